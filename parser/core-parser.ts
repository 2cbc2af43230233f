/**
 * Core Parser Implementation
 *
 * Recursive-descent parser for GraphQL executable documents. The source is
 * scanned into a token array up front, then definitions are parsed from it.
 * The first lexical or syntax error aborts the parse with a
 * {@link QuerySyntaxError}.
 */

import {
  type Argument,
  type Definition,
  type Directive,
  type Document,
  type Field,
  type FragmentDefinition,
  type FragmentSpread,
  type InlineFragment,
  type ListType,
  type NamedType,
  type ObjectField,
  type OperationDefinition,
  type Selection,
  type SelectionSet,
  type Type,
  type TypeCondition,
  type Value,
  ValueKind,
  type VariableDefinition
} from './ast-types.js';
import {
  createDirective,
  createDocumentNode,
  createFieldNode,
  createFragmentDefinitionNode,
  createFragmentSpreadNode,
  createInlineFragmentNode,
  createMutationNode,
  createQueryNode,
  createSelectionSetNode,
  createSubscriptionNode,
  createTypeCondition,
  createVariableDefinitionNode,
  floatValue,
  intValue,
  listType,
  namedType,
  nonNullType,
  type OperationParts
} from './ast-factory.js';
import { QuerySyntaxError } from './errors.js';
import {
  DiagnosticSeverity,
  ParseErrorCode,
  type ParseDiagnostic,
  type ParseOptions,
  type ParseResult,
  type Parser,
  type ParserOptions,
  type PositionMapper,
  type TextOptions
} from './parser-interfaces.js';
import { createScanner } from './scanner/scanner.js';
import { ScannerErrorCode, SyntaxKind, TokenFlags, describeToken } from './scanner/token-types.js';
import { sliceText, type Text, type TextFactory } from './text.js';

const DEFAULT_MAX_DOCUMENT_SIZE = 10 * 1024 * 1024;
const DEFAULT_MAX_DEPTH = 1000;

/**
 * Keywords that open type system definitions, which executable documents do not contain
 */
const TYPE_SYSTEM_KEYWORDS: ReadonlySet<string> = new Set([
  'schema', 'scalar', 'type', 'interface', 'union', 'enum', 'input', 'directive', 'extend'
]);

/**
 * Token structure from scanner
 */
interface Token {
  kind: SyntaxKind;
  flags: TokenFlags;
  pos: number;
  end: number;
  text: string;
  value: string;
}

/**
 * Parser context for state management
 */
interface ParserContext {
  tokens: Token[];
  currentIndex: number;
  depth: number;
  sourceText: string;
  options: ParseOptions;
  positions: PositionMapper;
}

type OperationFactory<T extends Text> = (
  pos: number,
  end: number,
  selectionSet: SelectionSet<T>,
  parts: OperationParts<T>
) => OperationDefinition<T>;

/**
 * Core parser implementation class
 */
class CoreParser<T extends Text> implements Parser<T> {
  private readonly defaultOptions: ParseOptions;
  private readonly maxDocumentSize: number;

  constructor(private readonly createText: TextFactory<T>, options?: ParserOptions) {
    this.defaultOptions = {
      allowEmptyDocument: false,
      ...options?.defaultParseOptions
    };
    this.maxDocumentSize = options?.maxDocumentSize ?? DEFAULT_MAX_DOCUMENT_SIZE;
  }

  parseDocument(text: string, options?: ParseOptions): ParseResult<T> {
    const startTime = performance.now();
    const parseOptions = { ...this.defaultOptions, ...options };
    const lineStarts = computeLineStarts(text);
    const positions = createPositionMapper(lineStarts);

    if (text.length > this.maxDocumentSize) {
      throw new QuerySyntaxError(createDiagnostic(positions, ParseErrorCode.DOCUMENT_TOO_LARGE,
        `Document is ${text.length} characters long, the limit is ${this.maxDocumentSize}.`, 0, 0));
    }

    const context: ParserContext = {
      tokens: this.scanAllTokens(text, parseOptions, positions),
      currentIndex: 0,
      depth: 0,
      sourceText: text,
      options: parseOptions,
      positions
    };

    const document = this.parseDocumentRoot(context);

    return {
      document,
      parseTime: performance.now() - startTime,
      tokenCount: context.tokens.length - 1,
      lineStarts,
      sourceText: text
    };
  }

  /**
   * Scan all tokens from the source text, stopping at the first lexical error
   */
  private scanAllTokens(text: string, options: ParseOptions, positions: PositionMapper): Token[] {
    const scanner = createScanner();
    const errors: ParseDiagnostic[] = [];
    const maxTokens = options.maxTokens ?? Number.POSITIVE_INFINITY;
    const tokens: Token[] = [];

    scanner.initText(text);
    scanner.setOnError((start, end, code, message) => {
      errors.push(createDiagnostic(positions, fromScannerError(code), message, start, end));
    });

    while (true) {
      const kind = scanner.scan();
      if (errors.length > 0) {
        throw new QuerySyntaxError(errors[0]);
      }

      tokens.push({
        kind,
        flags: scanner.tokenFlags,
        pos: scanner.tokenStart,
        end: scanner.offsetNext,
        text: scanner.tokenText,
        value: scanner.tokenValue
      });

      if (kind === SyntaxKind.EndOfFileToken) break;

      if (tokens.length > maxTokens) {
        throw new QuerySyntaxError(createDiagnostic(positions, ParseErrorCode.TOKEN_LIMIT_EXCEEDED,
          `Document contains more than ${maxTokens} tokens. Parsing aborted.`, scanner.tokenStart, scanner.offsetNext));
      }
    }

    return tokens;
  }

  /**
   * Parse the document root
   */
  private parseDocumentRoot(context: ParserContext): Document<T> {
    const definitions: Definition<T>[] = [];

    while (this.currentToken(context).kind !== SyntaxKind.EndOfFileToken) {
      definitions.push(this.parseDefinition(context));
    }

    if (definitions.length === 0 && !context.options.allowEmptyDocument) {
      this.fail(context, ParseErrorCode.EMPTY_DOCUMENT, 'Document contains no definitions.', this.currentToken(context));
    }

    return createDocumentNode(0, context.sourceText.length, definitions);
  }

  private parseDefinition(context: ParserContext): Definition<T> {
    const token = this.currentToken(context);

    if (token.kind === SyntaxKind.OpenBraceToken) {
      return this.parseSelectionSet(context);
    }

    if (token.kind === SyntaxKind.Name) {
      switch (token.text) {
        case 'query':
          return this.parseTypedOperation(context, createQueryNode);
        case 'mutation':
          return this.parseTypedOperation(context, createMutationNode);
        case 'subscription':
          return this.parseTypedOperation(context, createSubscriptionNode);
        case 'fragment':
          return this.parseFragmentDefinition(context);
      }

      if (TYPE_SYSTEM_KEYWORDS.has(token.text)) {
        this.fail(context, ParseErrorCode.UNSUPPORTED_DEFINITION,
          `Unexpected type system definition "${token.text}" in an executable document.`, token);
      }
    }

    return this.unexpected(context);
  }

  /**
   * `query|mutation|subscription Name? VariableDefinitions? Directives? SelectionSet`
   */
  private parseTypedOperation(context: ParserContext, create: OperationFactory<T>): OperationDefinition<T> {
    const start = this.nextToken(context).pos;

    const name = this.currentToken(context).kind === SyntaxKind.Name ? this.parseName(context) : undefined;
    const variableDefinitions = this.parseVariableDefinitions(context);
    const directives = this.parseDirectives(context, false);
    const selectionSet = this.parseSelectionSet(context);

    return create(start, selectionSet.end, selectionSet, { name, variableDefinitions, directives });
  }

  /**
   * `fragment Name on Type Directives? SelectionSet`
   */
  private parseFragmentDefinition(context: ParserContext): FragmentDefinition<T> {
    const start = this.nextToken(context).pos;

    if (this.isKeyword(context, 'on')) {
      this.unexpected(context);
    }

    const name = this.parseName(context);
    const typeCondition = this.parseTypeCondition(context);
    const directives = this.parseDirectives(context, false);
    const selectionSet = this.parseSelectionSet(context);

    return createFragmentDefinitionNode(start, selectionSet.end, name, typeCondition, selectionSet, directives);
  }

  private parseVariableDefinitions(context: ParserContext): VariableDefinition<T>[] {
    const definitions: VariableDefinition<T>[] = [];
    if (!this.parseOptional(context, SyntaxKind.OpenParenToken)) return definitions;

    do {
      definitions.push(this.parseVariableDefinition(context));
    } while (!this.parseOptional(context, SyntaxKind.CloseParenToken));

    return definitions;
  }

  /**
   * `$name: Type = DefaultValue @ConstDirectives`
   */
  private parseVariableDefinition(context: ParserContext): VariableDefinition<T> {
    const start = this.parseExpected(context, SyntaxKind.DollarToken, '"$"').pos;
    const name = this.parseName(context);
    this.parseExpected(context, SyntaxKind.ColonToken, '":"');
    const varType = this.parseType(context);
    const defaultValue = this.parseOptional(context, SyntaxKind.EqualsToken) ? this.parseValue(context, true) : undefined;
    const directives = this.parseDirectives(context, true);

    return createVariableDefinitionNode(start, this.lastTokenEnd(context), name, varType, defaultValue, directives);
  }

  private parseType(context: ParserContext): Type<T> {
    let type: NamedType<T> | ListType<T>;

    if (this.parseOptional(context, SyntaxKind.OpenBracketToken)) {
      const itemType = this.parseType(context);
      this.parseExpected(context, SyntaxKind.CloseBracketToken, '"]"');
      type = listType(itemType);
    } else {
      type = namedType(this.parseName(context));
    }

    return this.parseOptional(context, SyntaxKind.BangToken) ? nonNullType(type) : type;
  }

  private parseSelectionSet(context: ParserContext): SelectionSet<T> {
    const open = this.parseExpected(context, SyntaxKind.OpenBraceToken, '"{"');
    const items: Selection<T>[] = [];

    this.enterNesting(context, open);
    do {
      items.push(this.parseSelection(context));
    } while (!this.parseOptional(context, SyntaxKind.CloseBraceToken));
    context.depth--;

    return createSelectionSetNode(open.pos, this.lastTokenEnd(context), items);
  }

  private parseSelection(context: ParserContext): Selection<T> {
    return this.currentToken(context).kind === SyntaxKind.DotDotDotToken
      ? this.parseFragment(context)
      : this.parseField(context);
  }

  /**
   * `Alias? Name Arguments? Directives? SelectionSet?`
   */
  private parseField(context: ParserContext): Field<T> {
    const start = this.currentToken(context).pos;

    const nameOrAlias = this.parseName(context);
    let alias: T | undefined;
    let name: T;
    if (this.parseOptional(context, SyntaxKind.ColonToken)) {
      alias = nameOrAlias;
      name = this.parseName(context);
    } else {
      name = nameOrAlias;
    }

    const args = this.parseArguments(context, false);
    const directives = this.parseDirectives(context, false);
    const selectionSet = this.currentToken(context).kind === SyntaxKind.OpenBraceToken
      ? this.parseSelectionSet(context)
      : undefined;

    return createFieldNode(start, this.lastTokenEnd(context), name, { alias, arguments: args, directives, selectionSet });
  }

  /**
   * `...Name Directives?` or `... TypeCondition? Directives? SelectionSet`
   */
  private parseFragment(context: ParserContext): FragmentSpread<T> | InlineFragment<T> {
    const start = this.nextToken(context).pos;

    const hasTypeCondition = this.isKeyword(context, 'on');
    if (!hasTypeCondition && this.currentToken(context).kind === SyntaxKind.Name) {
      const fragmentName = this.parseName(context);
      const directives = this.parseDirectives(context, false);
      return createFragmentSpreadNode(start, this.lastTokenEnd(context), fragmentName, directives);
    }

    const typeCondition = hasTypeCondition ? this.parseTypeCondition(context) : undefined;
    const directives = this.parseDirectives(context, false);
    const selectionSet = this.parseSelectionSet(context);

    return createInlineFragmentNode(start, selectionSet.end, selectionSet, typeCondition, directives);
  }

  private parseTypeCondition(context: ParserContext): TypeCondition<T> {
    const start = this.currentToken(context).pos;
    if (!this.isKeyword(context, 'on')) {
      this.unexpected(context, '"on"');
    }
    this.nextToken(context);

    const on = this.parseName(context);
    return createTypeCondition(start, this.lastTokenEnd(context), on);
  }

  private parseDirectives(context: ParserContext, isConst: boolean): Directive<T>[] {
    const directives: Directive<T>[] = [];

    while (this.currentToken(context).kind === SyntaxKind.AtToken) {
      const start = this.nextToken(context).pos;
      const name = this.parseName(context);
      const args = this.parseArguments(context, isConst);
      directives.push(createDirective(start, this.lastTokenEnd(context), name, args));
    }

    return directives;
  }

  private parseArguments(context: ParserContext, isConst: boolean): Argument<T>[] {
    const args: Argument<T>[] = [];
    if (!this.parseOptional(context, SyntaxKind.OpenParenToken)) return args;

    do {
      const name = this.parseName(context);
      this.parseExpected(context, SyntaxKind.ColonToken, '":"');
      args.push({ name, value: this.parseValue(context, isConst) });
    } while (!this.parseOptional(context, SyntaxKind.CloseParenToken));

    return args;
  }

  /**
   * Values; variables are rejected where a constant is required
   */
  private parseValue(context: ParserContext, isConst: boolean): Value<T> {
    const token = this.currentToken(context);

    switch (token.kind) {
      case SyntaxKind.OpenBracketToken: {
        this.enterNesting(context, this.nextToken(context));
        const values: Value<T>[] = [];
        while (!this.parseOptional(context, SyntaxKind.CloseBracketToken)) {
          values.push(this.parseValue(context, isConst));
        }
        context.depth--;
        return { kind: ValueKind.List, values };
      }

      case SyntaxKind.OpenBraceToken: {
        this.enterNesting(context, this.nextToken(context));
        const fields: ObjectField<T>[] = [];
        while (!this.parseOptional(context, SyntaxKind.CloseBraceToken)) {
          const name = this.parseName(context);
          this.parseExpected(context, SyntaxKind.ColonToken, '":"');
          fields.push({ name, value: this.parseValue(context, isConst) });
        }
        context.depth--;
        return { kind: ValueKind.Object, fields };
      }

      case SyntaxKind.IntLiteral:
        this.nextToken(context);
        return intValue(token.text);

      case SyntaxKind.FloatLiteral:
        this.nextToken(context);
        return floatValue(token.text);

      case SyntaxKind.StringLiteral:
        this.nextToken(context);
        return { kind: ValueKind.String, value: token.value, block: (token.flags & TokenFlags.BlockString) !== 0 };

      case SyntaxKind.Name:
        this.nextToken(context);
        switch (token.text) {
          case 'true': return { kind: ValueKind.Boolean, value: true };
          case 'false': return { kind: ValueKind.Boolean, value: false };
          case 'null': return { kind: ValueKind.Null };
          default: return { kind: ValueKind.Enum, value: this.textOf(context, token) };
        }

      case SyntaxKind.DollarToken: {
        if (isConst) {
          const nameToken = this.peekToken(context);
          const variable = nameToken.kind === SyntaxKind.Name ? `"$${nameToken.text}"` : '"$"';
          this.fail(context, ParseErrorCode.UNEXPECTED_TOKEN, `Unexpected variable ${variable} in constant value.`, token);
        }
        this.nextToken(context);
        return { kind: ValueKind.Variable, name: this.parseName(context) };
      }
    }

    return this.unexpected(context);
  }

  /**
   * Selection sets, list values and object values each open one level
   */
  private enterNesting(context: ParserContext, open: Token): void {
    const maxDepth = context.options.maxDepth ?? DEFAULT_MAX_DEPTH;
    if (++context.depth > maxDepth) {
      this.fail(context, ParseErrorCode.DEPTH_LIMIT_EXCEEDED,
        `Document nests deeper than ${maxDepth} levels. Parsing aborted.`, open);
    }
  }

  private parseName(context: ParserContext): T {
    const token = this.parseExpected(context, SyntaxKind.Name, 'Name');
    return this.textOf(context, token);
  }

  private textOf(context: ParserContext, token: Token): T {
    return this.createText(context.sourceText, token.pos, token.end);
  }

  // ===========================================================================
  // Token Helpers
  // ===========================================================================

  private currentToken(context: ParserContext): Token {
    return context.tokens[context.currentIndex];
  }

  private peekToken(context: ParserContext): Token {
    return context.tokens[Math.min(context.currentIndex + 1, context.tokens.length - 1)];
  }

  /**
   * Returns the current token and moves past it; never moves past end of file
   */
  private nextToken(context: ParserContext): Token {
    const token = this.currentToken(context);
    if (token.kind !== SyntaxKind.EndOfFileToken) {
      context.currentIndex++;
    }
    return token;
  }

  private parseExpected(context: ParserContext, kind: SyntaxKind, description: string): Token {
    if (this.currentToken(context).kind !== kind) {
      this.unexpected(context, description);
    }
    return this.nextToken(context);
  }

  private parseOptional(context: ParserContext, kind: SyntaxKind): boolean {
    if (this.currentToken(context).kind === kind) {
      this.nextToken(context);
      return true;
    }
    return false;
  }

  private isKeyword(context: ParserContext, keyword: string): boolean {
    const token = this.currentToken(context);
    return token.kind === SyntaxKind.Name && token.text === keyword;
  }

  /**
   * Get the end position of the last processed token
   */
  private lastTokenEnd(context: ParserContext): number {
    return context.tokens[Math.max(0, context.currentIndex - 1)].end;
  }

  private unexpected(context: ParserContext, expected?: string): never {
    const token = this.currentToken(context);
    const found = describeToken(token.kind, token.text);
    const code = token.kind === SyntaxKind.EndOfFileToken
      ? ParseErrorCode.UNEXPECTED_END_OF_FILE
      : ParseErrorCode.UNEXPECTED_TOKEN;

    return this.fail(context, code, expected ? `Expected ${expected}, found ${found}.` : `Unexpected ${found}.`, token);
  }

  private fail(context: ParserContext, code: ParseErrorCode, message: string, token: Token): never {
    throw new QuerySyntaxError(createDiagnostic(context.positions, code, message, token.pos, token.end));
  }
}

function createDiagnostic(
  positions: PositionMapper,
  code: ParseErrorCode,
  message: string,
  pos: number,
  end: number
): ParseDiagnostic {
  const { line, column } = positions.offsetToPosition(pos);
  return { severity: DiagnosticSeverity.Error, code, message, pos, end, line, column };
}

function fromScannerError(code: ScannerErrorCode): ParseErrorCode {
  switch (code) {
    case ScannerErrorCode.UnterminatedString:
      return ParseErrorCode.UNTERMINATED_STRING;
    case ScannerErrorCode.InvalidNumber:
      return ParseErrorCode.INVALID_NUMBER;
    case ScannerErrorCode.InvalidEscape:
      return ParseErrorCode.INVALID_ESCAPE;
    case ScannerErrorCode.InvalidCharacter:
    case ScannerErrorCode.None:
      return ParseErrorCode.INVALID_CHARACTER;
  }
}

/**
 * Compute line starts for position mapping (LF, CRLF and CR all end a line)
 */
export function computeLineStarts(text: string): number[] {
  const lineStarts = [0];

  for (let i = 0; i < text.length; i++) {
    const ch = text.charCodeAt(i);
    if (ch === 0x0D) {
      if (text.charCodeAt(i + 1) === 0x0A) i++;
      lineStarts.push(i + 1);
    } else if (ch === 0x0A) {
      lineStarts.push(i + 1);
    }
  }

  return lineStarts;
}

export function createPositionMapper(lineStarts: ReadonlyArray<number>): PositionMapper {
  function lineIndexOf(offset: number): number {
    let low = 0;
    let high = lineStarts.length - 1;
    while (low < high) {
      const middle = (low + high + 1) >> 1;
      if (lineStarts[middle] <= offset) {
        low = middle;
      } else {
        high = middle - 1;
      }
    }
    return low;
  }

  return {
    offsetToPosition(offset) {
      const index = lineIndexOf(offset);
      return { line: index + 1, column: offset - lineStarts[index] + 1 };
    },
    positionToOffset(line, column) {
      const index = Math.min(Math.max(line - 1, 0), lineStarts.length - 1);
      return lineStarts[index] + column - 1;
    },
    getLineCount() {
      return lineStarts.length;
    }
  };
}

/**
 * Parser factory function. Names are strings unless `createText` is given.
 */
export function createParser(options?: ParserOptions): Parser<string>;
export function createParser<T extends Text>(options: ParserOptions & TextOptions<T>): Parser<T>;
export function createParser<T extends Text>(
  options?: ParserOptions & Partial<TextOptions<T>>
): Parser<T> | Parser<string> {
  if (options?.createText) {
    return new CoreParser(options.createText, options);
  }
  return new CoreParser(sliceText, options);
}

/**
 * Parse a query document in one call
 *
 * Nesting is capped by `maxDepth` (default 1000), which also bounds the
 * recursion of `walkDocument` over the result.
 *
 * @example
 * ```typescript
 * const document = parseQuery('{ viewer { login } }');
 * const viewTree = parseQuery('{ viewer { login } }', { createText: sourceText });
 * ```
 */
export function parseQuery(source: string, options?: ParseOptions): Document<string>;
export function parseQuery<T extends Text>(source: string, options: ParseOptions & TextOptions<T>): Document<T>;
export function parseQuery<T extends Text>(
  source: string,
  options?: ParseOptions & Partial<TextOptions<T>>
): Document<T> | Document<string> {
  if (options?.createText) {
    return new CoreParser(options.createText).parseDocument(source, options).document;
  }
  return new CoreParser(sliceText).parseDocument(source, options).document;
}
