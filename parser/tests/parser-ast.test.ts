/**
 * Tests for the query parser: node shapes, positions and diagnostics
 */

import { describe, expect, test } from 'vitest';
import { NodeKind, TypeKind, ValueKind, type Document } from '../ast-types.js';
import { printType } from '../ast-factory.js';
import { collectFields } from '../ast-traversal.js';
import { computeLineStarts, createParser, createPositionMapper, parseQuery } from '../core-parser.js';
import { isQuerySyntaxError, QuerySyntaxError } from '../errors.js';
import { DiagnosticSeverity, ParseErrorCode, type ParseDiagnostic } from '../parser-interfaces.js';

function diagnosticOf(source: string, parse: (text: string) => unknown = parseQuery): ParseDiagnostic {
  try {
    parse(source);
  } catch (error) {
    if (isQuerySyntaxError(error)) return error.diagnostic;
    throw error;
  }
  throw new Error(`Expected a syntax error for: ${source}`);
}

function firstVariables(document: Document) {
  const definition = document.definitions[0];
  if (definition.kind !== NodeKind.Query) throw new Error(`Expected a query, found ${NodeKind[definition.kind]}`);
  return definition.variableDefinitions;
}

describe('Operations', () => {
  test('parses a named query with positions', () => {
    const document = parseQuery('query Q { users { id country { id } } }');

    expect(document).toMatchObject({
      kind: NodeKind.Document,
      pos: 0,
      end: 39,
      definitions: [{
        kind: NodeKind.Query,
        name: 'Q',
        pos: 0,
        end: 39,
        variableDefinitions: [],
        selectionSet: {
          kind: NodeKind.SelectionSet,
          pos: 8,
          end: 39,
          items: [{
            kind: NodeKind.Field,
            name: 'users',
            pos: 10,
            end: 37,
            selectionSet: { pos: 16, end: 37 }
          }]
        }
      }]
    });
  });

  test('parses every definition kind', () => {
    const document = parseQuery(`
      { a }
      query { b }
      mutation M { c }
      subscription { d }
      fragment F on T { e }
    `);

    expect(document.definitions.map(definition => definition.kind)).toEqual([
      NodeKind.SelectionSet,
      NodeKind.Query,
      NodeKind.Mutation,
      NodeKind.Subscription,
      NodeKind.FragmentDefinition
    ]);
  });

  test('anonymous operations have no name', () => {
    const [definition] = parseQuery('query ($a: Int) { f }').definitions;
    expect(definition.kind).toBe(NodeKind.Query);
    expect('name' in definition && definition.name).toBeUndefined();
  });

  test('parses fragment definitions', () => {
    const [definition] = parseQuery('fragment Basic on User @live { id }').definitions;

    expect(definition).toMatchObject({
      kind: NodeKind.FragmentDefinition,
      name: 'Basic',
      typeCondition: { on: 'User', pos: 15, end: 22 },
      directives: [{ name: 'live', arguments: [] }],
      pos: 0,
      end: 35
    });
  });
});

describe('Variables and types', () => {
  test('parses types and default values', () => {
    const variables = firstVariables(parseQuery('query ($ids: [ID!]!, $limit: Int = 20, $opts: Options = { deep: true }) { f }'));

    expect(variables.map(variable => variable.name)).toEqual(['ids', 'limit', 'opts']);
    expect(variables.map(variable => printType(variable.varType))).toEqual(['[ID!]!', 'Int', 'Options']);
    expect(variables[0].varType.kind).toBe(TypeKind.NonNull);
    expect(variables[0].defaultValue).toBeUndefined();
    expect(variables[1].defaultValue).toEqual({ kind: ValueKind.Int, value: 20, raw: '20' });
    expect(variables[2].defaultValue).toEqual({
      kind: ValueKind.Object,
      fields: [{ name: 'deep', value: { kind: ValueKind.Boolean, value: true } }]
    });
  });

  test('variable definition spans end at the last token', () => {
    const variables = firstVariables(parseQuery('query ($a: Int = 1) { f }'));
    expect(variables[0]).toMatchObject({ pos: 7, end: 18 });
  });

  test('parses directives on variable definitions', () => {
    const variables = firstVariables(parseQuery('query ($a: Int = 1 @deprecated(reason: "old")) { f }'));

    expect(variables[0]).toMatchObject({
      name: 'a',
      defaultValue: { kind: ValueKind.Int, value: 1 },
      directives: [{
        name: 'deprecated',
        arguments: [{ name: 'reason', value: { kind: ValueKind.String, value: 'old', block: false } }]
      }],
      pos: 7,
      end: 45
    });
  });

  test('variables without directives have an empty list', () => {
    expect(firstVariables(parseQuery('query ($a: Int) { f }'))[0].directives).toEqual([]);
  });

  test('rejects variables in variable definition directives', () => {
    expect(diagnosticOf('query ($a: Int @x(v: $a)) { f }')).toMatchObject({
      code: ParseErrorCode.UNEXPECTED_TOKEN,
      message: 'Unexpected variable "$a" in constant value.',
      column: 22
    });
  });

  test('rejects variables in default values', () => {
    const diagnostic = diagnosticOf('query ($a: Int = $b) { f }');

    expect(diagnostic).toMatchObject({
      code: ParseErrorCode.UNEXPECTED_TOKEN,
      message: 'Unexpected variable "$b" in constant value.',
      line: 1,
      column: 18
    });
  });
});

describe('Fields and values', () => {
  test('parses aliases, arguments and directives', () => {
    const [field] = collectFields(parseQuery(
      '{ me: user(id: 4, tags: ["a", "b"], filter: { active: true, rank: -1.5e3 }, kind: ADMIN, note: null) @include(if: $show) }'
    ));

    expect(field.alias).toBe('me');
    expect(field.name).toBe('user');
    expect(field.selectionSet).toBeUndefined();
    expect(field.arguments).toEqual([
      { name: 'id', value: { kind: ValueKind.Int, value: 4, raw: '4' } },
      {
        name: 'tags',
        value: {
          kind: ValueKind.List,
          values: [
            { kind: ValueKind.String, value: 'a', block: false },
            { kind: ValueKind.String, value: 'b', block: false }
          ]
        }
      },
      {
        name: 'filter',
        value: {
          kind: ValueKind.Object,
          fields: [
            { name: 'active', value: { kind: ValueKind.Boolean, value: true } },
            { name: 'rank', value: { kind: ValueKind.Float, value: -1500, raw: '-1.5e3' } }
          ]
        }
      },
      { name: 'kind', value: { kind: ValueKind.Enum, value: 'ADMIN' } },
      { name: 'note', value: { kind: ValueKind.Null } }
    ]);
    expect(field.directives).toMatchObject([
      { name: 'include', arguments: [{ name: 'if', value: { kind: ValueKind.Variable, name: 'show' } }] }
    ]);
  });

  test('keeps the exact literal of large integers', () => {
    const [field] = collectFields(parseQuery('{ f(n: 12345678901234567890) }'));
    expect(field.arguments[0].value).toMatchObject({ kind: ValueKind.Int, raw: '12345678901234567890' });
  });

  test('decodes string escapes', () => {
    const [field] = collectFields(parseQuery('{ f(s: "a\\"b\\u0041\\n") }'));
    expect(field.arguments[0].value).toEqual({ kind: ValueKind.String, value: 'a"bA\n', block: false });
  });

  test('decodes braced unicode escapes', () => {
    const [field] = collectFields(parseQuery('{ f(s: "smile \\u{1F600}") }'));
    expect(field.arguments[0].value).toEqual({ kind: ValueKind.String, value: 'smile \u{1F600}', block: false });
  });

  test('dedents block strings', () => {
    const [field] = collectFields(parseQuery('{ f(text: """\n    Hello,\n      World!\n\n    Bye\n  """) }'));
    expect(field.arguments[0].value).toEqual({ kind: ValueKind.String, value: 'Hello,\n  World!\n\nBye', block: true });
  });

  test('parses spreads and inline fragments', () => {
    const document = parseQuery('{ ...Details @skip(if: true) ... @defer { a } ... on User { b } }');
    const definition = document.definitions[0];
    if (definition.kind !== NodeKind.SelectionSet) throw new Error('Expected a selection set');

    expect(definition.items).toMatchObject([
      { kind: NodeKind.FragmentSpread, fragmentName: 'Details', directives: [{ name: 'skip' }], pos: 2, end: 28 },
      { kind: NodeKind.InlineFragment, typeCondition: undefined, directives: [{ name: 'defer' }], pos: 29, end: 45 },
      { kind: NodeKind.InlineFragment, typeCondition: { on: 'User' }, directives: [], pos: 46, end: 63 }
    ]);
  });

  test('ignores commas and comments', () => {
    const document = parseQuery('{ a, b # trailing\n, c }');
    expect(collectFields(document).map(field => field.name)).toEqual(['a', 'b', 'c']);
  });
});

describe('Syntax errors', () => {
  test('reports a missing field name', () => {
    const diagnostic = diagnosticOf('{ }');

    expect(diagnostic).toMatchObject({
      severity: DiagnosticSeverity.Error,
      code: ParseErrorCode.UNEXPECTED_TOKEN,
      message: 'Expected Name, found "}".',
      pos: 2,
      line: 1,
      column: 3
    });
  });

  test('reports an unexpected end of file', () => {
    expect(diagnosticOf('query Q { a')).toMatchObject({
      code: ParseErrorCode.UNEXPECTED_END_OF_FILE,
      message: 'Expected Name, found <EOF>.',
      line: 1,
      column: 12
    });
  });

  test('reports lines and columns across line breaks', () => {
    expect(diagnosticOf('{\n  a\n  ...\n}')).toMatchObject({
      message: 'Expected "{", found "}".',
      pos: 12,
      line: 4,
      column: 1
    });
  });

  test('reports lexical errors', () => {
    expect(diagnosticOf('{ f(a: "abc) }')).toMatchObject({
      code: ParseErrorCode.UNTERMINATED_STRING,
      message: 'Unterminated string.',
      column: 8
    });
    expect(diagnosticOf('{ a ? }')).toMatchObject({
      code: ParseErrorCode.INVALID_CHARACTER,
      message: 'Unexpected character: "?".',
      column: 5
    });
    expect(diagnosticOf('{ f(n: 007) }')).toMatchObject({
      code: ParseErrorCode.INVALID_NUMBER,
      message: 'Invalid number, unexpected digit after 0: "0".',
      column: 9
    });
  });

  test('rejects type system definitions', () => {
    expect(diagnosticOf('type User { id: ID }')).toMatchObject({
      code: ParseErrorCode.UNSUPPORTED_DEFINITION,
      message: 'Unexpected type system definition "type" in an executable document.',
      line: 1,
      column: 1
    });
  });

  test('error messages carry the location', () => {
    let caught: unknown;
    try {
      parseQuery('query ($a: Int = $b) { f }');
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(QuerySyntaxError);
    expect(caught).toMatchObject({
      name: 'QuerySyntaxError',
      message: 'Syntax Error: Unexpected variable "$b" in constant value. (1:18)'
    });
  });
});

describe('Parse options', () => {
  test('rejects empty documents unless allowed', () => {
    expect(diagnosticOf('')).toMatchObject({ code: ParseErrorCode.EMPTY_DOCUMENT, message: 'Document contains no definitions.' });
    expect(diagnosticOf('# only a comment')).toMatchObject({ code: ParseErrorCode.EMPTY_DOCUMENT });
    expect(parseQuery('', { allowEmptyDocument: true }).definitions).toEqual([]);
  });

  test('aborts past the token limit', () => {
    expect(diagnosticOf('{ a b c }', text => parseQuery(text, { maxTokens: 3 }))).toMatchObject({
      code: ParseErrorCode.TOKEN_LIMIT_EXCEEDED,
      message: 'Document contains more than 3 tokens. Parsing aborted.'
    });
    expect(parseQuery('{ a b c }', { maxTokens: 5 }).definitions).toHaveLength(1);
  });

  test('aborts past the nesting limit', () => {
    const depth = 20000;
    const deep = '{ a '.repeat(depth) + '}'.repeat(depth);

    expect(diagnosticOf(deep)).toMatchObject({
      code: ParseErrorCode.DEPTH_LIMIT_EXCEEDED,
      message: 'Document nests deeper than 1000 levels. Parsing aborted.',
      pos: 4000,
      column: 4001
    });
  });

  test('counts selection sets and values toward the nesting limit', () => {
    const parseShallow = (text: string) => parseQuery(text, { maxDepth: 2 });

    expect(diagnosticOf('{ a { b { c } } }', parseShallow)).toMatchObject({
      code: ParseErrorCode.DEPTH_LIMIT_EXCEEDED,
      message: 'Document nests deeper than 2 levels. Parsing aborted.',
      column: 9
    });
    expect(diagnosticOf('{ f(v: [[1]]) }', parseShallow)).toMatchObject({
      code: ParseErrorCode.DEPTH_LIMIT_EXCEEDED,
      column: 9
    });
    expect(collectFields(parseShallow('{ a(v: [1]) { b } c { d } }')).map(field => field.name)).toEqual(['a', 'b', 'c', 'd']);
  });

  test('rejects documents over the size limit', () => {
    const parser = createParser({ maxDocumentSize: 8 });
    expect(diagnosticOf('{ abcdefgh }', text => parser.parseDocument(text))).toMatchObject({
      code: ParseErrorCode.DOCUMENT_TOO_LARGE,
      message: 'Document is 12 characters long, the limit is 8.'
    });
  });

  test('applies default parse options', () => {
    const parser = createParser({ defaultParseOptions: { allowEmptyDocument: true } });
    expect(parser.parseDocument('   ').document.definitions).toEqual([]);
  });

  test('reports parse statistics', () => {
    const result = createParser().parseDocument('{ a }\n{ b }');

    expect(result.tokenCount).toBe(6);
    expect(result.lineStarts).toEqual([0, 6]);
    expect(result.sourceText).toBe('{ a }\n{ b }');
    expect(result.parseTime).toBeGreaterThanOrEqual(0);
  });
});

describe('Position mapping', () => {
  test('handles every line break style', () => {
    expect(computeLineStarts('a\nb\r\nc\rd')).toEqual([0, 2, 5, 7]);
  });

  test('converts between offsets and positions', () => {
    const mapper = createPositionMapper(computeLineStarts('ab\ncd\nef'));

    expect(mapper.getLineCount()).toBe(3);
    expect(mapper.offsetToPosition(4)).toEqual({ line: 2, column: 2 });
    expect(mapper.positionToOffset(3, 1)).toBe(6);
  });
});
