import {
  CharacterCodes,
  hexValue,
  isDigit,
  isIgnored,
  isLineBreak,
  isNamePart,
  isNameStart,
  isWhiteSpaceSingleLine
} from './character-codes.js';
import {
  ScannerErrorCode,
  SyntaxKind,
  TokenFlags
} from './token-types.js';

export type ScannerErrorCallback = (start: number, end: number, code: ScannerErrorCode, message: string) => void;

export interface Scanner {
  /** Initialize scanner text and optional start/length. */
  initText(text: string, start?: number, length?: number): void;

  /** Advances to the next significant token and updates all public token fields. */
  scan(): SyntaxKind;

  /** Receives lexical errors; scanning continues after each report. */
  setOnError(callback: ScannerErrorCallback | undefined): void;

  /** Current token type. */
  readonly token: SyntaxKind;

  /** Current token source text, delimiters included. */
  readonly tokenText: string;

  /** Decoded value of a string token (escapes resolved, block strings dedented). Empty for other tokens. */
  readonly tokenValue: string;

  /** Token flags. */
  readonly tokenFlags: TokenFlags;

  /** Offset where the current token starts. */
  readonly tokenStart: number;

  /** Where the next token scan will start (offset into the source). */
  readonly offsetNext: number;
}

/**
 * Closure-based GraphQL scanner.
 *
 * Emits punctuators, names, numbers and strings. Whitespace, line terminators,
 * commas and `#` comments are skipped between tokens.
 */
export function createScanner(): Scanner {
  let source = '';
  let pos = 0;
  let end = 0;

  let token: SyntaxKind = SyntaxKind.Unknown;
  let tokenText = '';
  let tokenValue = '';
  let tokenFlags: TokenFlags = TokenFlags.None;
  let tokenStart = 0;

  let onError: ScannerErrorCallback | undefined;

  function setText(text: string, start = 0, length = text.length - start): void {
    source = text;
    pos = start;
    end = Math.min(text.length, start + length);

    token = SyntaxKind.Unknown;
    tokenText = '';
    tokenValue = '';
    tokenFlags = TokenFlags.None;
    tokenStart = start;
  }

  function peek(at: number): number {
    return at < end ? source.charCodeAt(at) : -1;
  }

  function matches(text: string, at: number): boolean {
    return at + text.length <= end && source.startsWith(text, at);
  }

  function reportError(start: number, errorEnd: number, code: ScannerErrorCode, message: string): void {
    onError?.(start, errorEnd, code, message);
  }

  function describeCharacter(at: number): string {
    if (at >= end) return '<EOF>';
    const ch = source.charCodeAt(at);
    if (ch >= CharacterCodes.space && ch <= CharacterCodes.maxAsciiCharacter - 1) {
      return ch === CharacterCodes.doubleQuote ? '\'"\'' : `"${source[at]}"`;
    }
    return 'U+' + ch.toString(16).toUpperCase().padStart(4, '0');
  }

  function skipIgnored(): TokenFlags {
    let flags = TokenFlags.None;
    while (pos < end) {
      const ch = source.charCodeAt(pos);
      if (isLineBreak(ch)) {
        flags |= TokenFlags.PrecedingLineBreak;
        pos++;
      } else if (isIgnored(ch)) {
        pos++;
      } else if (ch === CharacterCodes.hash) {
        // Comment runs to the end of the line
        pos++;
        while (pos < end && !isLineBreak(source.charCodeAt(pos))) pos++;
      } else {
        break;
      }
    }
    return flags;
  }

  function scan(): SyntaxKind {
    tokenFlags = skipIgnored();
    tokenStart = pos;
    tokenValue = '';

    if (pos >= end) {
      token = SyntaxKind.EndOfFileToken;
      tokenText = '';
      return token;
    }

    const ch = source.charCodeAt(pos);
    switch (ch) {
      case CharacterCodes.exclamation: return finishPunctuator(SyntaxKind.BangToken, 1);
      case CharacterCodes.dollar: return finishPunctuator(SyntaxKind.DollarToken, 1);
      case CharacterCodes.ampersand: return finishPunctuator(SyntaxKind.AmpersandToken, 1);
      case CharacterCodes.openParen: return finishPunctuator(SyntaxKind.OpenParenToken, 1);
      case CharacterCodes.closeParen: return finishPunctuator(SyntaxKind.CloseParenToken, 1);
      case CharacterCodes.colon: return finishPunctuator(SyntaxKind.ColonToken, 1);
      case CharacterCodes.equals: return finishPunctuator(SyntaxKind.EqualsToken, 1);
      case CharacterCodes.at: return finishPunctuator(SyntaxKind.AtToken, 1);
      case CharacterCodes.openBracket: return finishPunctuator(SyntaxKind.OpenBracketToken, 1);
      case CharacterCodes.closeBracket: return finishPunctuator(SyntaxKind.CloseBracketToken, 1);
      case CharacterCodes.openBrace: return finishPunctuator(SyntaxKind.OpenBraceToken, 1);
      case CharacterCodes.bar: return finishPunctuator(SyntaxKind.BarToken, 1);
      case CharacterCodes.closeBrace: return finishPunctuator(SyntaxKind.CloseBraceToken, 1);
      case CharacterCodes.dot:
        if (matches('...', pos)) return finishPunctuator(SyntaxKind.DotDotDotToken, 3);
        return scanInvalidCharacter();
      case CharacterCodes.doubleQuote:
        return matches('"""', pos) ? scanBlockString() : scanString();
    }

    if (isNameStart(ch)) return scanName();
    if (isDigit(ch) || ch === CharacterCodes.minus) return scanNumber();

    return scanInvalidCharacter();
  }

  function finishPunctuator(kind: SyntaxKind, length: number): SyntaxKind {
    pos += length;
    token = kind;
    tokenText = source.slice(tokenStart, pos);
    return token;
  }

  function scanInvalidCharacter(): SyntaxKind {
    const ch = source.charCodeAt(pos);
    const description = describeCharacter(pos);
    // Keep surrogate pairs together
    pos += ch >= 0xD800 && ch <= 0xDBFF && pos + 1 < end ? 2 : 1;

    token = SyntaxKind.Unknown;
    tokenText = source.slice(tokenStart, pos);
    reportError(tokenStart, pos, ScannerErrorCode.InvalidCharacter, `Unexpected character: ${description}.`);
    return token;
  }

  function scanName(): SyntaxKind {
    pos++;
    while (pos < end && isNamePart(source.charCodeAt(pos))) pos++;

    token = SyntaxKind.Name;
    tokenText = source.slice(tokenStart, pos);
    return token;
  }

  function skipDigits(): boolean {
    if (!isDigit(peek(pos))) return false;
    while (isDigit(peek(pos))) pos++;
    return true;
  }

  function scanNumber(): SyntaxKind {
    let isFloat = false;

    if (peek(pos) === CharacterCodes.minus) pos++;

    if (peek(pos) === CharacterCodes._0) {
      pos++;
      if (isDigit(peek(pos))) {
        return invalidNumber(`unexpected digit after 0: ${describeCharacter(pos)}`);
      }
    } else if (!skipDigits()) {
      return invalidNumber(`expected digit but got: ${describeCharacter(pos)}`);
    }

    if (peek(pos) === CharacterCodes.dot) {
      isFloat = true;
      pos++;
      if (!skipDigits()) return invalidNumber(`expected digit but got: ${describeCharacter(pos)}`);
    }

    const exponent = peek(pos);
    if (exponent === CharacterCodes.E || exponent === CharacterCodes.e) {
      isFloat = true;
      pos++;
      const sign = peek(pos);
      if (sign === CharacterCodes.plus || sign === CharacterCodes.minus) pos++;
      if (!skipDigits()) return invalidNumber(`expected digit but got: ${describeCharacter(pos)}`);
    }

    // Numbers may not run straight into a name or another dot
    const next = peek(pos);
    if (next === CharacterCodes.dot || isNameStart(next)) {
      return invalidNumber(`expected digit but got: ${describeCharacter(pos)}`);
    }

    token = isFloat ? SyntaxKind.FloatLiteral : SyntaxKind.IntLiteral;
    tokenText = source.slice(tokenStart, pos);
    return token;
  }

  function invalidNumber(detail: string): SyntaxKind {
    const errorPos = pos;
    if (pos < end) pos++;

    token = SyntaxKind.Unknown;
    tokenText = source.slice(tokenStart, pos);
    reportError(errorPos, pos, ScannerErrorCode.InvalidNumber, `Invalid number, ${detail}.`);
    return token;
  }

  function scanString(): SyntaxKind {
    pos++;
    let value = '';
    let chunkStart = pos;

    while (pos < end) {
      const ch = source.charCodeAt(pos);

      if (ch === CharacterCodes.doubleQuote) {
        value += source.slice(chunkStart, pos);
        pos++;
        return finishString(value, TokenFlags.None);
      }

      if (isLineBreak(ch)) break;

      if (ch === CharacterCodes.backslash) {
        value += source.slice(chunkStart, pos);
        value += scanEscape();
        chunkStart = pos;
        continue;
      }

      pos++;
    }

    value += source.slice(chunkStart, pos);
    reportError(tokenStart, pos, ScannerErrorCode.UnterminatedString, 'Unterminated string.');
    return finishString(value, TokenFlags.Unterminated);
  }

  function scanEscape(): string {
    const escapeStart = pos;
    const ch = peek(pos + 1);
    pos = Math.min(pos + 2, end);

    switch (ch) {
      case CharacterCodes.doubleQuote: return '"';
      case CharacterCodes.backslash: return '\\';
      case CharacterCodes.slash: return '/';
      case CharacterCodes.b: return '\b';
      case CharacterCodes.f: return '\f';
      case CharacterCodes.n: return '\n';
      case CharacterCodes.r: return '\r';
      case CharacterCodes.t: return '\t';
      case CharacterCodes.u: {
        if (peek(pos) === CharacterCodes.openBrace) return scanBracedUnicode(escapeStart);

        let code = 0;
        for (let i = 0; i < 4; i++) {
          const digit = hexValue(peek(pos + i));
          if (digit < 0) {
            const errorEnd = Math.min(pos + i + 1, end);
            reportError(escapeStart, errorEnd, ScannerErrorCode.InvalidEscape,
              `Invalid Unicode escape sequence: "${source.slice(escapeStart, errorEnd)}".`);
            pos += i;
            return '';
          }
          code = code * 16 + digit;
        }
        pos += 4;
        return String.fromCharCode(code);
      }
    }

    reportError(escapeStart, pos, ScannerErrorCode.InvalidEscape,
      `Invalid character escape sequence: "${source.slice(escapeStart, pos)}".`);
    return '';
  }

  /**
   * `\u{1F600}`: any number of hex digits naming a Unicode scalar value
   */
  function scanBracedUnicode(escapeStart: number): string {
    let at = pos + 1;
    let code = 0;
    let digits = 0;

    while (at < end) {
      const ch = source.charCodeAt(at);
      if (ch === CharacterCodes.closeBrace) {
        if (digits > 0 && isUnicodeScalarValue(code)) {
          pos = at + 1;
          return String.fromCodePoint(code);
        }
        break;
      }

      const digit = hexValue(ch);
      if (digit < 0) break;
      code = code * 16 + digit;
      digits++;
      if (code > 0x10FFFF) break;
      at++;
    }

    const errorEnd = Math.min(at + 1, end);
    reportError(escapeStart, errorEnd, ScannerErrorCode.InvalidEscape,
      `Invalid Unicode escape sequence: "${source.slice(escapeStart, errorEnd)}".`);
    pos = at;
    return '';
  }

  function scanBlockString(): SyntaxKind {
    pos += 3;
    let raw = '';
    let chunkStart = pos;

    while (pos < end) {
      if (matches('"""', pos)) {
        raw += source.slice(chunkStart, pos);
        pos += 3;
        return finishString(dedentBlockString(raw), TokenFlags.BlockString);
      }

      if (matches('\\"""', pos)) {
        raw += source.slice(chunkStart, pos) + '"""';
        pos += 4;
        chunkStart = pos;
        continue;
      }

      pos++;
    }

    raw += source.slice(chunkStart, pos);
    reportError(tokenStart, pos, ScannerErrorCode.UnterminatedString, 'Unterminated string.');
    return finishString(dedentBlockString(raw), TokenFlags.BlockString | TokenFlags.Unterminated);
  }

  function finishString(value: string, flags: TokenFlags): SyntaxKind {
    token = SyntaxKind.StringLiteral;
    tokenText = source.slice(tokenStart, pos);
    tokenValue = value;
    tokenFlags |= flags;
    return token;
  }

  const scanner: Scanner = {
    scan,
    initText: setText,
    setOnError(callback) { onError = callback; },

    get token() { return token; },
    get tokenText() { return tokenText; },
    get tokenValue() { return tokenValue; },
    get tokenFlags() { return tokenFlags; },
    get tokenStart() { return tokenStart; },
    get offsetNext() { return pos; }
  };

  return scanner;
}

/**
 * Block string value: common indentation of all lines but the first is removed,
 * then leading and trailing blank lines are dropped.
 */
export function dedentBlockString(raw: string): string {
  const lines = raw.split(/\r\n|[\n\r]/g);

  let commonIndent: number | undefined;
  for (let i = 1; i < lines.length; i++) {
    const indent = leadingWhitespace(lines[i]);
    if (indent === lines[i].length) continue;
    if (commonIndent === undefined || indent < commonIndent) {
      commonIndent = indent;
    }
  }

  if (commonIndent) {
    for (let i = 1; i < lines.length; i++) {
      lines[i] = lines[i].slice(commonIndent);
    }
  }

  let first = 0;
  while (first < lines.length && isBlank(lines[first])) first++;
  let last = lines.length;
  while (last > first && isBlank(lines[last - 1])) last--;

  return lines.slice(first, last).join('\n');
}

function isUnicodeScalarValue(code: number): boolean {
  return (code >= 0 && code <= 0xD7FF) || (code >= 0xE000 && code <= 0x10FFFF);
}

function leadingWhitespace(line: string): number {
  let i = 0;
  while (i < line.length && isWhiteSpaceSingleLine(line.charCodeAt(i))) i++;
  return i;
}

function isBlank(line: string): boolean {
  return leadingWhitespace(line) === line.length;
}
