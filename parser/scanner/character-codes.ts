/**
 * Character code constants and classification functions
 * for the GraphQL lexical grammar.
 */

export const enum CharacterCodes {
  nullCharacter = 0,
  maxAsciiCharacter = 0x7F,

  lineFeed = 0x0A,              // \n
  carriageReturn = 0x0D,        // \r

  tab = 0x09,
  backspace = 0x08,
  formFeed = 0x0C,

  space = 0x20,
  exclamation = 0x21,           // !
  doubleQuote = 0x22,           // "
  hash = 0x23,                  // #
  dollar = 0x24,                // $
  ampersand = 0x26,             // &
  openParen = 0x28,             // (
  closeParen = 0x29,            // )
  plus = 0x2B,                  // +
  comma = 0x2C,                 // ,
  minus = 0x2D,                 // -
  dot = 0x2E,                   // .
  slash = 0x2F,                 // /

  _0 = 0x30,                    // 0
  _9 = 0x39,                    // 9

  colon = 0x3A,                 // :
  equals = 0x3D,                // =
  at = 0x40,                    // @

  A = 0x41, E = 0x45, F = 0x46, Z = 0x5A,

  openBracket = 0x5B,           // [
  backslash = 0x5C,             // \
  closeBracket = 0x5D,          // ]
  underscore = 0x5F,            // _

  a = 0x61, b = 0x62, e = 0x65, f = 0x66, n = 0x6E, r = 0x72, t = 0x74, u = 0x75,
  z = 0x7A,

  openBrace = 0x7B,             // {
  bar = 0x7C,                   // |
  closeBrace = 0x7D,            // }

  byteOrderMark = 0xFEFF,
}

/**
 * Line terminators: LF and CR (CRLF is consumed as one)
 */
export function isLineBreak(ch: number): boolean {
  return ch === CharacterCodes.lineFeed ||
         ch === CharacterCodes.carriageReturn;
}

/**
 * Spaces and tabs
 */
export function isWhiteSpaceSingleLine(ch: number): boolean {
  return ch === CharacterCodes.space ||
         ch === CharacterCodes.tab;
}

/**
 * Whitespace, line terminators, commas and the byte order mark
 * are all insignificant between tokens.
 */
export function isIgnored(ch: number): boolean {
  return isWhiteSpaceSingleLine(ch) ||
         isLineBreak(ch) ||
         ch === CharacterCodes.comma ||
         ch === CharacterCodes.byteOrderMark;
}

export function isLetter(ch: number): boolean {
  return (ch >= CharacterCodes.A && ch <= CharacterCodes.Z) ||
         (ch >= CharacterCodes.a && ch <= CharacterCodes.z);
}

export function isDigit(ch: number): boolean {
  return ch >= CharacterCodes._0 && ch <= CharacterCodes._9;
}

/**
 * Name start: `[_A-Za-z]`
 */
export function isNameStart(ch: number): boolean {
  return isLetter(ch) || ch === CharacterCodes.underscore;
}

/**
 * Name continue: `[_0-9A-Za-z]`
 */
export function isNamePart(ch: number): boolean {
  return isNameStart(ch) || isDigit(ch);
}

/**
 * Value of a single hex digit, or -1
 */
export function hexValue(ch: number): number {
  if (isDigit(ch)) return ch - CharacterCodes._0;
  if (ch >= CharacterCodes.A && ch <= CharacterCodes.F) return ch - CharacterCodes.A + 10;
  if (ch >= CharacterCodes.a && ch <= CharacterCodes.f) return ch - CharacterCodes.a + 10;
  return -1;
}
