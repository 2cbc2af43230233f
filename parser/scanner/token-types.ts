/**
 * Token types for the GraphQL query scanner, following TypeScript's SyntaxKind pattern.
 * Ignored tokens (whitespace, commas, comments) are consumed by the scanner and never emitted.
 */

export const enum SyntaxKind {
  Unknown,
  EndOfFileToken,

  // Punctuators
  BangToken,                  // !
  DollarToken,                // $
  AmpersandToken,             // &
  OpenParenToken,             // (
  CloseParenToken,            // )
  DotDotDotToken,             // ...
  ColonToken,                 // :
  EqualsToken,                // =
  AtToken,                    // @
  OpenBracketToken,           // [
  CloseBracketToken,          // ]
  OpenBraceToken,             // {
  BarToken,                   // |
  CloseBraceToken,            // }

  // Lexical tokens
  Name,
  IntLiteral,
  FloatLiteral,
  StringLiteral,
}

/**
 * Token flags
 */
export const enum TokenFlags {
  None = 0,
  PrecedingLineBreak = 1 << 0,   // A line terminator was skipped before this token
  BlockString = 1 << 1,          // """...""" string
  Unterminated = 1 << 2,         // Token was not properly terminated (missing closing delimiter)
}

/**
 * Scanner error codes
 */
export enum ScannerErrorCode {
  None,
  UnterminatedString,
  InvalidCharacter,
  InvalidNumber,
  InvalidEscape,
}

/**
 * Human-readable token description used in diagnostics
 */
export function describeToken(kind: SyntaxKind, text: string): string {
  switch (kind) {
    case SyntaxKind.EndOfFileToken:
      return '<EOF>';
    case SyntaxKind.Name:
      return `Name "${text}"`;
    case SyntaxKind.IntLiteral:
      return `Int "${text}"`;
    case SyntaxKind.FloatLiteral:
      return `Float "${text}"`;
    case SyntaxKind.StringLiteral:
      return 'String';
    default:
      return `"${text}"`;
  }
}
