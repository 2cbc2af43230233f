/**
 * Parser Interfaces and Types
 */

import type { Document } from './ast-types.js';
import type { Text, TextFactory } from './text.js';

/**
 * Per-document parse options
 */
export interface ParseOptions {
  /** Abort once more than this many tokens have been scanned (default: unlimited) */
  maxTokens?: number;

  /** Abort once selection sets, lists and objects nest deeper than this (default: 1000) */
  maxDepth?: number;

  /** Accept a document with no definitions (default: false) */
  allowEmptyDocument?: boolean;
}

/**
 * Parser creation options
 */
export interface ParserOptions {
  /** Default parse options for all operations */
  defaultParseOptions?: ParseOptions;

  /** Maximum document size to parse in characters (default: 10MB) */
  maxDocumentSize?: number;
}

/**
 * Selects the name representation of the trees a parser builds
 */
export interface TextOptions<T extends Text> {
  createText: TextFactory<T>;
}

/**
 * Diagnostic severity levels
 */
export enum DiagnosticSeverity {
  Error = 'error',
}

/**
 * Parse error codes for machine-readable diagnostics
 */
export enum ParseErrorCode {
  UNEXPECTED_TOKEN = 'unexpected-token',
  UNEXPECTED_END_OF_FILE = 'unexpected-end-of-file',
  UNTERMINATED_STRING = 'unterminated-string',
  INVALID_CHARACTER = 'invalid-character',
  INVALID_NUMBER = 'invalid-number',
  INVALID_ESCAPE = 'invalid-escape',
  TOKEN_LIMIT_EXCEEDED = 'token-limit-exceeded',
  DEPTH_LIMIT_EXCEEDED = 'depth-limit-exceeded',
  DOCUMENT_TOO_LARGE = 'document-too-large',
  EMPTY_DOCUMENT = 'empty-document',
  UNSUPPORTED_DEFINITION = 'unsupported-definition',
}

/**
 * Parse diagnostic information
 */
export interface ParseDiagnostic {
  /** Diagnostic severity */
  severity: DiagnosticSeverity;

  /** Machine-readable error code */
  code: ParseErrorCode;

  /** Human-readable message */
  message: string;

  /** Start position in source */
  pos: number;

  /** End position in source */
  end: number;

  /** 1-based line of `pos` */
  line: number;

  /** 1-based column of `pos` */
  column: number;
}

/**
 * Result of a parse operation
 */
export interface ParseResult<T extends Text = string> {
  /** Root document node */
  document: Document<T>;

  /** Parse time in milliseconds */
  parseTime: number;

  /** Number of significant tokens scanned */
  tokenCount: number;

  /** Offsets at which each line starts, for position mapping */
  lineStarts: ReadonlyArray<number>;

  /** Source text that was parsed */
  sourceText: string;
}

/**
 * Main parser interface
 */
export interface Parser<T extends Text = string> {
  /**
   * Parse a complete document from text.
   * Throws {@link QuerySyntaxError} on the first lexical or syntax error.
   */
  parseDocument(text: string, options?: ParseOptions): ParseResult<T>;
}

/**
 * Position mapping utilities for editor integration
 */
export interface PositionMapper {
  /** Convert offset to 1-based line/column position */
  offsetToPosition(offset: number): { line: number; column: number };

  /** Convert 1-based line/column position to offset */
  positionToOffset(line: number, column: number): number;

  /** Get total number of lines */
  getLineCount(): number;
}
