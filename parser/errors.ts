/**
 * Defines error handling for query parsing
 */

import type { ParseDiagnostic } from './parser-interfaces.js';

/**
 * Represents the first error found while parsing a query document
 */
export class QuerySyntaxError extends Error {
  readonly diagnostic: ParseDiagnostic;

  constructor(diagnostic: ParseDiagnostic, options?: ErrorOptions) {
    super(`Syntax Error: ${diagnostic.message} (${diagnostic.line}:${diagnostic.column})`, options);
    this.name = 'QuerySyntaxError';
    this.diagnostic = diagnostic;
  }
}

/**
 * Type guard for {@link QuerySyntaxError}
 *
 * @param error The error to inspect
 * @returns True if the error is a {@link QuerySyntaxError}
 */
export function isQuerySyntaxError(error: unknown): error is QuerySyntaxError {
  return error instanceof QuerySyntaxError;
}
