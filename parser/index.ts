export { createScanner, dedentBlockString } from './scanner/scanner.js';
export type { Scanner, ScannerErrorCallback } from './scanner/scanner.js';
export { ScannerErrorCode } from './scanner/token-types.js';

export * from './text.js';
export * from './ast-types.js';
export * from './ast-factory.js';
export * from './ast-traversal.js';
export * from './parser-interfaces.js';
export * from './errors.js';
export { createParser, parseQuery, createPositionMapper, computeLineStarts } from './core-parser.js';
