/**
 * Parser adapters for benchmarking query parsing and walking
 *
 * Each adapter parses a document and walks every field, so the numbers cover
 * the whole path from source text to visitor calls.
 */

import { parse, version as graphqlVersion, visit } from 'graphql';
import { walkDocument, type QueryVisitor } from '../ast-traversal.js';
import { parseQuery } from '../core-parser.js';
import { createScanner } from '../scanner/scanner.js';
import { SyntaxKind } from '../scanner/token-types.js';
import { sourceText, type Text } from '../text.js';

export interface AdapterResult {
  tokenCount?: number;
  fieldCount?: number;
}

export interface ParserAdapter {
  name: string;
  version: string;
  parse(content: string): AdapterResult;
}

const VERSION = '0.1.0';

class FieldCounter implements QueryVisitor<Text> {
  count = 0;
  visitField(): void {
    this.count++;
  }
}

/**
 * Scanner only: the lower bound for any parse
 */
export const ScannerAdapter: ParserAdapter = {
  name: 'gqlwalk-scan',
  version: VERSION,
  parse(content) {
    const scanner = createScanner();
    scanner.initText(content);
    let tokenCount = 0;
    while (scanner.scan() !== SyntaxKind.EndOfFileToken) {
      tokenCount++;
    }
    return { tokenCount };
  }
};

export const WalkAdapter: ParserAdapter = {
  name: 'gqlwalk',
  version: VERSION,
  parse(content) {
    const counter = new FieldCounter();
    walkDocument(counter, parseQuery(content));
    return { fieldCount: counter.count };
  }
};

/**
 * Names kept as source views instead of copied strings
 */
export const SourceViewAdapter: ParserAdapter = {
  name: 'gqlwalk-view',
  version: VERSION,
  parse(content) {
    const counter = new FieldCounter();
    walkDocument(counter, parseQuery(content, { createText: sourceText }));
    return { fieldCount: counter.count };
  }
};

export const GraphqlAdapter: ParserAdapter = {
  name: 'graphql',
  version: graphqlVersion,
  parse(content) {
    let fieldCount = 0;
    visit(parse(content), {
      Field() {
        fieldCount++;
      }
    });
    return { fieldCount };
  }
};

export const adapters: ParserAdapter[] = [ScannerAdapter, WalkAdapter, SourceViewAdapter, GraphqlAdapter];
