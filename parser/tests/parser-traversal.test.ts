/**
 * Tests for the query walker: hook order, coverage and flow control
 */

import { readFileSync } from 'node:fs';
import { beforeEach, describe, expect, test } from 'vitest';
import {
  NodeKind,
  type AnyNode,
  type Document,
  type Field
} from '../ast-types.js';
import {
  createDocumentNode,
  createFieldNode,
  createFragmentDefinitionNode,
  createFragmentSpreadNode,
  createInlineFragmentNode,
  createQueryNode,
  createSelectionSetNode,
  createTypeCondition,
  createVariableDefinitionNode,
  namedType
} from '../ast-factory.js';
import {
  VisitResult,
  collectFields,
  countNodes,
  walkDocument,
  type QueryVisitor
} from '../ast-traversal.js';
import { parseQuery } from '../core-parser.js';
import { SourceText, sourceText } from '../text.js';

const allVariants = readFileSync(new URL('./fixtures/all-variants.graphql', import.meta.url), 'utf8');

type HookName = keyof QueryVisitor;

/**
 * Implements every hook and records each call
 */
class RecordingVisitor implements QueryVisitor {
  readonly calls: string[] = [];
  readonly counts = new Map<HookName, number>();

  private record(hook: HookName, label?: string) {
    this.calls.push(label === undefined ? hook : `${hook}:${label}`);
    this.counts.set(hook, (this.counts.get(hook) ?? 0) + 1);
  }

  visitDocument() { this.record('visitDocument'); }
  visitDefinition() { this.record('visitDefinition'); }
  visitFragmentDefinition(node: { name: string }) { this.record('visitFragmentDefinition', node.name); }
  visitOperationDefinition() { this.record('visitOperationDefinition'); }
  visitQuery() { this.record('visitQuery'); }
  visitMutation() { this.record('visitMutation'); }
  visitSubscription() { this.record('visitSubscription'); }
  visitSelectionSet() { this.record('visitSelectionSet'); }
  visitVariableDefinition(node: { name: string }) { this.record('visitVariableDefinition', node.name); }
  visitSelection() { this.record('visitSelection'); }
  visitField(node: Field) { this.record('visitField', node.name); }
  visitFragmentSpread(node: { fragmentName: string }) { this.record('visitFragmentSpread', node.fragmentName); }
  visitInlineFragment() { this.record('visitInlineFragment'); }

  get total(): number {
    let total = 0;
    for (const count of this.counts.values()) total += count;
    return total;
  }
}

function deepFreeze<V>(value: V): V {
  if (typeof value === 'object' && value !== null) {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}

describe('Query walker', () => {
  let sampleDocument: Document;

  beforeEach(() => {
    // Document
    //   Query Q($id)
    //     SelectionSet
    //       Field user
    //         SelectionSet
    //           Field name
    //           FragmentSpread Avatar
    //           InlineFragment on Admin
    //             SelectionSet
    //               Field level
    //   FragmentDefinition Avatar on User
    //     SelectionSet
    //       Field url

    const level = createFieldNode(60, 65, 'level');
    const inline = createInlineFragmentNode(44, 67, createSelectionSetNode(58, 67, [level]), createTypeCondition(48, 56, 'Admin'));
    const spread = createFragmentSpreadNode(30, 39, 'Avatar');
    const name = createFieldNode(24, 28, 'name');
    const user = createFieldNode(16, 69, 'user', { selectionSet: createSelectionSetNode(22, 69, [name, spread, inline]) });
    const variable = createVariableDefinitionNode(8, 14, 'id', namedType('ID'));
    const query = createQueryNode(0, 71, createSelectionSetNode(15, 71, [user]), { name: 'Q', variableDefinitions: [variable] });

    const url = createFieldNode(100, 103, 'url');
    const fragment = createFragmentDefinitionNode(72, 105, 'Avatar', createTypeCondition(88, 95, 'User'),
      createSelectionSetNode(96, 105, [url]));

    sampleDocument = createDocumentNode(0, 105, [query, fragment]);
  });

  test('calls hooks in pre-order, category hooks before concrete ones', () => {
    const visitor = new RecordingVisitor();
    walkDocument(visitor, sampleDocument);

    expect(visitor.calls).toEqual([
      'visitDocument',
      'visitDefinition',
      'visitOperationDefinition',
      'visitQuery',
      'visitVariableDefinition:id',
      'visitSelectionSet',
      'visitSelection',
      'visitField:user',
      'visitSelectionSet',
      'visitSelection',
      'visitField:name',
      'visitSelection',
      'visitFragmentSpread:Avatar',
      'visitSelection',
      'visitInlineFragment',
      'visitSelectionSet',
      'visitSelection',
      'visitField:level',
      'visitDefinition',
      'visitFragmentDefinition:Avatar',
      'visitSelectionSet',
      'visitSelection',
      'visitField:url'
    ]);
  });

  test('category and concrete hooks receive the same node', () => {
    const seen: AnyNode[] = [];
    walkDocument({
      visitDefinition(node) { seen.push(node); },
      visitOperationDefinition(node) { seen.push(node); },
      visitQuery(node) { seen.push(node); }
    }, sampleDocument);

    expect(seen).toHaveLength(4);
    expect(seen[0]).toBe(sampleDocument.definitions[0]);
    expect(seen[1]).toBe(sampleDocument.definitions[0]);
    expect(seen[2]).toBe(sampleDocument.definitions[0]);
    expect(seen[3]).toBe(sampleDocument.definitions[1]);
  });

  test('empty visitor walks without effect', () => {
    const frozen = deepFreeze(sampleDocument);
    const before = JSON.stringify(frozen);

    expect(walkDocument({}, frozen)).toBe(VisitResult.Continue);
    expect(JSON.stringify(frozen)).toBe(before);
  });

  test('walking the same tree twice gives the same calls', () => {
    const first = new RecordingVisitor();
    const second = new RecordingVisitor();
    walkDocument(first, sampleDocument);
    walkDocument(second, sampleDocument);

    expect(second.calls).toEqual(first.calls);
  });

  test('selections are visited in source order', () => {
    const names: string[] = [];
    walkDocument({ visitField(node) { names.push(node.name); } }, parseQuery('{ a b c }'));

    expect(names).toEqual(['a', 'b', 'c']);
  });

  test('inline fragment hook fires before its contents', () => {
    const events: string[] = [];
    walkDocument({
      visitSelectionSet() { events.push('selectionSet'); },
      visitInlineFragment() { events.push('inlineFragment'); },
      visitField(node) { events.push(`field:${node.name}`); }
    }, parseQuery('query { ... on User { name } }'));

    expect(events).toEqual(['selectionSet', 'inlineFragment', 'selectionSet', 'field:name']);
  });

  test('counts nested fields', () => {
    class FieldCounter implements QueryVisitor {
      count = 0;
      visitField(): void {
        this.count++;
      }
    }

    const counter = new FieldCounter();
    walkDocument(counter, parseQuery('query Q { users { id country { id } } }'));

    expect(counter.count).toBe(4);
  });
});

describe('Every node kind', () => {
  test('each hook fires the expected number of times', () => {
    const visitor = new RecordingVisitor();
    walkDocument(visitor, parseQuery(allVariants));

    expect(Object.fromEntries(visitor.counts)).toEqual({
      visitDocument: 1,
      visitDefinition: 5,
      visitOperationDefinition: 4,
      visitQuery: 1,
      visitMutation: 1,
      visitSubscription: 1,
      visitFragmentDefinition: 1,
      visitVariableDefinition: 4,
      visitSelectionSet: 9,
      visitSelection: 11,
      visitField: 9,
      visitFragmentSpread: 1,
      visitInlineFragment: 1
    });
  });

  test('hook calls equal nodes plus one per union category a node belongs to', () => {
    const document = parseQuery(allVariants);
    const visitor = new RecordingVisitor();
    walkDocument(visitor, document);

    const definitions = visitor.counts.get('visitDefinition') ?? 0;
    const operations = visitor.counts.get('visitOperationDefinition') ?? 0;
    const selections = visitor.counts.get('visitSelection') ?? 0;

    expect(countNodes(document)).toBe(29);
    expect(visitor.total).toBe(countNodes(document) + definitions + operations + selections);
  });

  test('bare selection set definitions are operations', () => {
    const kinds: NodeKind[] = [];
    walkDocument({ visitOperationDefinition(node) { kinds.push(node.kind); } }, parseQuery(allVariants));

    expect(kinds).toEqual([NodeKind.SelectionSet, NodeKind.Query, NodeKind.Mutation, NodeKind.Subscription]);
  });

  test('fragment definitions fire their own hook and walk their fields', () => {
    const visitor = new RecordingVisitor();
    walkDocument(visitor, parseQuery(allVariants));

    const index = visitor.calls.indexOf('visitFragmentDefinition:ProductSummary');
    expect(index).toBeGreaterThan(0);
    expect(visitor.calls.slice(index)).toEqual([
      'visitFragmentDefinition:ProductSummary',
      'visitSelectionSet',
      'visitSelection',
      'visitField:name'
    ]);
  });
});

describe('Flow control', () => {
  test('Skip prunes children but keeps siblings', () => {
    const names: string[] = [];
    const result = walkDocument({
      visitField(node) {
        names.push(node.name);
        return node.name === 'a' ? VisitResult.Skip : undefined;
      }
    }, parseQuery('{ a { b } c }'));

    expect(names).toEqual(['a', 'c']);
    expect(result).toBe(VisitResult.Continue);
  });

  test('Stop ends the walk', () => {
    const names: string[] = [];
    const result = walkDocument({
      visitField(node) {
        names.push(node.name);
        return node.name === 'b' ? VisitResult.Stop : VisitResult.Continue;
      }
    }, parseQuery('{ a { b } c } { d }'));

    expect(names).toEqual(['a', 'b']);
    expect(result).toBe(VisitResult.Stop);
  });

  test('skipping a category suppresses the concrete hook', () => {
    const fields: string[] = [];
    let selections = 0;
    walkDocument({
      visitSelection() {
        selections++;
        return VisitResult.Skip;
      },
      visitField(node) { fields.push(node.name); }
    }, parseQuery('{ a { b } c }'));

    expect(selections).toBe(2);
    expect(fields).toEqual([]);
  });

  test('skipping a query still walks later definitions', () => {
    const fields: string[] = [];
    walkDocument({
      visitQuery() { return VisitResult.Skip; },
      visitField(node) { fields.push(node.name); }
    }, parseQuery('query { a } mutation { b }'));

    expect(fields).toEqual(['b']);
  });

  test('errors thrown by hooks propagate unchanged', () => {
    const failure = new Error('hook failed');
    const fields: string[] = [];
    let caught: unknown;

    try {
      walkDocument({
        visitField(node) {
          fields.push(node.name);
          if (node.name === 'b') throw failure;
        }
      }, parseQuery('{ a b c }'));
    } catch (error) {
      caught = error;
    }

    expect(caught).toBe(failure);
    expect(fields).toEqual(['a', 'b']);
  });
});

describe('Name representations', () => {
  const source = 'query Q { users { id country { id } } }';

  test('source views and strings give the same names', () => {
    const viewDocument = parseQuery(source, { createText: sourceText });
    const stringDocument = parseQuery(source);

    const viewNames = collectFields(viewDocument).map(field => field.name.toString());
    const stringNames = collectFields(stringDocument).map(field => field.name);

    expect(viewNames).toEqual(['users', 'id', 'country', 'id']);
    expect(viewNames).toEqual(stringNames);
  });

  test('visitors are typed by the name representation', () => {
    const views: SourceText[] = [];
    walkDocument<SourceText>({
      visitField(node) { views.push(node.name); }
    }, parseQuery(source, { createText: sourceText }));

    expect(views).toHaveLength(4);
    expect(views[0]).toBeInstanceOf(SourceText);
    expect(views[0].pos).toBe(10);
    expect(views[0].end).toBe(15);
  });
});
