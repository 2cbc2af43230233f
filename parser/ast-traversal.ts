/**
 * AST Traversal Infrastructure
 *
 * Visitor pattern and utility functions for walking and querying query trees.
 *
 * A visitor implements any subset of the {@link QueryVisitor} hooks; every
 * hook it leaves out is a no-op. {@link walkDocument} drives the whole walk:
 * pre-order, depth-first, children in declaration order. For the union
 * categories the category hook fires before the concrete one, both with the
 * same node: a query fires `visitDefinition`, `visitOperationDefinition`,
 * then `visitQuery`.
 *
 * @example
 * ```typescript
 * class FieldCounter implements QueryVisitor {
 *   count = 0;
 *   visitField() {
 *     this.count++;
 *   }
 * }
 *
 * const counter = new FieldCounter();
 * walkDocument(counter, parseQuery('query Q { users { id country { id } } }'));
 * counter.count; // 4
 * ```
 */

import {
  NodeKind,
  type AnyNode,
  type Definition,
  type Document,
  type Field,
  type FragmentDefinition,
  type FragmentSpread,
  type InlineFragment,
  type Mutation,
  type OperationDefinition,
  type Query,
  type Selection,
  type SelectionSet,
  type Subscription,
  type TypedOperation,
  type VariableDefinition
} from './ast-types.js';
import type { Text } from './text.js';

/**
 * Visit result controls traversal flow
 */
export enum VisitResult {
  /** Continue normal traversal (visit children) */
  Continue,

  /** Skip children but continue with siblings */
  Skip,

  /** Stop traversal entirely */
  Stop
}

/**
 * What a hook may return. Returning nothing is the same as {@link VisitResult.Continue}.
 */
export type HookResult = VisitResult | void;

/**
 * Visitor interface with optional methods for each node kind
 */
export interface QueryVisitor<T extends Text = string> {
  visitDocument?(node: Document<T>): HookResult;

  /** Category hook: fires before visitOperationDefinition or visitFragmentDefinition */
  visitDefinition?(node: Definition<T>): HookResult;

  visitFragmentDefinition?(node: FragmentDefinition<T>): HookResult;

  /** Category hook: fires before visitSelectionSet, visitQuery, visitMutation or visitSubscription */
  visitOperationDefinition?(node: OperationDefinition<T>): HookResult;

  visitQuery?(node: Query<T>): HookResult;

  visitMutation?(node: Mutation<T>): HookResult;

  visitSubscription?(node: Subscription<T>): HookResult;

  visitSelectionSet?(node: SelectionSet<T>): HookResult;

  visitVariableDefinition?(node: VariableDefinition<T>): HookResult;

  /** Category hook: fires before visitField, visitFragmentSpread or visitInlineFragment */
  visitSelection?(node: Selection<T>): HookResult;

  visitField?(node: Field<T>): HookResult;

  visitFragmentSpread?(node: FragmentSpread<T>): HookResult;

  visitInlineFragment?(node: InlineFragment<T>): HookResult;
}

/**
 * Walk a query tree and call the visitor hooks for every node.
 *
 * This is how a visitor should be run. Errors thrown by hooks propagate unchanged.
 *
 * @returns {@link VisitResult.Stop} if a hook stopped the walk, otherwise {@link VisitResult.Continue}
 */
export function walkDocument<T extends Text>(visitor: QueryVisitor<T>, node: Document<T>): VisitResult {
  const result = resolve(visitor.visitDocument?.(node));
  if (result !== VisitResult.Continue) return settle(result);

  for (const definition of node.definitions) {
    if (walkDefinition(visitor, definition) === VisitResult.Stop) return VisitResult.Stop;
  }
  return VisitResult.Continue;
}

/**
 * Internal per-kind walkers. Each returns Stop to unwind, Continue otherwise.
 */

function walkDefinition<T extends Text>(visitor: QueryVisitor<T>, node: Definition<T>): VisitResult {
  const result = resolve(visitor.visitDefinition?.(node));
  if (result !== VisitResult.Continue) return settle(result);

  switch (node.kind) {
    case NodeKind.FragmentDefinition:
      return walkFragmentDefinition(visitor, node);
    case NodeKind.SelectionSet:
    case NodeKind.Query:
    case NodeKind.Mutation:
    case NodeKind.Subscription:
      return walkOperationDefinition(visitor, node);
  }
}

function walkFragmentDefinition<T extends Text>(visitor: QueryVisitor<T>, node: FragmentDefinition<T>): VisitResult {
  const result = resolve(visitor.visitFragmentDefinition?.(node));
  if (result !== VisitResult.Continue) return settle(result);

  return walkSelectionSet(visitor, node.selectionSet);
}

function walkOperationDefinition<T extends Text>(visitor: QueryVisitor<T>, node: OperationDefinition<T>): VisitResult {
  const result = resolve(visitor.visitOperationDefinition?.(node));
  if (result !== VisitResult.Continue) return settle(result);

  switch (node.kind) {
    case NodeKind.SelectionSet:
      return walkSelectionSet(visitor, node);
    case NodeKind.Query:
      return walkTypedOperation(visitor, node, resolve(visitor.visitQuery?.(node)));
    case NodeKind.Mutation:
      return walkTypedOperation(visitor, node, resolve(visitor.visitMutation?.(node)));
    case NodeKind.Subscription:
      return walkTypedOperation(visitor, node, resolve(visitor.visitSubscription?.(node)));
  }
}

/**
 * Children of a query, mutation or subscription, once its own hook has returned `result`
 */
function walkTypedOperation<T extends Text>(
  visitor: QueryVisitor<T>,
  node: TypedOperation<NodeKind, T>,
  result: VisitResult
): VisitResult {
  if (result !== VisitResult.Continue) return settle(result);

  for (const variableDefinition of node.variableDefinitions) {
    if (walkVariableDefinition(visitor, variableDefinition) === VisitResult.Stop) return VisitResult.Stop;
  }

  return walkSelectionSet(visitor, node.selectionSet);
}

function walkSelectionSet<T extends Text>(visitor: QueryVisitor<T>, node: SelectionSet<T>): VisitResult {
  const result = resolve(visitor.visitSelectionSet?.(node));
  if (result !== VisitResult.Continue) return settle(result);

  for (const selection of node.items) {
    if (walkSelection(visitor, selection) === VisitResult.Stop) return VisitResult.Stop;
  }
  return VisitResult.Continue;
}

function walkVariableDefinition<T extends Text>(visitor: QueryVisitor<T>, node: VariableDefinition<T>): VisitResult {
  return settle(resolve(visitor.visitVariableDefinition?.(node)));
}

function walkSelection<T extends Text>(visitor: QueryVisitor<T>, node: Selection<T>): VisitResult {
  const result = resolve(visitor.visitSelection?.(node));
  if (result !== VisitResult.Continue) return settle(result);

  switch (node.kind) {
    case NodeKind.Field:
      return walkField(visitor, node);
    case NodeKind.FragmentSpread:
      return walkFragmentSpread(visitor, node);
    case NodeKind.InlineFragment:
      return walkInlineFragment(visitor, node);
  }
}

function walkField<T extends Text>(visitor: QueryVisitor<T>, node: Field<T>): VisitResult {
  const result = resolve(visitor.visitField?.(node));
  if (result !== VisitResult.Continue) return settle(result);

  return node.selectionSet ? walkSelectionSet(visitor, node.selectionSet) : VisitResult.Continue;
}

function walkFragmentSpread<T extends Text>(visitor: QueryVisitor<T>, node: FragmentSpread<T>): VisitResult {
  return settle(resolve(visitor.visitFragmentSpread?.(node)));
}

function walkInlineFragment<T extends Text>(visitor: QueryVisitor<T>, node: InlineFragment<T>): VisitResult {
  const result = resolve(visitor.visitInlineFragment?.(node));
  if (result !== VisitResult.Continue) return settle(result);

  return walkSelectionSet(visitor, node.selectionSet);
}

/**
 * Missing hooks and hooks returning nothing continue
 */
function resolve(result: HookResult | undefined): VisitResult {
  return typeof result === 'number' ? result : VisitResult.Continue;
}

/**
 * A skip only prunes the current node; the parent carries on with siblings
 */
function settle(result: VisitResult): VisitResult {
  return result === VisitResult.Stop ? VisitResult.Stop : VisitResult.Continue;
}

// =============================================================================
// Visitor Helpers
// =============================================================================

/**
 * Builds a visitor that calls `callback` exactly once per node, from the
 * concrete hooks only (category hooks are left out).
 */
export function nodeVisitor<T extends Text>(callback: (node: AnyNode<T>) => HookResult): QueryVisitor<T> {
  return {
    visitDocument: callback,
    visitFragmentDefinition: callback,
    visitQuery: callback,
    visitMutation: callback,
    visitSubscription: callback,
    visitSelectionSet: callback,
    visitVariableDefinition: callback,
    visitField: callback,
    visitFragmentSpread: callback,
    visitInlineFragment: callback
  };
}

/**
 * Direct children of a node, in walk order
 */
export function getChildren<T extends Text>(node: AnyNode<T>): ReadonlyArray<AnyNode<T>> {
  switch (node.kind) {
    case NodeKind.Document:
      return node.definitions;
    case NodeKind.FragmentDefinition:
    case NodeKind.InlineFragment:
      return [node.selectionSet];
    case NodeKind.Query:
    case NodeKind.Mutation:
    case NodeKind.Subscription:
      return [...node.variableDefinitions, node.selectionSet];
    case NodeKind.SelectionSet:
      return node.items;
    case NodeKind.Field:
      return node.selectionSet ? [node.selectionSet] : [];
    case NodeKind.VariableDefinition:
    case NodeKind.FragmentSpread:
      return [];
  }
}

// =============================================================================
// Query Functions
// =============================================================================

/**
 * All fields in walk order, nested fields included
 */
export function collectFields<T extends Text>(document: Document<T>): Field<T>[] {
  const fields: Field<T>[] = [];

  walkDocument<T>({
    visitField(node) {
      fields.push(node);
    }
  }, document);

  return fields;
}

/**
 * Name of an operation or fragment; undefined for anonymous operations
 */
export function getOperationName<T extends Text>(definition: Definition<T>): T | undefined {
  switch (definition.kind) {
    case NodeKind.SelectionSet:
      return undefined;
    case NodeKind.FragmentDefinition:
    case NodeKind.Query:
    case NodeKind.Mutation:
    case NodeKind.Subscription:
      return definition.name;
  }
}

/**
 * Number of nodes in the tree, each node counted once
 */
export function countNodes<T extends Text>(document: Document<T>): number {
  let count = 0;

  walkDocument(nodeVisitor<T>(() => {
    count++;
  }), document);

  return count;
}

/**
 * Find the deepest node whose `[pos, end)` range contains the given offset
 */
export function findNodeAt<T extends Text>(document: Document<T>, offset: number): AnyNode<T> | undefined {
  if (offset < document.pos || offset >= document.end) {
    return undefined;
  }

  let result: AnyNode<T> = document;

  walkDocument(nodeVisitor<T>(node => {
    if (offset >= node.pos && offset < node.end) {
      result = node;
      return VisitResult.Continue;
    }
    return VisitResult.Skip;
  }), document);

  return result;
}

/**
 * Get the path from root to a specific node (compared by identity)
 */
export function getNodePath<T extends Text>(document: Document<T>, target: AnyNode<T>): AnyNode<T>[] {
  const path: AnyNode<T>[] = [];

  function findPath(node: AnyNode<T>): boolean {
    path.push(node);

    if (node === target) {
      return true;
    }

    for (const child of getChildren(node)) {
      if (findPath(child)) {
        return true;
      }
    }

    path.pop();
    return false;
  }

  return findPath(document) ? path : [];
}
