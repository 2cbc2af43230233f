/**
 * AST Factory Utilities
 *
 * Helper functions for creating AST nodes. The parser builds every node
 * through these; tests and tools can use them to assemble trees directly.
 */

import {
  NodeKind,
  TypeKind,
  ValueKind,
  type Argument,
  type Definition,
  type Directive,
  type Document,
  type Field,
  type FragmentDefinition,
  type FloatValue,
  type FragmentSpread,
  type InlineFragment,
  type IntValue,
  type ListType,
  type Mutation,
  type NamedType,
  type NonNullType,
  type Query,
  type Selection,
  type SelectionSet,
  type Subscription,
  type Type,
  type TypeCondition,
  type TypedOperation,
  type Value,
  type VariableDefinition
} from './ast-types.js';
import type { Text } from './text.js';

/**
 * Optional parts of a typed operation
 */
export interface OperationParts<T extends Text> {
  name?: T;
  variableDefinitions?: ReadonlyArray<VariableDefinition<T>>;
  directives?: ReadonlyArray<Directive<T>>;
}

/**
 * Optional parts of a field
 */
export interface FieldParts<T extends Text> {
  alias?: T;
  arguments?: ReadonlyArray<Argument<T>>;
  directives?: ReadonlyArray<Directive<T>>;
  selectionSet?: SelectionSet<T>;
}

export function createDocumentNode<T extends Text>(
  pos: number,
  end: number,
  definitions: ReadonlyArray<Definition<T>>
): Document<T> {
  return { kind: NodeKind.Document, pos, end, definitions };
}

export function createFragmentDefinitionNode<T extends Text>(
  pos: number,
  end: number,
  name: T,
  typeCondition: TypeCondition<T>,
  selectionSet: SelectionSet<T>,
  directives: ReadonlyArray<Directive<T>> = []
): FragmentDefinition<T> {
  return { kind: NodeKind.FragmentDefinition, pos, end, name, typeCondition, directives, selectionSet };
}

function createTypedOperation<K extends NodeKind.Query | NodeKind.Mutation | NodeKind.Subscription, T extends Text>(
  kind: K,
  pos: number,
  end: number,
  selectionSet: SelectionSet<T>,
  parts: OperationParts<T>
): TypedOperation<K, T> {
  return {
    kind,
    pos,
    end,
    name: parts.name,
    variableDefinitions: parts.variableDefinitions ?? [],
    directives: parts.directives ?? [],
    selectionSet
  };
}

export function createQueryNode<T extends Text>(
  pos: number,
  end: number,
  selectionSet: SelectionSet<T>,
  parts: OperationParts<T> = {}
): Query<T> {
  return createTypedOperation(NodeKind.Query, pos, end, selectionSet, parts);
}

export function createMutationNode<T extends Text>(
  pos: number,
  end: number,
  selectionSet: SelectionSet<T>,
  parts: OperationParts<T> = {}
): Mutation<T> {
  return createTypedOperation(NodeKind.Mutation, pos, end, selectionSet, parts);
}

export function createSubscriptionNode<T extends Text>(
  pos: number,
  end: number,
  selectionSet: SelectionSet<T>,
  parts: OperationParts<T> = {}
): Subscription<T> {
  return createTypedOperation(NodeKind.Subscription, pos, end, selectionSet, parts);
}

export function createSelectionSetNode<T extends Text>(
  pos: number,
  end: number,
  items: ReadonlyArray<Selection<T>>
): SelectionSet<T> {
  return { kind: NodeKind.SelectionSet, pos, end, items };
}

export function createVariableDefinitionNode<T extends Text>(
  pos: number,
  end: number,
  name: T,
  varType: Type<T>,
  defaultValue?: Value<T>,
  directives: ReadonlyArray<Directive<T>> = []
): VariableDefinition<T> {
  return { kind: NodeKind.VariableDefinition, pos, end, name, varType, defaultValue, directives };
}

export function createFieldNode<T extends Text>(
  pos: number,
  end: number,
  name: T,
  parts: FieldParts<T> = {}
): Field<T> {
  return {
    kind: NodeKind.Field,
    pos,
    end,
    alias: parts.alias,
    name,
    arguments: parts.arguments ?? [],
    directives: parts.directives ?? [],
    selectionSet: parts.selectionSet
  };
}

export function createFragmentSpreadNode<T extends Text>(
  pos: number,
  end: number,
  fragmentName: T,
  directives: ReadonlyArray<Directive<T>> = []
): FragmentSpread<T> {
  return { kind: NodeKind.FragmentSpread, pos, end, fragmentName, directives };
}

export function createInlineFragmentNode<T extends Text>(
  pos: number,
  end: number,
  selectionSet: SelectionSet<T>,
  typeCondition?: TypeCondition<T>,
  directives: ReadonlyArray<Directive<T>> = []
): InlineFragment<T> {
  return { kind: NodeKind.InlineFragment, pos, end, typeCondition, directives, selectionSet };
}

// =============================================================================
// Node Data
// =============================================================================

export function createTypeCondition<T extends Text>(pos: number, end: number, on: T): TypeCondition<T> {
  return { pos, end, on };
}

export function createDirective<T extends Text>(
  pos: number,
  end: number,
  name: T,
  args: ReadonlyArray<Argument<T>> = []
): Directive<T> {
  return { pos, end, name, arguments: args };
}

export function namedType<T extends Text>(name: T): NamedType<T> {
  return { kind: TypeKind.Named, name };
}

export function listType<T extends Text>(type: Type<T>): ListType<T> {
  return { kind: TypeKind.List, type };
}

export function nonNullType<T extends Text>(type: NamedType<T> | ListType<T>): NonNullType<T> {
  return { kind: TypeKind.NonNull, type };
}

/**
 * GraphQL notation of a type reference, e.g. `[ID!]!`
 */
export function printType<T extends Text>(type: Type<T>): string {
  switch (type.kind) {
    case TypeKind.Named:
      return type.name.toString();
    case TypeKind.List:
      return `[${printType(type.type)}]`;
    case TypeKind.NonNull:
      return `${printType(type.type)}!`;
  }
}

export function intValue(raw: string): IntValue {
  return { kind: ValueKind.Int, value: Number(raw), raw };
}

export function floatValue(raw: string): FloatValue {
  return { kind: ValueKind.Float, value: Number(raw), raw };
}
