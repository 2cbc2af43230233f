/**
 * AST Node Types for GraphQL executable documents
 *
 * Every type is generic over the name representation `T` (see {@link Text}).
 * Nodes are read-only: a tree is built once by the parser or the factory and
 * then only borrowed by traversals.
 */

import type { Text } from './text.js';

/**
 * Node kinds - one per concrete node type.
 *
 * Definition, OperationDefinition and Selection are unions of these and have
 * no kind of their own.
 */
export enum NodeKind {
  // Root node
  Document,

  // Definitions
  FragmentDefinition,
  Query,
  Mutation,
  Subscription,

  // Operation contents
  SelectionSet,
  VariableDefinition,

  // Selections
  Field,
  FragmentSpread,
  InlineFragment,
}

/**
 * Source range `[pos, end)` as UTF-16 offsets
 */
export interface Span {
  readonly pos: number;
  readonly end: number;
}

/**
 * Base interface for all AST nodes
 */
export interface Node extends Span {
  readonly kind: NodeKind;
}

// =============================================================================
// Specific Node Interfaces
// =============================================================================

/**
 * Document root node
 */
export interface Document<T extends Text = string> extends Node {
  readonly kind: NodeKind.Document;
  readonly definitions: ReadonlyArray<Definition<T>>;
}

/**
 * `fragment Name on Type @directives { ... }`
 */
export interface FragmentDefinition<T extends Text = string> extends Node {
  readonly kind: NodeKind.FragmentDefinition;
  readonly name: T;
  readonly typeCondition: TypeCondition<T>;
  readonly directives: ReadonlyArray<Directive<T>>;
  readonly selectionSet: SelectionSet<T>;
}

/**
 * Shape shared by query, mutation and subscription operations
 */
export interface TypedOperation<K extends NodeKind, T extends Text = string> extends Node {
  readonly kind: K;
  readonly name?: T;
  readonly variableDefinitions: ReadonlyArray<VariableDefinition<T>>;
  readonly directives: ReadonlyArray<Directive<T>>;
  readonly selectionSet: SelectionSet<T>;
}

export type Query<T extends Text = string> = TypedOperation<NodeKind.Query, T>;
export type Mutation<T extends Text = string> = TypedOperation<NodeKind.Mutation, T>;
export type Subscription<T extends Text = string> = TypedOperation<NodeKind.Subscription, T>;

/**
 * `{ ... }` block; `pos`/`end` cover the braces
 */
export interface SelectionSet<T extends Text = string> extends Node {
  readonly kind: NodeKind.SelectionSet;
  readonly items: ReadonlyArray<Selection<T>>;
}

/**
 * `$name: Type = default @directives`
 */
export interface VariableDefinition<T extends Text = string> extends Node {
  readonly kind: NodeKind.VariableDefinition;
  readonly name: T;
  readonly varType: Type<T>;
  readonly defaultValue?: Value<T>;
  readonly directives: ReadonlyArray<Directive<T>>;
}

/**
 * `alias: name(arguments) @directives { ... }`
 */
export interface Field<T extends Text = string> extends Node {
  readonly kind: NodeKind.Field;
  readonly alias?: T;
  readonly name: T;
  readonly arguments: ReadonlyArray<Argument<T>>;
  readonly directives: ReadonlyArray<Directive<T>>;
  /** Absent for leaf fields */
  readonly selectionSet?: SelectionSet<T>;
}

/**
 * `...Name @directives`
 */
export interface FragmentSpread<T extends Text = string> extends Node {
  readonly kind: NodeKind.FragmentSpread;
  readonly fragmentName: T;
  readonly directives: ReadonlyArray<Directive<T>>;
}

/**
 * `... on Type @directives { ... }`
 */
export interface InlineFragment<T extends Text = string> extends Node {
  readonly kind: NodeKind.InlineFragment;
  readonly typeCondition?: TypeCondition<T>;
  readonly directives: ReadonlyArray<Directive<T>>;
  readonly selectionSet: SelectionSet<T>;
}

// =============================================================================
// Node Data (not visited)
// =============================================================================

/**
 * `on Type`
 */
export interface TypeCondition<T extends Text = string> extends Span {
  readonly on: T;
}

/**
 * `@name(arguments)`
 */
export interface Directive<T extends Text = string> extends Span {
  readonly name: T;
  readonly arguments: ReadonlyArray<Argument<T>>;
}

export interface Argument<T extends Text = string> {
  readonly name: T;
  readonly value: Value<T>;
}

export enum TypeKind {
  Named,
  List,
  NonNull,
}

export interface NamedType<T extends Text = string> {
  readonly kind: TypeKind.Named;
  readonly name: T;
}

export interface ListType<T extends Text = string> {
  readonly kind: TypeKind.List;
  readonly type: Type<T>;
}

export interface NonNullType<T extends Text = string> {
  readonly kind: TypeKind.NonNull;
  readonly type: NamedType<T> | ListType<T>;
}

export type Type<T extends Text = string> = NamedType<T> | ListType<T> | NonNullType<T>;

export enum ValueKind {
  Variable,
  Int,
  Float,
  String,
  Boolean,
  Null,
  Enum,
  List,
  Object,
}

export interface VariableValue<T extends Text = string> {
  readonly kind: ValueKind.Variable;
  readonly name: T;
}

export interface IntValue {
  readonly kind: ValueKind.Int;
  readonly value: number;
  readonly raw: string;           // Source literal, exact even beyond safe integer range
}

export interface FloatValue {
  readonly kind: ValueKind.Float;
  readonly value: number;
  readonly raw: string;
}

export interface StringValue {
  readonly kind: ValueKind.String;
  readonly value: string;         // Decoded: escapes resolved, block strings dedented
  readonly block: boolean;
}

export interface BooleanValue {
  readonly kind: ValueKind.Boolean;
  readonly value: boolean;
}

export interface NullValue {
  readonly kind: ValueKind.Null;
}

export interface EnumValue<T extends Text = string> {
  readonly kind: ValueKind.Enum;
  readonly value: T;
}

export interface ListValue<T extends Text = string> {
  readonly kind: ValueKind.List;
  readonly values: ReadonlyArray<Value<T>>;
}

export interface ObjectField<T extends Text = string> {
  readonly name: T;
  readonly value: Value<T>;
}

export interface ObjectValue<T extends Text = string> {
  readonly kind: ValueKind.Object;
  readonly fields: ReadonlyArray<ObjectField<T>>;  // Source order
}

export type Value<T extends Text = string> =
  | VariableValue<T>
  | IntValue
  | FloatValue
  | StringValue
  | BooleanValue
  | NullValue
  | EnumValue<T>
  | ListValue<T>
  | ObjectValue<T>;

// =============================================================================
// Type Unions for Category Safety
// =============================================================================

/**
 * Top-level entry in a document
 */
export type Definition<T extends Text = string> =
  | OperationDefinition<T>
  | FragmentDefinition<T>;

/**
 * An operation: either a bare `{ ... }` shorthand query or a typed operation
 */
export type OperationDefinition<T extends Text = string> =
  | SelectionSet<T>
  | Query<T>
  | Mutation<T>
  | Subscription<T>;

/**
 * One entry of a selection set
 */
export type Selection<T extends Text = string> =
  | Field<T>
  | FragmentSpread<T>
  | InlineFragment<T>;

/**
 * All possible node types
 */
export type AnyNode<T extends Text = string> =
  | Document<T>
  | Definition<T>
  | VariableDefinition<T>
  | Selection<T>;
