/**
 * Property descriptor and definition types shared by the builder, the form
 * tree and the traversals.
 */

import type { SurplusPolicy } from './options.js';
import type { FormNode } from '../form/form-node.js';
import type { SchemaDefinition } from '../definition/definition.js';

/** Owner role used by definitions that bind a single model */
export const SELF_ROLE = 'self';

export type PropertyKind = 'scalar' | 'nested' | 'collection';

/**
 * - normal: read from the model, written back on sync
 * - virtual: read from the model, never written back, ignores input
 * - empty: never read from the model, never written back, filled by input
 */
export type Visibility = 'normal' | 'virtual' | 'empty';

/** One level of hierarchical input: property name to value */
export type InputMapping = Readonly<Record<string, unknown>>;

/** Plain nested mapping produced from a form tree */
export type Snapshot = { [name: string]: unknown };

/** Messages keyed by property name (or a dotted/indexed path below it) */
export type ErrorMessages = Record<string, string[]>;

/**
 * Pass/fail contract for a node's own values. Checkers see the node's
 * snapshot, never the models.
 */
export interface RuleChecker {
  check(values: Snapshot): ErrorMessages;
}

export type ModelConstructor = new () => object;

export interface CreationContext {
  readonly parent: FormNode;
  readonly property: NestedDescriptor;
  /** Definition the new model will be bound to */
  readonly definition: SchemaDefinition;
  /** Position in the collection, for collection properties */
  readonly index?: number;
  readonly path: string;
}

/** `null` means no model can be supplied; population then fails */
export type CreationFunction = (
  fragment: InputMapping,
  context: CreationContext
) => object | null;

export type CreationPolicy =
  | { readonly construct: ModelConstructor }
  | CreationFunction;

export interface SkipContext {
  readonly property: NestedDescriptor;
  readonly path: string;
  readonly index?: number;
  /** Child already bound at this position, if any */
  readonly existing?: FormNode;
}

/**
 * Skip predicates run once while input is checked and again while it is
 * applied, so they must be pure.
 */
export type SkipPolicy =
  | 'allBlank'
  | ((fragment: InputMapping, context: SkipContext) => boolean);

export interface TransformContext {
  readonly form: FormNode;
  readonly property: ScalarDescriptor;
  readonly previous: unknown;
}

export type InputTransform = (
  value: unknown,
  context: TransformContext
) => unknown;

interface DescriptorBase {
  readonly name: string;
  readonly accessor: string;
  readonly owner: string;
  readonly visibility: Visibility;
}

export interface ScalarDescriptor extends DescriptorBase {
  readonly kind: 'scalar';
  readonly transform?: InputTransform;
  readonly defaultValue?: unknown;
}

export interface NestedDescriptor extends DescriptorBase {
  readonly kind: 'nested' | 'collection';
  readonly schema: SchemaDefinition;
  readonly creationPolicy?: CreationPolicy;
  readonly persist: boolean;
  readonly skipIf?: SkipPolicy;
  readonly surplus?: SurplusPolicy;
}

export type PropertyDescriptor = ScalarDescriptor | NestedDescriptor;

export function isNestedDescriptor(
  descriptor: PropertyDescriptor
): descriptor is NestedDescriptor {
  return descriptor.kind !== 'scalar';
}
