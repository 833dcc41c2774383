/* eslint-disable max-lines-per-function */
/**
 * Population engine
 *
 * Reconciles a form tree against hierarchical input in two passes:
 * 1. check: walks the input against the current tree without assigning
 *    anything. Missing children are created through their creation policy
 *    and bound, but not installed; malformed shapes (PopulationError) and
 *    gaps nobody can fill (MissingNestedModelError) surface here.
 * 2. apply: overwrites scalars, recurses into existing children and
 *    installs the children the check pass created.
 *
 * Models are never written here; only sync/save does that.
 */

import type { FormNode } from '../form/form-node.js';
import { MissingNestedModelError } from '../types/errors.js';
import type { SurplusPolicy } from '../types/options.js';
import type {
  CreationContext,
  InputMapping,
  NestedDescriptor,
} from '../types/schema.js';
import { displayPath, indexPath, joinPath } from '../util/path.js';
import { createTracer, type Tracer } from '../util/trace.js';
import { expectMapping, readCollection } from './input.js';
import { shouldSkip } from './policies.js';

export type PopulateNoteCode =
  | 'CHILD_CREATED'
  | 'ENTRY_SKIPPED'
  | 'SURPLUS_KEPT'
  | 'SURPLUS_DROPPED'
  | 'SURPLUS_FLAGGED';

export interface PopulateNote {
  code: PopulateNoteCode;
  path: string;
  details?: Record<string, unknown>;
}

export interface PopulateResult {
  notes: PopulateNote[];
}

interface ApplyState {
  readonly notes: PopulateNote[];
  readonly trace: Tracer;
  readonly created: ReadonlyMap<string, FormNode>;
}

/** Children materialized by the check pass, keyed by form path */
type CreatedChildren = Map<string, FormNode>;

/**
 * Overwrite `form` (and its subtree) from `input`
 *
 * @throws {PopulationError} input shape does not match the definition
 * @throws {MissingNestedModelError} input addresses a child that does not
 * exist and has no creation policy
 */
export function populate(form: FormNode, input: unknown): PopulateResult {
  const mapping = expectMapping(input, form.path);
  const created: CreatedChildren = new Map();
  checkNode(form, mapping, created);

  const state: ApplyState = {
    notes: [],
    trace: createTracer(form.options),
    created,
  };
  applyNode(form, mapping, state);
  return { notes: state.notes };
}

function checkNode(
  node: FormNode,
  input: InputMapping,
  created: CreatedChildren
): void {
  for (const property of node.definition.properties) {
    if (property.kind === 'scalar') continue;
    if (property.visibility === 'virtual') continue;
    if (!Object.hasOwn(input, property.name)) continue;

    const fragment = input[property.name];
    const propertyPath = joinPath(node.path, property.name);

    if (property.kind === 'nested') {
      if (fragment === undefined || fragment === null) continue;
      const mapping = expectMapping(fragment, propertyPath);
      const existing = node.child(property.name);
      checkEntry(
        node,
        property,
        existing,
        mapping,
        propertyPath,
        undefined,
        created
      );
      continue;
    }

    const entries = readCollection(
      fragment,
      propertyPath,
      node.options.input.indexedMappings
    );
    if (entries === undefined) continue;
    const existing = node.children(property.name);
    entries.forEach((entry, index) => {
      const entryPath = indexPath(propertyPath, index);
      const mapping = expectMapping(entry, entryPath);
      checkEntry(
        node,
        property,
        existing[index],
        mapping,
        entryPath,
        index,
        created
      );
    });
  }
}

/**
 * A missing child is created here, bound but not installed, so the rest of
 * the check runs against the model the policy actually returned
 */
function checkEntry(
  parent: FormNode,
  property: NestedDescriptor,
  existing: FormNode | undefined,
  fragment: InputMapping,
  path: string,
  index: number | undefined,
  created: CreatedChildren
): void {
  const skipContext = { property, path, index, existing };
  if (shouldSkip(property.skipIf, fragment, skipContext)) {
    return;
  }
  if (existing) {
    checkNode(existing, fragment, created);
    return;
  }
  if (property.creationPolicy === undefined) {
    throw new MissingNestedModelError({
      message: `No ${property.schema.name} model at ${displayPath(path)} and "${property.name}" has no creation policy`,
      context: {
        path,
        property: property.name,
        definition: property.schema.name,
        suggestion: `Give "${property.name}" a create or createWith policy, or supply the ${property.schema.name} model`,
      },
    });
  }
  const child = createChild(parent, property, fragment, path, index);
  created.set(path, child);
  checkNode(child, fragment, created);
}

function applyNode(
  node: FormNode,
  input: InputMapping,
  state: ApplyState
): void {
  for (const property of node.definition.properties) {
    if (property.visibility === 'virtual') continue;
    if (!Object.hasOwn(input, property.name)) continue;

    const fragment = input[property.name];

    if (property.kind === 'scalar') {
      const value = property.transform
        ? property.transform(fragment, {
            form: node,
            property,
            previous: node.get(property.name),
          })
        : fragment;
      node.assignScalar(property.name, value);
      continue;
    }

    const propertyPath = joinPath(node.path, property.name);

    if (property.kind === 'nested') {
      if (fragment === undefined || fragment === null) continue;
      const mapping = expectMapping(fragment, propertyPath);
      const existing = node.child(property.name);
      const child = applyEntry(
        node,
        property,
        existing,
        mapping,
        propertyPath,
        undefined,
        state
      );
      if (child && child !== existing) {
        node.assignChild(property.name, child);
      }
      continue;
    }

    const entries = readCollection(
      fragment,
      propertyPath,
      node.options.input.indexedMappings
    );
    if (entries === undefined) continue;

    const current = node.children(property.name);
    const next: FormNode[] = [];
    entries.forEach((entry, index) => {
      const entryPath = indexPath(propertyPath, index);
      const child = applyEntry(
        node,
        property,
        current[index],
        expectMapping(entry, entryPath),
        entryPath,
        index,
        state
      );
      if (child) next.push(child);
    });

    const surplus = current.length - entries.length;
    const policy: SurplusPolicy =
      property.surplus ?? node.options.collections.surplus;
    node.flagSurplus(property.name, 0);
    if (surplus > 0) {
      const kept = handleSurplus(
        node,
        property.name,
        current.slice(entries.length),
        policy,
        propertyPath,
        state
      );
      next.push(...kept);
    }
    node.assignChildren(property.name, next);
  }
}

/**
 * Populate, create or skip the child at one position. Returns the node that
 * occupies the position afterwards (undefined when a gap was skipped).
 */
function applyEntry(
  parent: FormNode,
  property: NestedDescriptor,
  existing: FormNode | undefined,
  fragment: InputMapping,
  path: string,
  index: number | undefined,
  state: ApplyState
): FormNode | undefined {
  const skipContext = { property, path, index, existing };
  if (shouldSkip(property.skipIf, fragment, skipContext)) {
    state.notes.push({ code: 'ENTRY_SKIPPED', path });
    state.trace(`populate ${path}: skipped`);
    return existing;
  }
  if (existing) {
    applyNode(existing, fragment, state);
    return existing;
  }

  const child =
    state.created.get(path) ??
    createChild(parent, property, fragment, path, index);
  state.notes.push({
    code: 'CHILD_CREATED',
    path,
    details: { definition: property.schema.name },
  });
  state.trace(`populate ${path}: created ${property.schema.name}`);
  applyNode(child, fragment, state);
  return child;
}

function createChild(
  parent: FormNode,
  property: NestedDescriptor,
  fragment: InputMapping,
  path: string,
  index: number | undefined
): FormNode {
  const policy = property.creationPolicy;
  const context: CreationContext = {
    parent,
    property,
    definition: property.schema,
    index,
    path,
  };
  const model: unknown =
    policy === undefined
      ? undefined
      : typeof policy === 'function'
        ? policy(fragment, context)
        : new policy.construct();

  if (typeof model !== 'object' || model === null) {
    throw new MissingNestedModelError({
      message: `The creation policy of "${property.name}" returned no model for ${displayPath(path)}`,
      context: {
        path,
        property: property.name,
        definition: property.schema.name,
      },
    });
  }
  return parent.bindChild(property, model, path);
}

function handleSurplus(
  node: FormNode,
  name: string,
  surplus: readonly FormNode[],
  policy: SurplusPolicy,
  path: string,
  state: ApplyState
): readonly FormNode[] {
  const details = { count: surplus.length };
  switch (policy) {
    case 'keep':
      state.notes.push({ code: 'SURPLUS_KEPT', path, details });
      return surplus;
    case 'drop':
      state.notes.push({ code: 'SURPLUS_DROPPED', path, details });
      state.trace(`populate ${path}: dropped ${surplus.length} entries`);
      return [];
    case 'invalid':
      state.notes.push({ code: 'SURPLUS_FLAGGED', path, details });
      node.flagSurplus(name, surplus.length);
      return surplus;
  }
}
