/**
 * Save: sync, then persist bottom-up.
 *
 * Children are persisted before their parent, siblings in declaration order
 * and collection entries in order. A model bound in several places (for
 * instance by two roles of a composition) is persisted once per save.
 * Failures propagate as they come; siblings already persisted stay persisted.
 */

import type { FormNode } from '../form/form-node.js';
import type { Snapshot } from '../types/schema.js';
import { displayPath } from '../util/path.js';
import { createTracer, type Tracer } from '../util/trace.js';
import { toSnapshot } from './snapshot.js';
import { isSynced, syncForm } from './sync.js';

export interface PersistedEntry {
  readonly path: string;
  readonly definition: string;
  readonly role: string;
  readonly model: object;
}

export interface SaveResult {
  /** Persist calls in the order they were made */
  readonly persisted: readonly PersistedEntry[];
}

/** Receives the synchronized values when the caller persists on its own */
export type ManualSaveHandler<T> = (snapshot: Snapshot) => T;

export function saveForm(form: FormNode): SaveResult;
export function saveForm<T>(form: FormNode, handler: ManualSaveHandler<T>): T;
export function saveForm<T>(
  form: FormNode,
  handler?: ManualSaveHandler<T>
): SaveResult | T {
  if (handler) {
    return handler(toSnapshot(form));
  }

  syncForm(form);

  const persisted: PersistedEntry[] = [];
  persistNode(form, new Set<object>(), persisted, createTracer(form.options));
  return { persisted };
}

function persistNode(
  node: FormNode,
  seen: Set<object>,
  persisted: PersistedEntry[],
  trace: Tracer
): void {
  for (const property of node.definition.properties) {
    if (property.kind === 'scalar') continue;
    if (!property.persist || !isSynced(property)) continue;

    const children =
      property.kind === 'nested'
        ? [node.child(property.name)]
        : node.children(property.name);
    for (const child of children) {
      if (child) persistNode(child, seen, persisted, trace);
    }
  }

  for (const role of node.definition.roles) {
    const binding = node.binding(role);
    if (seen.has(binding.model)) continue;
    seen.add(binding.model);

    binding.persist();
    persisted.push({
      path: node.path,
      definition: node.definition.name,
      role,
      model: binding.model,
    });
    trace(`save ${displayPath(node.path)} (${node.definition.name}, ${role})`);
  }
}
