import type { FormNode } from '../form/form-node.js';
import type { PropertyDescriptor } from '../types/schema.js';
import { createTracer } from '../util/trace.js';

/** Properties that sync writes back: everything but `virtual` and `empty` */
export function isSynced(property: PropertyDescriptor): boolean {
  return property.visibility === 'normal';
}

/**
 * Write the tree's values onto its models. Children are synced through their
 * own bindings before the parent writes its own properties, so a parent only
 * ever hands its models the child model references.
 */
export function syncForm(form: FormNode): void {
  const trace = createTracer(form.options);
  syncNode(form, trace);
}

function syncNode(node: FormNode, trace: (message: string) => void): void {
  const { properties } = node.definition;

  for (const property of properties) {
    if (!isSynced(property)) continue;
    if (property.kind === 'nested') {
      const child = node.child(property.name);
      if (child) syncNode(child, trace);
    } else if (property.kind === 'collection') {
      for (const child of node.children(property.name)) {
        syncNode(child, trace);
      }
    }
  }

  for (const property of properties) {
    if (!isSynced(property)) continue;
    const binding = node.binding(property.owner);
    switch (property.kind) {
      case 'scalar':
        binding.set(property.accessor, node.get(property.name), property.name);
        break;
      case 'nested': {
        // an absent child leaves the model's reference as it is
        const child = node.child(property.name);
        if (child) binding.set(property.accessor, child.model, property.name);
        break;
      }
      case 'collection':
        binding.set(
          property.accessor,
          node.children(property.name).map((child) => child.model),
          property.name
        );
        break;
    }
  }

  const changed = node.changedProperties();
  if (changed.length > 0) {
    trace(
      `sync ${node.path === '' ? node.definition.name : node.path}: ${changed.join(', ')}`
    );
  }
}
