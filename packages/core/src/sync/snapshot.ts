import type { FormNode } from '../form/form-node.js';
import type { Snapshot } from '../types/schema.js';

/**
 * Plain nested mapping of a tree's current values: nested children become
 * mappings (`undefined` when absent), collections arrays of mappings.
 * Every property is included, `virtual` and `empty` ones too.
 */
export function toSnapshot(form: FormNode): Snapshot {
  const snapshot: Snapshot = {};
  for (const property of form.definition.properties) {
    switch (property.kind) {
      case 'scalar':
        snapshot[property.name] = form.get(property.name);
        break;
      case 'nested': {
        const child = form.child(property.name);
        snapshot[property.name] = child ? toSnapshot(child) : undefined;
        break;
      }
      case 'collection':
        snapshot[property.name] = form.children(property.name).map(toSnapshot);
        break;
    }
  }
  return snapshot;
}
