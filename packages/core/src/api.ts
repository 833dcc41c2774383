/**
 * Facades for building and driving form trees.
 *
 * The FormNode methods (`populate`, `validate`, `sync`, `save`,
 * `toSnapshot`) delegate to the same engines exported here; either style
 * works on the same tree.
 */

import type { SchemaDefinition } from './definition/definition.js';
import { FormNode } from './form/form-node.js';
import { ConfigError } from './types/errors.js';
import { resolveOptions, type FormOptions } from './types/options.js';

export type RoleModels = Readonly<Record<string, object>>;

/**
 * Build a form tree from its models.
 *
 * Single-model definitions take the model itself; definitions built with
 * `composedOf(...)` take a record holding one model per declared role.
 *
 * @throws {ConfigError} a role has no model, or options are invalid
 * @throws {MissingAccessorError} a model lacks a property the definition reads
 */
export function createForm(
  definition: SchemaDefinition,
  models: object,
  options: FormOptions = {}
): FormNode {
  const resolved = resolveOptions(options);
  return FormNode.build(definition, roleModels(definition, models), {
    options: resolved,
    path: '',
  });
}

function roleModels(
  definition: SchemaDefinition,
  models: object
): ReadonlyMap<string, object> {
  if (!definition.composed) {
    return new Map([[definition.primaryRole, models]]);
  }

  const byRole = new Map<string, object>();
  for (const role of definition.roles) {
    const model: unknown = Reflect.get(models, role);
    if (typeof model !== 'object' || model === null) {
      throw new ConfigError({
        message: `${definition.name} is composed of ${definition.roles.join(', ')}; no model was given for "${role}"`,
        context: { definition: definition.name, role, setting: 'models' },
      });
    }
    byRole.set(role, model);
  }
  return byRole;
}

export { populate } from './populate/populate.js';
export { runValidation } from './validation/runner.js';
export { syncForm } from './sync/sync.js';
export { saveForm } from './sync/save.js';
export { toSnapshot } from './sync/snapshot.js';

/**
 * Functional form of `form.validate(input)`
 */
export function validate(form: FormNode, input?: unknown): boolean {
  return form.validate(input);
}
