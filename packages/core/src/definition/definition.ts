import {
  SELF_ROLE,
  type PropertyDescriptor,
  type RuleChecker,
} from '../types/schema.js';

export interface SchemaDefinitionInit {
  name: string;
  properties: readonly PropertyDescriptor[];
  roles?: readonly string[];
  rules?: RuleChecker;
}

/**
 * Finalized, inheritance-resolved schema. Produced by SchemaBuilder.build();
 * frozen, so a definition can be shared by any number of form trees.
 */
export class SchemaDefinition {
  readonly name: string;
  readonly properties: readonly PropertyDescriptor[];
  readonly roles: readonly string[];
  readonly composed: boolean;
  readonly rules?: RuleChecker;

  readonly #byName: ReadonlyMap<string, PropertyDescriptor>;

  constructor(init: SchemaDefinitionInit) {
    this.name = init.name;
    this.properties = Object.freeze(
      init.properties.map((p) => Object.freeze({ ...p }))
    );
    this.composed = init.roles !== undefined && init.roles.length > 0;
    this.roles = Object.freeze(
      this.composed ? [...(init.roles ?? [])] : [SELF_ROLE]
    );
    this.rules = init.rules;
    this.#byName = new Map(this.properties.map((p) => [p.name, p]));
    Object.freeze(this);
  }

  property(name: string): PropertyDescriptor | undefined {
    return this.#byName.get(name);
  }

  has(name: string): boolean {
    return this.#byName.has(name);
  }

  /** Role whose model is exposed as the node's primary model */
  get primaryRole(): string {
    return this.roles[0] ?? SELF_ROLE;
  }
}
