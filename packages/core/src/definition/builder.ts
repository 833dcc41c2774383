/* eslint-disable max-lines */
/**
 * Property DSL
 *
 * `defineSchema(name)` returns an explicit builder; `.build()` finalizes it
 * into an immutable SchemaDefinition. Inheritance (`extendSchema`) starts a
 * builder from a copy of the base descriptor list; fragments
 * (`defineFragment`) are ordered declaration lists applied with `include`.
 *
 * Same-name rule: a name already present needs an explicit `override`
 * intent. 'replace' swaps the descriptor in place, 'extend' merges the new
 * options onto the inherited ones (and extends an inherited child definition
 * when an inline builder is given). Anything else is a DefinitionError.
 */

import { DefinitionError } from '../types/errors.js';
import { ErrorCode } from '../errors/codes.js';
import { isSurplusPolicy, type SurplusPolicy } from '../types/options.js';
import {
  SELF_ROLE,
  isNestedDescriptor,
  type CreationFunction,
  type CreationPolicy,
  type InputTransform,
  type ModelConstructor,
  type NestedDescriptor,
  type PropertyDescriptor,
  type RuleChecker,
  type ScalarDescriptor,
  type SkipPolicy,
  type Visibility,
} from '../types/schema.js';
import { SchemaDefinition } from './definition.js';

export type OverrideIntent = 'replace' | 'extend';

interface CommonOptions {
  /** Accessor name on the model (defaults to the property name) */
  as?: string;
  /** Owner role in a composed definition */
  on?: string;
  visibility?: Visibility;
  override?: OverrideIntent;
}

export interface ScalarOptions extends CommonOptions {
  transform?: InputTransform;
  default?: unknown;
}

export interface NestedOptions extends CommonOptions {
  /** Existing definition for the child; mutually exclusive with an inline builder */
  schema?: SchemaDefinition;
  /** Zero-argument construction when input addresses a missing child */
  create?: ModelConstructor;
  /** Custom creation policy when input addresses a missing child */
  createWith?: CreationFunction;
  /** Persist child models on save (default: true) */
  persist?: boolean;
  skipIf?: SkipPolicy;
  surplus?: SurplusPolicy;
}

export type BuildChild = (builder: SchemaBuilder) => void;

export type PropertyDeclaration =
  | { kind: 'scalar'; name: string; options: ScalarOptions }
  | {
      kind: 'nested' | 'collection';
      name: string;
      options: NestedOptions;
      build?: BuildChild;
    };

const VISIBILITIES: readonly Visibility[] = ['normal', 'virtual', 'empty'];
const NESTED_ONLY_KEYS = [
  'schema',
  'create',
  'createWith',
  'persist',
  'skipIf',
  'surplus',
] as const;
const SCALAR_ONLY_KEYS = ['transform', 'default'] as const;
const RESERVED_NAME_CHARS = /[.[\]]/;

function checkName(name: string, where: string): string {
  if (typeof name !== 'string' || name.length === 0) {
    throw new DefinitionError({
      message: `${where}: property names must be non-empty strings`,
      context: { definition: where },
    });
  }
  if (RESERVED_NAME_CHARS.test(name)) {
    throw new DefinitionError({
      message: `${where}: property name "${name}" must not contain ".", "[" or "]"`,
      context: { definition: where, property: name },
    });
  }
  return name;
}

/**
 * Declaration surface shared by schema builders and fragment builders
 */
export abstract class PropertyDsl {
  protected abstract readonly label: string;
  protected abstract accept(declaration: PropertyDeclaration): void;

  property(name: string, options: ScalarOptions = {}): this {
    this.accept({ kind: 'scalar', name: checkName(name, this.label), options });
    return this;
  }

  nested(name: string, build: BuildChild): this;
  nested(name: string, options: NestedOptions, build?: BuildChild): this;
  nested(
    name: string,
    optionsOrBuild: NestedOptions | BuildChild,
    build?: BuildChild
  ): this {
    return this.#declareNested('nested', name, optionsOrBuild, build);
  }

  collection(name: string, build: BuildChild): this;
  collection(name: string, options: NestedOptions, build?: BuildChild): this;
  collection(
    name: string,
    optionsOrBuild: NestedOptions | BuildChild,
    build?: BuildChild
  ): this {
    return this.#declareNested('collection', name, optionsOrBuild, build);
  }

  #declareNested(
    kind: 'nested' | 'collection',
    name: string,
    optionsOrBuild: NestedOptions | BuildChild,
    build?: BuildChild
  ): this {
    const options = typeof optionsOrBuild === 'function' ? {} : optionsOrBuild;
    const childBuild =
      typeof optionsOrBuild === 'function' ? optionsOrBuild : build;
    this.accept({
      kind,
      name: checkName(name, this.label),
      options,
      build: childBuild,
    });
    return this;
  }
}

/**
 * Ordered, reusable list of declarations
 */
export class Fragment {
  constructor(
    readonly name: string,
    readonly declarations: readonly PropertyDeclaration[]
  ) {
    Object.freeze(this);
  }
}

export class FragmentBuilder extends PropertyDsl {
  protected readonly label: string;
  readonly #declarations: PropertyDeclaration[] = [];

  constructor(name: string) {
    super();
    this.label = name;
  }

  protected accept(declaration: PropertyDeclaration): void {
    const clash = this.#declarations.some((d) => d.name === declaration.name);
    if (clash && declaration.options.override === undefined) {
      throw new DefinitionError({
        message: `${this.label}: property "${declaration.name}" is declared twice`,
        errorCode: ErrorCode.DUPLICATE_PROPERTY,
        context: { definition: this.label, property: declaration.name },
      });
    }
    this.#declarations.push(declaration);
  }

  build(): Fragment {
    return new Fragment(this.label, [...this.#declarations]);
  }
}

export class SchemaBuilder extends PropertyDsl {
  protected readonly label: string;
  #roles: string[] | undefined;
  #rules: RuleChecker | undefined;
  readonly #properties: PropertyDescriptor[];

  constructor(name: string, base?: SchemaDefinition) {
    super();
    this.label = name;
    this.#properties = base ? [...base.properties] : [];
    this.#roles = base?.composed ? [...base.roles] : undefined;
    this.#rules = base?.rules;
  }

  /**
   * Bind the definition to several independently owned models. Every
   * property then names its owner with `on`.
   */
  composedOf(...roles: string[]): this {
    if (roles.length === 0) {
      throw new DefinitionError({
        message: `${this.label}: composedOf() needs at least one role`,
        context: { definition: this.label },
      });
    }
    const seen = new Set<string>();
    for (const role of roles) {
      if (typeof role !== 'string' || role.length === 0 || seen.has(role)) {
        throw new DefinitionError({
          message: `${this.label}: roles must be unique non-empty strings (got ${JSON.stringify(roles)})`,
          context: { definition: this.label },
        });
      }
      seen.add(role);
    }
    this.#roles = roles;
    return this;
  }

  rules(checker: RuleChecker): this {
    this.#rules = checker;
    return this;
  }

  include(fragment: Fragment): this {
    for (const declaration of fragment.declarations) {
      this.accept(declaration);
    }
    return this;
  }

  build(): SchemaDefinition {
    const roles = this.#roles;
    for (const descriptor of this.#properties) {
      this.#checkOwner(descriptor, roles);
    }
    return new SchemaDefinition({
      name: this.label,
      properties: this.#properties,
      roles,
      rules: this.#rules,
    });
  }

  protected accept(declaration: PropertyDeclaration): void {
    const index = this.#properties.findIndex(
      (p) => p.name === declaration.name
    );
    const intent = declaration.options.override;

    if (index === -1) {
      if (intent !== undefined) {
        throw new DefinitionError({
          message: `${this.label}: cannot ${intent} "${declaration.name}", no such inherited property`,
          context: { definition: this.label, property: declaration.name },
        });
      }
      this.#properties.push(this.#resolve(declaration, undefined));
      return;
    }

    const existing = this.#properties[index];
    if (intent === undefined || existing === undefined) {
      throw new DefinitionError({
        message: `${this.label}: property "${declaration.name}" is already declared; pass override: 'replace' or 'extend'`,
        errorCode: ErrorCode.DUPLICATE_PROPERTY,
        context: { definition: this.label, property: declaration.name },
      });
    }
    if (intent !== 'replace' && intent !== 'extend') {
      throw new DefinitionError({
        message: `${this.label}: unknown override intent "${String(intent)}"`,
        context: { definition: this.label, property: declaration.name },
      });
    }

    this.#properties[index] = this.#resolve(
      declaration,
      intent === 'extend' ? existing : undefined
    );
  }

  #resolve(
    declaration: PropertyDeclaration,
    base: PropertyDescriptor | undefined
  ): PropertyDescriptor {
    const { name, options } = declaration;

    if (base && base.kind !== declaration.kind) {
      throw new DefinitionError({
        message: `${this.label}: cannot extend ${base.kind} "${name}" as ${declaration.kind}`,
        context: { definition: this.label, property: name },
      });
    }

    const visibility = options.visibility ?? base?.visibility ?? 'normal';
    if (!VISIBILITIES.includes(visibility)) {
      throw new DefinitionError({
        message: `${this.label}: "${name}" has unknown visibility "${String(visibility)}"`,
        context: { definition: this.label, property: name },
      });
    }

    const common = {
      name,
      accessor: options.as ?? base?.accessor ?? name,
      owner: options.on ?? base?.owner ?? SELF_ROLE,
      visibility,
    };

    if (declaration.kind === 'scalar') {
      this.#rejectKeys(name, declaration.options, NESTED_ONLY_KEYS, 'scalar');
      const inherited = base?.kind === 'scalar' ? base : undefined;
      const scalar: ScalarDescriptor = {
        ...common,
        kind: 'scalar',
        transform: declaration.options.transform ?? inherited?.transform,
        defaultValue: Object.hasOwn(declaration.options, 'default')
          ? declaration.options.default
          : inherited?.defaultValue,
      };
      return scalar;
    }

    this.#rejectKeys(
      name,
      declaration.options,
      SCALAR_ONLY_KEYS,
      declaration.kind
    );
    const inherited = base && isNestedDescriptor(base) ? base : undefined;
    const nestedOptions = declaration.options;
    const surplus = nestedOptions.surplus ?? inherited?.surplus;
    if (surplus !== undefined && !isSurplusPolicy(surplus)) {
      throw new DefinitionError({
        message: `${this.label}: "${name}" has unknown surplus policy "${String(surplus)}"`,
        context: { definition: this.label, property: name },
      });
    }
    if (surplus !== undefined && declaration.kind !== 'collection') {
      throw new DefinitionError({
        message: `${this.label}: surplus only applies to collections ("${name}" is nested)`,
        context: { definition: this.label, property: name },
      });
    }

    const nested: NestedDescriptor = {
      ...common,
      kind: declaration.kind,
      schema: this.#childSchema(declaration, inherited),
      creationPolicy: this.#creationPolicy(name, nestedOptions, inherited),
      persist: nestedOptions.persist ?? inherited?.persist ?? true,
      skipIf: nestedOptions.skipIf ?? inherited?.skipIf,
      surplus,
    };
    return nested;
  }

  #childSchema(
    declaration: Extract<
      PropertyDeclaration,
      { kind: 'nested' | 'collection' }
    >,
    inherited: NestedDescriptor | undefined
  ): SchemaDefinition {
    const { name, options, build } = declaration;
    if (options.schema && build) {
      throw new DefinitionError({
        message: `${this.label}: "${name}" takes either a schema or an inline builder, not both`,
        context: { definition: this.label, property: name },
      });
    }

    let child: SchemaDefinition | undefined;
    if (options.schema) {
      child = options.schema;
    } else if (build) {
      const builder = new SchemaBuilder(
        `${this.label}.${name}`,
        inherited?.schema
      );
      build(builder);
      child = builder.build();
    } else {
      child = inherited?.schema;
    }

    if (!child) {
      throw new DefinitionError({
        message: `${this.label}: ${declaration.kind} property "${name}" has no child definition`,
        context: { definition: this.label, property: name },
      });
    }
    if (child.composed) {
      throw new DefinitionError({
        message: `${this.label}: child definition "${child.name}" of "${name}" must bind a single model`,
        context: { definition: this.label, property: name },
      });
    }
    return child;
  }

  #creationPolicy(
    name: string,
    options: NestedOptions,
    inherited: NestedDescriptor | undefined
  ): CreationPolicy | undefined {
    if (options.create && options.createWith) {
      throw new DefinitionError({
        message: `${this.label}: "${name}" takes either create or createWith, not both`,
        context: { definition: this.label, property: name },
      });
    }
    if (options.create) return { construct: options.create };
    if (options.createWith) return options.createWith;
    return inherited?.creationPolicy;
  }

  #rejectKeys(
    name: string,
    options: object,
    keys: readonly string[],
    kind: string
  ): void {
    const offending = keys.filter((key) => Object.hasOwn(options, key));
    if (offending.length > 0) {
      throw new DefinitionError({
        message: `${this.label}: option(s) ${offending.join(', ')} do not apply to ${kind} property "${name}"`,
        context: { definition: this.label, property: name },
      });
    }
  }

  #checkOwner(
    descriptor: PropertyDescriptor,
    roles: readonly string[] | undefined
  ): void {
    if (roles === undefined) {
      if (descriptor.owner !== SELF_ROLE) {
        throw new DefinitionError({
          message: `${this.label}: "${descriptor.name}" is on "${descriptor.owner}" but the definition is not composed`,
          errorCode: ErrorCode.UNKNOWN_OWNER_ROLE,
          context: { definition: this.label, property: descriptor.name },
        });
      }
      return;
    }
    if (!roles.includes(descriptor.owner)) {
      throw new DefinitionError({
        message: `${this.label}: "${descriptor.name}" must name one of the roles ${roles.join(', ')} with on (got "${descriptor.owner}")`,
        errorCode: ErrorCode.UNKNOWN_OWNER_ROLE,
        context: {
          definition: this.label,
          property: descriptor.name,
          role: descriptor.owner,
        },
      });
    }
  }
}

export function defineSchema(name: string): SchemaBuilder {
  return new SchemaBuilder(name);
}

/**
 * Start a derived definition from a copy of `base`
 */
export function extendSchema(
  base: SchemaDefinition,
  name: string = base.name
): SchemaBuilder {
  return new SchemaBuilder(name, base);
}

export function defineFragment(name: string): FragmentBuilder {
  return new FragmentBuilder(name);
}
