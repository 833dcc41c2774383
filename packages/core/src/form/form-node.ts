/* eslint-disable max-lines */
/**
 * FormNode: one instantiated SchemaDefinition.
 *
 * Holds a Binding per owner role and the current value of every declared
 * property. Values are read from the models once, at construction; after
 * that only population changes them, and only sync/save writes them back.
 */

import { Binding } from '../binding/binding.js';
import type { SchemaDefinition } from '../definition/definition.js';
import {
  ConfigError,
  DefinitionError,
  PopulationError,
} from '../types/errors.js';
import type { ResolvedOptions } from '../types/options.js';
import type {
  ErrorMessages,
  NestedDescriptor,
  PropertyDescriptor,
  Snapshot,
} from '../types/schema.js';
import { displayPath, indexPath, joinPath } from '../util/path.js';
import { populate, type PopulateResult } from '../populate/populate.js';
import {
  saveForm,
  type ManualSaveHandler,
  type SaveResult,
} from '../sync/save.js';
import { toSnapshot } from '../sync/snapshot.js';
import { syncForm } from '../sync/sync.js';
import {
  emptyReport,
  flattenReport,
  isReportEmpty,
  type ErrorReport,
} from '../validation/report.js';
import { runValidation } from '../validation/runner.js';

export interface FormNodeInit {
  readonly options: ResolvedOptions;
  readonly path: string;
  readonly parent?: FormNode;
}

function isIterable(value: object): value is Iterable<unknown> {
  return typeof Reflect.get(value, Symbol.iterator) === 'function';
}

export class FormNode {
  readonly definition: SchemaDefinition;
  readonly bindings: ReadonlyMap<string, Binding>;
  readonly parent: FormNode | undefined;
  readonly options: ResolvedOptions;
  readonly path: string;

  readonly #scalars = new Map<string, unknown>();
  readonly #nested = new Map<string, FormNode | undefined>();
  readonly #collections = new Map<string, readonly FormNode[]>();
  readonly #changed = new Set<string>();
  readonly #surplus = new Map<string, number>();
  #errors: ErrorReport = emptyReport();

  private constructor(
    definition: SchemaDefinition,
    models: ReadonlyMap<string, object>,
    init: FormNodeInit
  ) {
    this.definition = definition;
    this.parent = init.parent;
    this.options = init.options;
    this.path = init.path;

    const bindings = new Map<string, Binding>();
    for (const role of definition.roles) {
      const model = models.get(role);
      if (model === undefined) {
        throw new ConfigError({
          message: `${definition.name} needs a model for role "${role}"`,
          context: { definition: definition.name, role, path: init.path },
        });
      }
      bindings.set(
        role,
        new Binding(role, model, { definition: definition.name, path: init.path })
      );
    }
    this.bindings = bindings;

    for (const property of definition.properties) {
      this.#read(property);
    }
  }

  /**
   * Build a node (and its subtree) from models keyed by owner role
   */
  static build(
    definition: SchemaDefinition,
    models: ReadonlyMap<string, object>,
    init: FormNodeInit
  ): FormNode {
    return new FormNode(definition, models, init);
  }

  /** Model of the primary role */
  get model(): object {
    return this.binding(this.definition.primaryRole).model;
  }

  get root(): FormNode {
    return this.parent ? this.parent.root : this;
  }

  /** Report produced by the last validation of this node */
  get errors(): ErrorReport {
    return this.#errors;
  }

  /** Last validation messages keyed by form path, e.g. `songs[0].title` */
  messages(): ErrorMessages {
    return flattenReport(this.#errors);
  }

  binding(role: string): Binding {
    const binding = this.bindings.get(role);
    if (!binding) {
      throw new ConfigError({
        message: `${this.definition.name} has no binding for role "${role}"`,
        context: { definition: this.definition.name, role, path: this.path },
      });
    }
    return binding;
  }

  descriptor(name: string): PropertyDescriptor {
    const descriptor = this.definition.property(name);
    if (!descriptor) {
      throw new DefinitionError({
        message: `${this.definition.name} declares no property "${name}"`,
        context: { definition: this.definition.name, property: name },
      });
    }
    return descriptor;
  }

  /**
   * Current value: a scalar, a FormNode (or undefined) for nested
   * properties, an array of FormNodes for collections
   */
  get(name: string): unknown {
    const descriptor = this.descriptor(name);
    switch (descriptor.kind) {
      case 'scalar':
        return this.#scalars.get(name);
      case 'nested':
        return this.#nested.get(name);
      case 'collection':
        return this.children(name);
    }
  }

  child(name: string): FormNode | undefined {
    this.#expectKind(name, 'nested');
    return this.#nested.get(name);
  }

  children(name: string): readonly FormNode[] {
    this.#expectKind(name, 'collection');
    return this.#collections.get(name) ?? [];
  }

  changed(name: string): boolean {
    this.descriptor(name);
    return this.#changed.has(name);
  }

  changedProperties(): string[] {
    return this.definition.properties
      .map((p) => p.name)
      .filter((name) => this.#changed.has(name));
  }

  /**
   * Overwrite the tree from hierarchical input. Models are not touched.
   */
  populate(input: unknown): PopulateResult {
    return populate(this, input);
  }

  /**
   * Populate (when input is given), then run every rule checker in the
   * tree. The report is kept on `errors`; true when it is empty.
   */
  validate(input?: unknown): boolean {
    if (input !== undefined) {
      populate(this, input);
    }
    const report = runValidation(this);
    this.#errors = report;
    return isReportEmpty(report);
  }

  sync(): void {
    syncForm(this);
  }

  save(): SaveResult;
  save<T>(handler: ManualSaveHandler<T>): T;
  save<T>(handler?: ManualSaveHandler<T>): SaveResult | T {
    return handler ? saveForm(this, handler) : saveForm(this);
  }

  toSnapshot(): Snapshot {
    return toSnapshot(this);
  }

  /** @internal population writes scalar values through here */
  assignScalar(name: string, value: unknown): void {
    this.#expectKind(name, 'scalar');
    if (!Object.is(this.#scalars.get(name), value)) {
      this.#changed.add(name);
    }
    this.#scalars.set(name, value);
  }

  /** @internal */
  assignChild(name: string, child: FormNode): void {
    this.#expectKind(name, 'nested');
    if (this.#nested.get(name) !== child) {
      this.#changed.add(name);
    }
    this.#nested.set(name, child);
  }

  /** @internal */
  assignChildren(name: string, children: readonly FormNode[]): void {
    const current = this.children(name);
    const same =
      current.length === children.length &&
      current.every((node, i) => node === children[i]);
    if (!same) {
      this.#changed.add(name);
    }
    this.#collections.set(name, Object.freeze([...children]));
  }

  /** @internal number of existing entries the last input left out */
  flagSurplus(name: string, count: number): void {
    this.#expectKind(name, 'collection');
    if (count > 0) {
      this.#surplus.set(name, count);
    } else {
      this.#surplus.delete(name);
    }
  }

  surplusCount(name: string): number {
    return this.#surplus.get(name) ?? 0;
  }

  /**
   * Wrap a child model in a node bound to `descriptor.schema`
   */
  bindChild(
    descriptor: NestedDescriptor,
    model: object,
    path: string
  ): FormNode {
    return FormNode.build(
      descriptor.schema,
      new Map([[descriptor.schema.primaryRole, model]]),
      { options: this.options, path, parent: this }
    );
  }

  #read(property: PropertyDescriptor): void {
    const path = joinPath(this.path, property.name);

    if (property.kind === 'scalar') {
      if (property.visibility === 'empty') {
        this.#scalars.set(property.name, property.defaultValue);
        return;
      }
      const raw = this.binding(property.owner).get(
        property.accessor,
        property.name
      );
      this.#scalars.set(
        property.name,
        raw === undefined ? property.defaultValue : raw
      );
      return;
    }

    if (property.kind === 'nested') {
      const raw =
        property.visibility === 'empty'
          ? undefined
          : this.binding(property.owner).get(property.accessor, property.name);
      this.#nested.set(
        property.name,
        raw === undefined || raw === null
          ? undefined
          : this.bindChild(property, this.#expectModel(raw, path), path)
      );
      return;
    }

    const raw =
      property.visibility === 'empty'
        ? undefined
        : this.binding(property.owner).get(property.accessor, property.name);
    if (raw === undefined || raw === null) {
      this.#collections.set(property.name, Object.freeze([]));
      return;
    }
    if (typeof raw !== 'object' || !isIterable(raw)) {
      throw new PopulationError({
        message: `${this.definition.name}.${property.name}: expected the model to hold a list at ${displayPath(path)}`,
        context: {
          path,
          definition: this.definition.name,
          property: property.name,
        },
      });
    }
    const children = Array.from(raw, (model, index) => {
      const childPath = indexPath(path, index);
      return this.bindChild(property, this.#expectModel(model, childPath), childPath);
    });
    this.#collections.set(property.name, Object.freeze(children));
  }

  #expectModel(value: unknown, path: string): object {
    if (typeof value !== 'object' || value === null) {
      throw new PopulationError({
        message: `${this.definition.name}: expected a model object at ${displayPath(path)} (got ${typeof value})`,
        context: { path, definition: this.definition.name },
      });
    }
    return value;
  }

  #expectKind(name: string, kind: PropertyDescriptor['kind']): void {
    const descriptor = this.descriptor(name);
    if (descriptor.kind !== kind) {
      throw new DefinitionError({
        message: `${this.definition.name}.${name} is a ${descriptor.kind} property, not ${kind}`,
        context: { definition: this.definition.name, property: name },
      });
    }
  }
}
