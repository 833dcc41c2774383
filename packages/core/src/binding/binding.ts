import {
  MissingAccessorError,
  PersistenceError,
} from '../types/errors.js';
import { isErr } from '../types/result.js';
import { displayPath } from '../util/path.js';
import { toAdapter, type ModelAdapter } from './adapter.js';

export interface BindingScope {
  /** Definition name, for error context */
  readonly definition: string;
  /** Form path of the node owning the binding */
  readonly path: string;
}

/**
 * One model, wrapped for exactly one owner role of one form node. The core
 * never swaps the model of a binding; it only reads, writes and persists it.
 */
export class Binding {
  readonly adapter: ModelAdapter;

  constructor(
    readonly role: string,
    model: object,
    private readonly scope: BindingScope
  ) {
    this.adapter = toAdapter(model);
  }

  get model(): object {
    return this.adapter.model;
  }

  get(accessor: string, property: string = accessor): unknown {
    if (!this.adapter.readable(accessor)) {
      throw this.#missing(accessor, property, 'read');
    }
    return this.adapter.get(accessor);
  }

  set(accessor: string, value: unknown, property: string = accessor): void {
    if (!this.adapter.writable(accessor)) {
      throw this.#missing(accessor, property, 'write');
    }
    this.adapter.set(accessor, value);
  }

  persist(): void {
    if (!this.adapter.persistable()) {
      throw this.#missing('save', 'save', 'persist');
    }
    const outcome = this.adapter.persist();
    if (isErr(outcome)) {
      throw new PersistenceError({
        message: `Persisting the ${this.role} model of ${this.scope.definition} at ${displayPath(this.scope.path)} failed: ${outcome.error.message}`,
        context: {
          definition: this.scope.definition,
          path: this.scope.path,
          role: this.role,
        },
        cause: outcome.error,
      });
    }
  }

  #missing(
    accessor: string,
    property: string,
    mode: 'read' | 'write' | 'persist'
  ): MissingAccessorError {
    const what =
      mode === 'persist'
        ? 'save() method'
        : `${mode === 'read' ? 'readable' : 'writable'} "${accessor}"`;
    return new MissingAccessorError({
      message: `The ${this.role} model of ${this.scope.definition} at ${displayPath(this.scope.path)} has no ${what}`,
      context: {
        accessor,
        mode,
        property,
        definition: this.scope.definition,
        path: this.scope.path,
        role: this.role,
      },
    });
  }
}
