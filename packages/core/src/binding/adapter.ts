/**
 * Model accessor contract
 *
 * The core never touches a model directly: every read, write and persist
 * goes through a ModelAdapter. `objectAdapter` covers plain objects and
 * class instances; callers with other storage shapes implement the
 * interface themselves.
 */

import { err, ok, isErr, type Result } from '../types/result.js';

export interface ModelAdapter {
  readonly model: object;
  readable(accessor: string): boolean;
  writable(accessor: string): boolean;
  persistable(): boolean;
  get(accessor: string): unknown;
  set(accessor: string, value: unknown): void;
  persist(): Result<void, Error>;
}

const ADAPTER_METHODS = [
  'readable',
  'writable',
  'persistable',
  'get',
  'set',
  'persist',
] as const;

export function isModelAdapter(value: unknown): value is ModelAdapter {
  if (typeof value !== 'object' || value === null) return false;
  if (typeof Reflect.get(value, 'model') !== 'object') return false;
  return ADAPTER_METHODS.every(
    (method) => typeof Reflect.get(value, method) === 'function'
  );
}

function findDescriptor(
  target: object,
  key: string
): PropertyDescriptor | undefined {
  let current: object | null = target;
  while (current !== null) {
    const descriptor = Object.getOwnPropertyDescriptor(current, key);
    if (descriptor) return descriptor;
    current = Object.getPrototypeOf(current);
  }
  return undefined;
}

function isResultLike(value: unknown): value is Result<unknown, unknown> {
  if (typeof value !== 'object' || value === null) return false;
  const tag = Reflect.get(value, '_tag');
  return tag === 'Ok' || tag === 'Err';
}

/**
 * Adapter over a plain object or class instance.
 * - readable: the key exists on the object or its prototype chain
 * - writable: a writable data property, or an accessor with a setter
 * - persist: calls `save()`; a `false` return or an Err result is a failure
 */
export function objectAdapter(model: object): ModelAdapter {
  return {
    model,
    readable(accessor) {
      return accessor in model;
    },
    writable(accessor) {
      const descriptor = findDescriptor(model, accessor);
      if (!descriptor) return false;
      if (descriptor.get !== undefined || descriptor.set !== undefined) {
        return descriptor.set !== undefined;
      }
      return descriptor.writable === true;
    },
    persistable() {
      return typeof Reflect.get(model, 'save') === 'function';
    },
    get(accessor) {
      return Reflect.get(model, accessor);
    },
    set(accessor, value) {
      Reflect.set(model, accessor, value);
    },
    persist() {
      const save: unknown = Reflect.get(model, 'save');
      if (typeof save !== 'function') {
        return err(new Error('model has no save() method'));
      }
      const outcome: unknown = Reflect.apply(save, model, []);
      if (outcome === false) {
        return err(new Error('save() returned false'));
      }
      if (isResultLike(outcome) && isErr(outcome)) {
        const failure = outcome.error;
        return err(
          failure instanceof Error ? failure : new Error(String(failure))
        );
      }
      return ok();
    },
  };
}

export function toAdapter(model: object): ModelAdapter {
  return isModelAdapter(model) ? model : objectAdapter(model);
}
