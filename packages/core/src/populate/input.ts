import { PopulationError } from '../types/errors.js';
import type { InputMapping } from '../types/schema.js';
import { displayPath } from '../util/path.js';

const INDEX_KEY = /^(?:0|[1-9]\d*)$/;

export function isPlainMapping(value: unknown): value is InputMapping {
  if (typeof value !== 'object' || value === null) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

export function expectMapping(value: unknown, path: string): InputMapping {
  if (!isPlainMapping(value)) {
    throw new PopulationError({
      message: `Expected a mapping at ${displayPath(path)} (got ${describe(value)})`,
      context: { path, value },
    });
  }
  return value;
}

/**
 * Entries of a collection fragment: an array, or (when allowed) a mapping
 * keyed by non-negative integers, ordered by index. `null`/`undefined`
 * mean the key was not given.
 */
export function readCollection(
  value: unknown,
  path: string,
  indexedMappings: boolean
): readonly unknown[] | undefined {
  if (value === undefined || value === null) return undefined;
  if (Array.isArray(value)) return value;

  if (indexedMappings && isPlainMapping(value)) {
    const keys = Object.keys(value);
    if (keys.every((key) => INDEX_KEY.test(key))) {
      return keys
        .map(Number)
        .sort((a, b) => a - b)
        .map((index) => value[String(index)]);
    }
  }

  throw new PopulationError({
    message: `Expected a list at ${displayPath(path)} (got ${describe(value)})`,
    context: { path, value },
  });
}

function describe(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}
