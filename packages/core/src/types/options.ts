/**
 * Runtime options for form trees
 *
 * All options are optional with conservative defaults. A tree resolves its
 * options once at construction; nested nodes share the root's resolved set.
 */

import { ConfigError } from './errors.js';

/**
 * What population does with existing collection entries that the input no
 * longer mentions (input shorter than the current membership)
 */
export type SurplusPolicy = 'keep' | 'drop' | 'invalid';

export const SURPLUS_POLICIES: readonly SurplusPolicy[] = [
  'keep',
  'drop',
  'invalid',
];

export interface CollectionOptions {
  /** Default handling of surplus entries (default: 'keep') */
  surplus?: SurplusPolicy;
}

export interface InputOptions {
  /**
   * Accept `{ "0": {...}, "1": {...} }` mappings for collections, ordered by
   * index (default: true)
   */
  indexedMappings?: boolean;
}

export type TraceSink = (line: string) => void;

export interface FormOptions {
  collections?: CollectionOptions;
  input?: InputOptions;
  /** Write population/sync trace lines (default: false) */
  trace?: boolean;
  /** Where trace lines go (default: process.stderr) */
  traceSink?: TraceSink;
}

export interface ResolvedOptions {
  collections: Required<CollectionOptions>;
  input: Required<InputOptions>;
  trace: boolean;
  traceSink?: TraceSink;
}

export const DEFAULT_OPTIONS: ResolvedOptions = {
  collections: {
    surplus: 'keep',
  },
  input: {
    indexedMappings: true,
  },
  trace: false,
};

/**
 * Deep-merges user options over DEFAULT_OPTIONS
 *
 * @throws {ConfigError} When a value is outside its allowed set
 */
export function resolveOptions(
  userOptions: FormOptions = {}
): ResolvedOptions {
  const resolved: ResolvedOptions = {
    ...DEFAULT_OPTIONS,
    ...userOptions,
    collections: { ...DEFAULT_OPTIONS.collections, ...userOptions.collections },
    input: { ...DEFAULT_OPTIONS.input, ...userOptions.input },
    trace: userOptions.trace ?? DEFAULT_OPTIONS.trace,
  };

  validateOptions(resolved);

  return resolved;
}

function validateOptions(options: ResolvedOptions): void {
  if (!SURPLUS_POLICIES.includes(options.collections.surplus)) {
    throw new ConfigError({
      message: `collections.surplus must be one of ${SURPLUS_POLICIES.join(', ')} (got ${String(options.collections.surplus)})`,
      context: {
        setting: 'collections.surplus',
        value: options.collections.surplus,
      },
    });
  }

  if (typeof options.input.indexedMappings !== 'boolean') {
    throw new ConfigError({
      message: 'input.indexedMappings must be a boolean',
      context: {
        setting: 'input.indexedMappings',
        value: options.input.indexedMappings,
      },
    });
  }

  if (
    options.traceSink !== undefined &&
    typeof options.traceSink !== 'function'
  ) {
    throw new ConfigError({
      message: 'traceSink must be a function',
      context: { setting: 'traceSink' },
    });
  }
}

export function isSurplusPolicy(value: unknown): value is SurplusPolicy {
  return SURPLUS_POLICIES.some((policy) => policy === value);
}
