import {
  ConfigError,
  SURPLUS_POLICIES,
  isSurplusPolicy,
  type FormOptions,
} from '@modelform/core';

export type OutputMode = 'report' | 'snapshot' | 'model';

const OUTPUT_MODES: readonly OutputMode[] = ['report', 'snapshot', 'model'];

/**
 * CLI options interface matching Commander.js option structure
 */
export interface CliOptions {
  definition?: string;
  model?: string;
  input?: string;
  out?: string;
  sync?: boolean;
  surplus?: string;
  trace?: boolean;
}

/**
 * Map CLI flags onto form options
 */
export function parseFormOptions(options: CliOptions): FormOptions {
  const formOptions: FormOptions = {};

  if (options.surplus !== undefined) {
    const surplus = options.surplus.toLowerCase();
    if (!isSurplusPolicy(surplus)) {
      throw new ConfigError({
        message: `Invalid --surplus value "${options.surplus}". Expected one of ${SURPLUS_POLICIES.join(', ')}.`,
        context: { setting: 'surplus', value: options.surplus },
      });
    }
    formOptions.collections = { surplus };
  }

  if (options.trace === true) {
    formOptions.trace = true;
  }

  return formOptions;
}

/**
 * Resolve the --out flag into a known output mode or throw.
 */
export function resolveOutputMode(value: unknown): OutputMode {
  if (value === undefined || value === null || value === '') {
    return 'snapshot';
  }
  const raw = String(value).toLowerCase();
  const mode = OUTPUT_MODES.find((candidate) => candidate === raw);
  if (mode === undefined) {
    throw new ConfigError({
      message: `Invalid --out value "${String(value)}". Supported modes are ${OUTPUT_MODES.map((m) => `"${m}"`).join(', ')}.`,
      context: { setting: 'out', value },
    });
  }
  return mode;
}
