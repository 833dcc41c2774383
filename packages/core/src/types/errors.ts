/**
 * Error hierarchy for modelform
 * Structural failures carry a stable code and a typed context.
 * Validation failures are not exceptions: they travel in the ErrorReport.
 */

import { ErrorCode, type Severity, getExitCode } from '../errors/codes.js';

/**
 * Typed error context shared across error types
 */
export interface ErrorContext {
  path?: string; // Form path of the offending node (e.g. 'songs[2].title')
  definition?: string; // Name of the schema definition involved
  property?: string; // Property name within that definition
  accessor?: string; // Accessor name used against the model
  role?: string; // Owner role of the binding
  value?: unknown; // Problematic value (may contain PII)
  suggestion?: string;
  [key: string]: unknown;
}

export interface SerializedError {
  name: string;
  message: string;
  errorCode: ErrorCode;
  severity: Severity;
  context?: ErrorContext;
  stack?: string;
  cause?: { name: string; message: string } | undefined;
}

export interface UserError {
  message: string;
  code: ErrorCode;
  severity: Severity;
  path?: string;
}

export interface ModelFormErrorParams {
  message: string;
  errorCode: ErrorCode;
  severity?: Severity;
  context?: ErrorContext;
  cause?: unknown;
}

type SubclassParams<C extends ErrorContext = ErrorContext> = Omit<
  ModelFormErrorParams,
  'errorCode' | 'context'
> & {
  errorCode?: ErrorCode;
  context?: C;
};

export const SENSITIVE_KEYS: readonly string[] = [
  'password',
  'apiKey',
  'secret',
  'token',
  'ssn',
  'creditCard',
];

/**
 * Replace the values of sensitive keys, at any depth, with `[REDACTED]`
 */
export function redactSensitive(
  value: unknown,
  keys: ReadonlySet<string> = new Set(SENSITIVE_KEYS)
): unknown {
  if (Array.isArray(value)) return value.map((v) => redactSensitive(v, keys));
  if (value !== null && typeof value === 'object') {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) {
      out[k] = keys.has(k) ? '[REDACTED]' : redactSensitive(v, keys);
    }
    return out;
  }
  return value;
}

/**
 * Base error class for all modelform errors
 */
export abstract class ModelFormError extends Error {
  public readonly errorCode: ErrorCode;
  public readonly severity: Severity;
  public readonly context?: ErrorContext;

  constructor(params: ModelFormErrorParams) {
    const { message, errorCode, severity = 'error', context, cause } = params;
    super(message, cause === undefined ? undefined : { cause });
    this.name = new.target.name;
    this.errorCode = errorCode;
    this.severity = severity;
    this.context = context;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  /**
   * Serialize error to JSON for logging and debugging
   * - dev: includes stack and full context
   * - prod: excludes stack and redacts sensitive keys in context.value
   */
  toJSON(env: 'dev' | 'prod' = 'dev'): SerializedError {
    const base: SerializedError = {
      name: this.name,
      message: this.message,
      errorCode: this.errorCode,
      severity: this.severity,
      context:
        env === 'prod' ? this.#redactContext(this.context) : this.context,
      cause:
        this.cause instanceof Error
          ? { name: this.cause.name, message: this.cause.message }
          : undefined,
    };

    if (env !== 'prod') {
      base.stack = this.stack;
    }
    return base;
  }

  /** Return a minimal, safe structure for external exposure */
  toUserError(): UserError {
    return {
      message: this.message,
      code: this.errorCode,
      severity: this.severity,
      path: this.context?.path,
    };
  }

  /** Resolve the process exit code associated with this error */
  getExitCode(): number {
    return getExitCode(this.errorCode);
  }

  #redactContext(context?: ErrorContext): ErrorContext | undefined {
    if (!context || !('value' in context)) return context;
    return { ...context, value: redactSensitive(context.value) };
  }
}

/**
 * Malformed or conflicting schema definition (raised while building it)
 */
export class DefinitionError extends ModelFormError {
  constructor(params: SubclassParams) {
    super({
      ...params,
      errorCode: params.errorCode ?? ErrorCode.INVALID_DEFINITION,
    });
  }
}

/**
 * A model lacks the reader or writer a property needs
 */
export class MissingAccessorError extends ModelFormError {
  constructor(
    params: SubclassParams<
      ErrorContext & { accessor: string; mode: 'read' | 'write' | 'persist' }
    >
  ) {
    super({ ...params, errorCode: ErrorCode.MISSING_ACCESSOR });
  }

  get accessor(): string | undefined {
    return this.context?.accessor;
  }
}

/**
 * Input addresses a nested position with no instance and no creation policy
 */
export class MissingNestedModelError extends ModelFormError {
  constructor(params: SubclassParams<ErrorContext & { path: string }>) {
    super({ ...params, errorCode: ErrorCode.MISSING_NESTED_MODEL });
  }
}

/**
 * Input shape does not match the declared nesting kind
 */
export class PopulationError extends ModelFormError {
  constructor(params: SubclassParams<ErrorContext & { path: string }>) {
    super({ ...params, errorCode: ErrorCode.MALFORMED_INPUT });
  }
}

/**
 * A model's persist operation reported failure
 */
export class PersistenceError extends ModelFormError {
  constructor(params: SubclassParams) {
    super({ ...params, errorCode: ErrorCode.PERSISTENCE_FAILED });
  }
}

/**
 * Configuration and setup errors
 */
export class ConfigError extends ModelFormError {
  constructor(params: SubclassParams<ErrorContext & { setting?: string }>) {
    super({
      ...params,
      errorCode: params.errorCode ?? ErrorCode.CONFIGURATION_ERROR,
    });
  }

  get setting(): string | undefined {
    const setting = this.context?.setting;
    return typeof setting === 'string' ? setting : undefined;
  }
}

/**
 * Parser errors (JSON documents handed to the CLI or the declaration compiler)
 */
export class ParseError extends ModelFormError {
  constructor(params: SubclassParams<ErrorContext & { file?: string }>) {
    super({ ...params, errorCode: ErrorCode.PARSE_ERROR });
  }
}

/**
 * Utility functions for error handling
 */
export function isModelFormError(error: unknown): error is ModelFormError {
  return error instanceof ModelFormError;
}
