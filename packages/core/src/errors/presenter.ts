/**
 * ErrorPresenter - presentation layer for ModelFormError instances
 * - No business logic; formats into environment-specific view objects
 */

import type { ErrorCode } from './codes.js';
import {
  SENSITIVE_KEYS,
  redactSensitive,
  type ErrorContext,
  type ModelFormError,
  type SerializedError,
} from '../types/errors.js';
import { displayPath } from '../util/path.js';

export interface PresenterOptions {
  colors?: boolean;
  redactKeys?: string[];
}

export interface CLIErrorView {
  title: string;
  code: ErrorCode;
  location?: string;
  path?: string;
  definition?: string;
  workaround?: string;
  cause?: string;
  colors: boolean;
}

export class ErrorPresenter {
  constructor(
    private readonly env: 'dev' | 'prod',
    private readonly options: PresenterOptions = {}
  ) {}

  formatForCLI(error: ModelFormError): CLIErrorView {
    return {
      title: `Error ${error.errorCode}: ${error.message}`,
      code: error.errorCode,
      location: this.#formatLocation(error.context),
      path: error.context?.path,
      definition: error.context?.definition,
      workaround: error.context?.suggestion,
      cause: error.cause instanceof Error ? error.cause.message : undefined,
      colors: this.#shouldUseColors(this.options.colors),
    };
  }

  formatForProduction(error: ModelFormError): SerializedError {
    return this.#applyAdditionalRedaction(error.toJSON('prod'));
  }

  #formatLocation(ctx?: ErrorContext): string | undefined {
    if (ctx?.path === undefined) return undefined;
    const where = displayPath(ctx.path);
    return ctx.definition
      ? `Location: ${where} (${ctx.definition})`
      : `Location: ${where}`;
  }

  #shouldUseColors(opt?: boolean): boolean {
    const noColor = process.env.NO_COLOR;
    const force = process.env.FORCE_COLOR;
    if (noColor && noColor !== '0' && noColor !== 'false') return false;
    if (force && force !== '0' && force !== 'false') return true;
    if (opt === undefined) return this.env === 'dev';
    return opt;
  }

  #applyAdditionalRedaction(view: SerializedError): SerializedError {
    if (!view.context || !('value' in view.context)) return view;
    const keys = new Set(this.options.redactKeys ?? SENSITIVE_KEYS);
    return {
      ...view,
      context: {
        ...view.context,
        value: redactSensitive(view.context.value, keys),
      },
    };
  }
}
