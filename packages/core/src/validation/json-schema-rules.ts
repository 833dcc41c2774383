import {
  Ajv,
  type AnySchema,
  type ErrorObject,
  type Options as AjvOptions,
  type ValidateFunction,
} from 'ajv';
import addFormatsPlugin from 'ajv-formats';

import { DefinitionError } from '../types/errors.js';
import type { ErrorMessages, RuleChecker } from '../types/schema.js';
import { joinPath, pointerToPath } from '../util/path.js';
import { addMessages, ROOT_KEY } from './report.js';

// ajv-formats is CommonJS; under NodeNext the plugin sits on `.default`
const addFormats = addFormatsPlugin.default;

export interface JsonSchemaRuleOptions {
  /** Enable ajv-formats (`email`, `date`, `uri`, ...). Default: false */
  validateFormats?: boolean;
  /**
   * Replace ajv's message for a keyword, e.g. `{ required: 'must be filled' }`
   */
  messages?: Partial<Record<string, string>>;
}

interface CompiledRules {
  readonly plain: ValidateFunction | undefined;
  readonly withFormats: ValidateFunction | undefined;
}

const compiled = new WeakMap<object, CompiledRules>();

let plainAjv: Ajv | undefined;
let formatsAjv: Ajv | undefined;

function createAjv(validateFormats: boolean): Ajv {
  const flags: AjvOptions = {
    allErrors: true,
    strict: false,
    validateFormats,
  };
  const ajv = new Ajv(flags);
  if (validateFormats) {
    addFormats(ajv);
  }
  return ajv;
}

function getAjv(validateFormats: boolean): Ajv {
  if (validateFormats) {
    formatsAjv ??= createAjv(true);
    return formatsAjv;
  }
  plainAjv ??= createAjv(false);
  return plainAjv;
}

function compile(schema: object, validateFormats: boolean): ValidateFunction {
  const cached = compiled.get(schema);
  const hit = validateFormats ? cached?.withFormats : cached?.plain;
  if (hit) return hit;

  let validate: ValidateFunction;
  try {
    validate = getAjv(validateFormats).compile(schema);
  } catch (error) {
    throw new DefinitionError({
      message: `Invalid JSON Schema for rules: ${error instanceof Error ? error.message : String(error)}`,
      cause: error,
    });
  }

  compiled.set(
    schema,
    validateFormats
      ? { plain: cached?.plain, withFormats: validate }
      : { plain: validate, withFormats: cached?.withFormats }
  );
  return validate;
}

/**
 * Form key an ajv error belongs to. `required` errors are reported on the
 * missing property, not on the object that lacks it.
 */
export function errorKey(error: ErrorObject): string {
  const base = pointerToPath(error.instancePath);
  if (error.keyword === 'required') {
    const missing: unknown = Reflect.get(error.params, 'missingProperty');
    if (typeof missing === 'string') {
      return joinPath(base, missing);
    }
  }
  return base === '' ? ROOT_KEY : base;
}

/**
 * Rule checker backed by a JSON Schema. The node snapshot is validated as a
 * whole and each ajv error is filed under the property it concerns.
 *
 * @example
 * const songRules = jsonSchemaRules({
 *   type: 'object',
 *   required: ['title'],
 *   properties: { title: { type: 'string', minLength: 1 } },
 * });
 */
export function jsonSchemaRules(
  schema: AnySchema,
  options: JsonSchemaRuleOptions = {}
): RuleChecker {
  const validateFormats = options.validateFormats ?? false;
  const validate =
    typeof schema === 'boolean'
      ? getAjv(validateFormats).compile(schema)
      : compile(schema, validateFormats);

  return {
    check(values) {
      if (validate(values)) return {};
      const messages: ErrorMessages = {};
      for (const error of validate.errors ?? []) {
        const message =
          options.messages?.[error.keyword] ??
          error.message ??
          `failed ${error.keyword}`;
        addMessages(messages, errorKey(error), [message]);
      }
      return messages;
    },
  };
}
