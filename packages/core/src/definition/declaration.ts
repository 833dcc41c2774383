/**
 * JSON form declarations
 *
 * A declaration is the JSON counterpart of the builder DSL, for tools (the
 * CLI among them) that load definitions from files:
 *
 * {
 *   "name": "Album",
 *   "properties": [
 *     { "name": "title" },
 *     { "name": "songs", "kind": "collection", "create": "record",
 *       "schema": { "properties": [{ "name": "title" }] } }
 *   ]
 * }
 *
 * Only data is expressible: creation is limited to plain records and
 * skipping to `allBlank`. Rules are JSON Schemas checked with ajv.
 */

import { createRequire } from 'node:module';
import {
  Ajv,
  type ErrorObject,
  type SchemaObject,
  type ValidateFunction,
} from 'ajv';

import { DefinitionError } from '../types/errors.js';
import type { SurplusPolicy } from '../types/options.js';
import type { Visibility } from '../types/schema.js';
import { createRecord } from '../populate/policies.js';
import { jsonSchemaRules } from '../validation/json-schema-rules.js';
import {
  defineSchema,
  type NestedOptions,
  type ScalarOptions,
  type SchemaBuilder,
} from './builder.js';
import type { SchemaDefinition } from './definition.js';

const requireJson = createRequire(import.meta.url);

export interface PropertyDeclarationJson {
  name: string;
  as?: string;
  on?: string;
  kind?: 'scalar' | 'nested' | 'collection';
  visibility?: Visibility;
  default?: unknown;
  persist?: boolean;
  create?: 'record';
  skipIf?: 'allBlank';
  surplus?: SurplusPolicy;
  schema?: FormDeclaration;
}

export interface FormDeclaration {
  name?: string;
  roles?: string[];
  rules?: SchemaObject | boolean;
  validateFormats?: boolean;
  properties: PropertyDeclarationJson[];
}

let validateDeclaration: ValidateFunction<FormDeclaration> | undefined;

function getValidator(): ValidateFunction<FormDeclaration> {
  if (!validateDeclaration) {
    const schema: SchemaObject = requireJson('./declaration.schema.json');
    const ajv = new Ajv({ allErrors: true, strict: false });
    validateDeclaration = ajv.compile<FormDeclaration>(schema);
  }
  return validateDeclaration;
}

function describeError(error: ErrorObject): string {
  const where = error.instancePath === '' ? '/' : error.instancePath;
  return `${where} ${error.message ?? error.keyword}`;
}

/**
 * Compile a JSON form declaration into a SchemaDefinition
 *
 * @throws {DefinitionError} the declaration does not match the declaration
 * schema, or describes a definition the builder rejects
 */
export function compileDeclaration(json: unknown): SchemaDefinition {
  const validate = getValidator();
  if (!validate(json)) {
    const problems = (validate.errors ?? []).map(describeError);
    throw new DefinitionError({
      message: `Invalid form declaration:\n  ${problems.join('\n  ')}`,
      context: { problems },
    });
  }
  return compileNode(json, json.name ?? 'Form');
}

function compileNode(
  declaration: FormDeclaration,
  name: string
): SchemaDefinition {
  const builder = defineSchema(name);
  if (declaration.roles) {
    builder.composedOf(...declaration.roles);
  }
  if (declaration.rules !== undefined) {
    builder.rules(
      jsonSchemaRules(declaration.rules, {
        validateFormats: declaration.validateFormats,
      })
    );
  }
  for (const property of declaration.properties) {
    declare(builder, property, name);
  }
  return builder.build();
}

function declare(
  builder: SchemaBuilder,
  property: PropertyDeclarationJson,
  parent: string
): void {
  const kind = property.kind ?? 'scalar';

  if (kind === 'scalar' || property.schema === undefined) {
    const options: ScalarOptions = {
      as: property.as,
      on: property.on,
      visibility: property.visibility,
    };
    if (Object.hasOwn(property, 'default')) {
      options.default = property.default;
    }
    builder.property(property.name, options);
    return;
  }

  const options: NestedOptions = {
    as: property.as,
    on: property.on,
    visibility: property.visibility,
    schema: compileNode(
      property.schema,
      property.schema.name ?? `${parent}.${property.name}`
    ),
  };
  if (property.persist !== undefined) options.persist = property.persist;
  if (property.create === 'record') options.createWith = createRecord;
  if (property.skipIf !== undefined) options.skipIf = property.skipIf;
  if (property.surplus !== undefined) options.surplus = property.surplus;

  if (kind === 'nested') {
    builder.nested(property.name, options);
  } else {
    builder.collection(property.name, options);
  }
}
