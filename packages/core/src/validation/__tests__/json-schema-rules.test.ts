import { describe, it, expect } from 'vitest';

import { jsonSchemaRules } from '../json-schema-rules.js';
import { DefinitionError } from '../../types/errors.js';

describe('jsonSchemaRules', () => {
  const songSchema = {
    type: 'object',
    required: ['title'],
    properties: {
      title: { type: 'string', minLength: 1 },
      length: { type: 'integer', minimum: 1 },
    },
  };

  it('returns no messages for valid values', () => {
    expect(jsonSchemaRules(songSchema).check({ title: 'A', length: 3 })).toEqual(
      {}
    );
  });

  it('files required errors under the missing property', () => {
    expect(jsonSchemaRules(songSchema).check({ length: 3 })).toEqual({
      title: ["must have required property 'title'"],
    });
  });

  it('collects every failing keyword', () => {
    expect(
      jsonSchemaRules(songSchema).check({ title: '', length: 0 })
    ).toEqual({
      title: ['must NOT have fewer than 1 characters'],
      length: ['must be >= 1'],
    });
  });

  it('maps instance paths below the node to dotted and indexed keys', () => {
    const checker = jsonSchemaRules({
      type: 'object',
      properties: {
        tags: { type: 'array', items: { type: 'string' } },
      },
    });

    expect(checker.check({ tags: ['a', 2] })).toEqual({
      'tags[1]': ['must be string'],
    });
  });

  it('files errors about the node itself under $root', () => {
    const checker = jsonSchemaRules({ type: 'object', maxProperties: 1 });
    expect(checker.check({ a: 1, b: 2 })).toEqual({
      $root: ['must NOT have more than 1 properties'],
    });
  });

  it('replaces messages per keyword', () => {
    const checker = jsonSchemaRules(songSchema, {
      messages: { required: 'must be filled' },
    });
    expect(checker.check({})).toEqual({ title: ['must be filled'] });
  });

  it('validates formats only when asked', () => {
    const schema = {
      type: 'object',
      properties: { email: { type: 'string', format: 'email' } },
    };

    expect(jsonSchemaRules(schema).check({ email: 'nope' })).toEqual({});
    expect(
      jsonSchemaRules(schema, { validateFormats: true }).check({ email: 'nope' })
    ).toEqual({ email: ['must match format "email"'] });
  });

  it('treats undefined values as absent', () => {
    expect(jsonSchemaRules(songSchema).check({ title: 'A', length: undefined })).toEqual({});
  });

  it('rejects schemas ajv cannot compile', () => {
    expect(() => jsonSchemaRules({ type: 'nonsense' })).toThrow(DefinitionError);
  });
});
