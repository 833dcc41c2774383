import type {
  CreationContext,
  InputMapping,
  SkipContext,
  SkipPolicy,
} from '../types/schema.js';

function isBlank(value: unknown): boolean {
  if (value === undefined || value === null) return true;
  if (typeof value === 'string') return value.trim() === '';
  if (Array.isArray(value)) return value.every(isBlank);
  if (typeof value === 'object') return Object.values(value).every(isBlank);
  return false;
}

/** True when every value in the fragment (recursively) is blank */
export function isAllBlank(fragment: InputMapping): boolean {
  return isBlank(fragment);
}

export function shouldSkip(
  policy: SkipPolicy | undefined,
  fragment: InputMapping,
  context: SkipContext
): boolean {
  if (policy === undefined) return false;
  if (policy === 'allBlank') return isAllBlank(fragment);
  return policy(fragment, context);
}

/**
 * Creation policy for plain-record models: a fresh object carrying every
 * accessor of the target definition (`null` for scalars and nested
 * properties, `[]` for collections)
 */
export function createRecord(
  _fragment: InputMapping,
  context: CreationContext
): Record<string, unknown> {
  const record: Record<string, unknown> = {};
  for (const property of context.definition.properties) {
    if (property.visibility === 'empty') continue;
    record[property.accessor] = property.kind === 'collection' ? [] : null;
  }
  return record;
}
