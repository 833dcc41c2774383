import type { ErrorMessages, RuleChecker, Snapshot } from '../types/schema.js';

/**
 * Wrap a plain function as a rule checker
 *
 * @example
 * rules((values) =>
 *   values.title ? {} : { title: ['must be filled'] }
 * )
 */
export function rules(check: (values: Snapshot) => ErrorMessages): RuleChecker {
  return { check };
}

/**
 * Run several checkers and merge their messages key by key
 */
export function combineRules(...checkers: RuleChecker[]): RuleChecker {
  return {
    check(values) {
      const merged: ErrorMessages = {};
      for (const checker of checkers) {
        for (const [key, messages] of Object.entries(checker.check(values))) {
          merged[key] = [...(merged[key] ?? []), ...messages];
        }
      }
      return merged;
    },
  };
}
