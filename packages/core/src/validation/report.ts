import type { ErrorMessages } from '../types/schema.js';
import { indexPath, joinPath } from '../util/path.js';

/** Key used by rule checkers for errors about the node as a whole */
export const ROOT_KEY = '$root';

/**
 * Nested validation result. `errors` holds the node's own messages;
 * `children` holds reports for nested properties (a single report) and
 * collections (index-aligned, `undefined` where an entry is clean). Clean
 * children are left out.
 */
export interface ErrorReport {
  readonly errors: ErrorMessages;
  readonly children: Readonly<
    Record<string, ErrorReport | ReadonlyArray<ErrorReport | undefined>>
  >;
}

export function emptyReport(): ErrorReport {
  return { errors: {}, children: {} };
}

export function isReportEmpty(report: ErrorReport): boolean {
  return (
    Object.keys(report.errors).length === 0 &&
    Object.keys(report.children).length === 0
  );
}

export function addMessages(
  target: ErrorMessages,
  key: string,
  messages: readonly string[]
): void {
  if (messages.length === 0) return;
  const existing = target[key];
  target[key] = existing ? [...existing, ...messages] : [...messages];
}

/**
 * Flatten a report into messages keyed by form path:
 * `{ title: [...], 'songs[0].title': [...] }`
 */
export function flattenReport(
  report: ErrorReport,
  prefix = ''
): ErrorMessages {
  const out: ErrorMessages = {};
  collect(report, prefix, out);
  return out;
}

function collect(report: ErrorReport, prefix: string, out: ErrorMessages): void {
  for (const [key, messages] of Object.entries(report.errors)) {
    const path =
      key === ROOT_KEY ? (prefix === '' ? ROOT_KEY : prefix) : joinPath(prefix, key);
    addMessages(out, path, messages);
  }
  for (const [name, child] of Object.entries(report.children)) {
    const base = joinPath(prefix, name);
    if (isReportList(child)) {
      child.forEach((entry, index) => {
        if (entry) collect(entry, indexPath(base, index), out);
      });
    } else {
      collect(child, base, out);
    }
  }
}

function isReportList(
  value: ErrorReport | ReadonlyArray<ErrorReport | undefined>
): value is ReadonlyArray<ErrorReport | undefined> {
  return Array.isArray(value);
}
