import type { FormNode } from '../form/form-node.js';
import type { ErrorMessages } from '../types/schema.js';
import { toSnapshot } from '../sync/snapshot.js';
import { addMessages, isReportEmpty, type ErrorReport } from './report.js';

/**
 * Depth-first validation of a populated tree. Each node's rule checker sees
 * the node's snapshot; the tree itself is only read.
 */
export function runValidation(form: FormNode): ErrorReport {
  const errors: ErrorMessages = {};
  const children: Record<
    string,
    ErrorReport | ReadonlyArray<ErrorReport | undefined>
  > = {};

  const rules = form.definition.rules;
  if (rules) {
    for (const [key, messages] of Object.entries(
      rules.check(toSnapshot(form))
    )) {
      addMessages(errors, key, messages);
    }
  }

  for (const property of form.definition.properties) {
    if (property.kind === 'nested') {
      const child = form.child(property.name);
      if (!child) continue;
      const report = runValidation(child);
      if (!isReportEmpty(report)) children[property.name] = report;
      continue;
    }

    if (property.kind === 'collection') {
      const reports = form.children(property.name).map(runValidation);
      if (reports.some((report) => !isReportEmpty(report))) {
        children[property.name] = reports.map((report) =>
          isReportEmpty(report) ? undefined : report
        );
      }
      const surplus = form.surplusCount(property.name);
      if (surplus > 0) {
        addMessages(errors, property.name, [
          `has ${surplus} ${surplus === 1 ? 'entry' : 'entries'} missing from the input`,
        ]);
      }
    }
  }

  return { errors, children };
}
