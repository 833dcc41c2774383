import type { CLIErrorView, ErrorMessages } from '@modelform/core';

const PREFIX = '[modelform]';
const RED = '\u001B[31m';
const RESET = '\u001B[0m';

/**
 * Structural error block for stderr:
 *
 *   [modelform] Error E030: No Song model at songs[2] ...
 *     Location: songs[2] (Song)
 *     caused by: ...
 *     hint: Give "songs" a create or createWith policy ...
 */
export function renderCLIView(view: CLIErrorView): string {
  const headline = `${PREFIX} ${view.title}`;
  const lines = [view.colors ? `${RED}${headline}${RESET}` : headline];
  if (view.location) lines.push(`  ${view.location}`);
  if (view.cause) lines.push(`  caused by: ${view.cause}`);
  if (view.workaround) lines.push(`  hint: ${view.workaround}`);
  return lines.join('\n');
}

/**
 * Validation failure block, one line per message keyed by form path
 */
export function renderValidationFailure(messages: ErrorMessages): string {
  const lines = Object.entries(messages).flatMap(([key, list]) =>
    list.map((message) => `  ${key}: ${message}`)
  );
  return [`${PREFIX} validation failed:`, ...lines].join('\n');
}
