import {
  ConfigError,
  ErrorCode,
  compileDeclaration,
  createForm,
  getExitCode,
  type ErrorMessages,
} from '@modelform/core';

import { readJsonFile, writeJsonFile } from './files.js';
import {
  parseFormOptions,
  resolveOutputMode,
  type CliOptions,
} from './flags.js';

export interface CheckResult {
  valid: boolean;
  exitCode: number;
  /** Flattened validation messages (empty when valid) */
  messages: ErrorMessages;
  /** Document printed on stdout */
  output: unknown;
}

function isDocument(value: unknown): value is object {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function requireFile(value: string | undefined, flag: string): string {
  if (value === undefined || value === '') {
    throw new ConfigError({
      message: `--${flag} <file> is required`,
      context: { setting: flag },
    });
  }
  return value;
}

/**
 * Load the declaration, the model document and the input; populate and
 * validate. Models are only written when validation passes.
 */
export function runCheck(options: CliOptions): CheckResult {
  const outputMode = resolveOutputMode(options.out);
  const formOptions = parseFormOptions(options);
  const definitionFile = requireFile(options.definition, 'definition');
  const modelFile = requireFile(options.model, 'model');

  const definition = compileDeclaration(
    readJsonFile(definitionFile, 'definition')
  );
  const document = readJsonFile(modelFile, 'model');
  if (!isDocument(document)) {
    throw new ConfigError({
      message: `The model file ${modelFile} must hold a JSON object${definition.composed ? ' keyed by role' : ''}`,
      context: { setting: 'model', definition: definition.name },
    });
  }

  const form = createForm(definition, document, formOptions);
  const input =
    options.input === undefined
      ? undefined
      : readJsonFile(options.input, 'input');

  const valid = form.validate(input);
  const messages = form.messages();
  if (!valid) {
    return {
      valid,
      exitCode: getExitCode(ErrorCode.VALIDATION_FAILED),
      messages,
      output: { valid, errors: messages },
    };
  }

  if (options.sync === true || outputMode === 'model') {
    form.sync();
  }
  if (options.sync === true) {
    writeJsonFile(modelFile, document);
  }

  let output: unknown;
  switch (outputMode) {
    case 'report':
      output = { valid, errors: messages };
      break;
    case 'model':
      output = document;
      break;
    case 'snapshot':
      output = form.toSnapshot();
      break;
  }
  return { valid, exitCode: 0, messages, output };
}
