#!/usr/bin/env node

// CLI entry point
// - Command name: `modelform` with the subcommand `check`.
// - `check` loads a JSON form declaration, a model document and an optional
//   input document, populates and validates, then prints the snapshot, the
//   synced model document or the report.

import { Command } from 'commander';
import fs from 'node:fs';
import { fileURLToPath } from 'node:url';
import {
  ErrorCode,
  ErrorPresenter,
  ModelFormError,
  isModelFormError,
} from '@modelform/core';

import { runCheck, type CheckResult } from './check.js';
import type { CliOptions } from './flags.js';
import { renderCLIView, renderValidationFailure } from './render.js';

export function createProgram(): Command {
  const program = new Command();

  program
    .name('modelform')
    .description('Bind JSON documents to form declarations and validate input')
    .version('0.1.0');

  program
    .command('check')
    .description('Populate a model document from input and validate it')
    .option('-d, --definition <file>', 'JSON form declaration')
    .option('-m, --model <file>', 'JSON model document (a role record when composed)')
    .option('-i, --input <file>', 'JSON input document')
    .option('--out <mode>', 'Output: report|snapshot|model', 'snapshot')
    .option('--sync', 'Write the synced model document back to --model', false)
    .option('--surplus <policy>', 'Surplus collection entries: keep|drop|invalid')
    .option('--trace', 'Write population and sync trace lines to stderr', false)
    .action((options: CliOptions) => {
      let result: CheckResult;
      try {
        result = runCheck(options);
      } catch (err: unknown) {
        handleCliError(err);
      }

      process.stdout.write(`${JSON.stringify(result.output, null, 2)}\n`);
      if (!result.valid) {
        process.stderr.write(`${renderValidationFailure(result.messages)}\n`);
        process.exit(result.exitCode);
      }
    });

  return program;
}

class InternalError extends ModelFormError {}

export function handleCliError(err: unknown): never {
  const env = process.env.NODE_ENV === 'production' ? 'prod' : 'dev';
  const presenter = new ErrorPresenter(env, { colors: true });

  const error = isModelFormError(err)
    ? err
    : new InternalError({
        message:
          (err instanceof Error ? err.message : String(err)) ||
          'Unexpected error',
        errorCode: ErrorCode.INTERNAL_ERROR,
        cause: err,
      });

  console.error(renderCLIView(presenter.formatForCLI(error)));
  process.exit(error.getExitCode());
}

const program = createProgram();

export async function main(argv: string[] = process.argv): Promise<void> {
  await program.parseAsync(argv).catch(handleCliError);
}

export { program };

const entryFile =
  typeof process.argv[1] === 'string' ? fs.realpathSync(process.argv[1]) : '';
const moduleFile = fileURLToPath(import.meta.url);
const isDirectExecution = entryFile === moduleFile;

if (isDirectExecution) {
  await main();
}
