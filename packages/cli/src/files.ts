import fs from 'node:fs';

import { ParseError } from '@modelform/core';

/**
 * Read and parse a JSON document named on the command line
 *
 * @throws {ParseError} the file cannot be read or is not valid JSON
 */
export function readJsonFile(file: string, label: string): unknown {
  let text: string;
  try {
    text = fs.readFileSync(file, 'utf8');
  } catch (error) {
    throw new ParseError({
      message: `Cannot read ${label} file ${file}: ${error instanceof Error ? error.message : String(error)}`,
      context: { file, suggestion: `Check the --${label} path` },
      cause: error,
    });
  }

  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch (error) {
    throw new ParseError({
      message: `${label} file ${file} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
      context: { file },
      cause: error,
    });
  }
}

export function writeJsonFile(file: string, value: unknown): void {
  fs.writeFileSync(file, `${JSON.stringify(value, null, 2)}\n`, 'utf8');
}
