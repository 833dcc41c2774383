import { mkdtemp, rm, writeFile, readFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { describe, it, expect, vi, afterEach } from 'vitest';

import { ErrorCode, getExitCode } from '@modelform/core';
import { runCheck } from './check.js';
import { createProgram } from './index.js';

interface Fixture {
  dir: string;
  definitionPath: string;
  modelPath: string;
  inputPath: string;
}

const albumDeclaration = {
  name: 'Album',
  rules: {
    type: 'object',
    properties: { title: { type: 'string', minLength: 1 } },
  },
  properties: [
    { name: 'title' },
    {
      name: 'songs',
      kind: 'collection',
      create: 'record',
      schema: { name: 'Song', properties: [{ name: 'title' }] },
    },
  ],
};

const dirs: string[] = [];

async function createFixture(input: unknown): Promise<Fixture> {
  const dir = await mkdtemp(path.join(os.tmpdir(), 'modelform-cli-'));
  dirs.push(dir);
  const definitionPath = path.join(dir, 'album.form.json');
  const modelPath = path.join(dir, 'album.json');
  const inputPath = path.join(dir, 'input.json');
  await writeFile(definitionPath, JSON.stringify(albumDeclaration), 'utf8');
  await writeFile(
    modelPath,
    JSON.stringify({ title: 'Draft', songs: [] }),
    'utf8'
  );
  await writeFile(inputPath, JSON.stringify(input), 'utf8');
  return { dir, definitionPath, modelPath, inputPath };
}

async function readModel(file: string): Promise<unknown> {
  const parsed: unknown = JSON.parse(await readFile(file, 'utf8'));
  return parsed;
}

afterEach(async () => {
  vi.restoreAllMocks();
  for (const dir of dirs.splice(0)) {
    await rm(dir, { recursive: true, force: true });
  }
});

describe('runCheck', () => {
  it('prints the snapshot and leaves the model file alone', async () => {
    const fixture = await createFixture({
      title: 'Rio',
      songs: [{ title: 'A' }],
    });

    const result = runCheck({
      definition: fixture.definitionPath,
      model: fixture.modelPath,
      input: fixture.inputPath,
    });

    expect(result.valid).toBe(true);
    expect(result.exitCode).toBe(0);
    expect(result.output).toEqual({ title: 'Rio', songs: [{ title: 'A' }] });
    expect(await readModel(fixture.modelPath)).toEqual({
      title: 'Draft',
      songs: [],
    });
  });

  it('writes the synced document back with --sync', async () => {
    const fixture = await createFixture({
      title: 'Rio',
      songs: [{ title: 'A' }],
    });

    const result = runCheck({
      definition: fixture.definitionPath,
      model: fixture.modelPath,
      input: fixture.inputPath,
      out: 'model',
      sync: true,
    });

    expect(result.output).toEqual({ title: 'Rio', songs: [{ title: 'A' }] });
    expect(await readModel(fixture.modelPath)).toEqual({
      title: 'Rio',
      songs: [{ title: 'A' }],
    });
  });

  it('reports validation failures without writing', async () => {
    const fixture = await createFixture({ title: '' });

    const result = runCheck({
      definition: fixture.definitionPath,
      model: fixture.modelPath,
      input: fixture.inputPath,
      sync: true,
    });

    expect(result.valid).toBe(false);
    expect(result.exitCode).toBe(getExitCode(ErrorCode.VALIDATION_FAILED));
    expect(result.output).toEqual({
      valid: false,
      errors: { title: ['must NOT have fewer than 1 characters'] },
    });
    expect(await readModel(fixture.modelPath)).toEqual({
      title: 'Draft',
      songs: [],
    });
  });

  it('requires --definition and --model', () => {
    expect(() => runCheck({ model: 'album.json' })).toThrow(
      '--definition <file> is required'
    );
  });
});

describe('modelform check', () => {
  function captureStreams(): { stdout: string[]; stderr: string[] } {
    const stdout: string[] = [];
    const stderr: string[] = [];
    vi.spyOn(process.stdout, 'write').mockImplementation(
      (chunk: string | Uint8Array) => {
        stdout.push(String(chunk));
        return true;
      }
    );
    vi.spyOn(process.stderr, 'write').mockImplementation(
      (chunk: string | Uint8Array) => {
        stderr.push(String(chunk));
        return true;
      }
    );
    return { stdout, stderr };
  }

  function mockExit(): void {
    vi.spyOn(process, 'exit').mockImplementation(
      (code?: string | number | null) => {
        throw new Error(`EXIT:${String(code ?? 0)}`);
      }
    );
  }

  it('prints the report as JSON', async () => {
    const fixture = await createFixture({ title: 'Rio' });
    const streams = captureStreams();

    await createProgram().parseAsync(
      [
        'check',
        '-d',
        fixture.definitionPath,
        '-m',
        fixture.modelPath,
        '-i',
        fixture.inputPath,
        '--out',
        'report',
      ],
      { from: 'user' }
    );

    expect(JSON.parse(streams.stdout.join(''))).toEqual({
      valid: true,
      errors: {},
    });
  });

  it('exits with the validation exit code on invalid input', async () => {
    const fixture = await createFixture({ title: '' });
    const streams = captureStreams();
    mockExit();

    await expect(
      createProgram().parseAsync(
        [
          'check',
          '--definition',
          fixture.definitionPath,
          '--model',
          fixture.modelPath,
          '--input',
          fixture.inputPath,
        ],
        { from: 'user' }
      )
    ).rejects.toThrow('EXIT:40');

    expect(streams.stderr.join('')).toBe(
      '[modelform] validation failed:\n  title: must NOT have fewer than 1 characters\n'
    );
  });

  it('presents structural errors and exits with their code', async () => {
    const fixture = await createFixture({ title: 'Rio' });
    const logged: string[] = [];
    vi.spyOn(console, 'error').mockImplementation((...args: unknown[]) => {
      logged.push(args.map(String).join(' '));
    });
    mockExit();

    await expect(
      createProgram().parseAsync(
        ['check', '-d', fixture.definitionPath, '-m', fixture.modelPath, '--surplus', 'purge'],
        { from: 'user' }
      )
    ).rejects.toThrow('EXIT:50');

    expect(logged.join('\n')).toContain(
      'Error E300: Invalid --surplus value "purge".'
    );
  });
});
