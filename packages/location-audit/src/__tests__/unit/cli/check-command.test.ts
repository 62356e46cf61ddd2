/**
 * Check Command Tests
 *
 * Drives the commander program in process against local fixture files.
 */

import { Command } from 'commander';
import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { registerLocationAuditCommands } from '../../../cli/commands/index.js';
import { createTempDir, csvLines, removeTempDir, writeTextFile } from '../../utils/fixtures.js';

let dir: string;
let output: string[];
let exitCode: typeof process.exitCode;

function createProgram(): Command {
  const program = new Command().name('location-audit').exitOverride();
  registerLocationAuditCommands(program);
  return program;
}

async function runCli(args: readonly string[]): Promise<void> {
  await createProgram().parseAsync(['node', 'location-audit', ...args]);
}

beforeEach(async () => {
  dir = await createTempDir();
  output = [];
  exitCode = process.exitCode;
  vi.stubEnv('LOCATION_AUDIT_CONFIG', '');
  vi.stubEnv('LOCATION_AUDIT_JSON', '');
  vi.spyOn(console, 'log').mockImplementation((line: unknown) => {
    output.push(String(line));
  });
  vi.spyOn(console, 'info').mockImplementation(() => undefined);
});

afterEach(async () => {
  process.exitCode = exitCode;
  vi.restoreAllMocks();
  vi.unstubAllEnvs();
  await removeTempDir(dir);
});

describe('location-audit check', () => {
  it('prints the result as JSON', async () => {
    const file = await writeTextFile(
      dir,
      'admin1.csv',
      csvLines('admin1Pcode,admin1Name', 10, (i) => `KE0${i},Area ${i}`)
    );

    await runCli(['check', file, '--type', 'csv', '--json']);

    expect(JSON.parse(output.join('\n'))).toEqual({
      file,
      type: 'csv',
      pcoded: true,
      latlonged: null,
      error: null,
    });
    expect(process.exitCode).toBe(0);
  });

  it('prints a readable summary and flags unchecked formats', async () => {
    const file = await writeTextFile(dir, 'notes.txt', 'text');

    await runCli(['check', file, '--type', 'txt']);

    expect(output).toEqual([
      `\n${file}`,
      '  P-coded:  unknown',
      '  Lat/long: unknown',
      "  Error:    Can't check formats",
    ]);
    expect(process.exitCode).toBe(1);
  });

  it('requires a file type', async () => {
    vi.spyOn(process.stderr, 'write').mockImplementation(() => true);

    await expect(runCli(['check', 'admin1.csv'])).rejects.toThrow(
      "error: required option '-t, --type <fileType>' not specified"
    );
  });
});
