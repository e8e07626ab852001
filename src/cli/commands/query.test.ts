import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import path from 'path';
import { resetConfig } from '../../lib/config';
import { createFailure } from '../../lib/errors';
import { SessionErrorCode } from '../../lib/types';
import {
  AMBIGUOUS,
  CANDIDATES,
  DIRECT_SELECT,
  NOT_FOUND,
  SMALL_BODIES,
  SMALL_BODY_CANDIDATES,
  TABLE_ROWS,
} from '../../interactive/__fixtures__/horizons-transcripts';
import { EXIT_AMBIGUOUS, EXIT_FAILURE, EXIT_SUCCESS, defaultOutputPath, exitCodeFor, queryCommand } from './query';

describe('exitCodeFor', () => {
  it('maps results to exit codes', () => {
    expect(exitCodeFor({ ok: true, text: '', synthesized: false })).toBe(EXIT_SUCCESS);
    expect(
      exitCodeFor({ ok: false, error: createFailure(SessionErrorCode.AMBIGUOUS_MATCH, 'Multiple matches') })
    ).toBe(EXIT_AMBIGUOUS);
    expect(exitCodeFor({ ok: false, error: createFailure(SessionErrorCode.NOT_FOUND, 'No matches') })).toBe(
      EXIT_FAILURE
    );
    expect(exitCodeFor({ ok: false, error: createFailure(SessionErrorCode.TIMEOUT, 'Timed out') })).toBe(
      EXIT_FAILURE
    );
  });
});

describe('defaultOutputPath', () => {
  it('drops whitespace from the target', () => {
    expect(defaultOutputPath('2015 HM10;', '.txt')).toBe('2015HM10;.txt');
  });
});

describe('query command', () => {
  let home: string;
  let previousHome: string | undefined;
  let logs: string[];
  let errors: string[];
  let stdout: string[];

  function transcript(name: string, script: readonly string[]): string {
    const file = path.join(home, `${name}.json`);
    writeFileSync(file, JSON.stringify(script));
    return file;
  }

  beforeEach(() => {
    home = mkdtempSync(path.join(tmpdir(), 'horizons-echo-query-'));
    previousHome = process.env.HORIZONS_ECHO_HOME;
    process.env.HORIZONS_ECHO_HOME = home;
    resetConfig();

    logs = [];
    errors = [];
    stdout = [];
    vi.spyOn(console, 'log').mockImplementation((...args: unknown[]) => {
      logs.push(args.map(String).join(' '));
    });
    vi.spyOn(console, 'error').mockImplementation((...args: unknown[]) => {
      errors.push(args.map(String).join(' '));
    });
    vi.spyOn(process.stdout, 'write').mockImplementation((chunk: string | Uint8Array) => {
      stdout.push(String(chunk));
      return true;
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
    if (previousHome === undefined) {
      delete process.env.HORIZONS_ECHO_HOME;
    } else {
      process.env.HORIZONS_ECHO_HOME = previousHome;
    }
    resetConfig();
    rmSync(home, { recursive: true, force: true });
  });

  it('writes the table to the output file', async () => {
    const output = path.join(home, 'table.txt');

    const code = await queryCommand('2018-01-01 10:00', '2015 HM10;', output, {
      replay: transcript('direct', DIRECT_SELECT),
    });

    expect(code).toBe(EXIT_SUCCESS);
    expect(readFileSync(output, 'utf-8')).toBe(TABLE_ROWS + '\n');
    expect(logs).toHaveLength(1);
    expect(logs[0]).toContain(`Wrote ${output}`);
  });

  it('writes to stdout for "-"', async () => {
    const code = await queryCommand('2018-01-01 10:00', '2015 HM10;', '-', {
      replay: transcript('direct', DIRECT_SELECT),
    });

    expect(code).toBe(EXIT_SUCCESS);
    expect(stdout).toEqual([TABLE_ROWS + '\n']);
  });

  it('prints the candidates and exits 2 for an ambiguous target', async () => {
    const code = await queryCommand('2018-01-01 10:00', '2015 HM10;', '-', {
      replay: transcript('ambiguous', AMBIGUOUS),
    });

    expect(code).toBe(EXIT_AMBIGUOUS);
    expect(stdout).toEqual([CANDIDATES + '\n']);
    expect(errors).toHaveLength(1);
    expect(errors[0]).toContain("Error: Multiple matches for '2015 HM10;'");
  });

  it('exits 2 with the listed rows for a small-body listing', async () => {
    const code = await queryCommand('2018-01-01 10:00', '2015 HM10;', '-', {
      replay: transcript('small-bodies', SMALL_BODIES),
    });

    expect(code).toBe(EXIT_AMBIGUOUS);
    expect(stdout).toEqual([SMALL_BODY_CANDIDATES + '\n']);
  });

  it('exits 1 for an unknown target', async () => {
    const code = await queryCommand('2018-01-01 10:00', '2015 HM10;', '-', {
      replay: transcript('not-found', NOT_FOUND),
    });

    expect(code).toBe(EXIT_FAILURE);
    expect(stdout).toEqual([]);
    expect(errors[0]).toContain("Error: No matches found for '2015 HM10;'");
  });

  it('requires a start time and target', async () => {
    const code = await queryCommand('', '2015 HM10;', undefined, {});

    expect(code).toBe(EXIT_FAILURE);
    expect(errors[0]).toContain('Error: start time and target are required');
  });
});
