import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { stripAnsi } from '../utils/text';
import { run } from './cli';

const FIXTURE = fileURLToPath(new URL('../../fixtures/runs.json', import.meta.url));

let dir: string;
let printed: string[];

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), 'batchstat-cli-'));
  printed = [];
});

afterEach(async () => {
  vi.restoreAllMocks();
  await rm(dir, { recursive: true, force: true });
});

function invoke(args: string[]): Promise<number> {
  return run(['node', 'batchstat', ...args], {
    cwd: () => dir,
    print: (text) => printed.push(text),
  });
}

describe('batchstat report', () => {
  it('lists every run in the snapshot', async () => {
    const code = await invoke(['report', '--snapshot', FIXTURE]);
    expect(code).toBe(0);
    expect(printed).toHaveLength(1);
    const rows = printed[0]?.split('\n').slice(2) ?? [];
    expect(rows.map((line) => line.trim().split(/\s+/).slice(0, 4))).toEqual([
      ['F', 'RUNNING', '50', '1001.0'],
      ['SUCCEEDED', '100', '1002.0', 'bob'],
    ]);
  });

  it('filters by user and sorts by the requested column', async () => {
    const code = await invoke(['report', '--snapshot', FIXTURE, '--user', 'bob', '--sort', 'RUN']);
    expect(code).toBe(0);
    expect(printed[0]?.split('\n')).toHaveLength(3);
  });

  it('reports one run in detail with exit codes', async () => {
    const code = await invoke(['report', '1001.0', '--snapshot', FIXTURE, '--exit-codes']);
    expect(code).toBe(0);
    expect(printed[2]).toBe('Path: /data/submit/u/alice/calib/20240401T000000Z');
    expect(printed[3]).toBe('Global job id: sched01#1001.0#1700000000');
    expect(printed[5]?.split('\n').map((line) => line.split(/\s+/)[0])).toEqual([
      '',
      '---------',
      'TOTAL',
      '---------',
      'init',
      'calibrate',
      'merge',
    ]);
    expect(printed[7]?.split('\n').slice(2)).toEqual([
      'init                     0                 0              None',
      'calibrate                1                 1               137',
      'merge                    0                 0              None',
    ]);
  });

  it('prints JSON when asked', async () => {
    const code = await invoke(['report', '--snapshot', FIXTURE, '--json']);
    expect(code).toBe(0);
    const parsed: unknown = JSON.parse(printed[0] ?? '');
    expect(parsed).toMatchObject({ summary: { kind: 'summary' }, message: null });
  });

  it('hints at a wider search when a run is missing', async () => {
    const code = await invoke(['report', '999.0', '--snapshot', FIXTURE, '--hist', '5']);
    expect(code).toBe(0);
    expect(printed).toEqual([
      "No records found for job id '999.0'. Hints: Double check id, retry with a larger --hist value (currently: 5), and/or use --global to search all job queues.",
    ]);
  });

  it('fails with a validation exit code for an unknown sort column', async () => {
    const errors: string[] = [];
    vi.spyOn(console, 'error').mockImplementation((message: unknown) => {
      errors.push(stripAnsi(String(message)));
    });
    const code = await invoke(['report', '--snapshot', FIXTURE, '--sort', 'WHEN']);
    expect(code).toBe(2);
    expect(errors[0]?.split('\n')[0]).toBe(
      'Error: cannot sort the report entries: column(s) WHEN not found',
    );
    expect(printed).toEqual([]);
  });

  it('rejects a non-numeric history window', async () => {
    const errors: string[] = [];
    vi.spyOn(console, 'error').mockImplementation((message: unknown) => {
      errors.push(stripAnsi(String(message)));
    });
    const code = await invoke(['report', '--snapshot', FIXTURE, '--hist', 'soon']);
    expect(code).toBe(2);
    expect(errors[0]?.split('\n')[1]).toBe('Code       cli.invalid_hist');
  });

  it('needs a snapshot for the snapshot service', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    expect(await invoke(['report'])).toBe(2);
  });
});
