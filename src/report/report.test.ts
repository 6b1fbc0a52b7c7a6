import { describe, expect, it } from 'vitest';

import type { RunRecord, WmsQuery, WmsReportResult, WmsService } from '../wms/types';
import { MIN_SINGLE_RUN_HIST_DAYS, type ReportOptions, runReport } from './report';

function makeRun(overrides: Partial<RunRecord> = {}): RunRecord {
  return {
    wmsId: '1001.0',
    globalWmsId: 'sched01#1001.0#1700000000',
    state: 'SUCCEEDED',
    jobStateCounts: { SUCCEEDED: 2 },
    totalNumberJobs: 2,
    runSummary: 'init:1;process:1',
    jobSummary: { init: { SUCCEEDED: 1 }, process: { SUCCEEDED: 1 } },
    exitCodeSummary: { process: [0] },
    operator: 'bob',
    project: 'survey',
    campaign: 'spring',
    payload: 'calib',
    run: 'u/bob/run1',
    path: '/submit/u/bob/run1',
    ...overrides,
  };
}

function fakeService(result: WmsReportResult): { service: WmsService; queries: WmsQuery[] } {
  const queries: WmsQuery[] = [];
  return {
    queries,
    service: {
      name: 'fake',
      report: async (query) => {
        queries.push(query);
        return result;
      },
    },
  };
}

function options(overrides: Partial<ReportOptions> = {}): ReportOptions {
  return {
    histDays: 1,
    isGlobal: false,
    exitCodes: false,
    sortBy: 'ID',
    json: false,
    ...overrides,
  };
}

describe('runReport', () => {
  it('widens the history window when asked about one run', async () => {
    const { service, queries } = fakeService({ runs: [makeRun()] });
    const outcome = await runReport(options({ runId: '1001.0', histDays: 1 }), {
      service,
      print: () => {},
    });
    expect(outcome.histDays).toBe(MIN_SINGLE_RUN_HIST_DAYS);
    expect(queries[0]).toEqual({ histDays: 2, isGlobal: false, runId: '1001.0' });
  });

  it('keeps a longer window and forwards filters', async () => {
    const { service, queries } = fakeService({ runs: [] });
    await runReport(options({ histDays: 5, user: 'bob', passThru: 'project=survey' }), {
      service,
      print: () => {},
    });
    expect(queries[0]).toEqual({
      histDays: 5,
      isGlobal: false,
      user: 'bob',
      passThru: 'project=survey',
    });
  });

  it('prints summary, location and detailed report for a run', async () => {
    const printed: string[] = [];
    const { service } = fakeService({ runs: [makeRun()] });
    await runReport(options({ runId: '1001.0' }), { service, print: (text) => printed.push(text) });

    expect(printed).toHaveLength(6);
    expect(printed[0]?.split('\n')[2]).toBe(
      '  SUCCEEDED 100 1001.0      bob  survey   spring   calib u/bob/run1',
    );
    expect(printed.slice(1, 5)).toEqual([
      '\n',
      'Path: /submit/u/bob/run1',
      'Global job id: sched01#1001.0#1700000000',
      '\n',
    ]);
    expect(printed[5]?.split('\n')[2]?.startsWith('TOTAL')).toBe(true);
  });

  it('appends the exit code report when requested', async () => {
    const printed: string[] = [];
    const { service } = fakeService({ runs: [makeRun()] });
    await runReport(options({ runId: '1001.0', exitCodes: true }), {
      service,
      print: (text) => printed.push(text),
    });
    expect(printed[6]).toBe('\n');
    expect(printed[7]?.split('\n')).toEqual([
      'label   pipe_error_count infra_error_count infra_error_codes',
      '------- ---------------- ----------------- -----------------',
      'init                   0                 0              None',
      'process                0                 0              None',
    ]);
  });

  it('prints the data warning before the run summary', async () => {
    const printed: string[] = [];
    const { jobSummary: _summary, ...run } = makeRun();
    const { service } = fakeService({ runs: [run] });
    await runReport(options({ runId: '1001.0' }), { service, print: (text) => printed.push(text) });
    expect(printed[0]).toBe(
      "WARNING: Job summary for run '1001.0' not available, report maybe incomplete.",
    );
  });

  it('prints a hint when nothing matched', async () => {
    const printed: string[] = [];
    const { service } = fakeService({ runs: [] });
    const outcome = await runReport(options({ runId: '77.0', histDays: 3 }), {
      service,
      print: (text) => printed.push(text),
    });
    expect(outcome).toEqual({ histDays: 3, runCount: 0 });
    expect(printed).toEqual([
      "No records found for job id '77.0'. Hints: Double check id, retry with a larger --hist value (currently: 3), and/or use --global to search all job queues.",
    ]);
  });

  it('prints the service message instead of the hint', async () => {
    const printed: string[] = [];
    const { service } = fakeService({ runs: [], message: 'scheduler unavailable' });
    const outcome = await runReport(options({ runId: '77.0' }), {
      service,
      print: (text) => printed.push(text),
    });
    expect(outcome.message).toBe('scheduler unavailable');
    expect(printed).toEqual(['scheduler unavailable', '\n']);
  });

  it('sorts the run list by the chosen column', async () => {
    const printed: string[] = [];
    const { service } = fakeService({
      runs: [makeRun({ wmsId: '9.0', operator: 'bob' }), makeRun({ wmsId: '3.0', operator: 'al' })],
    });
    const outcome = await runReport(options({ sortBy: 'OPERATOR' }), {
      service,
      print: (text) => printed.push(text),
    });
    expect(outcome.runCount).toBe(2);
    expect(printed).toHaveLength(1);
    const ids = printed[0]
      ?.split('\n')
      .slice(2)
      .map((line) => line.trim().split(/\s+/)[2]);
    expect(ids).toEqual(['3.0', '9.0']);
  });

  it('emits JSON for the run list', async () => {
    const printed: string[] = [];
    const { service } = fakeService({ runs: [makeRun()] });
    await runReport(options({ json: true }), { service, print: (text) => printed.push(text) });
    expect(printed).toHaveLength(1);
    expect(JSON.parse(printed[0] ?? '')).toEqual({
      summary: {
        kind: 'summary',
        columns: ['X', 'STATE', '%S', 'ID', 'OPERATOR', 'PROJECT', 'CAMPAIGN', 'PAYLOAD', 'RUN'],
        rows: [[' ', 'SUCCEEDED', '100', '1001.0', 'bob', 'survey', 'spring', 'calib', 'u/bob/run1']],
        message: null,
      },
      message: null,
    });
  });

  it('carries the hint and window in JSON when nothing matched', async () => {
    const printed: string[] = [];
    const { service } = fakeService({ runs: [] });
    await runReport(options({ runId: '77.0', json: true }), {
      service,
      print: (text) => printed.push(text),
    });
    expect(printed).toHaveLength(1);
    expect(JSON.parse(printed[0] ?? '')).toEqual({
      runs: [],
      histDays: 2,
      message: null,
      hint: "No records found for job id '77.0'. Hints: Double check id, retry with a larger --hist value (currently: 2), and/or use --global to search all job queues.",
    });
  });

  it('emits JSON per matched run', async () => {
    const printed: string[] = [];
    const { service } = fakeService({ runs: [makeRun()] });
    await runReport(options({ runId: '1001.0', json: true, isGlobal: true }), {
      service,
      print: (text) => printed.push(text),
    });
    const parsed: unknown = JSON.parse(printed[0] ?? '');
    expect(parsed).toMatchObject({
      runs: [
        {
          id: 'sched01#1001.0#1700000000',
          path: '/submit/u/bob/run1',
          detailed: { kind: 'detailed', message: null },
        },
      ],
      histDays: 2,
      message: null,
      hint: null,
    });
  });
});
