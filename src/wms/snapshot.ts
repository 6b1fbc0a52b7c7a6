import { readFile } from 'node:fs/promises';

import { BatchstatError } from '../core/errors';
import { createLogger } from '../core/logger';
import { type Snapshot, snapshotSchema } from './schema';
import type { RunRecord, WmsQuery, WmsReportResult, WmsService } from './types';

const log = createLogger({ source: 'wms' });

const DAY_MS = 86_400_000;

const PASS_THRU_FIELDS = ['project', 'campaign', 'payload', 'run'] as const;

type PassThruField = (typeof PASS_THRU_FIELDS)[number];

export type PassThruFilter = Array<[PassThruField, string]>;

/**
 * A WMS backed by a JSON file of run records, as dumped by a workload
 * manager's status query.
 */
export function createSnapshotService(options: {
  path: string;
  now?: () => number;
}): WmsService {
  const now = options.now ?? Date.now;
  return {
    name: 'snapshot',
    report: async (query) => {
      const snapshot = await readSnapshot(options.path);
      const runs = filterRuns(snapshot.runs.map(toRunRecord), query, now());
      log.debug('snapshot report', { path: options.path, matched: runs.length });
      const result: WmsReportResult = { runs };
      if (snapshot.message) {
        result.message = snapshot.message;
      }
      return result;
    },
  };
}

export async function readSnapshot(path: string): Promise<Snapshot> {
  let raw: string;
  try {
    raw = await readFile(path, 'utf8');
  } catch (error) {
    throw new BatchstatError({
      code: 'wms.snapshot_not_found',
      message: `Cannot read WMS snapshot ${path}: ${error instanceof Error ? error.message : String(error)}`,
      userMessage: `WMS snapshot not found: ${path}`,
      kind: 'not_found',
      details: { path },
      nextSteps: ['Pass --snapshot <path> or set wms.snapshotPath in your config.'],
      cause: error,
    });
  }

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (error) {
    throw invalidSnapshot(path, [error instanceof Error ? error.message : String(error)], error);
  }

  const parsed = snapshotSchema.safeParse(data);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (issue) => `${issue.path.join('.') || 'snapshot'}: ${issue.message}`,
    );
    throw invalidSnapshot(path, issues);
  }
  return parsed.data;
}

export function parsePassThru(value: string | undefined): PassThruFilter {
  if (!value || value.trim() === '') return [];
  const filter: PassThruFilter = [];
  for (const part of value.split(',')) {
    const [key, ...rest] = part.split('=');
    const field = PASS_THRU_FIELDS.find((candidate) => candidate === key?.trim());
    if (!field || rest.length === 0) {
      throw new BatchstatError({
        code: 'wms.invalid_pass_thru',
        message: `Unsupported pass-through filter: ${part}`,
        kind: 'validation',
        details: { passThru: value },
        nextSteps: [`Use key=value pairs with keys ${PASS_THRU_FIELDS.join(', ')}.`],
      });
    }
    filter.push([field, rest.join('=').trim()]);
  }
  return filter;
}

export function filterRuns(runs: RunRecord[], query: WmsQuery, nowMs: number): RunRecord[] {
  const passThru = parsePassThru(query.passThru);
  const cutoff = nowMs - query.histDays * DAY_MS;
  return runs.filter((run) => {
    if (query.runId) {
      const id = query.isGlobal ? run.globalWmsId : run.wmsId;
      if (id !== query.runId) return false;
    }
    if (query.user && run.operator !== query.user) return false;
    if (run.updatedAt) {
      const updated = Date.parse(run.updatedAt);
      if (Number.isFinite(updated) && updated < cutoff) return false;
    }
    return passThru.every(([field, expected]) => run[field] === expected);
  });
}

function toRunRecord(entry: Snapshot['runs'][number]): RunRecord {
  return {
    wmsId: entry.wmsId,
    globalWmsId: entry.globalWmsId,
    state: entry.state,
    jobStateCounts: entry.jobStateCounts,
    totalNumberJobs: entry.totalNumberJobs,
    operator: entry.operator,
    project: entry.project,
    campaign: entry.campaign,
    payload: entry.payload,
    run: entry.run,
    path: entry.path,
    ...(entry.runSummary !== undefined ? { runSummary: entry.runSummary } : {}),
    ...(entry.jobSummary !== undefined ? { jobSummary: entry.jobSummary } : {}),
    ...(entry.jobs !== undefined
      ? {
          jobs: entry.jobs.map((job) => ({
            label: job.label,
            state: job.state,
            ...(job.wmsId !== undefined ? { wmsId: job.wmsId } : {}),
            ...(job.name !== undefined ? { name: job.name } : {}),
          })),
        }
      : {}),
    ...(entry.exitCodeSummary !== undefined ? { exitCodeSummary: entry.exitCodeSummary } : {}),
    ...(entry.updatedAt !== undefined ? { updatedAt: entry.updatedAt } : {}),
  };
}

function invalidSnapshot(path: string, issues: string[], cause?: unknown): BatchstatError {
  return new BatchstatError({
    code: 'wms.snapshot_invalid',
    message: `Invalid WMS snapshot ${path}: ${issues.join('; ')}`,
    userMessage: 'WMS snapshot is invalid.',
    kind: 'validation',
    details: { path, issues },
    ...(cause !== undefined ? { cause } : {}),
  });
}
