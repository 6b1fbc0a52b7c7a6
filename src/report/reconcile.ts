import { createLogger } from '../core/logger';
import {
  emptyStateCounts,
  type JobState,
  type StateCounts,
  sumStateCounts,
  toStateCounts,
} from '../wms/states';
import type { RunRecord } from '../wms/types';
import { compileJobSummary } from './grouping';
import { type ExpectedCounts, sumExpected } from './run-summary';

const log = createLogger({ source: 'report' });

/** Cell value for counts the backend has no data for. */
export const MISSING_COUNT = -1;

/** State that absorbs the difference between expected and observed counts. */
export const SHORTFALL_STATE: JobState = 'UNREADY';

export const TOTAL_LABEL = 'TOTAL';

export const UNORDERED_PIPELINE_MESSAGE =
  'WARNING: Could not determine order of pipeline, instead sorted alphabetically.';

export type ObservedCounts = ReadonlyMap<string, Partial<Record<JobState, number>>>;

export type LabelCounts = {
  label: string;
  counts: StateCounts;
  expected: number;
};

export type ReconcileResult = {
  rows: LabelCounts[];
  message?: string;
};

export function buildTotalRow(
  run: Pick<RunRecord, 'jobStateCounts' | 'totalNumberJobs'>,
  expected: ExpectedCounts,
): LabelCounts {
  return {
    label: TOTAL_LABEL,
    counts: toStateCounts(run.jobStateCounts),
    expected: expected.size > 0 ? sumExpected(expected) : run.totalNumberJobs,
  };
}

/**
 * The job summary the backend supplied, or one compiled from its job list.
 * Returns undefined when the run carries neither.
 */
export function resolveJobSummary(
  run: Pick<RunRecord, 'jobSummary' | 'jobs'>,
): ObservedCounts | undefined {
  if (run.jobSummary && Object.keys(run.jobSummary).length > 0) {
    return new Map(Object.entries(run.jobSummary));
  }
  if (run.jobs && run.jobs.length > 0) {
    return compileJobSummary(run.jobs);
  }
  return undefined;
}

/**
 * Produces one row per pipeline label. Declared counts fix the row order and
 * any gap between declared and observed totals lands in the shortfall state.
 * Without declared counts, observed labels are listed alphabetically and left
 * as reported.
 */
export function reconcileJobSummary(
  expected: ExpectedCounts,
  observed: ObservedCounts,
): ReconcileResult {
  if (expected.size === 0) {
    const rows = [...observed.keys()].sort().map((label) => ({
      label,
      counts: toStateCounts(observed.get(label) ?? {}),
      expected: MISSING_COUNT,
    }));
    return { rows, message: UNORDERED_PIPELINE_MESSAGE };
  }

  const rows: LabelCounts[] = [];
  for (const [label, expectedCount] of expected) {
    const reported = observed.get(label);
    if (!reported) {
      rows.push({ label, counts: emptyStateCounts(MISSING_COUNT), expected: expectedCount });
      continue;
    }
    const counts = toStateCounts(reported);
    const alreadyCounted = sumStateCounts(counts);
    if (alreadyCounted !== expectedCount) {
      log.debug('reconcileJobSummary', { label, alreadyCounted, expectedCount });
      counts[SHORTFALL_STATE] += expectedCount - alreadyCounted;
    }
    rows.push({ label, counts, expected: expectedCount });
  }
  return { rows };
}
