import { createLogger } from '../core/logger';
import type { JobState } from '../wms/states';
import type { RunRecord } from '../wms/types';

const log = createLogger({ source: 'report' });

export type AttentionFlag = ' ' | 'F' | 'D' | 'H';

const ATTENTION_ORDER: Array<[JobState, AttentionFlag]> = [
  ['FAILED', 'F'],
  ['DELETED', 'D'],
  ['HELD', 'H'],
];

/** Flags a running run with failed, deleted or held jobs, in that priority. */
export function runAttentionFlag(run: Pick<RunRecord, 'state' | 'jobStateCounts'>): AttentionFlag {
  if (run.state !== 'RUNNING') return ' ';
  for (const [state, flag] of ATTENTION_ORDER) {
    if (run.jobStateCounts[state]) {
      return flag;
    }
  }
  return ' ';
}

/** Whole percent of succeeded jobs, truncated; `UNK` without a job total. */
export function percentSucceeded(
  run: Pick<RunRecord, 'jobStateCounts' | 'totalNumberJobs'>,
): string {
  log.debug('percentSucceeded', {
    totalNumberJobs: run.totalNumberJobs,
    jobStateCounts: run.jobStateCounts,
  });
  if (!run.totalNumberJobs) return 'UNK';
  const succeeded = run.jobStateCounts.SUCCEEDED ?? 0;
  log.debug('percentSucceeded', { succeeded });
  return String(Math.floor((100 * succeeded) / run.totalNumberJobs));
}
