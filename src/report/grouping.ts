import { createLogger } from '../core/logger';
import { type JobState, mapStates, type StateCounts } from '../wms/states';
import type { JobRecord } from '../wms/types';

const log = createLogger({ source: 'report' });

export type JobsByState = Record<JobState, JobRecord[]>;

/** Every state gets a group, even when no job is in it. */
export function groupJobsByState(jobs: readonly JobRecord[]): JobsByState {
  log.debug('groupJobsByState', { jobs: jobs.length });
  const byState = mapStates((): JobRecord[] => []);
  for (const job of jobs) {
    byState[job.state].push(job);
  }
  return byState;
}

/** Groups keep first-seen label order. */
export function groupJobsByLabel(jobs: readonly JobRecord[]): Map<string, JobRecord[]> {
  const byLabel = new Map<string, JobRecord[]>();
  for (const job of jobs) {
    const group = byLabel.get(job.label);
    if (group) {
      group.push(job);
    } else {
      byLabel.set(job.label, [job]);
    }
  }
  return byLabel;
}

/**
 * Builds the per-label state counts from individual jobs, for backends that
 * do not report a job summary of their own.
 */
export function compileJobSummary(jobs: readonly JobRecord[]): Map<string, StateCounts> {
  const summary = new Map<string, StateCounts>();
  for (const [label, group] of groupJobsByLabel(jobs)) {
    const byState = groupJobsByState(group);
    const counts = countJobs(byState);
    log.debug('compileJobSummary', { label, counts });
    summary.set(label, counts);
  }
  return summary;
}

function countJobs(byState: JobsByState): StateCounts {
  return mapStates((state) => byState[state].length);
}
