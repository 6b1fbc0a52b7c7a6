export const JOB_STATES = [
  'UNKNOWN',
  'MISFIT',
  'UNREADY',
  'READY',
  'PENDING',
  'RUNNING',
  'DELETED',
  'HELD',
  'SUCCEEDED',
  'FAILED',
  'PRUNED',
] as const;

export type JobState = (typeof JOB_STATES)[number];

/** Count per job state; every state is present. */
export type StateCounts = Record<JobState, number>;

/** Builds a record with one entry per job state, in declaration order. */
export function mapStates<T>(fn: (state: JobState) => T): Record<JobState, T> {
  return {
    UNKNOWN: fn('UNKNOWN'),
    MISFIT: fn('MISFIT'),
    UNREADY: fn('UNREADY'),
    READY: fn('READY'),
    PENDING: fn('PENDING'),
    RUNNING: fn('RUNNING'),
    DELETED: fn('DELETED'),
    HELD: fn('HELD'),
    SUCCEEDED: fn('SUCCEEDED'),
    FAILED: fn('FAILED'),
    PRUNED: fn('PRUNED'),
  };
}

export function emptyStateCounts(fill = 0): StateCounts {
  return mapStates(() => fill);
}

/** Fill the states a backend left out of a rolled-up view with zero. */
export function toStateCounts(partial: Partial<Record<JobState, number>>): StateCounts {
  return mapStates((state) => partial[state] ?? 0);
}

export function sumStateCounts(counts: Partial<Record<JobState, number>>): number {
  let total = 0;
  for (const state of JOB_STATES) {
    total += counts[state] ?? 0;
  }
  return total;
}
