import type { JobState } from './states';

export type JobRecord = {
  label: string;
  state: JobState;
  wmsId?: string;
  name?: string;
};

/** Per-label count of jobs in each state. */
export type JobSummary = Record<string, Partial<Record<JobState, number>>>;

/** Exit codes per label, one per job attempt. */
export type ExitCodeSummary = Record<string, number[]>;

export type RunRecord = {
  wmsId: string;
  globalWmsId: string;
  state: JobState;
  jobStateCounts: Partial<Record<JobState, number>>;
  totalNumberJobs: number;
  /** `label1:count1;label2:count2`, in pipeline order. */
  runSummary?: string;
  jobSummary?: JobSummary;
  jobs?: JobRecord[];
  exitCodeSummary?: ExitCodeSummary;
  operator: string;
  project: string;
  campaign: string;
  payload: string;
  run: string;
  path: string;
  updatedAt?: string;
};

export type WmsQuery = {
  runId?: string;
  user?: string;
  histDays: number;
  passThru?: string;
  isGlobal: boolean;
};

export type WmsReportResult = {
  runs: RunRecord[];
  message?: string;
};

export type WmsService = {
  readonly name: string;
  report: (query: WmsQuery) => Promise<WmsReportResult>;
};

export function runDisplayId(run: RunRecord, useGlobalId: boolean): string {
  return useGlobalId ? run.globalWmsId : run.wmsId;
}
