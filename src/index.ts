export { run } from './cli/cli';
export { defineConfig } from './config/define-config';
export type { Config, ConfigInput } from './config/schema';
export { configSchema } from './config/schema';
export { loadConfig } from './config/load';
export { BatchstatError, normalizeError } from './core/errors';
export { createLogger, setLogLevel } from './core/logger';
export { percentSucceeded, runAttentionFlag } from './report/classify';
export { classifyExitCodes, formatInfraCodes, parseInfraCodes } from './report/exit-codes';
export { compileJobSummary, groupJobsByLabel, groupJobsByState } from './report/grouping';
export {
  buildTotalRow,
  MISSING_COUNT,
  reconcileJobSummary,
  resolveJobSummary,
} from './report/reconcile';
export { type ReportOptions, runReport } from './report/report';
export { formatRunSummary, parseRunSummary } from './report/run-summary';
export { type Cell, type ColumnSpec, ReportTable } from './report/table';
export {
  DetailedRunReport,
  ExitCodesReport,
  type RunReportView,
  SummaryRunReport,
} from './report/views';
export { createWmsService, registerWmsService } from './wms/registry';
export { createSnapshotService } from './wms/snapshot';
export { JOB_STATES, type JobState } from './wms/states';
export type { JobRecord, RunRecord, WmsQuery, WmsReportResult, WmsService } from './wms/types';
