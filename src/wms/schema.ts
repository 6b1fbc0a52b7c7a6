import { z } from 'zod';

import { JOB_STATES } from './states';

export const jobStateSchema = z.enum(JOB_STATES);

const countSchema = z.number().int();

export const stateCountsSchema = z.record(jobStateSchema, countSchema);

export const jobRecordSchema = z.object({
  label: z.string().min(1),
  state: jobStateSchema,
  wmsId: z.string().optional(),
  name: z.string().optional(),
});

export const runRecordSchema = z.object({
  wmsId: z.string().min(1),
  globalWmsId: z.string().default(''),
  state: jobStateSchema,
  jobStateCounts: stateCountsSchema.default({}),
  totalNumberJobs: z.number().int().nonnegative().default(0),
  runSummary: z.string().optional(),
  jobSummary: z.record(z.string(), stateCountsSchema).optional(),
  jobs: z.array(jobRecordSchema).optional(),
  exitCodeSummary: z.record(z.string(), z.array(countSchema)).optional(),
  operator: z.string().default(''),
  project: z.string().default(''),
  campaign: z.string().default(''),
  payload: z.string().default(''),
  run: z.string().default(''),
  path: z.string().default(''),
  updatedAt: z.string().datetime({ offset: true }).optional(),
});

export const snapshotSchema = z.object({
  runs: z.array(runRecordSchema),
  message: z.string().optional(),
});

export type Snapshot = z.infer<typeof snapshotSchema>;
