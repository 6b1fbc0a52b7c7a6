import { z } from 'zod';

export const logLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);

export const configSchema = z.object({
  wms: z
    .object({
      service: z.string().min(1).default('snapshot'),
      snapshotPath: z.string().min(1).optional(),
    })
    .default({ service: 'snapshot' }),
  report: z
    .object({
      histDays: z.number().nonnegative().default(1),
      global: z.boolean().default(false),
      sortBy: z.string().min(1).default('ID'),
      exitCodes: z.boolean().default(false),
    })
    .default({ histDays: 1, global: false, sortBy: 'ID', exitCodes: false }),
  logging: z
    .object({
      level: logLevelSchema.default('warn'),
    })
    .default({ level: 'warn' }),
});

export type Config = z.infer<typeof configSchema>;
type DeepPartial<T> = {
  [K in keyof T]?: T[K] extends Array<infer U>
    ? Array<U>
    : T[K] extends Record<string, unknown>
      ? DeepPartial<T[K]>
      : T[K];
};
export type ConfigInput = DeepPartial<Config>;
