import { resolve } from 'node:path';

import type { CAC } from 'cac';

import { loadConfig } from '../../config/load';
import type { ConfigInput } from '../../config/schema';
import { BatchstatError } from '../../core/errors';
import { createLogger, setLogLevel } from '../../core/logger';
import { runReport } from '../../report/report';
import { createWmsService } from '../../wms/registry';
import type { WmsService } from '../../wms/types';
import { formatReportLine } from '../output';
import type { CliOptions } from '../types';

export type ReportCommandDeps = {
  cwd?: () => string;
  print?: (text: string) => void;
  createService?: typeof createWmsService;
};

const log = createLogger({ source: 'cli' });

export function parseNumberFlag(value: string | number | undefined): number | null {
  if (value === undefined) return null;
  if (typeof value === 'string' && value.trim() === '') return null;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : null;
}

export function buildConfigOverrides(options: CliOptions, cwd = process.cwd()): ConfigInput {
  const overrides: ConfigInput = {};
  if (options.wms || options.snapshot) {
    overrides.wms = {
      ...(options.wms ? { service: options.wms } : {}),
      ...(options.snapshot ? { snapshotPath: resolve(cwd, options.snapshot) } : {}),
    };
  }

  const histDays = parseNumberFlag(options.hist);
  if (options.hist !== undefined && histDays === null) {
    throw new BatchstatError({
      code: 'cli.invalid_hist',
      message: `--hist expects a number of days, got "${options.hist}".`,
      kind: 'validation',
    });
  }
  overrides.report = {
    ...(histDays !== null ? { histDays } : {}),
    ...(options.global ? { global: true } : {}),
    ...(options.exitCodes ? { exitCodes: true } : {}),
    ...(options.sort ? { sortBy: options.sort } : {}),
  };
  if (options.debug) {
    overrides.logging = { level: 'debug' };
  }
  return overrides;
}

export function registerReportCommands(cli: CAC, deps: ReportCommandDeps = {}): void {
  cli
    .command('report [runId]', 'Summarize runs, or show job detail for one run')
    .option('--user <user>', 'Restrict the report to runs submitted by this user')
    .option('--hist <days>', 'Number of days of history to search')
    .option('--pass-thru <filters>', 'Backend-specific filter string')
    .option('--global', 'Search all job queues, report global run ids')
    .option('--exit-codes', 'Also report payload and infrastructure exit codes')
    .option('--sort <column>', 'Summary column to sort by')
    .option('--wms <service>', 'WMS service to query')
    .option('--snapshot <path>', 'Run snapshot file for the snapshot service')
    .action(async (runId: string | undefined, options: CliOptions) => {
      const cwd = deps.cwd?.() ?? process.cwd();
      const { config, source } = await loadConfig(buildConfigOverrides(options, cwd), { cwd });
      setLogLevel(config.logging.level);
      log.debug('config loaded', { source: source?.path ?? null });

      const service: WmsService = (deps.createService ?? createWmsService)(config.wms);
      const print =
        deps.print ?? ((text: string) => console.log(options.json ? text : formatReportLine(text)));

      await runReport(
        {
          histDays: config.report.histDays,
          isGlobal: config.report.global,
          exitCodes: config.report.exitCodes,
          sortBy: config.report.sortBy,
          json: Boolean(options.json),
          ...(runId ? { runId } : {}),
          ...(options.user !== undefined ? { user: String(options.user) } : {}),
          ...(options.passThru !== undefined ? { passThru: String(options.passThru) } : {}),
        },
        { service, print },
      );
    });
}
