import { createLogger } from '../core/logger';
import type { WmsService } from '../wms/types';
import {
  DetailedRunReport,
  ExitCodesReport,
  type ReportJson,
  SummaryRunReport,
} from './views';

const log = createLogger({ source: 'report' });

/** Completed jobs may drop out of a shorter window before the run finishes. */
export const MIN_SINGLE_RUN_HIST_DAYS = 2;

export type ReportOptions = {
  runId?: string;
  user?: string;
  histDays: number;
  passThru?: string;
  isGlobal: boolean;
  exitCodes: boolean;
  sortBy: string;
  json: boolean;
};

export type ReportDeps = {
  service: WmsService;
  print: (text: string) => void;
};

export type ReportOutcome = {
  histDays: number;
  runCount: number;
  message?: string;
};

type RunJson = {
  id: string;
  path: string;
  globalWmsId: string;
  summary: ReportJson;
  detailed: ReportJson;
  exitCodes?: ReportJson;
};

export function noRecordsMessage(runId: string, histDays: number): string {
  return (
    `No records found for job id '${runId}'. ` +
    `Hints: Double check id, retry with a larger --hist value (currently: ${histDays}), ` +
    `and/or use --global to search all job queues.`
  );
}

/**
 * Queries the WMS and prints either one summary line per run or, for a single
 * run id, the summary, detailed and (optionally) exit-code reports per match.
 */
export async function runReport(
  options: ReportOptions,
  deps: ReportDeps,
): Promise<ReportOutcome> {
  const histDays = options.runId
    ? Math.max(options.histDays, MIN_SINGLE_RUN_HIST_DAYS)
    : options.histDays;

  log.debug('querying WMS', { service: deps.service.name, runId: options.runId, histDays });
  const { runs, message } = await deps.service.report({
    histDays,
    isGlobal: options.isGlobal,
    ...(options.runId ? { runId: options.runId } : {}),
    ...(options.user ? { user: options.user } : {}),
    ...(options.passThru ? { passThru: options.passThru } : {}),
  });

  const brief = new SummaryRunReport();
  if (options.runId) {
    const detailed = new DetailedRunReport();
    const exitCodes = options.exitCodes ? new ExitCodesReport() : undefined;
    const jsonRuns: RunJson[] = [];

    for (const run of runs) {
      brief.add(run, options.isGlobal);
      detailed.add(run, options.isGlobal);
      exitCodes?.add(run, options.isGlobal);

      if (options.json) {
        jsonRuns.push({
          id: options.isGlobal ? run.globalWmsId : run.wmsId,
          path: run.path,
          globalWmsId: run.globalWmsId,
          summary: brief.toJSON(),
          detailed: detailed.toJSON(),
          ...(exitCodes ? { exitCodes: exitCodes.toJSON() } : {}),
        });
      } else {
        if (detailed.message) {
          deps.print(detailed.message);
        }
        deps.print(brief.render());
        deps.print('\n');
        deps.print(`Path: ${run.path}`);
        deps.print(`Global job id: ${run.globalWmsId}`);
        deps.print('\n');
        deps.print(detailed.render());
        if (exitCodes) {
          if (exitCodes.message) {
            deps.print(exitCodes.message);
          }
          deps.print('\n');
          deps.print(exitCodes.render());
        }
      }

      brief.clear();
      detailed.clear();
      exitCodes?.clear();
    }

    if (options.json) {
      const hint = runs.length === 0 && !message ? noRecordsMessage(options.runId, histDays) : null;
      deps.print(
        JSON.stringify({ runs: jsonRuns, histDays, message: message ?? null, hint }, null, 2),
      );
      return outcome(histDays, runs.length, message);
    }
    if (runs.length === 0 && !message) {
      deps.print(noRecordsMessage(options.runId, histDays));
    }
  } else {
    for (const run of runs) {
      brief.add(run, options.isGlobal);
    }
    brief.sort(options.sortBy);
    if (options.json) {
      deps.print(JSON.stringify({ summary: brief.toJSON(), message: message ?? null }, null, 2));
      return outcome(histDays, runs.length, message);
    }
    deps.print(brief.render());
  }

  if (message) {
    deps.print(message);
    deps.print('\n');
  }
  return outcome(histDays, runs.length, message);
}

function outcome(histDays: number, runCount: number, message?: string): ReportOutcome {
  return message ? { histDays, runCount, message } : { histDays, runCount };
}
