import { access } from 'node:fs/promises';
import { dirname, isAbsolute, join, resolve } from 'node:path';
import { pathToFileURL } from 'node:url';

import { cosmiconfig } from 'cosmiconfig';

import { BatchstatError } from '../core/errors';
import { readEnvValue } from '../utils/env';
import { loadProjectEnv } from './env';
import type { Config, ConfigInput } from './schema';
import { configSchema, logLevelSchema } from './schema';

export type ConfigResult = {
  config: Config;
  source: { path: string; format: string } | null;
  projectRoot: string;
};

async function loadTsConfig(path: string): Promise<unknown> {
  const module = (await import(pathToFileURL(path).toString())) as {
    default?: unknown;
    config?: unknown;
  };
  return module.default ?? module.config ?? module;
}

type EnvValue = string | undefined;

function parseNumber(value: EnvValue): number | undefined {
  if (!value) return undefined;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : undefined;
}

function parseBool(value: EnvValue): boolean | undefined {
  if (!value) return undefined;
  if (value === '1' || value.toLowerCase() === 'true') return true;
  if (value === '0' || value.toLowerCase() === 'false') return false;
  return undefined;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function mergeConfig(base: Config, override?: ConfigInput): Config {
  if (!override) return base;
  return mergeRecords(base, override) as Config;
}

function mergeRecords(
  base: Record<string, unknown>,
  override: Record<string, unknown>,
): Record<string, unknown> {
  const output: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(override)) {
    if (value === undefined) continue;
    const baseValue = output[key];
    if (isRecord(value) && isRecord(baseValue)) {
      output[key] = mergeRecords(baseValue, value);
      continue;
    }
    output[key] = value;
  }
  return output;
}

const CONFIG_FILES = [
  'batchstat.config.ts',
  'batchstat.config.js',
  'batchstat.config.json',
  'batchstat.config.yaml',
  'batchstat.config.yml',
];

async function pathExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

export async function findConfigPath(searchFrom: string): Promise<string | null> {
  let current = searchFrom;
  while (true) {
    for (const candidate of CONFIG_FILES) {
      const path = join(current, candidate);
      if (await pathExists(path)) {
        return path;
      }
    }

    const parent = dirname(current);
    if (parent === current) break;
    current = parent;
  }
  return null;
}

export function configFromEnv(): ConfigInput {
  const override: ConfigInput = {};
  const env = (key: string): EnvValue => readEnvValue(key);

  const service = env('BATCHSTAT_WMS_SERVICE');
  if (service) {
    override.wms = { ...(override.wms ?? {}), service };
  }

  const snapshotPath = env('BATCHSTAT_SNAPSHOT');
  if (snapshotPath) {
    override.wms = { ...(override.wms ?? {}), snapshotPath };
  }

  const histDays = parseNumber(env('BATCHSTAT_HIST_DAYS'));
  if (histDays !== undefined) {
    override.report = { ...(override.report ?? {}), histDays };
  }

  const global = parseBool(env('BATCHSTAT_GLOBAL'));
  if (global !== undefined) {
    override.report = { ...(override.report ?? {}), global };
  }

  const level = logLevelSchema.safeParse(env('BATCHSTAT_LOG_LEVEL'));
  if (level.success) {
    override.logging = { level: level.data };
  }

  if (parseBool(env('BATCHSTAT_DEBUG'))) {
    override.logging = { level: 'debug' };
  }

  return override;
}

function toIssueLines(issues: Array<{ path: Array<string | number>; message: string }>): string[] {
  return issues.map((issue) => `${issue.path.join('.') || 'config'}: ${issue.message}`);
}

export async function loadConfig(
  overrides?: ConfigInput,
  options?: { cwd?: string },
): Promise<ConfigResult> {
  const explorer = cosmiconfig('batchstat', {
    searchPlaces: [...CONFIG_FILES, 'package.json'],
    loaders: {
      '.ts': loadTsConfig,
    },
  });

  const searchFrom = options?.cwd ? resolve(options.cwd) : process.cwd();
  const configPath = await findConfigPath(searchFrom);
  const result = configPath
    ? await explorer.load(configPath)
    : await explorer.search(searchFrom);
  const projectRoot = result ? dirname(result.filepath) : searchFrom;
  loadProjectEnv({
    cwd: searchFrom,
    ...(result ? { configPath: result.filepath } : {}),
  });

  const baseConfig: unknown = result ? (result.config ?? {}) : {};
  const parsed = configSchema.safeParse(baseConfig);
  if (!parsed.success) {
    const issueLines = toIssueLines(parsed.error.issues);
    throw new BatchstatError({
      code: 'config.invalid',
      message: `Invalid config: ${issueLines.join('\n')}`,
      userMessage: 'Configuration file is invalid.',
      kind: 'validation',
      details: {
        issues: issueLines,
        ...(result?.filepath ? { path: result.filepath } : {}),
      },
      nextSteps: ['Fix the invalid settings in your config file.'],
    });
  }

  const fileConfig = parsed.data;
  if (fileConfig.wms.snapshotPath && !isAbsolute(fileConfig.wms.snapshotPath)) {
    fileConfig.wms.snapshotPath = resolve(projectRoot, fileConfig.wms.snapshotPath);
  }

  const merged = mergeConfig(mergeConfig(fileConfig, configFromEnv()), overrides);
  const finalParsed = configSchema.safeParse(merged);
  if (!finalParsed.success) {
    const issueLines = toIssueLines(finalParsed.error.issues);
    throw new BatchstatError({
      code: 'config.invalid',
      message: `Invalid config overrides: ${issueLines.join('; ')}`,
      userMessage: 'Configuration overrides are invalid.',
      kind: 'validation',
      details: {
        issues: issueLines,
        ...(result?.filepath ? { path: result.filepath } : {}),
      },
      nextSteps: ['Check the BATCHSTAT_* environment variables and command flags.'],
    });
  }

  return {
    config: finalParsed.data,
    source: result
      ? { path: result.filepath, format: result.isEmpty ? 'empty' : 'file' }
      : null,
    projectRoot,
  };
}
