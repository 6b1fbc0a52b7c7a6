import { existsSync } from 'node:fs';
import { dirname, join } from 'node:path';

import { config as loadDotenv } from 'dotenv';

import { createLogger } from '../core/logger';

export type EnvLoadSummary = {
  path?: string;
  keys: string[];
};

const log = createLogger({ source: 'config' });

export function loadProjectEnv(options: {
  configPath?: string | null;
  cwd?: string;
}): EnvLoadSummary {
  const cwd = options.cwd ?? process.cwd();
  const envRoot = options.configPath ? dirname(options.configPath) : cwd;
  const envPath = join(envRoot, '.env');

  if (!existsSync(envPath)) {
    return { keys: [] };
  }

  log.debug(`Loading .env from ${envPath}`);
  const result = loadDotenv({ path: envPath, override: true });
  if (result.error) {
    log.warn(`Failed to load .env: ${result.error.message}`);
  }

  const keys = result.parsed ? Object.keys(result.parsed) : [];
  log.debug(`Loaded ${keys.length} environment variable${keys.length === 1 ? '' : 's'}`);

  return { path: envPath, keys };
}

