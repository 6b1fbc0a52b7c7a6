import type { ConfigInput } from './schema';

/** Typed authoring for `batchstat.config.ts`; the loader validates the result. */
export function defineConfig<T extends ConfigInput>(config: T): T {
  return config;
}
