import type { Config } from '../config/schema';
import { BatchstatError } from '../core/errors';
import { createSnapshotService } from './snapshot';
import type { WmsService } from './types';

export type WmsServiceFactory = (settings: Config['wms']) => WmsService;

const factories = new Map<string, WmsServiceFactory>([
  [
    'snapshot',
    (settings) => {
      if (!settings.snapshotPath) {
        throw new BatchstatError({
          code: 'wms.snapshot_path_missing',
          message: 'The snapshot WMS service needs a snapshot path.',
          kind: 'validation',
          nextSteps: ['Pass --snapshot <path> or set wms.snapshotPath in your config.'],
        });
      }
      return createSnapshotService({ path: settings.snapshotPath });
    },
  ],
]);

export function registerWmsService(name: string, factory: WmsServiceFactory): void {
  factories.set(name, factory);
}

export function listWmsServices(): string[] {
  return [...factories.keys()].sort();
}

export function createWmsService(settings: Config['wms']): WmsService {
  const factory = factories.get(settings.service);
  if (!factory) {
    throw new BatchstatError({
      code: 'wms.unknown_service',
      message: `Unknown WMS service: ${settings.service}`,
      kind: 'validation',
      details: { service: settings.service },
      nextSteps: [`Use one of: ${listWmsServices().join(', ')}.`],
    });
  }
  return factory(settings);
}
