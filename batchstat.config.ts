import { defineConfig } from './src/config/define-config';

export default defineConfig({
  wms: {
    service: 'snapshot',
    snapshotPath: 'fixtures/runs.json',
  },
  report: {
    histDays: 2,
    sortBy: 'ID',
  },
});
