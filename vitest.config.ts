import { tmpdir } from 'os';
import { join } from 'path';
import { defineConfig } from 'vitest/config';

// Keep every test away from the real config and state directories
const sandbox = join(tmpdir(), 's3-folder-sync-vitest');

export default defineConfig({
  test: {
    environment: 'node',
    include: ['src/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    testTimeout: 10_000,
    env: {
      S3_FOLDER_SYNC_LOG_LEVEL: 'error',
      XDG_CONFIG_HOME: join(sandbox, 'config'),
      XDG_STATE_HOME: join(sandbox, 'state'),
    },
  },
});
