import * as os from 'node:os';
import * as path from 'node:path';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    environment: 'node',
    env: {
      // Keep log files and config lookups out of the real home directory
      UNIX_TS_HOME: path.join(os.tmpdir(), 'unix-ts-test-home'),
    },
  },
});
