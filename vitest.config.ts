import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['test/**/*.test.ts'],
    env: {
      LOG_LEVEL: 'silent',
      SCAN_MIN_FILE_BYTES: '4096',
      PLOT_FALLBACK_COLUMNS: '80',
      PLOT_LABEL_MARGIN: '40',
    },
  },
});
