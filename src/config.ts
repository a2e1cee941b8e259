import 'dotenv/config';

import { z } from 'zod';

const envSchema = z.object({
  LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .default('info'),

  // Files at or below this size are left out of the distribution.
  SCAN_MIN_FILE_BYTES: z.coerce.number().int().min(0).default(4096),

  PLOT_FALLBACK_COLUMNS: z.coerce.number().int().min(1).max(10_000).default(80),
  PLOT_LABEL_MARGIN: z.coerce.number().int().min(0).max(10_000).default(40),
});

const parsed = envSchema.safeParse(process.env);
if (!parsed.success) {
  // eslint-disable-next-line no-console
  console.error(parsed.error.format());
  process.exit(1);
}

const env = parsed.data;

export const config = {
  logLevel: env.LOG_LEVEL,
  scan: {
    minFileBytes: env.SCAN_MIN_FILE_BYTES,
  },
  plot: {
    fallbackColumns: env.PLOT_FALLBACK_COLUMNS,
    labelMargin: env.PLOT_LABEL_MARGIN,
  },
} as const;
