import { z } from 'zod';

import { AppError } from '@/shared/errors/app-error.js';

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .default('info'),
  CONVERTER_CACHE_ENTRIES: z.coerce.number().int().positive().max(1_024).default(16),
  CONVERTER_CACHE_TTL_MS: z.coerce.number().int().positive().default(10 * 60 * 1000),
});

export type Env = z.infer<typeof envSchema>;

export function loadEnv(source: NodeJS.ProcessEnv): Env {
  const parsed = envSchema.safeParse(source);

  if (!parsed.success) {
    throw AppError.validation('config.invalid-environment', {
      issues: parsed.error.issues,
    });
  }

  return parsed.data;
}

export const env: Env = loadEnv(process.env);
