// ──────────────────────────────────────────
// Configuration — environment, validated once at startup
// ──────────────────────────────────────────

import { z } from 'zod';
import { ValidationError } from './shared/errors';

const envSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  DATA_DIRS: z
    .string()
    .default('data,/mnt/data')
    .transform((value) =>
      value
        .split(',')
        .map((dir) => dir.trim())
        .filter((dir) => dir !== '')
    )
    .pipe(z.array(z.string()).min(1)),
  REFRESH_INTERVAL_MS: z.coerce.number().int().min(0).default(0),
});

export type AppConfig = z.infer<typeof envSchema>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw new ValidationError(`Invalid configuration: ${issues.join('; ')}`, parsed.error.issues);
  }
  return parsed.data;
}
