import { ConfigurationError } from '@lcforge/core';
import { loggerEnvSchema } from '@lcforge/logger';
import { err, ok, type Result } from 'neverthrow';
import { z } from 'zod';

export const DEFAULT_RAW_DATA_DIR = 'raw_virgo_data';
export const DEFAULT_OUTPUT_DIR = 'snana_virgo_data';
export const DEFAULT_REGISTRY_PATH = 'config/objects.json';

export const CliEnvSchema = loggerEnvSchema.extend({
  LCFORGE_RAW_DATA_DIR: z.string().trim().min(1).default(DEFAULT_RAW_DATA_DIR),
  LCFORGE_OUTPUT_DIR: z.string().trim().min(1).default(DEFAULT_OUTPUT_DIR),
  LCFORGE_REGISTRY_PATH: z.string().trim().min(1).default(DEFAULT_REGISTRY_PATH),
  LCFORGE_HTTP_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('production'),
});

export type CliEnv = z.infer<typeof CliEnvSchema>;

export function loadCliEnv(env: NodeJS.ProcessEnv = process.env): Result<CliEnv, ConfigurationError> {
  const parsed = CliEnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    return err(new ConfigurationError(`Invalid environment: ${issues.join('; ')}`));
  }
  return ok(parsed.data);
}
