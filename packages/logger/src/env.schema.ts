import { z } from 'zod';

import { LOG_LEVELS, type LogLevel } from './logger.js';

export const loggerEnvSchema = z.object({
  LCFORGE_LOG_LEVEL: z
    .string()
    .trim()
    .toLowerCase()
    .refine((val): val is LogLevel => (LOG_LEVELS as readonly string[]).includes(val), {
      message: `Invalid log level, expected one of: ${LOG_LEVELS.join(', ')}`,
    })
    .default('info'),
  LCFORGE_LOG_FILE: z.string().trim().min(1, { message: 'Invalid log file path' }).optional(),
  LCFORGE_LOG_COLOR: z
    .string()
    .default('true')
    .transform((val: string) => val === 'true'),
});

export type LoggerEnvConfig = z.infer<typeof loggerEnvSchema>;

export function validateLoggerEnv(env: NodeJS.ProcessEnv = process.env): LoggerEnvConfig {
  return loggerEnvSchema.parse(env);
}
