import { LOG_LEVELS, type LogLevel } from '@lcforge/logger';
import { z } from 'zod';

export const JsonFlagSchema = z.object({
  json: z.boolean().optional(),
});

export const LogLevelFlagSchema = z.object({
  logLevel: z
    .string()
    .trim()
    .toLowerCase()
    .refine((val): val is LogLevel => (LOG_LEVELS as readonly string[]).includes(val), {
      message: `--log-level must be one of: ${LOG_LEVELS.join(', ')}`,
    })
    .optional(),
});

export const ObjectIdsSchema = z.array(z.string().trim().min(1, { message: 'Object ids must not be empty' }));

export const BandLabelsSchema = z
  .array(z.string().min(1, { message: 'Band labels must not be empty' }))
  .min(1, { message: 'At least one band label is required' });

/**
 * Process command options. Paths left out fall back to the LCFORGE_* environment.
 */
export const ProcessCommandOptionsSchema = z
  .object({
    registry: z.string().trim().min(1).optional(),
    rawDir: z.string().trim().min(1).optional(),
    outDir: z.string().trim().min(1).optional(),
    metadata: z.enum(['simbad', 'registry'], {
      errorMap: () => ({ message: '--metadata must be either "simbad" or "registry"' }),
    }).default('simbad'),
    strictBands: z.boolean().optional(),
    timeout: z.coerce.number().int().positive({ message: '--timeout must be a positive number of milliseconds' }).optional(),
  })
  .extend(JsonFlagSchema.shape)
  .extend(LogLevelFlagSchema.shape);

export const InspectCommandOptionsSchema = JsonFlagSchema.extend(LogLevelFlagSchema.shape);

export const ResolveBandCommandOptionsSchema = JsonFlagSchema;
