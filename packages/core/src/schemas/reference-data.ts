import { z } from 'zod';

export const PassbandVocabularyFileSchema = z.object({
  description: z.string().optional(),
  passbands: z.array(z.string().trim().min(1)).min(1, { message: 'Vocabulary must list at least one passband' }),
  aliases: z.record(z.string(), z.string().trim().min(1)).default({}),
  excludedLabels: z.array(z.string()).default([]),
});

export const ZeroPointFileSchema = z.object({
  description: z.string().optional(),
  units: z.string().optional(),
  systems: z.record(
    z.string().trim().min(1),
    z.record(z.string().trim().min(1), z.number().positive().finite())
  ),
});

export type PassbandVocabularyFile = z.input<typeof PassbandVocabularyFileSchema>;
export type ZeroPointFile = z.input<typeof ZeroPointFileSchema>;
