import { z } from 'zod';

/**
 * TAP `FORMAT=json` result: column descriptors and positional rows.
 */
export const SimbadTapResponseSchema = z.object({
  metadata: z.array(z.object({ name: z.string() }).passthrough()),
  data: z.array(z.array(z.union([z.number(), z.string(), z.boolean(), z.null()]))),
});

export const SimbadPositionSchema = z.object({
  ra: z.number().min(0).max(360),
  dec: z.number().min(-90).max(90),
  redshift: z.number().nullable(),
});

export type SimbadTapResponse = z.infer<typeof SimbadTapResponseSchema>;
export type SimbadPosition = z.infer<typeof SimbadPositionSchema>;
