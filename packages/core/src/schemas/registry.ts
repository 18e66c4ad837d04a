import { z } from 'zod';

import { DEFAULT_MAG_SYSTEM } from '../types/observation.js';

export const ObjectMetadataSchema = z.object({
  ra: z.number().min(0).max(360),
  dec: z.number().min(-90).max(90),
  redshift: z.number().default(0),
  mwebv: z.number().nonnegative().default(0),
});

export const RegistryEntrySchema = z.object({
  files: z.array(z.string().trim().min(1)).default([]),
  magSystem: z.string().trim().min(1).default(DEFAULT_MAG_SYSTEM),
  metadata: ObjectMetadataSchema.optional(),
});

export const ObjectRegistrySchema = z.object({
  survey: z.string().trim().min(1).default('VIRGO_PROJECT'),
  objects: z.record(z.string().trim().min(1), RegistryEntrySchema),
});

export type ObjectMetadata = z.infer<typeof ObjectMetadataSchema>;
export type RegistryEntry = z.infer<typeof RegistryEntrySchema>;
export type ObjectRegistry = z.infer<typeof ObjectRegistrySchema>;
