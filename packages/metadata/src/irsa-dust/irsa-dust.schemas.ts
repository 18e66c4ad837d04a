import { z } from 'zod';

function asArray<T>(value: T | T[]): T[] {
  return Array.isArray(value) ? value : [value];
}

// Elements that carry attributes come back as `{ _: text, ...attributes }`.
const TextNodeSchema = z.union([
  z.string(),
  z
    .object({ _: z.string() })
    .passthrough()
    .transform((node) => node._),
]);

const DustStatisticsSchema = z
  .object({
    refPixelValueSandF: TextNodeSchema.optional(),
    refPixelValueSFD: TextNodeSchema.optional(),
  })
  .passthrough();

const DustResultSchema = z
  .object({
    desc: TextNodeSchema.optional(),
    statistics: DustStatisticsSchema.optional(),
  })
  .passthrough();

/**
 * DUST service XML after xml2js with `explicitArray: false, mergeAttrs: true`.
 * A single `<result>` arrives as an object, several as an array.
 */
export const IrsaDustResponseSchema = z.object({
  results: z
    .object({
      status: z.string().optional(),
      message: z.string().optional(),
      result: z.union([DustResultSchema, z.array(DustResultSchema)]).optional(),
    })
    .passthrough()
    .transform(({ result, ...rest }) => ({ ...rest, result: result === undefined ? [] : asArray(result) })),
});

export type IrsaDustResponse = z.infer<typeof IrsaDustResponseSchema>;
