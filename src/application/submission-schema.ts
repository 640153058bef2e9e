import { LosslessNumber } from 'lossless-json';
import { z } from 'zod';
import type { JsonValue } from '../domain/index.js';

const literalSchema = z.union([
  z.string(),
  z.number(),
  z.instanceof(LosslessNumber),
  z.boolean(),
  z.null(),
]);

/** `time` is epoch seconds as a float, however many digits it was sent with. */
const timeSchema = z.union([
  z.number(),
  z.instanceof(LosslessNumber).transform((n) => Number(n.value)),
]);

/** Recursive schema for any JSON value carried in `value` / `values`. */
export const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([literalSchema, z.array(jsonValueSchema), z.record(z.string(), jsonValueSchema)]),
);

/**
 * Zod schema for one collectd submission.
 *
 * - Every field is optional and nullable; absence is not an error.
 * - Unknown keys (`interval`, `dstypes`, `dsnames`, ...) are stripped.
 * - A known key with the wrong JSON type fails the whole submission.
 */
export const rawSubmissionSchema = z.object({
  time: timeSchema.nullish(),
  host: z.string().nullish(),
  plugin: z.string().nullish(),
  plugin_instance: z.string().nullish(),
  type: z.string().nullish(),
  type_instance: z.string().nullish(),
  value: jsonValueSchema.optional(),
  values: z.array(jsonValueSchema).nullish(),
});

export type RawSubmissionInput = z.infer<typeof rawSubmissionSchema>;

/** A request body may also be an array of submissions; an empty one is valid. */
export const rawSubmissionBatchSchema = z.array(rawSubmissionSchema);
