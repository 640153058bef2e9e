import { isInteger, isSafeNumber, LosslessNumber, parse } from 'lossless-json';
import { ParseError } from '../domain/index.js';
import type {
  FlatRecord,
  MetricMetadata,
  MetricPayload,
  RawSubmission,
} from '../domain/index.js';
import { rawSubmissionSchema, rawSubmissionBatchSchema } from './submission-schema.js';

/** Unsafe integers keep their digits; everything else becomes a float. */
function parseNumber(text: string): number | LosslessNumber {
  return isInteger(text) && !isSafeNumber(text) ? new LosslessNumber(text) : Number(text);
}

/**
 * Parses a request body into submissions.
 *
 * The single-object form is tried first, then the array form; there is no
 * discriminator field. Throws `ParseError` when the text is not JSON or
 * fits neither form.
 */
export function parseSubmissionBody(body: string): RawSubmission[] {
  let json: unknown;
  try {
    json = parse(body, null, parseNumber);
  } catch (err: unknown) {
    throw new ParseError('Request body is not valid JSON', { cause: err });
  }

  const single = rawSubmissionSchema.safeParse(json);
  if (single.success) return [single.data];

  const batch = rawSubmissionBatchSchema.safeParse(json);
  if (batch.success) return batch.data;

  throw new ParseError('Request body is neither a submission nor an array of submissions', {
    issues: Array.isArray(json) ? batch.error.issues : single.error.issues,
  });
}

/** Single decision point for the `values` over `value` precedence. */
export function resolvePayload(raw: RawSubmission): MetricPayload {
  if (raw.values !== undefined && raw.values !== null) {
    return { kind: 'series', values: raw.values };
  }
  if (raw.value !== undefined && raw.value !== null) {
    return { kind: 'scalar', value: raw.value };
  }
  return { kind: 'empty' };
}

function metadataOf(raw: RawSubmission): MetricMetadata {
  return {
    time: raw.time ?? null,
    host: raw.host ?? null,
    plugin: raw.plugin ?? null,
    plugin_instance: raw.plugin_instance ?? null,
    type: raw.type ?? null,
    type_instance: raw.type_instance ?? null,
  };
}

/** Expands one submission into 0, 1 or n records, lazily and in order. */
export function* normalizeSubmission(raw: RawSubmission): Generator<FlatRecord, void, undefined> {
  const payload = resolvePayload(raw);
  if (payload.kind === 'empty') return;

  const metadata = metadataOf(raw);
  const values = payload.kind === 'series' ? payload.values : [payload.value];

  for (const value of values) {
    yield Object.freeze({ ...metadata, value });
  }
}

export function* normalizeSubmissions(
  raws: Iterable<RawSubmission>,
): Generator<FlatRecord, void, undefined> {
  for (const raw of raws) {
    yield* normalizeSubmission(raw);
  }
}
