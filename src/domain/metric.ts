import type { LosslessNumber } from 'lossless-json';

/**
 * Core domain types for the collectd metric model.
 *
 * A submission arrives as collectd's write_http JSON and leaves the
 * pipeline as one flat record per value. These types carry no framework
 * dependencies.
 */

/**
 * Any value JSON can carry. Integers beyond 2^53 stay `LosslessNumber` so
 * 64-bit counters reach the sink digit for digit.
 */
export type JsonValue =
  | string
  | number
  | LosslessNumber
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

/**
 * One inbound metric submission as collectd sends it.
 *
 * Every field is optional and `null` means the same as absent.
 */
export interface RawSubmission {
  readonly time?: number | null | undefined;
  readonly host?: string | null | undefined;
  readonly plugin?: string | null | undefined;
  readonly plugin_instance?: string | null | undefined;
  readonly type?: string | null | undefined;
  readonly type_instance?: string | null | undefined;
  readonly value?: JsonValue | undefined;
  readonly values?: readonly JsonValue[] | null | undefined;
}

/**
 * Payload of a submission, resolved once.
 *
 * `series` wins whenever `values` is an array, even an empty one.
 */
export type MetricPayload =
  | { readonly kind: 'series'; readonly values: readonly JsonValue[] }
  | { readonly kind: 'scalar'; readonly value: JsonValue }
  | { readonly kind: 'empty' };

/** Metadata shared by every record expanded from one submission. */
export interface MetricMetadata {
  readonly time: number | null;
  readonly host: string | null;
  readonly plugin: string | null;
  readonly plugin_instance: string | null;
  readonly type: string | null;
  readonly type_instance: string | null;
}

/** One normalized, single-valued metric. Frozen once produced. */
export interface FlatRecord extends MetricMetadata {
  readonly value: JsonValue;
}
