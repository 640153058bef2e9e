import type { FlatRecord } from './metric.js';

export type OutputMode = 'disk' | 'udp';

/**
 * Destination for flushed batches.
 *
 * `open()` runs once before the first flush and `close()` once after the
 * last. `flush()` rejects with `SinkIOError` on any I/O failure.
 */
export interface Sink {
  readonly kind: OutputMode;
  open(): Promise<void>;
  flush(batch: readonly FlatRecord[]): Promise<void>;
  close(): Promise<void>;
}
