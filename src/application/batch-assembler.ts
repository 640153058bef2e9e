import type { Logger } from 'pino';
import { SinkIOError } from '../domain/index.js';
import type { FlatRecord, Sink } from '../domain/index.js';
import type { IngestChannel } from './ingest-channel.js';
import { IntervalTicker } from './interval-ticker.js';

export type AssemblerState = 'buffering' | 'flushing' | 'shutdown';

export type FlushTrigger = 'size' | 'interval' | 'shutdown';

export interface BatchAssemblerOptions {
  /** Flush as soon as the buffer holds this many records. */
  batchSize: number;
  /** Tick period, and the minimum age of the last flush before a timed one. */
  flushIntervalMs: number;
  /** Monotonic clock in milliseconds. */
  now?: () => number;
}

/**
 * The single batch worker.
 *
 * Drains the ingest channel into an in-memory buffer and hands the whole
 * buffer to the sink when either:
 * - the buffer reaches `batchSize` records, or
 * - a tick finds the buffer non-empty and more than `flushIntervalMs` has
 *   passed since the last flush.
 *
 * When the channel is closed and drained, a non-empty buffer is flushed
 * once more and the worker stops. A sink failure stops it too: the batch in
 * hand is lost, the channel is terminated so producers get
 * `QueueClosedError`, and `run()` rejects with `SinkIOError`. Nothing
 * restarts it.
 *
 * The buffer is touched only from `run()`, and `run()` never takes input
 * while a flush is in flight.
 */
export class BatchAssembler {
  private buffer: FlatRecord[] = [];
  private lastFlushAt = 0;
  private currentState: AssemblerState = 'buffering';
  private batches = 0;
  private records = 0;

  private readonly batchSize: number;
  private readonly flushIntervalMs: number;
  private readonly now: () => number;

  constructor(
    private readonly channel: IngestChannel<FlatRecord>,
    private readonly sink: Sink,
    private readonly log: Logger,
    options: BatchAssemblerOptions,
  ) {
    this.batchSize = options.batchSize;
    this.flushIntervalMs = options.flushIntervalMs;
    this.now = options.now ?? (() => performance.now());
  }

  get state(): AssemblerState {
    return this.currentState;
  }

  /** Records held in the buffer, waiting for the next flush. */
  get buffered(): number {
    return this.buffer.length;
  }

  get flushedBatches(): number {
    return this.batches;
  }

  get flushedRecords(): number {
    return this.records;
  }

  /**
   * Main worker loop. Resolves after the shutdown flush; rejects on the
   * first sink failure.
   */
  async run(): Promise<void> {
    const ticker = new IntervalTicker(this.flushIntervalMs);
    this.lastFlushAt = this.now();

    this.log.info(
      { batchSize: this.batchSize, flushIntervalMs: this.flushIntervalMs, sink: this.sink.kind },
      'Batch assembler started',
    );

    try {
      for (;;) {
        if (ticker.takeTick()) {
          await this.onTick();
        }

        const next = this.channel.tryReceive();

        if (next.status === 'item') {
          await this.onRecord(next.item);
          continue;
        }

        if (next.status === 'closed') {
          if (this.buffer.length > 0) {
            await this.flush('shutdown');
          }
          break;
        }

        await this.waitForActivity(ticker);
      }
    } finally {
      ticker.stop();
      this.currentState = 'shutdown';
      this.channel.terminate();
    }

    this.log.info(
      { flushedBatches: this.batches, flushedRecords: this.records },
      'Batch assembler stopped',
    );
  }

  private async onRecord(record: FlatRecord): Promise<void> {
    this.buffer.push(record);
    if (this.buffer.length >= this.batchSize) {
      await this.flush('size');
    }
  }

  private async onTick(): Promise<void> {
    // The tick period equals the interval, so this holds on almost every
    // tick; it still decides the cadence when the timer fires early.
    if (this.buffer.length > 0 && this.now() - this.lastFlushAt > this.flushIntervalMs) {
      await this.flush('interval');
    }
  }

  private async flush(trigger: FlushTrigger): Promise<void> {
    const batch = this.buffer;
    this.buffer = [];
    this.currentState = 'flushing';

    try {
      await this.sink.flush(batch);
    } catch (err: unknown) {
      if (err instanceof SinkIOError) throw err;
      throw new SinkIOError(`${this.sink.kind} sink failed to flush ${batch.length} records`, {
        cause: err,
      });
    }

    this.currentState = 'buffering';
    this.lastFlushAt = this.now();
    this.batches++;
    this.records += batch.length;

    this.log.debug({ trigger, count: batch.length, sink: this.sink.kind }, 'Batch flushed');
  }

  /** Parks until the channel becomes readable or the ticker fires. */
  private waitForActivity(ticker: IntervalTicker): Promise<void> {
    return new Promise<void>((resolve) => {
      const wake = (): void => {
        stopChannel();
        stopTicker();
        resolve();
      };
      const stopChannel = this.channel.onceReadable(wake);
      const stopTicker = ticker.onceTick(wake);
    });
  }
}
