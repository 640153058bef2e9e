import type { Logger } from 'pino';
import type { FlatRecord, OutputMode, Sink } from '../domain/index.js';
import { IngestChannel } from './ingest-channel.js';
import { BatchAssembler } from './batch-assembler.js';
import type { AssemblerState, BatchAssemblerOptions } from './batch-assembler.js';

export interface PipelineStatus {
  worker: AssemblerState;
  pending: number;
  buffered: number;
  flushedBatches: number;
  flushedRecords: number;
  sink: OutputMode;
}

/**
 * Owns the channel, the batch worker and the sink for the lifetime of the
 * process. Constructed once at startup and handed to the HTTP layer.
 */
export class IngestPipeline {
  readonly channel = new IngestChannel<FlatRecord>();
  private readonly assembler: BatchAssembler;
  private running: Promise<void> | null = null;
  private stopping: Promise<void> | null = null;
  private failure: unknown = null;

  constructor(
    private readonly sink: Sink,
    private readonly log: Logger,
    options: BatchAssemblerOptions,
  ) {
    this.assembler = new BatchAssembler(this.channel, sink, log, options);
  }

  /** Error that stopped the worker, or `null` while it is healthy. */
  get workerFailure(): unknown {
    return this.failure;
  }

  /**
   * Opens the sink, then starts the worker in the background.
   * A sink that cannot be opened fails startup.
   */
  async start(): Promise<void> {
    if (this.running) return;

    await this.sink.open();

    this.running = this.assembler.run().catch((err: unknown) => {
      this.failure = err;
      this.log.fatal({ err }, 'Batch worker stopped; all further submissions will be refused');
    });
  }

  /**
   * Enqueues records in order. Throws `QueueClosedError` once the worker
   * is gone; records sent before the failure stay queued.
   */
  submit(records: Iterable<FlatRecord>): number {
    let count = 0;
    for (const record of records) {
      this.channel.send(record);
      count++;
    }
    return count;
  }

  /** Closes the channel, waits for the final flush, then closes the sink. */
  shutdown(): Promise<void> {
    this.stopping ??= this.stop();
    return this.stopping;
  }

  status(): PipelineStatus {
    return {
      worker: this.assembler.state,
      pending: this.channel.size,
      buffered: this.assembler.buffered,
      flushedBatches: this.assembler.flushedBatches,
      flushedRecords: this.assembler.flushedRecords,
      sink: this.sink.kind,
    };
  }

  private async stop(): Promise<void> {
    this.channel.close();

    if (this.running) {
      await this.running;
      await this.sink.close();
    }

    this.log.info(this.status(), 'Ingest pipeline shut down');
  }
}
