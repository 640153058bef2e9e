import { open } from 'node:fs/promises';
import type { FileHandle } from 'node:fs/promises';
import type { Logger } from 'pino';
import { SinkIOError } from '../../domain/index.js';
import type { FlatRecord, Sink } from '../../domain/index.js';
import { encodeLines } from './encoding.js';

/**
 * Appends batches to a newline-delimited JSON file.
 *
 * The file is opened once in append mode (created if missing) and held
 * open until `close()`. Writes go to the OS without fsync, so a crash can
 * lose what the kernel has not yet written out.
 */
export class DiskSink implements Sink {
  readonly kind = 'disk';
  private handle: FileHandle | null = null;

  constructor(
    private readonly path: string,
    private readonly log: Logger,
  ) {}

  async open(): Promise<void> {
    if (this.handle) return;

    try {
      this.handle = await open(this.path, 'a');
    } catch (err: unknown) {
      throw new SinkIOError(`Failed to open output file ${this.path}`, { cause: err });
    }

    this.log.info({ path: this.path }, 'Disk sink opened');
  }

  async flush(batch: readonly FlatRecord[]): Promise<void> {
    if (!this.handle) {
      throw new SinkIOError('Disk sink is not open');
    }
    if (batch.length === 0) return;

    try {
      await this.handle.appendFile(encodeLines(batch), 'utf-8');
    } catch (err: unknown) {
      throw new SinkIOError(`Failed to write ${batch.length} records to ${this.path}`, { cause: err });
    }

    this.log.debug({ path: this.path, count: batch.length }, 'Wrote batch to disk');
  }

  async close(): Promise<void> {
    const handle = this.handle;
    if (!handle) return;
    this.handle = null;

    try {
      await handle.close();
    } catch (err: unknown) {
      throw new SinkIOError(`Failed to close output file ${this.path}`, { cause: err });
    }

    this.log.info({ path: this.path }, 'Disk sink closed');
  }
}
