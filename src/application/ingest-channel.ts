import { QueueClosedError } from '../domain/index.js';

export type ReceiveResult<T> =
  | { readonly status: 'item'; readonly item: T }
  | { readonly status: 'empty' }
  | { readonly status: 'closed' };

const EMPTY = { status: 'empty' } as const;
const CLOSED = { status: 'closed' } as const;

/**
 * Unbounded FIFO handoff between request handlers and the batch worker.
 *
 * Any number of producers call `send()`; exactly one consumer polls with
 * `tryReceive()` and parks on `onceReadable()`. `send()` never waits. There
 * is no capacity limit, so a stalled consumer makes the queue grow without
 * bound.
 *
 * Two ways to end it:
 * - `close()`: producers are done. The consumer drains what is queued, then
 *   sees `closed`.
 * - `terminate()`: the consumer is gone. Queued items are dropped.
 *
 * After either, `send()` throws `QueueClosedError`, permanently.
 */
export class IngestChannel<T extends object> {
  private items: T[] = [];
  private head = 0;
  private inputClosed = false;
  private consumerGone = false;
  private readableListener: (() => void) | null = null;

  /** Items queued and not yet received. */
  get size(): number {
    return this.items.length - this.head;
  }

  /** True once `send()` can no longer succeed. */
  get closed(): boolean {
    return this.inputClosed || this.consumerGone;
  }

  send(item: T): void {
    if (this.closed) {
      throw new QueueClosedError();
    }
    this.items.push(item);
    this.notifyReadable();
  }

  tryReceive(): ReceiveResult<T> {
    if (this.consumerGone) return CLOSED;

    const item = this.items[this.head];
    if (item !== undefined) {
      this.head++;
      this.compact();
      return { status: 'item', item };
    }

    return this.inputClosed ? CLOSED : EMPTY;
  }

  /**
   * Calls `listener` once, on the next send, close or terminate.
   * Only one listener is held; registering replaces the previous one.
   * Returns a function that unregisters it.
   */
  onceReadable(listener: () => void): () => void {
    this.readableListener = listener;
    return () => {
      if (this.readableListener === listener) {
        this.readableListener = null;
      }
    };
  }

  close(): void {
    if (this.inputClosed) return;
    this.inputClosed = true;
    this.notifyReadable();
  }

  terminate(): void {
    if (this.consumerGone) return;
    this.consumerGone = true;
    this.items = [];
    this.head = 0;
    this.notifyReadable();
  }

  private notifyReadable(): void {
    const listener = this.readableListener;
    if (listener === null) return;
    this.readableListener = null;
    listener();
  }

  // Drop the consumed prefix once it dominates the backing array.
  private compact(): void {
    if (this.head === this.items.length) {
      this.items = [];
      this.head = 0;
    } else if (this.head > 1024 && this.head * 2 > this.items.length) {
      this.items = this.items.slice(this.head);
      this.head = 0;
    }
  }
}
