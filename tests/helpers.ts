import { pino } from 'pino';
import type { Logger } from 'pino';
import type { FlatRecord, JsonValue, Sink } from '../src/domain/index.js';

/** Logger that drops everything; spy on its methods where a test needs to. */
export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}

/** FlatRecord factory with every metadata field set. */
export function fakeRecord(value: JsonValue, overrides: Partial<FlatRecord> = {}): FlatRecord {
  return {
    time: overrides.time ?? 1700000000.5,
    host: overrides.host ?? 'web-01',
    plugin: overrides.plugin ?? 'cpu',
    plugin_instance: overrides.plugin_instance ?? '0',
    type: overrides.type ?? 'gauge',
    type_instance: overrides.type_instance ?? 'idle',
    value,
  };
}

/** In-memory sink that keeps every batch it is handed. */
export class RecordingSink implements Sink {
  readonly kind = 'disk';
  readonly batches: FlatRecord[][] = [];
  opened = false;
  closed = false;

  async open(): Promise<void> {
    this.opened = true;
  }

  async flush(batch: readonly FlatRecord[]): Promise<void> {
    this.batches.push([...batch]);
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  /** All flushed values, flattened in flush order. */
  values(): JsonValue[] {
    return this.batches.flat().map((r) => r.value);
  }
}

/** Sink whose flush fails with the given error. */
export class FailingSink extends RecordingSink {
  flushCalls = 0;

  constructor(private readonly error: Error) {
    super();
  }

  override async flush(): Promise<void> {
    this.flushCalls++;
    throw this.error;
  }
}

/** Sink whose flushes stay pending until released. */
export class GatedSink extends RecordingSink {
  private releaseGate: (() => void) | null = null;

  override flush(batch: readonly FlatRecord[]): Promise<void> {
    this.batches.push([...batch]);
    return new Promise<void>((resolve) => {
      this.releaseGate = resolve;
    });
  }

  release(): void {
    const release = this.releaseGate;
    this.releaseGate = null;
    release?.();
  }
}
