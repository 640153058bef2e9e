import type { ZodIssue } from 'zod';

export type RelayErrorCode =
  | 'PARSE_ERROR'
  | 'QUEUE_CLOSED'
  | 'SINK_IO'
  | 'CONFIG_INVALID';

/** Base class for every failure the relay reports on purpose. */
export abstract class RelayError extends Error {
  abstract readonly code: RelayErrorCode;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Request body is not JSON, or matches neither the single nor the array form. */
export class ParseError extends RelayError {
  override readonly code = 'PARSE_ERROR';
  readonly issues: readonly ZodIssue[];

  constructor(message: string, options?: ErrorOptions & { issues?: readonly ZodIssue[] }) {
    super(message, options);
    this.issues = options?.issues ?? [];
  }
}

/** The batch worker is gone; nothing can be enqueued any more. */
export class QueueClosedError extends RelayError {
  override readonly code = 'QUEUE_CLOSED';

  constructor(message = 'Ingest channel is closed') {
    super(message);
  }
}

/** A sink failed to open, write, transmit or close. */
export class SinkIOError extends RelayError {
  override readonly code = 'SINK_IO';
}

/** Startup configuration did not validate. */
export class ConfigError extends RelayError {
  override readonly code = 'CONFIG_INVALID';
  readonly issues: readonly ZodIssue[];

  constructor(message: string, issues: readonly ZodIssue[]) {
    super(message);
    this.issues = issues;
  }
}
