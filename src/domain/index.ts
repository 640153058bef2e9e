export type {
  JsonValue,
  RawSubmission,
  MetricPayload,
  MetricMetadata,
  FlatRecord,
} from './metric.js';
export type { Sink, OutputMode } from './sink.js';
export type { RelayErrorCode } from './errors.js';
export { RelayError, ParseError, QueueClosedError, SinkIOError, ConfigError } from './errors.js';
