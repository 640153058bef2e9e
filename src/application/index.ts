export {
  jsonValueSchema,
  rawSubmissionSchema,
  rawSubmissionBatchSchema,
} from './submission-schema.js';
export type { RawSubmissionInput } from './submission-schema.js';
export {
  parseSubmissionBody,
  resolvePayload,
  normalizeSubmission,
  normalizeSubmissions,
} from './normalizer.js';
export { IngestChannel } from './ingest-channel.js';
export type { ReceiveResult } from './ingest-channel.js';
export { IntervalTicker } from './interval-ticker.js';
export { BatchAssembler } from './batch-assembler.js';
export type { AssemblerState, FlushTrigger, BatchAssemblerOptions } from './batch-assembler.js';
export { IngestPipeline } from './ingest-pipeline.js';
export type { PipelineStatus } from './ingest-pipeline.js';
