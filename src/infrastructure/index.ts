export { loadServiceConfig, LOG_LEVELS } from './config/index.js';
export type { ServiceConfig, OutputConfig, LogLevel } from './config/index.js';
export { DiskSink, UdpSink, createSink, encodeLines, encodeDatagram } from './sinks/index.js';
export { pipelinePlugin } from './pipeline/index.js';
export type { PipelinePluginOptions } from './pipeline/index.js';
