export { loadServiceConfig, LOG_LEVELS } from './config.js';
export type { ServiceConfig, OutputConfig, LogLevel } from './config.js';
