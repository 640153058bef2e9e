import { z } from 'zod';
import { ConfigError } from '../../domain/index.js';

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export type OutputConfig =
  | { mode: 'disk'; file: string }
  | { mode: 'udp'; host: string; port: number };

/**
 * Validated service configuration. Built once at startup and passed to the
 * sink, the pipeline and the HTTP server.
 */
export interface ServiceConfig {
  host: string;
  port: number;
  batchSize: number;
  flushIntervalMs: number;
  logLevel: LogLevel;
  output: OutputConfig;
}

/**
 * Environment variables and their defaults.
 *
 * Every output variable is validated whichever mode is selected, so a typo
 * in an unused one still fails startup.
 */
const envSchema = z.object({
  HOST: z.string().min(1).default('0.0.0.0'),
  PORT: z.coerce.number().int().min(0).max(65535).default(8080),
  BATCH_SIZE: z.coerce.number().int().positive().default(100),
  OUTPUT_MODE: z.enum(['disk', 'udp'], {
    errorMap: () => ({ message: 'OUTPUT_MODE must be one of: disk, udp' }),
  }).default('disk'),
  OUTPUT_FILE: z.string().min(1).default('collectd.out'),
  UDP_HOST: z.string().min(1).default('localhost'),
  UDP_PORT: z.coerce.number().int().min(1).max(65535).default(9999),
  FLUSH_INTERVAL_MS: z.coerce.number().int().positive().default(1000),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
});

/**
 * Loads the service configuration from the environment.
 *
 * Throws `ConfigError` with every zod issue when a value is invalid;
 * the bootstrap treats that as fatal.
 */
export function loadServiceConfig(
  env: Record<string, string | undefined> = process.env,
): ServiceConfig {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    const summary = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration: ${summary}`, parsed.error.issues);
  }

  const e = parsed.data;

  const output: OutputConfig = e.OUTPUT_MODE === 'disk'
    ? { mode: 'disk', file: e.OUTPUT_FILE }
    : { mode: 'udp', host: e.UDP_HOST, port: e.UDP_PORT };

  return {
    host: e.HOST,
    port: e.PORT,
    batchSize: e.BATCH_SIZE,
    flushIntervalMs: e.FLUSH_INTERVAL_MS,
    logLevel: e.LOG_LEVEL,
    output,
  };
}
