/**
 * Logging setup. The CLI creates one root logger; library components take a
 * Logger and derive children from it.
 */

import pino from 'pino';
import type { Logger } from 'pino';

export type { Logger } from 'pino';

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';
export type LogFormat = 'pretty' | 'json';

export interface LogConfig {
  level: LogLevel;
  format: LogFormat;
}

const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];
const LOG_FORMATS: readonly LogFormat[] = ['pretty', 'json'];

function isLogLevel(value: string | undefined): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function isLogFormat(value: string | undefined): value is LogFormat {
  return LOG_FORMATS.some((format) => format === value);
}

/**
 * Apply RELAYWATCH_LOG / RELAYWATCH_LOG_FORMAT on top of the configured values
 */
export function resolveLogConfig(
  configured: Partial<LogConfig> = {},
  env: NodeJS.ProcessEnv = process.env
): LogConfig {
  const envLevel = env.RELAYWATCH_LOG;
  const envFormat = env.RELAYWATCH_LOG_FORMAT;

  return {
    level: isLogLevel(envLevel) ? envLevel : configured.level ?? 'info',
    format: isLogFormat(envFormat) ? envFormat : configured.format ?? 'pretty',
  };
}

export function createRootLogger(config: LogConfig): Logger {
  const transport =
    config.format === 'pretty'
      ? {
          target: 'pino-pretty',
          options: {
            colorize: true,
            singleLine: true,
            ignore: 'pid,hostname',
          },
        }
      : undefined;

  return pino({
    level: config.level,
    transport,
  });
}

/**
 * Logger used when a component is constructed without one
 */
export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}
