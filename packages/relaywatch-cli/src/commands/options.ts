/**
 * Option parsing shared by the commands
 */

import { InvalidArgumentError, Option } from 'commander';
import { DEFAULT_UPSTREAM, parseLocator } from 'relaywatch';
import type { Locator, LogFormat, LogLevel, RelayConfigInput } from 'relaywatch';

const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];
const LOG_FORMATS: readonly LogFormat[] = ['pretty', 'json'];

export interface CommonOptions {
  tokenFile?: string;
  logLevel?: LogLevel;
  logFormat?: LogFormat;
}

export interface StartOptions extends CommonOptions {
  host?: string;
  port?: number;
  listen?: Locator;
  dialTimeout?: number;
  handshakeTimeout?: number;
}

export function parsePort(value: string): number {
  const port = Number(value);
  if (!/^\d+$/.test(value) || port > 65535) {
    throw new InvalidArgumentError('Not a port number.');
  }
  return port;
}

export function parseMilliseconds(value: string): number {
  const ms = Number(value);
  if (!/^\d+$/.test(value) || ms === 0) {
    throw new InvalidArgumentError('Not a positive number of milliseconds.');
  }
  return ms;
}

export function parseAddress(value: string): Locator {
  try {
    return parseLocator(value);
  } catch (err) {
    throw new InvalidArgumentError(err instanceof Error ? err.message : String(err));
  }
}

export function tokenFileOption(): Option {
  return new Option('--token-file <path>', 'token cache file (default: token.tok)').env(
    'RELAYWATCH_TOKEN_FILE'
  );
}

export function logLevelOption(): Option {
  return new Option('--log-level <level>', 'log level').choices(LOG_LEVELS);
}

export function logFormatOption(): Option {
  return new Option('--log-format <format>', 'log output format').choices(LOG_FORMATS);
}

/**
 * Map command line options onto the relay configuration
 */
export function toConfigInput(options: StartOptions): RelayConfigInput {
  const input: RelayConfigInput = {
    log: { level: options.logLevel, format: options.logFormat },
  };

  if (options.host !== undefined || options.port !== undefined) {
    input.upstream = {
      host: options.host ?? DEFAULT_UPSTREAM.host,
      port: options.port ?? DEFAULT_UPSTREAM.port,
    };
  }
  if (options.listen !== undefined) {
    input.listen = options.listen;
  }
  if (options.tokenFile !== undefined) {
    input.tokenFile = options.tokenFile;
  }
  if (options.dialTimeout !== undefined) {
    input.dialTimeoutMs = options.dialTimeout;
  }
  if (options.handshakeTimeout !== undefined) {
    input.handshakeTimeoutMs = options.handshakeTimeout;
  }

  return input;
}
