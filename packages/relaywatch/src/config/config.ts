/**
 * Relay configuration: defaults and validation.
 */

import { z } from 'zod';
import { ErrorCode, RelayError } from '../types/errors.js';
import { DEFAULT_TOKEN_FILE } from '../auth/credential-store.js';
import {
  DEFAULT_CLIENT_ID,
  DEFAULT_SCOPE,
  LIVE_DEVICE_CODE_URL,
  LIVE_TOKEN_URL,
} from '../auth/device-code.js';

export const DEFAULT_LISTEN = { host: '0.0.0.0', port: 19132 } as const;
export const DEFAULT_UPSTREAM = { host: '127.0.0.1', port: 19134 } as const;

const locatorSchema = z.object({
  host: z.string().min(1),
  port: z.number().int().min(0).max(65535),
});

export const RelayConfigSchema = z.object({
  listen: locatorSchema.default(DEFAULT_LISTEN),
  upstream: locatorSchema.default(DEFAULT_UPSTREAM),
  tokenFile: z.string().min(1).default(DEFAULT_TOKEN_FILE),
  dialTimeoutMs: z.number().int().positive().default(10000),
  handshakeTimeoutMs: z.number().int().positive().default(30000),
  log: z
    .object({
      level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
      format: z.enum(['pretty', 'json']).default('pretty'),
    })
    .default({}),
  auth: z
    .object({
      clientId: z.string().min(1).default(DEFAULT_CLIENT_ID),
      scope: z.string().min(1).default(DEFAULT_SCOPE),
      deviceCodeUrl: z.string().url().default(LIVE_DEVICE_CODE_URL),
      tokenUrl: z.string().url().default(LIVE_TOKEN_URL),
    })
    .default({}),
});

export type RelayConfigInput = z.input<typeof RelayConfigSchema>;
export type ResolvedRelayConfig = z.output<typeof RelayConfigSchema>;

/**
 * Apply defaults and validate
 */
export function resolveConfig(input: unknown = {}): ResolvedRelayConfig {
  const result = RelayConfigSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new RelayError(ErrorCode.ERR_INVALID_CONFIG, `Invalid configuration: ${issues}`, {
      cause: result.error,
    });
  }
  return result.data;
}
