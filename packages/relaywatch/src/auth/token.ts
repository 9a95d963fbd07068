/**
 * Authentication token and its on-disk form.
 */

import { z } from 'zod';
import { sha256 } from '@noble/hashes/sha256';
import { bytesToHex } from '@noble/hashes/utils';

export interface Token {
  readonly accessToken: string;
  readonly tokenType: string;
  readonly refreshToken?: string;
  /** ISO-8601 expiry; absent means the token does not expire */
  readonly expiry?: string;
}

/** Tokens this close to expiry are treated as expired */
const EXPIRY_LEEWAY_MS = 10_000;

/**
 * Persisted layout: the OAuth2 token JSON (snake_case keys)
 */
export const tokenFileSchema = z
  .object({
    access_token: z.string().min(1),
    token_type: z.string().default('bearer'),
    refresh_token: z.string().optional(),
    expiry: z.string().datetime({ offset: true }).optional(),
  })
  .transform((file): Token => ({
    accessToken: file.access_token,
    tokenType: file.token_type,
    refreshToken: file.refresh_token,
    expiry: file.expiry,
  }));

export function serializeToken(token: Token): string {
  return JSON.stringify(
    {
      access_token: token.accessToken,
      token_type: token.tokenType,
      refresh_token: token.refreshToken,
      expiry: token.expiry,
    },
    null,
    2
  );
}

export function isTokenValid(token: Token, now: number = Date.now()): boolean {
  if (!token.accessToken) {
    return false;
  }
  if (token.expiry === undefined) {
    return true;
  }
  return Date.parse(token.expiry) - EXPIRY_LEEWAY_MS > now;
}

/**
 * Short identifier for logs; never log the token itself
 */
export function tokenFingerprint(token: Token): string {
  return bytesToHex(sha256(new TextEncoder().encode(token.accessToken)).slice(0, 8));
}

/**
 * Expiry timestamp `seconds` from now
 */
export function expiryIn(seconds: number, now: number = Date.now()): string {
  return new Date(now + seconds * 1000).toISOString();
}
