/**
 * OAuth 2.0 device authorization grant (RFC 8628).
 *
 * The user is shown a code and a URL, logs in on any device, and we poll the
 * token endpoint until the login completes, is refused, or the code expires.
 */

import { z } from 'zod';
import { ErrorCode, RelayError } from '../types/errors.js';
import { Token, expiryIn } from './token.js';
import type { AuthProvider } from './token-source.js';

export const LIVE_DEVICE_CODE_URL = 'https://login.live.com/oauth20_connect.srf';
export const LIVE_TOKEN_URL = 'https://login.live.com/oauth20_token.srf';
export const DEFAULT_CLIENT_ID = '0000000048183522';
export const DEFAULT_SCOPE = 'service::user.auth.xboxlive.com::MBI_SSL';

const DEVICE_CODE_GRANT = 'urn:ietf:params:oauth:grant-type:device_code';

export interface DeviceCodePrompt {
  verificationUri: string;
  userCode: string;
  /** Seconds until the code expires */
  expiresIn: number;
}

export interface DeviceCodeAuthOptions {
  clientId?: string;
  scope?: string;
  deviceCodeUrl?: string;
  tokenUrl?: string;
  /** Called once the user code is known */
  onPrompt?: (prompt: DeviceCodePrompt) => void;
  fetch?: typeof fetch;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

const deviceCodeResponseSchema = z.object({
  device_code: z.string(),
  user_code: z.string(),
  verification_uri: z.string(),
  expires_in: z.number().positive(),
  interval: z.number().positive().default(5),
});

const tokenResponseSchema = z.object({
  access_token: z.string().min(1),
  token_type: z.string().default('bearer'),
  refresh_token: z.string().optional(),
  expires_in: z.number().positive().optional(),
});

const errorResponseSchema = z.object({
  error: z.string(),
  error_description: z.string().optional(),
});

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export class DeviceCodeAuthProvider implements AuthProvider {
  private readonly config: Required<Omit<DeviceCodeAuthOptions, 'onPrompt'>>;
  private readonly onPrompt: (prompt: DeviceCodePrompt) => void;

  constructor(options: DeviceCodeAuthOptions = {}) {
    this.config = {
      clientId: options.clientId ?? DEFAULT_CLIENT_ID,
      scope: options.scope ?? DEFAULT_SCOPE,
      deviceCodeUrl: options.deviceCodeUrl ?? LIVE_DEVICE_CODE_URL,
      tokenUrl: options.tokenUrl ?? LIVE_TOKEN_URL,
      fetch: options.fetch ?? globalThis.fetch.bind(globalThis),
      sleep: options.sleep ?? defaultSleep,
      now: options.now ?? Date.now,
    };
    this.onPrompt = options.onPrompt ?? (() => undefined);
  }

  async obtainInteractive(): Promise<Token> {
    const response = await this.post(this.config.deviceCodeUrl, {
      client_id: this.config.clientId,
      scope: this.config.scope,
      response_type: 'device_code',
    });
    const body: unknown = await response.json();
    const deviceCode = deviceCodeResponseSchema.safeParse(body);
    if (!response.ok || !deviceCode.success) {
      throw new RelayError(
        ErrorCode.ERR_AUTH_FAILED,
        `Device code request failed (HTTP ${response.status})${describeError(body)}`
      );
    }

    const { device_code, user_code, verification_uri, expires_in } = deviceCode.data;
    this.onPrompt({ verificationUri: verification_uri, userCode: user_code, expiresIn: expires_in });

    let intervalMs = deviceCode.data.interval * 1000;
    const deadline = this.config.now() + expires_in * 1000;

    while (this.config.now() < deadline) {
      await this.config.sleep(intervalMs);

      const poll = await this.post(this.config.tokenUrl, {
        client_id: this.config.clientId,
        grant_type: DEVICE_CODE_GRANT,
        device_code,
      });
      const pollBody: unknown = await poll.json();
      if (poll.ok) {
        return this.toToken(pollBody);
      }

      const error = errorResponseSchema.safeParse(pollBody);
      const code = error.success ? error.data.error : `HTTP ${poll.status}`;
      switch (code) {
        case 'authorization_pending':
          continue;
        case 'slow_down':
          intervalMs += 5000;
          continue;
        default:
          throw new RelayError(ErrorCode.ERR_AUTH_FAILED, `Device login refused: ${code}${describeError(pollBody)}`);
      }
    }

    throw new RelayError(ErrorCode.ERR_AUTH_FAILED, 'Device code expired before the login completed');
  }

  async refresh(token: Token): Promise<Token> {
    if (!token.refreshToken) {
      throw new RelayError(ErrorCode.ERR_AUTH_EXPIRED, 'Token has no refresh token');
    }

    const response = await this.post(this.config.tokenUrl, {
      client_id: this.config.clientId,
      scope: this.config.scope,
      grant_type: 'refresh_token',
      refresh_token: token.refreshToken,
    });
    const body: unknown = await response.json();
    if (response.ok) {
      return this.toToken(body, token.refreshToken);
    }

    const error = errorResponseSchema.safeParse(body);
    if (error.success && error.data.error === 'invalid_grant') {
      throw new RelayError(ErrorCode.ERR_AUTH_EXPIRED, `Refresh token rejected${describeError(body)}`);
    }
    throw new RelayError(ErrorCode.ERR_AUTH_FAILED, `Token refresh failed (HTTP ${response.status})${describeError(body)}`);
  }

  private toToken(body: unknown, previousRefreshToken?: string): Token {
    const parsed = tokenResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new RelayError(ErrorCode.ERR_AUTH_FAILED, 'Token endpoint returned an unexpected response');
    }
    const { access_token, token_type, refresh_token, expires_in } = parsed.data;
    return {
      accessToken: access_token,
      tokenType: token_type,
      refreshToken: refresh_token ?? previousRefreshToken,
      expiry: expires_in === undefined ? undefined : expiryIn(expires_in, this.config.now()),
    };
  }

  private post(url: string, params: Record<string, string>): Promise<Response> {
    return this.config.fetch(url, {
      method: 'POST',
      headers: { 'content-type': 'application/x-www-form-urlencoded' },
      body: new URLSearchParams(params).toString(),
    });
  }
}

function describeError(body: unknown): string {
  const error = errorResponseSchema.safeParse(body);
  if (!error.success || !error.data.error_description) {
    return '';
  }
  return `: ${error.data.error_description}`;
}
