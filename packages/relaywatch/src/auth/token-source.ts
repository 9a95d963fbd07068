/**
 * Process-wide token handling: start-up acquisition policy and on-demand
 * refresh.
 */

import type { Logger } from 'pino';
import { ErrorCode, RelayError, hasErrorCode, toError } from '../types/errors.js';
import { silentLogger } from '../utils/logger.js';
import type { AccessTokenSource } from '../net/connection.js';
import type { CredentialStore } from './credential-store.js';
import { Token, isTokenValid, tokenFingerprint } from './token.js';

/**
 * The out-of-band login flow
 */
export interface AuthProvider {
  /** Interactive login; rejects with ERR_AUTH_FAILED when aborted or rejected */
  obtainInteractive(): Promise<Token>;
  /** Renew a token; rejects with ERR_AUTH_EXPIRED when it can no longer be renewed */
  refresh(token: Token): Promise<Token>;
}

/**
 * Holds the single active token and refreshes it when it expires.
 * Concurrent callers share one in-flight refresh.
 */
export class TokenSource implements AccessTokenSource {
  private currentToken: Token;
  private refreshing: Promise<Token> | null = null;

  constructor(
    private readonly provider: AuthProvider,
    initial: Token
  ) {
    this.currentToken = initial;
  }

  /**
   * A valid token, refreshing first if the current one has expired
   */
  async token(): Promise<Token> {
    if (isTokenValid(this.currentToken)) {
      return this.currentToken;
    }
    if (!this.refreshing) {
      this.refreshing = this.provider
        .refresh(this.currentToken)
        .then((token) => {
          this.currentToken = token;
          return token;
        })
        .finally(() => {
          this.refreshing = null;
        });
    }
    return this.refreshing;
  }

  /**
   * The token as it stands, without refreshing
   */
  current(): Token {
    return this.currentToken;
  }
}

/**
 * Start-up policy: cached token → refresh; on a missing cache or an expired
 * refresh fall back to the interactive login. Any other failure is fatal.
 */
export async function acquireToken(
  store: Pick<CredentialStore, 'load'>,
  provider: AuthProvider,
  logger: Logger = silentLogger()
): Promise<TokenSource> {
  try {
    const cached = await store.load();
    const source = new TokenSource(provider, cached);
    const token = await source.token();
    logger.info({ fingerprint: tokenFingerprint(token) }, 'Using cached token');
    return source;
  } catch (err) {
    if (hasErrorCode(err, ErrorCode.ERR_CREDENTIALS_NOT_FOUND)) {
      logger.info({ reason: err.message }, 'No usable cached token, starting interactive login');
    } else if (hasErrorCode(err, ErrorCode.ERR_AUTH_EXPIRED)) {
      logger.info('Cached token can no longer be refreshed, starting interactive login');
    } else {
      throw err;
    }
  }

  let token: Token;
  try {
    token = await provider.obtainInteractive();
  } catch (err) {
    if (hasErrorCode(err, ErrorCode.ERR_AUTH_FAILED)) {
      throw err;
    }
    throw new RelayError(ErrorCode.ERR_AUTH_FAILED, `Interactive login failed: ${toError(err).message}`, {
      cause: err,
    });
  }
  logger.info({ fingerprint: tokenFingerprint(token) }, 'Interactive login complete');
  return new TokenSource(provider, token);
}
