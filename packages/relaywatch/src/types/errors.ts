/**
 * Error codes for the relay.
 * Session-level codes stay inside the session; only credential
 * acquisition failures are fatal to the process.
 */

export enum ErrorCode {
  /** Generic/unspecified error */
  ERR_UNKNOWN = 1,

  /** Upstream could not be reached or rejected the login */
  ERR_DIAL_FAILED = 2,

  /** Interactive login was aborted or rejected */
  ERR_AUTH_FAILED = 3,

  /** Cached credentials can no longer be renewed */
  ERR_AUTH_EXPIRED = 4,

  /** No usable credentials on disk */
  ERR_CREDENTIALS_NOT_FOUND = 5,

  /** Credentials could not be written */
  ERR_PERSIST_FAILED = 6,

  /** Reading a packet failed */
  ERR_READ_FAILED = 7,

  /** Writing a packet failed */
  ERR_WRITE_FAILED = 8,

  /** Remote side disconnected with a reason */
  ERR_REMOTE_DISCONNECT = 9,

  /** Connection closed */
  ERR_CONNECTION_CLOSED = 10,

  /** Start-up handshake step failed */
  ERR_HANDSHAKE_FAILED = 11,

  /** Client login failed */
  ERR_LOGIN_FAILED = 12,

  /** Timeout */
  ERR_TIMEOUT = 13,

  /** Frame too large */
  ERR_MESSAGE_TOO_LARGE = 14,

  /** Invalid packet encoding */
  ERR_INVALID_PACKET = 15,

  /** Listener closed */
  ERR_LISTENER_CLOSED = 16,

  /** Invalid configuration */
  ERR_INVALID_CONFIG = 17,
}

/**
 * Get human-readable description for error code
 */
export function getErrorMessage(code: ErrorCode): string {
  const messages: Record<ErrorCode, string> = {
    [ErrorCode.ERR_UNKNOWN]: 'Unknown error',
    [ErrorCode.ERR_DIAL_FAILED]: 'Failed to connect to upstream',
    [ErrorCode.ERR_AUTH_FAILED]: 'Authentication failed',
    [ErrorCode.ERR_AUTH_EXPIRED]: 'Credentials expired',
    [ErrorCode.ERR_CREDENTIALS_NOT_FOUND]: 'No cached credentials',
    [ErrorCode.ERR_PERSIST_FAILED]: 'Failed to persist credentials',
    [ErrorCode.ERR_READ_FAILED]: 'Read failed',
    [ErrorCode.ERR_WRITE_FAILED]: 'Write failed',
    [ErrorCode.ERR_REMOTE_DISCONNECT]: 'Remote disconnected',
    [ErrorCode.ERR_CONNECTION_CLOSED]: 'Connection closed',
    [ErrorCode.ERR_HANDSHAKE_FAILED]: 'Handshake failed',
    [ErrorCode.ERR_LOGIN_FAILED]: 'Client login failed',
    [ErrorCode.ERR_TIMEOUT]: 'Operation timed out',
    [ErrorCode.ERR_MESSAGE_TOO_LARGE]: 'Message too large',
    [ErrorCode.ERR_INVALID_PACKET]: 'Invalid packet',
    [ErrorCode.ERR_LISTENER_CLOSED]: 'Listener closed',
    [ErrorCode.ERR_INVALID_CONFIG]: 'Invalid configuration',
  };
  return messages[code] ?? 'Unknown error';
}

/**
 * Custom error class for relay errors
 */
export class RelayError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message?: string,
    options?: { cause?: unknown }
  ) {
    super(message ?? getErrorMessage(code), options);
    this.name = 'RelayError';
  }
}

/**
 * The remote side closed the connection and told us why.
 * The reason is forwarded to the other peer of a session.
 */
export class RemoteDisconnectError extends RelayError {
  constructor(public readonly reason: string) {
    super(ErrorCode.ERR_REMOTE_DISCONNECT, reason);
    this.name = 'RemoteDisconnectError';
  }
}

/**
 * Check whether an error carries the given code
 */
export function hasErrorCode(err: unknown, code: ErrorCode): err is RelayError {
  return err instanceof RelayError && err.code === code;
}

/**
 * Find a remote disconnect in the error or anywhere in its cause chain
 */
export function findRemoteDisconnect(err: unknown): RemoteDisconnectError | null {
  let current: unknown = err;
  const seen = new Set<unknown>();
  while (current instanceof Error && !seen.has(current)) {
    if (current instanceof RemoteDisconnectError) {
      return current;
    }
    seen.add(current);
    current = current.cause;
  }
  return null;
}

/**
 * Normalize an unknown thrown value to an Error
 */
export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
