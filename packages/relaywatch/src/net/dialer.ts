/**
 * TCP dialer for the upstream connection
 */

import * as net from 'node:net';
import type { Logger } from 'pino';
import { Locator, formatLocator } from '../types/locator.js';
import { ErrorCode, RelayError, toError } from '../types/errors.js';
import type { ClientData } from '../types/packets.js';
import { silentLogger } from '../utils/logger.js';
import type { AccessTokenSource, Dialer, UpstreamConnection } from './connection.js';
import { UpstreamSocketConnection } from './socket-connection.js';

export interface DialOptions {
  /** Connection timeout in milliseconds */
  timeout?: number;
}

const DEFAULT_TIMEOUT = 10000; // 10 seconds

/**
 * Open a TCP connection
 */
export function dial(locator: Locator, options: DialOptions = {}): Promise<net.Socket> {
  return new Promise((resolve, reject) => {
    const timeout = options.timeout ?? DEFAULT_TIMEOUT;
    const socket = new net.Socket();
    let connected = false;

    const timeoutId = setTimeout(() => {
      if (!connected) {
        socket.destroy();
        reject(new RelayError(ErrorCode.ERR_TIMEOUT, `Connection timeout after ${timeout}ms`));
      }
    }, timeout);

    socket.once('connect', () => {
      connected = true;
      clearTimeout(timeoutId);
      resolve(socket);
    });

    socket.once('error', (err) => {
      clearTimeout(timeoutId);
      if (!connected) {
        reject(new RelayError(ErrorCode.ERR_CONNECTION_CLOSED, `Connection failed: ${err.message}`, { cause: err }));
      }
    });

    socket.connect(locator.port, locator.host);
  });
}

/**
 * Apply the socket options both sides of the relay use
 */
export function configureSocket(socket: net.Socket): void {
  // Enable keep-alive
  socket.setKeepAlive(true, 30000);
  // Disable Nagle's algorithm for lower latency
  socket.setNoDelay(true);
}

export interface TcpDialerOptions {
  /** Connect timeout in ms */
  dialTimeoutMs?: number;
  /** Timeout for each wait during login and spawn, in ms */
  handshakeTimeoutMs?: number;
  /** Chunk radius requested from the upstream */
  chunkRadius?: number;
  logger?: Logger;
}

/**
 * Dials the upstream and logs in on behalf of a client
 */
export class TcpDialer implements Dialer {
  private readonly logger: Logger;

  constructor(private readonly options: TcpDialerOptions = {}) {
    this.logger = options.logger ?? silentLogger();
  }

  async dial(
    target: Locator,
    clientData: ClientData,
    credentials: AccessTokenSource
  ): Promise<UpstreamConnection> {
    const address = formatLocator(target);
    let connection: UpstreamSocketConnection | null = null;

    try {
      const token = await credentials.token();
      const socket = await dial(target, { timeout: this.options.dialTimeoutMs });
      configureSocket(socket);

      connection = new UpstreamSocketConnection(socket, {
        handshakeTimeoutMs: this.options.handshakeTimeoutMs,
        chunkRadius: this.options.chunkRadius,
        logger: this.logger,
      });
      await connection.login(clientData, token.accessToken);

      this.logger.debug({ upstream: address, world: connection.gameData.worldName }, 'Upstream login complete');
      return connection;
    } catch (err) {
      if (connection) {
        await connection.close();
      }
      throw new RelayError(
        ErrorCode.ERR_DIAL_FAILED,
        `Failed to connect to ${address}: ${toError(err).message}`,
        { cause: err }
      );
    }
  }
}
