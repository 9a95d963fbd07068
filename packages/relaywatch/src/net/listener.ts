/**
 * TCP listener for inbound game clients
 */

import * as net from 'node:net';
import type { Logger } from 'pino';
import { Locator, createLocator, formatLocator } from '../types/locator.js';
import { ErrorCode, RelayError, toError } from '../types/errors.js';
import { silentLogger } from '../utils/logger.js';
import type { Acceptor, ClientConnection } from './connection.js';
import { ClientSocketConnection } from './socket-connection.js';
import { configureSocket } from './dialer.js';

export interface PacketListenerOptions {
  /** Host to bind to (default: '0.0.0.0') */
  host?: string;
  /** Port to bind to */
  port: number;
  /** Maximum pending connections */
  backlog?: number;
  /** Timeout for each wait during login and spawn, in ms */
  handshakeTimeoutMs?: number;
  /** Largest chunk radius granted to clients */
  maxChunkRadius?: number;
  logger?: Logger;
}

type AcceptResult =
  | { ok: true; connection: ClientConnection }
  | { ok: false; error: Error };

interface PendingAccept {
  resolve: (connection: ClientConnection) => void;
  reject: (error: Error) => void;
}

/**
 * Accepts client connections and completes their login before handing them
 * out through accept()
 */
export class PacketListener implements Acceptor {
  private readonly server: net.Server;
  private readonly logger: Logger;
  private readonly ready: AcceptResult[] = [];
  private readonly pending: PendingAccept[] = [];
  private localLocator: Locator | null = null;
  private closed = false;

  private constructor(private readonly options: PacketListenerOptions) {
    this.logger = options.logger ?? silentLogger();

    this.server = net.createServer((socket) => {
      this.handleConnection(socket);
    });
  }

  /**
   * Create a listener and wait until it is bound
   */
  static listen(options: PacketListenerOptions): Promise<PacketListener> {
    const listener = new PacketListener(options);
    return listener.start().then(() => listener);
  }

  /**
   * Get the local address the listener is bound to
   */
  get address(): Locator | null {
    return this.localLocator;
  }

  accept(): Promise<ClientConnection> {
    const next = this.ready.shift();
    if (next) {
      return next.ok ? Promise.resolve(next.connection) : Promise.reject(next.error);
    }
    if (this.closed) {
      return Promise.reject(new RelayError(ErrorCode.ERR_LISTENER_CLOSED));
    }
    return new Promise((resolve, reject) => {
      this.pending.push({ resolve, reject });
    });
  }

  /**
   * Stop accepting. Pending and later accept() calls reject with
   * ERR_LISTENER_CLOSED; sessions already running are left alone.
   */
  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;

    for (const waiter of this.pending.splice(0)) {
      waiter.reject(new RelayError(ErrorCode.ERR_LISTENER_CLOSED));
    }
    const unclaimed = this.ready.splice(0);
    await Promise.all(
      unclaimed.map((result) => (result.ok ? result.connection.close() : Promise.resolve()))
    );

    this.server.close((err) => {
      if (err) {
        this.logger.debug({ err }, 'Listener was not running');
      }
    });
  }

  private start(): Promise<void> {
    return new Promise((resolve, reject) => {
      const onError = (err: Error): void => {
        reject(new RelayError(ErrorCode.ERR_UNKNOWN, `Cannot listen: ${err.message}`, { cause: err }));
      };
      this.server.once('error', onError);

      this.server.listen(
        {
          host: this.options.host ?? '0.0.0.0',
          port: this.options.port,
          backlog: this.options.backlog,
        },
        () => {
          this.server.off('error', onError);
          this.server.on('error', (err) => {
            this.logger.error({ err }, 'Listener error');
          });

          const addr = this.server.address();
          if (addr && typeof addr === 'object') {
            this.localLocator = createLocator(addr.address, addr.port);
          }
          resolve();
        }
      );
    });
  }

  private handleConnection(socket: net.Socket): void {
    const remote = socket.remoteAddress && socket.remotePort
      ? formatLocator(createLocator(socket.remoteAddress, socket.remotePort))
      : 'unknown';

    if (this.closed) {
      socket.destroy();
      return;
    }

    configureSocket(socket);
    const connection = new ClientSocketConnection(socket, {
      handshakeTimeoutMs: this.options.handshakeTimeoutMs,
      maxChunkRadius: this.options.maxChunkRadius,
      logger: this.logger,
    });

    void connection.login().then(
      () => {
        this.logger.debug({ remote, client: connection.clientData.displayName }, 'Client logged in');
        this.push({ ok: true, connection });
      },
      async (err: unknown) => {
        await connection.close();
        this.push({
          ok: false,
          error: new RelayError(
            ErrorCode.ERR_LOGIN_FAILED,
            `Client login from ${remote} failed: ${toError(err).message}`,
            { cause: err }
          ),
        });
      }
    );
  }

  private push(result: AcceptResult): void {
    if (this.closed) {
      if (result.ok) {
        void result.connection.close();
      }
      return;
    }

    const waiter = this.pending.shift();
    if (!waiter) {
      this.ready.push(result);
    } else if (result.ok) {
      waiter.resolve(result.connection);
    } else {
      waiter.reject(result.error);
    }
  }
}
