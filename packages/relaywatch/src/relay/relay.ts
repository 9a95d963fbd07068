/**
 * Accept loop: one session per accepted client
 */

import { EventEmitter } from 'node:events';
import type { Logger } from 'pino';
import type { Locator } from '../types/locator.js';
import { ErrorCode, hasErrorCode } from '../types/errors.js';
import type { AccessTokenSource, Acceptor, ClientConnection, Dialer } from '../net/connection.js';
import type { PacketObserver } from '../observer/observer.js';
import { Session, allocateSessionId } from '../session/session.js';
import { silentLogger } from '../utils/logger.js';

export interface RelayConfig {
  listener: Acceptor;
  dialer: Dialer;
  upstream: Locator;
  credentials: AccessTokenSource;
  observer?: PacketObserver;
  logger?: Logger;
}

export interface RelayEvents {
  session: [session: Session];
  close: [];
}

export class Relay extends EventEmitter<RelayEvents> {
  private readonly config: RelayConfig;
  private readonly logger: Logger;
  private readonly sessions = new Set<Session>();
  private serving = false;

  constructor(config: RelayConfig) {
    super();
    this.config = config;
    this.logger = (config.logger ?? silentLogger()).child({ component: 'relay' });
  }

  /**
   * Sessions that have not finished yet
   */
  get sessionCount(): number {
    return this.sessions.size;
  }

  /**
   * Accept clients until the listener is closed. Sessions keep running after
   * serve() returns.
   */
  async serve(): Promise<void> {
    if (this.serving) {
      throw new Error('Relay is already serving');
    }
    this.serving = true;

    try {
      for (;;) {
        let client: ClientConnection;
        try {
          client = await this.config.listener.accept();
        } catch (err) {
          if (hasErrorCode(err, ErrorCode.ERR_LISTENER_CLOSED)) {
            this.logger.info('Listener closed');
            return;
          }
          this.logger.warn({ err }, 'Accept failed');
          continue;
        }

        void this.runSession(client);
      }
    } finally {
      this.serving = false;
      this.emit('close');
    }
  }

  /**
   * Close the listener; serve() returns once the pending accept fails
   */
  async stop(): Promise<void> {
    await this.config.listener.close();
  }

  private async runSession(client: ClientConnection): Promise<void> {
    const session = new Session({
      id: allocateSessionId(),
      client,
      upstream: this.config.upstream,
      dialer: this.config.dialer,
      credentials: this.config.credentials,
      observer: this.config.observer,
      logger: this.config.logger,
    });

    this.sessions.add(session);
    this.emit('session', session);
    try {
      await session.run();
    } catch (err) {
      this.logger.debug({ err, session: session.id }, 'Session ended before relaying');
    } finally {
      this.sessions.delete(session);
    }
  }
}
