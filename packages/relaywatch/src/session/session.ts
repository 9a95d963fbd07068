/**
 * A relay session: one client connection paired with one upstream connection.
 *
 * Lifecycle:
 * 1. connecting   - dial the upstream with the client's identity
 * 2. handshaking  - start the client's game and complete the upstream spawn,
 *                   concurrently; failures are logged and relaying starts anyway
 * 3. relaying     - one read/observe/write loop per direction
 * 4. closing      - the first loop to fail tears down both connections
 * 5. closed       - both loops have ended
 */

import { EventEmitter } from 'node:events';
import type { Logger } from 'pino';
import type { Locator } from '../types/locator.js';
import { formatLocator } from '../types/locator.js';
import { findRemoteDisconnect, toError } from '../types/errors.js';
import type { Packet } from '../types/packets.js';
import type {
  AccessTokenSource,
  ClientConnection,
  Connection,
  Dialer,
  UpstreamConnection,
} from '../net/connection.js';
import type { PacketDirection, PacketObserver } from '../observer/observer.js';
import { silentLogger } from '../utils/logger.js';

/** Reason given to the client when nothing more specific is known */
export const CONNECTION_LOST = 'connection lost';

export type SessionState = 'connecting' | 'handshaking' | 'relaying' | 'closing' | 'closed';

export interface SessionConfig {
  /** Numeric id, used in logs */
  id: number;
  client: ClientConnection;
  upstream: Locator;
  dialer: Dialer;
  credentials: AccessTokenSource;
  observer?: PacketObserver;
  logger?: Logger;
}

export interface SessionEvents {
  state: [state: SessionState];
  close: [reason: string];
}

let nextSessionId = 1;

/**
 * Allocate a process-unique session id
 */
export function allocateSessionId(): number {
  return nextSessionId++;
}

export class Session extends EventEmitter<SessionEvents> {
  readonly id: number;
  readonly client: ClientConnection;

  private readonly config: SessionConfig;
  private readonly logger: Logger;
  private upstream: UpstreamConnection | null = null;
  private currentState: SessionState = 'connecting';
  private closeReason: string | null = null;
  private started = false;

  constructor(config: SessionConfig) {
    super();
    this.config = config;
    this.id = config.id;
    this.client = config.client;
    this.logger = (config.logger ?? silentLogger()).child({ session: config.id });
  }

  get state(): SessionState {
    return this.currentState;
  }

  /**
   * Reason the client was disconnected with, once the session is closing
   */
  get reason(): string | null {
    return this.closeReason;
  }

  /**
   * Run the session to completion. Resolves once both relay loops have
   * ended; rejects only when the upstream cannot be dialed.
   */
  async run(): Promise<void> {
    if (this.started) {
      throw new Error('Session already started');
    }
    this.started = true;

    const upstream = await this.connect();
    this.upstream = upstream;

    this.setState('handshaking');
    await this.handshake(upstream);

    this.setState('relaying');
    this.logger.info('Relaying');
    await Promise.all([
      this.relay('client', this.client, upstream),
      this.relay('server', upstream, this.client),
    ]);

    this.setState('closed');
    this.emit('close', this.closeReason ?? CONNECTION_LOST);
  }

  private async connect(): Promise<UpstreamConnection> {
    const target = formatLocator(this.config.upstream);
    this.logger.info(
      { client: this.client.clientData.displayName, upstream: target },
      'Dialing upstream'
    );

    try {
      return await this.config.dialer.dial(
        this.config.upstream,
        this.client.clientData,
        this.config.credentials
      );
    } catch (err) {
      const reason = findRemoteDisconnect(err)?.reason ?? CONNECTION_LOST;
      this.logger.warn({ err, reason }, 'Upstream dial failed');

      this.closeReason = reason;
      this.setState('closing');
      await this.client.disconnect(reason);
      this.setState('closed');
      this.emit('close', reason);
      throw err;
    }
  }

  private async handshake(upstream: UpstreamConnection): Promise<void> {
    const [startGame, spawn] = await Promise.allSettled([
      this.client.startGame(upstream.gameData),
      upstream.doSpawn(),
    ]);

    if (startGame.status === 'rejected') {
      this.logger.warn({ err: toError(startGame.reason) }, 'Client start game failed');
    }
    if (spawn.status === 'rejected') {
      this.logger.warn({ err: toError(spawn.reason) }, 'Upstream spawn failed');
    }
  }

  /**
   * Forward packets from `source` to `sink` until either side fails
   */
  private async relay(direction: PacketDirection, source: Connection, sink: Connection): Promise<void> {
    for (;;) {
      let packet: Packet;
      try {
        packet = await source.readPacket();
      } catch (err) {
        // an upstream that disconnects tells the client why
        this.teardown(direction === 'server' ? remoteReason(err) : null, direction, err);
        return;
      }

      this.observe(direction, packet);

      try {
        await sink.writePacket(packet);
      } catch (err) {
        this.teardown(direction === 'client' ? remoteReason(err) : null, direction, err);
        return;
      }
    }
  }

  private observe(direction: PacketDirection, packet: Packet): void {
    if (!this.config.observer) {
      return;
    }
    try {
      this.config.observer(direction, packet);
    } catch (err) {
      this.logger.debug({ err, direction }, 'Observer failed');
    }
  }

  /**
   * Close both connections once; later failures from the other loop only
   * end that loop
   */
  private teardown(reason: string | null, direction: PacketDirection, err: unknown): void {
    if (this.closeReason !== null) {
      this.logger.debug({ err, direction }, 'Loop ended after teardown');
      return;
    }

    const clientReason = reason ?? CONNECTION_LOST;
    this.closeReason = clientReason;
    this.logger.info({ direction, reason: clientReason, err }, 'Session closing');
    this.setState('closing');

    if (this.upstream) {
      this.upstream.close().catch((closeErr: unknown) => {
        this.logger.debug({ err: closeErr }, 'Upstream close failed');
      });
    }
    this.client.disconnect(clientReason).catch((disconnectErr: unknown) => {
      this.logger.debug({ err: disconnectErr }, 'Client disconnect failed');
    });
  }

  private setState(state: SessionState): void {
    this.currentState = state;
    this.emit('state', state);
  }
}

function remoteReason(err: unknown): string | null {
  return findRemoteDisconnect(err)?.reason ?? null;
}
