/**
 * Packet connections over a TCP socket.
 *
 * Frames are varint length-prefixed CBOR packets. Incoming packets are queued
 * in receipt order; readers and the login/spawn sequences take from the same
 * queue, so a packet that arrives while a sequence waits for a specific kind
 * is kept for the next read.
 */

import type * as net from 'node:net';
import type { Logger } from 'pino';
import { FrameBuffer, frameMessage } from '../wire/framing.js';
import { decodePacket, encodePacket } from '../wire/codec.js';
import { ErrorCode, RelayError, RemoteDisconnectError, toError } from '../types/errors.js';
import {
  ClientData,
  GameData,
  Packet,
  PlayStatus,
  TypedPacketName,
  disconnectPacket,
  playStatusPacket,
  playStatusName,
} from '../types/packets.js';
import { silentLogger } from '../utils/logger.js';
import { kindName } from '../classifier/classifier.js';
import type { ClientConnection, Connection, UpstreamConnection } from './connection.js';

/** Protocol version sent in the relay's own login */
export const PROTOCOL_VERSION = 1;

/** Chunk radius the relay asks the upstream for */
export const DEFAULT_CHUNK_RADIUS = 8;

const DEFAULT_HANDSHAKE_TIMEOUT = 30000;

/** How long a disconnecting socket may take to flush before it is destroyed */
const DISCONNECT_LINGER_MS = 1000;

export interface SocketConnectionOptions {
  /** Timeout for each wait during login and spawn, in ms */
  handshakeTimeoutMs?: number;
  logger?: Logger;
}

interface Waiter {
  /** Take the packet if it is the one being waited for */
  offer(packet: Packet): boolean;
  fail(err: Error): void;
}

/**
 * Packet channel over a socket
 */
export class SocketConnection implements Connection {
  protected readonly handshakeTimeoutMs: number;
  protected readonly logger: Logger;

  private readonly frameBuffer = new FrameBuffer();
  private readonly queue: Packet[] = [];
  private readonly waiters: Waiter[] = [];
  private failure: Error | null = null;

  constructor(
    private readonly socket: net.Socket,
    options: SocketConnectionOptions = {}
  ) {
    this.handshakeTimeoutMs = options.handshakeTimeoutMs ?? DEFAULT_HANDSHAKE_TIMEOUT;
    this.logger = options.logger ?? silentLogger();

    this.socket.on('data', this.handleData.bind(this));
    this.socket.on('error', this.handleError.bind(this));
    this.socket.on('close', this.handleClose.bind(this));
  }

  /**
   * Next packet in receipt order; rejects with ERR_TIMEOUT when a timeout is
   * given and nothing arrives in time
   */
  readPacket(timeoutMs?: number): Promise<Packet> {
    return this.take((packet): packet is Packet => true, timeoutMs);
  }

  /**
   * Wait for the next packet of the given kind, leaving other packets queued
   */
  expect<N extends TypedPacketName>(
    name: N,
    timeoutMs: number = this.handshakeTimeoutMs
  ): Promise<Extract<Packet, { name: N }>> {
    return this.take((packet): packet is Extract<Packet, { name: N }> => packet.name === name, timeoutMs);
  }

  async writePacket(packet: Packet): Promise<void> {
    if (this.failure) {
      throw writeFailure(this.failure);
    }

    let frame: Uint8Array;
    try {
      frame = frameMessage(encodePacket(packet));
    } catch (err) {
      throw writeFailure(toError(err));
    }

    await new Promise<void>((resolve, reject) => {
      this.socket.write(frame, (err) => {
        if (err) {
          reject(writeFailure(this.failure ?? err));
        } else {
          resolve();
        }
      });
    });
  }

  async close(): Promise<void> {
    this.queue.length = 0;
    this.fail(new RelayError(ErrorCode.ERR_CONNECTION_CLOSED, 'Connection closed locally'));
    this.socket.destroy();
  }

  /**
   * Send a disconnect reason, then end the connection. Never rejects.
   */
  async disconnect(reason: string): Promise<void> {
    if (this.failure) {
      this.socket.destroy();
      return;
    }

    try {
      await this.writePacket(disconnectPacket(reason));
    } catch (err) {
      this.logger.debug({ err, reason }, 'Could not deliver disconnect');
    }

    this.queue.length = 0;
    this.fail(new RelayError(ErrorCode.ERR_CONNECTION_CLOSED, `Disconnected: ${reason}`));
    this.socket.end();
    setTimeout(() => this.socket.destroy(), DISCONNECT_LINGER_MS).unref();
  }

  private take<T extends Packet>(guard: (packet: Packet) => packet is T, timeoutMs?: number): Promise<T> {
    for (let i = 0; i < this.queue.length; i++) {
      const packet = this.queue[i];
      if (guard(packet)) {
        this.queue.splice(i, 1);
        return Promise.resolve(packet);
      }
    }

    if (this.failure) {
      return Promise.reject(this.failure);
    }

    return new Promise<T>((resolve, reject) => {
      let timer: NodeJS.Timeout | undefined;

      const settle = (): void => {
        clearTimeout(timer);
        const index = this.waiters.indexOf(waiter);
        if (index !== -1) {
          this.waiters.splice(index, 1);
        }
      };

      const waiter: Waiter = {
        offer: (packet) => {
          if (!guard(packet)) {
            return false;
          }
          settle();
          resolve(packet);
          return true;
        },
        fail: (err) => {
          settle();
          reject(err);
        },
      };

      if (timeoutMs !== undefined) {
        timer = setTimeout(() => {
          waiter.fail(new RelayError(ErrorCode.ERR_TIMEOUT, `No packet within ${timeoutMs}ms`));
        }, timeoutMs);
      }

      this.waiters.push(waiter);
    });
  }

  private fail(err: Error): void {
    if (this.failure) {
      return;
    }
    this.failure = err;
    for (const waiter of [...this.waiters]) {
      waiter.fail(err);
    }
  }

  private deliver(packet: Packet): void {
    for (const waiter of [...this.waiters]) {
      if (waiter.offer(packet)) {
        return;
      }
    }
    this.queue.push(packet);
  }

  private handleData(data: Buffer): void {
    if (this.failure) {
      return;
    }
    this.frameBuffer.append(new Uint8Array(data));

    let frame: Uint8Array | null;
    try {
      while (!this.failure && (frame = this.frameBuffer.readFrame()) !== null) {
        const packet = decodePacket(frame);
        if (packet.name === 'Disconnect') {
          this.fail(new RemoteDisconnectError(packet.message));
          this.socket.destroy();
          return;
        }
        this.deliver(packet);
      }
    } catch (err) {
      this.fail(new RelayError(ErrorCode.ERR_READ_FAILED, `Read failed: ${toError(err).message}`, { cause: err }));
      this.socket.destroy();
    }
  }

  private handleError(err: Error): void {
    this.fail(new RelayError(ErrorCode.ERR_READ_FAILED, `Read failed: ${err.message}`, { cause: err }));
  }

  private handleClose(): void {
    this.fail(new RelayError(ErrorCode.ERR_CONNECTION_CLOSED, 'Connection closed by peer'));
  }
}

function writeFailure(cause: Error): RelayError {
  return new RelayError(ErrorCode.ERR_WRITE_FAILED, `Write failed: ${cause.message}`, { cause });
}

export interface ClientSocketConnectionOptions extends SocketConnectionOptions {
  /** Largest chunk radius granted to the client */
  maxChunkRadius?: number;
}

/**
 * A game client connected to the relay; the relay plays the server
 */
export class ClientSocketConnection extends SocketConnection implements ClientConnection {
  private readonly maxChunkRadius: number;
  private loginData: ClientData = {};

  constructor(socket: net.Socket, options: ClientSocketConnectionOptions = {}) {
    super(socket, options);
    this.maxChunkRadius = options.maxChunkRadius ?? DEFAULT_CHUNK_RADIUS;
  }

  get clientData(): ClientData {
    return this.loginData;
  }

  /**
   * Wait for the client's Login and accept it
   */
  async login(timeoutMs: number = this.handshakeTimeoutMs): Promise<void> {
    const first = await this.readPacket(timeoutMs);
    if (first.name !== 'Login') {
      throw new RelayError(ErrorCode.ERR_LOGIN_FAILED, `Expected Login, got ${kindName(first)}`);
    }
    this.loginData = first.clientData;
    await this.writePacket(playStatusPacket(PlayStatus.LOGIN_SUCCESS));
  }

  async startGame(gameData: GameData): Promise<void> {
    await this.writePacket({ name: 'StartGame', gameData });
    const request = await this.expect('RequestChunkRadius');
    await this.writePacket({
      name: 'ChunkRadiusUpdated',
      radius: Math.min(request.radius, this.maxChunkRadius),
    });
    await this.writePacket(playStatusPacket(PlayStatus.PLAYER_SPAWN));
    await this.expect('SetLocalPlayerAsInitialised');
  }
}

export interface UpstreamSocketConnectionOptions extends SocketConnectionOptions {
  /** Chunk radius requested from the upstream */
  chunkRadius?: number;
}

/**
 * The relay's own connection to the real server; the relay plays the client
 */
export class UpstreamSocketConnection extends SocketConnection implements UpstreamConnection {
  private readonly chunkRadius: number;
  private startData: GameData = {};

  constructor(socket: net.Socket, options: UpstreamSocketConnectionOptions = {}) {
    super(socket, options);
    this.chunkRadius = options.chunkRadius ?? DEFAULT_CHUNK_RADIUS;
  }

  get gameData(): GameData {
    return this.startData;
  }

  /**
   * Log in with the client's identity and wait for the world to start
   */
  async login(clientData: ClientData, token: string): Promise<void> {
    await this.writePacket({ name: 'Login', protocol: PROTOCOL_VERSION, clientData, token });

    const status = await this.expect('PlayStatus');
    if (status.status !== PlayStatus.LOGIN_SUCCESS) {
      throw new RelayError(
        ErrorCode.ERR_LOGIN_FAILED,
        `Upstream refused login: ${playStatusName(status.status)}`
      );
    }

    const start = await this.expect('StartGame');
    this.startData = start.gameData;
  }

  async doSpawn(): Promise<void> {
    await this.writePacket({ name: 'RequestChunkRadius', radius: this.chunkRadius });
    await this.expect('ChunkRadiusUpdated');

    const status = await this.expect('PlayStatus');
    if (status.status !== PlayStatus.PLAYER_SPAWN) {
      throw new RelayError(
        ErrorCode.ERR_HANDSHAKE_FAILED,
        `Expected PlayerSpawn, got ${playStatusName(status.status)}`
      );
    }

    await this.writePacket({
      name: 'SetLocalPlayerAsInitialised',
      entityRuntimeId: this.startData.entityRuntimeId ?? 0,
    });
  }
}
