/**
 * Connection contracts the session relies on.
 *
 * A Connection is an ordered channel of already-decoded packets. Reads and
 * writes settle one packet at a time; failures surface as rejected promises.
 * A read or write that fails because the peer sent a disconnect carries a
 * RemoteDisconnectError somewhere in its cause chain.
 */

import type { ClientData, GameData, Packet } from '../types/packets.js';
import type { Locator } from '../types/locator.js';
import type { Token } from '../auth/token.js';

export interface Connection {
  /** Resolves with the next packet, in receipt order */
  readPacket(): Promise<Packet>;
  /** Resolves once the packet has been handed to the transport */
  writePacket(packet: Packet): Promise<void>;
  /** Release the connection; safe to call more than once */
  close(): Promise<void>;
}

/**
 * Connection accepted from a game client; the relay plays the server
 */
export interface ClientConnection extends Connection {
  readonly clientData: ClientData;
  /** Tell the client the game has started, using the upstream's game data */
  startGame(gameData: GameData): Promise<void>;
  /** Send the client a disconnect reason, then close. Never rejects. */
  disconnect(reason: string): Promise<void>;
}

/**
 * Connection dialed to the real server; the relay plays the client
 */
export interface UpstreamConnection extends Connection {
  readonly gameData: GameData;
  /** Complete the upstream's spawn sequence */
  doSpawn(): Promise<void>;
}

/**
 * Anything that can hand out a currently valid token
 */
export interface AccessTokenSource {
  token(): Promise<Token>;
}

export interface Dialer {
  dial(target: Locator, clientData: ClientData, credentials: AccessTokenSource): Promise<UpstreamConnection>;
}

export interface Acceptor {
  /** Resolves with the next logged-in client; rejects on a failed accept */
  accept(): Promise<ClientConnection>;
  close(): Promise<void>;
}
