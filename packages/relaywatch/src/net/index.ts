/**
 * Transport exports
 */

export type {
  Connection,
  ClientConnection,
  UpstreamConnection,
  AccessTokenSource,
  Dialer,
  Acceptor,
} from './connection.js';

export type {
  SocketConnectionOptions,
  ClientSocketConnectionOptions,
  UpstreamSocketConnectionOptions,
} from './socket-connection.js';
export {
  SocketConnection,
  ClientSocketConnection,
  UpstreamSocketConnection,
  PROTOCOL_VERSION,
  DEFAULT_CHUNK_RADIUS,
} from './socket-connection.js';

export type { DialOptions, TcpDialerOptions } from './dialer.js';
export { dial, configureSocket, TcpDialer } from './dialer.js';

export type { PacketListenerOptions } from './listener.js';
export { PacketListener } from './listener.js';
