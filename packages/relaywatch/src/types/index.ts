/**
 * Type definitions for the relay
 */

export type { Locator } from './locator.js';
export {
  parseLocator,
  formatLocator,
  createLocator,
} from './locator.js';

export {
  ErrorCode,
  getErrorMessage,
  RelayError,
  RemoteDisconnectError,
  hasErrorCode,
  findRemoteDisconnect,
  toError,
} from './errors.js';

export {
  PACKET_IDS,
  PlayStatus,
  packetNames,
  isPacketName,
  packetNameForId,
  packetId,
  genericPacket,
  disconnectPacket,
  playStatusPacket,
  playStatusName,
} from './packets.js';
export type {
  PacketName,
  TypedPacketName,
  GenericPacketName,
  RuntimeId,
  Vec3,
  BlockPos,
  ClientData,
  GameData,
  LoginPacket,
  PlayStatusPacket,
  DisconnectPacket,
  StartGamePacket,
  RequestChunkRadiusPacket,
  ChunkRadiusUpdatedPacket,
  ChangeDimensionPacket,
  PlayerActionPacket,
  SetLocalPlayerAsInitialisedPacket,
  TypedPacket,
  GenericPacket,
  UnknownPacket,
  UnparsedPacket,
  Packet,
} from './packets.js';
