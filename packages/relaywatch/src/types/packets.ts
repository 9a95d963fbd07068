/**
 * Packet model for the relayed game protocol.
 *
 * Packets are already-decoded, immutable values discriminated by `name`.
 * A handful of kinds the relay itself needs to inspect (login, spawn
 * sequence, disconnects and the kinds the observer reports in detail) are
 * typed arms; every other known kind is a GenericPacket with an opaque
 * payload, and ids outside the table decode to UnknownPacket. A typed kind
 * whose payload does not have the expected shape decodes to UnparsedPacket.
 */

/**
 * Known packet kinds and their wire ids
 */
export const PACKET_IDS = {
  Login: 0x01,
  PlayStatus: 0x02,
  Disconnect: 0x05,
  Text: 0x09,
  SetTime: 0x0a,
  StartGame: 0x0b,
  AddPlayer: 0x0c,
  AddActor: 0x0d,
  RemoveActor: 0x0e,
  MoveActorAbsolute: 0x12,
  MovePlayer: 0x13,
  UpdateBlock: 0x15,
  LevelEvent: 0x19,
  ActorEvent: 0x1b,
  UpdateAttributes: 0x1d,
  InventoryTransaction: 0x1e,
  MobEquipment: 0x1f,
  Interact: 0x21,
  PlayerAction: 0x24,
  SetActorData: 0x27,
  SetActorMotion: 0x28,
  Animate: 0x2c,
  Respawn: 0x2d,
  ContainerOpen: 0x2e,
  ContainerClose: 0x2f,
  InventoryContent: 0x31,
  InventorySlot: 0x32,
  CraftingData: 0x34,
  CraftingEvent: 0x35,
  LevelChunk: 0x3a,
  ChangeDimension: 0x3d,
  RequestChunkRadius: 0x45,
  ChunkRadiusUpdated: 0x46,
  AvailableCommands: 0x4c,
  CommandRequest: 0x4d,
  MoveActorDelta: 0x6f,
  SetLocalPlayerAsInitialised: 0x71,
  NetworkStackLatency: 0x73,
  NetworkChunkPublisherUpdate: 0x79,
  BiomeDefinitionList: 0x7a,
  LevelSoundEvent: 0x7b,
  PlayerAuthInput: 0x90,
  CreativeContent: 0x91,
  SubChunk: 0xae,
  SubChunkRequest: 0xaf,
} as const;

export type PacketName = keyof typeof PACKET_IDS;

const NAMES_BY_ID: ReadonlyMap<number, PacketName> = new Map(
  packetNames().map((name): [number, PacketName] => [PACKET_IDS[name], name])
);

/**
 * All known packet names, in table order
 */
export function packetNames(): PacketName[] {
  return Object.keys(PACKET_IDS).filter(isPacketName);
}

export function isPacketName(value: string): value is PacketName {
  return Object.hasOwn(PACKET_IDS, value);
}

/**
 * Look up the name of a wire id, or undefined when the id is not in the table
 */
export function packetNameForId(id: number): PacketName | undefined {
  return NAMES_BY_ID.get(id);
}

/**
 * Play status values carried by PlayStatus
 */
export enum PlayStatus {
  LOGIN_SUCCESS = 0,
  LOGIN_FAILED_CLIENT = 1,
  LOGIN_FAILED_SERVER = 2,
  PLAYER_SPAWN = 3,
  LOGIN_FAILED_INVALID_TENANT = 4,
  LOGIN_FAILED_VANILLA_EDU = 5,
  LOGIN_FAILED_EDU_VANILLA = 6,
  LOGIN_FAILED_SERVER_FULL = 7,
}

/**
 * Name of a play status, or the raw value when the table does not list it
 */
export function playStatusName(status: number): string | number {
  return PlayStatus[status] ?? status;
}

/** Entity ids are 64-bit; values past 2^53 decode as bigint */
export type RuntimeId = number | bigint;

export interface Vec3 {
  readonly x: number;
  readonly y: number;
  readonly z: number;
}

export interface BlockPos {
  readonly x: number;
  readonly y: number;
  readonly z: number;
}

/**
 * Identity the client declares at login; forwarded verbatim upstream
 */
export interface ClientData {
  readonly displayName?: string;
  readonly [key: string]: unknown;
}

/**
 * World data the upstream hands over at StartGame; replayed to the client
 */
export interface GameData {
  readonly worldName?: string;
  readonly entityRuntimeId?: RuntimeId;
  readonly [key: string]: unknown;
}

export interface LoginPacket {
  readonly name: 'Login';
  readonly protocol: number;
  readonly clientData: ClientData;
  /** Access token; only present on the relay → upstream login */
  readonly token?: string;
}

export interface PlayStatusPacket {
  readonly name: 'PlayStatus';
  /** A PlayStatus value; servers may send values this table does not list */
  readonly status: number;
}

export interface DisconnectPacket {
  readonly name: 'Disconnect';
  readonly message: string;
  readonly hideDisconnectionScreen?: boolean;
}

export interface StartGamePacket {
  readonly name: 'StartGame';
  readonly gameData: GameData;
}

export interface RequestChunkRadiusPacket {
  readonly name: 'RequestChunkRadius';
  readonly radius: number;
}

export interface ChunkRadiusUpdatedPacket {
  readonly name: 'ChunkRadiusUpdated';
  readonly radius: number;
}

export interface ChangeDimensionPacket {
  readonly name: 'ChangeDimension';
  readonly dimension: number;
  readonly position: Vec3;
  readonly respawn: boolean;
}

export interface PlayerActionPacket {
  readonly name: 'PlayerAction';
  readonly entityRuntimeId: RuntimeId;
  readonly actionType: number;
  readonly blockPosition: BlockPos;
  readonly resultPosition: BlockPos;
  readonly blockFace: number;
}

export interface SetLocalPlayerAsInitialisedPacket {
  readonly name: 'SetLocalPlayerAsInitialised';
  readonly entityRuntimeId: RuntimeId;
}

export type TypedPacket =
  | LoginPacket
  | PlayStatusPacket
  | DisconnectPacket
  | StartGamePacket
  | RequestChunkRadiusPacket
  | ChunkRadiusUpdatedPacket
  | ChangeDimensionPacket
  | PlayerActionPacket
  | SetLocalPlayerAsInitialisedPacket;

export type TypedPacketName = TypedPacket['name'];

export type GenericPacketName = Exclude<PacketName, TypedPacketName>;

/**
 * A known kind the relay never looks into
 */
export interface GenericPacket {
  readonly name: GenericPacketName;
  readonly payload: Readonly<Record<string, unknown>>;
}

/**
 * A kind outside the table; kept with its raw id so it re-encodes unchanged
 */
export interface UnknownPacket {
  readonly name: 'Unknown';
  readonly id: number;
  readonly payload: Readonly<Record<string, unknown>>;
}

/**
 * A typed kind whose payload did not match its shape; relayed opaquely
 */
export interface UnparsedPacket {
  readonly name: 'Unparsed';
  readonly kind: TypedPacketName;
  readonly payload: Readonly<Record<string, unknown>>;
}

export type Packet = TypedPacket | GenericPacket | UnknownPacket | UnparsedPacket;

/**
 * Wire id of a packet
 */
export function packetId(packet: Packet): number {
  switch (packet.name) {
    case 'Unknown':
      return packet.id;
    case 'Unparsed':
      return PACKET_IDS[packet.kind];
    default:
      return PACKET_IDS[packet.name];
  }
}

/**
 * Build a generic packet
 */
export function genericPacket(
  name: GenericPacketName,
  payload: Record<string, unknown> = {}
): GenericPacket {
  return { name, payload };
}

export function disconnectPacket(message: string): DisconnectPacket {
  return { name: 'Disconnect', message };
}

export function playStatusPacket(status: PlayStatus): PlayStatusPacket {
  return { name: 'PlayStatus', status };
}
