/**
 * CBOR codec for packets.
 *
 * A frame body is the map { t: <wire id>, p: <payload map> }. Typed packets
 * are a read-only view of their payload: the map a packet was decoded from is
 * kept and written back as received when the packet is encoded again. A typed
 * payload that does not fit its view decodes to an UnparsedPacket.
 */

import * as cborg from 'cborg';
import { z } from 'zod';
import { ErrorCode, RelayError } from '../types/errors.js';
import {
  Packet,
  TypedPacketName,
  packetId,
  packetNameForId,
} from '../types/packets.js';

const wireSchema = z.object({
  t: z.number().int().nonnegative(),
  p: z.record(z.unknown()).default({}),
});

const floatSchema = z.union([z.number(), z.nan()]);

const runtimeIdSchema = z.union([z.number().int(), z.bigint()]);

const vec3Schema = z.object({ x: floatSchema, y: floatSchema, z: floatSchema }).passthrough();

const blockPosSchema = z.object({
  x: z.number().int(),
  y: z.number().int(),
  z: z.number().int(),
}).passthrough();

const loginSchema = z.object({
  protocol: z.number().int(),
  clientData: z.object({ displayName: z.string().optional() }).passthrough(),
  token: z.string().optional(),
}).passthrough();

const playStatusSchema = z.object({ status: z.number().int() }).passthrough();

const disconnectSchema = z.object({
  message: z.string(),
  hideDisconnectionScreen: z.boolean().optional(),
}).passthrough();

const startGameSchema = z.object({
  gameData: z
    .object({
      worldName: z.string().optional(),
      entityRuntimeId: runtimeIdSchema.optional(),
    })
    .passthrough(),
}).passthrough();

const chunkRadiusSchema = z.object({ radius: z.number().int() }).passthrough();

const changeDimensionSchema = z.object({
  dimension: z.number().int(),
  position: vec3Schema,
  respawn: z.boolean(),
}).passthrough();

const playerActionSchema = z.object({
  entityRuntimeId: runtimeIdSchema,
  actionType: z.number().int(),
  blockPosition: blockPosSchema,
  resultPosition: blockPosSchema,
  blockFace: z.number().int(),
}).passthrough();

const initialisedSchema = z.object({ entityRuntimeId: runtimeIdSchema }).passthrough();

/** Payload maps of decoded typed packets, as received */
const receivedPayloads = new WeakMap<Packet, Readonly<Record<string, unknown>>>();

/**
 * Encode a packet to CBOR bytes
 */
export function encodePacket(packet: Packet): Uint8Array {
  const payload = receivedPayloads.get(packet) ?? packetPayload(packet);
  return cborg.encode({ t: packetId(packet), p: payload });
}

/**
 * Decode CBOR bytes to a packet
 */
export function decodePacket(data: Uint8Array): Packet {
  let decoded: unknown;
  try {
    decoded = cborg.decode(data);
  } catch (err) {
    throw new RelayError(ErrorCode.ERR_INVALID_PACKET, 'Malformed packet encoding', { cause: err });
  }

  const wire = wireSchema.safeParse(decoded);
  if (!wire.success) {
    throw new RelayError(ErrorCode.ERR_INVALID_PACKET, `Invalid frame: ${describeIssues(wire.error)}`);
  }

  const { t: id, p: payload } = wire.data;
  const name = packetNameForId(id);
  if (name === undefined) {
    return { name: 'Unknown', id, payload };
  }

  let packet: Packet | null;
  switch (name) {
    case 'Login':
      packet = view(name, loginSchema, payload);
      break;
    case 'PlayStatus':
      packet = view(name, playStatusSchema, payload);
      break;
    case 'Disconnect':
      packet = view(name, disconnectSchema, payload);
      break;
    case 'StartGame':
      packet = view(name, startGameSchema, payload);
      break;
    case 'RequestChunkRadius':
      packet = view(name, chunkRadiusSchema, payload);
      break;
    case 'ChunkRadiusUpdated':
      packet = view(name, chunkRadiusSchema, payload);
      break;
    case 'ChangeDimension':
      packet = view(name, changeDimensionSchema, payload);
      break;
    case 'PlayerAction':
      packet = view(name, playerActionSchema, payload);
      break;
    case 'SetLocalPlayerAsInitialised':
      packet = view(name, initialisedSchema, payload);
      break;
    default:
      return { name, payload };
  }

  if (packet === null) {
    return { name: 'Unparsed', kind: name, payload };
  }
  receivedPayloads.set(packet, payload);
  return packet;
}

/**
 * Typed view of a payload, or null when the payload does not fit it.
 * `name` goes last so a payload field of that name cannot replace it.
 */
function view<N extends TypedPacketName, T extends object>(
  name: N,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  payload: Record<string, unknown>
): (T & { name: N }) | null {
  const result = schema.safeParse(payload);
  return result.success ? { ...result.data, name } : null;
}

/**
 * Payload map of a packet, without the discriminant
 */
function packetPayload(packet: Packet): Record<string, unknown> {
  switch (packet.name) {
    case 'Unknown':
    case 'Unparsed':
      return { ...packet.payload };
    case 'Login':
    case 'PlayStatus':
    case 'Disconnect':
    case 'StartGame':
    case 'RequestChunkRadius':
    case 'ChunkRadiusUpdated':
    case 'ChangeDimension':
    case 'PlayerAction':
    case 'SetLocalPlayerAsInitialised': {
      const { name: _name, ...fields } = packet;
      // absent optional fields are left out of the map
      return Object.fromEntries(
        Object.entries(fields).filter(([, value]) => value !== undefined)
      );
    }
    default:
      return { ...packet.payload };
  }
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
}
