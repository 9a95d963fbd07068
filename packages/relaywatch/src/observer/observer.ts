/**
 * Packet observer hook.
 *
 * The session calls the observer inline for every relayed packet, before the
 * packet is written on. The default observer logs one structured record per
 * non-suppressed packet.
 */

import type { Logger } from 'pino';
import { Packet, playStatusName } from '../types/packets.js';
import { classify } from '../classifier/classifier.js';

/** Which side sent the packet */
export type PacketDirection = 'client' | 'server';

export type PacketObserver = (direction: PacketDirection, packet: Packet) => void;

/** Nesting below this depth is elided in payload dumps */
const MAX_DUMP_DEPTH = 6;

/**
 * Observer that logs every non-suppressed packet at info
 */
export function createLoggingObserver(logger: Logger): PacketObserver {
  const log = logger.child({ component: 'observer' });

  return (direction, packet) => {
    const { kindName, suppressed } = classify(packet);
    if (suppressed) {
      return;
    }
    log.info({ direction, packet: kindName, ...packetDetails(packet) }, `${direction} ${kindName}`);
  };
}

/**
 * Fields worth reporting for a packet
 */
export function packetDetails(packet: Packet): Record<string, unknown> {
  switch (packet.name) {
    case 'ChangeDimension':
      return {
        dimension: packet.dimension,
        respawn: packet.respawn,
        position: packet.position,
      };
    case 'PlayStatus':
      return { status: playStatusName(packet.status) };
    case 'PlayerAction':
      return {
        actionType: packet.actionType,
        blockPosition: packet.blockPosition,
        blockFace: packet.blockFace,
        resultPosition: packet.resultPosition,
      };
    case 'SetLocalPlayerAsInitialised':
      return { entityRuntimeId: dumpValue(packet.entityRuntimeId) };
    case 'Unknown':
      return { id: packet.id, data: dumpValue(packet.payload) };
    case 'Login':
    case 'Disconnect':
    case 'StartGame':
    case 'RequestChunkRadius':
    case 'ChunkRadiusUpdated': {
      const { name: _name, ...fields } = packet;
      return { data: dumpValue(fields) };
    }
    default:
      return { data: dumpValue(packet.payload) };
  }
}

/**
 * Copy of a payload that serializes cleanly: byte arrays become `<n bytes>`
 * and bigints become strings
 */
export function dumpValue(value: unknown, depth: number = 0): unknown {
  if (typeof value === 'bigint') {
    return value.toString();
  }
  if (value instanceof Uint8Array) {
    return `<${value.length} bytes>`;
  }
  if (value === null || typeof value !== 'object') {
    return value;
  }
  if (depth >= MAX_DUMP_DEPTH) {
    return '[nested]';
  }
  if (Array.isArray(value)) {
    return value.map((item) => dumpValue(item, depth + 1));
  }
  if (value instanceof Map) {
    return Object.fromEntries(
      Array.from(value, ([key, item]) => [String(key), dumpValue(item, depth + 1)])
    );
  }
  return Object.fromEntries(
    Object.entries(value).map(([key, item]) => [key, dumpValue(item, depth + 1)])
  );
}
