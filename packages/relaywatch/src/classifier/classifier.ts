/**
 * Packet classification for the observer.
 *
 * High-frequency kinds (movement, chunk streaming, inventory sync, actor
 * updates) are suppressed from verbose logging.
 */

import type { Packet, PacketName } from '../types/packets.js';

export interface Classification {
  /** Stable, human-readable kind */
  kindName: string;
  /** True when the kind is excluded from verbose logging */
  suppressed: boolean;
}

export const SUPPRESSED_PACKETS: ReadonlySet<PacketName> = new Set<PacketName>([
  // movement and input
  'MovePlayer',
  'PlayerAuthInput',
  'SetActorData',
  'SetActorMotion',
  'MoveActorAbsolute',
  'MoveActorDelta',
  // chunks and level
  'SubChunk',
  'SubChunkRequest',
  'ActorEvent',
  'AvailableCommands',
  'StartGame',
  'BiomeDefinitionList',
  // inventory and actors
  'InventoryContent',
  'InventoryTransaction',
  'InventorySlot',
  'CreativeContent',
  'AddActor',
  'LevelEvent',
  'RemoveActor',
  'LevelSoundEvent',
  'SetTime',
  'UpdateAttributes',
  'NetworkChunkPublisherUpdate',
  'LevelChunk',
  'CraftingEvent',
  'CraftingData',
]);

/**
 * Kind name of a packet; ids outside the table render as Unknown(0x..)
 */
export function kindName(packet: Packet): string {
  switch (packet.name) {
    case 'Unknown':
      return `Unknown(0x${packet.id.toString(16).padStart(2, '0')})`;
    case 'Unparsed':
      return packet.kind;
    default:
      return packet.name;
  }
}

export function classify(packet: Packet): Classification {
  let suppressed: boolean;
  switch (packet.name) {
    case 'Unknown':
      suppressed = false;
      break;
    case 'Unparsed':
      suppressed = SUPPRESSED_PACKETS.has(packet.kind);
      break;
    default:
      suppressed = SUPPRESSED_PACKETS.has(packet.name);
  }
  return { kindName: kindName(packet), suppressed };
}
