/**
 * Packet classification
 */

import { describe, it, expect } from 'vitest';
import { SUPPRESSED_PACKETS, classify, kindName } from '../classifier/classifier.js';
import { genericPacket, packetNames, playStatusPacket, PlayStatus } from '../types/packets.js';

describe('classify', () => {
  it('should suppress high-frequency kinds', () => {
    expect(classify(genericPacket('MovePlayer'))).toEqual({ kindName: 'MovePlayer', suppressed: true });
    expect(classify(genericPacket('LevelChunk'))).toEqual({ kindName: 'LevelChunk', suppressed: true });
    expect(classify({ name: 'StartGame', gameData: {} })).toEqual({ kindName: 'StartGame', suppressed: true });
  });

  it('should leave other kinds loggable', () => {
    expect(classify(genericPacket('Text'))).toEqual({ kindName: 'Text', suppressed: false });
    expect(classify(playStatusPacket(PlayStatus.PLAYER_SPAWN))).toEqual({
      kindName: 'PlayStatus',
      suppressed: false,
    });
  });

  it('should treat unknown kinds as loggable', () => {
    expect(classify({ name: 'Unknown', id: 0xfe, payload: {} })).toEqual({
      kindName: 'Unknown(0xfe)',
      suppressed: false,
    });
  });

  it('should classify unparsed packets by the kind they were sent as', () => {
    expect(classify({ name: 'Unparsed', kind: 'StartGame', payload: {} })).toEqual({
      kindName: 'StartGame',
      suppressed: true,
    });
    expect(classify({ name: 'Unparsed', kind: 'PlayStatus', payload: { status: 'x' } })).toEqual({
      kindName: 'PlayStatus',
      suppressed: false,
    });
  });

  it('should only name kinds from the packet table', () => {
    const known = new Set<string>(packetNames());
    for (const name of SUPPRESSED_PACKETS) {
      expect(known.has(name)).toBe(true);
    }
    expect(SUPPRESSED_PACKETS.size).toBe(26);
  });
});

describe('kindName', () => {
  it('should pad single-digit unknown ids', () => {
    expect(kindName({ name: 'Unknown', id: 7, payload: {} })).toBe('Unknown(0x07)');
  });
});
