/**
 * Wire protocol encoding and framing
 */

export { encodePacket, decodePacket } from './codec.js';

export {
  MAX_FRAME_SIZE,
  encodeVarint,
  decodeVarint,
  frameMessage,
  parseFramedMessage,
  FrameBuffer,
} from './framing.js';
export type { ParseResult } from './framing.js';
