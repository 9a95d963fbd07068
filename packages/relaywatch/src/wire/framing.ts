/**
 * Length-prefixed framing for packets.
 * Uses varint encoding for the frame length.
 */

import { ErrorCode, RelayError } from '../types/errors.js';

/** Maximum frame size (16 MB) */
export const MAX_FRAME_SIZE = 16 * 1024 * 1024;

/**
 * Encode a varint (unsigned LEB128)
 */
export function encodeVarint(value: number): Uint8Array {
  if (value < 0 || !Number.isInteger(value)) {
    throw new RangeError('Varint value must be a non-negative integer');
  }

  const bytes: number[] = [];
  do {
    let byte = value & 0x7f;
    value >>>= 7;
    if (value !== 0) {
      byte |= 0x80;
    }
    bytes.push(byte);
  } while (value !== 0);

  return new Uint8Array(bytes);
}

/**
 * Decode a varint from buffer, returning value and bytes consumed.
 * Returns null if the buffer ends before the varint does.
 */
export function decodeVarint(
  data: Uint8Array,
  offset: number = 0
): { value: number; bytesRead: number } | null {
  let value = 0;
  let shift = 0;
  let bytesRead = 0;

  while (offset + bytesRead < data.length) {
    const byte = data[offset + bytesRead];
    value += (byte & 0x7f) * 2 ** shift;
    bytesRead++;

    if ((byte & 0x80) === 0) {
      return { value, bytesRead };
    }

    shift += 7;
    if (shift > 28) {
      throw new RelayError(ErrorCode.ERR_INVALID_PACKET, 'Varint too large');
    }
  }

  return null;
}

/**
 * Frame a packet body with length prefix
 */
export function frameMessage(data: Uint8Array): Uint8Array {
  if (data.length > MAX_FRAME_SIZE) {
    throw new RelayError(
      ErrorCode.ERR_MESSAGE_TOO_LARGE,
      `Message too large: ${data.length} bytes (max: ${MAX_FRAME_SIZE})`
    );
  }

  const lengthPrefix = encodeVarint(data.length);
  const framed = new Uint8Array(lengthPrefix.length + data.length);
  framed.set(lengthPrefix, 0);
  framed.set(data, lengthPrefix.length);
  return framed;
}

/**
 * Result of parsing a framed message
 */
export interface ParseResult {
  /** The frame body (without length prefix) */
  data: Uint8Array;
  /** Total bytes consumed (including length prefix) */
  bytesConsumed: number;
}

/**
 * Parse a framed message from buffer.
 * Returns null if buffer doesn't contain a complete frame.
 */
export function parseFramedMessage(buffer: Uint8Array, offset: number = 0): ParseResult | null {
  const prefix = decodeVarint(buffer, offset);
  if (prefix === null) {
    return null;
  }

  const { value: length, bytesRead } = prefix;
  if (length > MAX_FRAME_SIZE) {
    throw new RelayError(
      ErrorCode.ERR_MESSAGE_TOO_LARGE,
      `Message too large: ${length} bytes (max: ${MAX_FRAME_SIZE})`
    );
  }

  const totalLength = bytesRead + length;
  if (buffer.length - offset < totalLength) {
    return null;
  }

  const data = buffer.slice(offset + bytesRead, offset + totalLength);
  return { data, bytesConsumed: totalLength };
}

/**
 * Buffer for accumulating incoming data and parsing frames
 */
export class FrameBuffer {
  private buffer: Uint8Array = new Uint8Array(0);

  /**
   * Append data to the buffer
   */
  append(data: Uint8Array): void {
    const newBuffer = new Uint8Array(this.buffer.length + data.length);
    newBuffer.set(this.buffer, 0);
    newBuffer.set(data, this.buffer.length);
    this.buffer = newBuffer;
  }

  /**
   * Try to read a complete frame from the buffer.
   * Returns the frame data if complete, null otherwise.
   */
  readFrame(): Uint8Array | null {
    const result = parseFramedMessage(this.buffer);
    if (result === null) {
      return null;
    }

    this.buffer = this.buffer.slice(result.bytesConsumed);
    return result.data;
  }

  /**
   * Get the current buffer size
   */
  get size(): number {
    return this.buffer.length;
  }
}
