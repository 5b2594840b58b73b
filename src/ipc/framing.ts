/**
 * Length-prefixed framing: 4-byte little-endian length, then the body
 */

import { ProtocolError } from '../errors.js';

export const MAX_MESSAGE_SIZE = 1024 * 1024;

const HEADER_SIZE = 4;

export function encodeFrame(body: Buffer): Buffer {
  if (body.length > MAX_MESSAGE_SIZE) {
    throw new ProtocolError('Request too large');
  }
  const header = Buffer.alloc(HEADER_SIZE);
  header.writeUInt32LE(body.length, 0);
  return Buffer.concat([header, body]);
}

/**
 * Accumulates socket chunks until one complete frame is available.
 */
export class FrameDecoder {
  private chunks: Buffer[] = [];
  private buffered = 0;
  private expected: number | null = null;

  /**
   * Returns the frame body once complete, otherwise `null`.
   * Bytes after the first frame are ignored.
   */
  push(chunk: Buffer): Buffer | null {
    this.chunks.push(chunk);
    this.buffered += chunk.length;

    if (this.expected === null) {
      if (this.buffered < HEADER_SIZE) return null;
      const joined = Buffer.concat(this.chunks, this.buffered);
      const length = joined.readUInt32LE(0);
      if (length > MAX_MESSAGE_SIZE) {
        throw new ProtocolError('Response too large');
      }
      this.expected = length;
      const rest = joined.subarray(HEADER_SIZE);
      this.chunks = [rest];
      this.buffered = rest.length;
    }

    if (this.buffered < this.expected) return null;
    return Buffer.concat(this.chunks, this.buffered).subarray(0, this.expected);
  }
}
