// packages/core/src/util/frame.ts
import type { ByteBuffer } from './ByteBuffer.js';
import { toInt32 }         from './narrow.js';

/** Size of the int32 length field that opens every frame body. */
export const FRAME_HEADER_BYTES = 4;

/** Writes the body of one frame; may append any number of bytes or throw. */
export type PayloadWriter = (buf: ByteBuffer) => void;

/**
 * Reserve a 4-byte length, run `payload`, then patch the length in place.
 *
 * The length counts itself plus the payload, never a preceding tag byte.
 * When `payload` throws, the error propagates and the placeholder plus any
 * partial payload stay in `buf`; callers must truncate or discard it.
 */
export function writeFrame(buf: ByteBuffer, payload: PayloadWriter): void {
  const base = buf.length;
  buf.writeInt32(0);

  payload(buf);

  const size = toInt32(buf.length - base, 'frame length');
  buf.setInt32(base, size);
}

/** Read the big-endian length of the frame whose length field starts at `off`. */
export function decodeFrameLen(buf: Uint8Array, off = 0): number {
  if (buf.length - off < FRAME_HEADER_BYTES) {
    throw new RangeError('Not enough bytes for frame header');
  }
  return new DataView(buf.buffer, buf.byteOffset + off, FRAME_HEADER_BYTES)
           .getInt32(0, false);
}
