// packages/core/src/util/cstring.ts
import { EmbeddedNullError } from '../errors/index.js';
import type { ByteBuffer }   from './ByteBuffer.js';

const utf8 = new TextEncoder();

/**
 * Append `text` as UTF-8 followed by one 0x00 terminator.
 * The buffer is untouched when the text already contains a NUL byte.
 */
export function writeCString(buf: ByteBuffer, text: string, field = 'string'): void {
  const bytes = utf8.encode(text);
  if (bytes.includes(0)) throw new EmbeddedNullError(field);
  buf.writeBytes(bytes);
  buf.writeUint8(0);
}
