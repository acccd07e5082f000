// packages/node-runtime/src/sink.ts
import { once }          from 'node:events';
import type { Writable } from 'node:stream';
import {
  FrontendEncoder,
  type FrontendMessage,
} from '../../core/src/index.js';

/**
 * Encode `messages` as one chunk and write it to `out`, waiting for
 * 'drain' when the stream asks for backpressure.
 *
 * Nothing is written when any message fails to encode.
 */
export async function writeMessages(
  out: Writable,
  messages: FrontendMessage | readonly FrontendMessage[],
  encoder: FrontendEncoder = new FrontendEncoder(),
): Promise<number> {
  const bytes = encoder.encode(messages).uint8array;
  if (!out.write(bytes)) {
    await once(out, 'drain');
  }
  return bytes.byteLength;
}
