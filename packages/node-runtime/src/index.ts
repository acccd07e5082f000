// packages/node-runtime/src/index.ts
import {
  FrontendEncoder,
  type FrontendEncoderOptions,
  type FrontendMessage,
} from '../../core/src/index.js';

export function createEncoder(cfg?: FrontendEncoderOptions): FrontendEncoder {
  return new FrontendEncoder(cfg);
}

/** Encode one or more messages straight into a Node `Buffer` (no copy). */
export function encodeToBuffer(
  messages: FrontendMessage | readonly FrontendMessage[],
  encoder: FrontendEncoder = createEncoder(),
): Buffer {
  const bytes = encoder.encode(messages).uint8array;
  return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength);
}

export { FrontendEncoder } from '../../core/src/index.js';
export { parseMessages, MessageSchema } from './messageSchema.js';
export { writeMessages } from './sink.js';
