// packages/core/src/index.ts

import { DEFAULT_OPTIONS, MESSAGE_TAGS } from './config/defaults.js';
import { writeMessage }                  from './messages/encoders.js';
import type { FrontendMessage }          from './messages/types.js';
import { ByteBuffer }                    from './util/ByteBuffer.js';
import { ConvertibleOutput }             from './util/Convertible.js';
import {
  createLogger,
  type Verbosity,
  type Logger,
} from './util/logger.js';

// ────────────────────────────────────────────────────────────────────────────
//  Stateless entry points
// ────────────────────────────────────────────────────────────────────────────

/**
 * Append exactly one complete frame for `message` to `out`.
 *
 * On failure the error is rethrown after `out` is truncated back to the
 * length it had before the call, so the buffer only ever holds whole frames.
 */
export function encode(message: FrontendMessage, out: ByteBuffer): void {
  const mark = out.length;
  try {
    writeMessage(out, message);
  } catch (err) {
    out.truncate(mark);
    throw err;
  }
}

/**
 * Append one frame per message, in order. When any message fails, the frames
 * written by earlier messages stay and the failing one is rolled back.
 */
export function encodeMessages(
  messages: Iterable<FrontendMessage>,
  out: ByteBuffer = new ByteBuffer(),
): ByteBuffer {
  for (const m of messages) encode(m, out);
  return out;
}

// ────────────────────────────────────────────────────────────────────────────
//  Configured encoder
// ────────────────────────────────────────────────────────────────────────────

/**
 * Options for configuring FrontendEncoder behavior.
 */
export interface FrontendEncoderOptions {
  /** Starting capacity of buffers created by `encode()` */
  initialCapacity? : number;
  /** Verbosity level 0-4 for logging (0 = errors only) */
  verbose?         : Verbosity;
  /** Optional custom logger callback (receives formatted messages) */
  logger?          : (msg: string) => void;
}

/**
 * Encodes frontend messages with shared options and diagnostics.
 * Holds no per-message state; one instance may serve any number of buffers.
 */
export class FrontendEncoder {
  private readonly initialCapacity: number;
  private readonly log            : Logger;

  constructor(opt: FrontendEncoderOptions = {}) {
    this.initialCapacity = opt.initialCapacity ?? DEFAULT_OPTIONS.initialCapacity;
    this.log             = createLogger(opt.verbose ?? DEFAULT_OPTIONS.verbose, opt.logger);
  }

  /** Encode one or more messages into a fresh buffer. */
  encode(messages: FrontendMessage | readonly FrontendMessage[]): ConvertibleOutput {
    const out  = new ByteBuffer(this.initialCapacity);
    const list = 'type' in messages ? [messages] : messages;
    for (const m of list) this.encodeInto(m, out);
    return new ConvertibleOutput(out.toUint8Array());
  }

  /** Append one frame to a caller-owned buffer; see {@link encode}. */
  encodeInto(message: FrontendMessage, out: ByteBuffer): void {
    const mark = out.length;
    try {
      encode(message, out);
    } catch (err) {
      const name = err instanceof Error ? err.name : 'Error';
      const msg  = err instanceof Error ? err.message : String(err);
      this.log.log(1, `${message.type}: ${name}: ${msg}`);
      throw err;
    }
    this.log.log(3, `${message.type} ${describeTag(message)} ${out.length - mark} bytes`);
  }
}

function describeTag(message: FrontendMessage): string {
  const tag = MESSAGE_TAGS[message.type];
  return tag === null ? '(untagged)' : `'${String.fromCharCode(tag)}'`;
}

// ────────────────────────────────────────────────────────────────────────────
//  Re-exports
// ────────────────────────────────────────────────────────────────────────────

export * from './errors/index.js';
export * from './messages/types.js';
export {
  writeBind,
  writeCancelRequest,
  writeClose,
  writeCopyData,
  writeCopyFail,
  writeDescribe,
  writeExecute,
  writeMessage,
  writeParse,
  writeQuery,
} from './messages/encoders.js';
export {
  CANCEL_REQUEST_CODE,
  DEFAULT_OPTIONS,
  MESSAGE_TAGS,
  TargetVariant,
  type MessageKind,
} from './config/defaults.js';
export { ByteBuffer }                       from './util/ByteBuffer.js';
export { ConvertibleOutput }                from './util/Convertible.js';
export { writeCString }                     from './util/cstring.js';
export { writeFrame, decodeFrameLen, FRAME_HEADER_BYTES, type PayloadWriter } from './util/frame.js';
export { narrow, toInt32, toUint16, type WireWidth } from './util/narrow.js';
export { createLogger, isVerbosity, type Logger, type Verbosity } from './util/logger.js';
export { hexDecode, hexEncode, base64Encode } from './util/bytes.js';
