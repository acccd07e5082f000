// packages/core/src/messages/encoders.ts
import {
  CANCEL_REQUEST_CODE,
  MESSAGE_TAGS,
  NULL_LENGTH,
} from '../config/defaults.js';
import type { ByteBuffer } from '../util/ByteBuffer.js';
import { writeCString }    from '../util/cstring.js';
import { writeFrame }      from '../util/frame.js';
import { toInt32, toUint16 } from '../util/narrow.js';
import { assertByte, assertInt16, assertInt32, assertUint32 } from '../util/range.js';
import type {
  BindMessage,
  CancelRequestMessage,
  CloseMessage,
  CopyDataMessage,
  CopyFailMessage,
  DescribeMessage,
  ExecuteMessage,
  FrontendMessage,
  ParseMessage,
  QueryMessage,
} from './types.js';

/* ------------------------------------------------------------------ */
/*  Field helpers                                                      */
/* ------------------------------------------------------------------ */

/**
 * uint16 element count followed by each element; the count is checked first.
 * Every index up to `length` is visited, so a hole reaches `writeItem` as
 * `undefined` instead of being skipped.
 */
function writeCounted<T>(
  buf: ByteBuffer,
  items: readonly T[],
  field: string,
  writeItem: (item: T, index: number) => void,
): void {
  buf.writeUint16(toUint16(items.length, `${field} count`));
  for (let i = 0; i < items.length; i++) writeItem(items[i], i);
}

function writeFormats(buf: ByteBuffer, formats: readonly number[], field: string): void {
  writeCounted(buf, formats, field, (f, i) =>
    buf.writeInt16(assertInt16(f, `${field}[${i}]`)));
}

/** `[tag] [len] [variant] name\0` shared by Close and Describe. */
function writeTargeted(
  buf: ByteBuffer,
  tag: number,
  kind: string,
  msg: CloseMessage | DescribeMessage,
): void {
  const variant = assertByte(msg.variant, `${kind}.variant`);
  buf.writeUint8(tag);
  writeFrame(buf, b => {
    b.writeUint8(variant);
    writeCString(b, msg.name, `${kind}.name`);
  });
}

/** Frame with nothing after the length field. */
function writeEmpty(buf: ByteBuffer, tag: number): void {
  buf.writeUint8(tag);
  writeFrame(buf, () => {});
}

/* ------------------------------------------------------------------ */
/*  One recipe per message kind                                        */
/* ------------------------------------------------------------------ */

export function writeBind(buf: ByteBuffer, msg: BindMessage): void {
  buf.writeUint8(MESSAGE_TAGS.bind);
  writeFrame(buf, b => {
    writeCString(b, msg.portal, 'bind.portal');
    writeCString(b, msg.statement, 'bind.statement');
    writeFormats(b, msg.formats, 'bind.formats');

    writeCounted(b, msg.values, 'bind.values', (value, i) => {
      if (value == null) {
        b.writeInt32(NULL_LENGTH);
        return;
      }
      b.writeInt32(toInt32(value.byteLength, `bind.values[${i}] length`));
      b.writeBytes(value);
    });

    writeFormats(b, msg.resultFormats, 'bind.resultFormats');
  });
}

/** Untagged: the request code inside the body identifies it. */
export function writeCancelRequest(buf: ByteBuffer, msg: CancelRequestMessage): void {
  const processId = assertInt32(msg.processId, 'cancelRequest.processId');
  const secretKey = assertInt32(msg.secretKey, 'cancelRequest.secretKey');
  writeFrame(buf, b => {
    b.writeInt32(CANCEL_REQUEST_CODE);
    b.writeInt32(processId);
    b.writeInt32(secretKey);
  });
}

export function writeClose(buf: ByteBuffer, msg: CloseMessage): void {
  writeTargeted(buf, MESSAGE_TAGS.close, 'close', msg);
}

export function writeCopyData(buf: ByteBuffer, msg: CopyDataMessage): void {
  buf.writeUint8(MESSAGE_TAGS.copyData);
  writeFrame(buf, b => { b.writeBytes(msg.data); });
}

export function writeCopyFail(buf: ByteBuffer, msg: CopyFailMessage): void {
  buf.writeUint8(MESSAGE_TAGS.copyFail);
  writeFrame(buf, b => writeCString(b, msg.message, 'copyFail.message'));
}

export function writeDescribe(buf: ByteBuffer, msg: DescribeMessage): void {
  writeTargeted(buf, MESSAGE_TAGS.describe, 'describe', msg);
}

export function writeExecute(buf: ByteBuffer, msg: ExecuteMessage): void {
  const maxRows = assertInt32(msg.maxRows, 'execute.maxRows');
  buf.writeUint8(MESSAGE_TAGS.execute);
  writeFrame(buf, b => {
    writeCString(b, msg.portal, 'execute.portal');
    b.writeInt32(maxRows);
  });
}

export function writeParse(buf: ByteBuffer, msg: ParseMessage): void {
  buf.writeUint8(MESSAGE_TAGS.parse);
  writeFrame(buf, b => {
    writeCString(b, msg.name, 'parse.name');
    writeCString(b, msg.query, 'parse.query');
    writeCounted(b, msg.paramTypes, 'parse.paramTypes', (oid, i) =>
      b.writeUint32(assertUint32(oid, `parse.paramTypes[${i}]`)));
  });
}

export function writeQuery(buf: ByteBuffer, msg: QueryMessage): void {
  buf.writeUint8(MESSAGE_TAGS.query);
  writeFrame(buf, b => writeCString(b, msg.sql, 'query.sql'));
}

/* ------------------------------------------------------------------ */
/*  Dispatch                                                           */
/* ------------------------------------------------------------------ */

/**
 * Append exactly one frame for `msg`. Does not roll back on failure: a throw
 * from inside the body leaves a partial frame at the tail of `buf`.
 */
export function writeMessage(buf: ByteBuffer, msg: FrontendMessage): void {
  switch (msg.type) {
    case 'bind':          return writeBind(buf, msg);
    case 'cancelRequest': return writeCancelRequest(buf, msg);
    case 'close':         return writeClose(buf, msg);
    case 'copyData':      return writeCopyData(buf, msg);
    case 'copyDone':      return writeEmpty(buf, MESSAGE_TAGS.copyDone);
    case 'copyFail':      return writeCopyFail(buf, msg);
    case 'describe':      return writeDescribe(buf, msg);
    case 'execute':       return writeExecute(buf, msg);
    case 'flush':         return writeEmpty(buf, MESSAGE_TAGS.flush);
    case 'parse':         return writeParse(buf, msg);
    case 'query':         return writeQuery(buf, msg);
    case 'sync':          return writeEmpty(buf, MESSAGE_TAGS.sync);
    case 'terminate':     return writeEmpty(buf, MESSAGE_TAGS.terminate);
    default: {
      const unknown: never = msg;
      throw new TypeError(`Unknown frontend message: ${JSON.stringify(unknown)}`);
    }
  }
}
