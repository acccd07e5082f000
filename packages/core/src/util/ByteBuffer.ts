// packages/core/src/util/ByteBuffer.ts
import { DEFAULT_OPTIONS } from '../config/defaults.js';

/**
 * Growable, append-only byte buffer owned by the caller.
 * Every multi-byte integer is written big-endian (network order).
 *
 * Views returned by `subarray()` alias the backing store and become stale on
 * the next write that grows it; use `toUint8Array()` for a stable copy.
 */
export class ByteBuffer {
  #buf : Uint8Array;
  #view: DataView;
  #len = 0;

  constructor(initialCapacity: number = DEFAULT_OPTIONS.initialCapacity) {
    if (!Number.isInteger(initialCapacity) || initialCapacity < 0) {
      throw new RangeError(`Invalid initialCapacity: ${initialCapacity}`);
    }
    this.#buf  = new Uint8Array(initialCapacity);
    this.#view = new DataView(this.#buf.buffer);
  }

  /** Number of bytes written so far */
  get length(): number { return this.#len; }

  /** Bytes the backing store can hold before it has to grow */
  get capacity(): number { return this.#buf.byteLength; }

  writeUint8(v: number): this {
    this.ensure(1);
    this.#buf[this.#len++] = v;
    return this;
  }

  writeInt16(v: number): this {
    this.ensure(2);
    this.#view.setInt16(this.#len, v, false);
    this.#len += 2;
    return this;
  }

  writeUint16(v: number): this {
    this.ensure(2);
    this.#view.setUint16(this.#len, v, false);
    this.#len += 2;
    return this;
  }

  writeInt32(v: number): this {
    this.ensure(4);
    this.#view.setInt32(this.#len, v, false);
    this.#len += 4;
    return this;
  }

  writeUint32(v: number): this {
    this.ensure(4);
    this.#view.setUint32(this.#len, v, false);
    this.#len += 4;
    return this;
  }

  writeBytes(bytes: Uint8Array): this {
    this.ensure(bytes.byteLength);
    this.#buf.set(bytes, this.#len);
    this.#len += bytes.byteLength;
    return this;
  }

  /** Overwrite 4 already-written bytes at `offset` with a big-endian int32. */
  setInt32(offset: number, v: number): void {
    if (offset < 0 || offset + 4 > this.#len) {
      throw new RangeError('setInt32() outside written bytes');
    }
    this.#view.setInt32(offset, v, false);
  }

  /** Drop everything after `length`; used to discard a half-written frame. */
  truncate(length: number): void {
    if (!Number.isInteger(length) || length < 0 || length > this.#len) {
      throw new RangeError(`truncate(${length}) outside written bytes`);
    }
    this.#len = length;
  }

  clear(): void { this.#len = 0; }

  /** Live view of `[start, end)` of the written bytes (no copy). */
  subarray(start = 0, end = this.#len): Uint8Array {
    return this.#buf.subarray(start, Math.min(end, this.#len));
  }

  /** Fresh copy of the written bytes */
  toUint8Array(): Uint8Array {
    return this.#buf.slice(0, this.#len);
  }

  /* ------------------------------------------------------------------ */
  /*  Internals                                                          */
  /* ------------------------------------------------------------------ */

  private ensure(extra: number): void {
    const need = this.#len + extra;
    if (need <= this.#buf.byteLength) return;

    const next = new Uint8Array(Math.max(this.#buf.byteLength * 2, need, 16));
    next.set(this.#buf.subarray(0, this.#len));
    this.#buf  = next;
    this.#view = new DataView(next.buffer);
  }
}
