// packages/core/src/util/Convertible.ts
import { base64Encode, hexEncode } from './bytes.js';

/**
 * Wraps encoded frame bytes and exposes multiple views.
 * String(result) yields hex, the form protocol traces are usually read in.
 */
export class ConvertibleOutput {
  constructor(private readonly bytes: Uint8Array) {}

  /** Raw bytes view (do NOT mutate). */
  get uint8array(): Uint8Array { return this.bytes; }

  get byteLength(): number { return this.bytes.byteLength; }

  /** Base64 view of the underlying bytes. */
  get base64(): string { return base64Encode(this.bytes); }

  /** Lower-case hex view of the underlying bytes. */
  get hex(): string { return hexEncode(this.bytes); }

  toString(): string { return this.hex; }
}
