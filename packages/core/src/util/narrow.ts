// packages/core/src/util/narrow.ts
import { INT32_MAX, UINT16_MAX } from '../config/defaults.js';
import { ValueTooLargeError }    from '../errors/index.js';

/** Integer widths a size may be narrowed into before it goes on the wire. */
export type WireWidth = 'uint16' | 'int32';

const WIDTH_MAX: Record<WireWidth, number> = {
  uint16: UINT16_MAX,
  int32 : INT32_MAX,
};

/**
 * Convert a non-negative size (element count, byte length) into `width`.
 * Throws `ValueTooLargeError` instead of truncating when it does not fit.
 */
export function narrow(size: number, width: WireWidth, field = 'value'): number {
  if (!Number.isInteger(size) || size < 0) {
    throw new RangeError(`${field}: size must be a non-negative integer, got ${size}`);
  }
  const max = WIDTH_MAX[width];
  if (size > max) throw new ValueTooLargeError(field, size, max);
  return size;
}

export const toUint16 = (size: number, field?: string): number => narrow(size, 'uint16', field);
export const toInt32  = (size: number, field?: string): number => narrow(size, 'int32', field);
