import {
  INT16_MAX,
  INT16_MIN,
  INT32_MAX,
  INT32_MIN,
  UINT32_MAX,
} from '../config/defaults.js';
import { FieldRangeError } from '../errors/index.js';

function assertIntegerIn(
  value: number,
  min: number,
  max: number,
  field: string,
): number {
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new FieldRangeError(field, value);
  }
  return value;
}

export const assertByte   = (v: number, field: string): number => assertIntegerIn(v, 0, 0xFF, field);
export const assertInt16  = (v: number, field: string): number => assertIntegerIn(v, INT16_MIN, INT16_MAX, field);
export const assertInt32  = (v: number, field: string): number => assertIntegerIn(v, INT32_MIN, INT32_MAX, field);
export const assertUint32 = (v: number, field: string): number => assertIntegerIn(v, 0, UINT32_MAX, field);
