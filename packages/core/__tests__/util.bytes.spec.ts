import {
  base64Encode,
  concat,
  hexDecode,
  hexEncode,
} from '../src/util/bytes.js';

describe('util/bytes helpers', () => {
  const a = new Uint8Array([1, 2, 3]);
  const b = new Uint8Array([4, 5]);

  it('concats arbitrary Uint8Arrays', () => {
    expect(Array.from(concat(a, b))).toEqual([1, 2, 3, 4, 5]);
  });

  it('base64-encodes the concatenation of all chunks', () => {
    expect(base64Encode(a, b)).toBe('AQIDBAU=');
  });

  it('hex-encodes with two lower-case digits per byte', () => {
    expect(hexEncode(new Uint8Array([0, 10, 255]))).toBe('000aff');
  });

  it('hex-decodes and ignores whitespace', () => {
    expect(Array.from(hexDecode('0a ff\n01'))).toEqual([10, 255, 1]);
  });

  it('rejects odd-length hex', () => {
    expect(() => hexDecode('abc')).toThrow(RangeError);
  });

  it('rejects non-hex characters', () => {
    expect(() => hexDecode('zz')).toThrow(RangeError);
  });
});
