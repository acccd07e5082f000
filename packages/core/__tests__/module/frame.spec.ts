import { ByteBuffer }                   from '../../src/util/ByteBuffer.js';
import { writeFrame, decodeFrameLen, FRAME_HEADER_BYTES } from '../../src/util/frame.js';
import { hexEncode }                    from '../../src/util/bytes.js';

describe('writeFrame', () => {
  it('length counts itself plus the payload', () => {
    const buf = new ByteBuffer();
    writeFrame(buf, b => { b.writeBytes(new Uint8Array([1, 2, 3])); });
    expect(hexEncode(buf.toUint8Array())).toBe('00000007010203');
  });

  it('empty payload gives length 4', () => {
    const buf = new ByteBuffer();
    writeFrame(buf, () => {});
    expect(hexEncode(buf.toUint8Array())).toBe('00000004');
  });

  it('does not count bytes written before the frame (tag)', () => {
    const buf = new ByteBuffer();
    buf.writeUint8(0x78);
    writeFrame(buf, b => { b.writeUint16(0); });
    expect(hexEncode(buf.toUint8Array())).toBe('78000000060000');
  });

  it('patches the right placeholder when frames follow each other', () => {
    const buf = new ByteBuffer(1);
    writeFrame(buf, b => { b.writeUint8(1); });
    writeFrame(buf, b => { b.writeUint32(2); });
    expect(hexEncode(buf.toUint8Array())).toBe('0000000501' + '0000000800000002');
  });

  it('propagates a payload failure and leaves the partial frame in place', () => {
    const buf = new ByteBuffer();
    expect(() => writeFrame(buf, b => {
      b.writeUint8(0xee);
      throw new Error('payload failed');
    })).toThrow('payload failed');
    expect(hexEncode(buf.toUint8Array())).toBe('00000000ee');
  });
});

describe('decodeFrameLen', () => {
  it('reads the big-endian length at an offset', () => {
    expect(decodeFrameLen(new Uint8Array([0x63, 0, 0, 0, 4]), 1)).toBe(4);
  });

  it('throws when fewer than four bytes remain', () => {
    expect(() => decodeFrameLen(new Uint8Array([0, 0, 0]))).toThrow(RangeError);
  });

  it('reads back what writeFrame patched, header size included', () => {
    const buf = new ByteBuffer();
    writeFrame(buf, b => { b.writeBytes(new Uint8Array(10)); });
    expect(FRAME_HEADER_BYTES).toBe(4);
    expect(decodeFrameLen(buf.toUint8Array())).toBe(FRAME_HEADER_BYTES + 10);
  });
});
