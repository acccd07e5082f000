import { ByteBuffer }        from '../../src/util/ByteBuffer.js';
import { writeCString }      from '../../src/util/cstring.js';
import { hexEncode }         from '../../src/util/bytes.js';
import { EmbeddedNullError } from '../../src/errors/index.js';

describe('writeCString', () => {
  it('appends UTF-8 bytes and one terminator', () => {
    const buf = new ByteBuffer();
    writeCString(buf, 'héllo');
    expect(hexEncode(buf.toUint8Array())).toBe('68c3a96c6c6f00');
  });

  it('writes a lone terminator for the empty string', () => {
    const buf = new ByteBuffer();
    writeCString(buf, '');
    expect(Array.from(buf.toUint8Array())).toEqual([0]);
  });

  it.each(['\0', 'a\0', '\0b', 'a\0b'])('rejects %j and leaves the buffer unmodified', text => {
    const buf = new ByteBuffer();
    buf.writeUint8(0x7f);
    expect(() => writeCString(buf, text, 'portal')).toThrow(EmbeddedNullError);
    expect(Array.from(buf.toUint8Array())).toEqual([0x7f]);
  });

  it('names the offending field', () => {
    expect(() => writeCString(new ByteBuffer(), 'x\0', 'parse.query'))
      .toThrow('parse.query contains an embedded null byte');
  });
});
