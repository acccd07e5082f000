import { ConvertibleOutput } from '../../src/util/Convertible.js';

describe('ConvertibleOutput', () => {
  const bytes = new Uint8Array([0x53, 0, 0, 0, 4]);

  it('exposes hex / base64 / uint8array views', () => {
    const out = new ConvertibleOutput(bytes);

    expect(out.hex).toBe('5300000004');
    expect(out.base64).toBe('UwAAAAQ=');
    expect(out.uint8array).toBe(bytes);
    expect(out.byteLength).toBe(5);
  });

  it('String(output) yields hex', () => {
    expect(String(new ConvertibleOutput(bytes))).toBe('5300000004');
  });
});
