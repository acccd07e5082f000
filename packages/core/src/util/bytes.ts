/**
 * Tiny run-time test - are we really in Node/Bun
 */
function isNodeLike(): boolean {
  return (
    typeof process !== 'undefined' &&
    typeof process.versions === 'object' &&
    typeof Buffer === 'function'
  );
}

/* ------------------------------------------------------------------ */

export function concat(...chunks: Uint8Array[]): Uint8Array {
  const total = chunks.reduce((n, c) => n + c.byteLength, 0);
  const out   = new Uint8Array(total);
  let offset  = 0;
  for (const c of chunks) {
    out.set(c, offset);
    offset += c.byteLength;
  }
  return out;
}

/* ----------  Base64 encode  --------------------------------------- */
export function base64Encode(...chunks: Uint8Array[]): string {
  const data = concat(...chunks);

  if (isNodeLike()) {
    return Buffer.from(data.buffer, data.byteOffset, data.byteLength).toString('base64');
  }

  let binary = '';
  for (let i = 0; i < data.length; i++) binary += String.fromCharCode(data[i]);
  return btoa(binary);
}

/* ----------  Hex  ------------------------------------------------- */
export function hexEncode(u8: Uint8Array): string {
  let s = '';
  for (let i = 0; i < u8.length; i++) {
    s += u8[i].toString(16).padStart(2, '0');
  }
  return s;
}

export function hexDecode(hex: string): Uint8Array {
  const clean = hex.replace(/\s+/g, '');
  if (clean.length % 2 !== 0 || !/^[0-9a-fA-F]*$/.test(clean)) {
    throw new RangeError(`Invalid hex string: '${clean.slice(0, 12)}…'`);
  }
  const out = new Uint8Array(clean.length / 2);
  for (let i = 0; i < out.length; i++) {
    out[i] = parseInt(clean.slice(i * 2, i * 2 + 2), 16);
  }
  return out;
}
