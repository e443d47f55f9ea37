import { EncodingError, DecodingError } from "../errors/index.js";

/**
 * Tiny run-time test - are we really in Node
 */
function isNodeLike(): boolean {
  return (
    typeof process !== 'undefined' &&
    typeof process.versions === 'object' &&
    typeof process.versions.node === 'string' &&
    typeof Buffer !== 'undefined'
  );
}

const BASE64_RE = /^[A-Za-z0-9+/]+={0,2}$/;

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

/** XOR every byte with a single-byte mask, returning a fresh copy. */
export function xorBytes(data: Uint8Array, mask: number): Uint8Array {
  const out = new Uint8Array(data.length);
  const m   = mask & 0xff;
  for (let i = 0; i < data.length; i++) out[i] = data[i] ^ m;
  return out;
}

export function readUint32LE(buf: Uint8Array, offset = 0): number {
  return new DataView(buf.buffer, buf.byteOffset, buf.byteLength)
    .getUint32(offset, true);
}

export function writeUint32LE(value: number): Uint8Array {
  const out = new Uint8Array(4);
  new DataView(out.buffer).setUint32(0, value, true);
  return out;
}

/* ----------  Base64 encode  --------------------------------------- */
export function base64Encode(...chunks: Uint8Array[]): string {
  try {
    const data = concat(...chunks);

    if (isNodeLike()) {
      return Buffer.from(data.buffer, data.byteOffset, data.byteLength).toString('base64');
    }

    let binary = '';
    for (let i = 0; i < data.length; i++) binary += String.fromCharCode(data[i]);
    return btoa(binary);
  } catch (err) {
    throw new EncodingError(
      `Base64 Encoding Error: ${err instanceof Error ? err.message : String(err)}`,
    );
  }
}

/* ----------  Base64 decode  --------------------------------------- */
/**
 * Strict decode: standard alphabet, mandatory padding, no whitespace.
 * Node's `Buffer` silently skips garbage, so the shape is checked up front.
 */
export function base64Decode(b64: string): Uint8Array {
  if (!BASE64_RE.test(b64) || b64.length % 4 !== 0) {
    throw new DecodingError(
      `Invalid Base64: length=${b64.length}, content='${b64.slice(0, 12)}…'`,
    );
  }

  if (isNodeLike()) {
    return new Uint8Array(Buffer.from(b64, 'base64'));
  }

  const bin = atob(b64);
  const out = new Uint8Array(bin.length);
  for (let i = 0; i < bin.length; i++) out[i] = bin.charCodeAt(i);
  return out;
}
