/**
 * MurmurHash3 (x86, 32-bit, seed 0)
 *
 * Results are signed 32-bit integers, matching the `asInt()` view of the hash
 * that fingerprints written by other writers were computed with.
 */

const C1 = 0xcc9e2d51;
const C2 = 0x1b873593;

const utf8 = new TextEncoder();

function mixK1(k1: number): number {
  k1 = Math.imul(k1, C1);
  k1 = (k1 << 15) | (k1 >>> 17);
  return Math.imul(k1, C2);
}

function mixH1(h1: number, k1: number): number {
  h1 ^= k1;
  h1 = (h1 << 13) | (h1 >>> 19);
  return (Math.imul(h1, 5) + 0xe6546b64) | 0;
}

function fmix(h1: number, length: number): number {
  h1 ^= length;
  h1 ^= h1 >>> 16;
  h1 = Math.imul(h1, 0x85ebca6b);
  h1 ^= h1 >>> 13;
  h1 = Math.imul(h1, 0xc2b2ae35);
  h1 ^= h1 >>> 16;
  return h1 | 0;
}

/** Hash raw bytes */
export function murmur3Hash32(data: Uint8Array): number {
  const view = new DataView(data.buffer, data.byteOffset, data.byteLength);
  const nblocks = Math.floor(data.length / 4);
  let h1 = 0;

  for (let i = 0; i < nblocks; i++) {
    h1 = mixH1(h1, mixK1(view.getUint32(i * 4, true)));
  }

  // Tail
  const offset = nblocks * 4;
  let k1 = 0;
  const tail = data.length & 3;
  if (tail >= 3) {
    k1 ^= view.getUint8(offset + 2) << 16;
  }
  if (tail >= 2) {
    k1 ^= view.getUint8(offset + 1) << 8;
  }
  if (tail >= 1) {
    k1 ^= view.getUint8(offset);
    h1 ^= mixK1(k1);
  }

  return fmix(h1, data.length);
}

/** Hash the UTF-8 encoding of a string */
export function murmur3HashString(value: string): number {
  return murmur3Hash32(utf8.encode(value));
}

/** Hash a 32-bit integer as its four little-endian bytes */
export function murmur3HashInt(value: number): number {
  const bytes = new Uint8Array(4);
  new DataView(bytes.buffer).setInt32(0, value, true);
  return murmur3Hash32(bytes);
}
