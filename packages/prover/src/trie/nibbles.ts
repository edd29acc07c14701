export type Nibbles = number[];

export function bytesToNibbles(bytes: Uint8Array): Nibbles {
  const nibbles: Nibbles = new Array<number>(bytes.length * 2);
  for (let i = 0; i < bytes.length; i++) {
    nibbles[2 * i] = bytes[i] >> 4;
    nibbles[2 * i + 1] = bytes[i] & 0x0f;
  }
  return nibbles;
}

/**
 * Decode the hex-prefix (compact) encoding of a leaf or extension path.
 * The high nibble of the first byte is the flag: 0 and 1 for extensions, 2 and 3 for leaves,
 * odd flags carry the first path nibble in the low nibble.
 * Returns null for an invalid flag or padding.
 */
export function decodeHexPrefix(encoded: Uint8Array): {path: Nibbles; isLeaf: boolean} | null {
  if (encoded.length === 0) {
    return null;
  }

  const nibbles = bytesToNibbles(encoded);
  const flag = nibbles[0];
  if (flag > 3) {
    return null;
  }

  const isLeaf = flag >= 2;
  const isOdd = flag % 2 === 1;
  if (!isOdd && nibbles[1] !== 0) {
    return null;
  }

  return {path: nibbles.slice(isOdd ? 1 : 2), isLeaf};
}

/** Length of the common prefix of `a` and `b[offset:]` */
export function matchingNibbleLength(a: Nibbles, b: Nibbles, offset: number): number {
  let i = 0;
  while (i < a.length && offset + i < b.length && a[i] === b[offset + i]) {
    i++;
  }
  return i;
}
