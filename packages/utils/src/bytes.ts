const hexByByte: string[] = [];

/**
 * Hex encode bytes with a `0x` prefix
 */
export function toHex(bytes: Uint8Array): string {
  let hex = "0x";
  for (const byte of bytes) {
    if (!hexByByte[byte]) {
      hexByByte[byte] = byte < 16 ? "0" + byte.toString(16) : byte.toString(16);
    }
    hex += hexByByte[byte];
  }
  return hex;
}

/**
 * Decode a hex string, with or without `0x` prefix. Odd length strings are left padded.
 */
export function fromHex(hex: string): Uint8Array {
  let str = hex.startsWith("0x") ? hex.slice(2) : hex;
  if (str.length % 2 !== 0) {
    str = "0" + str;
  }
  if (!/^[0-9a-fA-F]*$/.test(str)) {
    throw Error(`Invalid hex string ${hex}`);
  }

  const bytes = new Uint8Array(str.length / 2);
  for (let i = 0; i < bytes.length; i++) {
    bytes[i] = parseInt(str.slice(i * 2, i * 2 + 2), 16);
  }
  return bytes;
}

/**
 * Hex encode a 32 byte root
 */
export function toRootHex(root: Uint8Array): string {
  if (root.length !== 32) {
    throw Error(`Expect root to be 32 bytes, got ${root.length}`);
  }
  return toHex(root);
}

export function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) {
    return false;
  }
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) return false;
  }
  return true;
}

/**
 * Format bytes as `0x1234…abcd`
 */
export function prettyBytes(root: Uint8Array | string): string {
  const str = typeof root === "string" ? root : toHex(root);
  return `${str.slice(0, 6)}…${str.slice(-4)}`;
}
