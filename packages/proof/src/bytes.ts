/**
 * Byte helpers shared by the proof model and codec.
 *
 * Digests are carried as Uint8Array everywhere; hex only appears at the
 * edges (map keys, logs, file names, HTTP paths).
 */

const HEX_PATTERN = /^(?:[0-9a-fA-F]{2})*$/;

export function toHex(bytes: Uint8Array): string {
  return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString("hex");
}

/**
 * Decode a hex string.
 *
 * @throws Error if the string has odd length or non-hex characters
 */
export function fromHex(hex: string): Uint8Array {
  if (!HEX_PATTERN.test(hex)) {
    throw new Error(`Invalid hex string: "${hex.slice(0, 32)}"`);
  }
  return new Uint8Array(Buffer.from(hex, "hex"));
}

/**
 * Hex of the byte-reversed value.
 *
 * Block hashes and merkle roots are displayed this way by chain nodes
 * and explorers.
 */
export function toReversedHex(bytes: Uint8Array): string {
  return toHex(Uint8Array.from(bytes).reverse());
}

export function concatBytes(...parts: readonly Uint8Array[]): Uint8Array {
  let length = 0;
  for (const part of parts) length += part.length;

  const out = new Uint8Array(length);
  let offset = 0;
  for (const part of parts) {
    out.set(part, offset);
    offset += part.length;
  }
  return out;
}

/** Lexicographic comparison; a strict prefix sorts first. */
export function compareBytes(a: Uint8Array, b: Uint8Array): number {
  const n = Math.min(a.length, b.length);
  for (let i = 0; i < n; i++) {
    const diff = (a[i] ?? 0) - (b[i] ?? 0);
    if (diff !== 0) return diff < 0 ? -1 : 1;
  }
  if (a.length === b.length) return 0;
  return a.length < b.length ? -1 : 1;
}

export function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
  return compareBytes(a, b) === 0;
}

export function utf8Encode(text: string): Uint8Array {
  return new TextEncoder().encode(text);
}
