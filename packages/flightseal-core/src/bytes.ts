import { bytesToHex, concatBytes, hexToBytes, utf8ToBytes } from '@noble/hashes/utils';

const HASH_HEX_RE = /^[0-9a-f]{64}$/;

export function isHashHex(value: unknown): value is string {
  return typeof value === 'string' && HASH_HEX_RE.test(value);
}

export { bytesToHex, hexToBytes };

/**
 * Append-only big-endian byte builder used by every preimage in the
 * canonical layout (entries, chain links, digests).
 */
export class ByteWriter {
  private readonly chunks: Uint8Array[] = [];

  u8(value: number): this {
    this.chunks.push(Uint8Array.of(value));
    return this;
  }

  u32(value: number): this {
    const out = new Uint8Array(4);
    new DataView(out.buffer).setUint32(0, value, false);
    this.chunks.push(out);
    return this;
  }

  u64(value: number | bigint): this {
    const out = new Uint8Array(8);
    new DataView(out.buffer).setBigUint64(0, BigInt(value), false);
    this.chunks.push(out);
    return this;
  }

  /** -0 is written as +0 and every NaN as the quiet NaN 0x7ff8000000000000. */
  f64(value: number): this {
    const out = new Uint8Array(8);
    const view = new DataView(out.buffer);
    if (Number.isNaN(value)) {
      view.setUint32(0, 0x7ff80000, false);
    } else {
      view.setFloat64(0, value === 0 ? 0 : value, false);
    }
    this.chunks.push(out);
    return this;
  }

  raw(bytes: Uint8Array): this {
    this.chunks.push(bytes);
    return this;
  }

  /** Length-prefixed bytes: u32be(len) ‖ bytes. */
  lengthPrefixed(bytes: Uint8Array): this {
    return this.u32(bytes.length).raw(bytes);
  }

  /** Length-prefixed UTF-8 of the NFC form. Callers reject lone surrogates first. */
  text(value: string): this {
    return this.lengthPrefixed(utf8ToBytes(value.normalize('NFC')));
  }

  finish(): Uint8Array {
    return concatBytes(...this.chunks);
  }
}

export function compareBytes(a: Uint8Array, b: Uint8Array): number {
  const len = Math.min(a.length, b.length);
  for (let i = 0; i < len; i++) {
    const diff = (a[i] ?? 0) - (b[i] ?? 0);
    if (diff !== 0) return diff;
  }
  return a.length - b.length;
}
