import { blake2b } from '@noble/hashes/blake2b';
import { sha256 } from '@noble/hashes/sha256';
import { sha3_256 } from '@noble/hashes/sha3';

import { bytesToHex } from './bytes.js';
import { canonicalizeEntry } from './canonical.js';
import { AlgorithmMismatchError } from './errors.js';
import {
  CANONICAL_FORMAT,
  CANONICAL_FORMATS,
  DEFAULT_HASH_ALGORITHM,
  HASH_ALGORITHMS,
  type CanonicalFormat,
  type HashAlgorithm,
  type HashHex,
  type LogEntry,
} from './types.js';

const HASHERS: Record<HashAlgorithm, (data: Uint8Array) => Uint8Array> = {
  'SHA-256': (data) => sha256(data),
  'SHA3-256': (data) => sha3_256(data),
  'BLAKE2b-256': (data) => blake2b(data, { dkLen: 32 }),
};

export function isAllowedHashAlgorithm(value: unknown): value is HashAlgorithm {
  return HASH_ALGORITHMS.some((algorithm) => algorithm === value);
}

export function isAllowedCanonicalFormat(value: unknown): value is CanonicalFormat {
  return CANONICAL_FORMATS.some((format) => format === value);
}

/** Fail-closed lookup: anything off the allowlist is an algorithm mismatch. */
export function resolveHashAlgorithm(value: unknown): HashAlgorithm {
  if (value === undefined) return DEFAULT_HASH_ALGORITHM;
  if (!isAllowedHashAlgorithm(value)) {
    throw new AlgorithmMismatchError(
      `Unsupported hash algorithm: ${String(value)}`,
      HASH_ALGORITHMS.join(' | '),
      String(value)
    );
  }
  return value;
}

export function assertSameAlgorithm(expected: HashAlgorithm, received: unknown, what: string): void {
  if (!isAllowedHashAlgorithm(received)) {
    throw new AlgorithmMismatchError(
      `${what} uses an unsupported hash algorithm: ${String(received)}`,
      expected,
      String(received)
    );
  }
  if (received !== expected) {
    throw new AlgorithmMismatchError(
      `${what} was produced with ${received}, verifier is configured for ${expected}`,
      expected,
      received
    );
  }
}

export function assertCanonicalFormat(received: unknown, what: string): void {
  if (!isAllowedCanonicalFormat(received)) {
    throw new AlgorithmMismatchError(
      `${what} uses an unsupported canonical format: ${String(received)}`,
      CANONICAL_FORMAT,
      String(received)
    );
  }
}

export function digestBytes(data: Uint8Array, algorithm: HashAlgorithm): Uint8Array {
  return HASHERS[algorithm](data);
}

/** Hash canonical entry bytes to a 32-byte lowercase hex digest. */
export function hashEntry(
  canonical: Uint8Array,
  algorithm: HashAlgorithm = DEFAULT_HASH_ALGORITHM
): HashHex {
  return bytesToHex(digestBytes(canonical, algorithm));
}

export function hashLogEntry(
  entry: LogEntry,
  algorithm: HashAlgorithm = DEFAULT_HASH_ALGORITHM
): HashHex {
  return hashEntry(canonicalizeEntry(entry), algorithm);
}
