import { utf8ToBytes } from '@noble/hashes/utils';

import { ByteWriter, bytesToHex, hexToBytes } from './bytes.js';
import { hasLoneSurrogate } from './canonical.js';
import { MalformedInputError, SequenceError } from './errors.js';
import { digestBytes, resolveHashAlgorithm } from './hash.js';
import {
  CANONICAL_FORMAT,
  GENESIS_CHAIN_HASH,
  type ChainLink,
  type DigestSummary,
  type HashAlgorithm,
  type HashHex,
  type MissionDigest,
} from './types.js';

const DIGEST_MAGIC = utf8ToBytes('FSD1');

export type DigestHashInput = Omit<MissionDigest, 'created_at' | 'digest_hash'>;

export interface FinalizeOptions {
  hashAlgorithm?: HashAlgorithm;
  now?: () => Date;
}

/**
 * H("FSD1" ‖ str(digest_version) ‖ str(mission_id) ‖ u64be(entry_count)
 *   ‖ final_chain_hash ‖ str(hash_algorithm) ‖ str(canonical_format))
 *
 * created_at is not part of the preimage.
 */
export function computeDigestHash(input: DigestHashInput): HashHex {
  const preimage = new ByteWriter()
    .raw(DIGEST_MAGIC)
    .text(input.digest_version)
    .text(input.mission_id)
    .u64(input.entry_count)
    .raw(hexToBytes(input.final_chain_hash))
    .text(input.hash_algorithm)
    .text(input.canonical_format)
    .finish();
  return bytesToHex(digestBytes(preimage, input.hash_algorithm));
}

export function verifyDigestHash(digest: MissionDigest): boolean {
  return computeDigestHash(digest) === digest.digest_hash;
}

/**
 * Summarize a chain into a mission digest. Callable mid-mission for
 * intermediate anchoring or once the log is complete.
 */
export function finalize(
  missionId: string,
  finalLink: ChainLink | null,
  entryCount: number,
  opts: FinalizeOptions = {}
): MissionDigest {
  if (typeof missionId !== 'string' || missionId.length === 0) {
    throw new MalformedInputError('Mission id must be a non-empty string', { path: 'mission_id' });
  }
  if (hasLoneSurrogate(missionId)) {
    throw new MalformedInputError('Mission id contains a lone surrogate', { path: 'mission_id' });
  }

  const covered = finalLink === null ? 0 : finalLink.index + 1;
  if (!Number.isSafeInteger(entryCount) || entryCount !== covered) {
    throw new SequenceError(
      `Entry count ${entryCount} does not match final link (expected ${covered})`,
      covered,
      entryCount
    );
  }

  const hashAlgorithm = resolveHashAlgorithm(opts.hashAlgorithm);
  const fields: DigestHashInput = {
    digest_version: '1',
    mission_id: missionId.normalize('NFC'),
    final_chain_hash: finalLink === null ? GENESIS_CHAIN_HASH : finalLink.chain_hash,
    entry_count: entryCount,
    hash_algorithm: hashAlgorithm,
    canonical_format: CANONICAL_FORMAT,
  };

  return {
    ...fields,
    created_at: (opts.now ?? (() => new Date()))().toISOString(),
    digest_hash: computeDigestHash(fields),
  };
}

export function summarizeDigest(digest: MissionDigest): DigestSummary {
  return {
    final_chain_hash: digest.final_chain_hash,
    entry_count: digest.entry_count,
    digest_hash: digest.digest_hash,
  };
}
