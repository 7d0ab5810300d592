/**
 * Chain verification with divergence localization.
 *
 * The candidate log is replayed through the same canonicalize → hash → link
 * pipeline used at construction time and compared against the expected points
 * (a mission digest, a recorded checkpoint history or the full recorded chain)
 * in index order.
 *
 * Per run:
 *
 *   start → recomputing(i) → matched(i) → recomputing(i+1)
 *                          ↘ diverged(i) → done
 *
 * Tampering produces a FAIL report. Exceptions are reserved for malformed
 * input, algorithm disagreements and cancellation.
 */

import { isHashHex } from './bytes.js';
import { computeChainHash, linkEntry } from './chain.js';
import { computeDigestHash, summarizeDigest, verifyDigestHash } from './digest.js';
import { MalformedInputError, VerificationAbortedError } from './errors.js';
import { assertCanonicalFormat, assertSameAlgorithm, resolveHashAlgorithm } from './hash.js';
import {
  DIGEST_VERSIONS,
  GENESIS_CHAIN_HASH,
  type ChainLink,
  type Checkpoint,
  type CheckpointResult,
  type DigestSummary,
  type DivergenceReason,
  type HashAlgorithm,
  type HashHex,
  type LogEntry,
  type MissionDigest,
  type VerificationMode,
  type VerificationReport,
} from './types.js';

export interface VerifyOptions {
  /** Algorithm the verifier is configured for. Defaults to SHA-256. */
  hashAlgorithm?: HashAlgorithm;
  /** Trusted checkpoint to resume from instead of genesis. */
  from?: Checkpoint;
  /** Checked between entries. */
  signal?: AbortSignal;
}

export type ExpectedState = MissionDigest | readonly Checkpoint[] | readonly ChainLink[];

interface ExpectedPoint {
  index: number;
  chain_hash: HashHex;
}

interface NormalizedExpectation {
  mode: VerificationMode;
  points: ExpectedPoint[];
  summary: DigestSummary;
  digest: MissionDigest | null;
}

type RunState = 'recomputing' | 'diverged' | 'done';

function isIndex(value: unknown): value is number {
  return typeof value === 'number' && Number.isSafeInteger(value) && value >= 0;
}

function normalizeDigest(digest: MissionDigest, algorithm: HashAlgorithm): NormalizedExpectation {
  assertSameAlgorithm(algorithm, digest.hash_algorithm, 'Mission digest');
  assertCanonicalFormat(digest.canonical_format, 'Mission digest');

  if (!DIGEST_VERSIONS.some((v) => v === digest.digest_version)) {
    throw new MalformedInputError(`Unsupported digest version: ${String(digest.digest_version)}`, {
      path: 'digest_version',
    });
  }
  if (!isIndex(digest.entry_count)) {
    throw new MalformedInputError('Digest entry_count must be a non-negative integer', {
      path: 'entry_count',
    });
  }
  if (!isHashHex(digest.final_chain_hash)) {
    throw new MalformedInputError('Digest final_chain_hash must be 64 lowercase hex characters', {
      path: 'final_chain_hash',
    });
  }
  if (!verifyDigestHash(digest)) {
    throw new MalformedInputError('Digest digest_hash does not match its fields', {
      path: 'digest_hash',
    });
  }
  if (digest.entry_count === 0 && digest.final_chain_hash !== GENESIS_CHAIN_HASH) {
    throw new MalformedInputError('Empty-mission digest must carry the genesis chain hash', {
      path: 'final_chain_hash',
    });
  }

  return {
    mode: 'digest',
    points:
      digest.entry_count === 0
        ? []
        : [{ index: digest.entry_count - 1, chain_hash: digest.final_chain_hash }],
    summary: summarizeDigest(digest),
    digest,
  };
}

function validateCheckpoint(cp: Checkpoint, algorithm: HashAlgorithm, path: string): void {
  if (!isIndex(cp.index)) {
    throw new MalformedInputError('Checkpoint index must be a non-negative integer', {
      path: `${path}.index`,
    });
  }
  if (!isHashHex(cp.chain_hash)) {
    throw new MalformedInputError('Checkpoint chain_hash must be 64 lowercase hex characters', {
      path: `${path}.chain_hash`,
    });
  }
  assertSameAlgorithm(algorithm, cp.hash_algorithm, `Checkpoint ${cp.index}`);
}

function normalizeCheckpoints(
  checkpoints: readonly Checkpoint[],
  algorithm: HashAlgorithm
): NormalizedExpectation {
  if (checkpoints.length === 0) {
    throw new MalformedInputError('Checkpoint history is empty', { path: 'checkpoints' });
  }

  const points: ExpectedPoint[] = [];
  checkpoints.forEach((cp, i) => {
    validateCheckpoint(cp, algorithm, `checkpoints[${i}]`);
    const prev = points[points.length - 1];
    if (prev !== undefined && cp.index <= prev.index) {
      throw new MalformedInputError(
        `Checkpoints must be strictly ascending (index ${cp.index} after ${prev.index})`,
        { path: `checkpoints[${i}].index` }
      );
    }
    points.push({ index: cp.index, chain_hash: cp.chain_hash });
  });

  const last = points[points.length - 1];
  return {
    mode: 'checkpoints',
    points,
    summary: {
      final_chain_hash: last?.chain_hash ?? GENESIS_CHAIN_HASH,
      entry_count: last === undefined ? 0 : last.index + 1,
    },
    digest: null,
  };
}

/**
 * Every link must continue the one before it from genesis, and its chain_hash
 * must follow from its entry_hash under the configured algorithm.
 */
function normalizeChain(links: readonly ChainLink[], algorithm: HashAlgorithm): NormalizedExpectation {
  let prev: HashHex = GENESIS_CHAIN_HASH;
  const points = links.map((link, i): ExpectedPoint => {
    const path = `links[${i}]`;
    if (link.index !== i) {
      throw new MalformedInputError(`Chain link ${i} declares index ${String(link.index)}`, {
        path: `${path}.index`,
      });
    }
    for (const key of ['entry_hash', 'prev_chain_hash', 'chain_hash'] as const) {
      if (!isHashHex(link[key])) {
        throw new MalformedInputError(`Chain link ${i}: ${key} must be 64 lowercase hex characters`, {
          path: `${path}.${key}`,
        });
      }
    }
    if (link.prev_chain_hash !== prev) {
      const message =
        i === 0
          ? 'Chain link 0 does not start from the genesis hash'
          : `Chain link ${i} does not continue link ${i - 1}`;
      throw new MalformedInputError(message, { path: `${path}.prev_chain_hash` });
    }
    if (computeChainHash(link.entry_hash, prev, i, algorithm) !== link.chain_hash) {
      throw new MalformedInputError(
        `Chain link ${i}: chain_hash does not follow from entry_hash under ${algorithm}`,
        { path: `${path}.chain_hash` }
      );
    }
    prev = link.chain_hash;
    return { index: i, chain_hash: link.chain_hash };
  });

  return {
    mode: 'chain',
    points,
    summary: { final_chain_hash: prev, entry_count: links.length },
    digest: null,
  };
}

function isChainLinkList(
  expected: readonly Checkpoint[] | readonly ChainLink[]
): expected is readonly ChainLink[] {
  const first = expected[0];
  return first !== undefined && 'entry_hash' in first;
}

function isMissionDigest(expected: ExpectedState): expected is MissionDigest {
  return !Array.isArray(expected);
}

function normalizeExpectation(expected: ExpectedState, algorithm: HashAlgorithm): NormalizedExpectation {
  if (isMissionDigest(expected)) return normalizeDigest(expected, algorithm);
  return isChainLinkList(expected)
    ? normalizeChain(expected, algorithm)
    : normalizeCheckpoints(expected, algorithm);
}

/**
 * Incremental verifier. Feed candidate entries in order with {@link push}
 * until it returns false (diverged) or the input ends, then call
 * {@link finish} for the report.
 */
export class ChainVerifier {
  readonly hashAlgorithm: HashAlgorithm;

  private readonly expectation: NormalizedExpectation;
  private readonly points: ExpectedPoint[];
  private readonly startIndex: number;
  /** One past the last expected point; where uncovered entries begin. */
  private readonly coverageEnd: number;

  private state: RunState = 'recomputing';
  private nextIndex: number;
  private prevChainHash: HashHex;
  private cursor = 0;
  private checked = 0;
  private lastMatched: number | null = null;
  private divergence: { index: number; reason: DivergenceReason } | null = null;
  private readonly results: CheckpointResult[] = [];
  private report: VerificationReport | null = null;

  constructor(expected: ExpectedState, opts: Omit<VerifyOptions, 'signal'> = {}) {
    this.hashAlgorithm = resolveHashAlgorithm(opts.hashAlgorithm);
    this.expectation = normalizeExpectation(expected, this.hashAlgorithm);

    const from = opts.from;
    if (from === undefined) {
      this.points = this.expectation.points;
      this.startIndex = 0;
      this.prevChainHash = GENESIS_CHAIN_HASH;
    } else {
      validateCheckpoint(from, this.hashAlgorithm, 'from');
      const overlap = this.expectation.points.find((p) => p.index === from.index);
      if (overlap !== undefined && overlap.chain_hash !== from.chain_hash) {
        throw new MalformedInputError(
          `Resume checkpoint disagrees with the expected chain hash at index ${from.index}`,
          { path: 'from.chain_hash' }
        );
      }
      this.points = this.expectation.points.filter((p) => p.index > from.index);
      this.startIndex = from.index + 1;
      this.prevChainHash = from.chain_hash;
    }

    this.nextIndex = this.startIndex;
    const lastPoint = this.points[this.points.length - 1];
    this.coverageEnd = lastPoint === undefined ? this.startIndex : lastPoint.index + 1;
  }

  /** Index the next pushed entry is expected to occupy. */
  get position(): number {
    return this.nextIndex;
  }

  get diverged(): boolean {
    return this.state === 'diverged';
  }

  /**
   * Recompute one entry. Returns false once the run has diverged; later
   * pushes are ignored.
   */
  push(entry: LogEntry): boolean {
    if (this.state !== 'recomputing') return false;

    const position = this.nextIndex;
    const declared: unknown = entry.index;
    if (!isIndex(declared)) {
      throw new MalformedInputError('Entry index must be a non-negative safe integer', {
        entry_index: position,
        path: 'index',
      });
    }

    if (declared !== position) {
      this.diverge(position, 'INDEX_MISMATCH', null);
      return false;
    }

    const link = linkEntry(position, this.prevChainHash, entry, this.hashAlgorithm);
    this.prevChainHash = link.chain_hash;
    this.nextIndex = position + 1;
    this.checked++;

    const point = this.points[this.cursor];
    if (point === undefined || point.index !== position) return true;

    if (point.chain_hash !== link.chain_hash) {
      this.diverge(position, 'CHAIN_HASH_MISMATCH', link.chain_hash);
      return false;
    }

    this.results.push({
      index: point.index,
      expected_chain_hash: point.chain_hash,
      recomputed_chain_hash: link.chain_hash,
      status: 'ok',
    });
    this.lastMatched = position;
    this.cursor++;
    return true;
  }

  finish(): VerificationReport {
    if (this.report !== null) return this.report;

    if (this.state === 'recomputing' && this.cursor < this.points.length) {
      // Input ended before every expected point was reached.
      this.divergence = { index: this.nextIndex, reason: 'MISSING_ENTRIES' };
      for (const point of this.points.slice(this.cursor)) {
        this.results.push({
          index: point.index,
          expected_chain_hash: point.chain_hash,
          recomputed_chain_hash: null,
          status: 'missing_entry',
        });
      }
      this.cursor = this.points.length;
    }
    this.state = 'done';

    const divergence = this.divergence;
    const recomputedCount = this.nextIndex;
    const recomputed: DigestSummary = {
      final_chain_hash: this.prevChainHash,
      entry_count: recomputedCount,
    };
    const digest = this.expectation.digest;
    if (digest !== null) {
      recomputed.digest_hash = computeDigestHash({
        digest_version: digest.digest_version,
        mission_id: digest.mission_id,
        final_chain_hash: this.prevChainHash,
        entry_count: recomputedCount,
        hash_algorithm: this.hashAlgorithm,
        canonical_format: digest.canonical_format,
      });
    }

    this.report = {
      result: divergence === null ? 'PASS' : 'FAIL',
      mode: this.expectation.mode,
      first_divergence_index: divergence?.index ?? null,
      divergence_lower_bound:
        divergence === null
          ? null
          : this.lastMatched === null
            ? this.startIndex
            : this.lastMatched + 1,
      divergence_reason: divergence?.reason ?? null,
      recomputed_digest: recomputed,
      expected_digest: this.expectation.summary,
      checked_entry_count: this.checked,
      uncovered_suffix_length: Math.max(0, this.nextIndex - this.coverageEnd),
      hash_algorithm: this.hashAlgorithm,
      checkpoint_results: this.results,
      matched_checkpoint_count: this.results.filter((r) => r.status === 'ok').length,
    };
    return this.report;
  }

  private diverge(index: number, reason: DivergenceReason, recomputed: HashHex | null): void {
    this.state = 'diverged';
    this.divergence = { index, reason };

    const point = this.points[this.cursor];
    if (point !== undefined && point.index === index) {
      this.results.push({
        index: point.index,
        expected_chain_hash: point.chain_hash,
        recomputed_chain_hash: recomputed,
        status: 'mismatch',
      });
      this.cursor++;
    }
    for (const rest of this.points.slice(this.cursor)) {
      this.results.push({
        index: rest.index,
        expected_chain_hash: rest.chain_hash,
        recomputed_chain_hash: null,
        status: 'not_reached',
      });
    }
    this.cursor = this.points.length;
  }
}

/**
 * Verify a candidate log against a mission digest, checkpoint history or
 * recorded chain and localize the earliest divergence.
 */
export function verify(
  candidate: Iterable<LogEntry>,
  expected: ExpectedState,
  opts: VerifyOptions = {}
): VerificationReport {
  const { signal, ...rest } = opts;
  const verifier = new ChainVerifier(expected, rest);

  for (const entry of candidate) {
    if (signal?.aborted) throw new VerificationAbortedError(verifier.position);
    if (!verifier.push(entry)) break;
  }

  return verifier.finish();
}
