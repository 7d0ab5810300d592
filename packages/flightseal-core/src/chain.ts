/**
 * Append-only hash chain over canonical log entries.
 *
 *   chain_hash_i = H(entry_hash_i ‖ chain_hash_{i-1} ‖ u64be(i))
 *
 * with the 32 zero byte genesis constant standing in for chain_hash_{-1}.
 * Any suffix can be re-verified from the chain hash that precedes it.
 */

import { ByteWriter, bytesToHex, hexToBytes } from './bytes.js';
import { canonicalizeEntry } from './canonical.js';
import { finalize } from './digest.js';
import { MalformedInputError, SequenceError } from './errors.js';
import { digestBytes, hashEntry, resolveHashAlgorithm } from './hash.js';
import {
  DEFAULT_HASH_ALGORITHM,
  GENESIS_CHAIN_HASH,
  type ChainLink,
  type Checkpoint,
  type HashAlgorithm,
  type HashHex,
  type LogEntry,
  type MissionDigest,
} from './types.js';

export function computeChainHash(
  entryHash: HashHex,
  prevChainHash: HashHex,
  index: number,
  algorithm: HashAlgorithm = DEFAULT_HASH_ALGORITHM
): HashHex {
  const preimage = new ByteWriter()
    .raw(hexToBytes(entryHash))
    .raw(hexToBytes(prevChainHash))
    .u64(index)
    .finish();
  return bytesToHex(digestBytes(preimage, algorithm));
}

/**
 * Link an entry at a known position without sequence checks.
 * The verifier uses this after it has compared the declared index itself.
 */
export function linkEntry(
  index: number,
  prevChainHash: HashHex,
  entry: LogEntry,
  algorithm: HashAlgorithm
): ChainLink {
  const entryHash = hashEntry(canonicalizeEntry(entry), algorithm);
  return {
    index,
    entry_hash: entryHash,
    prev_chain_hash: prevChainHash,
    chain_hash: computeChainHash(entryHash, prevChainHash, index, algorithm),
  };
}

/**
 * Extend a chain by exactly one entry. `entry.index` must be `prev.index + 1`,
 * or 0 when starting from genesis.
 */
export function appendLink(
  prev: ChainLink | null,
  entry: LogEntry,
  algorithm: HashAlgorithm = DEFAULT_HASH_ALGORITHM
): ChainLink {
  const expected = prev === null ? 0 : prev.index + 1;
  const canonical = canonicalizeEntry(entry);

  if (entry.index !== expected) {
    throw new SequenceError(
      entry.index < expected
        ? `Entry ${entry.index} is out of order (next index is ${expected})`
        : `Gap before entry ${entry.index} (next index is ${expected})`,
      expected,
      entry.index
    );
  }

  const prevChainHash = prev === null ? GENESIS_CHAIN_HASH : prev.chain_hash;
  const entryHash = hashEntry(canonical, algorithm);
  return {
    index: expected,
    entry_hash: entryHash,
    prev_chain_hash: prevChainHash,
    chain_hash: computeChainHash(entryHash, prevChainHash, expected, algorithm),
  };
}

export interface CheckpointOptions {
  hashAlgorithm?: HashAlgorithm;
  now?: () => Date;
}

/** Read-only snapshot of a link for later comparison. */
export function checkpoint(link: ChainLink, opts: CheckpointOptions = {}): Checkpoint {
  return {
    index: link.index,
    chain_hash: link.chain_hash,
    timestamp: (opts.now ?? (() => new Date()))().toISOString(),
    hash_algorithm: resolveHashAlgorithm(opts.hashAlgorithm),
  };
}

/**
 * Split `totalEntries` into `chunks` consecutive runs (earlier runs take the
 * remainder) and return the index of the last entry in each run.
 *
 * planCheckpointIndices(10, 3) -> [3, 6, 9]
 */
export function planCheckpointIndices(totalEntries: number, chunks: number): number[] {
  if (!Number.isSafeInteger(totalEntries) || totalEntries < 0) {
    throw new MalformedInputError('Total entries must be a non-negative integer', {
      path: 'totalEntries',
    });
  }
  if (!Number.isSafeInteger(chunks) || chunks <= 0) {
    throw new MalformedInputError('Chunk count must be a positive integer', { path: 'chunks' });
  }
  if (totalEntries === 0) return [];

  const n = Math.min(chunks, totalEntries);
  const base = Math.floor(totalEntries / n);
  const remainder = totalEntries % n;

  const indices: number[] = [];
  let covered = 0;
  for (let i = 0; i < n; i++) {
    covered += base + (i < remainder ? 1 : 0);
    indices.push(covered - 1);
  }
  return indices;
}

// ---------------------------------------------------------------------------
// ChainBuilder
// ---------------------------------------------------------------------------

export interface ChainBuilderOptions {
  hashAlgorithm?: HashAlgorithm;
  /** Record a checkpoint after every N appended entries. */
  checkpointEvery?: number;
  /** Record a checkpoint when these indices are appended. */
  checkpointAt?: Iterable<number>;
  now?: () => Date;
}

/**
 * Single-writer chain under construction. Links live in an arena indexed by
 * sequence number; checkpoints are append-only.
 */
export class ChainBuilder {
  readonly hashAlgorithm: HashAlgorithm;

  private readonly links: ChainLink[] = [];
  private readonly recorded: Checkpoint[] = [];
  private readonly every: number | undefined;
  private readonly milestones: ReadonlySet<number>;
  private readonly now: () => Date;

  constructor(opts: ChainBuilderOptions = {}) {
    this.hashAlgorithm = resolveHashAlgorithm(opts.hashAlgorithm);
    this.now = opts.now ?? (() => new Date());

    if (opts.checkpointEvery !== undefined) {
      if (!Number.isSafeInteger(opts.checkpointEvery) || opts.checkpointEvery <= 0) {
        throw new MalformedInputError('checkpointEvery must be a positive integer', {
          path: 'checkpointEvery',
        });
      }
    }
    this.every = opts.checkpointEvery;

    const milestones = new Set<number>();
    for (const index of opts.checkpointAt ?? []) {
      if (!Number.isSafeInteger(index) || index < 0) {
        throw new MalformedInputError('checkpointAt indices must be non-negative integers', {
          path: 'checkpointAt',
        });
      }
      milestones.add(index);
    }
    this.milestones = milestones;
  }

  get length(): number {
    return this.links.length;
  }

  get head(): ChainLink | null {
    return this.links[this.links.length - 1] ?? null;
  }

  get checkpoints(): readonly Checkpoint[] {
    return this.recorded;
  }

  linkAt(index: number): ChainLink | undefined {
    return this.links[index];
  }

  getLinks(): readonly ChainLink[] {
    return this.links;
  }

  append(entry: LogEntry): ChainLink {
    const link = appendLink(this.head, entry, this.hashAlgorithm);
    this.links.push(link);

    const count = link.index + 1;
    const due =
      (this.every !== undefined && count % this.every === 0) || this.milestones.has(link.index);
    if (due) this.checkpoint();

    return link;
  }

  appendAll(entries: Iterable<LogEntry>): this {
    for (const entry of entries) this.append(entry);
    return this;
  }

  /** Checkpoint the current head. Repeating it at the same head returns the existing record. */
  checkpoint(): Checkpoint {
    const head = this.head;
    if (head === null) {
      throw new SequenceError('Cannot checkpoint an empty chain', 0, -1);
    }

    const last = this.recorded[this.recorded.length - 1];
    if (last !== undefined && last.index === head.index) return last;

    const cp = checkpoint(head, { hashAlgorithm: this.hashAlgorithm, now: this.now });
    this.recorded.push(cp);
    return cp;
  }

  finalize(missionId: string): MissionDigest {
    return finalize(missionId, this.head, this.links.length, {
      hashAlgorithm: this.hashAlgorithm,
      now: this.now,
    });
  }
}

export interface BuildChainOptions extends ChainBuilderOptions {
  missionId: string;
}

export interface BuiltChain {
  links: ChainLink[];
  checkpoints: Checkpoint[];
  digest: MissionDigest;
}

export function buildChain(entries: Iterable<LogEntry>, opts: BuildChainOptions): BuiltChain {
  const builder = new ChainBuilder(opts).appendAll(entries);
  return {
    links: [...builder.getLinks()],
    checkpoints: [...builder.checkpoints],
    digest: builder.finalize(opts.missionId),
  };
}
