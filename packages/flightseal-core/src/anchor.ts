import { verifyDigestHash } from './digest.js';
import { MalformedInputError } from './errors.js';
import type { Anchor, AnchorReceipt, MissionDigest } from './types.js';

export interface MemoryAnchorOptions {
  now?: () => Date;
}

/**
 * In-process append-only anchor. Useful for tests, dry runs and pipelines
 * that publish digests somewhere else later.
 */
export class MemoryAnchor implements Anchor {
  private readonly records: { digest: MissionDigest; receipt: AnchorReceipt }[] = [];
  private readonly now: () => Date;

  constructor(opts: MemoryAnchorOptions = {}) {
    this.now = opts.now ?? (() => new Date());
  }

  async anchor(digest: MissionDigest): Promise<AnchorReceipt> {
    if (!verifyDigestHash(digest)) {
      throw new MalformedInputError('Refusing to anchor a digest whose digest_hash does not match', {
        path: 'digest_hash',
      });
    }

    const receipt: AnchorReceipt = {
      anchor_id: `memory:${this.records.length}`,
      backend: 'memory',
      mission_id: digest.mission_id,
      digest_hash: digest.digest_hash,
      final_chain_hash: digest.final_chain_hash,
      entry_count: digest.entry_count,
      anchored_at: this.now().toISOString(),
    };
    this.records.push({ digest: { ...digest }, receipt });
    return receipt;
  }

  get receipts(): AnchorReceipt[] {
    return this.records.map((r) => r.receipt);
  }

  /** Digests anchored for a mission, oldest first. */
  digestsFor(missionId: string): MissionDigest[] {
    return this.records.filter((r) => r.digest.mission_id === missionId).map((r) => r.digest);
  }

  latest(missionId: string): MissionDigest | null {
    const all = this.digestsFor(missionId);
    return all[all.length - 1] ?? null;
  }
}
