/**
 * Anchor mission digests and checkpoints into an EVM flight registry.
 *
 * Every on-chain row is (versionId, chain_hash) where versionId is the number
 * of entries the chain hash covers (index + 1), so rows read back map directly
 * onto Checkpoint records the verifier accepts.
 */

import {
  DEFAULT_HASH_ALGORITHM,
  MalformedInputError,
  verifyDigestHash,
  type Anchor,
  type AnchorReceipt,
  type Checkpoint,
  type HashAlgorithm,
  type MissionDigest,
} from '@flightseal/core';
import type { Hex } from 'viem';

import { RegistryRevertError } from './errors.js';
import { fromBytes32, missionKey, toBytes32 } from './keys.js';
import { silentLogger, type Logger } from './logger.js';
import type { FlightRegistry, RegistryTx } from './registry.js';

export interface EvmAnchorOptions {
  registry: FlightRegistry;
  logger?: Logger;
  now?: () => Date;
}

export interface CheckpointAnchorReceipt {
  anchor_id: string;
  mission_id: string;
  mission_key: Hex;
  index: number;
  version_id: number;
  chain_hash: string;
  block_number: string | null;
}

export class EvmAnchor implements Anchor {
  private readonly registry: FlightRegistry;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(opts: EvmAnchorOptions) {
    this.registry = opts.registry;
    this.logger = opts.logger ?? silentLogger;
    this.now = opts.now ?? (() => new Date());
  }

  async anchor(digest: MissionDigest): Promise<AnchorReceipt> {
    if (!verifyDigestHash(digest)) {
      throw new MalformedInputError('Refusing to anchor a digest whose digest_hash does not match', {
        path: 'digest_hash',
      });
    }
    if (digest.entry_count === 0) {
      throw new MalformedInputError('Cannot anchor an empty mission', { path: 'entry_count' });
    }

    const key = await this.ensureOpenFlight(digest.mission_id);
    const versionId = BigInt(digest.entry_count);
    const tx = await this.registry.addCheckpoint(key, versionId, toBytes32(digest.final_chain_hash));
    this.logger.info(
      `anchored mission ${digest.mission_id} at ${digest.entry_count} entries (${tx.tx_hash})`
    );

    return {
      anchor_id: tx.tx_hash,
      backend: 'evm',
      mission_id: digest.mission_id,
      digest_hash: digest.digest_hash,
      final_chain_hash: digest.final_chain_hash,
      entry_count: digest.entry_count,
      anchored_at: this.now().toISOString(),
      details: this.details(key, tx),
    };
  }

  async anchorCheckpoint(missionId: string, cp: Checkpoint): Promise<CheckpointAnchorReceipt> {
    const key = await this.ensureOpenFlight(missionId);
    const versionId = cp.index + 1;
    const tx = await this.registry.addCheckpoint(key, BigInt(versionId), toBytes32(cp.chain_hash));
    this.logger.debug(`anchored checkpoint ${cp.index} for mission ${missionId} (${tx.tx_hash})`);

    return {
      anchor_id: tx.tx_hash,
      mission_id: missionId,
      mission_key: key,
      index: cp.index,
      version_id: versionId,
      chain_hash: cp.chain_hash,
      block_number: tx.block_number === null ? null : tx.block_number.toString(),
    };
  }

  async closeMission(missionId: string): Promise<RegistryTx> {
    const tx = await this.registry.closeFlight(missionKey(missionId));
    this.logger.info(`closed mission ${missionId} (${tx.tx_hash})`);
    return tx;
  }

  /**
   * Read a mission's on-chain rows back as checkpoints. The registry does not
   * store the hash algorithm, so the caller supplies the one the chain was
   * sealed with.
   */
  async fetchCheckpoints(
    missionId: string,
    hashAlgorithm: HashAlgorithm = DEFAULT_HASH_ALGORITHM
  ): Promise<Checkpoint[]> {
    const key = missionKey(missionId);
    if (!(await this.registry.flightExists(key))) {
      this.logger.warn(`mission ${missionId} is not registered`);
      return [];
    }

    const count = await this.registry.getCheckpointCount(key);
    const checkpoints: Checkpoint[] = [];
    for (let i = 0n; i < count; i++) {
      checkpoints.push(await this.readRow(key, i, hashAlgorithm));
    }
    this.logger.debug(`fetched ${checkpoints.length} checkpoints for mission ${missionId}`);
    return checkpoints;
  }

  /**
   * The mission's newest on-chain row as a checkpoint, or null when nothing
   * has been anchored for it yet. Its `index + 1` is the highest versionId
   * the registry will accept another row above.
   */
  async latestCheckpoint(
    missionId: string,
    hashAlgorithm: HashAlgorithm = DEFAULT_HASH_ALGORITHM
  ): Promise<Checkpoint | null> {
    const key = missionKey(missionId);
    if (!(await this.registry.flightExists(key))) return null;

    const count = await this.registry.getCheckpointCount(key);
    if (count === 0n) return null;
    return this.readRow(key, count - 1n, hashAlgorithm);
  }

  private async readRow(key: Hex, i: bigint, hashAlgorithm: HashAlgorithm): Promise<Checkpoint> {
    const row = await this.registry.getCheckpoint(key, i);
    if (row.versionId <= 0n || row.versionId > BigInt(Number.MAX_SAFE_INTEGER)) {
      throw new RegistryRevertError(`Checkpoint row ${i} has an invalid versionId ${row.versionId}`);
    }
    return {
      index: Number(row.versionId) - 1,
      chain_hash: fromBytes32(row.hash),
      timestamp: new Date(Number(row.timestamp) * 1000).toISOString(),
      hash_algorithm: hashAlgorithm,
    };
  }

  private async ensureOpenFlight(missionId: string): Promise<Hex> {
    const key = missionKey(missionId);
    if (!(await this.registry.flightExists(key))) {
      this.logger.info(`registering mission ${missionId} as ${key}`);
      await this.registry.registerFlight(key);
    } else if (await this.registry.isFlightClosed(key)) {
      throw new RegistryRevertError(`Mission ${missionId} is closed on the registry`);
    }
    return key;
  }

  private details(key: Hex, tx: RegistryTx): Record<string, string | number | boolean> {
    const details: Record<string, string | number | boolean> = { mission_key: key };
    if (tx.block_number !== null) details.block_number = tx.block_number.toString();
    if (this.registry.chainId !== null) details.chain_id = this.registry.chainId;
    return details;
  }
}
