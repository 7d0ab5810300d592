import { keccak256, toHex, type Hex } from 'viem';

import { RegistryRevertError } from './errors.js';
import type { FlightRegistry, OnchainCheckpoint, RegistryTx } from './registry.js';

interface FlightRecord {
  closed: boolean;
  checkpoints: OnchainCheckpoint[];
}

export interface MemoryFlightRegistryOptions {
  now?: () => Date;
  chainId?: number | null;
}

/**
 * In-process registry with the contract's rules: register once, append to
 * open flights only, version ids positive and strictly increasing.
 */
export class MemoryFlightRegistry implements FlightRegistry {
  readonly chainId: number | null;

  private readonly flights = new Map<Hex, FlightRecord>();
  private readonly now: () => Date;
  private block = 0n;

  constructor(opts: MemoryFlightRegistryOptions = {}) {
    this.now = opts.now ?? (() => new Date());
    this.chainId = opts.chainId ?? null;
  }

  /** Number of transactions mined so far. */
  get blockNumber(): bigint {
    return this.block;
  }

  async registerFlight(flightKey: Hex): Promise<RegistryTx> {
    if (this.flights.has(flightKey)) {
      throw new RegistryRevertError('registerFlight reverted: flight already registered');
    }
    this.flights.set(flightKey, { closed: false, checkpoints: [] });
    return this.mine('registerFlight', flightKey);
  }

  async addCheckpoint(flightKey: Hex, versionId: bigint, hash: Hex): Promise<RegistryTx> {
    const flight = this.openFlight('addCheckpoint', flightKey);
    if (versionId <= 0n) {
      throw new RegistryRevertError('addCheckpoint reverted: versionId must be > 0');
    }
    const last = flight.checkpoints[flight.checkpoints.length - 1];
    if (last !== undefined && versionId <= last.versionId) {
      throw new RegistryRevertError(
        `addCheckpoint reverted: versionId ${versionId} not above ${last.versionId}`
      );
    }
    flight.checkpoints.push({
      versionId,
      hash,
      timestamp: BigInt(Math.floor(this.now().getTime() / 1000)),
    });
    return this.mine('addCheckpoint', flightKey);
  }

  async closeFlight(flightKey: Hex): Promise<RegistryTx> {
    this.openFlight('closeFlight', flightKey).closed = true;
    return this.mine('closeFlight', flightKey);
  }

  async flightExists(flightKey: Hex): Promise<boolean> {
    return this.flights.has(flightKey);
  }

  async isFlightClosed(flightKey: Hex): Promise<boolean> {
    return this.flights.get(flightKey)?.closed ?? false;
  }

  async getCheckpointCount(flightKey: Hex): Promise<bigint> {
    return BigInt(this.flights.get(flightKey)?.checkpoints.length ?? 0);
  }

  async getCheckpoint(flightKey: Hex, index: bigint): Promise<OnchainCheckpoint> {
    const row = this.flights.get(flightKey)?.checkpoints[Number(index)];
    if (row === undefined) {
      throw new RegistryRevertError(`getCheckpoint reverted: no checkpoint ${index}`);
    }
    return { ...row };
  }

  private openFlight(functionName: string, flightKey: Hex): FlightRecord {
    const flight = this.flights.get(flightKey);
    if (flight === undefined) {
      throw new RegistryRevertError(`${functionName} reverted: unknown flight`);
    }
    if (flight.closed) {
      throw new RegistryRevertError(`${functionName} reverted: flight is closed`);
    }
    return flight;
  }

  private mine(functionName: string, flightKey: Hex): RegistryTx {
    this.block += 1n;
    return {
      tx_hash: keccak256(toHex(`${functionName}:${flightKey}:${this.block}`)),
      block_number: this.block,
    };
  }
}
