import { describe, expect, it } from 'vitest';

import { MalformedInputError, buildChain, verify, type LogEntry } from '@flightseal/core';

import { RegistryRevertError } from '../src/errors.js';
import { EvmAnchor } from '../src/evm-anchor.js';
import { fromBytes32, missionKey, toBytes32 } from '../src/keys.js';
import type { Logger } from '../src/logger.js';
import { MemoryFlightRegistry } from '../src/memory-registry.js';

const NOW = () => new Date('2026-03-01T12:00:00.000Z');

function makeLog(count: number): LogEntry[] {
  return Array.from({ length: count }, (_, i) => ({
    index: i,
    timestamp: `2026-03-01T10:00:${String(i).padStart(2, '0')}Z`,
    type: 'gps',
    fields: { alt_m: 100 + i, fix: '3d' },
  }));
}

function recordingLogger(): Logger & { lines: string[] } {
  const lines: string[] = [];
  return {
    lines,
    info: (msg) => lines.push(`info ${msg}`),
    warn: (msg) => lines.push(`warn ${msg}`),
    error: (msg) => lines.push(`error ${msg}`),
    debug: (msg) => lines.push(`debug ${msg}`),
  };
}

describe('keys', () => {
  it('derives one bytes32 key per NFC mission id', () => {
    const key = missionKey('caf\u00e9-01');
    expect(key).toMatch(/^0x[0-9a-f]{64}$/);
    expect(missionKey('cafe\u0301-01')).toBe(key);
    expect(missionKey('cafe-01')).not.toBe(key);
    expect(() => missionKey('')).toThrow(MalformedInputError);
  });

  it('converts chain hashes to and from bytes32', () => {
    const hash = 'ab'.repeat(32);
    expect(toBytes32(hash)).toBe(`0x${hash}`);
    expect(fromBytes32(`0x${'AB'.repeat(32)}`)).toBe(hash);
    expect(() => toBytes32('abc')).toThrow(MalformedInputError);
    expect(() => fromBytes32('0x1234')).toThrow(MalformedInputError);
  });
});

describe('EvmAnchor', () => {
  it('registers the mission on first anchor and records entry_count as versionId', async () => {
    const registry = new MemoryFlightRegistry({ now: NOW, chainId: 84532 });
    const logger = recordingLogger();
    const anchor = new EvmAnchor({ registry, logger, now: NOW });
    const { digest } = buildChain(makeLog(5), { missionId: 'mission-42' });

    const receipt = await anchor.anchor(digest);

    const key = missionKey('mission-42');
    expect(await registry.flightExists(key)).toBe(true);
    expect(await registry.getCheckpointCount(key)).toBe(1n);
    expect(await registry.getCheckpoint(key, 0n)).toEqual({
      versionId: 5n,
      hash: `0x${digest.final_chain_hash}`,
      timestamp: 1772366400n,
    });
    expect(receipt).toMatchObject({
      backend: 'evm',
      mission_id: 'mission-42',
      digest_hash: digest.digest_hash,
      entry_count: 5,
      anchored_at: '2026-03-01T12:00:00.000Z',
      details: { mission_key: key, block_number: '2', chain_id: 84532 },
    });
    expect(receipt.anchor_id).toMatch(/^0x[0-9a-f]{64}$/);
    expect(logger.lines[0]).toBe(`info registering mission mission-42 as ${key}`);
  });

  it('round-trips anchored checkpoints into a verifiable history', async () => {
    const registry = new MemoryFlightRegistry({ now: NOW });
    const anchor = new EvmAnchor({ registry });
    const log = makeLog(9);
    const { checkpoints, digest } = buildChain(log, {
      missionId: 'mission-rt',
      checkpointAt: [2, 5],
    });

    for (const cp of checkpoints) await anchor.anchorCheckpoint('mission-rt', cp);
    await anchor.anchor(digest);

    const fetched = await anchor.fetchCheckpoints('mission-rt');
    expect(fetched.map((cp) => cp.index)).toEqual([2, 5, 8]);
    expect(fetched[0]?.chain_hash).toBe(checkpoints[0]?.chain_hash);
    expect(fetched[2]?.chain_hash).toBe(digest.final_chain_hash);
    expect(fetched[0]?.timestamp).toBe('2026-03-01T12:00:00.000Z');

    expect(verify(log, fetched).result).toBe('PASS');

    const tampered = log.map((e) => (e.index === 4 ? { ...e, fields: { alt_m: 0, fix: '3d' } } : e));
    const report = verify(tampered, fetched);
    expect(report.first_divergence_index).toBe(5);
    expect(report.divergence_lower_bound).toBe(3);
  });

  it('reports the newest anchored row', async () => {
    const registry = new MemoryFlightRegistry({ now: NOW });
    const anchor = new EvmAnchor({ registry });
    const { checkpoints, digest } = buildChain(makeLog(6), {
      missionId: 'mission-latest',
      checkpointAt: [3],
    });

    expect(await anchor.latestCheckpoint('mission-latest')).toBeNull();

    for (const cp of checkpoints) await anchor.anchorCheckpoint('mission-latest', cp);
    expect(await anchor.latestCheckpoint('mission-latest')).toMatchObject({
      index: 3,
      chain_hash: checkpoints[0]?.chain_hash,
    });

    await anchor.anchor(digest);
    expect(await anchor.latestCheckpoint('mission-latest', 'SHA3-256')).toEqual({
      index: 5,
      chain_hash: digest.final_chain_hash,
      timestamp: '2026-03-01T12:00:00.000Z',
      hash_algorithm: 'SHA3-256',
    });
  });

  it('returns no checkpoints for an unknown mission', async () => {
    const logger = recordingLogger();
    const anchor = new EvmAnchor({ registry: new MemoryFlightRegistry(), logger });

    expect(await anchor.fetchCheckpoints('never-flown')).toEqual([]);
    expect(logger.lines).toEqual(['warn mission never-flown is not registered']);
  });

  it('refuses to extend a closed mission', async () => {
    const registry = new MemoryFlightRegistry();
    const anchor = new EvmAnchor({ registry });
    const first = buildChain(makeLog(3), { missionId: 'm' }).digest;
    const second = buildChain(makeLog(4), { missionId: 'm' }).digest;

    await anchor.anchor(first);
    await anchor.closeMission('m');

    expect(await registry.isFlightClosed(missionKey('m'))).toBe(true);
    await expect(anchor.anchor(second)).rejects.toBeInstanceOf(RegistryRevertError);
  });

  it('rejects inconsistent or empty digests before touching the registry', async () => {
    const registry = new MemoryFlightRegistry();
    const anchor = new EvmAnchor({ registry });
    const digest = buildChain(makeLog(2), { missionId: 'm' }).digest;
    const empty = buildChain([], { missionId: 'm' }).digest;

    await expect(anchor.anchor({ ...digest, entry_count: 3 })).rejects.toBeInstanceOf(
      MalformedInputError
    );
    await expect(anchor.anchor(empty)).rejects.toBeInstanceOf(MalformedInputError);
    expect(registry.blockNumber).toBe(0n);
  });
});

describe('MemoryFlightRegistry', () => {
  it('enforces register-once and increasing version ids', async () => {
    const registry = new MemoryFlightRegistry();
    const key = missionKey('m');
    const hash = toBytes32('cd'.repeat(32));

    await registry.registerFlight(key);
    await expect(registry.registerFlight(key)).rejects.toBeInstanceOf(RegistryRevertError);

    await registry.addCheckpoint(key, 3n, hash);
    await expect(registry.addCheckpoint(key, 3n, hash)).rejects.toBeInstanceOf(RegistryRevertError);
    await expect(registry.addCheckpoint(key, 0n, hash)).rejects.toBeInstanceOf(RegistryRevertError);
    await expect(registry.addCheckpoint(missionKey('other'), 1n, hash)).rejects.toBeInstanceOf(
      RegistryRevertError
    );
    await expect(registry.getCheckpoint(key, 1n)).rejects.toBeInstanceOf(RegistryRevertError);
  });
});
