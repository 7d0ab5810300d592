import { describe, expect, it } from 'vitest';

import { MemoryAnchor } from '../src/anchor.js';
import { buildChain } from '../src/chain.js';
import { AlgorithmMismatchError, MalformedInputError } from '../src/errors.js';
import {
  parseChainLinks,
  parseCheckpoint,
  parseCheckpoints,
  parseJsonlEntries,
  parseLogEntries,
  parseLogText,
  parseMissionDigest,
} from '../src/schema.js';
import { FIXED_NOW, makeLog, thrown } from './fixtures.js';

const roundTrip = (value: unknown): unknown => JSON.parse(JSON.stringify(value));

describe('parseLogEntries', () => {
  it('accepts a bare array and an { entries } document', () => {
    const log = makeLog(3);
    expect(parseLogEntries(roundTrip(log))).toEqual(log);
    expect(parseLogEntries(roundTrip({ entries: log }))).toEqual(log);
  });

  it('names the entry and field that failed', () => {
    const log = roundTrip([
      { index: 0, timestamp: '2026-03-01T10:00:00Z', type: 'gps', fields: {} },
      { index: 1, timestamp: 'yesterday', type: 'gps', fields: {} },
    ]);

    const err = thrown(() => parseLogEntries(log));
    expect(err).toBeInstanceOf(MalformedInputError);
    expect(err).toMatchObject({ details: { entry_index: 1, path: 'timestamp' } });
  });

  it('reports nested field paths', () => {
    const log = roundTrip([
      { index: 0, timestamp: '2026-03-01T10:00:00Z', type: 'gps', fields: { cells: [1, 2] } },
    ]);
    expect(parseLogEntries(log)).toHaveLength(1);

    expect(
      thrown(() => parseLogEntries([{ index: 0, timestamp: '2026-03-01T10:00:00Z', type: 'gps', fields: [] }]))
    ).toMatchObject({ details: { entry_index: 0, path: 'fields' } });
  });

  it('rejects unknown top-level keys and negative indices', () => {
    const base = { index: 0, timestamp: '2026-03-01T10:00:00Z', type: 'gps', fields: {} };
    expect(() => parseLogEntries([{ ...base, note: 'x' }])).toThrow(MalformedInputError);
    expect(() => parseLogEntries([{ ...base, index: -1 }])).toThrow(MalformedInputError);
    expect(() => parseLogEntries('nope')).toThrow(MalformedInputError);
  });
});

describe('parseJsonlEntries / parseLogText', () => {
  const lines = makeLog(3).map((e) => JSON.stringify(e));

  it('parses one entry per line and skips blank lines', () => {
    const parsed = parseJsonlEntries(`${lines[0]}\n\n${lines[1]}\r\n${lines[2]}\n`);
    expect(parsed).toEqual(makeLog(3));
  });

  it('points at the bad line', () => {
    const err = thrown(() => parseJsonlEntries(`${lines[0]}\n{oops\n`));
    expect(err).toMatchObject({ code: 'MALFORMED_INPUT', details: { entry_index: 1 } });
  });

  it('detects the log layout', () => {
    const log = makeLog(3);
    expect(parseLogText(JSON.stringify(log))).toEqual(log);
    expect(parseLogText(JSON.stringify({ entries: log }, null, 2))).toEqual(log);
    expect(parseLogText(lines.join('\n'))).toEqual(log);
    expect(parseLogText(lines[0] ?? '')).toEqual(log.slice(0, 1));
    expect(parseLogText('  \n')).toEqual([]);
  });

  it('keeps integers beyond 2^53 exact as bigint', () => {
    const line =
      '{"index":0,"timestamp":"2026-03-01T10:00:00Z","type":"imu","fields":{"t_ns":1700000000000000001,"seq":7}}';

    const [entry] = parseLogText(line);
    expect(entry?.fields).toEqual({ t_ns: 1700000000000000001n, seq: 7 });
    expect(parseJsonlEntries(`${line}\n${line.replace('"index":0', '"index":1')}`)[1]?.fields.t_ns).toBe(
      1700000000000000001n
    );
  });

  it('rejects decimals that would lose precision', () => {
    const line =
      '{"index":0,"timestamp":"2026-03-01T10:00:00Z","type":"imu","fields":{"gain":0.10000000000000000000001}}';

    const err = thrown(() => parseLogText(line));
    expect(err).toBeInstanceOf(MalformedInputError);
    expect(err).toMatchObject({
      message: 'Log: Number 0.10000000000000000000001 cannot be represented without losing precision',
    });
    expect(thrown(() => parseJsonlEntries(`${lines[0]}\n${line}`))).toMatchObject({
      details: { entry_index: 1 },
    });
  });

  it('rejects a "__proto__" field instead of dropping it', () => {
    const line =
      '{"index":0,"timestamp":"2026-03-01T10:00:00Z","type":"gps","fields":{"__proto__":1}}';

    const fromText = thrown(() => parseLogText(line));
    expect(fromText).toBeInstanceOf(MalformedInputError);
    expect(fromText).toMatchObject({
      message: 'Log: Field name "__proto__" is not allowed',
      details: { path: '__proto__' },
    });

    const fromValue = thrown(() => parseLogEntries([JSON.parse(line)]));
    expect(fromValue).toMatchObject({
      message: 'Entry 0: Field name "__proto__" is not allowed at fields.__proto__',
      details: { entry_index: 0, path: 'fields.__proto__' },
    });
  });
});

describe('parseMissionDigest', () => {
  const { digest, checkpoints } = buildChain(makeLog(4), { missionId: 'm-4', now: FIXED_NOW, checkpointEvery: 2 });

  it('accepts a digest read back from JSON', () => {
    expect(parseMissionDigest(roundTrip(digest))).toEqual(digest);
  });

  it('rejects a digest whose fields were edited', () => {
    const edited = { ...digest, entry_count: 3 };
    expect(thrown(() => parseMissionDigest(edited))).toMatchObject({
      code: 'MALFORMED_INPUT',
      details: { path: 'digest_hash' },
    });
  });

  it('reports unknown algorithm and format identifiers as mismatches', () => {
    expect(() => parseMissionDigest({ ...digest, hash_algorithm: 'MD5' })).toThrow(
      AlgorithmMismatchError
    );
    expect(() => parseMissionDigest({ ...digest, canonical_format: 'fslog-canon/2' })).toThrow(
      AlgorithmMismatchError
    );
  });

  it('parses checkpoint histories', () => {
    expect(parseCheckpoints(roundTrip(checkpoints))).toEqual(checkpoints);
    expect(parseCheckpoints(roundTrip({ checkpoints }))).toEqual(checkpoints);
    expect(parseCheckpoint(roundTrip(checkpoints[0]))).toEqual(checkpoints[0]);

    expect(thrown(() => parseCheckpoints([{ ...checkpoints[0], chain_hash: 'ABC' }]))).toMatchObject({
      details: { path: 'checkpoints[0].chain_hash' },
    });
    expect(() => parseCheckpoints([{ ...checkpoints[0], hash_algorithm: 'SHA-1' }])).toThrow(
      AlgorithmMismatchError
    );
  });
});

describe('parseChainLinks', () => {
  const { links } = buildChain(makeLog(4), { missionId: 'm-links', now: FIXED_NOW });

  it('accepts a bare array and a { links } document', () => {
    expect(parseChainLinks(roundTrip(links))).toEqual(links);
    expect(parseChainLinks(roundTrip({ links }))).toEqual(links);
    expect(parseChainLinks({ links: [] })).toEqual([]);
  });

  it('rejects gaps and broken linkage', () => {
    expect(thrown(() => parseChainLinks([links[0], links[2]]))).toMatchObject({
      message: 'Chain link 1 declares index 2',
      details: { path: 'links[1].index' },
    });

    const relinked = links.map((link) =>
      link.index === 3 ? { ...link, prev_chain_hash: links[1]?.chain_hash } : link
    );
    expect(thrown(() => parseChainLinks(relinked))).toMatchObject({
      message: 'Chain link 3 does not continue link 2',
      details: { path: 'links[3].prev_chain_hash' },
    });

    expect(thrown(() => parseChainLinks([{ ...links[0], entry_hash: 'xyz' }]))).toMatchObject({
      details: { path: 'links[0].entry_hash' },
    });
    expect(() => parseChainLinks({ checkpoints: [] })).toThrow(MalformedInputError);
  });
});

describe('MemoryAnchor', () => {
  it('records anchored digests per mission', async () => {
    const anchor = new MemoryAnchor({ now: FIXED_NOW });
    const first = buildChain(makeLog(2), { missionId: 'm' }).digest;
    const second = buildChain(makeLog(4), { missionId: 'm' }).digest;

    const receipt = await anchor.anchor(first);
    await anchor.anchor(second);

    expect(receipt).toEqual({
      anchor_id: 'memory:0',
      backend: 'memory',
      mission_id: 'm',
      digest_hash: first.digest_hash,
      final_chain_hash: first.final_chain_hash,
      entry_count: 2,
      anchored_at: '2026-03-01T12:00:00.000Z',
    });
    expect(anchor.receipts).toHaveLength(2);
    expect(anchor.latest('m')?.entry_count).toBe(4);
    expect(anchor.latest('other')).toBeNull();
  });

  it('refuses inconsistent digests', async () => {
    const anchor = new MemoryAnchor();
    const digest = buildChain(makeLog(2), { missionId: 'm' }).digest;
    await expect(anchor.anchor({ ...digest, mission_id: 'x' })).rejects.toBeInstanceOf(
      MalformedInputError
    );
  });
});
