import { describe, expect, it } from 'vitest';

import { ChainBuilder, buildChain } from '../src/chain.js';
import { finalize } from '../src/digest.js';
import {
  AlgorithmMismatchError,
  MalformedInputError,
  VerificationAbortedError,
} from '../src/errors.js';
import { parseLogText } from '../src/schema.js';
import type { Checkpoint, LogEntry } from '../src/types.js';
import { ChainVerifier, verify } from '../src/verify.js';
import { FIXED_NOW, makeEntry, makeLog, renumber, thrown } from './fixtures.js';

/** Seal a log with a checkpoint after every entry. */
function sealEveryEntry(log: LogEntry[], missionId = 'mission-every') {
  return buildChain(log, { missionId, checkpointEvery: 1, now: FIXED_NOW });
}

function at(log: LogEntry[], i: number): LogEntry {
  const entry = log[i];
  if (entry === undefined) throw new Error(`fixture has no entry ${i}`);
  return entry;
}

describe('verify: untouched logs', () => {
  it('passes an untouched 10-entry log against its own digest', () => {
    const log = makeLog(10);
    const { digest } = buildChain(log, { missionId: 'mission-010', now: FIXED_NOW });

    const report = verify(log, digest);

    expect(report.result).toBe('PASS');
    expect(report.mode).toBe('digest');
    expect(report.first_divergence_index).toBeNull();
    expect(report.divergence_lower_bound).toBeNull();
    expect(report.divergence_reason).toBeNull();
    expect(report.uncovered_suffix_length).toBe(0);
    expect(report.checked_entry_count).toBe(10);
    expect(report.recomputed_digest).toEqual({
      final_chain_hash: digest.final_chain_hash,
      entry_count: 10,
      digest_hash: digest.digest_hash,
    });
    expect(report.expected_digest).toEqual(report.recomputed_digest);
    expect(report.checkpoint_results).toEqual([
      {
        index: 9,
        expected_chain_hash: digest.final_chain_hash,
        recomputed_chain_hash: digest.final_chain_hash,
        status: 'ok',
      },
    ]);
    expect(report.matched_checkpoint_count).toBe(1);
  });

  it('is deterministic', () => {
    const log = makeLog(6);
    const { checkpoints } = sealEveryEntry(log);
    expect(verify(log, checkpoints)).toEqual(verify(makeLog(6), checkpoints));
  });

  it('passes an empty log against an empty-mission digest', () => {
    const report = verify([], finalize('empty', null, 0));
    expect(report.result).toBe('PASS');
    expect(report.checked_entry_count).toBe(0);
    expect(report.checkpoint_results).toEqual([]);
  });

  it('passes a longer candidate and reports the uncovered suffix', () => {
    const log = makeLog(10);
    const { digest } = buildChain(log.slice(0, 6), { missionId: 'partial' });

    const report = verify(log, digest);

    expect(report.result).toBe('PASS');
    expect(report.uncovered_suffix_length).toBe(4);
    expect(report.checked_entry_count).toBe(10);
    expect(report.matched_checkpoint_count).toBe(1);
  });
});

describe('verify: tamper localization with a checkpoint at every entry', () => {
  it('localizes an altered timestamp in a 5-entry log to index 3', () => {
    const log = makeLog(5);
    const { checkpoints } = sealEveryEntry(log);
    const tampered = log.map((e) =>
      e.index === 3 ? { ...e, timestamp: '2026-03-01T10:07:03Z' } : e
    );

    const report = verify(tampered, checkpoints);

    expect(report.result).toBe('FAIL');
    expect(report.first_divergence_index).toBe(3);
    expect(report.divergence_lower_bound).toBe(3);
    expect(report.divergence_reason).toBe('CHAIN_HASH_MISMATCH');
    expect(report.checked_entry_count).toBe(4);
    expect(report.matched_checkpoint_count).toBe(3);
    expect(report.checkpoint_results.map((r) => r.status)).toEqual([
      'ok',
      'ok',
      'ok',
      'mismatch',
      'not_reached',
    ]);
    expect(report.checkpoint_results[3]?.recomputed_chain_hash).not.toBe(
      checkpoints[3]?.chain_hash
    );
    expect(report.checkpoint_results[4]?.recomputed_chain_hash).toBeNull();
  });

  it('localizes a field edit to the edited index', () => {
    const log = makeLog(8);
    const { checkpoints } = sealEveryEntry(log);
    const tampered = log.map((e) =>
      e.index === 6 ? { ...e, fields: { ...e.fields, alt_m: 999 } } : e
    );

    const report = verify(tampered, checkpoints);
    expect(report.first_divergence_index).toBe(6);
    expect(report.divergence_reason).toBe('CHAIN_HASH_MISMATCH');
  });

  it('localizes a deletion to the deletion point', () => {
    const log = makeLog(8);
    const { checkpoints } = sealEveryEntry(log);
    const withoutThree = log.filter((e) => e.index !== 3);

    const raw = verify(withoutThree, checkpoints);
    expect(raw.first_divergence_index).toBe(3);
    expect(raw.divergence_reason).toBe('INDEX_MISMATCH');

    const renumbered = verify(renumber(withoutThree), checkpoints);
    expect(renumbered.first_divergence_index).toBe(3);
    expect(renumbered.divergence_reason).toBe('CHAIN_HASH_MISMATCH');
  });

  it('localizes an insertion to the insertion point', () => {
    const log = makeLog(8);
    const { checkpoints } = sealEveryEntry(log);
    const forged: LogEntry = {
      index: 4,
      timestamp: '2026-03-01T10:00:04Z',
      type: 'mode_change',
      fields: { mode: 'MANUAL' },
    };
    const inserted = [...log.slice(0, 4), forged, ...log.slice(4)];

    const raw = verify(inserted, checkpoints);
    expect(raw.first_divergence_index).toBe(4);
    expect(raw.divergence_reason).toBe('CHAIN_HASH_MISMATCH');

    const renumbered = verify(renumber(inserted), checkpoints);
    expect(renumbered.first_divergence_index).toBe(4);
  });

  it('localizes a swap of i < j to i', () => {
    const log = makeLog(8);
    const { checkpoints } = sealEveryEntry(log);
    const swapped = [...log];
    swapped[1] = at(log, 5);
    swapped[5] = at(log, 1);

    const raw = verify(swapped, checkpoints);
    expect(raw.first_divergence_index).toBe(1);
    expect(raw.divergence_reason).toBe('INDEX_MISMATCH');
    expect(raw.divergence_lower_bound).toBe(1);

    const renumbered = verify(renumber(swapped), checkpoints);
    expect(renumbered.first_divergence_index).toBe(1);
    expect(renumbered.divergence_reason).toBe('CHAIN_HASH_MISMATCH');
  });
});

describe('verify: recorded chain', () => {
  it('passes an untouched log and checks every link', () => {
    const log = makeLog(8);
    const { links, digest } = buildChain(log, { missionId: 'mission-chain', now: FIXED_NOW });

    const report = verify(log, links);
    expect(report.result).toBe('PASS');
    expect(report.mode).toBe('chain');
    expect(report.matched_checkpoint_count).toBe(8);
    expect(report.expected_digest).toEqual({
      final_chain_hash: digest.final_chain_hash,
      entry_count: 8,
    });
  });

  it('localizes a field edit exactly without dense checkpoints', () => {
    const log = makeLog(8);
    const { links } = buildChain(log, { missionId: 'mission-chain', now: FIXED_NOW });
    const tampered = log.map((e) =>
      e.index === 5 ? { ...e, fields: { ...e.fields, remaining_pct: 1 } } : e
    );

    const report = verify(tampered, links);
    expect(report.result).toBe('FAIL');
    expect(report.first_divergence_index).toBe(5);
    expect(report.divergence_lower_bound).toBe(5);
    expect(report.divergence_reason).toBe('CHAIN_HASH_MISMATCH');
    expect(report.checkpoint_results.map((r) => r.status)).toEqual([
      'ok',
      'ok',
      'ok',
      'ok',
      'ok',
      'mismatch',
      'not_reached',
      'not_reached',
    ]);
  });

  it('rejects a chain whose links do not connect', () => {
    const { links } = buildChain(makeLog(4), { missionId: 'mission-chain', now: FIXED_NOW });
    const relinked = links.map((link) =>
      link.index === 2 ? { ...link, prev_chain_hash: links[0]?.chain_hash ?? '' } : link
    );

    const err = thrown(() => verify(makeLog(4), relinked));
    expect(err).toBeInstanceOf(MalformedInputError);
    expect(err).toMatchObject({
      message: 'Chain link 2 does not continue link 1',
      details: { path: 'links[2].prev_chain_hash' },
    });
  });

  it('rejects links recorded under another algorithm', () => {
    const log = makeLog(3);
    const { links } = buildChain(log, { missionId: 'm', hashAlgorithm: 'BLAKE2b-256' });

    expect(thrown(() => verify(log, links))).toMatchObject({
      message: 'Chain link 0: chain_hash does not follow from entry_hash under SHA-256',
      details: { path: 'links[0].chain_hash' },
    });
    expect(verify(log, links, { hashAlgorithm: 'BLAKE2b-256' }).result).toBe('PASS');
  });
});

describe('verify: values beyond 2^53', () => {
  it('detects an edit to a 19-digit integer field', () => {
    const line = (tNs: string) =>
      `{"index":0,"timestamp":"2026-03-01T10:00:00Z","type":"imu","fields":{"t_ns":${tNs}}}`;
    const original = parseLogText(line('1700000000000000001'));
    const { checkpoints } = sealEveryEntry(original);

    expect(verify(parseLogText(line('1700000000000000001')), checkpoints).result).toBe('PASS');

    const report = verify(parseLogText(line('1700000000000000099')), checkpoints);
    expect(report.result).toBe('FAIL');
    expect(report.first_divergence_index).toBe(0);
    expect(report.divergence_reason).toBe('CHAIN_HASH_MISMATCH');
  });
});

describe('verify: sparse evidence', () => {
  it('fails at 5 when entry 5 was deleted and checkpoints cover 0 to 7', () => {
    const log = makeLog(8);
    const { checkpoints } = sealEveryEntry(log);
    const candidate = log.filter((e) => e.index !== 5);

    const report = verify(candidate, checkpoints);

    expect(report.result).toBe('FAIL');
    expect(report.first_divergence_index).toBe(5);
    expect(report.divergence_lower_bound).toBe(5);
    expect(report.checkpoint_results.slice(5)).toEqual([
      {
        index: 5,
        expected_chain_hash: checkpoints[5]?.chain_hash,
        recomputed_chain_hash: null,
        status: 'mismatch',
      },
      {
        index: 6,
        expected_chain_hash: checkpoints[6]?.chain_hash,
        recomputed_chain_hash: null,
        status: 'not_reached',
      },
      {
        index: 7,
        expected_chain_hash: checkpoints[7]?.chain_hash,
        recomputed_chain_hash: null,
        status: 'not_reached',
      },
    ]);
    expect(report.recomputed_digest).toEqual({
      final_chain_hash: checkpoints[4]?.chain_hash,
      entry_count: 5,
    });
  });

  it('fails at the first missing index when the log was truncated', () => {
    const log = makeLog(8);
    const { checkpoints } = sealEveryEntry(log);

    const report = verify(log.slice(0, 5), checkpoints);

    expect(report.result).toBe('FAIL');
    expect(report.first_divergence_index).toBe(5);
    expect(report.divergence_reason).toBe('MISSING_ENTRIES');
    expect(report.divergence_lower_bound).toBe(5);
    expect(report.checkpoint_results.slice(5).map((r) => r.status)).toEqual([
      'missing_entry',
      'missing_entry',
      'missing_entry',
    ]);
    expect(report.uncovered_suffix_length).toBe(0);
  });

  it('never passes a shortened log against a digest', () => {
    const log = makeLog(10);
    const { digest } = buildChain(log, { missionId: 'm' });

    const report = verify(log.slice(0, 9), digest);

    expect(report.result).toBe('FAIL');
    expect(report.first_divergence_index).toBe(9);
    expect(report.divergence_reason).toBe('MISSING_ENTRIES');
    expect(report.divergence_lower_bound).toBe(0);
  });

  it('bounds a digest-only divergence between genesis and the final entry', () => {
    const log = makeLog(5);
    const { digest } = buildChain(log, { missionId: 'm' });
    const tampered = log.map((e) =>
      e.index === 3 ? { ...e, timestamp: '2026-03-01T10:07:03Z' } : e
    );

    const report = verify(tampered, digest);

    expect(report.result).toBe('FAIL');
    expect(report.first_divergence_index).toBe(4);
    expect(report.divergence_lower_bound).toBe(0);
    expect(report.recomputed_digest.digest_hash).not.toBe(digest.digest_hash);
  });

  it('bounds a divergence by the last matched milestone', () => {
    const log = makeLog(10);
    const { checkpoints } = buildChain(log, { missionId: 'm', checkpointAt: [3, 6, 9] });
    const tampered = log.map((e) => (e.index === 8 ? { ...e, type: 'spoofed' } : e));

    const report = verify(tampered, checkpoints);

    expect(report.first_divergence_index).toBe(9);
    expect(report.divergence_lower_bound).toBe(7);
    expect(report.matched_checkpoint_count).toBe(2);
  });
});

describe('verify: resume from a trusted checkpoint', () => {
  it('reports the same suffix result as a run from genesis', () => {
    const log = makeLog(10);
    const { checkpoints } = sealEveryEntry(log);
    const tampered = log.map((e) => (e.index === 7 ? { ...e, type: 'spoofed' } : e));
    const from = checkpoints[4];
    if (from === undefined) throw new Error('fixture');

    const full = verify(tampered, checkpoints);
    const resumed = verify(tampered.slice(5), checkpoints, { from });

    expect(resumed.first_divergence_index).toBe(full.first_divergence_index);
    expect(resumed.divergence_reason).toBe(full.divergence_reason);
    expect(resumed.divergence_lower_bound).toBe(7);
    expect(resumed.recomputed_digest).toEqual(full.recomputed_digest);
    expect(resumed.checkpoint_results).toEqual(full.checkpoint_results.slice(5));
    expect(resumed.checked_entry_count).toBe(3);
  });

  it('passes an untouched suffix', () => {
    const log = makeLog(10);
    const { checkpoints, digest } = sealEveryEntry(log);
    const from = checkpoints[6];
    if (from === undefined) throw new Error('fixture');

    const report = verify(log.slice(7), digest, { from });
    expect(report.result).toBe('PASS');
    expect(report.checked_entry_count).toBe(3);
  });

  it('flags a suffix that does not start right after the checkpoint', () => {
    const log = makeLog(10);
    const { checkpoints } = sealEveryEntry(log);
    const from = checkpoints[4];
    if (from === undefined) throw new Error('fixture');

    const report = verify(log.slice(6), checkpoints, { from });
    expect(report.first_divergence_index).toBe(5);
    expect(report.divergence_reason).toBe('INDEX_MISMATCH');
  });

  it('rejects a resume point that contradicts the expected history', () => {
    const log = makeLog(6);
    const { checkpoints } = sealEveryEntry(log);
    const from = checkpoints[2];
    const other = checkpoints[3];
    if (from === undefined || other === undefined) throw new Error('fixture');

    expect(() =>
      verify(log.slice(3), checkpoints, { from: { ...from, chain_hash: other.chain_hash } })
    ).toThrow(MalformedInputError);
  });
});

describe('verify: errors', () => {
  it('throws on algorithm disagreement instead of reporting FAIL', () => {
    const log = makeLog(3);
    const { digest, checkpoints } = sealEveryEntry(log);

    expect(() => verify(log, digest, { hashAlgorithm: 'SHA3-256' })).toThrow(
      AlgorithmMismatchError
    );
    expect(() => verify(log, checkpoints, { hashAlgorithm: 'BLAKE2b-256' })).toThrow(
      AlgorithmMismatchError
    );
  });

  it('verifies chains sealed with a non-default algorithm', () => {
    const log = makeLog(4);
    const { digest } = buildChain(log, { missionId: 'm', hashAlgorithm: 'BLAKE2b-256' });
    expect(verify(log, digest, { hashAlgorithm: 'BLAKE2b-256' }).result).toBe('PASS');
  });

  it('rejects a digest whose digest_hash does not match', () => {
    const log = makeLog(3);
    const { digest } = buildChain(log, { missionId: 'm' });
    expect(() => verify(log, { ...digest, entry_count: 2 })).toThrow(MalformedInputError);
  });

  it('rejects empty and unordered checkpoint histories', () => {
    const log = makeLog(3);
    const { checkpoints } = sealEveryEntry(log);
    const reversed: Checkpoint[] = [...checkpoints].reverse();

    expect(() => verify(log, [])).toThrow(MalformedInputError);
    expect(() => verify(log, reversed)).toThrow(MalformedInputError);
  });

  it('raises MalformedInputError for malformed candidate entries', () => {
    const log = makeLog(3);
    const { digest } = buildChain(log, { missionId: 'm' });
    const broken = [at(log, 0), { ...at(log, 1), type: '' }, at(log, 2)];

    expect(thrown(() => verify(broken, digest))).toMatchObject({
      code: 'MALFORMED_INPUT',
      details: { entry_index: 1, path: 'type' },
    });
  });

  it('stops between entries when aborted', () => {
    const log = makeLog(6);
    const { digest } = buildChain(log, { missionId: 'm' });
    const controller = new AbortController();

    function* feed(): Generator<LogEntry> {
      yield at(log, 0);
      yield at(log, 1);
      yield at(log, 2);
      controller.abort();
      yield at(log, 3);
    }

    const err = thrown(() => verify(feed(), digest, { signal: controller.signal }));
    expect(err).toBeInstanceOf(VerificationAbortedError);
    expect(err).toMatchObject({ code: 'VERIFICATION_ABORTED', next_index: 3 });
  });
});

describe('ChainVerifier', () => {
  it('ignores pushes after divergence and caches the report', () => {
    const log = makeLog(4);
    const { checkpoints } = sealEveryEntry(log);
    const verifier = new ChainVerifier(checkpoints);

    expect(verifier.push(at(log, 0))).toBe(true);
    expect(verifier.push(makeEntry(2))).toBe(false);
    expect(verifier.diverged).toBe(true);
    expect(verifier.push(at(log, 1))).toBe(false);

    const report = verifier.finish();
    expect(report.first_divergence_index).toBe(1);
    expect(verifier.finish()).toBe(report);
  });

  it('can be fed incrementally as entries arrive', () => {
    const builder = new ChainBuilder({ checkpointEvery: 2 });
    const log = makeLog(6);
    builder.appendAll(log);

    const verifier = new ChainVerifier([...builder.checkpoints]);
    for (const entry of log) verifier.push(entry);

    expect(verifier.position).toBe(6);
    expect(verifier.finish().result).toBe('PASS');
  });
});
