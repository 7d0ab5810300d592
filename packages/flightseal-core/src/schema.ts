/**
 * Wire schemas for log entries, digests and checkpoint histories.
 *
 * Parsers turn untrusted JSON into typed values or throw MalformedInputError
 * naming the entry and field that failed. Hash and format identifiers are
 * accepted as plain strings here and checked against the allowlists
 * afterwards, so an unknown algorithm surfaces as AlgorithmMismatchError
 * rather than a validation failure.
 */

import { isInteger, isSafeNumber, parse as parseLossless } from 'lossless-json';
import { z } from 'zod';

import { verifyDigestHash } from './digest.js';
import { MalformedInputError } from './errors.js';
import { assertCanonicalFormat, resolveHashAlgorithm } from './hash.js';
import {
  CANONICAL_FORMAT,
  GENESIS_CHAIN_HASH,
  type ChainLink,
  type Checkpoint,
  type JsonTelemetryValue,
  type LogEntry,
  type MissionDigest,
} from './types.js';

const HashHexSchema = z
  .string()
  .regex(/^[0-9a-f]{64}$/, 'Expected 64 lowercase hex characters');

const IndexSchema = z.number().int().nonnegative().max(Number.MAX_SAFE_INTEGER);

const TimestampSchema = z.string().datetime({ offset: true });

const RESERVED_FIELD_NAME = '__proto__';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// z.record() drops a "__proto__" key without an issue; an uncommitted field must fail instead.
function telemetryRecord() {
  return z.preprocess((value, ctx) => {
    if (isRecord(value) && Object.prototype.hasOwnProperty.call(value, RESERVED_FIELD_NAME)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Field name "${RESERVED_FIELD_NAME}" is not allowed`,
        path: [RESERVED_FIELD_NAME],
      });
    }
    return value;
  }, z.record(TelemetryValueSchema));
}

export const TelemetryValueSchema: z.ZodType<JsonTelemetryValue, z.ZodTypeDef, unknown> = z.lazy(
  () =>
    z.union([
      z.null(),
      z.boolean(),
      z.number(),
      z.bigint(),
      z.string(),
      z.array(TelemetryValueSchema),
      telemetryRecord(),
    ])
);

export const LogEntrySchema = z
  .object({
    index: IndexSchema,
    timestamp: TimestampSchema,
    type: z.string().min(1),
    fields: telemetryRecord(),
  })
  .strict();

export const CheckpointSchema = z.object({
  index: IndexSchema,
  chain_hash: HashHexSchema,
  timestamp: TimestampSchema,
  hash_algorithm: z.string(),
});

export const ChainLinkSchema = z.object({
  index: IndexSchema,
  entry_hash: HashHexSchema,
  prev_chain_hash: HashHexSchema,
  chain_hash: HashHexSchema,
});

export const MissionDigestSchema = z.object({
  digest_version: z.literal('1'),
  mission_id: z.string().min(1),
  final_chain_hash: HashHexSchema,
  entry_count: IndexSchema,
  hash_algorithm: z.string(),
  canonical_format: z.string(),
  created_at: TimestampSchema,
  digest_hash: HashHexSchema,
});

function formatPath(path: (string | number)[]): string {
  return path.reduce<string>((acc, part) => {
    if (typeof part === 'number') return `${acc}[${part}]`;
    return acc.length === 0 ? part : `${acc}.${part}`;
  }, '');
}

function toMalformed(
  error: z.ZodError,
  label: string,
  entryIndex?: number,
  prefix: (string | number)[] = []
): MalformedInputError {
  const issue = error.issues[0];
  const path = formatPath([...prefix, ...(issue?.path ?? [])]);
  const message = issue?.message ?? 'Invalid input';
  return new MalformedInputError(`${label}: ${message}${path ? ` at ${path}` : ''}`, {
    entry_index: entryIndex,
    path,
  });
}

// ---------------------------------------------------------------------------
// Log entries
// ---------------------------------------------------------------------------

export function parseLogEntry(input: unknown, position: number): LogEntry {
  const parsed = LogEntrySchema.safeParse(input);
  if (!parsed.success) {
    throw toMalformed(parsed.error, `Entry ${position}`, position);
  }
  return parsed.data;
}

/** Accepts a JSON array of entries or `{ "entries": [...] }`. */
export function parseLogEntries(input: unknown): LogEntry[] {
  const list = isRecord(input) ? input.entries : input;
  if (!Array.isArray(list)) {
    throw new MalformedInputError('Log must be an array of entries or { "entries": [...] }', {
      path: 'entries',
    });
  }
  return list.map((item: unknown, i) => parseLogEntry(item, i));
}

/** One JSON entry per line; blank lines are skipped. */
export function parseJsonlEntries(text: string): LogEntry[] {
  const entries: LogEntry[] = [];
  const lines = text.split(/\r?\n/);

  lines.forEach((line, lineNo) => {
    if (line.trim().length === 0) return;
    const position = entries.length;
    const value = parseJsonLine(line, lineNo + 1, position);
    entries.push(parseLogEntry(value, position));
  });

  return entries;
}

/**
 * Parse a log file body: a JSON document (array or `{ entries }`) or JSONL.
 */
export function parseLogText(text: string): LogEntry[] {
  const trimmed = text.trim();
  if (trimmed.length === 0) return [];

  if (trimmed.startsWith('[')) {
    return parseLogEntries(parseJsonDocument(trimmed, 'Log'));
  }

  // A single JSON object is either `{ entries }` or the first line of JSONL.
  if (!trimmed.includes('\n')) {
    const doc = parseJsonDocument(trimmed, 'Log');
    return isRecord(doc) && 'entries' in doc ? parseLogEntries(doc) : [parseLogEntry(doc, 0)];
  }

  const firstLine = trimmed.slice(0, trimmed.indexOf('\n'));
  try {
    JSON.parse(firstLine);
  } catch {
    // Multi-line JSON document, e.g. pretty-printed `{ "entries": [...] }`.
    return parseLogEntries(parseJsonDocument(trimmed, 'Log'));
  }
  return parseJsonlEntries(trimmed);
}

/**
 * Numbers keep their exact value. Integers beyond 2^53 become bigint;
 * a decimal that no double can hold exactly is rejected.
 */
function parseJsonNumber(literal: string): number | bigint {
  if (isSafeNumber(literal)) return parseFloat(literal);
  if (isInteger(literal)) return BigInt(literal);
  throw new MalformedInputError(
    `Number ${literal} cannot be represented without losing precision`
  );
}

function rejectReservedKey(key: string, value: unknown): unknown {
  if (key === RESERVED_FIELD_NAME) {
    throw new MalformedInputError(`Field name "${RESERVED_FIELD_NAME}" is not allowed`, {
      path: RESERVED_FIELD_NAME,
    });
  }
  return value;
}

/**
 * Parse JSON text without rounding numbers.
 *
 * The built-in parser runs first: it reports syntax errors and keeps a
 * "__proto__" key as an own property, so the key can be rejected before
 * the lossless pass would drop it.
 */
function parseJsonText(text: string): unknown {
  JSON.parse(text, rejectReservedKey);
  return parseLossless(text, null, parseJsonNumber);
}

/** One line of a JSONL log; errors name the line and the entry position. */
export function parseJsonLine(line: string, lineNo: number, position: number): unknown {
  try {
    return parseJsonText(line);
  } catch (err) {
    if (err instanceof MalformedInputError) {
      throw new MalformedInputError(`Line ${lineNo}: ${err.message}`, {
        entry_index: position,
        path: err.details.path,
      });
    }
    const reason = err instanceof Error ? err.message : String(err);
    throw new MalformedInputError(`Line ${lineNo} is not valid JSON: ${reason}`, {
      entry_index: position,
    });
  }
}

export function parseJsonDocument(text: string, label: string): unknown {
  try {
    return parseJsonText(text);
  } catch (err) {
    if (err instanceof MalformedInputError) {
      throw new MalformedInputError(`${label}: ${err.message}`, err.details);
    }
    const reason = err instanceof Error ? err.message : String(err);
    throw new MalformedInputError(`${label} is not valid JSON: ${reason}`);
  }
}

// ---------------------------------------------------------------------------
// Digests and checkpoints
// ---------------------------------------------------------------------------

export function parseMissionDigest(input: unknown): MissionDigest {
  const parsed = MissionDigestSchema.safeParse(input);
  if (!parsed.success) {
    throw toMalformed(parsed.error, 'Mission digest');
  }

  const d = parsed.data;
  assertCanonicalFormat(d.canonical_format, 'Mission digest');
  const digest: MissionDigest = {
    ...d,
    hash_algorithm: resolveHashAlgorithm(d.hash_algorithm),
    canonical_format: CANONICAL_FORMAT,
  };

  if (digest.entry_count === 0 && digest.final_chain_hash !== GENESIS_CHAIN_HASH) {
    throw new MalformedInputError('Empty-mission digest must carry the genesis chain hash', {
      path: 'final_chain_hash',
    });
  }
  if (!verifyDigestHash(digest)) {
    throw new MalformedInputError('Mission digest: digest_hash does not match its fields', {
      path: 'digest_hash',
    });
  }
  return digest;
}

export function parseCheckpoint(input: unknown, position?: number): Checkpoint {
  const parsed = CheckpointSchema.safeParse(input);
  if (!parsed.success) {
    const label = position === undefined ? 'Checkpoint' : `Checkpoint ${position}`;
    throw toMalformed(
      parsed.error,
      label,
      undefined,
      position === undefined ? [] : ['checkpoints', position]
    );
  }
  return { ...parsed.data, hash_algorithm: resolveHashAlgorithm(parsed.data.hash_algorithm) };
}

/** Accepts a JSON array of checkpoints or `{ "checkpoints": [...] }`. */
export function parseCheckpoints(input: unknown): Checkpoint[] {
  const list = isRecord(input) ? input.checkpoints : input;
  if (!Array.isArray(list)) {
    throw new MalformedInputError(
      'Checkpoints must be an array or { "checkpoints": [...] }',
      { path: 'checkpoints' }
    );
  }
  return list.map((item: unknown, i) => parseCheckpoint(item, i));
}

/**
 * Accepts a JSON array of chain links or `{ "links": [...] }`, as written
 * next to the digest when a log is sealed. Linkage is checked here; whether
 * each chain_hash follows from its entry_hash depends on the algorithm and
 * is checked by the verifier.
 */
export function parseChainLinks(input: unknown): ChainLink[] {
  const list = isRecord(input) ? input.links : input;
  if (!Array.isArray(list)) {
    throw new MalformedInputError('Chain must be an array or { "links": [...] }', {
      path: 'links',
    });
  }

  const links: ChainLink[] = [];
  list.forEach((item: unknown, i) => {
    const parsed = ChainLinkSchema.safeParse(item);
    if (!parsed.success) {
      throw toMalformed(parsed.error, `Chain link ${i}`, undefined, ['links', i]);
    }
    const link = parsed.data;
    const prevHash = links[i - 1]?.chain_hash ?? GENESIS_CHAIN_HASH;
    if (link.index !== i) {
      throw new MalformedInputError(`Chain link ${i} declares index ${link.index}`, {
        path: `links[${i}].index`,
      });
    }
    if (link.prev_chain_hash !== prevHash) {
      const message =
        i === 0
          ? 'Chain link 0 does not start from the genesis hash'
          : `Chain link ${i} does not continue link ${i - 1}`;
      throw new MalformedInputError(message, { path: `links[${i}].prev_chain_hash` });
    }
    links.push(link);
  });
  return links;
}
