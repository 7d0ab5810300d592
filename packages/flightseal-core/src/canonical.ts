/**
 * Canonical byte layout for log entries (`fslog-canon/1`).
 *
 *   entry := "FSE1" u64be(index) str(type) str(timestamp) map(fields)
 *   str   := u32be(len) utf8(NFC(s))
 *
 * Values are tagged (see TAG below). Map keys are ordered by the UTF-8 bytes
 * of their NFC form, so insertion order never reaches the output.
 */

import { utf8ToBytes } from '@noble/hashes/utils';

import { ByteWriter, compareBytes } from './bytes.js';
import { MalformedInputError } from './errors.js';
import type { LogEntry, TelemetryValue } from './types.js';

const ENTRY_MAGIC = utf8ToBytes('FSE1');

export const MAX_NESTING_DEPTH = 64;

const TAG = {
  null: 0x00,
  false: 0x01,
  true: 0x02,
  number: 0x03,
  bigint: 0x04,
  string: 0x05,
  bytes: 0x06,
  array: 0x07,
  map: 0x08,
} as const;

const LONE_SURROGATE_RE = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/;

export function hasLoneSurrogate(value: string): boolean {
  return LONE_SURROGATE_RE.test(value);
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

interface EncodeContext {
  entryIndex: number | undefined;
  /** Containers currently being encoded; used for cycle and depth checks. */
  open: Set<object>;
}

function malformed(ctx: EncodeContext, path: string, message: string): MalformedInputError {
  const where = ctx.entryIndex === undefined ? path : `entry ${ctx.entryIndex} ${path}`;
  return new MalformedInputError(`${message} (at ${where})`, {
    entry_index: ctx.entryIndex,
    path,
  });
}

function writeText(w: ByteWriter, value: string, ctx: EncodeContext, path: string): void {
  if (hasLoneSurrogate(value)) {
    throw malformed(ctx, path, 'String contains a lone surrogate');
  }
  w.text(value);
}

function enter(container: object, ctx: EncodeContext, path: string): void {
  if (ctx.open.has(container)) {
    throw malformed(ctx, path, 'Cyclic structure');
  }
  if (ctx.open.size >= MAX_NESTING_DEPTH) {
    throw malformed(ctx, path, `Nesting deeper than ${MAX_NESTING_DEPTH}`);
  }
  ctx.open.add(container);
}

function writeMap(
  w: ByteWriter,
  map: Record<string, unknown>,
  ctx: EncodeContext,
  path: string
): void {
  if (Object.getOwnPropertySymbols(map).length > 0) {
    throw malformed(ctx, path, 'Symbol keys are not allowed');
  }

  const seen = new Set<string>();
  const keyed: { key: string; bytes: Uint8Array }[] = [];

  for (const key of Object.keys(map)) {
    const keyPath = `${path}.${key}`;
    if (hasLoneSurrogate(key)) {
      throw malformed(ctx, keyPath, 'Key contains a lone surrogate');
    }
    const normalized = key.normalize('NFC');
    if (seen.has(normalized)) {
      throw malformed(ctx, keyPath, 'Key collides with another key after NFC normalization');
    }
    seen.add(normalized);
    keyed.push({ key, bytes: utf8ToBytes(normalized) });
  }

  keyed.sort((a, b) => compareBytes(a.bytes, b.bytes));

  enter(map, ctx, path);
  w.u8(TAG.map).u32(keyed.length);
  for (const { key, bytes } of keyed) {
    w.lengthPrefixed(bytes);
    writeValue(w, map[key], ctx, `${path}.${key}`);
  }
  ctx.open.delete(map);
}

function writeObject(w: ByteWriter, value: object, ctx: EncodeContext, path: string): void {
  if (value instanceof Uint8Array) {
    w.u8(TAG.bytes).lengthPrefixed(value);
    return;
  }

  if (Array.isArray(value)) {
    enter(value, ctx, path);
    w.u8(TAG.array).u32(value.length);
    value.forEach((item: unknown, i) => writeValue(w, item, ctx, `${path}[${i}]`));
    ctx.open.delete(value);
    return;
  }

  if (isPlainObject(value)) {
    writeMap(w, value, ctx, path);
    return;
  }

  const kind = value.constructor?.name ?? 'object';
  throw malformed(ctx, path, `Unsupported object type ${kind}`);
}

function writeValue(w: ByteWriter, value: unknown, ctx: EncodeContext, path: string): void {
  if (value === null) {
    w.u8(TAG.null);
    return;
  }

  switch (typeof value) {
    case 'boolean':
      w.u8(value ? TAG.true : TAG.false);
      return;
    case 'number':
      w.u8(TAG.number).f64(value);
      return;
    case 'bigint':
      w.u8(TAG.bigint).text(value.toString(10));
      return;
    case 'string':
      w.u8(TAG.string);
      writeText(w, value, ctx, path);
      return;
    case 'object':
      writeObject(w, value, ctx, path);
      return;
    default:
      // undefined | function | symbol
      throw malformed(ctx, path, `Unsupported value type ${typeof value}`);
  }
}

/**
 * Canonical bytes of a single telemetry value. Exposed for tooling that needs
 * to compare individual fields; entries go through {@link canonicalizeEntry}.
 */
export function canonicalizeValue(value: TelemetryValue): Uint8Array {
  const w = new ByteWriter();
  writeValue(w, value, { entryIndex: undefined, open: new Set() }, '$');
  return w.finish();
}

/**
 * Deterministic bytes of a log entry. Semantically equal entries produce equal
 * bytes; any difference in index, type, timestamp or field content does not.
 *
 * Throws {@link MalformedInputError} for values outside the telemetry union.
 */
export function canonicalizeEntry(entry: LogEntry): Uint8Array {
  if (!isPlainObject(entry)) {
    throw new MalformedInputError('Log entry must be a plain object');
  }

  const index: unknown = entry.index;
  if (typeof index !== 'number' || !Number.isSafeInteger(index) || index < 0) {
    throw new MalformedInputError('Entry index must be a non-negative safe integer', {
      path: 'index',
    });
  }

  const ctx: EncodeContext = { entryIndex: index, open: new Set() };
  const type: unknown = entry.type;
  const timestamp: unknown = entry.timestamp;
  const fields: unknown = entry.fields;

  if (typeof type !== 'string' || type.length === 0) {
    throw malformed(ctx, 'type', 'Entry type must be a non-empty string');
  }
  if (typeof timestamp !== 'string') {
    throw malformed(ctx, 'timestamp', 'Entry timestamp must be a string');
  }
  if (!isPlainObject(fields)) {
    throw malformed(ctx, 'fields', 'Entry fields must be a plain object');
  }

  const w = new ByteWriter().raw(ENTRY_MAGIC).u64(index);
  writeText(w, type, ctx, 'type');
  writeText(w, timestamp, ctx, 'timestamp');
  writeMap(w, fields, ctx, 'fields');
  return w.finish();
}
