import type { LogEntry } from '../src/types.js';

export const FIXED_NOW = () => new Date('2026-03-01T12:00:00.000Z');

export function makeEntry(index: number): LogEntry {
  return {
    index,
    timestamp: `2026-03-01T10:00:${String(index).padStart(2, '0')}Z`,
    type: index % 2 === 0 ? 'gps' : 'battery',
    fields:
      index % 2 === 0
        ? { lat: 47.397742 + index / 1000, lon: 8.545594, alt_m: 100 + index, fix: '3d' }
        : { voltage_v: 15.2 - index / 100, remaining_pct: 90 - index, cells: [3.8, 3.8, 3.81, 3.79] },
  };
}

export function makeLog(count: number): LogEntry[] {
  return Array.from({ length: count }, (_, i) => makeEntry(i));
}

/** Renumber entries so declared indices match their positions again. */
export function renumber(entries: readonly LogEntry[]): LogEntry[] {
  return entries.map((entry, i) => ({ ...entry, index: i }));
}

export function thrown(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error('expected function to throw');
}
