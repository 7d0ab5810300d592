import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';

import { silentLogger } from '@flightseal/anchor-evm';
import type { LogEntry } from '@flightseal/core';

export const NOW = () => new Date('2026-03-01T12:00:00.000Z');

export const logger = silentLogger;

export function makeEntry(index: number): LogEntry {
  return {
    index,
    timestamp: `2026-03-01T10:00:${String(index).padStart(2, '0')}Z`,
    type: index % 2 === 0 ? 'gps' : 'battery',
    fields:
      index % 2 === 0
        ? { lat: 47.397742 + index / 1000, lon: 8.545594, alt_m: 100 + index }
        : { voltage_v: 15.2 - index / 100, remaining_pct: 90 - index },
  };
}

export function makeLog(count: number, start = 0): LogEntry[] {
  return Array.from({ length: count }, (_, i) => makeEntry(start + i));
}

export async function makeTmpDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), 'flightseal-'));
}

export async function removeTmpDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

export async function writeJsonl(filePath: string, entries: readonly LogEntry[]): Promise<void> {
  await fs.writeFile(filePath, entries.map((e) => JSON.stringify(e)).join('\n') + '\n', 'utf8');
}

export async function writeJson(filePath: string, value: unknown): Promise<void> {
  await fs.writeFile(filePath, JSON.stringify(value, null, 2), 'utf8');
}

export async function readJson(filePath: string): Promise<unknown> {
  return JSON.parse(await fs.readFile(filePath, 'utf8'));
}
