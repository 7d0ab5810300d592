import { createReadStream } from 'node:fs';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import * as readline from 'node:readline';

import {
  parseCheckpoint,
  parseCheckpoints,
  parseChainLinks,
  parseJsonDocument,
  parseJsonLine,
  parseLogEntry,
  parseLogText,
  parseMissionDigest,
  type ChainLink,
  type Checkpoint,
  type LogEntry,
  type MissionDigest,
} from '@flightseal/core';

import { CliUsageError } from './errors.js';

export function nowIso(): string {
  return new Date().toISOString();
}

export async function readTextFile(filePath: string): Promise<string> {
  try {
    return await fs.readFile(filePath, 'utf8');
  } catch (err) {
    throw new CliUsageError(
      `Could not read input file at ${filePath}: ${err instanceof Error ? err.message : 'unknown error'}`
    );
  }
}

export async function readJsonFile(filePath: string, label: string): Promise<unknown> {
  return parseJsonDocument(await readTextFile(filePath), label);
}

export async function writeJsonFile(filePath: string, value: unknown): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, `${JSON.stringify(value, null, 2)}\n`, 'utf8');
}

export async function readMissionDigestFile(filePath: string): Promise<MissionDigest> {
  return parseMissionDigest(await readJsonFile(filePath, 'Mission digest'));
}

export async function readCheckpointsFile(filePath: string): Promise<Checkpoint[]> {
  return parseCheckpoints(await readJsonFile(filePath, 'Checkpoints'));
}

export async function readCheckpointFile(filePath: string): Promise<Checkpoint> {
  return parseCheckpoint(await readJsonFile(filePath, 'Checkpoint'));
}

export async function readChainFile(filePath: string): Promise<ChainLink[]> {
  return parseChainLinks(await readJsonFile(filePath, 'Chain'));
}

/**
 * Stream the entries of a log file. `.jsonl` files are read line by line;
 * anything else is parsed as a whole.
 */
export async function* readLogEntries(filePath: string): AsyncGenerator<LogEntry> {
  if (path.extname(filePath).toLowerCase() !== '.jsonl') {
    yield* parseLogText(await readTextFile(filePath));
    return;
  }

  await fs.access(filePath).catch((err: unknown) => {
    throw new CliUsageError(
      `Could not read input file at ${filePath}: ${err instanceof Error ? err.message : 'unknown error'}`
    );
  });

  const stream = createReadStream(filePath, { encoding: 'utf8' });
  const lines = readline.createInterface({ input: stream, crlfDelay: Infinity });
  let position = 0;
  let lineNo = 0;
  try {
    for await (const line of lines) {
      lineNo += 1;
      if (line.trim().length === 0) continue;
      const value = parseJsonLine(line, lineNo, position);
      yield parseLogEntry(value, position);
      position += 1;
    }
  } finally {
    // Closing the interface leaves its input open.
    lines.close();
    stream.destroy();
  }
}

/** File-name-safe form of a mission id. */
export function missionSlug(missionId: string): string {
  const slug = missionId.normalize('NFC').replace(/[^A-Za-z0-9._-]+/g, '_');
  return slug.length === 0 ? 'mission' : slug;
}
