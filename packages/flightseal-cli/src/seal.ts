import * as path from 'node:path';

import type { Logger } from '@flightseal/anchor-evm';
import { ChainBuilder, planCheckpointIndices, type LogEntry } from '@flightseal/core';

import { missionSlug, nowIso, readLogEntries, writeJsonFile } from './io.js';
import type { CliSealOutput, ResolvedFlightsealConfig } from './types.js';

export type CheckpointPlan =
  | { kind: 'none' }
  | { kind: 'every'; every: number }
  | { kind: 'chunks'; chunks: number };

/**
 * Build the chain for a log file and write `<mission>.digest.json`,
 * `<mission>.checkpoints.json` and `<mission>.chain.json` to the output
 * directory (the input's directory by default).
 */
export async function sealLogFile(opts: {
  inputPath: string;
  missionId: string;
  outDir?: string;
  plan: CheckpointPlan;
  configPath?: string;
  config: ResolvedFlightsealConfig;
  logger: Logger;
  now?: () => Date;
}): Promise<CliSealOutput> {
  const plan: CheckpointPlan =
    opts.plan.kind === 'none' && opts.config.checkpointInterval !== null
      ? { kind: 'every', every: opts.config.checkpointInterval }
      : opts.plan;

  // Chunk milestones depend on the total, so the log is read up front.
  const entries: LogEntry[] = [];
  for await (const entry of readLogEntries(opts.inputPath)) entries.push(entry);

  const builder = new ChainBuilder({
    hashAlgorithm: opts.config.hashAlgorithm,
    checkpointEvery: plan.kind === 'every' ? plan.every : undefined,
    checkpointAt:
      plan.kind === 'chunks' ? planCheckpointIndices(entries.length, plan.chunks) : undefined,
    now: opts.now,
  });
  builder.appendAll(entries);
  const digest = builder.finalize(opts.missionId);
  opts.logger.debug(
    `sealed ${digest.entry_count} entries with ${builder.checkpoints.length} checkpoints`
  );

  const outDir = opts.outDir ?? path.dirname(opts.inputPath);
  const base = path.join(outDir, missionSlug(digest.mission_id));
  const files = {
    digest: `${base}.digest.json`,
    checkpoints: `${base}.checkpoints.json`,
    chain: `${base}.chain.json`,
  };
  await writeJsonFile(files.digest, digest);
  await writeJsonFile(files.checkpoints, { checkpoints: builder.checkpoints });
  await writeJsonFile(files.chain, { links: builder.getLinks() });
  opts.logger.info(`wrote ${files.digest}`);

  return {
    command: 'seal',
    status: 'PASS',
    completed_at: nowIso(),
    reason_code: 'SEALED',
    reason: `Sealed ${digest.entry_count} entries for mission ${digest.mission_id}`,
    input: { path: opts.inputPath, config_path: opts.configPath },
    digest,
    checkpoint_count: builder.checkpoints.length,
    files,
  };
}
