import type { Logger } from '@flightseal/anchor-evm';
import {
  ChainVerifier,
  VerificationAbortedError,
  type Checkpoint,
  type ExpectedState,
  type VerificationReport,
} from '@flightseal/core';

import { CliUsageError } from './errors.js';
import {
  nowIso,
  readChainFile,
  readCheckpointFile,
  readCheckpointsFile,
  readLogEntries,
  readMissionDigestFile,
} from './io.js';
import type { CliVerifyOutput, ResolvedFlightsealConfig } from './types.js';

function describeFailure(report: VerificationReport): string {
  const at = report.first_divergence_index;
  const from = report.divergence_lower_bound;
  switch (report.divergence_reason) {
    case 'INDEX_MISMATCH':
      return `Entry at position ${at} declares a different index`;
    case 'MISSING_ENTRIES':
      return `Log ends at index ${at}, before the last expected checkpoint`;
    default:
      return from === at
        ? `Chain hash diverges at index ${at}`
        : `Chain hash diverges at index ${at}; the altered entry lies in [${from}, ${at}]`;
  }
}

export function reportToOutput(
  report: VerificationReport,
  input: CliVerifyOutput['input']
): CliVerifyOutput {
  if (report.result === 'PASS') {
    const uncovered = report.uncovered_suffix_length;
    return {
      command: 'verify',
      status: 'PASS',
      completed_at: nowIso(),
      reason_code: 'OK',
      reason:
        uncovered === 0
          ? `Verified ${report.checked_entry_count} entries`
          : `Verified ${report.checked_entry_count} entries; the last ${uncovered} are not covered by any checkpoint`,
      input,
      report,
    };
  }
  return {
    command: 'verify',
    status: 'FAIL',
    completed_at: nowIso(),
    reason_code: report.divergence_reason ?? 'CHAIN_HASH_MISMATCH',
    reason: describeFailure(report),
    input,
    report,
  };
}

/**
 * Verify a log file against a digest file, a checkpoint history file or the
 * chain file written by seal.
 * Entries are streamed into the verifier, which stops reading at the first
 * divergence. The signal is checked between entries.
 */
export async function verifyLogFile(opts: {
  inputPath: string;
  digestPath?: string;
  checkpointsPath?: string;
  chainPath?: string;
  fromPath?: string;
  configPath?: string;
  config: ResolvedFlightsealConfig;
  logger: Logger;
  signal?: AbortSignal;
}): Promise<CliVerifyOutput> {
  const given = [opts.digestPath, opts.checkpointsPath, opts.chainPath].filter(
    (p) => p !== undefined
  );
  if (given.length > 1) {
    throw new CliUsageError('verify takes one of --digest, --checkpoints or --chain');
  }

  let expected: ExpectedState;
  if (opts.digestPath !== undefined) {
    expected = await readMissionDigestFile(opts.digestPath);
  } else if (opts.checkpointsPath !== undefined) {
    expected = await readCheckpointsFile(opts.checkpointsPath);
  } else if (opts.chainPath !== undefined) {
    expected = await readChainFile(opts.chainPath);
  } else {
    throw new CliUsageError('verify needs --digest <file>, --checkpoints <file> or --chain <file>');
  }
  const from: Checkpoint | undefined =
    opts.fromPath === undefined ? undefined : await readCheckpointFile(opts.fromPath);

  const verifier = new ChainVerifier(expected, { hashAlgorithm: opts.config.hashAlgorithm, from });
  for await (const entry of readLogEntries(opts.inputPath)) {
    if (opts.signal?.aborted) throw new VerificationAbortedError(verifier.position);
    if (!verifier.push(entry)) break;
  }
  const report = verifier.finish();
  opts.logger.debug(
    `checked ${report.checked_entry_count} entries, ${report.matched_checkpoint_count} expected points matched`
  );

  return reportToOutput(report, {
    path: opts.inputPath,
    digest_path: opts.digestPath,
    checkpoints_path: opts.checkpointsPath,
    chain_path: opts.chainPath,
    from_path: opts.fromPath,
    config_path: opts.configPath,
  });
}
