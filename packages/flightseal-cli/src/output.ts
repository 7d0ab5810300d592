import { AnchorConfigError, RegistryRevertError } from '@flightseal/anchor-evm';
import {
  AlgorithmMismatchError,
  MalformedInputError,
  SequenceError,
  VerificationAbortedError,
  isFlightsealError,
} from '@flightseal/core';

import { CliConfigError, CliUsageError } from './errors.js';
import { hintForReasonCode } from './hints.js';
import { nowIso } from './io.js';
import type { CliCommand, CliErrorOutput, CliOutput } from './types.js';

/** Attach a hint to a CLI output if applicable. */
export function attachHint<T extends CliOutput>(out: T): T {
  if (out.status !== 'PASS' && out.reason_code) {
    const hint = hintForReasonCode(out.reason_code);
    if (hint) {
      return { ...out, hint };
    }
  }
  return out;
}

export function exitCodeForOutput(out: CliOutput): number {
  switch (out.status) {
    case 'PASS':
      return 0;
    case 'FAIL':
      return 1;
    case 'ERROR':
      return 2;
  }
}

function errorDetails(err: unknown): Record<string, string | number> | undefined {
  if (err instanceof MalformedInputError) {
    const details: Record<string, string | number> = {};
    if (err.details.entry_index !== undefined) details.entry_index = err.details.entry_index;
    if (err.details.path !== undefined) details.path = err.details.path;
    return Object.keys(details).length > 0 ? details : undefined;
  }
  if (err instanceof SequenceError) {
    return { expected_index: err.expected_index, received_index: err.received_index };
  }
  if (err instanceof AlgorithmMismatchError) {
    return { expected: err.expected, received: err.received };
  }
  if (err instanceof VerificationAbortedError) {
    return { next_index: err.next_index };
  }
  if (err instanceof RegistryRevertError && err.tx_hash !== undefined) {
    return { tx_hash: err.tx_hash };
  }
  return undefined;
}

function reasonCodeForError(err: unknown): string {
  if (err instanceof CliUsageError) return err.code;
  if (err instanceof CliConfigError) return err.code;
  if (err instanceof AnchorConfigError) return err.code;
  if (err instanceof RegistryRevertError) return err.code;
  if (isFlightsealError(err)) return err.code;
  return 'INTERNAL_ERROR';
}

/** Map a thrown error to an ERROR output (exit code 2). */
export function errorToOutput(err: unknown, command?: CliCommand): CliErrorOutput {
  const reasonCode = reasonCodeForError(err);
  const out: CliErrorOutput = {
    status: 'ERROR',
    completed_at: nowIso(),
    reason_code: reasonCode,
    reason: err instanceof Error ? err.message : 'unknown error',
    hint: hintForReasonCode(reasonCode),
  };
  if (command !== undefined) out.command = command;
  const details = errorDetails(err);
  if (details !== undefined) out.details = details;
  return out;
}
