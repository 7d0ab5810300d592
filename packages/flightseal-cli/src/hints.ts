/**
 * Actionable hints for reason codes.
 *
 * Each hint should tell the user what to check or do next.
 * MUST NOT contain secrets. MUST be safe for CI logs.
 */

const HINTS: Record<string, string> = {
  // ── Pass ──────────────────────────────────────────────
  OK: 'Verification passed. No action required.',
  SEALED: 'Log sealed. Keep the digest (and checkpoints) somewhere the log writer cannot modify, or anchor them with `flightseal anchor`.',
  ANCHORED: 'Digest anchored. Keep the receipt; `flightseal fetch-checkpoints` reads the anchored history back.',
  FETCHED: 'Checkpoints fetched. Pass the output file to `flightseal verify --checkpoints`.',

  // ── Tamper findings ───────────────────────────────────
  CHAIN_HASH_MISMATCH:
    'The recomputed chain hash differs from the expected one. An entry at or after divergence_lower_bound and at or before first_divergence_index was modified, inserted or removed. Verify against denser checkpoints to narrow the range.',
  INDEX_MISMATCH:
    'An entry declares a different index than its position in the log. Entries were reordered, duplicated or removed just before first_divergence_index.',
  MISSING_ENTRIES:
    'The log ends before the last expected checkpoint. Entries from first_divergence_index onward were truncated or not yet uploaded.',

  // ── Input ─────────────────────────────────────────────
  MALFORMED_INPUT:
    'An entry, digest or checkpoint file failed validation. Check the reported entry index and field path. Entries need index, timestamp (RFC 3339), type and fields with JSON values only.',
  SEQUENCE_ERROR:
    'Entries were appended out of order or with a gap. Sort the log by index and make sure indices start at 0 and increase by one.',
  ALGORITHM_MISMATCH:
    'The digest or checkpoints were produced with a different hash algorithm or canonical format. Set FLIGHTSEAL_HASH_ALGORITHM (or hash_algorithm in the config file) to the one the log was sealed with.',
  VERIFICATION_ABORTED:
    'Verification was cancelled before it finished. Re-run it; no result was produced.',

  // ── CLI ───────────────────────────────────────────────
  USAGE_ERROR: 'Invalid command-line usage. Run `flightseal --help` for the list of commands and flags.',
  CONFIG_ERROR:
    'The config file or a FLIGHTSEAL_* environment variable is invalid. The file must be JSON with {"config_version":"1"}.',

  // ── Anchoring ─────────────────────────────────────────
  ANCHOR_CONFIG_ERROR:
    'Anchoring needs rpc_url, chain_id and registry_address (config file or FLIGHTSEAL_* variables), and FLIGHTSEAL_ANCHOR_PRIVATE_KEY for writes. Use --dry-run to anchor into an in-memory registry.',
  MISSION_NOT_FOUND:
    'The registry has no rows for this mission id. Check the id (it is NFC-normalized before hashing) and the registry address.',
  ANCHOR_HISTORY_MISMATCH:
    'The local chain disagrees with the newest row already anchored for this mission, so nothing was written. The log changed after it was anchored; verify it against the output of `flightseal fetch-checkpoints`.',
  REGISTRY_REVERT:
    'The flight registry rejected the call. Closed missions cannot be extended, and checkpoints must be anchored in increasing index order.',

  // ── Internal ──────────────────────────────────────────
  INTERNAL_ERROR: 'Unexpected failure. Re-run with FLIGHTSEAL_DEBUG=1 for diagnostics on stderr.',
};

/**
 * Look up an actionable hint for a reason code.
 * Returns undefined if no hint is registered (callers should not emit a hint field).
 */
export function hintForReasonCode(code: string): string | undefined {
  return HINTS[code];
}

export function knownReasonCodes(): string[] {
  return Object.keys(HINTS);
}

/**
 * Full explanation: reason code + hint.
 * Used by `flightseal explain`.
 */
export function explainReasonCode(code: string): string {
  const hint = HINTS[code];
  if (!hint) {
    return `${code}: Unknown reason code.\n\nKnown codes: ${knownReasonCodes().join(', ')}`;
  }
  return `${code}\n\n${hint}`;
}
