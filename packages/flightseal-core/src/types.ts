/**
 * Shared types for flight log sealing and verification.
 *
 * Wire objects (links, checkpoints, digests, reports) use snake_case so they
 * can be written to disk or handed to an anchoring backend unchanged.
 */

// ---------------------------------------------------------------------------
// Allowlists (fail-closed)
// ---------------------------------------------------------------------------

export const HASH_ALGORITHMS = ['SHA-256', 'SHA3-256', 'BLAKE2b-256'] as const;
export type HashAlgorithm = (typeof HASH_ALGORITHMS)[number];

export const DEFAULT_HASH_ALGORITHM: HashAlgorithm = 'SHA-256';

export const CANONICAL_FORMATS = ['fslog-canon/1'] as const;
export type CanonicalFormat = (typeof CANONICAL_FORMATS)[number];

export const CANONICAL_FORMAT: CanonicalFormat = 'fslog-canon/1';

export const DIGEST_VERSIONS = ['1'] as const;
export type DigestVersion = (typeof DIGEST_VERSIONS)[number];

/** Lowercase hex, 32 bytes, no 0x prefix. */
export type HashHex = string;

/** Public predecessor of the link at index 0. */
export const GENESIS_CHAIN_HASH: HashHex = '00'.repeat(32);

// ---------------------------------------------------------------------------
// Log entries
// ---------------------------------------------------------------------------

/**
 * Every value a telemetry field may hold. The canonical encoder has one
 * branch per member; anything else is rejected as malformed input.
 */
export type TelemetryValue =
  | null
  | boolean
  | number
  | bigint
  | string
  | Uint8Array
  | TelemetryValue[]
  | TelemetryRecord;

export interface TelemetryRecord {
  [field: string]: TelemetryValue;
}

/**
 * The subset of {@link TelemetryValue} a JSON log can carry. Integer literals
 * beyond 2^53 arrive as bigint.
 */
export type JsonTelemetryValue =
  | null
  | boolean
  | number
  | bigint
  | string
  | JsonTelemetryValue[]
  | { [field: string]: JsonTelemetryValue };

export interface LogEntry {
  /** Position in the mission log, starting at 0. */
  index: number;
  /** RFC 3339 timestamp as emitted by the logging pipeline. */
  timestamp: string;
  /** Entry type tag, e.g. "gps", "battery", "mode_change". */
  type: string;
  fields: TelemetryRecord;
}

// ---------------------------------------------------------------------------
// Chain
// ---------------------------------------------------------------------------

export interface ChainLink {
  index: number;
  entry_hash: HashHex;
  prev_chain_hash: HashHex;
  chain_hash: HashHex;
}

export interface Checkpoint {
  index: number;
  chain_hash: HashHex;
  /** When the checkpoint was recorded (ISO 8601). */
  timestamp: string;
  hash_algorithm: HashAlgorithm;
}

export interface MissionDigest {
  digest_version: DigestVersion;
  mission_id: string;
  final_chain_hash: HashHex;
  entry_count: number;
  hash_algorithm: HashAlgorithm;
  canonical_format: CanonicalFormat;
  created_at: string;
  /** Commits to every field above except created_at. */
  digest_hash: HashHex;
}

// ---------------------------------------------------------------------------
// Verification
// ---------------------------------------------------------------------------

export type VerificationResult = 'PASS' | 'FAIL';

export type VerificationMode = 'digest' | 'checkpoints' | 'chain';

export type DivergenceReason =
  | 'INDEX_MISMATCH'
  | 'CHAIN_HASH_MISMATCH'
  | 'MISSING_ENTRIES';

export interface DigestSummary {
  final_chain_hash: HashHex;
  entry_count: number;
  digest_hash?: HashHex;
}

export type CheckpointStatus = 'ok' | 'mismatch' | 'missing_entry' | 'not_reached';

export interface CheckpointResult {
  index: number;
  expected_chain_hash: HashHex;
  recomputed_chain_hash: HashHex | null;
  status: CheckpointStatus;
}

export interface VerificationReport {
  result: VerificationResult;
  mode: VerificationMode;
  first_divergence_index: number | null;
  /** Earliest index the evidence allows the divergence to start at. */
  divergence_lower_bound: number | null;
  divergence_reason: DivergenceReason | null;
  recomputed_digest: DigestSummary;
  expected_digest: DigestSummary;
  checked_entry_count: number;
  /** Candidate entries past the last expected point; verified by nothing. */
  uncovered_suffix_length: number;
  hash_algorithm: HashAlgorithm;
  checkpoint_results: CheckpointResult[];
  matched_checkpoint_count: number;
}

// ---------------------------------------------------------------------------
// Anchoring
// ---------------------------------------------------------------------------

export interface AnchorReceipt {
  /** Backend-specific identifier (transaction hash, record id, ...). */
  anchor_id: string;
  backend: string;
  mission_id: string;
  digest_hash: HashHex;
  final_chain_hash: HashHex;
  entry_count: number;
  anchored_at: string;
  details?: Record<string, string | number | boolean>;
}

/**
 * Capability used to publish a digest to an external immutable record.
 * Implementations own transport, signing, retries and confirmation.
 */
export interface Anchor {
  anchor(digest: MissionDigest): Promise<AnchorReceipt>;
}
