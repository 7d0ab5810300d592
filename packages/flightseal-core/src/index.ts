/**
 * @flightseal/core
 *
 * Offline, deterministic hash-chain construction and verification for
 * mission telemetry logs. No I/O; anchoring happens behind the Anchor
 * interface.
 */

export * from './types.js';
export * from './errors.js';

export { ByteWriter, isHashHex } from './bytes.js';
export {
  MAX_NESTING_DEPTH,
  canonicalizeEntry,
  canonicalizeValue,
  hasLoneSurrogate,
} from './canonical.js';
export {
  assertCanonicalFormat,
  assertSameAlgorithm,
  digestBytes,
  hashEntry,
  hashLogEntry,
  isAllowedCanonicalFormat,
  isAllowedHashAlgorithm,
  resolveHashAlgorithm,
} from './hash.js';
export {
  ChainBuilder,
  appendLink,
  buildChain,
  checkpoint,
  computeChainHash,
  linkEntry,
  planCheckpointIndices,
} from './chain.js';
export type {
  BuildChainOptions,
  BuiltChain,
  ChainBuilderOptions,
  CheckpointOptions,
} from './chain.js';
export { computeDigestHash, finalize, summarizeDigest, verifyDigestHash } from './digest.js';
export type { DigestHashInput, FinalizeOptions } from './digest.js';
export { ChainVerifier, verify } from './verify.js';
export type { ExpectedState, VerifyOptions } from './verify.js';
export {
  ChainLinkSchema,
  CheckpointSchema,
  LogEntrySchema,
  MissionDigestSchema,
  TelemetryValueSchema,
  parseChainLinks,
  parseCheckpoint,
  parseCheckpoints,
  parseJsonDocument,
  parseJsonLine,
  parseJsonlEntries,
  parseLogEntries,
  parseLogEntry,
  parseLogText,
  parseMissionDigest,
} from './schema.js';
export { MemoryAnchor } from './anchor.js';
export type { MemoryAnchorOptions } from './anchor.js';
