import type {
  AnchorReceipt,
  Checkpoint,
  HashAlgorithm,
  MissionDigest,
  VerificationReport,
} from '@flightseal/core';
import type { CheckpointAnchorReceipt } from '@flightseal/anchor-evm';

export type CliCommand = 'seal' | 'verify' | 'anchor' | 'fetch-checkpoints';

export type CliStatus = 'PASS' | 'FAIL' | 'ERROR';

export interface CliOutputBase {
  status: CliStatus;
  completed_at: string;
  reason_code: string;
  reason: string;
  /** Actionable hint for how to fix the issue. Only present on FAIL/ERROR. */
  hint?: string;
}

export interface CliSealOutput extends CliOutputBase {
  command: 'seal';
  input: { path: string; config_path?: string };
  digest: MissionDigest;
  checkpoint_count: number;
  files: { digest: string; checkpoints: string; chain: string };
}

export interface CliVerifyOutput extends CliOutputBase {
  command: 'verify';
  input: {
    path: string;
    digest_path?: string;
    checkpoints_path?: string;
    chain_path?: string;
    from_path?: string;
    config_path?: string;
  };
  report: VerificationReport;
}

export interface CliAnchorOutput extends CliOutputBase {
  command: 'anchor';
  input: { digest_path: string; checkpoints_path?: string; config_path?: string };
  dry_run: boolean;
  checkpoint_receipts: CheckpointAnchorReceipt[];
  /** Null when the registry already holds the digest's row. */
  receipt: AnchorReceipt | null;
  /** Entries the registry covered before this run. */
  previously_anchored: number;
  closed: boolean;
}

export interface CliFetchOutput extends CliOutputBase {
  command: 'fetch-checkpoints';
  mission_id: string;
  out_path?: string;
  checkpoints: Checkpoint[];
}

export interface CliErrorOutput extends CliOutputBase {
  command?: CliCommand;
  /** Structured error fields: entry index, field path, expected vs. received. */
  details?: Record<string, string | number>;
}

export type CliOutput =
  | CliSealOutput
  | CliVerifyOutput
  | CliAnchorOutput
  | CliFetchOutput
  | CliErrorOutput;

export interface FlightsealConfigV1 {
  config_version: '1';
  hash_algorithm?: HashAlgorithm;
  checkpoint_interval?: number;
  anchor?: {
    rpc_url?: string;
    chain_id?: number;
    registry_address?: string;
    chain_name?: string;
  };
}

export interface ResolvedAnchorConfig {
  rpcUrl: string | null;
  chainId: number | null;
  registryAddress: string | null;
  chainName: string | null;
  /** Only ever read from FLIGHTSEAL_ANCHOR_PRIVATE_KEY. */
  privateKey: string | null;
}

export interface ResolvedFlightsealConfig {
  hashAlgorithm: HashAlgorithm;
  checkpointInterval: number | null;
  anchor: ResolvedAnchorConfig;
}
