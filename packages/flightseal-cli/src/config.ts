import * as fs from 'node:fs/promises';

import {
  DEFAULT_HASH_ALGORITHM,
  HASH_ALGORITHMS,
  isAllowedHashAlgorithm,
  type HashAlgorithm,
} from '@flightseal/core';
import { z } from 'zod';

import { CliConfigError } from './errors.js';
import type { FlightsealConfigV1, ResolvedFlightsealConfig } from './types.js';

export const CONFIG_FILE_NAME = 'flightseal.config.v1.json';

const PositiveIntSchema = z.number().int().positive().max(Number.MAX_SAFE_INTEGER);

const FlightsealConfigV1Schema = z
  .object({
    config_version: z.literal('1'),
    hash_algorithm: z.enum(HASH_ALGORITHMS).optional(),
    checkpoint_interval: PositiveIntSchema.optional(),
    anchor: z
      .object({
        rpc_url: z.string().url().optional(),
        chain_id: PositiveIntSchema.optional(),
        registry_address: z
          .string()
          .regex(/^0x[0-9a-fA-F]{40}$/, 'must be a 0x-prefixed 20-byte address')
          .optional(),
        chain_name: z.string().min(1).optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

export async function loadFlightsealConfigFile(path: string): Promise<FlightsealConfigV1> {
  let raw: string;
  try {
    raw = await fs.readFile(path, 'utf8');
  } catch (err) {
    throw new CliConfigError(
      `Could not read config file at ${path}: ${err instanceof Error ? err.message : 'unknown error'}`
    );
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new CliConfigError(
      `Config file is not valid JSON: ${err instanceof Error ? err.message : 'unknown error'}`
    );
  }

  const result = FlightsealConfigV1Schema.safeParse(parsed);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue === undefined || issue.path.length === 0 ? '' : ` at ${issue.path.join('.')}`;
    throw new CliConfigError(
      `Config must be {"config_version":"1", ... }: ${issue?.message ?? 'invalid'}${where}`
    );
  }
  const config: FlightsealConfigV1 = result.data;
  return config;
}

function envValue(env: NodeJS.ProcessEnv, name: string): string | undefined {
  const value = env[name]?.trim();
  return value === undefined || value.length === 0 ? undefined : value;
}

function envPositiveInt(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const value = envValue(env, name);
  if (value === undefined) return undefined;
  const n = /^\d+$/.test(value) ? Number(value) : Number.NaN;
  if (!PositiveIntSchema.safeParse(n).success) {
    throw new CliConfigError(`${name} must be a positive integer, got "${value}"`);
  }
  return n;
}

function envHashAlgorithm(env: NodeJS.ProcessEnv): HashAlgorithm | undefined {
  const value = envValue(env, 'FLIGHTSEAL_HASH_ALGORITHM');
  if (value === undefined) return undefined;
  if (!isAllowedHashAlgorithm(value)) {
    throw new CliConfigError(
      `FLIGHTSEAL_HASH_ALGORITHM must be one of ${HASH_ALGORITHMS.join(', ')}, got "${value}"`
    );
  }
  return value;
}

/**
 * Merge the optional config file with FLIGHTSEAL_* environment variables.
 * Environment values win over the file.
 */
export async function resolveFlightsealConfig(opts: {
  configPath?: string;
  env?: NodeJS.ProcessEnv;
}): Promise<ResolvedFlightsealConfig> {
  const env = opts.env ?? process.env;
  const fileConfig: FlightsealConfigV1 | null = opts.configPath
    ? await loadFlightsealConfigFile(opts.configPath)
    : null;
  const fileAnchor: NonNullable<FlightsealConfigV1['anchor']> = fileConfig?.anchor ?? {};

  const envAlgorithm = envHashAlgorithm(env);
  const registryAddress = envValue(env, 'FLIGHTSEAL_REGISTRY_ADDRESS') ?? fileAnchor.registry_address;
  if (registryAddress !== undefined && !/^0x[0-9a-fA-F]{40}$/.test(registryAddress)) {
    throw new CliConfigError(`FLIGHTSEAL_REGISTRY_ADDRESS is not an address: "${registryAddress}"`);
  }

  return {
    hashAlgorithm: envAlgorithm ?? fileConfig?.hash_algorithm ?? DEFAULT_HASH_ALGORITHM,
    checkpointInterval:
      envPositiveInt(env, 'FLIGHTSEAL_CHECKPOINT_INTERVAL') ?? fileConfig?.checkpoint_interval ?? null,
    anchor: {
      rpcUrl: envValue(env, 'FLIGHTSEAL_RPC_URL') ?? fileAnchor.rpc_url ?? null,
      chainId: envPositiveInt(env, 'FLIGHTSEAL_CHAIN_ID') ?? fileAnchor.chain_id ?? null,
      registryAddress: registryAddress ?? null,
      chainName: fileAnchor.chain_name ?? null,
      privateKey: envValue(env, 'FLIGHTSEAL_ANCHOR_PRIVATE_KEY') ?? null,
    },
  };
}
