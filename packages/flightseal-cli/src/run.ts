import type { FlightRegistry, Logger } from '@flightseal/anchor-evm';

import { anchorDigestFile, fetchCheckpoints } from './anchor.js';
import type { ParsedArgs } from './args.js';
import { resolveFlightsealConfig } from './config.js';
import { attachHint, errorToOutput } from './output.js';
import { sealLogFile } from './seal.js';
import type { CliOutput } from './types.js';
import { verifyLogFile } from './verify.js';

export type RunnableArgs = Extract<
  ParsedArgs,
  { command: 'seal' | 'verify' | 'anchor' | 'fetch-checkpoints' }
>;

export interface RunContext {
  logger: Logger;
  env?: NodeJS.ProcessEnv;
  signal?: AbortSignal;
  /** Registry override for anchor and fetch-checkpoints. */
  registry?: FlightRegistry;
  now?: () => Date;
}

async function dispatch(parsed: RunnableArgs, ctx: RunContext): Promise<CliOutput> {
  const config = await resolveFlightsealConfig({ configPath: parsed.configPath, env: ctx.env });

  switch (parsed.command) {
    case 'seal':
      return sealLogFile({ ...parsed, config, logger: ctx.logger, now: ctx.now });
    case 'verify':
      return verifyLogFile({ ...parsed, config, logger: ctx.logger, signal: ctx.signal });
    case 'anchor':
      return anchorDigestFile({
        ...parsed,
        config,
        logger: ctx.logger,
        registry: ctx.registry,
        now: ctx.now,
      });
    case 'fetch-checkpoints':
      return fetchCheckpoints({ ...parsed, config, logger: ctx.logger, registry: ctx.registry });
  }
}

/**
 * Run one command to a JSON output. Errors become ERROR outputs; nothing is
 * thrown.
 */
export async function runCommand(parsed: RunnableArgs, ctx: RunContext): Promise<CliOutput> {
  try {
    return attachHint(await dispatch(parsed, ctx));
  } catch (err) {
    const out = errorToOutput(err, parsed.command);
    if (out.reason_code === 'INTERNAL_ERROR') {
      ctx.logger.debug(err instanceof Error && err.stack ? err.stack : String(err));
    }
    return out;
  }
}
