#!/usr/bin/env node

import { parseCliArgs } from './args.js';
import { explainReasonCode } from './hints.js';
import { createCliLogger } from './logger.js';
import { errorToOutput, exitCodeForOutput } from './output.js';
import { runCommand } from './run.js';
import type { CliOutput } from './types.js';

const VERSION = '0.1.0';

function output(out: CliOutput): void {
  process.stdout.write(`${JSON.stringify(out, null, 2)}\n`);
}

async function main() {
  const parsed = parseCliArgs(process.argv.slice(2));

  if (parsed.command === 'version') {
    process.stdout.write(`flightseal ${VERSION}\n`);
    return;
  }

  if (parsed.command === 'explain') {
    process.stdout.write(`${explainReasonCode(parsed.code)}\n`);
    return;
  }

  const logger = createCliLogger({
    quiet: parsed.quiet,
    debug: Boolean(process.env.FLIGHTSEAL_DEBUG),
  });

  // Ctrl-C stops a long verification between entries.
  const controller = new AbortController();
  const onSigint = () => controller.abort();
  process.once('SIGINT', onSigint);

  try {
    const out = await runCommand(parsed, { logger, signal: controller.signal });
    output(out);
    process.exitCode = exitCodeForOutput(out);
  } finally {
    process.off('SIGINT', onSigint);
  }
}

main().catch((err: unknown) => {
  const out = errorToOutput(err);
  output(out);
  process.exitCode = exitCodeForOutput(out);
});
