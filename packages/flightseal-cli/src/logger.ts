import { silentLogger, type Logger } from '@flightseal/anchor-evm';

/**
 * stderr logger for the CLI. stdout carries the JSON result only.
 * Debug lines are emitted when FLIGHTSEAL_DEBUG is set.
 */
export function createCliLogger(opts: { quiet?: boolean; debug?: boolean } = {}): Logger {
  if (opts.quiet) return silentLogger;
  const write = (level: string, msg: string) => console.error(`[flightseal] ${level} ${msg}`);
  return {
    info: (msg) => write('info', msg),
    warn: (msg) => write('warn', msg),
    error: (msg) => write('error', msg),
    debug: opts.debug ? (msg) => write('debug', msg) : () => {},
  };
}
