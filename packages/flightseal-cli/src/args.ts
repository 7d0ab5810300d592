import { CliUsageError } from './errors.js';
import type { CheckpointPlan } from './seal.js';

export function usageText(): string {
  return [
    'flightseal: tamper-evident hash chains for mission flight logs',
    '',
    'Usage:',
    '  flightseal seal   --input <log> --mission <id> [--out <dir>] [--every N | --chunks N] [--config <path>]',
    '  flightseal verify --input <log> (--digest <file> | --checkpoints <file> | --chain <file>) [--from <checkpoint.json>] [--config <path>]',
    '  flightseal anchor --digest <file> [--checkpoints <file>] [--close] [--dry-run] [--config <path>]',
    '  flightseal fetch-checkpoints --mission <id> [--out <file>] [--config <path>]',
    '  flightseal explain <REASON_CODE>',
    '  flightseal version',
    '',
    'Logs are a JSON array of entries, {"entries": [...]}, or JSONL (one entry per line).',
    'Add --quiet to silence progress lines on stderr.',
    '',
    'Exit codes:',
    '  0 = PASS',
    '  1 = FAIL (divergence found)',
    '  2 = usage, config, input or internal error',
    '',
    'Examples:',
    '  flightseal seal --input flight-042.jsonl --mission flight-042 --every 500',
    '  flightseal verify --input flight-042.jsonl --digest flight-042.digest.json',
    '  flightseal verify --input flight-042.jsonl --chain flight-042.chain.json',
    '  flightseal explain CHAIN_HASH_MISMATCH',
  ].join('\n');
}

export function readFlag(args: string[], name: string): string | undefined {
  const idx = args.indexOf(name);
  if (idx === -1) return undefined;
  const value = args[idx + 1];
  if (!value || value.startsWith('--')) return undefined;
  return value;
}

export function hasFlag(args: string[], name: string): boolean {
  return args.includes(name);
}

function requireFlag(args: string[], name: string, placeholder: string): string {
  const value = readFlag(args, name);
  if (!value) {
    throw new CliUsageError(`Missing required flag: ${name} <${placeholder}>\n\nRun: flightseal --help`);
  }
  return value;
}

function readPositiveIntFlag(args: string[], name: string): number | undefined {
  if (!hasFlag(args, name)) return undefined;
  const value = readFlag(args, name) ?? '';
  const n = /^\d+$/.test(value) ? Number(value) : Number.NaN;
  if (!Number.isSafeInteger(n) || n <= 0) {
    throw new CliUsageError(`${name} needs a positive integer, got "${value}"`);
  }
  return n;
}

export type ParsedArgs = { quiet: boolean } & (
  | {
      command: 'seal';
      inputPath: string;
      missionId: string;
      outDir?: string;
      plan: CheckpointPlan;
      configPath?: string;
    }
  | {
      command: 'verify';
      inputPath: string;
      digestPath?: string;
      checkpointsPath?: string;
      chainPath?: string;
      fromPath?: string;
      configPath?: string;
    }
  | {
      command: 'anchor';
      digestPath: string;
      checkpointsPath?: string;
      close: boolean;
      dryRun: boolean;
      configPath?: string;
    }
  | { command: 'fetch-checkpoints'; missionId: string; outPath?: string; configPath?: string }
  | { command: 'explain'; code: string }
  | { command: 'version' }
);

export function parseCliArgs(argv: string[]): ParsedArgs {
  if (argv.length === 0 || hasFlag(argv, '--help') || hasFlag(argv, '-h')) {
    throw new CliUsageError(usageText());
  }

  const quiet = hasFlag(argv, '--quiet');

  if (argv[0] === 'version' || hasFlag(argv, '--version')) {
    return { quiet, command: 'version' };
  }

  if (argv[0] === 'explain') {
    const code = argv[1];
    if (!code) throw new CliUsageError('Usage: flightseal explain <REASON_CODE>');
    return { quiet, command: 'explain', code: code.toUpperCase() };
  }

  const configPath = readFlag(argv, '--config');

  switch (argv[0]) {
    case 'seal': {
      const every = readPositiveIntFlag(argv, '--every');
      const chunks = readPositiveIntFlag(argv, '--chunks');
      if (every !== undefined && chunks !== undefined) {
        throw new CliUsageError('seal takes --every or --chunks, not both');
      }
      const plan: CheckpointPlan =
        every !== undefined
          ? { kind: 'every', every }
          : chunks !== undefined
            ? { kind: 'chunks', chunks }
            : { kind: 'none' };
      return {
        quiet,
        command: 'seal',
        inputPath: requireFlag(argv, '--input', 'log'),
        missionId: requireFlag(argv, '--mission', 'id'),
        outDir: readFlag(argv, '--out'),
        plan,
        configPath,
      };
    }

    case 'verify': {
      const digestPath = readFlag(argv, '--digest');
      const checkpointsPath = readFlag(argv, '--checkpoints');
      const chainPath = readFlag(argv, '--chain');
      const given = [digestPath, checkpointsPath, chainPath].filter((p) => p !== undefined);
      if (given.length !== 1) {
        throw new CliUsageError(
          'verify needs exactly one of --digest <file>, --checkpoints <file> or --chain <file>'
        );
      }
      return {
        quiet,
        command: 'verify',
        inputPath: requireFlag(argv, '--input', 'log'),
        digestPath,
        checkpointsPath,
        chainPath,
        fromPath: readFlag(argv, '--from'),
        configPath,
      };
    }

    case 'anchor':
      return {
        quiet,
        command: 'anchor',
        digestPath: requireFlag(argv, '--digest', 'file'),
        checkpointsPath: readFlag(argv, '--checkpoints'),
        close: hasFlag(argv, '--close'),
        dryRun: hasFlag(argv, '--dry-run'),
        configPath,
      };

    case 'fetch-checkpoints':
      return {
        quiet,
        command: 'fetch-checkpoints',
        missionId: requireFlag(argv, '--mission', 'id'),
        outPath: readFlag(argv, '--out'),
        configPath,
      };

    default:
      throw new CliUsageError(usageText());
  }
}
