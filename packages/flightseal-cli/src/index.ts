export { createRegistry, anchorDigestFile, fetchCheckpoints } from './anchor.js';
export { hasFlag, parseCliArgs, readFlag, usageText } from './args.js';
export type { ParsedArgs } from './args.js';
export {
  CONFIG_FILE_NAME,
  loadFlightsealConfigFile,
  resolveFlightsealConfig,
} from './config.js';
export { CliConfigError, CliUsageError } from './errors.js';
export { explainReasonCode, hintForReasonCode, knownReasonCodes } from './hints.js';
export { missionSlug, readChainFile, readLogEntries } from './io.js';
export { createCliLogger } from './logger.js';
export { attachHint, errorToOutput, exitCodeForOutput } from './output.js';
export { runCommand } from './run.js';
export type { RunContext, RunnableArgs } from './run.js';
export { sealLogFile } from './seal.js';
export type { CheckpointPlan } from './seal.js';
export { reportToOutput, verifyLogFile } from './verify.js';
export type * from './types.js';
