/** Bad command-line usage, or an input file that could not be read. */
export class CliUsageError extends Error {
  readonly code = 'USAGE_ERROR';

  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

/** The config file or a FLIGHTSEAL_* variable failed validation. */
export class CliConfigError extends Error {
  readonly code = 'CONFIG_ERROR';

  constructor(message: string) {
    super(message);
    this.name = 'CliConfigError';
  }
}
