export class AnchorConfigError extends Error {
  readonly code = 'ANCHOR_CONFIG_ERROR';

  constructor(message: string) {
    super(message);
    this.name = 'AnchorConfigError';
  }
}

/** The registry refused a write (or a read-back found an impossible row). */
export class RegistryRevertError extends Error {
  readonly code = 'REGISTRY_REVERT';

  constructor(
    message: string,
    public readonly tx_hash?: string
  ) {
    super(message);
    this.name = 'RegistryRevertError';
  }
}
