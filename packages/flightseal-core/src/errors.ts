export type FlightsealErrorCode =
  | 'MALFORMED_INPUT'
  | 'SEQUENCE_ERROR'
  | 'ALGORITHM_MISMATCH'
  | 'VERIFICATION_ABORTED';

export abstract class FlightsealError extends Error {
  abstract readonly code: FlightsealErrorCode;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * An entry, digest or checkpoint could not be validated or canonicalized.
 * Never a tamper finding.
 */
export class MalformedInputError extends FlightsealError {
  readonly code = 'MALFORMED_INPUT';

  constructor(
    message: string,
    public readonly details: { entry_index?: number; path?: string } = {}
  ) {
    super(message);
  }
}

/** Producer-side ordering bug: out-of-order append, gap, or count mismatch. */
export class SequenceError extends FlightsealError {
  readonly code = 'SEQUENCE_ERROR';

  constructor(
    message: string,
    public readonly expected_index: number,
    public readonly received_index: number
  ) {
    super(message);
  }
}

/** Hash function or canonical format disagreement. A compatibility issue, not tampering. */
export class AlgorithmMismatchError extends FlightsealError {
  readonly code = 'ALGORITHM_MISMATCH';

  constructor(
    message: string,
    public readonly expected: string,
    public readonly received: string
  ) {
    super(message);
  }
}

export class VerificationAbortedError extends FlightsealError {
  readonly code = 'VERIFICATION_ABORTED';

  constructor(public readonly next_index: number) {
    super(`Verification aborted before index ${next_index}`);
  }
}

export function isFlightsealError(err: unknown): err is FlightsealError {
  return err instanceof FlightsealError;
}
