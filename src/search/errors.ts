export type OracleOperation = 'propose' | 'score';

/**
 * A propose/score call failed: transport error, provider error or output the
 * oracle could not turn into a candidate or score.
 */
export class OracleUnavailable extends Error {
  readonly operation: OracleOperation;

  constructor(operation: OracleOperation, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'OracleUnavailable';
    this.operation = operation;
  }
}

export type SearchFailureReason = 'oracle' | 'aborted' | 'no-result' | 'state-key';

export class SearchFailed extends Error {
  readonly reason: SearchFailureReason;

  constructor(reason: SearchFailureReason, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SearchFailed';
    this.reason = reason;
  }
}

/** Terminal for one generation request; the caller decides what happens next. */
export class GenerationFailed extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'GenerationFailed';
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
