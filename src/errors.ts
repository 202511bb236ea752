/**
 * Error taxonomy. Every failure the pipeline reports to a caller carries a
 * stable `code` so the CLI and any front end can branch on it.
 */

export type FusionErrorCode =
  | 'UNREADABLE_DOCUMENT'
  | 'EXTRACTION_LOW_CONFIDENCE'
  | 'MODEL_UNAVAILABLE'
  | 'MERGE_CONFLICT'
  | 'INSUFFICIENT_CONTEXT'
  | 'OPERATION_ABORTED';

export abstract class FusionError extends Error {
  abstract readonly code: FusionErrorCode;
  /** Recoverable errors degrade a result; the rest abort the current unit of work. */
  abstract readonly recoverable: boolean;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class UnreadableDocument extends FusionError {
  readonly code = 'UNREADABLE_DOCUMENT' as const;
  readonly recoverable = false;

  constructor(public readonly reason: string, options?: { cause?: unknown }) {
    super(`Document could not be decoded: ${reason}`, options);
  }
}

export class ExtractionLowConfidence extends FusionError {
  readonly code = 'EXTRACTION_LOW_CONFIDENCE' as const;
  readonly recoverable = true;

  constructor(
    public readonly candidate: string,
    public readonly confidence: number,
    public readonly threshold: number,
  ) {
    super(`Discarded "${candidate}": confidence ${confidence.toFixed(2)} < ${threshold}`);
  }
}

export class ModelUnavailable extends FusionError {
  readonly code = 'MODEL_UNAVAILABLE' as const;
  readonly recoverable = true;

  constructor(public readonly provider: string, reason: string, options?: { cause?: unknown }) {
    super(`Model provider "${provider}" unavailable: ${reason}`, options);
  }
}

export class MergeConflict extends FusionError {
  readonly code = 'MERGE_CONFLICT' as const;
  readonly recoverable = true;

  constructor(public readonly entityIds: string[], reason: string) {
    super(`Merge conflict between ${entityIds.join(', ')}: ${reason}`);
  }
}

export class InsufficientContext extends FusionError {
  readonly code = 'INSUFFICIENT_CONTEXT' as const;
  readonly recoverable = true;

  constructor(public readonly question: string, public readonly reason: string) {
    super(`Not enough context to answer: ${reason}`);
  }
}

export class OperationAborted extends FusionError {
  readonly code = 'OPERATION_ABORTED' as const;
  readonly recoverable = false;

  constructor(operation: string, reason = 'aborted') {
    super(`${operation} ${reason}`);
  }
}

export function isFusionError(err: unknown): err is FusionError {
  return err instanceof FusionError;
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
