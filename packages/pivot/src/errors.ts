export type PivotErrorKind = 'validation' | 'processing';

export type PivotValidationCode =
  | 'UNREADABLE_FILE'
  | 'MISSING_COLUMNS'
  | 'INVALID_VALUE'
  | 'INVALID_STATION'
  | 'STATION_NOT_FOUND'
  | 'INVALID_POSITION_CODE'
  | 'UNKNOWN_CODE'
  | 'TOO_MANY_CODES';

export abstract class PivotError extends Error {
  abstract readonly kind: PivotErrorKind;
  readonly details?: Record<string, unknown>;

  constructor(message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'PivotError';
    this.details = details;
  }
}

/**
 * Input the caller can correct: a bad file, a bad station, a bad selection.
 */
export class PivotValidationError extends PivotError {
  readonly kind = 'validation';
  readonly code: PivotValidationCode;

  constructor(code: PivotValidationCode, message: string, details?: Record<string, unknown>) {
    super(message, details);
    this.name = 'PivotValidationError';
    this.code = code;
  }
}

export class PivotProcessingError extends PivotError {
  readonly kind = 'processing';
  readonly cause: unknown;

  constructor(message: string, cause?: unknown) {
    super(message);
    this.name = 'PivotProcessingError';
    this.cause = cause;
  }
}

export type Result<T, E extends PivotError = PivotError> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export const ok = <T>(value: T): { ok: true; value: T } => ({ ok: true, value });

export const fail = <E extends PivotError>(error: E): { ok: false; error: E } => ({ ok: false, error });

export function describeCause(cause: unknown): string {
  if (cause instanceof Error) {
    return cause.message;
  }
  return String(cause);
}
