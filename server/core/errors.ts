export type OfficeErrorKind =
  | 'NotFound'
  | 'Forbidden'
  | 'InvalidTransition'
  | 'InvalidInterval'
  | 'Conflict'
  | 'InvalidInput';

const STATUS_BY_KIND: Record<OfficeErrorKind, number> = {
  NotFound: 404,
  Forbidden: 403,
  InvalidTransition: 400,
  InvalidInterval: 400,
  Conflict: 409,
  InvalidInput: 400,
};

const CODE_BY_KIND: Record<OfficeErrorKind, string> = {
  NotFound: 'NOT_FOUND',
  Forbidden: 'FORBIDDEN',
  InvalidTransition: 'INVALID_TRANSITION',
  InvalidInterval: 'INVALID_INTERVAL',
  Conflict: 'CONFLICT',
  InvalidInput: 'VALIDATION_ERROR',
};

export abstract class OfficeError extends Error {
  abstract readonly kind: OfficeErrorKind;
  readonly details?: Record<string, unknown>;

  constructor(message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = new.target.name;
    this.details = details;
  }

  get statusCode(): number {
    return STATUS_BY_KIND[this.kind];
  }

  get code(): string {
    return CODE_BY_KIND[this.kind];
  }
}

export class NotFoundError extends OfficeError {
  readonly kind = 'NotFound' as const;
}

export class ForbiddenError extends OfficeError {
  readonly kind = 'Forbidden' as const;
}

export class InvalidTransitionError extends OfficeError {
  readonly kind = 'InvalidTransition' as const;
}

export class InvalidIntervalError extends OfficeError {
  readonly kind = 'InvalidInterval' as const;
}

export class ConflictError extends OfficeError {
  readonly kind = 'Conflict' as const;
}

export class InvalidInputError extends OfficeError {
  readonly kind = 'InvalidInput' as const;
}

export function isOfficeError(error: unknown): error is OfficeError {
  return error instanceof OfficeError;
}

/**
 * Maps any thrown value to the status the HTTP layer answers with.
 * Unknown failures are server errors.
 */
export function statusForError(error: unknown): number {
  return isOfficeError(error) ? error.statusCode : 500;
}
