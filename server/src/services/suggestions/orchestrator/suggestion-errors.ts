/**
 * Suggestion pipeline error taxonomy
 * Each outcome carries a stable code so clients can tell
 * quota-exhausted, invalid input and service-unavailable apart.
 */

export type SuggestionErrorCode =
  | 'VALIDATION_ERROR'
  | 'QUOTA_EXHAUSTED'
  | 'SERVICE_UNAVAILABLE'
  | 'REQUEST_CANCELLED';

export abstract class SuggestionError extends Error {
  abstract readonly code: SuggestionErrorCode;
  abstract readonly httpStatus: number;
}

export class SuggestionValidationError extends SuggestionError {
  readonly code = 'VALIDATION_ERROR';
  readonly httpStatus = 400;

  constructor(public readonly errors: string[]) {
    super(`Invalid suggestion request: ${errors.join('; ')}`);
    this.name = 'SuggestionValidationError';
  }
}

export class QuotaExceededError extends SuggestionError {
  readonly code = 'QUOTA_EXHAUSTED';
  readonly httpStatus = 403;

  constructor(public readonly remaining: number, public readonly limit: number) {
    super('Daily suggestion quota exhausted');
    this.name = 'QuotaExceededError';
  }
}

/**
 * Quota backend unreachable. Callers see it exactly like QuotaExceededError.
 */
export class AdmissionSystemError extends SuggestionError {
  readonly code = 'QUOTA_EXHAUSTED';
  readonly httpStatus = 403;

  constructor(public readonly limit: number) {
    super('Daily suggestion quota exhausted');
    this.name = 'AdmissionSystemError';
  }
}

export type FailedCollaborator = 'places_provider' | 'route_optimizer';

export class CollaboratorFailureError extends SuggestionError {
  readonly code = 'SERVICE_UNAVAILABLE';
  readonly httpStatus = 503;

  constructor(public readonly collaborator: FailedCollaborator, cause: unknown) {
    super(`${collaborator} failed: ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
    this.name = 'CollaboratorFailureError';
  }
}

export class RequestCancelledError extends SuggestionError {
  readonly code = 'REQUEST_CANCELLED';
  readonly httpStatus = 499;

  constructor(public readonly stage: string) {
    super(`Request cancelled before ${stage}`);
    this.name = 'RequestCancelledError';
  }
}

export function isSuggestionError(error: unknown): error is SuggestionError {
  return error instanceof SuggestionError;
}
