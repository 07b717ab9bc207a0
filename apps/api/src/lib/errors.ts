import type { ZodError } from 'zod';
import type { GenerationFailureCategory } from '@careplan/shared/constants/order.constants.js';
import { GENERATION_FAILURE_MESSAGES } from '@careplan/shared/constants/order.constants.js';

export interface FieldError {
  field: string;
  message: string;
}

export interface DuplicateFinding {
  code: string;
  message: string;
}

export class AppError extends Error {
  constructor(
    public statusCode: number,
    public code: string,
    message: string,
    public details?: unknown
  ) {
    super(message);
  }
}

export class ValidationError extends AppError {
  constructor(
    message: string,
    public errors: FieldError[] = [],
    code = 'VALIDATION_ERROR',
  ) {
    super(400, code, message, errors);
  }
}

export function fieldErrorsFromZod(error: ZodError): FieldError[] {
  return error.issues.map((issue) => ({
    field: issue.path.length > 0 ? issue.path.join('.') : 'body',
    message: issue.message,
  }));
}

export class NotFoundError extends AppError {
  constructor(resource: string) {
    super(404, 'NOT_FOUND', `${resource} not found`);
  }
}

export class ConflictError extends AppError {
  constructor(message: string, code = 'CONFLICT') {
    super(409, code, message);
  }
}

// ---------------------------------------------------------------------------
// Duplicate classification outcomes
// ---------------------------------------------------------------------------

/** Unconfirmed WARNING: nothing was written. */
export class DuplicateWarningError extends AppError {
  constructor(
    message: string,
    public warnings: DuplicateFinding[],
    public notices: string[] = [],
  ) {
    super(409, 'DUPLICATE_WARNING', message, warnings);
  }
}

/** BLOCKED: nothing was written and confirmation cannot override it. */
export class DuplicateBlockedError extends AppError {
  constructor(
    message: string,
    public errors: DuplicateFinding[],
    public notices: string[] = [],
    code = 'DUPLICATE_BLOCKED',
  ) {
    super(409, code, message, errors);
  }
}

// ---------------------------------------------------------------------------
// Generation failures (worker side, never sent over HTTP)
// ---------------------------------------------------------------------------

export class GenerationError extends Error {
  readonly sanitizedMessage: string;

  constructor(
    public readonly category: GenerationFailureCategory,
    public readonly retryable: boolean,
    detail?: string,
  ) {
    super(detail ?? GENERATION_FAILURE_MESSAGES[category]);
    this.sanitizedMessage = GENERATION_FAILURE_MESSAGES[category];
  }
}

/** Timeout, rate limit, 5xx or network failure. Retried with backoff. */
export class GenerationTransientError extends GenerationError {
  constructor(category: GenerationFailureCategory, detail?: string) {
    super(category, true, detail);
  }
}

/** Bad credentials, rejected request or malformed result. Never retried. */
export class GenerationPermanentError extends GenerationError {
  constructor(category: GenerationFailureCategory, detail?: string) {
    super(category, false, detail);
  }
}
