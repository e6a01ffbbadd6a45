/**
 * Typed error model for machine-actionable error handling.
 *
 * Core operations fail with a `PasteError` carrying a `TypedError` payload.
 * The HTTP layer maps the error kind 1:1 to a response status and returns the
 * payload as the response body. Nothing inside the core retries.
 */

/** Error kinds surfaced to callers. */
export type ErrorKind =
  | 'invalid_input'
  | 'unauthorized'
  | 'forbidden'
  | 'conflict'
  | 'not_found'
  | 'too_large'
  | 'too_many_requests'
  | 'internal'
  | 'service_unavailable';

/** Typed suggested fix that clients can apply. */
export interface SuggestedFix {
  type: string;
  params: Record<string, unknown>;
  description?: string;
}

/** The core typed error structure returned in API responses. */
export interface TypedError {
  /** Namespaced error code (e.g., "REPOSITORY.LOCK_HELD"). */
  code: string;
  kind: ErrorKind;
  /** Human-readable error message. */
  message: string;
  /** Whether the same request is expected to succeed later without changes. */
  retryable: boolean;
  details?: Record<string, unknown>;
  suggestedFixes: SuggestedFix[];
}

/** Create a typed error with defaults. */
export function createTypedError(params: {
  code: string;
  kind: ErrorKind;
  message: string;
  retryable?: boolean;
  details?: Record<string, unknown>;
  suggestedFixes?: SuggestedFix[];
}): TypedError {
  return {
    code: params.code,
    kind: params.kind,
    message: params.message,
    retryable: params.retryable ?? false,
    details: params.details,
    suggestedFixes: params.suggestedFixes ?? [],
  };
}

/** Error wrapper thrown across module boundaries. */
export class PasteError extends Error {
  constructor(public readonly typedError: TypedError) {
    super(typedError.message);
    this.name = 'PasteError';
  }

  get kind(): ErrorKind {
    return this.typedError.kind;
  }

  get code(): string {
    return this.typedError.code;
  }
}

export function isPasteError(err: unknown): err is PasteError {
  return err instanceof PasteError;
}

// --- Factories, one per kind ---

export function invalidInput(message: string, details?: Record<string, unknown>): PasteError {
  return new PasteError(createTypedError({
    code: 'VALIDATION.INVALID_INPUT',
    kind: 'invalid_input',
    message,
    details,
  }));
}

export function unauthorized(message: string): PasteError {
  return new PasteError(createTypedError({
    code: 'AUTH.UNAUTHENTICATED',
    kind: 'unauthorized',
    message,
  }));
}

export function forbidden(message: string, details?: Record<string, unknown>): PasteError {
  return new PasteError(createTypedError({
    code: 'AUTH.FORBIDDEN',
    kind: 'forbidden',
    message,
    details,
  }));
}

export function conflict(code: string, message: string, retryable = false): PasteError {
  return new PasteError(createTypedError({
    code,
    kind: 'conflict',
    message,
    retryable,
  }));
}

export function lockHeld(): PasteError {
  return conflict('REPOSITORY.LOCK_HELD', 'already running', true);
}

export function idempotencyMismatch(): PasteError {
  return conflict(
    'IDEMPOTENCY.FINGERPRINT_MISMATCH',
    'idempotency key reuse with different payload',
  );
}

export function notFound(resource: string, id?: string): PasteError {
  return new PasteError(createTypedError({
    code: 'PASTE.NOT_FOUND',
    kind: 'not_found',
    message: id ? `${resource} not found: ${id}` : `${resource} not found`,
  }));
}

export function tooLarge(size: number, maxBytes: number): PasteError {
  return new PasteError(createTypedError({
    code: 'VALIDATION.TOO_LARGE',
    kind: 'too_large',
    message: 'request body exceeds max-bytes',
    details: { size, maxBytes },
  }));
}

export function tooManyRequests(retryAfterMs: number, limit: number): PasteError {
  return new PasteError(createTypedError({
    code: 'RATE_LIMIT.EXCEEDED',
    kind: 'too_many_requests',
    message: 'api key rate limit exceeded',
    retryable: true,
    details: { retryAfterMs, limit },
    suggestedFixes: [
      { type: 'WAIT_AND_RETRY', params: { delayMs: retryAfterMs } },
    ],
  }));
}

export function internal(message: string, details?: Record<string, unknown>): PasteError {
  return new PasteError(createTypedError({
    code: 'SYSTEM.INTERNAL',
    kind: 'internal',
    message,
    details,
  }));
}

export function serviceUnavailable(message: string, fixes?: SuggestedFix[]): PasteError {
  return new PasteError(createTypedError({
    code: 'SYSTEM.UNAVAILABLE',
    kind: 'service_unavailable',
    message,
    retryable: true,
    suggestedFixes: fixes,
  }));
}

/** Extract a message from an unknown thrown value. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Wrap any failure as a PasteError. Typed errors pass through unchanged,
 * everything else becomes Internal with `context` prefixed to the message.
 */
export function toPasteError(err: unknown, context: string): PasteError {
  if (err instanceof PasteError) return err;
  return internal(`${context}: ${errorMessage(err)}`);
}

const HTTP_STATUS: Record<ErrorKind, number> = {
  invalid_input: 400,
  unauthorized: 401,
  forbidden: 403,
  not_found: 404,
  conflict: 409,
  too_large: 413,
  too_many_requests: 429,
  internal: 500,
  service_unavailable: 503,
};

export function httpStatusFor(kind: ErrorKind): number {
  return HTTP_STATUS[kind];
}

/**
 * Mask a secret value, preserving only the last 4 characters for
 * identification. Secrets shorter than 8 characters are fully masked.
 */
export function maskSecret(secret: string): string {
  if (!secret || secret.length < 8) return '****';
  return '*'.repeat(secret.length - 4) + secret.slice(-4);
}

/** API error response wrapper. */
export interface ApiErrorResponse {
  error: TypedError;
}

/** Construct an API error response. */
export function apiError(error: TypedError): ApiErrorResponse {
  return { error };
}
