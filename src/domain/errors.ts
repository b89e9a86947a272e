/**
 * Typed error model.
 *
 * Services throw a ServiceError carrying a TypedError; the HTTP layer maps
 * the error code to a status and returns the typed payload alongside the
 * short `detail` text clients of the mocked cloud API expect.
 */

/** Top-level error domain namespaces. */
export type ErrorDomain =
  | 'AUTH'
  | 'VALIDATION'
  | 'RESOURCE'
  | 'STORAGE'
  | 'SYSTEM';

/** Typed suggested fix that a client can apply. */
export interface SuggestedFix {
  type: string;
  params: Record<string, unknown>;
  description?: string;
}

/** The core typed error structure returned in API responses. */
export interface TypedError {
  /** Namespaced error code (e.g., "RESOURCE.NOT_FOUND"). */
  code: string;
  /** Human-readable error message. */
  message: string;
  /** Whether the same operation is expected to succeed without changes. */
  retryable: boolean;
  /** Structured detail payload. */
  details?: Record<string, unknown>;
  /** Machine-actionable remediation suggestions. */
  suggestedFixes: SuggestedFix[];
}

/** Create a typed error with defaults. */
export function createTypedError(params: {
  code: string;
  message: string;
  retryable?: boolean;
  details?: Record<string, unknown>;
  suggestedFixes?: SuggestedFix[];
}): TypedError {
  return {
    code: params.code,
    message: params.message,
    retryable: params.retryable ?? false,
    details: params.details,
    suggestedFixes: params.suggestedFixes ?? [],
  };
}

// --- Common error factory functions ---

export function validationError(message: string, details?: Record<string, unknown>, fixes?: SuggestedFix[]): TypedError {
  return createTypedError({
    code: 'VALIDATION.SCHEMA',
    message,
    retryable: false,
    details,
    suggestedFixes: fixes,
  });
}

export function unauthenticatedError(message: string): TypedError {
  return createTypedError({
    code: 'AUTH.UNAUTHENTICATED',
    message,
    retryable: false,
    suggestedFixes: [
      { type: 'REAUTHENTICATE', params: {}, description: 'Request a new token from POST /v3/auth/tokens' },
    ],
  });
}

export function notFoundError(resourceType: string, resourceId: string): TypedError {
  return createTypedError({
    code: 'RESOURCE.NOT_FOUND',
    message: `${resourceType} not found`,
    retryable: false,
    details: { resourceType, resourceId },
  });
}

export function conflictError(message: string, details?: Record<string, unknown>): TypedError {
  return createTypedError({
    code: 'RESOURCE.CONFLICT',
    message,
    retryable: false,
    details,
  });
}

export function persistenceError(collection: string, cause: string): TypedError {
  return createTypedError({
    code: 'STORAGE.WRITE_FAILED',
    message: `Failed to persist collection "${collection}": ${cause}`,
    retryable: true,
    details: { collection },
  });
}

export function internalError(message: string): TypedError {
  return createTypedError({
    code: 'SYSTEM.INTERNAL',
    message,
    retryable: false,
  });
}

/** Error wrapper thrown by services and the store. */
export class ServiceError extends Error {
  constructor(public typedError: TypedError) {
    super(typedError.message);
    this.name = 'ServiceError';
  }
}

/** API error response wrapper. */
export interface ApiErrorResponse {
  /** Short text, the field clients of the mocked API read. */
  detail: string;
  error: TypedError;
}

/** Construct an API error response. */
export function apiError(error: TypedError): ApiErrorResponse {
  return { detail: error.message, error };
}

/** Map a typed error code to its HTTP status. */
export function httpStatusFor(error: TypedError): number {
  if (error.code === 'AUTH.UNAUTHENTICATED') return 401;
  if (error.code.endsWith('.NOT_FOUND')) return 404;
  if (error.code.endsWith('.CONFLICT')) return 409;
  if (error.code.startsWith('VALIDATION.')) return 400;
  return 500;
}
