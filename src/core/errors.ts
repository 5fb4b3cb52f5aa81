/**
 * Error taxonomy for the copilot.
 *
 * Domain errors are thrown inside the orchestrator; model client errors are
 * produced by the model client and carry a retry classification. Everything is
 * converted into an `OrchestratorError` before it reaches a caller.
 */

export class InvalidQueryError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidQueryError';
  }
}

export class InputTooLargeError extends Error {
  constructor(
    public readonly size: number,
    public readonly budget: number
  ) {
    super(
      `Query is ${size} characters; the limit is ${budget}. Shorten the question or split it into smaller parts.`
    );
    this.name = 'InputTooLargeError';
  }
}

export class UnknownSessionError extends Error {
  constructor(public readonly sessionId: string) {
    super(`Session '${sessionId}' does not exist. Start a new conversation without a session_id.`);
    this.name = 'UnknownSessionError';
  }
}

export class RequestCancelledError extends Error {
  constructor(message = 'Request was cancelled') {
    super(message);
    this.name = 'RequestCancelledError';
  }
}

/**
 * Diagnostic codes that may cross the orchestrator boundary
 */
export type DiagnosticCode =
  | 'CREDENTIAL_MISSING'
  | 'AUTH_REJECTED'
  | 'RATE_LIMITED'
  | 'UPSTREAM_UNAVAILABLE'
  | 'NETWORK_ERROR'
  | 'TIMEOUT'
  | 'UNEXPECTED_STATUS'
  | 'MALFORMED_RESPONSE';

export interface ResponseDiagnostics {
  status?: number;
  bodyExcerpt?: string;
}

/**
 * Base class for failures of a single model API call
 */
export abstract class ModelClientError extends Error {
  abstract readonly retryable: boolean;

  constructor(
    message: string,
    public readonly code: DiagnosticCode,
    public readonly diagnostics: ResponseDiagnostics = {}
  ) {
    super(message);
  }
}

export class AuthError extends ModelClientError {
  readonly retryable = false;

  constructor(message: string, code: 'CREDENTIAL_MISSING' | 'AUTH_REJECTED', diagnostics?: ResponseDiagnostics) {
    super(message, code, diagnostics);
    this.name = 'AuthError';
  }
}

export class RateLimitError extends ModelClientError {
  readonly retryable = true;

  constructor(message: string, diagnostics?: ResponseDiagnostics) {
    super(message, 'RATE_LIMITED', diagnostics);
    this.name = 'RateLimitError';
  }
}

export class TransientNetworkError extends ModelClientError {
  readonly retryable = true;

  constructor(
    message: string,
    code: 'UPSTREAM_UNAVAILABLE' | 'NETWORK_ERROR' | 'TIMEOUT',
    diagnostics?: ResponseDiagnostics
  ) {
    super(message, code, diagnostics);
    this.name = 'TransientNetworkError';
  }
}

export class InvalidResponseError extends ModelClientError {
  readonly retryable = false;

  constructor(
    message: string,
    code: 'UNEXPECTED_STATUS' | 'MALFORMED_RESPONSE',
    diagnostics?: ResponseDiagnostics
  ) {
    super(message, code, diagnostics);
    this.name = 'InvalidResponseError';
  }
}

/**
 * Caller-facing error kinds
 */
export type ErrorKind =
  | 'invalid_query'
  | 'input_too_large'
  | 'unknown_session'
  | 'request_cancelled'
  | 'service_misconfigured'
  | 'upstream_unavailable'
  | 'internal_error';

export interface OrchestratorError {
  kind: ErrorKind;
  message: string;
  retryable: boolean;
  diagnosticCode?: DiagnosticCode;
}

export const STATUS_BY_KIND: Record<ErrorKind, number> = {
  invalid_query: 400,
  unknown_session: 404,
  input_too_large: 413,
  request_cancelled: 499,
  service_misconfigured: 500,
  internal_error: 502,
  upstream_unavailable: 503,
};

/**
 * Convert any thrown value into the closed set of caller-facing errors
 */
export function toOrchestratorError(error: unknown): OrchestratorError {
  if (error instanceof InvalidQueryError) {
    return { kind: 'invalid_query', message: error.message, retryable: false };
  }
  if (error instanceof InputTooLargeError) {
    return { kind: 'input_too_large', message: error.message, retryable: false };
  }
  if (error instanceof UnknownSessionError) {
    return { kind: 'unknown_session', message: error.message, retryable: false };
  }
  if (error instanceof RequestCancelledError) {
    return { kind: 'request_cancelled', message: error.message, retryable: true };
  }
  if (error instanceof AuthError) {
    return {
      kind: 'service_misconfigured',
      message: 'The assistant is not configured correctly. Please contact the administrator.',
      retryable: false,
      diagnosticCode: error.code,
    };
  }
  if (error instanceof RateLimitError || error instanceof TransientNetworkError) {
    return {
      kind: 'upstream_unavailable',
      message: 'The model service is temporarily unavailable. Please try again in a moment.',
      retryable: true,
      diagnosticCode: error.code,
    };
  }
  if (error instanceof InvalidResponseError) {
    return {
      kind: 'internal_error',
      message: 'The model service returned an unexpected response.',
      retryable: false,
      diagnosticCode: error.code,
    };
  }
  return {
    kind: 'internal_error',
    message: 'An unexpected error occurred.',
    retryable: false,
  };
}

/**
 * HTTP status for an error; unexpected failures are reported as 500
 */
export function statusForError(error: OrchestratorError): number {
  if (error.kind === 'internal_error' && error.diagnosticCode === undefined) {
    return 500;
  }
  return STATUS_BY_KIND[error.kind];
}
