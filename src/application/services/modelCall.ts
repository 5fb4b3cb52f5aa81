import type { IModelClient } from '../../core/interfaces/IModelClient.js';
import type { ModelRequest } from '../../core/entities/Model.js';
import {
  AuthError,
  InputTooLargeError,
  InvalidQueryError,
  InvalidResponseError,
  ModelClientError,
  RequestCancelledError,
  UnknownSessionError,
} from '../../core/errors.js';
import { withRetry, RetryPolicy, SleepFn } from '../../utils/retry.js';

export type LogContext = Record<string, string | undefined>;

export interface ModelCallOptions {
  retryPolicy: RetryPolicy;
  sleep?: SleepFn;
  signal?: AbortSignal;
  component: string;
  context: LogContext;
}

export interface ModelCompletion {
  text: string;
  attempts: number;
}

/**
 * Send one request, retrying rate limits and transient failures with backoff.
 * Throws the last client error once retries are exhausted.
 */
export async function completeWithRetry(
  client: IModelClient,
  request: ModelRequest,
  options: ModelCallOptions
): Promise<ModelCompletion> {
  let attempts = 0;
  const completion = await withRetry(
    async (attempt) => {
      attempts = attempt;
      const response = await client.send(request, options.signal);
      if (!response.ok) {
        throw response.error;
      }
      return response;
    },
    options.retryPolicy,
    {
      isRetryable: (error) => error instanceof ModelClientError && error.retryable,
      signal: options.signal,
      sleep: options.sleep,
      onLog: (log) => {
        if (!log.success && log.nextRetryInMs !== undefined) {
          console.error(
            JSON.stringify({
              timestamp: log.timestamp.toISOString(),
              component: options.component,
              ...options.context,
              attempt: log.attempt,
              error: log.error,
              next_retry_in_ms: log.nextRetryInMs,
              severity: 'INFO',
            })
          );
        }
      },
    }
  );

  return { text: completion.text, attempts };
}

/**
 * Structured failure record for a request that could not be answered.
 * Caller mistakes and cancellations are not logged.
 */
export function logModelFailure(component: string, context: LogContext, error: unknown): void {
  if (
    error instanceof InvalidQueryError ||
    error instanceof InputTooLargeError ||
    error instanceof UnknownSessionError ||
    error instanceof RequestCancelledError
  ) {
    return;
  }

  const record: Record<string, unknown> = {
    timestamp: new Date().toISOString(),
    component,
    ...context,
    error: error instanceof Error ? error.message : String(error),
  };

  if (error instanceof AuthError) {
    console.error(JSON.stringify({ ...record, code: error.code, severity: 'ERROR' }));
  } else if (error instanceof InvalidResponseError) {
    console.error(
      JSON.stringify({
        ...record,
        code: error.code,
        status: error.diagnostics.status,
        body_excerpt: error.diagnostics.bodyExcerpt,
        severity: 'ERROR',
      })
    );
  } else if (error instanceof ModelClientError) {
    console.warn(JSON.stringify({ ...record, code: error.code, severity: 'WARN', retries_exhausted: true }));
  } else {
    console.error(JSON.stringify({ ...record, severity: 'ERROR' }));
  }
}
