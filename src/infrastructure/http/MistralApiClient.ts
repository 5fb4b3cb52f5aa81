import fetch, { RequestInit, Response } from 'node-fetch';
import { z } from 'zod';
import type { IModelClient } from '../../core/interfaces/IModelClient.js';
import type { ModelRequest, ModelResponse } from '../../core/entities/Model.js';
import {
  AuthError,
  InvalidResponseError,
  RateLimitError,
  RequestCancelledError,
  TransientNetworkError,
} from '../../core/errors.js';

export type FetchFn = (url: string, init: RequestInit) => Promise<Response>;

export interface MistralClientOptions {
  apiUrl: string;
  apiKey?: string;
  model: string;
  temperature: number;
  maxTokens: number;
  timeoutMs: number;
  fetchFn?: FetchFn;
}

const ChatCompletionSchema = z.object({
  model: z.string().optional(),
  choices: z
    .array(
      z.object({
        message: z.object({
          role: z.string(),
          content: z.string(),
        }),
        finish_reason: z.string().nullable().optional(),
      })
    )
    .min(1),
  usage: z
    .object({
      prompt_tokens: z.number(),
      completion_tokens: z.number(),
      total_tokens: z.number(),
    })
    .optional(),
});

const BODY_EXCERPT_LENGTH = 200;

/**
 * Mistral chat-completions client.
 * One network call per `send`; retries belong to the caller.
 */
export class MistralApiClient implements IModelClient {
  private readonly fetchFn: FetchFn;

  constructor(private options: MistralClientOptions) {
    this.fetchFn = options.fetchFn ?? fetch;
  }

  async send(request: ModelRequest, abortSignal?: AbortSignal): Promise<ModelResponse> {
    if (!this.options.apiKey) {
      return {
        ok: false,
        error: new AuthError('Mistral API key is not configured', 'CREDENTIAL_MISSING'),
      };
    }

    if (abortSignal?.aborted) {
      throw new RequestCancelledError();
    }

    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.options.timeoutMs);
    const onCallerAbort = () => controller.abort();
    abortSignal?.addEventListener('abort', onCallerAbort, { once: true });

    try {
      let res: Response;
      let body: string;
      try {
        res = await this.fetchFn(`${this.options.apiUrl}/v1/chat/completions`, {
          method: 'POST',
          headers: {
            'Content-Type': 'application/json',
            Accept: 'application/json',
            Authorization: `Bearer ${this.options.apiKey}`,
          },
          body: JSON.stringify({
            model: this.options.model,
            messages: request.messages,
            temperature: this.options.temperature,
            max_tokens: request.maxTokens ?? this.options.maxTokens,
          }),
          signal: controller.signal,
        });
        body = await res.text();
      } catch (error) {
        if (abortSignal?.aborted) {
          throw new RequestCancelledError();
        }
        if (timedOut) {
          return {
            ok: false,
            error: new TransientNetworkError(
              `Mistral API did not respond within ${this.options.timeoutMs}ms`,
              'TIMEOUT'
            ),
          };
        }
        const message = error instanceof Error ? error.message : String(error);
        return {
          ok: false,
          error: new TransientNetworkError(`Network error calling Mistral API: ${message}`, 'NETWORK_ERROR'),
        };
      }

      return this.parseResponse(res.status, body);
    } finally {
      clearTimeout(timer);
      abortSignal?.removeEventListener('abort', onCallerAbort);
    }
  }

  private parseResponse(status: number, body: string): ModelResponse {
    const diagnostics = { status, bodyExcerpt: body.slice(0, BODY_EXCERPT_LENGTH) };

    if (status === 401 || status === 403) {
      return {
        ok: false,
        error: new AuthError(`Mistral API rejected the credential (HTTP ${status})`, 'AUTH_REJECTED', diagnostics),
      };
    }
    if (status === 429) {
      return {
        ok: false,
        error: new RateLimitError('Mistral API rate limit exceeded (HTTP 429)', diagnostics),
      };
    }
    if (status === 408 || status >= 500) {
      return {
        ok: false,
        error: new TransientNetworkError(
          `Mistral API unavailable (HTTP ${status})`,
          'UPSTREAM_UNAVAILABLE',
          diagnostics
        ),
      };
    }
    if (status < 200 || status >= 300) {
      return {
        ok: false,
        error: new InvalidResponseError(`Unexpected HTTP ${status} from Mistral API`, 'UNEXPECTED_STATUS', diagnostics),
      };
    }

    let json: unknown;
    try {
      json = JSON.parse(body);
    } catch {
      return {
        ok: false,
        error: new InvalidResponseError('Mistral API returned a non-JSON body', 'MALFORMED_RESPONSE', diagnostics),
      };
    }

    const parsed = ChatCompletionSchema.safeParse(json);
    if (!parsed.success) {
      const issue = parsed.error.errors[0];
      return {
        ok: false,
        error: new InvalidResponseError(
          `Mistral API response did not match the expected shape: ${issue.path.join('.') || 'root'}: ${issue.message}`,
          'MALFORMED_RESPONSE',
          diagnostics
        ),
      };
    }

    const text = parsed.data.choices[0].message.content.trim();
    if (text.length === 0) {
      return {
        ok: false,
        error: new InvalidResponseError('Mistral API returned an empty completion', 'MALFORMED_RESPONSE', diagnostics),
      };
    }

    const usage = parsed.data.usage;
    return {
      ok: true,
      text,
      model: parsed.data.model ?? this.options.model,
      usage: usage && {
        promptTokens: usage.prompt_tokens,
        completionTokens: usage.completion_tokens,
        totalTokens: usage.total_tokens,
      },
    };
  }
}
