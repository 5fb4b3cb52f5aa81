import type { IConversationStore } from '../../core/interfaces/IConversationStore.js';
import type { IModelClient } from '../../core/interfaces/IModelClient.js';
import type { IPromptBuilder } from '../../core/prompt/types.js';
import type { AssistantAnswer, Query } from '../../core/entities/Conversation.js';
import {
  InvalidQueryError,
  OrchestratorError,
  toOrchestratorError,
} from '../../core/errors.js';
import { RetryPolicy, SleepFn, DEFAULT_RETRY_POLICY } from '../../utils/retry.js';
import { DebugLog, noopDebugLog } from '../../utils/debug.js';
import { completeWithRetry, logModelFailure } from './modelCall.js';

export type HandleResult =
  | { ok: true; value: AssistantAnswer }
  | { ok: false; error: OrchestratorError };

export interface OrchestratorOptions {
  retryPolicy?: RetryPolicy;
  sleep?: SleepFn;
  debugLog?: DebugLog;
}

const SESSION_ID_PATTERN = /^[A-Za-z0-9_-]{1,128}$/;

/**
 * Entry point for risk questions: resolves the session, builds the prompt,
 * calls the model with retries and records the exchange.
 */
export class OrchestratorService {
  private readonly retryPolicy: RetryPolicy;
  private readonly debugLog: DebugLog;

  constructor(
    private store: IConversationStore,
    private promptBuilder: IPromptBuilder,
    private modelClient: IModelClient,
    private options: OrchestratorOptions = {}
  ) {
    this.retryPolicy = options.retryPolicy ?? DEFAULT_RETRY_POLICY;
    this.debugLog = options.debugLog ?? noopDebugLog;
  }

  async handle(query: Query, signal?: AbortSignal): Promise<HandleResult> {
    let sessionId = query.sessionId;

    try {
      this.validate(query);

      const session = this.store.getOrCreate(query.sessionId);
      sessionId = session.sessionId;
      if (session.created) {
        this.debugLog(`[Orchestrator] Session ${session.sessionId} created`);
      }

      const value = await this.store.runExclusive(session.sessionId, () =>
        this.converse(session.sessionId, query.query, signal)
      );
      return { ok: true, value };
    } catch (error) {
      logModelFailure('Orchestrator', { session_id: sessionId }, error);
      return { ok: false, error: toOrchestratorError(error) };
    }
  }

  private validate(query: Query): void {
    if (typeof query.query !== 'string' || query.query.trim().length === 0) {
      throw new InvalidQueryError('Query must be a non-empty question');
    }
    if (query.sessionId !== undefined && !SESSION_ID_PATTERN.test(query.sessionId)) {
      throw new InvalidQueryError(
        'session_id must be 1-128 characters of letters, digits, underscores or hyphens'
      );
    }
  }

  /**
   * Runs inside the session's exclusive scope
   */
  private async converse(sessionId: string, text: string, signal?: AbortSignal): Promise<AssistantAnswer> {
    const history = this.store.getMessages(sessionId);
    const request = this.promptBuilder.build(history, text);

    this.store.append(sessionId, { role: 'user', content: text });

    const completion = await completeWithRetry(this.modelClient, request, {
      retryPolicy: this.retryPolicy,
      sleep: this.options.sleep,
      signal,
      component: 'Orchestrator',
      context: { session_id: sessionId },
    });
    this.debugLog(
      `[Orchestrator] Session ${sessionId}: sent ${request.messages.length} message(s), answered after ${completion.attempts} attempt(s)`
    );

    this.store.append(sessionId, { role: 'assistant', content: completion.text });

    return { sessionId, answer: completion.text, attempts: completion.attempts };
  }
}
