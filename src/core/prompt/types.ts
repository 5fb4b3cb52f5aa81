import type { Message } from '../entities/Conversation.js';
import type { ModelRequest } from '../entities/Model.js';

export interface PromptBuilderOptions {
  /**
   * Character budget for history plus the new query.
   * The system prompt is fixed and not counted.
   */
  budgetChars: number;
  systemPrompt?: string;
}

/**
 * Composes a model-ready request from conversation history
 */
export interface IPromptBuilder {
  /**
   * Format conversation history and the new question into a request
   * @param history - Previous conversation messages, oldest first
   * @param newQuery - The new user question, passed through unchanged
   */
  build(history: readonly Message[], newQuery: string): ModelRequest;
}
