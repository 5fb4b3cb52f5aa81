import type { Message } from '../entities/Conversation.js';
import type { ChatMessage, ModelRequest } from '../entities/Model.js';
import { InputTooLargeError } from '../errors.js';
import type { IPromptBuilder, PromptBuilderOptions } from './types.js';

/**
 * Builds chat-completion requests with a sliding context window.
 *
 * History is walked newest to oldest and kept while it fits in whatever the
 * new query leaves of the budget. The first message that does not fit ends the
 * window, so the kept history is always a contiguous tail. A window never opens
 * on an assistant turn.
 */
export class PromptBuilder implements IPromptBuilder {
  private readonly budgetChars: number;
  private readonly systemPrompt?: string;

  constructor(options: PromptBuilderOptions) {
    if (!Number.isInteger(options.budgetChars) || options.budgetChars <= 0) {
      throw new RangeError(`budgetChars must be a positive integer, got ${options.budgetChars}`);
    }
    this.budgetChars = options.budgetChars;
    this.systemPrompt = options.systemPrompt;
  }

  build(history: readonly Message[], newQuery: string): ModelRequest {
    if (newQuery.length > this.budgetChars) {
      throw new InputTooLargeError(newQuery.length, this.budgetChars);
    }

    let remaining = this.budgetChars - newQuery.length;
    let start = history.length;
    while (start > 0 && history[start - 1].content.length <= remaining) {
      remaining -= history[start - 1].content.length;
      start--;
    }
    while (start < history.length && history[start].role === 'assistant') {
      start++;
    }

    const messages: ChatMessage[] = [];

    if (this.systemPrompt) {
      messages.push({ role: 'system', content: this.systemPrompt });
    }

    for (const msg of history.slice(start)) {
      messages.push({ role: msg.role, content: msg.content });
    }

    messages.push({ role: 'user', content: newQuery });

    return { messages };
  }
}
