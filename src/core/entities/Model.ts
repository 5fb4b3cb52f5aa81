import type { ModelClientError } from '../errors.js';

/**
 * Model-related domain entities
 */
export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface ModelRequest {
  messages: ChatMessage[];
  /** Overrides the client's default completion length */
  maxTokens?: number;
}

export interface TokenUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

export type ModelResponse =
  | {
      ok: true;
      text: string;
      model: string;
      usage?: TokenUsage;
    }
  | {
      ok: false;
      error: ModelClientError;
    };
