/**
 * Conversation domain entities
 */
export type MessageRole = 'user' | 'assistant';

export interface Message {
  readonly role: MessageRole;
  readonly content: string;
  readonly timestamp: Date;
}

export interface NewMessage {
  role: MessageRole;
  content: string;
}

export interface SessionSnapshot {
  sessionId: string;
  messages: readonly Message[];
  created: boolean;
}

export interface SessionSummary {
  sessionId: string;
  messageCount: number;
  createdAt: Date;
  lastUpdated: Date;
}

export interface Query {
  sessionId?: string;
  query: string;
}

export interface AssistantAnswer {
  sessionId: string;
  answer: string;
  attempts: number;
}
