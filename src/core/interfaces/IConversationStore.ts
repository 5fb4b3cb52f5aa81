import type { Message, NewMessage, SessionSnapshot, SessionSummary } from '../entities/Conversation.js';

/**
 * Interface for in-memory conversation state
 */
export interface IConversationStore {
  getOrCreate(sessionId?: string): SessionSnapshot;

  getMessages(sessionId: string): readonly Message[];

  append(sessionId: string, message: NewMessage): Message;

  /**
   * Run a task while holding the session's exclusive scope
   */
  runExclusive<T>(sessionId: string, task: () => Promise<T>): Promise<T>;

  deleteSession(sessionId: string): Promise<boolean>;

  listSessions(): SessionSummary[];

  close(): void;
}
