import { randomUUID } from 'crypto';
import type { IConversationStore } from '../../core/interfaces/IConversationStore.js';
import type {
  Message,
  NewMessage,
  SessionSnapshot,
  SessionSummary,
} from '../../core/entities/Conversation.js';
import { UnknownSessionError } from '../../core/errors.js';
import { KeyedMutex } from '../../utils/KeyedMutex.js';
import { DebugLog, noopDebugLog } from '../../utils/debug.js';

interface SessionState {
  messages: Message[];
  createdAt: Date;
}

export interface ConversationStoreOptions {
  lockIdleTtlMs?: number;
  /** 0 disables the background sweep */
  sweepIntervalMs?: number;
  generateId?: () => string;
  now?: () => number;
  debugLog?: DebugLog;
}

/**
 * In-memory conversation history, keyed by session id.
 * Lives for the lifetime of the process; `close()` clears it.
 */
export class ConversationStore implements IConversationStore {
  private sessions: Map<string, SessionState> = new Map();
  private mutex: KeyedMutex;
  private sweepTimer: NodeJS.Timeout | null = null;
  private readonly lockIdleTtlMs: number;
  private readonly generateId: () => string;
  private readonly now: () => number;
  private readonly debugLog: DebugLog;

  constructor(options: ConversationStoreOptions = {}) {
    this.lockIdleTtlMs = options.lockIdleTtlMs ?? 30 * 60 * 1000;
    this.generateId = options.generateId ?? randomUUID;
    this.now = options.now ?? Date.now;
    this.debugLog = options.debugLog ?? noopDebugLog;
    this.mutex = new KeyedMutex(this.now);

    const sweepIntervalMs = options.sweepIntervalMs ?? 60 * 1000;
    if (sweepIntervalMs > 0) {
      this.sweepTimer = setInterval(() => this.sweepIdleLocks(), sweepIntervalMs);
      this.sweepTimer.unref();
    }
  }

  /**
   * Resolve a session, creating it when the id is absent or new
   */
  getOrCreate(sessionId?: string): SessionSnapshot {
    if (sessionId !== undefined) {
      const existing = this.sessions.get(sessionId);
      if (existing) {
        return { sessionId, messages: [...existing.messages], created: false };
      }
    }

    let id = sessionId ?? this.generateId();
    while (sessionId === undefined && this.sessions.has(id)) {
      id = this.generateId();
    }

    this.sessions.set(id, { messages: [], createdAt: new Date(this.now()) });
    return { sessionId: id, messages: [], created: true };
  }

  getMessages(sessionId: string): readonly Message[] {
    return [...this.requireSession(sessionId).messages];
  }

  /**
   * Append a message, stamping it strictly after the previous one
   */
  append(sessionId: string, message: NewMessage): Message {
    const session = this.requireSession(sessionId);
    const last = session.messages[session.messages.length - 1];

    let time = this.now();
    if (last && time <= last.timestamp.getTime()) {
      time = last.timestamp.getTime() + 1;
    }

    const stored: Message = Object.freeze({
      role: message.role,
      content: message.content,
      timestamp: new Date(time),
    });
    session.messages.push(stored);
    return stored;
  }

  runExclusive<T>(sessionId: string, task: () => Promise<T>): Promise<T> {
    return this.mutex.runExclusive(sessionId, task);
  }

  /**
   * Remove a session once any in-flight query for it has finished
   */
  deleteSession(sessionId: string): Promise<boolean> {
    return this.mutex.runExclusive(sessionId, async () => this.sessions.delete(sessionId));
  }

  listSessions(): SessionSummary[] {
    return Array.from(this.sessions.entries()).map(([sessionId, session]) => {
      const last = session.messages[session.messages.length - 1];
      return {
        sessionId,
        messageCount: session.messages.length,
        createdAt: session.createdAt,
        lastUpdated: last ? last.timestamp : session.createdAt,
      };
    });
  }

  sweepIdleLocks(): number {
    const removed = this.mutex.sweep(this.lockIdleTtlMs);
    if (removed > 0) {
      this.debugLog(`[ConversationStore] Released ${removed} idle session lock(s), ${this.lockCount()} remaining`);
    }
    return removed;
  }

  lockCount(): number {
    return this.mutex.size();
  }

  close(): void {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
    }
    this.sessions.clear();
    this.mutex.clear();
  }

  private requireSession(sessionId: string): SessionState {
    const session = this.sessions.get(sessionId);
    if (!session) {
      throw new UnknownSessionError(sessionId);
    }
    return session;
  }
}
