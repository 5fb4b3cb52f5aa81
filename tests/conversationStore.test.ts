import { ConversationStore } from '../src/application/services/ConversationStore.js';
import { UnknownSessionError } from '../src/core/errors.js';

function idSequence(...ids: string[]): () => string {
  let index = 0;
  return () => ids[index++];
}

function deferred<T>() {
  let resolve: (value: T) => void = () => {};
  const promise = new Promise<T>((res) => {
    resolve = res;
  });
  return { promise, resolve };
}

describe('ConversationStore', () => {
  let store: ConversationStore;
  let clock: number;
  let debugLog: jest.Mock<void, [string]>;

  beforeEach(() => {
    clock = 1_000;
    debugLog = jest.fn<void, [string]>();
    store = new ConversationStore({
      sweepIntervalMs: 0,
      lockIdleTtlMs: 60_000,
      generateId: idSequence('S1', 'S1', 'S2', 'S3'),
      now: () => clock,
      debugLog,
    });
  });

  afterEach(() => {
    store.close();
    jest.restoreAllMocks();
  });

  describe('Session Resolution', () => {
    test('should create a session with a generated id when none is given', () => {
      const session = store.getOrCreate();

      expect(session).toEqual({ sessionId: 'S1', messages: [], created: true });
    });

    test('should return the existing session for a known id', () => {
      store.getOrCreate();
      store.append('S1', { role: 'user', content: 'Hello' });

      const session = store.getOrCreate('S1');

      expect(session.created).toBe(false);
      expect(session.messages.map((m) => m.content)).toEqual(['Hello']);
    });

    test('should create a session under a supplied id that does not exist yet', () => {
      const session = store.getOrCreate('client-chosen');

      expect(session).toEqual({ sessionId: 'client-chosen', messages: [], created: true });
      expect(store.getMessages('client-chosen')).toEqual([]);
    });

    test('should skip generated ids that are already taken', () => {
      store.getOrCreate();

      const second = store.getOrCreate();

      expect(second.sessionId).toBe('S2');
    });
  });

  describe('Appending Messages', () => {
    test('should fail for an unknown session', () => {
      expect(() => store.append('missing', { role: 'user', content: 'Hi' })).toThrow(UnknownSessionError);
      expect(() => store.getMessages('missing')).toThrow(UnknownSessionError);
    });

    test('should keep timestamps strictly increasing when the clock stands still', () => {
      store.getOrCreate('s');

      store.append('s', { role: 'user', content: 'one' });
      store.append('s', { role: 'assistant', content: 'two' });
      clock = 1_500;
      store.append('s', { role: 'user', content: 'three' });

      expect(store.getMessages('s').map((m) => m.timestamp.getTime())).toEqual([1_000, 1_001, 1_500]);
    });

    test('should hand out frozen messages and detached snapshots', () => {
      store.getOrCreate('s');
      const stored = store.append('s', { role: 'user', content: 'one' });

      const snapshot = store.getMessages('s');
      store.append('s', { role: 'assistant', content: 'two' });

      expect(Object.isFrozen(stored)).toBe(true);
      expect(snapshot).toHaveLength(1);
      expect(store.getMessages('s')).toHaveLength(2);
    });
  });

  describe('Exclusive Scope', () => {
    test('should run tasks for the same session one after another', async () => {
      const events: string[] = [];
      const gate = deferred<void>();

      const first = store.runExclusive('s', async () => {
        events.push('first:start');
        await gate.promise;
        events.push('first:end');
      });
      const second = store.runExclusive('s', async () => {
        events.push('second:start');
      });

      await Promise.resolve();
      gate.resolve();
      await Promise.all([first, second]);

      expect(events).toEqual(['first:start', 'first:end', 'second:start']);
    });

    test('should not block tasks for other sessions', async () => {
      const gate = deferred<void>();
      const events: string[] = [];

      const slow = store.runExclusive('a', async () => {
        await gate.promise;
        events.push('a');
      });
      await store.runExclusive('b', async () => {
        events.push('b');
      });
      gate.resolve();
      await slow;

      expect(events).toEqual(['b', 'a']);
    });

    test('should release the scope when a task fails', async () => {
      await expect(
        store.runExclusive('s', async () => {
          throw new Error('boom');
        })
      ).rejects.toThrow('boom');

      await expect(store.runExclusive('s', async () => 'next')).resolves.toBe('next');
    });

    test('should wait for in-flight work before deleting a session', async () => {
      store.getOrCreate('s');
      const gate = deferred<void>();

      const inFlight = store.runExclusive('s', async () => {
        await gate.promise;
        store.append('s', { role: 'user', content: 'late' });
      });
      const deletion = store.deleteSession('s');
      gate.resolve();

      await inFlight;
      await expect(deletion).resolves.toBe(true);
      await expect(store.deleteSession('s')).resolves.toBe(false);
    });
  });

  describe('Lifecycle', () => {
    test('should list sessions with message counts', () => {
      store.getOrCreate('a');
      store.getOrCreate('b');
      clock = 2_000;
      store.append('b', { role: 'user', content: 'Hello' });

      expect(store.listSessions()).toEqual([
        { sessionId: 'a', messageCount: 0, createdAt: new Date(1_000), lastUpdated: new Date(1_000) },
        { sessionId: 'b', messageCount: 1, createdAt: new Date(1_000), lastUpdated: new Date(2_000) },
      ]);
    });

    test('should sweep locks that have been idle past the TTL', async () => {
      await store.runExclusive('a', async () => {});
      await store.runExclusive('b', async () => {});
      expect(store.lockCount()).toBe(2);

      clock += 59_999;
      expect(store.sweepIdleLocks()).toBe(0);

      expect(debugLog).not.toHaveBeenCalled();

      clock += 1;
      expect(store.sweepIdleLocks()).toBe(2);
      expect(store.lockCount()).toBe(0);
      expect(debugLog).toHaveBeenCalledWith('[ConversationStore] Released 2 idle session lock(s), 0 remaining');
    });

    test('should not sweep a lock that is held', async () => {
      const gate = deferred<void>();
      const held = store.runExclusive('a', () => gate.promise);

      clock += 120_000;
      expect(store.sweepIdleLocks()).toBe(0);

      gate.resolve();
      await held;
    });

    test('should clear everything on close', () => {
      store.getOrCreate('a');

      store.close();

      expect(store.listSessions()).toEqual([]);
      expect(() => store.getMessages('a')).toThrow(UnknownSessionError);
    });
  });
});
