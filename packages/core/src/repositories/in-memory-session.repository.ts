import { randomUUID } from 'node:crypto';
import type { Session } from '@agora/shared/src/types/session.types.js';
import { PersistenceError } from '@agora/shared/src/utils/errors.js';
import type {
  CreateSessionInput,
  ListSessionsInput,
  SessionRepository,
  UpdateSessionInput,
} from './session.repository.js';

export function createInMemorySessionRepository(): SessionRepository {
  const sessions = new Map<string, Session>();

  return {
    create(input: CreateSessionInput): Promise<Session> {
      const now = new Date();
      const session: Session = {
        id: randomUUID(),
        goalText: input.goalText,
        status: 'active',
        createdAt: now,
        updatedAt: now,
      };
      sessions.set(session.id, session);
      return Promise.resolve(session);
    },

    getById(id: string): Promise<Session | null> {
      return Promise.resolve(sessions.get(id) ?? null);
    },

    list(input?: ListSessionsInput): Promise<readonly Session[]> {
      let results = [...sessions.values()];
      if (input?.status) {
        results = results.filter((s) => s.status === input.status);
      }
      results.sort((a, b) => b.updatedAt.getTime() - a.updatedAt.getTime());
      const limit = input?.limit ?? 50;
      return Promise.resolve(results.slice(0, limit));
    },

    update(id: string, updates: UpdateSessionInput): Promise<void> {
      const session = sessions.get(id);
      if (!session) {
        return Promise.reject(new PersistenceError(`Session not found: ${id}`));
      }
      const updated: Session = {
        ...session,
        ...(updates.status !== undefined && { status: updates.status }),
        ...(updates.failureReason !== undefined && { failureReason: updates.failureReason }),
        updatedAt: updates.updatedAt ?? new Date(),
      };
      sessions.set(id, updated);
      return Promise.resolve();
    },
  };
}
