import { Timestamp } from '@google-cloud/firestore';
import type { Session, SessionStatus } from '@agora/shared/src/types/session.types.js';
import type {
  CreateSessionInput,
  ListSessionsInput,
  SessionRepository,
  UpdateSessionInput,
} from '../repositories/session.repository.js';
import { PersistenceError } from '@agora/shared/src/utils/errors.js';
import type { FirestoreBase } from './firestore-types.js';

const SESSIONS_COLLECTION = 'sessions';

interface SessionDocument {
  goalText: string;
  status: SessionStatus;
  failureReason?: string;
  createdAt: Timestamp;
  updatedAt: Timestamp;
}

function sessionFromDoc(id: string, data: SessionDocument): Session {
  return {
    id,
    goalText: data.goalText,
    status: data.status,
    failureReason: data.failureReason,
    createdAt: data.createdAt.toDate(),
    updatedAt: data.updatedAt.toDate(),
  };
}

/**
 * Session metadata lives on the session document itself; the session's
 * context memory hangs below it as subcollections.
 */
export function createFirestoreSessionRepository(base: FirestoreBase): SessionRepository {
  const sessionsRef = base.collection(SESSIONS_COLLECTION);

  return {
    async create(input: CreateSessionInput): Promise<Session> {
      const now = Timestamp.now();
      const docData: SessionDocument = {
        goalText: input.goalText,
        status: 'active',
        createdAt: now,
        updatedAt: now,
      };

      const docRef = sessionsRef.doc();
      await docRef.set(docData);

      return sessionFromDoc(docRef.id, docData);
    },

    async getById(id: string): Promise<Session | null> {
      const doc = await sessionsRef.doc(id).get();
      if (!doc.exists) {
        return null;
      }
      return sessionFromDoc(id, doc.data() as SessionDocument);
    },

    async list(input?: ListSessionsInput): Promise<readonly Session[]> {
      let query = sessionsRef.orderBy('updatedAt', 'desc');
      if (input?.status) {
        query = sessionsRef.where('status', '==', input.status).orderBy('updatedAt', 'desc');
      }
      const snapshot = await query.limit(input?.limit ?? 50).get();
      return snapshot.docs.map((doc) => sessionFromDoc(doc.id, doc.data() as SessionDocument));
    },

    async update(id: string, updates: UpdateSessionInput): Promise<void> {
      const updateData: Record<string, unknown> = {
        updatedAt: updates.updatedAt ? Timestamp.fromDate(updates.updatedAt) : Timestamp.now(),
      };

      if (updates.status !== undefined) {
        updateData['status'] = updates.status;
      }
      if (updates.failureReason !== undefined) {
        updateData['failureReason'] = updates.failureReason;
      }

      try {
        await sessionsRef.doc(id).update(updateData);
      } catch (error) {
        throw new PersistenceError(
          `Failed to update session ${id}`,
          error instanceof Error ? error : undefined,
        );
      }
    },
  };
}
