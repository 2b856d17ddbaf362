import type { Session, SessionStatus } from '@agora/shared/src/types/session.types.js';

export interface CreateSessionInput {
  readonly goalText: string;
}

export interface UpdateSessionInput {
  readonly status?: SessionStatus;
  readonly failureReason?: string;
  readonly updatedAt?: Date;
}

export interface ListSessionsInput {
  readonly status?: SessionStatus;
  readonly limit?: number;
}

export interface SessionRepository {
  create(input: CreateSessionInput): Promise<Session>;
  getById(id: string): Promise<Session | null>;
  list(input?: ListSessionsInput): Promise<readonly Session[]>;
  update(id: string, updates: UpdateSessionInput): Promise<void>;
}
