import type { Review } from '@agora/shared/src/types/hypothesis.types.js';
import type { ContextMemory } from '../memory/context-memory.js';
import { scanValues } from '../memory/context-memory.js';
import { Keys, Kinds } from '../memory/record-kinds.js';
import { createIfAbsent } from '../memory/versioned-update.js';

export interface ReviewRepository {
  /** Create-only; resolves false when a review with this id already exists. */
  add(review: Review): Promise<boolean>;
  listFor(hypothesisId: string): Promise<readonly Review[]>;
  list(): Promise<readonly Review[]>;
}

function byCreation(a: Review, b: Review): number {
  if (a.createdAt !== b.createdAt) {
    return a.createdAt < b.createdAt ? -1 : 1;
  }
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

export function createReviewRepository(memory: ContextMemory): ReviewRepository {
  return {
    add(review: Review): Promise<boolean> {
      return createIfAbsent(memory, Keys.review(review.id), review);
    },

    async listFor(hypothesisId: string): Promise<readonly Review[]> {
      const reviews = await scanValues(memory, Kinds.review);
      return reviews.filter((r) => r.hypothesisId === hypothesisId).sort(byCreation);
    },

    async list(): Promise<readonly Review[]> {
      const reviews = await scanValues(memory, Kinds.review);
      return reviews.sort(byCreation);
    },
  };
}
