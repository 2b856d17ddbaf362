import { randomUUID } from 'node:crypto';
import type { Feedback, FeedbackAction } from '@agora/shared/src/types/hypothesis.types.js';
import type { ContextMemory } from '../memory/context-memory.js';
import { scanValues } from '../memory/context-memory.js';
import { Keys, Kinds } from '../memory/record-kinds.js';

export interface NewFeedback {
  readonly text: string;
  readonly goalId: string;
  readonly action: FeedbackAction;
  readonly targetHypothesisId?: string;
}

export interface FeedbackRepository {
  add(input: NewFeedback): Promise<Feedback>;
  list(): Promise<readonly Feedback[]>;
  /**
   * Feedback texts that apply to a hypothesis under the given goal: general
   * remarks plus those aimed at the hypothesis itself.
   */
  textsFor(goalId: string, hypothesisId?: string): Promise<readonly string[]>;
}

export function createFeedbackRepository(
  memory: ContextMemory,
  now: () => Date = () => new Date(),
): FeedbackRepository {
  async function listSorted(): Promise<Feedback[]> {
    const all = await scanValues(memory, Kinds.feedback);
    return all.sort((a, b) => (a.createdAt < b.createdAt ? -1 : a.createdAt > b.createdAt ? 1 : 0));
  }

  return {
    async add(input: NewFeedback): Promise<Feedback> {
      const feedback: Feedback = {
        id: randomUUID(),
        text: input.text,
        goalId: input.goalId,
        action: input.action,
        createdAt: now().toISOString(),
        ...(input.targetHypothesisId !== undefined && {
          targetHypothesisId: input.targetHypothesisId,
        }),
      };
      await memory.put(Keys.feedback(feedback.id), feedback, 0);
      await memory.appendToTimeline('feedback', {
        feedbackId: feedback.id,
        action: feedback.action,
        targetHypothesisId: feedback.targetHypothesisId,
      });
      return feedback;
    },

    list(): Promise<readonly Feedback[]> {
      return listSorted();
    },

    async textsFor(goalId: string, hypothesisId?: string): Promise<readonly string[]> {
      const all = await listSorted();
      return all
        .filter(
          (f) =>
            f.goalId === goalId &&
            (f.targetHypothesisId === undefined || f.targetHypothesisId === hypothesisId),
        )
        .map((f) => f.text);
    },
  };
}
