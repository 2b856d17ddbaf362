import { z } from 'zod';
import type { CompareOutput, CompareWinner } from '@agora/shared/src/types/agent.types.js';
import type { MatchOutcome } from '@agora/shared/src/types/tournament.types.js';
import type { TaskHandler } from '../types.js';
import { invocationContext, targetAt } from './handler-support.js';

const CompareOutputSchema: z.ZodType<CompareOutput> = z.object({
  winner: z.enum(['a', 'b', 'draw', 'undetermined']),
  confidence: z.number().min(0).max(1),
  rationale: z.string(),
  transcript: z.string(),
});

const OUTCOMES: Readonly<Record<CompareWinner, MatchOutcome>> = {
  a: 'a-wins',
  b: 'b-wins',
  draw: 'draw',
  undetermined: 'inconclusive',
};

export function matchIdFor(taskId: string): string {
  return `match-${taskId}`;
}

export const compareHandler: TaskHandler<CompareOutput> = {
  type: 'compare',
  outputSchema: CompareOutputSchema,

  async execute(task, ctx, signal) {
    const [hypothesisA, hypothesisB] = await Promise.all([
      ctx.hypotheses.require(targetAt(task, 0)),
      ctx.hypotheses.require(targetAt(task, 1)),
    ]);
    const goal = await ctx.goals.requireCurrent();
    const [reviewsA, reviewsB] = await Promise.all([
      ctx.reviews.listFor(hypothesisA.id),
      ctx.reviews.listFor(hypothesisB.id),
    ]);
    return ctx.roster['rank-compare'].invoke(
      { goal, hypothesisA, hypothesisB, reviewsA, reviewsB },
      invocationContext(task, ctx, signal),
    );
  },

  async apply(task, output, ctx) {
    await ctx.tournament.recordMatch({
      id: matchIdFor(task.id),
      hypothesisA: targetAt(task, 0),
      hypothesisB: targetAt(task, 1),
      outcome: OUTCOMES[output.winner],
      confidence: output.confidence,
      rationale: output.rationale,
      transcript: output.transcript,
      taskId: task.id,
    });
  },

  async onDead(task, ctx) {
    await ctx.tournament.recordMatch({
      id: matchIdFor(task.id),
      hypothesisA: targetAt(task, 0),
      hypothesisB: targetAt(task, 1),
      outcome: 'inconclusive',
      confidence: 0,
      rationale: `comparison abandoned: ${task.lastError ?? 'unknown error'}`,
      taskId: task.id,
    });
  },
};
