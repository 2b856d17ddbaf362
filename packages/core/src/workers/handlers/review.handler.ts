import { z } from 'zod';
import type { ReflectOutput } from '@agora/shared/src/types/agent.types.js';
import type { Review } from '@agora/shared/src/types/hypothesis.types.js';
import { createChildLogger } from '@agora/shared/src/logger.js';
import { mean, roundTo } from '@agora/shared/src/utils/math.js';
import type { TaskHandler } from '../types.js';
import { feedbackFor, invocationContext, targetAt } from './handler-support.js';

const log = createChildLogger('workers:review');

const ScoreSchema = z.number().min(1).max(10);

const ReflectOutputSchema: z.ZodType<ReflectOutput> = z.object({
  critique: z.object({
    strengths: z.array(z.string()),
    weaknesses: z.array(z.string()),
    suggestions: z.array(z.string()),
  }),
  scores: z.object({
    scientificMerit: ScoreSchema,
    novelty: ScoreSchema,
    testability: ScoreSchema,
    impact: ScoreSchema,
    limitations: ScoreSchema,
  }),
  recommendation: z.enum(['accept', 'revise', 'reject']),
});

export function reviewIdFor(taskId: string): string {
  return `review-${taskId}`;
}

export function overallScore(scores: ReflectOutput['scores']): number {
  return roundTo(
    mean([
      scores.scientificMerit,
      scores.novelty,
      scores.testability,
      scores.impact,
      scores.limitations,
    ]),
    2,
  );
}

export const reviewHandler: TaskHandler<ReflectOutput> = {
  type: 'review',
  outputSchema: ReflectOutputSchema,

  async execute(task, ctx, signal) {
    const hypothesis = await ctx.hypotheses.require(targetAt(task, 0));
    const goal = await ctx.goals.requireCurrent();
    return ctx.roster.reflect.invoke(
      { goal, hypothesis, feedback: await feedbackFor(ctx, goal.id, [hypothesis.id]) },
      invocationContext(task, ctx, signal),
    );
  },

  async apply(task, output, ctx) {
    const hypothesisId = targetAt(task, 0);
    const review: Review = {
      id: reviewIdFor(task.id),
      hypothesisId,
      reviewer: 'reflect',
      critique: output.critique,
      scores: output.scores,
      overallScore: overallScore(output.scores),
      recommendation: output.recommendation,
      createdAt: ctx.now().toISOString(),
    };
    await ctx.reviews.add(review);

    if (output.recommendation === 'reject' && ctx.config.tournament.rejectOnReviewRecommendation) {
      await ctx.hypotheses.setStatus(hypothesisId, 'rejected', `rejected by review ${review.id}`);
    }
    log.info(
      { taskId: task.id, hypothesisId, overallScore: review.overallScore, recommendation: review.recommendation },
      'Review stored',
    );
  },
};
