import { z } from 'zod';
import type { MetaReview, ResearchOverviewContent } from '@agora/shared/src/types/session.types.js';
import { createChildLogger } from '@agora/shared/src/logger.js';
import { Keys, ResearchOverviewContentSchema } from '../../memory/record-kinds.js';
import { createIfAbsent, updateWithRetry } from '../../memory/versioned-update.js';
import type { TaskHandler } from '../types.js';
import { invocationContext } from './handler-support.js';

const log = createChildLogger('workers:meta-review');

export interface MetaReviewTaskOutput {
  readonly goalId: string;
  readonly overview: ResearchOverviewContent;
}

const MetaReviewTaskOutputSchema: z.ZodType<MetaReviewTaskOutput> = z.object({
  goalId: z.string(),
  overview: ResearchOverviewContentSchema,
});

export function metaReviewIdFor(taskId: string): string {
  return `meta-${taskId}`;
}

export const metaReviewHandler: TaskHandler<MetaReviewTaskOutput> = {
  type: 'meta-review',
  outputSchema: MetaReviewTaskOutputSchema,

  async execute(task, ctx, signal) {
    const goal = await ctx.goals.requireCurrent();
    const subjects = await Promise.all(
      task.targetIds.map(async (id) => {
        const [hypothesis, rating, reviews] = await Promise.all([
          ctx.hypotheses.require(id),
          ctx.tournament.getRating(id),
          ctx.reviews.listFor(id),
        ]);
        return { hypothesis, rating: rating.rating, matchesPlayed: rating.matchesPlayed, reviews };
      }),
    );

    const result = await ctx.roster['meta-review'].invoke(
      { goal, subjects, final: task.final },
      invocationContext(task, ctx, signal),
    );
    return { goalId: goal.id, overview: result.overview };
  },

  async apply(task, output, ctx) {
    const metaReview: MetaReview = {
      id: metaReviewIdFor(task.id),
      taskId: task.id,
      final: task.final,
      overview: output.overview,
      coveredHypothesisIds: task.targetIds,
      createdAt: ctx.now().toISOString(),
    };
    await createIfAbsent(ctx.memory, Keys.metaReview(metaReview.id), metaReview);

    for (const hypothesisId of task.targetIds) {
      await updateWithRetry(ctx.memory, Keys.metaReviewCoverage(hypothesisId), (current) =>
        current?.value.metaReviewId === metaReview.id
          ? null
          : { hypothesisId, metaReviewId: metaReview.id, coveredAt: metaReview.createdAt },
      );
    }
    log.info(
      { taskId: task.id, covered: task.targetIds.length, final: task.final },
      'Meta-review stored',
    );
  },
};
