import { z } from 'zod';
import type { ProximityScoreOutput } from '@agora/shared/src/types/agent.types.js';
import type { TaskHandler } from '../types.js';
import { invocationContext, targetAt } from './handler-support.js';

const ProximityScoreOutputSchema: z.ZodType<ProximityScoreOutput> = z.object({
  scores: z.array(z.object({ hypothesisId: z.string(), similarity: z.number() })),
});

export const updateProximityHandler: TaskHandler<ProximityScoreOutput> = {
  type: 'update-proximity',
  outputSchema: ProximityScoreOutputSchema,

  async execute(task, ctx, signal) {
    const hypothesisId = targetAt(task, 0);
    if (await ctx.proximity.isIndexed(hypothesisId)) {
      return { scores: [] };
    }
    const plan = await ctx.proximity.prepareInsertion(hypothesisId);
    return ctx.roster['proximity-score'].invoke(
      { hypothesis: plan.hypothesis, candidates: plan.candidates },
      invocationContext(task, ctx, signal),
    );
  },

  async apply(task, output, ctx) {
    await ctx.proximity.applyScores(targetAt(task, 0), output.scores);
  },
};
