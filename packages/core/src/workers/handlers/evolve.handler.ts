import { z } from 'zod';
import type { EvolvedDraft } from '@agora/shared/src/types/agent.types.js';
import { createChildLogger } from '@agora/shared/src/logger.js';
import { EvolutionStrategySchema } from '../../memory/record-kinds.js';
import type { TaskHandler } from '../types.js';
import { feedbackFor, invocationContext } from './handler-support.js';

const log = createChildLogger('workers:evolve');

export interface EvolveTaskOutput {
  readonly goalId: string;
  readonly hypotheses: readonly EvolvedDraft[];
}

const EvolveTaskOutputSchema: z.ZodType<EvolveTaskOutput> = z.object({
  goalId: z.string(),
  hypotheses: z.array(
    z.object({
      title: z.string().min(1),
      description: z.string().min(1),
      rationale: z.string().optional(),
      strategy: EvolutionStrategySchema,
    }),
  ),
});

export function evolvedHypothesisId(taskId: string, index: number): string {
  return `${taskId}-e${String(index + 1)}`;
}

export const evolveHandler: TaskHandler<EvolveTaskOutput> = {
  type: 'evolve',
  outputSchema: EvolveTaskOutputSchema,

  async execute(task, ctx, signal) {
    const goal = await ctx.goals.requireCurrent();
    const parents = await Promise.all(task.targetIds.map((id) => ctx.hypotheses.require(id)));
    const reviews = (await Promise.all(parents.map((p) => ctx.reviews.listFor(p.id)))).flat();

    const result = await ctx.roster.evolve.invoke(
      { goal, parents, reviews, feedback: await feedbackFor(ctx, goal.id, task.targetIds) },
      invocationContext(task, ctx, signal),
    );
    return { goalId: goal.id, hypotheses: result.hypotheses };
  },

  async apply(task, output, ctx) {
    for (const [index, draft] of output.hypotheses.entries()) {
      const { strategy, ...content } = draft;
      await ctx.hypotheses.add({
        id: evolvedHypothesisId(task.id, index),
        goalId: output.goalId,
        content,
        provenance: { kind: 'evolved', parentIds: task.targetIds, strategy },
      });
    }
    log.info(
      { taskId: task.id, parents: task.targetIds, variants: output.hypotheses.length },
      'Evolved hypotheses stored',
    );
  },
};
