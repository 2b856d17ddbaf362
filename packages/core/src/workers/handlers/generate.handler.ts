import { z } from 'zod';
import type { HypothesisContent } from '@agora/shared/src/types/hypothesis.types.js';
import { createChildLogger } from '@agora/shared/src/logger.js';
import { HypothesisContentSchema } from '../../memory/record-kinds.js';
import type { TaskHandler } from '../types.js';
import { feedbackFor, invocationContext } from './handler-support.js';

const log = createChildLogger('workers:generate');

const MAX_EXISTING_TITLES = 50;

export interface GenerateTaskOutput {
  readonly goalId: string;
  readonly hypotheses: readonly HypothesisContent[];
}

const GenerateTaskOutputSchema: z.ZodType<GenerateTaskOutput> = z.object({
  goalId: z.string(),
  hypotheses: z.array(HypothesisContentSchema),
});

export function generatedHypothesisId(taskId: string, index: number): string {
  return `${taskId}-h${String(index + 1)}`;
}

export const generateHandler: TaskHandler<GenerateTaskOutput> = {
  type: 'generate',
  outputSchema: GenerateTaskOutputSchema,

  async execute(task, ctx, signal) {
    const goal = await ctx.goals.requireCurrent();
    const existing = await ctx.hypotheses.list();
    const existingTitles = existing
      .filter((h) => h.status !== 'rejected')
      .slice(-MAX_EXISTING_TITLES)
      .map((h) => h.content.title);

    const result = await ctx.roster.generate.invoke(
      {
        goal,
        count: ctx.config.population.hypothesesPerGenerateTask,
        existingTitles,
        feedback: await feedbackFor(ctx, goal.id, []),
      },
      invocationContext(task, ctx, signal),
    );
    return { goalId: goal.id, hypotheses: result.hypotheses };
  },

  async apply(task, output, ctx) {
    let created = 0;
    for (const [index, content] of output.hypotheses.entries()) {
      const result = await ctx.hypotheses.add({
        id: generatedHypothesisId(task.id, index),
        goalId: output.goalId,
        content,
        provenance: { kind: 'generated' },
      });
      if (result.created) {
        created++;
      }
    }
    log.info({ taskId: task.id, created }, 'Generated hypotheses stored');
  },
};
