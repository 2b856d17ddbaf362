import { describe, it, expect, beforeEach } from 'vitest';
import { OrchestrationConfigSchema } from '@agora/schemas/src/orchestration-config.schema.js';
import type { Task } from '@agora/shared/src/types/task.types.js';
import { createTestHandlerContext } from '../testing/handler-context.js';
import { createTaskQueue } from '../workers/task-queue.js';
import type { TaskQueue } from '../workers/task-queue.js';
import type { HandlerContext } from '../workers/types.js';
import { batchCapacity, planBatch, planFinalMetaReview, seedTaskIds } from './batch-planner.js';

describe('batchCapacity', () => {
  const config = OrchestrationConfigSchema.parse({});

  it('should fill up to the batch size while the queue has room', () => {
    expect(batchCapacity(0, config)).toBe(6);
  });

  it('should shrink the batch as the queue nears the hard limit', () => {
    expect(batchCapacity(37, config)).toBe(3);
  });

  it('should leave a single slot at the hard limit', () => {
    expect(batchCapacity(40, config)).toBe(1);
  });
});

describe('seedTaskIds', () => {
  it('should number the opening generate tasks under cycle zero', () => {
    expect(seedTaskIds(3)).toEqual(['t-0-1', 't-0-2', 't-0-3']);
  });
});

describe('planBatch', () => {
  let ctx: HandlerContext;
  let queue: TaskQueue;

  async function pendingTask(id: string, type: Task['type'], targetIds: string[]): Promise<Task> {
    const { task } = await queue.enqueue({ id, type, targetIds, priority: 1 });
    return task;
  }

  beforeEach(async () => {
    ctx = createTestHandlerContext({
      config: { convergence: { topK: 2 }, population: { evolveParents: 2 } },
    });
    queue = createTaskQueue({ memory: ctx.memory, retryLimit: 1 });
    for (const id of ['h-1', 'h-2', 'h-3']) {
      await ctx.hypotheses.add({
        id,
        goalId: 'goal-v1',
        content: { title: `Title ${id}`, description: `About ${id}` },
        provenance: { kind: 'generated' },
      });
    }
  });

  it('should number generate tasks by cycle and position', async () => {
    const requests = await planBatch({ cycle: 4, types: ['generate', 'generate'], pending: [] }, ctx);

    expect(requests).toEqual([
      { id: 't-4-1', type: 'generate', targetIds: [], priority: 10 },
      { id: 't-4-2', type: 'generate', targetIds: [], priority: 10 },
    ]);
  });

  it('should review the oldest unreviewed hypotheses not already scheduled', async () => {
    await ctx.reviews.add({
      id: 'review-x',
      hypothesisId: 'h-1',
      reviewer: 'reflect',
      critique: { strengths: [], weaknesses: [], suggestions: [] },
      scores: { scientificMerit: 5, novelty: 5, testability: 5, impact: 5, limitations: 5 },
      overallScore: 5,
      recommendation: 'revise',
      createdAt: new Date().toISOString(),
    });
    const pending = [await pendingTask('t-0-9', 'review', ['h-2'])];

    const requests = await planBatch({ cycle: 3, types: ['review', 'review', 'review'], pending }, ctx);

    expect(requests).toEqual([{ id: 't-3-1', type: 'review', targetIds: ['h-3'], priority: 50 }]);
  });

  it('should index hypotheses that are not in the proximity graph yet', async () => {
    await ctx.proximity.applyScores('h-1', []);

    const requests = await planBatch(
      { cycle: 2, types: ['update-proximity', 'update-proximity'], pending: [] },
      ctx,
    );

    expect(requests.map((r) => r.targetIds)).toEqual([['h-2'], ['h-3']]);
    expect(requests.every((r) => r.priority === 40)).toBe(true);
  });

  it('should skip pairs that already have a compare task pending', async () => {
    const pending = [await pendingTask('t-0-9', 'compare', ['h-1', 'h-2'])];

    const requests = await planBatch({ cycle: 1, types: ['compare'], pending }, ctx);

    expect(requests).toEqual([
      { id: 't-1-1', type: 'compare', targetIds: ['h-1', 'h-3'], priority: 30 },
    ]);
  });

  it('should rotate evolve parents over the ranking', async () => {
    const requests = await planBatch({ cycle: 1, types: ['evolve', 'evolve'], pending: [] }, ctx);

    expect(requests.map((r) => r.targetIds)).toEqual([
      ['h-2', 'h-3'],
      ['h-3', 'h-1'],
    ]);
  });

  it('should plan at most one meta-review per batch over the top-K', async () => {
    const requests = await planBatch(
      { cycle: 1, types: ['meta-review', 'meta-review'], pending: [] },
      ctx,
    );

    expect(requests).toEqual([
      { id: 't-1-1', type: 'meta-review', targetIds: ['h-1', 'h-2'], priority: 60 },
    ]);
  });

  it('should number a mixed batch in resolution order', async () => {
    const requests = await planBatch(
      { cycle: 2, types: ['meta-review', 'generate', 'review'], pending: [] },
      ctx,
    );

    expect(requests.map((r) => [r.id, r.type])).toEqual([
      ['t-2-1', 'generate'],
      ['t-2-2', 'review'],
      ['t-2-3', 'meta-review'],
    ]);
  });
});

describe('planFinalMetaReview', () => {
  it('should plan nothing without hypotheses', async () => {
    expect(await planFinalMetaReview(5, createTestHandlerContext())).toBeNull();
  });

  it('should target the top-K with the final flag and top priority', async () => {
    const ctx = createTestHandlerContext({ config: { convergence: { topK: 1 } } });
    await ctx.hypotheses.add({
      id: 'h-1',
      goalId: 'goal-v1',
      content: { title: 'Title', description: 'About' },
      provenance: { kind: 'generated' },
    });

    expect(await planFinalMetaReview(5, ctx)).toEqual({
      id: 't-5-final',
      type: 'meta-review',
      targetIds: ['h-1'],
      priority: 100,
      final: true,
    });
  });
});
