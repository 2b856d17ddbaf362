import { describe, it, expect, beforeEach } from 'vitest';
import type { Task } from '@agora/shared/src/types/task.types.js';
import { AgentError } from '@agora/shared/src/utils/errors.js';
import { Keys } from '../memory/record-kinds.js';
import type { FakeRoster } from '../testing/fake-roster.js';
import { createFakeRoster } from '../testing/fake-roster.js';
import { createTestHandlerContext } from '../testing/handler-context.js';
import type { EnqueueRequest, TaskQueue } from './task-queue.js';
import { createTaskQueue } from './task-queue.js';
import { createTaskHandlers } from './task-handlers.js';
import type { HandlerContext, TaskHandlers } from './types.js';

describe('task handlers', () => {
  let roster: FakeRoster;
  let ctx: HandlerContext;
  let queue: TaskQueue;
  let handlers: TaskHandlers;

  async function taskFor(request: EnqueueRequest): Promise<Task> {
    const { task } = await queue.enqueue(request);
    return task;
  }

  async function run(task: Task): Promise<unknown> {
    const handler = handlers[task.type];
    const output = await handler.execute(task, ctx, new AbortController().signal);
    await handler.apply(task, output, ctx);
    return output;
  }

  async function addHypothesis(id: string, description = `Description of ${id}`): Promise<void> {
    await ctx.hypotheses.add({
      id,
      goalId: 'goal-v1',
      content: { title: `Title ${id}`, description },
      provenance: { kind: 'generated' },
    });
  }

  beforeEach(async () => {
    roster = createFakeRoster({ champion: 'h-1' });
    ctx = createTestHandlerContext({
      roster,
      config: { population: { hypothesesPerGenerateTask: 2 } },
    });
    queue = createTaskQueue({ memory: ctx.memory, retryLimit: 3 });
    handlers = createTaskHandlers();
    await ctx.goals.publish('Identify mechanisms that slow cellular senescence', {
      evaluationCriteria: ['testability'],
      preferences: [],
    });
  });

  describe('generate', () => {
    it('should add the requested number of hypotheses with ids derived from the task', async () => {
      const task = await taskFor({ id: 't-1', type: 'generate', targetIds: [], priority: 1 });

      await run(task);

      const hypotheses = await ctx.hypotheses.list();
      expect(hypotheses.map((h) => h.id)).toEqual(['t-1-h1', 't-1-h2']);
      expect(hypotheses[0]?.provenance).toEqual({ kind: 'generated' });
      expect(hypotheses[0]?.goalId).toBe('goal-v1');
    });

    it('should not duplicate hypotheses when the output is applied twice', async () => {
      const task = await taskFor({ id: 't-1', type: 'generate', targetIds: [], priority: 1 });

      const output = await run(task);
      await handlers.generate.apply(task, output, ctx);

      expect(await ctx.hypotheses.list()).toHaveLength(2);
    });
  });

  describe('review', () => {
    it('should store a review with the mean of the five scores', async () => {
      await addHypothesis('h-1');
      const task = await taskFor({ id: 't-2', type: 'review', targetIds: ['h-1'], priority: 1 });

      await run(task);

      const reviews = await ctx.reviews.listFor('h-1');
      expect(reviews).toHaveLength(1);
      expect(reviews[0]).toMatchObject({
        id: 'review-t-2',
        reviewer: 'reflect',
        overallScore: 6.6,
        recommendation: 'accept',
      });
    });

    it('should reject the hypothesis on a reject recommendation', async () => {
      ctx = createTestHandlerContext({
        memory: ctx.memory,
        roster: createFakeRoster({ recommendationFor: () => 'reject' }),
      });
      await addHypothesis('h-1');
      const task = await taskFor({ id: 't-2', type: 'review', targetIds: ['h-1'], priority: 1 });

      await run(task);

      const hypothesis = await ctx.hypotheses.require('h-1');
      expect(hypothesis.status).toBe('rejected');
      expect(hypothesis.statusReason).toBe('rejected by review review-t-2');
    });

    it('should keep the hypothesis active when rejection on review is disabled', async () => {
      ctx = createTestHandlerContext({
        memory: ctx.memory,
        roster: createFakeRoster({ recommendationFor: () => 'reject' }),
        config: { tournament: { rejectOnReviewRecommendation: false } },
      });
      await addHypothesis('h-1');
      const task = await taskFor({ id: 't-2', type: 'review', targetIds: ['h-1'], priority: 1 });

      await run(task);

      expect((await ctx.hypotheses.require('h-1')).status).toBe('active');
    });
  });

  describe('compare', () => {
    it('should record the match and update both ratings', async () => {
      await addHypothesis('h-1');
      await addHypothesis('h-2');
      const task = await taskFor({
        id: 't-3',
        type: 'compare',
        targetIds: ['h-2', 'h-1'],
        priority: 1,
      });

      await run(task);

      const matches = await ctx.tournament.listMatches();
      expect(matches).toHaveLength(1);
      expect(matches[0]).toMatchObject({
        id: 'match-t-3',
        hypothesisA: 'h-2',
        hypothesisB: 'h-1',
        outcome: 'b-wins',
        taskId: 't-3',
      });
      expect((await ctx.tournament.getRating('h-1')).rating).toBe(1516);
      expect((await ctx.tournament.getRating('h-2')).rating).toBe(1484);
    });

    it('should record a dead comparison as inconclusive without touching ratings', async () => {
      await addHypothesis('h-1');
      await addHypothesis('h-2');
      const task = await taskFor({
        id: 't-3',
        type: 'compare',
        targetIds: ['h-1', 'h-2'],
        priority: 1,
      });

      await handlers.compare.onDead({ ...task, lastError: 'timed out' }, ctx);

      const matches = await ctx.tournament.listMatches();
      expect(matches[0]).toMatchObject({
        outcome: 'inconclusive',
        confidence: 0,
        rationale: 'comparison abandoned: timed out',
      });
      expect((await ctx.tournament.getRating('h-1')).matchesPlayed).toBe(0);
    });
  });

  describe('evolve', () => {
    it('should add a variant that names its parents and strategy', async () => {
      await addHypothesis('h-1');
      await addHypothesis('h-2');
      const task = await taskFor({
        id: 't-4',
        type: 'evolve',
        targetIds: ['h-1', 'h-2'],
        priority: 1,
      });

      await run(task);

      const child = await ctx.hypotheses.require('t-4-e1');
      expect(child.provenance).toEqual({
        kind: 'evolved',
        parentIds: ['h-1', 'h-2'],
        strategy: 'synthesis',
      });
      expect(child.content.title).toBe('Refinement of h-1 + h-2');
      expect(await ctx.hypotheses.ancestors('t-4-e1')).toEqual(['h-1', 'h-2']);
    });
  });

  describe('update-proximity', () => {
    it('should place a hypothesis with identical content in the same cluster', async () => {
      await addHypothesis('h-1', 'Shared mechanism');
      await addHypothesis('h-2', 'Shared mechanism');

      await run(await taskFor({ id: 't-5', type: 'update-proximity', targetIds: ['h-1'], priority: 1 }));
      await run(await taskFor({ id: 't-6', type: 'update-proximity', targetIds: ['h-2'], priority: 1 }));

      expect(await ctx.proximity.clusterOf('h-2')).toEqual(['h-1', 'h-2']);
    });

    it('should not invoke the agent for an already indexed hypothesis', async () => {
      await addHypothesis('h-1');
      await run(await taskFor({ id: 't-5', type: 'update-proximity', targetIds: ['h-1'], priority: 1 }));

      const output = await run(
        await taskFor({ id: 't-6', type: 'update-proximity', targetIds: ['h-1'], priority: 1 }),
      );

      expect(output).toEqual({ scores: [] });
      expect(roster.calls['proximity-score']).toBe(1);
    });
  });

  describe('meta-review', () => {
    it('should store the overview and cover every subject', async () => {
      await addHypothesis('h-1');
      await addHypothesis('h-2');
      const task = await taskFor({
        id: 't-7',
        type: 'meta-review',
        targetIds: ['h-1', 'h-2'],
        priority: 1,
      });

      await run(task);

      const stored = await ctx.memory.get(Keys.metaReview('meta-t-7'));
      expect(stored?.value.final).toBe(false);
      expect(stored?.value.overview.summary).toBe('Interim overview of 2 hypotheses');
      expect(stored?.value.coveredHypothesisIds).toEqual(['h-1', 'h-2']);
      const coverage = await ctx.memory.get(Keys.metaReviewCoverage('h-2'));
      expect(coverage?.value.metaReviewId).toBe('meta-t-7');
    });

    it('should mark the session-closing review as final', async () => {
      await addHypothesis('h-1');
      const task = await taskFor({
        id: 't-8',
        type: 'meta-review',
        targetIds: ['h-1'],
        priority: 1,
        final: true,
      });

      await run(task);

      const stored = await ctx.memory.get(Keys.metaReview('meta-t-8'));
      expect(stored?.value.final).toBe(true);
      expect(stored?.value.overview.summary).toBe('Final overview of 1 hypotheses');
    });
  });

  it('should refuse to apply a stored output that does not match the handler schema', async () => {
    const task = await taskFor({ id: 't-9', type: 'review', targetIds: ['h-1'], priority: 1 });

    await expect(handlers.review.apply(task, { critique: 'none' }, ctx)).rejects.toThrow(AgentError);
  });

  it('should fail a task that lacks its target', async () => {
    const task = await taskFor({ id: 't-10', type: 'compare', targetIds: ['h-1'], priority: 1 });

    await expect(
      handlers.compare.execute(task, ctx, new AbortController().signal),
    ).rejects.toThrow('needs at least 2 target(s)');
  });
});
