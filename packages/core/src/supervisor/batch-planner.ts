import type { OrchestrationConfig } from '@agora/schemas/src/orchestration-config.schema.js';
import type { Hypothesis } from '@agora/shared/src/types/hypothesis.types.js';
import type { Task, TaskType } from '@agora/shared/src/types/task.types.js';
import { compareByCreation } from '../repositories/hypothesis.repository.js';
import { pairKey } from '../tournament/pair-selection.js';
import type { EnqueueRequest } from '../workers/task-queue.js';
import type { HandlerContext } from '../workers/types.js';

export const TASK_PRIORITIES: Readonly<Record<TaskType, number>> = {
  'meta-review': 60,
  review: 50,
  'update-proximity': 40,
  compare: 30,
  evolve: 20,
  generate: 10,
};

export const FINAL_META_REVIEW_PRIORITY = 100;

export function cycleTaskId(cycle: number, index: number): string {
  return `t-${String(cycle)}-${String(index)}`;
}

export function finalTaskId(cycle: number): string {
  return `t-${String(cycle)}-final`;
}

/** Task ids of the generate tasks that open a fresh session. */
export function seedTaskIds(count: number): string[] {
  return Array.from({ length: count }, (_, i) => cycleTaskId(0, i + 1));
}

/** Free queue slots for the next batch. At the hard limit only one meta-review may still pass. */
export function batchCapacity(depth: number, config: Pick<OrchestrationConfig, 'queue' | 'supervisor'>): number {
  if (depth >= config.queue.hardLimit) {
    return 1;
  }
  return Math.min(config.supervisor.batchSize, config.queue.hardLimit - depth);
}

function count(types: readonly TaskType[], type: TaskType): number {
  return types.filter((t) => t === type).length;
}

function pendingTargets(pending: readonly Task[], type: TaskType): Set<string> {
  return new Set(pending.filter((t) => t.type === type).flatMap((t) => t.targetIds));
}

function oldestWithout(
  active: readonly Hypothesis[],
  excluded: (id: string) => boolean,
  limit: number,
): string[] {
  return [...active]
    .sort(compareByCreation)
    .filter((h) => !excluded(h.id))
    .slice(0, limit)
    .map((h) => h.id);
}

export interface BatchPlanInput {
  readonly cycle: number;
  readonly types: readonly TaskType[];
  /** Queued and in-progress tasks. */
  readonly pending: readonly Task[];
}

/**
 * Resolves sampled task types to concrete targets. Draws that find nothing
 * to work on are dropped, so a batch may come out smaller than sampled.
 */
export async function planBatch(input: BatchPlanInput, ctx: HandlerContext): Promise<EnqueueRequest[]> {
  const { cycle, types, pending } = input;
  const { config } = ctx;
  const requests: Omit<EnqueueRequest, 'id'>[] = [];

  const generates = count(types, 'generate');
  for (let i = 0; i < generates; i++) {
    requests.push({ type: 'generate', targetIds: [], priority: TASK_PRIORITIES.generate });
  }

  const active = (await ctx.hypotheses.list()).filter((h) => h.status === 'active');

  const reviewDraws = count(types, 'review');
  if (reviewDraws > 0) {
    const reviewed = new Set((await ctx.reviews.list()).map((r) => r.hypothesisId));
    const scheduled = pendingTargets(pending, 'review');
    for (const id of oldestWithout(active, (h) => reviewed.has(h) || scheduled.has(h), reviewDraws)) {
      requests.push({ type: 'review', targetIds: [id], priority: TASK_PRIORITIES.review });
    }
  }

  const proximityDraws = count(types, 'update-proximity');
  if (proximityDraws > 0) {
    const clusters = await ctx.proximity.clusters();
    const indexed = new Set(clusters.clusters.flatMap((c) => c.memberIds));
    const scheduled = pendingTargets(pending, 'update-proximity');
    for (const id of oldestWithout(active, (h) => indexed.has(h) || scheduled.has(h), proximityDraws)) {
      requests.push({
        type: 'update-proximity',
        targetIds: [id],
        priority: TASK_PRIORITIES['update-proximity'],
      });
    }
  }

  const compareDraws = count(types, 'compare');
  if (compareDraws > 0) {
    const scheduled = new Set(
      pending
        .filter((t) => t.type === 'compare' && t.targetIds.length === 2)
        .map((t) => pairKey(t.targetIds[0], t.targetIds[1])),
    );
    const pairs = await ctx.tournament.selectPairs({
      maxPairs: compareDraws,
      batchIndex: cycle,
      topK: config.convergence.topK,
      scheduled,
    });
    for (const pair of pairs) {
      requests.push({
        type: 'compare',
        targetIds: [pair.hypothesisA, pair.hypothesisB],
        priority: TASK_PRIORITIES.compare,
      });
    }
  }

  const evolveDraws = count(types, 'evolve');
  if (evolveDraws > 0) {
    const parents = config.population.evolveParents;
    const ranked = await ctx.tournament.topRanked(Math.max(parents, config.convergence.topK) + evolveDraws);
    const ids = ranked.map((r) => r.hypothesisId);
    if (ids.length > 0) {
      for (let i = 0; i < evolveDraws; i++) {
        const size = Math.min(parents, ids.length);
        const start = (cycle + i) % ids.length;
        const window = Array.from({ length: size }, (_, j) => ids[(start + j) % ids.length]);
        requests.push({
          type: 'evolve',
          targetIds: [...new Set(window)],
          priority: TASK_PRIORITIES.evolve,
        });
      }
    }
  }

  if (count(types, 'meta-review') > 0) {
    const top = await ctx.tournament.topRanked(config.convergence.topK);
    if (top.length > 0) {
      requests.push({
        type: 'meta-review',
        targetIds: top.map((r) => r.hypothesisId),
        priority: TASK_PRIORITIES['meta-review'],
      });
    }
  }

  return requests.map((request, i) => ({ ...request, id: cycleTaskId(cycle, i + 1) }));
}

/** The session-closing meta-review over the current top-K, funded from the reserve. */
export async function planFinalMetaReview(
  cycle: number,
  ctx: HandlerContext,
): Promise<EnqueueRequest | null> {
  const top = await ctx.tournament.topRanked(ctx.config.convergence.topK);
  if (top.length === 0) {
    return null;
  }
  return {
    id: finalTaskId(cycle),
    type: 'meta-review',
    targetIds: top.map((r) => r.hypothesisId),
    priority: FINAL_META_REVIEW_PRIORITY,
    final: true,
  };
}
