import type { OrchestrationConfig } from '@agora/schemas/src/orchestration-config.schema.js';
import type { StatisticsSnapshot } from '@agora/shared/src/types/statistics.types.js';
import type { TaskType } from '@agora/shared/src/types/task.types.js';
import { TASK_TYPES } from '@agora/shared/src/types/task.types.js';
import type { RandomSource } from '@agora/shared/src/utils/math.js';
import { throttledTypes } from '../workers/task-queue.js';
import { perTaskType } from './statistics.js';

export type TaskWeights = Readonly<Record<TaskType, number>>;

export type WeightConfig = Pick<
  OrchestrationConfig,
  'weights' | 'queue' | 'population' | 'convergence'
>;

/** Multiplier applied to a base weight when its trigger fires. */
export const BOOST = 2;

function pending(snapshot: StatisticsSnapshot, type: TaskType): number {
  return snapshot.tasks[type].queued + snapshot.tasks[type]['in-progress'];
}

/**
 * Pure mapping from a statistics snapshot to a weighting over task types.
 *
 * - evolve is boosted while the average rating delta shrinks;
 * - generate is boosted while the cluster count stagnates;
 * - a type with nothing to work on, or held back by back-pressure or the
 *   population cap, gets zero.
 */
export function computeTaskWeights(snapshot: StatisticsSnapshot, config: WeightConfig): TaskWeights {
  if (snapshot.budget.remaining === 0) {
    return perTaskType(() => 0);
  }

  const depth = snapshot.backlog.queued + snapshot.backlog.inProgress;
  const throttled = throttledTypes(depth, config.queue);
  const atCap = snapshot.hypotheses.active >= config.population.maxActiveHypotheses;
  const base = config.weights;

  const ratingsSettling =
    snapshot.previousAvgRatingDelta !== null &&
    snapshot.avgRatingDelta < snapshot.previousAvgRatingDelta;
  const clustersStagnant =
    snapshot.previousClusterCount !== null &&
    snapshot.clusterCount <= snapshot.previousClusterCount;

  const uncoveredTop = snapshot.topK.length > 0 && snapshot.metaReviewCoverage < 1;

  const raw: Record<TaskType, number> = {
    generate: atCap ? 0 : base.generate * (clustersStagnant || snapshot.hypotheses.active < 2 ? BOOST : 1),
    review: snapshot.pendingReviews > pending(snapshot, 'review') ? base.review : 0,
    compare: snapshot.hypotheses.active >= 2 ? base.compare : 0,
    evolve:
      atCap || snapshot.matches.conclusive === 0
        ? 0
        : base.evolve * (ratingsSettling ? BOOST : 1),
    'update-proximity':
      snapshot.unindexed > pending(snapshot, 'update-proximity') ? base['update-proximity'] : 0,
    'meta-review': uncoveredTop && pending(snapshot, 'meta-review') === 0 ? base['meta-review'] : 0,
  };

  return perTaskType((type) => (throttled.has(type) ? 0 : raw[type]));
}

/**
 * Draws `size` task types with replacement, proportionally to their weights.
 * Resolves to an empty batch when every weight is zero.
 */
export function sampleTaskTypes(
  weights: TaskWeights,
  size: number,
  random: RandomSource,
): TaskType[] {
  const total = TASK_TYPES.reduce((sum, type) => sum + weights[type], 0);
  if (total <= 0) {
    return [];
  }

  const drawn: TaskType[] = [];
  for (let i = 0; i < size; i++) {
    let point = random() * total;
    let chosen: TaskType | undefined;
    for (const type of TASK_TYPES) {
      if (weights[type] <= 0) {
        continue;
      }
      chosen = type;
      point -= weights[type];
      if (point < 0) {
        break;
      }
    }
    if (chosen) {
      drawn.push(chosen);
    }
  }
  return drawn;
}
