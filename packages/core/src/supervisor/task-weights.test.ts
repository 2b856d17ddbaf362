import { describe, it, expect } from 'vitest';
import { OrchestrationConfigSchema } from '@agora/schemas/src/orchestration-config.schema.js';
import { createSeededRandom } from '@agora/shared/src/utils/math.js';
import { makeSnapshot } from '../testing/fixtures.js';
import { perTaskType } from './statistics.js';
import type { TaskWeights } from './task-weights.js';
import { computeTaskWeights, sampleTaskTypes } from './task-weights.js';

const config = OrchestrationConfigSchema.parse({});

describe('computeTaskWeights', () => {
  it('should weight only the task types that have work', () => {
    expect(computeTaskWeights(makeSnapshot(), config)).toEqual({
      generate: 1,
      review: 0,
      compare: 1.5,
      evolve: 0.5,
      'update-proximity': 0,
      'meta-review': 0,
    });
  });

  it('should be a pure function of the snapshot', () => {
    const snapshot = makeSnapshot({ pendingReviews: 2, unindexed: 1 });

    expect(computeTaskWeights(snapshot, config)).toEqual(computeTaskWeights(snapshot, config));
  });

  it('should raise evolve while the average rating delta shrinks', () => {
    const weights = computeTaskWeights(
      makeSnapshot({ avgRatingDelta: 4, previousAvgRatingDelta: 8 }),
      config,
    );

    expect(weights.evolve).toBe(1);
  });

  it('should raise generate while the cluster count stagnates', () => {
    const weights = computeTaskWeights(
      makeSnapshot({ clusterCount: 3, previousClusterCount: 3 }),
      config,
    );

    expect(weights.generate).toBe(2);
  });

  it('should favour generation and skip comparison with fewer than two active hypotheses', () => {
    const weights = computeTaskWeights(
      makeSnapshot({ hypotheses: { active: 1, superseded: 0, rejected: 0, total: 1 } }),
      config,
    );

    expect(weights.generate).toBe(2);
    expect(weights.compare).toBe(0);
  });

  it('should not evolve before any conclusive match', () => {
    const weights = computeTaskWeights(
      makeSnapshot({ matches: { total: 1, conclusive: 0, inconclusive: 1 } }),
      config,
    );

    expect(weights.evolve).toBe(0);
  });

  it('should not schedule reviews already covered by pending review tasks', () => {
    const tasks = perTaskType(() => ({ queued: 0, 'in-progress': 0, done: 0, failed: 0, dead: 0 }));
    const covered = makeSnapshot({
      pendingReviews: 3,
      tasks: { ...tasks, review: { ...tasks.review, queued: 2, 'in-progress': 1 } },
    });
    const uncovered = makeSnapshot({
      pendingReviews: 3,
      tasks: { ...tasks, review: { ...tasks.review, queued: 2 } },
    });

    expect(computeTaskWeights(covered, config).review).toBe(0);
    expect(computeTaskWeights(uncovered, config).review).toBe(1);
  });

  it('should request a meta-review while the top is not fully covered', () => {
    const weights = computeTaskWeights(makeSnapshot({ metaReviewCoverage: 0 }), config);

    expect(weights['meta-review']).toBe(0.5);
  });

  it('should hold back expansion at the soft queue limit', () => {
    const weights = computeTaskWeights(
      makeSnapshot({ backlog: { queued: 15, inProgress: 5 }, pendingReviews: 1 }),
      config,
    );

    expect(weights.generate).toBe(0);
    expect(weights.evolve).toBe(0);
    expect(weights.review).toBe(1);
    expect(weights.compare).toBe(1.5);
  });

  it('should allow only meta-review at the hard queue limit', () => {
    const weights = computeTaskWeights(
      makeSnapshot({ backlog: { queued: 40, inProgress: 0 }, metaReviewCoverage: 0, pendingReviews: 2 }),
      config,
    );

    expect(weights).toEqual({
      generate: 0,
      review: 0,
      compare: 0,
      evolve: 0,
      'update-proximity': 0,
      'meta-review': 0.5,
    });
  });

  it('should stop expansion at the population cap', () => {
    const weights = computeTaskWeights(
      makeSnapshot({ hypotheses: { active: 30, superseded: 0, rejected: 0, total: 30 } }),
      config,
    );

    expect(weights.generate).toBe(0);
    expect(weights.evolve).toBe(0);
    expect(weights.compare).toBe(1.5);
  });

  it('should weight nothing once the regular budget is spent', () => {
    const weights = computeTaskWeights(
      makeSnapshot({ budget: { used: 98, max: 100, remaining: 0 }, pendingReviews: 5 }),
      config,
    );

    expect(Object.values(weights).every((w) => w === 0)).toBe(true);
  });
});

describe('sampleTaskTypes', () => {
  const weights: TaskWeights = {
    generate: 1,
    review: 0,
    compare: 1.5,
    evolve: 0.5,
    'update-proximity': 0,
    'meta-review': 0,
  };

  it('should return nothing when every weight is zero', () => {
    expect(sampleTaskTypes(perTaskType(() => 0), 5, createSeededRandom(1))).toEqual([]);
  });

  it('should pick the type whose weight interval contains the draw', () => {
    expect(sampleTaskTypes(weights, 1, () => 0)).toEqual(['generate']);
    expect(sampleTaskTypes(weights, 1, () => 0.5)).toEqual(['compare']);
    expect(sampleTaskTypes(weights, 1, () => 0.99)).toEqual(['evolve']);
  });

  it('should never draw a zero-weight type', () => {
    const drawn = sampleTaskTypes(weights, 200, createSeededRandom(7));

    expect(drawn).toHaveLength(200);
    expect(drawn.some((t) => t === 'review' || t === 'update-proximity' || t === 'meta-review')).toBe(
      false,
    );
  });

  it('should repeat the same batch for the same seed', () => {
    expect(sampleTaskTypes(weights, 6, createSeededRandom(42))).toEqual(
      sampleTaskTypes(weights, 6, createSeededRandom(42)),
    );
  });
});
