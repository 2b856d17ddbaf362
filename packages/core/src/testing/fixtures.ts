import type { InvocationContext } from '@agora/shared/src/types/agent.types.js';
import type { ResearchGoal } from '@agora/shared/src/types/goal.types.js';
import type { Hypothesis, Review } from '@agora/shared/src/types/hypothesis.types.js';
import type { StatisticsSnapshot } from '@agora/shared/src/types/statistics.types.js';
import { perTaskType } from '../supervisor/statistics.js';

export const FIXED_TIME = '2026-01-01T00:00:00.000Z';

export function makeGoal(overrides: Partial<ResearchGoal> = {}): ResearchGoal {
  return {
    id: 'goal-v1',
    version: 1,
    text: 'Identify mechanisms that slow cellular senescence',
    constraints: { evaluationCriteria: ['testability'], preferences: [] },
    createdAt: FIXED_TIME,
    ...overrides,
  };
}

export function makeHypothesis(id: string, overrides: Partial<Hypothesis> = {}): Hypothesis {
  return {
    id,
    goalId: 'goal-v1',
    content: { title: `Title ${id}`, description: `Description of ${id}` },
    provenance: { kind: 'generated' },
    createdAt: FIXED_TIME,
    creationSequence: 1,
    status: 'active',
    ...overrides,
  };
}

export function makeReview(hypothesisId: string, overrides: Partial<Review> = {}): Review {
  return {
    id: `review-${hypothesisId}`,
    hypothesisId,
    reviewer: 'reflect',
    critique: { strengths: ['Specific'], weaknesses: ['Untested'], suggestions: ['Add controls'] },
    scores: { scientificMerit: 7, novelty: 6, testability: 8, impact: 7, limitations: 5 },
    overallScore: 6.6,
    recommendation: 'accept',
    createdAt: FIXED_TIME,
    ...overrides,
  };
}

export function makeContext(overrides: Partial<InvocationContext> = {}): InvocationContext {
  return {
    sessionId: 'session-1',
    taskId: 'task-1',
    signal: new AbortController().signal,
    ...overrides,
  };
}

/** A quiet mid-session snapshot: nothing pending, plenty of budget. */
export function makeSnapshot(overrides: Partial<StatisticsSnapshot> = {}): StatisticsSnapshot {
  return {
    cycle: 1,
    computedAt: FIXED_TIME,
    hypotheses: { active: 4, superseded: 0, rejected: 0, total: 4 },
    pendingReviews: 0,
    unindexed: 0,
    matches: { total: 2, conclusive: 2, inconclusive: 0 },
    tasks: perTaskType(() => ({ queued: 0, 'in-progress': 0, done: 0, failed: 0, dead: 0 })),
    yield: perTaskType(() => ({ done: 0, dead: 0, rate: 1 })),
    backlog: { queued: 0, inProgress: 0 },
    avgRatingDelta: 10,
    previousAvgRatingDelta: null,
    clusterCount: 3,
    previousClusterCount: null,
    topK: [{ hypothesisId: 'h-1', rating: 1516 }],
    topRatingChange: null,
    topMembershipChanged: true,
    stableCycles: 0,
    metaReviewCoverage: 1,
    budget: { used: 10, max: 100, remaining: 88 },
    timelineSequence: 0,
    ...overrides,
  };
}
