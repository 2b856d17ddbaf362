import type { TaskStatus, TaskType } from './task.types.js';

export interface TopEntry {
  readonly hypothesisId: string;
  readonly rating: number;
}

export interface TaskYield {
  readonly done: number;
  readonly dead: number;
  /** Share of finished tasks of this type that completed, 0..1. */
  readonly rate: number;
}

export interface StatisticsSnapshot {
  readonly cycle: number;
  readonly computedAt: string;
  readonly hypotheses: {
    readonly active: number;
    readonly superseded: number;
    readonly rejected: number;
    readonly total: number;
  };
  readonly pendingReviews: number;
  readonly unindexed: number;
  readonly matches: {
    readonly total: number;
    readonly conclusive: number;
    readonly inconclusive: number;
  };
  readonly tasks: Record<TaskType, Record<TaskStatus, number>>;
  readonly yield: Record<TaskType, TaskYield>;
  readonly backlog: {
    readonly queued: number;
    readonly inProgress: number;
  };
  readonly avgRatingDelta: number;
  readonly previousAvgRatingDelta: number | null;
  readonly clusterCount: number;
  readonly previousClusterCount: number | null;
  readonly topK: readonly TopEntry[];
  readonly topRatingChange: number | null;
  readonly topMembershipChanged: boolean;
  readonly stableCycles: number;
  readonly metaReviewCoverage: number;
  readonly budget: {
    readonly used: number;
    readonly max: number;
    readonly remaining: number;
  };
  readonly timelineSequence: number;
}
