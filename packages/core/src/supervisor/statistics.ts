import type {
  ConvergenceConfig,
  SupervisorConfig,
} from '@agora/schemas/src/orchestration-config.schema.js';
import type { Hypothesis, Review } from '@agora/shared/src/types/hypothesis.types.js';
import type { StatisticsSnapshot, TaskYield, TopEntry } from '@agora/shared/src/types/statistics.types.js';
import type { Budget, Task, TaskStatus, TaskType } from '@agora/shared/src/types/task.types.js';
import { TASK_TYPES } from '@agora/shared/src/types/task.types.js';
import type {
  Match,
  MatchApplication,
  RankedHypothesis,
} from '@agora/shared/src/types/tournament.types.js';
import { mean, roundTo } from '@agora/shared/src/utils/math.js';
import type { ContextMemory } from '../memory/context-memory.js';
import { scanValues } from '../memory/context-memory.js';
import { Kinds } from '../memory/record-kinds.js';
import type { HandlerContext } from '../workers/types.js';
import type { TaskQueue } from '../workers/task-queue.js';
import type { BudgetLedger } from '../workers/budget.js';
import { regularRemaining } from '../workers/budget.js';

export interface StatisticsSources {
  readonly hypotheses: readonly Hypothesis[];
  readonly reviews: readonly Review[];
  readonly indexedIds: ReadonlySet<string>;
  readonly matches: readonly Match[];
  readonly applications: readonly MatchApplication[];
  readonly tasks: readonly Task[];
  /** Active hypotheses in rank order, at least `topK` long when available. */
  readonly ranked: readonly RankedHypothesis[];
  readonly clusterCount: number;
  readonly coveredIds: ReadonlySet<string>;
  readonly budget: Budget;
  readonly timelineSequence: number;
}

export type StatisticsConfig = {
  readonly convergence: ConvergenceConfig;
  readonly supervisor: SupervisorConfig;
};

/** Builds a record with one entry per task type. */
export function perTaskType<V>(value: (type: TaskType) => V): Record<TaskType, V> {
  return {
    generate: value('generate'),
    review: value('review'),
    compare: value('compare'),
    evolve: value('evolve'),
    'update-proximity': value('update-proximity'),
    'meta-review': value('meta-review'),
  };
}

function countTasks(tasks: readonly Task[]): Record<TaskType, Record<TaskStatus, number>> {
  const counts = perTaskType(
    (): Record<TaskStatus, number> => ({
      queued: 0,
      'in-progress': 0,
      done: 0,
      failed: 0,
      dead: 0,
    }),
  );
  for (const task of tasks) {
    counts[task.type][task.status]++;
  }
  return counts;
}

function yieldOf(counts: Record<TaskStatus, number>): TaskYield {
  const finished = counts.done + counts.dead;
  return {
    done: counts.done,
    dead: counts.dead,
    rate: finished === 0 ? 1 : roundTo(counts.done / finished, 4),
  };
}

function byApplicationOrder(a: MatchApplication, b: MatchApplication): number {
  if (a.appliedAt !== b.appliedAt) {
    return a.appliedAt < b.appliedAt ? -1 : 1;
  }
  return a.sequence - b.sequence || (a.matchId < b.matchId ? -1 : a.matchId > b.matchId ? 1 : 0);
}

/** Mean absolute rating movement per side over the most recent applied matches. */
export function averageRatingDelta(
  applications: readonly MatchApplication[],
  window: number,
): number {
  const recent = [...applications].sort(byApplicationOrder).slice(-window);
  return roundTo(mean(recent.map((a) => (Math.abs(a.deltaA) + Math.abs(a.deltaB)) / 2)), 4);
}

function topChange(
  topK: readonly TopEntry[],
  previous: StatisticsSnapshot | null,
): { change: number | null; membershipChanged: boolean } {
  if (!previous) {
    return { change: null, membershipChanged: topK.length > 0 };
  }
  const before = new Map(previous.topK.map((e) => [e.hypothesisId, e.rating]));
  const membershipChanged =
    before.size !== topK.length || topK.some((e) => !before.has(e.hypothesisId));
  const deltas = topK.flatMap((e) => {
    const prior = before.get(e.hypothesisId);
    return prior === undefined ? [] : [Math.abs(e.rating - prior)];
  });
  return {
    change: deltas.length === 0 ? null : roundTo(Math.max(...deltas), 4),
    membershipChanged,
  };
}

/**
 * Builds an immutable snapshot from what memory holds right now. Pure: the
 * same sources and previous snapshot always yield the same statistics.
 */
export function buildSnapshot(
  sources: StatisticsSources,
  previous: StatisticsSnapshot | null,
  cycle: number,
  config: StatisticsConfig,
  computedAt: string,
): StatisticsSnapshot {
  const active = sources.hypotheses.filter((h) => h.status === 'active');
  const reviewed = new Set(sources.reviews.map((r) => r.hypothesisId));
  const tasks = countTasks(sources.tasks);
  const conclusive = sources.matches.filter((m) => m.outcome !== 'inconclusive').length;

  const topK: TopEntry[] = sources.ranked
    .slice(0, config.convergence.topK)
    .map((r) => ({ hypothesisId: r.hypothesisId, rating: r.rating }));
  const { change, membershipChanged } = topChange(topK, previous);
  const stable =
    previous !== null &&
    topK.length > 0 &&
    !membershipChanged &&
    (change ?? 0) < config.convergence.ratingDelta;

  const covered = topK.filter((e) => sources.coveredIds.has(e.hypothesisId)).length;

  return {
    cycle,
    computedAt,
    hypotheses: {
      active: active.length,
      superseded: sources.hypotheses.filter((h) => h.status === 'superseded').length,
      rejected: sources.hypotheses.filter((h) => h.status === 'rejected').length,
      total: sources.hypotheses.length,
    },
    pendingReviews: active.filter((h) => !reviewed.has(h.id)).length,
    unindexed: active.filter((h) => !sources.indexedIds.has(h.id)).length,
    matches: {
      total: sources.matches.length,
      conclusive,
      inconclusive: sources.matches.length - conclusive,
    },
    tasks,
    yield: perTaskType((t) => yieldOf(tasks[t])),
    backlog: {
      queued: TASK_TYPES.reduce((sum, t) => sum + tasks[t].queued, 0),
      inProgress: TASK_TYPES.reduce((sum, t) => sum + tasks[t]['in-progress'], 0),
    },
    avgRatingDelta: averageRatingDelta(sources.applications, config.supervisor.recentMatchWindow),
    previousAvgRatingDelta: previous?.avgRatingDelta ?? null,
    clusterCount: sources.clusterCount,
    previousClusterCount: previous?.clusterCount ?? null,
    topK,
    topRatingChange: change,
    topMembershipChanged: membershipChanged,
    stableCycles: stable ? (previous?.stableCycles ?? 0) + 1 : 0,
    metaReviewCoverage: topK.length === 0 ? 0 : roundTo(covered / topK.length, 4),
    budget: {
      used: sources.budget.used,
      max: sources.budget.maxInvocations,
      remaining: regularRemaining(sources.budget),
    },
    timelineSequence: sources.timelineSequence,
  };
}

export async function latestTimelineSequence(
  memory: ContextMemory,
  fromSequence: number,
): Promise<number> {
  let last = fromSequence - 1;
  for await (const entry of memory.readTimeline(fromSequence)) {
    last = entry.sequence;
  }
  return Math.max(0, last);
}

export interface StatisticsCollector {
  collect(cycle: number, previous: StatisticsSnapshot | null): Promise<StatisticsSnapshot>;
}

export function createStatisticsCollector(deps: {
  readonly context: HandlerContext;
  readonly queue: TaskQueue;
  readonly ledger: BudgetLedger;
}): StatisticsCollector {
  const { context, queue, ledger } = deps;
  const { memory, config } = context;

  return {
    async collect(cycle: number, previous: StatisticsSnapshot | null): Promise<StatisticsSnapshot> {
      const [hypotheses, reviews, clusters, matches, applications, tasks, ranked, coverage, budget] =
        await Promise.all([
          context.hypotheses.list(),
          context.reviews.list(),
          context.proximity.clusters(),
          context.tournament.listMatches(),
          context.tournament.listApplications(),
          queue.list(),
          context.tournament.topRanked(config.convergence.topK),
          scanValues(memory, Kinds.metaReviewCoverage),
          ledger.current(),
        ]);
      const timelineSequence = await latestTimelineSequence(
        memory,
        (previous?.timelineSequence ?? 0) + 1,
      );

      return buildSnapshot(
        {
          hypotheses,
          reviews,
          indexedIds: new Set(clusters.clusters.flatMap((c) => c.memberIds)),
          matches,
          applications,
          tasks,
          ranked,
          clusterCount: clusters.clusters.length,
          coveredIds: new Set(coverage.map((c) => c.hypothesisId)),
          budget,
          timelineSequence: Math.max(timelineSequence, previous?.timelineSequence ?? 0),
        },
        previous,
        cycle,
        config,
        context.now().toISOString(),
      );
    },
  };
}
