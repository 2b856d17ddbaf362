import { z } from 'zod';
import type { GoalPointer, ResearchGoal } from '@agora/shared/src/types/goal.types.js';
import type {
  Feedback,
  Hypothesis,
  HypothesisContent,
  Review,
} from '@agora/shared/src/types/hypothesis.types.js';
import type {
  Match,
  MatchApplication,
  MatchTranscript,
  Rating,
} from '@agora/shared/src/types/tournament.types.js';
import type {
  ClusterState,
  ProximityEdge,
  ProximityIndexEntry,
} from '@agora/shared/src/types/proximity.types.js';
import type { Budget, Task } from '@agora/shared/src/types/task.types.js';
import { TASK_STATUSES, TASK_TYPES } from '@agora/shared/src/types/task.types.js';
import type {
  ControlRecord,
  MetaReview,
  MetaReviewCoverage,
  PhaseRecord,
  ResearchOverview,
  ResearchOverviewContent,
} from '@agora/shared/src/types/session.types.js';
import type { StatisticsSnapshot } from '@agora/shared/src/types/statistics.types.js';
import { defineRecordKind, recordKey } from './context-memory.js';
import type { RecordKey } from './context-memory.js';

export const SINGLETON_ID = 'current';

export const EvolutionStrategySchema = z.enum([
  'synthesis',
  'specialization',
  'generalization',
  'cross-pollination',
  'constraint-relaxation',
  'mechanism-elaboration',
]);

export const HypothesisContentSchema: z.ZodType<HypothesisContent> = z.object({
  title: z.string().min(1),
  description: z.string().min(1),
  rationale: z.string().optional(),
});

const ResearchGoalSchema: z.ZodType<ResearchGoal> = z.object({
  id: z.string(),
  version: z.number().int().positive(),
  text: z.string(),
  constraints: z.object({
    evaluationCriteria: z.array(z.string()),
    preferences: z.array(z.string()),
    domain: z.string().optional(),
  }),
  supersedesId: z.string().optional(),
  createdAt: z.string(),
});

const GoalPointerSchema: z.ZodType<GoalPointer> = z.object({
  currentGoalId: z.string(),
  version: z.number().int().positive(),
});

const HypothesisSchema: z.ZodType<Hypothesis> = z.object({
  id: z.string(),
  goalId: z.string(),
  content: HypothesisContentSchema,
  provenance: z.discriminatedUnion('kind', [
    z.object({ kind: z.literal('generated') }),
    z.object({
      kind: z.literal('evolved'),
      parentIds: z.array(z.string()).min(1),
      strategy: EvolutionStrategySchema,
    }),
  ]),
  createdAt: z.string(),
  creationSequence: z.number().int(),
  status: z.enum(['active', 'superseded', 'rejected']),
  statusReason: z.string().optional(),
});

const ScoreSchema = z.number().min(1).max(10);

const ReviewSchema: z.ZodType<Review> = z.object({
  id: z.string(),
  hypothesisId: z.string(),
  reviewer: z.string(),
  critique: z.object({
    strengths: z.array(z.string()),
    weaknesses: z.array(z.string()),
    suggestions: z.array(z.string()),
  }),
  scores: z.object({
    scientificMerit: ScoreSchema,
    novelty: ScoreSchema,
    testability: ScoreSchema,
    impact: ScoreSchema,
    limitations: ScoreSchema,
  }),
  overallScore: z.number(),
  recommendation: z.enum(['accept', 'revise', 'reject']),
  createdAt: z.string(),
});

const FeedbackSchema: z.ZodType<Feedback> = z.object({
  id: z.string(),
  text: z.string(),
  targetHypothesisId: z.string().optional(),
  action: z.enum(['comment', 'reject']),
  goalId: z.string(),
  createdAt: z.string(),
});

const RatingSchema: z.ZodType<Rating> = z.object({
  hypothesisId: z.string(),
  rating: z.number(),
  matchesPlayed: z.number().int().min(0),
  wins: z.number().int().min(0),
  losses: z.number().int().min(0),
  draws: z.number().int().min(0),
  lastSequence: z.number().int().min(0),
  lastMatchId: z.string().optional(),
  updatedAt: z.string(),
});

const MatchSchema: z.ZodType<Match> = z.object({
  id: z.string(),
  hypothesisA: z.string(),
  hypothesisB: z.string(),
  outcome: z.enum(['a-wins', 'b-wins', 'draw', 'inconclusive']),
  confidence: z.number().min(0).max(1),
  rationale: z.string().optional(),
  transcriptKey: z.string().optional(),
  taskId: z.string().optional(),
  recordedAt: z.string(),
});

const MatchTranscriptSchema: z.ZodType<MatchTranscript> = z.object({
  matchId: z.string(),
  transcript: z.string(),
});

const MatchApplicationSchema: z.ZodType<MatchApplication> = z.object({
  matchId: z.string(),
  hypothesisA: z.string(),
  hypothesisB: z.string(),
  sequence: z.number().int().positive(),
  deltaA: z.number(),
  deltaB: z.number(),
  ratingA: z.number(),
  ratingB: z.number(),
  appliedAt: z.string(),
});

const ProximityEdgeSchema: z.ZodType<ProximityEdge> = z.object({
  id: z.string(),
  a: z.string(),
  b: z.string(),
  similarity: z.number().min(0).max(1),
  computedAt: z.string(),
  pruned: z.boolean(),
});

const ClusterStateSchema: z.ZodType<ClusterState> = z.object({
  generation: z.number().int().min(0),
  clusters: z.array(
    z.object({
      id: z.string(),
      representativeId: z.string(),
      memberIds: z.array(z.string()).min(1),
    }),
  ),
  updatedAt: z.string(),
});

const ProximityIndexEntrySchema: z.ZodType<ProximityIndexEntry> = z.object({
  hypothesisId: z.string(),
  candidatesScored: z.number().int().min(0),
  indexedAt: z.string(),
});

const TaskTypeSchema = z.enum(TASK_TYPES);
const TaskStatusSchema = z.enum(TASK_STATUSES);

const TaskSchema: z.ZodType<Task> = z.object({
  id: z.string(),
  type: TaskTypeSchema,
  targetIds: z.array(z.string()),
  priority: z.number(),
  status: TaskStatusSchema,
  retryCount: z.number().int().min(0),
  enqueueSequence: z.number().int(),
  enqueuedAt: z.string(),
  claimedBy: z.string().optional(),
  startedAt: z.string().optional(),
  finishedAt: z.string().optional(),
  lastError: z.string().optional(),
  output: z.unknown(),
  applied: z.boolean(),
  applyAttempts: z.number().int().min(0).optional(),
  final: z.boolean(),
  history: z.array(
    z.object({
      status: TaskStatusSchema,
      at: z.string(),
      reason: z.string().optional(),
    }),
  ),
});

const BudgetSchema: z.ZodType<Budget> = z.object({
  maxInvocations: z.number().int().min(0),
  finalReserve: z.number().int().min(0),
  used: z.number().int().min(0),
  finalUsed: z.number().int().min(0),
});

const ControlRecordSchema: z.ZodType<ControlRecord> = z.object({
  stopRequested: z.boolean(),
  goalInvalidated: z.boolean(),
  reason: z.string().optional(),
  requestedAt: z.string().optional(),
});

const PhaseRecordSchema: z.ZodType<PhaseRecord> = z.object({
  phase: z.enum(['initializing', 'running', 'converged', 'exhausted', 'terminated']),
  reason: z.string().optional(),
  cycle: z.number().int().min(0),
  updatedAt: z.string(),
});

export const ResearchOverviewContentSchema: z.ZodType<ResearchOverviewContent> = z.object({
  summary: z.string(),
  themes: z.array(z.string()),
  strengths: z.array(z.string()),
  recommendations: z.array(z.string()),
  hypothesisNotes: z.array(z.object({ hypothesisId: z.string(), note: z.string() })),
});

const MetaReviewSchema: z.ZodType<MetaReview> = z.object({
  id: z.string(),
  taskId: z.string(),
  final: z.boolean(),
  overview: ResearchOverviewContentSchema,
  coveredHypothesisIds: z.array(z.string()),
  createdAt: z.string(),
});

const MetaReviewCoverageSchema: z.ZodType<MetaReviewCoverage> = z.object({
  hypothesisId: z.string(),
  metaReviewId: z.string(),
  coveredAt: z.string(),
});

const ResearchOverviewSchema: z.ZodType<ResearchOverview> = z.object({
  sessionId: z.string(),
  goalId: z.string(),
  final: z.boolean(),
  phase: z.enum(['initializing', 'running', 'converged', 'exhausted', 'terminated']),
  overview: ResearchOverviewContentSchema.nullable(),
  topHypotheses: z.array(
    z.object({
      hypothesisId: z.string(),
      title: z.string(),
      rating: z.number(),
      matchesPlayed: z.number().int(),
    }),
  ),
  generatedAt: z.string(),
});

const CountsByStatusSchema = z.object({
  queued: z.number().int(),
  'in-progress': z.number().int(),
  done: z.number().int(),
  failed: z.number().int(),
  dead: z.number().int(),
});

const YieldSchema = z.object({
  done: z.number().int(),
  dead: z.number().int(),
  rate: z.number(),
});

export const StatisticsSnapshotSchema: z.ZodType<StatisticsSnapshot> = z.object({
  cycle: z.number().int(),
  computedAt: z.string(),
  hypotheses: z.object({
    active: z.number().int(),
    superseded: z.number().int(),
    rejected: z.number().int(),
    total: z.number().int(),
  }),
  pendingReviews: z.number().int(),
  unindexed: z.number().int(),
  matches: z.object({
    total: z.number().int(),
    conclusive: z.number().int(),
    inconclusive: z.number().int(),
  }),
  tasks: z.object({
    generate: CountsByStatusSchema,
    review: CountsByStatusSchema,
    compare: CountsByStatusSchema,
    evolve: CountsByStatusSchema,
    'update-proximity': CountsByStatusSchema,
    'meta-review': CountsByStatusSchema,
  }),
  yield: z.object({
    generate: YieldSchema,
    review: YieldSchema,
    compare: YieldSchema,
    evolve: YieldSchema,
    'update-proximity': YieldSchema,
    'meta-review': YieldSchema,
  }),
  backlog: z.object({ queued: z.number().int(), inProgress: z.number().int() }),
  avgRatingDelta: z.number(),
  previousAvgRatingDelta: z.number().nullable(),
  clusterCount: z.number().int(),
  previousClusterCount: z.number().int().nullable(),
  topK: z.array(z.object({ hypothesisId: z.string(), rating: z.number() })),
  topRatingChange: z.number().nullable(),
  topMembershipChanged: z.boolean(),
  stableCycles: z.number().int(),
  metaReviewCoverage: z.number(),
  budget: z.object({ used: z.number().int(), max: z.number().int(), remaining: z.number().int() }),
  timelineSequence: z.number().int(),
});

export const Kinds = {
  goal: defineRecordKind('goal', ResearchGoalSchema),
  goalPointer: defineRecordKind('goal-pointer', GoalPointerSchema),
  hypothesis: defineRecordKind('hypothesis', HypothesisSchema),
  review: defineRecordKind('review', ReviewSchema),
  feedback: defineRecordKind('feedback', FeedbackSchema),
  rating: defineRecordKind('rating', RatingSchema),
  match: defineRecordKind('match', MatchSchema),
  matchTranscript: defineRecordKind('match-transcript', MatchTranscriptSchema),
  matchApplication: defineRecordKind('match-application', MatchApplicationSchema),
  proximityEdge: defineRecordKind('proximity-edge', ProximityEdgeSchema),
  proximityClusters: defineRecordKind('proximity-clusters', ClusterStateSchema),
  proximityIndex: defineRecordKind('proximity-index', ProximityIndexEntrySchema),
  task: defineRecordKind('task', TaskSchema),
  budget: defineRecordKind('budget', BudgetSchema),
  control: defineRecordKind('control', ControlRecordSchema),
  phase: defineRecordKind('phase', PhaseRecordSchema),
  metaReview: defineRecordKind('meta-review', MetaReviewSchema),
  metaReviewCoverage: defineRecordKind('meta-review-coverage', MetaReviewCoverageSchema),
  overview: defineRecordKind('overview', ResearchOverviewSchema),
};

export const Keys = {
  goal: (id: string): RecordKey<ResearchGoal> => recordKey(Kinds.goal, id),
  goalPointer: (): RecordKey<GoalPointer> => recordKey(Kinds.goalPointer, SINGLETON_ID),
  hypothesis: (id: string): RecordKey<Hypothesis> => recordKey(Kinds.hypothesis, id),
  review: (id: string): RecordKey<Review> => recordKey(Kinds.review, id),
  feedback: (id: string): RecordKey<Feedback> => recordKey(Kinds.feedback, id),
  rating: (hypothesisId: string): RecordKey<Rating> => recordKey(Kinds.rating, hypothesisId),
  match: (id: string): RecordKey<Match> => recordKey(Kinds.match, id),
  matchTranscript: (matchId: string): RecordKey<MatchTranscript> =>
    recordKey(Kinds.matchTranscript, matchId),
  matchApplication: (matchId: string): RecordKey<MatchApplication> =>
    recordKey(Kinds.matchApplication, matchId),
  proximityEdge: (id: string): RecordKey<ProximityEdge> => recordKey(Kinds.proximityEdge, id),
  proximityClusters: (): RecordKey<ClusterState> =>
    recordKey(Kinds.proximityClusters, SINGLETON_ID),
  proximityIndex: (hypothesisId: string): RecordKey<ProximityIndexEntry> =>
    recordKey(Kinds.proximityIndex, hypothesisId),
  task: (id: string): RecordKey<Task> => recordKey(Kinds.task, id),
  budget: (): RecordKey<Budget> => recordKey(Kinds.budget, SINGLETON_ID),
  control: (): RecordKey<ControlRecord> => recordKey(Kinds.control, SINGLETON_ID),
  phase: (): RecordKey<PhaseRecord> => recordKey(Kinds.phase, SINGLETON_ID),
  metaReview: (id: string): RecordKey<MetaReview> => recordKey(Kinds.metaReview, id),
  metaReviewCoverage: (hypothesisId: string): RecordKey<MetaReviewCoverage> =>
    recordKey(Kinds.metaReviewCoverage, hypothesisId),
  overview: (): RecordKey<ResearchOverview> => recordKey(Kinds.overview, SINGLETON_ID),
};
