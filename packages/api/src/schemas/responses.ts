import { z } from '@hono/zod-openapi';
import { TASK_STATUSES, TASK_TYPES } from '@agora/shared/src/types/task.types.js';

const SessionStatusSchema = z.enum(['active', 'converged', 'exhausted', 'terminated', 'failed']);
const SupervisorPhaseSchema = z.enum([
  'initializing',
  'running',
  'converged',
  'exhausted',
  'terminated',
]);

export const ErrorResponseSchema = z
  .object({
    error: z.string(),
    code: z.string(),
    requestId: z.string(),
    details: z.array(z.string()).optional(),
  })
  .openapi('ErrorResponse');

// Health
export const HealthResponseSchema = z
  .object({
    status: z.enum(['ok', 'draining']),
    service: z.string(),
    version: z.string(),
    memory: z.enum(['memory', 'firestore']),
    runningSessions: z.number().int(),
  })
  .openapi('HealthResponse');

// Sessions
export const CreateSessionResponseSchema = z
  .object({
    sessionId: z.string(),
    status: SessionStatusSchema,
    goalId: z.string(),
  })
  .openapi('CreateSessionResponse');

const StatisticsSummarySchema = z
  .object({
    cycle: z.number(),
    computedAt: z.string(),
    hypotheses: z.object({
      active: z.number(),
      superseded: z.number(),
      rejected: z.number(),
      total: z.number(),
    }),
    matches: z.object({
      total: z.number(),
      conclusive: z.number(),
      inconclusive: z.number(),
    }),
    backlog: z.object({ queued: z.number(), inProgress: z.number() }),
    clusterCount: z.number(),
    topK: z.array(z.object({ hypothesisId: z.string(), rating: z.number() })),
    stableCycles: z.number(),
    metaReviewCoverage: z.number(),
    budget: z.object({ used: z.number(), max: z.number(), remaining: z.number() }),
  })
  .openapi('StatisticsSummary');

export type StatisticsSummary = z.infer<typeof StatisticsSummarySchema>;

export const SessionDetailResponseSchema = z
  .object({
    sessionId: z.string(),
    goalText: z.string(),
    status: SessionStatusSchema,
    running: z.boolean(),
    phase: SupervisorPhaseSchema.nullable(),
    phaseReason: z.string().optional(),
    cycle: z.number().nullable(),
    failureReason: z.string().optional(),
    createdAt: z.string(),
    updatedAt: z.string(),
    statistics: StatisticsSummarySchema.nullable(),
  })
  .openapi('SessionDetailResponse');

export const FeedbackResponseSchema = z
  .object({
    feedbackId: z.string(),
    action: z.enum(['comment', 'reject']),
    goalId: z.string(),
    revisedGoalId: z.string().optional(),
  })
  .openapi('FeedbackResponse');

export const OverviewResponseSchema = z
  .object({
    sessionId: z.string(),
    goalId: z.string(),
    final: z.boolean(),
    phase: SupervisorPhaseSchema,
    overview: z
      .object({
        summary: z.string(),
        themes: z.array(z.string()),
        strengths: z.array(z.string()),
        recommendations: z.array(z.string()),
        hypothesisNotes: z.array(z.object({ hypothesisId: z.string(), note: z.string() })),
      })
      .nullable(),
    topHypotheses: z.array(
      z.object({
        hypothesisId: z.string(),
        title: z.string(),
        rating: z.number(),
        matchesPlayed: z.number(),
      }),
    ),
    generatedAt: z.string(),
  })
  .openapi('OverviewResponse');

export const HypothesisListResponseSchema = z
  .object({
    sessionId: z.string(),
    hypotheses: z.array(
      z.object({
        hypothesisId: z.string(),
        title: z.string(),
        description: z.string(),
        rating: z.number(),
        matchesPlayed: z.number(),
      }),
    ),
  })
  .openapi('HypothesisListResponse');

export const ClusterResponseSchema = z
  .object({
    hypothesisId: z.string(),
    memberIds: z.array(z.string()),
    nearDuplicates: z.array(z.object({ hypothesisId: z.string(), similarity: z.number() })),
  })
  .openapi('ClusterResponse');

export const TaskListResponseSchema = z
  .object({
    sessionId: z.string(),
    tasks: z.array(
      z.object({
        id: z.string(),
        type: z.enum(TASK_TYPES),
        status: z.enum(TASK_STATUSES),
        targetIds: z.array(z.string()),
        priority: z.number(),
        retryCount: z.number(),
        applyAttempts: z.number().optional(),
        final: z.boolean(),
        enqueuedAt: z.string(),
        lastError: z.string().optional(),
      }),
    ),
  })
  .openapi('TaskListResponse');

export const StopSessionResponseSchema = z
  .object({
    sessionId: z.string(),
    stopRequested: z.boolean(),
    reason: z.string().optional(),
  })
  .openapi('StopSessionResponse');

export const ResumeSessionResponseSchema = z
  .object({
    sessionId: z.string(),
    status: SessionStatusSchema,
  })
  .openapi('ResumeSessionResponse');
