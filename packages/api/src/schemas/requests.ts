import { z } from '@hono/zod-openapi';
import { TASK_STATUSES, TASK_TYPES } from '@agora/shared/src/types/task.types.js';

const GoalConstraintsRequestSchema = z
  .object({
    evaluationCriteria: z.array(z.string().min(1)).optional(),
    preferences: z.array(z.string().min(1)).optional(),
    domain: z.string().min(1).optional(),
  })
  .openapi('GoalConstraints');

export const CreateSessionSchema = z
  .object({
    goal: z.string().min(1).openapi({ example: 'Explain how biofilms tolerate antibiotics' }),
    constraints: GoalConstraintsRequestSchema.optional(),
  })
  .openapi('CreateSessionRequest');

export type CreateSessionRequest = z.infer<typeof CreateSessionSchema>;

export const SubmitFeedbackSchema = z
  .object({
    text: z.string().min(1),
    targetHypothesisId: z.string().min(1).optional(),
    action: z.enum(['comment', 'reject']).optional(),
    revisedGoal: z
      .object({
        text: z.string().min(1),
        constraints: GoalConstraintsRequestSchema.optional(),
      })
      .optional(),
  })
  .openapi('SubmitFeedbackRequest');

export type SubmitFeedbackRequest = z.infer<typeof SubmitFeedbackSchema>;

export const StopSessionSchema = z
  .object({
    reason: z.string().min(1).optional(),
  })
  .openapi('StopSessionRequest');

export const ResumeSessionSchema = z
  .object({
    checkpointId: z.string().min(1).optional(),
  })
  .openapi('ResumeSessionRequest');

export const SessionParamsSchema = z.object({
  sessionId: z.string().min(1),
});

export const HypothesisParamsSchema = z.object({
  sessionId: z.string().min(1),
  hypothesisId: z.string().min(1),
});

export const ListHypothesesQuerySchema = z
  .object({
    limit: z.coerce.number().int().min(1).max(100).optional().default(10),
  })
  .openapi('ListHypothesesQuery');

export const ClusterQuerySchema = z
  .object({
    threshold: z.coerce.number().min(0).max(1).optional(),
  })
  .openapi('ClusterQuery');

export const ListTasksQuerySchema = z
  .object({
    status: z.enum(TASK_STATUSES).optional(),
    type: z.enum(TASK_TYPES).optional(),
  })
  .openapi('ListTasksQuery');
