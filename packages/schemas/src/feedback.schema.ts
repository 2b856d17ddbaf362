import { z } from 'zod';
import { GoalConstraintsSchema } from './research-goal.schema.js';

export const FeedbackInputSchema = z
  .object({
    text: z.string().trim().min(1, 'Feedback text must not be empty'),
    targetHypothesisId: z.string().min(1).optional(),
    action: z.enum(['comment', 'reject']).default('comment'),
    revisedGoal: z
      .object({
        text: z.string().trim().min(10, 'Research goal must be at least 10 characters'),
        constraints: GoalConstraintsSchema.optional(),
      })
      .optional(),
  })
  .refine((f) => f.action !== 'reject' || f.targetHypothesisId !== undefined, {
    message: 'A reject action needs a target hypothesis',
    path: ['targetHypothesisId'],
  });

export type FeedbackInput = z.infer<typeof FeedbackInputSchema>;
export type FeedbackInputRaw = z.input<typeof FeedbackInputSchema>;
