import { z } from 'zod';

export const GoalConstraintsSchema = z.object({
  evaluationCriteria: z.array(z.string().min(1)).default([]),
  preferences: z.array(z.string().min(1)).default([]),
  domain: z.string().min(1).optional(),
});

export const ResearchGoalInputSchema = z.object({
  text: z.string().trim().min(10, 'Research goal must be at least 10 characters'),
  constraints: GoalConstraintsSchema.default({}),
});

export type ResearchGoalInput = z.infer<typeof ResearchGoalInputSchema>;
export type GoalConstraintsInput = z.input<typeof GoalConstraintsSchema>;
