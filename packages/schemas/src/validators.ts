import type { ZodError } from 'zod';
import { SchemaValidationError } from '@agora/shared/src/utils/errors.js';
import { FeedbackInputSchema } from './feedback.schema.js';
import type { FeedbackInput } from './feedback.schema.js';
import { OrchestrationConfigSchema } from './orchestration-config.schema.js';
import type { OrchestrationConfig } from './orchestration-config.schema.js';
import { ResearchGoalInputSchema } from './research-goal.schema.js';
import type { ResearchGoalInput } from './research-goal.schema.js';

export function formatZodErrors(error: ZodError): readonly string[] {
  return error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
}

export function validateOrchestrationConfig(data: unknown): OrchestrationConfig {
  const result = OrchestrationConfigSchema.safeParse(data);

  if (!result.success) {
    throw new SchemaValidationError(
      'Invalid orchestration configuration',
      formatZodErrors(result.error),
    );
  }

  return result.data;
}

export function validateResearchGoal(data: unknown): ResearchGoalInput {
  const result = ResearchGoalInputSchema.safeParse(data);

  if (!result.success) {
    throw new SchemaValidationError('Invalid research goal', formatZodErrors(result.error));
  }

  return result.data;
}

export function validateFeedback(data: unknown): FeedbackInput {
  const result = FeedbackInputSchema.safeParse(data);

  if (!result.success) {
    throw new SchemaValidationError('Invalid feedback', formatZodErrors(result.error));
  }

  return result.data;
}
