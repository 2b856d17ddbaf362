import type { OrchestrationConfigInput } from '@agora/schemas/src/orchestration-config.schema.js';
import { OrchestrationConfigSchema } from '@agora/schemas/src/orchestration-config.schema.js';
import type { AgentRoster } from '@agora/shared/src/types/agent.types.js';
import type { ContextMemory } from '../memory/context-memory.js';
import { createInMemoryContextMemory } from '../memory/in-memory-context-memory.js';
import { createProximityGraph } from '../proximity/proximity-graph.js';
import { createFeedbackRepository } from '../repositories/feedback.repository.js';
import { createGoalRepository } from '../repositories/goal.repository.js';
import { createHypothesisRepository } from '../repositories/hypothesis.repository.js';
import { createReviewRepository } from '../repositories/review.repository.js';
import { createTournamentEngine } from '../tournament/tournament-engine.js';
import type { HandlerContext } from '../workers/types.js';
import { createFakeRoster } from './fake-roster.js';

export interface TestContextOptions {
  readonly memory?: ContextMemory;
  readonly roster?: AgentRoster;
  readonly config?: OrchestrationConfigInput;
  readonly now?: () => Date;
}

export function createTestHandlerContext(options: TestContextOptions = {}): HandlerContext {
  const memory = options.memory ?? createInMemoryContextMemory();
  const config = OrchestrationConfigSchema.parse(options.config ?? {});
  const now = options.now ?? ((): Date => new Date());
  return {
    sessionId: 'session-1',
    memory,
    roster: options.roster ?? createFakeRoster(),
    tournament: createTournamentEngine({ memory, config: config.tournament, now }),
    proximity: createProximityGraph({ memory, config: config.proximity, now }),
    goals: createGoalRepository(memory, now),
    hypotheses: createHypothesisRepository(memory, now),
    reviews: createReviewRepository(memory),
    feedback: createFeedbackRepository(memory, now),
    config,
    now,
  };
}
