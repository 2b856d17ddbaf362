import type { z } from 'zod';
import type { OrchestrationConfig } from '@agora/schemas/src/orchestration-config.schema.js';
import type { AgentRoster } from '@agora/shared/src/types/agent.types.js';
import type { Task, TaskType } from '@agora/shared/src/types/task.types.js';
import type { ContextMemory } from '../memory/context-memory.js';
import type { ProximityGraph } from '../proximity/types.js';
import type { FeedbackRepository } from '../repositories/feedback.repository.js';
import type { GoalRepository } from '../repositories/goal.repository.js';
import type { HypothesisRepository } from '../repositories/hypothesis.repository.js';
import type { ReviewRepository } from '../repositories/review.repository.js';
import type { TournamentEngine } from '../tournament/types.js';

/** Everything a handler may read or mutate. Coordination happens only through memory. */
export interface HandlerContext {
  readonly sessionId: string;
  readonly memory: ContextMemory;
  readonly roster: AgentRoster;
  readonly tournament: TournamentEngine;
  readonly proximity: ProximityGraph;
  readonly goals: GoalRepository;
  readonly hypotheses: HypothesisRepository;
  readonly reviews: ReviewRepository;
  readonly feedback: FeedbackRepository;
  readonly config: OrchestrationConfig;
  readonly now: () => Date;
}

/**
 * One task type. `execute` gathers context and invokes the agent without
 * mutating anything; `apply` commits the stored output and must be
 * idempotent, since recovery may run it again.
 */
export interface TaskHandler<O> {
  readonly type: TaskType;
  readonly outputSchema: z.ZodType<O>;
  execute(task: Task, ctx: HandlerContext, signal: AbortSignal): Promise<O>;
  apply(task: Task, output: O, ctx: HandlerContext): Promise<void>;
  /** Runs once when the task is marked dead. */
  onDead?(task: Task, ctx: HandlerContext): Promise<void>;
}

/** A handler with its output type erased at the dispatch boundary. */
export interface RegisteredHandler {
  readonly type: TaskType;
  execute(task: Task, ctx: HandlerContext, signal: AbortSignal): Promise<unknown>;
  /** Validates the stored output before applying it. */
  apply(task: Task, storedOutput: unknown, ctx: HandlerContext): Promise<void>;
  onDead(task: Task, ctx: HandlerContext): Promise<void>;
}

export type TaskHandlers = { readonly [K in TaskType]: RegisteredHandler };
