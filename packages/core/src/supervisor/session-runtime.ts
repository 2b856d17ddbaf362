import type { OrchestrationConfig } from '@agora/schemas/src/orchestration-config.schema.js';
import type { AgentRoster } from '@agora/shared/src/types/agent.types.js';
import type { ContextMemory } from '../memory/context-memory.js';
import { createProximityGraph } from '../proximity/proximity-graph.js';
import { createFeedbackRepository } from '../repositories/feedback.repository.js';
import { createGoalRepository } from '../repositories/goal.repository.js';
import { createHypothesisRepository } from '../repositories/hypothesis.repository.js';
import { createReviewRepository } from '../repositories/review.repository.js';
import { createTournamentEngine } from '../tournament/tournament-engine.js';
import type { BudgetLedger } from '../workers/budget.js';
import { createBudgetLedger } from '../workers/budget.js';
import { createBudgetedRoster } from '../workers/budgeted-roster.js';
import { createTaskHandlers } from '../workers/task-handlers.js';
import type { TaskQueue } from '../workers/task-queue.js';
import { createTaskQueue } from '../workers/task-queue.js';
import type { HandlerContext } from '../workers/types.js';
import type { WorkerPool } from '../workers/worker-pool.js';
import { createWorkerPool } from '../workers/worker-pool.js';
import type { Supervisor } from './supervisor.js';
import { createSupervisor } from './supervisor.js';

export interface SessionRuntimeDeps {
  readonly sessionId: string;
  readonly memory: ContextMemory;
  /** Unbudgeted agents; the runtime charges every call to the session budget. */
  readonly roster: AgentRoster;
  readonly config: OrchestrationConfig;
  readonly now?: () => Date;
  /** Replaces the cadence sleep between supervisor cycles. */
  readonly pace?: (pool: WorkerPool) => Promise<void>;
}

export interface SessionRuntime {
  readonly context: HandlerContext;
  readonly queue: TaskQueue;
  readonly ledger: BudgetLedger;
  readonly pool: WorkerPool;
  readonly supervisor: Supervisor;
}

/** Wires one session's components around a single memory instance. */
export function createSessionRuntime(deps: SessionRuntimeDeps): SessionRuntime {
  const { sessionId, memory, config } = deps;
  const now = deps.now ?? ((): Date => new Date());
  const ledger = createBudgetLedger(memory);

  const context: HandlerContext = {
    sessionId,
    memory,
    roster: createBudgetedRoster(deps.roster, ledger),
    tournament: createTournamentEngine({ memory, config: config.tournament, now }),
    proximity: createProximityGraph({ memory, config: config.proximity, now }),
    goals: createGoalRepository(memory, now),
    hypotheses: createHypothesisRepository(memory, now),
    reviews: createReviewRepository(memory),
    feedback: createFeedbackRepository(memory, now),
    config,
    now,
  };

  const queue = createTaskQueue({
    memory,
    retryLimit: config.workers.retryLimit,
    applyAttemptLimit: config.workers.applyAttemptLimit,
    now,
  });
  const pool = createWorkerPool({
    queue,
    handlers: createTaskHandlers(),
    context,
    config: config.workers,
  });
  const pace = deps.pace;
  const supervisor = createSupervisor({
    context,
    queue,
    pool,
    ledger,
    ...(pace && { pace: () => pace(pool) }),
  });

  return { context, queue, ledger, pool, supervisor };
}
