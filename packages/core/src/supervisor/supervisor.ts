import { StateGraph, START, END } from '@langchain/langgraph';
import type { ResearchOverview, SupervisorPhase } from '@agora/shared/src/types/session.types.js';
import type { StatisticsSnapshot } from '@agora/shared/src/types/statistics.types.js';
import { createChildLogger } from '@agora/shared/src/logger.js';
import { toError } from '@agora/shared/src/utils/errors.js';
import { createSeededRandom } from '@agora/shared/src/utils/math.js';
import type { BudgetLedger } from '../workers/budget.js';
import type { TaskQueue } from '../workers/task-queue.js';
import type { HandlerContext } from '../workers/types.js';
import type { WorkerPool } from '../workers/worker-pool.js';
import {
  TASK_PRIORITIES,
  batchCapacity,
  planBatch,
  planFinalMetaReview,
  seedTaskIds,
} from './batch-planner.js';
import { decidePhase } from './convergence.js';
import { composeOverview, writeOverview } from './overview.js';
import { recoverSession } from './recovery.js';
import { readControl, writePhase } from './session-control.js';
import { createStatisticsCollector } from './statistics.js';
import { SupervisorGraphAnnotation, type SupervisorGraphState } from './supervisor-state.js';
import { computeTaskWeights, sampleTaskTypes } from './task-weights.js';

const log = createChildLogger('supervisor:loop');

export interface SupervisorDeps {
  readonly context: HandlerContext;
  readonly queue: TaskQueue;
  readonly pool: WorkerPool;
  readonly ledger: BudgetLedger;
  /** Waits between cycles. Defaults to sleeping for the configured cadence. */
  readonly pace?: () => Promise<void>;
}

export interface SupervisorRunOptions {
  readonly resume?: boolean;
  readonly restoredFrom?: number;
}

export interface SupervisorResult {
  readonly phase: SupervisorPhase;
  readonly reason?: string;
  readonly cycle: number;
  readonly overview: ResearchOverview | null;
}

export interface Supervisor {
  run(options?: SupervisorRunOptions): Promise<SupervisorResult>;
}

async function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function routeAfterCycle(state: SupervisorGraphState): string {
  return state.phase === 'running' ? 'cycle' : 'finalize';
}

export function createSupervisor(deps: SupervisorDeps): Supervisor {
  const { context, queue, pool, ledger } = deps;
  const { memory, config, sessionId } = context;
  const pace = deps.pace ?? ((): Promise<void> => sleep(config.supervisor.cadenceMs));
  const statistics = createStatisticsCollector({ context, queue, ledger });

  async function initializeNode(state: SupervisorGraphState): Promise<Partial<SupervisorGraphState>> {
    await writePhase(memory, 'initializing', state.cycle, context.now());
    const goal = await context.goals.requireCurrent();
    await ledger.initialize(config.budget);

    let cycle = 0;
    let previous: StatisticsSnapshot | null = null;
    if (state.resume) {
      const recovered = await recoverSession({
        memory,
        pool,
        tournament: context.tournament,
        ...(state.restoredFrom !== undefined && { restoredFrom: state.restoredFrom }),
      });
      cycle = recovered.cycle;
      previous = recovered.previous;
    } else {
      for (const id of seedTaskIds(config.supervisor.initialGenerateTasks)) {
        await queue.enqueue({ id, type: 'generate', targetIds: [], priority: TASK_PRIORITIES.generate });
      }
    }

    pool.start();
    await writePhase(memory, 'running', cycle, context.now());
    log.info({ sessionId, goalId: goal.id, resume: state.resume, cycle }, 'Supervisor started');
    return { cycle, previous, phase: 'running' };
  }

  async function cycleNode(state: SupervisorGraphState): Promise<Partial<SupervisorGraphState>> {
    const cycle = state.cycle + 1;
    await pool.reconcile();
    await pool.applyPending();

    const snapshot = await statistics.collect(cycle, state.previous);
    await memory.appendToTimeline('statistics', snapshot);

    const decision = decidePhase(snapshot, await readControl(memory), config);
    if (decision) {
      log.info({ sessionId, cycle, ...decision }, 'Supervisor leaving the running phase');
      return { cycle, previous: snapshot, phase: decision.phase, reason: decision.reason };
    }

    const weights = computeTaskWeights(snapshot, config);
    const capacity = batchCapacity(snapshot.backlog.queued + snapshot.backlog.inProgress, config);
    const types = sampleTaskTypes(weights, capacity, createSeededRandom(config.supervisor.seed + cycle));
    const pending = [
      ...(await queue.list({ status: 'queued' })),
      ...(await queue.list({ status: 'in-progress' })),
    ];
    const requests = await planBatch({ cycle, types, pending }, context);

    let enqueued = 0;
    for (const request of requests) {
      const { created } = await queue.enqueue(request);
      if (created) {
        enqueued++;
      }
    }

    if (cycle % config.supervisor.checkpointEveryCycles === 0) {
      await memory.checkpoint(`cycle-${String(cycle)}`);
    }
    if (cycle % config.proximity.recomputeEveryCycles === 0) {
      await context.proximity.recompute();
    }

    log.debug(
      {
        sessionId,
        cycle,
        weights,
        sampled: types.length,
        enqueued,
        stableCycles: snapshot.stableCycles,
      },
      'Supervisor cycle complete',
    );

    await pace();
    return { cycle, previous: snapshot };
  }

  async function finalizeNode(state: SupervisorGraphState): Promise<Partial<SupervisorGraphState>> {
    const { phase, cycle } = state;
    let overview: ResearchOverview | null = null;

    if (phase === 'converged' || phase === 'exhausted') {
      const request = await planFinalMetaReview(cycle, context);
      if (request) {
        await queue.enqueue(request);
        const task = await pool.waitForTask(request.id);
        if (task.status === 'dead') {
          log.error({ sessionId, taskId: task.id, error: task.lastError }, 'Final meta-review failed');
        }
      }
      overview = await composeOverview(context, phase);
      await writeOverview(context, overview);
    }

    await pool.stop();
    await writePhase(memory, phase, cycle, context.now(), state.reason);
    await memory.checkpoint('final');
    log.info({ sessionId, phase, cycle, reason: state.reason }, 'Supervisor finished');
    return { overview };
  }

  const graph = new StateGraph(SupervisorGraphAnnotation)
    .addNode('initialize', initializeNode)
    .addNode('cycle', cycleNode)
    .addNode('finalize', finalizeNode)
    .addEdge(START, 'initialize')
    .addEdge('initialize', 'cycle')
    .addConditionalEdges('cycle', routeAfterCycle, {
      cycle: 'cycle',
      finalize: 'finalize',
    })
    .addEdge('finalize', END)
    .compile();

  return {
    async run(options: SupervisorRunOptions = {}): Promise<SupervisorResult> {
      try {
        const result = await graph.invoke(
          {
            sessionId,
            resume: options.resume ?? false,
            restoredFrom: options.restoredFrom,
            cycle: 0,
            phase: 'initializing',
            reason: undefined,
            previous: null,
            overview: null,
          },
          { recursionLimit: config.supervisor.maxCycles + 10 },
        );
        return {
          phase: result.phase,
          cycle: result.cycle,
          overview: result.overview,
          ...(result.reason !== undefined && { reason: result.reason }),
        };
      } catch (error) {
        log.error({ sessionId, err: toError(error) }, 'Supervisor failed');
        await pool.stop();
        throw error;
      }
    },
  };
}
