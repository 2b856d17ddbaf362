import type { OrchestrationConfig } from '@agora/schemas/src/orchestration-config.schema.js';
import type { GoalConstraintsInput } from '@agora/schemas/src/research-goal.schema.js';
import type { FeedbackInputRaw } from '@agora/schemas/src/feedback.schema.js';
import { validateFeedback, validateResearchGoal } from '@agora/schemas/src/validators.js';
import type { AgentRoster } from '@agora/shared/src/types/agent.types.js';
import type { ResearchGoal } from '@agora/shared/src/types/goal.types.js';
import type { Feedback } from '@agora/shared/src/types/hypothesis.types.js';
import type { SimilarityScore } from '@agora/shared/src/types/proximity.types.js';
import type {
  ControlRecord,
  PhaseRecord,
  ResearchOverview,
  Session,
  SessionStatus,
  SupervisorPhase,
} from '@agora/shared/src/types/session.types.js';
import type { StatisticsSnapshot } from '@agora/shared/src/types/statistics.types.js';
import type { Task } from '@agora/shared/src/types/task.types.js';
import type { RankedHypothesis } from '@agora/shared/src/types/tournament.types.js';
import { createChildLogger } from '@agora/shared/src/logger.js';
import { NotFoundError, SessionError, toError } from '@agora/shared/src/utils/errors.js';
import type { ContextMemory } from '../../memory/context-memory.js';
import { checkpointIdFor } from '../../memory/context-memory.js';
import type { SessionRepository, UpdateSessionInput } from '../../repositories/session.repository.js';
import { composeOverview, readOverview } from '../../supervisor/overview.js';
import { lastSnapshotBetween } from '../../supervisor/recovery.js';
import {
  claimResume,
  clearControl,
  invalidateGoal,
  readPhase,
  requestStop,
  RESUMING,
  writePhase,
} from '../../supervisor/session-control.js';
import type { SessionRuntime } from '../../supervisor/session-runtime.js';
import { createSessionRuntime } from '../../supervisor/session-runtime.js';
import type { SupervisorRunOptions } from '../../supervisor/supervisor.js';
import type { TaskFilter } from '../../workers/task-queue.js';
import type { WorkerPool } from '../../workers/worker-pool.js';

const log = createChildLogger('service:research');

export interface ResearchServiceDeps {
  readonly sessions: SessionRepository;
  /** Context memory of one session; called once per session and process. */
  readonly memoryFor: (sessionId: string) => ContextMemory;
  readonly roster: AgentRoster;
  readonly config: OrchestrationConfig;
  readonly now?: () => Date;
  readonly pace?: (pool: WorkerPool) => Promise<void>;
}

export interface StartedSession {
  readonly session: Session;
  readonly goal: ResearchGoal;
}

export interface FeedbackResult {
  readonly feedback: Feedback;
  /** The new goal version when the feedback revised the goal. */
  readonly goal?: ResearchGoal;
}

export interface SessionStatusView {
  readonly session: Session;
  readonly running: boolean;
  readonly phase: PhaseRecord | null;
  readonly statistics: StatisticsSnapshot | null;
}

export interface RankedHypothesisView extends RankedHypothesis {
  readonly title: string;
  readonly description: string;
}

export interface ServiceHealth {
  readonly runningSessions: number;
  /** Set once shutdown has begun; new and resumed sessions are refused. */
  readonly shuttingDown: boolean;
}

export interface ResumeOptions {
  readonly checkpointId?: string;
}

export interface ResearchService {
  setGoal(text: string, constraints?: GoalConstraintsInput): Promise<StartedSession>;
  submitFeedback(sessionId: string, input: FeedbackInputRaw): Promise<FeedbackResult>;
  requestOverview(sessionId: string): Promise<ResearchOverview>;
  getStatus(sessionId: string): Promise<SessionStatusView>;
  topRanked(sessionId: string, limit: number): Promise<readonly RankedHypothesisView[]>;
  clusterOf(sessionId: string, hypothesisId: string): Promise<readonly string[]>;
  nearDuplicatesOf(
    sessionId: string,
    hypothesisId: string,
    threshold?: number,
  ): Promise<readonly SimilarityScore[]>;
  listTasks(sessionId: string, filter?: TaskFilter): Promise<readonly Task[]>;
  stop(sessionId: string, reason?: string): Promise<ControlRecord>;
  resume(sessionId: string, options?: ResumeOptions): Promise<Session>;
  waitForCompletion(sessionId: string): Promise<Session>;
  health(): ServiceHealth;
  /** Stops every running session and waits for each to finish. */
  shutdown(): Promise<void>;
}

export function sessionStatusFor(phase: SupervisorPhase): SessionStatus {
  switch (phase) {
    case 'converged':
    case 'exhausted':
    case 'terminated':
      return phase;
    default:
      return 'active';
  }
}

async function checkpointSequence(memory: ContextMemory, checkpointId: string): Promise<number> {
  for await (const entry of memory.readTimeline(1)) {
    if (entry.kind === 'checkpoint' && checkpointIdFor(entry.sequence) === checkpointId) {
      return entry.sequence;
    }
  }
  throw new NotFoundError(`Checkpoint not found: ${checkpointId}`);
}

export function createResearchService(deps: ResearchServiceDeps): ResearchService {
  const { sessions, config } = deps;
  const runtimes = new Map<string, SessionRuntime>();
  const running = new Map<string, Promise<Session>>();
  const resuming = new Set<string>();
  let shuttingDown = false;

  async function requireSession(sessionId: string): Promise<Session> {
    const session = await sessions.getById(sessionId);
    if (!session) {
      throw new NotFoundError(`Session not found: ${sessionId}`);
    }
    return session;
  }

  function runtimeOf(sessionId: string): SessionRuntime {
    const existing = runtimes.get(sessionId);
    if (existing) {
      return existing;
    }
    const runtime = createSessionRuntime({
      sessionId,
      memory: deps.memoryFor(sessionId),
      roster: deps.roster,
      config,
      ...(deps.now && { now: deps.now }),
      ...(deps.pace && { pace: deps.pace }),
    });
    runtimes.set(sessionId, runtime);
    return runtime;
  }

  async function loadRuntime(sessionId: string): Promise<SessionRuntime> {
    await requireSession(sessionId);
    return runtimeOf(sessionId);
  }

  async function supervise(sessionId: string, options: SupervisorRunOptions): Promise<Session> {
    let update: UpdateSessionInput;
    try {
      const result = await runtimeOf(sessionId).supervisor.run(options);
      log.info({ sessionId, phase: result.phase, cycle: result.cycle }, 'Research session ended');
      update = { status: sessionStatusFor(result.phase) };
    } catch (error) {
      const err = toError(error);
      log.error({ sessionId, err }, 'Research session failed');
      update = { status: 'failed', failureReason: err.message };
    }
    await sessions.update(sessionId, update);
    return requireSession(sessionId);
  }

  function launch(sessionId: string, options: SupervisorRunOptions): void {
    if (shuttingDown) {
      throw new SessionError('Service is shutting down');
    }
    if (running.has(sessionId)) {
      throw new SessionError(`Session is already running: ${sessionId}`);
    }
    const completion = supervise(sessionId, options).finally(() => {
      running.delete(sessionId);
    });
    completion.catch((error: unknown) => {
      log.error({ sessionId, err: toError(error) }, 'Session status could not be recorded');
    });
    running.set(sessionId, completion);
  }

  return {
    async setGoal(text: string, constraints?: GoalConstraintsInput): Promise<StartedSession> {
      const input = validateResearchGoal({ text, constraints });
      if (shuttingDown) {
        throw new SessionError('Service is shutting down');
      }
      const created = await sessions.create({ goalText: input.text });
      const goal = await runtimeOf(created.id).context.goals.publish(input.text, input.constraints);
      launch(created.id, {});
      log.info({ sessionId: created.id, goalId: goal.id }, 'Research session started');
      return { session: created, goal };
    },

    async submitFeedback(sessionId: string, raw: FeedbackInputRaw): Promise<FeedbackResult> {
      const input = validateFeedback(raw);
      const { context } = await loadRuntime(sessionId);
      const goal = await context.goals.requireCurrent();
      if (input.targetHypothesisId !== undefined) {
        await context.hypotheses.require(input.targetHypothesisId);
      }

      const feedback = await context.feedback.add({
        text: input.text,
        goalId: goal.id,
        action: input.action,
        ...(input.targetHypothesisId !== undefined && {
          targetHypothesisId: input.targetHypothesisId,
        }),
      });

      if (input.action === 'reject' && input.targetHypothesisId !== undefined) {
        await context.hypotheses.setStatus(
          input.targetHypothesisId,
          'rejected',
          `rejected by scientist: ${input.text}`,
        );
      }

      if (!input.revisedGoal) {
        return { feedback };
      }
      const revised = await context.goals.publish(
        input.revisedGoal.text,
        input.revisedGoal.constraints ?? goal.constraints,
      );
      await invalidateGoal(context.memory, 'research goal was revised', context.now());
      return { feedback, goal: revised };
    },

    async requestOverview(sessionId: string): Promise<ResearchOverview> {
      const { context } = await loadRuntime(sessionId);
      const stored = await readOverview(context);
      if (stored?.final) {
        return stored;
      }
      const phase = await readPhase(context.memory);
      return composeOverview(context, phase?.phase ?? 'initializing');
    },

    async getStatus(sessionId: string): Promise<SessionStatusView> {
      const session = await requireSession(sessionId);
      const { memory } = runtimeOf(sessionId).context;
      return {
        session,
        running: running.has(sessionId),
        phase: await readPhase(memory),
        statistics: await lastSnapshotBetween(memory, 1),
      };
    },

    async topRanked(sessionId: string, limit: number): Promise<readonly RankedHypothesisView[]> {
      const { context } = await loadRuntime(sessionId);
      const ranked = await context.tournament.topRanked(limit);
      return Promise.all(
        ranked.map(async (r) => {
          const hypothesis = await context.hypotheses.require(r.hypothesisId);
          return {
            ...r,
            title: hypothesis.content.title,
            description: hypothesis.content.description,
          };
        }),
      );
    },

    async clusterOf(sessionId: string, hypothesisId: string): Promise<readonly string[]> {
      const { context } = await loadRuntime(sessionId);
      await context.hypotheses.require(hypothesisId);
      return context.proximity.clusterOf(hypothesisId);
    },

    async nearDuplicatesOf(
      sessionId: string,
      hypothesisId: string,
      threshold?: number,
    ): Promise<readonly SimilarityScore[]> {
      const { context } = await loadRuntime(sessionId);
      await context.hypotheses.require(hypothesisId);
      return context.proximity.nearDuplicatesOf(
        hypothesisId,
        threshold ?? config.proximity.dedupThreshold ?? config.proximity.similarityThreshold,
      );
    },

    async listTasks(sessionId: string, filter: TaskFilter = {}): Promise<readonly Task[]> {
      const { queue } = await loadRuntime(sessionId);
      return queue.list(filter);
    },

    async stop(sessionId: string, reason = 'stopped by operator'): Promise<ControlRecord> {
      const { context } = await loadRuntime(sessionId);
      return requestStop(context.memory, reason, context.now());
    },

    async resume(sessionId: string, options: ResumeOptions = {}): Promise<Session> {
      const { context } = await loadRuntime(sessionId);
      if (shuttingDown) {
        throw new SessionError('Service is shutting down');
      }
      if (running.has(sessionId)) {
        throw new SessionError(`Session is already running: ${sessionId}`);
      }
      if (resuming.has(sessionId)) {
        throw new SessionError(`Session is already being resumed: ${sessionId}`);
      }
      resuming.add(sessionId);
      try {
        const restoredFrom =
          options.checkpointId !== undefined
            ? await checkpointSequence(context.memory, options.checkpointId)
            : undefined;
        const claim = await claimResume(
          context.memory,
          context.now(),
          config.workers.taskTimeoutMs,
        );
        if (options.checkpointId !== undefined) {
          await context.memory.restore(options.checkpointId);
          // The restore rewinds the phase record; keep the claim visible.
          await writePhase(context.memory, 'initializing', claim.cycle, context.now(), RESUMING);
        }
        await clearControl(context.memory, context.now());
        await sessions.update(sessionId, { status: 'active' });

        launch(sessionId, {
          resume: true,
          ...(restoredFrom !== undefined && { restoredFrom }),
        });
      } finally {
        resuming.delete(sessionId);
      }
      log.info({ sessionId, checkpointId: options.checkpointId }, 'Research session resumed');
      return requireSession(sessionId);
    },

    async waitForCompletion(sessionId: string): Promise<Session> {
      const completion = running.get(sessionId);
      return completion ?? requireSession(sessionId);
    },

    health(): ServiceHealth {
      return { runningSessions: running.size, shuttingDown };
    },

    async shutdown(): Promise<void> {
      shuttingDown = true;
      const active = [...running.entries()];
      for (const [sessionId] of active) {
        await requestStop(runtimeOf(sessionId).context.memory, 'service shutting down');
      }
      await Promise.allSettled(active.map(([, completion]) => completion));
    },
  };
}
