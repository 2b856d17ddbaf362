import type { QueueConfig } from '@agora/schemas/src/orchestration-config.schema.js';
import type { Task, TaskStatus, TaskType } from '@agora/shared/src/types/task.types.js';
import { createChildLogger } from '@agora/shared/src/logger.js';
import {
  InvalidTransitionError,
  NotFoundError,
  VersionConflictError,
} from '@agora/shared/src/utils/errors.js';
import type { ContextMemory, VersionedRecord } from '../memory/context-memory.js';
import { collect } from '../memory/context-memory.js';
import { Keys, Kinds } from '../memory/record-kinds.js';
import { createIfAbsent, updateWithRetry } from '../memory/versioned-update.js';

const log = createChildLogger('workers:task-queue');

const ALLOWED: Readonly<Record<TaskStatus, readonly TaskStatus[]>> = {
  queued: ['in-progress'],
  'in-progress': ['done', 'failed', 'queued'],
  done: ['dead'],
  failed: ['queued', 'dead'],
  dead: [],
};

export interface EnqueueRequest {
  readonly id: string;
  readonly type: TaskType;
  readonly targetIds: readonly string[];
  readonly priority: number;
  readonly final?: boolean;
}

export interface EnqueueResult {
  readonly task: Task;
  readonly created: boolean;
}

export interface TaskFilter {
  readonly status?: TaskStatus;
  readonly type?: TaskType;
}

export interface FailOptions {
  readonly retryable: boolean;
}

export interface TaskQueueDeps {
  readonly memory: ContextMemory;
  readonly retryLimit: number;
  /** Failed applies a done task may have before it is marked dead. */
  readonly applyAttemptLimit?: number;
  readonly now?: () => Date;
}

export interface TaskQueue {
  /** Idempotent by task id. */
  enqueue(request: EnqueueRequest): Promise<EnqueueResult>;
  /** Claims the highest-priority queued task, FIFO within a priority. */
  claimNext(workerId: string): Promise<Task | null>;
  complete(taskId: string, output: unknown): Promise<Task>;
  markApplied(taskId: string): Promise<Task>;
  /** in-progress → failed → queued, or → dead once retries are used up. */
  fail(taskId: string, reason: string, options: FailOptions): Promise<Task>;
  /**
   * Records a failed apply of a done task; once the attempts reach the limit
   * the task moves to dead.
   */
  failApply(taskId: string, reason: string): Promise<Task>;
  /**
   * in-progress → queued without spending a retry. A task that is no longer
   * in progress is returned unchanged.
   */
  requeue(taskId: string, reason: string): Promise<Task>;
  /** Requeues every in-progress task left behind by a stopped process. */
  requeueInterrupted(): Promise<readonly Task[]>;
  get(taskId: string): Promise<Task | null>;
  list(filter?: TaskFilter): Promise<readonly Task[]>;
  /** Done tasks whose mutations have not been applied yet. */
  unapplied(): Promise<readonly Task[]>;
  /** Queued plus in-progress tasks. */
  depth(): Promise<number>;
}

export function compareForClaim(a: Task, b: Task): number {
  if (a.priority !== b.priority) {
    return b.priority - a.priority;
  }
  if (a.enqueueSequence !== b.enqueueSequence) {
    return a.enqueueSequence - b.enqueueSequence;
  }
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

/**
 * Task types held back at the current queue depth: expansion first, then
 * everything except meta-review.
 */
export function throttledTypes(depth: number, config: QueueConfig): ReadonlySet<TaskType> {
  if (depth >= config.hardLimit) {
    return new Set<TaskType>(['generate', 'evolve', 'review', 'compare', 'update-proximity']);
  }
  if (depth >= config.softLimit) {
    return new Set<TaskType>(['generate', 'evolve']);
  }
  return new Set<TaskType>();
}

function moved(task: Task, status: TaskStatus, at: string, reason?: string): Task {
  if (!ALLOWED[task.status].includes(status)) {
    throw new InvalidTransitionError(`Task ${task.id} cannot move from ${task.status} to ${status}`);
  }
  return {
    ...task,
    status,
    history: [...task.history, { status, at, ...(reason !== undefined && { reason }) }],
  };
}

export function createTaskQueue(deps: TaskQueueDeps): TaskQueue {
  const { memory, retryLimit } = deps;
  const applyAttemptLimit = deps.applyAttemptLimit ?? 3;
  const now = deps.now ?? ((): Date => new Date());

  async function records(): Promise<VersionedRecord<Task>[]> {
    return collect(memory.scan(Kinds.task));
  }

  async function transition(
    taskId: string,
    change: (task: Task) => Task | null,
  ): Promise<Task> {
    const result = await updateWithRetry(memory, Keys.task(taskId), (current) => {
      if (!current) {
        throw new NotFoundError(`Task not found: ${taskId}`);
      }
      return change(current.value);
    });
    if (!result) {
      throw new NotFoundError(`Task not found: ${taskId}`);
    }
    if (result.written) {
      await memory.appendToTimeline('task-transition', {
        taskId,
        type: result.value.type,
        status: result.value.status,
      });
    }
    return result.value;
  }

  function failed(task: Task, reason: string, retryable: boolean): Task {
    const at = now().toISOString();
    const retryCount = task.retryCount + 1;
    const afterFailure = {
      ...moved(task, 'failed', at, reason),
      retryCount,
      lastError: reason,
      finishedAt: at,
    };
    if (retryable && retryCount <= retryLimit) {
      return {
        ...moved(afterFailure, 'queued', at, `retry ${String(retryCount)} of ${String(retryLimit)}`),
        claimedBy: undefined,
      };
    }
    return moved(afterFailure, 'dead', at, retryable ? 'retry limit reached' : 'not retryable');
  }

  function requeued(task: Task, reason: string): Task | null {
    if (task.status !== 'in-progress') {
      return null;
    }
    return { ...moved(task, 'queued', now().toISOString(), reason), claimedBy: undefined };
  }

  return {
    async enqueue(request: EnqueueRequest): Promise<EnqueueResult> {
      const existing = await memory.get(Keys.task(request.id));
      if (existing) {
        return { task: existing.value, created: false };
      }

      const enqueueSequence = await memory.appendToTimeline('task-enqueued', {
        taskId: request.id,
        type: request.type,
        targetIds: request.targetIds,
        priority: request.priority,
      });
      const at = now().toISOString();
      const task: Task = {
        id: request.id,
        type: request.type,
        targetIds: request.targetIds,
        priority: request.priority,
        status: 'queued',
        retryCount: 0,
        enqueueSequence,
        enqueuedAt: at,
        applied: false,
        final: request.final ?? false,
        history: [{ status: 'queued', at }],
      };

      if (!(await createIfAbsent(memory, Keys.task(request.id), task))) {
        const winner = await memory.get(Keys.task(request.id));
        if (winner) {
          return { task: winner.value, created: false };
        }
      }
      log.debug({ taskId: task.id, type: task.type, priority: task.priority }, 'Task enqueued');
      return { task, created: true };
    },

    async claimNext(workerId: string): Promise<Task | null> {
      const queued = (await records())
        .filter((r) => r.value.status === 'queued')
        .sort((a, b) => compareForClaim(a.value, b.value));

      for (const record of queued) {
        const at = now().toISOString();
        const claimed: Task = {
          ...moved(record.value, 'in-progress', at),
          claimedBy: workerId,
          startedAt: at,
        };
        try {
          await memory.put(Keys.task(record.id), claimed, record.version);
        } catch (error) {
          if (error instanceof VersionConflictError) {
            continue;
          }
          throw error;
        }
        await memory.appendToTimeline('task-transition', {
          taskId: claimed.id,
          type: claimed.type,
          status: claimed.status,
        });
        return claimed;
      }
      return null;
    },

    complete(taskId: string, output: unknown): Promise<Task> {
      return transition(taskId, (task) => {
        const at = now().toISOString();
        return { ...moved(task, 'done', at), output, finishedAt: at };
      });
    },

    markApplied(taskId: string): Promise<Task> {
      return transition(taskId, (task) => {
        if (task.status !== 'done') {
          throw new InvalidTransitionError(`Task ${taskId} is ${task.status}, not done`);
        }
        return task.applied ? null : { ...task, applied: true };
      });
    },

    async fail(taskId: string, reason: string, options: FailOptions): Promise<Task> {
      const task = await transition(taskId, (current) => failed(current, reason, options.retryable));
      const level = task.status === 'dead' ? 'error' : 'warn';
      log[level](
        { taskId, type: task.type, retryCount: task.retryCount, status: task.status, reason },
        task.status === 'dead' ? 'Task is dead' : 'Task failed, requeued',
      );
      return task;
    },

    async failApply(taskId: string, reason: string): Promise<Task> {
      const task = await transition(taskId, (current) => {
        if (current.status !== 'done' || current.applied) {
          return null;
        }
        const applyAttempts = (current.applyAttempts ?? 0) + 1;
        if (applyAttempts < applyAttemptLimit) {
          return { ...current, applyAttempts, lastError: reason };
        }
        return {
          ...moved(current, 'dead', now().toISOString(), 'apply attempts exhausted'),
          applyAttempts,
          lastError: `apply failed: ${reason}`,
        };
      });
      if (task.status === 'dead') {
        log.error(
          { taskId, type: task.type, applyAttempts: task.applyAttempts, reason },
          'Task is dead',
        );
      }
      return task;
    },

    async requeue(taskId: string, reason: string): Promise<Task> {
      const task = await transition(taskId, (current) => requeued(current, reason));
      log.warn({ taskId, type: task.type, status: task.status, reason }, 'Task requeued');
      return task;
    },

    async requeueInterrupted(): Promise<readonly Task[]> {
      const inFlight = (await records()).filter((r) => r.value.status === 'in-progress');
      const requeuedTasks: Task[] = [];
      for (const record of inFlight) {
        const task = await transition(record.id, (current) =>
          requeued(current, 'requeued after restart'),
        );
        if (task.status === 'queued') {
          requeuedTasks.push(task);
        }
      }
      if (requeuedTasks.length > 0) {
        log.info({ count: requeuedTasks.length }, 'Requeued interrupted tasks');
      }
      return requeuedTasks;
    },

    async get(taskId: string): Promise<Task | null> {
      const record = await memory.get(Keys.task(taskId));
      return record?.value ?? null;
    },

    async list(filter: TaskFilter = {}): Promise<readonly Task[]> {
      return (await records())
        .map((r) => r.value)
        .filter(
          (t) =>
            (!filter.status || t.status === filter.status) &&
            (!filter.type || t.type === filter.type),
        )
        .sort((a, b) => a.enqueueSequence - b.enqueueSequence);
    },

    async unapplied(): Promise<readonly Task[]> {
      return (await this.list({ status: 'done' })).filter((t) => !t.applied);
    },

    async depth(): Promise<number> {
      return (await records()).filter(
        (r) => r.value.status === 'queued' || r.value.status === 'in-progress',
      ).length;
    },
  };
}
