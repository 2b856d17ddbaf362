import type { WorkersConfig } from '@agora/schemas/src/orchestration-config.schema.js';
import type { Task } from '@agora/shared/src/types/task.types.js';
import { createChildLogger } from '@agora/shared/src/logger.js';
import {
  AgentInvocationError,
  GoalInvalidatedError,
  NotFoundError,
  ProvenanceError,
  ResourceExhaustedError,
  SessionError,
  TaskTimeoutError,
  toError,
} from '@agora/shared/src/utils/errors.js';
import type { TaskQueue } from './task-queue.js';
import type { HandlerContext, TaskHandlers } from './types.js';

const log = createChildLogger('workers:pool');

export interface WorkerPoolDeps {
  readonly queue: TaskQueue;
  readonly handlers: TaskHandlers;
  readonly context: HandlerContext;
  readonly config: WorkersConfig;
}

export interface RecoveryReport {
  readonly requeued: readonly string[];
  readonly applied: readonly string[];
}

export interface WorkerPool {
  start(): void;
  /** Stops claiming new work and waits for in-flight tasks to finish. */
  stop(): Promise<void>;
  isRunning(): boolean;
  /** Claims and fully processes one task. Resolves false when nothing was queued. */
  runOnce(workerId: string): Promise<boolean>;
  /** Resolves once no task is queued or in progress. */
  waitForIdle(): Promise<void>;
  /** Resolves once the task is done or dead and no slot is still working on it. */
  waitForTask(taskId: string): Promise<Task>;
  /** Applies done tasks whose mutations were never committed. */
  applyPending(): Promise<readonly string[]>;
  /**
   * Requeues tasks this pool finished but could not record as done or failed,
   * so they are not left in progress.
   */
  reconcile(): Promise<readonly string[]>;
  /** Restart path: requeue interrupted tasks once, then apply pending results. */
  recover(): Promise<RecoveryReport>;
}

async function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function isRetryable(error: unknown): boolean {
  if (error instanceof ResourceExhaustedError || error instanceof GoalInvalidatedError) {
    return false;
  }
  if (error instanceof AgentInvocationError) {
    return error.retryable;
  }
  if (error instanceof NotFoundError || error instanceof ProvenanceError) {
    return false;
  }
  return true;
}

export function createWorkerPool(deps: WorkerPoolDeps): WorkerPool {
  const { queue, handlers, context, config } = deps;
  const active = new Set<string>();
  const stranded = new Set<string>();
  let running = false;
  let loops: Promise<void>[] = [];

  async function executeWithTimeout(task: Task): Promise<unknown> {
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_resolve, reject) => {
      timer = setTimeout(() => {
        const error = new TaskTimeoutError(task.id, config.taskTimeoutMs);
        controller.abort(error);
        reject(error);
      }, config.taskTimeoutMs);
    });
    try {
      return await Promise.race([
        handlers[task.type].execute(task, context, controller.signal),
        timeout,
      ]);
    } finally {
      clearTimeout(timer);
    }
  }

  async function recordApplyFailure(task: Task, cause: Error): Promise<void> {
    try {
      const after = await queue.failApply(task.id, cause.message);
      if (after.status === 'dead') {
        await buryTask(after);
      }
    } catch (error) {
      log.error(
        { taskId: task.id, type: task.type, err: toError(error) },
        'Apply failure could not be recorded',
      );
    }
  }

  async function applyTask(task: Task): Promise<boolean> {
    try {
      await handlers[task.type].apply(task, task.output, context);
      await queue.markApplied(task.id);
      return true;
    } catch (error) {
      const cause = toError(error);
      log.error({ taskId: task.id, type: task.type, err: cause }, 'Task result could not be applied');
      // Stays done-but-unapplied until the attempts run out.
      await recordApplyFailure(task, cause);
      return false;
    }
  }

  async function buryTask(task: Task): Promise<void> {
    try {
      await handlers[task.type].onDead(task, context);
    } catch (error) {
      log.error(
        { taskId: task.id, type: task.type, err: toError(error) },
        'Dead-task handler failed',
      );
    }
  }

  function strand(task: Task, error: unknown): void {
    stranded.add(task.id);
    log.error(
      { taskId: task.id, type: task.type, err: toError(error) },
      'Task outcome could not be recorded; it will be requeued',
    );
  }

  async function failTask(task: Task, error: unknown): Promise<void> {
    const cause = toError(error);
    let failed: Task;
    try {
      failed = await queue.fail(task.id, cause.message, { retryable: isRetryable(error) });
    } catch (writeError) {
      strand(task, writeError);
      return;
    }
    if (failed.status === 'dead') {
      await buryTask(failed);
    }
  }

  async function processTask(task: Task): Promise<void> {
    active.add(task.id);
    try {
      let output: unknown;
      try {
        output = await executeWithTimeout(task);
      } catch (error) {
        await failTask(task, error);
        return;
      }
      let done: Task;
      try {
        done = await queue.complete(task.id, output);
      } catch (error) {
        strand(task, error);
        return;
      }
      log.info({ taskId: task.id, type: task.type, workerId: done.claimedBy }, 'Task completed');
      await applyTask(done);
    } finally {
      active.delete(task.id);
    }
  }

  async function slot(workerId: string): Promise<void> {
    while (running) {
      let worked = false;
      try {
        const task = await queue.claimNext(workerId);
        if (task) {
          worked = true;
          await processTask(task);
        }
      } catch (error) {
        log.error({ workerId, err: toError(error) }, 'Worker loop error');
      }
      if (!worked) {
        await sleep(config.pollIntervalMs);
      }
    }
  }

  return {
    start(): void {
      if (running) {
        return;
      }
      running = true;
      loops = Array.from({ length: config.concurrency }, (_, i) =>
        slot(`${context.sessionId}:worker-${String(i + 1)}`),
      );
      log.info({ sessionId: context.sessionId, concurrency: config.concurrency }, 'Worker pool started');
    },

    async stop(): Promise<void> {
      if (!running) {
        return;
      }
      running = false;
      await Promise.all(loops);
      loops = [];
      log.info({ sessionId: context.sessionId }, 'Worker pool stopped');
    },

    isRunning(): boolean {
      return running;
    },

    async runOnce(workerId: string): Promise<boolean> {
      const task = await queue.claimNext(workerId);
      if (!task) {
        return false;
      }
      await processTask(task);
      return true;
    },

    async waitForIdle(): Promise<void> {
      while ((await queue.depth()) > 0 || active.size > 0) {
        if (!running) {
          throw new SessionError('Worker pool is not running; the queue cannot drain');
        }
        await this.reconcile();
        await sleep(config.pollIntervalMs);
      }
    },

    async waitForTask(taskId: string): Promise<Task> {
      for (;;) {
        const task = await queue.get(taskId);
        if (!task) {
          throw new NotFoundError(`Task not found: ${taskId}`);
        }
        if ((task.status === 'done' || task.status === 'dead') && !active.has(taskId)) {
          return task;
        }
        if (!running) {
          throw new SessionError(`Worker pool is not running; task ${taskId} is ${task.status}`);
        }
        await sleep(config.pollIntervalMs);
      }
    },

    async applyPending(): Promise<readonly string[]> {
      const applied: string[] = [];
      for (const task of await queue.unapplied()) {
        if (active.has(task.id)) {
          continue;
        }
        if (await applyTask(task)) {
          applied.push(task.id);
        }
      }
      if (applied.length > 0) {
        log.info({ count: applied.length }, 'Applied pending task results');
      }
      return applied;
    },

    async reconcile(): Promise<readonly string[]> {
      const requeued: string[] = [];
      for (const taskId of [...stranded]) {
        if (active.has(taskId)) {
          continue;
        }
        try {
          const task = await queue.requeue(taskId, 'requeued after a lost result write');
          stranded.delete(taskId);
          if (task.status === 'queued') {
            requeued.push(taskId);
          }
        } catch (error) {
          log.warn({ taskId, err: toError(error) }, 'Stranded task could not be requeued yet');
        }
      }
      return requeued;
    },

    async recover(): Promise<RecoveryReport> {
      if (running) {
        throw new SessionError('Recovery must run before the worker pool starts');
      }
      stranded.clear();
      const requeued = await queue.requeueInterrupted();
      const applied = await this.applyPending();
      return { requeued: requeued.map((t) => t.id), applied };
    },
  };
}
