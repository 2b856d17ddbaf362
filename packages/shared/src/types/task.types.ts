export const TASK_TYPES = [
  'generate',
  'review',
  'compare',
  'evolve',
  'update-proximity',
  'meta-review',
] as const;

export type TaskType = (typeof TASK_TYPES)[number];

export const TASK_STATUSES = ['queued', 'in-progress', 'done', 'failed', 'dead'] as const;

export type TaskStatus = (typeof TASK_STATUSES)[number];

export interface TaskTransition {
  readonly status: TaskStatus;
  readonly at: string;
  readonly reason?: string;
}

export interface Task {
  readonly id: string;
  readonly type: TaskType;
  readonly targetIds: readonly string[];
  readonly priority: number;
  readonly status: TaskStatus;
  readonly retryCount: number;
  readonly enqueueSequence: number;
  readonly enqueuedAt: string;
  readonly claimedBy?: string;
  readonly startedAt?: string;
  readonly finishedAt?: string;
  readonly lastError?: string;
  readonly output?: unknown;
  readonly applied: boolean;
  /** Failed attempts to apply a stored result. */
  readonly applyAttempts?: number;
  /** Marks the session-closing meta-review, funded from the budget reserve. */
  readonly final: boolean;
  readonly history: readonly TaskTransition[];
}

export interface Budget {
  readonly maxInvocations: number;
  readonly finalReserve: number;
  readonly used: number;
  readonly finalUsed: number;
}
