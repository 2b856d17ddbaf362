import type { InvocationContext } from '@agora/shared/src/types/agent.types.js';
import type { Task } from '@agora/shared/src/types/task.types.js';
import { AgentError } from '@agora/shared/src/utils/errors.js';
import type { HandlerContext } from '../types.js';

export function invocationContext(
  task: Task,
  ctx: HandlerContext,
  signal: AbortSignal,
): InvocationContext {
  return { sessionId: ctx.sessionId, taskId: task.id, signal, final: task.final };
}

export function targetAt(task: Task, index: number): string {
  const id = task.targetIds.at(index);
  if (id === undefined) {
    throw new AgentError(
      `Task ${task.id} (${task.type}) needs at least ${String(index + 1)} target(s)`,
    );
  }
  return id;
}

/** Goal-wide feedback plus feedback aimed at any of `hypothesisIds`, without repeats. */
export async function feedbackFor(
  ctx: HandlerContext,
  goalId: string,
  hypothesisIds: readonly string[],
): Promise<string[]> {
  const texts = new Set(await ctx.feedback.textsFor(goalId));
  for (const id of hypothesisIds) {
    for (const text of await ctx.feedback.textsFor(goalId, id)) {
      texts.add(text);
    }
  }
  return [...texts];
}
