import { AgentError } from '@agora/shared/src/utils/errors.js';
import { compareHandler } from './handlers/compare.handler.js';
import { evolveHandler } from './handlers/evolve.handler.js';
import { generateHandler } from './handlers/generate.handler.js';
import { metaReviewHandler } from './handlers/meta-review.handler.js';
import { reviewHandler } from './handlers/review.handler.js';
import { updateProximityHandler } from './handlers/update-proximity.handler.js';
import type { RegisteredHandler, TaskHandler, TaskHandlers } from './types.js';

export function defineHandler<O>(handler: TaskHandler<O>): RegisteredHandler {
  return {
    type: handler.type,
    execute: (task, ctx, signal) => handler.execute(task, ctx, signal),
    async apply(task, storedOutput, ctx) {
      const parsed = handler.outputSchema.safeParse(storedOutput);
      if (!parsed.success) {
        throw new AgentError(
          `Stored output of task ${task.id} is invalid: ${parsed.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`).join(', ')}`,
        );
      }
      await handler.apply(task, parsed.data, ctx);
    },
    async onDead(task, ctx) {
      if (handler.onDead) {
        await handler.onDead(task, ctx);
      }
    },
  };
}

export function createTaskHandlers(): TaskHandlers {
  return {
    generate: defineHandler(generateHandler),
    review: defineHandler(reviewHandler),
    compare: defineHandler(compareHandler),
    evolve: defineHandler(evolveHandler),
    'update-proximity': defineHandler(updateProximityHandler),
    'meta-review': defineHandler(metaReviewHandler),
  };
}
