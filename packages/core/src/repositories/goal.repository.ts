import type { GoalConstraints, ResearchGoal } from '@agora/shared/src/types/goal.types.js';
import { createChildLogger } from '@agora/shared/src/logger.js';
import { NotFoundError } from '@agora/shared/src/utils/errors.js';
import type { ContextMemory } from '../memory/context-memory.js';
import { recordWrite, scanValues } from '../memory/context-memory.js';
import { Keys, Kinds } from '../memory/record-kinds.js';
import { commitWithRetry } from '../memory/versioned-update.js';

const log = createChildLogger('repository:goal');

export interface GoalRepository {
  /** Publishes a new goal version and moves the current pointer to it. */
  publish(text: string, constraints: GoalConstraints): Promise<ResearchGoal>;
  current(): Promise<ResearchGoal | null>;
  requireCurrent(): Promise<ResearchGoal>;
  getById(id: string): Promise<ResearchGoal | null>;
  history(): Promise<readonly ResearchGoal[]>;
}

export function goalIdFor(version: number): string {
  return `goal-v${String(version)}`;
}

export function createGoalRepository(
  memory: ContextMemory,
  now: () => Date = () => new Date(),
): GoalRepository {
  return {
    async publish(text: string, constraints: GoalConstraints): Promise<ResearchGoal> {
      const goal = await commitWithRetry(memory, async () => {
        const pointer = await memory.get(Keys.goalPointer());
        const version = (pointer?.value.version ?? 0) + 1;
        const next: ResearchGoal = {
          id: goalIdFor(version),
          version,
          text,
          constraints,
          createdAt: now().toISOString(),
          ...(pointer && { supersedesId: pointer.value.currentGoalId }),
        };
        return {
          writes: [
            recordWrite(Keys.goal(next.id), next, 0),
            recordWrite(
              Keys.goalPointer(),
              { currentGoalId: next.id, version },
              pointer?.version ?? 0,
            ),
          ],
          result: next,
        };
      });
      if (!goal) {
        throw new Error('Goal publication produced no writes');
      }

      await memory.appendToTimeline('goal-set', {
        goalId: goal.id,
        version: goal.version,
        supersedesId: goal.supersedesId,
      });
      log.info({ goalId: goal.id, version: goal.version }, 'Research goal published');
      return goal;
    },

    async current(): Promise<ResearchGoal | null> {
      const pointer = await memory.get(Keys.goalPointer());
      if (!pointer) {
        return null;
      }
      const goal = await memory.get(Keys.goal(pointer.value.currentGoalId));
      return goal?.value ?? null;
    },

    async requireCurrent(): Promise<ResearchGoal> {
      const goal = await this.current();
      if (!goal) {
        throw new NotFoundError('No research goal has been set');
      }
      return goal;
    },

    async getById(id: string): Promise<ResearchGoal | null> {
      const record = await memory.get(Keys.goal(id));
      return record?.value ?? null;
    },

    async history(): Promise<readonly ResearchGoal[]> {
      const goals = await scanValues(memory, Kinds.goal);
      return goals.sort((a, b) => a.version - b.version);
    },
  };
}
