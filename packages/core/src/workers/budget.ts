import type { BudgetConfig } from '@agora/schemas/src/orchestration-config.schema.js';
import type { AgentType } from '@agora/shared/src/types/agent.types.js';
import type { Budget } from '@agora/shared/src/types/task.types.js';
import { createChildLogger } from '@agora/shared/src/logger.js';
import { NotFoundError, ResourceExhaustedError } from '@agora/shared/src/utils/errors.js';
import type { ContextMemory } from '../memory/context-memory.js';
import { Keys } from '../memory/record-kinds.js';
import { createIfAbsent, updateWithRetry } from '../memory/versioned-update.js';

const log = createChildLogger('workers:budget');

export interface BudgetLedger {
  /** Creates the budget record; an existing one is kept as is. */
  initialize(config: BudgetConfig): Promise<Budget>;
  /**
   * Charges one agent invocation. Regular invocations may not touch the
   * final reserve; `final` ones may spend it.
   */
  charge(agentType: AgentType, final: boolean): Promise<Budget>;
  current(): Promise<Budget>;
}

/** Invocations left before regular work hits the final reserve. */
export function regularRemaining(budget: Budget): number {
  return Math.max(0, budget.maxInvocations - budget.finalReserve - budget.used);
}

export function isExhausted(budget: Budget): boolean {
  return regularRemaining(budget) === 0;
}

export function createBudgetLedger(memory: ContextMemory): BudgetLedger {
  return {
    async initialize(config: BudgetConfig): Promise<Budget> {
      const budget: Budget = {
        maxInvocations: config.maxInvocations,
        finalReserve: config.finalReserve,
        used: 0,
        finalUsed: 0,
      };
      if (await createIfAbsent(memory, Keys.budget(), budget)) {
        log.info({ ...budget }, 'Budget initialized');
        return budget;
      }
      return this.current();
    },

    async charge(agentType: AgentType, final: boolean): Promise<Budget> {
      const result = await updateWithRetry(memory, Keys.budget(), (current) => {
        if (!current) {
          throw new NotFoundError('Budget has not been initialized');
        }
        const budget = current.value;
        const limit = final ? budget.maxInvocations : budget.maxInvocations - budget.finalReserve;
        if (budget.used >= limit) {
          throw new ResourceExhaustedError(
            `Invocation budget exhausted: ${String(budget.used)} of ${String(limit)} used (${agentType})`,
          );
        }
        return {
          ...budget,
          used: budget.used + 1,
          finalUsed: budget.finalUsed + (final ? 1 : 0),
        };
      });
      if (!result) {
        throw new NotFoundError('Budget has not been initialized');
      }
      return result.value;
    },

    async current(): Promise<Budget> {
      const record = await memory.get(Keys.budget());
      if (!record) {
        throw new NotFoundError('Budget has not been initialized');
      }
      return record.value;
    },
  };
}
