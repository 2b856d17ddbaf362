import type {
  AgentCapability,
  AgentRoster,
  AgentType,
  InvocationContext,
} from '@agora/shared/src/types/agent.types.js';
import {
  AgentError,
  AgentInvocationError,
  AgoraError,
  LlmError,
  toError,
} from '@agora/shared/src/utils/errors.js';
import type { BudgetLedger } from './budget.js';

function toInvocationError(agentType: AgentType, error: unknown): Error {
  if (error instanceof LlmError) {
    return new AgentInvocationError(error.message, agentType, error.isTransient, error);
  }
  if (error instanceof AgentError) {
    return new AgentInvocationError(error.message, agentType, true, error);
  }
  if (error instanceof AgoraError) {
    return error;
  }
  const cause = toError(error);
  return new AgentInvocationError(cause.message, agentType, true, cause);
}

function budgeted<I, O>(
  agentType: AgentType,
  capability: AgentCapability<I, O>,
  ledger: BudgetLedger,
): AgentCapability<I, O> {
  return {
    async invoke(input: I, context: InvocationContext): Promise<O> {
      await ledger.charge(agentType, context.final === true);
      try {
        return await capability.invoke(input, context);
      } catch (error) {
        throw toInvocationError(agentType, error);
      }
    },
  };
}

/**
 * Charges every invocation to the session budget and maps agent failures to
 * `AgentInvocationError` with a retryable flag.
 */
export function createBudgetedRoster(roster: AgentRoster, ledger: BudgetLedger): AgentRoster {
  return {
    generate: budgeted('generate', roster.generate, ledger),
    reflect: budgeted('reflect', roster.reflect, ledger),
    'rank-compare': budgeted('rank-compare', roster['rank-compare'], ledger),
    evolve: budgeted('evolve', roster.evolve, ledger),
    'proximity-score': budgeted('proximity-score', roster['proximity-score'], ledger),
    'meta-review': budgeted('meta-review', roster['meta-review'], ledger),
  };
}
