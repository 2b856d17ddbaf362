import type {
  AgentCapability,
  EvolveInput,
  EvolveOutput,
  InvocationContext,
} from '@agora/shared/src/types/agent.types.js';
import { createChildLogger } from '@agora/shared/src/logger.js';
import { AgentError } from '@agora/shared/src/utils/errors.js';
import type { LlmClient } from '../llm/llm-client.js';
import { invokeAndValidate } from '../llm/invoke-and-validate.js';
import { EvolutionResultJsonSchema, EvolutionResultSchema } from './agent-output.schemas.js';
import { feedbackSection, goalSection, hypothesisSection, reviewsSection } from './prompt-sections.js';

const log = createChildLogger('agent:evolution');

const MAX_VARIANTS = 2;

const SYSTEM_PROMPT = `You are the Evolution agent in a multi-agent research assistant. Refine the parent hypotheses into improved variants.

Use one of these strategies per variant:
- "synthesis": combine elements of several parents
- "specialization": focus on and elaborate one aspect
- "generalization": broaden scope or applicability
- "cross-pollination": apply ideas from another field
- "constraint-relaxation": challenge an assumption
- "mechanism-elaboration": detail the underlying process

Keep the valuable core ideas, address the weaknesses named in the reviews and improve feasibility. Produce one or two variants.

Respond with a JSON object containing:
- hypotheses: an array of objects with title, description, rationale and strategy`;

export function createEvolutionAgent(
  llmClient: LlmClient,
): AgentCapability<EvolveInput, EvolveOutput> {
  return {
    async invoke(input: EvolveInput, context: InvocationContext): Promise<EvolveOutput> {
      if (input.parents.length === 0) {
        throw new AgentError('Evolution needs at least one parent hypothesis');
      }

      const parents = input.parents
        .map((parent, i) => {
          const reviews = input.reviews.filter((r) => r.hypothesisId === parent.id);
          return `${hypothesisSection(`PARENT_${String(i + 1)}`, parent)}\nReviews:\n${reviewsSection(reviews)}`;
        })
        .join('\n\n');

      const result = await invokeAndValidate({
        llmClient,
        request: {
          systemPrompt: SYSTEM_PROMPT,
          userMessage: `${goalSection(input.goal)}\n\n${parents}${feedbackSection(input.feedback)}`,
          jsonSchema: EvolutionResultJsonSchema as Record<string, unknown>,
          signal: context.signal,
        },
        schema: EvolutionResultSchema,
        agentName: 'Evolution',
      });

      const hypotheses = result.hypotheses.slice(0, MAX_VARIANTS);
      log.info(
        {
          taskId: context.taskId,
          parents: input.parents.map((p) => p.id),
          strategies: hypotheses.map((h) => h.strategy),
        },
        'Evolution complete',
      );
      return { hypotheses };
    },
  };
}
