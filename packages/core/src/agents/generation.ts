import type {
  AgentCapability,
  GenerateInput,
  GenerateOutput,
  InvocationContext,
} from '@agora/shared/src/types/agent.types.js';
import { createChildLogger } from '@agora/shared/src/logger.js';
import type { LlmClient } from '../llm/llm-client.js';
import { invokeAndValidate } from '../llm/invoke-and-validate.js';
import { GenerationResultJsonSchema, GenerationResultSchema } from './agent-output.schemas.js';
import { feedbackSection, goalSection } from './prompt-sections.js';

const log = createChildLogger('agent:generation');

export function createGenerationAgent(
  llmClient: LlmClient,
): AgentCapability<GenerateInput, GenerateOutput> {
  return {
    async invoke(input: GenerateInput, context: InvocationContext): Promise<GenerateOutput> {
      log.info(
        { sessionId: context.sessionId, taskId: context.taskId, count: input.count },
        'Generating hypotheses',
      );

      const systemPrompt = `You are the Generation agent in a multi-agent research assistant. Propose exactly ${String(input.count)} hypotheses that address the research goal.

A good hypothesis:
1. Is specific and testable
2. Addresses the research goal directly
3. Is grounded in established principles
4. Offers a perspective that differs from the existing hypotheses
5. Suggests how it could be validated experimentally

Respond with a JSON object containing:
- hypotheses: an array of objects with
  - title: a short, descriptive title
  - description: the core idea in two or three paragraphs, including how to validate it
  - rationale: why it addresses the goal and its main limitations`;

      const existing =
        input.existingTitles.length > 0
          ? `\n\n[EXISTING_HYPOTHESES]\nDo not repeat these:\n${input.existingTitles.map((t) => `- ${t}`).join('\n')}`
          : '';

      const result = await invokeAndValidate({
        llmClient,
        request: {
          systemPrompt,
          userMessage: `${goalSection(input.goal)}${existing}${feedbackSection(input.feedback)}`,
          jsonSchema: GenerationResultJsonSchema as Record<string, unknown>,
          signal: context.signal,
        },
        schema: GenerationResultSchema,
        agentName: 'Generation',
      });

      const hypotheses = result.hypotheses.slice(0, input.count);
      log.info({ taskId: context.taskId, produced: hypotheses.length }, 'Generation complete');
      return { hypotheses };
    },
  };
}
