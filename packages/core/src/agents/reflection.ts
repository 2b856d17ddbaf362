import type {
  AgentCapability,
  InvocationContext,
  ReflectInput,
  ReflectOutput,
} from '@agora/shared/src/types/agent.types.js';
import { createChildLogger } from '@agora/shared/src/logger.js';
import type { LlmClient } from '../llm/llm-client.js';
import { invokeAndValidate } from '../llm/invoke-and-validate.js';
import { ReflectionResultJsonSchema, ReflectionResultSchema } from './agent-output.schemas.js';
import { feedbackSection, goalSection, hypothesisSection } from './prompt-sections.js';

const log = createChildLogger('agent:reflection');

const SYSTEM_PROMPT = `You are the Reflection agent in a multi-agent research assistant. Critically review the hypothesis against the research goal.

Score each dimension from 1 (poor) to 10 (excellent):
- scientificMerit: grounded in established principles, logically sound, plausible mechanisms
- novelty: a unique perspective that advances current understanding
- testability: can be validated experimentally with realistic methods
- impact: significance and applications if proven true
- limitations: how well key assumptions, risks and ethical concerns are handled (10 = few limitations)

Then recommend one of:
- "accept": worth pursuing as stated
- "revise": promising but needs refinement
- "reject": fundamentally flawed or off-goal

Respond with a JSON object containing:
- strengths: array of strings
- weaknesses: array of strings
- suggestions: array of concrete improvements
- scores: { scientificMerit, novelty, testability, impact, limitations }
- recommendation: "accept" | "revise" | "reject"`;

export function createReflectionAgent(
  llmClient: LlmClient,
): AgentCapability<ReflectInput, ReflectOutput> {
  return {
    async invoke(input: ReflectInput, context: InvocationContext): Promise<ReflectOutput> {
      const result = await invokeAndValidate({
        llmClient,
        request: {
          systemPrompt: SYSTEM_PROMPT,
          userMessage: `${goalSection(input.goal)}\n\n${hypothesisSection('HYPOTHESIS', input.hypothesis)}${feedbackSection(input.feedback)}`,
          jsonSchema: ReflectionResultJsonSchema as Record<string, unknown>,
          signal: context.signal,
        },
        schema: ReflectionResultSchema,
        agentName: 'Reflection',
      });

      log.info(
        {
          taskId: context.taskId,
          hypothesisId: input.hypothesis.id,
          recommendation: result.recommendation,
        },
        'Review complete',
      );

      return {
        critique: {
          strengths: result.strengths,
          weaknesses: result.weaknesses,
          suggestions: result.suggestions,
        },
        scores: result.scores,
        recommendation: result.recommendation,
      };
    },
  };
}
