import type {
  AgentCapability,
  CompareInput,
  CompareOutput,
  CompareWinner,
  InvocationContext,
} from '@agora/shared/src/types/agent.types.js';
import { createChildLogger } from '@agora/shared/src/logger.js';
import type { LlmClient } from '../llm/llm-client.js';
import { invokeAndValidate } from '../llm/invoke-and-validate.js';
import type { RankingResult } from './agent-output.schemas.js';
import { RankingResultJsonSchema, RankingResultSchema } from './agent-output.schemas.js';
import { goalSection, hypothesisSection, reviewsSection } from './prompt-sections.js';

const log = createChildLogger('agent:ranking');

const WINNERS: Readonly<Record<RankingResult['winner'], CompareWinner>> = {
  A: 'a',
  B: 'b',
  draw: 'draw',
  undetermined: 'undetermined',
};

const SYSTEM_PROMPT = `You are the Ranking agent in a multi-agent research assistant. Run a scientific debate between two experts about which of two hypotheses better addresses the research goal.

Compare them on:
1. Scientific merit and rigor
2. Novelty
3. Feasibility
4. Potential impact
5. Clarity and completeness

Let the experts argue for each hypothesis in turn, then reach a verdict. Use "draw" when they are equally strong and "undetermined" when the debate cannot decide.

Respond with a JSON object containing:
- transcript: the debate as plain text
- rationale: one paragraph explaining the verdict
- winner: "A" | "B" | "draw" | "undetermined"
- confidence: 0 to 100, how strongly the debate supports the verdict`;

export function createRankingAgent(
  llmClient: LlmClient,
): AgentCapability<CompareInput, CompareOutput> {
  return {
    async invoke(input: CompareInput, context: InvocationContext): Promise<CompareOutput> {
      const userMessage = [
        goalSection(input.goal),
        `${hypothesisSection('HYPOTHESIS_A', input.hypothesisA)}\nReviews:\n${reviewsSection(input.reviewsA)}`,
        `${hypothesisSection('HYPOTHESIS_B', input.hypothesisB)}\nReviews:\n${reviewsSection(input.reviewsB)}`,
      ].join('\n\n');

      const result = await invokeAndValidate({
        llmClient,
        request: {
          systemPrompt: SYSTEM_PROMPT,
          userMessage,
          jsonSchema: RankingResultJsonSchema as Record<string, unknown>,
          signal: context.signal,
        },
        schema: RankingResultSchema,
        agentName: 'Ranking',
      });

      const winner = WINNERS[result.winner];
      log.info(
        {
          taskId: context.taskId,
          hypothesisA: input.hypothesisA.id,
          hypothesisB: input.hypothesisB.id,
          winner,
          confidence: result.confidence,
        },
        'Debate complete',
      );

      return {
        winner,
        confidence: result.confidence / 100,
        rationale: result.rationale,
        transcript: result.transcript,
      };
    },
  };
}
