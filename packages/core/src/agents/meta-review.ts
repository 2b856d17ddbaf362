import type {
  AgentCapability,
  InvocationContext,
  MetaReviewInput,
  MetaReviewOutput,
} from '@agora/shared/src/types/agent.types.js';
import { createChildLogger } from '@agora/shared/src/logger.js';
import type { LlmClient } from '../llm/llm-client.js';
import { invokeAndValidate } from '../llm/invoke-and-validate.js';
import { MetaReviewResultJsonSchema, MetaReviewResultSchema } from './agent-output.schemas.js';
import { goalSection, hypothesisSection, reviewsSection } from './prompt-sections.js';

const log = createChildLogger('agent:meta-review');

export function createMetaReviewAgent(
  llmClient: LlmClient,
): AgentCapability<MetaReviewInput, MetaReviewOutput> {
  return {
    async invoke(input: MetaReviewInput, context: InvocationContext): Promise<MetaReviewOutput> {
      const scope = input.final
        ? 'This is the final overview that closes the research session.'
        : 'This is an interim overview; the research is still running.';

      const systemPrompt = `You are the Meta-review agent in a multi-agent research assistant. Synthesize the tournament results into a research overview. ${scope}

Analyze:
1. Key themes and patterns across the hypotheses
2. Strength of their theoretical foundations and methods
3. Novel concepts and combinations of ideas
4. The most promising directions and their challenges

Respond with a JSON object containing:
- summary: one or two paragraphs
- themes: array of strings
- strengths: array of strings
- recommendations: array of next steps
- hypothesisNotes: array of { hypothesisId, note } for the hypotheses listed`;

      const subjects = input.subjects
        .map(
          (s, i) =>
            `${hypothesisSection(`HYPOTHESIS_${String(i + 1)}`, s.hypothesis)}\nRating: ${String(Math.round(s.rating))} after ${String(s.matchesPlayed)} matches\nReviews:\n${reviewsSection(s.reviews)}`,
        )
        .join('\n\n');

      const result = await invokeAndValidate({
        llmClient,
        request: {
          systemPrompt,
          userMessage: `${goalSection(input.goal)}\n\n${subjects}`,
          jsonSchema: MetaReviewResultJsonSchema as Record<string, unknown>,
          signal: context.signal,
        },
        schema: MetaReviewResultSchema,
        agentName: 'MetaReview',
      });

      const known = new Set(input.subjects.map((s) => s.hypothesis.id));
      const overview = {
        ...result,
        hypothesisNotes: result.hypothesisNotes.filter((n) => known.has(n.hypothesisId)),
      };

      log.info(
        { taskId: context.taskId, subjects: input.subjects.length, final: input.final },
        'Meta-review complete',
      );
      return { overview };
    },
  };
}
