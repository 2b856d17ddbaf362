import type {
  AgentCapability,
  InvocationContext,
  ProximityScoreInput,
  ProximityScoreOutput,
} from '@agora/shared/src/types/agent.types.js';
import { createChildLogger } from '@agora/shared/src/logger.js';
import { clamp, cosineSimilarity, roundTo } from '@agora/shared/src/utils/math.js';
import type { EmbeddingClient } from '../embedding/embedding-client.js';
import { buildHypothesisEmbeddingText } from '../embedding/embedding-text-builder.js';

const log = createChildLogger('agent:proximity');

/**
 * Scores similarity as the cosine of hypothesis embeddings, clamped to [0, 1].
 */
export function createProximityAgent(
  embeddingClient: EmbeddingClient,
): AgentCapability<ProximityScoreInput, ProximityScoreOutput> {
  return {
    async invoke(
      input: ProximityScoreInput,
      context: InvocationContext,
    ): Promise<ProximityScoreOutput> {
      if (input.candidates.length === 0) {
        return { scores: [] };
      }

      const texts = [input.hypothesis, ...input.candidates].map((h) =>
        buildHypothesisEmbeddingText(h.content),
      );
      const [target, ...others] = await embeddingClient.generateEmbeddings(texts);
      context.signal.throwIfAborted();

      const scores = input.candidates.map((candidate, i) => ({
        hypothesisId: candidate.id,
        similarity: roundTo(clamp(cosineSimilarity(target, others[i]), 0, 1), 6),
      }));

      log.debug(
        { taskId: context.taskId, hypothesisId: input.hypothesis.id, candidates: scores.length },
        'Proximity scored',
      );
      return { scores };
    },
  };
}
