import type { AgentRoster } from '@agora/shared/src/types/agent.types.js';
import type { EmbeddingClient } from '../embedding/embedding-client.js';
import type { LlmClient } from '../llm/llm-client.js';
import { createEvolutionAgent } from './evolution.js';
import { createGenerationAgent } from './generation.js';
import { createMetaReviewAgent } from './meta-review.js';
import { createProximityAgent } from './proximity.js';
import { createRankingAgent } from './ranking.js';
import { createReflectionAgent } from './reflection.js';

export interface AgentRosterDeps {
  readonly llmClient: LlmClient;
  readonly embeddingClient: EmbeddingClient;
}

export function createAgentRoster(deps: AgentRosterDeps): AgentRoster {
  return {
    generate: createGenerationAgent(deps.llmClient),
    reflect: createReflectionAgent(deps.llmClient),
    'rank-compare': createRankingAgent(deps.llmClient),
    evolve: createEvolutionAgent(deps.llmClient),
    'proximity-score': createProximityAgent(deps.embeddingClient),
    'meta-review': createMetaReviewAgent(deps.llmClient),
  };
}
