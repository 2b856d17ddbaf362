import type { OrchestrationConfig } from '@agora/schemas/src/orchestration-config.schema.js';
import { loadOrchestrationConfig } from '@agora/schemas/src/config-loader.js';
import { createChildLogger } from '@agora/shared/src/logger.js';
import { ConfigurationError } from '@agora/shared/src/utils/errors.js';
import { createAgentRoster } from '../../agents/roster.js';
import { createMockEmbeddingClient } from '../../embedding/mock-embedding-client.js';
import { createVertexEmbeddingClient } from '../../embedding/vertex-embedding-client.js';
import { createFirestoreClient } from '../../infrastructure/firestore-client.js';
import { createFirestoreContextMemory } from '../../infrastructure/firestore-context-memory.js';
import { createFirestoreSessionRepository } from '../../infrastructure/firestore-session.repository.js';
import { createLlmClient } from '../../llm/llm-client.js';
import { createInMemoryContextMemory } from '../../memory/in-memory-context-memory.js';
import { createInMemorySessionRepository } from '../../repositories/in-memory-session.repository.js';
import type { ResearchService, ResearchServiceDeps } from './research-service.js';
import { createResearchService } from './research-service.js';

const log = createChildLogger('service:bootstrap');

export type MemoryBackend = 'memory' | 'firestore';

export interface BootstrapOptions {
  readonly configPath?: string;
  readonly env?: NodeJS.ProcessEnv;
}

export interface BootstrappedService {
  readonly service: ResearchService;
  readonly config: OrchestrationConfig;
  readonly backend: MemoryBackend;
}

export function memoryBackendFrom(env: NodeJS.ProcessEnv): MemoryBackend {
  const value = env['AGORA_MEMORY'] ?? 'memory';
  if (value !== 'memory' && value !== 'firestore') {
    throw new ConfigurationError(`AGORA_MEMORY must be "memory" or "firestore", got "${value}"`);
  }
  return value;
}

function storageFor(
  backend: MemoryBackend,
): Pick<ResearchServiceDeps, 'sessions' | 'memoryFor'> {
  if (backend === 'firestore') {
    const db = createFirestoreClient();
    return {
      sessions: createFirestoreSessionRepository(db),
      memoryFor: (sessionId) => createFirestoreContextMemory(db, sessionId),
    };
  }
  return {
    sessions: createInMemorySessionRepository(),
    memoryFor: () => createInMemoryContextMemory(),
  };
}

/**
 * Builds the research service from the config file and environment.
 * The file path falls back to AGORA_CONFIG, then config/orchestration.json.
 */
export async function bootstrapResearchService(
  options: BootstrapOptions = {},
): Promise<BootstrappedService> {
  const env = options.env ?? process.env;
  const config = await loadOrchestrationConfig(options.configPath ?? env['AGORA_CONFIG'], env);
  const backend = memoryBackendFrom(env);
  const mock = env['AGORA_MOCK_LLM'] === 'true';

  const roster = createAgentRoster({
    llmClient: await createLlmClient(),
    embeddingClient: mock ? createMockEmbeddingClient() : createVertexEmbeddingClient(),
  });

  log.info(
    { backend, mockLlm: mock, workers: config.workers.concurrency, budget: config.budget.maxInvocations },
    'Research service configured',
  );
  return {
    service: createResearchService({ ...storageFor(backend), roster, config }),
    config,
    backend,
  };
}
