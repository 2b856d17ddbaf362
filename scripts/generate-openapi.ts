import { createLocalJWKSet } from 'jose';
import { createApp } from '../packages/api/src/app.js';
import { createInMemoryContextMemory } from '../packages/core/src/memory/in-memory-context-memory.js';
import { createInMemorySessionRepository } from '../packages/core/src/repositories/in-memory-session.repository.js';
import { createResearchService } from '../packages/core/src/services/research/research-service.js';
import { createFakeRoster } from '../packages/core/src/testing/fake-roster.js';
import { defaultOrchestrationConfig } from '../packages/schemas/src/config-loader.js';
import { SERVICE_VERSION } from '../packages/shared/src/logger.js';

// Routes are only registered, never called, so an offline service is enough.
const app = createApp({
  service: createResearchService({
    sessions: createInMemorySessionRepository(),
    memoryFor: () => createInMemoryContextMemory(),
    roster: createFakeRoster(),
    config: defaultOrchestrationConfig(),
  }),
  auth: { issuer: '', audience: '', jwks: createLocalJWKSet({ keys: [] }) },
  memoryBackend: 'memory',
});

const doc = app.getOpenAPI31Document({
  openapi: '3.1.0',
  info: {
    title: 'Agora API',
    version: SERVICE_VERSION,
    description: 'Tournament-ranked research hypothesis sessions',
  },
  servers: [
    { url: 'http://localhost:3000', description: 'Local development' },
  ],
  security: [{ Bearer: [] }],
});

doc.components = {
  ...doc.components,
  securitySchemes: {
    Bearer: {
      type: 'http',
      scheme: 'bearer',
      bearerFormat: 'JWT',
    },
  },
};

process.stdout.write(JSON.stringify(doc, null, 2));
process.stdout.write('\n');
