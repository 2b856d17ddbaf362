import type { OpenAPIHono } from '@hono/zod-openapi';
import { createRoute } from '@hono/zod-openapi';
import type { MemoryBackend } from '@agora/core/src/services/research/bootstrap.js';
import type { ResearchService } from '@agora/core/src/services/research/research-service.js';
import { SERVICE_NAME, SERVICE_VERSION } from '@agora/shared/src/logger.js';
import { createRouter, type AppEnv } from '../types.js';
import { HealthResponseSchema } from '../schemas/responses.js';

const healthRoute = createRoute({
  method: 'get',
  path: '/',
  tags: ['Health'],
  summary: 'Health and readiness check',
  security: [],
  responses: {
    200: {
      description: 'Service accepts research sessions',
      content: {
        'application/json': {
          schema: HealthResponseSchema,
        },
      },
    },
    503: {
      description: 'Service is draining its sessions for shutdown',
      content: {
        'application/json': {
          schema: HealthResponseSchema,
        },
      },
    },
  },
});

export interface HealthDeps {
  readonly service: ResearchService;
  readonly memoryBackend: MemoryBackend;
}

export function createHealthRoutes(deps: HealthDeps): OpenAPIHono<AppEnv> {
  const health = createRouter();

  health.openapi(healthRoute, (c) => {
    const { runningSessions, shuttingDown } = deps.service.health();
    const body = {
      status: shuttingDown ? ('draining' as const) : ('ok' as const),
      service: SERVICE_NAME,
      version: SERVICE_VERSION,
      memory: deps.memoryBackend,
      runningSessions,
    };
    return shuttingDown ? c.json(body, 503) : c.json(body, 200);
  });

  return health;
}
