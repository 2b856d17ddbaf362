import type { OpenAPIHono } from '@hono/zod-openapi';
import { cors } from 'hono/cors';
import type { MemoryBackend } from '@agora/core/src/services/research/bootstrap.js';
import type { ResearchService } from '@agora/core/src/services/research/research-service.js';
import { createChildLogger, SERVICE_VERSION } from '@agora/shared/src/logger.js';
import { createRouter, type AppEnv } from './types.js';
import { requestId } from './middleware/request-id.js';
import { errorHandler } from './middleware/error-handler.js';
import type { AuthConfig } from './middleware/auth.js';
import { createAuthMiddleware } from './middleware/auth.js';
import { createHealthRoutes } from './routes/health.js';
import { createSessionRoutes } from './routes/sessions.js';

const log = createChildLogger('api:server');

export interface AppConfig {
  readonly service: ResearchService;
  readonly auth: AuthConfig;
  readonly memoryBackend: MemoryBackend;
}

export function createApp(config: AppConfig): OpenAPIHono<AppEnv> {
  const app = createRouter();

  app.use('*', cors());
  app.use('*', requestId);

  // Request logging
  app.use('*', async (c, next) => {
    const start = Date.now();
    await next();
    const duration = Date.now() - start;
    log.info(
      {
        method: c.req.method,
        path: c.req.path,
        status: c.res.status,
        duration,
        requestId: c.get('requestId'),
      },
      'Request completed',
    );
  });

  app.onError(errorHandler);

  // Health — no auth required
  app.route(
    '/health',
    createHealthRoutes({ service: config.service, memoryBackend: config.memoryBackend }),
  );

  // OpenAPI spec — no auth required
  app.get('/openapi.json', (c) => {
    const spec = app.getOpenAPI31Document({
      openapi: '3.1.0',
      info: {
        title: 'Agora API',
        version: SERVICE_VERSION,
        description: 'Tournament-ranked research hypothesis sessions',
      },
      security: [{ Bearer: [] }],
    });
    spec.components = {
      ...spec.components,
      securitySchemes: {
        Bearer: {
          type: 'http',
          scheme: 'bearer',
          bearerFormat: 'JWT',
        },
      },
    };
    return c.json(spec);
  });

  // Auth middleware — applies to all routes below
  app.use('*', createAuthMiddleware(config.auth));

  app.route('/sessions', createSessionRoutes(config.service));

  return app;
}
