import type { OpenAPIHono } from '@hono/zod-openapi';
import { cors } from 'hono/cors';
import type { MemoryBackend } from '@agora/core/src/services/research/bootstrap.js';
import type { ResearchService } from '@agora/core/src/services/research/research-service.js';
import { createRouter, type AppEnv } from './types.js';
import { requestId } from './middleware/request-id.js';
import { errorHandler } from './middleware/error-handler.js';
import { createHealthRoutes } from './routes/health.js';
import { createSessionRoutes } from './routes/sessions.js';

/**
 * Creates a test app that bypasses JWT auth with a fixed subject.
 * For use in unit tests only.
 */
export function createTestApp(
  service: ResearchService,
  memoryBackend: MemoryBackend = 'memory',
): OpenAPIHono<AppEnv> {
  const app = createRouter();

  app.use('*', cors());
  app.use('*', requestId);

  app.onError(errorHandler);

  app.route('/health', createHealthRoutes({ service, memoryBackend }));

  app.use('*', async (c, next) => {
    c.set('subject', 'test-user');
    await next();
  });

  app.route('/sessions', createSessionRoutes(service));

  return app;
}
