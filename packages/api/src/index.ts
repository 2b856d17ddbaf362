import { serve } from '@hono/node-server';
import { createRemoteJWKSet } from 'jose';
import { bootstrapResearchService } from '@agora/core/src/services/research/bootstrap.js';
import { createChildLogger } from '@agora/shared/src/logger.js';
import { ConfigurationError, toError } from '@agora/shared/src/utils/errors.js';
import type { AuthConfig } from './middleware/auth.js';
import { createApp } from './app.js';

const log = createChildLogger('api:main');

function requireEnv(name: string): string {
  const value = process.env[name];
  if (!value) {
    throw new ConfigurationError(`Missing required environment variable: ${name}`);
  }
  return value;
}

function authFromEnv(): AuthConfig {
  return {
    issuer: requireEnv('AUTH_ISSUER'),
    audience: requireEnv('AUTH_AUDIENCE'),
    jwks: createRemoteJWKSet(new URL(requireEnv('AUTH_JWKS_URL'))),
  };
}

async function main(): Promise<void> {
  const port = parseInt(process.env['PORT'] ?? '3000', 10);
  const auth = authFromEnv();
  const { service, backend } = await bootstrapResearchService();

  const app = createApp({ service, auth, memoryBackend: backend });

  log.info({ port, backend }, 'Starting Agora API server');

  const server = serve({ fetch: app.fetch, port }, (info) => {
    log.info({ port: info.port }, 'Agora API server running');
  });

  const shutdown = (signal: string): void => {
    log.info({ signal }, 'Shutting down');
    server.close();
    service.shutdown().then(
      () => process.exit(0),
      (error: unknown) => {
        log.error({ err: toError(error) }, 'Shutdown failed');
        process.exit(1);
      },
    );
  };
  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

main().catch((error: unknown) => {
  log.error({ err: toError(error) }, 'Failed to start API server');
  process.exit(1);
});
