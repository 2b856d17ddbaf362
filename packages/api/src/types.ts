import { OpenAPIHono } from '@hono/zod-openapi';

export interface AppEnv {
  Variables: {
    requestId: string;
    /** `sub` claim of the verified bearer token. */
    subject: string;
  };
}

export function createRouter(): OpenAPIHono<AppEnv> {
  return new OpenAPIHono<AppEnv>({
    defaultHook: (result, c): Response | undefined => {
      if (!result.success) {
        const details = result.error.errors.map(
          (e) => `${e.path.join('.')}: ${e.message}`,
        );
        return c.json(
          {
            error: 'Validation failed',
            code: 'VALIDATION_ERROR',
            requestId: c.get('requestId'),
            details,
          },
          400,
        );
      }
    },
  });
}
