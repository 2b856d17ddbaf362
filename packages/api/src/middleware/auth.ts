import { jwtVerify } from 'jose';
import type { JWTVerifyGetKey } from 'jose';
import { createMiddleware } from 'hono/factory';
import type { AppEnv } from '../types.js';

export interface AuthConfig {
  readonly issuer: string;
  readonly audience: string;
  /** Key set the bearer tokens are verified against. */
  readonly jwks: JWTVerifyGetKey;
}

export function createAuthMiddleware(config: AuthConfig): ReturnType<typeof createMiddleware<AppEnv>> {
  return createMiddleware<AppEnv>(async (c, next) => {
    const authHeader = c.req.header('Authorization');
    if (!authHeader?.startsWith('Bearer ')) {
      return c.json(
        { error: 'Missing or invalid Authorization header', code: 'UNAUTHORIZED' },
        401,
      );
    }

    const token = authHeader.slice(7);

    const { payload } = await jwtVerify(token, config.jwks, {
      issuer: config.issuer,
      audience: config.audience,
    });

    if (!payload.sub) {
      return c.json({ error: 'Token missing sub claim', code: 'UNAUTHORIZED' }, 401);
    }

    c.set('subject', payload.sub);
    await next();
  });
}
