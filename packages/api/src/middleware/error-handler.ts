import type { Context } from 'hono';
import { HTTPException } from 'hono/http-exception';
import { ZodError } from 'zod';
import { errors as joseErrors } from 'jose';
import {
  InvalidTransitionError,
  LlmError,
  NotFoundError,
  PersistenceError,
  SchemaValidationError,
  SessionError,
} from '@agora/shared/src/utils/errors.js';
import { createChildLogger } from '@agora/shared/src/logger.js';
import type { AppEnv } from '../types.js';

const log = createChildLogger('api:error-handler');

interface ErrorResponse {
  readonly error: string;
  readonly code: string;
  readonly requestId: string;
  readonly details?: readonly string[];
}

export function errorHandler(err: Error, c: Context<AppEnv>): Response {
  const requestId = c.get('requestId');

  if (err instanceof joseErrors.JOSEError) {
    const body: ErrorResponse = {
      error: 'Invalid or expired token',
      code: 'UNAUTHORIZED',
      requestId,
    };
    return c.json(body, 401);
  }

  if (err instanceof HTTPException) {
    return err.getResponse();
  }

  if (err instanceof ZodError) {
    const details = err.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
    const body: ErrorResponse = {
      error: 'Validation failed',
      code: 'VALIDATION_ERROR',
      requestId,
      details,
    };
    return c.json(body, 400);
  }

  if (err instanceof SchemaValidationError) {
    const body: ErrorResponse = {
      error: err.message,
      code: 'VALIDATION_ERROR',
      requestId,
      details: err.validationErrors,
    };
    return c.json(body, 400);
  }

  if (err instanceof NotFoundError) {
    const body: ErrorResponse = {
      error: err.message,
      code: 'NOT_FOUND',
      requestId,
    };
    return c.json(body, 404);
  }

  if (err instanceof SessionError || err instanceof InvalidTransitionError) {
    log.warn({ requestId, error: err.message }, 'Request conflicts with session state');
    const body: ErrorResponse = {
      error: err.message,
      code: 'CONFLICT',
      requestId,
    };
    return c.json(body, 409);
  }

  if (err instanceof LlmError) {
    log.error({ requestId, error: err.message }, 'LLM error');
    const body: ErrorResponse = {
      error: 'Language model processing failed',
      code: 'LLM_ERROR',
      requestId,
    };
    return c.json(body, 502);
  }

  if (err instanceof PersistenceError) {
    log.error({ requestId, error: err.message }, 'Persistence error');
    const body: ErrorResponse = {
      error: 'Internal server error',
      code: 'INTERNAL_ERROR',
      requestId,
    };
    return c.json(body, 500);
  }

  log.error({ requestId, error: err.message }, 'Unhandled error');
  const body: ErrorResponse = {
    error: 'Internal server error',
    code: 'INTERNAL_ERROR',
    requestId,
  };
  return c.json(body, 500);
}
