import type { z } from 'zod';
import { createChildLogger } from '@agora/shared/src/logger.js';
import { AgentError } from '@agora/shared/src/utils/errors.js';
import type { LlmClient, LlmRequest } from './llm-client.js';
import { extractJson } from './json-extraction.js';

const log = createChildLogger('llm:invoke-and-validate');

const DEFAULT_MAX_RETRIES = 1;

export interface InvokeAndValidateOptions<T> {
  readonly llmClient: LlmClient;
  readonly request: LlmRequest;
  readonly schema: z.ZodType<T>;
  readonly agentName: string;
  readonly maxRetries?: number;
}

function correctionFor(request: LlmRequest, errors: readonly string[]): LlmRequest {
  return {
    ...request,
    userMessage: `${request.userMessage}\n\n[CORRECTION] Your previous response had validation errors. Please fix these issues and respond with valid JSON:\n${errors.map((e) => `- ${e}`).join('\n')}`,
  };
}

/**
 * Invokes the model and validates its JSON against `schema`, retrying with a
 * correction message. Client errors propagate without a retry here; the LLM
 * client has its own transient retry.
 */
export async function invokeAndValidate<T>(options: InvokeAndValidateOptions<T>): Promise<T> {
  const { llmClient, request, schema, agentName, maxRetries = DEFAULT_MAX_RETRIES } = options;

  let lastErrors: string[] = [];

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    request.signal?.throwIfAborted();
    const response = await llmClient.invoke(
      attempt === 0 ? request : correctionFor(request, lastErrors),
    );

    let parsed: unknown;
    try {
      parsed = extractJson(response.content);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      lastErrors = [`Failed to parse JSON: ${message}`];
      log.warn(
        { agentName, attempt: attempt + 1, errors: lastErrors },
        'JSON parse failed, retrying with correction',
      );
      continue;
    }

    const result = schema.safeParse(parsed);
    if (result.success) {
      return result.data;
    }

    lastErrors = result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);

    log.warn(
      { agentName, attempt: attempt + 1, errors: lastErrors },
      'Zod validation failed, retrying with correction',
    );
  }

  throw new AgentError(
    `${agentName} returned invalid output after ${String(maxRetries + 1)} attempts: ${lastErrors.join(', ')}`,
  );
}
