import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { AgentError, LlmError } from '@agora/shared/src/utils/errors.js';
import type { LlmClient, LlmRequest } from './llm-client.js';
import { invokeAndValidate } from './invoke-and-validate.js';

const VerdictSchema = z.object({
  winner: z.enum(['a', 'b']),
  confidence: z.number().min(0).max(1),
});

interface ScriptedClient extends LlmClient {
  readonly requests: LlmRequest[];
}

/** Replies with the scripted contents in order, repeating the last one. */
function scriptedClient(contents: readonly string[]): ScriptedClient {
  const requests: LlmRequest[] = [];
  return {
    requests,
    invoke(request: LlmRequest) {
      requests.push(request);
      const content = contents[Math.min(requests.length, contents.length) - 1];
      return Promise.resolve({ content });
    },
  };
}

const request: LlmRequest = {
  systemPrompt: 'You judge hypothesis debates.',
  userMessage: '[HYPOTHESIS A]\nEfflux pumps\n\n[HYPOTHESIS B]\nPersister cells',
};

describe('invokeAndValidate', () => {
  it('should return the verdict when the first reply is valid', async () => {
    const client = scriptedClient([JSON.stringify({ winner: 'a', confidence: 0.7 })]);

    const verdict = await invokeAndValidate({
      llmClient: client,
      request,
      schema: VerdictSchema,
      agentName: 'ranking',
    });

    expect(verdict).toEqual({ winner: 'a', confidence: 0.7 });
    expect(client.requests).toHaveLength(1);
  });

  it('should read JSON fenced in a markdown block', async () => {
    const client = scriptedClient(['Verdict:\n```json\n{"winner": "b", "confidence": 0.4}\n```']);

    const verdict = await invokeAndValidate({
      llmClient: client,
      request,
      schema: VerdictSchema,
      agentName: 'ranking',
    });

    expect(verdict).toEqual({ winner: 'b', confidence: 0.4 });
  });

  it('should send a correction listing the schema errors', async () => {
    const client = scriptedClient([
      JSON.stringify({ winner: 'c', confidence: 0.5 }),
      JSON.stringify({ winner: 'b', confidence: 0.5 }),
    ]);

    const verdict = await invokeAndValidate({
      llmClient: client,
      request,
      schema: VerdictSchema,
      agentName: 'ranking',
    });

    expect(verdict.winner).toBe('b');
    expect(client.requests).toHaveLength(2);
    expect(client.requests[1].userMessage.startsWith(request.userMessage)).toBe(true);
    expect(client.requests[1].userMessage).toContain('[CORRECTION]');
    expect(client.requests[1].userMessage).toContain('- winner: ');
  });

  it('should send a correction when the reply is not JSON', async () => {
    const client = scriptedClient([
      'Hypothesis A wins.',
      JSON.stringify({ winner: 'a', confidence: 1 }),
    ]);

    await invokeAndValidate({
      llmClient: client,
      request,
      schema: VerdictSchema,
      agentName: 'ranking',
    });

    expect(client.requests[1].userMessage).toContain('- Failed to parse JSON: ');
  });

  it('should throw an AgentError once the retries are spent', async () => {
    const client = scriptedClient([JSON.stringify({ winner: 'a' })]);

    const attempt = invokeAndValidate({
      llmClient: client,
      request,
      schema: VerdictSchema,
      agentName: 'ranking',
      maxRetries: 2,
    });

    await expect(attempt).rejects.toThrow(AgentError);
    await expect(attempt).rejects.toThrow(
      'ranking returned invalid output after 3 attempts: confidence: Required',
    );
    expect(client.requests).toHaveLength(3);
  });

  it('should make a single attempt when retries are disabled', async () => {
    const client = scriptedClient(['{}']);

    await expect(
      invokeAndValidate({
        llmClient: client,
        request,
        schema: VerdictSchema,
        agentName: 'ranking',
        maxRetries: 0,
      }),
    ).rejects.toThrow('ranking returned invalid output after 1 attempts');
    expect(client.requests).toHaveLength(1);
  });

  it('should propagate client errors without a correction retry', async () => {
    const failure = new LlmError('Rate limit exceeded', true);
    const requests: LlmRequest[] = [];
    const client: LlmClient = {
      invoke(req: LlmRequest) {
        requests.push(req);
        return Promise.reject(failure);
      },
    };

    await expect(
      invokeAndValidate({ llmClient: client, request, schema: VerdictSchema, agentName: 'ranking' }),
    ).rejects.toBe(failure);
    expect(requests).toHaveLength(1);
  });

  it('should stop before invoking when the signal is already aborted', async () => {
    const client = scriptedClient([JSON.stringify({ winner: 'a', confidence: 1 })]);
    const controller = new AbortController();
    controller.abort(new Error('task timed out'));

    await expect(
      invokeAndValidate({
        llmClient: client,
        request: { ...request, signal: controller.signal },
        schema: VerdictSchema,
        agentName: 'ranking',
      }),
    ).rejects.toThrow('task timed out');
    expect(client.requests).toHaveLength(0);
  });
});
