import { createChildLogger } from '@agora/shared/src/logger.js';
import { ConfigurationError, LlmError } from '@agora/shared/src/utils/errors.js';
import { hashString } from '@agora/shared/src/utils/math.js';
import { extractJson } from './json-extraction.js';

const log = createChildLogger('llm:client');

const MAX_TRANSIENT_RETRIES = 3;
const BASE_DELAY_MS = 1000;
const DEFAULT_MODEL = 'gemini-2.0-flash';

export interface LlmRequest {
  readonly systemPrompt: string;
  readonly userMessage: string;
  readonly jsonSchema?: Record<string, unknown>;
  readonly signal?: AbortSignal;
}

export interface LlmResponse {
  readonly content: string;
  readonly tokenUsage?: {
    readonly input: number;
    readonly output: number;
  };
}

export interface LlmClient {
  invoke(request: LlmRequest): Promise<LlmResponse>;
}

/** Reads the first line following a `[TAG]` marker in a prompt section. */
function taggedLine(message: string, tag: string): string | undefined {
  const match = new RegExp(`\\[${tag}\\]\\s*\\n(?:Title:\\s*)?(.+)`).exec(message);
  return match?.[1].trim();
}

function mockScore(seed: number, salt: number): number {
  return 5 + (Math.abs(seed + salt * 7919) % 5);
}

function createMockResponse(systemPrompt: string, userMessage: string): string {
  const prompt = systemPrompt.toLowerCase();
  const seed = hashString(userMessage);

  if (prompt.includes('generation agent')) {
    const countMatch = /exactly\s+(\d+)\s+hypothes/i.exec(systemPrompt);
    const count = countMatch ? parseInt(countMatch[1], 10) : 1;
    return JSON.stringify({
      hypotheses: Array.from({ length: count }, (_, i) => {
        const tag = Math.abs(hashString(`${String(seed)}:${String(i)}`)).toString(36);
        return {
          title: `Candidate mechanism ${tag}`,
          description: `Mechanism ${tag} explains the observed effect through pathway ${tag}.`,
          rationale: 'Consistent with the goal constraints.',
        };
      }),
    });
  }

  if (prompt.includes('reflection agent')) {
    const scores = {
      scientificMerit: mockScore(seed, 1),
      novelty: mockScore(seed, 2),
      testability: mockScore(seed, 3),
      impact: mockScore(seed, 4),
      limitations: mockScore(seed, 5),
    };
    return JSON.stringify({
      strengths: ['Clear causal chain'],
      weaknesses: ['Limited supporting evidence'],
      suggestions: ['Propose a falsifying experiment'],
      scores,
      recommendation: 'accept',
    });
  }

  if (prompt.includes('ranking agent')) {
    const titleA = taggedLine(userMessage, 'HYPOTHESIS_A') ?? '';
    const titleB = taggedLine(userMessage, 'HYPOTHESIS_B') ?? '';
    const winner = hashString(titleA) >= hashString(titleB) ? 'A' : 'B';
    return JSON.stringify({
      transcript: `Expert 1 favours ${winner}. Expert 2 agrees after discussing testability.`,
      rationale: `Hypothesis ${winner} is more specific.`,
      winner,
      confidence: 80,
    });
  }

  if (prompt.includes('evolution agent')) {
    const parentTitle = taggedLine(userMessage, 'PARENT_1') ?? 'parent';
    return JSON.stringify({
      hypotheses: [
        {
          title: `Refined ${parentTitle} ${Math.abs(seed).toString(36)}`,
          description: `A narrower variant of ${parentTitle} with an explicit mechanism.`,
          rationale: 'Addresses reviewer weaknesses.',
          strategy: 'specialization',
        },
      ],
    });
  }

  if (prompt.includes('meta-review agent')) {
    return JSON.stringify({
      summary: 'The leading hypotheses converge on a shared mechanism.',
      themes: ['mechanism'],
      strengths: ['Testable predictions'],
      recommendations: ['Run the proposed experiments'],
      hypothesisNotes: [],
    });
  }

  return JSON.stringify({ result: 'Mock LLM response' });
}

function createMockClient(): LlmClient {
  log.info('Using mock LLM client');

  return {
    invoke(request: LlmRequest): Promise<LlmResponse> {
      log.debug({ systemPromptLength: request.systemPrompt.length }, 'Mock LLM invocation');

      const content = createMockResponse(request.systemPrompt, request.userMessage);

      return Promise.resolve({
        content,
        tokenUsage: { input: 100, output: 50 },
      });
    },
  };
}

export function isTransientError(error: unknown): boolean {
  if (!(error instanceof Error)) {
    return false;
  }

  const statusCode =
    ('status' in error && typeof error.status === 'number' ? error.status : undefined) ??
    ('statusCode' in error && typeof error.statusCode === 'number' ? error.statusCode : undefined);

  if (typeof statusCode === 'number' && (statusCode === 429 || statusCode >= 500)) {
    return true;
  }

  const message = error.message.toLowerCase();
  const transientPatterns = [
    '429', 'rate limit', 'too many requests',
    '500', '502', '503', 'internal server error', 'bad gateway', 'service unavailable',
    'econnreset', 'etimedout', 'timeout', 'network',
    'socket hang up', 'econnrefused',
  ];

  return transientPatterns.some((pattern) => message.includes(pattern));
}

async function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function computeBackoffMs(attempt: number): number {
  const exponential = BASE_DELAY_MS * Math.pow(2, attempt);
  const jitter = Math.random() * BASE_DELAY_MS;
  return exponential + jitter;
}

async function createVertexClient(): Promise<LlmClient> {
  const projectId = process.env['AGORA_GCP_PROJECT_ID'] ?? process.env['GCP_PROJECT_ID'];
  const location = process.env['VERTEX_AI_LOCATION'] ?? 'europe-west1';
  const modelName = process.env['AGORA_LLM_MODEL'] ?? DEFAULT_MODEL;

  if (!projectId) {
    throw new ConfigurationError(
      'AGORA_GCP_PROJECT_ID environment variable is required for Vertex AI LLM client',
    );
  }

  const { ChatVertexAI } = await import('@langchain/google-vertexai');

  const model = new ChatVertexAI({
    model: modelName,
    location,
    temperature: 0.7,
    authOptions: { projectId },
    responseMimeType: 'application/json',
  });

  log.info({ projectId, location, model: modelName }, 'Using Vertex AI LLM client');

  return {
    async invoke(request: LlmRequest): Promise<LlmResponse> {
      log.debug({ systemPromptLength: request.systemPrompt.length }, 'Vertex AI LLM invocation');

      let lastError: Error | undefined;

      for (let attempt = 0; attempt < MAX_TRANSIENT_RETRIES; attempt++) {
        try {
          const response = await model.invoke(
            [
              ['system', request.systemPrompt],
              ['human', request.userMessage],
            ],
            { signal: request.signal },
          );

          const rawContent =
            typeof response.content === 'string'
              ? response.content
              : JSON.stringify(response.content);

          // Validate that the response is parseable JSON, using extractJson as safety net
          const parsed = extractJson(rawContent);
          const content = JSON.stringify(parsed);

          return {
            content,
            tokenUsage: response.usage_metadata
              ? {
                  input: response.usage_metadata.input_tokens,
                  output: response.usage_metadata.output_tokens,
                }
              : undefined,
          };
        } catch (error) {
          lastError = error instanceof Error ? error : new Error(String(error));

          if (request.signal?.aborted || !isTransientError(error)) {
            throw new LlmError(
              `Vertex AI invocation failed: ${lastError.message}`,
              false,
              lastError,
            );
          }

          log.warn(
            { attempt: attempt + 1, maxRetries: MAX_TRANSIENT_RETRIES, error: lastError.message },
            'Transient LLM error, retrying',
          );

          if (attempt < MAX_TRANSIENT_RETRIES - 1) {
            await sleep(computeBackoffMs(attempt));
          }
        }
      }

      throw new LlmError(
        `Vertex AI invocation failed after ${String(MAX_TRANSIENT_RETRIES)} retries: ${lastError?.message ?? 'unknown error'}`,
        true,
        lastError,
      );
    },
  };
}

export async function createLlmClient(): Promise<LlmClient> {
  if (process.env['AGORA_MOCK_LLM'] === 'true') {
    return createMockClient();
  }

  return createVertexClient();
}
