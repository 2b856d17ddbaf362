import type { protos, v1 } from '@google-cloud/aiplatform';
import { createChildLogger } from '@agora/shared/src/logger.js';
import { ConfigurationError, LlmError } from '@agora/shared/src/utils/errors.js';
import type { EmbeddingClient } from './embedding-client.js';
import { DEFAULT_EMBEDDING_MODEL, EMBEDDING_DIMENSION } from './embedding-client.js';

const log = createChildLogger('embedding:vertex');

type ProtoValue = protos.google.protobuf.IValue;

function embeddingValues(prediction: ProtoValue): number[] | undefined {
  const embeddings = prediction.structValue?.fields?.['embeddings'];
  const values = embeddings?.structValue?.fields?.['values']?.listValue?.values;
  if (!values) {
    return undefined;
  }
  const numbers: number[] = [];
  for (const value of values) {
    if (typeof value.numberValue !== 'number') {
      return undefined;
    }
    numbers.push(value.numberValue);
  }
  return numbers;
}

export function createVertexEmbeddingClient(): EmbeddingClient {
  const projectId = process.env['AGORA_GCP_PROJECT_ID'] ?? process.env['GCP_PROJECT_ID'];
  const location = process.env['VERTEX_AI_LOCATION'] ?? 'europe-west1';
  const model = process.env['AGORA_EMBEDDING_MODEL'] ?? DEFAULT_EMBEDDING_MODEL;

  if (!projectId) {
    throw new ConfigurationError(
      'AGORA_GCP_PROJECT_ID environment variable is required for Vertex AI embedding client',
    );
  }

  const endpoint = `projects/${projectId}/locations/${location}/publishers/google/models/${model}`;

  log.info({ projectId, location, model }, 'Initializing Vertex AI embedding client');

  let clientInstance: v1.PredictionServiceClient | undefined;

  async function getClient(): Promise<v1.PredictionServiceClient> {
    if (!clientInstance) {
      const aiplatform = await import('@google-cloud/aiplatform');
      clientInstance = new aiplatform.v1.PredictionServiceClient({
        apiEndpoint: `${location}-aiplatform.googleapis.com`,
        projectId,
      });
    }
    return clientInstance;
  }

  async function embed(texts: readonly string[]): Promise<number[][]> {
    try {
      const client = await getClient();
      const instances: ProtoValue[] = texts.map((text) => ({
        structValue: {
          fields: {
            content: { stringValue: text },
            task_type: { stringValue: 'SEMANTIC_SIMILARITY' },
          },
        },
      }));

      const [response] = await client.predict({ endpoint, instances });
      const predictions = response.predictions ?? [];
      if (predictions.length !== texts.length) {
        log.error({ predictions: predictions.length }, 'Unexpected embedding response');
        throw new LlmError(
          `Unexpected embedding response: expected ${String(texts.length)} predictions, got ${String(predictions.length)}`,
          false,
        );
      }

      return predictions.map((prediction) => {
        const values = embeddingValues(prediction);
        if (!values || values.length !== EMBEDDING_DIMENSION) {
          log.error({ dimension: values?.length }, 'Unexpected embedding structure');
          throw new LlmError(
            `Unexpected embedding dimension: expected ${String(EMBEDDING_DIMENSION)}, got ${String(values?.length ?? 0)}`,
            false,
          );
        }
        return values;
      });
    } catch (error) {
      if (error instanceof LlmError) {
        throw error;
      }
      throw new LlmError(
        `Vertex AI embedding failed: ${error instanceof Error ? error.message : String(error)}`,
        true,
        error instanceof Error ? error : undefined,
      );
    }
  }

  return {
    async generateEmbedding(text: string): Promise<number[]> {
      log.debug({ textLength: text.length }, 'Generating single embedding');
      const [result] = await embed([text]);
      return result;
    },

    async generateEmbeddings(texts: readonly string[]): Promise<number[][]> {
      log.debug({ count: texts.length }, 'Generating batch embeddings');
      return embed(texts);
    },
  };
}
