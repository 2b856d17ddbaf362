import { hashString } from '@agora/shared/src/utils/math.js';
import type { EmbeddingClient } from './embedding-client.js';
import { EMBEDDING_DIMENSION } from './embedding-client.js';

function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .split(/[^\p{L}\p{N}]+/u)
    .filter((token) => token.length > 0);
}

/**
 * Hashed bag of words: texts sharing vocabulary land close together, and
 * identical texts map to identical vectors.
 */
function generateDeterministicVector(text: string): number[] {
  const vector: number[] = new Array<number>(EMBEDDING_DIMENSION).fill(0);
  for (const token of tokenize(text)) {
    const hash = hashString(token);
    const index = Math.abs(hash) % EMBEDDING_DIMENSION;
    vector[index] += hash < 0 ? -1 : 1;
  }

  const magnitude = Math.sqrt(vector.reduce((sum, v) => sum + v * v, 0));
  if (magnitude === 0) {
    vector[0] = 1;
    return vector;
  }
  return vector.map((v) => v / magnitude);
}

export function createMockEmbeddingClient(): EmbeddingClient {
  return {
    generateEmbedding(text: string): Promise<number[]> {
      return Promise.resolve(generateDeterministicVector(text));
    },

    generateEmbeddings(texts: readonly string[]): Promise<number[][]> {
      return Promise.resolve(texts.map((t) => generateDeterministicVector(t)));
    },
  };
}
