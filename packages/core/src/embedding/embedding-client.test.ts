import { describe, it, expect } from 'vitest';
import { cosineSimilarity } from '@agora/shared/src/utils/math.js';
import { createMockEmbeddingClient } from './mock-embedding-client.js';
import { EMBEDDING_DIMENSION } from './embedding-client.js';
import { buildHypothesisEmbeddingText } from './embedding-text-builder.js';

describe('MockEmbeddingClient', () => {
  it('should generate embedding with correct dimensions', async () => {
    const client = createMockEmbeddingClient();
    const embedding = await client.generateEmbedding('test input');

    expect(embedding).toHaveLength(EMBEDDING_DIMENSION);
  });

  it('should generate identical embeddings for identical input', async () => {
    const client = createMockEmbeddingClient();
    const e1 = await client.generateEmbedding('Membrane transport limits growth');
    const e2 = await client.generateEmbedding('Membrane transport limits growth');

    expect(e1).toEqual(e2);
    expect(cosineSimilarity(e1, e2)).toBeCloseTo(1, 9);
  });

  it('should place texts with shared vocabulary closer than unrelated ones', async () => {
    const client = createMockEmbeddingClient();
    const [base, related, unrelated] = await client.generateEmbeddings([
      'kinase inhibition slows tumour growth',
      'kinase inhibition slows cell growth',
      'river sediment alters delta shape',
    ]);

    expect(cosineSimilarity(base, related)).toBeGreaterThan(cosineSimilarity(base, unrelated));
  });

  it('should generate normalized unit vectors', async () => {
    const client = createMockEmbeddingClient();
    const embedding = await client.generateEmbedding('test');

    const magnitude = Math.sqrt(embedding.reduce((sum, v) => sum + v * v, 0));
    expect(magnitude).toBeCloseTo(1.0, 5);
  });

  it('should still return a unit vector for text without words', async () => {
    const client = createMockEmbeddingClient();
    const embedding = await client.generateEmbedding('  ...  ');

    expect(embedding[0]).toBe(1);
  });
});

describe('buildHypothesisEmbeddingText', () => {
  it('should join title, description and rationale', () => {
    const text = buildHypothesisEmbeddingText({
      title: 'Gut flora',
      description: 'Microbes modulate sleep.',
      rationale: 'Observed in mice',
    });

    expect(text).toBe('Gut flora. Microbes modulate sleep. Observed in mice');
  });

  it('should skip an empty rationale', () => {
    const text = buildHypothesisEmbeddingText({ title: 'Title', description: 'Body', rationale: ' ' });

    expect(text).toBe('Title. Body');
  });
});
