export const EMBEDDING_DIMENSION = 768;
export const DEFAULT_EMBEDDING_MODEL = 'text-embedding-005';

export interface EmbeddingClient {
  generateEmbedding(text: string): Promise<number[]>;
  generateEmbeddings(texts: readonly string[]): Promise<number[][]>;
}
