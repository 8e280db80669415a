/**
 * Embedding provider interface.
 * Wraps external embedding APIs (Voyage, OpenAI) used to query the
 * knowledge index.
 */

export interface IEmbeddingProvider {
  /** Vector length produced by this provider. */
  readonly dimensions: number;

  generate(text: string): Promise<number[]>;

  /** Embeddings in input order. */
  generateBatch(texts: string[]): Promise<number[][]>;
}
