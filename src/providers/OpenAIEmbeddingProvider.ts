/**
 * OpenAI embedding provider.
 * text-embedding-3-small shortened to the knowledge index width (1024).
 */

import OpenAI from 'openai';
import type { IEmbeddingProvider } from './IEmbeddingProvider.js';

const DEFAULT_MODEL = 'text-embedding-3-small';
const DEFAULT_DIMENSIONS = 1024;

export class OpenAIEmbeddingProvider implements IEmbeddingProvider {
  private readonly client: OpenAI;
  private readonly model: string;
  readonly dimensions: number;

  constructor(opts?: { apiKey?: string; model?: string; dimensions?: number; client?: OpenAI }) {
    this.client =
      opts?.client ??
      new OpenAI({
        apiKey: opts?.apiKey ?? process.env.OPENAI_API_KEY ?? '',
        maxRetries: 0,
      });
    this.model = opts?.model ?? DEFAULT_MODEL;
    this.dimensions = opts?.dimensions ?? DEFAULT_DIMENSIONS;
  }

  async generate(text: string): Promise<number[]> {
    const [embedding] = await this.embed([text]);
    return embedding;
  }

  async generateBatch(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) return [];
    return this.embed(texts);
  }

  private async embed(input: string[]): Promise<number[][]> {
    const response = await this.client.embeddings.create({
      model: this.model,
      input,
      dimensions: this.dimensions,
    });

    if (response.data.length !== input.length) {
      throw new Error(
        `OpenAI returned ${response.data.length} embeddings for ${input.length} inputs`
      );
    }
    return [...response.data].sort((a, b) => a.index - b.index).map((d) => d.embedding);
  }
}
