/**
 * Voyage AI embedding provider.
 * Plain fetch against the embeddings endpoint; no SDK dependency.
 *
 * Single texts are embedded as queries (dish names at request time), batches
 * as documents (knowledge base seeding). Voyage tunes the vectors differently
 * for the two sides of a retrieval.
 */

import { z } from 'zod';
import type { IEmbeddingProvider } from './IEmbeddingProvider.js';

const API_URL = 'https://api.voyageai.com/v1/embeddings';
const DEFAULT_MODEL = 'voyage-3.5-lite';
const DEFAULT_DIMENSIONS = 1024;

const responseSchema = z.object({
  data: z.array(
    z.object({
      embedding: z.array(z.number()),
      index: z.number().int(),
    })
  ),
});

export type VoyageInputType = 'query' | 'document';

export class VoyageEmbeddingProvider implements IEmbeddingProvider {
  private readonly apiKey: string;
  private readonly model: string;
  readonly dimensions: number;

  constructor(opts?: { apiKey?: string; model?: string; dimensions?: number }) {
    this.apiKey = opts?.apiKey ?? process.env.VOYAGE_API_KEY ?? '';
    this.model = opts?.model ?? DEFAULT_MODEL;
    this.dimensions = opts?.dimensions ?? DEFAULT_DIMENSIONS;
  }

  async generate(text: string): Promise<number[]> {
    const [embedding] = await this.callApi([text], 'query');
    return embedding;
  }

  async generateBatch(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) return [];
    return this.callApi(texts, 'document');
  }

  // ── Private ──

  private async callApi(input: string[], inputType: VoyageInputType): Promise<number[][]> {
    const body: Record<string, unknown> = {
      input,
      model: this.model,
      input_type: inputType,
    };
    if (this.dimensions !== DEFAULT_DIMENSIONS) {
      body.output_dimension = this.dimensions;
    }

    const res = await fetch(API_URL, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        Authorization: `Bearer ${this.apiKey}`,
      },
      body: JSON.stringify(body),
    });

    if (!res.ok) {
      const detail = await res
        .json()
        .then((err: unknown) => z.object({ detail: z.string() }).safeParse(err))
        .then((parsed) => (parsed.success ? parsed.data.detail : 'Unknown error'))
        .catch(() => 'Unknown error');
      throw new Error(`Voyage API error (${res.status}): ${detail}`);
    }

    const parsed = responseSchema.safeParse(await res.json());
    if (!parsed.success || parsed.data.data.length !== input.length) {
      throw new Error('Voyage API returned an unexpected response shape');
    }

    return [...parsed.data.data].sort((a, b) => a.index - b.index).map((d) => d.embedding);
  }
}
