import { describe, it, expect, beforeEach, vi } from 'vitest';

const { completionsCreate, embeddingsCreate, clientOptions } = vi.hoisted(() => ({
  completionsCreate: vi.fn(),
  embeddingsCreate: vi.fn(),
  clientOptions: [] as unknown[],
}));

vi.mock('openai', () => ({
  default: class {
    chat = { completions: { create: completionsCreate } };
    embeddings = { create: embeddingsCreate };
    constructor(options: unknown) {
      clientOptions.push(options);
    }
  },
}));

import { OpenAIChatProvider } from '../../src/providers/OpenAIChatProvider.js';
import { OpenAIEmbeddingProvider } from '../../src/providers/OpenAIEmbeddingProvider.js';

beforeEach(() => {
  completionsCreate.mockReset();
  embeddingsCreate.mockReset();
  clientOptions.length = 0;
});

describe('OpenAIChatProvider', () => {
  it('should be available only with an API key', async () => {
    expect(await new OpenAIChatProvider({ apiKey: 'test-key' }).isAvailable()).toBe(true);
    expect(await new OpenAIChatProvider({ apiKey: '' }).isAvailable()).toBe(false);
  });

  it('should build its client without retries', () => {
    new OpenAIChatProvider({ apiKey: 'test-key' });
    expect(clientOptions).toEqual([{ apiKey: 'test-key', maxRetries: 0 }]);
  });

  it('should send system and user messages and return the reply', async () => {
    completionsCreate.mockResolvedValueOnce({
      choices: [{ message: { role: 'assistant', content: '[{"dish":"Soup"}]' } }],
    });
    const controller = new AbortController();
    const provider = new OpenAIChatProvider({ apiKey: 'test-key' });

    const text = await provider.generate('Classify', 'You are a classifier', controller.signal);

    expect(text).toBe('[{"dish":"Soup"}]');
    expect(completionsCreate).toHaveBeenCalledWith(
      {
        model: 'gpt-4o-mini',
        messages: [
          { role: 'system', content: 'You are a classifier' },
          { role: 'user', content: 'Classify' },
        ],
        temperature: 0.1,
      },
      { signal: controller.signal }
    );
  });

  it('should return an empty string when there is no choice', async () => {
    completionsCreate.mockResolvedValueOnce({ choices: [] });
    expect(await new OpenAIChatProvider({ apiKey: 'test-key' }).generate('p', 's')).toBe('');
  });

  it('should propagate API errors', async () => {
    completionsCreate.mockRejectedValueOnce(new Error('429 Rate limit reached'));
    await expect(new OpenAIChatProvider({ apiKey: 'test-key' }).generate('p', 's')).rejects.toThrow(
      '429 Rate limit reached'
    );
  });
});

describe('OpenAIEmbeddingProvider', () => {
  it('should request 1024-dimension embeddings in index order', async () => {
    embeddingsCreate.mockResolvedValueOnce({
      data: [
        { embedding: [0.3], index: 1 },
        { embedding: [0.1], index: 0 },
      ],
    });
    const provider = new OpenAIEmbeddingProvider({ apiKey: 'test-key' });

    expect(await provider.generateBatch(['tofu', 'tempeh'])).toEqual([[0.1], [0.3]]);
    expect(embeddingsCreate).toHaveBeenCalledWith({
      model: 'text-embedding-3-small',
      input: ['tofu', 'tempeh'],
      dimensions: 1024,
    });
  });

  it('should embed a single text', async () => {
    embeddingsCreate.mockResolvedValueOnce({ data: [{ embedding: [0.5, 0.5], index: 0 }] });
    expect(await new OpenAIEmbeddingProvider({ apiKey: 'test-key' }).generate('tofu')).toEqual([
      0.5, 0.5,
    ]);
  });

  it('should skip the API for an empty batch', async () => {
    expect(await new OpenAIEmbeddingProvider({ apiKey: 'test-key' }).generateBatch([])).toEqual([]);
    expect(embeddingsCreate).not.toHaveBeenCalled();
  });

  it('should reject a short response', async () => {
    embeddingsCreate.mockResolvedValueOnce({ data: [{ embedding: [0.1], index: 0 }] });
    await expect(
      new OpenAIEmbeddingProvider({ apiKey: 'test-key' }).generateBatch(['a', 'b'])
    ).rejects.toThrow('OpenAI returned 1 embeddings for 2 inputs');
  });
});
