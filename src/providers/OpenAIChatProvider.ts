/**
 * OpenAI chat provider.
 * Wraps the OpenAI chat completions API (gpt-4o-mini by default).
 */

import OpenAI from 'openai';
import type { ILanguageModelProvider } from './ILanguageModelProvider.js';

const DEFAULT_MODEL = 'gpt-4o-mini';

export class OpenAIChatProvider implements ILanguageModelProvider {
  readonly name = 'openai';
  private readonly client: OpenAI;
  private readonly apiKey: string;
  private readonly model: string;

  constructor(opts?: {
    apiKey?: string;
    model?: string;
    /** Preconfigured client (custom fetch, base URL, retries). */
    client?: OpenAI;
  }) {
    this.apiKey = opts?.apiKey ?? process.env.OPENAI_API_KEY ?? '';
    this.model = opts?.model ?? DEFAULT_MODEL;
    this.client = opts?.client ?? new OpenAI({ apiKey: this.apiKey, maxRetries: 0 });
  }

  async isAvailable(): Promise<boolean> {
    return this.apiKey.length > 0;
  }

  async generate(prompt: string, systemPrompt: string, signal?: AbortSignal): Promise<string> {
    const response = await this.client.chat.completions.create(
      {
        model: this.model,
        messages: [
          { role: 'system', content: systemPrompt },
          { role: 'user', content: prompt },
        ],
        temperature: 0.1,
      },
      { signal }
    );

    return response.choices[0]?.message?.content ?? '';
  }
}
