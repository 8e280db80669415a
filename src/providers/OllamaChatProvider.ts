/**
 * Ollama chat provider for a locally hosted model.
 * Plain fetch against the Ollama REST API; no SDK dependency.
 */

import { z } from 'zod';
import type { ILanguageModelProvider } from './ILanguageModelProvider.js';

const DEFAULT_BASE_URL = 'http://localhost:11434';
const DEFAULT_MODEL = 'llama3.2';
const PROBE_TIMEOUT_MS = 5_000;

const chatResponseSchema = z.object({
  message: z.object({ content: z.string() }).optional(),
});

const errorSchema = z.object({ error: z.string() });

export class OllamaChatProvider implements ILanguageModelProvider {
  readonly name = 'ollama';
  private readonly baseUrl: string;
  private readonly model: string;

  constructor(opts?: { baseUrl?: string; model?: string }) {
    this.baseUrl = (opts?.baseUrl ?? process.env.OLLAMA_BASE_URL ?? DEFAULT_BASE_URL).replace(/\/+$/, '');
    this.model = opts?.model ?? process.env.OLLAMA_MODEL ?? DEFAULT_MODEL;
  }

  async isAvailable(): Promise<boolean> {
    try {
      const res = await fetch(`${this.baseUrl}/api/tags`, {
        signal: AbortSignal.timeout(PROBE_TIMEOUT_MS),
      });
      return res.ok;
    } catch {
      // Connection refused or probe timeout: the server is down.
      return false;
    }
  }

  async generate(prompt: string, systemPrompt: string, signal?: AbortSignal): Promise<string> {
    const res = await fetch(`${this.baseUrl}/api/chat`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({
        model: this.model,
        messages: [
          { role: 'system', content: systemPrompt },
          { role: 'user', content: prompt },
        ],
        stream: false,
      }),
      signal,
    });

    if (!res.ok) {
      const parsed = errorSchema.safeParse(await res.json().catch(() => null));
      const detail = parsed.success ? parsed.data.error : 'Unknown error';
      throw new Error(`Ollama API error (${res.status}): ${detail}`);
    }

    const parsed = chatResponseSchema.safeParse(await res.json());
    if (!parsed.success) {
      throw new Error('Ollama API returned an unexpected response shape');
    }
    return parsed.data.message?.content ?? '';
  }
}
