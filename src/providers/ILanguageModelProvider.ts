/**
 * Language-model backend interface.
 * One chat-style completion per call; the caller owns prompting and parsing.
 */

export interface ILanguageModelProvider {
  /** Short backend name recorded in verdict evidence, e.g. "ollama". */
  readonly name: string;

  /** Cheap readiness probe, checked once before a classification run. */
  isAvailable(): Promise<boolean>;

  /** Raw completion text. Rejects on transport or HTTP errors. */
  generate(prompt: string, systemPrompt: string, signal?: AbortSignal): Promise<string>;
}
