/**
 * Production container.
 * Reads backend settings from the environment once, at first use.
 * Every external service has a fallback so the function still answers
 * with a reduced signal set:
 *   knowledge index  Supabase pgvector → in-memory index
 *   embeddings       Voyage → OpenAI
 *   language model   LLM_PROVIDER primary, the other one secondary
 *   logging          Axiom → console
 */

import { createContainer, type Container } from './container.js';
import { loadEngineConfig } from './config.js';
import { getSupabaseClient } from './db.js';
import { loadKnowledgeBase } from './knowledge/KnowledgeBase.js';
import { SupabaseKnowledgeRepository } from './repositories/SupabaseKnowledgeRepository.js';
import { InMemoryKnowledgeRepository } from './repositories/InMemoryKnowledgeRepository.js';
import { VoyageEmbeddingProvider } from './providers/VoyageEmbeddingProvider.js';
import { OpenAIEmbeddingProvider } from './providers/OpenAIEmbeddingProvider.js';
import { OllamaChatProvider } from './providers/OllamaChatProvider.js';
import { OpenAIChatProvider } from './providers/OpenAIChatProvider.js';
import { AxiomLogProvider } from './providers/AxiomLogProvider.js';
import { ConsoleLogProvider } from './providers/ConsoleLogProvider.js';
import { isLogLevel, type ILogProvider } from './providers/ILogProvider.js';
import type { ILanguageModelProvider } from './providers/ILanguageModelProvider.js';

let cached: Container | null = null;

export function getProductionContainer(env: NodeJS.ProcessEnv = process.env): Container {
  if (cached) return cached;

  const config = loadEngineConfig(env);
  const knowledgeBase = loadKnowledgeBase();

  const logProvider = createLogProvider(env);

  const knowledgeRepo =
    env.SUPABASE_URL && env.SUPABASE_SERVICE_ROLE_KEY
      ? new SupabaseKnowledgeRepository(getSupabaseClient(env))
      : new InMemoryKnowledgeRepository();

  const embeddingProvider = env.VOYAGE_API_KEY
    ? new VoyageEmbeddingProvider({ apiKey: env.VOYAGE_API_KEY })
    : new OpenAIEmbeddingProvider({ apiKey: env.OPENAI_API_KEY });

  const { primary, secondary } = createModelBackends(env);

  cached = createContainer({
    config,
    knowledgeBase,
    knowledgeRepo,
    embeddingProvider,
    primaryModel: primary,
    secondaryModel: secondary,
    logProvider,
  });

  return cached;
}

export function createModelBackends(env: NodeJS.ProcessEnv): {
  primary: ILanguageModelProvider;
  secondary: ILanguageModelProvider;
} {
  const provider = env.LLM_PROVIDER ?? 'ollama';
  if (provider !== 'ollama' && provider !== 'openai') {
    throw new Error(`Invalid LLM_PROVIDER "${provider}": expected "ollama" or "openai"`);
  }

  const ollama = new OllamaChatProvider({
    baseUrl: env.OLLAMA_BASE_URL,
    model: env.OLLAMA_MODEL,
  });
  const openai = new OpenAIChatProvider({
    apiKey: env.OPENAI_API_KEY ?? '',
    model: env.OPENAI_MODEL,
  });

  return provider === 'ollama'
    ? { primary: ollama, secondary: openai }
    : { primary: openai, secondary: ollama };
}

function createLogProvider(env: NodeJS.ProcessEnv): ILogProvider {
  if (env.AXIOM_API_KEY && env.AXIOM_DATASET) {
    return new AxiomLogProvider({ apiToken: env.AXIOM_API_KEY, dataset: env.AXIOM_DATASET });
  }
  const level = env.LOG_LEVEL ?? 'info';
  return new ConsoleLogProvider({
    outputToConsole: true,
    minLevel: isLogLevel(level) ? level : 'info',
  });
}
