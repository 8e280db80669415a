export type { IEmbeddingProvider } from './IEmbeddingProvider.js';
export { OpenAIEmbeddingProvider } from './OpenAIEmbeddingProvider.js';
export { VoyageEmbeddingProvider } from './VoyageEmbeddingProvider.js';
export type { ILanguageModelProvider } from './ILanguageModelProvider.js';
export { OllamaChatProvider } from './OllamaChatProvider.js';
export { OpenAIChatProvider } from './OpenAIChatProvider.js';
export type { ILogProvider, LogEvent, LogLevel, RequestLogEvent } from './ILogProvider.js';
export { isLogLevel, LOG_LEVELS } from './ILogProvider.js';
export { ConsoleLogProvider } from './ConsoleLogProvider.js';
export { AxiomLogProvider } from './AxiomLogProvider.js';
