/**
 * Dependency wiring.
 * Constructs all services with their dependencies. Production wiring lives
 * in container.production.ts; tests pass in-process fakes.
 */

import type { EngineConfig } from './config.js';
import type { KnowledgeBase } from './knowledge/KnowledgeBase.js';
import type { IKnowledgeRepository } from './repositories/IKnowledgeRepository.js';
import type { IEmbeddingProvider } from './providers/IEmbeddingProvider.js';
import type { ILanguageModelProvider } from './providers/ILanguageModelProvider.js';
import type { ILogProvider } from './providers/ILogProvider.js';
import type { IReviewSessionStore } from './stores/IReviewSessionStore.js';
import type { IFeedbackStore } from './stores/IFeedbackStore.js';
import type { Middleware } from './middleware/pipeline.js';
import { InMemoryReviewSessionStore } from './stores/InMemoryReviewSessionStore.js';
import { InMemoryFeedbackStore } from './stores/InMemoryFeedbackStore.js';
import { KeywordMatcher } from './services/KeywordMatcher.js';
import { EvidenceRetriever } from './services/EvidenceRetriever.js';
import { ModelClassifier } from './services/ModelClassifier.js';
import { Reconciler } from './services/Reconciler.js';
import { ReviewService } from './services/ReviewService.js';
import { KnowledgeIndexer } from './services/KnowledgeIndexer.js';
import { MenuService } from './services/MenuService.js';
import { createLoggingMiddleware } from './middleware/logging.js';

export interface Container {
  config: EngineConfig;
  reconciler: Reconciler;
  reviewService: ReviewService;
  menuService: MenuService;
  knowledgeIndexer: KnowledgeIndexer;
  knowledgeRepo: IKnowledgeRepository;
  logProvider: ILogProvider;
  logging: Middleware;
}

export function createContainer(deps: {
  config: EngineConfig;
  knowledgeBase: KnowledgeBase;
  knowledgeRepo: IKnowledgeRepository;
  embeddingProvider: IEmbeddingProvider;
  primaryModel: ILanguageModelProvider;
  secondaryModel?: ILanguageModelProvider;
  logProvider: ILogProvider;
  sessionStore?: IReviewSessionStore;
  feedbackStore?: IFeedbackStore;
  /** Clock for review sessions, in epoch ms. */
  now?: () => number;
}): Container {
  const { config, logProvider } = deps;

  const reconciler = new Reconciler(
    new KeywordMatcher(deps.knowledgeBase.keywords),
    new EvidenceRetriever(deps.knowledgeRepo, deps.embeddingProvider, config, logProvider),
    new ModelClassifier(
      { primary: deps.primaryModel, secondary: deps.secondaryModel },
      config,
      logProvider
    ),
    config,
    logProvider
  );

  const now = deps.now ?? Date.now;
  const sessionStore =
    deps.sessionStore ?? new InMemoryReviewSessionStore(config.reviewSessionTtlSeconds, now);
  const reviewService = new ReviewService(
    sessionStore,
    config,
    logProvider,
    now,
    deps.feedbackStore ?? new InMemoryFeedbackStore()
  );

  const knowledgeIndexer = new KnowledgeIndexer(
    deps.knowledgeBase,
    deps.knowledgeRepo,
    deps.embeddingProvider,
    logProvider
  );
  const menuService = new MenuService(
    reconciler,
    reviewService,
    knowledgeIndexer,
    config,
    logProvider
  );

  return {
    config,
    reconciler,
    reviewService,
    menuService,
    knowledgeIndexer,
    knowledgeRepo: deps.knowledgeRepo,
    logProvider,
    logging: createLoggingMiddleware(logProvider),
  };
}
