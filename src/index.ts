export { createEngineConfig, loadEngineConfig, DEFAULT_ENGINE_CONFIG } from './config.js';
export type { EngineConfig, LayerWeights } from './config.js';
export { AppError, ValidationError, NotFoundError, TimeoutError, RequestDeadlineError } from './errors.js';
export { loadKnowledgeBase, parseKnowledgeBase } from './knowledge/KnowledgeBase.js';
export type { KnowledgeBase, KnowledgeEntry, KeywordLists } from './knowledge/KnowledgeBase.js';
export { KeywordMatcher } from './services/KeywordMatcher.js';
export { EvidenceRetriever, scoreEvidence } from './services/EvidenceRetriever.js';
export { ModelClassifier } from './services/ModelClassifier.js';
export { Reconciler, combineVerdicts, nextState } from './services/Reconciler.js';
export type { ReconcileOptions, ReconcileState } from './services/Reconciler.js';
export { ReviewSession } from './services/ReviewSession.js';
export type { ReviewResolution, ReviewSessionView, ReviewSessionSnapshot } from './services/ReviewSession.js';
export { ReviewService } from './services/ReviewService.js';
export type { FeedbackStats, DishFeedback } from './services/ReviewService.js';
export { MenuService } from './services/MenuService.js';
export type { MenuClassification } from './services/MenuService.js';
export { KnowledgeIndexer } from './services/KnowledgeIndexer.js';
export { sumVegetarianPrices } from './services/PriceAggregator.js';
export type { KeywordLayer, RetrievalLayer, ModelLayer, ModelOutcome } from './services/layers.js';
export { InMemoryKnowledgeRepository } from './repositories/InMemoryKnowledgeRepository.js';
export { SupabaseKnowledgeRepository } from './repositories/SupabaseKnowledgeRepository.js';
export { InMemoryReviewSessionStore } from './stores/InMemoryReviewSessionStore.js';
export { InMemoryFeedbackStore } from './stores/InMemoryFeedbackStore.js';
export type { FeedbackRecord, IFeedbackStore } from './stores/IFeedbackStore.js';
export { createContainer } from './container.js';
export type { Container } from './container.js';
export { createRouter } from './api/router.js';
export * from './providers/index.js';
export type * from './types/models.js';
export type * from './types/api.js';
