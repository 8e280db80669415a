/**
 * Domain models: the classification engine's view of menu items and verdicts.
 * Decoupled from both API shapes and database row shapes.
 */

// ── Input ──

/** One parsed menu line awaiting classification. */
export interface DishCandidate {
  readonly name: string;
  /** Non-negative price in the menu's currency. */
  readonly price: number;
  /** 1-based index of the menu image the line was read from. */
  readonly sourceImage: number;
  readonly rawText: string;
}

// ── Signals ──

export type SignalLayer = 'keyword' | 'rag' | 'llm';

export type KeywordPolarity = 'positive' | 'marker' | 'negative';

export interface KeywordEvidence {
  kind: 'keyword';
  term: string;
  polarity: KeywordPolarity;
}

/** A knowledge-base entry returned by the similarity index. */
export interface EvidenceMatch {
  id: string;
  name: string;
  document: string;
  isVegetarian: boolean;
  category: string;
  /** Clamped to [0, 1]. */
  relevance: number;
}

export interface RetrievalEvidence {
  kind: 'rag';
  vegScore: number;
  nonVegScore: number;
  matches: EvidenceMatch[];
}

export interface ModelEvidence {
  kind: 'llm';
  /** Name of the backend that produced the verdict (e.g. "ollama", "openai"). */
  backend: string;
  reason: string;
}

export type VerdictEvidence = KeywordEvidence | RetrievalEvidence | ModelEvidence;

export interface SignalVerdict {
  readonly layer: SignalLayer;
  readonly isVegetarian: boolean;
  readonly confidence: number;
  readonly evidence?: VerdictEvidence;
}

export type LayerOutcome =
  | { status: 'verdict'; verdict: SignalVerdict }
  | { status: 'no_verdict'; reason: string };

// ── Reconciled output ──

export type ClassificationMethod = 'keyword' | 'rag' | 'llm' | 'combined' | 'unresolved';

export interface FallbackStep {
  layer: SignalLayer;
  /** The layer's own confidence; 0 when it produced no verdict. */
  confidence: number;
  /** Why the layer produced no verdict. */
  reason?: string;
}

export interface AggregateResult {
  readonly candidate: DishCandidate;
  readonly isVegetarian: boolean;
  readonly confidence: number;
  readonly fallbackChain: readonly FallbackStep[];
  readonly method: ClassificationMethod;
  /** Up to three knowledge-base documents retrieved for the candidate. */
  readonly evidence: readonly string[];
}

// ── Review ──

export type ReviewStatus = 'needs_review' | 'resolved';

export interface ReviewItem extends AggregateResult {
  readonly humanReviewed: boolean;
}

export interface Correction {
  name: string;
  isVegetarian: boolean;
}
