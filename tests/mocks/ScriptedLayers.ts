/**
 * Scripted signal layers for Reconciler tests.
 * Answers are keyed by dish name; unknown names get a no-verdict outcome.
 */

import type {
  ModelLayer,
  ModelOutcome,
  ModelRequest,
  RetrievalLayer,
  RetrievalResult,
} from '../../src/services/layers.js';
import type { EvidenceMatch, LayerOutcome } from '../../src/types/models.js';

export function evidence(name: string, isVegetarian: boolean, relevance = 0.5): EvidenceMatch {
  return {
    id: `dish_${name.replace(/\s+/g, '_')}`,
    name,
    document: `${name}: test entry`,
    isVegetarian,
    category: 'test',
    relevance,
  };
}

export function ragResult(
  isVegetarian: boolean,
  confidence: number,
  matches: EvidenceMatch[] = []
): RetrievalResult {
  return {
    outcome: {
      status: 'verdict',
      verdict: { layer: 'rag', isVegetarian, confidence },
    },
    matches,
  };
}

export function llmVerdict(isVegetarian: boolean, confidence: number): LayerOutcome {
  return { status: 'verdict', verdict: { layer: 'llm', isVegetarian, confidence } };
}

export class ScriptedRetrievalLayer implements RetrievalLayer {
  readonly calls: string[] = [];
  /** Per-name delay before answering, in ms. */
  readonly delays: Record<string, number> = {};

  constructor(private readonly answers: Record<string, RetrievalResult | Error> = {}) {}

  async retrieve(name: string): Promise<RetrievalResult> {
    this.calls.push(name);
    const delay = this.delays[name] ?? 0;
    if (delay > 0) await new Promise((resolve) => setTimeout(resolve, delay));

    const answer = this.answers[name];
    if (answer instanceof Error) throw answer;
    return answer ?? { outcome: { status: 'no_verdict', reason: 'no matches' }, matches: [] };
  }
}

export class ScriptedModelLayer implements ModelLayer {
  readonly calls: ModelRequest[][] = [];
  public failWith: Error | null = null;

  constructor(private readonly answers: Record<string, ModelOutcome> = {}) {}

  async classify(requests: ModelRequest[]): Promise<ModelOutcome[]> {
    this.calls.push(requests);
    if (this.failWith) throw this.failWith;
    return requests.map(
      (r) => this.answers[r.name] ?? { status: 'no_verdict', reason: 'missing from model response' }
    );
  }
}
