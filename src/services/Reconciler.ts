/**
 * Per-candidate orchestration of the three signal layers.
 *
 * Each candidate walks keyword → rag → llm → combine → done, stopping as soon
 * as a cheap layer is confident enough. Keyword and retrieval run per
 * candidate under a concurrency cap; everything that reaches the llm state is
 * handed to the model layer in one call so it can batch. A request deadline
 * aborts outstanding calls, and affected candidates are finalized through
 * combine with whatever verdicts they already have.
 *
 * Transitions and the combine vote are pure functions, exported for tests.
 */

import type { EngineConfig, LayerWeights } from '../config.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type {
  AggregateResult,
  ClassificationMethod,
  DishCandidate,
  EvidenceMatch,
  FallbackStep,
  LayerOutcome,
  SignalLayer,
  SignalVerdict,
} from '../types/models.js';
import { mapWithConcurrency, startDeadline } from '../utils/concurrency.js';
import type { KeywordLayer, ModelLayer, ModelOutcome, RetrievalLayer } from './layers.js';

export type ReconcileState = 'keyword' | 'rag' | 'llm' | 'combine' | 'done';

export interface CombinedVerdict {
  isVegetarian: boolean;
  confidence: number;
  method: ClassificationMethod;
}

export interface ReconcileOptions {
  /** Caller-side cancellation, merged with the configured request deadline. */
  signal?: AbortSignal;
  /** Correlates log events. */
  requestId?: string;
}

const EVIDENCE_DOCUMENTS = 3;

/**
 * Next state after a layer has reported.
 * `outcome` is the outcome of the layer named by `state`.
 */
export function nextState(
  state: ReconcileState,
  outcome: LayerOutcome | undefined,
  confidenceThreshold: number
): ReconcileState {
  switch (state) {
    case 'keyword':
      return outcome?.status === 'verdict' ? 'done' : 'rag';
    case 'rag':
      return outcome?.status === 'verdict' && outcome.verdict.confidence >= confidenceThreshold
        ? 'done'
        : 'llm';
    case 'llm':
      return 'combine';
    case 'combine':
    case 'done':
      return 'done';
  }
}

/**
 * Weighted vote over the layers that produced a verdict.
 *
 * With two or more participants each layer votes its verdict with its weight,
 * renormalized over the participants: `vegProbability = Σ w_i [veg_i] / Σ w_i`,
 * and the distance of that share from 0.5 becomes the confidence. An exact
 * split resolves to non-vegetarian. A lone participant keeps its own verdict
 * and confidence.
 */
export function combineVerdicts(
  verdicts: readonly SignalVerdict[],
  weights: LayerWeights
): CombinedVerdict {
  if (verdicts.length === 0) {
    return { isVegetarian: false, confidence: 0, method: 'unresolved' };
  }

  if (verdicts.length === 1) {
    const [only] = verdicts;
    return {
      isVegetarian: only.isVegetarian,
      confidence: clamp01(only.confidence),
      method: only.layer,
    };
  }

  let vegWeight = 0;
  let totalWeight = 0;
  for (const verdict of verdicts) {
    const weight = weights[verdict.layer];
    if (verdict.isVegetarian) vegWeight += weight;
    totalWeight += weight;
  }

  const vegProbability = vegWeight / totalWeight;
  return {
    isVegetarian: vegProbability > 0.5,
    confidence: clamp01(Math.abs(vegProbability - 0.5) * 2),
    method: 'combined',
  };
}

interface CandidateTrace {
  candidate: DishCandidate;
  state: ReconcileState;
  chain: FallbackStep[];
  verdicts: SignalVerdict[];
  matches: EvidenceMatch[];
  result?: AggregateResult;
}

type ReconcilerConfig = Pick<
  EngineConfig,
  'confidenceThreshold' | 'candidateConcurrency' | 'requestDeadlineMs' | 'layerWeights'
>;

export class Reconciler {
  constructor(
    private readonly keywordLayer: KeywordLayer,
    private readonly retrievalLayer: RetrievalLayer,
    private readonly modelLayer: ModelLayer,
    private readonly config: ReconcilerConfig,
    private readonly logProvider: ILogProvider
  ) {}

  /** One result per candidate, in input order. Never rejects on layer faults. */
  async reconcile(
    candidates: readonly DishCandidate[],
    options: ReconcileOptions = {}
  ): Promise<AggregateResult[]> {
    const start = performance.now();
    const deadline = startDeadline(this.config.requestDeadlineMs, options.signal);

    try {
      const traces = await mapWithConcurrency(
        candidates,
        this.config.candidateConcurrency,
        (candidate) => this.runCheapLayers(candidate, deadline.signal)
      );

      const pending = traces.filter((t) => t.state === 'llm');
      if (pending.length > 0) {
        const outcomes = await this.runModelLayer(pending, deadline.signal);
        pending.forEach((trace, i) => this.applyModelOutcome(trace, outcomes[i]));
      }

      const results = traces.map((trace) => trace.result ?? this.finalize(trace));
      for (const trace of traces) {
        this.logProvider.debug('Candidate classified', {
          requestId: options.requestId,
          dish: trace.candidate.name,
          method: trace.result?.method,
          confidence: trace.result?.confidence,
          fallbackChain: trace.chain.map((s) => `${s.layer}:${s.confidence.toFixed(2)}`),
        });
      }

      this.logProvider.info('Menu classified', {
        requestId: options.requestId,
        candidates: candidates.length,
        sentToModel: pending.length,
        methods: countMethods(results),
        deadlineExceeded: deadline.signal.aborted,
        durationMs: Math.round(performance.now() - start),
      });

      return results;
    } finally {
      deadline.dispose();
    }
  }

  // ── Private ──

  private async runCheapLayers(
    candidate: DishCandidate,
    signal: AbortSignal
  ): Promise<CandidateTrace> {
    const trace: CandidateTrace = {
      candidate,
      state: 'keyword',
      chain: [],
      verdicts: [],
      matches: [],
    };

    const keyword = this.keywordLayer.match(candidate.name);
    this.record(trace, 'keyword', keyword);
    trace.state = nextState('keyword', keyword, this.config.confidenceThreshold);
    if (trace.state === 'done') {
      trace.result = this.emit(trace, 'keyword');
      return trace;
    }

    // Past the deadline nothing else is invoked.
    if (signal.aborted) {
      trace.state = 'combine';
      return trace;
    }

    let rag: LayerOutcome;
    try {
      const retrieved = await this.retrievalLayer.retrieve(candidate.name, signal);
      rag = retrieved.outcome;
      trace.matches = retrieved.matches;
    } catch (err) {
      rag = { status: 'no_verdict', reason: `retrieval failed: ${errorMessage(err)}` };
    }
    this.record(trace, 'rag', rag);
    trace.state = nextState('rag', rag, this.config.confidenceThreshold);
    if (trace.state === 'done') {
      trace.result = this.emit(trace, 'rag');
    }
    return trace;
  }

  private async runModelLayer(
    pending: CandidateTrace[],
    signal: AbortSignal
  ): Promise<ModelOutcome[]> {
    const requests = pending.map((t) => ({ name: t.candidate.name, evidence: t.matches }));
    try {
      return await this.modelLayer.classify(requests, signal);
    } catch (err) {
      const reason = `model layer failed: ${errorMessage(err)}`;
      this.logProvider.error('Model layer failed', { reason, candidates: pending.length });
      return pending.map(() => ({ status: 'no_verdict', reason }));
    }
  }

  private applyModelOutcome(trace: CandidateTrace, outcome: ModelOutcome | undefined): void {
    // A batch that was never dispatched leaves no trace in the chain.
    if (outcome && outcome.status !== 'skipped') {
      this.record(trace, 'llm', outcome);
    }
    trace.state = nextState('llm', undefined, this.config.confidenceThreshold);
  }

  private finalize(trace: CandidateTrace): AggregateResult {
    const combined = combineVerdicts(trace.verdicts, this.config.layerWeights);
    trace.state = nextState('combine', undefined, this.config.confidenceThreshold);
    trace.result = this.build(trace, combined);
    return trace.result;
  }

  private record(trace: CandidateTrace, layer: SignalLayer, outcome: LayerOutcome): void {
    if (outcome.status === 'verdict') {
      trace.chain.push({ layer, confidence: outcome.verdict.confidence });
      trace.verdicts.push(outcome.verdict);
    } else {
      trace.chain.push({ layer, confidence: 0, reason: outcome.reason });
    }
  }

  /** Short-circuit exit: the named layer's verdict is the answer. */
  private emit(trace: CandidateTrace, layer: 'keyword' | 'rag'): AggregateResult {
    const verdict = trace.verdicts.find((v) => v.layer === layer);
    if (!verdict) {
      // nextState only reports done for a layer that produced a verdict
      throw new Error(`No ${layer} verdict recorded for "${trace.candidate.name}"`);
    }
    return this.build(trace, {
      isVegetarian: verdict.isVegetarian,
      confidence: verdict.confidence,
      method: layer,
    });
  }

  private build(trace: CandidateTrace, verdict: CombinedVerdict): AggregateResult {
    return Object.freeze({
      candidate: trace.candidate,
      isVegetarian: verdict.isVegetarian,
      confidence: clamp01(verdict.confidence),
      fallbackChain: Object.freeze(trace.chain.map((step) => Object.freeze({ ...step }))),
      method: verdict.method,
      evidence: Object.freeze(trace.matches.slice(0, EVIDENCE_DOCUMENTS).map((m) => m.document)),
    });
  }
}

function countMethods(results: readonly AggregateResult[]): Partial<Record<ClassificationMethod, number>> {
  const counts: Partial<Record<ClassificationMethod, number>> = {};
  for (const r of results) {
    counts[r.method] = (counts[r.method] ?? 0) + 1;
  }
  return counts;
}

function clamp01(value: number): number {
  if (Number.isNaN(value)) return 0;
  return Math.max(0, Math.min(1, value));
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
