/**
 * Language-model signal for the candidates the cheaper layers could not settle.
 *
 * Candidates are grouped into fixed-size batches, one completion per batch,
 * batches in parallel under a concurrency cap. A batch whose response does
 * not parse is retried one candidate at a time, in sequence, inside the
 * batch's own slot. Transport failures and timeouts only affect the batch
 * they happen in.
 *
 * The backend is chosen once per call: the primary if its probe succeeds,
 * otherwise the secondary. Callers only ever see the `llm` layer; the
 * backend's name travels in the verdict evidence.
 */

import { z } from 'zod';
import type { EngineConfig } from '../config.js';
import { TimeoutError } from '../errors.js';
import type { ILanguageModelProvider } from '../providers/ILanguageModelProvider.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type { LayerOutcome, SignalVerdict } from '../types/models.js';
import { isAbortLike, mapWithConcurrency, runWithTimeout } from '../utils/concurrency.js';
import type { ModelLayer, ModelOutcome, ModelRequest } from './layers.js';

export const SYSTEM_PROMPT = `You are a food classification expert. Decide whether each dish is vegetarian.

A dish is NOT vegetarian if it contains meat, poultry, fish, seafood, or hidden animal products such as fish sauce, anchovy paste, gelatin, lard or bone broth.
A dish IS vegetarian if it contains only vegetables, fruits, grains, legumes, dairy, eggs or plant-based proteins.

Respond with a JSON array containing one object per dish:
{"dish": "<dish name as given>", "is_vegetarian": true|false, "confidence": 0.0-1.0, "reason": "<brief explanation>"}

Return ONLY the JSON array, no other text.`;

const EVIDENCE_PER_DISH = 3;
const DEFAULT_MODEL_CONFIDENCE = 0.7;

const entrySchema = z
  .object({
    dish: z.string().optional(),
    name: z.string().optional(),
    is_vegetarian: z.boolean(),
    confidence: z.coerce.number().min(0).max(1).default(DEFAULT_MODEL_CONFIDENCE),
    reason: z.string().optional(),
    reasoning: z.string().optional(),
  })
  .transform((e) => ({
    dish: e.dish ?? e.name,
    isVegetarian: e.is_vegetarian,
    confidence: e.confidence,
    reason: e.reason ?? e.reasoning ?? '',
  }));

export type ModelEntry = z.output<typeof entrySchema>;

export interface ModelBackends {
  primary: ILanguageModelProvider;
  secondary?: ILanguageModelProvider;
}

type BatchConfig = Pick<EngineConfig, 'llmBatchSize' | 'llmConcurrency' | 'llmTimeoutMs'>;

export class ModelClassifier implements ModelLayer {
  constructor(
    private readonly backends: ModelBackends,
    private readonly config: BatchConfig,
    private readonly logProvider: ILogProvider
  ) {}

  async classify(requests: ModelRequest[], signal?: AbortSignal): Promise<ModelOutcome[]> {
    if (requests.length === 0) return [];
    if (signal?.aborted) return requests.map(() => SKIPPED);

    const backend = await this.selectBackend();
    if (!backend) {
      return requests.map(() => noVerdict('no model backend available'));
    }

    const batches: ModelRequest[][] = [];
    for (let i = 0; i < requests.length; i += this.config.llmBatchSize) {
      batches.push(requests.slice(i, i + this.config.llmBatchSize));
    }

    const results = await mapWithConcurrency(batches, this.config.llmConcurrency, (batch, i) =>
      this.runBatch(backend, batch, i + 1, signal)
    );
    return results.flat();
  }

  // ── Private ──

  private async selectBackend(): Promise<ILanguageModelProvider | null> {
    const { primary, secondary } = this.backends;

    if (await this.probe(primary)) return primary;

    if (secondary && (await this.probe(secondary))) {
      this.logProvider.warn('Primary model backend unavailable, using secondary', {
        primary: primary.name,
        secondary: secondary.name,
      });
      return secondary;
    }

    this.logProvider.error('No model backend available', {
      primary: primary.name,
      secondary: secondary?.name ?? null,
    });
    return null;
  }

  private async probe(backend: ILanguageModelProvider): Promise<boolean> {
    try {
      return await backend.isAvailable();
    } catch (err) {
      this.logProvider.warn('Model backend probe failed', {
        backend: backend.name,
        error: err instanceof Error ? err.message : String(err),
      });
      return false;
    }
  }

  private async runBatch(
    backend: ILanguageModelProvider,
    batch: ModelRequest[],
    batchNumber: number,
    signal?: AbortSignal
  ): Promise<ModelOutcome[]> {
    if (signal?.aborted) return batch.map(() => SKIPPED);

    let response: string;
    try {
      response = await this.generate(backend, batch, signal);
    } catch (err) {
      const reason = failureReason(err);
      this.logProvider.warn('Model batch failed', {
        backend: backend.name,
        batch: batchNumber,
        size: batch.length,
        reason,
      });
      return batch.map(() => noVerdict(reason));
    }

    const entries = parseModelResponse(response);
    if (!entries) {
      this.logProvider.warn('Unparseable model batch response, retrying per item', {
        backend: backend.name,
        batch: batchNumber,
        preview: response.slice(0, 200),
      });
      const retried: ModelOutcome[] = [];
      for (const request of batch) {
        retried.push(await this.retrySingle(backend, request, signal));
      }
      return retried;
    }

    const outcomes = matchEntries(batch, entries, backend.name);
    this.logProvider.debug('Model batch classified', {
      backend: backend.name,
      batch: batchNumber,
      size: batch.length,
      answered: outcomes.filter((o) => o.status === 'verdict').length,
    });
    return outcomes;
  }

  private async retrySingle(
    backend: ILanguageModelProvider,
    request: ModelRequest,
    signal?: AbortSignal
  ): Promise<LayerOutcome> {
    let response: string;
    try {
      response = await this.generate(backend, [request], signal);
    } catch (err) {
      return noVerdict(failureReason(err));
    }

    const entries = parseModelResponse(response);
    if (!entries || entries.length === 0) {
      return noVerdict('parse error');
    }
    // A single-dish answer is accepted even when the model renamed the dish.
    const [outcome] = matchEntries([request], entries, backend.name);
    if (outcome.status === 'verdict' || entries.length !== 1) return outcome;
    return toVerdict(entries[0], backend.name);
  }

  private generate(
    backend: ILanguageModelProvider,
    batch: ModelRequest[],
    signal?: AbortSignal
  ): Promise<string> {
    return runWithTimeout(
      `${backend.name} completion`,
      this.config.llmTimeoutMs,
      (callSignal) => backend.generate(buildPrompt(batch), SYSTEM_PROMPT, callSignal),
      signal
    );
  }
}

export function buildPrompt(batch: readonly ModelRequest[]): string {
  const lines = batch.map((request, i) => {
    const related = request.evidence
      .slice(0, EVIDENCE_PER_DISH)
      .map((m) => `${m.document} (vegetarian: ${m.isVegetarian})`);
    const context = related.length > 0 ? `\n   Related: ${related.join('; ')}` : '';
    return `${i + 1}. ${request.name}${context}`;
  });

  return [
    `Classify these ${batch.length} dishes as vegetarian or not:`,
    '',
    ...lines,
    '',
    `Return a JSON array with ${batch.length} objects, one per dish.`,
  ].join('\n');
}

/**
 * Extract classification entries from a completion.
 * Accepts a JSON array (optionally fenced in markdown) or a single object.
 * Returns null when nothing parses into the expected structure.
 */
export function parseModelResponse(text: string): ModelEntry[] | null {
  const cleaned = text.replace(/```(?:json)?/gi, '').trim();

  for (const [open, close] of [['[', ']'], ['{', '}']] as const) {
    const start = cleaned.indexOf(open);
    const end = cleaned.lastIndexOf(close);
    if (start === -1 || end <= start) continue;

    let value: unknown;
    try {
      value = JSON.parse(cleaned.slice(start, end + 1));
    } catch {
      continue; // try the next shape
    }

    const parsed = Array.isArray(value)
      ? z.array(entrySchema).safeParse(value)
      : entrySchema.transform((e) => [e]).safeParse(value);
    if (parsed.success) return parsed.data;
  }

  return null;
}

/**
 * Pair entries with requests by dish name. Exact matches on the normalized
 * name are claimed first; the remaining requests then take the closest
 * unclaimed entry whose name contains theirs or is contained in it. Entries
 * without a name fall back to their position.
 */
export function matchEntries(
  batch: readonly ModelRequest[],
  entries: readonly ModelEntry[],
  backend: string
): LayerOutcome[] {
  const named = entries.filter((e): e is ModelEntry & { dish: string } => Boolean(e.dish));
  const claimed = new Set<ModelEntry>();
  const keys = batch.map((request) => normalize(request.name));

  const matched: Array<ModelEntry | undefined> = keys.map((key) => {
    const exact = named.filter((e) => normalize(e.dish) === key);
    const entry = exact.find((e) => !claimed.has(e)) ?? exact[0];
    if (entry) claimed.add(entry);
    return entry;
  });

  keys.forEach((key, i) => {
    if (matched[i]) return;
    let best: ModelEntry | undefined;
    let bestDistance = Infinity;
    for (const entry of named) {
      if (claimed.has(entry)) continue;
      const dish = normalize(entry.dish);
      if (dish.length === 0 || !(dish.includes(key) || key.includes(dish))) continue;
      const distance = Math.abs(dish.length - key.length);
      if (distance < bestDistance) {
        best = entry;
        bestDistance = distance;
      }
    }
    if (best) {
      claimed.add(best);
      matched[i] = best;
    } else if (entries[i] && !entries[i].dish) {
      matched[i] = entries[i];
    }
  });

  return matched.map((entry) =>
    entry ? toVerdict(entry, backend) : noVerdict('missing from model response')
  );
}

function toVerdict(entry: ModelEntry, backend: string): LayerOutcome {
  return {
    status: 'verdict',
    verdict: Object.freeze<SignalVerdict>({
      layer: 'llm',
      isVegetarian: entry.isVegetarian,
      confidence: entry.confidence,
      evidence: { kind: 'llm', backend, reason: entry.reason },
    }),
  };
}

function normalize(name: string): string {
  return name.trim().toLowerCase().replace(/\s+/g, ' ');
}

const SKIPPED: ModelOutcome = { status: 'skipped', reason: 'deadline exceeded' };

function noVerdict(reason: string): LayerOutcome {
  return { status: 'no_verdict', reason };
}

function failureReason(err: unknown): string {
  if (err instanceof TimeoutError) return 'timeout';
  if (isAbortLike(err)) return 'cancelled';
  const message = err instanceof Error ? err.message : String(err);
  return `transport error: ${message}`;
}
