/**
 * Curated ingredient and dish knowledge.
 * Loaded once from data/knowledge-base.json, validated, and frozen.
 * Seeds the similarity index and supplies the keyword lists.
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';

const entrySchema = z.object({
  name: z.string().min(1),
  kind: z.enum(['ingredient', 'dish']),
  isVegetarian: z.boolean(),
  category: z.string().default('unknown'),
  description: z.string().default(''),
  notes: z.string().default(''),
});

const knowledgeBaseSchema = z.object({
  version: z.number().int(),
  entries: z.array(entrySchema),
  keywords: z.object({
    positive: z.array(z.string().min(1)),
    markers: z.array(z.string().min(1)),
    negative: z.array(z.string().min(1)),
  }),
});

export type KnowledgeEntry = Readonly<z.infer<typeof entrySchema>> & { readonly id: string };

export interface KeywordLists {
  readonly positive: readonly string[];
  readonly markers: readonly string[];
  readonly negative: readonly string[];
}

export interface KnowledgeBase {
  readonly version: number;
  readonly entries: readonly KnowledgeEntry[];
  readonly keywords: KeywordLists;
}

export const DEFAULT_KNOWLEDGE_BASE_URL = new URL('../../data/knowledge-base.json', import.meta.url);

/** Stable id, e.g. "dish_veggie_burger". */
export function entryId(kind: 'ingredient' | 'dish', name: string): string {
  const prefix = kind === 'ingredient' ? 'ing' : 'dish';
  return `${prefix}_${name.trim().toLowerCase().replace(/\s+/g, '_')}`;
}

/** Text embedded for an entry and shown to reviewers as evidence. */
export function entryDocument(entry: Pick<KnowledgeEntry, 'name' | 'description'>): string {
  return entry.description ? `${entry.name}: ${entry.description}` : entry.name;
}

export function parseKnowledgeBase(raw: unknown): KnowledgeBase {
  const parsed = knowledgeBaseSchema.safeParse(raw);
  if (!parsed.success) {
    const first = parsed.error.issues[0];
    throw new Error(
      `Invalid knowledge base at ${first.path.join('.') || '<root>'}: ${first.message}`
    );
  }

  const seen = new Set<string>();
  const entries: KnowledgeEntry[] = [];
  for (const entry of parsed.data.entries) {
    const id = entryId(entry.kind, entry.name);
    if (seen.has(id)) {
      throw new Error(`Duplicate knowledge base entry: ${id}`);
    }
    seen.add(id);
    entries.push(Object.freeze({ ...entry, id }));
  }

  const { positive, markers, negative } = parsed.data.keywords;
  return Object.freeze({
    version: parsed.data.version,
    entries: Object.freeze(entries),
    keywords: Object.freeze({
      positive: Object.freeze([...positive]),
      markers: Object.freeze([...markers]),
      negative: Object.freeze([...negative]),
    }),
  });
}

export function loadKnowledgeBase(path: string | URL = DEFAULT_KNOWLEDGE_BASE_URL): KnowledgeBase {
  const text = readFileSync(path, 'utf8');
  return parseKnowledgeBase(JSON.parse(text));
}
