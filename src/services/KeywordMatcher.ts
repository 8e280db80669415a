/**
 * Lexical signal over a dish name.
 *
 * Whole-word matching only: a term matches when it is not glued to other
 * letters or digits, so "ham" never fires on "hamburger". Negative terms
 * take priority over positive ones.
 */

import type { KeywordLists } from '../knowledge/KnowledgeBase.js';
import type { KeywordPolarity, LayerOutcome, SignalVerdict } from '../types/models.js';
import type { KeywordLayer } from './layers.js';

export const KEYWORD_CONFIDENCE = 0.95;

interface CompiledTerm {
  term: string;
  polarity: KeywordPolarity;
  pattern: RegExp;
}

const WORD_CHAR = /[\p{L}\p{N}]/u;

export class KeywordMatcher implements KeywordLayer {
  private readonly negative: CompiledTerm[];
  private readonly positive: CompiledTerm[];

  constructor(keywords: KeywordLists) {
    this.negative = keywords.negative.map((t) => compile(t, 'negative'));
    this.positive = [
      ...keywords.markers.map((t) => compile(t, 'marker')),
      ...keywords.positive.map((t) => compile(t, 'positive')),
    ];
  }

  match(name: string): LayerOutcome {
    const text = name.trim();
    if (!text) {
      return { status: 'no_verdict', reason: 'empty name' };
    }

    const negative = this.negative.find((t) => t.pattern.test(text));
    if (negative) {
      return verdict(false, negative);
    }

    const positive = this.positive.find((t) => t.pattern.test(text));
    if (positive) {
      return verdict(true, positive);
    }

    return { status: 'no_verdict', reason: 'no keyword match' };
  }
}

function verdict(isVegetarian: boolean, term: CompiledTerm): LayerOutcome {
  return {
    status: 'verdict',
    verdict: Object.freeze<SignalVerdict>({
      layer: 'keyword',
      isVegetarian,
      confidence: KEYWORD_CONFIDENCE,
      evidence: { kind: 'keyword', term: term.term, polarity: term.polarity },
    }),
  };
}

function compile(term: string, polarity: KeywordPolarity): CompiledTerm {
  const normalized = term.trim().toLowerCase();
  const escaped = normalized.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
  // Boundaries only apply on edges that are themselves word characters;
  // "(v)" or an emoji has nothing to glue onto.
  const head = WORD_CHAR.test(normalized.charAt(0)) ? '(?<![\\p{L}\\p{N}])' : '';
  const tail = WORD_CHAR.test(normalized.charAt(normalized.length - 1)) ? '(?![\\p{L}\\p{N}])' : '';
  return {
    term: normalized,
    polarity,
    pattern: new RegExp(`${head}${escaped}${tail}`, 'iu'),
  };
}
