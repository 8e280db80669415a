import { describe, it, expect } from 'vitest';
import { KeywordMatcher, KEYWORD_CONFIDENCE } from '../../src/services/KeywordMatcher.js';
import { loadKnowledgeBase } from '../../src/knowledge/KnowledgeBase.js';
import type { LayerOutcome } from '../../src/types/models.js';

function expectVerdict(outcome: LayerOutcome, isVegetarian: boolean, term: string) {
  expect(outcome.status).toBe('verdict');
  if (outcome.status !== 'verdict') return;
  expect(outcome.verdict.layer).toBe('keyword');
  expect(outcome.verdict.isVegetarian).toBe(isVegetarian);
  expect(outcome.verdict.confidence).toBe(KEYWORD_CONFIDENCE);
  expect(outcome.verdict.evidence).toMatchObject({ kind: 'keyword', term });
}

describe('KeywordMatcher', () => {
  const matcher = new KeywordMatcher(loadKnowledgeBase().keywords);

  // ── negative terms ──

  it('should classify a named meat as non-vegetarian', () => {
    expectVerdict(matcher.match('Chicken Wings'), false, 'chicken');
  });

  it('should let a negative term win over a positive one', () => {
    expectVerdict(matcher.match('Vegan Chicken Burger'), false, 'chicken');
  });

  it('should match case-insensitively', () => {
    expectVerdict(matcher.match('GRILLED SALMON'), false, 'salmon');
  });

  it('should treat punctuation as a word boundary', () => {
    expectVerdict(matcher.match('Salmon-Teriyaki Bowl'), false, 'salmon');
  });

  it('should not match a term inside another word', () => {
    expect(matcher.match('Hamburger')).toEqual({ status: 'no_verdict', reason: 'no keyword match' });
    expect(matcher.match('Catfish Tacos')).toEqual({
      status: 'no_verdict',
      reason: 'no keyword match',
    });
  });

  // ── positive terms ──

  it('should classify a vegetarian indicator as vegetarian', () => {
    expectVerdict(matcher.match('Veggie Burger'), true, 'veggie');
  });

  it('should recognise marker tokens', () => {
    const outcome = matcher.match('Pad Thai (V)');
    expectVerdict(outcome, true, '(v)');
    if (outcome.status === 'verdict') {
      expect(outcome.verdict.evidence).toMatchObject({ polarity: 'marker' });
    }
  });

  it('should recognise emoji indicators', () => {
    expectVerdict(matcher.match('Garden Bowl 🌱'), true, '🌱');
  });

  it('should recognise plant proteins', () => {
    expectVerdict(matcher.match('Crispy Tofu Stir Fry'), true, 'tofu');
  });

  // ── no verdict ──

  it('should return no verdict when nothing matches', () => {
    expect(matcher.match('French Fries')).toEqual({
      status: 'no_verdict',
      reason: 'no keyword match',
    });
  });

  it('should return no verdict for empty or whitespace-only names', () => {
    expect(matcher.match('')).toEqual({ status: 'no_verdict', reason: 'empty name' });
    expect(matcher.match('   \t')).toEqual({ status: 'no_verdict', reason: 'empty name' });
  });

  // ── custom lists ──

  it('should use the keyword lists it was built with', () => {
    const custom = new KeywordMatcher({ positive: ['garden'], markers: [], negative: ['ham'] });
    expectVerdict(custom.match('Ham & Cheese Toastie'), false, 'ham');
    expectVerdict(custom.match('Garden Plate'), true, 'garden');
    expect(custom.match('Veggie Burger').status).toBe('no_verdict');
  });

  it('should be deterministic', () => {
    expect(matcher.match('Beef Pho')).toEqual(matcher.match('Beef Pho'));
  });
});
