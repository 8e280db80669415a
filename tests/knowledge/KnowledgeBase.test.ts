import { describe, it, expect } from 'vitest';
import {
  entryDocument,
  entryId,
  loadKnowledgeBase,
  parseKnowledgeBase,
} from '../../src/knowledge/KnowledgeBase.js';

const keywords = { positive: ['veggie'], markers: ['(v)'], negative: ['beef'] };

describe('KnowledgeBase', () => {
  it('should load the bundled knowledge base', () => {
    const kb = loadKnowledgeBase();

    expect(kb.version).toBe(1);
    expect(kb.entries).toHaveLength(66);
    expect(kb.entries[0]).toMatchObject({ id: 'ing_tofu', name: 'tofu', isVegetarian: true });
    expect(kb.keywords.positive).toContain('veggie');
    expect(kb.keywords.markers).toContain('(v)');
    expect(kb.keywords.negative).toContain('chicken');
  });

  it('should derive stable ids', () => {
    expect(entryId('dish', ' Veggie  Burger ')).toBe('dish_veggie_burger');
    expect(entryId('ingredient', 'fish sauce')).toBe('ing_fish_sauce');
  });

  it('should build documents from name and description', () => {
    expect(entryDocument({ name: 'tofu', description: 'Soybean curd' })).toBe('tofu: Soybean curd');
    expect(entryDocument({ name: 'tofu', description: '' })).toBe('tofu');
  });

  it('should fill optional fields with defaults', () => {
    const kb = parseKnowledgeBase({
      version: 2,
      entries: [{ name: 'lentil soup', kind: 'dish', isVegetarian: true }],
      keywords,
    });

    expect(kb.entries[0]).toEqual({
      id: 'dish_lentil_soup',
      name: 'lentil soup',
      kind: 'dish',
      isVegetarian: true,
      category: 'unknown',
      description: '',
      notes: '',
    });
    expect(Object.isFrozen(kb.entries)).toBe(true);
  });

  it('should reject malformed entries with their path', () => {
    expect(() =>
      parseKnowledgeBase({
        version: 1,
        entries: [{ name: 'gelatin', kind: 'ingredient' }],
        keywords,
      })
    ).toThrow(/^Invalid knowledge base at entries\.0\.isVegetarian: /);
  });

  it('should reject duplicate entries', () => {
    expect(() =>
      parseKnowledgeBase({
        version: 1,
        entries: [
          { name: 'Tofu', kind: 'ingredient', isVegetarian: true },
          { name: 'tofu', kind: 'ingredient', isVegetarian: true },
        ],
        keywords,
      })
    ).toThrow('Duplicate knowledge base entry: ing_tofu');
  });
});
