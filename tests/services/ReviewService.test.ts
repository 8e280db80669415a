import { describe, it, expect, beforeEach } from 'vitest';
import { ReviewService } from '../../src/services/ReviewService.js';
import { InMemoryReviewSessionStore } from '../../src/stores/InMemoryReviewSessionStore.js';
import { InMemoryFeedbackStore } from '../../src/stores/InMemoryFeedbackStore.js';
import type { FeedbackRecord } from '../../src/stores/IFeedbackStore.js';
import { ConsoleLogProvider } from '../../src/providers/ConsoleLogProvider.js';
import { NotFoundError } from '../../src/errors.js';
import { result } from '../mocks/fixtures.js';

const T0 = Date.parse('2026-03-01T12:00:00.000Z');

function menu() {
  return [
    result('Veggie Burger', 9, true, 0.95, 'keyword'),
    result('Chicken Wings', 11, false, 0.95, 'keyword'),
    result('French Fries', 4.5, true, 0.4, 'rag'),
  ];
}

describe('ReviewService', () => {
  let clock: number;
  let store: InMemoryReviewSessionStore;
  let logs: ConsoleLogProvider;
  let service: ReviewService;

  beforeEach(() => {
    clock = T0;
    store = new InMemoryReviewSessionStore(3_600, () => clock);
    logs = new ConsoleLogProvider();
    service = new ReviewService(store, { hitlThreshold: 0.5 }, logs, () => clock);
  });

  // ── create / get ──

  it('should open and store a session', async () => {
    const view = await service.create(menu(), 'req-1');

    expect(view.status).toBe('needs_review');
    expect(view.partialSum).toBe(9);
    expect((await store.get('req-1'))?.createdAt).toBe('2026-03-01T12:00:00.000Z');
    expect(logs.find('Review session opened')[0]?.fields).toEqual({
      requestId: 'req-1',
      confident: 2,
      uncertain: 1,
    });
  });

  it('should generate a request id when none is given', async () => {
    const view = await service.create(menu());
    expect(view.requestId).toMatch(/^[0-9a-f-]{36}$/);
    expect(await service.get(view.requestId)).toEqual(view);
  });

  it('should not log an opened session when nothing needs review', async () => {
    const view = await service.create(menu().slice(0, 2), 'req-1');
    expect(view.status).toBe('resolved');
    expect(logs.find('Review session opened')).toEqual([]);
  });

  it('should reject unknown sessions', async () => {
    await expect(service.get('missing')).rejects.toBeInstanceOf(NotFoundError);
    await expect(service.applyCorrections('missing', [])).rejects.toThrow(
      'Review session "missing" not found or expired'
    );
  });

  it('should reject expired sessions', async () => {
    await service.create(menu(), 'req-1');
    clock = T0 + 3_600_000;
    await expect(service.get('req-1')).rejects.toBeInstanceOf(NotFoundError);
  });

  // ── corrections ──

  it('should resolve a session with corrections', async () => {
    await service.create(menu(), 'req-1');
    const resolution = await service.applyCorrections('req-1', [
      { name: 'French Fries', isVegetarian: true },
    ]);

    expect(resolution.totalSum).toBe(13.5);
    expect((await service.get('req-1')).status).toBe('resolved');
  });

  it('should log each correction as feedback', async () => {
    await service.create(menu(), 'req-1');
    await service.applyCorrections('req-1', [
      { name: 'French Fries', isVegetarian: true },
      { name: 'Lobster Bisque', isVegetarian: true },
    ]);

    expect(logs.find('Review correction applied').map((e) => e.fields)).toEqual([
      {
        requestId: 'req-1',
        feedbackType: 'hitl_correction',
        dish: 'French Fries',
        isVegetarian: true,
        method: 'rag',
      },
    ]);
    expect(logs.find('Review session resolved')[0]?.fields).toEqual({
      requestId: 'req-1',
      submitted: 2,
      applied: 1,
      repeat: false,
      totalSum: 13.5,
    });
  });

  it('should be idempotent once resolved', async () => {
    await service.create(menu(), 'req-1');
    const first = await service.applyCorrections('req-1', [
      { name: 'French Fries', isVegetarian: true },
    ]);
    const second = await service.applyCorrections('req-1', [
      { name: 'French Fries', isVegetarian: false },
    ]);

    expect(second).toEqual(first);
    expect(logs.find('Review correction applied')).toHaveLength(1);
    expect(logs.find('Review session resolved')[1]?.fields).toMatchObject({ repeat: true });
  });

  it('should apply concurrent submissions one at a time', async () => {
    await service.create(menu(), 'req-1');
    const [a, b] = await Promise.all([
      service.applyCorrections('req-1', [{ name: 'French Fries', isVegetarian: true }]),
      service.applyCorrections('req-1', [{ name: 'French Fries', isVegetarian: false }]),
    ]);

    expect(a.totalSum).toBe(13.5);
    expect(b).toEqual(a);
  });

  it('should keep working after a failed submission', async () => {
    await expect(service.applyCorrections('missing', [])).rejects.toBeInstanceOf(NotFoundError);
    await service.create(menu(), 'missing');
    const resolution = await service.applyCorrections('missing', []);
    expect(resolution.totalSum).toBe(9);
  });

  // ── feedback ──

  it('should report no feedback before any review', async () => {
    expect(await service.feedbackStats()).toEqual({
      totalCorrections: 0,
      uniqueDishes: 0,
      dishStats: {},
      recentFeedback: [],
    });
  });

  it('should tally applied corrections per dish', async () => {
    await service.create(menu(), 'req-1');
    await service.create(menu(), 'req-2');
    await service.applyCorrections('req-1', [
      { name: 'French Fries', isVegetarian: true },
      { name: 'Lobster Bisque', isVegetarian: true },
    ]);
    clock = T0 + 60_000;
    await service.applyCorrections('req-2', [{ name: 'french fries ', isVegetarian: false }]);
    await service.applyCorrections('req-2', [{ name: 'French Fries', isVegetarian: true }]);

    expect(await service.feedbackStats()).toEqual({
      totalCorrections: 2,
      uniqueDishes: 1,
      dishStats: { 'French Fries': { vegCount: 1, nonVegCount: 1 } },
      recentFeedback: [
        {
          timestamp: '2026-03-01T12:00:00.000Z',
          requestId: 'req-1',
          dishName: 'French Fries',
          humanLabel: true,
          feedbackType: 'hitl_correction',
        },
        {
          timestamp: '2026-03-01T12:01:00.000Z',
          requestId: 'req-2',
          dishName: 'French Fries',
          humanLabel: false,
          feedbackType: 'hitl_correction',
        },
      ],
    });
  });

  it('should list only the latest twenty records', async () => {
    const history: FeedbackRecord[] = Array.from({ length: 25 }, (_, i) => ({
      timestamp: '2026-02-01T00:00:00.000Z',
      requestId: `req-${i}`,
      dishName: 'Dal Tadka',
      humanLabel: i % 2 === 0,
      feedbackType: 'hitl_correction',
    }));
    const feedback = new InMemoryFeedbackStore();
    await feedback.append(history);
    const withHistory = new ReviewService(store, { hitlThreshold: 0.5 }, logs, () => clock, feedback);

    const stats = await withHistory.feedbackStats();
    expect(stats.totalCorrections).toBe(25);
    expect(stats.dishStats).toEqual({ 'Dal Tadka': { vegCount: 13, nonVegCount: 12 } });
    expect(stats.recentFeedback.map((r) => r.requestId)).toEqual(
      Array.from({ length: 20 }, (_, i) => `req-${i + 5}`)
    );
  });
});
