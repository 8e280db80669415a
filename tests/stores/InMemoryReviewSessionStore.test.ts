import { describe, it, expect, beforeEach } from 'vitest';
import { InMemoryReviewSessionStore } from '../../src/stores/InMemoryReviewSessionStore.js';
import { ReviewSession } from '../../src/services/ReviewSession.js';
import { result } from '../mocks/fixtures.js';

const T0 = Date.parse('2026-03-01T12:00:00.000Z');

function snapshot(requestId: string, createdAt = T0) {
  return ReviewSession.create(
    requestId,
    [result('French Fries', 4.5, true, 0.4, 'rag')],
    0.5,
    new Date(createdAt)
  ).toSnapshot();
}

describe('InMemoryReviewSessionStore', () => {
  let clock: number;
  let store: InMemoryReviewSessionStore;

  beforeEach(() => {
    clock = T0;
    store = new InMemoryReviewSessionStore(60, () => clock);
  });

  it('should return a saved session', async () => {
    await store.save(snapshot('req-1'));
    const loaded = await store.get('req-1');
    expect(loaded?.requestId).toBe('req-1');
    expect(loaded?.uncertainItems).toHaveLength(1);
  });

  it('should return null for an unknown session', async () => {
    expect(await store.get('missing')).toBeNull();
  });

  it('should hand out copies', async () => {
    await store.save(snapshot('req-1'));
    const first = await store.get('req-1');
    first?.uncertainItems.pop();

    const second = await store.get('req-1');
    expect(second?.uncertainItems).toHaveLength(1);
  });

  it('should expire sessions a fixed time after creation', async () => {
    await store.save(snapshot('req-1'));

    clock = T0 + 59_999;
    expect(await store.get('req-1')).not.toBeNull();

    clock = T0 + 60_000;
    expect(await store.get('req-1')).toBeNull();
    expect(store.size).toBe(0);
  });

  it('should not extend expiry when a session is saved again', async () => {
    await store.save(snapshot('req-1'));
    clock = T0 + 30_000;
    await store.save(snapshot('req-1'));

    clock = T0 + 60_000;
    expect(await store.get('req-1')).toBeNull();
  });

  it('should evict expired sessions on write', async () => {
    await store.save(snapshot('req-1'));
    clock = T0 + 61_000;
    await store.save(snapshot('req-2', clock));

    expect(store.size).toBe(1);
  });

  it('should delete a session', async () => {
    await store.save(snapshot('req-1'));
    await store.delete('req-1');
    expect(await store.get('req-1')).toBeNull();
  });
});
