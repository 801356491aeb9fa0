import {
  compareDueOrder, initialProgress, isDue, MIN_EASE_FACTOR, ReviewScheduler, scheduleReview, startOfDay
} from '../src/services/spaced-repetition';
import { SessionContext } from '../src/services/session-context';
import { ProgressRecord } from '../src/types/vocabulary';
import { InconsistentStateError, InputError } from '../src/utils/errors';
import { MemoryProgressStore } from './helpers/memory-store';
import { RecordingRewardSignal } from './helpers/fakes';

const NOW = new Date(2024, 4, 10, 12, 0, 0);
const DAY = 24 * 60 * 60 * 1000;

function record(overrides: Partial<ProgressRecord> = {}): ProgressRecord {
  return { ...initialProgress('item-1', NOW), ...overrides };
}

describe('scheduleReview', () => {
  it('walks the fixed schedule for four perfect reviews', () => {
    let state = record();
    const intervals: number[] = [];
    const statuses: string[] = [];

    for (let i = 0; i < 4; i++) {
      state = { ...state, ...scheduleReview(state, 5, NOW) };
      intervals.push(state.intervalDays);
      statuses.push(state.status);
    }

    expect(intervals).toEqual([1, 3, 7, 14]);
    expect(statuses).toEqual(['learning', 'learning', 'learning', 'learned']);
    expect(state.repetitions).toBe(4);
    expect(state.easeFactor).toBeCloseTo(2.9);
  });

  it('grows past the schedule using the ease factor held before the review', () => {
    const state = record({ repetitions: 4, intervalDays: 14, easeFactor: 2.9, timesCorrect: 4, status: 'learned' });

    const next = scheduleReview(state, 5, NOW);

    expect(next.intervalDays).toBe(41);
    expect(next.easeFactor).toBeCloseTo(3.0);
    expect(next.status).toBe('learned');
  });

  it('caps intervals at 90 days', () => {
    const next = scheduleReview(record({ repetitions: 6, intervalDays: 60, timesCorrect: 6 }), 5, NOW);
    expect(next.intervalDays).toBe(90);
  });

  it('resets the streak on a failing review', () => {
    const learned = record({ repetitions: 5, intervalDays: 30, timesCorrect: 6, status: 'learned' });

    const next = scheduleReview(learned, 0, NOW);

    expect(next.status).toBe('learning');
    expect(next.repetitions).toBe(0);
    expect(next.intervalDays).toBe(1);
    expect(next.timesIncorrect).toBe(1);
    expect(next.easeFactor).toBeCloseTo(1.7);
  });

  it('marks an item struggling after its third miss', () => {
    const next = scheduleReview(record({ timesIncorrect: 2, status: 'learning' }), 1, NOW);
    expect(next.status).toBe('struggling');
    expect(next.timesIncorrect).toBe(3);
  });

  it('lets a struggling item recover from its current repetition count', () => {
    const struggling = record({
      status: 'struggling', timesIncorrect: 3, timesCorrect: 1, repetitions: 2, easeFactor: 1.5
    });

    const next = scheduleReview(struggling, 4, NOW);

    expect(next.timesCorrect).toBe(2);
    expect(next.repetitions).toBe(3);
    expect(next.intervalDays).toBe(7);
    expect(next.status).toBe('learning');
    expect(next.easeFactor).toBeCloseTo(1.5);
  });

  it('never lets the ease factor drop below the floor', () => {
    let state = record();
    for (let i = 0; i < 20; i++) {
      state = { ...state, ...scheduleReview(state, i % 3, NOW) };
      expect(state.easeFactor).toBeGreaterThanOrEqual(MIN_EASE_FACTOR);
    }
    expect(state.easeFactor).toBe(MIN_EASE_FACTOR);
  });

  it('sets next review interval days after the review', () => {
    const next = scheduleReview(record({ repetitions: 1 }), 4, NOW);
    expect(next.lastReview).toEqual(NOW);
    expect(next.nextReview).toEqual(new Date(NOW.getTime() + 3 * DAY));
  });

  it('rejects qualities outside 0-5', () => {
    expect(() => scheduleReview(record(), 6, NOW)).toThrow(InputError);
    expect(() => scheduleReview(record(), 2.5, NOW)).toThrow(InputError);
  });
});

describe('due policy', () => {
  const today = startOfDay(NOW);

  it('is due once the next review has passed', () => {
    expect(isDue(record({ status: 'learned', nextReview: new Date(NOW.getTime() - 1000) }), NOW, today)).toBe(true);
  });

  it('keeps a learned item back until its next review', () => {
    expect(isDue(record({ status: 'learned', nextReview: new Date(NOW.getTime() + DAY) }), NOW, today)).toBe(false);
  });

  it('brings learning items back on a new day', () => {
    const yesterday = new Date(NOW.getTime() - DAY);
    const earlierToday = new Date(NOW.getTime() - 60 * 60 * 1000);
    const future = new Date(NOW.getTime() + 3 * DAY);

    expect(isDue(record({ status: 'learning', lastReview: yesterday, nextReview: future }), NOW, today)).toBe(true);
    expect(isDue(record({ status: 'learning', lastReview: earlierToday, nextReview: future }), NOW, today)).toBe(false);
  });

  it('orders struggling items before earlier ones', () => {
    const struggling = record({ status: 'struggling', nextReview: NOW });
    const early = record({ status: 'learning', nextReview: new Date(NOW.getTime() - DAY) });
    expect(compareDueOrder(struggling, early)).toBeLessThan(0);
    expect(compareDueOrder(early, struggling)).toBeGreaterThan(0);
  });
});

describe('ReviewScheduler', () => {
  let store: MemoryProgressStore;
  let rewards: RecordingRewardSignal;
  let scheduler: ReviewScheduler;

  beforeEach(() => {
    store = new MemoryProgressStore();
    rewards = new RecordingRewardSignal();
    scheduler = new ReviewScheduler(store, rewards, () => NOW);
  });

  it('returns due items struggling first, then by next review', async () => {
    await store.seed('hablar', 'learning', { nextReview: new Date(NOW.getTime() - DAY), lastReview: new Date(NOW.getTime() - 2 * DAY) });
    await store.seed('comer', 'struggling', { nextReview: new Date(NOW.getTime() - 60 * 60 * 1000), lastReview: new Date(NOW.getTime() - DAY) });
    await store.seed('vivir', 'new', { nextReview: new Date(NOW.getTime() - 2 * DAY) });
    await store.seed('casa', 'learned', { nextReview: new Date(NOW.getTime() + 5 * DAY), lastReview: NOW });

    const due = await scheduler.reviewNext(10);

    expect(due.map(entry => entry.item.lemma)).toEqual(['comer', 'vivir', 'hablar']);
  });

  it('honours the limit', async () => {
    await store.seed('hablar', 'new', { nextReview: new Date(NOW.getTime() - DAY) });
    await store.seed('comer', 'new', { nextReview: new Date(NOW.getTime() - 2 * DAY) });

    const due = await scheduler.reviewNext(1);

    expect(due.map(entry => entry.item.lemma)).toEqual(['comer']);
  });

  it('rejects limits outside 1-100', async () => {
    await expect(scheduler.reviewNext(0)).rejects.toBeInstanceOf(InputError);
    await expect(scheduler.reviewNext(101)).rejects.toBeInstanceOf(InputError);
  });

  it('updates progress and emits a reward for a passing review', async () => {
    const { item } = await store.seed('hablar', 'new');

    const outcome = await scheduler.submit(item.id, 5);

    expect(outcome.passed).toBe(true);
    expect(outcome.previous.status).toBe('new');
    expect(outcome.progress).toMatchObject({ status: 'learning', repetitions: 1, intervalDays: 1, timesCorrect: 1 });
    expect(await store.getProgress(item.id)).toEqual(outcome.progress);
    expect(rewards.events).toEqual([
      { vocabularyId: item.id, lemma: 'hablar', quality: 5, status: 'learning', reviewedAt: NOW }
    ]);
  });

  it('does not reward failed reviews', async () => {
    const { item } = await store.seed('hablar', 'learning');
    await scheduler.submit(item.id, 2);
    expect(rewards.events).toHaveLength(0);
  });

  it('rejects unknown items and invalid quality without touching state', async () => {
    const { item } = await store.seed('hablar', 'new');
    const before = await store.getProgress(item.id);

    await expect(scheduler.submit('missing', 4)).rejects.toMatchObject({ name: 'InputError', statusCode: 404 });
    await expect(scheduler.submit(item.id, 7)).rejects.toBeInstanceOf(InputError);

    expect(await store.getProgress(item.id)).toEqual(before);
  });

  it('treats an item without progress as inconsistent state', async () => {
    const { item } = await store.seed('hablar', 'new');
    store.progress.delete(item.id);

    await expect(scheduler.submit(item.id, 4)).rejects.toBeInstanceOf(InconsistentStateError);
  });

  it('records reviews into a session', async () => {
    const { item } = await store.seed('hablar', 'new');
    const session = SessionContext.create('review', NOW);

    await scheduler.submit(item.id, 5, session);
    await scheduler.submit(item.id, 1, session);

    expect(session.flush(new Date(NOW.getTime() + 90 * 1000))).toMatchObject({
      itemsPracticed: 1,
      correctCount: 1,
      incorrectCount: 1,
      durationSeconds: 90
    });
  });

  it('rejects a flushed session before changing progress', async () => {
    const { item } = await store.seed('hablar', 'new');
    const before = await store.getProgress(item.id);
    const session = SessionContext.create('review', NOW);
    session.flush(NOW);

    await expect(scheduler.submit(item.id, 5, session)).rejects.toMatchObject({ name: 'InputError', statusCode: 409 });

    expect(await store.getProgress(item.id)).toEqual(before);
    expect(rewards.events).toHaveLength(0);
  });

  it('reports counts per status and items due now', async () => {
    await store.seed('hablar', 'new', { nextReview: new Date(NOW.getTime() - DAY) });
    await store.seed('comer', 'learned', { nextReview: new Date(NOW.getTime() + DAY), lastReview: NOW });
    await store.seed('vivir', 'struggling', { nextReview: new Date(NOW.getTime() + DAY), lastReview: new Date(NOW.getTime() - 2 * DAY) });

    const stats = await scheduler.statistics();

    expect(stats).toEqual({
      total: 3,
      byStatus: { new: 1, learning: 0, struggling: 1, learned: 1 },
      dueNow: 2
    });
  });
});
