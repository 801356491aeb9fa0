import { DueQuery, VocabularyRepository } from '../clients/db';
import { ReviewPassedEvent, RewardSignal } from '../types/collaborators';
import {
  ProgressRecord, REVIEW_STATUSES, ReviewStatus, SchedulingState, VocabularyEntry, VocabularyItem
} from '../types/vocabulary';
import { InconsistentStateError, InputError } from '../utils/errors';
import { logger } from '../utils/logger';
import { SessionContext } from './session-context';

export const INITIAL_EASE_FACTOR = 2.5;
export const MIN_EASE_FACTOR = 1.3;
export const MAX_INTERVAL_DAYS = 90;
export const PASSING_QUALITY = 3;

/** Interval in days after the n-th consecutive passing review. */
export const REVIEW_SCHEDULE: Readonly<Partial<Record<number, number>>> = { 0: 1, 1: 3, 2: 7, 3: 14 };

const DAY_MS = 24 * 60 * 60 * 1000;

export interface ScheduledReview extends SchedulingState {
  status: ReviewStatus;
}

export function isValidQuality(quality: unknown): quality is number {
  return typeof quality === 'number' && Number.isInteger(quality) && quality >= 0 && quality <= 5;
}

export function initialProgress(vocabularyId: string, now: Date): ProgressRecord {
  return {
    vocabularyId,
    easeFactor: INITIAL_EASE_FACTOR,
    intervalDays: 1,
    repetitions: 0,
    timesCorrect: 0,
    timesIncorrect: 0,
    status: 'new',
    nextReview: now,
    lastReview: null
  };
}

/**
 * SM-2 update for one review of quality 0-5.
 *
 * Failing reviews reset the repetition streak; passing ones walk the fixed
 * schedule and then grow by the ease factor held before this review.
 */
export function scheduleReview(state: SchedulingState, quality: number, now: Date): ScheduledReview {
  if (!isValidQuality(quality)) {
    throw new InputError(`Quality must be an integer between 0 and 5, got ${quality}`);
  }

  let { intervalDays, repetitions, timesCorrect, timesIncorrect } = state;
  let status: ReviewStatus;

  if (quality < PASSING_QUALITY) {
    repetitions = 0;
    intervalDays = 1;
    timesIncorrect += 1;
    status = timesIncorrect > 2 ? 'struggling' : 'learning';
  } else {
    timesCorrect += 1;
    intervalDays = REVIEW_SCHEDULE[repetitions]
      ?? Math.min(Math.round(state.intervalDays * state.easeFactor), MAX_INTERVAL_DAYS);
    repetitions += 1;
    status = timesCorrect >= 4 && intervalDays >= 7 ? 'learned' : 'learning';
  }

  const miss = 5 - quality;
  const easeFactor = Math.max(MIN_EASE_FACTOR, state.easeFactor + 0.1 - miss * (0.08 + miss * 0.02));

  return {
    easeFactor,
    intervalDays,
    repetitions,
    timesCorrect,
    timesIncorrect,
    status,
    lastReview: now,
    nextReview: new Date(now.getTime() + intervalDays * DAY_MS)
  };
}

export function startOfDay(now: Date): Date {
  const start = new Date(now);
  start.setHours(0, 0, 0, 0);
  return start;
}

/**
 * An item is due once its next review has passed. Items still being learned
 * also come back on any new day, whatever their interval.
 */
export function isDue(progress: ProgressRecord, now: Date, startOfToday: Date = startOfDay(now)): boolean {
  if (progress.nextReview !== null && progress.nextReview.getTime() <= now.getTime()) {
    return true;
  }
  if (progress.status === 'learning' || progress.status === 'struggling') {
    return progress.lastReview === null || progress.lastReview.getTime() < startOfToday.getTime();
  }
  return false;
}

/** Struggling first, then earliest next review. */
export function compareDueOrder(a: ProgressRecord, b: ProgressRecord): number {
  const priority = (p: ProgressRecord) => (p.status === 'struggling' ? 0 : 1);
  const byPriority = priority(a) - priority(b);
  if (byPriority !== 0) {
    return byPriority;
  }
  const time = (p: ProgressRecord) => (p.nextReview ? p.nextReview.getTime() : Number.NEGATIVE_INFINITY);
  return time(a) - time(b);
}

export interface ReviewOutcome {
  item: VocabularyItem;
  previous: ProgressRecord;
  progress: ProgressRecord;
  passed: boolean;
}

export interface ReviewStatistics {
  total: number;
  byStatus: Record<ReviewStatus, number>;
  dueNow: number;
}

export const MAX_REVIEW_LIMIT = 100;

/**
 * Spaced repetition over persisted vocabulary progress.
 */
export class ReviewScheduler {
  constructor(
    private readonly store: VocabularyRepository,
    private readonly rewards: RewardSignal,
    private readonly clock: () => Date = () => new Date()
  ) {}

  async reviewNext(limit: number): Promise<VocabularyEntry[]> {
    if (!Number.isInteger(limit) || limit < 1 || limit > MAX_REVIEW_LIMIT) {
      throw new InputError(`limit must be an integer between 1 and ${MAX_REVIEW_LIMIT}`);
    }
    const page = await this.store.findDue(this.dueQuery(limit));
    return page.items;
  }

  async submit(vocabularyId: string, quality: number, session?: SessionContext): Promise<ReviewOutcome> {
    if (!isValidQuality(quality)) {
      throw new InputError(`Quality must be an integer between 0 and 5, got ${quality}`);
    }

    session?.assertOpen();

    const item = await this.store.getItem(vocabularyId);
    if (!item) {
      throw InputError.notFound('Vocabulary item', vocabularyId);
    }

    const now = this.clock();
    const snapshot: { previous?: ProgressRecord } = {};
    const progress = await this.store.updateProgress(vocabularyId, current => {
      snapshot.previous = current;
      return { ...current, ...scheduleReview(current, quality, now) };
    });

    const previous = snapshot.previous;
    if (!progress || !previous) {
      logger.error('Vocabulary item has no progress record', { vocabularyId, lemma: item.lemma });
      throw new InconsistentStateError(`Vocabulary item ${vocabularyId} has no progress record`);
    }

    const passed = quality >= PASSING_QUALITY;
    session?.recordReview(vocabularyId, quality);

    logger.debug('Review recorded', {
      vocabularyId,
      quality,
      status: progress.status,
      intervalDays: progress.intervalDays
    });

    if (passed) {
      const event: ReviewPassedEvent = {
        vocabularyId,
        lemma: item.lemma,
        quality,
        status: progress.status,
        reviewedAt: now
      };
      await this.rewards.reviewPassed(event);
    }

    return { item, previous, progress, passed };
  }

  async statistics(): Promise<ReviewStatistics> {
    const byStatus = await this.store.countByStatus();
    const due = await this.store.findDue(this.dueQuery(1));
    const total = REVIEW_STATUSES.reduce((sum, status) => sum + byStatus[status], 0);
    return { total, byStatus, dueNow: due.total };
  }

  private dueQuery(limit: number): DueQuery {
    const now = this.clock();
    return { now, startOfToday: startOfDay(now), limit, offset: 0 };
  }
}
