import { randomUUID } from 'crypto';
import { SessionRepository } from '../clients/db';
import { PracticeSession, SessionType } from '../types/vocabulary';
import { InputError } from '../utils/errors';
import { logger } from '../utils/logger';

export const SESSION_TYPES: readonly SessionType[] = ['review', 'pronunciation', 'reading', 'mixed'];

interface ReviewSample {
  vocabularyId: string;
  quality: number;
}

/**
 * Accumulates what happens during one practice sitting. Created explicitly,
 * fed by the scheduler and pronunciation endpoints, then flushed once into a
 * PracticeSession summary.
 */
export class SessionContext {
  private readonly reviews: ReviewSample[] = [];
  private readonly pronunciation: number[] = [];
  private flushed = false;

  private constructor(
    readonly id: string,
    readonly sessionType: SessionType,
    readonly startedAt: Date
  ) {}

  static create(sessionType: SessionType, now: Date = new Date()): SessionContext {
    return new SessionContext(randomUUID(), sessionType, now);
  }

  get isFlushed(): boolean {
    return this.flushed;
  }

  recordReview(vocabularyId: string, quality: number): void {
    this.assertOpen();
    this.reviews.push({ vocabularyId, quality });
  }

  recordPronunciation(accuracy: number): void {
    this.assertOpen();
    if (!Number.isFinite(accuracy) || accuracy < 0 || accuracy > 100) {
      throw new InputError('Pronunciation accuracy must be between 0 and 100');
    }
    this.pronunciation.push(accuracy);
  }

  get pronunciationSamples(): readonly number[] {
    return this.pronunciation;
  }

  /** Mean of recorded pronunciation samples, or null when there are none. */
  averageAccuracy(): number | null {
    if (this.pronunciation.length === 0) {
      return null;
    }
    const sum = this.pronunciation.reduce((total, value) => total + value, 0);
    return sum / this.pronunciation.length;
  }

  flush(now: Date = new Date()): PracticeSession {
    this.assertOpen();
    this.flushed = true;

    const correctCount = this.reviews.filter(review => review.quality >= 3).length;
    const average = this.averageAccuracy();
    return {
      id: this.id,
      sessionType: this.sessionType,
      startedAt: this.startedAt,
      endedAt: now,
      itemsPracticed: new Set(this.reviews.map(review => review.vocabularyId)).size,
      correctCount,
      incorrectCount: this.reviews.length - correctCount,
      averageAccuracy: average === null ? null : Math.round(average * 10) / 10,
      durationSeconds: Math.max(0, Math.round((now.getTime() - this.startedAt.getTime()) / 1000))
    };
  }

  /** Throws 409 once the session has been flushed. */
  assertOpen(): void {
    if (this.flushed) {
      throw new InputError(`Session ${this.id} has already been flushed`, 409);
    }
  }
}

// Open sessions untouched for this long are dropped without being saved
export const SESSION_IDLE_MS = 2 * 60 * 60 * 1000;

interface OpenSession {
  session: SessionContext;
  lastActive: Date;
}

/** Open sessions of one running service instance. */
export class SessionManager {
  private readonly open = new Map<string, OpenSession>();

  constructor(
    private readonly store: SessionRepository,
    private readonly clock: () => Date = () => new Date()
  ) {}

  create(sessionType: SessionType): SessionContext {
    const now = this.clock();
    this.evictIdle(now);
    const session = SessionContext.create(sessionType, now);
    this.open.set(session.id, { session, lastActive: now });
    return session;
  }

  /** Open session by id; unknown, flushed or expired ids are an InputError. */
  get(id: string): SessionContext {
    const now = this.clock();
    this.evictIdle(now);
    const entry = this.open.get(id);
    if (!entry) {
      throw InputError.notFound('Session', id);
    }
    entry.lastActive = now;
    return entry.session;
  }

  get openCount(): number {
    return this.open.size;
  }

  async flush(id: string): Promise<PracticeSession> {
    const session = this.get(id);
    const summary = session.flush(this.clock());
    this.open.delete(id);
    await this.store.saveSession(summary);
    logger.info('Practice session saved', {
      sessionId: summary.id,
      itemsPracticed: summary.itemsPracticed,
      durationSeconds: summary.durationSeconds
    });
    return summary;
  }

  history(limit: number): Promise<PracticeSession[]> {
    return this.store.listSessions(limit);
  }

  private evictIdle(now: Date): void {
    for (const [id, entry] of this.open) {
      if (now.getTime() - entry.lastActive.getTime() > SESSION_IDLE_MS) {
        this.open.delete(id);
        logger.warn('Discarding idle practice session', { sessionId: id, lastActive: entry.lastActive });
      }
    }
  }
}
