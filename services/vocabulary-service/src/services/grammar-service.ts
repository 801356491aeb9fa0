import { GrammarRepository } from '../clients/db';
import {
  CEFR_LEVELS, CefrLevel, GrammarCapabilities, GrammarProgress, GrammarStatus, GrammarTopicView
} from '../types/grammar';
import { InputError } from '../utils/errors';
import { logger } from '../utils/logger';
import { GrammarCatalog } from './grammar-catalog';
import { INITIAL_EASE_FACTOR, isValidQuality, scheduleReview } from './spaced-repetition';

// Retention at which a learned topic counts as mastered
export const MASTERED_INTERVAL_DAYS = 30;

/** Always available: what an A1 learner can already recognize. */
export const BASELINE_CAPABILITIES: GrammarCapabilities = {
  presentTense: true,
  preteriteTense: false,
  imperfectTense: false,
  futureTense: false,
  conditional: false,
  nounPlurals: true,
  adjectiveAgreement: true
};

const STATUS_WEIGHT: Record<GrammarStatus, number> = {
  new: 0,
  learning: 0.5,
  learned: 1,
  mastered: 1
};

function freshProgress(topicId: string): GrammarProgress {
  return {
    topicId,
    status: 'new',
    easeFactor: INITIAL_EASE_FACTOR,
    intervalDays: 1,
    repetitions: 0,
    timesCorrect: 0,
    timesIncorrect: 0,
    nextReview: null,
    lastReview: null
  };
}

export class GrammarService {
  constructor(
    private readonly store: GrammarRepository,
    private readonly catalog: GrammarCatalog,
    private readonly clock: () => Date = () => new Date()
  ) {}

  async listTopics(level?: CefrLevel): Promise<GrammarTopicView[]> {
    const progress = await this.progressById();
    const topics = level ? this.catalog.topicsAtLevel(level) : this.catalog.topics();
    return topics.map(topic => ({ ...topic, progress: progress.get(topic.id) ?? null }));
  }

  async reviewTopic(topicId: string, quality: number): Promise<GrammarProgress> {
    if (!isValidQuality(quality)) {
      throw new InputError(`Quality must be an integer between 0 and 5, got ${quality}`);
    }
    if (!this.catalog.topic(topicId)) {
      throw InputError.notFound('Grammar topic', topicId);
    }

    const now = this.clock();
    const updated = await this.store.upsertGrammarProgress(topicId, freshProgress(topicId), current => {
      const { status, ...state } = scheduleReview(current, quality, now);
      let grammarStatus: GrammarStatus;
      if (status === 'learned') {
        grammarStatus = state.intervalDays >= MASTERED_INTERVAL_DAYS ? 'mastered' : 'learned';
      } else if (status === 'new') {
        grammarStatus = 'new';
      } else {
        grammarStatus = 'learning';
      }
      return { ...current, ...state, status: grammarStatus };
    });

    logger.debug('Grammar review recorded', { topicId, quality, status: updated.status });
    return updated;
  }

  /**
   * Inflection families the learner can recognize. A1 topics count as known;
   * the rest unlock once learned.
   */
  async capabilities(): Promise<GrammarCapabilities> {
    const progress = await this.progressById();
    const capabilities: GrammarCapabilities = { ...BASELINE_CAPABILITIES };

    for (const topic of this.catalog.topics()) {
      if (!topic.capability) {
        continue;
      }
      const status = progress.get(topic.id)?.status;
      if (topic.cefrLevel === 'A1' || status === 'learned' || status === 'mastered') {
        capabilities[topic.capability] = true;
      }
    }
    return capabilities;
  }

  /** Weighted topic coverage per level, 0-1. Levels without topics report 0. */
  async masteryByLevel(): Promise<Record<CefrLevel, number>> {
    const progress = await this.progressById();
    const mastery = { A1: 0, A2: 0, B1: 0, B2: 0, C1: 0, C2: 0 };

    for (const level of CEFR_LEVELS) {
      const topics = this.catalog.topicsAtLevel(level);
      if (topics.length === 0) {
        continue;
      }
      const covered = topics.reduce((sum, topic) => {
        const status = progress.get(topic.id)?.status ?? 'new';
        return sum + STATUS_WEIGHT[status];
      }, 0);
      mastery[level] = covered / topics.length;
    }
    return mastery;
  }

  private async progressById(): Promise<Map<string, GrammarProgress>> {
    const records = await this.store.listGrammarProgress();
    return new Map(records.map(record => [record.topicId, record]));
  }
}
