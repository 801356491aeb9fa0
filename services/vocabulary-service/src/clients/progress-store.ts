import { Collection, Db, Document, MongoServerError, ObjectId } from 'mongodb';
import { ContentPackage } from '../types/analysis';
import { GrammarProgress } from '../types/grammar';
import {
  NewVocabularyItem, NewWordForm, Page, PageRequest, PracticeSession, ProgressRecord,
  REVIEW_STATUSES, ReviewStatus, VocabularyEntry, VocabularyItem, WordForm
} from '../types/vocabulary';
import { initialProgress } from '../services/spaced-repetition';
import { logger } from '../utils/logger';
import { DueQuery, ProgressStore } from './db';

const MAX_UPDATE_ATTEMPTS = 5;

interface ProgressDocument extends ProgressRecord {
  revision: number;
}

interface GrammarProgressDocument extends GrammarProgress {
  revision: number;
}

interface JoinedProgress extends ProgressDocument {
  item: VocabularyItem;
}

interface PagedJoin {
  items: JoinedProgress[];
  total: Array<{ count: number }>;
}

function toItem(doc: VocabularyItem): VocabularyItem {
  return {
    id: doc.id,
    lemma: doc.lemma,
    translation: doc.translation,
    category: doc.category,
    cefrLevel: doc.cefrLevel,
    exampleSentence: doc.exampleSentence,
    createdAt: doc.createdAt
  };
}

function toProgress(doc: ProgressRecord): ProgressRecord {
  return {
    vocabularyId: doc.vocabularyId,
    easeFactor: doc.easeFactor,
    intervalDays: doc.intervalDays,
    repetitions: doc.repetitions,
    timesCorrect: doc.timesCorrect,
    timesIncorrect: doc.timesIncorrect,
    status: doc.status,
    nextReview: doc.nextReview,
    lastReview: doc.lastReview
  };
}

function toGrammarProgress(doc: GrammarProgress): GrammarProgress {
  return {
    topicId: doc.topicId,
    status: doc.status,
    easeFactor: doc.easeFactor,
    intervalDays: doc.intervalDays,
    repetitions: doc.repetitions,
    timesCorrect: doc.timesCorrect,
    timesIncorrect: doc.timesIncorrect,
    nextReview: doc.nextReview,
    lastReview: doc.lastReview
  };
}

function toWordForm(doc: WordForm): WordForm {
  return {
    id: doc.id,
    vocabularyId: doc.vocabularyId,
    baseWord: doc.baseWord,
    form: doc.form,
    formType: doc.formType,
    tags: doc.tags,
    verified: doc.verified,
    requestKey: doc.requestKey,
    createdAt: doc.createdAt
  };
}

function toContentPackage(doc: ContentPackage): ContentPackage {
  return {
    id: doc.id,
    title: doc.title,
    words: doc.words,
    comprehensionAtImport: doc.comprehensionAtImport,
    importedAt: doc.importedAt
  };
}

function toSession(doc: PracticeSession): PracticeSession {
  return {
    id: doc.id,
    sessionType: doc.sessionType,
    startedAt: doc.startedAt,
    endedAt: doc.endedAt,
    itemsPracticed: doc.itemsPracticed,
    correctCount: doc.correctCount,
    incorrectCount: doc.incorrectCount,
    averageAccuracy: doc.averageAccuracy,
    durationSeconds: doc.durationSeconds
  };
}

function isDuplicateKey(error: unknown): boolean {
  return error instanceof MongoServerError && error.code === 11000;
}

/**
 * MongoDB persistence for vocabulary, progress, word forms, grammar
 * progress, content packages and practice sessions.
 */
export class MongoProgressStore implements ProgressStore {
  private vocabulary: Collection<VocabularyItem>;
  private progress: Collection<ProgressDocument>;
  private wordForms: Collection<WordForm>;
  private grammarProgress: Collection<GrammarProgressDocument>;
  private contentPackages: Collection<ContentPackage>;
  private sessions: Collection<PracticeSession>;

  constructor(db: Db) {
    this.vocabulary = db.collection<VocabularyItem>('vocabulary');
    this.progress = db.collection<ProgressDocument>('vocabulary_progress');
    this.wordForms = db.collection<WordForm>('word_forms');
    this.grammarProgress = db.collection<GrammarProgressDocument>('grammar_progress');
    this.contentPackages = db.collection<ContentPackage>('content_packages');
    this.sessions = db.collection<PracticeSession>('practice_sessions');
  }

  /**
   * Create indexes
   */
  async initialize(): Promise<void> {
    await this.vocabulary.createIndex({ id: 1 }, { unique: true });
    await this.vocabulary.createIndex({ lemma: 1 }, { unique: true });
    await this.progress.createIndex({ vocabularyId: 1 }, { unique: true });
    await this.progress.createIndex({ status: 1, nextReview: 1 });
    await this.wordForms.createIndex({ id: 1 }, { unique: true });
    await this.wordForms.createIndex({ vocabularyId: 1, form: 1, formType: 1 }, { unique: true });
    await this.wordForms.createIndex({ requestKey: 1 });
    await this.grammarProgress.createIndex({ topicId: 1 }, { unique: true });
    await this.contentPackages.createIndex({ id: 1 }, { unique: true });
    await this.sessions.createIndex({ endedAt: -1 });

    logger.info('Progress store indexes ready');
  }

  // ===================
  // VOCABULARY
  // ===================

  async createItem(input: NewVocabularyItem, now: Date): Promise<VocabularyEntry> {
    const item: VocabularyItem = { ...input, id: new ObjectId().toHexString(), createdAt: now };
    const progress = initialProgress(item.id, now);

    await this.vocabulary.insertOne({ ...item });
    try {
      await this.progress.insertOne({ ...progress, revision: 0 });
    } catch (error) {
      await this.vocabulary.deleteOne({ id: item.id });
      throw error;
    }
    return { item, progress };
  }

  async getItem(id: string): Promise<VocabularyItem | null> {
    const doc = await this.vocabulary.findOne({ id });
    return doc ? toItem(doc) : null;
  }

  async findItemByLemma(lemma: string): Promise<VocabularyItem | null> {
    const doc = await this.vocabulary.findOne({ lemma });
    return doc ? toItem(doc) : null;
  }

  async updateTranslation(id: string, translation: string): Promise<VocabularyItem | null> {
    const doc = await this.vocabulary.findOneAndUpdate(
      { id },
      { $set: { translation } },
      { returnDocument: 'after' }
    );
    return doc ? toItem(doc) : null;
  }

  async deleteItem(id: string): Promise<boolean> {
    const result = await this.vocabulary.deleteOne({ id });
    if (result.deletedCount === 0) {
      return false;
    }
    await this.progress.deleteOne({ vocabularyId: id });
    await this.wordForms.deleteMany({ vocabularyId: id });
    return true;
  }

  async getProgress(vocabularyId: string): Promise<ProgressRecord | null> {
    const doc = await this.progress.findOne({ vocabularyId });
    return doc ? toProgress(doc) : null;
  }

  /**
   * Optimistic read-modify-write: the update only lands if the revision read
   * is still current, otherwise the mutation is re-applied to fresh state.
   */
  async updateProgress(
    vocabularyId: string,
    mutate: (current: ProgressRecord) => ProgressRecord
  ): Promise<ProgressRecord | null> {
    for (let attempt = 0; attempt < MAX_UPDATE_ATTEMPTS; attempt++) {
      const doc = await this.progress.findOne({ vocabularyId });
      if (!doc) {
        return null;
      }
      const next = toProgress(mutate(toProgress(doc)));
      const result = await this.progress.updateOne(
        { vocabularyId, revision: doc.revision },
        { $set: { ...next, vocabularyId, revision: doc.revision + 1 } }
      );
      if (result.matchedCount === 1) {
        return next;
      }
      logger.debug('Progress update conflict, retrying', { vocabularyId, attempt });
    }
    throw new Error(`Progress for ${vocabularyId} kept changing during update`);
  }

  async findDue(query: DueQuery): Promise<Page<VocabularyEntry>> {
    const match: Document = {
      $or: [
        { nextReview: { $lte: query.now } },
        {
          status: { $in: ['learning', 'struggling'] },
          $or: [{ lastReview: null }, { lastReview: { $lt: query.startOfToday } }]
        }
      ]
    };
    const sort: Document = { priority: 1, nextReview: 1, vocabularyId: 1 };
    return this.joinedPage(match, sort, query.offset ?? 0, query.limit, Math.floor((query.offset ?? 0) / query.limit) + 1);
  }

  async findByStatus(statuses: readonly ReviewStatus[], page: PageRequest): Promise<Page<VocabularyEntry>> {
    const match: Document = { status: { $in: [...statuses] } };
    const sort: Document = { vocabularyId: 1 };
    return this.joinedPage(match, sort, (page.page - 1) * page.pageSize, page.pageSize, page.page);
  }

  async lemmaStatuses(): Promise<Map<string, ReviewStatus>> {
    const [items, progress] = await Promise.all([
      this.vocabulary.find({}, { projection: { id: 1, lemma: 1 } }).toArray(),
      this.progress.find({}, { projection: { vocabularyId: 1, status: 1 } }).toArray()
    ]);
    const statusById = new Map(progress.map(record => [record.vocabularyId, record.status]));
    const statuses = new Map<string, ReviewStatus>();
    for (const item of items) {
      const status = statusById.get(item.id);
      if (status !== undefined) {
        statuses.set(item.lemma, status);
      }
    }
    return statuses;
  }

  async countByStatus(): Promise<Record<ReviewStatus, number>> {
    const counts: Record<ReviewStatus, number> = { new: 0, learning: 0, struggling: 0, learned: 0 };
    const groups = await this.progress
      .aggregate<{ _id: ReviewStatus; count: number }>([{ $group: { _id: '$status', count: { $sum: 1 } } }])
      .toArray();
    for (const group of groups) {
      if (REVIEW_STATUSES.includes(group._id)) {
        counts[group._id] = group.count;
      }
    }
    return counts;
  }

  private async joinedPage(
    match: Document,
    sort: Document,
    skip: number,
    limit: number,
    page: number
  ): Promise<Page<VocabularyEntry>> {
    const [result] = await this.progress.aggregate<PagedJoin>([
      { $match: match },
      { $addFields: { priority: { $cond: [{ $eq: ['$status', 'struggling'] }, 0, 1] } } },
      { $sort: sort },
      {
        $facet: {
          items: [
            { $skip: skip },
            { $limit: limit },
            { $lookup: { from: 'vocabulary', localField: 'vocabularyId', foreignField: 'id', as: 'item' } },
            { $unwind: '$item' }
          ],
          total: [{ $count: 'count' }]
        }
      }
    ]).toArray();

    return {
      items: (result?.items ?? []).map(doc => ({ item: toItem(doc.item), progress: toProgress(doc) })),
      total: result?.total[0]?.count ?? 0,
      page,
      pageSize: limit
    };
  }

  // ===================
  // WORD FORMS
  // ===================

  async listWordForms(): Promise<WordForm[]> {
    const docs = await this.wordForms.find({}).toArray();
    return docs.map(toWordForm);
  }

  async listRequestKeys(): Promise<Set<string>> {
    const keys = await this.wordForms.distinct('requestKey');
    return new Set(keys);
  }

  async insertWordForms(forms: NewWordForm[], now: Date): Promise<number> {
    if (forms.length === 0) {
      return 0;
    }
    const result = await this.wordForms.bulkWrite(
      forms.map(form => ({
        updateOne: {
          filter: { vocabularyId: form.vocabularyId, form: form.form, formType: form.formType },
          update: {
            $setOnInsert: {
              id: new ObjectId().toHexString(),
              baseWord: form.baseWord,
              tags: form.tags,
              requestKey: form.requestKey,
              verified: false,
              createdAt: now
            }
          },
          upsert: true
        }
      })),
      { ordered: false }
    );
    return result.upsertedCount;
  }

  async markVerified(id: string): Promise<WordForm | null> {
    const doc = await this.wordForms.findOneAndUpdate(
      { id },
      { $set: { verified: true } },
      { returnDocument: 'after' }
    );
    return doc ? toWordForm(doc) : null;
  }

  async clearWordForms(): Promise<number> {
    const result = await this.wordForms.deleteMany({});
    return result.deletedCount;
  }

  // ===================
  // GRAMMAR
  // ===================

  async listGrammarProgress(): Promise<GrammarProgress[]> {
    const docs = await this.grammarProgress.find({}).toArray();
    return docs.map(toGrammarProgress);
  }

  async getGrammarProgress(topicId: string): Promise<GrammarProgress | null> {
    const doc = await this.grammarProgress.findOne({ topicId });
    return doc ? toGrammarProgress(doc) : null;
  }

  async upsertGrammarProgress(
    topicId: string,
    initial: GrammarProgress,
    mutate: (current: GrammarProgress) => GrammarProgress
  ): Promise<GrammarProgress> {
    for (let attempt = 0; attempt < MAX_UPDATE_ATTEMPTS; attempt++) {
      const doc = await this.grammarProgress.findOne({ topicId });
      if (!doc) {
        const created = toGrammarProgress(mutate(initial));
        try {
          await this.grammarProgress.insertOne({ ...created, topicId, revision: 0 });
          return created;
        } catch (error) {
          if (!isDuplicateKey(error)) {
            throw error;
          }
          continue;
        }
      }

      const next = toGrammarProgress(mutate(toGrammarProgress(doc)));
      const result = await this.grammarProgress.updateOne(
        { topicId, revision: doc.revision },
        { $set: { ...next, topicId, revision: doc.revision + 1 } }
      );
      if (result.matchedCount === 1) {
        return next;
      }
    }
    throw new Error(`Grammar progress for ${topicId} kept changing during update`);
  }

  // ===================
  // CONTENT & SESSIONS
  // ===================

  async saveContentPackage(pkg: ContentPackage): Promise<void> {
    await this.contentPackages.insertOne({ ...pkg });
  }

  async listContentPackages(): Promise<ContentPackage[]> {
    const docs = await this.contentPackages.find({}).sort({ importedAt: 1 }).toArray();
    return docs.map(toContentPackage);
  }

  async saveSession(session: PracticeSession): Promise<void> {
    await this.sessions.insertOne({ ...session });
  }

  async listSessions(limit: number): Promise<PracticeSession[]> {
    const docs = await this.sessions.find({}).sort({ endedAt: -1 }).limit(limit).toArray();
    return docs.map(toSession);
  }
}
