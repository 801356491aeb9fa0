// Persistence seams. The service code only sees these interfaces; the
// MongoDB implementation lives in progress-store.ts and tests use an
// in-memory one.
import {
  NewVocabularyItem, NewWordForm, Page, PageRequest, PracticeSession,
  ProgressRecord, ReviewStatus, VocabularyEntry, VocabularyItem, WordForm
} from '../types/vocabulary';
import { GrammarProgress } from '../types/grammar';
import { ContentPackage } from '../types/analysis';

export interface DueQuery {
  now: Date;
  startOfToday: Date;
  limit: number;
  offset?: number;
}

export interface VocabularyRepository {
  /** Creates the item together with its fresh progress record. */
  createItem(input: NewVocabularyItem, now: Date): Promise<VocabularyEntry>;
  getItem(id: string): Promise<VocabularyItem | null>;
  findItemByLemma(lemma: string): Promise<VocabularyItem | null>;
  updateTranslation(id: string, translation: string): Promise<VocabularyItem | null>;
  /** Removes the item, its progress record and its word forms. */
  deleteItem(id: string): Promise<boolean>;

  getProgress(vocabularyId: string): Promise<ProgressRecord | null>;
  /**
   * Applies `mutate` to the current record atomically. Resolves null when the
   * record does not exist.
   */
  updateProgress(
    vocabularyId: string,
    mutate: (current: ProgressRecord) => ProgressRecord
  ): Promise<ProgressRecord | null>;

  /** Due entries, struggling first then by ascending next review. */
  findDue(query: DueQuery): Promise<Page<VocabularyEntry>>;
  findByStatus(statuses: readonly ReviewStatus[], page: PageRequest): Promise<Page<VocabularyEntry>>;
  /** lemma → status for every stored item. */
  lemmaStatuses(): Promise<Map<string, ReviewStatus>>;
  countByStatus(): Promise<Record<ReviewStatus, number>>;
}

export interface WordFormRepository {
  listWordForms(): Promise<WordForm[]>;
  listRequestKeys(): Promise<Set<string>>;
  /** Skips forms already stored for the same item, string and type. Returns the number inserted. */
  insertWordForms(forms: NewWordForm[], now: Date): Promise<number>;
  markVerified(id: string): Promise<WordForm | null>;
  clearWordForms(): Promise<number>;
}

export interface GrammarRepository {
  listGrammarProgress(): Promise<GrammarProgress[]>;
  getGrammarProgress(topicId: string): Promise<GrammarProgress | null>;
  /** Atomic like updateProgress, but creates the record from `initial` when absent. */
  upsertGrammarProgress(
    topicId: string,
    initial: GrammarProgress,
    mutate: (current: GrammarProgress) => GrammarProgress
  ): Promise<GrammarProgress>;
}

export interface ContentRepository {
  saveContentPackage(pkg: ContentPackage): Promise<void>;
  listContentPackages(): Promise<ContentPackage[]>;
}

export interface SessionRepository {
  saveSession(session: PracticeSession): Promise<void>;
  listSessions(limit: number): Promise<PracticeSession[]>;
}

export type ProgressStore =
  VocabularyRepository & WordFormRepository & GrammarRepository & ContentRepository & SessionRepository;
