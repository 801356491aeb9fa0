import { CefrLevel, Tense } from './grammar';

export type ReviewStatus = 'new' | 'learning' | 'struggling' | 'learned';

export const REVIEW_STATUSES: readonly ReviewStatus[] = ['new', 'learning', 'struggling', 'learned'];

export interface VocabularyItem {
  id: string;
  lemma: string;
  translation: string;
  category: string;
  cefrLevel: CefrLevel;
  exampleSentence: string | null;
  createdAt: Date;
}

export interface NewVocabularyItem {
  lemma: string;
  translation: string;
  category: string;
  cefrLevel: CefrLevel;
  exampleSentence: string | null;
}

/** Memory state shared by vocabulary and grammar scheduling. */
export interface SchedulingState {
  easeFactor: number;
  intervalDays: number;
  repetitions: number;
  timesCorrect: number;
  timesIncorrect: number;
  nextReview: Date | null;
  lastReview: Date | null;
}

export interface ProgressRecord extends SchedulingState {
  vocabularyId: string;
  status: ReviewStatus;
}

export interface VocabularyEntry {
  item: VocabularyItem;
  progress: ProgressRecord;
}

export type FormType = 'base' | 'verb_conjugation' | 'noun_plural' | 'adjective_agreement';

export const PERSONS = ['yo', 'tú', 'él/ella/usted', 'nosotros', 'vosotros', 'ellos/ellas/ustedes'] as const;
export type Person = typeof PERSONS[number];

export interface GrammaticalTags {
  person?: Person;
  number?: 'singular' | 'plural';
  gender?: 'masculine' | 'feminine';
  tense?: Tense;
  mood?: 'indicative' | 'conditional';
}

export interface WordForm {
  id: string;
  vocabularyId: string;
  baseWord: string;
  form: string;
  formType: FormType;
  tags: GrammaticalTags;
  verified: boolean;
  /** Cache key of the generation request that produced this form. */
  requestKey: string;
  createdAt: Date;
}

export type NewWordForm = Omit<WordForm, 'id' | 'createdAt' | 'verified'>;

export type SessionType = 'review' | 'pronunciation' | 'reading' | 'mixed';

export interface PracticeSession {
  id: string;
  sessionType: SessionType;
  startedAt: Date;
  endedAt: Date;
  itemsPracticed: number;
  correctCount: number;
  incorrectCount: number;
  averageAccuracy: number | null;
  durationSeconds: number;
}

export interface PageRequest {
  page: number;
  pageSize: number;
}

export interface Page<T> {
  items: T[];
  total: number;
  page: number;
  pageSize: number;
}
