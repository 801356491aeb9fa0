export const CEFR_LEVELS = ['A1', 'A2', 'B1', 'B2', 'C1', 'C2'] as const;
export type CefrLevel = typeof CEFR_LEVELS[number];

/** 0-based position of a level, used for "at or below" comparisons. */
export function levelIndex(level: CefrLevel): number {
  return CEFR_LEVELS.indexOf(level);
}

export type Tense = 'present' | 'preterite' | 'imperfect' | 'future' | 'conditional';

export interface GrammarCapabilities {
  presentTense: boolean;
  preteriteTense: boolean;
  imperfectTense: boolean;
  futureTense: boolean;
  conditional: boolean;
  nounPlurals: boolean;
  adjectiveAgreement: boolean;
}

export type Capability = keyof GrammarCapabilities;

export type GrammarCategory = 'verbs' | 'nouns' | 'adjectives' | 'pronouns' | 'prepositions' | 'syntax' | 'mood';

export interface GrammarTopic {
  id: string;
  title: string;
  cefrLevel: CefrLevel;
  category: GrammarCategory;
  description: string;
  /** Inflection family the topic unlocks for word-form generation. */
  capability?: Capability;
}

export type GrammarStatus = 'new' | 'learning' | 'learned' | 'mastered';

export interface GrammarProgress {
  topicId: string;
  status: GrammarStatus;
  easeFactor: number;
  intervalDays: number;
  repetitions: number;
  timesCorrect: number;
  timesIncorrect: number;
  nextReview: Date | null;
  lastReview: Date | null;
}

export interface GrammarTopicView extends GrammarTopic {
  progress: GrammarProgress | null;
}
