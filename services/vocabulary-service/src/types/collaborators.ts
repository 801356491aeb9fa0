import { Person, ReviewStatus } from './vocabulary';
import { Tense } from './grammar';

export interface TranslationProvider {
  translate(text: string): Promise<string>;
}

export interface ConjugatedForm {
  person: Person;
  form: string;
}

export interface AgreementForms {
  masculineSingular: string;
  feminineSingular: string;
  masculinePlural: string;
  femininePlural: string;
}

/**
 * Produces inflected surface forms. Implementations reject with
 * GenerationFailure when the reply cannot be used.
 */
export interface MorphologicalGenerator {
  generateConjugations(infinitive: string, tense: Tense): Promise<ConjugatedForm[]>;
  /** Verbs missing from the result are retried one by one by the caller. */
  generateConjugationsBatch(infinitives: string[], tense: Tense): Promise<Map<string, ConjugatedForm[]>>;
  generatePlural(noun: string): Promise<string>;
  generateAgreement(adjective: string): Promise<AgreementForms>;
}

export interface PronunciationScorer {
  /** Mean accuracy 0-100 over recorded attempts, or null when none exist. */
  averageAccuracy(): Promise<number | null>;
}

export interface ReviewPassedEvent {
  vocabularyId: string;
  lemma: string;
  quality: number;
  status: ReviewStatus;
  reviewedAt: Date;
}

export interface RewardSignal {
  reviewPassed(event: ReviewPassedEvent): Promise<void>;
}
