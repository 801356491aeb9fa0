import Joi from 'joi';
import frequencyData from '../data/frequency.json';
import { CEFR_LEVELS, CefrLevel, levelIndex } from '../types/grammar';
import { FrequencyTier } from '../types/analysis';
import { validateWith } from '../utils/validation';

export const UNKNOWN_RANK = 99999;

export type PartOfSpeech =
  | 'verb' | 'noun' | 'adjective' | 'adverb' | 'pronoun'
  | 'preposition' | 'conjunction' | 'determiner' | 'interjection';

export interface FrequencyEntry {
  lemma: string;
  rank: number;
  translation: string;
  pos: PartOfSpeech;
  /** Estimated from rank when absent. */
  level?: CefrLevel;
}

interface IndexedEntry extends FrequencyEntry {
  level: CefrLevel;
}

const entrySchema = Joi.object<FrequencyEntry>({
  lemma: Joi.string().min(1).required(),
  rank: Joi.number().integer().min(1).required(),
  translation: Joi.string().allow('').required(),
  pos: Joi.string()
    .valid('verb', 'noun', 'adjective', 'adverb', 'pronoun', 'preposition', 'conjunction', 'determiner', 'interjection')
    .required(),
  level: Joi.string().valid(...CEFR_LEVELS)
});

const frequencySchema = Joi.array<FrequencyEntry[]>().items(entrySchema);

// Rank ceilings used when a lemma has no explicit level
const RANK_LEVELS: ReadonlyArray<[number, CefrLevel]> = [
  [500, 'A1'],
  [1000, 'A2'],
  [2000, 'B1'],
  [3500, 'B2'],
  [5000, 'C1']
];

/**
 * Static lemma → rank / translation / level lookup. Immutable once built.
 */
export class FrequencyIndex {
  private readonly entries = new Map<string, IndexedEntry>();

  constructor(entries: readonly FrequencyEntry[]) {
    for (const entry of entries) {
      const lemma = entry.lemma.toLowerCase();
      const existing = this.entries.get(lemma);
      // Duplicate lemmas keep the most frequent reading
      if (!existing || entry.rank < existing.rank) {
        this.entries.set(lemma, { ...entry, lemma, level: entry.level ?? estimateLevelFromRank(entry.rank) });
      }
    }
  }

  get size(): number {
    return this.entries.size;
  }

  has(lemma: string): boolean {
    return this.entries.has(lemma);
  }

  rank(lemma: string): number {
    return this.entries.get(lemma)?.rank ?? UNKNOWN_RANK;
  }

  translation(lemma: string): string | null {
    const translation = this.entries.get(lemma)?.translation;
    return translation ? translation : null;
  }

  partOfSpeech(lemma: string): PartOfSpeech | null {
    return this.entries.get(lemma)?.pos ?? null;
  }

  cefrLevel(lemma: string): CefrLevel {
    return this.entries.get(lemma)?.level ?? 'B1';
  }

  /** True when the lemma is listed at `level` or below. */
  inReferenceVocabulary(lemma: string, level: CefrLevel): boolean {
    const entry = this.entries.get(lemma);
    return entry !== undefined && levelIndex(entry.level) <= levelIndex(level);
  }

  /** Lemmas listed at exactly `level`. */
  referenceVocabulary(level: CefrLevel): string[] {
    const lemmas: string[] = [];
    for (const entry of this.entries.values()) {
      if (entry.level === level) {
        lemmas.push(entry.lemma);
      }
    }
    return lemmas;
  }

  frequencyTier(lemma: string): FrequencyTier {
    const rank = this.rank(lemma);
    if (rank === UNKNOWN_RANK) return 'rare';
    if (rank <= 500) return 'essential';
    if (rank <= 1500) return 'high';
    if (rank <= 3000) return 'medium';
    return 'low';
  }
}

export function estimateLevelFromRank(rank: number): CefrLevel {
  for (const [ceiling, level] of RANK_LEVELS) {
    if (rank <= ceiling) {
      return level;
    }
  }
  return 'C2';
}

let defaultIndex: FrequencyIndex | null = null;

/** Index over the bundled frequency list, validated on first use. */
export function getFrequencyIndex(): FrequencyIndex {
  if (!defaultIndex) {
    defaultIndex = new FrequencyIndex(validateWith(frequencySchema, frequencyData, 'frequency.json'));
  }
  return defaultIndex;
}
