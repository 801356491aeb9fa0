import { VocabularyRepository, WordFormRepository } from '../clients/db';
import {
  ContentAnalysisResult, DifficultyLabel, LevelAnalysis, NewWordInfo
} from '../types/analysis';
import { CefrLevel } from '../types/grammar';
import { ReviewStatus } from '../types/vocabulary';
import { InputError } from '../utils/errors';
import { FrequencyIndex } from './frequency-index';
import { extractSentences, Lemmatizer, tokenize } from './lemmatizer';

export const READY_THRESHOLD = 80;
export const HIGH_VALUE_RANK = 1500;
const MIN_NEW_WORD_LENGTH = 3;
const MAX_EXAMPLE_SENTENCES = 3;

// Lower bounds of each difficulty label, easiest first
const DIFFICULTY_BANDS: ReadonlyArray<[number, DifficultyLabel]> = [
  [95, 'very easy'],
  [85, 'easy'],
  [70, 'moderate'],
  [50, 'challenging']
];

export function difficultyLabel(comprehensionPct: number): DifficultyLabel {
  const band = DIFFICULTY_BANDS.find(([floor]) => comprehensionPct >= floor);
  return band ? band[1] : 'difficult';
}

export function comprehensionRecommendation(pct: number, newCount: number, highValue: number): string {
  if (pct >= 95) {
    return 'Perfect for your level! You know almost all the vocabulary.';
  }
  if (pct >= 85) {
    return `Great match! Learn ${newCount} new words to fully understand this content.`;
  }
  if (pct >= 70) {
    return `Moderate challenge. Consider learning the ${highValue} high-frequency words first.`;
  }
  if (pct >= 50) {
    return `Challenging content. Focus on the ${highValue} most common new words to improve comprehension.`;
  }
  return `This content may be too advanced. Consider easier material or learn ${highValue} essential words first.`;
}

export interface AnalyzeOptions {
  includeStopWords?: boolean;
}

type AnalyzerStore = Pick<VocabularyRepository, 'lemmaStatuses'> & Pick<WordFormRepository, 'listWordForms'>;

const COMPREHENSIBLE: ReadonlySet<ReviewStatus> = new Set(['learning', 'struggling']);

function byLemma(a: string, b: string): number {
  return a.localeCompare(b, 'es');
}

/**
 * Estimates how much of a text the learner can follow. Read-only: the store
 * is consulted for statuses and cached word forms but never written.
 */
export class ContentAnalyzer {
  constructor(
    private readonly store: AnalyzerStore,
    private readonly lemmatizer: Lemmatizer,
    private readonly index: FrequencyIndex,
    private readonly targetLevel: CefrLevel
  ) {}

  async analyze(text: string, options: AnalyzeOptions = {}): Promise<ContentAnalysisResult> {
    if (typeof text !== 'string' || !text.trim()) {
      throw new InputError('Text to analyze must not be empty');
    }
    const includeStopWords = options.includeStopWords ?? false;

    const tokens = tokenize(text);
    const lemmaOf = new Map<string, string>();
    for (const token of tokens) {
      if (!lemmaOf.has(token)) {
        lemmaOf.set(token, this.lemmatizer.lemmatize(token));
      }
    }

    const lemmas = new Set<string>();
    const stopLemmas = new Set<string>();
    const formsByLemma = new Map<string, Set<string>>();
    const occurrences = new Map<string, number>();

    for (const token of tokens) {
      const lemma = lemmaOf.get(token) ?? token;
      if (this.lemmatizer.isProperName(lemma)) {
        continue;
      }
      if (this.lemmatizer.isStopWord(lemma)) {
        stopLemmas.add(lemma);
        if (!includeStopWords) {
          continue;
        }
      }
      lemmas.add(lemma);
      occurrences.set(lemma, (occurrences.get(lemma) ?? 0) + 1);
      const forms = formsByLemma.get(lemma) ?? new Set<string>();
      forms.add(token);
      formsByLemma.set(lemma, forms);
    }

    const [statuses, wordForms] = await Promise.all([
      this.store.lemmaStatuses(),
      this.store.listWordForms()
    ]);
    const formStrings = new Set(wordForms.map(form => form.form));

    const known = new Set<string>();
    for (const lemma of lemmas) {
      if (statuses.get(lemma) === 'learned') {
        known.add(lemma);
      }
    }

    // A cached inflection marks the lemma of the token it matched, so two
    // surface forms of one known word count once
    const matchedTokens = new Set<string>();
    for (const token of lemmaOf.keys()) {
      if (!formStrings.has(token)) {
        continue;
      }
      matchedTokens.add(token);
      const lemma = lemmaOf.get(token) ?? token;
      if (lemmas.has(lemma)) {
        known.add(lemma);
      }
    }

    const learning = new Set<string>();
    for (const lemma of lemmas) {
      const status = statuses.get(lemma);
      if (!known.has(lemma) && status !== undefined && COMPREHENSIBLE.has(status)) {
        learning.add(lemma);
      }
    }

    const newWords = [...lemmas].filter(lemma =>
      !known.has(lemma)
      && !statuses.has(lemma)
      && lemma.length >= MIN_NEW_WORD_LENGTH
      && !this.lemmatizer.isStopWord(lemma)
    );

    const stopWordsPresent = includeStopWords ? 0 : stopLemmas.size;
    const denominator = lemmas.size + stopWordsPresent;
    const comprehensionPct = denominator === 0
      ? 100
      : Math.min(100, Math.max(0, Math.round(((known.size + learning.size + stopWordsPresent) / denominator) * 1000) / 10));

    const sentences = extractSentences(text);
    const newWordDetails = newWords
      .map(lemma => this.describeNewWord(lemma, formsByLemma.get(lemma), occurrences.get(lemma) ?? 0, sentences))
      .sort((a, b) => a.frequencyRank - b.frequencyRank || byLemma(a.lemma, b.lemma));

    const highValueWords = newWordDetails.filter(word => word.frequencyRank <= HIGH_VALUE_RANK).length;

    return {
      totalWords: tokens.length,
      uniqueWords: lemmas.size,
      knownWords: [...known].sort(byLemma),
      learningWords: [...learning].sort(byLemma),
      newWords: newWordDetails.map(word => word.lemma),
      knownCount: known.size,
      learningCount: learning.size,
      newCount: newWordDetails.length,
      stopWordsPresent,
      wordFormsMatched: matchedTokens.size,
      comprehensionPct,
      difficulty: difficultyLabel(comprehensionPct),
      readyToConsume: comprehensionPct >= READY_THRESHOLD,
      highValueWords,
      recommendation: comprehensionRecommendation(comprehensionPct, newWordDetails.length, highValueWords),
      newWordDetails
    };
  }

  /** Splits the new words into those expected at `level` and those beyond it. */
  async analyzeForLevel(text: string, level: CefrLevel, options: AnalyzeOptions = {}): Promise<LevelAnalysis> {
    const analysis = await this.analyze(text, options);
    const levelWords = analysis.newWordDetails.filter(word => this.index.inReferenceVocabulary(word.lemma, level));
    const beyondLevelWords = analysis.newWordDetails.filter(word => !this.index.inReferenceVocabulary(word.lemma, level));

    return {
      level,
      analysis,
      levelWords,
      beyondLevelWords,
      recommendation: levelWords.length > 0
        ? `Learn the ${levelWords.length} ${level} words first`
        : `No new ${level} vocabulary in this text`
    };
  }

  private describeNewWord(
    lemma: string,
    forms: Set<string> | undefined,
    occurrences: number,
    sentences: string[]
  ): NewWordInfo {
    const originalForms = [...(forms ?? [])].sort(byLemma);
    const examples = sentences.filter(sentence => {
      const words = new Set(tokenize(sentence));
      return originalForms.some(form => words.has(form));
    });

    return {
      lemma,
      translation: this.index.translation(lemma),
      frequencyRank: this.index.rank(lemma),
      cefrLevel: this.index.cefrLevel(lemma),
      frequencyTier: this.index.frequencyTier(lemma),
      inReferenceVocabulary: this.index.inReferenceVocabulary(lemma, this.targetLevel),
      occurrences,
      originalForms,
      exampleSentences: examples.slice(0, MAX_EXAMPLE_SENTENCES)
    };
  }
}
