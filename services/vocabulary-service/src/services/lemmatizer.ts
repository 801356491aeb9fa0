import Joi from 'joi';
import irregularData from '../data/irregular-verbs.json';
import stopWordData from '../data/stop-words.json';
import properNameData from '../data/proper-names.json';
import { FrequencyIndex, getFrequencyIndex } from './frequency-index';
import { validateWith } from '../utils/validation';

const NON_WORD = /[^\p{L}\p{N}\s]/gu;
const DIGITS_ONLY = /^\p{N}+$/u;
const SENTENCE_BREAK = /[.!?…]+/;

/**
 * Lowercases, replaces punctuation with spaces and collapses whitespace.
 * Letters with diacritics (á, ñ, ü...) are kept; decomposed accents are
 * composed first so they are not read as punctuation.
 */
export function normalize(text: string): string {
  return text.normalize('NFC').toLowerCase().replace(NON_WORD, ' ').replace(/\s+/g, ' ').trim();
}

export function tokenize(text: string): string[] {
  const normalized = normalize(text);
  if (!normalized) {
    return [];
  }
  return normalized.split(' ').filter(token => token.length > 1 && !DIGITS_ONLY.test(token));
}

export function extractSentences(text: string): string[] {
  return text
    .split(SENTENCE_BREAK)
    .map(sentence => sentence.trim())
    .filter(sentence => sentence.length > 10);
}

interface SuffixRule {
  suffix: string;
  /** Appended to the stem to propose base forms, most likely first. */
  endings: string[];
  /** Use endings[0] even when no candidate is a known lemma. */
  fallback: boolean;
}

const MIN_STEM = 2;

const rule = (suffix: string, endings: string[], fallback: boolean): SuffixRule => ({ suffix, endings, fallback });

// Regular -ar/-er/-ir inflections. Longer suffixes are tried first. No suffix
// ends in "r", so infinitives are never reduced further.
const SUFFIX_RULES: readonly SuffixRule[] = [
  // conditional
  rule('aríamos', ['ar'], true), rule('eríamos', ['er'], true), rule('iríamos', ['ir'], true),
  rule('arían', ['ar'], true), rule('erían', ['er'], true), rule('irían', ['ir'], true),
  rule('arías', ['ar'], true), rule('erías', ['er'], true), rule('irías', ['ir'], true),
  rule('aría', ['ar'], true), rule('ería', ['er'], true), rule('iría', ['ir'], true),
  // future
  rule('aremos', ['ar'], true), rule('eremos', ['er'], true), rule('iremos', ['ir'], true),
  rule('aréis', ['ar'], true), rule('eréis', ['er'], true), rule('iréis', ['ir'], true),
  rule('arán', ['ar'], true), rule('erán', ['er'], true), rule('irán', ['ir'], true),
  rule('arás', ['ar'], true), rule('erás', ['er'], true), rule('irás', ['ir'], true),
  rule('aré', ['ar'], true), rule('eré', ['er'], true), rule('iré', ['ir'], true),
  rule('ará', ['ar'], true), rule('erá', ['er'], true), rule('irá', ['ir'], true),
  // imperfect
  rule('ábamos', ['ar'], true), rule('abais', ['ar'], true),
  rule('aban', ['ar'], true), rule('abas', ['ar'], true), rule('aba', ['ar'], true),
  rule('íamos', ['er', 'ir'], true), rule('íais', ['er', 'ir'], true),
  rule('ían', ['er', 'ir'], true), rule('ías', ['er', 'ir'], true), rule('ía', ['er', 'ir'], false),
  // preterite
  rule('asteis', ['ar'], true), rule('isteis', ['er', 'ir'], true),
  rule('ieron', ['er', 'ir'], true), rule('aron', ['ar'], true),
  rule('aste', ['ar'], true), rule('iste', ['er', 'ir'], true),
  // gerund and participles
  rule('iendo', ['er', 'ir'], true), rule('ando', ['ar'], true),
  rule('ados', ['ar'], false), rule('adas', ['ar'], false), rule('ada', ['ar'], false), rule('ado', ['ar'], true),
  rule('idos', ['er', 'ir'], false), rule('idas', ['er', 'ir'], false), rule('ida', ['er', 'ir'], false),
  rule('ido', ['ir', 'er'], true),
  // present plural persons
  rule('amos', ['ar'], true), rule('emos', ['er'], true), rule('imos', ['ir'], true),
  rule('áis', ['ar'], true), rule('éis', ['er'], true), rule('ís', ['ir'], false),
  // preterite singular
  rule('ió', ['er', 'ir'], true), rule('ó', ['ar'], true),
  rule('é', ['ar'], false), rule('í', ['er', 'ir'], false),
  // short endings shared with nouns and adjectives: only when a candidate is known
  rule('an', ['ar'], false),
  rule('en', ['er', 'ir'], false),
  rule('as', ['o', 'a', 'ar'], false),
  rule('es', ['er', 'ir', '', 'e'], false),
  rule('os', ['o'], false),
  rule('a', ['o', 'ar'], false),
  rule('e', ['er', 'ir'], false),
  rule('o', ['ar', 'er', 'ir'], false)
];

const irregularSchema = Joi.object<Record<string, string[]>>().pattern(
  Joi.string(),
  Joi.array().items(Joi.string().min(1)).min(1)
);
const wordListSchema = Joi.array<string[]>().items(Joi.string().min(1));

export interface LemmatizerOptions {
  /** infinitive → inflected forms */
  irregularVerbs: Record<string, string[]>;
  stopWords: Iterable<string>;
  properNames: Iterable<string>;
}

/**
 * Heuristic reduction of Spanish surface forms to base forms.
 *
 * Order: proper names, irregular table, known lemmas and stop words, suffix
 * rules, plural stripping, identity. lemmatize(lemmatize(w)) === lemmatize(w).
 */
export class Lemmatizer {
  private readonly irregular = new Map<string, string>();
  readonly stopWords: ReadonlySet<string>;
  readonly properNames: ReadonlySet<string>;
  private readonly cache = new Map<string, string>();

  constructor(private readonly index: FrequencyIndex, options: LemmatizerOptions) {
    this.stopWords = new Set(options.stopWords);
    this.properNames = new Set(options.properNames);

    for (const [infinitive, forms] of Object.entries(options.irregularVerbs)) {
      for (const form of forms) {
        const current = this.irregular.get(form);
        // A form shared by two verbs (fui: ser/ir) goes to the more frequent one
        if (current === undefined || index.rank(infinitive) < index.rank(current)) {
          this.irregular.set(form, infinitive);
        }
      }
    }
  }

  isStopWord(word: string): boolean {
    return this.stopWords.has(word);
  }

  isProperName(word: string): boolean {
    return this.properNames.has(word);
  }

  lemmatize(token: string): string {
    const word = token.normalize('NFC').trim().toLowerCase();
    const cached = this.cache.get(word);
    if (cached !== undefined) {
      return cached;
    }
    const lemma = this.reduce(word);
    this.cache.set(word, lemma);
    return lemma;
  }

  private reduce(word: string): string {
    if (!word || this.properNames.has(word)) {
      return word;
    }

    const irregular = this.irregular.get(word);
    if (irregular !== undefined) {
      return irregular;
    }

    if (this.index.has(word) || this.stopWords.has(word)) {
      return word;
    }

    for (const { suffix, endings, fallback } of SUFFIX_RULES) {
      if (!word.endsWith(suffix)) {
        continue;
      }
      const stem = word.slice(0, -suffix.length);
      if (stem.length < MIN_STEM) {
        continue;
      }
      const candidates = endings.map(ending => stem + ending);
      const best = this.mostFrequentKnown(candidates);
      if (best !== null) {
        return best;
      }
      if (fallback) {
        return candidates[0];
      }
    }

    return this.singular(word) ?? word;
  }

  private singular(word: string): string | null {
    if (word.endsWith('es') && word.length > 3) {
      const stripped = word.slice(0, -2);
      if (this.isStableLemma(stripped)) {
        return stripped;
      }
    }
    if (word.endsWith('s') && word.length > 2) {
      const stripped = word.slice(0, -1);
      if (this.isStableLemma(stripped)) {
        return stripped;
      }
    }
    return null;
  }

  /** Known lemma that is not itself an inflected irregular form. */
  private isStableLemma(candidate: string): boolean {
    return this.index.has(candidate) && !this.irregular.has(candidate);
  }

  private mostFrequentKnown(candidates: string[]): string | null {
    let best: string | null = null;
    for (const candidate of candidates) {
      if (!this.isStableLemma(candidate)) {
        continue;
      }
      if (best === null || this.index.rank(candidate) < this.index.rank(best)) {
        best = candidate;
      }
    }
    return best;
  }
}

let defaultLemmatizer: Lemmatizer | null = null;

export function getLemmatizer(): Lemmatizer {
  if (!defaultLemmatizer) {
    defaultLemmatizer = new Lemmatizer(getFrequencyIndex(), {
      irregularVerbs: validateWith(irregularSchema, irregularData, 'irregular-verbs.json'),
      stopWords: validateWith(wordListSchema, stopWordData, 'stop-words.json'),
      properNames: validateWith(wordListSchema, properNameData, 'proper-names.json')
    });
  }
  return defaultLemmatizer;
}
