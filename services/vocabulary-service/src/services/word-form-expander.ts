import { VocabularyRepository, WordFormRepository } from '../clients/db';
import { AgreementForms, ConjugatedForm, MorphologicalGenerator } from '../types/collaborators';
import { Capability, GrammarCapabilities, Tense } from '../types/grammar';
import {
  FormType, GrammaticalTags, NewWordForm, Person, PERSONS, ReviewStatus, VocabularyEntry, WordForm
} from '../types/vocabulary';
import { errorMessage, GenerationFailure, InputError } from '../utils/errors';
import { logger } from '../utils/logger';
import { FrequencyIndex } from './frequency-index';
import { GrammarService } from './grammar-service';

export const EXPANDABLE_STATUSES: readonly ReviewStatus[] = ['learning', 'struggling', 'learned'];

const TENSE_CAPABILITIES: ReadonlyArray<[Capability, Tense]> = [
  ['presentTense', 'present'],
  ['preteriteTense', 'preterite'],
  ['imperfectTense', 'imperfect'],
  ['futureTense', 'future'],
  ['conditional', 'conditional']
];

const SINGULAR_PERSONS: readonly Person[] = ['yo', 'tú', 'él/ella/usted'];

const AGREEMENT_TAGS: ReadonlyArray<[keyof AgreementForms, GrammaticalTags]> = [
  ['masculineSingular', { gender: 'masculine', number: 'singular' }],
  ['feminineSingular', { gender: 'feminine', number: 'singular' }],
  ['masculinePlural', { gender: 'masculine', number: 'plural' }],
  ['femininePlural', { gender: 'feminine', number: 'plural' }]
];

const PAGE_SIZE = 200;

type WordClass = 'verb' | 'noun' | 'adjective';

export interface RegenerationResult {
  wordsProcessed: number;
  formsGenerated: number;
  /** Cached forms per processed word, base form included. */
  multiplier: number;
  failedRequests: number;
}

export interface WordFormStats {
  baseWords: number;
  totalForms: number;
  generatedForms: number;
  verifiedForms: number;
  multiplier: number;
}

export function requestKey(baseWord: string, formType: FormType, tense?: Tense): string {
  return `${baseWord}|${formType}|${tense ?? ''}`;
}

export function enabledTenses(capabilities: GrammarCapabilities): Tense[] {
  return TENSE_CAPABILITIES.filter(([capability]) => capabilities[capability]).map(([, tense]) => tense);
}

function cleanForm(value: string): string {
  return value.normalize('NFC').trim().toLowerCase();
}

function isUsableForm(value: unknown): value is string {
  return typeof value === 'string' && /^[\p{L}]+$/u.test(value.trim());
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

interface ExpanderOptions {
  batchSize: number;
  clock?: () => Date;
}

/**
 * Generates and caches inflected surface forms for the words a learner is
 * working on, so the analyzer can recognize "hablé" as a form of a known
 * "hablar". Collaborator failures never propagate: the word keeps its base
 * form and the request is retried on the next run.
 */
export class WordFormExpander {
  private readonly batchSize: number;
  private readonly clock: () => Date;

  constructor(
    private readonly store: VocabularyRepository & WordFormRepository,
    private readonly grammar: GrammarService,
    private readonly index: FrequencyIndex,
    private readonly generator: MorphologicalGenerator,
    options: ExpanderOptions
  ) {
    this.batchSize = Math.max(1, options.batchSize);
    this.clock = options.clock ?? (() => new Date());
  }

  async regenerate(options: { force?: boolean } = {}): Promise<RegenerationResult> {
    if (options.force) {
      const removed = await this.store.clearWordForms();
      logger.info('Cleared cached word forms', { removed });
    }

    const capabilities = await this.grammar.capabilities();
    const tenses = enabledTenses(capabilities);
    const entries = await this.expandableEntries();
    const cached = await this.store.listRequestKeys();

    const run = { formsGenerated: 0, failedRequests: 0 };
    const verbs: VocabularyEntry[] = [];

    for (const entry of entries) {
      const lemma = entry.item.lemma;
      const baseKey = requestKey(lemma, 'base');
      if (!cached.has(baseKey)) {
        run.formsGenerated += await this.save([
          { vocabularyId: entry.item.id, baseWord: lemma, form: lemma, formType: 'base', tags: {}, requestKey: baseKey }
        ]);
      }

      const wordClass = this.classify(lemma);
      if (wordClass === 'verb') {
        verbs.push(entry);
      } else if (wordClass === 'noun' && capabilities.nounPlurals) {
        await this.expandNoun(entry, cached, run);
      } else if (wordClass === 'adjective' && capabilities.adjectiveAgreement) {
        await this.expandAdjective(entry, cached, run);
      }
    }

    for (const tense of tenses) {
      const pending = verbs.filter(entry => !cached.has(requestKey(entry.item.lemma, 'verb_conjugation', tense)));
      for (let start = 0; start < pending.length; start += this.batchSize) {
        await this.expandVerbBatch(pending.slice(start, start + this.batchSize), tense, run);
      }
    }

    const processed = new Set(entries.map(entry => entry.item.id));
    const forms = await this.store.listWordForms();
    const storedForProcessed = forms.filter(form => processed.has(form.vocabularyId)).length;

    const result: RegenerationResult = {
      wordsProcessed: entries.length,
      formsGenerated: run.formsGenerated,
      multiplier: entries.length === 0 ? 0 : round2(storedForProcessed / entries.length),
      failedRequests: run.failedRequests
    };
    logger.info('Word form regeneration finished', { ...result, tenses });
    return result;
  }

  async stats(): Promise<WordFormStats> {
    const forms = await this.store.listWordForms();
    const baseWords = new Set(forms.map(form => form.vocabularyId)).size;
    return {
      baseWords,
      totalForms: forms.length,
      generatedForms: forms.filter(form => form.formType !== 'base').length,
      verifiedForms: forms.filter(form => form.verified).length,
      multiplier: baseWords === 0 ? 0 : round2(forms.length / baseWords)
    };
  }

  async verify(formId: string): Promise<WordForm> {
    const form = await this.store.markVerified(formId);
    if (!form) {
      throw InputError.notFound('Word form', formId);
    }
    return form;
  }

  /** Frequency data first, then the spelling heuristic. */
  classify(lemma: string): WordClass | null {
    const pos = this.index.partOfSpeech(lemma);
    if (pos === 'verb' || pos === 'noun' || pos === 'adjective') {
      return pos;
    }
    if (pos !== null) {
      return null;
    }
    if (/(ar|er|ir)$/.test(lemma)) return 'verb';
    if (lemma.endsWith('o')) return 'adjective';
    return 'noun';
  }

  private async expandableEntries(): Promise<VocabularyEntry[]> {
    const entries: VocabularyEntry[] = [];
    for (let page = 1; ; page += 1) {
      const result = await this.store.findByStatus(EXPANDABLE_STATUSES, { page, pageSize: PAGE_SIZE });
      entries.push(...result.items);
      if (result.items.length === 0 || entries.length >= result.total) {
        return entries;
      }
    }
  }

  private async expandNoun(entry: VocabularyEntry, cached: Set<string>, run: RunCounters): Promise<void> {
    const lemma = entry.item.lemma;
    const key = requestKey(lemma, 'noun_plural');
    if (cached.has(key)) {
      return;
    }
    await this.attempt(key, run, async () => {
      const plural = await this.generator.generatePlural(lemma);
      if (!isUsableForm(plural)) {
        throw new GenerationFailure(key, 'plural is not a single word');
      }
      return [{
        vocabularyId: entry.item.id,
        baseWord: lemma,
        form: cleanForm(plural),
        formType: 'noun_plural',
        tags: { number: 'plural' },
        requestKey: key
      }];
    });
  }

  private async expandAdjective(entry: VocabularyEntry, cached: Set<string>, run: RunCounters): Promise<void> {
    const lemma = entry.item.lemma;
    const key = requestKey(lemma, 'adjective_agreement');
    if (cached.has(key)) {
      return;
    }
    await this.attempt(key, run, async () => {
      const agreement = await this.generator.generateAgreement(lemma);
      return AGREEMENT_TAGS.map(([field, tags]): NewWordForm => {
        const form = agreement[field];
        if (!isUsableForm(form)) {
          throw new GenerationFailure(key, `missing ${field}`);
        }
        return {
          vocabularyId: entry.item.id,
          baseWord: lemma,
          form: cleanForm(form),
          formType: 'adjective_agreement',
          tags,
          requestKey: key
        };
      });
    });
  }

  private async expandVerbBatch(chunk: VocabularyEntry[], tense: Tense, run: RunCounters): Promise<void> {
    let batch = new Map<string, ConjugatedForm[]>();
    if (chunk.length > 1) {
      try {
        batch = await this.generator.generateConjugationsBatch(chunk.map(entry => entry.item.lemma), tense);
      } catch (error) {
        logger.warn('Batch conjugation failed, falling back to single requests', {
          tense,
          verbs: chunk.length,
          error: errorMessage(error)
        });
      }
    }

    for (const entry of chunk) {
      const lemma = entry.item.lemma;
      const key = requestKey(lemma, 'verb_conjugation', tense);
      await this.attempt(key, run, async () => {
        const fromBatch = batch.get(lemma);
        if (fromBatch) {
          try {
            return this.conjugationForms(entry, tense, key, fromBatch);
          } catch (error) {
            logger.warn('Discarding malformed batch conjugation', { request: key, error: errorMessage(error) });
          }
        }
        const single = await this.generator.generateConjugations(lemma, tense);
        return this.conjugationForms(entry, tense, key, single);
      });
    }
  }

  private conjugationForms(
    entry: VocabularyEntry,
    tense: Tense,
    key: string,
    conjugations: ConjugatedForm[]
  ): NewWordForm[] {
    if (conjugations.length === 0) {
      throw new GenerationFailure(key, 'no conjugations returned');
    }
    return conjugations.map(({ person, form }) => {
      if (!PERSONS.includes(person) || !isUsableForm(form)) {
        throw new GenerationFailure(key, `unusable conjugation for ${person}`);
      }
      return {
        vocabularyId: entry.item.id,
        baseWord: entry.item.lemma,
        form: cleanForm(form),
        formType: 'verb_conjugation',
        tags: {
          person,
          number: SINGULAR_PERSONS.includes(person) ? 'singular' : 'plural',
          tense,
          mood: tense === 'conditional' ? 'conditional' : 'indicative'
        },
        requestKey: key
      };
    });
  }

  /** Runs one generation request, recording failures instead of raising them. */
  private async attempt(key: string, run: RunCounters, produce: () => Promise<NewWordForm[]>): Promise<void> {
    let forms: NewWordForm[];
    try {
      forms = await produce();
    } catch (error) {
      run.failedRequests += 1;
      logger.warn('Word form generation skipped', { request: key, error: errorMessage(error) });
      return;
    }
    run.formsGenerated += await this.save(forms);
  }

  private save(forms: NewWordForm[]): Promise<number> {
    return this.store.insertWordForms(forms, this.clock());
  }
}

interface RunCounters {
  formsGenerated: number;
  failedRequests: number;
}
