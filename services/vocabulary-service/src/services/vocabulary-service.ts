import { VocabularyRepository } from '../clients/db';
import { TranslationProvider } from '../types/collaborators';
import { Page, ReviewStatus, VocabularyEntry } from '../types/vocabulary';
import { errorMessage, InconsistentStateError, InputError } from '../utils/errors';
import { logger } from '../utils/logger';
import { FrequencyIndex } from './frequency-index';
import { Lemmatizer } from './lemmatizer';

export interface AddVocabularyRequest {
  lemma: string;
  translation?: string;
  category?: string;
  exampleSentence?: string;
}

export interface ListVocabularyRequest {
  status?: ReviewStatus;
  page: number;
  pageSize: number;
}

export interface AddVocabularyResult {
  entry: VocabularyEntry;
  created: boolean;
}

const ALL_STATUSES: readonly ReviewStatus[] = ['new', 'learning', 'struggling', 'learned'];

export class VocabularyService {
  constructor(
    private readonly store: VocabularyRepository,
    private readonly index: FrequencyIndex,
    private readonly lemmatizer: Lemmatizer,
    private readonly translator: TranslationProvider,
    private readonly clock: () => Date = () => new Date()
  ) {}

  /**
   * Adds a word on first encounter. Inflected input is reduced to its lemma;
   * a lemma that is already stored returns the existing entry.
   */
  async add(request: AddVocabularyRequest): Promise<AddVocabularyResult> {
    const word = request.lemma.normalize('NFC').trim().toLowerCase();
    if (!word) {
      throw new InputError('Lemma must not be empty');
    }
    const lemma = this.lemmatizer.lemmatize(word);

    const existing = await this.store.findItemByLemma(lemma);
    if (existing) {
      const progress = await this.store.getProgress(existing.id);
      if (!progress) {
        throw new InconsistentStateError(`Vocabulary item ${existing.id} has no progress record`);
      }
      return { entry: { item: existing, progress }, created: false };
    }

    const translation = request.translation?.trim()
      || this.index.translation(lemma)
      || await this.translate(lemma);

    const entry = await this.store.createItem({
      lemma,
      translation,
      category: request.category?.trim() || 'general',
      cefrLevel: this.index.cefrLevel(lemma),
      exampleSentence: request.exampleSentence?.trim() || null
    }, this.clock());

    logger.info('Vocabulary item created', { id: entry.item.id, lemma });
    return { entry, created: true };
  }

  async get(id: string): Promise<VocabularyEntry> {
    const item = await this.store.getItem(id);
    if (!item) {
      throw InputError.notFound('Vocabulary item', id);
    }
    const progress = await this.store.getProgress(id);
    if (!progress) {
      throw new InconsistentStateError(`Vocabulary item ${id} has no progress record`);
    }
    return { item, progress };
  }

  list(request: ListVocabularyRequest): Promise<Page<VocabularyEntry>> {
    const statuses = request.status ? [request.status] : ALL_STATUSES;
    return this.store.findByStatus(statuses, { page: request.page, pageSize: request.pageSize });
  }

  async updateTranslation(id: string, translation: string): Promise<VocabularyEntry> {
    const text = translation.trim();
    if (!text) {
      throw new InputError('Translation must not be empty');
    }
    const item = await this.store.updateTranslation(id, text);
    if (!item) {
      throw InputError.notFound('Vocabulary item', id);
    }
    return this.get(item.id);
  }

  async remove(id: string): Promise<void> {
    const removed = await this.store.deleteItem(id);
    if (!removed) {
      throw InputError.notFound('Vocabulary item', id);
    }
    logger.info('Vocabulary item deleted', { id });
  }

  private async translate(lemma: string): Promise<string> {
    try {
      return await this.translator.translate(lemma);
    } catch (error) {
      logger.warn('Translation unavailable, storing without one', { lemma, error: errorMessage(error) });
      return '';
    }
  }
}
