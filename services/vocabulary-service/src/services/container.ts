import { ProgressStore } from '../clients/db';
import {
  MorphologicalGenerator, PronunciationScorer, RewardSignal, TranslationProvider
} from '../types/collaborators';
import { CefrLevel } from '../types/grammar';
import { CefrScorer } from './cefr-scorer';
import { ContentAnalyzer } from './content-analyzer';
import { ContentLibrary } from './content-library';
import { FrequencyIndex } from './frequency-index';
import { GrammarCatalog } from './grammar-catalog';
import { GrammarService } from './grammar-service';
import { Lemmatizer } from './lemmatizer';
import { SessionManager } from './session-context';
import { ReviewScheduler } from './spaced-repetition';
import { VocabularyService } from './vocabulary-service';
import { WordFormExpander } from './word-form-expander';

export interface Collaborators {
  translator: TranslationProvider;
  generator: MorphologicalGenerator;
  pronunciation: PronunciationScorer;
  rewards: RewardSignal;
}

export interface ServiceOptions {
  index: FrequencyIndex;
  lemmatizer: Lemmatizer;
  catalog: GrammarCatalog;
  targetLevel: CefrLevel;
  batchSize: number;
  clock?: () => Date;
}

export interface AppServices {
  vocabulary: VocabularyService;
  scheduler: ReviewScheduler;
  sessions: SessionManager;
  grammar: GrammarService;
  expander: WordFormExpander;
  analyzer: ContentAnalyzer;
  content: ContentLibrary;
  scorer: CefrScorer;
}

export function createServices(store: ProgressStore, collaborators: Collaborators, options: ServiceOptions): AppServices {
  const clock = options.clock ?? (() => new Date());
  const grammar = new GrammarService(store, options.catalog, clock);
  const analyzer = new ContentAnalyzer(store, options.lemmatizer, options.index, options.targetLevel);

  return {
    vocabulary: new VocabularyService(store, options.index, options.lemmatizer, collaborators.translator, clock),
    scheduler: new ReviewScheduler(store, collaborators.rewards, clock),
    sessions: new SessionManager(store, clock),
    grammar,
    expander: new WordFormExpander(store, grammar, options.index, collaborators.generator, {
      batchSize: options.batchSize,
      clock
    }),
    analyzer,
    content: new ContentLibrary(store, analyzer, clock),
    scorer: new CefrScorer(store, options.index, grammar, collaborators.pronunciation)
  };
}
