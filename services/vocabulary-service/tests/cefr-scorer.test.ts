import { bandedScore, cefrBand, CefrScorer, levelGates, readinessRecommendation } from '../src/services/cefr-scorer';
import { FrequencyIndex } from '../src/services/frequency-index';
import { GrammarCatalog } from '../src/services/grammar-catalog';
import { GrammarService } from '../src/services/grammar-service';
import { SessionContext } from '../src/services/session-context';
import { GrammarProgress, GrammarStatus } from '../src/types/grammar';
import { FakePronunciationScorer } from './helpers/fakes';
import { MemoryProgressStore } from './helpers/memory-store';

const NOW = new Date('2024-05-10T09:00:00.000Z');
const NONE = { A1: 0, A2: 0, B1: 0, B2: 0, C1: 0, C2: 0 };

const index = new FrequencyIndex([
  { lemma: 'casa', rank: 120, translation: 'house', pos: 'noun', level: 'A1' },
  { lemma: 'perro', rank: 700, translation: 'dog', pos: 'noun', level: 'A1' },
  { lemma: 'gato', rank: 900, translation: 'cat', pos: 'noun', level: 'A2' },
  { lemma: 'mesa', rank: 740, translation: 'table', pos: 'noun', level: 'A2' }
]);

const catalog = new GrammarCatalog([
  { id: 'A1_V_001', title: 'Present', cefrLevel: 'A1', category: 'verbs', description: '' },
  { id: 'A1_N_001', title: 'Gender', cefrLevel: 'A1', category: 'nouns', description: '' },
  { id: 'A2_V_001', title: 'Preterite', cefrLevel: 'A2', category: 'verbs', description: '', capability: 'preteriteTense' }
]);

function grammarProgress(topicId: string, status: GrammarStatus): GrammarProgress {
  return {
    topicId,
    status,
    easeFactor: 2.5,
    intervalDays: 1,
    repetitions: 0,
    timesCorrect: 0,
    timesIncorrect: 0,
    nextReview: null,
    lastReview: null
  };
}

describe('cefrBand', () => {
  it.each([
    [0, 'A1', 'A1.1'], [12.5, 'A1', 'A1.2'], [24.9, 'A1', 'A1.2'],
    [25, 'A2', 'A2.1'], [50, 'B1', 'B1.1'], [60, 'B1', 'B1.2'],
    [70, 'B2', 'B2.1'], [85, 'C1', 'C1.1'], [95, 'C2', 'C2.1'],
    [97.5, 'C2', 'C2.2'], [100, 'C2', 'C2.2'], [-5, 'A1', 'A1.1'], [150, 'C2', 'C2.2']
  ])('places %d in %s (%s)', (score, level, sublevel) => {
    expect(cefrBand(score)).toEqual({ level, sublevel });
  });
});

describe('bandedScore', () => {
  it('weights coverage by band width', () => {
    expect(bandedScore({ ...NONE, A1: 1, A2: 0.5, C2: 1 })).toBe(42.5);
    expect(bandedScore({ A1: 1, A2: 1, B1: 1, B2: 1, C1: 1, C2: 1 })).toBe(100);
  });
});

describe('levelGates', () => {
  it('chains each level on the one before', () => {
    const gates = levelGates(
      { ...NONE, A1: 90, A2: 90, B1: 100 },
      { ...NONE, A1: 85, A2: 70, B1: 100 }
    );

    expect(gates.map(gate => [gate.level, gate.unlocked])).toEqual([
      ['A1', true], ['A2', true], ['B1', false], ['B2', false], ['C1', false], ['C2', false]
    ]);
    expect(gates[2]).toEqual({ level: 'B1', unlocked: false, vocabularyMastery: 90, grammarMastery: 70 });
  });

  it('opens a level at exactly the threshold', () => {
    const gates = levelGates({ ...NONE, A1: 80 }, { ...NONE, A1: 80 });
    expect(gates[1].unlocked).toBe(true);
  });
});

describe('CefrScorer', () => {
  let store: MemoryProgressStore;
  let pronunciation: FakePronunciationScorer;
  let scorer: CefrScorer;

  beforeEach(() => {
    store = new MemoryProgressStore();
    pronunciation = new FakePronunciationScorer();
    scorer = new CefrScorer(store, index, new GrammarService(store, catalog, () => NOW), pronunciation);
  });

  it('scores a learner with no progress at the bottom of A1', async () => {
    const result = await scorer.unifiedScore();

    expect(result).toMatchObject({
      score: 0,
      level: 'A1',
      sublevel: 'A1.1',
      components: { vocabulary: 0, grammar: 0, speaking: 0, content: 0 },
      unlockedLevel: 'A1'
    });
  });

  it('combines the four components', async () => {
    await store.seed('casa', 'learned');
    await store.seed('perro', 'learned');
    await store.seed('gato', 'learning');
    store.grammar.set('A1_V_001', grammarProgress('A1_V_001', 'learned'));
    store.grammar.set('A1_N_001', grammarProgress('A1_N_001', 'mastered'));
    store.grammar.set('A2_V_001', grammarProgress('A2_V_001', 'learning'));
    pronunciation.accuracy = 90;
    const session = SessionContext.create('pronunciation', NOW);
    session.recordPronunciation(70);
    await store.saveContentPackage({ id: 'p1', title: 'Mascotas', words: ['casa', 'gato'], comprehensionAtImport: 50, importedAt: NOW });
    await store.saveContentPackage({ id: 'p2', title: 'Cocina', words: ['mesa', 'perro'], comprehensionAtImport: 50, importedAt: NOW });

    const result = await scorer.unifiedScore(session);

    expect(result.components).toEqual({ vocabulary: 31.3, grammar: 37.5, speaking: 80, content: 50 });
    expect(result.score).toBe(46);
    expect(result.level).toBe('A2');
    expect(result.sublevel).toBe('A2.2');
    expect(result.vocabularyMastery).toEqual({ ...NONE, A1: 100, A2: 25 });
    expect(result.grammarMastery).toEqual({ ...NONE, A1: 100, A2: 50 });
    expect(result.unlockedLevel).toBe('A2');
  });

  it('does not count a package without words as mastered', async () => {
    await store.saveContentPackage({ id: 'p1', title: 'Saludos', words: [], comprehensionAtImport: 100, importedAt: NOW });

    const result = await scorer.unifiedScore();

    expect(result.components.content).toBe(0);
    expect(result.score).toBe(0);
  });

  it('caps the speaking component', async () => {
    pronunciation.accuracy = 100;

    const result = await scorer.unifiedScore();

    expect(result.components.speaking).toBe(87.5);
    expect(result.score).toBe(17.5);
  });

  it('uses session accuracy when the pronunciation service has none', async () => {
    const session = SessionContext.create('pronunciation', NOW);
    session.recordPronunciation(60);

    const result = await scorer.unifiedScore(session);

    expect(result.components.speaking).toBe(60);
  });
});

describe('CefrScorer.readiness', () => {
  const readinessIndex = new FrequencyIndex([
    { lemma: 'ser', rank: 2, translation: 'to be', pos: 'verb', level: 'A1' },
    { lemma: 'tener', rank: 20, translation: 'to have', pos: 'verb', level: 'A1' },
    { lemma: 'comer', rank: 300, translation: 'to eat', pos: 'verb', level: 'A1' },
    { lemma: 'casa', rank: 120, translation: 'house', pos: 'noun', level: 'A1' },
    { lemma: 'perro', rank: 700, translation: 'dog', pos: 'noun', level: 'A1' },
    { lemma: 'gato', rank: 900, translation: 'cat', pos: 'noun', level: 'A2' }
  ]);

  let store: MemoryProgressStore;
  let scorer: CefrScorer;

  beforeEach(() => {
    store = new MemoryProgressStore();
    scorer = new CefrScorer(
      store,
      readinessIndex,
      new GrammarService(store, catalog, () => NOW),
      new FakePronunciationScorer()
    );
  });

  it('lists what is missing for a level and what to study next', async () => {
    await store.seed('ser', 'learned');
    await store.seed('comer', 'learning');
    await store.seed('casa', 'new');
    await store.seed('perro', 'learned');
    store.grammar.set('A1_V_001', grammarProgress('A1_V_001', 'learned'));
    store.grammar.set('A1_N_001', grammarProgress('A1_N_001', 'learning'));

    const report = await scorer.readiness('A1');

    expect(report).toMatchObject({
      level: 'A1',
      vocabularyPct: 50,
      verbsPct: 50,
      grammarPct: 50,
      overallPct: 50,
      completeTopics: 1,
      partialTopics: 1,
      missingTopics: 0,
      recommendation: 'Making progress. Focus on the missing A1 topics and verbs.'
    });
    expect(report.topics).toEqual([
      { topicId: 'A1_N_001', title: 'Gender', status: 'partial', progressStatus: 'learning' },
      { topicId: 'A1_V_001', title: 'Present', status: 'complete', progressStatus: 'learned' }
    ]);
    expect(report.missingVocabulary).toEqual([
      { lemma: 'tener', translation: 'to have', rank: 20, partOfSpeech: 'verb' },
      { lemma: 'casa', translation: 'house', rank: 120, partOfSpeech: 'noun' }
    ]);
    expect(report.missingVerbs.map(word => word.lemma)).toEqual(['tener']);
    expect(report.priorities).toEqual([
      { kind: 'verbs', title: 'Core verbs', action: 'Practise the most frequent A1 verbs', items: ['tener'] },
      {
        kind: 'vocabulary',
        title: 'Reference vocabulary',
        action: 'Learn the most frequent missing A1 words',
        items: ['casa']
      },
      { kind: 'grammar', title: 'Gender', action: 'Review: Gender', items: ['A1_N_001'] }
    ]);
  });

  it('puts unstudied topics first for a learner with no progress', async () => {
    const report = await scorer.readiness('A2');

    expect(report).toMatchObject({
      level: 'A2',
      vocabularyPct: 0,
      verbsPct: 0,
      grammarPct: 0,
      overallPct: 0,
      missingTopics: 1,
      missingVerbs: [],
      recommendation: 'Start with the most frequent A2 words to build a foundation.'
    });
    expect(report.priorities).toEqual([
      { kind: 'grammar', title: 'Preterite', action: 'Learn: Preterite', items: ['A2_V_001'] },
      {
        kind: 'vocabulary',
        title: 'Reference vocabulary',
        action: 'Learn the most frequent missing A2 words',
        items: ['gato']
      }
    ]);
  });
});

describe('readinessRecommendation', () => {
  it.each([
    [85, 'Well prepared for B1. Consolidate with longer reading and listening practice.'],
    [60, 'Good progress. Review the partially learned B1 grammar topics.'],
    [39.9, 'Start with the most frequent B1 words to build a foundation.']
  ])('describes %d%% readiness', (pct, text) => {
    expect(readinessRecommendation('B1', pct)).toBe(text);
  });
});
