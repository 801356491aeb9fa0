import {
  comprehensionRecommendation, ContentAnalyzer, difficultyLabel
} from '../src/services/content-analyzer';
import { getFrequencyIndex } from '../src/services/frequency-index';
import { getLemmatizer } from '../src/services/lemmatizer';
import { InputError } from '../src/utils/errors';
import { MemoryProgressStore } from './helpers/memory-store';

describe('ContentAnalyzer', () => {
  let store: MemoryProgressStore;
  let analyzer: ContentAnalyzer;

  beforeEach(() => {
    store = new MemoryProgressStore();
    analyzer = new ContentAnalyzer(store, getLemmatizer(), getFrequencyIndex(), 'A2');
  });

  it('counts two surface forms of a learned lemma once', async () => {
    await store.seed('hablar', 'learned');

    const result = await analyzer.analyze('Hablo español. Ayer hablé con María.');

    expect(result).toMatchObject({
      totalWords: 6,
      uniqueWords: 3,
      knownWords: ['hablar'],
      learningWords: [],
      newWords: ['ayer', 'español'],
      knownCount: 1,
      newCount: 2,
      stopWordsPresent: 1,
      comprehensionPct: 50,
      difficulty: 'challenging',
      readyToConsume: false,
      highValueWords: 2,
      recommendation: 'Challenging content. Focus on the 2 most common new words to improve comprehension.'
    });
  });

  it('scores decomposed text like its composed spelling', async () => {
    await store.seed('hablar', 'learned');

    const result = await analyzer.analyze('Hablo español. Ayer hablé con María.'.normalize('NFD'));

    expect(result).toMatchObject({
      totalWords: 6,
      uniqueWords: 3,
      knownWords: ['hablar'],
      newWords: ['ayer', 'español'],
      comprehensionPct: 50
    });
  });

  it('describes new words with their forms and example sentences', async () => {
    const result = await analyzer.analyze('Hablo español. Ayer hablé con María.');

    const ayer = result.newWordDetails.find(word => word.lemma === 'ayer');
    expect(ayer).toMatchObject({
      frequencyRank: 350,
      cefrLevel: 'A1',
      frequencyTier: 'essential',
      inReferenceVocabulary: true,
      occurrences: 1,
      originalForms: ['ayer'],
      exampleSentences: ['Ayer hablé con María']
    });
    const hablar = result.newWordDetails.find(word => word.lemma === 'hablar');
    expect(hablar?.originalForms).toEqual(['hablé', 'hablo']);
    expect(hablar?.occurrences).toBe(2);
  });

  it('keeps learning words apart from known ones', async () => {
    await store.seed('hablar', 'learning');
    await store.seed('ayer', 'struggling');

    const result = await analyzer.analyze('Hablo español. Ayer hablé con María.');

    expect(result.knownWords).toEqual([]);
    expect(result.learningWords).toEqual(['ayer', 'hablar']);
    expect(result.newWords).toEqual(['español']);
    expect(result.comprehensionPct).toBe(75);
  });

  it('does not report stored words as new', async () => {
    await store.seed('español', 'new');

    const result = await analyzer.analyze('Hablo español.');

    expect(result.newWords).toEqual(['hablar']);
    expect(result.comprehensionPct).toBe(0);
  });

  it('treats a lemma as known when a cached word form appears in the text', async () => {
    const { item } = await store.seed('comer', 'learning');
    await store.insertWordForms([{
      vocabularyId: item.id,
      baseWord: 'comer',
      form: 'comen',
      formType: 'verb_conjugation',
      tags: { person: 'ellos/ellas/ustedes', number: 'plural', tense: 'present', mood: 'indicative' },
      requestKey: 'comer|verb_conjugation|present'
    }], new Date());

    const result = await analyzer.analyze('Comen mucho.');

    expect(result.knownWords).toEqual(['comer']);
    expect(result.learningWords).toEqual([]);
    expect(result.wordFormsMatched).toBe(1);
    expect(result.comprehensionPct).toBe(50);
  });

  it('counts stop words as understood unless asked to include them', async () => {
    await store.seed('hablar', 'learned');

    const excluded = await analyzer.analyze('Hablo con María');
    const included = await analyzer.analyze('Hablo con María', { includeStopWords: true });

    expect(excluded.comprehensionPct).toBe(100);
    expect(excluded.stopWordsPresent).toBe(1);
    expect(included.comprehensionPct).toBe(50);
    expect(included.stopWordsPresent).toBe(0);
    expect(included.newWords).toEqual([]);
  });

  it('scores text without content words as fully comprehensible', async () => {
    const result = await analyzer.analyze('¡¿...?!');
    expect(result.comprehensionPct).toBe(100);
    expect(result.totalWords).toBe(0);
  });

  it('rejects empty text', async () => {
    await expect(analyzer.analyze('   ')).rejects.toBeInstanceOf(InputError);
  });

  it('keeps comprehension within 0-100', async () => {
    await store.seed('hablar', 'learned');
    for (const text of ['Hablo', 'Gatos y perros', 'Con el de la', 'Hablo con hablé']) {
      const { comprehensionPct } = await analyzer.analyze(text);
      expect(comprehensionPct).toBeGreaterThanOrEqual(0);
      expect(comprehensionPct).toBeLessThanOrEqual(100);
    }
  });

  it('splits new words by level', async () => {
    const result = await analyzer.analyzeForLevel('El perro come.', 'A1');

    expect(result.levelWords.map(word => word.lemma)).toEqual(['comer']);
    expect(result.beyondLevelWords.map(word => word.lemma)).toEqual(['perro']);
    expect(result.recommendation).toBe('Learn the 1 A1 words first');
  });

  it('says so when nothing new is at the level', async () => {
    await store.seed('comer', 'learned');

    const result = await analyzer.analyzeForLevel('El perro come.', 'A1');

    expect(result.levelWords).toEqual([]);
    expect(result.recommendation).toBe('No new A1 vocabulary in this text');
  });
});

describe('difficultyLabel', () => {
  it.each([
    [100, 'very easy'], [95, 'very easy'], [90, 'easy'], [70, 'moderate'], [50, 'challenging'], [49.9, 'difficult']
  ])('%d%% is %s', (pct, label) => {
    expect(difficultyLabel(pct)).toBe(label);
  });
});

describe('comprehensionRecommendation', () => {
  it('names the count that matters at each band', () => {
    expect(comprehensionRecommendation(96, 1, 0)).toBe('Perfect for your level! You know almost all the vocabulary.');
    expect(comprehensionRecommendation(88, 4, 2)).toBe('Great match! Learn 4 new words to fully understand this content.');
    expect(comprehensionRecommendation(30, 12, 7))
      .toBe('This content may be too advanced. Consider easier material or learn 7 essential words first.');
  });
});
