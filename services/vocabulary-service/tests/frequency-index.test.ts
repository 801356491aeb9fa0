import {
  estimateLevelFromRank, FrequencyIndex, getFrequencyIndex, UNKNOWN_RANK
} from '../src/services/frequency-index';

describe('FrequencyIndex', () => {
  const index = new FrequencyIndex([
    { lemma: 'casa', rank: 120, translation: 'house', pos: 'noun', level: 'A1' },
    { lemma: 'Casa', rank: 900, translation: 'home', pos: 'noun' },
    { lemma: 'perro', rank: 700, translation: 'dog', pos: 'noun', level: 'A2' },
    { lemma: 'lograr', rank: 2100, translation: '', pos: 'verb' },
    { lemma: 'denuedo', rank: 6800, translation: 'courage', pos: 'noun' }
  ]);

  it('keeps the most frequent reading of a duplicated lemma', () => {
    expect(index.size).toBe(4);
    expect(index.rank('casa')).toBe(120);
    expect(index.translation('casa')).toBe('house');
  });

  it('answers unknown lemmas with defaults', () => {
    expect(index.has('gato')).toBe(false);
    expect(index.rank('gato')).toBe(UNKNOWN_RANK);
    expect(index.translation('gato')).toBeNull();
    expect(index.partOfSpeech('gato')).toBeNull();
    expect(index.cefrLevel('gato')).toBe('B1');
  });

  it('treats an empty translation as missing', () => {
    expect(index.translation('lograr')).toBeNull();
  });

  it('estimates a level from rank when none is listed', () => {
    expect(index.cefrLevel('lograr')).toBe('B2');
    expect(index.cefrLevel('denuedo')).toBe('C2');
  });

  it('filters reference vocabulary by level', () => {
    expect(index.inReferenceVocabulary('casa', 'A1')).toBe(true);
    expect(index.inReferenceVocabulary('perro', 'A1')).toBe(false);
    expect(index.inReferenceVocabulary('perro', 'B2')).toBe(true);
    expect(index.inReferenceVocabulary('gato', 'C2')).toBe(false);
    expect(index.referenceVocabulary('A2')).toEqual(['perro']);
  });

  it('assigns frequency tiers', () => {
    expect(index.frequencyTier('casa')).toBe('essential');
    expect(index.frequencyTier('perro')).toBe('high');
    expect(index.frequencyTier('lograr')).toBe('medium');
    expect(index.frequencyTier('denuedo')).toBe('low');
    expect(index.frequencyTier('gato')).toBe('rare');
  });
});

describe('estimateLevelFromRank', () => {
  it.each([
    [1, 'A1'], [500, 'A1'], [501, 'A2'], [1000, 'A2'], [2000, 'B1'],
    [3500, 'B2'], [5000, 'C1'], [5001, 'C2']
  ])('rank %i is %s', (rank, level) => {
    expect(estimateLevelFromRank(rank)).toBe(level);
  });
});

describe('getFrequencyIndex', () => {
  it('loads the bundled list', () => {
    const index = getFrequencyIndex();
    expect(index.rank('ser')).toBe(2);
    expect(index.partOfSpeech('hablar')).toBe('verb');
    expect(index.cefrLevel('perro')).toBe('A2');
    expect(getFrequencyIndex()).toBe(index);
  });
});
