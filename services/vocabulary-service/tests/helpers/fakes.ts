import {
  AgreementForms, ConjugatedForm, MorphologicalGenerator, PronunciationScorer,
  ReviewPassedEvent, RewardSignal, TranslationProvider
} from '../../src/types/collaborators';
import { Tense } from '../../src/types/grammar';
import { GenerationFailure } from '../../src/utils/errors';

const REGULAR_ENDINGS: Record<'ar' | 'er' | 'ir', Record<Tense, string[]>> = {
  ar: {
    present: ['o', 'as', 'a', 'amos', 'áis', 'an'],
    preterite: ['é', 'aste', 'ó', 'amos', 'asteis', 'aron'],
    imperfect: ['aba', 'abas', 'aba', 'ábamos', 'abais', 'aban'],
    future: ['aré', 'arás', 'ará', 'aremos', 'aréis', 'arán'],
    conditional: ['aría', 'arías', 'aría', 'aríamos', 'aríais', 'arían']
  },
  er: {
    present: ['o', 'es', 'e', 'emos', 'éis', 'en'],
    preterite: ['í', 'iste', 'ió', 'imos', 'isteis', 'ieron'],
    imperfect: ['ía', 'ías', 'ía', 'íamos', 'íais', 'ían'],
    future: ['eré', 'erás', 'erá', 'eremos', 'eréis', 'erán'],
    conditional: ['ería', 'erías', 'ería', 'eríamos', 'eríais', 'erían']
  },
  ir: {
    present: ['o', 'es', 'e', 'imos', 'ís', 'en'],
    preterite: ['í', 'iste', 'ió', 'imos', 'isteis', 'ieron'],
    imperfect: ['ía', 'ías', 'ía', 'íamos', 'íais', 'ían'],
    future: ['iré', 'irás', 'irá', 'iremos', 'iréis', 'irán'],
    conditional: ['iría', 'irías', 'iría', 'iríamos', 'iríais', 'irían']
  }
};

const PERSON_ORDER: ConjugatedForm['person'][] = ['yo', 'tú', 'él/ella/usted', 'nosotros', 'vosotros', 'ellos/ellas/ustedes'];

export function regularConjugation(infinitive: string, tense: Tense): ConjugatedForm[] {
  const ending = infinitive.slice(-2);
  if (ending !== 'ar' && ending !== 'er' && ending !== 'ir') {
    throw new GenerationFailure(infinitive, 'not an infinitive');
  }
  const stem = infinitive.slice(0, -2);
  return REGULAR_ENDINGS[ending][tense].map((suffix, i) => ({ person: PERSON_ORDER[i], form: stem + suffix }));
}

/**
 * Deterministic generator for regular words. Words listed in `failing`
 * reject every request; batch calls can be made to fail wholesale.
 */
export class FakeMorphologyGenerator implements MorphologicalGenerator {
  readonly failing = new Set<string>();
  failBatches = false;
  readonly calls: string[] = [];

  async generateConjugations(infinitive: string, tense: Tense): Promise<ConjugatedForm[]> {
    this.calls.push(`single:${infinitive}:${tense}`);
    this.assertWorking(infinitive);
    return regularConjugation(infinitive, tense);
  }

  async generateConjugationsBatch(infinitives: string[], tense: Tense): Promise<Map<string, ConjugatedForm[]>> {
    this.calls.push(`batch:${infinitives.join(',')}:${tense}`);
    if (this.failBatches) {
      throw new GenerationFailure('batch', 'upstream timeout');
    }
    const result = new Map<string, ConjugatedForm[]>();
    for (const infinitive of infinitives) {
      if (!this.failing.has(infinitive)) {
        result.set(infinitive, regularConjugation(infinitive, tense));
      }
    }
    return result;
  }

  async generatePlural(noun: string): Promise<string> {
    this.calls.push(`plural:${noun}`);
    this.assertWorking(noun);
    return /[aeiouáéíóú]$/.test(noun) ? `${noun}s` : `${noun}es`;
  }

  async generateAgreement(adjective: string): Promise<AgreementForms> {
    this.calls.push(`agreement:${adjective}`);
    this.assertWorking(adjective);
    const stem = adjective.endsWith('o') ? adjective.slice(0, -1) : adjective;
    return {
      masculineSingular: adjective,
      feminineSingular: adjective.endsWith('o') ? `${stem}a` : adjective,
      masculinePlural: `${adjective}s`,
      femininePlural: adjective.endsWith('o') ? `${stem}as` : `${adjective}s`
    };
  }

  private assertWorking(word: string): void {
    if (this.failing.has(word)) {
      throw new GenerationFailure(word, 'malformed reply');
    }
  }
}

export class FakeTranslationProvider implements TranslationProvider {
  readonly requests: string[] = [];
  fail = false;

  async translate(text: string): Promise<string> {
    this.requests.push(text);
    if (this.fail) {
      throw new Error('translation service unavailable');
    }
    return `${text}-en`;
  }
}

export class FakePronunciationScorer implements PronunciationScorer {
  constructor(public accuracy: number | null = null) {}

  async averageAccuracy(): Promise<number | null> {
    return this.accuracy;
  }
}

export class RecordingRewardSignal implements RewardSignal {
  readonly events: ReviewPassedEvent[] = [];

  async reviewPassed(event: ReviewPassedEvent): Promise<void> {
    this.events.push(event);
  }
}
