import Joi from 'joi';
import OpenAI from 'openai';
import {
  AgreementForms, ConjugatedForm, MorphologicalGenerator
} from '../types/collaborators';
import { Tense } from '../types/grammar';
import { PERSONS } from '../types/vocabulary';
import { GenerationFailure } from '../utils/errors';
import { complete } from './openai';

const TENSE_NAMES: Record<Tense, string> = {
  present: 'present indicative',
  preterite: 'preterite (pretérito indefinido)',
  imperfect: 'imperfect indicative',
  future: 'simple future',
  conditional: 'simple conditional'
};

const SYSTEM_PROMPT =
  'You are a Spanish morphology engine. Answer with a single JSON object and nothing else. ' +
  `Use these person labels exactly: ${PERSONS.join(', ')}.`;

const conjugationItem = Joi.object<ConjugatedForm>({
  person: Joi.string().valid(...PERSONS).required(),
  form: Joi.string().trim().min(1).required()
});

const conjugationsSchema = Joi.object<{ conjugations: ConjugatedForm[] }>({
  conjugations: Joi.array().items(conjugationItem).min(1).required()
}).unknown(true);

const batchSchema = Joi.object<{ verbs: Record<string, ConjugatedForm[]> }>({
  verbs: Joi.object().pattern(Joi.string(), Joi.array().items(conjugationItem).min(1)).required()
}).unknown(true);

const pluralSchema = Joi.object<{ plural: string }>({
  plural: Joi.string().trim().min(1).required()
}).unknown(true);

const agreementSchema = Joi.object<AgreementForms>({
  masculineSingular: Joi.string().trim().min(1).required(),
  feminineSingular: Joi.string().trim().min(1).required(),
  masculinePlural: Joi.string().trim().min(1).required(),
  femininePlural: Joi.string().trim().min(1).required()
}).unknown(true);

/** Pulls the first JSON object out of a model reply. */
export function extractJson(reply: string, request: string): unknown {
  const match = reply.match(/\{[\s\S]*\}/);
  if (!match) {
    throw new GenerationFailure(request, 'reply contains no JSON object');
  }
  try {
    const parsed: unknown = JSON.parse(match[0]);
    return parsed;
  } catch (error) {
    throw new GenerationFailure(request, 'reply is not valid JSON');
  }
}

function parseWith<T>(schema: Joi.ObjectSchema<T>, reply: string, request: string): T {
  const result = schema.validate(extractJson(reply, request), { abortEarly: true });
  if (result.error !== undefined) {
    throw new GenerationFailure(request, result.error.message);
  }
  return result.value;
}

export function parseConjugations(reply: string, request: string): ConjugatedForm[] {
  return parseWith(conjugationsSchema, reply, request).conjugations;
}

export function parseConjugationBatch(reply: string, request: string): Map<string, ConjugatedForm[]> {
  const { verbs } = parseWith(batchSchema, reply, request);
  return new Map(Object.entries(verbs).map(([verb, forms]) => [verb.trim().toLowerCase(), forms]));
}

export function parsePlural(reply: string, request: string): string {
  return parseWith(pluralSchema, reply, request).plural;
}

export function parseAgreement(reply: string, request: string): AgreementForms {
  const { masculineSingular, feminineSingular, masculinePlural, femininePlural } =
    parseWith(agreementSchema, reply, request);
  return { masculineSingular, feminineSingular, masculinePlural, femininePlural };
}

/**
 * LLM-backed inflection generator. Replies are validated here; anything
 * that does not match the expected shape becomes a GenerationFailure.
 */
export class OpenAiMorphologyGenerator implements MorphologicalGenerator {
  constructor(private readonly openai: OpenAI) {}

  async generateConjugations(infinitive: string, tense: Tense): Promise<ConjugatedForm[]> {
    const prompt =
      `Conjugate "${infinitive}" in the ${TENSE_NAMES[tense]} for all six persons. ` +
      'Format: {"conjugations":[{"person":"yo","form":"..."}, ...]}';
    const reply = await complete(this.openai, SYSTEM_PROMPT, prompt, 300);
    return parseConjugations(reply, `${infinitive}|${tense}`);
  }

  async generateConjugationsBatch(infinitives: string[], tense: Tense): Promise<Map<string, ConjugatedForm[]>> {
    const prompt =
      `Conjugate each of these verbs in the ${TENSE_NAMES[tense]} for all six persons: ${infinitives.join(', ')}. ` +
      'Format: {"verbs":{"<infinitive>":[{"person":"yo","form":"..."}, ...]}}';
    const reply = await complete(this.openai, SYSTEM_PROMPT, prompt, 250 * infinitives.length);
    return parseConjugationBatch(reply, `batch(${infinitives.length})|${tense}`);
  }

  async generatePlural(noun: string): Promise<string> {
    const reply = await complete(this.openai, SYSTEM_PROMPT, `Plural of the noun "${noun}". Format: {"plural":"..."}`, 50);
    return parsePlural(reply, `${noun}|plural`);
  }

  async generateAgreement(adjective: string): Promise<AgreementForms> {
    const prompt =
      `Gender and number forms of the adjective "${adjective}". ` +
      'Format: {"masculineSingular":"...","feminineSingular":"...","masculinePlural":"...","femininePlural":"..."}';
    const reply = await complete(this.openai, SYSTEM_PROMPT, prompt, 100);
    return parseAgreement(reply, `${adjective}|agreement`);
  }
}
