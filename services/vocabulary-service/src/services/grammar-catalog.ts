import Joi from 'joi';
import topicData from '../data/grammar-topics.json';
import { CEFR_LEVELS, CefrLevel, GrammarTopic } from '../types/grammar';
import { validateWith } from '../utils/validation';

const topicSchema = Joi.object<GrammarTopic>({
  id: Joi.string().pattern(/^[ABC][12]_[A-Z]_\d{3}$/).required(),
  title: Joi.string().required(),
  cefrLevel: Joi.string().valid(...CEFR_LEVELS).required(),
  category: Joi.string()
    .valid('verbs', 'nouns', 'adjectives', 'pronouns', 'prepositions', 'syntax', 'mood')
    .required(),
  description: Joi.string().allow('').required(),
  capability: Joi.string().valid(
    'presentTense', 'preteriteTense', 'imperfectTense', 'futureTense',
    'conditional', 'nounPlurals', 'adjectiveAgreement'
  )
});

const catalogSchema = Joi.array<GrammarTopic[]>().items(topicSchema).unique('id');

/** Static grammar taxonomy. */
export class GrammarCatalog {
  private readonly byId: Map<string, GrammarTopic>;

  constructor(private readonly topicList: readonly GrammarTopic[]) {
    this.byId = new Map(topicList.map(topic => [topic.id, topic]));
  }

  topics(): readonly GrammarTopic[] {
    return this.topicList;
  }

  topic(id: string): GrammarTopic | null {
    return this.byId.get(id) ?? null;
  }

  topicsAtLevel(level: CefrLevel): GrammarTopic[] {
    return this.topicList.filter(topic => topic.cefrLevel === level);
  }
}

let defaultCatalog: GrammarCatalog | null = null;

export function getGrammarCatalog(): GrammarCatalog {
  if (!defaultCatalog) {
    defaultCatalog = new GrammarCatalog(validateWith(catalogSchema, topicData, 'grammar-topics.json'));
  }
  return defaultCatalog;
}
