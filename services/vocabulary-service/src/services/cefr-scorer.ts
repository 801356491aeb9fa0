import { ContentRepository, VocabularyRepository } from '../clients/db';
import { PronunciationScorer } from '../types/collaborators';
import { CEFR_LEVELS, CefrLevel, GrammarStatus, GrammarTopicView } from '../types/grammar';
import { ReviewStatus } from '../types/vocabulary';
import { FrequencyIndex, PartOfSpeech } from './frequency-index';
import { GrammarService } from './grammar-service';
import { packageKnownPct, PACKAGE_MASTERY_PCT } from './content-library';
import { SessionContext } from './session-context';

/** Share of the 0-100 scale each level contributes. */
export const BAND_WIDTHS: Record<CefrLevel, number> = { A1: 25, A2: 25, B1: 20, B2: 15, C1: 10, C2: 5 };

export const COMPONENT_WEIGHTS = {
  vocabulary: 0.30,
  grammar: 0.35,
  speaking: 0.20,
  content: 0.15
} as const;

// Pronunciation alone cannot carry a learner past B2
export const SPEAKING_CAP = 87.5;
export const UNLOCK_THRESHOLD = 80;

export const READINESS_WEIGHTS = {
  vocabulary: 0.5,
  grammar: 0.3,
  verbs: 0.2
} as const;

const MAX_MISSING_VERBS = 10;
const PRIORITY_LIMIT = 5;
const PRIORITY_WORDS = 5;

const VOCABULARY_WEIGHT: Record<ReviewStatus, number> = {
  new: 0,
  learning: 0.5,
  struggling: 0.5,
  learned: 1
};

export type Sublevel = `${CefrLevel}.${1 | 2}`;

export interface CefrBand {
  level: CefrLevel;
  sublevel: Sublevel;
}

export interface LevelGate {
  level: CefrLevel;
  unlocked: boolean;
  /** Mastery of the previous level that decided this gate, 0-100. */
  vocabularyMastery: number;
  grammarMastery: number;
}

export interface ComponentScores {
  vocabulary: number;
  grammar: number;
  speaking: number;
  content: number;
}

export interface UnifiedScore extends CefrBand {
  score: number;
  components: ComponentScores;
  vocabularyMastery: Record<CefrLevel, number>;
  grammarMastery: Record<CefrLevel, number>;
  gates: LevelGate[];
  /** Highest unlocked level; may differ from the band of `score`. */
  unlockedLevel: CefrLevel;
}

export type CoverageStatus = 'complete' | 'partial' | 'missing';

export interface TopicReadiness {
  topicId: string;
  title: string;
  status: CoverageStatus;
  progressStatus: GrammarStatus | null;
}

export interface MissingWord {
  lemma: string;
  translation: string;
  rank: number;
  partOfSpeech: PartOfSpeech | null;
}

export interface StudyPriority {
  kind: 'grammar' | 'verbs' | 'vocabulary';
  title: string;
  action: string;
  /** Topic id for grammar, otherwise the lemmas to learn first. */
  items: string[];
}

export interface ReadinessReport {
  level: CefrLevel;
  overallPct: number;
  vocabularyPct: number;
  verbsPct: number;
  grammarPct: number;
  completeTopics: number;
  partialTopics: number;
  missingTopics: number;
  /** Missing topics first, then partial, then complete. */
  topics: TopicReadiness[];
  missingVerbs: MissingWord[];
  /** Every reference lemma of the level not yet studied, most frequent first. */
  missingVocabulary: MissingWord[];
  priorities: StudyPriority[];
  recommendation: string;
}

const COVERAGE_ORDER: Record<CoverageStatus, number> = { missing: 0, partial: 1, complete: 2 };

function topicCoverage(topic: GrammarTopicView): CoverageStatus {
  switch (topic.progress?.status) {
    case 'learned':
    case 'mastered':
      return 'complete';
    case 'learning':
      return 'partial';
    default:
      return 'missing';
  }
}

export function readinessRecommendation(level: CefrLevel, overallPct: number): string {
  if (overallPct >= 80) {
    return `Well prepared for ${level}. Consolidate with longer reading and listening practice.`;
  }
  if (overallPct >= 60) {
    return `Good progress. Review the partially learned ${level} grammar topics.`;
  }
  if (overallPct >= 40) {
    return `Making progress. Focus on the missing ${level} topics and verbs.`;
  }
  return `Start with the most frequent ${level} words to build a foundation.`;
}

function round1(value: number): number {
  return Math.round(value * 10) / 10;
}

/**
 * Half-open bands A1 [0,25) A2 [25,50) B1 [50,70) B2 [70,85) C1 [85,95)
 * C2 [95,100], each split at its midpoint into .1 and .2.
 */
export function cefrBand(score: number): CefrBand {
  const clipped = Math.min(100, Math.max(0, score));
  let floor = 0;
  for (const level of CEFR_LEVELS) {
    const ceiling = floor + BAND_WIDTHS[level];
    if (clipped < ceiling || level === 'C2') {
      const half: 1 | 2 = clipped < floor + BAND_WIDTHS[level] / 2 ? 1 : 2;
      return { level, sublevel: `${level}.${half}` };
    }
    floor = ceiling;
  }
  return { level: 'C2', sublevel: 'C2.2' };
}

/** Weighted sum of per-level coverage (0-1) into 0-100 points. */
export function bandedScore(coverage: Record<CefrLevel, number>): number {
  return CEFR_LEVELS.reduce((sum, level) => sum + BAND_WIDTHS[level] * coverage[level], 0);
}

/**
 * Chained gating: A1 is always open; each next level needs the previous one
 * open and both masteries at or above the threshold.
 */
export function levelGates(
  vocabularyMastery: Record<CefrLevel, number>,
  grammarMastery: Record<CefrLevel, number>
): LevelGate[] {
  const gates: LevelGate[] = [{ level: 'A1', unlocked: true, vocabularyMastery: 100, grammarMastery: 100 }];
  for (let i = 1; i < CEFR_LEVELS.length; i += 1) {
    const previous = CEFR_LEVELS[i - 1];
    const vocabulary = vocabularyMastery[previous];
    const grammar = grammarMastery[previous];
    gates.push({
      level: CEFR_LEVELS[i],
      unlocked: gates[i - 1].unlocked && vocabulary >= UNLOCK_THRESHOLD && grammar >= UNLOCK_THRESHOLD,
      vocabularyMastery: vocabulary,
      grammarMastery: grammar
    });
  }
  return gates;
}

/**
 * Unified 0-100 proficiency estimate from vocabulary, grammar, speaking and
 * content, reported alongside the level gates.
 */
export class CefrScorer {
  constructor(
    private readonly store: Pick<VocabularyRepository, 'lemmaStatuses'> & Pick<ContentRepository, 'listContentPackages'>,
    private readonly index: FrequencyIndex,
    private readonly grammar: GrammarService,
    private readonly pronunciation: PronunciationScorer
  ) {}

  async unifiedScore(session?: SessionContext): Promise<UnifiedScore> {
    const [statuses, grammarCoverage, remoteAccuracy, packages] = await Promise.all([
      this.store.lemmaStatuses(),
      this.grammar.masteryByLevel(),
      this.pronunciation.averageAccuracy(),
      this.store.listContentPackages()
    ]);

    const vocabularyCoverage = this.vocabularyCoverage(statuses);

    const accuracySources = [remoteAccuracy, session?.averageAccuracy() ?? null]
      .filter((value): value is number => value !== null);
    const accuracy = accuracySources.length === 0
      ? 0
      : accuracySources.reduce((sum, value) => sum + value, 0) / accuracySources.length;

    const masteredPackages = packages
      .filter(pkg => packageKnownPct(pkg.words, statuses) >= PACKAGE_MASTERY_PCT).length;

    const components: ComponentScores = {
      vocabulary: bandedScore(vocabularyCoverage),
      grammar: bandedScore(grammarCoverage),
      speaking: Math.min(accuracy, SPEAKING_CAP),
      content: packages.length === 0 ? 0 : (masteredPackages / packages.length) * 100
    };

    const score = round1(
      components.vocabulary * COMPONENT_WEIGHTS.vocabulary
      + components.grammar * COMPONENT_WEIGHTS.grammar
      + components.speaking * COMPONENT_WEIGHTS.speaking
      + components.content * COMPONENT_WEIGHTS.content
    );

    const vocabularyMastery = this.toPercent(vocabularyCoverage);
    const grammarMastery = this.toPercent(grammarCoverage);
    const gates = levelGates(vocabularyMastery, grammarMastery);
    const unlocked = gates.filter(gate => gate.unlocked);

    return {
      score,
      ...cefrBand(score),
      components: {
        vocabulary: round1(components.vocabulary),
        grammar: round1(components.grammar),
        speaking: round1(components.speaking),
        content: round1(components.content)
      },
      vocabularyMastery,
      grammarMastery,
      gates,
      unlockedLevel: unlocked[unlocked.length - 1].level
    };
  }

  /**
   * What is still missing for one level: weighted coverage of its reference
   * vocabulary and verbs, grammar topics by status, and what to study next.
   */
  async readiness(level: CefrLevel): Promise<ReadinessReport> {
    const [statuses, topicViews] = await Promise.all([
      this.store.lemmaStatuses(),
      this.grammar.listTopics(level)
    ]);

    const reference = this.index.referenceVocabulary(level)
      .sort((a, b) => this.index.rank(a) - this.index.rank(b) || a.localeCompare(b));
    const verbs = reference.filter(lemma => this.index.partOfSpeech(lemma) === 'verb');
    const weightOf = (lemma: string) => {
      const status = statuses.get(lemma);
      return status === undefined ? 0 : VOCABULARY_WEIGHT[status];
    };
    const coveragePct = (lemmas: string[]) => lemmas.length === 0
      ? 0
      : round1((lemmas.reduce((sum, lemma) => sum + weightOf(lemma), 0) / lemmas.length) * 100);

    const missingVocabulary = reference
      .filter(lemma => weightOf(lemma) === 0)
      .map(lemma => this.missingWord(lemma));
    const missingVerbs = missingVocabulary.filter(word => word.partOfSpeech === 'verb');

    const topics: TopicReadiness[] = topicViews
      .map(topic => ({
        topicId: topic.id,
        title: topic.title,
        status: topicCoverage(topic),
        progressStatus: topic.progress?.status ?? null
      }))
      .sort((a, b) => COVERAGE_ORDER[a.status] - COVERAGE_ORDER[b.status]);
    const countOf = (status: CoverageStatus) => topics.filter(topic => topic.status === status).length;
    const completeTopics = countOf('complete');

    const vocabularyPct = coveragePct(reference);
    const verbsPct = coveragePct(verbs);
    const grammarPct = topics.length === 0 ? 0 : round1((completeTopics / topics.length) * 100);
    const overallPct = round1(
      vocabularyPct * READINESS_WEIGHTS.vocabulary
      + grammarPct * READINESS_WEIGHTS.grammar
      + verbsPct * READINESS_WEIGHTS.verbs
    );

    return {
      level,
      overallPct,
      vocabularyPct,
      verbsPct,
      grammarPct,
      completeTopics,
      partialTopics: countOf('partial'),
      missingTopics: countOf('missing'),
      topics,
      missingVerbs: missingVerbs.slice(0, MAX_MISSING_VERBS),
      missingVocabulary,
      priorities: this.priorities(level, topics, missingVocabulary),
      recommendation: readinessRecommendation(level, overallPct)
    };
  }

  private priorities(level: CefrLevel, topics: TopicReadiness[], missing: MissingWord[]): StudyPriority[] {
    const topicPriorities = (status: CoverageStatus, verb: string): StudyPriority[] => topics
      .filter(topic => topic.status === status)
      .map((topic): StudyPriority => ({
        kind: 'grammar',
        title: topic.title,
        action: `${verb}: ${topic.title}`,
        items: [topic.topicId]
      }));

    const priorities = topicPriorities('missing', 'Learn');
    const verbs = missing.filter(word => word.partOfSpeech === 'verb');
    if (verbs.length > 0) {
      priorities.push({
        kind: 'verbs',
        title: 'Core verbs',
        action: `Practise the most frequent ${level} verbs`,
        items: verbs.slice(0, PRIORITY_WORDS).map(word => word.lemma)
      });
    }
    const words = missing.filter(word => word.partOfSpeech !== 'verb');
    if (words.length > 0) {
      priorities.push({
        kind: 'vocabulary',
        title: 'Reference vocabulary',
        action: `Learn the most frequent missing ${level} words`,
        items: words.slice(0, PRIORITY_WORDS).map(word => word.lemma)
      });
    }
    priorities.push(...topicPriorities('partial', 'Review'));
    return priorities.slice(0, PRIORITY_LIMIT);
  }

  private missingWord(lemma: string): MissingWord {
    return {
      lemma,
      translation: this.index.translation(lemma) ?? '',
      rank: this.index.rank(lemma),
      partOfSpeech: this.index.partOfSpeech(lemma)
    };
  }

  private vocabularyCoverage(statuses: Map<string, ReviewStatus>): Record<CefrLevel, number> {
    const coverage = { A1: 0, A2: 0, B1: 0, B2: 0, C1: 0, C2: 0 };
    for (const level of CEFR_LEVELS) {
      const reference = this.index.referenceVocabulary(level);
      if (reference.length === 0) {
        continue;
      }
      const covered = reference.reduce((sum, lemma) => {
        const status = statuses.get(lemma);
        return sum + (status === undefined ? 0 : VOCABULARY_WEIGHT[status]);
      }, 0);
      coverage[level] = covered / reference.length;
    }
    return coverage;
  }

  private toPercent(coverage: Record<CefrLevel, number>): Record<CefrLevel, number> {
    const percent = { A1: 0, A2: 0, B1: 0, B2: 0, C1: 0, C2: 0 };
    for (const level of CEFR_LEVELS) {
      percent[level] = round1(coverage[level] * 100);
    }
    return percent;
  }
}
