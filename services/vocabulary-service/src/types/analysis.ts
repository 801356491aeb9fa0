import { CefrLevel } from './grammar';

export type FrequencyTier = 'essential' | 'high' | 'medium' | 'low' | 'rare';

export type DifficultyLabel = 'very easy' | 'easy' | 'moderate' | 'challenging' | 'difficult';

export interface NewWordInfo {
  lemma: string;
  translation: string | null;
  frequencyRank: number;
  cefrLevel: CefrLevel;
  frequencyTier: FrequencyTier;
  inReferenceVocabulary: boolean;
  occurrences: number;
  originalForms: string[];
  exampleSentences: string[];
}

export interface ContentAnalysisResult {
  totalWords: number;
  uniqueWords: number;
  knownWords: string[];
  learningWords: string[];
  newWords: string[];
  knownCount: number;
  learningCount: number;
  newCount: number;
  stopWordsPresent: number;
  wordFormsMatched: number;
  comprehensionPct: number;
  difficulty: DifficultyLabel;
  readyToConsume: boolean;
  highValueWords: number;
  recommendation: string;
  newWordDetails: NewWordInfo[];
}

export interface LevelAnalysis {
  level: CefrLevel;
  analysis: ContentAnalysisResult;
  levelWords: NewWordInfo[];
  beyondLevelWords: NewWordInfo[];
  recommendation: string;
}

export interface ContentPackage {
  id: string;
  title: string;
  words: string[];
  comprehensionAtImport: number;
  importedAt: Date;
}

export interface ContentPackageView extends ContentPackage {
  knownPct: number;
  mastered: boolean;
}
