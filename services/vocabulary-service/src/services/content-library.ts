import { randomUUID } from 'crypto';
import { ContentRepository, VocabularyRepository } from '../clients/db';
import { ContentPackage, ContentPackageView } from '../types/analysis';
import { ReviewStatus } from '../types/vocabulary';
import { InputError } from '../utils/errors';
import { logger } from '../utils/logger';
import { ContentAnalyzer } from './content-analyzer';

export const PACKAGE_MASTERY_PCT = 80;

const KNOWN_STATUSES: ReadonlySet<ReviewStatus> = new Set(['learned', 'learning', 'struggling']);

/** Share of a package's words the learner currently knows, 0-100. A package with no words is never mastered. */
export function packageKnownPct(words: readonly string[], statuses: Map<string, ReviewStatus>): number {
  if (words.length === 0) {
    return 0;
  }
  const known = words.filter(word => {
    const status = statuses.get(word);
    return status !== undefined && KNOWN_STATUSES.has(status);
  }).length;
  return Math.round((known / words.length) * 1000) / 10;
}

export interface ImportRequest {
  title: string;
  text: string;
}

/**
 * Texts the learner has imported. Each keeps the lemmas extracted at import
 * time and counts toward the content part of the CEFR score once mostly known.
 */
export class ContentLibrary {
  constructor(
    private readonly store: ContentRepository & Pick<VocabularyRepository, 'lemmaStatuses'>,
    private readonly analyzer: ContentAnalyzer,
    private readonly clock: () => Date = () => new Date()
  ) {}

  async importPackage(request: ImportRequest): Promise<ContentPackageView> {
    const title = request.title.trim();
    if (!title) {
      throw new InputError('Content title must not be empty');
    }
    const analysis = await this.analyzer.analyze(request.text);
    const words = [...analysis.knownWords, ...analysis.learningWords, ...analysis.newWords].sort();

    const pkg: ContentPackage = {
      id: randomUUID(),
      title,
      words,
      comprehensionAtImport: analysis.comprehensionPct,
      importedAt: this.clock()
    };
    await this.store.saveContentPackage(pkg);
    logger.info('Content package imported', { id: pkg.id, title, words: words.length });

    return this.view(pkg, await this.store.lemmaStatuses());
  }

  async listPackages(): Promise<ContentPackageView[]> {
    const [packages, statuses] = await Promise.all([
      this.store.listContentPackages(),
      this.store.lemmaStatuses()
    ]);
    return packages.map(pkg => this.view(pkg, statuses));
  }

  private view(pkg: ContentPackage, statuses: Map<string, ReviewStatus>): ContentPackageView {
    const knownPct = packageKnownPct(pkg.words, statuses);
    return { ...pkg, knownPct, mastered: knownPct >= PACKAGE_MASTERY_PCT };
  }
}
