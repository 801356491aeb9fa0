import axios, { AxiosInstance } from 'axios';
import { PronunciationScorer } from '../types/collaborators';
import { errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';

interface AccuracySummaryResponse {
  averageAccuracy: number | null;
  attempts: number;
}

/**
 * Client for the pronunciation scoring service. An unreachable service
 * reads as "no data" rather than an error.
 */
export class HttpPronunciationScorer implements PronunciationScorer {
  private readonly http: AxiosInstance;

  constructor(baseURL: string, timeoutMs: number) {
    this.http = axios.create({ baseURL, timeout: timeoutMs });
  }

  async averageAccuracy(): Promise<number | null> {
    try {
      const response = await this.http.get<AccuracySummaryResponse>('/accuracy/summary');
      const { averageAccuracy, attempts } = response.data;
      if (attempts === 0 || typeof averageAccuracy !== 'number' || !Number.isFinite(averageAccuracy)) {
        return null;
      }
      return Math.min(100, Math.max(0, averageAccuracy));
    } catch (error) {
      logger.warn('Pronunciation service unavailable', { error: errorMessage(error) });
      return null;
    }
  }
}
