import axios, { AxiosInstance } from 'axios';
import { ReviewPassedEvent, RewardSignal } from '../types/collaborators';
import { errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';

interface RewardResponse {
  success: boolean;
  error?: string;
}

/**
 * Notifies the reward service of passed reviews. Failures are logged and
 * swallowed so a review is never rejected because of rewards.
 */
export class HttpRewardSignal implements RewardSignal {
  private readonly http: AxiosInstance;

  constructor(baseURL: string, timeoutMs: number) {
    this.http = axios.create({ baseURL, timeout: timeoutMs });
  }

  async reviewPassed(event: ReviewPassedEvent): Promise<void> {
    try {
      const response = await this.http.post<RewardResponse>('/reward/review', {
        vocabularyId: event.vocabularyId,
        lemma: event.lemma,
        quality: event.quality,
        status: event.status,
        reviewedAt: event.reviewedAt.toISOString()
      });
      if (!response.data.success) {
        logger.warn('Reward service declined review reward', {
          vocabularyId: event.vocabularyId,
          error: response.data.error
        });
      }
    } catch (error) {
      logger.warn('Failed to send review reward', { vocabularyId: event.vocabularyId, error: errorMessage(error) });
    }
  }
}
