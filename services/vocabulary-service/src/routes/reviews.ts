import { NextFunction, Request, Response, Router } from 'express';
import Joi from 'joi';
import { config } from '../config/environment';
import { validateRequest } from '../middleware/validation';
import { AppServices } from '../services/container';
import { MAX_REVIEW_LIMIT } from '../services/spaced-repetition';

interface NextQuery {
  limit?: number;
}

interface SubmitReviewBody {
  itemId: string;
  quality: number;
  sessionId?: string;
}

const nextQuerySchema = Joi.object<NextQuery>({
  limit: Joi.number().integer().min(1).max(MAX_REVIEW_LIMIT)
});

const submitReviewSchema = Joi.object<SubmitReviewBody>({
  itemId: Joi.string().required(),
  quality: Joi.number().integer().min(0).max(5).required(),
  sessionId: Joi.string()
});

export function createReviewRoutes(services: AppServices): Router {
  const router = Router();

  /**
   * GET /reviews/next
   * Items due for review, struggling first
   */
  router.get('/next', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const query = validateRequest(nextQuerySchema, req.query, res);
      if (!query) return;

      const items = await services.scheduler.reviewNext(query.limit ?? config.reviews.defaultLimit);
      res.json({
        items,
        count: items.length,
        message: `${items.length} items ready for review`
      });
    } catch (error) {
      next(error);
    }
  });

  /**
   * POST /reviews
   * Submit a review (quality 0-5) and reschedule the item
   */
  router.post('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = validateRequest(submitReviewSchema, req.body, res);
      if (!body) return;

      const session = body.sessionId ? services.sessions.get(body.sessionId) : undefined;
      const outcome = await services.scheduler.submit(body.itemId, body.quality, session);

      res.json({
        itemId: outcome.item.id,
        lemma: outcome.item.lemma,
        passed: outcome.passed,
        previousStatus: outcome.previous.status,
        progress: outcome.progress
      });
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /reviews/statistics
   */
  router.get('/statistics', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      res.json(await services.scheduler.statistics());
    } catch (error) {
      next(error);
    }
  });

  return router;
}
