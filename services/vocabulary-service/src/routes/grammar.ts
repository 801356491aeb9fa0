import { NextFunction, Request, Response, Router } from 'express';
import Joi from 'joi';
import { validateRequest } from '../middleware/validation';
import { AppServices } from '../services/container';
import { CEFR_LEVELS, CefrLevel } from '../types/grammar';

const topicsQuerySchema = Joi.object<{ level?: CefrLevel }>({
  level: Joi.string().valid(...CEFR_LEVELS)
});

const reviewSchema = Joi.object<{ quality: number }>({
  quality: Joi.number().integer().min(0).max(5).required()
});

export function createGrammarRoutes(services: AppServices): Router {
  const router = Router();

  router.get('/topics', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const query = validateRequest(topicsQuerySchema, req.query, res);
      if (!query) return;

      const topics = await services.grammar.listTopics(query.level);
      res.json({ topics, count: topics.length });
    } catch (error) {
      next(error);
    }
  });

  router.get('/capabilities', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      res.json(await services.grammar.capabilities());
    } catch (error) {
      next(error);
    }
  });

  /**
   * POST /grammar/topics/:id/review
   */
  router.post('/topics/:id/review', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = validateRequest(reviewSchema, req.body, res);
      if (!body) return;

      res.json(await services.grammar.reviewTopic(req.params.id, body.quality));
    } catch (error) {
      next(error);
    }
  });

  return router;
}
