import { NextFunction, Request, Response, Router } from 'express';
import Joi from 'joi';
import { validateRequest } from '../middleware/validation';
import { AppServices } from '../services/container';
import { CEFR_LEVELS, CefrLevel } from '../types/grammar';

const scoreQuerySchema = Joi.object<{ sessionId?: string }>({
  sessionId: Joi.string()
});

const readinessQuerySchema = Joi.object<{ level: CefrLevel }>({
  level: Joi.string().valid(...CEFR_LEVELS).required()
});

export function createCefrRoutes(services: AppServices): Router {
  const router = Router();

  /**
   * GET /cefr/score
   * Unified score with level band and gates; an open session adds its
   * pronunciation samples
   */
  router.get('/score', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const query = validateRequest(scoreQuerySchema, req.query, res);
      if (!query) return;

      const session = query.sessionId ? services.sessions.get(query.sessionId) : undefined;
      res.json(await services.scorer.unifiedScore(session));
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /cefr/readiness?level=
   * Coverage of one level with missing vocabulary, verbs and grammar topics
   */
  router.get('/readiness', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const query = validateRequest(readinessQuerySchema, req.query, res);
      if (!query) return;

      res.json(await services.scorer.readiness(query.level));
    } catch (error) {
      next(error);
    }
  });

  return router;
}
