import { NextFunction, Request, Response, Router } from 'express';
import Joi from 'joi';
import { validateRequest } from '../middleware/validation';
import { AppServices } from '../services/container';
import { CEFR_LEVELS, CefrLevel } from '../types/grammar';

interface AnalyzeBody {
  text: string;
  includeStopWords?: boolean;
  level?: CefrLevel;
}

const analyzeSchema = Joi.object<AnalyzeBody>({
  text: Joi.string().max(100000).required(),
  includeStopWords: Joi.boolean(),
  level: Joi.string().valid(...CEFR_LEVELS)
});

export function createAnalysisRoutes(services: AppServices): Router {
  const router = Router();

  /**
   * POST /analysis
   * Comprehension estimate for a text; with `level`, new words are split
   * into those expected at that level and those beyond it
   */
  router.post('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = validateRequest(analyzeSchema, req.body, res);
      if (!body) return;

      const options = { includeStopWords: body.includeStopWords };
      if (body.level) {
        res.json(await services.analyzer.analyzeForLevel(body.text, body.level, options));
        return;
      }
      res.json(await services.analyzer.analyze(body.text, options));
    } catch (error) {
      next(error);
    }
  });

  return router;
}
