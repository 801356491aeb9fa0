import { NextFunction, Request, Response, Router } from 'express';
import Joi from 'joi';
import { validateRequest } from '../middleware/validation';
import { AppServices } from '../services/container';

const regenerateSchema = Joi.object<{ force: boolean }>({
  force: Joi.boolean().default(false)
});

export function createWordFormRoutes(services: AppServices): Router {
  const router = Router();

  /**
   * POST /word-forms/regenerate
   * Generate missing inflections for words in progress; force clears the cache first
   */
  router.post('/regenerate', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = validateRequest(regenerateSchema, req.body ?? {}, res);
      if (!body) return;

      res.json(await services.expander.regenerate({ force: body.force }));
    } catch (error) {
      next(error);
    }
  });

  router.get('/stats', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      res.json(await services.expander.stats());
    } catch (error) {
      next(error);
    }
  });

  /**
   * POST /word-forms/:id/verify
   * Mark a generated form as confirmed
   */
  router.post('/:id/verify', async (req: Request, res: Response, next: NextFunction) => {
    try {
      res.json(await services.expander.verify(req.params.id));
    } catch (error) {
      next(error);
    }
  });

  return router;
}
