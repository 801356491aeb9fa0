import { NextFunction, Request, Response, Router } from 'express';
import Joi from 'joi';
import { validateRequest } from '../middleware/validation';
import { AppServices } from '../services/container';
import { ImportRequest } from '../services/content-library';

const importSchema = Joi.object<ImportRequest>({
  title: Joi.string().trim().min(1).max(200).required(),
  text: Joi.string().max(100000).required()
});

export function createContentRoutes(services: AppServices): Router {
  const router = Router();

  /**
   * POST /content
   * Import a text as a content package
   */
  router.post('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = validateRequest(importSchema, req.body, res);
      if (!body) return;

      res.status(201).json(await services.content.importPackage(body));
    } catch (error) {
      next(error);
    }
  });

  router.get('/', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const packages = await services.content.listPackages();
      res.json({ packages, count: packages.length });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
