import { NextFunction, Request, Response, Router } from 'express';
import Joi from 'joi';
import { validateRequest } from '../middleware/validation';
import { AppServices } from '../services/container';
import { AddVocabularyRequest, ListVocabularyRequest } from '../services/vocabulary-service';
import { REVIEW_STATUSES } from '../types/vocabulary';

const addSchema = Joi.object<AddVocabularyRequest>({
  lemma: Joi.string().trim().min(1).max(100).required(),
  translation: Joi.string().trim().max(200),
  category: Joi.string().trim().max(50),
  exampleSentence: Joi.string().trim().max(500)
});

const listSchema = Joi.object<ListVocabularyRequest>({
  status: Joi.string().valid(...REVIEW_STATUSES),
  page: Joi.number().integer().min(1).default(1),
  pageSize: Joi.number().integer().min(1).max(200).default(50)
});

const translationSchema = Joi.object<{ translation: string }>({
  translation: Joi.string().trim().min(1).max(200).required()
});

export function createVocabularyRoutes(services: AppServices): Router {
  const router = Router();

  /**
   * POST /vocabulary
   * Add a word on first encounter (inflected input is reduced to its lemma)
   */
  router.post('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = validateRequest(addSchema, req.body, res);
      if (!body) return;

      const { entry, created } = await services.vocabulary.add(body);
      res.status(created ? 201 : 200).json({ ...entry, created });
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /vocabulary?status=&page=&pageSize=
   */
  router.get('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const query = validateRequest(listSchema, req.query, res);
      if (!query) return;

      res.json(await services.vocabulary.list(query));
    } catch (error) {
      next(error);
    }
  });

  router.get('/:id', async (req: Request, res: Response, next: NextFunction) => {
    try {
      res.json(await services.vocabulary.get(req.params.id));
    } catch (error) {
      next(error);
    }
  });

  /**
   * PATCH /vocabulary/:id
   * Translation fix-up, the only edit an item accepts
   */
  router.patch('/:id', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = validateRequest(translationSchema, req.body, res);
      if (!body) return;

      res.json(await services.vocabulary.updateTranslation(req.params.id, body.translation));
    } catch (error) {
      next(error);
    }
  });

  router.delete('/:id', async (req: Request, res: Response, next: NextFunction) => {
    try {
      await services.vocabulary.remove(req.params.id);
      res.status(204).send();
    } catch (error) {
      next(error);
    }
  });

  return router;
}
