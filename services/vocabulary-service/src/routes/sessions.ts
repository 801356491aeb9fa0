import { NextFunction, Request, Response, Router } from 'express';
import Joi from 'joi';
import { validateRequest } from '../middleware/validation';
import { AppServices } from '../services/container';
import { SESSION_TYPES } from '../services/session-context';
import { SessionType } from '../types/vocabulary';

const createSchema = Joi.object<{ sessionType: SessionType }>({
  sessionType: Joi.string().valid(...SESSION_TYPES).default('review')
});

const pronunciationSchema = Joi.object<{ accuracy: number }>({
  accuracy: Joi.number().min(0).max(100).required()
});

const historySchema = Joi.object<{ limit: number }>({
  limit: Joi.number().integer().min(1).max(100).default(20)
});

export function createSessionRoutes(services: AppServices): Router {
  const router = Router();

  /**
   * POST /sessions
   * Open a practice session
   */
  router.post('/', (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = validateRequest(createSchema, req.body ?? {}, res);
      if (!body) return;

      const session = services.sessions.create(body.sessionType);
      res.status(201).json({ id: session.id, sessionType: session.sessionType, startedAt: session.startedAt });
    } catch (error) {
      next(error);
    }
  });

  router.get('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const query = validateRequest(historySchema, req.query, res);
      if (!query) return;

      const sessions = await services.sessions.history(query.limit);
      res.json({ sessions, count: sessions.length });
    } catch (error) {
      next(error);
    }
  });

  /**
   * POST /sessions/:id/pronunciation
   * Record one pronunciation accuracy sample (0-100)
   */
  router.post('/:id/pronunciation', (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = validateRequest(pronunciationSchema, req.body, res);
      if (!body) return;

      const session = services.sessions.get(req.params.id);
      session.recordPronunciation(body.accuracy);
      res.json({ id: session.id, samples: session.pronunciationSamples.length, averageAccuracy: session.averageAccuracy() });
    } catch (error) {
      next(error);
    }
  });

  /**
   * POST /sessions/:id/flush
   * Close the session and persist its summary
   */
  router.post('/:id/flush', async (req: Request, res: Response, next: NextFunction) => {
    try {
      res.json(await services.sessions.flush(req.params.id));
    } catch (error) {
      next(error);
    }
  });

  return router;
}
