import express, { Express } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import morgan from 'morgan';
import { config } from './config/environment';
import { errorHandler } from './middleware/error-handler';
import { AppServices } from './services/container';
import healthRoutes from './routes/health';
import { createAnalysisRoutes } from './routes/analysis';
import { createCefrRoutes } from './routes/cefr';
import { createContentRoutes } from './routes/content';
import { createGrammarRoutes } from './routes/grammar';
import { createReviewRoutes } from './routes/reviews';
import { createSessionRoutes } from './routes/sessions';
import { createVocabularyRoutes } from './routes/vocabulary';
import { createWordFormRoutes } from './routes/word-forms';
import { logger } from './utils/logger';

export function createApp(services: AppServices): Express {
  const app = express();

  app.use(helmet());
  app.use(cors({
    origin: config.allowedOrigins,
    credentials: true,
    optionsSuccessStatus: 200
  }));
  app.use(express.json({ limit: '1mb' }));

  if (config.nodeEnv !== 'test') {
    app.use(morgan('combined', {
      stream: { write: (message: string) => logger.info(message.trim()) }
    }));
  }

  // Routes - mount all API routes under /api prefix
  const apiRouter = express.Router();
  apiRouter.use('/vocabulary', createVocabularyRoutes(services));
  apiRouter.use('/reviews', createReviewRoutes(services));
  apiRouter.use('/analysis', createAnalysisRoutes(services));
  apiRouter.use('/word-forms', createWordFormRoutes(services));
  apiRouter.use('/cefr', createCefrRoutes(services));
  apiRouter.use('/grammar', createGrammarRoutes(services));
  apiRouter.use('/content', createContentRoutes(services));
  apiRouter.use('/sessions', createSessionRoutes(services));
  app.use('/api', apiRouter);

  app.use('/health', healthRoutes);

  // Health check endpoint for Kubernetes
  app.get('/healthz', (_req, res) => {
    res.send('ok');
  });

  app.use((_req, res) => {
    res.status(404).json({ error: 'Not found' });
  });

  app.use(errorHandler);

  return app;
}
