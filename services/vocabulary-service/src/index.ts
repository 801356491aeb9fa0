import { config, validateConfig } from './config/environment';
import { createApp } from './app';
import { closeConnection, connect } from './clients/mongodb';
import { OpenAiMorphologyGenerator } from './clients/morphology';
import { getOpenAI } from './clients/openai';
import { MongoProgressStore } from './clients/progress-store';
import { HttpPronunciationScorer } from './clients/pronunciation';
import { HttpRewardSignal } from './clients/reward';
import { OpenAiTranslationProvider } from './clients/translation';
import { createServices } from './services/container';
import { getFrequencyIndex } from './services/frequency-index';
import { getGrammarCatalog } from './services/grammar-catalog';
import { getLemmatizer } from './services/lemmatizer';
import { errorMessage } from './utils/errors';
import { logger } from './utils/logger';

async function start(): Promise<void> {
  validateConfig();

  const db = await connect();
  const store = new MongoProgressStore(db);
  await store.initialize();

  const openai = getOpenAI();
  const services = createServices(store, {
    translator: new OpenAiTranslationProvider(openai),
    generator: new OpenAiMorphologyGenerator(openai),
    pronunciation: new HttpPronunciationScorer(config.pronunciationServiceUrl, config.httpTimeoutMs),
    rewards: new HttpRewardSignal(config.rewardServiceUrl, config.httpTimeoutMs)
  }, {
    index: getFrequencyIndex(),
    lemmatizer: getLemmatizer(),
    catalog: getGrammarCatalog(),
    targetLevel: config.analysis.targetLevel,
    batchSize: config.wordForms.batchSize
  });

  const app = createApp(services);
  const server = app.listen(config.port, () => {
    logger.info(`Vocabulary service listening on port ${config.port}`, { env: config.nodeEnv });
  });

  const shutdown = (signal: string) => {
    logger.info(`${signal} received, shutting down gracefully`);
    server.close(() => {
      closeConnection()
        .then(() => process.exit(0))
        .catch(error => {
          logger.error('Error during shutdown', { error: errorMessage(error) });
          process.exit(1);
        });
    });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

if (require.main === module) {
  start().catch(error => {
    logger.error('Failed to start vocabulary service', { error: errorMessage(error) });
    process.exit(1);
  });
}

export { start };
