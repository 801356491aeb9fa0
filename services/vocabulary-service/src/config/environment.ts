import dotenv from 'dotenv';
import { CEFR_LEVELS, CefrLevel } from '../types/grammar';

dotenv.config();

function parseLevel(value: string | undefined, fallback: CefrLevel): CefrLevel {
  const match = CEFR_LEVELS.find(level => level === value?.toUpperCase());
  return match ?? fallback;
}

export const config = {
  // Server config
  port: parseInt(process.env.PORT || '8080'),
  nodeEnv: process.env.NODE_ENV || 'development',
  allowedOrigins: process.env.ALLOWED_ORIGINS?.split(',') || ['http://localhost:3000'],

  // Database config
  mongoUrl: process.env.MONGO_URI || 'mongodb://localhost:27017',
  mongoDbName: process.env.MONGO_DB_NAME || 'lengua',

  // LLM collaborator used for translation and inflection generation
  openai: {
    apiKey: process.env.OPENAI_API_KEY || '',
    model: process.env.OPENAI_MODEL || 'gpt-4o-mini',
    timeoutMs: parseInt(process.env.OPENAI_TIMEOUT_MS || '30000'),
  },

  // External services
  pronunciationServiceUrl: process.env.PRONUNCIATION_SERVICE_URL || 'http://localhost:8081',
  rewardServiceUrl: process.env.REWARD_SERVICE_URL || 'http://localhost:8082',
  httpTimeoutMs: parseInt(process.env.HTTP_TIMEOUT_MS || '5000'),

  wordForms: {
    batchSize: parseInt(process.env.WORD_FORMS_BATCH_SIZE || '10'),
  },

  reviews: {
    defaultLimit: parseInt(process.env.REVIEW_DEFAULT_LIMIT || '20'),
  },

  analysis: {
    targetLevel: parseLevel(process.env.TARGET_LEVEL, 'A2'),
  },

  // Logging
  logLevel: process.env.LOG_LEVEL || 'info',
  logDir: process.env.LOG_DIR || '',
};

export function validateConfig(): void {
  const missing: string[] = [];
  if (!config.mongoUrl) missing.push('MONGO_URI');
  if (!config.openai.apiKey) missing.push('OPENAI_API_KEY');

  if (missing.length > 0) {
    throw new Error(`Missing required configuration: ${missing.join(', ')}`);
  }

  if (!Number.isInteger(config.wordForms.batchSize) || config.wordForms.batchSize < 1) {
    throw new Error('WORD_FORMS_BATCH_SIZE must be a positive integer');
  }
}
