import { Db, MongoClient } from 'mongodb';
import { config } from '../config/environment';
import { errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';

// Log the connection details with credentials masked
const maskedUri = config.mongoUrl.replace(/\/\/([^:]+):([^@]+)@/, '//***:***@');

let client: MongoClient | null = null;
let db: Db | null = null;

export async function connect(): Promise<Db> {
  if (db) {
    return db;
  }

  logger.info('Connecting to MongoDB', { uri: maskedUri, database: config.mongoDbName });
  const candidate = new MongoClient(config.mongoUrl, {
    retryWrites: true,
    w: 'majority'
  });

  try {
    await candidate.connect();
    const database = candidate.db(config.mongoDbName);
    // Ping the database to verify connection
    await database.command({ ping: 1 });
    client = candidate;
    db = database;
    logger.info('MongoDB connection verified', { database: config.mongoDbName });
    return database;
  } catch (error) {
    logger.error('Failed to connect to MongoDB', { uri: maskedUri, error: errorMessage(error) });
    await candidate.close();
    throw new Error(`MongoDB connection failed: ${errorMessage(error)}`);
  }
}

// Close the MongoDB connection (for graceful shutdown)
export async function closeConnection(): Promise<void> {
  if (client) {
    await client.close();
    client = null;
    db = null;
    logger.info('MongoDB connection closed');
  }
}
