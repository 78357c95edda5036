import { MongoClient, ServerApiVersion, type Db, type MongoClientOptions } from 'mongodb';
import { logger } from '../utils/logger.js';
import { getEnv } from './env.js';

let client: MongoClient | null = null;
let db: Db | null = null;

/**
 * Strip credentials from a connection string before it is logged
 */
export function redactMongoUri(uri: string): string {
  return uri.replace(/^(mongodb(?:\+srv)?:\/\/)([^@/]+)@/, '$1***@');
}

const CLIENT_OPTIONS: MongoClientOptions = {
  serverApi: {
    version: ServerApiVersion.v1,
    strict: false,
    deprecationErrors: true,
  },
  connectTimeoutMS: 10000,
  serverSelectionTimeoutMS: 10000,
  maxPoolSize: 5,
};

/**
 * Connect to the index store database
 *
 * @throws {Error} If MONGODB_URI is not configured or the server cannot be reached
 */
export async function connectDB(): Promise<Db> {
  if (db) {
    return db;
  }

  const env = getEnv();
  if (!env.MONGODB_URI) {
    throw new Error('MONGODB_URI is not configured. Set it in .env or pass --dry-run.');
  }

  const mongoClient = new MongoClient(env.MONGODB_URI, CLIENT_OPTIONS);
  try {
    await mongoClient.connect();
    await mongoClient.db(env.DB_NAME).command({ ping: 1 });
  } catch (error) {
    logger.error({ error, uri: redactMongoUri(env.MONGODB_URI) }, 'Failed to connect to MongoDB');
    await mongoClient.close().catch((closeError: unknown) => {
      logger.debug({ error: closeError }, 'Error closing MongoDB client after failed connect');
    });
    throw error;
  }

  client = mongoClient;
  db = mongoClient.db(env.DB_NAME);
  logger.info({ uri: redactMongoUri(env.MONGODB_URI), dbName: env.DB_NAME }, 'Connected to MongoDB');
  return db;
}

export async function closeDB(): Promise<void> {
  if (!client) {
    return;
  }
  try {
    await client.close();
    logger.info('MongoDB connection closed');
  } catch (error) {
    logger.error({ error }, 'Error closing MongoDB connection');
    throw error;
  } finally {
    client = null;
    db = null;
  }
}
