import mongoose from 'mongoose';
import { logger } from './logger';

export const MAX_RETRIES = 3;
export const RETRY_DELAY = 5000;

export const maskMongoURI = (uri: string): string => {
  try {
    const url = new URL(uri);
    if (url.username || url.password) {
      return uri.replace(/\/\/(.*?@)/, '//*****:*****@');
    }
    return uri;
  } catch {
    return '*****';
  }
};

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

let listenersAttached = false;

const attachConnectionListeners = () => {
  if (listenersAttached) {
    return;
  }
  listenersAttached = true;

  mongoose.connection.on('connected', () => {
    logger.info(`MongoDB connection established to ${mongoose.connection.name}`);
  });

  mongoose.connection.on('error', (err: Error) => {
    logger.error(`MongoDB connection error: ${err.message}`);
  });

  mongoose.connection.on('disconnected', () => {
    logger.warn('MongoDB connection disconnected');
  });
};

export interface ConnectOptions {
  uri: string;
  dbName: string;
  retries?: number;
  retryDelayMs?: number;
}

/**
 * Connects the shared mongoose connection, retrying a fixed number of times
 * before giving up with the last connection error.
 */
export const connectDB = async ({
  uri,
  dbName,
  retries = MAX_RETRIES,
  retryDelayMs = RETRY_DELAY,
}: ConnectOptions): Promise<void> => {
  const options: mongoose.ConnectOptions = {
    autoIndex: process.env.NODE_ENV !== 'production',
    serverSelectionTimeoutMS: 5000,
    socketTimeoutMS: 45000,
    family: 4,
    maxPoolSize: 50,
    dbName,
  };

  attachConnectionListeners();
  logger.info(`Attempting to connect to MongoDB at: ${maskMongoURI(uri)}`);

  for (let attempt = 1; ; attempt++) {
    try {
      await mongoose.connect(uri, options);
      await mongoose.connection.db?.command({ ping: 1 });
      return;
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      logger.error(`MongoDB connection failed (attempt ${attempt}/${retries}): ${reason}`);
      if (attempt >= retries) {
        throw error;
      }
      logger.info(`Retrying in ${retryDelayMs / 1000} seconds...`);
      await sleep(retryDelayMs);
    }
  }
};

export const disconnectDB = async (): Promise<void> => {
  await mongoose.connection.close();
  logger.info('MongoDB connection closed');
};
