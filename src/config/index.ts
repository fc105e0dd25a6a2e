import Joi from 'joi';

export type NodeEnv = 'development' | 'production' | 'test';
export type StorageBackend = 'memory' | 'mongo';

export interface AppConfig {
  nodeEnv: NodeEnv;
  port: number;
  storage: {
    backend: StorageBackend;
    mongoUri?: string;
    dbName: string;
  };
  log: {
    level: string;
    dir: string;
    toFile: boolean;
  };
  rateLimit: {
    windowMs: number;
    max: number;
  };
  seedFile?: string;
}

interface EnvVars {
  NODE_ENV: NodeEnv;
  PORT: number;
  STORAGE_BACKEND: StorageBackend;
  MONGODB_URI?: string;
  MONGODB_DB_NAME: string;
  LOG_LEVEL?: string;
  LOG_DIR: string;
  LOG_TO_FILE?: boolean;
  RATE_LIMIT_WINDOW_MS: number;
  RATE_LIMIT_MAX: number;
  COUNTRY_SEED_FILE?: string;
}

const envSchema = Joi.object<EnvVars>({
  NODE_ENV: Joi.string().valid('development', 'production', 'test').default('development'),
  PORT: Joi.number().port().default(8087),
  STORAGE_BACKEND: Joi.string().valid('memory', 'mongo').default('memory'),
  MONGODB_URI: Joi.string()
    .uri({ scheme: ['mongodb', 'mongodb+srv'] })
    .when('STORAGE_BACKEND', { is: 'mongo', then: Joi.required() }),
  MONGODB_DB_NAME: Joi.string().default('countrydb'),
  LOG_LEVEL: Joi.string().valid('error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'),
  LOG_DIR: Joi.string().default('logs'),
  LOG_TO_FILE: Joi.boolean(),
  RATE_LIMIT_WINDOW_MS: Joi.number().integer().min(1000).default(15 * 60 * 1000),
  RATE_LIMIT_MAX: Joi.number().integer().min(1).default(100),
  COUNTRY_SEED_FILE: Joi.string(),
});

/**
 * Builds the application configuration from environment variables.
 * Throws when a variable is malformed or a required one is missing.
 */
export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  const result = envSchema.validate(env, { allowUnknown: true, abortEarly: false });
  if (result.error) {
    throw new Error(`Invalid configuration: ${result.error.message}`);
  }
  const { value } = result;

  return {
    nodeEnv: value.NODE_ENV,
    port: value.PORT,
    storage: {
      backend: value.STORAGE_BACKEND,
      mongoUri: value.MONGODB_URI,
      dbName: value.MONGODB_DB_NAME,
    },
    log: {
      level: value.LOG_LEVEL ?? (value.NODE_ENV === 'production' ? 'warn' : 'info'),
      dir: value.LOG_DIR,
      toFile: value.LOG_TO_FILE ?? value.NODE_ENV !== 'test',
    },
    rateLimit: {
      windowMs: value.RATE_LIMIT_WINDOW_MS,
      max: value.RATE_LIMIT_MAX,
    },
    seedFile: value.COUNTRY_SEED_FILE,
  };
};
