import express, { Express } from 'express';
import helmet from 'helmet';
import cors from 'cors';
import mongoSanitize from 'express-mongo-sanitize';
import rateLimit from 'express-rate-limit';
import hpp from 'hpp';
import { AppConfig } from './config';
import { createCountryController } from './controllers/countryController';
import errorHandler, { notFound } from './middlewares/errorHandler';
import requestLogger, { errorLogger } from './middlewares/requestLogger';
import { createRouter } from './routes';
import { CountryService } from './services/countryService';
import { AppMetrics, metricsEndpoint, requestDuration } from './utils/metrics';

export interface AppDependencies {
  countryService: CountryService;
  metrics: AppMetrics;
  config: Pick<AppConfig, 'rateLimit'>;
}

export const createApp = ({ countryService, metrics, config }: AppDependencies): Express => {
  const app = express();
  app.set('trust proxy', 1);

  app.use(requestLogger);

  // Timed and scraped before body parsing and rate limiting.
  app.use(requestDuration(metrics));
  app.get('/metrics', metricsEndpoint(metrics));

  app.use(express.json({ limit: '10kb' }));

  // Security: Prevent MongoDB operator injection
  app.use(mongoSanitize());
  // Security: Rate limiting to prevent brute-force attacks
  app.use(
    rateLimit({
      windowMs: config.rateLimit.windowMs,
      limit: config.rateLimit.max,
      standardHeaders: true,
      legacyHeaders: false,
    }),
  );
  app.use(helmet());
  app.use(
    cors({
      origin: true,
      methods: ['GET', 'POST', 'PUT', 'DELETE'],
      allowedHeaders: ['Content-Type'],
    }),
  );
  // Security: Prevent HTTP Parameter Pollution
  app.use(hpp());

  app.use('/', createRouter(createCountryController(countryService, metrics)));

  app.use(notFound);
  app.use(errorLogger);
  app.use(errorHandler);

  return app;
};

export default createApp;
