import { Request, Response, NextFunction } from 'express';
import client from 'prom-client';
import { CountryRepository } from '../repositories/countryRepository';
import { CountryMutation } from '../types/country';

export interface AppMetrics {
  register: client.Registry;
  httpRequestDuration: client.Histogram<'method' | 'route' | 'code'>;
  countryMutations: client.Counter<'operation'>;
  countriesStored: client.Gauge;
}

export interface MetricsOptions {
  collectDefaultMetrics?: boolean;
}

/**
 * Creates a registry holding the HTTP histogram, the mutation counter and a
 * gauge of stored countries that is read from the repository on each scrape.
 */
export const createMetrics = (
  repository: CountryRepository,
  { collectDefaultMetrics = true }: MetricsOptions = {},
): AppMetrics => {
  const register = new client.Registry();
  if (collectDefaultMetrics) {
    client.collectDefaultMetrics({ register });
  }

  const httpRequestDuration = new client.Histogram({
    name: 'http_request_duration_ms',
    help: 'Duration of HTTP requests in ms',
    labelNames: ['method', 'route', 'code'] as const,
    buckets: [50, 100, 200, 300, 400, 500, 1000],
    registers: [register],
  });

  const countryMutations = new client.Counter({
    name: 'country_mutations_total',
    help: 'Successful country create, update and delete operations',
    labelNames: ['operation'] as const,
    registers: [register],
  });

  const countriesStored = new client.Gauge({
    name: 'countries_stored',
    help: 'Number of countries currently stored',
    registers: [register],
    async collect() {
      this.set(await repository.count());
    },
  });

  return { register, httpRequestDuration, countryMutations, countriesStored };
};

export const recordMutation = (metrics: AppMetrics, operation: CountryMutation): void => {
  metrics.countryMutations.inc({ operation });
};

// Unmatched paths share one label so that probing random URLs cannot grow the series count.
const routeLabel = (req: Request): string => {
  const routePath: unknown = req.route?.path;
  return typeof routePath === 'string' ? `${req.baseUrl}${routePath}` : 'unmatched';
};

export const requestDuration =
  (metrics: AppMetrics) => (req: Request, res: Response, next: NextFunction) => {
    const end = metrics.httpRequestDuration.startTimer();
    res.on('finish', () => {
      end({ method: req.method, route: routeLabel(req), code: res.statusCode });
    });
    next();
  };

export const metricsEndpoint =
  (metrics: AppMetrics) => async (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = await metrics.register.metrics();
      res.set('Content-Type', metrics.register.contentType);
      res.end(body);
    } catch (error) {
      next(error);
    }
  };
