import dotenv from 'dotenv';
import { Server } from 'http';
import { createApp } from './app';
import { AppConfig, loadConfig } from './config';
import { createRepository } from './repositories';
import { CountryService } from './services/countryService';
import { disconnectDB } from './utils/db';
import { configureLogger, logger } from './utils/logger';
import { createMetrics } from './utils/metrics';
import { loadSeedFile, seedCountries } from './utils/seed';

dotenv.config();

const shutdown = (server: Server, config: AppConfig) => (signal: NodeJS.Signals) => {
  logger.info(`${signal} received, shutting down gracefully`);
  server.close(async (closeError) => {
    try {
      if (config.storage.backend === 'mongo') {
        await disconnectDB();
      }
      process.exit(closeError ? 1 : 0);
    } catch (error) {
      logger.error('Failed to shut down cleanly', { error });
      process.exit(1);
    }
  });
};

const start = async () => {
  const config = loadConfig();
  configureLogger({ level: config.log.level, logDir: config.log.dir, logToFile: config.log.toFile });

  const repository = await createRepository(config);
  const countryService = new CountryService(repository);

  if (config.seedFile) {
    await seedCountries(countryService, await loadSeedFile(config.seedFile));
  }

  const app = createApp({ countryService, metrics: createMetrics(repository), config });
  const server = app.listen(config.port, () => {
    logger.info(
      `Country directory listening on port ${config.port} (${config.storage.backend} storage)`,
    );
  });

  process.once('SIGTERM', shutdown(server, config));
  process.once('SIGINT', shutdown(server, config));
};

start().catch((error: unknown) => {
  logger.error('Failed to initialize application', { error });
  process.exit(1);
});
