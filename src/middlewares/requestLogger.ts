import expressWinston from 'express-winston';
import { logger } from '../utils/logger';

/**
 * Access log for every request, written through the shared winston logger.
 */
const requestLogger = expressWinston.logger({
  winstonInstance: logger,
  meta: true,
  msg: 'HTTP {{req.method}} {{req.url}} {{res.statusCode}} {{res.responseTime}}ms',
  expressFormat: false,
  colorize: false,
});

export const errorLogger = expressWinston.errorLogger({
  winstonInstance: logger,
});

export default requestLogger;
