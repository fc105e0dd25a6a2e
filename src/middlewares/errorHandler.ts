import { Request, Response, NextFunction } from 'express';
import { AppError, NotFoundError, ValidationError } from '../utils/errors';
import { logger } from '../utils/logger';
import { messages } from '../utils/messages';

interface BodyParserError extends Error {
  type: string;
  status: number;
}

const isBodyParserError = (err: unknown): err is BodyParserError =>
  err instanceof Error && 'type' in err && 'status' in err && typeof err.status === 'number';

const toAppError = (err: unknown): AppError | null => {
  if (err instanceof AppError) {
    return err;
  }
  // Oversized bodies, unsupported charsets and the like are client errors too.
  if (isBodyParserError(err) && err.status < 500) {
    return new ValidationError(
      err.type === 'entity.parse.failed' ? messages.malformedBody : err.message,
    );
  }
  return null;
};

/**
 * Fallback for requests that matched no route.
 */
export const notFound = (req: Request, res: Response, next: NextFunction) => {
  next(new NotFoundError(`${messages.routeNotFound}: ${req.method} ${req.path}`));
};

/**
 * Converts any error reaching the end of the chain into the JSON error body.
 *
 * `AppError`s keep their kind and status. Anything else is a 500 whose
 * message is only exposed when running in development.
 */
const errorHandler = (err: unknown, req: Request, res: Response, next: NextFunction) => {
  if (res.headersSent) {
    return next(err);
  }

  const appError = toAppError(err);
  if (appError) {
    return res.status(appError.statusCode).json({
      success: false,
      error: appError.kind,
      message: appError.message,
      details: appError.details,
    });
  }

  const error = err instanceof Error ? err : new Error(String(err));
  logger.error(error.message, { stack: error.stack });
  res.status(500).json({
    success: false,
    error: 'InternalError',
    message: messages.error,
    details:
      process.env.NODE_ENV === 'development' ? [{ param: '', message: error.message }] : undefined,
  });
};

export default errorHandler;
