export type ErrorKind = 'NotFound' | 'Conflict' | 'ValidationError';

export interface ErrorDetail {
  param: string;
  message: string;
}

export abstract class AppError extends Error {
  abstract readonly kind: ErrorKind;
  abstract readonly statusCode: number;

  constructor(
    message: string,
    public readonly details?: ErrorDetail[],
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class NotFoundError extends AppError {
  readonly kind = 'NotFound';
  readonly statusCode = 404;
}

export class ConflictError extends AppError {
  readonly kind = 'Conflict';
  readonly statusCode = 409;
}

export class ValidationError extends AppError {
  readonly kind = 'ValidationError';
  readonly statusCode = 400;
}
