import { Request, Response, NextFunction } from 'express';
import { validationResult, ValidationError as FieldError } from 'express-validator';
import { ObjectSchema } from 'joi';
import { ErrorDetail, ValidationError } from '../utils/errors';

/**
 * Validates `req.body` against a Joi schema and replaces it with the
 * converted value: strings trimmed, numeric strings cast and unknown keys
 * dropped.
 */
export const validateBody =
  (schema: ObjectSchema) => (req: Request, res: Response, next: NextFunction) => {
    const result = schema.validate(req.body, {
      abortEarly: false,
      stripUnknown: { objects: true },
    });
    if (result.error) {
      const details: ErrorDetail[] = result.error.details.map((detail) => ({
        param: detail.path.join('.'),
        message: detail.message,
      }));
      return next(new ValidationError(details[0].message, details));
    }
    req.body = result.value;
    next();
  };

const validateRequest = (req: Request, res: Response, next: NextFunction) => {
  const errors = validationResult(req);

  if (!errors.isEmpty()) {
    const details: ErrorDetail[] = errors.array().map((err: FieldError) => ({
      param: err.type === 'field' ? err.path : '',
      message: String(err.msg),
    }));
    return next(new ValidationError(details[0].message, details));
  }

  next();
};

export default validateRequest;
