import { Request, Response, NextFunction } from 'express';
import Joi from 'joi';
import { ZodSchema, ZodType } from 'zod';
import { ValidationError } from '../utils/errors';
import { describeZodError } from '../utils/validators';

export type ValidationSchema = Joi.Schema | ZodSchema;
export type RequestProperty = 'body' | 'query';

export interface ValidationOptions {
  abortEarly?: boolean;
  stripUnknown?: boolean;
}

/**
 * Validated values are written to `res.locals.validated[property]` so the
 * originals on `req` stay untouched.
 */
const store = (res: Response, property: RequestProperty, value: unknown): void => {
  const current: unknown = res.locals.validated;
  const validated = typeof current === 'object' && current !== null ? current : {};
  res.locals.validated = { ...validated, [property]: value };
};

export const validateJoi = (
  schema: Joi.Schema,
  property: RequestProperty = 'body',
  options: ValidationOptions = {}
) => {
  return (req: Request, res: Response, next: NextFunction): void => {
    const { error, value } = schema.validate(req[property], {
      abortEarly: options.abortEarly ?? false,
      stripUnknown: options.stripUnknown ?? true,
      convert: true
    });

    if (error) {
      const errors = error.details.map(detail => ({
        field: detail.path.join('.'),
        message: detail.message,
        type: detail.type
      }));
      next(new ValidationError('Validation error', errors));
      return;
    }

    store(res, property, value);
    next();
  };
};

export const validateZod = (
  schema: ZodSchema,
  property: RequestProperty = 'body'
) => {
  return (req: Request, res: Response, next: NextFunction): void => {
    const result = schema.safeParse(req[property]);

    if (!result.success) {
      next(new ValidationError('Validation error', describeZodError(result.error)));
      return;
    }

    store(res, property, result.data);
    next();
  };
};

export const validate = (
  schema: ValidationSchema,
  property: RequestProperty = 'body',
  options?: ValidationOptions
) => {
  if (schema instanceof ZodType) {
    return validateZod(schema, property);
  }
  return validateJoi(schema, property, options);
};

/**
 * Read a value stored by `validate`. Undefined when the property was not validated.
 */
export const getValidated = <T>(res: Response, property: RequestProperty): T | undefined => {
  const validated: Record<string, T | undefined> | undefined = res.locals.validated;
  return validated?.[property];
};
