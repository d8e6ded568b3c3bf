import { Request, Response, NextFunction } from 'express';
import { MulterError } from 'multer';
import { ApiErrorResponse, HttpMethod, HttpStatus } from '../types/api.types';
import { AppError, NotFoundError, getErrorMessage } from '../utils/errors';
import { appConfig } from '../config/app.config';
import { loggers } from '../utils/logger';

const HTTP_METHODS: readonly HttpMethod[] = ['GET', 'POST', 'PUT', 'PATCH', 'DELETE', 'OPTIONS', 'HEAD'];

const toHttpMethod = (method: string): HttpMethod | undefined =>
  HTTP_METHODS.find(m => m === method.toUpperCase());

/**
 * Upload errors from multer are client errors
 */
const normalizeError = (err: unknown): unknown => {
  if (err instanceof MulterError) {
    const status = err.code === 'LIMIT_FILE_SIZE' ? HttpStatus.PAYLOAD_TOO_LARGE : HttpStatus.BAD_REQUEST;
    return new AppError(err.message, status, err.code, true, { field: err.field });
  }
  return err;
};

const getErrorStatusCode = (error: unknown): number => {
  if (error instanceof AppError) return error.statusCode;
  if (typeof error === 'object' && error !== null) {
    // body-parser and friends attach `status` / `statusCode`
    const candidate = 'statusCode' in error ? error.statusCode : 'status' in error ? error.status : undefined;
    if (typeof candidate === 'number' && candidate >= 400 && candidate < 600) return candidate;
  }
  return HttpStatus.INTERNAL_SERVER_ERROR;
};

/**
 * Build the JSON error envelope for an error. Non-operational errors are masked.
 */
export const buildErrorResponse = (
  err: unknown,
  context: { path?: string; method?: string; requestId?: string; includeStack?: boolean } = {}
): ApiErrorResponse => {
  const error = normalizeError(err);
  const status = getErrorStatusCode(error);
  const isOperational = error instanceof AppError ? error.isOperational : status < 500;
  const code = error instanceof AppError ? error.code : status < 500 ? 'BAD_REQUEST' : 'INTERNAL_ERROR';

  return {
    success: false,
    error: {
      code,
      message: isOperational ? getErrorMessage(error) : 'Internal server error',
      status,
      timestamp: new Date().toISOString(),
      path: context.path,
      method: context.method ? toHttpMethod(context.method) : undefined,
      requestId: context.requestId,
      ...(error instanceof AppError && error.details !== undefined && { details: error.details }),
      ...(context.includeStack && error instanceof Error && { stack: error.stack })
    }
  };
};

export const errorHandler = (
  err: unknown,
  req: Request,
  res: Response,
  next: NextFunction
): void => {
  if (res.headersSent) {
    next(err);
    return;
  }

  const body = buildErrorResponse(err, {
    path: req.originalUrl,
    method: req.method,
    requestId: req.requestId,
    includeStack: appConfig.env === 'development'
  });

  const errorLog = {
    requestId: req.requestId,
    method: req.method,
    url: req.originalUrl,
    statusCode: body.error.status,
    code: body.error.code,
    message: getErrorMessage(err),
    stack: err instanceof Error ? err.stack : undefined
  };

  if (body.error.status >= 500) {
    loggers.api.error('Server Error', errorLog);
  } else {
    loggers.api.warn('Client Error', errorLog);
  }

  res.status(body.error.status).json(body);
};

export const notFoundHandler = (req: Request, _res: Response, next: NextFunction): void => {
  next(new NotFoundError(`Route ${req.originalUrl} not found`));
};

export const asyncHandler = (
  fn: (req: Request, res: Response, next: NextFunction) => Promise<void>
) => {
  return (req: Request, res: Response, next: NextFunction): void => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
};
