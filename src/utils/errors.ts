import { HttpStatus } from '../types/api.types';

export class AppError extends Error {
  public readonly statusCode: number;
  public readonly isOperational: boolean;
  public readonly code: string;
  public readonly details?: unknown;

  constructor(
    message: string,
    statusCode: number = HttpStatus.INTERNAL_SERVER_ERROR,
    code: string = 'INTERNAL_ERROR',
    isOperational: boolean = true,
    details?: unknown
  ) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.code = code;
    this.isOperational = isOperational;
    this.details = details;

    Object.setPrototypeOf(this, new.target.prototype);
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Malformed input: mismatched lists, bad dimensions, bad scale denominators
 */
export class ValidationError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, HttpStatus.BAD_REQUEST, 'VALIDATION_ERROR', true, details);
  }
}

/**
 * A rectangle that would produce a zero-area or NaN-normal primitive
 */
export class GeometryError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, HttpStatus.UNPROCESSABLE_ENTITY, 'GEOMETRY_ERROR', true, details);
  }
}

/**
 * Buffer sizes or offsets outside what the binary container can address
 */
export class SerializationError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, HttpStatus.INTERNAL_SERVER_ERROR, 'SERIALIZATION_ERROR', true, details);
  }
}

export class DetectionServiceError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, HttpStatus.BAD_GATEWAY, 'DETECTION_SERVICE_ERROR', true, details);
  }
}

export class NotFoundError extends AppError {
  constructor(message: string = 'Resource not found') {
    super(message, HttpStatus.NOT_FOUND, 'ROUTE_NOT_FOUND', true);
  }
}

export const getErrorMessage = (error: unknown): string => {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return 'Unknown error occurred';
};
