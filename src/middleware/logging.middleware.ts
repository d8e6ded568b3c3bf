/**
 * Logging Middleware
 * Request/Response logging and monitoring
 */

import { Request, Response, NextFunction } from 'express';
import { v4 as uuidv4 } from 'uuid';
import { loggers } from '../utils/logger';
import { PERFORMANCE } from '../utils/constants';

// Extend Express Request to add logging properties
declare global {
  namespace Express {
    interface Request {
      startTime?: number;
      requestId?: string;
    }
  }
}

const REQUEST_ID_HEADER = 'x-request-id';

const resolveRequestId = (req: Request): string => {
  const header = req.get(REQUEST_ID_HEADER);
  return header && header.trim().length > 0 ? header.trim() : uuidv4();
};

/**
 * Request logging middleware
 */
export const requestLogger = (req: Request, res: Response, next: NextFunction): void => {
  req.startTime = Date.now();
  req.requestId = resolveRequestId(req);
  res.setHeader(REQUEST_ID_HEADER, req.requestId);

  // Skip logging for health checks
  if (req.path === '/health') {
    next();
    return;
  }

  loggers.api.info('Incoming request', {
    requestId: req.requestId,
    method: req.method,
    url: req.originalUrl,
    ip: req.ip,
    userAgent: req.get('user-agent'),
    contentType: req.get('content-type')
  });

  res.on('finish', () => {
    const responseTime = req.startTime ? Date.now() - req.startTime : 0;
    const metadata = {
      requestId: req.requestId,
      method: req.method,
      url: req.originalUrl,
      statusCode: res.statusCode,
      responseTime,
      ...(responseTime > PERFORMANCE.SLOW_REQUEST_MS && {
        slowRequest: true,
        threshold: PERFORMANCE.SLOW_REQUEST_MS
      })
    };

    if (res.statusCode >= 500) {
      loggers.api.error('Request completed', metadata);
    } else if (res.statusCode >= 400) {
      loggers.api.warn('Request completed', metadata);
    } else {
      loggers.api.info('Request completed', metadata);
    }
  });

  next();
};

/**
 * Log the uploaded image, if any, before it is handed to the detector
 */
export const uploadLogger = (req: Request, _res: Response, next: NextFunction): void => {
  if (req.file) {
    loggers.api.info('Floor plan image received', {
      requestId: req.requestId,
      filename: req.file.originalname,
      mimetype: req.file.mimetype,
      size: req.file.size,
      sizeMB: (req.file.size / (1024 * 1024)).toFixed(2)
    });
  }

  next();
};
