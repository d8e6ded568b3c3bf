/**
 * Express Application Configuration
 * Main application setup with all middleware and routes
 */

import express, { Application, Request, Response } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import compression from 'compression';
import morgan from 'morgan';
import rateLimit from 'express-rate-limit';

import { AppConfig, appConfig } from './config/app.config';
import { stream } from './utils/logger';
import { APP_INFO } from './utils/constants';
import { AppError } from './utils/errors';
import { HttpStatus } from './types/api.types';
import { requestLogger } from './middleware/logging.middleware';
import { errorHandler, notFoundHandler } from './middleware/error.middleware';
import floorPlan3DRoutes from './routes/floor-plan-3d.routes';

const isHealthCheck = (req: Request): boolean => req.path === '/health';

/**
 * Create and configure Express application
 */
export const createApp = (config: AppConfig = appConfig): Application => {
  const app: Application = express();

  // Trust proxy - important for deployment behind reverse proxies
  app.set('trust proxy', 1);

  // ============================
  // Security Middleware
  // ============================

  app.use(helmet({
    contentSecurityPolicy: config.isProduction ? undefined : false
  }));

  app.use(cors({
    origin: config.http.corsOrigins === '*' ? true : config.http.corsOrigins,
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'X-Request-ID'],
    exposedHeaders: ['X-Request-ID', 'Content-Disposition', 'RateLimit-Limit', 'RateLimit-Remaining'],
    optionsSuccessStatus: 204
  }));

  app.use(APP_INFO.API_PREFIX, rateLimit({
    windowMs: config.http.rateLimitWindowMs,
    limit: config.http.rateLimitMax,
    standardHeaders: true,
    legacyHeaders: false,
    handler: (_req, _res, next) => {
      next(new AppError(
        'Too many requests from this IP, please try again later.',
        HttpStatus.TOO_MANY_REQUESTS,
        'RATE_LIMITED'
      ));
    }
  }));

  // ============================
  // Request Processing Middleware
  // ============================

  app.use(compression({
    threshold: 1024,
    filter: (req, res) => {
      if (req.headers['x-no-compression']) {
        return false;
      }
      return compression.filter(req, res);
    }
  }));

  app.use(express.json({ limit: config.http.jsonBodyLimit }));

  app.use(requestLogger);

  if (!config.isTest) {
    // HTTP access log through the Winston stream
    app.use(morgan(config.isProduction ? 'combined' : 'dev', {
      skip: isHealthCheck,
      stream
    }));
  }

  // ============================
  // Health & Status Endpoints
  // ============================

  app.get('/health', (_req: Request, res: Response) => {
    res.status(HttpStatus.OK).json({
      status: 'healthy',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      environment: config.env,
      version: APP_INFO.VERSION
    });
  });

  app.get(APP_INFO.API_PREFIX, (_req: Request, res: Response) => {
    res.json({
      name: APP_INFO.NAME,
      version: APP_INFO.VERSION,
      description: APP_INFO.DESCRIPTION,
      endpoints: {
        health: '/health',
        detect: `${APP_INFO.API_PREFIX}/detect`,
        generate3d: `${APP_INFO.API_PREFIX}/generate3d`,
        generateFromDetection: `${APP_INFO.API_PREFIX}/generate3d/from-detection`
      },
      timestamp: new Date().toISOString()
    });
  });

  // ============================
  // API Routes
  // ============================

  app.use(APP_INFO.API_PREFIX, floorPlan3DRoutes);

  // ============================
  // Error Handling
  // ============================

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
};

export default createApp;
