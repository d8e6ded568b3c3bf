/**
 * Application Configuration
 * Environment-driven settings, validated once at startup
 */

import dotenv from 'dotenv';
import { z } from 'zod';
import { GLTF } from '../utils/constants';

// Load environment variables
dotenv.config();

export const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().min(0).max(65535).default(4000),
  HOST: z.string().default('0.0.0.0'),
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']).default('info'),
  LOG_DIR: z.string().default('./logs'),
  DISABLE_FILE_LOGGING: z.enum(['true', 'false']).default('false'),
  DETECTOR_URL: z.string().url().default('http://127.0.0.1:5000/'),
  DETECTOR_TIMEOUT_MS: z.coerce.number().int().positive().default(60000),
  MAX_UPLOAD_BYTES: z.coerce.number().int().positive().default(20 * 1024 * 1024),
  JSON_BODY_LIMIT: z.string().default('5mb'),
  CORS_ORIGINS: z.string().default('*'),
  RATE_LIMIT_WINDOW_MS: z.coerce.number().int().positive().default(15 * 60 * 1000),
  RATE_LIMIT_MAX: z.coerce.number().int().positive().default(100),
  GLTF_GENERATOR: z.string().min(1).default(GLTF.DEFAULT_GENERATOR),
});

export type Environment = z.infer<typeof envSchema>;

export interface AppConfig {
  env: Environment['NODE_ENV'];
  isProduction: boolean;
  isTest: boolean;
  port: number;
  host: string;
  logging: {
    level: Environment['LOG_LEVEL'];
    dir: string;
    fileLogging: boolean;
  };
  detector: {
    url: string;
    timeoutMs: number;
  };
  upload: {
    maxBytes: number;
  };
  http: {
    jsonBodyLimit: string;
    corsOrigins: string[] | '*';
    rateLimitWindowMs: number;
    rateLimitMax: number;
  };
  gltf: {
    generator: string;
  };
}

/**
 * Build the config from an environment map. Throws on invalid values.
 */
export const loadConfig = (source: NodeJS.ProcessEnv = process.env): AppConfig => {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid environment configuration: ${issues}`);
  }

  const env = parsed.data;
  const origins = env.CORS_ORIGINS.trim();

  return {
    env: env.NODE_ENV,
    isProduction: env.NODE_ENV === 'production',
    isTest: env.NODE_ENV === 'test',
    port: env.PORT,
    host: env.HOST,
    logging: {
      level: env.LOG_LEVEL,
      dir: env.LOG_DIR,
      fileLogging: env.DISABLE_FILE_LOGGING !== 'true' && env.NODE_ENV !== 'test',
    },
    detector: {
      url: env.DETECTOR_URL,
      timeoutMs: env.DETECTOR_TIMEOUT_MS,
    },
    upload: {
      maxBytes: env.MAX_UPLOAD_BYTES,
    },
    http: {
      jsonBodyLimit: env.JSON_BODY_LIMIT,
      corsOrigins: origins === '*' ? '*' : origins.split(',').map(o => o.trim()).filter(Boolean),
      rateLimitWindowMs: env.RATE_LIMIT_WINDOW_MS,
      rateLimitMax: env.RATE_LIMIT_MAX,
    },
    gltf: {
      generator: env.GLTF_GENERATOR,
    },
  };
};

export const appConfig = loadConfig();
