/**
 * API Type Definitions
 * Request and response shapes for the generation endpoints
 */

import { GltfDocument } from './gltf.types';
import { GenerationDiagnostics, ModelMetadata } from './floor-plan.types';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE' | 'OPTIONS' | 'HEAD';

/**
 * HTTP status codes used by the API
 */
export enum HttpStatus {
  OK = 200,
  BAD_REQUEST = 400,
  NOT_FOUND = 404,
  PAYLOAD_TOO_LARGE = 413,
  UNSUPPORTED_MEDIA_TYPE = 415,
  UNPROCESSABLE_ENTITY = 422,
  TOO_MANY_REQUESTS = 429,
  INTERNAL_SERVER_ERROR = 500,
  BAD_GATEWAY = 502
}

/**
 * Output formats for a generated model
 */
export enum ModelFormat {
  GLTF = 'gltf',
  GLB = 'glb'
}

/**
 * Raw payload returned by the detection service
 */
export interface DetectorPayload {
  points: Array<{ x1: number; y1: number; x2: number; y2: number }>;
  classes: Array<{ name?: string }>;
  Width: number;
  Height: number;
  averageDoor?: number;
}

export interface ApiError {
  code: string;
  message: string;
  status: number;
  timestamp: string;
  path?: string;
  method?: HttpMethod;
  requestId?: string;
  details?: unknown;
  stack?: string;
}

export interface ApiErrorResponse {
  success: false;
  error: ApiError;
}

export interface DetectResponse {
  success: true;
  detection: unknown;
  requestId?: string;
}

export interface Generate3DResponse {
  success: true;
  detection: unknown;
  gltf: GltfDocument;
  metadata: ModelMetadata;
  diagnostics: GenerationDiagnostics;
  requestId?: string;
}
