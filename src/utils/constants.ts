import { Color, GenerationConfig } from '../types/floor-plan.types';

export const APP_INFO = {
  NAME: 'Floor Plan Mesh API',
  VERSION: '1.0.0',
  DESCRIPTION: 'Converts floor plan detections into glTF 2.0 building meshes',
  API_PREFIX: '/api',
} as const;

/**
 * Every floor plan is normalized into a square of this many world units
 */
export const WORLD_FOOTPRINT = 10.0;

export const DEFAULT_GENERATION_CONFIG: Readonly<GenerationConfig> = Object.freeze({
  wall_height: 3.0,
  wall_thickness: 0.15,
  door_height: 2.1,
  window_height: 1.2,
  window_sill_height: 0.9,
});

/**
 * Upper bounds on caller-supplied numbers. Anything larger could overflow
 * float32 once scaled into world units.
 */
export const INPUT_LIMITS = {
  MAX_ABS_COORDINATE: 1e7,
  MAX_CONFIG_LENGTH: 1e4,
} as const;

export const ELEMENT_COLORS: Readonly<Record<'floor' | 'ceiling' | 'wall' | 'door' | 'window', Color>> = {
  floor: [0.6, 0.6, 0.6],
  ceiling: [0.95, 0.95, 0.95],
  wall: [0.95, 0.95, 0.95],
  door: [0.4, 0.25, 0.1],
  window: [0.3, 0.6, 0.9],
};

export const GLTF = {
  VERSION: '2.0',
  DEFAULT_GENERATOR: 'FloorPlanTo3D-API',
  BYTES_PER_COMPONENT: 4,
  MAX_UINT32: 0xffffffff,
  GLB_MAGIC: 0x46546c67,
  GLB_VERSION: 2,
  CHUNK_JSON: 0x4e4f534a,
  CHUNK_BIN: 0x004e4942,
  DATA_URI_PREFIX: 'data:application/octet-stream;base64,',
  MIME_TYPE_GLB: 'model/gltf-binary',
} as const;

export const FILE_UPLOAD = {
  FIELD_NAME: 'image',
  ALLOWED_IMAGE_TYPES: [
    'image/jpeg',
    'image/jpg',
    'image/png',
    'image/bmp',
    'image/webp',
  ],
} as const;

export const PERFORMANCE = {
  SLOW_GENERATION_MS: 500,
  SLOW_REQUEST_MS: 3000,
} as const;
