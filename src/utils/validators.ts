import { z, ZodError } from 'zod';
import Joi from 'joi';
import { ModelFormat } from '../types/api.types';
import { INPUT_LIMITS } from './constants';

const coordinate = z.number()
  .finite()
  .min(-INPUT_LIMITS.MAX_ABS_COORDINATE, `Coordinates must be within ±${INPUT_LIMITS.MAX_ABS_COORDINATE} px`)
  .max(INPUT_LIMITS.MAX_ABS_COORDINATE, `Coordinates must be within ±${INPUT_LIMITS.MAX_ABS_COORDINATE} px`);

const length = z.number().finite().max(INPUT_LIMITS.MAX_CONFIG_LENGTH);

const dimension = z.number()
  .int('Image dimensions must be integers')
  .positive('Image dimensions must be greater than zero');

export const zodSchemas = {
  rect: z.object({
    x1: coordinate,
    y1: coordinate,
    x2: coordinate,
    y2: coordinate,
  }),

  // Payload shape emitted by the detection service
  detectorPayload: z.object({
    points: z.array(z.object({
      x1: coordinate,
      y1: coordinate,
      x2: coordinate,
      y2: coordinate,
    })),
    classes: z.array(z.object({
      name: z.string().optional(),
    }).passthrough()),
    Width: dimension,
    Height: dimension,
    averageDoor: z.number().finite().optional(),
  }).passthrough(),

  elementListPayload: z.object({
    width: dimension,
    height: dimension,
    elements: z.array(z.object({
      rect: z.object({
        x1: coordinate,
        y1: coordinate,
        x2: coordinate,
        y2: coordinate,
      }),
      label: z.string().nullable().optional(),
    })),
    averageDoor: z.number().finite().optional(),
  }),

  generationConfig: z.object({
    wall_height: length.positive().optional(),
    wall_thickness: length.positive().optional(),
    door_height: length.positive().optional(),
    window_height: length.positive().optional(),
    window_sill_height: length.min(0).optional(),
  }).strict(),
};

export const generateFromDetectionSchema = z.object({
  detection: z.unknown().refine(value => value !== undefined, { message: 'detection is required' }),
  options: zodSchemas.generationConfig.optional(),
});

export type GenerateFromDetectionBody = z.infer<typeof generateFromDetectionSchema>;
export type GenerationConfigInput = z.infer<typeof zodSchemas.generationConfig>;

/**
 * Multipart form fields arrive as strings; Joi converts them.
 */
export const joiSchemas = {
  generationForm: Joi.object({
    wall_height: Joi.number().positive().max(INPUT_LIMITS.MAX_CONFIG_LENGTH),
    wall_thickness: Joi.number().positive().max(INPUT_LIMITS.MAX_CONFIG_LENGTH),
    door_height: Joi.number().positive().max(INPUT_LIMITS.MAX_CONFIG_LENGTH),
    window_height: Joi.number().positive().max(INPUT_LIMITS.MAX_CONFIG_LENGTH),
    window_sill_height: Joi.number().min(0).max(INPUT_LIMITS.MAX_CONFIG_LENGTH),
  }),

  formatQuery: Joi.object({
    format: Joi.string().valid(...Object.values(ModelFormat)).default(ModelFormat.GLTF),
  }),
};

export interface FieldError {
  field: string;
  message: string;
  type: string;
}

export const describeZodError = (error: ZodError): FieldError[] =>
  error.issues.map(issue => ({
    field: issue.path.join('.'),
    message: issue.message,
    type: issue.code
  }));
