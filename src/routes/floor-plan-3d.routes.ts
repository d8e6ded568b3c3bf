/**
 * API Routes for 2D to 3D Floor Plan Conversion
 */

import { Router } from 'express';
import multer from 'multer';
import { appConfig } from '../config/app.config';
import { HttpStatus } from '../types/api.types';
import { FILE_UPLOAD } from '../utils/constants';
import { AppError } from '../utils/errors';
import { generateFromDetectionSchema, joiSchemas } from '../utils/validators';
import { asyncHandler } from '../middleware/error.middleware';
import { uploadLogger } from '../middleware/logging.middleware';
import { validate } from '../middleware/validation.middleware';
import { floorPlan3DController } from '../controllers/floor-plan-3d.controller';

const ALLOWED_MIME_TYPES: readonly string[] = FILE_UPLOAD.ALLOWED_IMAGE_TYPES;

// Images stay in memory; they are forwarded to the detector and never written to disk
const upload = multer({
  storage: multer.memoryStorage(),
  limits: {
    fileSize: appConfig.upload.maxBytes,
    files: 1
  },
  fileFilter: (_req, file, cb) => {
    if (ALLOWED_MIME_TYPES.includes(file.mimetype)) {
      cb(null, true);
      return;
    }
    cb(new AppError(
      `Unsupported image type: ${file.mimetype}`,
      HttpStatus.UNSUPPORTED_MEDIA_TYPE,
      'UNSUPPORTED_MEDIA_TYPE',
      true,
      { allowed: ALLOWED_MIME_TYPES }
    ));
  }
});

const router = Router();

/**
 * POST /api/detect
 * Run detection on an uploaded image and return the raw detector result
 */
router.post(
  '/detect',
  upload.single(FILE_UPLOAD.FIELD_NAME),
  uploadLogger,
  asyncHandler(floorPlan3DController.detect)
);

/**
 * POST /api/generate3d
 * Detect elements in an uploaded floor plan image and build its 3D model
 */
router.post(
  '/generate3d',
  upload.single(FILE_UPLOAD.FIELD_NAME),
  uploadLogger,
  validate(joiSchemas.generationForm, 'body'),
  validate(joiSchemas.formatQuery, 'query'),
  asyncHandler(floorPlan3DController.generateFromImage)
);

/**
 * POST /api/generate3d/from-detection
 * Build a 3D model from a detection result supplied by the caller
 */
router.post(
  '/generate3d/from-detection',
  validate(generateFromDetectionSchema, 'body'),
  validate(joiSchemas.formatQuery, 'query'),
  asyncHandler(floorPlan3DController.generateFromDetection)
);

export default router;
