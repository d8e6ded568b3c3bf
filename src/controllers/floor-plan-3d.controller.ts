import { Request, Response } from 'express';
import { DetectResponse, Generate3DResponse, HttpStatus, ModelFormat } from '../types/api.types';
import { GenerationConfig } from '../types/floor-plan.types';
import { FILE_UPLOAD, GLTF } from '../utils/constants';
import { ValidationError } from '../utils/errors';
import { GenerateFromDetectionBody, GenerationConfigInput } from '../utils/validators';
import { getValidated } from '../middleware/validation.middleware';
import { loggers } from '../utils/logger';
import { FloorPlan3DService, GenerationResult, floorPlan3DService } from '../services/floor-plan-3d.service';
import { DetectionClient, detectionClient } from '../services/detection-client.service';
import { embedBufferAsDataUri, packGlb } from '../services/3d/gltf-packaging';

export const GLB_FILENAME = 'floor-plan.glb';

export type RenderedModel =
  | { kind: 'glb'; body: Buffer; filename: string }
  | { kind: 'json'; body: Generate3DResponse };

/**
 * Shape a generation result for the wire: a GLB attachment or a JSON
 * envelope with the buffer embedded in the document.
 */
export const renderModel = (
  result: GenerationResult,
  detection: unknown,
  format: ModelFormat,
  requestId?: string
): RenderedModel => {
  if (format === ModelFormat.GLB) {
    return { kind: 'glb', body: packGlb(result.gltf, result.buffer), filename: GLB_FILENAME };
  }

  return {
    kind: 'json',
    body: {
      success: true,
      detection,
      gltf: embedBufferAsDataUri(result.gltf, result.buffer),
      metadata: result.metadata,
      diagnostics: result.diagnostics,
      requestId
    }
  };
};

const requireImage = (req: Request): Express.Multer.File => {
  if (!req.file) {
    throw new ValidationError(`No image uploaded; expected multipart field "${FILE_UPLOAD.FIELD_NAME}"`);
  }
  return req.file;
};

export class FloorPlan3DController {
  constructor(
    private readonly service: FloorPlan3DService = floorPlan3DService,
    private readonly detector: DetectionClient = detectionClient
  ) {}

  /**
   * POST /api/detect
   * Detector output only, no geometry
   */
  detect = async (req: Request, res: Response): Promise<void> => {
    const image = requireImage(req);
    const detection = await this.detector.detect(image.buffer, image.originalname, image.mimetype);

    loggers.api.info('Detection returned', { requestId: req.requestId, filename: image.originalname });

    const body: DetectResponse = { success: true, detection, requestId: req.requestId };
    res.status(HttpStatus.OK).json(body);
  };

  /**
   * POST /api/generate3d
   */
  generateFromImage = async (req: Request, res: Response): Promise<void> => {
    const image = requireImage(req);
    const options = getValidated<GenerationConfigInput>(res, 'body') ?? {};
    const detection = await this.detector.detect(image.buffer, image.originalname, image.mimetype);

    this.respond(req, res, detection, options);
  };

  /**
   * POST /api/generate3d/from-detection
   */
  generateFromDetection = async (req: Request, res: Response): Promise<void> => {
    const body = getValidated<GenerateFromDetectionBody>(res, 'body');
    if (!body) {
      throw new ValidationError('Request body is required');
    }

    this.respond(req, res, body.detection, body.options ?? {});
  };

  private respond(
    req: Request,
    res: Response,
    detection: unknown,
    options: Partial<GenerationConfig>
  ): void {
    const query = getValidated<{ format?: ModelFormat }>(res, 'query');
    const format = query?.format ?? ModelFormat.GLTF;

    const result = this.service.generate(detection, options);
    const rendered = renderModel(result, detection, format, req.requestId);

    loggers.api.info('Model generated', {
      requestId: req.requestId,
      format,
      vertices: result.metadata.num_vertices,
      faces: result.metadata.num_faces
    });

    if (rendered.kind === 'glb') {
      res.setHeader('Content-Type', GLTF.MIME_TYPE_GLB);
      res.setHeader('Content-Disposition', `attachment; filename="${rendered.filename}"`);
      res.status(HttpStatus.OK).send(rendered.body);
      return;
    }

    res.status(HttpStatus.OK).json(rendered.body);
  }
}

export const floorPlan3DController = new FloorPlan3DController();
