/**
 * Floor Plan 3D Service
 * Detection result in, glTF document + binary buffer + summary out
 */

import { GenerationConfig, GenerationDiagnostics, ModelMetadata } from '../types/floor-plan.types';
import { GltfDocument } from '../types/gltf.types';
import { appConfig } from '../config/app.config';
import { PERFORMANCE } from '../utils/constants';
import { loggers } from '../utils/logger';
import { parseDetection } from './geometry/detection-parser';
import { DegeneratePolicy, FloorPlanMeshBuilder } from './3d/mesh-builder';
import { GltfExportService } from './3d/gltf-export.service';

export interface GenerationResult {
  gltf: GltfDocument;
  buffer: Buffer;
  metadata: ModelMetadata;
  diagnostics: GenerationDiagnostics;
}

export interface FloorPlan3DServiceOptions {
  generator?: string;
  degeneratePolicy?: DegeneratePolicy;
}

export class FloorPlan3DService {
  private readonly exporter: GltfExportService;
  private readonly degeneratePolicy: DegeneratePolicy;

  constructor(options: FloorPlan3DServiceOptions = {}) {
    this.exporter = new GltfExportService({ generator: options.generator });
    this.degeneratePolicy = options.degeneratePolicy ?? 'skip';
  }

  /**
   * Run the full pipeline. Synchronous; a fresh builder is created per call so
   * concurrent requests never share geometry state.
   */
  generate(detection: unknown, config: Partial<GenerationConfig> = {}): GenerationResult {
    const startTime = Date.now();

    const parsed = parseDetection(detection);
    const builder = new FloorPlanMeshBuilder(config, { degeneratePolicy: this.degeneratePolicy });
    const { mesh, counts, diagnostics } = builder.build(parsed);

    const { gltf, buffer, metadata } = this.exporter.export(mesh, {
      wall_height: builder.settings.wall_height,
      wall_thickness: builder.settings.wall_thickness,
      num_walls: counts.walls,
      num_doors: counts.doors,
      num_windows: counts.windows
    });

    loggers.geometry.info('3D model generated', {
      ...metadata,
      bufferBytes: buffer.byteLength,
      droppedLabels: diagnostics.droppedLabels,
      skippedElements: diagnostics.skippedElements.length,
      wallsWithOpenings: diagnostics.openingOverlaps.length
    });
    loggers.performance.measure('3D generation', startTime, PERFORMANCE.SLOW_GENERATION_MS);

    return { gltf, buffer, metadata, diagnostics };
  }
}

// Export singleton
export const floorPlan3DService = new FloorPlan3DService({ generator: appConfig.gltf.generator });
