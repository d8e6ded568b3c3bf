// ========================================
// FLOOR PLAN MESH BUILDER - mesh-builder.ts
// Floor, ceiling, wall prisms and opening panels
// ========================================

import {
  ElementClass,
  Face,
  GeneratedMesh,
  GenerationConfig,
  ParsedDetection,
  Rectangle,
  SkippedElement,
  Vec3,
  WallOpeningOverlap,
  WorldScale
} from '../../types/floor-plan.types';
import { DEFAULT_GENERATION_CONFIG, ELEMENT_COLORS } from '../../utils/constants';
import { GeometryError, ValidationError } from '../../utils/errors';
import { describeZodError, zodSchemas } from '../../utils/validators';
import { loggers } from '../../utils/logger';
import { findWallOpenings, getOrientation } from '../geometry/opening-classifier';
import { resolveScale } from '../geometry/scale-resolver';
import { MeshBuffer } from './mesh-buffer';

export type DegeneratePolicy = 'skip' | 'throw';

export interface MeshBuilderOptions {
  degeneratePolicy?: DegeneratePolicy;
}

// Front quad 0-3, back quad 4-7; each quad is bottom-left, bottom-right, top-right, top-left
const WALL_FACES: readonly Face[] = [
  // Front
  [0, 1, 2], [0, 2, 3],
  // Back
  [5, 4, 7], [5, 7, 6],
  // Left
  [4, 0, 3], [4, 3, 7],
  // Right
  [1, 5, 6], [1, 6, 2],
  // Top
  [3, 2, 6], [3, 6, 7]
];

// Second pair is reverse-wound so the panel shows from both sides
const PANEL_FACES: readonly Face[] = [
  [0, 1, 2], [0, 2, 3],
  [1, 0, 3], [1, 3, 2]
];

const FLOOR_FACES: readonly Face[] = [[0, 1, 2], [0, 2, 3]];
const CEILING_FACES: readonly Face[] = [[0, 2, 1], [0, 3, 2]];

/**
 * A rectangle with no width or no height cannot form a panel or a prism footprint.
 */
export const checkDegenerate = (rect: Rectangle, index: number): GeometryError | null => {
  if (rect.width > 0 && rect.height > 0) return null;
  return new GeometryError(
    `Degenerate ${rect.elementClass} #${index}: ${rect.width}x${rect.height} px`,
    { elementClass: rect.elementClass, index, width: rect.width, height: rect.height }
  );
};

/**
 * Merge per-call overrides onto the defaults. Heights and thickness must be
 * positive, the sill may sit on the floor.
 */
export const resolveGenerationConfig = (config: Partial<GenerationConfig> = {}): Readonly<GenerationConfig> => {
  const parsed = zodSchemas.generationConfig.safeParse(config);
  if (!parsed.success) {
    throw new ValidationError('Invalid generation config', describeZodError(parsed.error));
  }

  const overrides = parsed.data;
  return Object.freeze({
    wall_height: overrides.wall_height ?? DEFAULT_GENERATION_CONFIG.wall_height,
    wall_thickness: overrides.wall_thickness ?? DEFAULT_GENERATION_CONFIG.wall_thickness,
    door_height: overrides.door_height ?? DEFAULT_GENERATION_CONFIG.door_height,
    window_height: overrides.window_height ?? DEFAULT_GENERATION_CONFIG.window_height,
    window_sill_height: overrides.window_sill_height ?? DEFAULT_GENERATION_CONFIG.window_sill_height
  });
};

export class FloorPlanMeshBuilder {
  private readonly config: Readonly<GenerationConfig>;
  private readonly degeneratePolicy: DegeneratePolicy;

  constructor(config: Partial<GenerationConfig> = {}, options: MeshBuilderOptions = {}) {
    this.config = resolveGenerationConfig(config);
    this.degeneratePolicy = options.degeneratePolicy ?? 'skip';
  }

  get settings(): Readonly<GenerationConfig> {
    return this.config;
  }

  /**
   * Build the full building mesh. Each call owns a fresh MeshBuffer.
   */
  build(detection: ParsedDetection): GeneratedMesh {
    const { walls, doors, windows, width, height } = detection;
    const scale = resolveScale(width, height);
    const buffer = new MeshBuffer();
    const skippedElements: SkippedElement[] = [];
    const openingOverlaps: WallOpeningOverlap[] = [];

    const usable = (rects: readonly Rectangle[]): Array<[Rectangle, number]> =>
      rects.flatMap((rect, index): Array<[Rectangle, number]> => {
        const problem = checkDegenerate(rect, index);
        if (!problem) return [[rect, index]];
        if (this.degeneratePolicy === 'throw') throw problem;

        loggers.geometry.warn(`Skipping element: ${problem.message}`);
        skippedElements.push({ elementClass: rect.elementClass, index, reason: problem.message });
        return [];
      });

    const usableWalls = usable(walls);
    const usableDoors = usable(doors);
    const usableWindows = usable(windows);

    this.addFloor(buffer, scale, width, height);

    for (const [wall, index] of usableWalls) {
      const overlap = findWallOpenings(wall, index, doors, windows);
      if (overlap.doors.length > 0 || overlap.windows.length > 0) {
        openingOverlaps.push(overlap);
      }
      this.addWall(buffer, wall, scale);
    }

    for (const [door] of usableDoors) {
      this.addOpening(buffer, door, scale);
    }
    for (const [window] of usableWindows) {
      this.addOpening(buffer, window, scale);
    }

    this.addCeiling(buffer, scale, width, height);

    const mesh = buffer.snapshot();

    loggers.geometry.info('Mesh generated', {
      vertices: mesh.vertices.length,
      faces: mesh.faces.length,
      walls: usableWalls.length,
      doors: usableDoors.length,
      windows: usableWindows.length,
      skipped: skippedElements.length
    });

    return {
      mesh,
      counts: {
        walls: walls.length,
        doors: doors.length,
        windows: windows.length
      },
      diagnostics: {
        droppedLabels: { ...detection.droppedLabels },
        skippedElements,
        openingOverlaps
      }
    };
  }

  private addFloor(buffer: MeshBuffer, scale: WorldScale, width: number, height: number): void {
    const maxX = width * scale.scaleX;
    const maxZ = height * scale.scaleY;

    buffer.appendBlock({
      vertices: [
        [0, 0, 0],
        [maxX, 0, 0],
        [maxX, 0, maxZ],
        [0, 0, maxZ]
      ],
      normals: [0, 1, 0],
      color: ELEMENT_COLORS.floor,
      faces: FLOOR_FACES
    });
  }

  private addCeiling(buffer: MeshBuffer, scale: WorldScale, width: number, height: number): void {
    const maxX = width * scale.scaleX;
    const maxZ = height * scale.scaleY;
    const y = this.config.wall_height;

    buffer.appendBlock({
      vertices: [
        [0, y, 0],
        [maxX, y, 0],
        [maxX, y, maxZ],
        [0, y, maxZ]
      ],
      normals: [0, -1, 0],
      color: ELEMENT_COLORS.ceiling,
      faces: CEILING_FACES
    });
  }

  /**
   * Rectangular prism around the wall's centerline, thickened across its run.
   */
  private addWall(buffer: MeshBuffer, wall: Rectangle, scale: WorldScale): void {
    const { wall_height: h, wall_thickness: t } = this.config;
    const x1 = wall.x1 * scale.scaleX;
    const z1 = wall.y1 * scale.scaleY;
    const x2 = wall.x2 * scale.scaleX;
    const z2 = wall.y2 * scale.scaleY;

    let vertices: Vec3[];
    let front: Vec3;
    let back: Vec3;

    if (getOrientation(wall) === 'horizontal') {
      // Runs along X, thickness in Z
      const zCenter = (z1 + z2) / 2;
      const zFront = zCenter - t / 2;
      const zBack = zCenter + t / 2;
      vertices = [
        [x1, 0, zFront], [x2, 0, zFront], [x2, h, zFront], [x1, h, zFront],
        [x1, 0, zBack], [x2, 0, zBack], [x2, h, zBack], [x1, h, zBack]
      ];
      front = [0, 0, -1];
      back = [0, 0, 1];
    } else {
      // Runs along Z, thickness in X
      const xCenter = (x1 + x2) / 2;
      const xFront = xCenter - t / 2;
      const xBack = xCenter + t / 2;
      vertices = [
        [xFront, 0, z1], [xFront, 0, z2], [xFront, h, z2], [xFront, h, z1],
        [xBack, 0, z1], [xBack, 0, z2], [xBack, h, z2], [xBack, h, z1]
      ];
      front = [-1, 0, 0];
      back = [1, 0, 0];
    }

    buffer.appendBlock({
      vertices,
      normals: [front, front, front, front, back, back, back, back],
      color: ELEMENT_COLORS.wall,
      faces: WALL_FACES
    });
  }

  /**
   * Double-sided panel on the opening's centerline. Doors stand on the floor,
   * windows start at the sill.
   */
  private addOpening(buffer: MeshBuffer, opening: Rectangle, scale: WorldScale): void {
    const isDoor = opening.elementClass === ElementClass.DOOR;
    const bottom = isDoor ? 0 : this.config.window_sill_height;
    const top = isDoor
      ? this.config.door_height
      : this.config.window_sill_height + this.config.window_height;

    const x1 = opening.x1 * scale.scaleX;
    const z1 = opening.y1 * scale.scaleY;
    const x2 = opening.x2 * scale.scaleX;
    const z2 = opening.y2 * scale.scaleY;

    let vertices: Vec3[];
    let normal: Vec3;

    if (getOrientation(opening) === 'horizontal') {
      const z = (z1 + z2) / 2;
      vertices = [[x1, bottom, z], [x2, bottom, z], [x2, top, z], [x1, top, z]];
      normal = [0, 0, 1];
    } else {
      const x = (x1 + x2) / 2;
      vertices = [[x, bottom, z1], [x, bottom, z2], [x, top, z2], [x, top, z1]];
      normal = [1, 0, 0];
    }

    buffer.appendBlock({
      vertices,
      normals: normal,
      color: isDoor ? ELEMENT_COLORS.door : ELEMENT_COLORS.window,
      faces: PANEL_FACES
    });
  }
}
