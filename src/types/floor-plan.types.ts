/**
 * Floor Plan Type Definitions
 * Detection input, generation settings and mesh data for 2D to 3D conversion
 */

/**
 * Element classes the detector can report
 */
export enum ElementClass {
  WALL = 'wall',
  DOOR = 'door',
  WINDOW = 'window'
}

export type Orientation = 'horizontal' | 'vertical';

export interface Point2D {
  x: number;
  y: number;
}

/**
 * Axis-aligned bounding box in pixel space
 */
export interface Rect {
  x1: number;
  y1: number;
  x2: number;
  y2: number;
}

/**
 * A classified detection. `width`, `height` and `center` are derived from the corners.
 */
export interface Rectangle extends Rect {
  readonly elementClass: ElementClass;
  readonly width: number;
  readonly height: number;
  readonly center: Point2D;
}

/**
 * Normalized detection result after boundary validation
 */
export interface DetectionResult {
  width: number;
  height: number;
  elements: Array<{ rect: Rect; label: string | null }>;
  averageDoor?: number;
}

/**
 * Detection partitioned by element class
 */
export interface ParsedDetection {
  walls: Rectangle[];
  doors: Rectangle[];
  windows: Rectangle[];
  width: number;
  height: number;
  droppedLabels: Record<string, number>;
  averageDoor?: number;
}

export interface WorldScale {
  scaleX: number;
  scaleY: number;
}

/**
 * Architectural parameters for one generation call (meters)
 */
export interface GenerationConfig {
  wall_height: number;
  wall_thickness: number;
  door_height: number;
  window_height: number;
  window_sill_height: number;
}

export type Vec3 = readonly [number, number, number];
export type Face = readonly [number, number, number];
export type Color = readonly [number, number, number];

/**
 * Immutable mesh produced by one generation call.
 * vertices, normals and colors are index-aligned.
 */
export interface MeshData {
  readonly vertices: readonly Vec3[];
  readonly normals: readonly Vec3[];
  readonly colors: readonly Color[];
  readonly faces: readonly Face[];
}

/**
 * Element skipped because it would produce a zero-area primitive
 */
export interface SkippedElement {
  elementClass: ElementClass;
  index: number;
  reason: string;
}

export interface WallOpeningOverlap {
  wallIndex: number;
  doors: number[];
  windows: number[];
}

export interface GenerationDiagnostics {
  droppedLabels: Record<string, number>;
  skippedElements: SkippedElement[];
  openingOverlaps: WallOpeningOverlap[];
}

/**
 * Summary reported with every exported model
 */
export interface ModelMetadata {
  wall_height: number;
  wall_thickness: number;
  num_vertices: number;
  num_faces: number;
  num_walls: number;
  num_doors: number;
  num_windows: number;
}

export interface GeneratedMesh {
  mesh: MeshData;
  counts: {
    walls: number;
    doors: number;
    windows: number;
  };
  diagnostics: GenerationDiagnostics;
}
