/**
 * Detection Parser
 * Validates raw detector output and partitions it into walls, doors and windows
 */

import {
  DetectionResult,
  ElementClass,
  ParsedDetection,
  Rect,
  Rectangle
} from '../../types/floor-plan.types';
import { describeZodError, zodSchemas } from '../../utils/validators';
import { ValidationError } from '../../utils/errors';
import { loggers } from '../../utils/logger';

const MISSING_LABEL = '<missing>';

const ELEMENT_CLASSES: ReadonlyMap<string, ElementClass> = new Map(
  Object.values(ElementClass).map(value => [value, value])
);

/**
 * Map a detector label onto an element class. Unknown labels yield null.
 */
export const parseElementClass = (label: string | null | undefined): ElementClass | null => {
  if (label === null || label === undefined) return null;
  return ELEMENT_CLASSES.get(label) ?? null;
};

export const createRectangle = (rect: Rect, elementClass: ElementClass): Rectangle => {
  const { x1, y1, x2, y2 } = rect;
  return Object.freeze({
    x1,
    y1,
    x2,
    y2,
    elementClass,
    width: Math.abs(x2 - x1),
    height: Math.abs(y2 - y1),
    center: { x: (x1 + x2) / 2, y: (y1 + y2) / 2 }
  });
};

const isDetectorForm = (input: object): boolean => 'points' in input || 'classes' in input;

/**
 * Normalize either accepted wire form into a DetectionResult.
 */
export const toDetectionResult = (input: unknown): DetectionResult => {
  if (typeof input !== 'object' || input === null) {
    throw new ValidationError('Detection result must be an object');
  }

  if (isDetectorForm(input)) {
    const parsed = zodSchemas.detectorPayload.safeParse(input);
    if (!parsed.success) {
      throw new ValidationError('Invalid detection result', describeZodError(parsed.error));
    }

    const { points, classes, Width, Height, averageDoor } = parsed.data;
    if (points.length !== classes.length) {
      throw new ValidationError(
        `Detection lists are misaligned: ${points.length} rectangles but ${classes.length} labels`,
        { points: points.length, classes: classes.length }
      );
    }

    return {
      width: Width,
      height: Height,
      elements: points.map((rect, i) => ({ rect, label: classes[i].name ?? null })),
      averageDoor
    };
  }

  const parsed = zodSchemas.elementListPayload.safeParse(input);
  if (!parsed.success) {
    throw new ValidationError('Invalid detection result', describeZodError(parsed.error));
  }

  const { width, height, elements, averageDoor } = parsed.data;
  return {
    width,
    height,
    elements: elements.map(({ rect, label }) => ({ rect, label: label ?? null })),
    averageDoor
  };
};

/**
 * Partition a detection result by element class.
 * Elements with unrecognized labels are dropped and counted per label.
 */
export const parseDetection = (input: unknown): ParsedDetection => {
  const detection = toDetectionResult(input);

  const walls: Rectangle[] = [];
  const doors: Rectangle[] = [];
  const windows: Rectangle[] = [];
  const droppedLabels: Record<string, number> = {};

  for (const { rect, label } of detection.elements) {
    const elementClass = parseElementClass(label);

    switch (elementClass) {
      case ElementClass.WALL:
        walls.push(createRectangle(rect, elementClass));
        break;
      case ElementClass.DOOR:
        doors.push(createRectangle(rect, elementClass));
        break;
      case ElementClass.WINDOW:
        windows.push(createRectangle(rect, elementClass));
        break;
      case null: {
        const key = label ?? MISSING_LABEL;
        droppedLabels[key] = (droppedLabels[key] ?? 0) + 1;
        break;
      }
    }
  }

  const droppedCount = Object.values(droppedLabels).reduce((sum, n) => sum + n, 0);
  if (droppedCount > 0) {
    loggers.detection.warn(`Dropped ${droppedCount} element(s) with unrecognized labels`, { droppedLabels });
  }

  loggers.detection.debug('Detection parsed', {
    width: detection.width,
    height: detection.height,
    walls: walls.length,
    doors: doors.length,
    windows: windows.length
  });

  return {
    walls,
    doors,
    windows,
    width: detection.width,
    height: detection.height,
    droppedLabels,
    ...(detection.averageDoor !== undefined && { averageDoor: detection.averageDoor })
  };
};
