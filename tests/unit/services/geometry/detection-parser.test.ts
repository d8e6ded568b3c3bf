import { describe, expect, it } from 'vitest';
import {
  createRectangle,
  parseDetection,
  parseElementClass,
  toDetectionResult
} from '../../../../src/services/geometry/detection-parser';
import { ElementClass } from '../../../../src/types/floor-plan.types';
import { ValidationError } from '../../../../src/utils/errors';
import { detectorPayload } from '../../../helpers/detections';

describe('parseElementClass', () => {
  it('maps the three known labels', () => {
    expect(parseElementClass('wall')).toBe(ElementClass.WALL);
    expect(parseElementClass('door')).toBe(ElementClass.DOOR);
    expect(parseElementClass('window')).toBe(ElementClass.WINDOW);
  });

  it('matches labels exactly', () => {
    expect(parseElementClass('Wall')).toBeNull();
    expect(parseElementClass(' door')).toBeNull();
  });

  it('returns null for missing labels', () => {
    expect(parseElementClass(null)).toBeNull();
    expect(parseElementClass(undefined)).toBeNull();
  });
});

describe('createRectangle', () => {
  it('derives width, height and center', () => {
    const rect = createRectangle({ x1: 10, y1: 20, x2: 40, y2: 30 }, ElementClass.WALL);

    expect(rect.width).toBe(30);
    expect(rect.height).toBe(10);
    expect(rect.center).toEqual({ x: 25, y: 25 });
    expect(rect.elementClass).toBe(ElementClass.WALL);
  });

  it('uses absolute extents for reversed corners', () => {
    const rect = createRectangle({ x1: 40, y1: 30, x2: 10, y2: 20 }, ElementClass.DOOR);

    expect(rect.width).toBe(30);
    expect(rect.height).toBe(10);
  });
});

describe('toDetectionResult', () => {
  it('normalizes the detector form', () => {
    const result = toDetectionResult(detectorPayload(200, 100, [[0, 0, 50, 5, 'wall']], 12.5));

    expect(result).toEqual({
      width: 200,
      height: 100,
      elements: [{ rect: { x1: 0, y1: 0, x2: 50, y2: 5 }, label: 'wall' }],
      averageDoor: 12.5
    });
  });

  it('normalizes the element list form', () => {
    const result = toDetectionResult({
      width: 64,
      height: 32,
      elements: [{ rect: { x1: 1, y1: 2, x2: 3, y2: 4 }, label: 'door' }, { rect: { x1: 0, y1: 0, x2: 1, y2: 1 } }]
    });

    expect(result.elements).toEqual([
      { rect: { x1: 1, y1: 2, x2: 3, y2: 4 }, label: 'door' },
      { rect: { x1: 0, y1: 0, x2: 1, y2: 1 }, label: null }
    ]);
  });

  it('rejects misaligned rectangle and label lists', () => {
    const payload = {
      points: [{ x1: 0, y1: 0, x2: 1, y2: 1 }, { x1: 2, y1: 2, x2: 3, y2: 3 }],
      classes: [{ name: 'wall' }],
      Width: 10,
      Height: 10
    };

    let caught: unknown;
    try {
      toDetectionResult(payload);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ValidationError);
    expect(caught).toMatchObject({
      message: 'Detection lists are misaligned: 2 rectangles but 1 labels',
      details: { points: 2, classes: 1 }
    });
  });

  it('rejects non-object input', () => {
    expect(() => toDetectionResult('wall')).toThrow('Detection result must be an object');
    expect(() => toDetectionResult(null)).toThrow(ValidationError);
  });

  it.each([
    ['zero width', detectorPayload(0, 10, [])],
    ['negative height', detectorPayload(10, -5, [])],
    ['fractional width', detectorPayload(10.5, 10, [])]
  ])('rejects %s', (_name, payload) => {
    expect(() => toDetectionResult(payload)).toThrow('Invalid detection result');
  });

  it('rejects non-finite coordinates', () => {
    const payload = detectorPayload(10, 10, [[0, 0, Number.POSITIVE_INFINITY, 1, 'wall']]);
    expect(() => toDetectionResult(payload)).toThrow(ValidationError);
  });

  it('rejects coordinates too large to place in the model', () => {
    const payload = detectorPayload(10, 10, [[0, 4, 1e39, 6, 'wall']]);
    let caught: unknown;
    try {
      toDetectionResult(payload);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ValidationError);
    expect(caught).toMatchObject({
      details: [{ field: 'points.0.x2', message: 'Coordinates must be within ±10000000 px', type: 'too_big' }]
    });
    expect(() => toDetectionResult(detectorPayload(10, 10, [[-1e7, 0, 1e7, 1, 'wall']]))).not.toThrow();
  });
});

describe('parseDetection', () => {
  it('partitions elements by class in input order', () => {
    const parsed = parseDetection(detectorPayload(100, 100, [
      [0, 0, 100, 10, 'wall'],
      [40, 0, 60, 10, 'door'],
      [0, 0, 10, 100, 'wall'],
      [0, 40, 10, 60, 'window']
    ]));

    expect(parsed.width).toBe(100);
    expect(parsed.height).toBe(100);
    expect(parsed.walls.map(w => [w.x1, w.y1, w.x2, w.y2])).toEqual([[0, 0, 100, 10], [0, 0, 10, 100]]);
    expect(parsed.doors).toHaveLength(1);
    expect(parsed.windows).toHaveLength(1);
    expect(parsed.droppedLabels).toEqual({});
  });

  it('drops and counts unrecognized or missing labels', () => {
    const parsed = parseDetection(detectorPayload(100, 100, [
      [0, 0, 100, 10, 'wall'],
      [5, 5, 6, 6, 'stairs'],
      [7, 7, 8, 8, 'stairs'],
      [1, 1, 2, 2, 'Wall'],
      [3, 3, 4, 4]
    ]));

    expect(parsed.walls).toHaveLength(1);
    expect(parsed.droppedLabels).toEqual({ stairs: 2, Wall: 1, '<missing>': 1 });
  });

  it('keeps averageDoor only when the detector sent one', () => {
    expect(parseDetection(detectorPayload(10, 10, [], 7)).averageDoor).toBe(7);
    expect('averageDoor' in parseDetection(detectorPayload(10, 10, []))).toBe(false);
  });
});
