import { describe, expect, it } from 'vitest';
import { FloorPlanMeshBuilder, resolveGenerationConfig } from '../../../../src/services/3d/mesh-builder';
import { parseDetection } from '../../../../src/services/geometry/detection-parser';
import { ElementClass } from '../../../../src/types/floor-plan.types';
import { DEFAULT_GENERATION_CONFIG, ELEMENT_COLORS } from '../../../../src/utils/constants';
import { GeometryError, ValidationError } from '../../../../src/utils/errors';
import { detectorPayload, unitPlan } from '../../../helpers/detections';

const T = DEFAULT_GENERATION_CONFIG.wall_thickness;

describe('FloorPlanMeshBuilder', () => {
  describe('floor and ceiling', () => {
    it('emits only floor and ceiling for an empty plan', () => {
      const { mesh } = new FloorPlanMeshBuilder().build(parseDetection(unitPlan([])));

      expect(mesh.vertices).toEqual([
        [0, 0, 0], [10, 0, 0], [10, 0, 10], [0, 0, 10],
        [0, 3, 0], [10, 3, 0], [10, 3, 10], [0, 3, 10]
      ]);
      expect(mesh.faces).toEqual([[0, 1, 2], [0, 2, 3], [4, 6, 5], [4, 7, 6]]);
      expect(mesh.normals.slice(0, 4)).toEqual(Array(4).fill([0, 1, 0]));
      expect(mesh.normals.slice(4)).toEqual(Array(4).fill([0, -1, 0]));
      expect(mesh.colors[0]).toEqual(ELEMENT_COLORS.floor);
      expect(mesh.colors[7]).toEqual(ELEMENT_COLORS.ceiling);
    });

    it('normalizes any image size to a ten unit footprint', () => {
      const { mesh } = new FloorPlanMeshBuilder().build(parseDetection(detectorPayload(200, 100, [])));
      const [x, y, z] = mesh.vertices[2];

      expect(x).toBeCloseTo(10, 12);
      expect(y).toBe(0);
      expect(z).toBeCloseTo(10, 12);
    });

    it('raises the ceiling to the configured wall height', () => {
      const { mesh } = new FloorPlanMeshBuilder({ wall_height: 2.5 }).build(parseDetection(unitPlan([])));
      expect(mesh.vertices.slice(4).map(v => v[1])).toEqual([2.5, 2.5, 2.5, 2.5]);
    });
  });

  describe('walls', () => {
    it('thickens a horizontal wall along Z', () => {
      const { mesh } = new FloorPlanMeshBuilder().build(parseDetection(unitPlan([[0, 4, 10, 6, 'wall']])));
      const zFront = 5 - T / 2;
      const zBack = 5 + T / 2;

      expect(mesh.vertices.slice(4, 12)).toEqual([
        [0, 0, zFront], [10, 0, zFront], [10, 3, zFront], [0, 3, zFront],
        [0, 0, zBack], [10, 0, zBack], [10, 3, zBack], [0, 3, zBack]
      ]);
      expect(mesh.normals.slice(4, 8)).toEqual(Array(4).fill([0, 0, -1]));
      expect(mesh.normals.slice(8, 12)).toEqual(Array(4).fill([0, 0, 1]));
    });

    it('thickens a vertical wall along X', () => {
      const { mesh } = new FloorPlanMeshBuilder().build(parseDetection(unitPlan([[4, 0, 6, 10, 'wall']])));
      const xFront = 5 - T / 2;
      const xBack = 5 + T / 2;

      expect(mesh.vertices.slice(4, 12)).toEqual([
        [xFront, 0, 0], [xFront, 0, 10], [xFront, 3, 10], [xFront, 3, 0],
        [xBack, 0, 0], [xBack, 0, 10], [xBack, 3, 10], [xBack, 3, 0]
      ]);
      expect(mesh.normals[4]).toEqual([-1, 0, 0]);
      expect(mesh.normals[11]).toEqual([1, 0, 0]);
    });

    it('gives a wall the configured thickness whatever the image scale', () => {
      const { mesh } = new FloorPlanMeshBuilder().build(
        parseDetection(detectorPayload(500, 500, [[0, 0, 100, 10, 'wall']]))
      );
      const zs = mesh.vertices.slice(4, 12).map(v => v[2]);

      expect(Math.max(...zs) - Math.min(...zs)).toBeCloseTo(0.15, 12);
      expect(mesh.vertices[5][0]).toBeCloseTo(2, 12);
    });

    it('keeps attributes aligned and faces in range', () => {
      const { mesh } = new FloorPlanMeshBuilder().build(parseDetection(unitPlan([
        [0, 4, 10, 6, 'wall'],
        [4, 0, 6, 10, 'wall'],
        [2, 4.5, 4, 5.5, 'door']
      ])));

      expect(mesh.normals).toHaveLength(mesh.vertices.length);
      expect(mesh.colors).toHaveLength(mesh.vertices.length);
      expect(mesh.faces.flat().every(i => i >= 0 && i < mesh.vertices.length)).toBe(true);
    });

    it('emits ten faces per wall and no bottom face', () => {
      const { mesh } = new FloorPlanMeshBuilder().build(parseDetection(unitPlan([[0, 4, 10, 6, 'wall']])));

      expect(mesh.faces.slice(2, 12)).toEqual([
        [4, 5, 6], [4, 6, 7],
        [9, 8, 11], [9, 11, 10],
        [8, 4, 7], [8, 7, 11],
        [5, 9, 10], [5, 10, 6],
        [7, 6, 10], [7, 10, 11]
      ]);
      expect(mesh.colors.slice(4, 12)).toEqual(Array(8).fill(ELEMENT_COLORS.wall));
    });
  });

  describe('openings', () => {
    const plan = unitPlan([
      [0, 4, 10, 6, 'wall'],
      [2, 4.5, 4, 5.5, 'door'],
      [0, 2, 1, 4, 'window']
    ]);

    it('emits floor, walls, doors, windows, ceiling in order', () => {
      const { mesh } = new FloorPlanMeshBuilder().build(parseDetection(plan));

      expect(mesh.vertices).toHaveLength(4 + 8 + 4 + 4 + 4);
      expect(mesh.faces).toHaveLength(2 + 10 + 4 + 4 + 2);
      expect(mesh.colors[12]).toEqual(ELEMENT_COLORS.door);
      expect(mesh.colors[16]).toEqual(ELEMENT_COLORS.window);
      expect(mesh.faces.slice(20)).toEqual([[20, 22, 21], [20, 23, 22]]);
    });

    it('stands a horizontal door on the floor at its centerline', () => {
      const { mesh } = new FloorPlanMeshBuilder().build(parseDetection(plan));

      expect(mesh.vertices.slice(12, 16)).toEqual([[2, 0, 5], [4, 0, 5], [4, 2.1, 5], [2, 2.1, 5]]);
      expect(mesh.normals.slice(12, 16)).toEqual(Array(4).fill([0, 0, 1]));
      expect(mesh.faces.slice(12, 16)).toEqual([[12, 13, 14], [12, 14, 15], [13, 12, 15], [13, 15, 14]]);
    });

    it('lifts a vertical window to the sill', () => {
      const { mesh } = new FloorPlanMeshBuilder().build(parseDetection(plan));
      const top = 0.9 + 1.2;

      expect(mesh.vertices.slice(16, 20)).toEqual([[0.5, 0.9, 2], [0.5, 0.9, 4], [0.5, top, 4], [0.5, top, 2]]);
      expect(mesh.normals.slice(16, 20)).toEqual(Array(4).fill([1, 0, 0]));
    });

    it('reports overlapping openings without cutting the wall', () => {
      const { mesh, diagnostics, counts } = new FloorPlanMeshBuilder().build(parseDetection(plan));

      expect(diagnostics.openingOverlaps).toEqual([{ wallIndex: 0, doors: [0], windows: [0] }]);
      expect(mesh.vertices.slice(4, 12)).toHaveLength(8);
      expect(counts).toEqual({ walls: 1, doors: 1, windows: 1 });
    });
  });

  describe('degenerate elements', () => {
    const plan = unitPlan([
      [0, 5, 10, 5, 'wall'],
      [1, 1, 1, 3, 'door']
    ]);

    it('skips zero-area rectangles and records why', () => {
      const { mesh, diagnostics, counts } = new FloorPlanMeshBuilder().build(parseDetection(plan));

      expect(mesh.vertices).toHaveLength(8);
      expect(mesh.faces).toHaveLength(4);
      expect(diagnostics.skippedElements).toEqual([
        { elementClass: ElementClass.WALL, index: 0, reason: 'Degenerate wall #0: 10x0 px' },
        { elementClass: ElementClass.DOOR, index: 0, reason: 'Degenerate door #0: 0x2 px' }
      ]);
      expect(counts).toEqual({ walls: 1, doors: 1, windows: 0 });
    });

    it('never emits non-finite coordinates', () => {
      const { mesh } = new FloorPlanMeshBuilder().build(parseDetection(plan));
      expect(mesh.vertices.flat().every(Number.isFinite)).toBe(true);
    });

    it('throws under the throw policy', () => {
      const builder = new FloorPlanMeshBuilder({}, { degeneratePolicy: 'throw' });
      expect(() => builder.build(parseDetection(plan))).toThrow(GeometryError);
    });
  });

  it('carries dropped labels into diagnostics', () => {
    const { diagnostics } = new FloorPlanMeshBuilder().build(parseDetection(unitPlan([[1, 1, 2, 2, 'column']])));
    expect(diagnostics.droppedLabels).toEqual({ column: 1 });
  });
});

describe('resolveGenerationConfig', () => {
  it('fills unspecified values from the defaults', () => {
    expect(resolveGenerationConfig({ wall_height: 2.5, window_sill_height: 0 })).toEqual({
      wall_height: 2.5,
      wall_thickness: 0.15,
      door_height: 2.1,
      window_height: 1.2,
      window_sill_height: 0
    });
  });

  it('treats explicit undefined as unset', () => {
    expect(resolveGenerationConfig({ wall_height: undefined }).wall_height).toBe(3.0);
  });

  it.each([
    [{ wall_height: 0 }],
    [{ wall_thickness: -0.1 }],
    [{ door_height: Number.NaN }],
    [{ window_sill_height: -1 }],
    [{ wall_height: 1e39 }],
    [{ window_sill_height: 10001 }]
  ])('rejects %j', config => {
    expect(() => resolveGenerationConfig(config)).toThrow(ValidationError);
  });

  it('is frozen', () => {
    expect(Object.isFrozen(resolveGenerationConfig())).toBe(true);
  });
});
