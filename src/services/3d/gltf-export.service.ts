// ========================================
// GLTF EXPORT SERVICE - gltf-export.service.ts
// Packs a mesh into a glTF 2.0 document plus one binary buffer
// ========================================

import { MeshData, ModelMetadata, Vec3 } from '../../types/floor-plan.types';
import {
  ComponentType,
  GltfAccessor,
  GltfBufferView,
  GltfDocument,
  PrimitiveMode
} from '../../types/gltf.types';
import { GLTF } from '../../utils/constants';
import { SerializationError } from '../../utils/errors';
import { loggers } from '../../utils/logger';

export interface GltfExportOptions {
  generator?: string;
}

export interface ExportSummary {
  wall_height: number;
  wall_thickness: number;
  num_walls: number;
  num_doors: number;
  num_windows: number;
}

export interface GltfExportResult {
  gltf: GltfDocument;
  buffer: Buffer;
  metadata: ModelMetadata;
}

interface Section {
  name: 'positions' | 'normals' | 'colors' | 'indices';
  values: readonly number[];
  componentType: ComponentType;
}

/**
 * Component-wise bounds of the position data as it will be stored (float32).
 */
export const computeBounds = (vertices: readonly Vec3[]): { min: number[]; max: number[] } => {
  const min = [Infinity, Infinity, Infinity];
  const max = [-Infinity, -Infinity, -Infinity];

  for (const vertex of vertices) {
    for (let axis = 0; axis < 3; axis++) {
      const value = Math.fround(vertex[axis]);
      if (value < min[axis]) min[axis] = value;
      if (value > max[axis]) max[axis] = value;
    }
  }

  return { min, max };
};

/**
 * Byte lengths, offsets and counts must be safe integers that fit uint32.
 */
export const assertAddressable = (label: string, value: number): void => {
  if (!Number.isSafeInteger(value) || value < 0 || value > GLTF.MAX_UINT32) {
    throw new SerializationError(`${label} (${value}) exceeds the uint32 range of the binary container`, {
      [label]: value
    });
  }
};

const assertFloat32Finite = (section: Section): void => {
  section.values.forEach((value, position) => {
    if (!Number.isFinite(Math.fround(value))) {
      throw new SerializationError(`${section.name}[${position}] (${value}) is not representable as float32`, {
        section: section.name,
        position,
        value: String(value)
      });
    }
  });
};

const flatten = (tuples: ReadonlyArray<readonly number[]>): number[] => {
  const out: number[] = [];
  for (const tuple of tuples) {
    for (const value of tuple) out.push(value);
  }
  return out;
};

export class GltfExportService {
  private readonly generator: string;

  constructor(options: GltfExportOptions = {}) {
    this.generator = options.generator ?? GLTF.DEFAULT_GENERATOR;
  }

  /**
   * Export a mesh. Either returns the complete document and buffer or throws
   * before any bytes are handed out.
   */
  export(mesh: MeshData, summary: ExportSummary): GltfExportResult {
    const startTime = Date.now();
    const { vertices, normals, colors, faces } = mesh;

    if (vertices.length === 0) {
      throw new SerializationError('Cannot export a mesh without vertices');
    }

    if (vertices.length !== normals.length || vertices.length !== colors.length) {
      throw new SerializationError('Vertex, normal and color counts differ', {
        vertices: vertices.length,
        normals: normals.length,
        colors: colors.length
      });
    }

    const indices = flatten(faces);
    for (const index of indices) {
      if (!Number.isInteger(index) || index < 0 || index >= vertices.length) {
        throw new SerializationError(`Face index ${index} is outside the vertex range`, {
          index,
          vertexCount: vertices.length
        });
      }
    }

    // Order is load-bearing: offsets below are cumulative over it
    const sections: Section[] = [
      { name: 'positions', values: flatten(vertices), componentType: ComponentType.FLOAT },
      { name: 'normals', values: flatten(normals), componentType: ComponentType.FLOAT },
      { name: 'colors', values: flatten(colors), componentType: ComponentType.FLOAT },
      { name: 'indices', values: indices, componentType: ComponentType.UNSIGNED_INT }
    ];

    for (const section of sections) {
      if (section.componentType === ComponentType.FLOAT) assertFloat32Finite(section);
    }

    const bufferViews: GltfBufferView[] = [];
    let byteOffset = 0;
    for (const section of sections) {
      const byteLength = section.values.length * GLTF.BYTES_PER_COMPONENT;
      assertAddressable(`${section.name}.byteLength`, byteLength);
      assertAddressable(`${section.name}.byteOffset`, byteOffset);
      bufferViews.push({ buffer: 0, byteOffset, byteLength });
      byteOffset += byteLength;
    }
    const totalByteLength = byteOffset;
    assertAddressable('buffer.byteLength', totalByteLength);
    assertAddressable('indices.count', indices.length);

    const buffer = this.writeSections(sections, totalByteLength);
    const bounds = computeBounds(vertices);

    const accessors: GltfAccessor[] = [
      {
        bufferView: 0,
        componentType: ComponentType.FLOAT,
        count: vertices.length,
        type: 'VEC3',
        max: bounds.max,
        min: bounds.min
      },
      {
        bufferView: 1,
        componentType: ComponentType.FLOAT,
        count: normals.length,
        type: 'VEC3'
      },
      {
        bufferView: 2,
        componentType: ComponentType.FLOAT,
        count: colors.length,
        type: 'VEC3'
      },
      {
        bufferView: 3,
        componentType: ComponentType.UNSIGNED_INT,
        count: indices.length,
        type: 'SCALAR'
      }
    ];

    const gltf: GltfDocument = {
      asset: {
        version: GLTF.VERSION,
        generator: this.generator
      },
      scene: 0,
      scenes: [{ nodes: [0] }],
      nodes: [{ mesh: 0 }],
      materials: [
        {
          pbrMetallicRoughness: {
            baseColorFactor: [1.0, 1.0, 1.0, 1.0],
            metallicFactor: 0.0,
            roughnessFactor: 1.0
          },
          doubleSided: true
        }
      ],
      meshes: [
        {
          primitives: [
            {
              attributes: {
                POSITION: 0,
                NORMAL: 1,
                COLOR_0: 2
              },
              indices: 3,
              material: 0,
              mode: PrimitiveMode.TRIANGLES
            }
          ]
        }
      ],
      accessors,
      bufferViews,
      buffers: [{ byteLength: totalByteLength }]
    };

    const metadata: ModelMetadata = {
      wall_height: summary.wall_height,
      wall_thickness: summary.wall_thickness,
      num_vertices: vertices.length,
      num_faces: faces.length,
      num_walls: summary.num_walls,
      num_doors: summary.num_doors,
      num_windows: summary.num_windows
    };

    loggers.export.debug('glTF buffer packed', {
      byteLength: totalByteLength,
      vertices: vertices.length,
      indices: indices.length,
      durationMs: Date.now() - startTime
    });

    return { gltf, buffer, metadata };
  }

  /**
   * Little-endian float32 / uint32 sections, back to back. Every element is
   * 4 bytes so section boundaries stay 4-byte aligned without padding.
   */
  private writeSections(sections: readonly Section[], totalByteLength: number): Buffer {
    const buffer = Buffer.alloc(totalByteLength);
    let offset = 0;

    for (const section of sections) {
      if (section.componentType === ComponentType.FLOAT) {
        for (const value of section.values) {
          offset = buffer.writeFloatLE(value, offset);
        }
      } else {
        for (const value of section.values) {
          offset = buffer.writeUInt32LE(value, offset);
        }
      }
    }

    return buffer;
  }
}
