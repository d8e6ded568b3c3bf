/**
 * glTF 2.0 Type Definitions
 * Subset of the schema emitted by the exporter
 */

export enum ComponentType {
  UNSIGNED_INT = 5125,
  FLOAT = 5126
}

export enum PrimitiveMode {
  TRIANGLES = 4
}

export type AccessorType = 'SCALAR' | 'VEC3';

export interface GltfAsset {
  version: '2.0';
  generator: string;
}

export interface GltfScene {
  nodes: number[];
}

export interface GltfNode {
  mesh: number;
}

export interface GltfMaterial {
  pbrMetallicRoughness: {
    baseColorFactor: [number, number, number, number];
    metallicFactor: number;
    roughnessFactor: number;
  };
  doubleSided: boolean;
}

export interface GltfPrimitive {
  attributes: {
    POSITION: number;
    NORMAL: number;
    COLOR_0: number;
  };
  indices: number;
  material: number;
  mode: PrimitiveMode;
}

export interface GltfMesh {
  primitives: GltfPrimitive[];
}

export interface GltfAccessor {
  bufferView: number;
  componentType: ComponentType;
  count: number;
  type: AccessorType;
  min?: number[];
  max?: number[];
}

export interface GltfBufferView {
  buffer: number;
  byteOffset: number;
  byteLength: number;
}

export interface GltfBuffer {
  byteLength: number;
  uri?: string;
}

export interface GltfDocument {
  asset: GltfAsset;
  scene: number;
  scenes: GltfScene[];
  nodes: GltfNode[];
  materials: GltfMaterial[];
  meshes: GltfMesh[];
  accessors: GltfAccessor[];
  bufferViews: GltfBufferView[];
  buffers: GltfBuffer[];
}
