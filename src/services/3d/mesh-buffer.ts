import { Color, Face, MeshData, Vec3 } from '../../types/floor-plan.types';

/**
 * Geometry accumulator owned by a single generation call.
 * Every appended block gets fresh vertices; nothing is welded or shared.
 */
export class MeshBuffer {
  private readonly vertices: Vec3[] = [];
  private readonly normals: Vec3[] = [];
  private readonly colors: Color[] = [];
  private readonly faces: Face[] = [];
  private sealed = false;

  get vertexCount(): number {
    return this.vertices.length;
  }

  get faceCount(): number {
    return this.faces.length;
  }

  /**
   * Append a vertex block. Face indices are local to the block.
   * `normals` is either one normal per vertex or a single normal shared by all of them.
   */
  appendBlock(block: {
    vertices: readonly Vec3[];
    normals: readonly Vec3[] | Vec3;
    color: Color;
    faces: readonly Face[];
  }): void {
    if (this.sealed) {
      throw new Error('MeshBuffer is sealed; create a new buffer per generation');
    }

    const { vertices, color, faces } = block;
    let normals: readonly Vec3[];
    if (isVec3(block.normals)) {
      const shared: Vec3 = block.normals;
      normals = vertices.map(() => shared);
    } else {
      normals = block.normals;
    }

    if (normals.length !== vertices.length) {
      throw new Error(`Normal count ${normals.length} does not match vertex count ${vertices.length}`);
    }
    for (const face of faces) {
      if (face.some(i => !Number.isInteger(i) || i < 0 || i >= vertices.length)) {
        throw new Error(`Face [${face.join(', ')}] references a vertex outside its block`);
      }
    }

    const base = this.vertices.length;
    for (let i = 0; i < vertices.length; i++) {
      this.vertices.push(vertices[i]);
      this.normals.push(normals[i]);
      this.colors.push(color);
    }
    for (const [a, b, c] of faces) {
      this.faces.push([base + a, base + b, base + c]);
    }
  }

  /**
   * Freeze the accumulated geometry. The buffer accepts no more blocks afterwards.
   */
  snapshot(): MeshData {
    this.sealed = true;
    return Object.freeze({
      vertices: Object.freeze([...this.vertices]),
      normals: Object.freeze([...this.normals]),
      colors: Object.freeze([...this.colors]),
      faces: Object.freeze([...this.faces])
    });
  }
}

const isVec3 = (value: readonly Vec3[] | Vec3): value is Vec3 =>
  value.length === 3 && typeof value[0] === 'number';
