import { vec3 } from 'gl-matrix';
import type { Vec2, Vec3 } from '../../types';
import type { MeshPart } from '../types';

/**
 * Range inside the index buffer, in indices (not bytes)
 */
export interface IndexRange {
  offset: number;
  count: number;
}

/**
 * Raw geometry data returned by primitive generators
 */
export interface GeometryData {
  positions: Float32Array;
  normals: Float32Array;
  uvs: Float32Array;
  indices: Uint16Array;
}

export interface MeshGeometry extends GeometryData {
  parts: Partial<Record<MeshPart, IndexRange>>;
}

/**
 * Accumulates vertices and triangles for one mesh, grouping the triangles
 * into named parts.
 */
export class GeometryBuilder {
  private readonly positions: number[] = [];
  private readonly normals: number[] = [];
  private readonly uvs: number[] = [];
  private readonly indices: number[] = [];
  private readonly parts: Partial<Record<MeshPart, IndexRange>> = {};
  private openPart: { name: MeshPart; offset: number } | null = null;

  get vertexCount(): number {
    return this.positions.length / 3;
  }

  addVertex(position: Readonly<Vec3>, normal: Readonly<Vec3>, uv: Readonly<Vec2>): number {
    this.positions.push(position[0], position[1], position[2]);
    this.normals.push(normal[0], normal[1], normal[2]);
    this.uvs.push(uv[0], uv[1]);
    return this.vertexCount - 1;
  }

  addTriangle(a: number, b: number, c: number): void {
    this.indices.push(a, b, c);
  }

  /**
   * Add a flat triangle, computing the face normal from its CCW winding
   */
  addFace(corners: [Readonly<Vec3>, Readonly<Vec3>, Readonly<Vec3>], uvs: [Vec2, Vec2, Vec2]): void {
    const normal = faceNormal(corners[0], corners[1], corners[2]);
    const a = this.addVertex(corners[0], normal, uvs[0]);
    const b = this.addVertex(corners[1], normal, uvs[1]);
    const c = this.addVertex(corners[2], normal, uvs[2]);
    this.addTriangle(a, b, c);
  }

  beginPart(name: MeshPart): void {
    if (this.openPart) {
      throw new Error(`Part "${this.openPart.name}" is still open`);
    }
    this.openPart = { name, offset: this.indices.length };
  }

  endPart(): void {
    if (!this.openPart) {
      throw new Error('No open part to end');
    }
    const { name, offset } = this.openPart;
    this.parts[name] = { offset, count: this.indices.length - offset };
    this.openPart = null;
  }

  build(): MeshGeometry {
    if (this.openPart) {
      throw new Error(`Part "${this.openPart.name}" was never ended`);
    }
    return {
      positions: new Float32Array(this.positions),
      normals: new Float32Array(this.normals),
      uvs: new Float32Array(this.uvs),
      indices: new Uint16Array(this.indices),
      parts: { ...this.parts },
    };
  }
}

/**
 * Unit normal of triangle (a, b, c) wound counter-clockwise
 */
export function faceNormal(a: Readonly<Vec3>, b: Readonly<Vec3>, c: Readonly<Vec3>): Vec3 {
  const e1 = vec3.subtract(vec3.create(), b, a);
  const e2 = vec3.subtract(vec3.create(), c, a);
  const n = vec3.normalize(vec3.create(), vec3.cross(vec3.create(), e1, e2));
  return [n[0], n[1], n[2]];
}
