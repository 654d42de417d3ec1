/**
 * ShapeMeshes - GPU buffers and draw calls for the primitive meshes
 *
 * Each loaded kind owns one vertex array object with separate position,
 * normal and UV buffers plus an index buffer. Cylinder-like meshes draw
 * their caps and sides as separate index ranges.
 */

import type { MeshKind, MeshLibrary, MeshPart, MeshPartOptions } from './types';
import type { IndexRange, MeshGeometry } from './primitives/GeometryBuilder';
import { generateMeshGeometry } from './primitiveGeometry';

/**
 * The slice of WebGL2 the mesh library calls into
 */
export type MeshGL = Pick<
  WebGL2RenderingContext,
  | 'createVertexArray'
  | 'bindVertexArray'
  | 'deleteVertexArray'
  | 'createBuffer'
  | 'bindBuffer'
  | 'bufferData'
  | 'deleteBuffer'
  | 'enableVertexAttribArray'
  | 'vertexAttribPointer'
  | 'drawElements'
  | 'ARRAY_BUFFER'
  | 'ELEMENT_ARRAY_BUFFER'
  | 'STATIC_DRAW'
  | 'FLOAT'
  | 'TRIANGLES'
  | 'UNSIGNED_SHORT'
>;

/**
 * Vertex attribute locations, bound in the shader with layout qualifiers
 */
export const ATTRIBUTE_LOCATIONS = {
  aPosition: 0,
  aNormal: 1,
  aTexCoord: 2,
} as const;

interface GPUMesh {
  vao: WebGLVertexArrayObject;
  buffers: WebGLBuffer[];
  parts: Partial<Record<MeshPart, IndexRange>>;
}

const UINT16_BYTES = 2;

export class ShapeMeshes implements MeshLibrary {
  private readonly meshes = new Map<MeshKind, GPUMesh>();
  private readonly warnedKinds = new Set<MeshKind>();

  constructor(private readonly gl: MeshGL) {}

  get loadedKinds(): MeshKind[] {
    return [...this.meshes.keys()];
  }

  loadMeshes(kinds: readonly MeshKind[]): void {
    for (const kind of kinds) {
      if (this.meshes.has(kind)) continue;
      this.meshes.set(kind, this.upload(kind, generateMeshGeometry(kind)));
      console.log(`[ShapeMeshes] Loaded ${kind} mesh`);
    }
  }

  drawBox(): void {
    this.drawParts('box', ['body']);
  }

  drawPlane(): void {
    this.drawParts('plane', ['body']);
  }

  drawSphere(): void {
    this.drawParts('sphere', ['body']);
  }

  drawHalfSphere(): void {
    this.drawParts('halfSphere', ['sides', 'bottom']);
  }

  drawPyramid4(): void {
    this.drawParts('pyramid4', ['body']);
  }

  drawCylinder(parts: MeshPartOptions = {}): void {
    this.drawParts('cylinder', selectParts(parts));
  }

  drawTaperedCylinder(parts: MeshPartOptions = {}): void {
    this.drawParts('taperedCylinder', selectParts(parts));
  }

  drawCone(parts: Omit<MeshPartOptions, 'top'> = {}): void {
    this.drawParts('cone', selectParts({ ...parts, top: false }));
  }

  destroy(): void {
    const gl = this.gl;
    for (const mesh of this.meshes.values()) {
      for (const buffer of mesh.buffers) {
        gl.deleteBuffer(buffer);
      }
      gl.deleteVertexArray(mesh.vao);
    }
    this.meshes.clear();
    this.warnedKinds.clear();
  }

  private upload(kind: MeshKind, geometry: MeshGeometry): GPUMesh {
    const gl = this.gl;
    const vao = gl.createVertexArray();
    if (!vao) {
      throw new Error(`[ShapeMeshes] Could not create vertex array for ${kind}`);
    }

    const buffers: WebGLBuffer[] = [];
    const createBuffer = (): WebGLBuffer => {
      const buffer = gl.createBuffer();
      if (!buffer) {
        throw new Error(`[ShapeMeshes] Could not create buffer for ${kind}`);
      }
      buffers.push(buffer);
      return buffer;
    };

    gl.bindVertexArray(vao);

    const attributes: Array<[number, Float32Array, number]> = [
      [ATTRIBUTE_LOCATIONS.aPosition, geometry.positions, 3],
      [ATTRIBUTE_LOCATIONS.aNormal, geometry.normals, 3],
      [ATTRIBUTE_LOCATIONS.aTexCoord, geometry.uvs, 2],
    ];
    for (const [location, data, size] of attributes) {
      gl.bindBuffer(gl.ARRAY_BUFFER, createBuffer());
      gl.bufferData(gl.ARRAY_BUFFER, data, gl.STATIC_DRAW);
      gl.enableVertexAttribArray(location);
      gl.vertexAttribPointer(location, size, gl.FLOAT, false, 0, 0);
    }

    // Element buffer binding is recorded in the VAO
    gl.bindBuffer(gl.ELEMENT_ARRAY_BUFFER, createBuffer());
    gl.bufferData(gl.ELEMENT_ARRAY_BUFFER, geometry.indices, gl.STATIC_DRAW);

    gl.bindVertexArray(null);
    gl.bindBuffer(gl.ARRAY_BUFFER, null);

    return { vao, buffers, parts: geometry.parts };
  }

  private drawParts(kind: MeshKind, parts: readonly MeshPart[]): void {
    const mesh = this.meshes.get(kind);
    if (!mesh) {
      if (!this.warnedKinds.has(kind)) {
        this.warnedKinds.add(kind);
        console.warn(`[ShapeMeshes] ${kind} mesh was never loaded, skipping draw`);
      }
      return;
    }

    const gl = this.gl;
    gl.bindVertexArray(mesh.vao);
    for (const part of parts) {
      const range = mesh.parts[part];
      if (!range) continue;
      gl.drawElements(gl.TRIANGLES, range.count, gl.UNSIGNED_SHORT, range.offset * UINT16_BYTES);
    }
    gl.bindVertexArray(null);
  }
}

/**
 * Parts to draw for a cylinder-like mesh; an omitted flag means draw it
 */
export function selectParts(options: MeshPartOptions): MeshPart[] {
  const parts: MeshPart[] = [];
  if (options.top !== false) parts.push('top');
  if (options.bottom !== false) parts.push('bottom');
  if (options.sides !== false) parts.push('sides');
  return parts;
}
