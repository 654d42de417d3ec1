import type { MeshGeometry } from './GeometryBuilder';

/**
 * Unit box centered at the origin, extents [-0.5, 0.5] on every axis.
 * 6 faces, 4 vertices each so every face keeps its own normal.
 */
export function generateBoxGeometry(): MeshGeometry {
  const h = 0.5;

  const positions = new Float32Array([
    // Front face (Z+)
    -h, -h,  h,   h, -h,  h,   h,  h,  h,  -h,  h,  h,
    // Back face (Z-)
     h, -h, -h,  -h, -h, -h,  -h,  h, -h,   h,  h, -h,
    // Top face (Y+)
    -h,  h,  h,   h,  h,  h,   h,  h, -h,  -h,  h, -h,
    // Bottom face (Y-)
    -h, -h, -h,   h, -h, -h,   h, -h,  h,  -h, -h,  h,
    // Right face (X+)
     h, -h,  h,   h, -h, -h,   h,  h, -h,   h,  h,  h,
    // Left face (X-)
    -h, -h, -h,  -h, -h,  h,  -h,  h,  h,  -h,  h, -h,
  ]);

  const normals = new Float32Array([
    0, 0, 1,  0, 0, 1,  0, 0, 1,  0, 0, 1,
    0, 0, -1,  0, 0, -1,  0, 0, -1,  0, 0, -1,
    0, 1, 0,  0, 1, 0,  0, 1, 0,  0, 1, 0,
    0, -1, 0,  0, -1, 0,  0, -1, 0,  0, -1, 0,
    1, 0, 0,  1, 0, 0,  1, 0, 0,  1, 0, 0,
    -1, 0, 0,  -1, 0, 0,  -1, 0, 0,  -1, 0, 0,
  ]);

  const faceUVs = [0, 0,  1, 0,  1, 1,  0, 1];
  const uvs = new Float32Array(Array.from({ length: 6 }, () => faceUVs).flat());

  const indices = new Uint16Array(36);
  for (let face = 0; face < 6; face++) {
    const v = face * 4;
    indices.set([v, v + 1, v + 2, v, v + 2, v + 3], face * 6);
  }

  return {
    positions,
    normals,
    uvs,
    indices,
    parts: { body: { offset: 0, count: indices.length } },
  };
}
