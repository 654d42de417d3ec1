import { GeometryBuilder, type MeshGeometry } from './GeometryBuilder';

/**
 * Flat plane on XZ at y = 0, extents [-1, 1], facing +Y
 */
export function generatePlaneGeometry(): MeshGeometry {
  const builder = new GeometryBuilder();
  builder.beginPart('body');

  const a = builder.addVertex([-1, 0, 1], [0, 1, 0], [0, 0]);
  const b = builder.addVertex([1, 0, 1], [0, 1, 0], [1, 0]);
  const c = builder.addVertex([1, 0, -1], [0, 1, 0], [1, 1]);
  const d = builder.addVertex([-1, 0, -1], [0, 1, 0], [0, 1]);
  builder.addTriangle(a, b, c);
  builder.addTriangle(a, c, d);

  builder.endPart();
  return builder.build();
}
