import type { Vec3 } from '../../types';
import { GeometryBuilder, type MeshGeometry } from './GeometryBuilder';

/**
 * Square pyramid with a [-0.5, 0.5] base at y = -0.5 and its apex at
 * (0, 0.5, 0). Every face is flat shaded.
 */
export function generatePyramid4Geometry(): MeshGeometry {
  const h = 0.5;
  const apex: Vec3 = [0, h, 0];
  const frontLeft: Vec3 = [-h, -h, h];
  const frontRight: Vec3 = [h, -h, h];
  const backRight: Vec3 = [h, -h, -h];
  const backLeft: Vec3 = [-h, -h, -h];

  const builder = new GeometryBuilder();
  builder.beginPart('body');

  // Sides, left then right corner as seen from outside
  const sides: Array<[Vec3, Vec3]> = [
    [frontLeft, frontRight],
    [frontRight, backRight],
    [backRight, backLeft],
    [backLeft, frontLeft],
  ];
  for (const [left, right] of sides) {
    builder.addFace([left, right, apex], [[0, 0], [1, 0], [0.5, 1]]);
  }

  // Base, facing down
  builder.addFace([backLeft, backRight, frontRight], [[0, 0], [1, 0], [1, 1]]);
  builder.addFace([backLeft, frontRight, frontLeft], [[0, 0], [1, 1], [0, 1]]);

  builder.endPart();
  return builder.build();
}
