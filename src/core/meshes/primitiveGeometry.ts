/**
 * Primitive geometry factory
 *
 * Maps each mesh kind to its generator. Generators live in ./primitives and
 * return geometry with per-part index ranges.
 */

import type { MeshKind } from './types';
import type { MeshGeometry } from './primitives/GeometryBuilder';
import { generateBoxGeometry } from './primitives/box';
import { generatePlaneGeometry } from './primitives/plane';
import { generateSphereGeometry, generateHalfSphereGeometry } from './primitives/sphere';
import {
  generateCylinderGeometry,
  generateTaperedCylinderGeometry,
  generateConeGeometry,
} from './primitives/cylinder';
import { generatePyramid4Geometry } from './primitives/pyramid';

export type { MeshGeometry };

export const MESH_KINDS: readonly MeshKind[] = [
  'box',
  'plane',
  'sphere',
  'halfSphere',
  'cylinder',
  'taperedCylinder',
  'cone',
  'pyramid4',
];

/**
 * Generate geometry for a mesh kind
 */
export function generateMeshGeometry(kind: MeshKind): MeshGeometry {
  switch (kind) {
    case 'box':
      return generateBoxGeometry();
    case 'plane':
      return generatePlaneGeometry();
    case 'sphere':
      return generateSphereGeometry();
    case 'halfSphere':
      return generateHalfSphereGeometry();
    case 'cylinder':
      return generateCylinderGeometry();
    case 'taperedCylinder':
      return generateTaperedCylinderGeometry();
    case 'cone':
      return generateConeGeometry();
    case 'pyramid4':
      return generatePyramid4Geometry();
  }
}
