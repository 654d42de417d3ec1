import { vec3 } from 'gl-matrix';
import { GeometryBuilder, type MeshGeometry } from './GeometryBuilder';

const SEGMENTS = 36;

interface CylinderShape {
  bottomRadius: number;
  /** 0 closes the top into an apex (a cone) and drops the top cap */
  topRadius: number;
}

function addCap(builder: GeometryBuilder, y: number, radius: number, facingUp: boolean): void {
  const normalY = facingUp ? 1 : -1;
  const center = builder.addVertex([0, y, 0], [0, normalY, 0], [0.5, 0.5]);
  const ring = builder.vertexCount;

  for (let i = 0; i <= SEGMENTS; i++) {
    const phi = (i * 2 * Math.PI) / SEGMENTS;
    const x = Math.cos(phi);
    const z = Math.sin(phi);
    builder.addVertex([x * radius, y, z * radius], [0, normalY, 0], [0.5 + x * 0.5, 0.5 + z * 0.5]);
  }

  for (let i = 0; i < SEGMENTS; i++) {
    if (facingUp) {
      builder.addTriangle(center, ring + i + 1, ring + i);
    } else {
      builder.addTriangle(center, ring + i, ring + i + 1);
    }
  }
}

/**
 * Cylinder-like solid of height 1 standing on y = 0, split into
 * `sides`, `bottom` and (unless it is a cone) `top` parts.
 */
function generateCylinderShape({ bottomRadius, topRadius }: CylinderShape): MeshGeometry {
  const builder = new GeometryBuilder();

  builder.beginPart('sides');
  const first = builder.vertexCount;
  for (let i = 0; i <= SEGMENTS; i++) {
    const phi = (i * 2 * Math.PI) / SEGMENTS;
    const x = Math.cos(phi);
    const z = Math.sin(phi);
    // Side slope tilts the normal up as the radius shrinks
    const n = vec3.normalize(vec3.create(), [x, bottomRadius - topRadius, z]);
    const normal: [number, number, number] = [n[0], n[1], n[2]];
    const u = i / SEGMENTS;
    builder.addVertex([x * bottomRadius, 0, z * bottomRadius], normal, [u, 0]);
    builder.addVertex([x * topRadius, 1, z * topRadius], normal, [u, 1]);
  }
  for (let i = 0; i < SEGMENTS; i++) {
    const b0 = first + i * 2;
    const t0 = b0 + 1;
    const b1 = b0 + 2;
    const t1 = b0 + 3;
    builder.addTriangle(b0, t0, t1);
    builder.addTriangle(b0, t1, b1);
  }
  builder.endPart();

  builder.beginPart('bottom');
  addCap(builder, 0, bottomRadius, false);
  builder.endPart();

  if (topRadius > 0) {
    builder.beginPart('top');
    addCap(builder, 1, topRadius, true);
    builder.endPart();
  }

  return builder.build();
}

/** Radius 1, height 1, base on y = 0 */
export function generateCylinderGeometry(): MeshGeometry {
  return generateCylinderShape({ bottomRadius: 1, topRadius: 1 });
}

/** Radius 1 at the base narrowing to 0.5 at the top */
export function generateTaperedCylinderGeometry(): MeshGeometry {
  return generateCylinderShape({ bottomRadius: 1, topRadius: 0.5 });
}

/** Radius 1 base, apex at (0, 1, 0) */
export function generateConeGeometry(): MeshGeometry {
  return generateCylinderShape({ bottomRadius: 1, topRadius: 0 });
}
