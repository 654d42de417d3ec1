import { GeometryBuilder, type MeshGeometry } from './GeometryBuilder';

const LAT_BANDS = 16;
const LONG_BANDS = 32;

/**
 * Add latitude/longitude rings of a unit sphere from the north pole down to
 * `latBands` bands (a full sphere has LAT_BANDS, a dome half of that).
 */
function addSphereBands(builder: GeometryBuilder, latBands: number): void {
  const first = builder.vertexCount;

  for (let lat = 0; lat <= latBands; lat++) {
    const theta = (lat * Math.PI) / LAT_BANDS;
    const sinTheta = Math.sin(theta);
    const cosTheta = Math.cos(theta);

    for (let lon = 0; lon <= LONG_BANDS; lon++) {
      const phi = (lon * 2 * Math.PI) / LONG_BANDS;

      // Normal is just the unit sphere position
      const nx = Math.cos(phi) * sinTheta;
      const ny = cosTheta;
      const nz = Math.sin(phi) * sinTheta;

      builder.addVertex([nx, ny, nz], [nx, ny, nz], [lon / LONG_BANDS, 1 - lat / LAT_BANDS]);
    }
  }

  // CCW winding when viewed from outside
  for (let lat = 0; lat < latBands; lat++) {
    for (let lon = 0; lon < LONG_BANDS; lon++) {
      const a = first + lat * (LONG_BANDS + 1) + lon;
      const b = a + LONG_BANDS + 1;
      builder.addTriangle(a, a + 1, b);
      builder.addTriangle(a + 1, b + 1, b);
    }
  }
}

/**
 * Unit sphere (radius 1) centered at the origin
 */
export function generateSphereGeometry(): MeshGeometry {
  const builder = new GeometryBuilder();
  builder.beginPart('body');
  addSphereBands(builder, LAT_BANDS);
  builder.endPart();
  return builder.build();
}

/**
 * Upper hemisphere of the unit sphere, closed by a disc at y = 0
 */
export function generateHalfSphereGeometry(): MeshGeometry {
  const builder = new GeometryBuilder();

  builder.beginPart('sides');
  addSphereBands(builder, LAT_BANDS / 2);
  builder.endPart();

  builder.beginPart('bottom');
  const center = builder.addVertex([0, 0, 0], [0, -1, 0], [0.5, 0.5]);
  const ring = builder.vertexCount;
  for (let lon = 0; lon <= LONG_BANDS; lon++) {
    const phi = (lon * 2 * Math.PI) / LONG_BANDS;
    const x = Math.cos(phi);
    const z = Math.sin(phi);
    builder.addVertex([x, 0, z], [0, -1, 0], [0.5 + x * 0.5, 0.5 + z * 0.5]);
  }
  for (let lon = 0; lon < LONG_BANDS; lon++) {
    builder.addTriangle(center, ring + lon, ring + lon + 1);
  }
  builder.endPart();

  return builder.build();
}
