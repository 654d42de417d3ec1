/**
 * Mesh library contract consumed by the scene assembler
 */

/**
 * Primitive meshes the library can draw
 */
export type MeshKind =
  | 'box'
  | 'plane'
  | 'sphere'
  | 'halfSphere'
  | 'cylinder'
  | 'taperedCylinder'
  | 'cone'
  | 'pyramid4';

/**
 * Named index ranges inside a mesh. Cylinder-like meshes split into caps and
 * sides so a draw can leave out an end; everything else is a single body.
 */
export type MeshPart = 'body' | 'top' | 'bottom' | 'sides';

/**
 * Which parts of a cylinder-like mesh to draw; omitted parts are drawn
 */
export interface MeshPartOptions {
  top?: boolean;
  bottom?: boolean;
  sides?: boolean;
}

/**
 * A single mesh draw as it appears in the scene description
 */
export type MeshInvocation =
  | { kind: 'box' }
  | { kind: 'plane' }
  | { kind: 'sphere' }
  | { kind: 'halfSphere' }
  | { kind: 'pyramid4' }
  | { kind: 'cylinder'; parts?: MeshPartOptions }
  | { kind: 'taperedCylinder'; parts?: MeshPartOptions }
  | { kind: 'cone'; parts?: Omit<MeshPartOptions, 'top'> };

export interface MeshLibrary {
  /** Prepare GPU buffers for the given meshes; already loaded kinds are skipped */
  loadMeshes(kinds: readonly MeshKind[]): void;
  drawBox(): void;
  drawPlane(): void;
  drawSphere(): void;
  drawHalfSphere(): void;
  drawPyramid4(): void;
  drawCylinder(parts?: MeshPartOptions): void;
  drawTaperedCylinder(parts?: MeshPartOptions): void;
  drawCone(parts?: Omit<MeshPartOptions, 'top'>): void;
  /** Release every GPU buffer the library created */
  destroy(): void;
}
