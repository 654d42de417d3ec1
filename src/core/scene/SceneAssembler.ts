/**
 * SceneAssembler - runs the fixed draw list once per frame
 *
 * Every step writes its full shading state before drawing: model matrix,
 * UV scale, base color or texture, then material. Uniform state is shared
 * between steps, so anything a step leaves out is inherited from the
 * previous one.
 */

import type { RGBA } from '../types';
import type { MeshInvocation, MeshKind, MeshLibrary } from '../meshes/types';
import type { TransformComposer } from '../shading/TransformComposer';
import type { UniformDispatcher } from '../shading/UniformDispatcher';
import type { DrawStep } from './types';

export interface FrameReport {
  stepsDrawn: number;
  textureMisses: number;
  materialMisses: number;
}

export interface SceneAssemblerOptions {
  /** Flat color drawn in place of a texture that is not registered */
  missingTextureColor?: Readonly<RGBA>;
}

export const DEFAULT_MISSING_TEXTURE_COLOR: Readonly<RGBA> = [0.8, 0.8, 0.8, 1];

export class SceneAssembler {
  private readonly missingTextureColor: Readonly<RGBA>;

  constructor(
    private readonly composer: TransformComposer,
    private readonly dispatcher: UniformDispatcher,
    private readonly meshes: MeshLibrary,
    private readonly steps: readonly DrawStep[],
    options: SceneAssemblerOptions = {}
  ) {
    this.missingTextureColor = options.missingTextureColor ?? DEFAULT_MISSING_TEXTURE_COLOR;
  }

  /**
   * Draw every step in order. Textures must already be bound to their
   * units for this frame.
   */
  render(): FrameReport {
    const report: FrameReport = { stepsDrawn: 0, textureMisses: 0, materialMisses: 0 };

    for (const step of this.steps) {
      this.composer.apply(step.transform);

      const [u, v] = step.uvScale ?? [1, 1];
      this.dispatcher.setUVScale(u, v);

      if (step.shading.kind === 'texture') {
        const result = this.dispatcher.setTexture(step.shading.tag);
        if (!result.success) {
          report.textureMisses++;
          const [r, g, b, a] = this.missingTextureColor;
          this.dispatcher.setColor(r, g, b, a);
        }
      } else {
        const [r, g, b, a] = step.shading.rgba;
        this.dispatcher.setColor(r, g, b, a);
      }

      const material = this.dispatcher.setMaterial(step.materialTag);
      if (!material.success) {
        report.materialMisses++;
      }

      drawMesh(this.meshes, step.mesh);
      report.stepsDrawn++;
    }

    return report;
  }
}

export function drawMesh(meshes: MeshLibrary, mesh: MeshInvocation): void {
  switch (mesh.kind) {
    case 'box':
      return meshes.drawBox();
    case 'plane':
      return meshes.drawPlane();
    case 'sphere':
      return meshes.drawSphere();
    case 'halfSphere':
      return meshes.drawHalfSphere();
    case 'pyramid4':
      return meshes.drawPyramid4();
    case 'cylinder':
      return meshes.drawCylinder(mesh.parts);
    case 'taperedCylinder':
      return meshes.drawTaperedCylinder(mesh.parts);
    case 'cone':
      return meshes.drawCone(mesh.parts);
  }
}

/** A flat color with alpha below 1 */
export function isTranslucent(step: DrawStep): boolean {
  return step.shading.kind === 'color' && step.shading.rgba[3] < 1;
}

/**
 * Translucent steps that still have an opaque step after them. Blending
 * only looks right when every translucent draw comes last.
 */
export function findOrderViolations(steps: readonly DrawStep[]): DrawStep[] {
  const violations: DrawStep[] = [];
  let opaqueAfter = false;
  for (let i = steps.length - 1; i >= 0; i--) {
    if (isTranslucent(steps[i])) {
      if (opaqueAfter) violations.unshift(steps[i]);
    } else {
      opaqueAfter = true;
    }
  }
  return violations;
}

/** Mesh kinds the steps draw, in order of first use */
export function requiredMeshKinds(steps: readonly DrawStep[]): MeshKind[] {
  return [...new Set(steps.map((step) => step.mesh.kind))];
}
