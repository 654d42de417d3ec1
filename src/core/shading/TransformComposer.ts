/**
 * TransformComposer - per-draw model matrix
 *
 * M = T(position) · Rz · Ry · Rx · S(scale)
 *
 * Applied to a column vector, a point is scaled, rotated about X, then Y,
 * then Z, and finally translated. The axis order is part of the scene's
 * contract: every placement in the scene data was authored against it.
 */

import { glMatrix, mat4 } from 'gl-matrix';
import type { Vec3 } from '../types';
import type { ShadingInterface } from '../gl/types';
import { DEFAULT_UNIFORM_NAMES, type UniformNames } from './uniformNames';

export interface TransformSpec {
  scale: Readonly<Vec3>;
  /** Rotation about X, Y and Z in degrees */
  rotationDegrees: Readonly<Vec3>;
  position: Readonly<Vec3>;
}

/**
 * Build the model matrix for a transform spec
 */
export function composeModelMatrix(spec: TransformSpec, out: mat4 = mat4.create()): mat4 {
  const [rx, ry, rz] = spec.rotationDegrees;
  mat4.fromTranslation(out, spec.position);
  mat4.rotateZ(out, out, glMatrix.toRadian(rz));
  mat4.rotateY(out, out, glMatrix.toRadian(ry));
  mat4.rotateX(out, out, glMatrix.toRadian(rx));
  mat4.scale(out, out, spec.scale);
  return out;
}

export class TransformComposer {
  private readonly shader: ShadingInterface;
  private readonly modelName: string;

  constructor(shader: ShadingInterface, names: Pick<UniformNames, 'model'> = DEFAULT_UNIFORM_NAMES) {
    this.shader = shader;
    this.modelName = names.model;
  }

  /**
   * Compose the matrix and write it to the model uniform right away
   */
  apply(spec: TransformSpec): mat4 {
    const model = composeModelMatrix(spec);
    this.shader.setMat4(this.modelName, model);
    return model;
  }
}
