/**
 * Scene lighting - the fixed light block written once during setup
 */

import { glMatrix } from 'gl-matrix';
import type { Vec3 } from '../types';
import type { ShadingInterface } from '../gl/types';
import { DEFAULT_UNIFORM_NAMES, type UniformNames } from '../shading/uniformNames';
import { MAX_POINT_LIGHTS } from '../gl/shaders/phong';

export interface LightColors {
  ambient: Vec3;
  diffuse: Vec3;
  specular: Vec3;
}

export interface DirectionalLightParams extends LightColors {
  direction: Vec3;
}

export interface PointLightParams extends LightColors {
  position: Vec3;
}

/**
 * Camera-mounted spot light. Position and direction follow the camera and
 * are written by the view manager each frame.
 */
export interface SpotLightParams extends LightColors {
  constant: number;
  linear: number;
  quadratic: number;
  /** Inner cone half-angle in degrees */
  cutOffDegrees: number;
  /** Outer cone half-angle in degrees */
  outerCutOffDegrees: number;
}

export interface SceneLighting {
  directional: DirectionalLightParams;
  pointLights: PointLightParams[];
  spot: SpotLightParams;
}

function writeColors(shader: ShadingInterface, prefix: string, light: LightColors): void {
  shader.setVec3(`${prefix}.ambient`, light.ambient);
  shader.setVec3(`${prefix}.diffuse`, light.diffuse);
  shader.setVec3(`${prefix}.specular`, light.specular);
}

/**
 * Enable lighting and write every light of the scene.
 * Point lights beyond the shader's array size are dropped with a warning.
 */
export function applySceneLighting(
  shader: ShadingInterface,
  lighting: SceneLighting,
  names: Pick<UniformNames, 'useLighting'> = DEFAULT_UNIFORM_NAMES
): void {
  shader.setBool(names.useLighting, true);

  const { directional, spot } = lighting;
  shader.setVec3('directionalLight.direction', directional.direction);
  writeColors(shader, 'directionalLight', directional);
  shader.setBool('directionalLight.bActive', true);

  if (lighting.pointLights.length > MAX_POINT_LIGHTS) {
    console.warn(
      `[SceneLighting] ${lighting.pointLights.length} point lights given, only the first ${MAX_POINT_LIGHTS} are used`
    );
  }

  for (let i = 0; i < MAX_POINT_LIGHTS; i++) {
    const light = lighting.pointLights[i];
    const prefix = `pointLights[${i}]`;
    if (!light) {
      shader.setBool(`${prefix}.bActive`, false);
      continue;
    }
    shader.setVec3(`${prefix}.position`, light.position);
    writeColors(shader, prefix, light);
    shader.setBool(`${prefix}.bActive`, true);
  }

  writeColors(shader, 'spotLight', spot);
  shader.setFloat('spotLight.constant', spot.constant);
  shader.setFloat('spotLight.linear', spot.linear);
  shader.setFloat('spotLight.quadratic', spot.quadratic);
  // The shader compares against cosines
  shader.setFloat('spotLight.cutOff', Math.cos(glMatrix.toRadian(spot.cutOffDegrees)));
  shader.setFloat('spotLight.outerCutOff', Math.cos(glMatrix.toRadian(spot.outerCutOffDegrees)));
  shader.setBool('spotLight.bActive', true);
}
