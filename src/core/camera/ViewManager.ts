/**
 * ViewManager - camera, projection and the per-frame view uniforms
 *
 * The orthographic mode is a fixed front view of the table. Switching to it
 * remembers the free camera and switching back restores it.
 */

import { glMatrix, mat4 } from 'gl-matrix';
import type { ShadingInterface } from '../gl/types';
import { Camera, type CameraState } from './Camera';

export type ProjectionMode = 'perspective' | 'orthographic';

/** Front view used while the projection is orthographic */
export const ORTHOGRAPHIC_VIEW: Readonly<CameraState> = {
  position: [-1, 2, 12],
  yaw: -90,
  pitch: 0,
  fov: 45,
};

/** Half the visible height of the orthographic view, in world units */
export const ORTHOGRAPHIC_HALF_HEIGHT = 6;

export const VIEW_UNIFORMS = {
  view: 'view',
  projection: 'projection',
  viewPosition: 'viewPosition',
  spotPosition: 'spotLight.position',
  spotDirection: 'spotLight.direction',
} as const;

export class ViewManager {
  readonly camera: Camera;
  private mode: ProjectionMode = 'perspective';
  private savedCamera: CameraState | null = null;

  private readonly viewMatrix = mat4.create();
  private readonly projectionMatrix = mat4.create();

  constructor(
    private readonly shader: ShadingInterface,
    camera: Camera = new Camera()
  ) {
    this.camera = camera;
  }

  get projectionMode(): ProjectionMode {
    return this.mode;
  }

  setProjectionMode(mode: ProjectionMode): void {
    if (mode === this.mode) return;

    if (mode === 'orthographic') {
      this.savedCamera = this.camera.getState();
      this.camera.setState(ORTHOGRAPHIC_VIEW);
    } else if (this.savedCamera) {
      this.camera.setState(this.savedCamera);
      this.savedCamera = null;
    }

    this.mode = mode;
    console.log(`[ViewManager] Switched to ${mode} projection`);
  }

  getProjectionMatrix(aspect: number, out: mat4 = mat4.create()): mat4 {
    const { near, far } = this.camera;
    if (this.mode === 'orthographic') {
      const halfHeight = ORTHOGRAPHIC_HALF_HEIGHT;
      const halfWidth = halfHeight * aspect;
      return mat4.ortho(out, -halfWidth, halfWidth, -halfHeight, halfHeight, near, far);
    }
    return mat4.perspective(out, glMatrix.toRadian(this.camera.fov), aspect, near, far);
  }

  /**
   * Write view, projection and eye position for this frame. The spot light
   * rides on the camera like a headlamp.
   */
  prepareSceneView(aspect: number): void {
    this.camera.getViewMatrix(this.viewMatrix);
    this.getProjectionMatrix(aspect, this.projectionMatrix);

    this.shader.setMat4(VIEW_UNIFORMS.view, this.viewMatrix);
    this.shader.setMat4(VIEW_UNIFORMS.projection, this.projectionMatrix);
    this.shader.setVec3(VIEW_UNIFORMS.viewPosition, this.camera.position);
    this.shader.setVec3(VIEW_UNIFORMS.spotPosition, this.camera.position);
    this.shader.setVec3(VIEW_UNIFORMS.spotDirection, this.camera.front);
  }
}
