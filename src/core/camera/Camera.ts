/**
 * Camera - fly camera driven by yaw/pitch angles in degrees
 *
 * Yaw -90 looks down -Z. Movement is relative to where the camera faces.
 */

import { glMatrix, mat4, vec3 } from 'gl-matrix';
import type { Vec3 } from '../types';

export type CameraMovement = 'forward' | 'backward' | 'left' | 'right' | 'up' | 'down';

export interface CameraSettings {
  position: Vec3;
  /** Degrees; -90 faces -Z */
  yaw: number;
  /** Degrees, clamped to ±89 */
  pitch: number;
  /** Vertical field of view in degrees */
  fov: number;
  near: number;
  far: number;
  /** World units per second */
  movementSpeed: number;
}

/** Everything needed to put the camera back where it was */
export interface CameraState {
  position: Vec3;
  yaw: number;
  pitch: number;
  fov: number;
}

export const DEFAULT_CAMERA_SETTINGS: Readonly<CameraSettings> = {
  position: [0, 5, 12],
  yaw: -90,
  pitch: -20,
  fov: 45,
  near: 0.1,
  far: 100,
  movementSpeed: 2.5,
};

const MOUSE_SENSITIVITY = 0.1;
const MAX_PITCH = 89;
export const MIN_MOVEMENT_SPEED = 1;
export const MAX_MOVEMENT_SPEED = 20;

const WORLD_UP: Vec3 = [0, 1, 0];

function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

export class Camera {
  position: Vec3;
  yaw: number;
  pitch: number;
  fov: number;
  near: number;
  far: number;
  movementSpeed: number;

  constructor(settings: Partial<CameraSettings> = {}) {
    const s = { ...DEFAULT_CAMERA_SETTINGS, ...settings };
    this.position = [s.position[0], s.position[1], s.position[2]];
    this.yaw = s.yaw;
    this.pitch = clamp(s.pitch, -MAX_PITCH, MAX_PITCH);
    this.fov = s.fov;
    this.near = s.near;
    this.far = s.far;
    this.movementSpeed = clamp(s.movementSpeed, MIN_MOVEMENT_SPEED, MAX_MOVEMENT_SPEED);
  }

  /** Unit view direction */
  get front(): Vec3 {
    const yaw = glMatrix.toRadian(this.yaw);
    const pitch = glMatrix.toRadian(this.pitch);
    const front = vec3.normalize(vec3.create(), [
      Math.cos(yaw) * Math.cos(pitch),
      Math.sin(pitch),
      Math.sin(yaw) * Math.cos(pitch),
    ]);
    return [front[0], front[1], front[2]];
  }

  get right(): Vec3 {
    const right = vec3.normalize(vec3.create(), vec3.cross(vec3.create(), this.front, WORLD_UP));
    return [right[0], right[1], right[2]];
  }

  get up(): Vec3 {
    const up = vec3.normalize(vec3.create(), vec3.cross(vec3.create(), this.right, this.front));
    return [up[0], up[1], up[2]];
  }

  getViewMatrix(out: mat4 = mat4.create()): mat4 {
    const target = vec3.add(vec3.create(), this.position, this.front);
    return mat4.lookAt(out, this.position, target, this.up);
  }

  /**
   * Move along the view axes
   * @param deltaTime - Seconds since the last frame
   */
  processKeyboard(direction: CameraMovement, deltaTime: number): void {
    const distance = this.movementSpeed * deltaTime;
    const axes: Record<CameraMovement, [Vec3, number]> = {
      forward: [this.front, 1],
      backward: [this.front, -1],
      right: [this.right, 1],
      left: [this.right, -1],
      up: [this.up, 1],
      down: [this.up, -1],
    };
    const [axis, sign] = axes[direction];
    const moved = vec3.scaleAndAdd(vec3.create(), this.position, axis, distance * sign);
    this.position = [moved[0], moved[1], moved[2]];
  }

  /**
   * Turn by a mouse offset in pixels; positive y looks up
   */
  processMouseMovement(xOffset: number, yOffset: number): void {
    this.yaw += xOffset * MOUSE_SENSITIVITY;
    this.pitch = clamp(this.pitch + yOffset * MOUSE_SENSITIVITY, -MAX_PITCH, MAX_PITCH);
  }

  /**
   * The scroll wheel changes how fast the camera moves
   */
  processMouseScroll(yOffset: number): void {
    this.movementSpeed = clamp(this.movementSpeed + yOffset, MIN_MOVEMENT_SPEED, MAX_MOVEMENT_SPEED);
  }

  getState(): CameraState {
    return { position: [...this.position], yaw: this.yaw, pitch: this.pitch, fov: this.fov };
  }

  setState(state: CameraState): void {
    this.position = [...state.position];
    this.yaw = state.yaw;
    this.pitch = clamp(state.pitch, -MAX_PITCH, MAX_PITCH);
    this.fov = state.fov;
  }
}
