/**
 * CameraInput - keyboard and mouse bindings for the tabletop view
 *
 * W/S/A/D move, Q/E rise and sink, P and O pick the projection. Mouse look
 * needs pointer lock, requested by clicking the canvas. The wheel changes
 * movement speed.
 *
 * Held keys are sampled once per frame in update() so movement scales with
 * frame time.
 */

import type { CameraMovement } from '../../core/camera/Camera';
import type { ProjectionMode, ViewManager } from '../../core/camera/ViewManager';

// ==================== Key Bindings ====================

export const MOVEMENT_KEYS: Readonly<Record<string, CameraMovement>> = {
  KeyW: 'forward',
  KeyS: 'backward',
  KeyA: 'left',
  KeyD: 'right',
  KeyQ: 'up',
  KeyE: 'down',
};

export const PROJECTION_KEYS: Readonly<Record<string, ProjectionMode>> = {
  KeyP: 'perspective',
  KeyO: 'orthographic',
};

// ==================== CameraInput Class ====================

export class CameraInput {
  private readonly held = new Set<CameraMovement>();
  private canvas: HTMLCanvasElement | null = null;
  private pointerLocked = false;

  // Bound handlers for cleanup
  private readonly boundKeyDown = (e: KeyboardEvent) => this.handleKeyDown(e.code);
  private readonly boundKeyUp = (e: KeyboardEvent) => this.handleKeyUp(e.code);
  private readonly boundMouseMove = (e: MouseEvent) => {
    if (this.pointerLocked) this.handleMouseMove(e.movementX, e.movementY);
  };
  private readonly boundWheel = (e: WheelEvent) => {
    e.preventDefault();
    this.handleWheel(e.deltaY);
  };
  private readonly boundClick = () => this.requestPointerLock();
  private readonly boundPointerLockChange = () => {
    this.pointerLocked = this.canvas !== null && document.pointerLockElement === this.canvas;
  };
  private readonly boundBlur = () => this.held.clear();

  constructor(private readonly view: ViewManager) {}

  // ==================== DOM Wiring ====================

  attach(canvas: HTMLCanvasElement): void {
    if (this.canvas) this.detach();
    this.canvas = canvas;

    window.addEventListener('keydown', this.boundKeyDown);
    window.addEventListener('keyup', this.boundKeyUp);
    window.addEventListener('blur', this.boundBlur);
    document.addEventListener('mousemove', this.boundMouseMove);
    document.addEventListener('pointerlockchange', this.boundPointerLockChange);
    canvas.addEventListener('wheel', this.boundWheel, { passive: false });
    canvas.addEventListener('click', this.boundClick);
  }

  detach(): void {
    const canvas = this.canvas;
    if (!canvas) return;

    window.removeEventListener('keydown', this.boundKeyDown);
    window.removeEventListener('keyup', this.boundKeyUp);
    window.removeEventListener('blur', this.boundBlur);
    document.removeEventListener('mousemove', this.boundMouseMove);
    document.removeEventListener('pointerlockchange', this.boundPointerLockChange);
    canvas.removeEventListener('wheel', this.boundWheel);
    canvas.removeEventListener('click', this.boundClick);

    if (document.pointerLockElement === canvas) {
      document.exitPointerLock();
    }
    this.canvas = null;
    this.pointerLocked = false;
    this.held.clear();
  }

  private requestPointerLock(): void {
    const canvas = this.canvas;
    if (!canvas) return;
    // Older DOM typings return void, newer ones a promise
    Promise.resolve(canvas.requestPointerLock()).catch((error: unknown) => {
      console.warn('[CameraInput] Pointer lock was refused:', error);
    });
  }

  // ==================== Event Handling ====================

  handleKeyDown(code: string): void {
    const movement = MOVEMENT_KEYS[code];
    if (movement) {
      this.held.add(movement);
      return;
    }
    const mode = PROJECTION_KEYS[code];
    if (mode) {
      this.view.setProjectionMode(mode);
    }
  }

  handleKeyUp(code: string): void {
    const movement = MOVEMENT_KEYS[code];
    if (movement) this.held.delete(movement);
  }

  /**
   * @param movementX - Pixels right
   * @param movementY - Pixels down (screen space)
   */
  handleMouseMove(movementX: number, movementY: number): void {
    this.view.camera.processMouseMovement(movementX, -movementY);
  }

  /** One speed step per wheel event; scrolling up speeds up */
  handleWheel(deltaY: number): void {
    if (deltaY !== 0) {
      this.view.camera.processMouseScroll(-Math.sign(deltaY));
    }
  }

  /**
   * Apply held movement keys
   * @param deltaTime - Seconds since the last frame
   */
  update(deltaTime: number): void {
    for (const movement of this.held) {
      this.view.camera.processKeyboard(movement, deltaTime);
    }
  }
}
