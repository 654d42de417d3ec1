import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { Camera } from './Camera';
import { ORTHOGRAPHIC_VIEW, ViewManager } from './ViewManager';
import { RecordingShadingInterface } from '../testing';

describe('ViewManager', () => {
  let shader: RecordingShadingInterface;
  let camera: Camera;
  let view: ViewManager;

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    shader = new RecordingShadingInterface();
    camera = new Camera();
    view = new ViewManager(shader, camera);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('prepareSceneView', () => {
    it('writes the view uniforms and aims the spot light with the camera', () => {
      view.prepareSceneView(16 / 9);

      expect(shader.namesWritten()).toEqual([
        'view',
        'projection',
        'viewPosition',
        'spotLight.position',
        'spotLight.direction',
      ]);
      expect(shader.get('view')).toEqual(Array.from(camera.getViewMatrix()));
      expect(shader.get('viewPosition')).toEqual([0, 5, 12]);
      expect(shader.get('spotLight.position')).toEqual([0, 5, 12]);
      expect(shader.get('spotLight.direction')).toEqual(camera.front);
    });

    it('follows the camera between frames', () => {
      view.prepareSceneView(1);
      camera.position = [3, 1, 4];
      view.prepareSceneView(1);

      expect(shader.get('viewPosition')).toEqual([3, 1, 4]);
      expect(shader.get('spotLight.position')).toEqual([3, 1, 4]);
    });
  });

  describe('projection', () => {
    it('uses a 45 degree perspective by default', () => {
      const projection = view.getProjectionMatrix(2);
      const focal = 1 / Math.tan(Math.PI / 8);

      expect(view.projectionMode).toBe('perspective');
      expect(projection[5]).toBeCloseTo(focal, 5);
      expect(projection[0]).toBeCloseTo(focal / 2, 5);
      expect(projection[11]).toBe(-1);
    });

    it('uses a fixed-height box in orthographic mode', () => {
      view.setProjectionMode('orthographic');
      const projection = view.getProjectionMatrix(2);

      expect(projection[0]).toBeCloseTo(1 / 12, 6);
      expect(projection[5]).toBeCloseTo(1 / 6, 6);
      expect(projection[11]).toBe(0);
      expect(projection[15]).toBe(1);
    });
  });

  describe('setProjectionMode', () => {
    it('moves to the front view and restores the free camera afterwards', () => {
      camera.processMouseMovement(150, 40);
      const before = camera.getState();

      view.setProjectionMode('orthographic');
      expect(camera.getState()).toEqual(ORTHOGRAPHIC_VIEW);

      camera.processKeyboard('left', 1);
      view.setProjectionMode('perspective');

      expect(camera.getState()).toEqual(before);
      expect(view.projectionMode).toBe('perspective');
    });

    it('keeps the first saved camera when orthographic is requested twice', () => {
      const before = camera.getState();

      view.setProjectionMode('orthographic');
      view.setProjectionMode('orthographic');
      view.setProjectionMode('perspective');

      expect(camera.getState()).toEqual(before);
      expect(console.log).toHaveBeenCalledTimes(2);
    });

    it('leaves the camera alone when perspective is already active', () => {
      camera.processKeyboard('forward', 1);
      const before = camera.getState();

      view.setProjectionMode('perspective');

      expect(camera.getState()).toEqual(before);
      expect(console.log).not.toHaveBeenCalled();
    });

    it('logs the switch', () => {
      view.setProjectionMode('orthographic');

      expect(console.log).toHaveBeenCalledWith('[ViewManager] Switched to orthographic projection');
    });
  });
});
