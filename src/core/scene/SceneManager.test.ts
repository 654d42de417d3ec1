import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { SceneManager, type SceneManagerOptions } from './SceneManager';
import type { TextureSource } from './types';
import type { DecodedImage } from '../textures/ImageDecoder';
import {
  RecordingMeshLibrary,
  RecordingShadingInterface,
  RecordingTextureContext,
  StubImageDecoder,
  solidImage,
} from '../testing';

const TABLETOP_TEXTURES: TextureSource[] = [
  'planeTexture',
  'redTexture',
  'midTexture',
  'topTexture',
  'corkTexture',
  'cupTexture',
  'bottleTexture',
  'knobTexture',
  'whiteTexture',
  'lidTexture',
  'gripTexture',
  'pot1',
  'pot2',
  'wall',
].map((tag) => ({ path: `textures/${tag}.jpg`, tag }));

describe('SceneManager', () => {
  let shader: RecordingShadingInterface;
  let context: RecordingTextureContext;
  let meshes: RecordingMeshLibrary;

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    shader = new RecordingShadingInterface();
    context = new RecordingTextureContext();
    meshes = new RecordingMeshLibrary();
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  function createManager(overrides: Partial<SceneManagerOptions<number>> = {}): SceneManager<number> {
    return new SceneManager({
      shader,
      textureContext: context,
      decoder: new StubImageDecoder({}, solidImage(2, 2, 3)),
      createMeshes: () => meshes,
      textures: TABLETOP_TEXTURES,
      ...overrides,
    });
  }

  describe('prepareScene', () => {
    it('loads every texture, the materials, the lights and the meshes', async () => {
      const manager = createManager();

      const report = await manager.prepareScene();

      expect(report.loaded).toEqual(TABLETOP_TEXTURES.map((t) => t.tag));
      expect(report.failed).toEqual([]);
      expect(manager.textures.size).toBe(14);
      expect(manager.materials.entries().map((m) => m.tag)).toEqual(['shinier', 'matte', 'gold', 'glass']);
      expect(shader.get('bUseLighting')).toBe(true);
      expect([...meshes.loaded]).toEqual([
        'box',
        'pyramid4',
        'cylinder',
        'taperedCylinder',
        'cone',
        'halfSphere',
        'plane',
        'sphere',
      ]);
      expect(console.log).toHaveBeenCalledWith('[SceneManager] Scene prepared: 14/14 textures, 4 materials, 8 meshes');
    });

    it('keeps going when a texture fails to load', async () => {
      const manager = createManager({
        decoder: new StubImageDecoder(
          { 'textures/cork.jpg': new Error('bad huffman table') },
          solidImage(2, 2, 3)
        ),
        textures: [
          { path: 'textures/plane.jpg', tag: 'planeTexture' },
          { path: 'textures/cork.jpg', tag: 'corkTexture' },
          { path: 'textures/wall.jpg', tag: 'wall' },
        ],
      });

      const report = await manager.prepareScene();

      expect(report.loaded).toEqual(['planeTexture', 'wall']);
      expect(report.failed).toEqual([
        {
          tag: 'corkTexture',
          error: { kind: 'DecodeFailure', path: 'textures/cork.jpg', reason: 'bad huffman table' },
        },
      ]);
      expect(manager.textures.findSlot('wall')).toBe(1);
    });

    it('runs only once', async () => {
      const manager = createManager();
      await manager.prepareScene();

      await expect(manager.prepareScene()).rejects.toThrow('[SceneManager] prepareScene() called twice');
      expect(manager.materials.size).toBe(4);
      expect(manager.textures.size).toBe(14);
      expect(context.liveTextures.size).toBe(14);
    });

    it('abandons setup when destroyed before the first load runs', async () => {
      const manager = createManager();

      const pending = manager.prepareScene();
      manager.destroy();
      const report = await pending;

      expect(report).toEqual({ loaded: [], failed: [] });
      expect(context.liveTextures.size).toBe(0);
      expect(manager.textures.size).toBe(0);
      expect(manager.materials.isEmpty).toBe(true);
      expect(shader.has('bUseLighting')).toBe(false);
      expect(meshes.loaded.size).toBe(0);
      expect(meshes.destroyCount).toBe(1);
    });

    it('leaves nothing behind when destroyed mid-decode', async () => {
      let open = () => {};
      const gate = new Promise<void>((resolve) => {
        open = resolve;
      });
      const decode = vi.fn(async (path: string): Promise<DecodedImage> => {
        if (path === 'textures/redTexture.jpg') await gate;
        return solidImage(2, 2, 3);
      });
      const manager = createManager({ decoder: { decode } });

      const pending = manager.prepareScene();
      await vi.waitFor(() => expect(decode).toHaveBeenCalledTimes(2));
      manager.destroy();
      open();
      const report = await pending;

      expect(report).toEqual({ loaded: ['planeTexture'], failed: [] });
      expect(decode).toHaveBeenCalledTimes(2);
      expect(context.deleted).toEqual([1]);
      expect(context.liveTextures.size).toBe(0);
      expect(manager.textures.size).toBe(0);
      expect(manager.materials.isEmpty).toBe(true);
      expect(meshes.loaded.size).toBe(0);
    });

    it('does not touch material uniforms during setup', async () => {
      await createManager().prepareScene();

      expect(shader.has('material.shininess')).toBe(false);
    });
  });

  describe('renderScene', () => {
    it('binds the textures and draws every step', async () => {
      const manager = createManager();
      await manager.prepareScene();

      const frame = manager.renderScene();

      expect(frame).toEqual({ stepsDrawn: 26, textureMisses: 0, materialMisses: 0 });
      expect(context.units.size).toBe(14);
      expect(context.units.get(13)).toBe(14);
      expect(meshes.draws).toHaveLength(26);
    });

    it('reports the draws whose texture did not load', async () => {
      const manager = createManager({ textures: TABLETOP_TEXTURES.filter((t) => t.tag !== 'whiteTexture') });
      await manager.prepareScene();

      const frame = manager.renderScene();

      // Container base and its two edge cylinders
      expect(frame.textureMisses).toBe(3);
      expect(frame.stepsDrawn).toBe(26);
    });
  });

  describe('destroy', () => {
    it('releases textures, materials and meshes once', async () => {
      const manager = createManager();
      await manager.prepareScene();

      manager.destroy();
      manager.destroy();

      expect(context.deleted).toHaveLength(14);
      expect(context.liveTextures.size).toBe(0);
      expect(manager.materials.isEmpty).toBe(true);
      expect(meshes.destroyCount).toBe(1);
    });

    it('refuses to render afterwards', async () => {
      const manager = createManager();
      await manager.prepareScene();
      manager.destroy();

      expect(() => manager.renderScene()).toThrow('[SceneManager] renderScene() called after destroy()');
    });
  });
});
