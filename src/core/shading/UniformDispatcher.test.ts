import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { UniformDispatcher } from './UniformDispatcher';
import { DEFAULT_UNIFORM_NAMES } from './uniformNames';
import { MaterialRegistry } from '../materials/MaterialRegistry';
import { TextureRegistry } from '../textures/TextureRegistry';
import { RecordingShadingInterface, RecordingTextureContext, StubImageDecoder, solidImage } from '../testing';

describe('UniformDispatcher', () => {
  let shader: RecordingShadingInterface;
  let textures: TextureRegistry<number>;
  let materials: MaterialRegistry;
  let dispatcher: UniformDispatcher;

  beforeEach(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    shader = new RecordingShadingInterface();
    textures = new TextureRegistry(new RecordingTextureContext(), new StubImageDecoder({}, solidImage(2, 2, 3)));
    await textures.load('wood.jpg', 'table');
    await textures.load('cork.jpg', 'cork');
    materials = new MaterialRegistry();
    dispatcher = new UniformDispatcher(shader, textures, materials);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('setColor', () => {
    it('turns texturing off and writes the color', () => {
      dispatcher.setColor(0.1, 0.2, 0.3, 0.8);

      expect(shader.calls).toEqual([
        { method: 'setBool', name: 'bUseTexture', value: false },
        { method: 'setVec4', name: 'objectColor', value: [0.1, 0.2, 0.3, 0.8] },
      ]);
    });
  });

  describe('setTexture', () => {
    it('points the sampler at the slot of the tag', () => {
      const result = dispatcher.setTexture('cork');

      expect(result).toEqual({ success: true, slot: 1 });
      expect(shader.calls).toEqual([
        { method: 'setBool', name: 'bUseTexture', value: true },
        { method: 'setSampler2D', name: 'objectTexture', value: 1 },
      ]);
    });

    it('writes nothing for an unknown tag', () => {
      const result = dispatcher.setTexture('velvet');

      expect(result).toEqual({
        success: false,
        error: { kind: 'TagNotFound', registry: 'texture', tag: 'velvet' },
      });
      expect(shader.calls).toEqual([]);
    });

    it('warns once per unknown tag', () => {
      dispatcher.setTexture('velvet');
      dispatcher.setTexture('velvet');
      dispatcher.setTexture('linen');

      expect(console.warn).toHaveBeenCalledTimes(2);
      expect(console.warn).toHaveBeenCalledWith('[UniformDispatcher] No texture registered with tag "velvet"');
    });
  });

  describe('setUVScale', () => {
    it('writes the tiling factors', () => {
      dispatcher.setUVScale(4, 2);

      expect(shader.get('UVscale')).toEqual([4, 2]);
    });
  });

  describe('setMaterial', () => {
    it('does nothing while no material is defined', () => {
      const result = dispatcher.setMaterial('gold');

      expect(result).toEqual({ success: true, applied: false });
      expect(shader.calls).toEqual([]);
      expect(console.warn).not.toHaveBeenCalled();
    });

    it('writes diffuse, specular and shininess', () => {
      materials.define('gold', [0.4, 0.4, 0.4], [1, 1, 1], 256);

      const result = dispatcher.setMaterial('gold');

      expect(result).toEqual({ success: true, applied: true });
      expect(shader.calls).toEqual([
        { method: 'setVec3', name: 'material.diffuseColor', value: [0.4, 0.4, 0.4] },
        { method: 'setVec3', name: 'material.specularColor', value: [1, 1, 1] },
        { method: 'setFloat', name: 'material.shininess', value: 256 },
      ]);
    });

    it('reports an unknown tag and leaves the material uniforms alone', () => {
      materials.define('gold', [0.4, 0.4, 0.4], [1, 1, 1], 256);

      const result = dispatcher.setMaterial('velvet');

      expect(result).toEqual({
        success: false,
        error: { kind: 'TagNotFound', registry: 'material', tag: 'velvet' },
      });
      expect(shader.calls).toEqual([]);
      expect(console.warn).toHaveBeenCalledWith('[UniformDispatcher] No material registered with tag "velvet"');
    });

    it('tracks texture and material misses separately', () => {
      materials.define('gold', [0.4, 0.4, 0.4], [1, 1, 1], 256);

      dispatcher.setTexture('velvet');
      dispatcher.setMaterial('velvet');

      expect(console.warn).toHaveBeenCalledTimes(2);
    });
  });

  describe('setLighting', () => {
    it('toggles the lighting flag', () => {
      dispatcher.setLighting(false);

      expect(shader.get('bUseLighting')).toBe(false);
    });
  });

  it('writes through custom uniform names', () => {
    const custom = new UniformDispatcher(shader, textures, materials, {
      ...DEFAULT_UNIFORM_NAMES,
      useTexture: 'uHasTexture',
      objectTexture: 'uAlbedo',
    });

    custom.setTexture('table');

    expect(shader.namesWritten()).toEqual(['uHasTexture', 'uAlbedo']);
  });
});
