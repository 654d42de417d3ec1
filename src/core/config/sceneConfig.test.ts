import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { fileURLToPath } from 'url';
import { parseSceneConfig, resolveTextureSources, SceneConfigError } from './sceneConfig';
import { loadSceneConfig } from './loadSceneConfig';

describe('parseSceneConfig', () => {
  it('accepts a minimal config and defaults the texture root', () => {
    const config = parseSceneConfig({ textures: [{ path: 'a.png', tag: 'a' }] });

    expect(config).toEqual({ textureRoot: '', textures: [{ path: 'a.png', tag: 'a' }] });
  });

  it('keeps partial camera settings', () => {
    const config = parseSceneConfig({
      textures: [{ path: 'a.png', tag: 'a' }],
      camera: { position: [1, 2, 3], pitch: 10 },
    });

    expect(config.camera).toEqual({ position: [1, 2, 3], pitch: 10 });
  });

  it('rejects non-string tags', () => {
    expect(() => parseSceneConfig({ textures: [{ path: 'a.png', tag: 7 }] })).toThrow(SceneConfigError);
  });

  it('rejects an empty texture list', () => {
    expect(() => parseSceneConfig({ textures: [] })).toThrow(SceneConfigError);
  });

  it('lists every issue with its path', () => {
    try {
      parseSceneConfig({ textures: [{ path: '', tag: 'a' }], camera: { pitch: 120 } }, 'scene.json');
      expect.unreachable('parseSceneConfig should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(SceneConfigError);
      if (!(error instanceof SceneConfigError)) return;
      expect(error.issues.map((issue) => issue.split(':')[0])).toEqual(['textures.0.path', 'camera.pitch']);
      expect(error.message.startsWith('Invalid scene.json:\n  textures.0.path: ')).toBe(true);
    }
  });

  it('reports a non-object at the root', () => {
    try {
      parseSceneConfig('textures');
      expect.unreachable('parseSceneConfig should have thrown');
    } catch (error) {
      if (!(error instanceof SceneConfigError)) throw error;
      expect(error.issues).toHaveLength(1);
      expect(error.issues[0].startsWith('(root): ')).toBe(true);
    }
  });
});

describe('resolveTextureSources', () => {
  const config = parseSceneConfig({
    textureRoot: 'textures/',
    textures: [
      { path: 'wood.jpg', tag: 'table' },
      { path: '/abs/wall.jpg', tag: 'wall' },
    ],
  });

  it('joins relative paths onto the texture root', () => {
    expect(resolveTextureSources(config)).toEqual([
      { path: 'textures/wood.jpg', tag: 'table' },
      { path: '/abs/wall.jpg', tag: 'wall' },
    ]);
  });

  it('takes an explicit root', () => {
    expect(resolveTextureSources(config, '/assets')[0]).toEqual({ path: '/assets/wood.jpg', tag: 'table' });
    expect(resolveTextureSources(config, '')[0]).toEqual({ path: 'wood.jpg', tag: 'table' });
  });
});

describe('loadSceneConfig', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'scene-config-'));
  });

  afterEach(async () => {
    await fs.promises.rm(dir, { recursive: true, force: true });
  });

  it('loads the shipped tabletop config', async () => {
    const config = await loadSceneConfig(fileURLToPath(new URL('../../../config/scene.json', import.meta.url)));

    expect(config.textures).toHaveLength(14);
    expect(config.textures[4]).toEqual({ path: 'cork.jpg', tag: 'corkTexture' });
    expect(config.camera?.position).toEqual([0, 5, 12]);
  });

  it('wraps malformed JSON in a config error', async () => {
    const file = path.join(dir, 'broken.json');
    await fs.promises.writeFile(file, '{ "textures": [');

    await expect(loadSceneConfig(file)).rejects.toThrow(`Malformed JSON in ${file}`);
  });

  it('validates what it reads', async () => {
    const file = path.join(dir, 'empty.json');
    await fs.promises.writeFile(file, JSON.stringify({ textures: [] }));

    await expect(loadSceneConfig(file)).rejects.toBeInstanceOf(SceneConfigError);
  });
});
