import { describe, it, expect } from 'vitest';
import { MaterialRegistry } from './MaterialRegistry';
import type { RGB } from '../types';

describe('MaterialRegistry', () => {
  it('starts empty', () => {
    const registry = new MaterialRegistry();

    expect(registry.isEmpty).toBe(true);
    expect(registry.size).toBe(0);
    expect(registry.find('gold')).toBeNull();
  });

  it('finds a defined material by tag', () => {
    const registry = new MaterialRegistry();
    registry.define('gold', [0.4, 0.4, 0.4], [1, 1, 1], 256);

    expect(registry.find('gold')).toEqual({
      tag: 'gold',
      diffuseColor: [0.4, 0.4, 0.4],
      specularColor: [1, 1, 1],
      shininess: 256,
    });
    expect(registry.isEmpty).toBe(false);
  });

  it('returns the first of several materials sharing a tag', () => {
    const registry = new MaterialRegistry();
    registry.define('matte', [0.3, 0.3, 0.4], [0, 0, 0], 0.05);
    registry.define('matte', [1, 0, 0], [1, 1, 1], 64);

    expect(registry.size).toBe(2);
    expect(registry.find('matte')?.shininess).toBe(0.05);
  });

  it('copies the color vectors it is given', () => {
    const registry = new MaterialRegistry();
    const diffuse: RGB = [0.1, 0.2, 0.3];
    registry.define('glass', diffuse, [1, 1, 1], 256);

    diffuse[0] = 0.9;

    expect(registry.find('glass')?.diffuseColor).toEqual([0.1, 0.2, 0.3]);
  });

  it('lists entries in definition order and clears them', () => {
    const registry = new MaterialRegistry();
    registry.define('shinier', [0.4, 0.4, 0.4], [1, 1, 1], 128);
    registry.define('gold', [0.4, 0.4, 0.4], [1, 1, 1], 256);

    expect(registry.entries().map((m) => m.tag)).toEqual(['shinier', 'gold']);

    registry.clear();
    expect(registry.isEmpty).toBe(true);
  });
});
