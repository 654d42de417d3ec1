/**
 * The tabletop still life: tray, sugar container, gold cup, coffee pot,
 * bottle, cone ornament, lidded container, backdrop wall, table and a glass
 * sphere. Units are world units, rotations are degrees.
 */

import type { Vec3 } from '../types';
import type { TransformSpec } from '../shading/TransformComposer';
import type { DrawShading, DrawStep, MaterialDefinition } from './types';

function place(scale: Vec3, rotationDegrees: Vec3, position: Vec3): TransformSpec {
  return { scale, rotationDegrees, position };
}

function texture(tag: string): DrawShading {
  return { kind: 'texture', tag };
}

export const TABLETOP_MATERIALS: readonly MaterialDefinition[] = [
  { tag: 'shinier', diffuseColor: [0.4, 0.4, 0.4], specularColor: [1, 1, 1], shininess: 128 },
  { tag: 'matte', diffuseColor: [0.3, 0.3, 0.4], specularColor: [0, 0, 0], shininess: 0.05 },
  { tag: 'gold', diffuseColor: [0.4, 0.4, 0.4], specularColor: [1, 1, 1], shininess: 256 },
  { tag: 'glass', diffuseColor: [0.1, 0.2, 0.3], specularColor: [1, 1, 1], shininess: 256 },
];

export const TABLETOP_SCENE: readonly DrawStep[] = [
  {
    name: 'tray',
    transform: place([9.5, 0.5, 5.5], [0, 0, 0], [-1, -0.9, 6]),
    shading: texture('planeTexture'),
    materialTag: 'matte',
    mesh: { kind: 'box' },
  },

  // Sugar container
  {
    name: 'sugar container base',
    transform: place([1.5, 1.7, 1.5], [0, 45, 0], [2, 0.2, 5]),
    shading: texture('redTexture'),
    materialTag: 'shinier',
    mesh: { kind: 'box' },
  },
  {
    name: 'sugar container shoulder',
    transform: place([1.5, 1.5, 1.5], [0, 45, 0], [2, 1.8, 5]),
    shading: texture('midTexture'),
    materialTag: 'shinier',
    mesh: { kind: 'pyramid4' },
  },
  {
    name: 'sugar container top',
    transform: place([1, 0.8, 1], [0, 45, 0], [2, 1.9, 5]),
    shading: texture('topTexture'),
    materialTag: 'shinier',
    mesh: { kind: 'box' },
  },
  {
    name: 'sugar container cork',
    transform: place([0.7, 0.4, 0.7], [0, 45, 0], [2, 2.3, 5]),
    shading: texture('corkTexture'),
    materialTag: 'matte',
    mesh: { kind: 'box' },
  },

  {
    name: 'gold cup',
    transform: place([0.7, 1.2, 0.7], [0, 45, 0], [2.5, -0.6, 7.4]),
    shading: texture('cupTexture'),
    materialTag: 'gold',
    mesh: { kind: 'cylinder', parts: { top: false } },
  },

  // Coffee pot
  {
    name: 'coffee pot base',
    transform: place([0.9, 1, 0.9], [0, 0, 0], [-0.9, -0.7, 5.3]),
    shading: texture('pot2'),
    materialTag: 'shinier',
    mesh: { kind: 'cylinder', parts: { top: false } },
  },
  {
    name: 'coffee pot body',
    transform: place([0.9, 2.8, 0.9], [0, 0, 0], [-0.9, 0.2, 5.3]),
    shading: texture('pot2'),
    materialTag: 'shinier',
    mesh: { kind: 'taperedCylinder', parts: { top: false, bottom: false } },
  },
  {
    name: 'coffee pot top',
    transform: place([0.9, 1, 0.9], [180, 0, 0], [-0.9, 3.7, 5.3]),
    shading: texture('pot1'),
    materialTag: 'matte',
    mesh: { kind: 'taperedCylinder', parts: { top: false, bottom: false } },
  },
  {
    name: 'coffee pot handle short',
    transform: place([0.4, 0.5, 0.5], [-78, 0, 0], [-0.9, 2.3, 4.5]),
    shading: texture('gripTexture'),
    materialTag: 'matte',
    mesh: { kind: 'box' },
  },
  {
    name: 'coffee pot handle long',
    transform: place([0.4, 0.5, 1.6], [-78, 0, 0], [-0.9, 2, 4.1]),
    shading: texture('gripTexture'),
    materialTag: 'matte',
    mesh: { kind: 'box' },
  },

  // Bottle
  {
    name: 'bottle body',
    transform: place([0.8, 2.5, 0.8], [0, 0, 0], [-2.9, -0.7, 5.3]),
    shading: texture('bottleTexture'),
    materialTag: 'shinier',
    mesh: { kind: 'cylinder' },
  },
  {
    name: 'bottle shoulder',
    transform: place([0.8, 0.5, 0.8], [0, 0, 0], [-2.9, 1.8, 5.3]),
    shading: texture('bottleTexture'),
    materialTag: 'shinier',
    mesh: { kind: 'taperedCylinder' },
  },
  {
    name: 'bottle neck',
    transform: place([0.4, 0.5, 0.4], [0, 0, 0], [-2.9, 2.3, 5.3]),
    shading: texture('bottleTexture'),
    materialTag: 'shinier',
    mesh: { kind: 'cylinder', parts: { top: false } },
  },

  // Cone ornament
  {
    name: 'cone ornament',
    transform: place([0.8, 2.5, 0.8], [0, 0, 0], [-4.6, 0, 5.3]),
    shading: texture('corkTexture'),
    materialTag: 'matte',
    mesh: { kind: 'cone' },
  },
  {
    name: 'cone ornament base',
    transform: place([0.8, 0.8, 0.8], [180, 0, 0], [-4.6, -0.02, 5.3]),
    shading: texture('corkTexture'),
    materialTag: 'matte',
    mesh: { kind: 'halfSphere' },
  },

  // Lidded container
  {
    name: 'container base',
    transform: place([3.8, 0.7, 1.5], [0, 0, 0], [-1.5, -0.5, 7.5]),
    shading: texture('whiteTexture'),
    materialTag: 'shinier',
    mesh: { kind: 'box' },
  },
  {
    name: 'container base left edge',
    transform: place([0.77, 0.7, 0.77], [0, 0, 0], [-3.2, -0.85, 7.5]),
    shading: texture('whiteTexture'),
    materialTag: 'shinier',
    mesh: { kind: 'cylinder' },
  },
  {
    name: 'container base right edge',
    transform: place([0.77, 0.7, 0.77], [0, 0, 0], [0.2, -0.85, 7.5]),
    shading: texture('whiteTexture'),
    materialTag: 'shinier',
    mesh: { kind: 'cylinder' },
  },
  {
    name: 'container lid',
    transform: place([3.8, 0.3, 1.58], [0, 0, 0], [-1.5, 0, 7.5]),
    shading: texture('lidTexture'),
    materialTag: 'shinier',
    mesh: { kind: 'box' },
  },
  {
    name: 'container lid left edge',
    transform: place([0.8, 0.3, 0.8], [0, 0, 0], [-3.2, -0.15, 7.5]),
    shading: texture('lidTexture'),
    materialTag: 'shinier',
    mesh: { kind: 'cylinder' },
  },
  {
    name: 'container lid right edge',
    transform: place([0.8, 0.3, 0.8], [0, 0, 0], [0.2, -0.15, 7.5]),
    shading: texture('lidTexture'),
    materialTag: 'shinier',
    mesh: { kind: 'cylinder' },
  },
  {
    name: 'container knob',
    transform: place([0.3, 0.2, 0.3], [0, 0, 0], [-1.5, 0.15, 7.5]),
    shading: texture('knobTexture'),
    materialTag: 'shinier',
    mesh: { kind: 'cylinder' },
  },

  {
    name: 'backdrop wall',
    transform: place([11, 0.5, 7], [90, 0, 0], [-1, 5.45, -0.97]),
    shading: texture('wall'),
    materialTag: 'matte',
    mesh: { kind: 'plane' },
  },
  {
    name: 'table',
    transform: place([22, 0.5, 15], [0, 0, 0], [-1, -1.4, 6]),
    shading: texture('planeTexture'),
    materialTag: 'shinier',
    mesh: { kind: 'box' },
  },

  // Translucent, must stay last
  {
    name: 'glass sphere',
    transform: place([0.8, 0.8, 0.8], [0, 0, 0], [-5.1, 0, 7.3]),
    shading: { kind: 'color', rgba: [0.1, 0.2, 0.3, 0.8] },
    materialTag: 'glass',
    mesh: { kind: 'sphere' },
  },
];
