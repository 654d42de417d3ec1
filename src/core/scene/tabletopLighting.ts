import type { SceneLighting } from '../lighting/sceneLighting';

/**
 * Soft overhead daylight, five warm fill lights around the table and a
 * camera-mounted spot light
 */
export const TABLETOP_LIGHTING: SceneLighting = {
  directional: {
    direction: [-0.05, -0.3, -0.1],
    ambient: [0.05, 0.05, 0.05],
    diffuse: [0.6, 0.6, 0.6],
    specular: [0, 0, 0],
  },
  pointLights: [
    { position: [-4, 8, 0], ambient: [0.05, 0.05, 0.05], diffuse: [0.3, 0.3, 0.3], specular: [0.1, 0.1, 0.1] },
    { position: [4, 8, 0], ambient: [0.05, 0.05, 0.05], diffuse: [0.3, 0.3, 0.3], specular: [0.1, 0.1, 0.1] },
    { position: [3.8, 5.5, 4], ambient: [0.05, 0.05, 0.05], diffuse: [0.2, 0.2, 0.2], specular: [0.8, 0.8, 0.8] },
    { position: [3.8, 3.5, 4], ambient: [0.05, 0.05, 0.05], diffuse: [0.2, 0.2, 0.2], specular: [0.8, 0.8, 0.8] },
    { position: [-3.2, 6, -4], ambient: [0.05, 0.05, 0.05], diffuse: [0.9, 0.9, 0.9], specular: [0.1, 0.1, 0.1] },
  ],
  spot: {
    ambient: [0.8, 0.8, 0.8],
    diffuse: [1, 1, 1],
    specular: [0.7, 0.7, 0.7],
    constant: 1,
    linear: 0.09,
    quadratic: 0.032,
    cutOffDegrees: 42.5,
    outerCutOffDegrees: 48,
  },
};
