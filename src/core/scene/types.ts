import type { RGB, RGBA, Vec2 } from '../types';
import type { MeshInvocation } from '../meshes/types';
import type { TransformSpec } from '../shading/TransformComposer';

/**
 * Base color source of a draw: a registry texture or a flat RGBA color
 */
export type DrawShading = { kind: 'texture'; tag: string } | { kind: 'color'; rgba: Readonly<RGBA> };

/**
 * One object placement in the scene, drawn in list order every frame
 */
export interface DrawStep {
  name: string;
  transform: TransformSpec;
  shading: DrawShading;
  materialTag: string;
  /** Texture tiling; (1, 1) when omitted */
  uvScale?: Readonly<Vec2>;
  mesh: MeshInvocation;
}

export interface MaterialDefinition {
  tag: string;
  diffuseColor: RGB;
  specularColor: RGB;
  shininess: number;
}

export interface TextureSource {
  path: string;
  tag: string;
}
