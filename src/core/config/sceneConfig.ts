/**
 * Scene configuration - which images to load and where the camera starts
 *
 * Validated once before any GPU work. A bad file is the only scene failure
 * that throws.
 */

import { z } from 'zod';
import type { TextureSource } from '../scene/types';

const vec3Schema = z.tuple([z.number(), z.number(), z.number()]);

export const textureSourceSchema = z.object({
  path: z.string().min(1),
  tag: z.string().min(1),
});

export const cameraConfigSchema = z
  .object({
    position: vec3Schema,
    yaw: z.number(),
    pitch: z.number().min(-89).max(89),
    fov: z.number().gt(0).lt(180),
    near: z.number().positive(),
    far: z.number().positive(),
    movementSpeed: z.number().min(1).max(20),
  })
  .partial();

export const sceneConfigSchema = z.object({
  /** Directory the texture paths are relative to */
  textureRoot: z.string().default(''),
  textures: z.array(textureSourceSchema).min(1),
  camera: cameraConfigSchema.optional(),
});

export type SceneConfig = z.infer<typeof sceneConfigSchema>;
export type CameraConfig = z.infer<typeof cameraConfigSchema>;

export class SceneConfigError extends Error {
  constructor(
    message: string,
    readonly issues: string[] = []
  ) {
    super(message);
    this.name = 'SceneConfigError';
  }
}

/**
 * Validate an already-parsed config object
 * @param source - Shown in the error message, usually the file name
 */
export function parseSceneConfig(input: unknown, source = 'scene config'): SceneConfig {
  const result = sceneConfigSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new SceneConfigError(`Invalid ${source}:\n  ${issues.join('\n  ')}`, issues);
  }
  return result.data;
}

/**
 * Texture sources with their paths joined onto the texture root
 */
export function resolveTextureSources(config: SceneConfig, root: string = config.textureRoot): TextureSource[] {
  const prefix = root.replace(/\/+$/, '');
  return config.textures.map(({ path, tag }) => ({
    path: prefix && !path.startsWith('/') ? `${prefix}/${path}` : path,
    tag,
  }));
}
