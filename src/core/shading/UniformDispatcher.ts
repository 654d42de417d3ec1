/**
 * UniformDispatcher - per-draw shading state
 *
 * Four independent setters that write straight through to the shading
 * interface. There is no batching and no dirty tracking: whatever a draw
 * leaves behind is what the next draw sees unless it overwrites it.
 */

import { describeSceneError, type RegistryName, type TagNotFound } from '../errors';
import type { ShadingInterface } from '../gl/types';
import type { MaterialLookup } from '../materials/MaterialRegistry';
import type { TextureSlot, TextureSlotLookup } from '../textures/TextureRegistry';
import { DEFAULT_UNIFORM_NAMES, type UniformNames } from './uniformNames';

export type TextureApplyResult =
  | { success: true; slot: TextureSlot }
  | { success: false; error: TagNotFound };

export type MaterialApplyResult =
  | { success: true; applied: boolean }
  | { success: false; error: TagNotFound };

export class UniformDispatcher {
  private readonly shader: ShadingInterface;
  private readonly textures: TextureSlotLookup;
  private readonly materials: MaterialLookup;
  private readonly names: Readonly<UniformNames>;

  // Misses are logged once per tag, render runs every frame
  private readonly reportedMisses = new Set<string>();

  constructor(
    shader: ShadingInterface,
    textures: TextureSlotLookup,
    materials: MaterialLookup,
    names: Readonly<UniformNames> = DEFAULT_UNIFORM_NAMES
  ) {
    this.shader = shader;
    this.textures = textures;
    this.materials = materials;
    this.names = names;
  }

  /**
   * Flat color for the next draw; turns texturing off
   */
  setColor(r: number, g: number, b: number, a: number): void {
    this.shader.setBool(this.names.useTexture, false);
    this.shader.setVec4(this.names.objectColor, [r, g, b, a]);
  }

  /**
   * Sample the texture registered under `tag` for the next draw.
   *
   * The sampler is pointed at the registry slot, which is only correct
   * because `bindAll()` bound that slot to the texture unit of the same
   * index this frame. An unknown tag writes nothing.
   */
  setTexture(tag: string): TextureApplyResult {
    const slot = this.textures.findSlot(tag);
    if (slot === null) {
      return { success: false, error: this.miss('texture', tag) };
    }

    this.shader.setBool(this.names.useTexture, true);
    this.shader.setSampler2D(this.names.objectTexture, slot);
    return { success: true, slot };
  }

  setUVScale(u: number, v: number): void {
    this.shader.setVec2(this.names.uvScale, [u, v]);
  }

  /**
   * Write the diffuse, specular and shininess uniforms of the material
   * tagged `tag`. With no materials defined this is a no-op; an unknown tag
   * on a populated registry leaves the current material uniforms untouched.
   */
  setMaterial(tag: string): MaterialApplyResult {
    if (this.materials.isEmpty) {
      return { success: true, applied: false };
    }

    const material = this.materials.find(tag);
    if (!material) {
      return { success: false, error: this.miss('material', tag) };
    }

    this.shader.setVec3(this.names.materialDiffuse, material.diffuseColor);
    this.shader.setVec3(this.names.materialSpecular, material.specularColor);
    this.shader.setFloat(this.names.materialShininess, material.shininess);
    return { success: true, applied: true };
  }

  setLighting(enabled: boolean): void {
    this.shader.setBool(this.names.useLighting, enabled);
  }

  private miss(registry: RegistryName, tag: string): TagNotFound {
    const error: TagNotFound = { kind: 'TagNotFound', registry, tag };
    const key = `${registry}:${tag}`;
    if (!this.reportedMisses.has(key)) {
      this.reportedMisses.add(key);
      console.warn(`[UniformDispatcher] ${describeSceneError(error)}`);
    }
    return error;
  }
}
