/**
 * SceneManager - owns the scene's resources from setup to teardown
 *
 * prepareScene() fills the registries, writes the light block and uploads
 * the meshes; renderScene() binds the textures and runs the draw list;
 * destroy() releases everything the manager created.
 */

import type { RGBA } from '../types';
import type { ShadingInterface, TextureContext } from '../gl/types';
import type { MeshLibrary } from '../meshes/types';
import type { ImageDecoder } from '../textures/ImageDecoder';
import type { TextureLoadError } from '../errors';
import { TextureRegistry } from '../textures/TextureRegistry';
import { MaterialRegistry } from '../materials/MaterialRegistry';
import { applySceneLighting, type SceneLighting } from '../lighting/sceneLighting';
import { TransformComposer } from '../shading/TransformComposer';
import { UniformDispatcher } from '../shading/UniformDispatcher';
import { DEFAULT_UNIFORM_NAMES, type UniformNames } from '../shading/uniformNames';
import { SceneAssembler, requiredMeshKinds, type FrameReport } from './SceneAssembler';
import { TABLETOP_MATERIALS, TABLETOP_SCENE } from './tabletopScene';
import { TABLETOP_LIGHTING } from './tabletopLighting';
import type { DrawStep, MaterialDefinition, TextureSource } from './types';

export interface SceneManagerOptions<THandle> {
  /** Shading interface of the active program; borrowed */
  shader: ShadingInterface;
  textureContext: TextureContext<THandle>;
  decoder: ImageDecoder;
  /** Creates the mesh library the manager owns and destroys */
  createMeshes: () => MeshLibrary;
  /** Images to load, in slot order */
  textures: readonly TextureSource[];
  materials?: readonly MaterialDefinition[];
  lighting?: SceneLighting;
  steps?: readonly DrawStep[];
  uniformNames?: Readonly<UniformNames>;
  missingTextureColor?: Readonly<RGBA>;
}

export interface PrepareReport {
  loaded: string[];
  failed: Array<{ tag: string; error: TextureLoadError }>;
}

export class SceneManager<THandle> {
  readonly textures: TextureRegistry<THandle>;
  readonly materials = new MaterialRegistry();

  private readonly shader: ShadingInterface;
  private readonly meshes: MeshLibrary;
  private readonly assembler: SceneAssembler;
  private readonly textureSources: readonly TextureSource[];
  private readonly materialDefinitions: readonly MaterialDefinition[];
  private readonly lighting: SceneLighting;
  private readonly steps: readonly DrawStep[];
  private readonly uniformNames: Readonly<UniformNames>;
  private prepared = false;
  private destroyed = false;

  constructor(options: SceneManagerOptions<THandle>) {
    this.shader = options.shader;
    this.textureSources = options.textures;
    this.materialDefinitions = options.materials ?? TABLETOP_MATERIALS;
    this.lighting = options.lighting ?? TABLETOP_LIGHTING;
    this.steps = options.steps ?? TABLETOP_SCENE;
    this.uniformNames = options.uniformNames ?? DEFAULT_UNIFORM_NAMES;

    this.textures = new TextureRegistry(options.textureContext, options.decoder);
    this.meshes = options.createMeshes();

    const composer = new TransformComposer(this.shader, this.uniformNames);
    const dispatcher = new UniformDispatcher(this.shader, this.textures, this.materials, this.uniformNames);
    this.assembler = new SceneAssembler(composer, dispatcher, this.meshes, this.steps, {
      missingTextureColor: options.missingTextureColor,
    });
  }

  /**
   * Load textures, define materials, write the lights and upload meshes,
   * in that order. A texture that fails to load is reported and skipped.
   * Runs once; a destroy() during loading abandons the rest of setup.
   */
  async prepareScene(): Promise<PrepareReport> {
    if (this.destroyed) {
      throw new Error('[SceneManager] prepareScene() called after destroy()');
    }
    if (this.prepared) {
      throw new Error('[SceneManager] prepareScene() called twice');
    }
    this.prepared = true;

    const report: PrepareReport = { loaded: [], failed: [] };
    for (const source of this.textureSources) {
      const result = await this.textures.load(source.path, source.tag);
      if (this.destroyed) {
        console.warn('[SceneManager] Destroyed while loading textures, setup abandoned');
        return report;
      }
      if (result.success) {
        report.loaded.push(result.tag);
      } else {
        report.failed.push({ tag: result.tag, error: result.error });
      }
    }

    for (const m of this.materialDefinitions) {
      this.materials.define(m.tag, m.diffuseColor, m.specularColor, m.shininess);
    }

    applySceneLighting(this.shader, this.lighting, this.uniformNames);

    const kinds = requiredMeshKinds(this.steps);
    this.meshes.loadMeshes(kinds);

    console.log(
      `[SceneManager] Scene prepared: ${report.loaded.length}/${this.textureSources.length} textures, ` +
        `${this.materials.size} materials, ${kinds.length} meshes`
    );
    return report;
  }

  /**
   * Bind every texture to its unit and draw the scene
   */
  renderScene(): FrameReport {
    if (this.destroyed) {
      throw new Error('[SceneManager] renderScene() called after destroy()');
    }
    this.textures.bindAll();
    return this.assembler.render();
  }

  /**
   * Release textures, materials and meshes. Safe to call repeatedly.
   */
  destroy(): void {
    if (this.destroyed) return;
    this.destroyed = true;

    this.textures.destroyAll();
    this.materials.clear();
    this.meshes.destroy();
    console.log('[SceneManager] Destroyed scene resources');
  }
}
