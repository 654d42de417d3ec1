/**
 * Scene report - prepares the scene against recording collaborators and
 * draws one frame, so the draw list can be checked without a GPU
 */

import { Camera } from '../core/camera/Camera';
import { ViewManager } from '../core/camera/ViewManager';
import { resolveTextureSources, type SceneConfig } from '../core/config/sceneConfig';
import { describeSceneError } from '../core/errors';
import { findOrderViolations, type FrameReport } from '../core/scene/SceneAssembler';
import { SceneManager, type PrepareReport } from '../core/scene/SceneManager';
import { TABLETOP_SCENE } from '../core/scene/tabletopScene';
import type { ImageDecoder } from '../core/textures/ImageDecoder';
import {
  RecordingMeshLibrary,
  RecordingShadingInterface,
  RecordingTextureContext,
  type MeshDraw,
} from '../core/testing';

export interface SceneReportOptions {
  config: SceneConfig;
  decoder: ImageDecoder;
  /** Overrides config.textureRoot */
  textureRoot?: string;
  aspect?: number;
}

export interface SceneReport {
  prepare: PrepareReport;
  textureCount: number;
  frame: FrameReport;
  /** Uniform writes in the frame, view uniforms included */
  uniformWrites: number;
  draws: MeshDraw[];
  /** Translucent steps drawn before an opaque one */
  orderViolations: string[];
}

export async function runSceneReport(options: SceneReportOptions): Promise<SceneReport> {
  const { config, decoder, aspect = 16 / 9 } = options;
  const shader = new RecordingShadingInterface();
  const meshes = new RecordingMeshLibrary();
  const textures = resolveTextureSources(config, options.textureRoot ?? config.textureRoot);

  const scene = new SceneManager({
    shader,
    textureContext: new RecordingTextureContext(),
    decoder,
    createMeshes: () => meshes,
    textures,
  });

  try {
    const prepare = await scene.prepareScene();

    shader.clear();
    new ViewManager(shader, new Camera(config.camera)).prepareSceneView(aspect);
    const frame = scene.renderScene();

    return {
      prepare,
      textureCount: textures.length,
      frame,
      uniformWrites: shader.calls.length,
      draws: [...meshes.draws],
      orderViolations: findOrderViolations(TABLETOP_SCENE).map((step) => step.name),
    };
  } finally {
    scene.destroy();
  }
}

export function formatSceneReport(report: SceneReport): string {
  const { prepare, frame } = report;
  const lines = [`Textures: ${prepare.loaded.length}/${report.textureCount} loaded`];
  for (const { tag, error } of prepare.failed) {
    lines.push(`  ${tag}: ${describeSceneError(error)}`);
  }

  lines.push(
    `Frame: ${frame.stepsDrawn} draws, ${frame.textureMisses} texture misses, ${frame.materialMisses} material misses`,
    `Uniform writes: ${report.uniformWrites}`,
    'Draws:'
  );
  report.draws.forEach((draw, i) => {
    lines.push(`  ${String(i + 1).padStart(2)}. ${TABLETOP_SCENE[i]?.name ?? '?'}: ${draw.kind} [${draw.parts.join(', ')}]`);
  });

  lines.push(
    report.orderViolations.length === 0
      ? 'Draw order: ok'
      : `Draw order: translucent before opaque at ${report.orderViolations.join(', ')}`
  );
  return lines.join('\n');
}
