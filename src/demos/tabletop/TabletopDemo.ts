/**
 * TabletopDemo - WebGL2 setup and frame loop for the tabletop scene
 *
 * Textures come from the dev server under /<textureRoot>/. Images that fail
 * to load are logged and the objects using them draw in a flat color.
 */

import { createAnimationLoop, type AnimationLoop, type FpsCallback } from '../../core/animationLoop';
import { Camera } from '../../core/camera/Camera';
import { ViewManager } from '../../core/camera/ViewManager';
import { resolveTextureSources, type SceneConfig } from '../../core/config/sceneConfig';
import { ShaderProgram } from '../../core/gl/ShaderProgram';
import { WebGLTextureContext } from '../../core/gl/WebGLTextureContext';
import { PHONG_SHADER } from '../../core/gl/shaders/phong';
import { ShapeMeshes } from '../../core/meshes/ShapeMeshes';
import { SceneManager, type PrepareReport } from '../../core/scene/SceneManager';
import { FetchImageDecoder } from '../../core/textures/FetchImageDecoder';
import { CameraInput } from './CameraInput';

export interface TabletopDemoOptions {
  config: SceneConfig;
  /** Defaults to `/${config.textureRoot}` */
  textureBaseUrl?: string;
  onFps?: FpsCallback;
}

const CLEAR_COLOR = [0, 0, 0, 1] as const;

export class TabletopDemo {
  private readonly loop: AnimationLoop;
  private destroyed = false;

  private constructor(
    private readonly canvas: HTMLCanvasElement,
    private readonly gl: WebGL2RenderingContext,
    private readonly program: ShaderProgram,
    private readonly scene: SceneManager<WebGLTexture>,
    private readonly view: ViewManager,
    private readonly input: CameraInput,
    onFps: FpsCallback | undefined
  ) {
    this.loop = createAnimationLoop({ onFps });
  }

  /**
   * Create the GL context, compile the shader and prepare the scene
   * @throws When WebGL2 is unavailable or the shader fails to build
   */
  static async create(canvas: HTMLCanvasElement, options: TabletopDemoOptions): Promise<TabletopDemo> {
    const gl = canvas.getContext('webgl2');
    if (!gl) {
      throw new Error('[TabletopDemo] WebGL2 is not available');
    }

    gl.enable(gl.DEPTH_TEST);
    gl.enable(gl.BLEND);
    gl.blendFunc(gl.SRC_ALPHA, gl.ONE_MINUS_SRC_ALPHA);

    const result = ShaderProgram.create(gl, PHONG_SHADER);
    if (!result.success) {
      throw new Error(`[TabletopDemo] ${result.error}`);
    }
    const program = result.program;
    program.use();

    const { config } = options;
    const scene = new SceneManager({
      shader: program,
      textureContext: new WebGLTextureContext(gl),
      decoder: new FetchImageDecoder(),
      createMeshes: () => new ShapeMeshes(gl),
      textures: resolveTextureSources(config, options.textureBaseUrl ?? `/${config.textureRoot}`),
    });

    let report: PrepareReport;
    try {
      report = await scene.prepareScene();
    } catch (error) {
      scene.destroy();
      program.destroy();
      throw error;
    }
    if (report.failed.length > 0) {
      console.warn(`[TabletopDemo] ${report.failed.length} texture(s) missing, drawing them in a flat color`);
    }

    const view = new ViewManager(program, new Camera(config.camera));
    const input = new CameraInput(view);
    input.attach(canvas);

    return new TabletopDemo(canvas, gl, program, scene, view, input, options.onFps);
  }

  start(): void {
    if (this.destroyed) {
      throw new Error('[TabletopDemo] start() called after destroy()');
    }
    this.loop.start((deltaTime) => this.frame(deltaTime));
  }

  stop(): void {
    this.loop.stop();
  }

  destroy(): void {
    if (this.destroyed) return;
    this.destroyed = true;

    this.loop.stop();
    this.input.detach();
    this.scene.destroy();
    this.program.destroy();
  }

  private frame(deltaTime: number): void {
    this.input.update(deltaTime);
    this.resizeToDisplay();

    const { gl } = this;
    gl.viewport(0, 0, gl.drawingBufferWidth, gl.drawingBufferHeight);
    gl.clearColor(...CLEAR_COLOR);
    gl.clear(gl.COLOR_BUFFER_BIT | gl.DEPTH_BUFFER_BIT);

    const aspect = gl.drawingBufferWidth / Math.max(1, gl.drawingBufferHeight);
    this.view.prepareSceneView(aspect);
    this.scene.renderScene();
  }

  /** Match the drawing buffer to the canvas's CSS size */
  private resizeToDisplay(): void {
    const dpr = window.devicePixelRatio || 1;
    const width = Math.max(1, Math.floor(this.canvas.clientWidth * dpr));
    const height = Math.max(1, Math.floor(this.canvas.clientHeight * dpr));
    if (this.canvas.width !== width || this.canvas.height !== height) {
      this.canvas.width = width;
      this.canvas.height = height;
    }
  }
}
