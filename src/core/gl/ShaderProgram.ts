/**
 * ShaderProgram - a linked WebGL2 program with name-addressed uniform setters
 */

import type { ReadonlyMat4, ReadonlyVec2, ReadonlyVec3, ReadonlyVec4 } from 'gl-matrix';
import type { ShadingInterface } from './types';

export type ProgramGL = Pick<
  WebGL2RenderingContext,
  | 'createShader'
  | 'shaderSource'
  | 'compileShader'
  | 'getShaderParameter'
  | 'getShaderInfoLog'
  | 'deleteShader'
  | 'createProgram'
  | 'attachShader'
  | 'linkProgram'
  | 'getProgramParameter'
  | 'getProgramInfoLog'
  | 'deleteProgram'
  | 'useProgram'
  | 'getUniformLocation'
  | 'uniform1i'
  | 'uniform1f'
  | 'uniform2f'
  | 'uniform3f'
  | 'uniform4f'
  | 'uniformMatrix4fv'
  | 'VERTEX_SHADER'
  | 'FRAGMENT_SHADER'
  | 'COMPILE_STATUS'
  | 'LINK_STATUS'
>;

export interface ShaderSources {
  vertex: string;
  fragment: string;
}

export type ShaderProgramResult =
  | { success: true; program: ShaderProgram }
  | { success: false; error: string };

type ShaderCompileResult =
  | { success: true; shader: WebGLShader }
  | { success: false; error: string };

/**
 * Compile a shader from source
 */
function compileShader(gl: ProgramGL, type: number, source: string): ShaderCompileResult {
  const shader = gl.createShader(type);
  if (!shader) {
    return { success: false, error: 'Failed to create shader' };
  }

  gl.shaderSource(shader, source);
  gl.compileShader(shader);

  if (!gl.getShaderParameter(shader, gl.COMPILE_STATUS)) {
    const error = gl.getShaderInfoLog(shader) ?? 'unknown error';
    gl.deleteShader(shader);
    return { success: false, error };
  }

  return { success: true, shader };
}

export class ShaderProgram implements ShadingInterface {
  /** Locations looked up so far; null marks a name the program does not use */
  private readonly locations = new Map<string, WebGLUniformLocation | null>();
  private destroyed = false;

  private constructor(
    private readonly gl: ProgramGL,
    private readonly program: WebGLProgram,
  ) {}

  /**
   * Compile and link a program from vertex and fragment sources
   */
  static create(gl: ProgramGL, sources: ShaderSources): ShaderProgramResult {
    const vsResult = compileShader(gl, gl.VERTEX_SHADER, sources.vertex);
    if (!vsResult.success) {
      return { success: false, error: `Vertex shader error:\n${vsResult.error}` };
    }

    const fsResult = compileShader(gl, gl.FRAGMENT_SHADER, sources.fragment);
    if (!fsResult.success) {
      gl.deleteShader(vsResult.shader);
      return { success: false, error: `Fragment shader error:\n${fsResult.error}` };
    }

    const program = gl.createProgram();
    if (!program) {
      gl.deleteShader(vsResult.shader);
      gl.deleteShader(fsResult.shader);
      return { success: false, error: 'Failed to create program' };
    }

    gl.attachShader(program, vsResult.shader);
    gl.attachShader(program, fsResult.shader);
    gl.linkProgram(program);

    // Program keeps the compiled stages alive
    gl.deleteShader(vsResult.shader);
    gl.deleteShader(fsResult.shader);

    if (!gl.getProgramParameter(program, gl.LINK_STATUS)) {
      const error = gl.getProgramInfoLog(program) ?? 'unknown error';
      gl.deleteProgram(program);
      return { success: false, error: `Link error:\n${error}` };
    }

    return { success: true, program: new ShaderProgram(gl, program) };
  }

  use(): void {
    this.gl.useProgram(this.program);
  }

  setBool(name: string, value: boolean): void {
    this.gl.uniform1i(this.location(name), value ? 1 : 0);
  }

  setInt(name: string, value: number): void {
    this.gl.uniform1i(this.location(name), value);
  }

  setFloat(name: string, value: number): void {
    this.gl.uniform1f(this.location(name), value);
  }

  setVec2(name: string, value: ReadonlyVec2): void {
    this.gl.uniform2f(this.location(name), value[0], value[1]);
  }

  setVec3(name: string, value: ReadonlyVec3): void {
    this.gl.uniform3f(this.location(name), value[0], value[1], value[2]);
  }

  setVec4(name: string, value: ReadonlyVec4): void {
    this.gl.uniform4f(this.location(name), value[0], value[1], value[2], value[3]);
  }

  setMat4(name: string, value: ReadonlyMat4): void {
    this.gl.uniformMatrix4fv(this.location(name), false, Float32Array.from(value));
  }

  setSampler2D(name: string, unit: number): void {
    this.gl.uniform1i(this.location(name), unit);
  }

  destroy(): void {
    if (this.destroyed) return;
    this.destroyed = true;
    this.locations.clear();
    this.gl.deleteProgram(this.program);
  }

  private location(name: string): WebGLUniformLocation | null {
    const cached = this.locations.get(name);
    if (cached !== undefined) return cached;
    const location = this.gl.getUniformLocation(this.program, name);
    this.locations.set(name, location);
    return location;
  }
}
