import { describe, it, expect, vi } from 'vitest';
import { mat4 } from 'gl-matrix';
import { ShaderProgram, type ProgramGL } from './ShaderProgram';

const VERTEX_SHADER = 0x8b31;
const FRAGMENT_SHADER = 0x8b30;

function createFakeGL(options: { failStage?: number; failLink?: boolean } = {}) {
  const locations = new Map<string, WebGLUniformLocation>([
    ['model', {}],
    ['bUseTexture', {}],
    ['objectColor', {}],
  ]);
  const shaderTypes = new Map<WebGLShader, number>();

  const calls = {
    createShader: vi.fn((type: number): WebGLShader | null => {
      const shader = {};
      shaderTypes.set(shader, type);
      return shader;
    }),
    shaderSource: vi.fn(),
    compileShader: vi.fn(),
    getShaderParameter: vi.fn((shader: WebGLShader) => shaderTypes.get(shader) !== options.failStage),
    getShaderInfoLog: vi.fn(() => "ERROR: 0:3: 'vec5' : undeclared identifier"),
    deleteShader: vi.fn(),
    createProgram: vi.fn((): WebGLProgram | null => ({})),
    attachShader: vi.fn(),
    linkProgram: vi.fn(),
    getProgramParameter: vi.fn(() => !options.failLink),
    getProgramInfoLog: vi.fn(() => 'varying mismatch'),
    deleteProgram: vi.fn(),
    useProgram: vi.fn(),
    getUniformLocation: vi.fn((_program: WebGLProgram, name: string) => locations.get(name) ?? null),
    uniform1i: vi.fn(),
    uniform1f: vi.fn(),
    uniform2f: vi.fn(),
    uniform3f: vi.fn(),
    uniform4f: vi.fn(),
    uniformMatrix4fv: vi.fn(),
  };
  const gl: ProgramGL = {
    ...calls,
    VERTEX_SHADER: 0x8b31,
    FRAGMENT_SHADER: 0x8b30,
    COMPILE_STATUS: 0x8b81,
    LINK_STATUS: 0x8b82,
  };
  return { gl, calls, locations };
}

const SOURCES = { vertex: 'void main() {}', fragment: 'void main() {}' };

function createProgram(fake: ReturnType<typeof createFakeGL>): ShaderProgram {
  const result = ShaderProgram.create(fake.gl, SOURCES);
  if (!result.success) {
    throw new Error(result.error);
  }
  return result.program;
}

describe('ShaderProgram.create', () => {
  it('links both stages and releases the shader objects', () => {
    const fake = createFakeGL();
    const result = ShaderProgram.create(fake.gl, SOURCES);

    expect(result.success).toBe(true);
    expect(fake.calls.attachShader).toHaveBeenCalledTimes(2);
    expect(fake.calls.deleteShader).toHaveBeenCalledTimes(2);
  });

  it('reports vertex compile errors with the info log', () => {
    const fake = createFakeGL({ failStage: VERTEX_SHADER });
    const result = ShaderProgram.create(fake.gl, SOURCES);

    expect(result).toEqual({
      success: false,
      error: "Vertex shader error:\nERROR: 0:3: 'vec5' : undeclared identifier",
    });
    expect(fake.calls.createProgram).not.toHaveBeenCalled();
  });

  it('deletes the vertex stage when the fragment stage fails', () => {
    const fake = createFakeGL({ failStage: FRAGMENT_SHADER });
    const result = ShaderProgram.create(fake.gl, SOURCES);

    expect(result.success).toBe(false);
    expect(fake.calls.deleteShader).toHaveBeenCalledTimes(2);
  });

  it('reports link errors and deletes the program', () => {
    const fake = createFakeGL({ failLink: true });
    const result = ShaderProgram.create(fake.gl, SOURCES);

    expect(result).toEqual({ success: false, error: 'Link error:\nvarying mismatch' });
    expect(fake.calls.deleteProgram).toHaveBeenCalledTimes(1);
  });
});

describe('ShaderProgram uniforms', () => {
  it('looks each uniform location up once', () => {
    const fake = createFakeGL();
    const program = createProgram(fake);

    program.setBool('bUseTexture', true);
    program.setBool('bUseTexture', false);

    expect(fake.calls.getUniformLocation).toHaveBeenCalledTimes(1);
    const location = fake.locations.get('bUseTexture');
    expect(fake.calls.uniform1i.mock.calls).toEqual([
      [location, 1],
      [location, 0],
    ]);
  });

  it('caches names the program does not use', () => {
    const fake = createFakeGL();
    const program = createProgram(fake);

    program.setFloat('unused', 2);
    program.setFloat('unused', 3);

    expect(fake.calls.getUniformLocation).toHaveBeenCalledTimes(1);
    expect(fake.calls.uniform1f.mock.calls).toEqual([
      [null, 2],
      [null, 3],
    ]);
  });

  it('uploads matrices column-major without transposing', () => {
    const fake = createFakeGL();
    const program = createProgram(fake);
    const model = mat4.fromTranslation(mat4.create(), [1, 2, 3]);

    program.setMat4('model', model);

    const [location, transpose, data] = fake.calls.uniformMatrix4fv.mock.calls[0];
    expect(location).toBe(fake.locations.get('model'));
    expect(transpose).toBe(false);
    expect(Array.from(data)).toEqual([1, 0, 0, 0, 0, 1, 0, 0, 0, 0, 1, 0, 1, 2, 3, 1]);
  });

  it('writes vectors component by component', () => {
    const fake = createFakeGL();
    const program = createProgram(fake);

    program.setVec4('objectColor', [0.1, 0.2, 0.3, 0.8]);

    expect(fake.calls.uniform4f).toHaveBeenCalledWith(fake.locations.get('objectColor'), 0.1, 0.2, 0.3, 0.8);
  });

  it('deletes the program only once', () => {
    const fake = createFakeGL();
    const program = createProgram(fake);

    program.destroy();
    program.destroy();

    expect(fake.calls.deleteProgram).toHaveBeenCalledTimes(1);
  });
});
