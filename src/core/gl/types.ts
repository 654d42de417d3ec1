import type { ReadonlyMat4, ReadonlyVec2, ReadonlyVec3, ReadonlyVec4 } from 'gl-matrix';

/**
 * Name-addressed uniform writer for the active shader program.
 *
 * Implementations are borrowed by the registries and dispatchers: they never
 * own the program and never destroy it.
 */
export interface ShadingInterface {
  setBool(name: string, value: boolean): void;
  setInt(name: string, value: number): void;
  setFloat(name: string, value: number): void;
  setVec2(name: string, value: ReadonlyVec2): void;
  setVec3(name: string, value: ReadonlyVec3): void;
  setVec4(name: string, value: ReadonlyVec4): void;
  setMat4(name: string, value: ReadonlyMat4): void;
  /** Point a sampler uniform at a texture unit */
  setSampler2D(name: string, unit: number): void;
}

export type TextureWrap = 'repeat' | 'clamp' | 'mirror';
export type TextureFilter = 'linear' | 'nearest';

export interface TextureSampling {
  wrapS: TextureWrap;
  wrapT: TextureWrap;
  minFilter: TextureFilter;
  magFilter: TextureFilter;
}

/** Pixel layout of an uploaded image, 8 bits per channel */
export type PixelFormat = 'rgb' | 'rgba';

export interface PixelData {
  pixels: Uint8Array;
  width: number;
  height: number;
}

/**
 * GPU-side texture operations used by the texture registry.
 * `THandle` is the opaque texture object type of the backend.
 */
export interface TextureContext<THandle> {
  createTexture(): THandle;
  configureSampling(handle: THandle, sampling: TextureSampling): void;
  uploadPixels(handle: THandle, image: PixelData, format: PixelFormat): void;
  generateMipmaps(handle: THandle): void;
  bindToUnit(unit: number, handle: THandle): void;
  deleteTexture(handle: THandle): void;
}
