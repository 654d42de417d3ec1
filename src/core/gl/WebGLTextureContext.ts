/**
 * WebGL2 backend for the texture registry
 */

import type { PixelData, PixelFormat, TextureContext, TextureFilter, TextureSampling, TextureWrap } from './types';

export type TextureGL = Pick<
  WebGL2RenderingContext,
  | 'createTexture'
  | 'bindTexture'
  | 'texParameteri'
  | 'pixelStorei'
  | 'texImage2D'
  | 'generateMipmap'
  | 'activeTexture'
  | 'deleteTexture'
  | 'TEXTURE_2D'
  | 'TEXTURE_WRAP_S'
  | 'TEXTURE_WRAP_T'
  | 'TEXTURE_MIN_FILTER'
  | 'TEXTURE_MAG_FILTER'
  | 'REPEAT'
  | 'CLAMP_TO_EDGE'
  | 'MIRRORED_REPEAT'
  | 'LINEAR'
  | 'NEAREST'
  | 'UNPACK_ALIGNMENT'
  | 'RGB8'
  | 'RGB'
  | 'RGBA8'
  | 'RGBA'
  | 'UNSIGNED_BYTE'
  | 'TEXTURE0'
>;

export class WebGLTextureContext implements TextureContext<WebGLTexture> {
  constructor(private readonly gl: TextureGL) {}

  createTexture(): WebGLTexture {
    const texture = this.gl.createTexture();
    if (!texture) {
      throw new Error('Failed to create texture');
    }
    return texture;
  }

  configureSampling(handle: WebGLTexture, sampling: TextureSampling): void {
    const gl = this.gl;
    gl.bindTexture(gl.TEXTURE_2D, handle);
    gl.texParameteri(gl.TEXTURE_2D, gl.TEXTURE_WRAP_S, this.wrapMode(sampling.wrapS));
    gl.texParameteri(gl.TEXTURE_2D, gl.TEXTURE_WRAP_T, this.wrapMode(sampling.wrapT));
    gl.texParameteri(gl.TEXTURE_2D, gl.TEXTURE_MIN_FILTER, this.filterMode(sampling.minFilter));
    gl.texParameteri(gl.TEXTURE_2D, gl.TEXTURE_MAG_FILTER, this.filterMode(sampling.magFilter));
    gl.bindTexture(gl.TEXTURE_2D, null);
  }

  uploadPixels(handle: WebGLTexture, image: PixelData, format: PixelFormat): void {
    const gl = this.gl;
    const [internalFormat, pixelFormat] = format === 'rgb' ? [gl.RGB8, gl.RGB] : [gl.RGBA8, gl.RGBA];

    gl.bindTexture(gl.TEXTURE_2D, handle);
    // RGB rows are not 4-byte aligned for odd widths
    gl.pixelStorei(gl.UNPACK_ALIGNMENT, 1);
    gl.texImage2D(
      gl.TEXTURE_2D,
      0,
      internalFormat,
      image.width,
      image.height,
      0,
      pixelFormat,
      gl.UNSIGNED_BYTE,
      image.pixels,
    );
    gl.bindTexture(gl.TEXTURE_2D, null);
  }

  generateMipmaps(handle: WebGLTexture): void {
    const gl = this.gl;
    gl.bindTexture(gl.TEXTURE_2D, handle);
    gl.generateMipmap(gl.TEXTURE_2D);
    gl.bindTexture(gl.TEXTURE_2D, null);
  }

  bindToUnit(unit: number, handle: WebGLTexture): void {
    const gl = this.gl;
    gl.activeTexture(gl.TEXTURE0 + unit);
    gl.bindTexture(gl.TEXTURE_2D, handle);
  }

  deleteTexture(handle: WebGLTexture): void {
    this.gl.deleteTexture(handle);
  }

  private wrapMode(wrap: TextureWrap): number {
    switch (wrap) {
      case 'repeat':
        return this.gl.REPEAT;
      case 'clamp':
        return this.gl.CLAMP_TO_EDGE;
      case 'mirror':
        return this.gl.MIRRORED_REPEAT;
    }
  }

  private filterMode(filter: TextureFilter): number {
    return filter === 'linear' ? this.gl.LINEAR : this.gl.NEAREST;
  }
}
