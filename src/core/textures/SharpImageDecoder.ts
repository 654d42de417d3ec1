/**
 * SharpImageDecoder - reads image files from disk in Node
 *
 * Used by the scene report and tests; the browser build decodes through
 * FetchImageDecoder instead.
 */

import path from 'path';
import sharp from 'sharp';
import type { DecodedImage, ImageDecoder } from './ImageDecoder';

export class SharpImageDecoder implements ImageDecoder {
  /**
   * @param root - Directory relative paths are resolved against
   */
  constructor(private readonly root: string = process.cwd()) {}

  async decode(imagePath: string): Promise<DecodedImage> {
    const absolutePath = path.resolve(this.root, imagePath);
    // Rows come out bottom-up, the order GL expects for texture uploads
    const { data, info } = await sharp(absolutePath).flip().raw().toBuffer({ resolveWithObject: true });

    return {
      pixels: new Uint8Array(data.buffer, data.byteOffset, data.byteLength),
      width: info.width,
      height: info.height,
      channelCount: info.channels,
    };
  }
}
