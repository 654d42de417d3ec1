/**
 * FetchImageDecoder - browser decoder built on fetch and createImageBitmap
 *
 * Always yields RGBA: the canvas readback has no RGB variant.
 */

import type { DecodedImage, ImageDecoder } from './ImageDecoder';

export class FetchImageDecoder implements ImageDecoder {
  async decode(url: string): Promise<DecodedImage> {
    const response = await fetch(url);
    if (!response.ok) {
      throw new Error(`Failed to fetch ${url}: ${response.status} ${response.statusText}`);
    }
    const blob = await response.blob();

    const bitmap = await createImageBitmap(blob, {
      imageOrientation: 'flipY',
      premultiplyAlpha: 'none',
      colorSpaceConversion: 'none',
    });

    try {
      const canvas = new OffscreenCanvas(bitmap.width, bitmap.height);
      const ctx = canvas.getContext('2d');
      if (!ctx) {
        throw new Error('2D canvas context is not available');
      }
      ctx.drawImage(bitmap, 0, 0);
      const { data } = ctx.getImageData(0, 0, bitmap.width, bitmap.height);

      return {
        pixels: new Uint8Array(data.buffer, data.byteOffset, data.byteLength),
        width: bitmap.width,
        height: bitmap.height,
        channelCount: 4,
      };
    } finally {
      bitmap.close();
    }
  }
}
