/**
 * Image decoding contract used by the texture registry.
 *
 * Decoders return rows bottom-up (vertically flipped) so that UV (0, 0)
 * lands on the lower-left corner of the image, and reject when the file
 * cannot be read or decoded.
 */

export interface DecodedImage {
  /** Tightly packed 8-bit pixels, `width * height * channelCount` bytes */
  pixels: Uint8Array;
  width: number;
  height: number;
  channelCount: number;
}

export interface ImageDecoder {
  decode(path: string): Promise<DecodedImage>;
}
