/**
 * TextureRegistry - fixed-capacity table of tagged GPU textures
 *
 * Each loaded image occupies the next free slot. The slot index doubles as
 * the texture unit the texture is bound to in `bindAll()`, which is what the
 * sampler uniforms point at, so slots are never reordered or compacted.
 */

import type { PixelFormat, TextureContext, TextureSampling } from '../gl/types';
import { describeSceneError, errorMessage, type TextureLoadError } from '../errors';
import type { DecodedImage, ImageDecoder } from './ImageDecoder';

/** Number of texture units the registry hands out */
export const TEXTURE_SLOT_CAPACITY = 16;

/** Position of an entry in the registry and the texture unit it binds to */
export type TextureSlot = number;

/** Sampling used for every registry texture */
export const REGISTRY_SAMPLING: Readonly<TextureSampling> = {
  wrapS: 'repeat',
  wrapT: 'repeat',
  minFilter: 'linear',
  magFilter: 'linear',
};

export interface TextureEntry<THandle> {
  readonly tag: string;
  readonly handle: THandle;
}

export type TextureLoadResult<THandle> =
  | { success: true; tag: string; slot: TextureSlot; handle: THandle }
  | { success: false; tag: string; error: TextureLoadError };

/**
 * Read-only slot lookup, all the uniform dispatcher needs
 */
export interface TextureSlotLookup {
  findSlot(tag: string): TextureSlot | null;
}

function pixelFormatFor(channelCount: number): PixelFormat | null {
  if (channelCount === 3) return 'rgb';
  if (channelCount === 4) return 'rgba';
  return null;
}

export class TextureRegistry<THandle> implements TextureSlotLookup {
  private readonly context: TextureContext<THandle>;
  private readonly decoder: ImageDecoder;
  private readonly slots: TextureEntry<THandle>[] = [];
  readonly capacity: number;

  // Loads run one after another so slot order always matches call order
  private queue: Promise<unknown> = Promise.resolve();
  // Bumped by destroyAll(); loads started under an older generation register nothing
  private generation = 0;

  constructor(
    context: TextureContext<THandle>,
    decoder: ImageDecoder,
    capacity: number = TEXTURE_SLOT_CAPACITY
  ) {
    this.context = context;
    this.decoder = decoder;
    if (!Number.isInteger(capacity) || capacity < 1 || capacity > TEXTURE_SLOT_CAPACITY) {
      throw new RangeError(
        `[TextureRegistry] Capacity must be an integer from 1 to ${TEXTURE_SLOT_CAPACITY}, got ${capacity}`
      );
    }
    this.capacity = capacity;
  }

  /** Number of occupied slots */
  get size(): number {
    return this.slots.length;
  }

  get isFull(): boolean {
    return this.slots.length >= this.capacity;
  }

  /** Snapshot of the occupied slots, in slot order */
  entries(): ReadonlyArray<TextureEntry<THandle>> {
    return [...this.slots];
  }

  /**
   * Decode an image, upload it as a mipmapped repeat/linear texture and
   * register it under `tag` in the next free slot.
   *
   * Failures are reported in the result and logged; the registry is left
   * unchanged. A load still pending when `destroyAll()` runs is cancelled.
   */
  load(path: string, tag: string): Promise<TextureLoadResult<THandle>> {
    const generation = this.generation;
    const run = this.queue.then(() => this.loadNow(path, tag, generation));
    // The caller sees a rejection through `run`; later loads still proceed
    this.queue = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  private async loadNow(path: string, tag: string, generation: number): Promise<TextureLoadResult<THandle>> {
    if (generation !== this.generation) {
      return this.cancelled(path, tag);
    }
    if (this.isFull) {
      return this.fail(tag, { kind: 'RegistryFull', tag, capacity: this.capacity });
    }

    let image: DecodedImage;
    try {
      image = await this.decoder.decode(path);
    } catch (err) {
      return this.fail(tag, { kind: 'DecodeFailure', path, reason: errorMessage(err) });
    }
    // Everything below is synchronous, so this is the last point teardown can slip in
    if (generation !== this.generation) {
      return this.cancelled(path, tag);
    }

    const format = pixelFormatFor(image.channelCount);
    if (format === null) {
      return this.fail(tag, { kind: 'UnsupportedChannelCount', path, channelCount: image.channelCount });
    }

    let handle: THandle;
    try {
      handle = this.context.createTexture();
    } catch (err) {
      return this.fail(tag, { kind: 'UploadFailure', path, reason: errorMessage(err) });
    }

    try {
      this.context.configureSampling(handle, REGISTRY_SAMPLING);
      this.context.uploadPixels(handle, image, format);
      this.context.generateMipmaps(handle);
    } catch (err) {
      this.context.deleteTexture(handle);
      return this.fail(tag, { kind: 'UploadFailure', path, reason: errorMessage(err) });
    }

    const slot = this.slots.length;
    this.slots.push({ tag, handle });
    console.log(
      `[TextureRegistry] Loaded ${path} (${image.width}x${image.height}, ${image.channelCount} channels) as "${tag}" in slot ${slot}`
    );
    return { success: true, tag, slot, handle };
  }

  private cancelled(path: string, tag: string): TextureLoadResult<THandle> {
    const error: TextureLoadError = { kind: 'LoadCancelled', path, tag };
    console.warn(`[TextureRegistry] ${describeSceneError(error)}`);
    return { success: false, tag, error };
  }

  private fail(tag: string, error: TextureLoadError): TextureLoadResult<THandle> {
    console.error(`[TextureRegistry] ${describeSceneError(error)}`);
    return { success: false, tag, error };
  }

  /**
   * Bind every occupied slot to the texture unit with the same index.
   * Binding state is context-global, so this runs once per frame before
   * any textured draw.
   */
  bindAll(): void {
    for (let slot = 0; slot < this.slots.length; slot++) {
      this.context.bindToUnit(slot, this.slots[slot].handle);
    }
  }

  /** GPU handle of the first entry tagged `tag` */
  findHandle(tag: string): THandle | null {
    const entry = this.slots.find((e) => e.tag === tag);
    return entry ? entry.handle : null;
  }

  /** Slot of the first entry tagged `tag` */
  findSlot(tag: string): TextureSlot | null {
    const slot = this.slots.findIndex((e) => e.tag === tag);
    return slot === -1 ? null : slot;
  }

  /**
   * Delete every texture object and empty the registry, cancelling loads
   * that have not registered yet. Safe to call repeatedly.
   */
  destroyAll(): void {
    this.generation++;
    for (const entry of this.slots) {
      this.context.deleteTexture(entry.handle);
    }
    this.slots.length = 0;
  }
}
