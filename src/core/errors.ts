/**
 * Scene resource errors
 *
 * Every failure the registries and the uniform dispatcher can report is a
 * plain value discriminated on `kind`. None of them are thrown: setup keeps
 * going with the remaining resources and rendering falls back to safe state.
 */

export type RegistryName = 'texture' | 'material';

export interface DecodeFailure {
  kind: 'DecodeFailure';
  path: string;
  reason: string;
}

export interface UnsupportedChannelCount {
  kind: 'UnsupportedChannelCount';
  path: string;
  channelCount: number;
}

export interface RegistryFull {
  kind: 'RegistryFull';
  tag: string;
  capacity: number;
}

export interface UploadFailure {
  kind: 'UploadFailure';
  path: string;
  reason: string;
}

export interface LoadCancelled {
  kind: 'LoadCancelled';
  path: string;
  tag: string;
}

export interface TagNotFound {
  kind: 'TagNotFound';
  registry: RegistryName;
  tag: string;
}

export type TextureLoadError =
  | DecodeFailure
  | UnsupportedChannelCount
  | RegistryFull
  | UploadFailure
  | LoadCancelled;

export type SceneError = TextureLoadError | TagNotFound;

/**
 * One-line, human readable description for logs and reports
 */
export function describeSceneError(error: SceneError): string {
  switch (error.kind) {
    case 'DecodeFailure':
      return `Could not decode image ${error.path}: ${error.reason}`;
    case 'UnsupportedChannelCount':
      return `Image ${error.path} has ${error.channelCount} channels (expected 3 or 4)`;
    case 'RegistryFull':
      return `Texture registry is full (${error.capacity} slots), cannot load "${error.tag}"`;
    case 'UploadFailure':
      return `Could not upload image ${error.path}: ${error.reason}`;
    case 'LoadCancelled':
      return `Load of ${error.path} as "${error.tag}" was cancelled by destroyAll()`;
    case 'TagNotFound':
      return `No ${error.registry} registered with tag "${error.tag}"`;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
