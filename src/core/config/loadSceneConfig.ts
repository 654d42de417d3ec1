import fs from 'fs';
import { parseSceneConfig, SceneConfigError, type SceneConfig } from './sceneConfig';
import { errorMessage } from '../errors';

/**
 * Read and validate a scene config file (Node only)
 */
export async function loadSceneConfig(file: string): Promise<SceneConfig> {
  const text = await fs.promises.readFile(file, 'utf-8');

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (error) {
    throw new SceneConfigError(`Malformed JSON in ${file}: ${errorMessage(error)}`);
  }

  return parseSceneConfig(json, file);
}
