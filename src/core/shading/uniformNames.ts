/**
 * Uniform names recognised by the per-draw shading pipeline.
 *
 * Passed to the transform composer and uniform dispatcher at construction so
 * a shader with different naming only needs a different struct.
 */
export interface UniformNames {
  model: string;
  objectColor: string;
  objectTexture: string;
  useTexture: string;
  useLighting: string;
  uvScale: string;
  materialDiffuse: string;
  materialSpecular: string;
  materialShininess: string;
}

export const DEFAULT_UNIFORM_NAMES: Readonly<UniformNames> = {
  model: 'model',
  objectColor: 'objectColor',
  objectTexture: 'objectTexture',
  useTexture: 'bUseTexture',
  useLighting: 'bUseLighting',
  uvScale: 'UVscale',
  materialDiffuse: 'material.diffuseColor',
  materialSpecular: 'material.specularColor',
  materialShininess: 'material.shininess',
};
