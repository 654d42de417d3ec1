/**
 * MaterialRegistry - tagged Phong material parameters
 */

import type { RGB } from '../types';

export interface MaterialEntry {
  readonly tag: string;
  readonly diffuseColor: Readonly<RGB>;
  readonly specularColor: Readonly<RGB>;
  readonly shininess: number;
}

/**
 * Read-only material lookup, all the uniform dispatcher needs
 */
export interface MaterialLookup {
  readonly isEmpty: boolean;
  find(tag: string): MaterialEntry | null;
}

export class MaterialRegistry implements MaterialLookup {
  private readonly materials: MaterialEntry[] = [];

  get size(): number {
    return this.materials.length;
  }

  get isEmpty(): boolean {
    return this.materials.length === 0;
  }

  /**
   * Append a material. Tags are not checked for uniqueness; lookups only
   * ever see the first entry with a given tag.
   */
  define(tag: string, diffuseColor: Readonly<RGB>, specularColor: Readonly<RGB>, shininess: number): MaterialEntry {
    const entry: MaterialEntry = {
      tag,
      diffuseColor: [diffuseColor[0], diffuseColor[1], diffuseColor[2]],
      specularColor: [specularColor[0], specularColor[1], specularColor[2]],
      shininess,
    };
    this.materials.push(entry);
    return entry;
  }

  find(tag: string): MaterialEntry | null {
    return this.materials.find((m) => m.tag === tag) ?? null;
  }

  entries(): ReadonlyArray<MaterialEntry> {
    return [...this.materials];
  }

  clear(): void {
    this.materials.length = 0;
  }
}
