/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Geometry types for rigkit
 */

import type { Vec2 } from '@rigkit/data';

/**
 * One primitive cut out of its parent mesh, with its own dense vertex space
 */
export interface ExtractedSubmesh {
  /** Position of the primitive across all meshes, in document order */
  primitiveIndex: number;
  meshIndex: number;
  /** Position of the primitive within its mesh */
  meshPrimitiveIndex: number;
  meshName: string | undefined;
  materialIndex: number | undefined;
  materialName: string | undefined;
  positions: Float64Array; // [x,y,z, x,y,z, ...]
  normals: Float64Array | null; // [nx,ny,nz, ...]
  uvs: Float64Array | null; // [u,v, u,v, ...]
  faces: Uint32Array; // Triangle indices into this submesh's vertices
  vertexCount: number;
  faceCount: number;
  /** Source POSITION index of each compacted vertex, ascending */
  sourceVertices: Uint32Array;
}

export type ComponentCategory =
  | 'skin'
  | 'face'
  | 'eyeIris'
  | 'eyeHighlight'
  | 'hair'
  | 'top'
  | 'bottom'
  | 'footwear'
  | 'detail'
  | 'unclassified';

export const COMPONENT_CATEGORIES: readonly ComponentCategory[] = [
  'skin',
  'face',
  'eyeIris',
  'eyeHighlight',
  'hair',
  'top',
  'bottom',
  'footwear',
  'detail',
  'unclassified',
];

export function isComponentCategory(value: string): value is ComponentCategory {
  return COMPONENT_CATEGORIES.some((c) => c === value);
}

export type UvTransform = 'identity' | 'flipV' | 'flipU' | 'flipBoth';

export const UV_TRANSFORMS: readonly UvTransform[] = ['identity', 'flipV', 'flipU', 'flipBoth'];

export function isUvTransform(value: string): value is UvTransform {
  return UV_TRANSFORMS.some((t) => t === value);
}

export interface MaterialAssignment {
  materialName: string;
  category: ComponentCategory;
  /** Pattern that selected the category, null for unclassified */
  matchedPattern: string | null;
  /** Configured override for the category, else the category default */
  suggestedTexture: string | null;
  /** File name of the material's own base colour image, if it has one */
  sourceTexture: string | null;
}

export interface UvRangeReport {
  /** Per-axis minimum, null when there are no UVs */
  min: Vec2 | null;
  max: Vec2 | null;
  /** Number of UV pairs with a component outside [-epsilon, 1 + epsilon] */
  outOfRange: number;
}
