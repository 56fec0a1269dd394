/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * UV Space Corrector - maps texture coordinates from the container's
 * top-left origin into the target's convention
 */

import { createLogger } from '@rigkit/data';
import type { Diagnostics } from '@rigkit/data';
import type { ComponentCategory, ExtractedSubmesh, UvRangeReport, UvTransform } from './types.js';

const log = createLogger('UVCorrector');

export interface UvCorrectionConfig {
  /** Transform for categories without an entry in `byComponent` */
  default: UvTransform;
  byComponent: Partial<Record<ComponentCategory, UvTransform>>;
  /** Tolerance around [0, 1] before a UV counts as out of range */
  epsilon: number;
}

export const DEFAULT_UV_CORRECTION: UvCorrectionConfig = {
  default: 'flipV',
  byComponent: {},
  epsilon: 0.01,
};

/**
 * Apply a transform to flat [u,v, u,v, ...] data, returning a new array
 */
export function applyUvTransform(uvs: Float64Array, transform: UvTransform): Float64Array {
  const flipU = transform === 'flipU' || transform === 'flipBoth';
  const flipV = transform === 'flipV' || transform === 'flipBoth';
  const out = new Float64Array(uvs.length);
  for (let i = 0; i < uvs.length; i += 2) {
    out[i] = flipU ? 1 - uvs[i] : uvs[i];
    out[i + 1] = flipV ? 1 - uvs[i + 1] : uvs[i + 1];
  }
  return out;
}

export function resolveUvTransform(category: ComponentCategory, config: UvCorrectionConfig): UvTransform {
  return config.byComponent[category] ?? config.default;
}

/**
 * Measure the UV extent and count pairs outside [-epsilon, 1 + epsilon]
 */
export function checkUvRange(uvs: Float64Array, epsilon: number): UvRangeReport {
  if (uvs.length === 0) {
    return { min: null, max: null, outOfRange: 0 };
  }

  let minU = Infinity;
  let minV = Infinity;
  let maxU = -Infinity;
  let maxV = -Infinity;
  let outOfRange = 0;
  const low = -epsilon;
  const high = 1 + epsilon;

  for (let i = 0; i < uvs.length; i += 2) {
    const u = uvs[i];
    const v = uvs[i + 1];
    if (u < minU) minU = u;
    if (u > maxU) maxU = u;
    if (v < minV) minV = v;
    if (v > maxV) maxV = v;
    if (u < low || u > high || v < low || v > high) {
      outOfRange++;
    }
  }

  return { min: [minU, minV], max: [maxU, maxV], outOfRange };
}

export interface UvCorrectionResult {
  submesh: ExtractedSubmesh;
  transform: UvTransform;
  report: UvRangeReport;
}

/**
 * Correct a submesh's UVs for its category and check the result
 *
 * Records one SuspiciousUVRange warning when any corrected UV falls outside
 * the tolerated range. Submeshes without UVs pass through unchanged.
 */
export function correctSubmeshUvs(
  submesh: ExtractedSubmesh,
  category: ComponentCategory,
  config: UvCorrectionConfig,
  diagnostics: Diagnostics
): UvCorrectionResult {
  const transform = resolveUvTransform(category, config);

  if (submesh.uvs === null) {
    return { submesh, transform, report: { min: null, max: null, outOfRange: 0 } };
  }

  const uvs = applyUvTransform(submesh.uvs, transform);
  const report = checkUvRange(uvs, config.epsilon);

  if (report.outOfRange > 0 && report.min && report.max) {
    diagnostics.record(
      'SuspiciousUVRange',
      `${report.outOfRange} of ${uvs.length / 2} UVs outside [0, 1] after ${transform} ` +
        `(u ${report.min[0]}..${report.max[0]}, v ${report.min[1]}..${report.max[1]})`,
      {
        primitiveIndex: submesh.primitiveIndex,
        materialName: submesh.materialName,
        min: report.min,
        max: report.max,
        outOfRange: report.outOfRange,
      }
    );
  }

  log.debug(`Applied ${transform} for ${category}`, undefined, {
    operation: 'correctSubmeshUvs',
    primitiveIndex: submesh.primitiveIndex,
  });

  return { submesh: { ...submesh, uvs }, transform, report };
}
