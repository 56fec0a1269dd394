/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * @rigkit/geometry - Per-primitive submesh extraction, UV correction and
 * material classification
 */

export { partitionPrimitive, partitionPrimitives } from './partitioner.js';
export type { PrimitiveLocation } from './partitioner.js';

export {
  applyUvTransform,
  resolveUvTransform,
  checkUvRange,
  correctSubmeshUvs,
  DEFAULT_UV_CORRECTION,
} from './uv-corrector.js';
export type { UvCorrectionConfig, UvCorrectionResult } from './uv-corrector.js';

export { MaterialResolver, DEFAULT_MATERIAL_RULES } from './material-resolver.js';
export type { MaterialRule, MaterialResolverOptions, Classification } from './material-resolver.js';

export { COMPONENT_CATEGORIES, UV_TRANSFORMS, isComponentCategory, isUvTransform } from './types.js';
export type { ExtractedSubmesh, ComponentCategory, UvTransform, MaterialAssignment, UvRangeReport } from './types.js';
