/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * @rigkit/skeleton - Bone graph extraction, canonical taxonomy and joint export
 */

export { isBoneLike, nameWords, nodeDisplayName, localMatrix, buildParentIndex, extractBoneGraph } from './bone-graph.js';
export { CanonicalBoneTaxonomy, ROOT_BONE, loadTaxonomyFile, loadDefaultTaxonomy } from './taxonomy.js';
export type { AliasMatch } from './taxonomy.js';
export { bindSceneBones, readHumanoidExtension, DEFAULT_BINDING_OPTIONS } from './binding.js';
export type { BindingOptions, HumanoidBoneEntry } from './binding.js';
export { buildSkeletonMapping, checkParentChains, relativeTransform } from './mapping.js';
export { exportJointDescriptors } from './joints.js';

export { VOCABULARIES, AXES, CHANNELS, SKELETON_FRAME, isVocabulary } from './types.js';
export type {
  Vocabulary,
  Axis,
  Channel,
  JointType,
  AxisLimit,
  AxisLimits,
  CanonicalBone,
  SceneBone,
  BoneGraph,
  BindingSource,
  BoneBinding,
  UnresolvedBone,
  SkeletonBinding,
  MappedBone,
  SkeletonMapping,
  JointDescriptor,
} from './types.js';
