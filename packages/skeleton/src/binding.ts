/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Bone binding - joins scene nodes to canonical bones
 *
 * The VRM humanoid extension is authoritative when present: it names the node
 * of each humanoid bone directly. Remaining bone-like nodes are matched by
 * name, trying the configured vocabularies in order.
 */

import { createLogger } from '@rigkit/data';
import type { Diagnostics } from '@rigkit/data';
import { getExtension, isRecord } from '@rigkit/container';
import type { SceneDocument } from '@rigkit/container';
import { nodeDisplayName } from './bone-graph.js';
import type { CanonicalBoneTaxonomy } from './taxonomy.js';
import type { BoneBinding, BoneGraph, SkeletonBinding, Vocabulary } from './types.js';

const log = createLogger('BoneBinding');

export interface BindingOptions {
  /** Vocabularies tried for node names, in order */
  vocabularies: readonly Vocabulary[];
  /** Read VRM 0.x / 1.0 humanoid extensions before matching names */
  useHumanoidExtension: boolean;
}

export const DEFAULT_BINDING_OPTIONS: BindingOptions = {
  vocabularies: ['humanoid', 'vroid', 'mocap', 'rigTool'],
  useHumanoidExtension: true,
};

export interface HumanoidBoneEntry {
  /** Humanoid bone name as written in the extension */
  bone: string;
  node: number;
}

function isNodeIndex(value: unknown, nodeCount: number): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 0 && value < nodeCount;
}

/**
 * Read the humanoid bone table of a VRM 0.x (`VRM`) or 1.0 (`VRMC_vrm`) extension.
 * Entries pointing at nodes that do not exist are dropped.
 */
export function readHumanoidExtension(doc: SceneDocument): HumanoidBoneEntry[] {
  const entries: HumanoidBoneEntry[] = [];
  const nodeCount = doc.nodes.length;

  // VRM 1.0: humanBones is an object keyed by bone name
  const vrm1 = getExtension(doc, 'VRMC_vrm');
  const humanoid1 = vrm1 && isRecord(vrm1.humanoid) ? vrm1.humanoid : undefined;
  if (humanoid1 && isRecord(humanoid1.humanBones)) {
    for (const [bone, value] of Object.entries(humanoid1.humanBones)) {
      if (isRecord(value) && isNodeIndex(value.node, nodeCount)) {
        entries.push({ bone, node: value.node });
      }
    }
    return entries;
  }

  // VRM 0.x: humanBones is an array of { bone, node }
  const vrm0 = getExtension(doc, 'VRM');
  const humanoid0 = vrm0 && isRecord(vrm0.humanoid) ? vrm0.humanoid : undefined;
  if (humanoid0 && Array.isArray(humanoid0.humanBones)) {
    for (const value of humanoid0.humanBones) {
      if (isRecord(value) && typeof value.bone === 'string' && isNodeIndex(value.node, nodeCount)) {
        entries.push({ bone: value.bone, node: value.node });
      }
    }
  }
  return entries;
}

/**
 * Bind scene nodes to canonical bones
 *
 * Records UnresolvedBoneAlias for bone-like nodes no vocabulary knows, and
 * DuplicateBoneBinding when a second node resolves to an already bound bone
 * (the first binding is kept).
 */
export function bindSceneBones(
  graph: BoneGraph,
  doc: SceneDocument,
  taxonomy: CanonicalBoneTaxonomy,
  options: BindingOptions,
  diagnostics: Diagnostics
): SkeletonBinding {
  const bindings = new Map<string, BoneBinding>();
  const boundNodes = new Set<number>();
  const unresolved: SkeletonBinding['unresolved'] = [];

  const bind = (binding: BoneBinding): void => {
    const existing = bindings.get(binding.bone);
    if (existing !== undefined) {
      diagnostics.record(
        'DuplicateBoneBinding',
        `"${binding.rawName}" (node ${binding.nodeIndex}) also resolves to ${binding.bone}, already bound to "${existing.rawName}" (node ${existing.nodeIndex})`,
        { nodeIndex: binding.nodeIndex, boneName: binding.bone }
      );
      return;
    }
    bindings.set(binding.bone, binding);
    boundNodes.add(binding.nodeIndex);
  };

  if (options.useHumanoidExtension) {
    for (const entry of readHumanoidExtension(doc)) {
      const bone = taxonomy.resolve('humanoid', entry.bone);
      if (bone === undefined) {
        log.debug(`Humanoid bone "${entry.bone}" has no canonical counterpart`);
        continue;
      }
      bind({
        bone: bone.name,
        nodeIndex: entry.node,
        rawName: nodeDisplayName(doc.nodes[entry.node]),
        source: 'humanoidExtension',
      });
    }
  }

  for (const sceneBone of graph.bones) {
    if (boundNodes.has(sceneBone.nodeIndex)) continue;
    const match = taxonomy.resolveAny(sceneBone.name, options.vocabularies);
    if (match === undefined) {
      unresolved.push({ nodeIndex: sceneBone.nodeIndex, rawName: sceneBone.name });
      diagnostics.record('UnresolvedBoneAlias', `No vocabulary knows "${sceneBone.name}"`, {
        nodeIndex: sceneBone.nodeIndex,
      });
      continue;
    }
    bind({ bone: match.bone.name, nodeIndex: sceneBone.nodeIndex, rawName: sceneBone.name, source: match.vocabulary });
  }

  log.info(`Bound ${bindings.size} of ${taxonomy.size} canonical bone(s), ${unresolved.length} node(s) unresolved`, {
    operation: 'bindSceneBones',
  });
  return { bindings, unresolved };
}
