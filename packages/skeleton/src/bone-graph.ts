/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Skeleton Graph Extractor - finds the bone-like nodes of the scene graph
 *
 * Parent links are derived by inverting the nodes' children lists. World
 * matrices are composed for every node, so bones bound later through an
 * extension still get a world position even if their name looks nothing
 * like a bone.
 */

import { mat4 } from 'gl-matrix';
import { PipelineError, createLogger } from '@rigkit/data';
import type { SceneDocument, SceneNode } from '@rigkit/container';
import type { BoneGraph, SceneBone } from './types.js';

const log = createLogger('BoneGraph');

// Whole words only, so "Armature", "legacy" and "Eyebrow_end" stay out
const BONE_WORDS: ReadonlySet<string> = new Set([
  'hip', 'hips', 'pelvis', 'spine', 'chest', 'neck', 'head', 'jaw', 'eye',
  'shoulder', 'clavicle', 'collar', 'arm', 'upperarm', 'lowerarm', 'forearm', 'hand', 'wrist',
  'leg', 'upleg', 'upperleg', 'lowerleg', 'thigh', 'knee', 'calf', 'shin', 'foot', 'ankle', 'toe', 'toes',
]);
const BONE_PREFIX = /^(J_Bip_|J_Adj_|CC_Base_|mixamorig)/;

/**
 * Split a node name into lower-case words at separators, camelCase humps and
 * letter/digit boundaries: "LeftUpLeg" -> left, up, leg; "Spine1" -> spine, 1
 */
export function nameWords(name: string): string[] {
  return name
    .replace(/([a-z])([A-Z])/g, '$1 $2')
    .replace(/([A-Za-z])([0-9])/g, '$1 $2')
    .replace(/([0-9])([A-Za-z])/g, '$1 $2')
    .split(/[^A-Za-z0-9]+/)
    .filter((word) => word.length > 0)
    .map((word) => word.toLowerCase());
}

/**
 * A node is bone-like when it has children or its name looks like a bone.
 * Mesh leaves are never bones.
 */
export function isBoneLike(node: SceneNode): boolean {
  const hasChildren = node.children.length > 0;
  if (node.mesh !== undefined && !hasChildren) {
    return false;
  }
  if (hasChildren) {
    return true;
  }
  const name = node.name ?? '';
  return BONE_PREFIX.test(name) || nameWords(name).some((word) => BONE_WORDS.has(word));
}

export function nodeDisplayName(node: SceneNode): string {
  return node.name ?? `node_${node.index}`;
}

function identity(): number[] {
  return [1, 0, 0, 0, 0, 1, 0, 0, 0, 0, 1, 0, 0, 0, 0, 1];
}

export function localMatrix(node: SceneNode): number[] {
  const out = identity();
  mat4.fromRotationTranslationScale(out, node.rotation, node.translation, node.scale);
  return out;
}

/**
 * Invert the children lists into one parent per node
 *
 * @throws PipelineError(UnsupportedSchema) if a node has two parents
 * @throws PipelineError(CyclicHierarchy) if a parent walk revisits a node
 */
export function buildParentIndex(doc: SceneDocument): Array<number | null> {
  const parentOf: Array<number | null> = doc.nodes.map(() => null);

  for (const node of doc.nodes) {
    for (const child of node.children) {
      const existing = parentOf[child];
      if (existing !== null) {
        throw new PipelineError(
          'UnsupportedSchema',
          `Node ${child} is a child of both node ${existing} and node ${node.index}`,
          { node: child, parents: [existing, node.index] }
        );
      }
      parentOf[child] = node.index;
    }
  }

  for (let start = 0; start < parentOf.length; start++) {
    const seen = new Set<number>([start]);
    let current = parentOf[start];
    while (current !== null) {
      if (seen.has(current)) {
        throw new PipelineError('CyclicHierarchy', `Node ${start} reaches node ${current} twice walking its parents`, {
          node: start,
          chain: [...seen],
        });
      }
      seen.add(current);
      current = parentOf[current];
    }
  }

  return parentOf;
}

function computeWorldMatrices(doc: SceneDocument, parentOf: Array<number | null>): number[][] {
  const world: number[][] = doc.nodes.map(() => identity());
  const stack: number[] = [];
  for (let i = parentOf.length - 1; i >= 0; i--) {
    if (parentOf[i] === null) stack.push(i);
  }

  // Top-down, so a parent's matrix is final before its children read it
  while (stack.length > 0) {
    const index = stack.pop();
    if (index === undefined) break;
    const node = doc.nodes[index];
    const local = localMatrix(node);
    const parent = parentOf[index];
    if (parent === null) {
      world[index] = local;
    } else {
      const composed = identity();
      mat4.multiply(composed, world[parent], local);
      world[index] = composed;
    }
    for (let c = node.children.length - 1; c >= 0; c--) {
      stack.push(node.children[c]);
    }
  }

  return world;
}

/**
 * Extract the bone graph reachable from the default scene
 *
 * Roots are the nodes of `scenes[scene ?? 0]`, or every parentless node when
 * the document has no scenes. Each bone's parent is its nearest bone-like
 * ancestor.
 */
export function extractBoneGraph(doc: SceneDocument): BoneGraph {
  const parentOf = buildParentIndex(doc);
  const worldMatrices = computeWorldMatrices(doc, parentOf);

  const roots =
    doc.scenes.length > 0
      ? [...doc.scenes[doc.scene ?? 0].nodes]
      : parentOf.flatMap((parent, index) => (parent === null ? [index] : []));

  const bones: SceneBone[] = [];
  const byNode = new Map<number, SceneBone>();
  const visited = new Set<number>();

  // Depth-first, pre-order; entries carry the nearest bone ancestor
  const stack: Array<{ nodeIndex: number; boneParent: number | null }> = [];
  for (let r = roots.length - 1; r >= 0; r--) {
    stack.push({ nodeIndex: roots[r], boneParent: null });
  }

  while (stack.length > 0) {
    const entry = stack.pop();
    if (entry === undefined) break;
    if (visited.has(entry.nodeIndex)) continue;
    visited.add(entry.nodeIndex);

    const node = doc.nodes[entry.nodeIndex];
    let boneParent = entry.boneParent;

    if (isBoneLike(node)) {
      const world = worldMatrices[node.index];
      const bone: SceneBone = {
        nodeIndex: node.index,
        name: nodeDisplayName(node),
        parentNode: entry.boneParent,
        childNodes: [],
        local: { translation: node.translation, rotation: node.rotation, scale: node.scale },
        world,
        worldPosition: [world[12], world[13], world[14]],
      };
      bones.push(bone);
      byNode.set(node.index, bone);
      if (entry.boneParent !== null) {
        byNode.get(entry.boneParent)?.childNodes.push(node.index);
      }
      boneParent = node.index;
    }

    for (let c = node.children.length - 1; c >= 0; c--) {
      stack.push({ nodeIndex: node.children[c], boneParent });
    }
  }

  log.info(`Found ${bones.length} bone-like node(s) among ${doc.nodes.length}`, { operation: 'extractBoneGraph' });
  return { bones, byNode, roots, worldMatrices };
}
