/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Skeleton mapping - the canonical skeleton measured against one asset
 */

import { mat4 } from 'gl-matrix';
import { PipelineError, createLogger } from '@rigkit/data';
import type { Quat, Transform, Vec3 } from '@rigkit/data';
import type { CanonicalBoneTaxonomy } from './taxonomy.js';
import { SKELETON_FRAME } from './types.js';
import type { BoneGraph, CanonicalBone, MappedBone, SkeletonBinding, SkeletonMapping } from './types.js';

const log = createLogger('SkeletonMapping');

function identity(): number[] {
  return [1, 0, 0, 0, 0, 1, 0, 0, 0, 0, 1, 0, 0, 0, 0, 1];
}

function decompose(matrix: number[]): Transform {
  const translation: Vec3 = [0, 0, 0];
  const rotation: Quat = [0, 0, 0, 1];
  const scale: Vec3 = [1, 1, 1];
  mat4.getTranslation(translation, matrix);
  mat4.getScaling(scale, matrix);
  mat4.getRotation(rotation, matrix);
  return { translation, rotation, scale };
}

/**
 * Express `child` in the frame of `parent`. Null when the parent matrix is singular.
 */
export function relativeTransform(parent: number[], child: number[]): Transform | null {
  const inverse = identity();
  if (mat4.invert(inverse, parent) === null) {
    return null;
  }
  const relative = identity();
  mat4.multiply(relative, inverse, child);
  return decompose(relative);
}

function copyTransform(t: Transform): Transform {
  return {
    translation: [t.translation[0], t.translation[1], t.translation[2]],
    rotation: [t.rotation[0], t.rotation[1], t.rotation[2], t.rotation[3]],
    scale: [t.scale[0], t.scale[1], t.scale[2]],
  };
}

/**
 * @throws PipelineError(CyclicHierarchy) if a parent chain does not reach the
 *   root within `bones.size` steps
 */
export function checkParentChains(bones: ReadonlyMap<string, MappedBone>, root: string): void {
  const roots = [...bones.values()].filter((b) => b.parent === null);
  if (roots.length !== 1 || roots[0].name !== root) {
    throw new PipelineError('CyclicHierarchy', `Skeleton must have the single root "${root}"`, {
      roots: roots.map((r) => r.name),
    });
  }
  for (const bone of bones.values()) {
    let current: MappedBone | undefined = bone;
    let steps = 0;
    while (current !== undefined && current.parent !== null) {
      if (steps >= bones.size) {
        throw new PipelineError('CyclicHierarchy', `Parent chain of "${bone.name}" does not reach "${root}"`, {
          bone: bone.name,
        });
      }
      current = bones.get(current.parent);
      steps++;
    }
    if (current === undefined || current.name !== root) {
      throw new PipelineError('CyclicHierarchy', `Parent chain of "${bone.name}" does not reach "${root}"`, {
        bone: bone.name,
      });
    }
  }
}

interface Placement {
  /** World matrix of the bone as placed in the mapping */
  world: number[];
  /** Nearest bound bone at or above this one */
  anchor: string | null;
  bone: MappedBone;
}

function composeRest(parentWorld: number[], rest: Transform): number[] {
  const local = identity();
  mat4.fromRotationTranslationScale(local, rest.rotation, rest.translation, rest.scale);
  const out = identity();
  mat4.multiply(out, parentWorld, local);
  return out;
}

/**
 * Build the skeleton mapping for every canonical bone, in taxonomy order
 *
 * Every bone is placed in the frame of its canonical parent as the mapping
 * places it. A bound bone is measured on the asset: its node world matrix
 * relative to that frame, which runs through the nearest bound ancestor and
 * the rest offsets of any unbound bones in between. Unbound bones take the
 * taxonomy rest transform. Composing local transforms from the root therefore
 * reproduces the node world matrix of every measured bone.
 */
export function buildSkeletonMapping(
  taxonomy: CanonicalBoneTaxonomy,
  graph: BoneGraph,
  binding: SkeletonBinding
): SkeletonMapping {
  const placements = new Map<string, Placement>();

  const place = (name: string): Placement => {
    const done = placements.get(name);
    if (done !== undefined) return done;

    const canonical = taxonomy.get(name);
    if (canonical === undefined) {
      throw new PipelineError('MalformedTaxonomy', `Parent chain reaches unknown bone "${name}"`, { bone: name });
    }
    const parent = canonical.parent === null ? null : place(canonical.parent);
    const parentWorld = parent?.world ?? identity();
    const anchor = parent?.anchor ?? null;
    const bound = binding.bindings.get(name) ?? null;

    let placement: Placement | null = null;
    if (bound !== null) {
      const world = graph.worldMatrices[bound.nodeIndex];
      const local = relativeTransform(parentWorld, world);
      if (local === null) {
        log.warn(`Frame of "${canonical.parent ?? ''}" is singular; "${name}" uses the rest pose`, {
          operation: 'buildSkeletonMapping',
          nodeIndex: bound.nodeIndex,
        });
      } else {
        placement = {
          world,
          anchor: name,
          bone: { ...boneFields(canonical), localTransform: local, source: 'scene', measuredFrom: anchor, binding: bound },
        };
      }
    }
    if (placement === null) {
      placement = {
        world: composeRest(parentWorld, canonical.restTransform),
        anchor,
        bone: {
          ...boneFields(canonical),
          localTransform: copyTransform(canonical.restTransform),
          source: 'rest',
          measuredFrom: null,
          binding: bound,
        },
      };
    }
    placements.set(name, placement);
    return placement;
  };

  const bones = new Map<string, MappedBone>();
  for (const canonical of taxonomy.bones) {
    bones.set(canonical.name, place(canonical.name).bone);
  }

  checkParentChains(bones, taxonomy.root.name);

  const measured = [...bones.values()].filter((b) => b.source === 'scene').length;
  const totalDof = [...bones.values()].reduce((sum, b) => sum + b.dof, 0);
  log.info(`Mapped ${bones.size} bones, ${measured} measured on the asset, ${totalDof} DOF`, {
    operation: 'buildSkeletonMapping',
  });
  return { bones, root: taxonomy.root.name, totalDof, frame: SKELETON_FRAME };
}

function boneFields(canonical: CanonicalBone): Pick<
  MappedBone,
  'name' | 'parent' | 'children' | 'jointType' | 'limits' | 'channels' | 'dof'
> {
  return {
    name: canonical.name,
    parent: canonical.parent,
    children: canonical.children,
    jointType: canonical.jointType,
    limits: canonical.limits,
    channels: canonical.channels,
    dof: canonical.dof,
  };
}
