/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import type { AxisLimits, JointDescriptor, MappedBone, SkeletonMapping } from './types.js';

function freezeLimits(limits: AxisLimits): Readonly<AxisLimits> {
  const copy: AxisLimits = {};
  if (limits.x) copy.x = Object.freeze({ ...limits.x });
  if (limits.y) copy.y = Object.freeze({ ...limits.y });
  if (limits.z) copy.z = Object.freeze({ ...limits.z });
  return Object.freeze(copy);
}

function describeJoint(parent: string, bone: MappedBone): JointDescriptor {
  const [x, y, z] = bone.localTransform.translation;
  return Object.freeze({
    name: `${parent}_${bone.name}`,
    parentLink: parent,
    childLink: bone.name,
    jointType: bone.jointType,
    pivotOffset: Object.freeze<[number, number, number]>([x, y, z]),
    axisLimits: freezeLimits(bone.limits),
    channels: Object.freeze([...bone.channels]),
    dof: bone.dof,
    pivotSource: bone.source,
  });
}

/**
 * One joint per non-root bone, in mapping order. Descriptors are frozen.
 */
export function exportJointDescriptors(mapping: SkeletonMapping): readonly JointDescriptor[] {
  const joints: JointDescriptor[] = [];
  for (const bone of mapping.bones.values()) {
    if (bone.parent === null) continue;
    joints.push(describeJoint(bone.parent, bone));
  }
  return Object.freeze(joints);
}
