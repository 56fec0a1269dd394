/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { describe, it, expect } from 'vitest';
import { Diagnostics } from '@rigkit/data';
import { SceneBuilder, parseSceneDocument, readContainer } from '@rigkit/container';
import { DEFAULT_BINDING_OPTIONS, bindSceneBones } from './binding.js';
import { extractBoneGraph } from './bone-graph.js';
import { exportJointDescriptors } from './joints.js';
import { buildSkeletonMapping } from './mapping.js';
import { loadDefaultTaxonomy } from './taxonomy.js';
import type { JointDescriptor } from './types.js';

const taxonomy = loadDefaultTaxonomy();

// hips -> shoulder -> arm, with the arm node named by the caller
function jointsFor(armName: string): readonly JointDescriptor[] {
  const builder = new SceneBuilder();
  builder.addNode({ name: 'J_Bip_C_Hips', translation: [0, 1, 0], children: [1] }, { root: true });
  builder.addNode({ name: 'J_Bip_L_Shoulder', translation: [-0.25, 0.5, 0], children: [2] });
  builder.addNode({ name: armName, translation: [-0.125, 0, 0] });
  const doc = parseSceneDocument(readContainer(builder.build()).json);
  const graph = extractBoneGraph(doc);
  const binding = bindSceneBones(graph, doc, taxonomy, DEFAULT_BINDING_OPTIONS, new Diagnostics());
  return exportJointDescriptors(buildSkeletonMapping(taxonomy, graph, binding));
}

describe('exportJointDescriptors', () => {
  it('should emit one joint per non-root bone in taxonomy order', () => {
    const joints = jointsFor('J_Bip_L_UpperArm');
    expect(joints).toHaveLength(23);
    expect(joints.map((j) => j.childLink)).toEqual(taxonomy.bones.slice(1).map((b) => b.name));
    expect(joints[0].name).toBe('hips_spine');
    expect(joints[0].parentLink).toBe('hips');
  });

  it('should take the pivot from the scene when both links are bound', () => {
    const joint = jointsFor('J_Bip_L_UpperArm').find((j) => j.childLink === 'leftUpperArm');
    expect(joint?.name).toBe('leftShoulder_leftUpperArm');
    expect(joint?.pivotSource).toBe('scene');
    expect(joint?.pivotOffset[0]).toBeCloseTo(-0.125, 10);
    expect(joint?.pivotOffset[1]).toBeCloseTo(0, 10);
    expect(joint?.axisLimits).toEqual({
      x: { min: -180, max: 180 },
      y: { min: -90, max: 180 },
      z: { min: -45, max: 180 },
    });
    expect(joint?.channels).toEqual(['Xrotation', 'Yrotation', 'Zrotation']);
    expect(joint?.dof).toBe(3);
    expect(joint?.jointType).toBe('revolute');
  });

  it('should take the pivot from the rest pose otherwise', () => {
    const joint = jointsFor('J_Bip_L_UpperArm').find((j) => j.childLink === 'jaw');
    expect(joint?.pivotSource).toBe('rest');
    expect(joint?.pivotOffset).toEqual([0, -0.03, -0.02]);
    expect(joint?.axisLimits).toEqual({ x: { min: 0, max: 30 } });
  });

  it('should give the same child link to a rig-tool and a mocap arm name', () => {
    const fromRigTool = jointsFor('CC_Base_L_Upperarm').find((j) => j.childLink === 'leftUpperArm');
    const fromMocap = jointsFor('LeftArm').find((j) => j.childLink === 'leftUpperArm');
    expect(fromRigTool?.pivotSource).toBe('scene');
    expect(fromMocap?.pivotSource).toBe('scene');
    expect(fromRigTool?.name).toBe(fromMocap?.name);
  });

  it('should freeze descriptors deeply', () => {
    const joints = jointsFor('LeftArm');
    const joint = joints[0];
    expect(Object.isFrozen(joints)).toBe(true);
    expect(Object.isFrozen(joint)).toBe(true);
    expect(Object.isFrozen(joint.pivotOffset)).toBe(true);
    expect(Object.isFrozen(joint.axisLimits)).toBe(true);
    expect(Object.isFrozen(joint.axisLimits.x)).toBe(true);
    expect(Object.isFrozen(joint.channels)).toBe(true);
  });
});
