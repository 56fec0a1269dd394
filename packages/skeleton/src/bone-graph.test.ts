/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { describe, it, expect } from 'vitest';
import { isPipelineError } from '@rigkit/data';
import { SceneBuilder, parseSceneDocument, readContainer } from '@rigkit/container';
import type { SceneDocument } from '@rigkit/container';
import { buildParentIndex, extractBoneGraph, isBoneLike, nameWords } from './bone-graph.js';

function errorOf(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
}

function parse(json: string): SceneDocument {
  return parseSceneDocument(json);
}

// 0 Armature -> 1 Hips -> 2 Spine -> {3 Upperarm, 4 Ribbon}; 0 -> 5 Body (mesh)
function avatarScene(): SceneDocument {
  const builder = new SceneBuilder();
  const POSITION = builder.addAccessor(new Float32Array([0, 0, 0, 1, 0, 0, 0, 1, 0]), 'VEC3');
  const mesh = builder.addMesh([{ attributes: { POSITION } }], 'Body');
  builder.addNode({ name: 'Armature', children: [1, 5] }, { root: true });
  builder.addNode({ name: 'J_Bip_C_Hips', translation: [0, 1, 0], children: [2] });
  builder.addNode({ name: 'J_Bip_C_Spine', translation: [0, 0.2, 0], children: [3, 4] });
  builder.addNode({ name: 'CC_Base_L_Upperarm', translation: [0.1, 0, 0] });
  builder.addNode({ name: 'Ribbon' });
  builder.addNode({ name: 'Body', mesh });
  return parseSceneDocument(readContainer(builder.build()).json);
}

describe('isBoneLike', () => {
  it('should accept nodes with children or bone names and reject mesh leaves', () => {
    const doc = avatarScene();
    expect(doc.nodes.map(isBoneLike)).toEqual([true, true, true, true, false, false]);
  });

  it('should match bone words case-insensitively', () => {
    const doc = parse('{"asset":{"version":"2.0"},"nodes":[{"name":"upper_LEG.L"},{"name":"Collider"},{}]}');
    expect(doc.nodes.map(isBoneLike)).toEqual([true, false, false]);
  });

  it('should match whole words only', () => {
    const names = ['LeftForeArm', 'LeftUpLeg', 'Spine1', 'LeftToeBase', 'HEAD', 'legacy', 'Eyebrow_end', 'Armature', 'Handle'];
    const doc = parse(JSON.stringify({ asset: { version: '2.0' }, nodes: names.map((name) => ({ name })) }));
    expect(doc.nodes.map(isBoneLike)).toEqual([true, true, true, true, true, false, false, false, false]);
  });
});

describe('nameWords', () => {
  it('should split at separators, humps and digits', () => {
    expect(nameWords('LeftUpLeg')).toEqual(['left', 'up', 'leg']);
    expect(nameWords('upper_LEG.L')).toEqual(['upper', 'leg', 'l']);
    expect(nameWords('Spine1')).toEqual(['spine', '1']);
    expect(nameWords('Eyebrow_end')).toEqual(['eyebrow', 'end']);
  });
});

describe('buildParentIndex', () => {
  it('should invert children lists', () => {
    expect(buildParentIndex(avatarScene())).toEqual([null, 0, 1, 2, 2, 0]);
  });

  it('should reject a node with two parents', () => {
    const doc = parse('{"asset":{"version":"2.0"},"nodes":[{"children":[2]},{"children":[2]},{}]}');
    const error = errorOf(() => buildParentIndex(doc));
    expect(isPipelineError(error, 'UnsupportedSchema')).toBe(true);
    expect(error instanceof Error ? error.message : '').toBe('Node 2 is a child of both node 0 and node 1');
  });

  it('should reject a parent cycle', () => {
    const doc = parse('{"asset":{"version":"2.0"},"nodes":[{"children":[1]},{"children":[0]}]}');
    expect(isPipelineError(errorOf(() => buildParentIndex(doc)), 'CyclicHierarchy')).toBe(true);
  });
});

describe('extractBoneGraph', () => {
  it('should link each bone to its nearest bone ancestor', () => {
    const graph = extractBoneGraph(avatarScene());

    expect(graph.roots).toEqual([0]);
    expect(graph.bones.map((b) => b.nodeIndex)).toEqual([0, 1, 2, 3]);
    expect(graph.bones.map((b) => b.parentNode)).toEqual([null, 0, 1, 2]);
    expect(graph.byNode.get(2)?.childNodes).toEqual([3]);
    expect(graph.byNode.get(0)?.childNodes).toEqual([1]);
    expect(graph.byNode.has(4)).toBe(false);
  });

  it('should compose world positions down the tree', () => {
    const graph = extractBoneGraph(avatarScene());
    const [x, y, z] = graph.byNode.get(3)?.worldPosition ?? [NaN, NaN, NaN];
    expect(x).toBeCloseTo(0.1, 10);
    expect(y).toBeCloseTo(1.2, 10);
    expect(z).toBeCloseTo(0, 10);
    expect(graph.worldMatrices).toHaveLength(6);
  });

  it('should apply parent rotation and scale to child offsets', () => {
    // 90 degrees about z maps +x to +y; scale 2 doubles the offset
    const s = Math.SQRT1_2;
    const doc = parse(
      JSON.stringify({
        asset: { version: '2.0' },
        nodes: [
          { name: 'hips', rotation: [0, 0, s, s], scale: [2, 2, 2], children: [1] },
          { name: 'spine', translation: [1, 0, 0] },
        ],
      })
    );
    const [x, y, z] = extractBoneGraph(doc).byNode.get(1)?.worldPosition ?? [NaN, NaN, NaN];
    expect(x).toBeCloseTo(0, 6);
    expect(y).toBeCloseTo(2, 6);
    expect(z).toBeCloseTo(0, 6);
  });

  it('should use parentless nodes as roots when there are no scenes', () => {
    const doc = parse('{"asset":{"version":"2.0"},"nodes":[{"name":"hips","children":[1]},{"name":"spine"},{"name":"head"}]}');
    const graph = extractBoneGraph(doc);
    expect(graph.roots).toEqual([0, 2]);
    expect(graph.bones.map((b) => b.name)).toEqual(['hips', 'spine', 'head']);
  });

  it('should ignore nodes outside the default scene', () => {
    const doc = parse(
      '{"asset":{"version":"2.0"},"scene":0,"scenes":[{"nodes":[0]}],"nodes":[{"name":"hips"},{"name":"spine"}]}'
    );
    expect(extractBoneGraph(doc).bones.map((b) => b.nodeIndex)).toEqual([0]);
  });
});
