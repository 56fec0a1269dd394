/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Small in-memory avatar used by the pipeline tests
 *
 * Meshes: "Body" with a skin triangle (primitive 0) and a hair triangle
 * (primitive 1, textured with image 0); "Broken" with one primitive that has
 * no POSITION (primitive 2).
 *
 * Nodes: Armature -> Hips -> Spine -> Chest -> Neck, and
 * Hips -> CC_Base_L_Upperarm -> LeftForeArm, plus the two mesh nodes.
 */

import { SceneBuilder } from '@rigkit/container';

export const PNG_BYTES = new Uint8Array([0x89, 0x50, 0x4e, 0x47]);

export function buildTestAvatar(): Uint8Array {
  const builder = new SceneBuilder('rigkit test avatar');

  const POSITION = builder.addAccessor(
    new Float32Array([0, 0, 0, 1, 0, 0, 0, 1, 0, 0, 0, 1, 1, 1, 0, 0, 1, 1]),
    'VEC3'
  );
  const NORMAL = builder.addAccessor(new Float32Array([0, 0, 1, 0, 0, 1, 0, 0, 1, 0, 0, 1, 0, 0, 1, 0, 0, 1]), 'VEC3');
  const TEXCOORD_0 = builder.addAccessor(new Float32Array([0, 0, 1, 0, 0, 1, 0.25, 0.25, 0.5, 0.25, 0.25, 0.75]), 'VEC2');

  const hairTexture = builder.addImage(PNG_BYTES, 'image/png', 'hair');
  const skin = builder.addMaterial('N00_000_00_Body_00_SKIN (Instance)');
  const hair = builder.addMaterial('N00_000_Hair1_00_HAIR (Instance)', { baseColorTexture: hairTexture });

  const attributes = { POSITION, NORMAL, TEXCOORD_0 };
  const body = builder.addMesh(
    [
      { attributes, indices: builder.addAccessor(new Uint16Array([0, 1, 2]), 'SCALAR'), material: skin },
      { attributes, indices: builder.addAccessor(new Uint16Array([3, 4, 5]), 'SCALAR'), material: hair },
    ],
    'Body'
  );
  const broken = builder.addMesh([{ attributes: {} }], 'Broken');

  builder.addNode({ name: 'Armature', children: [1, 7, 8] }, { root: true });
  builder.addNode({ name: 'J_Bip_C_Hips', translation: [0, 1, 0], children: [2, 5] });
  builder.addNode({ name: 'J_Bip_C_Spine', translation: [0, 0.25, 0], children: [3] });
  builder.addNode({ name: 'J_Bip_C_Chest', translation: [0, 0.25, 0], children: [4] });
  builder.addNode({ name: 'J_Bip_C_Neck', translation: [0, 0.125, 0] });
  builder.addNode({ name: 'CC_Base_L_Upperarm', translation: [-0.25, 0.5, 0], children: [6] });
  builder.addNode({ name: 'LeftForeArm', translation: [-0.25, 0, 0] });
  builder.addNode({ name: 'Body', mesh: body });
  builder.addNode({ name: 'BrokenMesh', mesh: broken });

  return builder.build();
}
