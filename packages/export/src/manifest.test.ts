/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { describe, it, expect } from 'vitest';
import { Diagnostics } from '@rigkit/data';
import type { ExtractedSubmesh } from '@rigkit/geometry';
import { buildManifest, meshFileName, serializeManifest, type MeshEntry } from './manifest.js';

const submesh: ExtractedSubmesh = {
  primitiveIndex: 3,
  meshIndex: 1,
  meshPrimitiveIndex: 0,
  meshName: 'Hair',
  materialIndex: 2,
  materialName: 'N00_000_Hair1_00_HAIR',
  positions: new Float64Array(12),
  normals: null,
  uvs: new Float64Array(8),
  faces: new Uint32Array([0, 1, 2, 2, 1, 3]),
  vertexCount: 4,
  faceCount: 2,
  sourceVertices: new Uint32Array([10, 11, 12, 13]),
};

const entry: MeshEntry = {
  submesh,
  assignment: {
    materialName: 'N00_000_Hair1_00_HAIR',
    category: 'hair',
    matchedPattern: 'hair',
    suggestedTexture: 'texture_20.png',
    sourceTexture: 'texture_01.png',
  },
  uvTransform: 'flipV',
  filename: meshFileName('hair', 3),
};

describe('meshFileName', () => {
  it('should combine category and global primitive index', () => {
    expect(meshFileName('hair', 3)).toBe('hair_p3.obj');
    expect(meshFileName('unclassified', 0)).toBe('unclassified_p0.obj');
  });
});

describe('buildManifest', () => {
  it('should list primitives, textures and diagnostics with snake_case keys', () => {
    const diagnostics = new Diagnostics();
    diagnostics.record('MissingRequiredAttribute', 'Primitive 4: no POSITION attribute', { primitiveIndex: 4 });

    const manifest = buildManifest({
      generator: 'rigkit test',
      source: 'avatar.vrm',
      meshes: [entry],
      textures: [{ imageIndex: 1, fileName: 'texture_01.png', mimeType: 'image/png', bytes: new Uint8Array(5) }],
      diagnostics: diagnostics.all,
    });

    expect(manifest).toEqual({
      generator: 'rigkit test',
      source: 'avatar.vrm',
      primitives: [
        {
          filename: 'hair_p3.obj',
          primitive_index: 3,
          mesh_index: 1,
          material_name: 'N00_000_Hair1_00_HAIR',
          component_category: 'hair',
          face_count: 2,
          vertex_count: 4,
          suggested_texture: 'texture_20.png',
          source_texture: 'texture_01.png',
          uv_correction_applied: 'flipV',
        },
      ],
      textures: [{ filename: 'texture_01.png', image_index: 1, mime_type: 'image/png', byte_length: 5 }],
      diagnostics: [
        {
          severity: 'error',
          kind: 'MissingRequiredAttribute',
          message: 'Primitive 4: no POSITION attribute',
          context: { primitiveIndex: 4 },
        },
      ],
    });
  });

  it('should serialize as indented JSON with a trailing newline', () => {
    const manifest = buildManifest({ generator: 'g', source: 's', meshes: [], textures: [], diagnostics: [] });
    expect(serializeManifest(manifest)).toBe(
      '{\n  "generator": "g",\n  "source": "s",\n  "primitives": [],\n  "textures": [],\n  "diagnostics": []\n}\n'
    );
  });
});
