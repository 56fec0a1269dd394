/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { describe, it, expect } from 'vitest';
import { Diagnostics, isPipelineError } from '@rigkit/data';
import { SceneBuilder, parseSceneDocument, readContainer } from '@rigkit/container';
import type { PrimitiveSpec, SceneDocument } from '@rigkit/container';
import { partitionPrimitive, partitionPrimitives } from './partitioner.js';

function load(builder: SceneBuilder): { doc: SceneDocument; bin: Uint8Array | null } {
  const container = readContainer(builder.build());
  return { doc: parseSceneDocument(container.json), bin: container.bin };
}

function errorOf(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
}

// Ten vertices on the x axis, x = i; uv = (i / 8, 0.5)
function sharedVertexScene(primitiveIndices: number[][], extra: Partial<PrimitiveSpec> = {}): SceneBuilder {
  const builder = new SceneBuilder();
  const positions = new Float32Array(30);
  const normals = new Float32Array(30);
  const uvs = new Float32Array(20);
  for (let i = 0; i < 10; i++) {
    positions[i * 3] = i;
    normals[i * 3 + 2] = 1;
    uvs[i * 2] = i / 8;
    uvs[i * 2 + 1] = 0.5;
  }
  const POSITION = builder.addAccessor(positions, 'VEC3');
  const NORMAL = builder.addAccessor(normals, 'VEC3');
  const TEXCOORD_0 = builder.addAccessor(uvs, 'VEC2');
  const material = builder.addMaterial('N00_000_00_Body_00_SKIN');

  builder.addMesh(
    primitiveIndices.map((indices) => ({
      attributes: { POSITION, NORMAL, TEXCOORD_0 },
      indices: builder.addAccessor(new Uint16Array(indices), 'SCALAR'),
      material,
      ...extra,
    })),
    'Body'
  );
  return builder;
}

describe('partitionPrimitives', () => {
  it('should give each primitive only the vertices it references', () => {
    const { doc, bin } = load(sharedVertexScene([[0, 1, 2], [7, 8, 9]]));
    const diagnostics = new Diagnostics();

    const submeshes = partitionPrimitives(doc, bin, diagnostics);

    expect(diagnostics.size).toBe(0);
    expect(submeshes).toHaveLength(2);
    for (const submesh of submeshes) {
      expect(submesh.vertexCount).toBe(3);
      expect(submesh.positions).toHaveLength(9);
      expect(Array.from(submesh.faces)).toEqual([0, 1, 2]);
    }
    expect(Array.from(submeshes[1].positions)).toEqual([7, 0, 0, 8, 0, 0, 9, 0, 0]);
    expect(Array.from(submeshes[1].sourceVertices)).toEqual([7, 8, 9]);
    expect(Array.from(submeshes[1].uvs ?? [])).toEqual([0.875, 0.5, 1, 0.5, 1.125, 0.5]);
    expect(Array.from(submeshes[1].normals ?? [])).toEqual([0, 0, 1, 0, 0, 1, 0, 0, 1]);
  });

  it('should number primitives globally and carry mesh and material info', () => {
    const { doc, bin } = load(sharedVertexScene([[0, 1, 2], [3, 4, 5]]));
    const submeshes = partitionPrimitives(doc, bin, new Diagnostics());

    expect(submeshes.map((s) => s.primitiveIndex)).toEqual([0, 1]);
    expect(submeshes[1]).toMatchObject({
      meshIndex: 0,
      meshPrimitiveIndex: 1,
      meshName: 'Body',
      materialIndex: 0,
      materialName: 'N00_000_00_Body_00_SKIN',
      faceCount: 1,
    });
  });

  it('should skip a primitive without POSITION and record it', () => {
    const builder = sharedVertexScene([[0, 1, 2]]);
    builder.addMesh([{ attributes: {} }], 'Empty');
    const { doc, bin } = load(builder);
    const diagnostics = new Diagnostics();

    const submeshes = partitionPrimitives(doc, bin, diagnostics);

    expect(submeshes).toHaveLength(1);
    expect(diagnostics.all).toEqual([
      {
        severity: 'error',
        kind: 'MissingRequiredAttribute',
        message: 'Primitive 1: no POSITION attribute',
        context: { primitiveIndex: 1, meshIndex: 1 },
      },
    ]);
  });

  it('should let fatal decoder errors through', () => {
    const builder = sharedVertexScene([[0, 1, 2]]);
    const view = builder.addBufferView(new Uint16Array([0, 1, 2]));
    const badIndices = builder.addRawAccessor({ bufferView: view, componentType: 5123, type: 'SCALAR', count: 30 });
    builder.addMesh([{ attributes: { POSITION: 0 }, indices: badIndices }]);
    const { doc, bin } = load(builder);

    const error = errorOf(() => partitionPrimitives(doc, bin, new Diagnostics()));
    expect(isPipelineError(error, 'AccessorOutOfRange')).toBe(true);
  });
});

describe('partitionPrimitive', () => {
  const location = { meshIndex: 0, meshPrimitiveIndex: 0, primitiveIndex: 0 };

  it('should renumber vertices in ascending source order', () => {
    const { doc, bin } = load(sharedVertexScene([[9, 7, 8, 8, 7, 4]]));
    const submesh = partitionPrimitive(doc, bin, location);

    expect(Array.from(submesh.sourceVertices)).toEqual([4, 7, 8, 9]);
    expect(Array.from(submesh.faces)).toEqual([3, 1, 2, 2, 1, 0]);
    expect(submesh.faceCount).toBe(2);
  });

  it('should treat a primitive without indices as a sequential triangle list', () => {
    const builder = new SceneBuilder();
    const POSITION = builder.addAccessor(new Float32Array([0, 0, 0, 1, 0, 0, 0, 1, 0]), 'VEC3');
    builder.addMesh([{ attributes: { POSITION } }]);
    const { doc, bin } = load(builder);

    const submesh = partitionPrimitive(doc, bin, location);
    expect(Array.from(submesh.faces)).toEqual([0, 1, 2]);
    expect(submesh.normals).toBeNull();
    expect(submesh.uvs).toBeNull();
  });

  it('should reject indices past the POSITION count', () => {
    const { doc, bin } = load(sharedVertexScene([[0, 1, 12]]));
    const error = errorOf(() => partitionPrimitive(doc, bin, location));
    expect(isPipelineError(error, 'MalformedPrimitive')).toBe(true);
    expect(error instanceof Error ? error.message : '').toBe(
      'Primitive 0: index 12 at position 2 is past the 10 POSITION elements'
    );
  });

  it('should reject an index count that is not a multiple of 3', () => {
    const { doc, bin } = load(sharedVertexScene([[0, 1, 2, 3]]));
    expect(isPipelineError(errorOf(() => partitionPrimitive(doc, bin, location)), 'MalformedPrimitive')).toBe(true);
  });

  it('should reject non-triangle modes', () => {
    const { doc, bin } = load(sharedVertexScene([[0, 1, 2]], { mode: 1 }));
    const error = errorOf(() => partitionPrimitive(doc, bin, location));
    expect(error instanceof Error ? error.message : '').toBe('Primitive 0: mode 1 is not a triangle list');
  });

  it('should reject normals shorter than positions', () => {
    const builder = new SceneBuilder();
    const POSITION = builder.addAccessor(new Float32Array(12), 'VEC3');
    const NORMAL = builder.addAccessor(new Float32Array(6), 'VEC3');
    builder.addMesh([{ attributes: { POSITION, NORMAL }, indices: builder.addAccessor(new Uint8Array([0, 1, 2]), 'SCALAR') }]);
    const { doc, bin } = load(builder);

    const error = errorOf(() => partitionPrimitive(doc, bin, location));
    expect(error instanceof Error ? error.message : '').toBe('Primitive 0: NORMAL has 2 elements, POSITION has 4');
  });
});
