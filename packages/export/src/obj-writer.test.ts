/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { describe, it, expect } from 'vitest';
import type { ExtractedSubmesh } from '@rigkit/geometry';
import { writeObj } from './obj-writer.js';

function triangle(overrides: Partial<ExtractedSubmesh> = {}): ExtractedSubmesh {
  return {
    primitiveIndex: 2,
    meshIndex: 0,
    meshPrimitiveIndex: 1,
    meshName: 'Body',
    materialIndex: 0,
    materialName: 'Skin',
    positions: new Float64Array([0, 0, 0, 1, 0, 0, 0, 1, 0]),
    normals: new Float64Array([0, 0, 1, 0, 0, 1, 0, 0, 1]),
    uvs: new Float64Array([0, 0, 1, 0, 0, 1]),
    faces: new Uint32Array([0, 1, 2]),
    vertexCount: 3,
    faceCount: 1,
    sourceVertices: new Uint32Array([4, 5, 6]),
    ...overrides,
  };
}

function faceLines(text: string): string[] {
  return text.split('\n').filter((line) => line.startsWith('f '));
}

describe('writeObj', () => {
  it('should write header, vertices, UVs, normals and faces in order', () => {
    expect(writeObj(triangle())).toBe(
      [
        '# primitive 2 (mesh 0 "Body", primitive 1)',
        '# material Skin',
        '# vertices 3, faces 1',
        'v 0.000000 0.000000 0.000000',
        'v 1.000000 0.000000 0.000000',
        'v 0.000000 1.000000 0.000000',
        'vt 0.000000 0.000000',
        'vt 1.000000 0.000000',
        'vt 0.000000 1.000000',
        'vn 0.000000 0.000000 1.000000',
        'vn 0.000000 0.000000 1.000000',
        'vn 0.000000 0.000000 1.000000',
        'f 1/1/1 2/2/2 3/3/3',
        '',
      ].join('\n')
    );
  });

  it('should pick the face composite from the available attributes', () => {
    expect(faceLines(writeObj(triangle({ normals: null })))).toEqual(['f 1/1 2/2 3/3']);
    expect(faceLines(writeObj(triangle({ uvs: null })))).toEqual(['f 1//1 2//2 3//3']);
    expect(faceLines(writeObj(triangle({ uvs: null, normals: null })))).toEqual(['f 1 2 3']);
  });

  it('should omit vt and vn lines for missing attributes', () => {
    const text = writeObj(triangle({ uvs: null, normals: null }));
    expect(text.split('\n').filter((line) => line.startsWith('vt ') || line.startsWith('vn '))).toEqual([]);
  });

  it('should honour the precision option', () => {
    const text = writeObj(triangle({ positions: new Float64Array([0.12345, -0.0000001, 2, 0, 0, 0, 0, 0, 0]) }), {
      precision: 3,
    });
    expect(text.split('\n')[3]).toBe('v 0.123 0.000 2.000');
  });

  it('should keep comments on one line each', () => {
    const text = writeObj(triangle({ meshName: undefined, materialName: undefined }), {
      comments: ['source avatar.vrm', 'uv flipV\nsecond line'],
    });
    expect(text.split('\n').slice(0, 4)).toEqual([
      '# primitive 2 (mesh 0, primitive 1)',
      '# vertices 3, faces 1',
      '# source avatar.vrm',
      '# uv flipV second line',
    ]);
  });

  it('should be deterministic', () => {
    expect(writeObj(triangle())).toBe(writeObj(triangle()));
  });
});
