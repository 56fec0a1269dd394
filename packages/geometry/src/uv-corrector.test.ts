/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { describe, it, expect } from 'vitest';
import { Diagnostics } from '@rigkit/data';
import {
  DEFAULT_UV_CORRECTION,
  applyUvTransform,
  checkUvRange,
  correctSubmeshUvs,
  resolveUvTransform,
} from './uv-corrector.js';
import type { ExtractedSubmesh } from './types.js';

function submeshWithUvs(uvs: number[] | null): ExtractedSubmesh {
  const vertexCount = uvs ? uvs.length / 2 : 3;
  return {
    primitiveIndex: 4,
    meshIndex: 0,
    meshPrimitiveIndex: 4,
    meshName: 'Body',
    materialIndex: 2,
    materialName: 'Hair_01',
    positions: new Float64Array(vertexCount * 3),
    normals: null,
    uvs: uvs ? new Float64Array(uvs) : null,
    faces: new Uint32Array([0, 0, 0]),
    vertexCount,
    faceCount: 1,
    sourceVertices: new Uint32Array(vertexCount),
  };
}

describe('applyUvTransform', () => {
  const uvs = new Float64Array([0.25, 0.25, 0, 1]);

  it('should flip the requested axes', () => {
    expect(Array.from(applyUvTransform(uvs, 'identity'))).toEqual([0.25, 0.25, 0, 1]);
    expect(Array.from(applyUvTransform(uvs, 'flipV'))).toEqual([0.25, 0.75, 0, 0]);
    expect(Array.from(applyUvTransform(uvs, 'flipU'))).toEqual([0.75, 0.25, 1, 1]);
    expect(Array.from(applyUvTransform(uvs, 'flipBoth'))).toEqual([0.75, 0.75, 1, 0]);
  });

  it('should leave the input untouched', () => {
    applyUvTransform(uvs, 'flipBoth');
    expect(Array.from(uvs)).toEqual([0.25, 0.25, 0, 1]);
  });
});

describe('resolveUvTransform', () => {
  it('should prefer the per-category entry over the default', () => {
    const config = { ...DEFAULT_UV_CORRECTION, byComponent: { top: 'flipBoth' as const } };
    expect(resolveUvTransform('top', config)).toBe('flipBoth');
    expect(resolveUvTransform('hair', config)).toBe('flipV');
  });
});

describe('checkUvRange', () => {
  it('should report extent and count pairs outside the tolerance', () => {
    const report = checkUvRange(new Float64Array([-0.5, 0.5, 1.005, 0.2, 0.3, -0.005]), 0.01);
    expect(report).toEqual({ min: [-0.5, -0.005], max: [1.005, 0.5], outOfRange: 1 });
  });

  it('should handle empty input', () => {
    expect(checkUvRange(new Float64Array(0), 0.01)).toEqual({ min: null, max: null, outOfRange: 0 });
  });
});

describe('correctSubmeshUvs', () => {
  it('should record one warning per submesh with out-of-range UVs', () => {
    const diagnostics = new Diagnostics();
    const result = correctSubmeshUvs(submeshWithUvs([1.5, 0.5, 2, 0.5]), 'hair', DEFAULT_UV_CORRECTION, diagnostics);

    expect(result.transform).toBe('flipV');
    expect(result.report.outOfRange).toBe(2);
    expect(diagnostics.size).toBe(1);
    expect(diagnostics.all[0].kind).toBe('SuspiciousUVRange');
    expect(diagnostics.all[0].message).toBe('2 of 2 UVs outside [0, 1] after flipV (u 1.5..2, v 0.5..0.5)');
    expect(diagnostics.all[0].context.primitiveIndex).toBe(4);
  });

  it('should return corrected UVs without touching the input submesh', () => {
    const input = submeshWithUvs([0.25, 0.125]);
    const result = correctSubmeshUvs(input, 'skin', DEFAULT_UV_CORRECTION, new Diagnostics());

    expect(Array.from(result.submesh.uvs ?? [])).toEqual([0.25, 0.875]);
    expect(Array.from(input.uvs ?? [])).toEqual([0.25, 0.125]);
  });

  it('should pass submeshes without UVs through', () => {
    const diagnostics = new Diagnostics();
    const input = submeshWithUvs(null);
    const result = correctSubmeshUvs(input, 'skin', DEFAULT_UV_CORRECTION, diagnostics);

    expect(result.submesh).toBe(input);
    expect(diagnostics.size).toBe(0);
  });
});
