/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Wavefront OBJ writer
 *
 * Writes one extracted submesh as text: comment header, `v`, `vt`, `vn`,
 * then `f` lines with 1-based indices. The face composite depends on which
 * attributes the submesh has: `p/t/n`, `p/t`, `p//n` or `p`. Output depends
 * only on the submesh and the options.
 */

import type { ExtractedSubmesh } from '@rigkit/geometry';
import { DEFAULT_PRECISION, formatNumber } from './format.js';

export interface ObjWriteOptions {
  /** Digits after the decimal point (default: 6) */
  precision?: number;
  /** Extra comment lines appended to the header */
  comments?: readonly string[];
}

function commentLine(text: string): string {
  return `# ${text.replace(/[\r\n]+/g, ' ')}`;
}

function headerLines(submesh: ExtractedSubmesh, comments: readonly string[]): string[] {
  const lines = [
    commentLine(
      `primitive ${submesh.primitiveIndex} (mesh ${submesh.meshIndex}${
        submesh.meshName === undefined ? '' : ` "${submesh.meshName}"`
      }, primitive ${submesh.meshPrimitiveIndex})`
    ),
  ];
  if (submesh.materialName !== undefined) {
    lines.push(commentLine(`material ${submesh.materialName}`));
  }
  lines.push(commentLine(`vertices ${submesh.vertexCount}, faces ${submesh.faceCount}`));
  for (const comment of comments) {
    lines.push(commentLine(comment));
  }
  return lines;
}

function faceVertex(index: number, hasUvs: boolean, hasNormals: boolean): string {
  const i = index + 1;
  if (hasUvs && hasNormals) return `${i}/${i}/${i}`;
  if (hasUvs) return `${i}/${i}`;
  if (hasNormals) return `${i}//${i}`;
  return String(i);
}

/**
 * Serialize a submesh to OBJ text, newline-terminated
 */
export function writeObj(submesh: ExtractedSubmesh, options: ObjWriteOptions = {}): string {
  const precision = options.precision ?? DEFAULT_PRECISION;
  const lines = headerLines(submesh, options.comments ?? []);
  const fmt = (value: number): string => formatNumber(value, precision);

  const { positions, uvs, normals, faces } = submesh;
  for (let i = 0; i < submesh.vertexCount; i++) {
    lines.push(`v ${fmt(positions[i * 3])} ${fmt(positions[i * 3 + 1])} ${fmt(positions[i * 3 + 2])}`);
  }
  if (uvs !== null) {
    for (let i = 0; i < submesh.vertexCount; i++) {
      lines.push(`vt ${fmt(uvs[i * 2])} ${fmt(uvs[i * 2 + 1])}`);
    }
  }
  if (normals !== null) {
    for (let i = 0; i < submesh.vertexCount; i++) {
      lines.push(`vn ${fmt(normals[i * 3])} ${fmt(normals[i * 3 + 1])} ${fmt(normals[i * 3 + 2])}`);
    }
  }

  const hasUvs = uvs !== null;
  const hasNormals = normals !== null;
  for (let f = 0; f < submesh.faceCount; f++) {
    const a = faceVertex(faces[f * 3], hasUvs, hasNormals);
    const b = faceVertex(faces[f * 3 + 1], hasUvs, hasNormals);
    const c = faceVertex(faces[f * 3 + 2], hasUvs, hasNormals);
    lines.push(`f ${a} ${b} ${c}`);
  }

  return `${lines.join('\n')}\n`;
}
