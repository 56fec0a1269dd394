/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Primitive Partitioner - splits meshes into per-primitive submeshes
 *
 * Primitives of one mesh usually share a single vertex buffer. Each submesh
 * keeps only the vertices its own faces reference: the referenced indices are
 * collected, sorted, given dense new numbers, and the faces are rewritten
 * against that numbering. A 10-vertex shared buffer with a primitive that uses
 * vertices {7, 8, 9} yields a 3-vertex submesh with face (0, 1, 2).
 */

import { PipelineError, createLogger, isPipelineError } from '@rigkit/data';
import type { Diagnostics, RecoverableErrorKind } from '@rigkit/data';
import { AccessorReader, MODE_TRIANGLES, decodeIndices } from '@rigkit/container';
import type { SceneDocument } from '@rigkit/container';
import type { ExtractedSubmesh } from './types.js';

const log = createLogger('Partitioner');

export interface PrimitiveLocation {
  meshIndex: number;
  meshPrimitiveIndex: number;
  /** Global primitive number in document order */
  primitiveIndex: number;
}

function malformed(location: PrimitiveLocation, message: string): PipelineError {
  return new PipelineError('MalformedPrimitive', `Primitive ${location.primitiveIndex}: ${message}`, {
    primitiveIndex: location.primitiveIndex,
    meshIndex: location.meshIndex,
  });
}

function recoverableKind(error: unknown): RecoverableErrorKind | null {
  if (isPipelineError(error) && (error.kind === 'MalformedPrimitive' || error.kind === 'MissingRequiredAttribute')) {
    return error.kind;
  }
  return null;
}

function attributeReader(
  doc: SceneDocument,
  bin: Uint8Array | null,
  accessorIndex: number,
  semantic: string,
  expectedType: 'VEC2' | 'VEC3',
  location: PrimitiveLocation
): AccessorReader {
  const accessor = doc.accessors[accessorIndex];
  if (accessor.type !== expectedType) {
    throw malformed(location, `${semantic} accessor is ${accessor.type}, expected ${expectedType}`);
  }
  return new AccessorReader(doc, bin, accessorIndex);
}

/**
 * Extract one primitive as a compact submesh
 *
 * @throws PipelineError(MissingRequiredAttribute) if the primitive has no POSITION
 * @throws PipelineError(MalformedPrimitive) on a non-triangle mode, a bad index
 *   count, an index past the POSITION count, or short NORMAL/TEXCOORD_0 data
 * @throws PipelineError(AccessorOutOfRange | UnsupportedSchema) from the decoder
 */
export function partitionPrimitive(
  doc: SceneDocument,
  bin: Uint8Array | null,
  location: PrimitiveLocation
): ExtractedSubmesh {
  const mesh = doc.meshes[location.meshIndex];
  const primitive = mesh.primitives[location.meshPrimitiveIndex];

  if (primitive.mode !== MODE_TRIANGLES) {
    throw malformed(location, `mode ${primitive.mode} is not a triangle list`);
  }

  const positionAccessor = primitive.attributes.POSITION;
  if (positionAccessor === undefined) {
    throw new PipelineError(
      'MissingRequiredAttribute',
      `Primitive ${location.primitiveIndex}: no POSITION attribute`,
      { primitiveIndex: location.primitiveIndex, meshIndex: location.meshIndex }
    );
  }

  const positionReader = attributeReader(doc, bin, positionAccessor, 'POSITION', 'VEC3', location);
  const vertexTotal = positionReader.count;

  const normalReader =
    primitive.attributes.NORMAL === undefined
      ? null
      : attributeReader(doc, bin, primitive.attributes.NORMAL, 'NORMAL', 'VEC3', location);
  if (normalReader && normalReader.count < vertexTotal) {
    throw malformed(location, `NORMAL has ${normalReader.count} elements, POSITION has ${vertexTotal}`);
  }

  const uvReader =
    primitive.attributes.TEXCOORD_0 === undefined
      ? null
      : attributeReader(doc, bin, primitive.attributes.TEXCOORD_0, 'TEXCOORD_0', 'VEC2', location);
  if (uvReader && uvReader.count < vertexTotal) {
    throw malformed(location, `TEXCOORD_0 has ${uvReader.count} elements, POSITION has ${vertexTotal}`);
  }

  // Non-indexed primitives draw their vertices in order
  let indices: Uint32Array;
  if (primitive.indices === undefined) {
    indices = new Uint32Array(vertexTotal);
    for (let i = 0; i < vertexTotal; i++) indices[i] = i;
  } else {
    indices = decodeIndices(doc, bin, primitive.indices);
  }

  if (indices.length % 3 !== 0) {
    throw malformed(location, `index count ${indices.length} is not a multiple of 3`);
  }

  // Mark referenced vertices; -1 means unused
  const remap = new Int32Array(vertexTotal).fill(-1);
  for (let i = 0; i < indices.length; i++) {
    const index = indices[i];
    if (index >= vertexTotal) {
      throw malformed(location, `index ${index} at position ${i} is past the ${vertexTotal} POSITION elements`);
    }
    remap[index] = 0;
  }

  // Ascending walk assigns dense numbers in sorted order
  let vertexCount = 0;
  for (let v = 0; v < vertexTotal; v++) {
    if (remap[v] === 0) {
      remap[v] = vertexCount++;
    }
  }

  const sourceVertices = new Uint32Array(vertexCount);
  const positions = new Float64Array(vertexCount * 3);
  const normals = normalReader ? new Float64Array(vertexCount * 3) : null;
  const uvs = uvReader ? new Float64Array(vertexCount * 2) : null;

  for (let v = 0; v < vertexTotal; v++) {
    const target = remap[v];
    if (target < 0) continue;
    sourceVertices[target] = v;
    positionReader.read(v, positions, target * 3);
    if (normalReader && normals) normalReader.read(v, normals, target * 3);
    if (uvReader && uvs) uvReader.read(v, uvs, target * 2);
  }

  const faces = new Uint32Array(indices.length);
  for (let i = 0; i < indices.length; i++) {
    faces[i] = remap[indices[i]];
  }

  const materialName = primitive.material === undefined ? undefined : doc.materials[primitive.material].name;

  log.debug(`Kept ${vertexCount} of ${vertexTotal} vertices, ${faces.length / 3} faces`, undefined, {
    operation: 'partitionPrimitive',
    primitiveIndex: location.primitiveIndex,
  });

  return {
    primitiveIndex: location.primitiveIndex,
    meshIndex: location.meshIndex,
    meshPrimitiveIndex: location.meshPrimitiveIndex,
    meshName: mesh.name,
    materialIndex: primitive.material,
    materialName,
    positions,
    normals,
    uvs,
    faces,
    vertexCount,
    faceCount: faces.length / 3,
    sourceVertices,
  };
}

/**
 * Extract every primitive of every mesh, in document order
 *
 * Primitives that fail with a recoverable error are recorded in `diagnostics`
 * and skipped. Any other error aborts the whole extraction.
 */
export function partitionPrimitives(
  doc: SceneDocument,
  bin: Uint8Array | null,
  diagnostics: Diagnostics
): ExtractedSubmesh[] {
  const submeshes: ExtractedSubmesh[] = [];
  let primitiveIndex = 0;

  for (const mesh of doc.meshes) {
    for (let meshPrimitiveIndex = 0; meshPrimitiveIndex < mesh.primitives.length; meshPrimitiveIndex++) {
      const location: PrimitiveLocation = { meshIndex: mesh.index, meshPrimitiveIndex, primitiveIndex };
      primitiveIndex++;
      try {
        submeshes.push(partitionPrimitive(doc, bin, location));
      } catch (error) {
        const kind = recoverableKind(error);
        if (kind === null || !(error instanceof Error)) {
          throw error;
        }
        diagnostics.record(kind, error.message, {
          primitiveIndex: location.primitiveIndex,
          meshIndex: location.meshIndex,
        });
      }
    }
  }

  log.info(`Extracted ${submeshes.length} of ${primitiveIndex} primitive(s)`, { operation: 'partitionPrimitives' });
  return submeshes;
}
