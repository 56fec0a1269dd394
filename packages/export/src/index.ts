/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * @rigkit/export - OBJ meshes, mesh manifest and skeleton document
 */

export { writeObj } from './obj-writer.js';
export type { ObjWriteOptions } from './obj-writer.js';
export { formatNumber, roundNumber, roundVector, DEFAULT_PRECISION } from './format.js';
export {
  meshFileName,
  toManifestRecord,
  toManifestDiagnostics,
  buildManifest,
  serializeManifest,
} from './manifest.js';
export type {
  Manifest,
  ManifestRecord,
  ManifestTexture,
  ManifestDiagnostic,
  ManifestInput,
  MeshEntry,
} from './manifest.js';
export { buildSkeletonDocument, serializeSkeletonDocument } from './skeleton-document.js';
export type {
  SkeletonDocument,
  SkeletonDocumentBone,
  SkeletonDocumentJoint,
  SkeletonDocumentInput,
  HierarchyNode,
  AliasTableEntry,
} from './skeleton-document.js';
