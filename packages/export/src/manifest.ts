/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Mesh manifest (`manifest.json`)
 *
 * Lists every written submesh with its classification and texture hints, the
 * extracted textures, and the diagnostics of the run. Keys are snake_case.
 */

import type { Diagnostic } from '@rigkit/data';
import type { EmbeddedImage } from '@rigkit/container';
import type { ComponentCategory, ExtractedSubmesh, MaterialAssignment, UvTransform } from '@rigkit/geometry';

export interface ManifestRecord {
  filename: string;
  primitive_index: number;
  mesh_index: number;
  material_name: string;
  component_category: ComponentCategory;
  face_count: number;
  vertex_count: number;
  suggested_texture: string | null;
  source_texture: string | null;
  /** null when the submesh has no texture coordinates */
  uv_correction_applied: UvTransform | null;
}

export interface ManifestTexture {
  filename: string;
  image_index: number;
  mime_type: string | null;
  byte_length: number;
}

export interface ManifestDiagnostic {
  severity: Diagnostic['severity'];
  kind: Diagnostic['kind'];
  message: string;
  context: Record<string, unknown>;
}

export interface Manifest {
  generator: string;
  source: string;
  primitives: ManifestRecord[];
  textures: ManifestTexture[];
  diagnostics: ManifestDiagnostic[];
}

/** A submesh ready to be listed, with what the pipeline decided for it */
export interface MeshEntry {
  submesh: ExtractedSubmesh;
  assignment: MaterialAssignment;
  uvTransform: UvTransform | null;
  filename: string;
}

export interface ManifestInput {
  generator: string;
  source: string;
  meshes: readonly MeshEntry[];
  textures: readonly EmbeddedImage[];
  diagnostics: readonly Diagnostic[];
}

/**
 * Output file name of a submesh: `<category>_p<primitiveIndex>.obj`
 */
export function meshFileName(category: ComponentCategory, primitiveIndex: number): string {
  return `${category}_p${primitiveIndex}.obj`;
}

export function toManifestRecord(entry: MeshEntry): ManifestRecord {
  const { submesh, assignment } = entry;
  return {
    filename: entry.filename,
    primitive_index: submesh.primitiveIndex,
    mesh_index: submesh.meshIndex,
    material_name: assignment.materialName,
    component_category: assignment.category,
    face_count: submesh.faceCount,
    vertex_count: submesh.vertexCount,
    suggested_texture: assignment.suggestedTexture,
    source_texture: assignment.sourceTexture,
    uv_correction_applied: entry.uvTransform,
  };
}

export function toManifestDiagnostics(diagnostics: readonly Diagnostic[]): ManifestDiagnostic[] {
  return diagnostics.map((d) => ({
    severity: d.severity,
    kind: d.kind,
    message: d.message,
    context: { ...d.context },
  }));
}

export function buildManifest(input: ManifestInput): Manifest {
  return {
    generator: input.generator,
    source: input.source,
    primitives: input.meshes.map(toManifestRecord),
    textures: input.textures.map((image) => ({
      filename: image.fileName,
      image_index: image.imageIndex,
      mime_type: image.mimeType ?? null,
      byte_length: image.bytes.byteLength,
    })),
    diagnostics: toManifestDiagnostics(input.diagnostics),
  };
}

export function serializeManifest(manifest: Manifest): string {
  return `${JSON.stringify(manifest, null, 2)}\n`;
}
