/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Avatar conversion
 *
 * One straight-line run per asset: read container -> parse document ->
 * {partition meshes, extract skeleton} -> build outputs. Nothing is shared
 * between runs. The abort signal is checked between stages; a cancelled run
 * throws PipelineError(Cancelled) and produces nothing.
 */

import { Diagnostics, PipelineError, createLogger, type DiagnosticKind } from '@rigkit/data';
import {
  extractEmbeddedImages,
  parseSceneDocument,
  readContainer,
  type EmbeddedImage,
  type SceneDocument,
} from '@rigkit/container';
import { MaterialResolver, correctSubmeshUvs, partitionPrimitives } from '@rigkit/geometry';
import {
  bindSceneBones,
  buildSkeletonMapping,
  exportJointDescriptors,
  extractBoneGraph,
  loadDefaultTaxonomy,
  loadTaxonomyFile,
  type BoneGraph,
  type CanonicalBoneTaxonomy,
  type JointDescriptor,
  type SkeletonBinding,
  type SkeletonMapping,
} from '@rigkit/skeleton';
import {
  buildManifest,
  buildSkeletonDocument,
  meshFileName,
  writeObj,
  type Manifest,
  type MeshEntry,
  type SkeletonDocument,
} from '@rigkit/export';
import { defaultConfig, type PipelineConfig } from './config.js';

const log = createLogger('Pipeline');

export const GENERATOR = 'rigkit 0.1.0';

const SKELETON_DIAGNOSTICS: ReadonlySet<DiagnosticKind> = new Set<DiagnosticKind>([
  'UnresolvedBoneAlias',
  'DuplicateBoneBinding',
]);

export type ConversionStage = 'container' | 'document' | 'meshes' | 'skeleton' | 'textures' | 'serialize' | 'write';

export interface ConvertOptions {
  config?: PipelineConfig;
  /** Overrides the taxonomy named by the configuration */
  taxonomy?: CanonicalBoneTaxonomy;
  /** Name recorded in the outputs, usually the input file name */
  source?: string;
  signal?: AbortSignal;
}

export interface ConvertedMesh extends MeshEntry {
  /** OBJ text */
  obj: string;
}

export interface SkeletonResult {
  graph: BoneGraph;
  binding: SkeletonBinding;
  mapping: SkeletonMapping;
  joints: readonly JointDescriptor[];
}

export interface ConversionResult {
  source: string;
  document: SceneDocument;
  meshes: ConvertedMesh[];
  textures: EmbeddedImage[];
  skeleton: SkeletonResult;
  manifest: Manifest;
  skeletonDocument: SkeletonDocument;
  diagnostics: Diagnostics;
}

/**
 * @throws PipelineError(Cancelled) when the signal has fired
 */
export function throwIfCancelled(signal: AbortSignal | undefined, stage: ConversionStage): void {
  if (signal?.aborted) {
    throw new PipelineError('Cancelled', `Conversion cancelled before stage "${stage}"`, { stage });
  }
}

function taxonomyFor(options: ConvertOptions, config: PipelineConfig): CanonicalBoneTaxonomy {
  if (options.taxonomy !== undefined) return options.taxonomy;
  if (config.skeleton.taxonomyPath !== null) return loadTaxonomyFile(config.skeleton.taxonomyPath);
  return loadDefaultTaxonomy();
}

function convertMeshes(
  doc: SceneDocument,
  bin: Uint8Array | null,
  config: PipelineConfig,
  source: string,
  diagnostics: Diagnostics
): ConvertedMesh[] {
  const resolver = new MaterialResolver({ textureOverrides: config.textures.overrides });
  const submeshes = partitionPrimitives(doc, bin, diagnostics);

  return submeshes.map((submesh) => {
    const assignment = resolver.resolve(doc, submesh.materialIndex, diagnostics, submesh.primitiveIndex);
    const corrected = correctSubmeshUvs(submesh, assignment.category, config.uv, diagnostics);
    const uvTransform = submesh.uvs === null ? null : corrected.transform;
    const filename = meshFileName(assignment.category, submesh.primitiveIndex);
    const comments = [`source ${source}`, `category ${assignment.category}`];
    if (uvTransform !== null) comments.push(`uv ${uvTransform}`);

    return {
      submesh: corrected.submesh,
      assignment,
      uvTransform,
      filename,
      obj: writeObj(corrected.submesh, { precision: config.output.precision, comments }),
    };
  });
}

function extractSkeleton(
  doc: SceneDocument,
  taxonomy: CanonicalBoneTaxonomy,
  config: PipelineConfig,
  diagnostics: Diagnostics
): SkeletonResult {
  const graph = extractBoneGraph(doc);
  const binding = bindSceneBones(
    graph,
    doc,
    taxonomy,
    { vocabularies: config.skeleton.vocabularies, useHumanoidExtension: config.skeleton.useHumanoidExtension },
    diagnostics
  );
  const mapping = buildSkeletonMapping(taxonomy, graph, binding);
  return { graph, binding, mapping, joints: exportJointDescriptors(mapping) };
}

/**
 * Convert one avatar held in memory
 *
 * Fatal problems throw PipelineError; per-primitive and per-bone problems are
 * recorded in `diagnostics` and serialized into both documents.
 */
export function convertAvatar(bytes: Uint8Array, options: ConvertOptions = {}): ConversionResult {
  const config = options.config ?? defaultConfig();
  const source = options.source ?? 'avatar';
  const { signal } = options;
  const diagnostics = new Diagnostics(createLogger('Diagnostics'));
  const start = Date.now();

  throwIfCancelled(signal, 'container');
  const container = readContainer(bytes);
  log.info(`Read ${container.chunks.length} chunk(s), ${container.totalLength} bytes`, { operation: source });

  throwIfCancelled(signal, 'document');
  const document = parseSceneDocument(container.json);
  const taxonomy = taxonomyFor(options, config);

  throwIfCancelled(signal, 'meshes');
  const meshes = convertMeshes(document, container.bin, config, source, diagnostics);
  log.info(`Extracted ${meshes.length} submesh(es)`, { operation: source });

  throwIfCancelled(signal, 'skeleton');
  const skeleton = extractSkeleton(document, taxonomy, config, diagnostics);
  log.info(`Mapped skeleton: ${skeleton.binding.bindings.size} bound, ${skeleton.joints.length} joints`, {
    operation: source,
  });

  throwIfCancelled(signal, 'textures');
  const textures = config.output.extractTextures ? extractEmbeddedImages(document, container.bin, diagnostics) : [];

  throwIfCancelled(signal, 'serialize');
  const manifest = buildManifest({ generator: GENERATOR, source, meshes, textures, diagnostics: diagnostics.all });
  const skeletonDocument = buildSkeletonDocument({
    generator: GENERATOR,
    source,
    mapping: skeleton.mapping,
    binding: skeleton.binding,
    joints: skeleton.joints,
    diagnostics: diagnostics.all.filter((d) => SKELETON_DIAGNOSTICS.has(d.kind)),
    precision: config.output.precision,
  });

  log.info(`Converted in ${Date.now() - start}ms with ${diagnostics.size} diagnostic(s)`, { operation: source });
  return { source, document, meshes, textures, skeleton, manifest, skeletonDocument, diagnostics };
}
