/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Typed scene document model parsed from the container's JSON chunk.
 *
 * Only the fields the pipeline reads are typed. Every other key of every
 * object (extensions, extras, renderer-specific fields) is kept verbatim in
 * `passthrough` so it can be recovered downstream.
 */

import { mat4 } from 'gl-matrix';
import { PipelineError } from '@rigkit/data';
import type { Quat, Vec3 } from '@rigkit/data';
import {
  MODE_TRIANGLES,
  isAccessorType,
  isComponentType,
  type AccessorType,
  type ComponentType,
} from './constants.js';

export type Passthrough = Record<string, unknown>;

export interface SceneNode {
  index: number;
  name: string | undefined;
  translation: Vec3;
  rotation: Quat;
  scale: Vec3;
  children: number[];
  mesh: number | undefined;
  passthrough: Passthrough;
}

export interface PrimitiveAttributes {
  POSITION?: number;
  NORMAL?: number;
  TEXCOORD_0?: number;
}

export interface Primitive {
  attributes: PrimitiveAttributes;
  /** Attributes other than POSITION/NORMAL/TEXCOORD_0 (joints, weights, extra UV sets) */
  extraAttributes: Record<string, number>;
  indices: number | undefined;
  material: number | undefined;
  mode: number;
  passthrough: Passthrough;
}

export interface Mesh {
  index: number;
  name: string | undefined;
  primitives: Primitive[];
  passthrough: Passthrough;
}

export interface Accessor {
  index: number;
  componentType: ComponentType;
  type: AccessorType;
  count: number;
  byteOffset: number;
  bufferView: number | undefined;
  normalized: boolean;
  sparse: boolean;
  passthrough: Passthrough;
}

export interface BufferView {
  index: number;
  buffer: number;
  byteOffset: number;
  byteLength: number;
  byteStride: number | undefined;
  passthrough: Passthrough;
}

export interface BufferDef {
  index: number;
  byteLength: number;
  uri: string | undefined;
  passthrough: Passthrough;
}

export interface Material {
  index: number;
  name: string | undefined;
  /** Texture index of pbrMetallicRoughness.baseColorTexture */
  baseColorTexture: number | undefined;
  passthrough: Passthrough;
}

export interface Texture {
  index: number;
  source: number | undefined;
  passthrough: Passthrough;
}

export interface Image {
  index: number;
  name: string | undefined;
  mimeType: string | undefined;
  bufferView: number | undefined;
  uri: string | undefined;
  passthrough: Passthrough;
}

export interface Scene {
  name: string | undefined;
  nodes: number[];
  passthrough: Passthrough;
}

export interface SceneDocument {
  asset: { version: string; generator: string | undefined };
  scene: number | undefined;
  scenes: Scene[];
  nodes: SceneNode[];
  meshes: Mesh[];
  accessors: Accessor[];
  bufferViews: BufferView[];
  buffers: BufferDef[];
  materials: Material[];
  textures: Texture[];
  images: Image[];
  /** Top-level keys not modelled above (extensions, skins, animations, ...) */
  passthrough: Passthrough;
}

// ============================================================================
// JSON field readers
// ============================================================================

function unsupported(message: string, details?: Record<string, unknown>): PipelineError {
  return new PipelineError('UnsupportedSchema', message, details);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function expectObject(value: unknown, path: string): Record<string, unknown> {
  if (!isRecord(value)) {
    throw unsupported(`${path} must be an object`);
  }
  return value;
}

function optionalArray(obj: Record<string, unknown>, key: string, path: string): unknown[] {
  const value = obj[key];
  if (value === undefined) return [];
  if (!Array.isArray(value)) {
    throw unsupported(`${path}.${key} must be an array`);
  }
  return value;
}

function optionalString(obj: Record<string, unknown>, key: string, path: string): string | undefined {
  const value = obj[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'string') {
    throw unsupported(`${path}.${key} must be a string`);
  }
  return value;
}

function optionalInteger(obj: Record<string, unknown>, key: string, path: string): number | undefined {
  const value = obj[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
    throw unsupported(`${path}.${key} must be a non-negative integer`);
  }
  return value;
}

function requiredInteger(obj: Record<string, unknown>, key: string, path: string): number {
  const value = optionalInteger(obj, key, path);
  if (value === undefined) {
    throw unsupported(`${path}.${key} is required`);
  }
  return value;
}

function numberTuple(obj: Record<string, unknown>, key: string, length: number, path: string): number[] | undefined {
  const value = obj[key];
  if (value === undefined) return undefined;
  if (!Array.isArray(value) || value.length !== length) {
    throw unsupported(`${path}.${key} must be an array of ${length} numbers`);
  }
  const result: number[] = [];
  for (const item of value) {
    if (typeof item !== 'number' || !Number.isFinite(item)) {
      throw unsupported(`${path}.${key} must be an array of ${length} numbers`);
    }
    result.push(item);
  }
  return result;
}

function indexArray(obj: Record<string, unknown>, key: string, path: string): number[] {
  return optionalArray(obj, key, path).map((item, i) => {
    if (typeof item !== 'number' || !Number.isInteger(item) || item < 0) {
      throw unsupported(`${path}.${key}[${i}] must be a non-negative integer`);
    }
    return item;
  });
}

function collectPassthrough(obj: Record<string, unknown>, known: readonly string[]): Passthrough {
  const passthrough: Passthrough = {};
  for (const [key, value] of Object.entries(obj)) {
    if (!known.includes(key)) {
      passthrough[key] = value;
    }
  }
  return passthrough;
}

function toVec3(values: number[] | undefined, fallback: Vec3): Vec3 {
  return values ? [values[0], values[1], values[2]] : fallback;
}

function toQuat(values: number[] | undefined): Quat {
  return values ? [values[0], values[1], values[2], values[3]] : [0, 0, 0, 1];
}

// ============================================================================
// Object parsers
// ============================================================================

const NODE_KEYS = ['name', 'translation', 'rotation', 'scale', 'matrix', 'children', 'mesh'] as const;

function parseNode(value: unknown, index: number): SceneNode {
  const path = `nodes[${index}]`;
  const obj = expectObject(value, path);

  let translation = toVec3(numberTuple(obj, 'translation', 3, path), [0, 0, 0]);
  let rotation = toQuat(numberTuple(obj, 'rotation', 4, path));
  let scale = toVec3(numberTuple(obj, 'scale', 3, path), [1, 1, 1]);

  const matrix = numberTuple(obj, 'matrix', 16, path);
  if (matrix) {
    const t = mat4.getTranslation([0, 0, 0], matrix);
    const r = mat4.getRotation([0, 0, 0, 1], matrix);
    const s = mat4.getScaling([0, 0, 0], matrix);
    translation = [t[0], t[1], t[2]];
    rotation = [r[0], r[1], r[2], r[3]];
    scale = [s[0], s[1], s[2]];
  }

  return {
    index,
    name: optionalString(obj, 'name', path),
    translation,
    rotation,
    scale,
    children: indexArray(obj, 'children', path),
    mesh: optionalInteger(obj, 'mesh', path),
    passthrough: collectPassthrough(obj, NODE_KEYS),
  };
}

const KNOWN_ATTRIBUTES = ['POSITION', 'NORMAL', 'TEXCOORD_0'] as const;

function parsePrimitive(value: unknown, path: string): Primitive {
  const obj = expectObject(value, path);
  const attributesObj = expectObject(obj.attributes, `${path}.attributes`);

  const attributes: PrimitiveAttributes = {};
  const extraAttributes: Record<string, number> = {};
  for (const semantic of Object.keys(attributesObj)) {
    const accessor = requiredInteger(attributesObj, semantic, `${path}.attributes`);
    switch (semantic) {
      case 'POSITION':
        attributes.POSITION = accessor;
        break;
      case 'NORMAL':
        attributes.NORMAL = accessor;
        break;
      case 'TEXCOORD_0':
        attributes.TEXCOORD_0 = accessor;
        break;
      default:
        extraAttributes[semantic] = accessor;
    }
  }

  return {
    attributes,
    extraAttributes,
    indices: optionalInteger(obj, 'indices', path),
    material: optionalInteger(obj, 'material', path),
    mode: optionalInteger(obj, 'mode', path) ?? MODE_TRIANGLES,
    passthrough: collectPassthrough(obj, ['attributes', 'indices', 'material', 'mode']),
  };
}

function parseMesh(value: unknown, index: number): Mesh {
  const path = `meshes[${index}]`;
  const obj = expectObject(value, path);
  return {
    index,
    name: optionalString(obj, 'name', path),
    primitives: optionalArray(obj, 'primitives', path).map((p, i) => parsePrimitive(p, `${path}.primitives[${i}]`)),
    passthrough: collectPassthrough(obj, ['name', 'primitives']),
  };
}

function parseAccessor(value: unknown, index: number): Accessor {
  const path = `accessors[${index}]`;
  const obj = expectObject(value, path);

  const componentType = requiredInteger(obj, 'componentType', path);
  if (!isComponentType(componentType)) {
    throw unsupported(`${path}.componentType ${componentType} is not supported`, { componentType });
  }
  const type = optionalString(obj, 'type', path);
  if (type === undefined || !isAccessorType(type)) {
    throw unsupported(`${path}.type ${String(type)} is not supported`);
  }
  const normalized = obj.normalized;
  if (normalized !== undefined && typeof normalized !== 'boolean') {
    throw unsupported(`${path}.normalized must be a boolean`);
  }

  return {
    index,
    componentType,
    type,
    count: requiredInteger(obj, 'count', path),
    byteOffset: optionalInteger(obj, 'byteOffset', path) ?? 0,
    bufferView: optionalInteger(obj, 'bufferView', path),
    normalized: normalized === true,
    sparse: obj.sparse !== undefined,
    passthrough: collectPassthrough(obj, ['componentType', 'type', 'count', 'byteOffset', 'bufferView', 'normalized']),
  };
}

function parseBufferView(value: unknown, index: number): BufferView {
  const path = `bufferViews[${index}]`;
  const obj = expectObject(value, path);
  return {
    index,
    buffer: requiredInteger(obj, 'buffer', path),
    byteOffset: optionalInteger(obj, 'byteOffset', path) ?? 0,
    byteLength: requiredInteger(obj, 'byteLength', path),
    byteStride: optionalInteger(obj, 'byteStride', path),
    passthrough: collectPassthrough(obj, ['buffer', 'byteOffset', 'byteLength', 'byteStride']),
  };
}

function parseBuffer(value: unknown, index: number): BufferDef {
  const path = `buffers[${index}]`;
  const obj = expectObject(value, path);
  return {
    index,
    byteLength: requiredInteger(obj, 'byteLength', path),
    uri: optionalString(obj, 'uri', path),
    passthrough: collectPassthrough(obj, ['byteLength', 'uri']),
  };
}

function parseMaterial(value: unknown, index: number): Material {
  const path = `materials[${index}]`;
  const obj = expectObject(value, path);

  let baseColorTexture: number | undefined;
  if (obj.pbrMetallicRoughness !== undefined) {
    const pbr = expectObject(obj.pbrMetallicRoughness, `${path}.pbrMetallicRoughness`);
    if (pbr.baseColorTexture !== undefined) {
      const info = expectObject(pbr.baseColorTexture, `${path}.pbrMetallicRoughness.baseColorTexture`);
      baseColorTexture = requiredInteger(info, 'index', `${path}.pbrMetallicRoughness.baseColorTexture`);
    }
  }

  return {
    index,
    name: optionalString(obj, 'name', path),
    baseColorTexture,
    // pbrMetallicRoughness stays in passthrough as a whole
    passthrough: collectPassthrough(obj, ['name']),
  };
}

function parseTexture(value: unknown, index: number): Texture {
  const path = `textures[${index}]`;
  const obj = expectObject(value, path);
  return {
    index,
    source: optionalInteger(obj, 'source', path),
    passthrough: collectPassthrough(obj, ['source']),
  };
}

function parseImage(value: unknown, index: number): Image {
  const path = `images[${index}]`;
  const obj = expectObject(value, path);
  return {
    index,
    name: optionalString(obj, 'name', path),
    mimeType: optionalString(obj, 'mimeType', path),
    bufferView: optionalInteger(obj, 'bufferView', path),
    uri: optionalString(obj, 'uri', path),
    passthrough: collectPassthrough(obj, ['name', 'mimeType', 'bufferView', 'uri']),
  };
}

function parseScene(value: unknown, index: number): Scene {
  const path = `scenes[${index}]`;
  const obj = expectObject(value, path);
  return {
    name: optionalString(obj, 'name', path),
    nodes: indexArray(obj, 'nodes', path),
    passthrough: collectPassthrough(obj, ['name', 'nodes']),
  };
}

// ============================================================================
// Reference validation
// ============================================================================

function checkRef(index: number | undefined, length: number, path: string, target: string): void {
  if (index !== undefined && index >= length) {
    throw unsupported(`${path} references ${target}[${index}], but only ${length} exist`, {
      path,
      target,
      index,
      length,
    });
  }
}

function validateReferences(doc: SceneDocument): void {
  checkRef(doc.scene, doc.scenes.length, 'scene', 'scenes');

  doc.scenes.forEach((scene, s) => {
    scene.nodes.forEach((n, i) => checkRef(n, doc.nodes.length, `scenes[${s}].nodes[${i}]`, 'nodes'));
  });

  for (const node of doc.nodes) {
    node.children.forEach((c, i) => checkRef(c, doc.nodes.length, `nodes[${node.index}].children[${i}]`, 'nodes'));
    checkRef(node.mesh, doc.meshes.length, `nodes[${node.index}].mesh`, 'meshes');
  }

  for (const mesh of doc.meshes) {
    mesh.primitives.forEach((primitive, p) => {
      const path = `meshes[${mesh.index}].primitives[${p}]`;
      for (const semantic of KNOWN_ATTRIBUTES) {
        checkRef(primitive.attributes[semantic], doc.accessors.length, `${path}.attributes.${semantic}`, 'accessors');
      }
      for (const [semantic, accessor] of Object.entries(primitive.extraAttributes)) {
        checkRef(accessor, doc.accessors.length, `${path}.attributes.${semantic}`, 'accessors');
      }
      checkRef(primitive.indices, doc.accessors.length, `${path}.indices`, 'accessors');
      checkRef(primitive.material, doc.materials.length, `${path}.material`, 'materials');
    });
  }

  for (const accessor of doc.accessors) {
    checkRef(accessor.bufferView, doc.bufferViews.length, `accessors[${accessor.index}].bufferView`, 'bufferViews');
  }
  for (const view of doc.bufferViews) {
    checkRef(view.buffer, doc.buffers.length, `bufferViews[${view.index}].buffer`, 'buffers');
  }
  for (const material of doc.materials) {
    checkRef(material.baseColorTexture, doc.textures.length, `materials[${material.index}].baseColorTexture`, 'textures');
  }
  for (const texture of doc.textures) {
    checkRef(texture.source, doc.images.length, `textures[${texture.index}].source`, 'images');
  }
  for (const image of doc.images) {
    checkRef(image.bufferView, doc.bufferViews.length, `images[${image.index}].bufferView`, 'bufferViews');
  }
}

const DOCUMENT_KEYS = [
  'asset',
  'scene',
  'scenes',
  'nodes',
  'meshes',
  'accessors',
  'bufferViews',
  'buffers',
  'materials',
  'textures',
  'images',
] as const;

/**
 * Parse the JSON chunk text into a typed scene document
 *
 * @throws PipelineError(MalformedContainer) if the text is not JSON
 * @throws PipelineError(UnsupportedSchema) on a wrong field type or a dangling index
 */
export function parseSceneDocument(jsonText: string): SceneDocument {
  let raw: unknown;
  try {
    raw = JSON.parse(jsonText);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new PipelineError('MalformedContainer', `JSON chunk is not valid JSON: ${reason}`);
  }

  const root = expectObject(raw, 'document');
  const asset = expectObject(root.asset, 'asset');
  const version = optionalString(asset, 'version', 'asset');
  if (version === undefined) {
    throw unsupported('asset.version is required');
  }

  const doc: SceneDocument = {
    asset: { version, generator: optionalString(asset, 'generator', 'asset') },
    scene: optionalInteger(root, 'scene', 'document'),
    scenes: optionalArray(root, 'scenes', 'document').map(parseScene),
    nodes: optionalArray(root, 'nodes', 'document').map(parseNode),
    meshes: optionalArray(root, 'meshes', 'document').map(parseMesh),
    accessors: optionalArray(root, 'accessors', 'document').map(parseAccessor),
    bufferViews: optionalArray(root, 'bufferViews', 'document').map(parseBufferView),
    buffers: optionalArray(root, 'buffers', 'document').map(parseBuffer),
    materials: optionalArray(root, 'materials', 'document').map(parseMaterial),
    textures: optionalArray(root, 'textures', 'document').map(parseTexture),
    images: optionalArray(root, 'images', 'document').map(parseImage),
    passthrough: collectPassthrough(root, DOCUMENT_KEYS),
  };

  validateReferences(doc);
  return doc;
}

/**
 * Get a top-level extension object (e.g. 'VRM', 'VRMC_vrm'), if present
 */
export function getExtension(doc: SceneDocument, name: string): Record<string, unknown> | undefined {
  const extensions = doc.passthrough.extensions;
  if (!isRecord(extensions)) return undefined;
  const extension = extensions[name];
  return isRecord(extension) ? extension : undefined;
}

/**
 * Material name for a primitive's material index, or undefined when the
 * primitive has no material or the material is unnamed
 */
export function getMaterialName(doc: SceneDocument, materialIndex: number | undefined): string | undefined {
  if (materialIndex === undefined) return undefined;
  return doc.materials[materialIndex]?.name;
}

export { isRecord };
