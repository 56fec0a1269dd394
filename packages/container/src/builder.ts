/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Incremental builder for binary glTF scenes.
 *
 * Used to assemble avatar containers in memory, e.g. as test input.
 */

import {
  COMPONENT_BYTE,
  COMPONENT_FLOAT,
  COMPONENT_SHORT,
  COMPONENT_UNSIGNED_BYTE,
  COMPONENT_UNSIGNED_INT,
  COMPONENT_UNSIGNED_SHORT,
  type AccessorType,
  type ComponentType,
} from './constants.js';
import { combineBuffers, writeContainer } from './writer.js';

export type ElementArray = Float32Array | Int8Array | Uint8Array | Int16Array | Uint16Array | Uint32Array;

export interface AccessorOptions {
  normalized?: boolean;
  byteStride?: number;
  /** Override the element count derived from the data */
  count?: number;
}

export interface PrimitiveSpec {
  attributes: Record<string, number>;
  indices?: number;
  material?: number;
  mode?: number;
}

export interface NodeSpec {
  name?: string;
  translation?: [number, number, number];
  rotation?: [number, number, number, number];
  scale?: [number, number, number];
  matrix?: number[];
  children?: number[];
  mesh?: number;
  extras?: Record<string, unknown>;
}

type JsonObject = Record<string, unknown>;

function componentTypeOf(data: ElementArray): ComponentType {
  if (data instanceof Float32Array) return COMPONENT_FLOAT;
  if (data instanceof Int8Array) return COMPONENT_BYTE;
  if (data instanceof Uint8Array) return COMPONENT_UNSIGNED_BYTE;
  if (data instanceof Int16Array) return COMPONENT_SHORT;
  if (data instanceof Uint16Array) return COMPONENT_UNSIGNED_SHORT;
  return COMPONENT_UNSIGNED_INT;
}

const COMPONENTS: Record<AccessorType, number> = {
  SCALAR: 1,
  VEC2: 2,
  VEC3: 3,
  VEC4: 4,
  MAT2: 4,
  MAT3: 9,
  MAT4: 16,
};

function bytesOf(data: ArrayBufferView): Uint8Array {
  return new Uint8Array(data.buffer, data.byteOffset, data.byteLength);
}

export class SceneBuilder {
  private readonly chunks: Uint8Array[] = [];
  private binLength = 0;

  private readonly scenes: JsonObject[] = [{ nodes: [] }];
  private readonly nodes: JsonObject[] = [];
  private readonly meshes: JsonObject[] = [];
  private readonly accessors: JsonObject[] = [];
  private readonly bufferViews: JsonObject[] = [];
  private readonly materials: JsonObject[] = [];
  private readonly textures: JsonObject[] = [];
  private readonly images: JsonObject[] = [];
  private readonly rootNodes: number[] = [];
  private readonly extensions: JsonObject = {};

  constructor(private readonly generator = 'rigkit SceneBuilder') {}

  /**
   * Append raw bytes to the blob as a new buffer view, 4-byte aligned
   */
  addBufferView(data: ArrayBufferView, options: { byteStride?: number } = {}): number {
    const padding = (4 - (this.binLength % 4)) % 4;
    if (padding > 0) {
      this.chunks.push(new Uint8Array(padding));
      this.binLength += padding;
    }
    const bytes = bytesOf(data);
    this.chunks.push(bytes);
    this.bufferViews.push({
      buffer: 0,
      byteOffset: this.binLength,
      byteLength: bytes.byteLength,
      byteStride: options.byteStride,
    });
    this.binLength += bytes.byteLength;
    return this.bufferViews.length - 1;
  }

  /**
   * Add an accessor over a fresh buffer view holding `data`
   */
  addAccessor(data: ElementArray, type: AccessorType, options: AccessorOptions = {}): number {
    const bufferView = this.addBufferView(data, { byteStride: options.byteStride });
    const elementCount = options.byteStride
      ? Math.floor(data.byteLength / options.byteStride)
      : data.length / COMPONENTS[type];
    this.accessors.push({
      bufferView,
      byteOffset: 0,
      componentType: componentTypeOf(data),
      type,
      count: options.count ?? elementCount,
      normalized: options.normalized,
    });
    return this.accessors.length - 1;
  }

  /**
   * Add an accessor from a literal definition, e.g. one with a bad range
   */
  addRawAccessor(definition: JsonObject): number {
    this.accessors.push(definition);
    return this.accessors.length - 1;
  }

  addMaterial(name: string | undefined, options: { baseColorTexture?: number } = {}): number {
    const material: JsonObject = { name };
    if (options.baseColorTexture !== undefined) {
      material.pbrMetallicRoughness = { baseColorTexture: { index: options.baseColorTexture } };
    }
    this.materials.push(material);
    return this.materials.length - 1;
  }

  /**
   * Embed an image in the blob and add a texture sampling it
   *
   * @returns The texture index
   */
  addImage(bytes: Uint8Array, mimeType: string, name?: string): number {
    const bufferView = this.addBufferView(bytes);
    this.images.push({ name, mimeType, bufferView });
    this.textures.push({ source: this.images.length - 1 });
    return this.textures.length - 1;
  }

  addMesh(primitives: PrimitiveSpec[], name?: string): number {
    this.meshes.push({ name, primitives: primitives.map((p) => ({ ...p })) });
    return this.meshes.length - 1;
  }

  addNode(spec: NodeSpec, options: { root?: boolean } = {}): number {
    this.nodes.push({ ...spec });
    const index = this.nodes.length - 1;
    if (options.root) {
      this.rootNodes.push(index);
    }
    return index;
  }

  setExtension(name: string, value: unknown): void {
    this.extensions[name] = value;
  }

  toJSON(): JsonObject {
    const json: JsonObject = {
      asset: { version: '2.0', generator: this.generator },
      scene: 0,
      scenes: this.scenes.map((s) => ({ ...s, nodes: [...this.rootNodes] })),
      nodes: this.nodes,
      meshes: this.meshes,
      accessors: this.accessors,
      bufferViews: this.bufferViews,
      buffers: [{ byteLength: this.binLength }],
      materials: this.materials,
      textures: this.textures,
      images: this.images,
    };
    if (Object.keys(this.extensions).length > 0) {
      json.extensions = this.extensions;
    }
    return json;
  }

  /** Pack the scene into a binary container */
  build(): Uint8Array {
    return writeContainer(this.toJSON(), combineBuffers(this.chunks));
  }
}
