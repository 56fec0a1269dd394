/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * @rigkit/container - Binary glTF (GLB/VRM) reading
 *
 * @example
 * ```typescript
 * import { readContainer, parseSceneDocument, decodeAccessor } from '@rigkit/container';
 *
 * const container = readContainer(bytes);
 * const doc = parseSceneDocument(container.json);
 * const positions = decodeAccessor(doc, container.bin, 0);
 * ```
 */

export { readContainer } from './chunk-reader.js';
export type { Chunk, ChunkContainer } from './chunk-reader.js';

export { parseSceneDocument, getExtension, getMaterialName, isRecord } from './document.js';
export type {
  SceneDocument,
  SceneNode,
  Scene,
  Mesh,
  Primitive,
  PrimitiveAttributes,
  Accessor,
  BufferView,
  BufferDef,
  Material,
  Texture,
  Image,
  Passthrough,
} from './document.js';

export { AccessorReader, decodeAccessor, decodeIndices } from './accessor.js';
export type { AccessorReaderOptions } from './accessor.js';

export { extractEmbeddedImages, imageFileName, textureFileName, extensionForMimeType } from './images.js';
export type { EmbeddedImage } from './images.js';

export { writeContainer, combineBuffers } from './writer.js';
export { SceneBuilder } from './builder.js';
export type { AccessorOptions, ElementArray, NodeSpec, PrimitiveSpec } from './builder.js';

export {
  GLB_MAGIC,
  GLB_VERSION,
  HEADER_SIZE,
  CHUNK_HEADER_SIZE,
  CHUNK_TYPE_JSON,
  CHUNK_TYPE_BIN,
  MODE_TRIANGLES,
  COMPONENT_BYTE,
  COMPONENT_UNSIGNED_BYTE,
  COMPONENT_SHORT,
  COMPONENT_UNSIGNED_SHORT,
  COMPONENT_UNSIGNED_INT,
  COMPONENT_FLOAT,
  getComponentSize,
  getComponentCount,
} from './constants.js';
export type { ComponentType, AccessorType } from './constants.js';
