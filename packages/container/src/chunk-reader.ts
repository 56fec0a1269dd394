/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Binary glTF container reader
 *
 * Validates the 12-byte header and walks every chunk header before any chunk
 * body is interpreted, so a truncated or lying container fails before JSON
 * parsing starts.
 */

import { PipelineError, createLogger } from '@rigkit/data';
import {
  CHUNK_HEADER_SIZE,
  CHUNK_TYPE_BIN,
  CHUNK_TYPE_JSON,
  GLB_MAGIC,
  GLB_VERSION,
  HEADER_SIZE,
} from './constants.js';

const log = createLogger('ContainerReader');

export interface Chunk {
  type: number;
  /** Byte offset of the chunk body within the container */
  offset: number;
  length: number;
  bytes: Uint8Array;
}

export interface ChunkContainer {
  magic: number;
  version: number;
  totalLength: number;
  chunks: Chunk[];
  /** Decoded text of the JSON chunk */
  json: string;
  /** Body of the BIN chunk, borrowed from the input buffer */
  bin: Uint8Array | null;
}

function malformed(message: string, details?: Record<string, unknown>): PipelineError {
  return new PipelineError('MalformedContainer', message, details);
}

function hex(value: number): string {
  return `0x${value.toString(16).padStart(8, '0')}`;
}

/**
 * Read a binary glTF container
 *
 * @param data - The whole file
 * @throws PipelineError(MalformedContainer) on a bad header, a chunk that
 *   reads past the declared length, or a missing/duplicated JSON chunk
 */
export function readContainer(data: Uint8Array): ChunkContainer {
  if (data.byteLength < HEADER_SIZE) {
    throw malformed(`Container is ${data.byteLength} bytes, smaller than the ${HEADER_SIZE}-byte header`);
  }

  const view = new DataView(data.buffer, data.byteOffset, data.byteLength);

  const magic = view.getUint32(0, true);
  if (magic !== GLB_MAGIC) {
    throw malformed(`Invalid magic: expected ${hex(GLB_MAGIC)}, got ${hex(magic)}`);
  }

  const version = view.getUint32(4, true);
  if (version !== GLB_VERSION) {
    throw malformed(`Unsupported container version ${version}`, { version });
  }

  const totalLength = view.getUint32(8, true);
  if (totalLength > data.byteLength) {
    throw malformed(`Declared length ${totalLength} exceeds buffer length ${data.byteLength}`, {
      totalLength,
      byteLength: data.byteLength,
    });
  }
  if (totalLength < HEADER_SIZE) {
    throw malformed(`Declared length ${totalLength} is smaller than the header`);
  }

  // Walk chunk headers; each body must end inside the declared length
  const chunks: Chunk[] = [];
  let offset = HEADER_SIZE;
  while (offset < totalLength) {
    if (offset + CHUNK_HEADER_SIZE > totalLength) {
      throw malformed(`Truncated chunk header at offset ${offset}`);
    }
    const length = view.getUint32(offset, true);
    const type = view.getUint32(offset + 4, true);
    const bodyStart = offset + CHUNK_HEADER_SIZE;
    if (bodyStart + length > totalLength) {
      throw malformed(
        `Chunk ${chunks.length} (${hex(type)}) declares ${length} bytes at offset ${bodyStart}, past the declared length ${totalLength}`,
        { chunk: chunks.length, length, offset: bodyStart }
      );
    }
    chunks.push({ type, offset: bodyStart, length, bytes: data.subarray(bodyStart, bodyStart + length) });
    offset = bodyStart + length;
  }

  const jsonChunks = chunks.filter((c) => c.type === CHUNK_TYPE_JSON);
  if (jsonChunks.length !== 1) {
    throw malformed(`Expected exactly one JSON chunk, found ${jsonChunks.length}`);
  }
  if (chunks[0].type !== CHUNK_TYPE_JSON) {
    throw malformed('JSON chunk must be the first chunk');
  }

  const binChunks = chunks.filter((c) => c.type === CHUNK_TYPE_BIN);
  if (binChunks.length > 1) {
    throw malformed(`Expected at most one BIN chunk, found ${binChunks.length}`);
  }

  const ignored = chunks.length - 1 - binChunks.length;
  if (ignored > 0) {
    log.debug(`Ignoring ${ignored} chunk(s) of unknown type`);
  }

  let json: string;
  try {
    json = new TextDecoder('utf-8', { fatal: true }).decode(jsonChunks[0].bytes);
  } catch (error) {
    log.caught('JSON chunk decode failed', error);
    throw malformed('JSON chunk is not valid UTF-8');
  }

  log.info(`Read container: ${chunks.length} chunk(s), ${totalLength} bytes`, {
    operation: 'readContainer',
  });

  return {
    magic,
    version,
    totalLength,
    chunks,
    json,
    bin: binChunks.length === 1 ? binChunks[0].bytes : null,
  };
}
