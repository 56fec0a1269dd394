/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { CHUNK_TYPE_BIN, CHUNK_TYPE_JSON, GLB_MAGIC, GLB_VERSION } from './constants.js';

/**
 * Concatenate byte arrays into one
 */
export function combineBuffers(buffers: readonly Uint8Array[]): Uint8Array {
  const totalLength = buffers.reduce((sum, buf) => sum + buf.byteLength, 0);
  const combined = new Uint8Array(totalLength);
  let offset = 0;
  for (const buffer of buffers) {
    combined.set(buffer, offset);
    offset += buffer.byteLength;
  }
  return combined;
}

/**
 * Pack a JSON document and an optional binary blob into a binary glTF container.
 * The JSON chunk is padded with spaces and the BIN chunk with zeros to 4 bytes.
 */
export function writeContainer(json: unknown, bin: Uint8Array | null = null): Uint8Array {
  const jsonBuffer = new TextEncoder().encode(JSON.stringify(json));
  const jsonPadding = (4 - (jsonBuffer.byteLength % 4)) % 4;
  const paddedJsonLength = jsonBuffer.byteLength + jsonPadding;

  const binPadding = bin ? (4 - (bin.byteLength % 4)) % 4 : 0;
  const paddedBinLength = bin ? bin.byteLength + binPadding : 0;

  const totalLength = 12 + 8 + paddedJsonLength + (bin ? 8 + paddedBinLength : 0);
  const glb = new ArrayBuffer(totalLength);
  const view = new DataView(glb);
  const bytes = new Uint8Array(glb);

  let offset = 0;

  // Header
  view.setUint32(offset, GLB_MAGIC, true);
  offset += 4;
  view.setUint32(offset, GLB_VERSION, true);
  offset += 4;
  view.setUint32(offset, totalLength, true);
  offset += 4;

  // JSON chunk
  view.setUint32(offset, paddedJsonLength, true);
  offset += 4;
  view.setUint32(offset, CHUNK_TYPE_JSON, true);
  offset += 4;
  bytes.set(jsonBuffer, offset);
  offset += jsonBuffer.byteLength;
  for (let i = 0; i < jsonPadding; i++) {
    bytes[offset++] = 0x20;
  }

  // BIN chunk (zero padding comes from the fresh ArrayBuffer)
  if (bin) {
    view.setUint32(offset, paddedBinLength, true);
    offset += 4;
    view.setUint32(offset, CHUNK_TYPE_BIN, true);
    offset += 4;
    bytes.set(bin, offset);
  }

  return bytes;
}
