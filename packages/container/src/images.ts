/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Embedded image extraction. Image bytes are copied out as stored; pixels
 * are never decoded.
 */

import { PipelineError, createLogger, type Diagnostics } from '@rigkit/data';
import type { SceneDocument } from './document.js';

const log = createLogger('ImageExtractor');

export interface EmbeddedImage {
  imageIndex: number;
  /** Stable output name, `texture_NN.<ext>` */
  fileName: string;
  mimeType: string | undefined;
  bytes: Uint8Array;
}

const DATA_URI = /^data:([^;,]+)?(;base64)?,(.*)$/s;

export function extensionForMimeType(mimeType: string | undefined): string {
  switch (mimeType) {
    case 'image/png':
      return 'png';
    case 'image/jpeg':
      return 'jpg';
    default:
      return 'bin';
  }
}

/**
 * Output file name of an image: `texture_00.png`, `texture_13.jpg`, ...
 */
export function imageFileName(imageIndex: number, mimeType: string | undefined): string {
  return `texture_${String(imageIndex).padStart(2, '0')}.${extensionForMimeType(mimeType)}`;
}

function mimeTypeOf(doc: SceneDocument, imageIndex: number): string | undefined {
  const image = doc.images[imageIndex];
  if (image.mimeType !== undefined) return image.mimeType;
  const match = image.uri === undefined ? null : DATA_URI.exec(image.uri);
  return match?.[1];
}

/**
 * File name of the image behind a texture, or null when the texture has no source
 */
export function textureFileName(doc: SceneDocument, textureIndex: number | undefined): string | null {
  if (textureIndex === undefined) return null;
  const source = doc.textures[textureIndex]?.source;
  if (source === undefined) return null;
  return imageFileName(source, mimeTypeOf(doc, source));
}

function decodePercentEncoded(imageIndex: number, payload: string): Uint8Array {
  try {
    return new TextEncoder().encode(decodeURIComponent(payload));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new PipelineError(
      'UnsupportedSchema',
      `Image ${imageIndex}: data URI is not valid percent-encoding (${reason})`,
      { image: imageIndex }
    );
  }
}

/**
 * Copy every image stored in the blob or in a data URI
 *
 * Images that reference an external file are skipped and recorded as
 * ExternalImage warnings.
 *
 * @throws PipelineError(AccessorOutOfRange) if an image buffer view lies outside the blob
 * @throws PipelineError(UnsupportedSchema) if a data URI cannot be decoded
 */
export function extractEmbeddedImages(
  doc: SceneDocument,
  bin: Uint8Array | null,
  diagnostics?: Diagnostics
): EmbeddedImage[] {
  const images: EmbeddedImage[] = [];

  for (const image of doc.images) {
    const mimeType = mimeTypeOf(doc, image.index);
    const fileName = imageFileName(image.index, mimeType);

    if (image.bufferView !== undefined) {
      const view = doc.bufferViews[image.bufferView];
      const end = view.byteOffset + view.byteLength;
      const blobLength = bin?.byteLength ?? 0;
      if (bin === null || end > blobLength) {
        throw new PipelineError(
          'AccessorOutOfRange',
          `Image ${image.index}: buffer view ${view.index} ends at ${end}, past the blob (${blobLength} bytes)`,
          { image: image.index, end, blobLength }
        );
      }
      images.push({ imageIndex: image.index, fileName, mimeType, bytes: bin.slice(view.byteOffset, end) });
      continue;
    }

    const match = image.uri === undefined ? null : DATA_URI.exec(image.uri);
    if (match) {
      const payload = match[3];
      const bytes = match[2]
        ? new Uint8Array(Buffer.from(payload, 'base64'))
        : decodePercentEncoded(image.index, payload);
      images.push({ imageIndex: image.index, fileName, mimeType, bytes });
      continue;
    }

    const message = `Image ${image.index} references external file "${image.uri ?? ''}"; not extracted`;
    if (diagnostics) {
      diagnostics.record('ExternalImage', message, { imageIndex: image.index, uri: image.uri });
    } else {
      log.warn(message, { operation: 'extractEmbeddedImages' });
    }
  }

  log.info(`Extracted ${images.length} of ${doc.images.length} image(s)`, { operation: 'extractEmbeddedImages' });
  return images;
}
