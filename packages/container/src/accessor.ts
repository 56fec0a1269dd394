/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Accessor decoding over the container's binary blob.
 *
 * The complete byte range an accessor can touch is checked against its buffer
 * view and the blob when the reader is created. Element reads after that are
 * unchecked.
 */

import { PipelineError, createLogger } from '@rigkit/data';
import {
  COMPONENT_BYTE,
  COMPONENT_FLOAT,
  COMPONENT_SHORT,
  COMPONENT_UNSIGNED_BYTE,
  COMPONENT_UNSIGNED_INT,
  COMPONENT_UNSIGNED_SHORT,
  getComponentCount,
  getComponentSize,
  type ComponentType,
} from './constants.js';
import type { Accessor, SceneDocument } from './document.js';

const log = createLogger('AccessorDecoder');

type ComponentGetter = (view: DataView, byteOffset: number) => number;

function getterFor(componentType: ComponentType, normalized: boolean): ComponentGetter {
  switch (componentType) {
    case COMPONENT_BYTE:
      return normalized
        ? (v, o) => Math.max(v.getInt8(o) / 127, -1)
        : (v, o) => v.getInt8(o);
    case COMPONENT_UNSIGNED_BYTE:
      return normalized ? (v, o) => v.getUint8(o) / 255 : (v, o) => v.getUint8(o);
    case COMPONENT_SHORT:
      return normalized
        ? (v, o) => Math.max(v.getInt16(o, true) / 32767, -1)
        : (v, o) => v.getInt16(o, true);
    case COMPONENT_UNSIGNED_SHORT:
      return normalized ? (v, o) => v.getUint16(o, true) / 65535 : (v, o) => v.getUint16(o, true);
    case COMPONENT_UNSIGNED_INT:
      return normalized ? (v, o) => v.getUint32(o, true) / 4294967295 : (v, o) => v.getUint32(o, true);
    case COMPONENT_FLOAT:
      return (v, o) => v.getFloat32(o, true);
  }
}

function outOfRange(accessor: Accessor, message: string, details: Record<string, unknown>): PipelineError {
  return new PipelineError('AccessorOutOfRange', `Accessor ${accessor.index}: ${message}`, {
    accessor: accessor.index,
    ...details,
  });
}

export interface AccessorReaderOptions {
  /** Honour the accessor's `normalized` flag (default true) */
  normalize?: boolean;
}

/**
 * Random-access reader for one accessor
 */
export class AccessorReader {
  readonly accessor: Accessor;
  readonly count: number;
  /** Components per element (3 for VEC3) */
  readonly components: number;
  readonly componentSize: number;
  /** Bytes per element, without stride padding */
  readonly elementSize: number;
  readonly stride: number;
  /** Offset of element 0 within the blob */
  readonly start: number;

  private readonly view: DataView | null;
  private readonly getComponent: ComponentGetter;

  /**
   * @throws PipelineError(UnsupportedSchema) for sparse accessors, external
   *   buffers or a stride smaller than one element
   * @throws PipelineError(AccessorOutOfRange) if any element would fall outside
   *   the buffer view or the blob
   */
  constructor(doc: SceneDocument, bin: Uint8Array | null, accessorIndex: number, options: AccessorReaderOptions = {}) {
    const accessor = doc.accessors[accessorIndex];
    if (accessor === undefined) {
      throw new PipelineError('UnsupportedSchema', `Accessor ${accessorIndex} does not exist`);
    }
    if (accessor.sparse) {
      throw new PipelineError('UnsupportedSchema', `Accessor ${accessorIndex} is sparse; sparse accessors are not supported`);
    }

    this.accessor = accessor;
    this.count = accessor.count;
    this.components = getComponentCount(accessor.type);
    this.componentSize = getComponentSize(accessor.componentType);
    this.elementSize = this.components * this.componentSize;
    this.getComponent = getterFor(accessor.componentType, accessor.normalized && options.normalize !== false);

    if (accessor.bufferView === undefined) {
      // No storage: every element is zero
      this.stride = this.elementSize;
      this.start = 0;
      this.view = null;
      return;
    }

    const bufferView = doc.bufferViews[accessor.bufferView];
    const buffer = doc.buffers[bufferView.buffer];
    if (bufferView.buffer !== 0 || buffer.uri !== undefined) {
      throw new PipelineError(
        'UnsupportedSchema',
        `Accessor ${accessorIndex} reads buffer ${bufferView.buffer}, which is not the embedded binary chunk`,
        { buffer: bufferView.buffer }
      );
    }

    this.stride = bufferView.byteStride ?? this.elementSize;
    if (this.stride < this.elementSize) {
      throw new PipelineError(
        'UnsupportedSchema',
        `Accessor ${accessorIndex} has byteStride ${this.stride} smaller than its element size ${this.elementSize}`
      );
    }
    this.start = bufferView.byteOffset + accessor.byteOffset;

    const blobLength = bin?.byteLength ?? 0;
    const viewEnd = bufferView.byteOffset + bufferView.byteLength;
    if (viewEnd > blobLength) {
      throw outOfRange(accessor, `buffer view ${bufferView.index} ends at ${viewEnd}, past the blob (${blobLength} bytes)`, {
        viewEnd,
        blobLength,
      });
    }

    const end = this.count === 0 ? this.start : this.start + (this.count - 1) * this.stride + this.elementSize;
    if (end > viewEnd) {
      throw outOfRange(accessor, `elements end at ${end}, past buffer view ${bufferView.index} (ends at ${viewEnd})`, {
        end,
        viewEnd,
      });
    }
    if (end > blobLength) {
      throw outOfRange(accessor, `elements end at ${end}, past the blob (${blobLength} bytes)`, { end, blobLength });
    }

    this.view = bin ? new DataView(bin.buffer, bin.byteOffset, bin.byteLength) : null;
    log.debug(`Accessor ${accessorIndex}: ${this.count} x ${accessor.type} at ${this.start}, stride ${this.stride}`);
  }

  /**
   * Read element `index` into `out` starting at `outOffset`
   */
  read(index: number, out: Float64Array | number[], outOffset = 0): void {
    if (!Number.isInteger(index) || index < 0 || index >= this.count) {
      throw outOfRange(this.accessor, `element ${index} requested, accessor has ${this.count}`, { element: index });
    }
    const view = this.view;
    if (view === null) {
      for (let c = 0; c < this.components; c++) out[outOffset + c] = 0;
      return;
    }
    const base = this.start + index * this.stride;
    for (let c = 0; c < this.components; c++) {
      out[outOffset + c] = this.getComponent(view, base + c * this.componentSize);
    }
  }

  /** Decode every element into one flat array */
  readAll(): Float64Array {
    const out = new Float64Array(this.count * this.components);
    for (let i = 0; i < this.count; i++) {
      this.read(i, out, i * this.components);
    }
    return out;
  }
}

/**
 * Decode a whole attribute accessor into a flat Float64Array
 */
export function decodeAccessor(doc: SceneDocument, bin: Uint8Array | null, accessorIndex: number): Float64Array {
  return new AccessorReader(doc, bin, accessorIndex).readAll();
}

/**
 * Decode an index accessor (unsigned integer SCALAR) into a Uint32Array
 */
export function decodeIndices(doc: SceneDocument, bin: Uint8Array | null, accessorIndex: number): Uint32Array {
  const accessor = doc.accessors[accessorIndex];
  if (accessor === undefined) {
    throw new PipelineError('UnsupportedSchema', `Accessor ${accessorIndex} does not exist`);
  }
  if (
    accessor.type !== 'SCALAR' ||
    (accessor.componentType !== COMPONENT_UNSIGNED_BYTE &&
      accessor.componentType !== COMPONENT_UNSIGNED_SHORT &&
      accessor.componentType !== COMPONENT_UNSIGNED_INT)
  ) {
    throw new PipelineError(
      'UnsupportedSchema',
      `Accessor ${accessorIndex} cannot hold indices (${accessor.type}, component type ${accessor.componentType})`
    );
  }

  // Indices are never normalized, whatever the flag says
  const reader = new AccessorReader(doc, bin, accessorIndex, { normalize: false });
  const indices = new Uint32Array(reader.count);
  const element = [0];
  for (let i = 0; i < reader.count; i++) {
    reader.read(i, element);
    indices[i] = element[0];
  }
  return indices;
}
