/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

// glTF 2.0 binary container constants
export const GLB_MAGIC = 0x46546c67; // 'glTF'
export const GLB_VERSION = 2;
export const HEADER_SIZE = 12;
export const CHUNK_HEADER_SIZE = 8;
export const CHUNK_TYPE_JSON = 0x4e4f534a; // 'JSON'
export const CHUNK_TYPE_BIN = 0x004e4942; // 'BIN\0'

// Component types
export const COMPONENT_BYTE = 5120;
export const COMPONENT_UNSIGNED_BYTE = 5121;
export const COMPONENT_SHORT = 5122;
export const COMPONENT_UNSIGNED_SHORT = 5123;
export const COMPONENT_UNSIGNED_INT = 5125;
export const COMPONENT_FLOAT = 5126;

export type ComponentType =
  | typeof COMPONENT_BYTE
  | typeof COMPONENT_UNSIGNED_BYTE
  | typeof COMPONENT_SHORT
  | typeof COMPONENT_UNSIGNED_SHORT
  | typeof COMPONENT_UNSIGNED_INT
  | typeof COMPONENT_FLOAT;

export const COMPONENT_TYPES: readonly ComponentType[] = [
  COMPONENT_BYTE,
  COMPONENT_UNSIGNED_BYTE,
  COMPONENT_SHORT,
  COMPONENT_UNSIGNED_SHORT,
  COMPONENT_UNSIGNED_INT,
  COMPONENT_FLOAT,
];

export type AccessorType = 'SCALAR' | 'VEC2' | 'VEC3' | 'VEC4' | 'MAT2' | 'MAT3' | 'MAT4';

export const ACCESSOR_TYPES: readonly AccessorType[] = ['SCALAR', 'VEC2', 'VEC3', 'VEC4', 'MAT2', 'MAT3', 'MAT4'];

// Primitive modes
export const MODE_TRIANGLES = 4;

/**
 * Get the byte size for a glTF component type
 */
export function getComponentSize(componentType: ComponentType): number {
  switch (componentType) {
    case COMPONENT_BYTE:
    case COMPONENT_UNSIGNED_BYTE:
      return 1;
    case COMPONENT_SHORT:
    case COMPONENT_UNSIGNED_SHORT:
      return 2;
    case COMPONENT_UNSIGNED_INT:
    case COMPONENT_FLOAT:
      return 4;
  }
}

/**
 * Get the number of components for an accessor type
 */
export function getComponentCount(type: AccessorType): number {
  switch (type) {
    case 'SCALAR':
      return 1;
    case 'VEC2':
      return 2;
    case 'VEC3':
      return 3;
    case 'VEC4':
      return 4;
    case 'MAT2':
      return 4;
    case 'MAT3':
      return 9;
    case 'MAT4':
      return 16;
  }
}

export function isComponentType(value: number): value is ComponentType {
  return COMPONENT_TYPES.some((t) => t === value);
}

export function isAccessorType(value: string): value is AccessorType {
  return ACCESSOR_TYPES.some((t) => t === value);
}
