/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Skeleton types for rigkit
 */

import type { Transform, Vec3 } from '@rigkit/data';

/** Bone naming conventions the taxonomy knows aliases for */
export type Vocabulary = 'humanoid' | 'mocap' | 'rigTool' | 'vroid';

export const VOCABULARIES: readonly Vocabulary[] = ['humanoid', 'mocap', 'rigTool', 'vroid'];

export function isVocabulary(value: string): value is Vocabulary {
  return VOCABULARIES.some((v) => v === value);
}

export type Axis = 'x' | 'y' | 'z';

export const AXES: readonly Axis[] = ['x', 'y', 'z'];

export type Channel = 'Xposition' | 'Yposition' | 'Zposition' | 'Xrotation' | 'Yrotation' | 'Zrotation';

export const CHANNELS: readonly Channel[] = ['Xposition', 'Yposition', 'Zposition', 'Xrotation', 'Yrotation', 'Zrotation'];

export type JointType = 'fixed' | 'revolute';

/** Rotation range in degrees */
export interface AxisLimit {
  min: number;
  max: number;
}

export type AxisLimits = Partial<Record<Axis, AxisLimit>>;

export interface CanonicalBone {
  name: string;
  aliases: Record<Vocabulary, readonly string[]>;
  parent: string | null;
  children: readonly string[];
  restTransform: Transform;
  jointType: JointType;
  limits: AxisLimits;
  channels: readonly Channel[];
  /** Always channels.length */
  dof: number;
}

// ============================================================================
// Scene bone graph
// ============================================================================

export interface SceneBone {
  nodeIndex: number;
  /** Node name, or `node_<index>` for unnamed nodes */
  name: string;
  /** Nearest bone-like ancestor */
  parentNode: number | null;
  childNodes: number[];
  local: Transform;
  /** Column-major 4x4 world matrix */
  world: number[];
  worldPosition: Vec3;
}

export interface BoneGraph {
  /** Bone-like nodes in depth-first order from the scene roots */
  bones: SceneBone[];
  byNode: Map<number, SceneBone>;
  /** Scene root node indices */
  roots: number[];
  /** World matrix of every node, bone-like or not, by node index */
  worldMatrices: number[][];
}

// ============================================================================
// Binding and mapping
// ============================================================================

/** Where a canonical bone's scene node was found */
export type BindingSource = 'humanoidExtension' | Vocabulary;

export interface BoneBinding {
  bone: string;
  nodeIndex: number;
  rawName: string;
  source: BindingSource;
}

export interface UnresolvedBone {
  nodeIndex: number;
  rawName: string;
}

export interface SkeletonBinding {
  /** Canonical bone name -> scene node */
  bindings: Map<string, BoneBinding>;
  unresolved: UnresolvedBone[];
}

export interface MappedBone {
  name: string;
  parent: string | null;
  children: readonly string[];
  jointType: JointType;
  limits: AxisLimits;
  channels: readonly Channel[];
  dof: number;
  /** Transform relative to the parent bone */
  localTransform: Transform;
  /**
   * Nearest bound ancestor the bone was measured from; null for the root, for
   * bones without a bound ancestor, and for rest-pose bones
   */
  measuredFrom: string | null;
  /** 'scene' when measured on the asset, 'rest' when taken from the taxonomy */
  source: 'scene' | 'rest';
  binding: BoneBinding | null;
}

/** Axes of every skeleton transform and rest offset: glTF, +Y up, metres */
export const SKELETON_FRAME = 'gltf-y-up';

export interface SkeletonMapping {
  /** Every canonical bone, in taxonomy order */
  bones: Map<string, MappedBone>;
  root: string;
  totalDof: number;
  frame: typeof SKELETON_FRAME;
}

export interface JointDescriptor {
  readonly name: string;
  readonly parentLink: string;
  readonly childLink: string;
  readonly jointType: JointType;
  readonly pivotOffset: Readonly<Vec3>;
  readonly axisLimits: Readonly<AxisLimits>;
  readonly channels: readonly Channel[];
  readonly dof: number;
  readonly pivotSource: 'scene' | 'rest';
}
