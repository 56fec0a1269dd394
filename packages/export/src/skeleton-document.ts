/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Skeleton document (`skeleton.json`)
 *
 * The canonical skeleton as an engine reads it: bones keyed by canonical
 * name, a nested hierarchy, joint descriptors, and which scene node each
 * canonical bone was bound to. Keys are snake_case; transforms are rounded
 * to the output precision.
 */

import type { Diagnostic } from '@rigkit/data';
import type {
  AxisLimits,
  BindingSource,
  JointDescriptor,
  SkeletonBinding,
  SkeletonMapping,
} from '@rigkit/skeleton';
import { DEFAULT_PRECISION, roundVector } from './format.js';
import { toManifestDiagnostics, type ManifestDiagnostic } from './manifest.js';

type LimitTable = Partial<Record<'x' | 'y' | 'z', [number, number]>>;

export interface SkeletonDocumentBone {
  parent: string | null;
  children: string[];
  joint_type: string;
  limits: LimitTable;
  channels: string[];
  dof: number;
  local_transform: { translation: number[]; rotation: number[]; scale: number[] };
  source: 'scene' | 'rest';
  /** Nearest bound ancestor the transform was measured from */
  measured_from: string | null;
}

export interface HierarchyNode {
  name: string;
  children: HierarchyNode[];
}

export interface SkeletonDocumentJoint {
  name: string;
  parent_link: string;
  child_link: string;
  joint_type: string;
  pivot_offset: number[];
  axis_limits: LimitTable;
  channels: string[];
  dof: number;
  pivot_source: 'scene' | 'rest';
}

export interface AliasTableEntry {
  raw_name: string;
  node_index: number;
  vocabulary: BindingSource;
}

export interface SkeletonDocument {
  metadata: {
    generator: string;
    source: string;
    /** Axes of every transform and pivot offset */
    frame: string;
    root: string;
    total_dof: number;
    bone_count: number;
    bound_count: number;
  };
  bones: Record<string, SkeletonDocumentBone>;
  hierarchy: HierarchyNode;
  joints: SkeletonDocumentJoint[];
  bone_alias_table: Record<string, AliasTableEntry | null>;
  unresolved: Array<{ node_index: number; raw_name: string }>;
  diagnostics: ManifestDiagnostic[];
}

export interface SkeletonDocumentInput {
  generator: string;
  source: string;
  mapping: SkeletonMapping;
  binding: SkeletonBinding;
  joints: readonly JointDescriptor[];
  diagnostics: readonly Diagnostic[];
  /** Digits kept in transforms (default: 6) */
  precision?: number;
}

function limitTable(limits: Readonly<AxisLimits>): LimitTable {
  const table: LimitTable = {};
  if (limits.x) table.x = [limits.x.min, limits.x.max];
  if (limits.y) table.y = [limits.y.min, limits.y.max];
  if (limits.z) table.z = [limits.z.min, limits.z.max];
  return table;
}

function buildHierarchy(mapping: SkeletonMapping, name: string): HierarchyNode {
  const bone = mapping.bones.get(name);
  return {
    name,
    children: (bone?.children ?? []).map((child) => buildHierarchy(mapping, child)),
  };
}

export function buildSkeletonDocument(input: SkeletonDocumentInput): SkeletonDocument {
  const { mapping, binding } = input;
  const precision = input.precision ?? DEFAULT_PRECISION;

  const bones: Record<string, SkeletonDocumentBone> = {};
  const aliasTable: Record<string, AliasTableEntry | null> = {};
  for (const bone of mapping.bones.values()) {
    const t = bone.localTransform;
    bones[bone.name] = {
      parent: bone.parent,
      children: [...bone.children],
      joint_type: bone.jointType,
      limits: limitTable(bone.limits),
      channels: [...bone.channels],
      dof: bone.dof,
      local_transform: {
        translation: roundVector(t.translation, precision),
        rotation: roundVector(t.rotation, precision),
        scale: roundVector(t.scale, precision),
      },
      source: bone.source,
      measured_from: bone.measuredFrom,
    };
    const bound = binding.bindings.get(bone.name);
    aliasTable[bone.name] =
      bound === undefined ? null : { raw_name: bound.rawName, node_index: bound.nodeIndex, vocabulary: bound.source };
  }

  return {
    metadata: {
      generator: input.generator,
      source: input.source,
      frame: mapping.frame,
      root: mapping.root,
      total_dof: mapping.totalDof,
      bone_count: mapping.bones.size,
      bound_count: binding.bindings.size,
    },
    bones,
    hierarchy: buildHierarchy(mapping, mapping.root),
    joints: input.joints.map((j) => ({
      name: j.name,
      parent_link: j.parentLink,
      child_link: j.childLink,
      joint_type: j.jointType,
      pivot_offset: roundVector(j.pivotOffset, precision),
      axis_limits: limitTable(j.axisLimits),
      channels: [...j.channels],
      dof: j.dof,
      pivot_source: j.pivotSource,
    })),
    bone_alias_table: aliasTable,
    unresolved: binding.unresolved.map((u) => ({ node_index: u.nodeIndex, raw_name: u.rawName })),
    diagnostics: toManifestDiagnostics(input.diagnostics),
  };
}

export function serializeSkeletonDocument(document: SkeletonDocument): string {
  return `${JSON.stringify(document, null, 2)}\n`;
}
