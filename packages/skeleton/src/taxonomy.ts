/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Canonical Bone Taxonomy - the fixed humanoid bone table and its alias index
 *
 * The table is data (`data/humanoid-taxonomy.json`), validated when loaded:
 * names are unique, parents exist, the hierarchy is acyclic with a single
 * `hips` root, limit ranges are ordered, and no alias string maps to two
 * bones within one vocabulary.
 */

import { readFileSync } from 'fs';
import { PipelineError, createLogger } from '@rigkit/data';
import { isRecord } from '@rigkit/container';
import {
  AXES,
  CHANNELS,
  VOCABULARIES,
  isVocabulary,
  type AxisLimits,
  type CanonicalBone,
  type Channel,
  type JointType,
  type Vocabulary,
} from './types.js';

const log = createLogger('BoneTaxonomy');

export const ROOT_BONE = 'hips';

export interface AliasMatch {
  bone: CanonicalBone;
  vocabulary: Vocabulary;
}

function malformed(message: string, details?: Record<string, unknown>): PipelineError {
  return new PipelineError('MalformedTaxonomy', message, details);
}

function readNumbers(value: unknown, length: number, path: string): number[] {
  if (!Array.isArray(value) || value.length !== length) {
    throw malformed(`${path} must be an array of ${length} numbers`);
  }
  return value.map((item) => {
    if (typeof item !== 'number' || !Number.isFinite(item)) {
      throw malformed(`${path} must be an array of ${length} numbers`);
    }
    return item;
  });
}

function readStrings(value: unknown, path: string): string[] {
  if (!Array.isArray(value)) {
    throw malformed(`${path} must be an array of strings`);
  }
  return value.map((item) => {
    if (typeof item !== 'string' || item.length === 0) {
      throw malformed(`${path} must be an array of non-empty strings`);
    }
    return item;
  });
}

function readLimits(value: unknown, path: string): AxisLimits {
  if (value === undefined) return {};
  if (!isRecord(value)) {
    throw malformed(`${path} must be an object`);
  }
  const limits: AxisLimits = {};
  for (const [key, range] of Object.entries(value)) {
    const axis = AXES.find((a) => a === key);
    if (axis === undefined) {
      throw malformed(`${path}.${key} is not an axis`);
    }
    const [min, max] = readNumbers(range, 2, `${path}.${key}`);
    if (min > max) {
      throw malformed(`${path}.${key} is inverted: ${min} > ${max}`, { min, max });
    }
    limits[axis] = { min, max };
  }
  return limits;
}

function readChannels(value: unknown, path: string): Channel[] {
  return readStrings(value, path).map((name) => {
    const channel = CHANNELS.find((c) => c === name);
    if (channel === undefined) {
      throw malformed(`${path}: unknown channel "${name}"`);
    }
    return channel;
  });
}

function readAliases(value: unknown, path: string): Record<Vocabulary, string[]> {
  const aliases: Record<Vocabulary, string[]> = { humanoid: [], mocap: [], rigTool: [], vroid: [] };
  if (value === undefined) return aliases;
  if (!isRecord(value)) {
    throw malformed(`${path} must be an object`);
  }
  for (const [key, names] of Object.entries(value)) {
    if (!isVocabulary(key)) {
      throw malformed(`${path}.${key} is not a known vocabulary`);
    }
    aliases[key] = [...new Set(readStrings(names, `${path}.${key}`))];
  }
  return aliases;
}

interface ParsedBone {
  name: string;
  parent: string | null;
  jointType: JointType;
  restOffset: number[];
  restRotation: number[];
  limits: AxisLimits;
  channels: Channel[];
  aliases: Record<Vocabulary, string[]>;
}

function parseBone(value: unknown, index: number): ParsedBone {
  const path = `bones[${index}]`;
  if (!isRecord(value)) {
    throw malformed(`${path} must be an object`);
  }
  const name = value.name;
  if (typeof name !== 'string' || name.length === 0) {
    throw malformed(`${path}.name must be a non-empty string`);
  }
  const parent = value.parent;
  if (parent !== null && typeof parent !== 'string') {
    throw malformed(`${path}.parent must be a bone name or null`);
  }
  let jointType: JointType;
  if (value.jointType === undefined || value.jointType === 'revolute') {
    jointType = 'revolute';
  } else if (value.jointType === 'fixed') {
    jointType = 'fixed';
  } else {
    throw malformed(`${path}.jointType must be "fixed" or "revolute"`);
  }
  return {
    name,
    parent: typeof parent === 'string' ? parent : null,
    jointType,
    restOffset: readNumbers(value.restOffset, 3, `${path}.restOffset`),
    restRotation: value.restRotation === undefined ? [0, 0, 0, 1] : readNumbers(value.restRotation, 4, `${path}.restRotation`),
    limits: readLimits(value.limits, `${path}.limits`),
    channels: readChannels(value.channels, `${path}.channels`),
    aliases: readAliases(value.aliases, `${path}.aliases`),
  };
}

/**
 * @throws PipelineError(CyclicHierarchy) if walking parents from any bone
 *   revisits a bone
 */
function checkAcyclic(parsed: ParsedBone[], byName: Map<string, ParsedBone>): void {
  for (const bone of parsed) {
    const seen = new Set<string>([bone.name]);
    let parent = bone.parent;
    while (parent !== null) {
      if (seen.has(parent)) {
        throw new PipelineError('CyclicHierarchy', `Bone "${bone.name}" reaches "${parent}" twice walking its parents`, {
          bone: bone.name,
          chain: [...seen],
        });
      }
      seen.add(parent);
      parent = byName.get(parent)?.parent ?? null;
    }
  }
}

export class CanonicalBoneTaxonomy {
  readonly bones: readonly CanonicalBone[];
  readonly root: CanonicalBone;
  private readonly byName: Map<string, CanonicalBone>;
  private readonly aliasIndex: Record<Vocabulary, Map<string, CanonicalBone>>;

  private constructor(
    bones: CanonicalBone[],
    root: CanonicalBone,
    aliasIndex: Record<Vocabulary, Map<string, CanonicalBone>>
  ) {
    this.bones = bones;
    this.root = root;
    this.byName = new Map(bones.map((b) => [b.name, b]));
    this.aliasIndex = aliasIndex;
  }

  /**
   * Build and validate a taxonomy from its table
   *
   * @throws PipelineError(MalformedTaxonomy) on a structural problem
   * @throws PipelineError(CyclicHierarchy) on a parent cycle
   * @throws PipelineError(AmbiguousBoneAlias) when one alias names two bones
   *   within a vocabulary
   */
  static fromTable(table: unknown): CanonicalBoneTaxonomy {
    const rows: unknown = isRecord(table) ? table.bones : undefined;
    if (!isRecord(table) || !Array.isArray(rows)) {
      throw malformed('Taxonomy must be an object with a "bones" array');
    }
    for (const key of Object.keys(table)) {
      if (key !== 'bones') {
        throw malformed(`Taxonomy has unknown key "${key}"`);
      }
    }
    const parsed = rows.map(parseBone);
    if (parsed.length === 0) {
      throw malformed('Taxonomy has no bones');
    }

    const byName = new Map<string, ParsedBone>();
    for (const bone of parsed) {
      if (byName.has(bone.name)) {
        throw malformed(`Duplicate bone "${bone.name}"`);
      }
      byName.set(bone.name, bone);
    }
    for (const bone of parsed) {
      if (bone.parent !== null && !byName.has(bone.parent)) {
        throw malformed(`Bone "${bone.name}" has unknown parent "${bone.parent}"`);
      }
    }

    checkAcyclic(parsed, byName);

    const roots = parsed.filter((b) => b.parent === null);
    if (roots.length !== 1) {
      throw malformed(`Taxonomy must have exactly one root, found ${roots.length}`, {
        roots: roots.map((r) => r.name),
      });
    }
    if (roots[0].name !== ROOT_BONE) {
      throw malformed(`Taxonomy root must be "${ROOT_BONE}", found "${roots[0].name}"`);
    }

    const bones: CanonicalBone[] = parsed.map((bone) => ({
      name: bone.name,
      aliases: bone.aliases,
      parent: bone.parent,
      children: parsed.filter((c) => c.parent === bone.name).map((c) => c.name),
      restTransform: {
        translation: [bone.restOffset[0], bone.restOffset[1], bone.restOffset[2]],
        rotation: [bone.restRotation[0], bone.restRotation[1], bone.restRotation[2], bone.restRotation[3]],
        scale: [1, 1, 1],
      },
      jointType: bone.jointType,
      limits: bone.limits,
      channels: bone.channels,
      dof: bone.channels.length,
    }));

    const aliasIndex: Record<Vocabulary, Map<string, CanonicalBone>> = {
      humanoid: new Map(),
      mocap: new Map(),
      rigTool: new Map(),
      vroid: new Map(),
    };
    for (const bone of bones) {
      for (const vocabulary of VOCABULARIES) {
        const index = aliasIndex[vocabulary];
        for (const alias of bone.aliases[vocabulary]) {
          const existing = index.get(alias);
          if (existing !== undefined) {
            throw new PipelineError(
              'AmbiguousBoneAlias',
              `Alias "${alias}" in ${vocabulary} names both "${existing.name}" and "${bone.name}"`,
              { vocabulary, alias, bones: [existing.name, bone.name] }
            );
          }
          index.set(alias, bone);
        }
      }
    }

    const root = bones.find((b) => b.parent === null);
    if (root === undefined) {
      throw malformed('Taxonomy has no root');
    }

    log.debug(`Built taxonomy with ${bones.length} bones`);
    return new CanonicalBoneTaxonomy(bones, root, aliasIndex);
  }

  get size(): number {
    return this.bones.length;
  }

  get totalDof(): number {
    return this.bones.reduce((sum, b) => sum + b.dof, 0);
  }

  get(name: string): CanonicalBone | undefined {
    return this.byName.get(name);
  }

  has(name: string): boolean {
    return this.byName.has(name);
  }

  /**
   * Exact, case-sensitive alias lookup within one vocabulary
   */
  resolve(vocabulary: Vocabulary, rawName: string): CanonicalBone | undefined {
    return this.aliasIndex[vocabulary].get(rawName);
  }

  /**
   * Look a name up in several vocabularies, first hit wins
   */
  resolveAny(rawName: string, vocabularies: readonly Vocabulary[]): AliasMatch | undefined {
    for (const vocabulary of vocabularies) {
      const bone = this.resolve(vocabulary, rawName);
      if (bone !== undefined) {
        return { bone, vocabulary };
      }
    }
    return undefined;
  }
}

/**
 * Load and validate a taxonomy table from a JSON file
 */
export function loadTaxonomyFile(path: string | URL): CanonicalBoneTaxonomy {
  const text = readFileSync(path, 'utf8');
  let table: unknown;
  try {
    table = JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw malformed(`Taxonomy file ${String(path)} is not valid JSON: ${reason}`);
  }
  return CanonicalBoneTaxonomy.fromTable(table);
}

let defaultTaxonomy: CanonicalBoneTaxonomy | null = null;

/**
 * The built-in 24-bone humanoid taxonomy
 */
export function loadDefaultTaxonomy(): CanonicalBoneTaxonomy {
  if (defaultTaxonomy === null) {
    defaultTaxonomy = loadTaxonomyFile(new URL('../data/humanoid-taxonomy.json', import.meta.url));
  }
  return defaultTaxonomy;
}
