/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Pipeline configuration
 *
 * `rigkit.config.json` is optional. When present it is validated by hand and
 * merged over the defaults; unknown keys, unknown enum values and wrong types
 * are InvalidConfig errors naming the offending path.
 */

import { existsSync, readFileSync } from 'fs';
import { dirname, resolve } from 'path';
import { PipelineError, createLogger } from '@rigkit/data';
import { isRecord } from '@rigkit/container';
import {
  DEFAULT_UV_CORRECTION,
  isComponentCategory,
  isUvTransform,
  type ComponentCategory,
  type UvCorrectionConfig,
  type UvTransform,
} from '@rigkit/geometry';
import { DEFAULT_BINDING_OPTIONS, isVocabulary, type Vocabulary } from '@rigkit/skeleton';
import { DEFAULT_PRECISION } from '@rigkit/export';

const log = createLogger('Config');

export const CONFIG_FILE_NAME = 'rigkit.config.json';

/** `toFixed` accepts 0..100; more than 15 digits is noise for float64 */
const MAX_PRECISION = 15;

export interface PipelineConfig {
  uv: UvCorrectionConfig;
  textures: {
    /** Texture file name per category, replacing the built-in suggestion */
    overrides: Partial<Record<ComponentCategory, string>>;
  };
  skeleton: {
    vocabularies: readonly Vocabulary[];
    useHumanoidExtension: boolean;
    /** Custom taxonomy table, absolute; null for the built-in table */
    taxonomyPath: string | null;
  };
  output: {
    precision: number;
    extractTextures: boolean;
  };
}

export function defaultConfig(): PipelineConfig {
  return {
    uv: { ...DEFAULT_UV_CORRECTION, byComponent: { ...DEFAULT_UV_CORRECTION.byComponent } },
    textures: { overrides: {} },
    skeleton: {
      vocabularies: [...DEFAULT_BINDING_OPTIONS.vocabularies],
      useHumanoidExtension: DEFAULT_BINDING_OPTIONS.useHumanoidExtension,
      taxonomyPath: null,
    },
    output: { precision: DEFAULT_PRECISION, extractTextures: true },
  };
}

function invalid(path: string, message: string): PipelineError {
  return new PipelineError('InvalidConfig', `${path}: ${message}`, { path });
}

function section(value: unknown, path: string, keys: readonly string[]): Record<string, unknown> {
  if (!isRecord(value)) {
    throw invalid(path, 'must be an object');
  }
  for (const key of Object.keys(value)) {
    if (!keys.includes(key)) {
      throw invalid(`${path}.${key}`, 'unknown key');
    }
  }
  return value;
}

function readBoolean(value: unknown, path: string): boolean {
  if (typeof value !== 'boolean') {
    throw invalid(path, 'must be true or false');
  }
  return value;
}

function readString(value: unknown, path: string): string {
  if (typeof value !== 'string' || value.length === 0) {
    throw invalid(path, 'must be a non-empty string');
  }
  return value;
}

function readUvTransform(value: unknown, path: string): UvTransform {
  if (typeof value !== 'string' || !isUvTransform(value)) {
    throw invalid(path, `must be one of identity, flipV, flipU, flipBoth`);
  }
  return value;
}

function readUv(value: unknown, base: UvCorrectionConfig): UvCorrectionConfig {
  const uv = section(value, 'uv', ['default', 'byComponent', 'epsilon']);
  const result: UvCorrectionConfig = { ...base, byComponent: { ...base.byComponent } };
  if (uv.default !== undefined) {
    result.default = readUvTransform(uv.default, 'uv.default');
  }
  if (uv.byComponent !== undefined) {
    if (!isRecord(uv.byComponent)) {
      throw invalid('uv.byComponent', 'must be an object');
    }
    for (const [key, transform] of Object.entries(uv.byComponent)) {
      if (!isComponentCategory(key)) {
        throw invalid(`uv.byComponent.${key}`, 'unknown component category');
      }
      result.byComponent[key] = readUvTransform(transform, `uv.byComponent.${key}`);
    }
  }
  if (uv.epsilon !== undefined) {
    if (typeof uv.epsilon !== 'number' || !Number.isFinite(uv.epsilon) || uv.epsilon < 0) {
      throw invalid('uv.epsilon', 'must be a non-negative number');
    }
    result.epsilon = uv.epsilon;
  }
  return result;
}

function readTextures(value: unknown, base: PipelineConfig['textures']): PipelineConfig['textures'] {
  const textures = section(value, 'textures', ['overrides']);
  const overrides = { ...base.overrides };
  if (textures.overrides !== undefined) {
    if (!isRecord(textures.overrides)) {
      throw invalid('textures.overrides', 'must be an object');
    }
    for (const [key, file] of Object.entries(textures.overrides)) {
      if (!isComponentCategory(key)) {
        throw invalid(`textures.overrides.${key}`, 'unknown component category');
      }
      overrides[key] = readString(file, `textures.overrides.${key}`);
    }
  }
  return { overrides };
}

function readSkeleton(
  value: unknown,
  base: PipelineConfig['skeleton'],
  baseDir: string
): PipelineConfig['skeleton'] {
  const skeleton = section(value, 'skeleton', ['vocabularies', 'useHumanoidExtension', 'taxonomy']);
  const result = { ...base };
  if (skeleton.vocabularies !== undefined) {
    if (!Array.isArray(skeleton.vocabularies) || skeleton.vocabularies.length === 0) {
      throw invalid('skeleton.vocabularies', 'must be a non-empty array');
    }
    const vocabularies: Vocabulary[] = [];
    skeleton.vocabularies.forEach((name: unknown, i) => {
      if (typeof name !== 'string' || !isVocabulary(name)) {
        throw invalid(`skeleton.vocabularies[${i}]`, 'must be one of humanoid, mocap, rigTool, vroid');
      }
      if (vocabularies.includes(name)) {
        throw invalid(`skeleton.vocabularies[${i}]`, `"${name}" is listed twice`);
      }
      vocabularies.push(name);
    });
    result.vocabularies = vocabularies;
  }
  if (skeleton.useHumanoidExtension !== undefined) {
    result.useHumanoidExtension = readBoolean(skeleton.useHumanoidExtension, 'skeleton.useHumanoidExtension');
  }
  if (skeleton.taxonomy !== undefined) {
    result.taxonomyPath = resolve(baseDir, readString(skeleton.taxonomy, 'skeleton.taxonomy'));
  }
  return result;
}

function readOutput(value: unknown, base: PipelineConfig['output']): PipelineConfig['output'] {
  const output = section(value, 'output', ['precision', 'extractTextures']);
  const result = { ...base };
  if (output.precision !== undefined) {
    const precision = output.precision;
    if (typeof precision !== 'number' || !Number.isInteger(precision) || precision < 0 || precision > MAX_PRECISION) {
      throw invalid('output.precision', `must be an integer from 0 to ${MAX_PRECISION}`);
    }
    result.precision = precision;
  }
  if (output.extractTextures !== undefined) {
    result.extractTextures = readBoolean(output.extractTextures, 'output.extractTextures');
  }
  return result;
}

/**
 * Validate a parsed configuration object and merge it over the defaults
 *
 * @param baseDir Directory relative paths in the configuration resolve against
 * @throws PipelineError(InvalidConfig)
 */
export function parseConfig(raw: unknown, baseDir = process.cwd()): PipelineConfig {
  const root = section(raw, 'config', ['uv', 'textures', 'skeleton', 'output']);
  const base = defaultConfig();
  return {
    uv: root.uv === undefined ? base.uv : readUv(root.uv, base.uv),
    textures: root.textures === undefined ? base.textures : readTextures(root.textures, base.textures),
    skeleton: root.skeleton === undefined ? base.skeleton : readSkeleton(root.skeleton, base.skeleton, baseDir),
    output: root.output === undefined ? base.output : readOutput(root.output, base.output),
  };
}

/**
 * Load the configuration file
 *
 * An explicit path must exist. Without one, `rigkit.config.json` in `cwd` is
 * used when present, else the defaults.
 *
 * @throws PipelineError(InvalidConfig)
 */
export function loadConfig(path?: string, cwd = process.cwd()): PipelineConfig {
  const file = resolve(cwd, path ?? CONFIG_FILE_NAME);
  if (!existsSync(file)) {
    if (path !== undefined) {
      throw new PipelineError('InvalidConfig', `Configuration file ${file} does not exist`, { path: file });
    }
    log.debug(`No ${CONFIG_FILE_NAME} in ${cwd}, using defaults`);
    return defaultConfig();
  }

  let text: string;
  try {
    text = readFileSync(file, 'utf8');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new PipelineError('InvalidConfig', `Configuration file ${file} cannot be read: ${reason}`, {
      path: file,
    });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new PipelineError('InvalidConfig', `Configuration file ${file} is not valid JSON: ${reason}`, {
      path: file,
    });
  }
  log.info(`Loaded ${file}`, { operation: 'loadConfig' });
  return parseConfig(raw, dirname(file));
}
