/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * File output
 *
 * A conversion is written into a staging directory beside the target and
 * renamed over it once the manifest, the last file, is in place. A failed or
 * cancelled run leaves the previous output untouched, and a successful one
 * leaves no files from earlier runs behind. Only an empty directory or an
 * earlier output, recognised by its manifest, is ever replaced.
 */

import { randomBytes } from 'crypto';
import { existsSync, mkdirSync, readFileSync, readdirSync, renameSync, rmSync, statSync, writeFileSync } from 'fs';
import { basename, dirname, join, parse, resolve } from 'path';
import { PipelineError, createLogger, isPipelineError } from '@rigkit/data';
import { serializeManifest, serializeSkeletonDocument } from '@rigkit/export';
import { convertAvatar, throwIfCancelled, type ConversionResult, type ConvertOptions } from './convert.js';

const log = createLogger('Output');

export const MANIFEST_FILE = 'manifest.json';
export const SKELETON_FILE = 'skeleton.json';

function reason(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function siblingPath(path: string, tag: string): string {
  return `${path}.${process.pid}.${randomBytes(4).toString('hex')}.${tag}`;
}

/**
 * @throws PipelineError(OutputWriteFailed) unless `dir` is absent, empty or an earlier output
 */
function assertReplaceable(dir: string): void {
  if (!existsSync(dir)) return;
  let replaceable: boolean;
  try {
    replaceable = statSync(dir).isDirectory() && (readdirSync(dir).length === 0 || existsSync(join(dir, MANIFEST_FILE)));
  } catch (error) {
    throw new PipelineError('OutputWriteFailed', `Cannot inspect ${dir}: ${reason(error)}`, { path: dir });
  }
  if (!replaceable) {
    throw new PipelineError('OutputWriteFailed', `${dir} is not empty and holds no ${MANIFEST_FILE}; not replacing it`, {
      path: dir,
    });
  }
}

/**
 * Move `staging` to `outputDir`, replacing whatever was there
 *
 * @throws PipelineError(OutputWriteFailed)
 */
function replaceDirectory(staging: string, outputDir: string): void {
  const previous = existsSync(outputDir) ? siblingPath(outputDir, 'old') : null;
  try {
    if (previous) renameSync(outputDir, previous);
    renameSync(staging, outputDir);
  } catch (error) {
    if (previous && !existsSync(outputDir)) renameSync(previous, outputDir);
    throw new PipelineError('OutputWriteFailed', `Cannot replace ${outputDir}: ${reason(error)}`, { path: outputDir });
  }
  if (previous) rmSync(previous, { recursive: true, force: true });
}

/**
 * Write `data` to `path` through a temporary file and a rename
 *
 * @throws PipelineError(OutputWriteFailed)
 */
export function writeFileAtomic(path: string, data: string | Uint8Array): void {
  const temp = siblingPath(path, 'tmp');
  try {
    writeFileSync(temp, data);
    renameSync(temp, path);
  } catch (error) {
    rmSync(temp, { force: true });
    throw new PipelineError('OutputWriteFailed', `Cannot write ${path}: ${reason(error)}`, { path });
  }
}

export interface FileConversion {
  input: string;
  outputDir: string;
  /** Written file names, in write order; the manifest is last */
  files: string[];
  result: ConversionResult;
}

/**
 * Convert one file and write its outputs into `outputDir`, replacing any
 * earlier contents only once every file is written
 */
export function convertAvatarFile(inputPath: string, outputDir: string, options: ConvertOptions = {}): FileConversion {
  const bytes = readFileSync(inputPath);
  const result = convertAvatar(new Uint8Array(bytes.buffer, bytes.byteOffset, bytes.byteLength), {
    ...options,
    source: options.source ?? basename(inputPath),
  });

  throwIfCancelled(options.signal, 'write');
  const target = resolve(outputDir);
  assertReplaceable(target);
  const staging = siblingPath(target, 'tmp');
  try {
    mkdirSync(dirname(target), { recursive: true });
    mkdirSync(staging);
  } catch (error) {
    throw new PipelineError('OutputWriteFailed', `Cannot create ${outputDir}: ${reason(error)}`, { path: outputDir });
  }

  const files: string[] = [];
  const write = (name: string, data: string | Uint8Array): void => {
    throwIfCancelled(options.signal, 'write');
    writeFileAtomic(join(staging, name), data);
    files.push(name);
    log.debug(`Staged ${name}`);
  };

  try {
    for (const mesh of result.meshes) {
      write(mesh.filename, mesh.obj);
    }
    for (const texture of result.textures) {
      write(texture.fileName, texture.bytes);
    }
    write(SKELETON_FILE, serializeSkeletonDocument(result.skeletonDocument));
    write(MANIFEST_FILE, serializeManifest(result.manifest));
    replaceDirectory(staging, target);
  } catch (error) {
    rmSync(staging, { recursive: true, force: true });
    throw error;
  }

  log.info(`Wrote ${files.length} file(s) to ${outputDir}`, { operation: 'convertAvatarFile' });
  return { input: inputPath, outputDir, files, result };
}

export type FileOutcome =
  | { ok: true; input: string; conversion: FileConversion }
  | { ok: false; input: string; outputDir: string; error: Error };

/**
 * Output directory per input: `outputDir` itself for a single input, else
 * one subdirectory per input named after the file, suffixed on collision.
 */
export function outputDirsFor(inputs: readonly string[], outputDir: string): string[] {
  if (inputs.length === 1) return [outputDir];
  const used = new Map<string, number>();
  return inputs.map((input) => {
    const name = parse(input).name;
    const seen = used.get(name) ?? 0;
    used.set(name, seen + 1);
    return join(outputDir, seen === 0 ? name : `${name}_${seen + 1}`);
  });
}

/**
 * Convert several files independently; one failing file does not stop the others
 */
export function convertAvatarFiles(
  inputs: readonly string[],
  outputDir: string,
  options: Omit<ConvertOptions, 'source'> = {}
): FileOutcome[] {
  const dirs = outputDirsFor(inputs, outputDir);
  return inputs.map((input, i): FileOutcome => {
    try {
      return { ok: true, input, conversion: convertAvatarFile(input, dirs[i], options) };
    } catch (error) {
      const failure = error instanceof Error ? error : new Error(String(error));
      const kind = isPipelineError(error) ? error.kind : failure.name;
      log.error(`Conversion of ${input} failed (${kind})`, failure, { operation: 'convertAvatarFiles' });
      return { ok: false, input, outputDir: dirs[i], error: failure };
    }
  });
}
