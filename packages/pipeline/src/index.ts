/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * @rigkit/pipeline - Avatar conversion from bytes or files
 *
 * @example
 * ```typescript
 * import { convertAvatarFile, loadConfig } from '@rigkit/pipeline';
 *
 * const { files } = convertAvatarFile('avatar.vrm', 'out', { config: loadConfig() });
 * ```
 */

export { convertAvatar, throwIfCancelled, GENERATOR } from './convert.js';
export type { ConvertOptions, ConversionResult, ConvertedMesh, SkeletonResult, ConversionStage } from './convert.js';

export {
  writeFileAtomic,
  convertAvatarFile,
  convertAvatarFiles,
  outputDirsFor,
  MANIFEST_FILE,
  SKELETON_FILE,
} from './output.js';
export type { FileConversion, FileOutcome } from './output.js';

export { loadConfig, parseConfig, defaultConfig, CONFIG_FILE_NAME } from './config.js';
export type { PipelineConfig } from './config.js';
