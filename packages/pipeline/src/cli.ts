#!/usr/bin/env node
/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * CLI for avatar conversion
 *
 * Converts VRM/GLB files into OBJ submeshes, a manifest and a skeleton document.
 */

import { Command } from 'commander';
import { loadConfig } from './config.js';
import { convertAvatarFiles } from './output.js';

const program = new Command();

program
  .name('rigkit')
  .description('Extract per-material meshes and a canonical skeleton from VRM/GLB avatars')
  .version('0.1.0');

program
  .argument('<inputs...>', 'VRM or GLB files to convert')
  .option('-o, --output <dir>', 'Output directory', './rigkit-out')
  .option('-c, --config <file>', 'Configuration file (default: ./rigkit.config.json when present)')
  .option('--no-textures', 'Do not extract embedded textures')
  .option('-v, --verbose', 'Print stage progress and diagnostics', false)
  .action(
    (
      inputs: string[],
      options: {
        output: string;
        config?: string;
        textures: boolean;
        verbose: boolean;
      }
    ) => {
      if (options.verbose) {
        process.env.RIGKIT_DEBUG = 'true';
      }

      let exitCode = 0;
      try {
        const config = loadConfig(options.config);
        if (!options.textures) {
          config.output.extractTextures = false;
        }

        const start = Date.now();
        const outcomes = convertAvatarFiles(inputs, options.output, { config });

        for (const outcome of outcomes) {
          if (outcome.ok) {
            const { result, outputDir, files } = outcome.conversion;
            const warnings = result.diagnostics.warnings().length;
            const errors = result.diagnostics.errors().length;
            console.log(`✓ ${outcome.input} -> ${outputDir} (${files.length} files, ${errors} skipped primitive(s), ${warnings} warning(s))`);
          } else {
            exitCode = 1;
            console.error(`✗ ${outcome.input}: ${outcome.error.message}`);
          }
        }
        console.log(`\nCompleted in ${Date.now() - start}ms`);
      } catch (error) {
        console.error('\nError:', error instanceof Error ? error.message : error);
        exitCode = 1;
      }
      process.exitCode = exitCode;
    }
  );

program.parse();
