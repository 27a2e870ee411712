#!/usr/bin/env node

import 'dotenv/config';
import { Command } from 'commander';
import { version } from '../index.ts';
import { basename, dirname, resolve } from 'node:path';
import { loadConfig } from '../config/index.ts';
import { formatError } from '../errors/index.ts';
import { BUNDLE_EXTENSION, loadProject, locateProject } from '../pbxproj/index.ts';
import { renderProjectTree } from '../walker/index.ts';

const program = new Command();

// Global output control
interface OutputOptions {
  verbose?: boolean;
  quiet?: boolean;
}

let outputOptions: OutputOptions = {};

function log(message: string, level: 'info' | 'verbose' = 'info') {
  if (outputOptions.quiet) {
    return;
  }
  if (level === 'verbose' && !outputOptions.verbose) {
    return;
  }
  console.log(message);
}

function logError(message: string) {
  console.error(message);
}

program
  .name('pbxnav')
  .description('Print the Xcode project navigator as a text tree')
  .version(version)
  .option('-v, --verbose', 'Show diagnostics and warnings')
  .option('-q, --quiet', 'Print the tree only')
  .hook('preAction', (thisCommand) => {
    const opts = thisCommand.optsWithGlobals();
    outputOptions = {
      verbose: opts.verbose,
      quiet: opts.quiet,
    };
  });

program
  .command('tree [path]')
  .description('Print the navigator tree of an .xcodeproj bundle or the directory holding one')
  .option('--root <dir>', 'Project root for SOURCE_ROOT paths (default: the bundle directory)')
  .option('--no-header', 'Omit the header and rules around the tree')
  .action(async (path: string | undefined, options: { root?: string; header: boolean }) => {
    try {
      const target = resolve(path ?? '.');
      // Config sits beside the bundle, or in the directory being inspected
      const configDir = target.endsWith(BUNDLE_EXTENSION) ? dirname(target) : target;
      const config = await loadConfig(configDir);

      const requested =
        config.project && !target.endsWith(BUNDLE_EXTENSION)
          ? resolve(configDir, config.project)
          : target;
      const bundlePath = await locateProject(requested);
      const graph = await loadProject(bundlePath);

      const configRoot = config.root ? resolve(configDir, config.root) : undefined;
      const projectRoot = resolve(
        options.root || process.env.PBXNAV_ROOT || configRoot || dirname(bundlePath)
      );

      log(`Project: ${bundlePath}`, 'verbose');
      log(`Project root: ${projectRoot}`, 'verbose');

      const result = renderProjectTree(graph, {
        projectRoot,
        projectName: basename(bundlePath),
        header: options.header && config.output.header && !outputOptions.quiet,
        indentWidth: config.output.indentWidth,
      });

      for (const line of result.lines) {
        console.log(line);
      }

      log(`Indexed ${result.indexedTargets} native targets`, 'verbose');
      if (result.warnings.length > 0) {
        log(`\n${result.warnings.length} warnings:`, 'verbose');
        for (const warning of result.warnings) {
          log(`  ${formatError(warning).split('\n').join('\n  ')}`, 'verbose');
        }
      }
    } catch (error) {
      logError(formatError(error instanceof Error ? error : new Error(String(error))));
      process.exit(1);
    }
  });

await program.parseAsync();
