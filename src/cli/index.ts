#!/usr/bin/env node
/**
 * Image Tea Installer - Main Entry Point
 */

import { Command } from 'commander';
import { join } from 'path';
import { version as packageVersion } from '../../package.json';
import { loadConfig } from '../core/config';
import { InstallerEngine, EXIT_FAILURE } from '../core/state-machine';
import { getLogger, initLogger } from '../infra/logger';
import { FixedLocator, ProcessLocator, type FilesystemLocator } from '../installer/locator';
import { detectPlatform, fetchLatestRelease } from '../installer/release';
import { removeTrackedPaths } from '../installer/temp-paths';
import { FrameRenderer } from './frame';
import { createKeyReader } from './keypress';
import { onShutdown, printError, warning } from './utils';

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface CliOptions {
  debug?: boolean;
  dir?: string;
}

// ---------------------------------------------------------------------------
// Installer Run
// ---------------------------------------------------------------------------

export async function runInstaller(options: CliOptions): Promise<number> {
  const locator: FilesystemLocator = options.dir
    ? new FixedLocator(options.dir)
    : new ProcessLocator();
  const installerDir = locator.getInstallerDir();

  const config = loadConfig({
    baseDir: installerDir,
    warn: (message) => console.warn(`${warning('Warning:')} ${message}`),
  });

  if (options.debug || config.debug) {
    await initLogger({ level: 'debug', logDir: join(installerDir, 'logs') });
  }

  const log = getLogger().child('cli');
  log.info('Installer starting', { version: packageVersion, installerDir, platform: process.platform });

  const keys = createKeyReader();
  const renderer = new FrameRenderer({ width: config.frameWidth });
  const restoreTerminal = () => {
    keys.close();
    renderer.showCursor();
  };
  onShutdown(restoreTerminal);
  onShutdown(removeTrackedPaths);

  const engine = new InstallerEngine({
    config,
    platform: detectPlatform(),
    locator,
    keys,
    renderer,
    releaseLookup: (repo, assetName) => fetchLatestRelease(repo, assetName),
  });

  renderer.hideCursor();
  try {
    const exitCode = await engine.run();
    log.info('Installer finished', { exitCode });
    return exitCode;
  } finally {
    restoreTerminal();
    await getLogger().close();
  }
}

// ---------------------------------------------------------------------------
// Main Program
// ---------------------------------------------------------------------------

export function createProgram(): Command {
  const program = new Command();

  program
    .name('image-tea-installer')
    .description('Install, launch, reinstall or uninstall Image Tea')
    .version(packageVersion)
    .option('--debug', 'Write a debug log to <installer-dir>/logs')
    .option('--dir <path>', 'Use this directory instead of the installer\'s own')
    .action(async (options: CliOptions) => {
      process.exitCode = await runInstaller(options);
    });

  return program;
}

// ---------------------------------------------------------------------------
// Error Handling
// ---------------------------------------------------------------------------

function handleError(err: unknown): never {
  printError(err);

  if (process.env.DEBUG && err instanceof Error && err.stack) {
    console.error('\nStack trace:');
    console.error(err.stack);
  }

  process.exit(EXIT_FAILURE);
}

if (require.main === module) {
  process.on('unhandledRejection', handleError);
  createProgram().parseAsync(process.argv).catch(handleError);
}
