/**
 * Image Tea Installer
 * Main entry point exporting all public modules
 */

// Core types
export * from './core/types';

// Core modules
export { loadConfig, ConfigLoader, DEFAULT_CONFIG, CONFIG_FILE_NAME } from './core/config';
export { InstallerError, DownloadError, ExtractError, describeError } from './core/errors';
export { ConfirmationFlow, applyConfirmationKey } from './core/confirmation';
export type { ConfirmationState, ConfirmationStep } from './core/confirmation';
export { MENU_ITEMS, parseMenuKey } from './core/menu';
export { InstallerEngine, EXIT_OK, EXIT_FAILURE, EXIT_INTERRUPTED } from './core/state-machine';
export type { InstallerDeps } from './core/state-machine';

// Installer
export { download } from './installer/downloader';
export type { Downloader, DownloadOptions } from './installer/downloader';
export { extract } from './installer/extractor';
export type { Extractor } from './installer/extractor';
export { FixedLocator, ProcessLocator, getInstallTarget } from './installer/locator';
export type { FilesystemLocator } from './installer/locator';
export { detectPlatform, resolveReleaseAsset, fetchLatestRelease } from './installer/release';
export type { ReleaseInfo } from './installer/release';
export { launchApplication, isInstalled, getEntryPoint } from './installer/launcher';
export { uninstall } from './installer/uninstaller';

// Terminal
export { createKeyReader, KEYS } from './cli/keypress';
export type { KeyReader } from './cli/keypress';
export { FrameRenderer } from './cli/frame';
export type { Renderer } from './cli/frame';

// Infrastructure
export { Logger, getLogger, initLogger } from './infra/logger';
export type { LoggerConfig } from './infra/logger';
