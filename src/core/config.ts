/**
 * Configuration Management with Priority Resolution
 * Loads from environment, the installer config file, and defaults
 */

import { z } from 'zod';
import { existsSync, readFileSync } from 'fs';
import { join } from 'path';
import { ConfigSchema, type Config } from './types';

// ---------------------------------------------------------------------------
// Settings File Schema (every key optional)
// ---------------------------------------------------------------------------

// Names are checked after the merge so a bad one resets only its own key
const FileAssetNamesSchema = z.object({
  win32: z.string(),
  darwin: z.string(),
  linux: z.string(),
}).partial();

const SettingsFileSchema = z.object({
  applicationRepo: z.string().optional(),
  assets: FileAssetNamesSchema.optional(),
  installDirName: z.string().optional(),
  frameWidth: z.number().optional(),
  uninstallConfirmations: z.number().optional(),
  downloadTimeoutMs: z.number().optional(),
  confirmInstall: z.boolean().optional(),
  debug: z.boolean().optional(),
}).passthrough();

export type SettingsFile = z.infer<typeof SettingsFileSchema>;

export const CONFIG_FILE_NAME = 'installer.config.json';

// ---------------------------------------------------------------------------
// Default Values
// ---------------------------------------------------------------------------

export const DEFAULT_CONFIG: Config = {
  applicationRepo: 'mudrikam/Image-Tea-nano',
  assets: {
    win32: 'Image-Tea-windows.zip',
    darwin: 'Image-Tea-macos.zip',
    linux: 'Image-Tea-linux.zip',
  },
  installDirName: 'Image-Tea',
  frameWidth: 60,
  uninstallConfirmations: 2,
  downloadTimeoutMs: 60_000,
  confirmInstall: false,
  debug: false,
};

// ---------------------------------------------------------------------------
// Environment Variable Mapping
// ---------------------------------------------------------------------------

type ScalarKey = Exclude<keyof Config, 'assets'>;

interface EnvMapping {
  envKey: string;
  configKey: ScalarKey;
  transform: (value: string) => string | number | boolean;
}

const toBool = (v: string) => v === 'true' || v === '1';

const ENV_MAPPINGS: EnvMapping[] = [
  { envKey: 'IMAGE_TEA_REPO', configKey: 'applicationRepo', transform: (v) => v },
  { envKey: 'IMAGE_TEA_INSTALL_DIR_NAME', configKey: 'installDirName', transform: (v) => v },
  { envKey: 'IMAGE_TEA_FRAME_WIDTH', configKey: 'frameWidth', transform: (v) => parseInt(v, 10) },
  { envKey: 'IMAGE_TEA_DOWNLOAD_TIMEOUT_MS', configKey: 'downloadTimeoutMs', transform: (v) => parseInt(v, 10) },
  { envKey: 'IMAGE_TEA_CONFIRM_INSTALL', configKey: 'confirmInstall', transform: toBool },
  { envKey: 'IMAGE_TEA_DEBUG', configKey: 'debug', transform: toBool },
];

function loadEnvConfig(env: NodeJS.ProcessEnv): Partial<Record<ScalarKey, unknown>> {
  const config: Partial<Record<ScalarKey, unknown>> = {};

  for (const mapping of ENV_MAPPINGS) {
    const value = env[mapping.envKey];
    if (value === undefined || value === '') continue;

    const transformed = mapping.transform(value);
    if (typeof transformed === 'number' && Number.isNaN(transformed)) continue;
    config[mapping.configKey] = transformed;
  }

  return config;
}

// ---------------------------------------------------------------------------
// File Loading
// ---------------------------------------------------------------------------

export type ConfigWarning = (message: string) => void;

function loadSettingsFile(path: string, warn: ConfigWarning): SettingsFile | null {
  if (!existsSync(path)) return null;

  try {
    const data: unknown = JSON.parse(readFileSync(path, 'utf-8'));
    const result = SettingsFileSchema.safeParse(data);
    if (result.success) return result.data;
    warn(`Invalid settings in ${path}: ${formatIssues(result.error)}`);
  } catch (err) {
    warn(`Failed to load settings from ${path}: ${err instanceof Error ? err.message : String(err)}`);
  }
  return null;
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
}

// ---------------------------------------------------------------------------
// Config Loader
// ---------------------------------------------------------------------------

export interface ConfigLoaderOptions {
  /** Directory holding installer.config.json, normally the installer's own */
  baseDir: string;
  env?: NodeJS.ProcessEnv;
  skipEnv?: boolean;
  warn?: ConfigWarning;
}

export class ConfigLoader {
  private readonly options: ConfigLoaderOptions;

  constructor(options: ConfigLoaderOptions) {
    this.options = options;
  }

  /**
   * Load and merge configuration from all sources
   * Priority (highest to lowest):
   * 1. Environment variables
   * 2. installer.config.json beside the installer
   * 3. Default values
   *
   * A merged result that fails validation falls back to the defaults for
   * the offending keys.
   */
  load(): Config {
    const warn = this.options.warn ?? (() => {});
    const file = loadSettingsFile(join(this.options.baseDir, CONFIG_FILE_NAME), warn);
    const env = this.options.skipEnv ? {} : loadEnvConfig(this.options.env ?? process.env);

    const merged = {
      ...DEFAULT_CONFIG,
      ...stripUndefined(file ?? {}),
      ...env,
      assets: { ...DEFAULT_CONFIG.assets, ...stripUndefined(file?.assets ?? {}) },
    };

    const result = ConfigSchema.safeParse(merged);
    if (result.success) return result.data;

    warn(`Ignoring invalid configuration values: ${formatIssues(result.error)}`);
    return this.repair(merged, result.error);
  }

  private repair(merged: Record<string, unknown>, error: z.ZodError): Config {
    const badKeys = new Set(error.issues.map((issue) => String(issue.path[0])));
    const repaired: Record<string, unknown> = { ...merged };
    for (const [key, value] of Object.entries(DEFAULT_CONFIG)) {
      if (badKeys.has(key)) repaired[key] = value;
    }
    return ConfigSchema.parse(repaired);
  }
}

function stripUndefined(value: object): Record<string, unknown> {
  return Object.fromEntries(
    Object.entries(value).filter(([, v]) => v !== undefined)
  );
}

// ---------------------------------------------------------------------------
// Convenience
// ---------------------------------------------------------------------------

export function loadConfig(options: ConfigLoaderOptions): Config {
  return new ConfigLoader(options).load();
}
