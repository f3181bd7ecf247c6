/**
 * Core Type Definitions for the Image Tea Installer
 * Config uses a Zod schema for runtime validation with TypeScript inference
 */

import { z } from 'zod';

// ---------------------------------------------------------------------------
// Platform
// ---------------------------------------------------------------------------

export const PlatformSchema = z.enum(['win32', 'darwin', 'linux']);
export type Platform = z.infer<typeof PlatformSchema>;

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

/** One file or folder name, never a path and never `.` or `..` */
export const SafeNameSchema = z.string().min(1).refine(
  (name) => name !== '.' && name !== '..' && !/[/\\]/.test(name),
  'must be a plain file or folder name'
);

export const AssetNamesSchema = z.object({
  win32: SafeNameSchema,
  darwin: SafeNameSchema,
  linux: SafeNameSchema,
});

export type AssetNames = z.infer<typeof AssetNamesSchema>;

export const ConfigSchema = z.object({
  /** GitHub repository in `owner/name` form */
  applicationRepo: z.string().regex(/^[\w.-]+\/[\w.-]+$/, 'expected "owner/name"'),
  assets: AssetNamesSchema,
  /** Directory created beside the installer */
  installDirName: SafeNameSchema,
  frameWidth: z.number().int().min(20).max(200).default(60),
  uninstallConfirmations: z.number().int().min(1).max(5).default(2),
  downloadTimeoutMs: z.number().positive().default(60_000),
  confirmInstall: z.boolean().default(false),
  debug: z.boolean().default(false),
});

export type Config = z.infer<typeof ConfigSchema>;

// ---------------------------------------------------------------------------
// Results
// ---------------------------------------------------------------------------

export type Result<T, E> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export const ok = <T>(value: T): Result<T, never> => ({ ok: true, value });
export const err = <E>(error: E): Result<never, E> => ({ ok: false, error });

// ---------------------------------------------------------------------------
// Release & Progress
// ---------------------------------------------------------------------------

export interface ReleaseAsset {
  url: string;
  fileName: string;
  /** Byte size, 0 until known */
  size: number;
}

export type ProgressPhase = 'downloading' | 'extracting';

export interface ProgressEvent {
  readonly phase: ProgressPhase;
  readonly bytesDone: number;
  /** 0 when the total is not known */
  readonly bytesTotal: number;
}

export type ProgressListener = (event: ProgressEvent) => void;

// ---------------------------------------------------------------------------
// Menu
// ---------------------------------------------------------------------------

export type MenuAction = 'launch' | 'reinstall' | 'uninstall' | 'exit';

// ---------------------------------------------------------------------------
// Installer Phase
// ---------------------------------------------------------------------------

export type InstallerPhase =
  | { name: 'welcome'; auto: boolean; notice?: Notice }
  | { name: 'installing' }
  | { name: 'menu'; notice?: Notice }
  | { name: 'launching' }
  | { name: 'reinstalling' }
  | { name: 'uninstalling' }
  | { name: 'exited'; exitCode: number };

export type PhaseName = InstallerPhase['name'];

export interface Notice {
  kind: 'success' | 'error' | 'info';
  message: string;
}
