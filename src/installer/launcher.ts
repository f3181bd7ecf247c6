/**
 * Application Launcher
 * Finds the platform entry point and starts it without waiting on it
 */

import { spawn } from 'child_process';
import { access, stat } from 'fs/promises';
import { constants } from 'fs';
import { join } from 'path';
import { getLogger } from '../infra/logger';
import type { Platform } from '../core/types';

// ---------------------------------------------------------------------------
// Entry Points
// ---------------------------------------------------------------------------

export const ENTRY_POINTS: Record<Platform, string> = {
  win32: 'Image Tea.exe',
  darwin: 'Launcher.sh',
  linux: 'Launcher.sh',
};

export function getEntryPoint(targetDir: string, platform: Platform): string {
  return join(targetDir, ENTRY_POINTS[platform]);
}

/** A valid install is a target directory holding the platform entry point. */
export async function isInstalled(targetDir: string, platform: Platform): Promise<boolean> {
  try {
    const info = await stat(getEntryPoint(targetDir, platform));
    return info.isFile();
  } catch {
    return false;
  }
}

// ---------------------------------------------------------------------------
// Launch
// ---------------------------------------------------------------------------

export type SpawnFn = typeof spawn;

async function isExecutable(path: string): Promise<boolean> {
  try {
    await access(path, constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Start the installed application detached from the installer. Resolves with
 * the child's pid once it has spawned; rejects with the spawn error. A
 * launcher script that lost its executable bit is run through /bin/sh.
 */
export async function launchApplication(
  targetDir: string,
  platform: Platform,
  spawnFn: SpawnFn = spawn
): Promise<number | undefined> {
  const log = getLogger().child('launcher');
  const entry = getEntryPoint(targetDir, platform);

  const [command, args]: [string, string[]] = platform !== 'win32' && !(await isExecutable(entry))
    ? ['/bin/sh', [entry]]
    : [entry, []];

  log.info('Launching application', { command, args });

  const child = spawnFn(command, args, {
    cwd: targetDir,
    detached: true,
    stdio: 'ignore',
  });

  await new Promise<void>((resolve, reject) => {
    child.once('spawn', () => resolve());
    child.once('error', reject);
  });

  child.unref();
  log.info('Application started', { pid: child.pid });
  return child.pid;
}
