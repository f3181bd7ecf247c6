/**
 * Uninstaller
 * Removes the install target and nothing else
 */

import { rm } from 'fs/promises';
import { resolve } from 'path';
import { getLogger } from '../infra/logger';
import { InstallerError, describeError } from '../core/errors';
import { err, ok, type Result } from '../core/types';
import { isInside } from './locator';

const RM_RETRIES = 3;
const RM_RETRY_DELAY_MS = 200;

/**
 * Recursively delete `targetDir`, which must lie strictly inside
 * `installerDir`. Locked files (a running instance on Windows) are retried a
 * few times before the error is returned.
 */
export async function uninstall(
  targetDir: string,
  installerDir: string
): Promise<Result<void, InstallerError>> {
  const log = getLogger().child('uninstaller');
  const target = resolve(targetDir);

  if (target === resolve(installerDir) || !isInside(target, installerDir)) {
    log.error('Refusing to remove path outside the installer directory', { target, installerDir });
    return err(new InstallerError('filesystem', `Refusing to remove ${target}: not inside ${installerDir}`));
  }

  try {
    await rm(target, {
      recursive: true,
      force: true,
      maxRetries: RM_RETRIES,
      retryDelay: RM_RETRY_DELAY_MS,
    });
  } catch (cause) {
    log.error('Uninstall failed', { target, error: describeError(cause) });
    return err(new InstallerError('filesystem', `Could not remove ${target}: ${describeError(cause)}`, { cause }));
  }

  log.info('Uninstalled', { target });
  return ok(undefined);
}
