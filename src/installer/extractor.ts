/**
 * Archive Extractor
 * Unzips a release into a staging directory and swaps it into place
 */

import AdmZip from 'adm-zip';
import { randomBytes } from 'crypto';
import { chmod, mkdir, readdir, rename, rm, stat, symlink, writeFile } from 'fs/promises';
import { basename, dirname, join, posix } from 'path';
import { getLogger } from '../infra/logger';
import { ExtractError } from '../core/errors';
import { err, ok, type ProgressListener, type Result } from '../core/types';
import { trackTemporaryPath } from './temp-paths';

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

const S_IFMT = 0o170000;
const S_IFLNK = 0o120000;
const PERMISSION_BITS = 0o7777;
export const STAGING_MARKER = '.staging-';
export const BACKUP_MARKER = '.previous-';

export type Extractor = (
  archiveFile: string,
  destinationDir: string,
  onProgress?: ProgressListener
) => Promise<Result<void, ExtractError>>;

// ---------------------------------------------------------------------------
// Entry Planning
// ---------------------------------------------------------------------------

export interface PlannedEntry {
  /** Path relative to the destination, `/`-separated */
  path: string;
  isDirectory: boolean;
  /** Unix mode from the archive, 0 when the archive carries none */
  mode: number;
  size: number;
  read(): Buffer;
}

export function normalizeEntryName(name: string): string {
  const normalized = posix.normalize(name.replace(/\\/g, '/')).replace(/\/+$/, '');
  if (
    normalized === '..'
    || normalized.startsWith('../')
    || normalized.startsWith('/')
    || /^[a-zA-Z]:/.test(normalized)
  ) {
    throw new ExtractError('corrupt-archive', `Archive entry escapes the install directory: ${name}`);
  }
  return normalized;
}

/**
 * Normalise entry paths and drop a single wrapping top-level directory, so
 * `Image-Tea/Launcher.sh` and `Launcher.sh` both land at the target's root.
 */
export function planEntries(zip: AdmZip): PlannedEntry[] {
  const entries = zip.getEntries()
    .map((entry) => ({
      path: normalizeEntryName(entry.entryName),
      isDirectory: entry.isDirectory,
      mode: (entry.header.attr >>> 16) & 0xffff,
      size: entry.header.size,
      read: () => entry.getData(),
    }))
    .filter((entry) => entry.path !== '' && entry.path !== '.');

  const roots = new Set(entries.map((entry) => entry.path.split('/')[0]));
  const [onlyRoot] = roots;
  if (roots.size !== 1 || onlyRoot === undefined) return entries;

  const prefix = `${onlyRoot}/`;
  const wrapped = entries.some((entry) => entry.path.startsWith(prefix))
    && entries.every((entry) => entry.path === onlyRoot ? entry.isDirectory : entry.path.startsWith(prefix));
  if (!wrapped) return entries;

  return entries
    .filter((entry) => entry.path !== onlyRoot)
    .map((entry) => ({ ...entry, path: entry.path.slice(prefix.length) }));
}

// ---------------------------------------------------------------------------
// Extract
// ---------------------------------------------------------------------------

export const extract: Extractor = async (archiveFile, destinationDir, onProgress) => {
  const log = getLogger().child('extractor');
  const suffix = randomBytes(4).toString('hex');
  const parent = dirname(destinationDir);
  const base = basename(destinationDir);
  const stagingDir = join(parent, `.${base}${STAGING_MARKER}${suffix}`);
  const backupDir = join(parent, `.${base}${BACKUP_MARKER}${suffix}`);

  log.info('Extracting archive', { archiveFile, destinationDir });
  await removeStaleSiblings(parent, base);

  const releaseStaging = trackTemporaryPath(stagingDir);
  try {
    const entries = planEntries(new AdmZip(archiveFile));
    if (entries.length === 0) {
      throw new ExtractError('corrupt-archive', 'Archive contains no files');
    }
    const total = entries.reduce((sum, entry) => sum + (entry.isDirectory ? 0 : entry.size), 0);
    const links = new Set<string>();
    let done = 0;

    await mkdir(stagingDir, { recursive: true });

    for (const entry of entries) {
      await writeEntry(stagingDir, entry, links);
      if (!entry.isDirectory) {
        done += entry.size;
        onProgress?.({ phase: 'extracting', bytesDone: done, bytesTotal: total });
      }
    }

    await swapIntoPlace(stagingDir, destinationDir, backupDir);
    log.info('Extraction complete', { destinationDir, entries: entries.length });
    return ok(undefined);
  } catch (cause) {
    await removeQuietly(stagingDir);
    const error = cause instanceof ExtractError ? cause : ExtractError.from(cause);
    log.error('Extraction failed', { archiveFile, reason: error.reason, message: error.message });
    return err(error);
  } finally {
    releaseStaging();
  }
};

/**
 * Write one entry below `root`. Symlinks must point inside the tree, and no
 * entry may be written through a symlink created earlier.
 */
async function writeEntry(root: string, entry: PlannedEntry, links: Set<string>): Promise<void> {
  const target = join(root, ...entry.path.split('/'));
  const keepMode = process.platform !== 'win32' && entry.mode !== 0;

  if (hasLinkAncestor(entry.path, links)) {
    throw new ExtractError('corrupt-archive', `Archive entry is written through a symlink: ${entry.path}`);
  }

  if (entry.isDirectory) {
    await mkdir(target, { recursive: true });
    return;
  }

  await mkdir(dirname(target), { recursive: true });

  if (keepMode && (entry.mode & S_IFMT) === S_IFLNK) {
    const linkTarget = entry.read().toString('utf8');
    assertLinkInside(entry.path, linkTarget);
    await symlink(linkTarget, target);
    links.add(entry.path);
    return;
  }

  await writeFile(target, entry.read());
  if (keepMode) {
    await chmod(target, entry.mode & PERMISSION_BITS);
  }
}

function hasLinkAncestor(path: string, links: Set<string>): boolean {
  const parts = path.split('/');
  for (let i = 1; i < parts.length; i++) {
    if (links.has(parts.slice(0, i).join('/'))) return true;
  }
  return false;
}

function assertLinkInside(entryPath: string, linkTarget: string): void {
  const normalized = linkTarget.replace(/\\/g, '/');
  const resolved = posix.isAbsolute(normalized) || /^[a-zA-Z]:/.test(normalized)
    ? normalized
    : posix.join(posix.dirname(entryPath), normalized);
  try {
    normalizeEntryName(resolved);
  } catch {
    throw new ExtractError('corrupt-archive', `Archive symlink points outside the install directory: ${entryPath} -> ${linkTarget}`);
  }
}

/**
 * Replace `destination` with `staging`. The previous tree is moved aside
 * first and restored if the final rename fails. A backup that cannot be
 * deleted afterwards is left for the next run to clear.
 */
async function swapIntoPlace(staging: string, destination: string, backup: string): Promise<void> {
  const hadPrevious = await exists(destination);
  if (!hadPrevious) {
    await rename(staging, destination);
    return;
  }

  const releaseBackup = trackTemporaryPath(backup);
  try {
    await rename(destination, backup);
    try {
      await rename(staging, destination);
    } catch (cause) {
      await rename(backup, destination);
      throw cause;
    }
    await removeQuietly(backup);
  } finally {
    releaseBackup();
  }
}

/** Clear staging and backup trees left behind by an interrupted run. */
async function removeStaleSiblings(parent: string, base: string): Promise<void> {
  let names: string[];
  try {
    names = await readdir(parent);
  } catch {
    return;
  }

  const prefixes = [`.${base}${STAGING_MARKER}`, `.${base}${BACKUP_MARKER}`];
  for (const name of names) {
    if (prefixes.some((prefix) => name.startsWith(prefix))) {
      await removeQuietly(join(parent, name));
    }
  }
}

async function removeQuietly(path: string): Promise<void> {
  try {
    await rm(path, { recursive: true, force: true });
  } catch (cause) {
    getLogger().child('extractor').warn('Could not remove temporary tree', {
      path,
      error: cause instanceof Error ? cause.message : String(cause),
    });
  }
}

async function exists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch {
    return false;
  }
}
