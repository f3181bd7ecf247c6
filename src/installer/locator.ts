/**
 * Filesystem Locator
 * Resolves the installer's own directory, the base for every path it writes
 */

import { tmpdir } from 'os';
import { basename, dirname, join, relative, resolve, sep, isAbsolute } from 'path';
import { InstallerError } from '../core/errors';

// ---------------------------------------------------------------------------
// Locator Contract
// ---------------------------------------------------------------------------

export interface FilesystemLocator {
  getInstallerDir(): string;
}

export function getInstallTarget(locator: FilesystemLocator, installDirName: string): string {
  return join(locator.getInstallerDir(), installDirName);
}

// ---------------------------------------------------------------------------
// Fixed Locator (tests, --dir)
// ---------------------------------------------------------------------------

export class FixedLocator implements FilesystemLocator {
  private readonly dir: string;

  constructor(dir: string) {
    this.dir = resolve(dir);
  }

  getInstallerDir(): string {
    return this.dir;
  }
}

// ---------------------------------------------------------------------------
// Process Locator
// ---------------------------------------------------------------------------

export interface ProcessInfo {
  execPath: string;
  env: NodeJS.ProcessEnv;
  cwd: string;
  tempDir: string;
}

export function currentProcessInfo(): ProcessInfo {
  return {
    execPath: process.execPath,
    env: process.env,
    cwd: process.cwd(),
    tempDir: tmpdir(),
  };
}

const NODE_BINARY = /^node(\.exe)?$/i;
const APP_BUNDLE = /^(.*?\.app)[\\/]Contents[\\/]MacOS[\\/]/;

/**
 * Locates the installer when it runs as an AppImage, inside a macOS .app
 * bundle, or as a packaged binary. Bundles that unpack themselves under the
 * temp directory are traced back to the file the user started; the result is
 * never inside the temp directory.
 *
 * A script run under node uses the working directory. The entry script then
 * lives in this package's dist/ tree, or under node_modules behind an npm bin
 * link, and neither is where the user expects `Image-Tea/` to appear.
 */
export class ProcessLocator implements FilesystemLocator {
  private readonly info: ProcessInfo;
  private resolved: string | null = null;

  constructor(info: ProcessInfo = currentProcessInfo()) {
    this.info = info;
  }

  getInstallerDir(): string {
    this.resolved ??= this.resolve();
    return this.resolved;
  }

  private resolve(): string {
    for (const candidate of this.candidates()) {
      if (!isInside(candidate, this.info.tempDir)) return candidate;
    }
    throw new InstallerError(
      'config',
      'Installer is running from a temporary directory; move it to a permanent folder or pass --dir'
    );
  }

  private candidates(): string[] {
    const { env, execPath, cwd } = this.info;
    const found: string[] = [];

    const appImage = env['APPIMAGE'];
    if (appImage && isAbsolute(appImage)) found.push(dirname(appImage));

    const bundle = APP_BUNDLE.exec(execPath);
    if (bundle?.[1]) found.push(dirname(bundle[1]));

    if (!NODE_BINARY.test(basename(execPath))) {
      found.push(dirname(execPath));
    }

    found.push(cwd);
    return found.map((dir) => resolve(dir));
  }
}

// ---------------------------------------------------------------------------
// Path Helpers
// ---------------------------------------------------------------------------

/** True when `child` is `parent` or lies beneath it. */
export function isInside(child: string, parent: string): boolean {
  const rel = relative(resolve(parent), resolve(child));
  return rel === '' || (!rel.startsWith(`..${sep}`) && rel !== '..' && !isAbsolute(rel));
}
