/**
 * Filesystem Locator Unit Tests
 * Tests how the installer directory is found for each way of running
 */

import { describe, it, expect } from 'vitest';
import { join, resolve } from 'path';
import { InstallerError } from '../../src/core/errors';
import {
  FixedLocator,
  ProcessLocator,
  getInstallTarget,
  isInside,
  type ProcessInfo,
} from '../../src/installer/locator';

const processInfo = (overrides: Partial<ProcessInfo>): ProcessInfo => ({
  execPath: '/usr/local/bin/node',
  env: {},
  cwd: '/home/user/Downloads',
  tempDir: '/tmp',
  ...overrides,
});

describe('FixedLocator', () => {
  it('should resolve the directory it was given', () => {
    expect(new FixedLocator('some/dir').getInstallerDir()).toBe(resolve('some/dir'));
  });

  it('should place the install target inside it', () => {
    const locator = new FixedLocator('/opt/installer');
    expect(getInstallTarget(locator, 'Image-Tea')).toBe(join(resolve('/opt/installer'), 'Image-Tea'));
  });
});

describe('ProcessLocator', () => {
  it('should use the working directory for a script run under node', () => {
    const locator = new ProcessLocator(processInfo({}));
    expect(locator.getInstallerDir()).toBe(resolve('/home/user/Downloads'));
  });

  it('should use the AppImage location, not its mount point', () => {
    const locator = new ProcessLocator(processInfo({
      execPath: '/tmp/.mount_ImageT1a2b/usr/bin/image-tea-installer',
      env: { APPIMAGE: '/home/user/Apps/Image-Tea-Installer.AppImage' },
    }));
    expect(locator.getInstallerDir()).toBe(resolve('/home/user/Apps'));
  });

  it('should use the folder holding a macOS app bundle', () => {
    const locator = new ProcessLocator(processInfo({
      execPath: '/Applications/Image Tea Installer.app/Contents/MacOS/image-tea-installer',
    }));
    expect(locator.getInstallerDir()).toBe(resolve('/Applications'));
  });

  it('should use the folder of a packaged binary', () => {
    const locator = new ProcessLocator(processInfo({ execPath: '/opt/image-tea/image-tea-installer' }));
    expect(locator.getInstallerDir()).toBe(resolve('/opt/image-tea'));
  });

  it('should skip a binary unpacked into the temp directory', () => {
    const locator = new ProcessLocator(processInfo({ execPath: '/tmp/pkg-1234/image-tea-installer' }));
    expect(locator.getInstallerDir()).toBe(resolve('/home/user/Downloads'));
  });

  it('should refuse to run entirely from the temp directory', () => {
    const locator = new ProcessLocator(processInfo({
      execPath: '/tmp/pkg-1234/image-tea-installer',
      cwd: '/tmp/work',
    }));
    expect(() => locator.getInstallerDir()).toThrow(InstallerError);
  });

  it('should resolve only once', () => {
    const info = processInfo({});
    const locator = new ProcessLocator(info);
    const first = locator.getInstallerDir();
    info.cwd = '/somewhere/else';
    expect(locator.getInstallerDir()).toBe(first);
  });
});

describe('isInside', () => {
  it('should accept the directory itself and its children', () => {
    expect(isInside('/a', '/a')).toBe(true);
    expect(isInside('/a/b/c', '/a')).toBe(true);
  });

  it('should reject siblings and parents', () => {
    expect(isInside('/ab', '/a')).toBe(false);
    expect(isInside('/', '/a')).toBe(false);
    expect(isInside('/a/../b', '/a')).toBe(false);
  });
});
