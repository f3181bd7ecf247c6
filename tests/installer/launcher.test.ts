/**
 * Application Launcher Unit Tests
 * Tests entry point detection and detached launching
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { getEntryPoint, isInstalled, launchApplication } from '../../src/installer/launcher';

const MARKER_SCRIPT = '#!/bin/sh\necho launched > marker.txt\n';

async function waitForFile(path: string, timeoutMs = 5000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!existsSync(path) || readFileSync(path, 'utf8') === '') {
    if (Date.now() > deadline) throw new Error(`Timed out waiting for ${path}`);
    await new Promise((resolve) => setTimeout(resolve, 25));
  }
}

describe('launcher', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'image-tea-launch-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  describe('getEntryPoint', () => {
    it('should name the platform entry point', () => {
      expect(getEntryPoint(dir, 'win32')).toBe(join(dir, 'Image Tea.exe'));
      expect(getEntryPoint(dir, 'darwin')).toBe(join(dir, 'Launcher.sh'));
      expect(getEntryPoint(dir, 'linux')).toBe(join(dir, 'Launcher.sh'));
    });
  });

  describe('isInstalled', () => {
    it('should be false without the entry point', async () => {
      expect(await isInstalled(dir, 'linux')).toBe(false);
      expect(await isInstalled(join(dir, 'missing'), 'linux')).toBe(false);
    });

    it('should be true once the entry point exists', async () => {
      writeFileSync(join(dir, 'Launcher.sh'), MARKER_SCRIPT);
      expect(await isInstalled(dir, 'linux')).toBe(true);
      expect(await isInstalled(dir, 'win32')).toBe(false);
    });

    it('should not accept a directory in place of the entry point', async () => {
      mkdirSync(join(dir, 'Launcher.sh'));
      expect(await isInstalled(dir, 'linux')).toBe(false);
    });
  });

  describe('launchApplication', () => {
    it.skipIf(process.platform === 'win32')('should start the launcher in the install directory', async () => {
      writeFileSync(join(dir, 'Launcher.sh'), MARKER_SCRIPT, { mode: 0o755 });

      const pid = await launchApplication(dir, 'linux');

      expect(typeof pid).toBe('number');
      await waitForFile(join(dir, 'marker.txt'));
      expect(readFileSync(join(dir, 'marker.txt'), 'utf8')).toBe('launched\n');
    });

    it.skipIf(process.platform === 'win32')('should run a script without the executable bit through sh', async () => {
      writeFileSync(join(dir, 'Launcher.sh'), MARKER_SCRIPT, { mode: 0o644 });

      await launchApplication(dir, 'linux');

      await waitForFile(join(dir, 'marker.txt'));
      expect(readFileSync(join(dir, 'marker.txt'), 'utf8')).toBe('launched\n');
    });

    it('should reject when the entry point cannot be started', async () => {
      await expect(launchApplication(dir, 'win32')).rejects.toThrow();
    });
  });
});
