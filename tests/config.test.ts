/**
 * Configuration Unit Tests
 * Tests defaults, file and environment priority, and value repair
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { CONFIG_FILE_NAME, ConfigLoader, DEFAULT_CONFIG, loadConfig } from '../src/core/config';

describe('ConfigLoader', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'image-tea-config-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  const writeSettings = (data: unknown) =>
    writeFileSync(join(dir, CONFIG_FILE_NAME), typeof data === 'string' ? data : JSON.stringify(data));

  describe('defaults', () => {
    it('should use defaults without a file or environment', () => {
      expect(loadConfig({ baseDir: dir, skipEnv: true })).toEqual(DEFAULT_CONFIG);
    });

    it('should point at the Image Tea release assets', () => {
      expect(DEFAULT_CONFIG.applicationRepo).toBe('mudrikam/Image-Tea-nano');
      expect(DEFAULT_CONFIG.assets).toEqual({
        win32: 'Image-Tea-windows.zip',
        darwin: 'Image-Tea-macos.zip',
        linux: 'Image-Tea-linux.zip',
      });
      expect(DEFAULT_CONFIG.installDirName).toBe('Image-Tea');
      expect(DEFAULT_CONFIG.uninstallConfirmations).toBe(2);
    });
  });

  describe('settings file', () => {
    it('should override defaults and merge asset names', () => {
      writeSettings({ applicationRepo: 'acme/widget', assets: { linux: 'widget-linux.zip' } });

      const config = loadConfig({ baseDir: dir, skipEnv: true });

      expect(config.applicationRepo).toBe('acme/widget');
      expect(config.assets.linux).toBe('widget-linux.zip');
      expect(config.assets.win32).toBe('Image-Tea-windows.zip');
    });

    it('should warn and fall back on malformed JSON', () => {
      writeSettings('{ not json');
      const warn = vi.fn();

      const config = loadConfig({ baseDir: dir, skipEnv: true, warn });

      expect(config).toEqual(DEFAULT_CONFIG);
      expect(warn).toHaveBeenCalledTimes(1);
      expect(warn.mock.calls[0]?.[0]).toContain(`Failed to load settings from ${join(dir, CONFIG_FILE_NAME)}`);
    });

    it('should warn and ignore a file with wrongly typed values', () => {
      writeSettings({ frameWidth: 'wide', applicationRepo: 'acme/widget' });
      const warn = vi.fn();

      const config = loadConfig({ baseDir: dir, skipEnv: true, warn });

      expect(config).toEqual(DEFAULT_CONFIG);
      expect(warn.mock.calls[0]?.[0]).toContain('Invalid settings in');
      expect(warn.mock.calls[0]?.[0]).toContain('frameWidth');
    });

    it('should reset only the out-of-range keys', () => {
      writeSettings({ frameWidth: 5, installDirName: 'a/b', applicationRepo: 'acme/widget' });
      const warn = vi.fn();

      const config = loadConfig({ baseDir: dir, skipEnv: true, warn });

      expect(config.frameWidth).toBe(60);
      expect(config.installDirName).toBe('Image-Tea');
      expect(config.applicationRepo).toBe('acme/widget');
      expect(warn.mock.calls[0]?.[0]).toContain('Ignoring invalid configuration values');
    });

    it('should refuse an asset name that is a path', () => {
      writeSettings({ applicationRepo: 'acme/widget', assets: { linux: '../x.zip' } });
      const warn = vi.fn();

      const config = loadConfig({ baseDir: dir, skipEnv: true, warn });

      expect(config.assets).toEqual(DEFAULT_CONFIG.assets);
      expect(config.applicationRepo).toBe('acme/widget');
      expect(warn).toHaveBeenCalledWith(
        'Ignoring invalid configuration values: assets.linux: must be a plain file or folder name'
      );
    });
  });

  describe('environment', () => {
    it('should take priority over the file', () => {
      writeSettings({ applicationRepo: 'acme/widget', frameWidth: 70 });

      const config = new ConfigLoader({
        baseDir: dir,
        env: {
          IMAGE_TEA_REPO: 'env/repo',
          IMAGE_TEA_FRAME_WIDTH: '80',
          IMAGE_TEA_DEBUG: '1',
          IMAGE_TEA_CONFIRM_INSTALL: 'true',
        },
      }).load();

      expect(config.applicationRepo).toBe('env/repo');
      expect(config.frameWidth).toBe(80);
      expect(config.debug).toBe(true);
      expect(config.confirmInstall).toBe(true);
    });

    it.each(['.', '..'])('should refuse %s as the install folder name', (name) => {
      const warn = vi.fn();

      const config = loadConfig({ baseDir: dir, env: { IMAGE_TEA_INSTALL_DIR_NAME: name }, warn });

      expect(config.installDirName).toBe('Image-Tea');
      expect(warn).toHaveBeenCalledWith(
        'Ignoring invalid configuration values: installDirName: must be a plain file or folder name'
      );
    });

    it('should skip numbers that do not parse', () => {
      const config = loadConfig({ baseDir: dir, env: { IMAGE_TEA_FRAME_WIDTH: 'wide' } });
      expect(config.frameWidth).toBe(60);
    });

    it('should treat other boolean strings as false', () => {
      const config = loadConfig({ baseDir: dir, env: { IMAGE_TEA_DEBUG: 'yes' } });
      expect(config.debug).toBe(false);
    });

    it('should ignore the environment when skipEnv is set', () => {
      const config = loadConfig({ baseDir: dir, skipEnv: true, env: { IMAGE_TEA_REPO: 'env/repo' } });
      expect(config.applicationRepo).toBe(DEFAULT_CONFIG.applicationRepo);
    });
  });
});
