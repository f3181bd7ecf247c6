/**
 * Installer State Machine
 * Drives install, menu, launch, reinstall, uninstall and exit
 */

import { join } from 'path';
import { rm } from 'fs/promises';
import { KEYS, type KeyReader } from '../cli/keypress';
import type { Renderer } from '../cli/frame';
import { bold, dim, error as errorColor, formatBytes, info, success } from '../cli/utils';
import { getLogger } from '../infra/logger';
import { download as defaultDownload, type Downloader } from '../installer/downloader';
import { extract as defaultExtract, type Extractor } from '../installer/extractor';
import { getInstallTarget, type FilesystemLocator } from '../installer/locator';
import { isInstalled, launchApplication } from '../installer/launcher';
import { resolveReleaseAsset, type ReleaseInfo } from '../installer/release';
import { uninstall as defaultUninstall } from '../installer/uninstaller';
import { ConfirmationFlow } from './confirmation';
import { describeError, type InstallerError } from './errors';
import { MENU_ITEMS, parseMenuKey } from './menu';
import { ok } from './types';
import type {
  Config,
  InstallerPhase,
  Notice,
  PhaseName,
  Platform,
  ProgressEvent,
  Result,
} from './types';

// ---------------------------------------------------------------------------
// Dependencies
// ---------------------------------------------------------------------------

export interface InstallerDeps {
  config: Config;
  platform: Platform;
  locator: FilesystemLocator;
  keys: KeyReader;
  renderer: Renderer;
  downloader?: Downloader;
  extractor?: Extractor;
  launcher?: (targetDir: string, platform: Platform) => Promise<number | undefined>;
  uninstaller?: (targetDir: string, installerDir: string) => Promise<Result<void, InstallerError>>;
  /** Optional metadata lookup shown on the welcome frame */
  releaseLookup?: (repo: string, assetName: string) => Promise<ReleaseInfo | null>;
}

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_INTERRUPTED = 130;

// ---------------------------------------------------------------------------
// Installer Engine
// ---------------------------------------------------------------------------

export class InstallerEngine {
  private readonly deps: InstallerDeps;
  private readonly downloader: Downloader;
  private readonly extractor: Extractor;
  private readonly confirmation: ConfirmationFlow;
  private readonly targetDir: string;
  private phase: InstallerPhase = { name: 'welcome', auto: false };
  private readonly history: PhaseName[] = [];
  private release: ReleaseInfo | null = null;
  private releaseLooked = false;
  /** Set while no valid install exists because the last attempt failed */
  private unrecoveredFailure = false;
  private readonly log = getLogger().child('engine');

  constructor(deps: InstallerDeps) {
    this.deps = deps;
    this.downloader = deps.downloader ?? defaultDownload;
    this.extractor = deps.extractor ?? defaultExtract;
    this.confirmation = new ConfirmationFlow(deps.keys, deps.renderer);
    this.targetDir = getInstallTarget(deps.locator, deps.config.installDirName);
  }

  getPhase(): InstallerPhase {
    return this.phase;
  }

  getHistory(): PhaseName[] {
    return [...this.history];
  }

  getTargetDir(): string {
    return this.targetDir;
  }

  // -------------------------------------------------------------------------
  // Lifecycle
  // -------------------------------------------------------------------------

  /** Pick the first phase: the menu for a valid install, welcome otherwise. */
  async start(): Promise<void> {
    const installed = await isInstalled(this.targetDir, this.deps.platform);
    this.log.info('Starting', { targetDir: this.targetDir, installed });

    if (installed) {
      this.transition({ name: 'menu' });
    } else {
      this.transition({ name: 'welcome', auto: !this.deps.config.confirmInstall });
    }
  }

  /** Run until the exited phase and return its exit code. */
  async run(): Promise<number> {
    await this.start();
    for (;;) {
      const phase = this.phase;
      if (phase.name === 'exited') return phase.exitCode;
      await this.step();
    }
  }

  /** Execute the current phase once. */
  async step(): Promise<void> {
    const phase = this.phase;
    switch (phase.name) {
      case 'welcome': return this.runWelcome(phase);
      case 'installing': return this.runInstall(false);
      case 'reinstalling': return this.runInstall(true);
      case 'menu': return this.runMenu(phase);
      case 'launching': return this.runLaunch();
      case 'uninstalling': return this.runUninstall();
      case 'exited': return;
    }
  }

  private transition(next: InstallerPhase): void {
    this.log.debug('Phase change', { from: this.phase.name, to: next.name });
    this.phase = next;
    this.history.push(next.name);
  }

  private exit(exitCode: number): void {
    this.deps.renderer.renderFrame('Image Tea Installer', [
      '',
      exitCode === EXIT_OK ? 'Goodbye!' : errorColor('Installer exited without a working install.'),
      '',
    ]);
    this.transition({ name: 'exited', exitCode });
  }

  private exitCodeFor(key: string): number {
    if (key === KEYS.INTERRUPT) return EXIT_INTERRUPTED;
    return this.unrecoveredFailure ? EXIT_FAILURE : EXIT_OK;
  }

  // -------------------------------------------------------------------------
  // Welcome
  // -------------------------------------------------------------------------

  private async runWelcome(phase: Extract<InstallerPhase, { name: 'welcome' }>): Promise<void> {
    await this.lookupRelease();
    this.renderWelcome(phase);

    if (phase.auto) {
      this.transition({ name: 'installing' });
      return;
    }

    const key = await this.deps.keys.readKey();
    const lower = key.toLowerCase();

    if (lower === 'i' || key === KEYS.ENTER) {
      this.transition({ name: 'installing' });
    } else if (lower === 'x' || key === KEYS.INTERRUPT || key === KEYS.END_OF_INPUT) {
      this.exit(this.exitCodeFor(key));
    }
  }

  private async lookupRelease(): Promise<void> {
    const lookup = this.deps.releaseLookup;
    if (!lookup || this.releaseLooked) return;
    this.releaseLooked = true;
    this.release = await lookup(this.deps.config.applicationRepo, this.deps.config.assets[this.deps.platform]);
  }

  private renderWelcome(phase: Extract<InstallerPhase, { name: 'welcome' }>): void {
    const { config, platform } = this.deps;
    const assetName = config.assets[platform];
    const body = [
      '',
      `Application: ${bold(config.applicationRepo.split('/').pop() ?? config.applicationRepo)}`,
      `Repository:  ${dim(`https://github.com/${config.applicationRepo}`)}`,
      `Package:     ${assetName}`,
    ];

    if (this.release) {
      body.push(`Release:     ${this.release.tagName} (${this.release.name})`);
      if (this.release.publishedAt) body.push(`Published:   ${this.release.publishedAt.slice(0, 10)}`);
      if (this.release.assetSize) body.push(`Size:        ${formatBytes(this.release.assetSize)}`);
    }

    body.push('', 'Installation will:', `  • Download: ${assetName}`, `  • Extract to: ${this.targetDir}`, '');
    if (phase.notice) body.push(formatNotice(phase.notice), '');

    const footer = phase.auto
      ? dim('Starting installation...')
      : `${bold('[I]')} ${phase.notice?.kind === 'error' ? 'Retry' : 'Install'}   ${bold('[X]')} Exit`;

    this.deps.renderer.renderFrame('IMAGE-TEA INSTALLER', body, [footer]);
  }

  // -------------------------------------------------------------------------
  // Install / Reinstall
  // -------------------------------------------------------------------------

  private async runInstall(reinstall: boolean): Promise<void> {
    const result = await this.installRelease();

    if (result.ok) {
      this.unrecoveredFailure = false;
      this.transition({
        name: 'menu',
        notice: {
          kind: 'success',
          message: reinstall ? 'Reinstall completed!' : `Installation completed! Installed to ${this.targetDir}`,
        },
      });
      return;
    }

    const notice: Notice = { kind: 'error', message: describeError(result.error) };
    if (reinstall && await isInstalled(this.targetDir, this.deps.platform)) {
      this.transition({ name: 'menu', notice });
      return;
    }

    this.unrecoveredFailure = true;
    this.transition({ name: 'welcome', auto: false, notice });
  }

  /** Download the latest asset beside the installer, extract it, drop the archive. */
  private async installRelease(): Promise<Result<void, InstallerError>> {
    const { config, platform, locator, renderer } = this.deps;
    const asset = resolveReleaseAsset(config, platform);
    const archivePath = join(locator.getInstallerDir(), asset.fileName);

    renderer.renderProgress('downloading', 0, `Connecting to ${new URL(asset.url).host}...`);
    const downloaded = await this.downloader(asset.url, archivePath, (event) => this.renderEvent(event), {
      timeoutMs: config.downloadTimeoutMs,
      expectedSize: this.release?.assetSize,
    });
    if (!downloaded.ok) return downloaded;

    renderer.renderProgress('extracting', 0);
    const extracted = await this.extractor(archivePath, this.targetDir, (event) => this.renderEvent(event));

    try {
      await rm(archivePath, { force: true });
    } catch (cause) {
      this.log.warn('Could not remove archive', { archivePath, error: describeError(cause) });
    }

    return extracted.ok ? ok(undefined) : extracted;
  }

  private renderEvent(event: ProgressEvent): void {
    const fraction = event.bytesTotal > 0 ? event.bytesDone / event.bytesTotal : 0;
    const detail = event.bytesTotal > 0
      ? `${formatBytes(event.bytesDone)} / ${formatBytes(event.bytesTotal)}`
      : formatBytes(event.bytesDone);
    this.deps.renderer.renderProgress(event.phase, fraction, detail);
  }

  // -------------------------------------------------------------------------
  // Main Menu
  // -------------------------------------------------------------------------

  private async runMenu(phase: Extract<InstallerPhase, { name: 'menu' }>): Promise<void> {
    this.renderMenu(phase);

    const key = await this.deps.keys.readKey();
    if (key === KEYS.INTERRUPT || key === KEYS.END_OF_INPUT) {
      this.exit(this.exitCodeFor(key));
      return;
    }

    switch (parseMenuKey(key)) {
      case 'launch': return this.transition({ name: 'launching' });
      case 'reinstall': return this.transition({ name: 'reinstalling' });
      case 'uninstall': return this.transition({ name: 'uninstalling' });
      case 'exit': return this.exit(EXIT_OK);
      case null: return;
    }
  }

  private renderMenu(phase: Extract<InstallerPhase, { name: 'menu' }>): void {
    const body = ['', `Installed at: ${dim(this.targetDir)}`, ''];
    for (const item of MENU_ITEMS) {
      body.push(`  ${bold(`[${item.key}]`)} ${item.label}`);
    }
    body.push('');
    if (phase.notice) body.push(formatNotice(phase.notice), '');

    this.deps.renderer.renderFrame('Image Tea', body, [dim('Press a key to choose an option.')]);
  }

  // -------------------------------------------------------------------------
  // Launch
  // -------------------------------------------------------------------------

  private async runLaunch(): Promise<void> {
    const { platform } = this.deps;
    if (!(await isInstalled(this.targetDir, platform))) {
      this.transition({
        name: 'welcome',
        auto: false,
        notice: { kind: 'info', message: 'Image Tea is not installed. Press I to install it.' },
      });
      return;
    }

    const launch = this.deps.launcher ?? launchApplication;
    try {
      const pid = await launch(this.targetDir, platform);
      const suffix = pid === undefined ? '' : ` (pid ${pid})`;
      this.transition({ name: 'menu', notice: { kind: 'success', message: `Image Tea started${suffix}.` } });
    } catch (cause) {
      this.log.error('Launch failed', { error: describeError(cause) });
      this.transition({ name: 'menu', notice: { kind: 'error', message: `Launch failed: ${describeError(cause)}` } });
    }
  }

  // -------------------------------------------------------------------------
  // Uninstall
  // -------------------------------------------------------------------------

  private async runUninstall(): Promise<void> {
    const confirmed = await this.confirmation.confirm(
      'uninstall',
      this.deps.config.uninstallConfirmations,
      [`This deletes ${this.targetDir}`, 'and everything inside it.']
    );

    if (!confirmed) {
      this.transition({ name: 'menu', notice: { kind: 'info', message: 'Uninstall cancelled.' } });
      return;
    }

    const remove = this.deps.uninstaller ?? defaultUninstall;
    const result = await remove(this.targetDir, this.deps.locator.getInstallerDir());

    if (!result.ok) {
      this.transition({ name: 'menu', notice: { kind: 'error', message: describeError(result.error) } });
      return;
    }

    this.transition({
      name: 'welcome',
      auto: false,
      notice: { kind: 'success', message: 'Image Tea was uninstalled.' },
    });
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function formatNotice(notice: Notice): string {
  switch (notice.kind) {
    case 'success': return success(`✓ ${notice.message}`);
    case 'error': return errorColor(`✗ ${notice.message}`);
    case 'info': return info(notice.message);
  }
}
