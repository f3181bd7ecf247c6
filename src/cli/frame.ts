/**
 * Frame Renderer
 * Draws the installer's bordered frame and redraws it in place
 */

import { drawBox, drawProgressBar, fitWidth, getTerminalWidth } from './box';
import { bold, dim, visibleLength } from './utils';
import type { ProgressPhase } from '../core/types';

// ---------------------------------------------------------------------------
// Output Target
// ---------------------------------------------------------------------------

export interface FrameOutput {
  write(chunk: string): unknown;
  isTTY?: boolean;
  columns?: number;
}

const CURSOR_UP = (n: number) => `\x1b[${n}A`;
const CLEAR_BELOW = '\r\x1b[0J';
const HIDE_CURSOR = '\x1b[?25l';
const SHOW_CURSOR = '\x1b[?25h';

// ---------------------------------------------------------------------------
// Renderer Contract
// ---------------------------------------------------------------------------

export interface Renderer {
  renderFrame(title: string, body: string[], footer?: string[]): void;
  renderProgress(phase: ProgressPhase, fraction: number, detail?: string): void;
}

export interface FrameRendererOptions {
  output?: FrameOutput;
  /** Preferred inner width; shrunk to the terminal */
  width?: number;
}

const PHASE_TITLES: Record<ProgressPhase, string> = {
  downloading: 'Downloading',
  extracting: 'Extracting',
};

// ---------------------------------------------------------------------------
// Frame Renderer
// ---------------------------------------------------------------------------

export class FrameRenderer implements Renderer {
  private readonly output: FrameOutput;
  private readonly preferredWidth: number;
  private previousRows = 0;
  private lastFrame: string[] = [];
  private cursorHidden = false;

  constructor(options: FrameRendererOptions = {}) {
    this.output = options.output ?? process.stdout;
    this.preferredWidth = options.width ?? 60;
  }

  renderFrame(title: string, body: string[], footer?: string[]): void {
    const columns = getTerminalWidth(this.output);
    const lines = drawBox(body, {
      width: fitWidth(this.preferredWidth, columns),
      title,
      footer,
    });

    let out = '';
    if (this.output.isTTY && this.previousRows > 0) {
      out += CURSOR_UP(this.previousRows) + CLEAR_BELOW;
    }
    out += lines.join('\n') + '\n';
    this.output.write(out);

    this.lastFrame = lines;
    this.previousRows = countRows(lines, columns);
  }

  renderProgress(phase: ProgressPhase, fraction: number, detail?: string): void {
    const innerWidth = fitWidth(this.preferredWidth, getTerminalWidth(this.output)) - 2;
    const body = [
      '',
      bold(`${PHASE_TITLES[phase]}...`),
      '',
      drawProgressBar(fraction, innerWidth),
    ];
    if (detail) body.push(dim(detail));
    body.push('');

    this.renderFrame(PHASE_TITLES[phase], body, [dim('Please wait, this may take a moment.')]);
  }

  getLastFrame(): string[] {
    return [...this.lastFrame];
  }

  hideCursor(): void {
    if (!this.output.isTTY || this.cursorHidden) return;
    this.output.write(HIDE_CURSOR);
    this.cursorHidden = true;
  }

  showCursor(): void {
    if (!this.cursorHidden) return;
    this.output.write(SHOW_CURSOR);
    this.cursorHidden = false;
  }
}

/** Physical terminal rows a frame occupies once long lines wrap. */
function countRows(lines: string[], columns: number): number {
  const width = Math.max(1, columns);
  return lines.reduce((rows, line) => rows + Math.max(1, Math.ceil(visibleLength(line) / width)), 0);
}
