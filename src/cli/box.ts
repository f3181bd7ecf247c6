/**
 * Box Drawing Utilities
 * Terminal box rendering and dimension helpers
 */

import { padRight, truncate, visibleLength } from './utils';

// ---------------------------------------------------------------------------
// Box Drawing Characters
// ---------------------------------------------------------------------------

export const BOX_CHARS = {
  topLeft: '╔',
  topRight: '╗',
  bottomLeft: '╚',
  bottomRight: '╝',
  horizontal: '═',
  vertical: '║',
  teeRight: '╟',
  teeLeft: '╢',
  separator: '─',
} as const;

export const BAR_CHARS = {
  filled: '█',
  empty: '░',
} as const;

// ---------------------------------------------------------------------------
// Terminal Dimensions
// ---------------------------------------------------------------------------

export const MIN_FRAME_WIDTH = 20;

export function getTerminalWidth(stream: { columns?: number } = process.stdout): number {
  return stream.columns ?? 80;
}

/**
 * Frame width for a terminal: the preferred width, shrunk so the box plus its
 * two border columns fits, never below MIN_FRAME_WIDTH.
 */
export function fitWidth(preferred: number, terminalColumns: number): number {
  return Math.max(MIN_FRAME_WIDTH, Math.min(preferred, terminalColumns - 2));
}

// ---------------------------------------------------------------------------
// Box Drawing
// ---------------------------------------------------------------------------

export interface BoxOptions {
  /** Inner width between the vertical borders */
  width: number;
  title?: string;
  footer?: string[];
  padding?: number;
}

export function drawBox(content: string[], options: BoxOptions): string[] {
  const width = Math.max(MIN_FRAME_WIDTH, options.width);
  const padding = options.padding ?? 1;
  const paddingStr = ' '.repeat(padding);
  const contentWidth = width - padding * 2;

  const row = (line: string) =>
    `${BOX_CHARS.vertical}${paddingStr}${padRight(truncate(line, contentWidth), contentWidth)}${paddingStr}${BOX_CHARS.vertical}`;

  const lines: string[] = [topBorder(width, options.title)];

  for (const line of content) {
    lines.push(row(line));
  }

  if (options.footer && options.footer.length > 0) {
    lines.push(BOX_CHARS.teeRight + BOX_CHARS.separator.repeat(width) + BOX_CHARS.teeLeft);
    for (const line of options.footer) {
      lines.push(row(line));
    }
  }

  lines.push(BOX_CHARS.bottomLeft + BOX_CHARS.horizontal.repeat(width) + BOX_CHARS.bottomRight);

  return lines;
}

function topBorder(width: number, title?: string): string {
  if (!title) {
    return BOX_CHARS.topLeft + BOX_CHARS.horizontal.repeat(width) + BOX_CHARS.topRight;
  }

  const titlePart = ` ${truncate(title, width - 4)} `;
  const remainingWidth = width - visibleLength(titlePart);
  const leftDashes = Math.floor(remainingWidth / 2);
  const rightDashes = remainingWidth - leftDashes;
  return BOX_CHARS.topLeft
    + BOX_CHARS.horizontal.repeat(leftDashes)
    + titlePart
    + BOX_CHARS.horizontal.repeat(rightDashes)
    + BOX_CHARS.topRight;
}

// ---------------------------------------------------------------------------
// Progress Bar
// ---------------------------------------------------------------------------

export const PROGRESS_BAR_WIDTH = 40;

export function clampFraction(fraction: number): number {
  if (!Number.isFinite(fraction)) return 0;
  return Math.min(1, Math.max(0, fraction));
}

/** `[████░░░░]  50%`, the bar shrinking to fit `maxWidth` visible columns. */
export function drawProgressBar(fraction: number, maxWidth: number): string {
  const clamped = clampFraction(fraction);
  const percent = Math.floor(clamped * 100);
  const percentStr = `${String(percent).padStart(3)}%`;
  const barWidth = Math.max(1, Math.min(PROGRESS_BAR_WIDTH, maxWidth - percentStr.length - 3));
  const filled = Math.floor(barWidth * clamped);
  const bar = BAR_CHARS.filled.repeat(filled) + BAR_CHARS.empty.repeat(barWidth - filled);
  return `[${bar}] ${percentStr}`;
}
