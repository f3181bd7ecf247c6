/**
 * Shared CLI Utilities
 * Colors, text measurement helpers, byte formatting, shutdown hooks
 */

import { describeError } from '../core/errors';
import { getLogger } from '../infra/logger';

// ---------------------------------------------------------------------------
// ANSI Colors
// ---------------------------------------------------------------------------

const COLORS = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  cyan: '\x1b[36m',
} as const;

export type ColorName = keyof typeof COLORS;

export function color(text: string, colorName: ColorName): string {
  const isColorEnabled = process.stdout.isTTY && !process.env.NO_COLOR;
  if (!isColorEnabled) return text;
  return `${COLORS[colorName]}${text}${COLORS.reset}`;
}

export const bold = (text: string) => color(text, 'bold');
export const dim = (text: string) => color(text, 'dim');
export const success = (text: string) => color(text, 'green');
export const error = (text: string) => color(text, 'red');
export const warning = (text: string) => color(text, 'yellow');
export const info = (text: string) => color(text, 'cyan');

// ---------------------------------------------------------------------------
// Text Helpers
// ---------------------------------------------------------------------------

const ANSI_PATTERN = /\x1b\[[0-9;]*m/g;

export function stripAnsi(text: string): string {
  return text.replace(ANSI_PATTERN, '');
}

export function visibleLength(text: string): number {
  return stripAnsi(text).length;
}

export function padRight(text: string, width: number): string {
  const padding = Math.max(0, width - visibleLength(text));
  return text + ' '.repeat(padding);
}

/**
 * Cut a line to `width` visible columns, ending in an ellipsis.
 * Colour codes are dropped from truncated lines.
 */
export function truncate(text: string, width: number): string {
  if (width <= 0) return '';
  if (visibleLength(text) <= width) return text;
  const plain = stripAnsi(text);
  return width === 1 ? '…' : plain.slice(0, width - 1) + '…';
}

export function formatBytes(bytes: number): string {
  const mb = bytes / (1024 * 1024);
  return `${mb.toFixed(1)} MB`;
}

// ---------------------------------------------------------------------------
// Error Printing
// ---------------------------------------------------------------------------

export const printError = (err: unknown) => console.error(`${error('Error:')} ${describeError(err)}`);

// ---------------------------------------------------------------------------
// Graceful Shutdown
// ---------------------------------------------------------------------------

const shutdownHandlers: Array<() => void> = [];
let shutdownRegistered = false;

/**
 * Register a synchronous cleanup step run on SIGINT/SIGTERM and on exit.
 * Handlers run once, in registration order.
 */
export function onShutdown(handler: () => void): void {
  shutdownHandlers.push(handler);

  if (shutdownRegistered) return;
  shutdownRegistered = true;

  let ran = false;
  const runHandlers = () => {
    if (ran) return;
    ran = true;
    for (const h of shutdownHandlers) {
      try {
        h();
      } catch (err) {
        getLogger().warn('Shutdown handler failed', { error: describeError(err) });
      }
    }
  };

  process.on('exit', runHandlers);
  process.on('SIGINT', () => {
    runHandlers();
    process.exit(130);
  });
  process.on('SIGTERM', () => {
    runHandlers();
    process.exit(143);
  });
}
