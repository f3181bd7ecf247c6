/**
 * Confirmation Flow
 * "Press Y N times" gate in front of destructive actions
 */

import { KEYS, type KeyReader } from '../cli/keypress';
import type { Renderer } from '../cli/frame';
import { bold, dim, warning } from '../cli/utils';
import type { MenuAction } from './types';

// ---------------------------------------------------------------------------
// State
// ---------------------------------------------------------------------------

export interface ConfirmationState {
  readonly action: MenuAction;
  readonly confirmationsRequired: number;
  readonly confirmationsReceived: number;
}

export type ConfirmationStep =
  | { status: 'pending'; state: ConfirmationState }
  | { status: 'confirmed' }
  | { status: 'cancelled' };

const YES_KEY = 'y';
const RESET_KEY = 'n';
const CANCEL_KEYS: ReadonlySet<string> = new Set([KEYS.ESCAPE, KEYS.INTERRUPT, KEYS.END_OF_INPUT, 'c']);

/**
 * One key against the current state. Y counts up, N starts over from zero,
 * Esc/C/Ctrl+C/end of input cancel, anything else leaves the state alone.
 */
export function applyConfirmationKey(state: ConfirmationState, key: string): ConfirmationStep {
  const lower = key.toLowerCase();

  if (CANCEL_KEYS.has(lower)) return { status: 'cancelled' };

  if (lower === YES_KEY) {
    const received = state.confirmationsReceived + 1;
    if (received >= state.confirmationsRequired) return { status: 'confirmed' };
    return { status: 'pending', state: { ...state, confirmationsReceived: received } };
  }

  if (lower === RESET_KEY) {
    return { status: 'pending', state: { ...state, confirmationsReceived: 0 } };
  }

  return { status: 'pending', state };
}

// ---------------------------------------------------------------------------
// Interactive Flow
// ---------------------------------------------------------------------------

const ACTION_LABELS: Record<MenuAction, string> = {
  launch: 'Launch',
  reinstall: 'Reinstall',
  uninstall: 'Uninstall',
  exit: 'Exit',
};

export class ConfirmationFlow {
  constructor(
    private readonly keys: KeyReader,
    private readonly renderer: Renderer
  ) {}

  async confirm(action: MenuAction, requiredCount: number, details: string[] = []): Promise<boolean> {
    let state: ConfirmationState = {
      action,
      confirmationsRequired: Math.max(1, requiredCount),
      confirmationsReceived: 0,
    };

    for (;;) {
      this.render(state, details);
      const step = applyConfirmationKey(state, await this.keys.readKey());
      if (step.status === 'confirmed') return true;
      if (step.status === 'cancelled') return false;
      state = step.state;
    }
  }

  private render(state: ConfirmationState, details: string[]): void {
    const label = ACTION_LABELS[state.action];
    const remaining = state.confirmationsRequired - state.confirmationsReceived;

    this.renderer.renderFrame(`Confirm ${label}`, [
      '',
      warning(bold(`⚠ ${label} cannot be undone.`)),
      ...details,
      '',
      `Confirmations: ${state.confirmationsReceived}/${state.confirmationsRequired}`,
      remaining === 1
        ? `Press ${bold('Y')} once more to confirm.`
        : `Press ${bold('Y')} ${remaining} more times to confirm.`,
      '',
    ], [dim('[Y] Yes   [N] Start over   [Esc/C] Cancel')]);
  }
}
