/**
 * Main Menu
 * Action table and key mapping
 */

import type { MenuAction } from './types';

export interface MenuItem {
  action: MenuAction;
  key: string;
  label: string;
}

export const MENU_ITEMS: readonly MenuItem[] = [
  { action: 'launch', key: 'L', label: 'Launch Image Tea' },
  { action: 'reinstall', key: 'R', label: 'Reinstall (download the latest release)' },
  { action: 'uninstall', key: 'U', label: 'Uninstall' },
  { action: 'exit', key: 'X', label: 'Exit' },
];

/** Case-insensitive; null for any key that is not a trigger. */
export function parseMenuKey(key: string): MenuAction | null {
  const upper = key.toUpperCase();
  return MENU_ITEMS.find((item) => item.key === upper)?.action ?? null;
}
