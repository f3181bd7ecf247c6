/**
 * Temporary Path Tracking
 * Partial downloads and staging trees that must not outlive an interrupted run
 */

import { rmSync } from 'fs';
import { getLogger } from '../infra/logger';

const pending = new Set<string>();

/** Register an in-flight path; the returned function forgets it again. */
export function trackTemporaryPath(path: string): () => void {
  pending.add(path);
  return () => {
    pending.delete(path);
  };
}

export function trackedPaths(): string[] {
  return [...pending];
}

/**
 * Synchronously delete every tracked path. Runs from shutdown handlers,
 * where nothing asynchronous completes.
 */
export function removeTrackedPaths(): void {
  for (const path of pending) {
    try {
      rmSync(path, { recursive: true, force: true });
    } catch (err) {
      getLogger().child('cleanup').warn('Could not remove temporary path', {
        path,
        error: err instanceof Error ? err.message : String(err),
      });
    }
    pending.delete(path);
  }
}
