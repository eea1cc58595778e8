import type { Snapshot, Story } from '../types';
import { debugLogger } from '../utils/debug-logger';

export const EMPTY_SNAPSHOT: Snapshot = Object.freeze([]);

/**
 * Owns the currently published snapshot.
 *
 * Readers take the current reference and work on it; the refresh job replaces it
 * with a new frozen array in a single assignment. A reader therefore holds either
 * the old or the new snapshot, never a mix, and never waits.
 */
export class SnapshotStore {
  private snapshot: Snapshot = EMPTY_SNAPSHOT;
  private lastPublishedAt: Date | null = null;
  private publishCount = 0;

  current(): Snapshot {
    return this.snapshot;
  }

  /**
   * Replace the current snapshot. The input is copied, so later changes
   * to the caller's array are not visible to readers.
   */
  publish(stories: readonly Story[]): Snapshot {
    const next: Snapshot = stories.length === 0 ? EMPTY_SNAPSHOT : Object.freeze([...stories]);

    this.snapshot = next;
    this.lastPublishedAt = new Date();
    this.publishCount++;

    debugLogger.info('SNAPSHOT', 'Published snapshot', {
      stories: next.length,
      version: this.publishCount,
    });

    return next;
  }

  publishedAt(): Date | null {
    return this.lastPublishedAt;
  }

  /** Number of publishes so far; 0 until the first refresh completes */
  version(): number {
    return this.publishCount;
  }

  clear(): void {
    this.snapshot = EMPTY_SNAPSHOT;
  }
}
