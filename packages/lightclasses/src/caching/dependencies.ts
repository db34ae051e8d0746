/**
 * Dependency snapshots for tracked caches
 */

import type { ModificationTracker } from "@classview/frontend";

export type DependencySnapshot = {
  readonly tracker: ModificationTracker;
  readonly modificationCount: number;
};

export const snapshotDependencies = (
  trackers: readonly ModificationTracker[]
): readonly DependencySnapshot[] =>
  trackers.map((tracker) => ({
    tracker,
    modificationCount: tracker.modificationCount,
  }));

export const isUpToDate = (
  snapshots: readonly DependencySnapshot[]
): boolean =>
  snapshots.every(
    (s) => s.tracker.modificationCount === s.modificationCount
  );
