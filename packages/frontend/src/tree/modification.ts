/**
 * Modification tracking for source trees
 *
 * Caches built on top of a tree record the modification counts of the
 * trackers they depend on and treat any difference as staleness.
 */

export type ModificationTracker = {
  readonly modificationCount: number;
};

/**
 * Counter bumped by the host whenever the content it guards changes
 */
export class SimpleModificationTracker implements ModificationTracker {
  private count = 0;

  get modificationCount(): number {
    return this.count;
  }

  incModificationCount(): void {
    this.count++;
  }
}

/**
 * Per-file tracker. A file stops being valid once it has been replaced
 * (e.g. reparsed); views and caches built on it must not outlive that.
 */
export class FileModificationTracker extends SimpleModificationTracker {
  private valid = true;

  get isValid(): boolean {
    return this.valid;
  }

  invalidate(): void {
    this.valid = false;
    this.incModificationCount();
  }
}
