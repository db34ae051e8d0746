/**
 * Stub cache
 *
 * Memoizes one stub bundle per stub root. An entry depends on the root's
 * file tracker and on the context-wide modification tracker; a change in
 * either makes it stale, and the next request recomputes it.
 *
 * Entries are keyed weakly by root identity, so dropping a tree drops its
 * stubs.
 */

import {
  printDeclaration,
  type ClassOrObjectNode,
  type ModificationTracker,
} from "@classview/frontend";
import type {
  ClassInfo,
  StubBuilder,
  StubBundle,
  StubRoot,
} from "../contracts/stub-builder.js";
import { InvariantViolationError } from "../errors.js";
import { findStubRoot } from "../locator.js";
import {
  type DependencySnapshot,
  isUpToDate,
  snapshotDependencies,
} from "./dependencies.js";

type CacheEntry = {
  readonly bundle: StubBundle;
  readonly dependencies: readonly DependencySnapshot[];
};

/**
 * Marks a root whose synchronous computation has started but not finished.
 * Meeting it again on the same root means the builder re-entered itself.
 */
const IN_PROGRESS = "in-progress";

type CacheSlot = CacheEntry | typeof IN_PROGRESS;

type PendingComputation = {
  readonly promise: Promise<StubBundle>;
  readonly dependencies: readonly DependencySnapshot[];
};

export type StubCacheOptions = {
  /** Context-wide tracker for changes outside any single file */
  readonly modificationTracker: ModificationTracker;
  readonly verbose?: boolean;
};

const describeRoot = (root: StubRoot): string =>
  `${root.file.name}:${root.name ?? "<anonymous>"}`;

export class StubCache {
  private entries = new WeakMap<StubRoot, CacheSlot>();
  private readonly inFlight = new Map<StubRoot, PendingComputation>();
  /** Epoch of the last invalidate per root; a computation started before it is discarded */
  private invalidatedAt = new WeakMap<StubRoot, number>();
  private clearedAt = 0;
  private epoch = 0;
  private readonly builder: StubBuilder;
  private readonly modificationTracker: ModificationTracker;
  private readonly verbose: boolean;

  constructor(builder: StubBuilder, options: StubCacheOptions) {
    this.builder = builder;
    this.modificationTracker = options.modificationTracker;
    this.verbose = options.verbose ?? false;
  }

  /**
   * Current bundle for `root`, computing it when absent or stale
   */
  getBundle(root: StubRoot): StubBundle {
    const fresh = this.lookupFresh(root);
    if (fresh !== undefined) return fresh;

    const dependencies = this.snapshot(root);
    const startedAt = this.epoch;
    this.log(`Computing stubs for ${describeRoot(root)}`);
    this.entries.set(root, IN_PROGRESS);

    let bundle: StubBundle;
    try {
      bundle = this.builder.build(root);
    } catch (err) {
      this.entries.delete(root);
      throw err;
    }
    return this.publish(root, bundle, dependencies, startedAt);
  }

  /**
   * Asynchronous variant. Concurrent requests for the same root share one
   * computation and all observe the same bundle. A request made after the
   * root changed does not join a computation that started before the change.
   */
  async getBundleAsync(root: StubRoot): Promise<StubBundle> {
    const fresh = this.lookupFresh(root);
    if (fresh !== undefined) return fresh;

    const pending = this.inFlight.get(root);
    if (pending !== undefined && isUpToDate(pending.dependencies)) {
      return pending.promise;
    }

    const dependencies = this.snapshot(root);
    const startedAt = this.epoch;
    this.log(`Computing stubs asynchronously for ${describeRoot(root)}`);

    const promise: Promise<StubBundle> = this.buildAsync(root)
      .then((bundle) => this.publish(root, bundle, dependencies, startedAt))
      .finally(() => {
        if (this.inFlight.get(root)?.promise === promise) {
          this.inFlight.delete(root);
        }
      });
    this.inFlight.set(root, { promise, dependencies });
    return promise;
  }

  /**
   * Per-declaration info from the bundle of the declaration's stub root
   *
   * @throws InvariantViolationError when the bundle has no entry for it
   */
  getClassInfo(decl: ClassOrObjectNode): ClassInfo {
    const root = findStubRoot(decl);
    const info = this.getBundle(root).classes.get(decl);
    if (info === undefined) {
      throw new InvariantViolationError({
        message: `No class info for ${decl.name ?? "<anonymous>"} in the stubs of ${describeRoot(root)}`,
        context: printDeclaration(decl),
      });
    }
    return info;
  }

  /**
   * Drop the entry for `root`. A computation still running for it completes
   * for its own callers but is never published.
   */
  invalidate(root: StubRoot): void {
    this.entries.delete(root);
    this.inFlight.delete(root);
    this.invalidatedAt.set(root, ++this.epoch);
  }

  clear(): void {
    this.entries = new WeakMap();
    this.invalidatedAt = new WeakMap();
    this.inFlight.clear();
    this.clearedAt = ++this.epoch;
  }

  private lookupFresh(root: StubRoot): StubBundle | undefined {
    const slot = this.entries.get(root);
    if (slot === undefined) return undefined;

    if (slot === IN_PROGRESS) {
      throw new InvariantViolationError({
        message: `Recursive stub computation for ${describeRoot(root)}`,
      });
    }

    if (isUpToDate(slot.dependencies)) return slot.bundle;

    this.log(`Dropping stale stubs for ${describeRoot(root)}`);
    this.entries.delete(root);
    return undefined;
  }

  /**
   * Store a finished computation unless a fresh entry was published first,
   * in which case that entry wins and every caller sees the same bundle.
   * A result that is already stale, or that an invalidate overtook, is
   * returned without being stored.
   */
  private publish(
    root: StubRoot,
    bundle: StubBundle,
    dependencies: readonly DependencySnapshot[],
    startedAt: number
  ): StubBundle {
    const overtaken =
      this.clearedAt > startedAt ||
      (this.invalidatedAt.get(root) ?? 0) > startedAt;
    if (overtaken || !isUpToDate(dependencies)) {
      this.log(`Discarding outdated stubs for ${describeRoot(root)}`);
      if (this.entries.get(root) === IN_PROGRESS) this.entries.delete(root);
      return bundle;
    }

    const current = this.entries.get(root);
    if (
      current !== undefined &&
      current !== IN_PROGRESS &&
      isUpToDate(current.dependencies)
    ) {
      return current.bundle;
    }
    this.entries.set(root, { bundle, dependencies });
    return bundle;
  }

  private buildAsync(root: StubRoot): Promise<StubBundle> {
    if (this.builder.buildAsync !== undefined) {
      return this.builder.buildAsync(root);
    }
    return Promise.resolve().then(() => this.builder.build(root));
  }

  private snapshot(root: StubRoot): readonly DependencySnapshot[] {
    return snapshotDependencies([root.file.tracker, this.modificationTracker]);
  }

  private log(message: string): void {
    if (this.verbose) console.log(`[Stub Cache] ${message}`);
  }
}
