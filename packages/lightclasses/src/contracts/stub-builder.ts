/**
 * Stub-building pipeline contract
 */

import type {
  ClassDescriptor,
  ClassOrObjectNode,
  TopLevelDeclaration,
} from "@classview/frontend";
import type { StubFile } from "../stubs/types.js";

/**
 * Unit of stub computation and cache key. For non-local declarations this
 * is the outermost class or object; local declarations are computed with
 * the top-level function, property or class that contains them.
 */
export type StubRoot = TopLevelDeclaration;

/**
 * Resolved view of one declaration inside a bundle. The descriptor carries
 * the resolved supertypes.
 */
export type ClassInfo = {
  readonly declaration: ClassOrObjectNode;
  readonly internalName: string;
  readonly descriptor: ClassDescriptor;
};

export type StubBundle = {
  readonly root: StubRoot;
  readonly stubFile: StubFile;
  /** Every class or object under the root (the root itself included) */
  readonly classes: ReadonlyMap<ClassOrObjectNode, ClassInfo>;
};

/**
 * Deterministic, side-effect-free function of the root's current content
 */
export type StubBuilder = {
  readonly build: (root: StubRoot) => StubBundle;
  readonly buildAsync?: (root: StubRoot) => Promise<StubBundle>;
};
