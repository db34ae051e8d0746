/**
 * Minimal class contract of the target type system
 *
 * Light classes implement it, and so does anything else a light class can
 * be compared with (compiled classes, facades, mirrors of other classes).
 */

export type TargetClass = {
  getName(): string | undefined;
  getQualifiedName(): string | undefined;
};
