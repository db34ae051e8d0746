import type { ClassOrObjectNode } from "@classview/frontend";

/**
 * Predicts the internal (binary) name a non-local declaration compiles to,
 * e.g. "geo/Shape$Corner". Undefined means the declaration gets no view.
 */
export type BinaryNamePredictor = {
  readonly predict: (decl: ClassOrObjectNode) => string | undefined;
};
