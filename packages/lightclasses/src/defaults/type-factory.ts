/**
 * Default type factory
 *
 * Types record the tracker count they were created at and stop being
 * valid once it moves.
 */

import type { ModificationTracker } from "@classview/frontend";
import type { TypeFactory } from "../contracts/type-factory.js";

export const createTypeFactory = (
  tracker: ModificationTracker
): TypeFactory => ({
  createClassReference: (qualifiedName, scope) => ({
    kind: "classReference",
    qualifiedName,
    scope,
  }),
  createType: (reference) => {
    const createdAt = tracker.modificationCount;
    return {
      kind: "classType",
      reference,
      isValid: () => tracker.modificationCount === createdAt,
    };
  },
});
