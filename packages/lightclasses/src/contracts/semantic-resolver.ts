import type { ClassDescriptor } from "@classview/frontend";

export type BuiltIns = {
  readonly deprecatedAnnotation: ClassDescriptor;
};

/**
 * Semantic queries the target type system cannot answer on its own
 */
export type SemanticResolver = {
  readonly builtIns: BuiltIns;
  /**
   * Whether `qualifiedName` is a direct (or, with `deep`, transitive)
   * supertype of `descriptor`
   */
  readonly checkSupertype: (
    descriptor: ClassDescriptor,
    qualifiedName: string,
    deep: boolean
  ) => boolean;
};
