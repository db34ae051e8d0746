/**
 * Type and reference construction in the target model
 */

export type SearchScope = {
  readonly kind: "all";
};

export const ALL_SCOPE: SearchScope = { kind: "all" };

export type ClassReference = {
  readonly kind: "classReference";
  readonly qualifiedName: string;
  readonly scope: SearchScope;
};

export type ClassType = {
  readonly kind: "classType";
  readonly reference: ClassReference;
  /** False once the type was built against a model that has since changed */
  readonly isValid: () => boolean;
};

export type TypeFactory = {
  readonly createClassReference: (
    qualifiedName: string,
    scope: SearchScope
  ) => ClassReference;
  readonly createType: (reference: ClassReference) => ClassType;
};
