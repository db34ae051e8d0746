/**
 * Resolved semantic model
 *
 * Descriptors are produced by name/type resolution and consumed read-only.
 */

export type ClassDescriptor = {
  readonly kind: "class";
  readonly name: string;
  readonly fqName: string;
  readonly supertypes: readonly SupertypeRef[];
};

export type SupertypeRef = {
  /** Supertype as written */
  readonly text: string;
  /** Undefined when resolution failed (error type) */
  readonly descriptor: ClassDescriptor | undefined;
};
