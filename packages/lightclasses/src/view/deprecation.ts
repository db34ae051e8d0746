/**
 * Deprecation detection
 */

import {
  userTypeToQualifiedName,
  type ClassDescriptor,
  type ClassOrObjectNode,
} from "@classview/frontend";

/**
 * True when an annotation on the declaration names the deprecation
 * annotation. Only plain user types are considered; nullable and function
 * types are skipped, as are references with a missing segment.
 *
 * A bare short name also matches, since unresolved references are compared
 * by text. This can report a same-named annotation from another package.
 */
export const hasDeprecatedAnnotation = (
  decl: ClassOrObjectNode,
  deprecated: ClassDescriptor
): boolean =>
  decl.annotations.some((entry) => {
    const typeElement = entry.typeReference?.typeElement;
    if (typeElement === undefined || typeElement.kind !== "userType") {
      return false;
    }

    const fqName = userTypeToQualifiedName(typeElement);
    if (fqName === undefined) return false;

    return fqName === deprecated.fqName || fqName === deprecated.name;
  });
