/**
 * Qualified and internal (binary) names
 *
 * Qualified:  geo.Shape.Corner
 * Internal:   geo/Shape$Corner  (package path with "/", nesting with "$")
 */

export const shortName = (qualifiedName: string): string => {
  const lastDot = qualifiedName.lastIndexOf(".");
  return lastDot === -1 ? qualifiedName : qualifiedName.slice(lastDot + 1);
};

/**
 * Qualified name for an internal name, treating every "$" as a nesting
 * separator (names containing a literal "$" cannot be told apart).
 */
export const internalNameToQualifiedName = (internalName: string): string =>
  internalName.replace(/[/$]/g, ".");

export const packageToInternalPath = (packageName: string): string =>
  packageName.replace(/\./g, "/");
