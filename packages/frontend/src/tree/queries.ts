/**
 * Containment queries over the source tree
 */

import {
  isClassOrObject,
  isLocalContainer,
  type ClassOrObjectNode,
  type DeclarationNode,
  type LocalContainerNode,
  type TopLevelDeclaration,
  type UserTypeElement,
} from "./nodes.js";

/**
 * True when the declaration sits (transitively) inside a function,
 * property or initializer rather than only inside classes and the file.
 */
export const isLocal = (decl: DeclarationNode): boolean => {
  let current: DeclarationNode = decl;
  while (true) {
    const parent = current.parent;
    if (parent.kind === "file") return false;
    if (isLocalContainer(parent)) return true;
    current = parent;
  }
};

/**
 * True when the declaration is a direct child of its file
 */
export const isTopLevel = (decl: DeclarationNode): boolean =>
  decl.parent.kind === "file";

/**
 * Outermost class or object whose parent is the file, or undefined when
 * the declaration is local (no chain of class bodies reaches the file).
 */
export const getOutermostClassOrObject = (
  decl: ClassOrObjectNode
): ClassOrObjectNode | undefined => {
  let current: ClassOrObjectNode = decl;
  while (true) {
    const parent = current.parent;
    if (parent.kind === "file") return current;
    if (!isClassOrObject(parent)) return undefined;
    current = parent;
  }
};

/**
 * Topmost declaration of any kind whose parent is the file
 */
export const getTopLevelDeclaration = (
  decl: DeclarationNode
): TopLevelDeclaration => {
  let current: DeclarationNode = decl;
  while (true) {
    const parent = current.parent;
    if (parent.kind === "file") break;
    current = parent;
  }
  if (current.kind === "initializer") {
    throw new Error("ICE: initializer declared at file level");
  }
  return current;
};

/**
 * Nearest enclosing function, property or initializer
 */
export const getNearestLocalContainer = (
  decl: DeclarationNode
): LocalContainerNode | undefined => {
  let current: DeclarationNode = decl;
  while (true) {
    const parent = current.parent;
    if (parent.kind === "file") return undefined;
    if (isLocalContainer(parent)) return parent;
    current = parent;
  }
};

/**
 * Nearest enclosing class or object, looking through local containers
 */
export const getEnclosingClassOrObject = (
  decl: DeclarationNode
): ClassOrObjectNode | undefined => {
  let current: DeclarationNode = decl;
  while (true) {
    const parent = current.parent;
    if (parent.kind === "file") return undefined;
    if (isClassOrObject(parent)) return parent;
    current = parent;
  }
};

/**
 * Dotted name of a user type reference, undefined when any segment is
 * missing
 */
export const userTypeToQualifiedName = (
  userType: UserTypeElement
): string | undefined => {
  const segments: string[] = [];
  let current: UserTypeElement | undefined = userType;
  while (current) {
    if (current.referencedName === undefined) return undefined;
    segments.unshift(current.referencedName);
    current = current.qualifier;
  }
  return segments.join(".");
};
