/**
 * Outermost declaration locator
 *
 * Finds the unit of stub computation for a declaration. Stubs are always
 * built for a whole outermost class, so a nested class shares the bundle
 * of the class that contains it.
 */

import {
  getOutermostClassOrObject,
  getTopLevelDeclaration,
  isLocal,
  printDeclaration,
  type ClassOrObjectNode,
} from "@classview/frontend";
import type { StubRoot } from "./contracts/stub-builder.js";
import { LocalDeclarationError } from "./errors.js";

/**
 * Outermost class or object whose parent is the file
 *
 * @throws LocalDeclarationError when the declaration is local
 */
export const locateOutermost = (
  decl: ClassOrObjectNode
): ClassOrObjectNode => {
  const outermost = getOutermostClassOrObject(decl);
  if (outermost === undefined) {
    throw new LocalDeclarationError(printDeclaration(decl));
  }
  return outermost;
};

/**
 * Stub root (cache key) for any class or object, local ones included.
 * Local declarations are computed with the top-level declaration that
 * contains them, which may be a function or property.
 */
export const findStubRoot = (decl: ClassOrObjectNode): StubRoot =>
  isLocal(decl) ? getTopLevelDeclaration(decl) : locateOutermost(decl);
