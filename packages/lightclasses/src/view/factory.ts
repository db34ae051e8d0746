/**
 * Light class factory
 */

import {
  internalNameToQualifiedName,
  isLocal,
  type ClassOrObjectNode,
} from "@classview/frontend";
import type { LightClassContext } from "../context.js";
import { AnonymousLightClass } from "./anonymous.js";
import { LightClassForDeclaration } from "./light-class.js";

/**
 * Internal name of the class a declaration compiles to. Local names are
 * only known to the stub pipeline, so they come from the stub cache.
 */
const getInternalName = (
  context: LightClassContext,
  decl: ClassOrObjectNode
): string | undefined =>
  isLocal(decl)
    ? context.stubCache.getClassInfo(decl).internalName
    : context.predictor.predict(decl);

/**
 * Light class for a declaration, or undefined when the declaration gets
 * none (built-in packages, unpredictable names). Object literals get the
 * anonymous specialization.
 */
export const createLightClass = (
  context: LightClassContext,
  decl: ClassOrObjectNode
): LightClassForDeclaration | undefined => {
  if (context.config.builtInPackages.has(decl.file.packageName)) {
    return undefined;
  }

  const internalName = getInternalName(context, decl);
  if (internalName === undefined) return undefined;

  const qualifiedName = internalNameToQualifiedName(internalName);
  return decl.kind === "object" && decl.isLiteral
    ? new AnonymousLightClass(context, qualifiedName, decl)
    : new LightClassForDeclaration(context, qualifiedName, decl);
};
