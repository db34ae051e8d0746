/**
 * Kind predicates for class-like declarations
 */

import type { ClassOrObjectNode } from "@classview/frontend";

/** Traits and annotation classes are interfaces in the target model */
export const isInterfaceDeclaration = (decl: ClassOrObjectNode): boolean =>
  decl.kind === "class" && (decl.isTrait || decl.modifiers.has("annotation"));

export const isAnnotationDeclaration = (decl: ClassOrObjectNode): boolean =>
  decl.kind === "class" && decl.modifiers.has("annotation");

export const isEnumDeclaration = (decl: ClassOrObjectNode): boolean =>
  decl.kind === "class" && decl.modifiers.has("enum");

/** Objects never declare type parameters */
export const hasTypeParameterDeclarations = (
  decl: ClassOrObjectNode
): boolean => decl.kind === "class" && decl.typeParameters.length > 0;
