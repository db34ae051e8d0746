/**
 * Modifier translation
 *
 * Source modifiers map onto the target modifier set as follows:
 *
 * public, internal  -> public
 * protected         -> protected
 * final             -> final
 * private           -> private when nested, public at file level
 *
 * then:
 * - no private/protected: public
 * - abstract or interface: abstract; otherwise final unless open
 * - nested and not inner: static
 */

import type { ClassOrObjectNode, ModifierKeyword } from "@classview/frontend";
import type { StubModifier } from "../stubs/types.js";

export type TargetModifier = StubModifier;

const MODIFIER_ORDER: readonly TargetModifier[] = [
  "public",
  "protected",
  "private",
  "abstract",
  "static",
  "final",
];

const DIRECT_MAPPING: readonly (readonly [ModifierKeyword, TargetModifier])[] =
  [
    ["public", "public"],
    ["internal", "public"],
    ["protected", "protected"],
    ["final", "final"],
  ];

export const computeModifiers = (
  decl: ClassOrObjectNode,
  isInterface: boolean
): readonly TargetModifier[] => {
  // Parent is not the file: member or local declaration
  const nested = decl.parent.kind !== "file";
  const result = new Set<TargetModifier>();

  for (const [keyword, modifier] of DIRECT_MAPPING) {
    if (decl.modifiers.has(keyword)) result.add(modifier);
  }

  if (decl.modifiers.has("private")) {
    // Top-level private classes are visible in their package
    result.add(nested ? "private" : "public");
  }

  if (!result.has("private") && !result.has("protected")) {
    result.add("public");
  }

  if (decl.modifiers.has("abstract") || isInterface) {
    result.add("abstract");
  } else if (!decl.modifiers.has("open")) {
    result.add("final");
  }

  if (nested && !decl.modifiers.has("inner")) {
    result.add("static");
  }

  return MODIFIER_ORDER.filter((modifier) => result.has(modifier));
};

/**
 * Read-only modifier list of a light class
 */
export class LightModifierList {
  private readonly modifiers: readonly TargetModifier[];

  constructor(modifiers: readonly TargetModifier[]) {
    this.modifiers = modifiers;
  }

  getModifiers(): readonly TargetModifier[] {
    return this.modifiers;
  }

  hasModifierProperty(name: string): boolean {
    return this.modifiers.some((modifier) => modifier === name);
  }

  getText(): string {
    return this.modifiers.join(" ");
  }
}
