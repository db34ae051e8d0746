/**
 * Lightweight counterparts of source members in the target model
 */

import type { FunctionNode, PropertyNode } from "@classview/frontend";
import type { TargetClass } from "./target-class.js";

export type MethodMirror = {
  readonly name: string;
  readonly containingClass: TargetClass;
  /** Member of the file facade that holds package-level functions */
  readonly isInFileFacade: boolean;
};

export type PropertyAccessorMirrors = {
  readonly getter: MethodMirror | undefined;
};

export type MemberMirrors = {
  /** Undefined for functions without a counterpart (local functions) */
  readonly getMethod: (fn: FunctionNode) => MethodMirror | undefined;
  readonly getPropertyAccessors: (
    property: PropertyNode
  ) => PropertyAccessorMirrors;
};
