/**
 * Default member mirrors
 *
 * Members of a class or object belong to that class's light class.
 * Package-level functions and properties belong to the package facade.
 * Local functions and properties have no counterpart.
 */

import {
  internalNameToQualifiedName,
  isClassOrObject,
  type ClassOrObjectNode,
  type FunctionNode,
  type PropertyNode,
  type SourceFileNode,
} from "@classview/frontend";
import type {
  MemberMirrors,
  MethodMirror,
} from "../contracts/member-mirrors.js";
import type { TargetClass } from "../contracts/target-class.js";
import {
  getPackageFacadeInternalName,
  getPackageFacadeName,
} from "../naming/binary-names.js";
import { capitalize } from "../naming/identifiers.js";

type MemberOwner = {
  readonly containingClass: TargetClass;
  readonly isInFileFacade: boolean;
};

const packageFacade = (file: SourceFileNode): TargetClass => {
  const name = getPackageFacadeName(file.packageName);
  const qualifiedName = internalNameToQualifiedName(
    getPackageFacadeInternalName(file.packageName)
  );
  return {
    getName: () => name,
    getQualifiedName: () => qualifiedName,
  };
};

export const createMemberMirrors = (
  getLightClass: (decl: ClassOrObjectNode) => TargetClass | undefined
): MemberMirrors => {
  const findOwner = (
    member: FunctionNode | PropertyNode
  ): MemberOwner | undefined => {
    const parent = member.parent;
    if (parent.kind === "file") {
      return {
        containingClass: packageFacade(member.file),
        isInFileFacade: true,
      };
    }
    if (!isClassOrObject(parent)) return undefined;

    const containingClass = getLightClass(parent);
    return containingClass === undefined
      ? undefined
      : { containingClass, isInFileFacade: false };
  };

  const mirror = (
    member: FunctionNode | PropertyNode,
    name: string
  ): MethodMirror | undefined => {
    const owner = findOwner(member);
    return owner === undefined ? undefined : { name, ...owner };
  };

  return {
    getMethod: (fn) =>
      fn.name === undefined ? undefined : mirror(fn, fn.name),
    getPropertyAccessors: (property) => ({
      getter:
        property.name === undefined
          ? undefined
          : mirror(property, `get${capitalize(property.name)}`),
    }),
  };
};
