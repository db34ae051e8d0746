/**
 * Parent synthesis for local light classes
 *
 * A class declared inside a function body has no class parent in the
 * target model. It is given a placeholder method named after the nearest
 * enclosing function (or property getter), owned by that member's class;
 * inside an initializer the parent is the enclosing light class itself.
 */

import {
  getNearestLocalContainer,
  type ClassOrObjectNode,
  type LocalContainerNode,
  type SourceFileNode,
} from "@classview/frontend";
import type {
  MemberMirrors,
  MethodMirror,
} from "../contracts/member-mirrors.js";
import type { TargetClass } from "../contracts/target-class.js";

/**
 * Stands in for the package facade of one file. Named after the file so a
 * local class in a package-level function reports the file it lives in.
 */
export class FileFacadeClass implements TargetClass {
  readonly kind = "fileFacade";
  private readonly facade: TargetClass;
  private readonly fileName: string;

  constructor(facade: TargetClass, fileName: string) {
    this.facade = facade;
    this.fileName = fileName;
  }

  getName(): string {
    return this.fileName;
  }

  getQualifiedName(): string | undefined {
    return this.facade.getQualifiedName();
  }

  getFacade(): TargetClass {
    return this.facade;
  }
}

/**
 * Method placeholder used as the parent of a local light class
 */
export class LightMethod {
  readonly kind = "lightMethod";
  private readonly mirror: MethodMirror;
  private readonly name: string;
  private readonly containingClass: TargetClass;

  constructor(mirror: MethodMirror, name: string, file: SourceFileNode) {
    this.mirror = mirror;
    this.name = name;
    this.containingClass = mirror.isInFileFacade
      ? new FileFacadeClass(mirror.containingClass, file.name)
      : mirror.containingClass;
  }

  getName(): string {
    return this.name;
  }

  getContainingClass(): TargetClass {
    return this.containingClass;
  }

  getParent(): TargetClass {
    return this.containingClass;
  }

  getMirror(): MethodMirror {
    return this.mirror;
  }
}

export type LocalParentOptions = {
  readonly memberMirrors: MemberMirrors;
  readonly getLightClass: (decl: ClassOrObjectNode) => TargetClass | undefined;
};

const parentForContainer = (
  container: LocalContainerNode,
  decl: ClassOrObjectNode,
  options: LocalParentOptions
): LightMethod | TargetClass | undefined => {
  switch (container.kind) {
    case "function": {
      const mirror = options.memberMirrors.getMethod(container);
      return mirror === undefined
        ? undefined
        : new LightMethod(mirror, container.name ?? mirror.name, decl.file);
    }
    case "property": {
      const getter = options.memberMirrors.getPropertyAccessors(container).getter;
      return getter === undefined
        ? undefined
        : new LightMethod(getter, container.name ?? getter.name, decl.file);
    }
    case "initializer":
      return options.getLightClass(container.parent);
  }
};

/**
 * Synthesized parent of a local declaration, or undefined when no
 * enclosing container has a counterpart in the target model.
 * Containers without one (local functions) are skipped outward.
 */
export const computeLocalParent = (
  decl: ClassOrObjectNode,
  options: LocalParentOptions
): LightMethod | TargetClass | undefined => {
  let container = getNearestLocalContainer(decl);
  while (container !== undefined) {
    const parent = parentForContainer(container, decl, options);
    if (parent !== undefined) return parent;
    container = getNearestLocalContainer(container);
  }
  return undefined;
};
