/**
 * Type parameters of a light class
 */

import type { ClassOrObjectNode } from "@classview/frontend";
import type { TargetClass } from "../contracts/target-class.js";

/** Name given to a type parameter the source left unnamed */
export const NO_NAME_PLACEHOLDER = "__no_name__";

export class LightTypeParameter {
  private readonly owner: TargetClass;
  private readonly index: number;
  private readonly name: string;

  constructor(owner: TargetClass, index: number, name: string) {
    this.owner = owner;
    this.index = index;
    this.name = name;
  }

  getName(): string {
    return this.name;
  }

  getIndex(): number {
    return this.index;
  }

  getOwner(): TargetClass {
    return this.owner;
  }
}

export class LightTypeParameterList {
  private readonly parameters: readonly LightTypeParameter[];

  constructor(parameters: readonly LightTypeParameter[]) {
    this.parameters = parameters;
  }

  getTypeParameters(): readonly LightTypeParameter[] {
    return this.parameters;
  }

  getText(): string {
    return this.parameters.length === 0
      ? ""
      : `<${this.parameters.map((p) => p.getName()).join(", ")}>`;
  }
}

export const buildTypeParameterList = (
  owner: TargetClass,
  decl: ClassOrObjectNode
): LightTypeParameterList => {
  if (decl.kind !== "class") return new LightTypeParameterList([]);

  return new LightTypeParameterList(
    decl.typeParameters.map(
      (parameter, index) =>
        new LightTypeParameter(
          owner,
          index,
          parameter.name === undefined || parameter.name === ""
            ? NO_NAME_PLACEHOLDER
            : parameter.name
        )
    )
  );
};
