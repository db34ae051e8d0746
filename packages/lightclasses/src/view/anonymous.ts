/**
 * Light class for an object literal
 */

import type { ClassOrObjectNode } from "@classview/frontend";
import {
  ALL_SCOPE,
  type ClassReference,
  type ClassType,
} from "../contracts/type-factory.js";
import { InvariantViolationError } from "../errors.js";
import { LightClassForDeclaration } from "./light-class.js";

export class AnonymousLightClass extends LightClassForDeclaration {
  /** Held weakly; a collected or outdated type is rebuilt on demand */
  private cachedBaseType: WeakRef<ClassType> | undefined = undefined;

  /**
   * Reference to the first declared supertype, or to the root type when
   * the literal declares none
   *
   * @throws InvariantViolationError when the first supertype is unresolved
   */
  getBaseClassReference(): ClassReference {
    const [firstSupertype] = this.getDescriptor().supertypes;

    let qualifiedName = this.context.config.rootTypeName;
    if (firstSupertype !== undefined) {
      if (firstSupertype.descriptor === undefined) {
        throw new InvariantViolationError({
          message: `No descriptor for supertype '${firstSupertype.text}' of anonymous class`,
          qualifiedName: this.getQualifiedName(),
        });
      }
      qualifiedName = firstSupertype.descriptor.fqName;
    }

    return this.context.typeFactory.createClassReference(
      qualifiedName,
      ALL_SCOPE
    );
  }

  getBaseClassType(): ClassType {
    const cached = this.cachedBaseType?.deref();
    if (cached !== undefined && cached.isValid()) return cached;

    const type = this.context.typeFactory.createType(
      this.getBaseClassReference()
    );
    this.cachedBaseType = new WeakRef(type);
    return type;
  }

  /** Constructor arguments are not modeled */
  getArgumentList(): undefined {
    return undefined;
  }

  isInQualifiedNew(): boolean {
    return false;
  }

  protected override withDeclaration(
    classOrObject: ClassOrObjectNode
  ): AnonymousLightClass {
    return new AnonymousLightClass(
      this.context,
      this.getQualifiedName(),
      classOrObject
    );
  }
}
