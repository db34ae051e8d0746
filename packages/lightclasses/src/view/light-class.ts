/**
 * Light class for an explicit declaration
 *
 * A read-only class view over one source class or object. Structure that
 * the source alone determines (name, modifiers, type parameters, parent,
 * kind predicates) is answered from the declaration. Members come from the
 * compiled stub of the class, loaded on first use through the stub cache.
 */

import {
  copyDeclaration,
  getEnclosingClassOrObject,
  isLocal,
  isTopLevel,
  printSourceFile,
  shortName,
  type ClassDescriptor,
  type ClassOrObjectNode,
} from "@classview/frontend";
import { lazy } from "../caching/lazy.js";
import type { TargetClass } from "../contracts/target-class.js";
import type { LightClassContext } from "../context.js";
import { InvariantViolationError, IncorrectOperationError } from "../errors.js";
import { findStubRoot } from "../locator.js";
import { findClass } from "../stubs/lookup.js";
import { printStubFile } from "../stubs/printer.js";
import type {
  ClassStub,
  FieldStub,
  MethodStub,
  StubFile,
} from "../stubs/types.js";
import {
  hasTypeParameterDeclarations,
  isAnnotationDeclaration,
  isEnumDeclaration,
  isInterfaceDeclaration,
} from "./classification.js";
import { hasDeprecatedAnnotation } from "./deprecation.js";
import { LightFile } from "./light-file.js";
import { computeModifiers, LightModifierList } from "./modifiers.js";
import { computeLocalParent, type LightMethod } from "./parent.js";
import {
  buildTypeParameterList,
  type LightTypeParameter,
  type LightTypeParameterList,
} from "./type-parameters.js";

export type LightClassParent = LightFile | TargetClass | LightMethod;

/**
 * 31-based string hash, stable across runs
 */
const hashString = (value: string): number => {
  let hash = 0;
  for (let i = 0; i < value.length; i++) {
    hash = (Math.imul(31, hash) + value.charCodeAt(i)) | 0;
  }
  return hash;
};

export class LightClassForDeclaration implements TargetClass {
  protected readonly context: LightClassContext;
  private readonly classFqName: string;
  private readonly classOrObject: ClassOrObjectNode;

  private readonly delegate = lazy(() => this.findDelegate());
  private readonly parent = lazy(() => this.computeParent());
  private readonly containingFile = lazy(
    () =>
      new LightFile(this.classOrObject.file, () => this.loadStubFile())
  );
  private readonly typeParameterList = lazy(() =>
    buildTypeParameterList(this, this.classOrObject)
  );
  private readonly modifierList = lazy(
    () =>
      new LightModifierList(
        computeModifiers(this.classOrObject, this.isInterface())
      )
  );

  constructor(
    context: LightClassContext,
    classFqName: string,
    classOrObject: ClassOrObjectNode
  ) {
    this.context = context;
    this.classFqName = classFqName;
    this.classOrObject = classOrObject;
  }

  // ============================================================
  // Identity
  // ============================================================

  getSourceDeclaration(): ClassOrObjectNode {
    return this.classOrObject;
  }

  getQualifiedName(): string {
    return this.classFqName;
  }

  getName(): string {
    return shortName(this.classFqName);
  }

  getNavigationElement(): ClassOrObjectNode {
    return this.classOrObject;
  }

  /**
   * Same qualified name; different declarations are equivalent when
   * they compile to the same class
   */
  isEquivalentTo(another: TargetClass): boolean {
    return another.getQualifiedName() === this.classFqName;
  }

  equals(other: unknown): boolean {
    if (other === this) return true;
    return (
      other instanceof LightClassForDeclaration &&
      other.classFqName === this.classFqName
    );
  }

  hashCode(): number {
    return hashString(this.classFqName);
  }

  toString(): string {
    return `LightClass:${this.classFqName}`;
  }

  /**
   * New view over a copy of the declaration; the copy lives in a fresh
   * tree and does not share caches with this view
   */
  copy(): LightClassForDeclaration {
    return this.withDeclaration(copyDeclaration(this.classOrObject));
  }

  protected withDeclaration(
    classOrObject: ClassOrObjectNode
  ): LightClassForDeclaration {
    return new LightClassForDeclaration(
      this.context,
      this.classFqName,
      classOrObject
    );
  }

  isValid(): boolean {
    return this.classOrObject.file.tracker.isValid;
  }

  // ============================================================
  // Compiled delegate
  // ============================================================

  /**
   * Compiled stub of this class
   *
   * @throws InvariantViolationError when the stubs have no such class
   */
  getDelegate(): ClassStub {
    return this.delegate.value;
  }

  getDescriptor(): ClassDescriptor {
    return this.context.stubCache.getClassInfo(this.classOrObject).descriptor;
  }

  getOwnInnerClasses(): readonly ClassStub[] {
    return this.getDelegate().innerClasses;
  }

  getMethods(): readonly MethodStub[] {
    return this.getDelegate().methods;
  }

  getFields(): readonly FieldStub[] {
    return this.getDelegate().fields;
  }

  private loadStubFile(): StubFile {
    return this.context.stubCache.getBundle(findStubRoot(this.classOrObject))
      .stubFile;
  }

  private findDelegate(): ClassStub {
    const root = findStubRoot(this.classOrObject);
    const stubFile = this.context.stubCache.getBundle(root).stubFile;
    const stub = findClass(this.classFqName, stubFile);
    if (stub === undefined) {
      throw new InvariantViolationError({
        message: `Class was not found ${this.classFqName}`,
        qualifiedName: this.classFqName,
        context: `in ${root.file.name}\n${printSourceFile(root.file)}\nstub:\n${printStubFile(stubFile)}`,
      });
    }
    return stub;
  }

  // ============================================================
  // Structure
  // ============================================================

  getContainingFile(): LightFile {
    return this.containingFile.value;
  }

  /**
   * Light class of the nearest enclosing class or object, undefined for
   * declarations directly in the file or in package-level functions
   */
  getContainingClass(): TargetClass | undefined {
    if (isTopLevel(this.classOrObject)) return undefined;
    const enclosing = getEnclosingClassOrObject(this.classOrObject);
    return enclosing === undefined
      ? undefined
      : this.context.getLightClass(enclosing);
  }

  getParent(): LightClassParent | undefined {
    return this.parent.value;
  }

  private computeParent(): LightClassParent | undefined {
    if (isLocal(this.classOrObject)) {
      const synthesized = computeLocalParent(this.classOrObject, {
        memberMirrors: this.context.memberMirrors,
        getLightClass: (decl) => this.context.getLightClass(decl),
      });
      if (synthesized !== undefined) return synthesized;
    }
    return isTopLevel(this.classOrObject)
      ? this.getContainingFile()
      : this.getContainingClass();
  }

  getTypeParameterList(): LightTypeParameterList {
    return this.typeParameterList.value;
  }

  getTypeParameters(): readonly LightTypeParameter[] {
    return this.getTypeParameterList().getTypeParameters();
  }

  getModifierList(): LightModifierList {
    return this.modifierList.value;
  }

  hasModifierProperty(name: string): boolean {
    return this.getModifierList().hasModifierProperty(name);
  }

  // ============================================================
  // Classification
  // ============================================================

  isDeprecated(): boolean {
    return hasDeprecatedAnnotation(
      this.classOrObject,
      this.context.resolver.builtIns.deprecatedAnnotation
    );
  }

  isInterface(): boolean {
    return isInterfaceDeclaration(this.classOrObject);
  }

  isAnnotationType(): boolean {
    return isAnnotationDeclaration(this.classOrObject);
  }

  isEnum(): boolean {
    return isEnumDeclaration(this.classOrObject);
  }

  hasTypeParameters(): boolean {
    return hasTypeParameterDeclarations(this.classOrObject);
  }

  /**
   * Whether `baseClass` is a supertype of this class. Bases that are light
   * classes are compared through their resolved descriptor; other bases
   * through their qualified name, and a base without one never matches.
   */
  isInheritor(baseClass: TargetClass, checkDeep: boolean): boolean {
    const qualifiedName =
      baseClass instanceof LightClassForDeclaration
        ? baseClass.getDescriptor().fqName
        : baseClass.getQualifiedName();
    if (qualifiedName === undefined) return false;

    return this.context.resolver.checkSupertype(
      this.getDescriptor(),
      qualifiedName,
      checkDeep
    );
  }

  // ============================================================
  // Mutation (unsupported)
  // ============================================================

  setName(name: string): never {
    throw new IncorrectOperationError(
      `rename ${this.classFqName} to ${name}`
    );
  }

  delete(): never {
    throw new IncorrectOperationError(`delete ${this.classFqName}`);
  }
}
