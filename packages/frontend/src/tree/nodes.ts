/**
 * Source declaration tree
 *
 * Nodes form a closed variant over `kind`. Every declaration knows its
 * enclosing container (`parent`) and the file it belongs to; the builder
 * is the only place that wires these links.
 */

import type { FileModificationTracker } from "./modification.js";

export type ModifierKeyword =
  | "public"
  | "internal"
  | "protected"
  | "private"
  | "final"
  | "open"
  | "abstract"
  | "inner"
  | "annotation"
  | "enum"
  | "override"
  | "data";

// ============================================================
// Type references (annotation targets)
// ============================================================

export type UserTypeElement = {
  readonly kind: "userType";
  /** Undefined when the reference is incomplete (e.g. `a.` while typing) */
  readonly referencedName: string | undefined;
  readonly qualifier?: UserTypeElement;
};

export type FunctionTypeElement = {
  readonly kind: "functionType";
  readonly text: string;
};

export type NullableTypeElement = {
  readonly kind: "nullableType";
  readonly innerType: TypeElement;
};

export type TypeElement =
  | UserTypeElement
  | FunctionTypeElement
  | NullableTypeElement;

export type TypeReference = {
  readonly typeElement: TypeElement | undefined;
};

export type AnnotationEntry = {
  readonly typeReference: TypeReference | undefined;
};

export type TypeParameterNode = {
  readonly name: string | undefined;
};

// ============================================================
// Declarations
// ============================================================

export type SourceFileNode = {
  readonly kind: "file";
  /** File name, e.g. "shapes.kt" */
  readonly name: string;
  /** Dotted package name, empty for the root package */
  readonly packageName: string;
  readonly declarations: readonly TopLevelDeclaration[];
  readonly tracker: FileModificationTracker;
};

export type ClassNode = {
  readonly kind: "class";
  readonly name: string | undefined;
  /** Declared with the trait keyword instead of class */
  readonly isTrait: boolean;
  readonly modifiers: ReadonlySet<ModifierKeyword>;
  readonly annotations: readonly AnnotationEntry[];
  readonly typeParameters: readonly TypeParameterNode[];
  /** Supertype list as written */
  readonly superTypes: readonly string[];
  readonly declarations: readonly MemberDeclaration[];
  readonly parent: ContainerNode;
  readonly file: SourceFileNode;
};

export type ObjectNode = {
  readonly kind: "object";
  /** Undefined for object literals */
  readonly name: string | undefined;
  /** Object expression (anonymous), as opposed to a named object declaration */
  readonly isLiteral: boolean;
  readonly modifiers: ReadonlySet<ModifierKeyword>;
  readonly annotations: readonly AnnotationEntry[];
  readonly superTypes: readonly string[];
  readonly declarations: readonly MemberDeclaration[];
  readonly parent: ContainerNode;
  readonly file: SourceFileNode;
};

export type FunctionNode = {
  readonly kind: "function";
  readonly name: string | undefined;
  readonly modifiers: ReadonlySet<ModifierKeyword>;
  /** Declarations inside the body (local classes, objects, literals, functions) */
  readonly declarations: readonly LocalDeclaration[];
  readonly parent: ContainerNode;
  readonly file: SourceFileNode;
};

export type PropertyNode = {
  readonly kind: "property";
  readonly name: string | undefined;
  readonly modifiers: ReadonlySet<ModifierKeyword>;
  /** Declarations inside the initializer or accessors */
  readonly declarations: readonly LocalDeclaration[];
  readonly parent: ContainerNode;
  readonly file: SourceFileNode;
};

export type InitializerNode = {
  readonly kind: "initializer";
  readonly declarations: readonly LocalDeclaration[];
  readonly parent: ClassOrObjectNode;
  readonly file: SourceFileNode;
};

export type ClassOrObjectNode = ClassNode | ObjectNode;

export type DeclarationNode =
  | ClassNode
  | ObjectNode
  | FunctionNode
  | PropertyNode
  | InitializerNode;

/** Declarations that may appear directly in a file */
export type TopLevelDeclaration =
  | ClassNode
  | ObjectNode
  | FunctionNode
  | PropertyNode;

/** Declarations that may appear in a class or object body */
export type MemberDeclaration = DeclarationNode;

/** Declarations that may appear inside a function, property or initializer */
export type LocalDeclaration =
  | ClassNode
  | ObjectNode
  | FunctionNode
  | PropertyNode;

/** Constructs whose body makes the declarations inside them local */
export type LocalContainerNode = FunctionNode | PropertyNode | InitializerNode;

export type ContainerNode = SourceFileNode | DeclarationNode;

export const isClassOrObject = (
  node: ContainerNode
): node is ClassOrObjectNode =>
  node.kind === "class" || node.kind === "object";

export const isLocalContainer = (
  node: ContainerNode
): node is LocalContainerNode =>
  node.kind === "function" ||
  node.kind === "property" ||
  node.kind === "initializer";
