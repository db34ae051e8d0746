/**
 * Binary-shaped stub tree
 *
 * The shape of a compiled class as the target type system sees it.
 * Stub trees are produced by the stub-building pipeline and only read here.
 */

export type StubModifier =
  | "public"
  | "protected"
  | "private"
  | "abstract"
  | "static"
  | "final";

export type StubClassKind = "class" | "interface" | "enum" | "annotation";

export type ParameterStub = {
  readonly name: string;
  readonly type: string;
};

export type FieldStub = {
  readonly kind: "field";
  readonly name: string;
  readonly modifiers: readonly StubModifier[];
  readonly type: string;
};

export type MethodStub = {
  readonly kind: "method";
  readonly name: string;
  readonly modifiers: readonly StubModifier[];
  readonly returnType: string;
  readonly parameters: readonly ParameterStub[];
};

export type ClassStub = {
  readonly kind: "classStub";
  readonly classKind: StubClassKind;
  readonly name: string;
  /** Qualified name without dollars, e.g. "geo.Shape.Corner" */
  readonly qualifiedName: string;
  /** Internal name, e.g. "geo/Shape$Corner" */
  readonly internalName: string;
  readonly modifiers: readonly StubModifier[];
  readonly typeParameters: readonly string[];
  readonly superClass: string | undefined;
  readonly interfaces: readonly string[];
  readonly fields: readonly FieldStub[];
  readonly methods: readonly MethodStub[];
  readonly innerClasses: readonly ClassStub[];
};

export type StubFile = {
  readonly kind: "stubFile";
  readonly packageName: string;
  readonly classes: readonly ClassStub[];
};
