/**
 * Stub printer
 *
 * Renders a stub file as declaration-only source text. Only used to put
 * the stub next to the source text in diagnostics.
 */

import type {
  ClassStub,
  FieldStub,
  MethodStub,
  StubClassKind,
  StubFile,
  StubModifier,
} from "./types.js";

const MODIFIER_ORDER: readonly StubModifier[] = [
  "public",
  "protected",
  "private",
  "abstract",
  "static",
  "final",
];

const CLASS_KEYWORDS: Readonly<Record<StubClassKind, string>> = {
  class: "class",
  interface: "interface",
  enum: "enum",
  annotation: "@interface",
};

const printModifiers = (modifiers: readonly StubModifier[]): string =>
  MODIFIER_ORDER.filter((m) => modifiers.includes(m))
    .map((m) => `${m} `)
    .join("");

const printField = (field: FieldStub, indent: string): string =>
  `${indent}${printModifiers(field.modifiers)}${field.type} ${field.name};`;

const printMethod = (method: MethodStub, indent: string): string => {
  const params = method.parameters.map((p) => `${p.type} ${p.name}`).join(", ");
  return `${indent}${printModifiers(method.modifiers)}${method.returnType} ${method.name}(${params});`;
};

export const printClassStub = (stub: ClassStub, indent = ""): string => {
  const typeParams =
    stub.typeParameters.length > 0 ? `<${stub.typeParameters.join(", ")}>` : "";
  const extendsClause = stub.superClass ? ` extends ${stub.superClass}` : "";
  const interfaceKeyword =
    stub.classKind === "interface" || stub.classKind === "annotation"
      ? "extends"
      : "implements";
  const interfacesClause =
    stub.interfaces.length > 0
      ? ` ${interfaceKeyword} ${stub.interfaces.join(", ")}`
      : "";

  const innerIndent = indent + "    ";
  const members = [
    ...stub.fields.map((f) => printField(f, innerIndent)),
    ...stub.methods.map((m) => printMethod(m, innerIndent)),
    ...stub.innerClasses.map((c) => printClassStub(c, innerIndent)),
  ];
  const body = members.length > 0 ? `\n${members.join("\n")}` : "";

  return `${indent}${printModifiers(stub.modifiers)}${CLASS_KEYWORDS[stub.classKind]} ${stub.name}${typeParams}${extendsClause}${interfacesClause} {${body}\n${indent}}`;
};

export const printStubFile = (stubFile: StubFile): string => {
  const header =
    stubFile.packageName === "" ? [] : [`package ${stubFile.packageName};`];
  const classes = stubFile.classes.map((c) => printClassStub(c));
  return `${[...header, ...classes].join("\n\n")}\n`;
};
