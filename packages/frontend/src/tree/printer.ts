/**
 * Source printer
 *
 * Renders a tree back to source-like text. Used for diagnostics, where the
 * text surrounding a declaration has to be shown; the output is stable
 * (canonical modifier order, four-space indent) rather than a faithful
 * reproduction of the original formatting.
 */

import type {
  AnnotationEntry,
  DeclarationNode,
  ModifierKeyword,
  SourceFileNode,
  TypeElement,
  TypeParameterNode,
} from "./nodes.js";

const MODIFIER_ORDER: readonly ModifierKeyword[] = [
  "public",
  "internal",
  "protected",
  "private",
  "final",
  "open",
  "abstract",
  "inner",
  "annotation",
  "enum",
  "override",
  "data",
];

const INDENT = "    ";

const printTypeElement = (element: TypeElement): string => {
  switch (element.kind) {
    case "userType": {
      const qualifier = element.qualifier
        ? `${printTypeElement(element.qualifier)}.`
        : "";
      return `${qualifier}${element.referencedName ?? "?"}`;
    }
    case "functionType":
      return element.text;
    case "nullableType":
      return `${printTypeElement(element.innerType)}?`;
  }
};

const printAnnotations = (annotations: readonly AnnotationEntry[]): string =>
  annotations
    .map((entry) => {
      const element = entry.typeReference?.typeElement;
      return `@${element ? printTypeElement(element) : "?"} `;
    })
    .join("");

const printModifiers = (modifiers: ReadonlySet<ModifierKeyword>): string =>
  MODIFIER_ORDER.filter((m) => modifiers.has(m))
    .map((m) => `${m} `)
    .join("");

const printTypeParameters = (
  typeParameters: readonly TypeParameterNode[]
): string =>
  typeParameters.length === 0
    ? ""
    : `<${typeParameters.map((tp) => tp.name ?? "?").join(", ")}>`;

const printSuperTypes = (superTypes: readonly string[]): string =>
  superTypes.length === 0 ? "" : ` : ${superTypes.join(", ")}`;

const printBody = (
  declarations: readonly DeclarationNode[],
  indent: string
): string => {
  if (declarations.length === 0) return "";
  const inner = declarations
    .map((d) => printDeclaration(d, indent + INDENT))
    .join("\n");
  return ` {\n${inner}\n${indent}}`;
};

export const printDeclaration = (
  decl: DeclarationNode,
  indent = ""
): string => {
  switch (decl.kind) {
    case "class": {
      const keyword = decl.isTrait ? "trait" : "class";
      const header = `${printAnnotations(decl.annotations)}${printModifiers(decl.modifiers)}${keyword} ${decl.name ?? "?"}${printTypeParameters(decl.typeParameters)}${printSuperTypes(decl.superTypes)}`;
      return `${indent}${header}${printBody(decl.declarations, indent)}`;
    }
    case "object": {
      const name = decl.isLiteral ? "" : ` ${decl.name ?? "?"}`;
      const header = `${printAnnotations(decl.annotations)}${printModifiers(decl.modifiers)}object${name}${printSuperTypes(decl.superTypes)}`;
      return `${indent}${header}${printBody(decl.declarations, indent)}`;
    }
    case "function": {
      const header = `${printModifiers(decl.modifiers)}fun ${decl.name ?? "?"}()`;
      return `${indent}${header}${printBody(decl.declarations, indent)}`;
    }
    case "property": {
      const header = `${printModifiers(decl.modifiers)}val ${decl.name ?? "?"}`;
      const body = printBody(decl.declarations, indent);
      return `${indent}${header}${body === "" ? "" : ` = run${body}`}`;
    }
    case "initializer": {
      const body = printBody(decl.declarations, indent);
      return `${indent}init${body === "" ? " {}" : body}`;
    }
  }
};

export const printSourceFile = (file: SourceFileNode): string => {
  const header = file.packageName === "" ? [] : [`package ${file.packageName}`];
  const declarations = file.declarations.map((d) => printDeclaration(d));
  return `${[...header, ...declarations].join("\n\n")}\n`;
};
