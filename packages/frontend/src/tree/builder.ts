/**
 * Source tree construction
 *
 * Trees are described by plain shapes and materialized top-down so that
 * each node can point at its parent. Shapes are also what copies are
 * made from: a copy is a fresh tree built from the shape of the original.
 */

import { FileModificationTracker } from "./modification.js";
import type {
  AnnotationEntry,
  ClassNode,
  ClassOrObjectNode,
  ContainerNode,
  DeclarationNode,
  FunctionNode,
  InitializerNode,
  LocalDeclaration,
  MemberDeclaration,
  ModifierKeyword,
  ObjectNode,
  PropertyNode,
  SourceFileNode,
  TopLevelDeclaration,
  TypeParameterNode,
} from "./nodes.js";

// ============================================================
// Shapes
// ============================================================

export type ClassShape = {
  readonly kind: "class";
  readonly name?: string;
  readonly isTrait?: boolean;
  readonly modifiers?: readonly ModifierKeyword[];
  readonly annotations?: readonly AnnotationEntry[];
  readonly typeParameters?: readonly TypeParameterNode[];
  readonly superTypes?: readonly string[];
  readonly declarations?: readonly MemberShape[];
};

export type ObjectShape = {
  readonly kind: "object";
  readonly name?: string;
  readonly modifiers?: readonly ModifierKeyword[];
  readonly annotations?: readonly AnnotationEntry[];
  readonly superTypes?: readonly string[];
  readonly declarations?: readonly MemberShape[];
};

export type ObjectLiteralShape = {
  readonly kind: "objectLiteral";
  readonly superTypes?: readonly string[];
  readonly declarations?: readonly MemberShape[];
};

export type FunctionShape = {
  readonly kind: "function";
  readonly name?: string;
  readonly modifiers?: readonly ModifierKeyword[];
  readonly declarations?: readonly LocalShape[];
};

export type PropertyShape = {
  readonly kind: "property";
  readonly name?: string;
  readonly modifiers?: readonly ModifierKeyword[];
  readonly declarations?: readonly LocalShape[];
};

export type InitializerShape = {
  readonly kind: "initializer";
  readonly declarations?: readonly LocalShape[];
};

export type TopLevelShape = ClassShape | ObjectShape | FunctionShape | PropertyShape;

export type MemberShape = TopLevelShape | InitializerShape;

export type LocalShape = TopLevelShape | ObjectLiteralShape;

export type SourceFileShape = {
  readonly name: string;
  readonly packageName?: string;
  readonly declarations?: readonly TopLevelShape[];
};

// ============================================================
// Materialization
// ============================================================

export const createSourceFile = (shape: SourceFileShape): SourceFileNode => {
  const declarations: TopLevelDeclaration[] = [];
  const file: SourceFileNode = {
    kind: "file",
    name: shape.name,
    packageName: shape.packageName ?? "",
    declarations,
    tracker: new FileModificationTracker(),
  };
  for (const child of shape.declarations ?? []) {
    declarations.push(buildTopLevel(child, file, file));
  }
  return file;
};

const buildTopLevel = (
  shape: TopLevelShape,
  parent: ContainerNode,
  file: SourceFileNode
): TopLevelDeclaration => {
  switch (shape.kind) {
    case "class":
      return buildClass(shape, parent, file);
    case "object":
      return buildObject(shape, parent, file);
    case "function":
    case "property":
      return buildCallable(shape, parent, file);
  }
};

const buildMember = (
  shape: MemberShape,
  parent: ClassOrObjectNode,
  file: SourceFileNode
): MemberDeclaration => {
  if (shape.kind !== "initializer") {
    return buildTopLevel(shape, parent, file);
  }
  const declarations: LocalDeclaration[] = [];
  const node: InitializerNode = { kind: "initializer", declarations, parent, file };
  for (const child of shape.declarations ?? []) {
    declarations.push(buildLocal(child, node, file));
  }
  return node;
};

const buildLocal = (
  shape: LocalShape,
  parent: ContainerNode,
  file: SourceFileNode
): LocalDeclaration => {
  if (shape.kind !== "objectLiteral") {
    return buildTopLevel(shape, parent, file);
  }
  return buildObject(
    {
      kind: "object",
      superTypes: shape.superTypes,
      declarations: shape.declarations,
    },
    parent,
    file,
    true
  );
};

const buildClass = (
  shape: ClassShape,
  parent: ContainerNode,
  file: SourceFileNode
): ClassNode => {
  const declarations: MemberDeclaration[] = [];
  const node: ClassNode = {
    kind: "class",
    name: shape.name,
    isTrait: shape.isTrait ?? false,
    modifiers: new Set(shape.modifiers ?? []),
    annotations: shape.annotations ?? [],
    typeParameters: shape.typeParameters ?? [],
    superTypes: shape.superTypes ?? [],
    declarations,
    parent,
    file,
  };
  for (const child of shape.declarations ?? []) {
    declarations.push(buildMember(child, node, file));
  }
  return node;
};

const buildObject = (
  shape: ObjectShape,
  parent: ContainerNode,
  file: SourceFileNode,
  isLiteral = false
): ObjectNode => {
  const declarations: MemberDeclaration[] = [];
  const node: ObjectNode = {
    kind: "object",
    name: isLiteral ? undefined : shape.name,
    isLiteral,
    modifiers: new Set(shape.modifiers ?? []),
    annotations: shape.annotations ?? [],
    superTypes: shape.superTypes ?? [],
    declarations,
    parent,
    file,
  };
  for (const child of shape.declarations ?? []) {
    declarations.push(buildMember(child, node, file));
  }
  return node;
};

const buildCallable = (
  shape: FunctionShape | PropertyShape,
  parent: ContainerNode,
  file: SourceFileNode
): FunctionNode | PropertyNode => {
  const declarations: LocalDeclaration[] = [];
  const node: FunctionNode | PropertyNode = {
    kind: shape.kind,
    name: shape.name,
    modifiers: new Set(shape.modifiers ?? []),
    declarations,
    parent,
    file,
  };
  for (const child of shape.declarations ?? []) {
    declarations.push(buildLocal(child, node, file));
  }
  return node;
};

// ============================================================
// Shapes of existing nodes
// ============================================================

export const toFileShape = (file: SourceFileNode): SourceFileShape => ({
  name: file.name,
  packageName: file.packageName,
  declarations: file.declarations.map(toTopLevelShape),
});

const toTopLevelShape = (node: TopLevelDeclaration): TopLevelShape => {
  switch (node.kind) {
    case "class":
      return {
        kind: "class",
        name: node.name,
        isTrait: node.isTrait,
        modifiers: [...node.modifiers],
        annotations: node.annotations,
        typeParameters: node.typeParameters,
        superTypes: node.superTypes,
        declarations: node.declarations.map(toMemberShape),
      };
    case "object":
      return {
        kind: "object",
        name: node.name,
        modifiers: [...node.modifiers],
        annotations: node.annotations,
        superTypes: node.superTypes,
        declarations: node.declarations.map(toMemberShape),
      };
    case "function":
    case "property":
      return {
        kind: node.kind,
        name: node.name,
        modifiers: [...node.modifiers],
        declarations: node.declarations.map(toLocalShape),
      };
  }
};

const toMemberShape = (node: MemberDeclaration): MemberShape =>
  node.kind === "initializer"
    ? { kind: "initializer", declarations: node.declarations.map(toLocalShape) }
    : toTopLevelShape(node);

const toLocalShape = (node: LocalDeclaration): LocalShape =>
  node.kind === "object" && node.isLiteral
    ? {
        kind: "objectLiteral",
        superTypes: node.superTypes,
        declarations: node.declarations.map(toMemberShape),
      }
    : toTopLevelShape(node);

// ============================================================
// Copies
// ============================================================

/**
 * Index path from the file down to `node`
 */
const pathOf = (node: DeclarationNode): readonly number[] => {
  const path: number[] = [];
  let current: DeclarationNode = node;
  while (true) {
    const parent: ContainerNode = current.parent;
    const siblings: readonly DeclarationNode[] = parent.declarations;
    path.unshift(siblings.indexOf(current));
    if (parent.kind === "file") return path;
    current = parent;
  }
};

/**
 * Copy a declaration together with its whole file. The copy lives in a
 * fresh tree with its own tracker, so containment queries on it behave
 * exactly as on the original.
 */
export const copyDeclaration = <T extends DeclarationNode>(node: T): T => {
  const copiedFile = createSourceFile(toFileShape(node.file));
  let current: ContainerNode = copiedFile;
  for (const index of pathOf(node)) {
    const children: readonly DeclarationNode[] = current.declarations;
    const next = children[index];
    if (next === undefined) {
      throw new Error(`ICE: copied tree lost declaration at index ${index}`);
    }
    current = next;
  }
  if (!isSameKind(node, current)) {
    throw new Error(`ICE: copied tree changed declaration kind '${node.kind}'`);
  }
  return current;
};

const isSameKind = <T extends DeclarationNode>(
  original: T,
  copy: ContainerNode
): copy is T => copy.kind === original.kind;
