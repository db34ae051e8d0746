/**
 * In-process stub pipeline for tests
 *
 * Builds stubs, internal names and descriptors straight from source trees.
 * Supertypes are written as qualified names; names declared in the known
 * files resolve to their declarations, every other name resolves to an
 * external class without supertypes unless listed as unresolved.
 */

import {
  internalNameToQualifiedName,
  isClassOrObject,
  shortName,
  type ClassDescriptor,
  type ClassOrObjectNode,
  type DeclarationNode,
  type SourceFileNode,
  type SupertypeRef,
} from "@classview/frontend";
import type { ResolvedLightClassConfig } from "../config.js";
import { createLightClassContext, type LightClassContext } from "../context.js";
import type { SemanticResolver } from "../contracts/semantic-resolver.js";
import type {
  ClassInfo,
  StubBuilder,
  StubBundle,
  StubRoot,
} from "../contracts/stub-builder.js";
import {
  getPackageFacadeInternalName,
  predictInternalName,
} from "../naming/binary-names.js";
import { capitalize } from "../naming/identifiers.js";
import type {
  ClassStub,
  FieldStub,
  MethodStub,
  StubClassKind,
} from "../stubs/types.js";
import { isInterfaceDeclaration } from "../view/classification.js";
import type { LightClassForDeclaration } from "../view/light-class.js";
import { computeModifiers } from "../view/modifiers.js";

export const DEPRECATED_ANNOTATION: ClassDescriptor = {
  kind: "class",
  name: "deprecated",
  fqName: "lang.deprecated",
  supertypes: [],
};

const OBJECT_TYPE = "java.lang.Object";

export type HarnessOptions = {
  /** Files whose classes supertype names may refer to */
  readonly files?: readonly SourceFileNode[];
  /** Supertype names that fail to resolve */
  readonly unresolvedSupertypes?: readonly string[];
};

export type RecordingStubBuilder = StubBuilder & {
  /** Roots in the order they were built */
  readonly builtRoots: readonly StubRoot[];
};

// ============================================================
// Descriptors
// ============================================================

const collectNamedClasses = (
  files: readonly SourceFileNode[]
): ReadonlyMap<string, ClassOrObjectNode> => {
  const byName = new Map<string, ClassOrObjectNode>();
  const visit = (decl: DeclarationNode): void => {
    if (isClassOrObject(decl)) {
      const internalName = predictInternalName(decl);
      if (internalName !== undefined) {
        byName.set(internalNameToQualifiedName(internalName), decl);
      }
    }
    decl.declarations.forEach(visit);
  };
  files.forEach((file) => file.declarations.forEach(visit));
  return byName;
};

const createDescriptorTable = (options: HarnessOptions) => {
  const known = collectNamedClasses(options.files ?? []);
  const unresolved = new Set(options.unresolvedSupertypes ?? []);
  const byDeclaration = new Map<ClassOrObjectNode, ClassDescriptor>();
  const external = new Map<string, ClassDescriptor>();

  const externalDescriptor = (fqName: string): ClassDescriptor => {
    const existing = external.get(fqName);
    if (existing !== undefined) return existing;
    const descriptor: ClassDescriptor = {
      kind: "class",
      name: shortName(fqName),
      fqName,
      supertypes: [],
    };
    external.set(fqName, descriptor);
    return descriptor;
  };

  const resolveSupertype = (text: string): SupertypeRef => {
    if (unresolved.has(text)) return { text, descriptor: undefined };
    const decl = known.get(text);
    return {
      text,
      descriptor:
        decl === undefined ? externalDescriptor(text) : describe(decl, text),
    };
  };

  const describe = (
    decl: ClassOrObjectNode,
    fqName: string
  ): ClassDescriptor => {
    const existing = byDeclaration.get(decl);
    if (existing !== undefined) return existing;
    const descriptor: ClassDescriptor = {
      kind: "class",
      name: decl.name ?? shortName(fqName),
      fqName,
      supertypes: decl.superTypes.map(resolveSupertype),
    };
    byDeclaration.set(decl, descriptor);
    return descriptor;
  };

  return { describe };
};

// ============================================================
// Stubs
// ============================================================

const classKindOf = (decl: ClassOrObjectNode): StubClassKind => {
  if (decl.kind === "object") return "class";
  if (decl.modifiers.has("annotation")) return "annotation";
  if (decl.isTrait) return "interface";
  if (decl.modifiers.has("enum")) return "enum";
  return "class";
};

const membersOf = (
  decl: ClassOrObjectNode
): { readonly fields: FieldStub[]; readonly methods: MethodStub[] } => {
  const fields: FieldStub[] = [];
  const methods: MethodStub[] = [];
  for (const member of decl.declarations) {
    if (member.kind === "function" && member.name !== undefined) {
      methods.push({
        kind: "method",
        name: member.name,
        modifiers: ["public", "final"],
        returnType: "void",
        parameters: [],
      });
    }
    if (member.kind === "property" && member.name !== undefined) {
      fields.push({
        kind: "field",
        name: member.name,
        modifiers: ["private", "final"],
        type: OBJECT_TYPE,
      });
      methods.push({
        kind: "method",
        name: `get${capitalize(member.name)}`,
        modifiers: ["public", "final"],
        returnType: OBJECT_TYPE,
        parameters: [],
      });
    }
  }
  return { fields, methods };
};

/**
 * Bundle for one root. Classes nested in class bodies become inner
 * classes; local classes become separate top-level classes named
 * `<owner>$<container>$<name>`, and unnamed ones get a 1-based index in
 * place of the name.
 */
const buildBundle = (
  root: StubRoot,
  describe: (decl: ClassOrObjectNode, fqName: string) => ClassDescriptor
): StubBundle => {
  const classes = new Map<ClassOrObjectNode, ClassInfo>();
  const topLevel: ClassStub[] = [];
  let anonymousIndex = 0;

  const nameLocal = (
    decl: ClassOrObjectNode,
    owner: string,
    container: string | undefined
  ): string => {
    const prefix = container === undefined ? owner : `${owner}$${container}`;
    return `${prefix}$${decl.name ?? String(++anonymousIndex)}`;
  };

  const buildClass = (
    decl: ClassOrObjectNode,
    internalName: string
  ): ClassStub => {
    const qualifiedName = internalNameToQualifiedName(internalName);
    classes.set(decl, {
      declaration: decl,
      internalName,
      descriptor: describe(decl, qualifiedName),
    });

    const innerClasses: ClassStub[] = [];
    visitBody(decl, internalName, undefined, innerClasses);

    const [superClass, ...interfaces] = decl.superTypes;
    const { fields, methods } = membersOf(decl);
    return {
      kind: "classStub",
      classKind: classKindOf(decl),
      name: shortName(qualifiedName),
      qualifiedName,
      internalName,
      modifiers: computeModifiers(decl, isInterfaceDeclaration(decl)),
      typeParameters:
        decl.kind === "class"
          ? decl.typeParameters.map((p) => p.name ?? "")
          : [],
      superClass,
      interfaces,
      fields,
      methods,
      innerClasses,
    };
  };

  const visitBody = (
    node: DeclarationNode,
    owner: string,
    container: string | undefined,
    innerClasses: ClassStub[]
  ): void => {
    for (const child of node.declarations) {
      switch (child.kind) {
        case "class":
        case "object":
          if (isClassOrObject(node)) {
            const name = child.name ?? String(++anonymousIndex);
            innerClasses.push(buildClass(child, `${owner}$${name}`));
          } else {
            topLevel.push(
              buildClass(child, nameLocal(child, owner, container))
            );
          }
          break;
        case "function":
        case "property":
          visitBody(child, owner, child.name ?? "?", innerClasses);
          break;
        case "initializer":
          visitBody(child, owner, undefined, innerClasses);
          break;
      }
    }
  };

  if (isClassOrObject(root)) {
    const internalName = predictInternalName(root);
    if (internalName === undefined) {
      throw new Error(`ICE: no internal name for stub root ${root.name}`);
    }
    topLevel.unshift(buildClass(root, internalName));
  } else {
    visitBody(
      root,
      getPackageFacadeInternalName(root.file.packageName),
      root.name ?? "?",
      []
    );
  }

  return {
    root,
    stubFile: {
      kind: "stubFile",
      packageName: root.file.packageName,
      classes: topLevel,
    },
    classes,
  };
};

// ============================================================
// Public helpers
// ============================================================

/**
 * Declaration reached from the file by a path of names; a number selects
 * by position instead (for unnamed declarations)
 */
export const declarationAt = (
  file: SourceFileNode,
  ...path: readonly (string | number)[]
): DeclarationNode => {
  let candidates: readonly DeclarationNode[] = file.declarations;
  let found: DeclarationNode | undefined;
  for (const segment of path) {
    found =
      typeof segment === "number"
        ? candidates[segment]
        : candidates.find((decl) => "name" in decl && decl.name === segment);
    if (found === undefined) {
      throw new Error(`No declaration at ${path.join("/")} in ${file.name}`);
    }
    candidates = found.declarations;
  }
  if (found === undefined) {
    throw new Error(`Empty declaration path in ${file.name}`);
  }
  return found;
};

export const classAt = (
  file: SourceFileNode,
  ...path: readonly (string | number)[]
): ClassOrObjectNode => {
  const decl = declarationAt(file, ...path);
  if (!isClassOrObject(decl)) {
    throw new Error(`${path.join("/")} in ${file.name} is a ${decl.kind}`);
  }
  return decl;
};

export const createHarnessStubBuilder = (
  options: HarnessOptions = {}
): RecordingStubBuilder => {
  const { describe } = createDescriptorTable(options);
  const builtRoots: StubRoot[] = [];
  return {
    builtRoots,
    build: (root) => {
      builtRoots.push(root);
      return buildBundle(root, describe);
    },
  };
};

/**
 * Resolver walking descriptor supertypes. With `deep`, supertypes of
 * supertypes are searched too.
 */
export const createHarnessResolver = (): SemanticResolver => {
  const checkSupertype = (
    descriptor: ClassDescriptor,
    qualifiedName: string,
    deep: boolean
  ): boolean => {
    const visited = new Set<ClassDescriptor>();
    const pending: ClassDescriptor[] = [descriptor];
    while (pending.length > 0) {
      const current = pending.shift();
      if (current === undefined || visited.has(current)) continue;
      visited.add(current);
      for (const supertype of current.supertypes) {
        if (supertype.descriptor === undefined) continue;
        if (supertype.descriptor.fqName === qualifiedName) return true;
        if (deep) pending.push(supertype.descriptor);
      }
    }
    return false;
  };

  return {
    builtIns: { deprecatedAnnotation: DEPRECATED_ANNOTATION },
    checkSupertype,
  };
};

/**
 * Context over the harness pipeline
 */
export const createHarnessContext = (
  options: HarnessOptions & { readonly config?: ResolvedLightClassConfig } = {}
): {
  readonly context: LightClassContext;
  readonly stubBuilder: RecordingStubBuilder;
} => {
  const stubBuilder = createHarnessStubBuilder(options);
  const context = createLightClassContext({
    stubBuilder,
    resolver: createHarnessResolver(),
    config: options.config,
  });
  return { context, stubBuilder };
};

export const requireLightClass = (
  context: LightClassContext,
  decl: ClassOrObjectNode
): LightClassForDeclaration => {
  const lightClass = context.getLightClass(decl);
  if (lightClass === undefined) {
    throw new Error(`No light class for ${decl.name ?? "<anonymous>"}`);
  }
  return lightClass;
};
