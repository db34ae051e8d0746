/**
 * Source fixtures shared by view tests
 */

import {
  createSourceFile,
  type AnnotationEntry,
  type SourceFileNode,
  type UserTypeElement,
} from "@classview/frontend";

export const annotation = (...segments: string[]): AnnotationEntry => {
  let userType: UserTypeElement | undefined;
  for (const segment of segments) {
    userType = { kind: "userType", referencedName: segment, qualifier: userType };
  }
  return {
    typeReference: userType === undefined ? undefined : { typeElement: userType },
  };
};

/**
 * package geo
 *
 * @lang.deprecated abstract class Shape<T, ?> : geo.Base, geo.Named {
 *     class Corner
 *     inner class Edge
 *     fun area() {
 *         class Local
 *         object : geo.Base
 *         fun helper() { class Deep }
 *     }
 *     val cache = run { class Holder }
 *     init { class Init }
 * }
 * open class Base
 * trait Named : geo.Tagged
 * trait Tagged
 * enum class Color
 * annotation class Marker
 * object Registry
 * fun build() { class Helper; object }
 */
export const createShapesFile = (): SourceFileNode =>
  createSourceFile({
    name: "shapes.kt",
    packageName: "geo",
    declarations: [
      {
        kind: "class",
        name: "Shape",
        modifiers: ["abstract"],
        annotations: [annotation("lang", "deprecated")],
        typeParameters: [{ name: "T" }, { name: undefined }],
        superTypes: ["geo.Base", "geo.Named"],
        declarations: [
          { kind: "class", name: "Corner" },
          { kind: "class", name: "Edge", modifiers: ["inner"] },
          {
            kind: "function",
            name: "area",
            declarations: [
              { kind: "class", name: "Local" },
              { kind: "objectLiteral", superTypes: ["geo.Base"] },
              {
                kind: "function",
                name: "helper",
                declarations: [{ kind: "class", name: "Deep" }],
              },
            ],
          },
          {
            kind: "property",
            name: "cache",
            declarations: [{ kind: "class", name: "Holder" }],
          },
          {
            kind: "initializer",
            declarations: [{ kind: "class", name: "Init" }],
          },
        ],
      },
      { kind: "class", name: "Base", modifiers: ["open"] },
      {
        kind: "class",
        name: "Named",
        isTrait: true,
        superTypes: ["geo.Tagged"],
      },
      { kind: "class", name: "Tagged", isTrait: true },
      { kind: "class", name: "Color", modifiers: ["enum"] },
      { kind: "class", name: "Marker", modifiers: ["annotation"] },
      { kind: "object", name: "Registry" },
      {
        kind: "function",
        name: "build",
        declarations: [
          { kind: "class", name: "Helper" },
          { kind: "objectLiteral" },
        ],
      },
    ],
  });
