/**
 * Collaborator contracts - Public API
 */

export type { TargetClass } from "./target-class.js";
export type { BinaryNamePredictor } from "./binary-name-predictor.js";
export type {
  StubRoot,
  ClassInfo,
  StubBundle,
  StubBuilder,
} from "./stub-builder.js";
export type { BuiltIns, SemanticResolver } from "./semantic-resolver.js";
export type {
  MethodMirror,
  PropertyAccessorMirrors,
  MemberMirrors,
} from "./member-mirrors.js";
export {
  type SearchScope,
  type ClassReference,
  type ClassType,
  type TypeFactory,
  ALL_SCOPE,
} from "./type-factory.js";
