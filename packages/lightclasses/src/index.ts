/**
 * classview light classes - read-only class views over source declarations
 */

export * from "./contracts/index.js";
export * from "./stubs/index.js";
export {
  InvariantViolationError,
  LocalDeclarationError,
  IncorrectOperationError,
  type LightClassErrorTag,
} from "./errors.js";
export {
  CONFIG_FILE_NAME,
  DEFAULT_ROOT_TYPE,
  type LightClassConfig,
  type ResolvedLightClassConfig,
  loadConfig,
  findConfig,
  resolveConfig,
  loadConfigFromDirectory,
} from "./config.js";
export { locateOutermost, findStubRoot } from "./locator.js";
export { StubCache, type StubCacheOptions } from "./caching/stub-cache.js";
export { lazy, type Lazy } from "./caching/lazy.js";
export {
  predictInternalName,
  getPackageFacadeName,
  getPackageFacadeInternalName,
  defaultBinaryNamePredictor,
} from "./naming/binary-names.js";
export {
  type LightClassContext,
  type LightClassContextOptions,
  createLightClassContext,
} from "./context.js";
export { createTypeFactory } from "./defaults/type-factory.js";
export { createMemberMirrors } from "./defaults/member-mirrors.js";
export {
  LightClassForDeclaration,
  type LightClassParent,
} from "./view/light-class.js";
export { AnonymousLightClass } from "./view/anonymous.js";
export { createLightClass } from "./view/factory.js";
export { LightFile } from "./view/light-file.js";
export { LightMethod, FileFacadeClass } from "./view/parent.js";
export {
  LightModifierList,
  computeModifiers,
  type TargetModifier,
} from "./view/modifiers.js";
export {
  LightTypeParameter,
  LightTypeParameterList,
  NO_NAME_PLACEHOLDER,
} from "./view/type-parameters.js";
