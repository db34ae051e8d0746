/**
 * classview frontend - source declaration trees and the resolved model
 */

export * from "./tree/index.js";
export * from "./names.js";
export type { ClassDescriptor, SupertypeRef } from "./semantic/descriptors.js";
export { type Result, ok, error } from "./types/result.js";
