/**
 * Source tree - Public API
 */

export * from "./nodes.js";
export * from "./builder.js";
export * from "./queries.js";
export { printDeclaration, printSourceFile } from "./printer.js";
export {
  type ModificationTracker,
  SimpleModificationTracker,
  FileModificationTracker,
} from "./modification.js";
