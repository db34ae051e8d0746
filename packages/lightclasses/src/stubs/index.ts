export type {
  StubModifier,
  StubClassKind,
  ParameterStub,
  FieldStub,
  MethodStub,
  ClassStub,
  StubFile,
} from "./types.js";
export { allClasses, findClass } from "./lookup.js";
export { printClassStub, printStubFile } from "./printer.js";
