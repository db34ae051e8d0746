/**
 * Stub tree lookups
 */

import type { ClassStub, StubFile } from "./types.js";

/**
 * Every class in the file, inner classes included, in pre-order
 */
export const allClasses = (stubFile: StubFile): readonly ClassStub[] => {
  const result: ClassStub[] = [];
  const visit = (stub: ClassStub): void => {
    result.push(stub);
    stub.innerClasses.forEach(visit);
  };
  stubFile.classes.forEach(visit);
  return result;
};

export const findClass = (
  qualifiedName: string,
  stubFile: StubFile
): ClassStub | undefined =>
  allClasses(stubFile).find((stub) => stub.qualifiedName === qualifiedName);
