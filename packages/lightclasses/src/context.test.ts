/**
 * Tests for context creation
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { SimpleModificationTracker } from "@classview/frontend";
import { resolveConfig, DEFAULT_ROOT_TYPE } from "./config.js";
import { createLightClassContext } from "./context.js";
import {
  classAt,
  createHarnessResolver,
  createHarnessStubBuilder,
} from "./testing/harness.js";
import { createShapesFile } from "./testing/fixtures.js";

describe("createLightClassContext", () => {
  it("should fill in defaults", () => {
    const context = createLightClassContext({
      stubBuilder: createHarnessStubBuilder(),
      resolver: createHarnessResolver(),
    });

    expect(context.config.rootTypeName).to.equal(DEFAULT_ROOT_TYPE);
    expect(context.config.verbose).to.equal(false);
    expect(context.modificationTracker.modificationCount).to.equal(0);
  });

  it("should share the given tracker with its caches", () => {
    const file = createShapesFile();
    const modificationTracker = new SimpleModificationTracker();
    const stubBuilder = createHarnessStubBuilder();
    const context = createLightClassContext({
      stubBuilder,
      resolver: createHarnessResolver(),
      modificationTracker,
    });
    const shape = classAt(file, "Shape");

    context.stubCache.getBundle(shape);
    modificationTracker.incModificationCount();
    context.stubCache.getBundle(shape);

    expect(context.modificationTracker).to.equal(modificationTracker);
    expect(stubBuilder.builtRoots.length).to.equal(2);
  });

  it("should pass the verbose flag to the stub cache", () => {
    const file = createShapesFile();
    const context = createLightClassContext({
      stubBuilder: createHarnessStubBuilder(),
      resolver: createHarnessResolver(),
      config: resolveConfig({ verbose: true }),
    });

    const originalLog = console.log;
    const lines: string[] = [];
    console.log = (message: string) => {
      lines.push(message);
    };
    try {
      context.getLightClass(classAt(file, "build", "Helper"));
    } finally {
      console.log = originalLog;
    }

    expect(lines).to.deep.equal([
      "[Stub Cache] Computing stubs for shapes.kt:build",
    ]);
  });
});
