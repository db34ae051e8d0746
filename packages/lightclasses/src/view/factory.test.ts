/**
 * Tests for the light class factory
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { createSourceFile } from "@classview/frontend";
import { resolveConfig } from "../config.js";
import { createLightClassContext } from "../context.js";
import {
  classAt,
  createHarnessContext,
  createHarnessResolver,
  createHarnessStubBuilder,
} from "../testing/harness.js";
import { AnonymousLightClass } from "./anonymous.js";
import { createLightClass } from "./factory.js";
import { LightClassForDeclaration } from "./light-class.js";

const file = createSourceFile({
  name: "core.kt",
  packageName: "lang",
  declarations: [{ kind: "class", name: "Any" }],
});

const appFile = createSourceFile({
  name: "app.kt",
  packageName: "app",
  declarations: [
    { kind: "class", name: "Main" },
    { kind: "class" },
    {
      kind: "function",
      name: "run",
      declarations: [{ kind: "objectLiteral" }],
    },
  ],
});

describe("createLightClass", () => {
  it("should create plain light classes for named declarations", () => {
    const { context } = createHarnessContext();

    const lightClass = createLightClass(context, classAt(appFile, "Main"));

    expect(lightClass).to.be.instanceOf(LightClassForDeclaration);
    expect(lightClass).to.not.be.instanceOf(AnonymousLightClass);
    expect(lightClass?.getQualifiedName()).to.equal("app.Main");
  });

  it("should create anonymous light classes for object literals", () => {
    const { context } = createHarnessContext();

    const lightClass = createLightClass(context, classAt(appFile, "run", 0));

    expect(lightClass).to.be.instanceOf(AnonymousLightClass);
    expect(lightClass?.getQualifiedName()).to.equal("app.AppPackage.run.1");
  });

  it("should skip built-in packages", () => {
    const { context } = createHarnessContext({
      config: resolveConfig({ builtInPackages: ["lang"] }),
    });

    expect(createLightClass(context, classAt(file, "Any"))).to.equal(
      undefined
    );
  });

  it("should skip declarations without a predictable name", () => {
    const { context } = createHarnessContext();

    expect(createLightClass(context, classAt(appFile, 1))).to.equal(undefined);
  });

  it("should use the context predictor", () => {
    const context = createLightClassContext({
      stubBuilder: createHarnessStubBuilder(),
      resolver: createHarnessResolver(),
      predictor: { predict: () => "custom/Name$Inner" },
    });

    expect(
      context.getLightClass(classAt(appFile, "Main"))?.getQualifiedName()
    ).to.equal("custom.Name.Inner");
  });
});
