/**
 * Light class context
 *
 * Everything a light class needs from its surroundings, created once per
 * project model and shared by every view built from it.
 */

import {
  SimpleModificationTracker,
  type ClassOrObjectNode,
} from "@classview/frontend";
import { StubCache } from "./caching/stub-cache.js";
import type { BinaryNamePredictor } from "./contracts/binary-name-predictor.js";
import type { MemberMirrors } from "./contracts/member-mirrors.js";
import type { SemanticResolver } from "./contracts/semantic-resolver.js";
import type { StubBuilder } from "./contracts/stub-builder.js";
import type { TypeFactory } from "./contracts/type-factory.js";
import { resolveConfig, type ResolvedLightClassConfig } from "./config.js";
import { createMemberMirrors } from "./defaults/member-mirrors.js";
import { createTypeFactory } from "./defaults/type-factory.js";
import { defaultBinaryNamePredictor } from "./naming/binary-names.js";
import { createLightClass } from "./view/factory.js";
import type { LightClassForDeclaration } from "./view/light-class.js";

export type LightClassContext = {
  readonly config: ResolvedLightClassConfig;
  /** Bumped by the host on changes outside any single file */
  readonly modificationTracker: SimpleModificationTracker;
  readonly stubCache: StubCache;
  readonly predictor: BinaryNamePredictor;
  readonly resolver: SemanticResolver;
  readonly memberMirrors: MemberMirrors;
  readonly typeFactory: TypeFactory;
  readonly getLightClass: (
    decl: ClassOrObjectNode
  ) => LightClassForDeclaration | undefined;
};

export type LightClassContextOptions = {
  readonly stubBuilder: StubBuilder;
  readonly resolver: SemanticResolver;
  readonly config?: ResolvedLightClassConfig;
  readonly modificationTracker?: SimpleModificationTracker;
  readonly predictor?: BinaryNamePredictor;
  readonly memberMirrors?: MemberMirrors;
  readonly typeFactory?: TypeFactory;
};

export const createLightClassContext = (
  options: LightClassContextOptions
): LightClassContext => {
  const config = options.config ?? resolveConfig();
  const modificationTracker =
    options.modificationTracker ?? new SimpleModificationTracker();

  const getLightClass = (
    decl: ClassOrObjectNode
  ): LightClassForDeclaration | undefined => createLightClass(context, decl);

  const context: LightClassContext = {
    config,
    modificationTracker,
    stubCache: new StubCache(options.stubBuilder, {
      modificationTracker,
      verbose: config.verbose,
    }),
    predictor: options.predictor ?? defaultBinaryNamePredictor,
    resolver: options.resolver,
    memberMirrors: options.memberMirrors ?? createMemberMirrors(getLightClass),
    typeFactory: options.typeFactory ?? createTypeFactory(modificationTracker),
    getLightClass,
  };
  return context;
};
