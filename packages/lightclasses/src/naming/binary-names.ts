/**
 * Internal (binary) name prediction
 *
 * Package path with "/", nesting with "$":
 *
 * Source:    package geo; class Shape { class Corner }
 * Internal:  geo/Shape$Corner
 *
 * Local and anonymous declarations cannot be predicted from their position
 * alone; their names come from the stub-building pass.
 */

import {
  isClassOrObject,
  packageToInternalPath,
  shortName,
  type ClassOrObjectNode,
} from "@classview/frontend";
import type { BinaryNamePredictor } from "../contracts/binary-name-predictor.js";
import { capitalize } from "./identifiers.js";

const packagePrefix = (packageName: string): string =>
  packageName === "" ? "" : `${packageToInternalPath(packageName)}/`;

/**
 * Simple name of the facade class holding package-level functions and
 * properties, e.g. "GeoPackage" for package "org.geo"
 */
export const getPackageFacadeName = (packageName: string): string =>
  packageName === ""
    ? "_DefaultPackage"
    : `${capitalize(shortName(packageName))}Package`;

export const getPackageFacadeInternalName = (packageName: string): string =>
  `${packagePrefix(packageName)}${getPackageFacadeName(packageName)}`;

export const predictInternalName = (
  decl: ClassOrObjectNode
): string | undefined => {
  if (decl.name === undefined) return undefined;

  const parent = decl.parent;
  if (parent.kind === "file") {
    return `${packagePrefix(parent.packageName)}${decl.name}`;
  }
  if (!isClassOrObject(parent)) return undefined;

  const outer = predictInternalName(parent);
  return outer === undefined ? undefined : `${outer}$${decl.name}`;
};

export const defaultBinaryNamePredictor: BinaryNamePredictor = {
  predict: predictInternalName,
};
