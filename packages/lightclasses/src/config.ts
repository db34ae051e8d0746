/**
 * Configuration loading and resolution
 */

import { existsSync, readFileSync } from "node:fs";
import { dirname, join, resolve } from "node:path";
import { type Result, ok, error } from "@classview/frontend";

export const CONFIG_FILE_NAME = "classview.json";

/**
 * Contents of classview.json
 */
export type LightClassConfig = {
  /** Universal root type of the target type system */
  readonly rootType?: string;
  /** Packages whose declarations never get light classes */
  readonly builtInPackages?: readonly string[];
  readonly verbose?: boolean;
};

export type ResolvedLightClassConfig = {
  readonly rootTypeName: string;
  readonly builtInPackages: ReadonlySet<string>;
  readonly verbose: boolean;
};

export const DEFAULT_ROOT_TYPE = "java.lang.Object";

const isStringArray = (value: unknown): value is readonly string[] =>
  Array.isArray(value) && value.every((item) => typeof item === "string");

const validateConfig = (
  raw: unknown
): Result<LightClassConfig, string> => {
  if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
    return error(`${CONFIG_FILE_NAME}: must be an object`);
  }

  const rootType = "rootType" in raw ? raw.rootType : undefined;
  if (
    rootType !== undefined &&
    (typeof rootType !== "string" || rootType === "")
  ) {
    return error(`${CONFIG_FILE_NAME}: 'rootType' must be a non-empty string`);
  }

  const builtInPackages =
    "builtInPackages" in raw ? raw.builtInPackages : undefined;
  if (builtInPackages !== undefined && !isStringArray(builtInPackages)) {
    return error(
      `${CONFIG_FILE_NAME}: 'builtInPackages' must be an array of strings`
    );
  }

  const verbose = "verbose" in raw ? raw.verbose : undefined;
  if (verbose !== undefined && typeof verbose !== "boolean") {
    return error(`${CONFIG_FILE_NAME}: 'verbose' must be a boolean`);
  }

  return ok({
    rootType: typeof rootType === "string" ? rootType : undefined,
    builtInPackages: isStringArray(builtInPackages)
      ? builtInPackages
      : undefined,
    verbose: typeof verbose === "boolean" ? verbose : undefined,
  });
};

/**
 * Load classview.json from a path
 */
export const loadConfig = (
  configPath: string
): Result<LightClassConfig, string> => {
  if (!existsSync(configPath)) {
    return error(`Config file not found: ${configPath}`);
  }

  try {
    const content = readFileSync(configPath, "utf-8");
    return validateConfig(JSON.parse(content));
  } catch (err) {
    return error(
      `Failed to parse ${CONFIG_FILE_NAME}: ${err instanceof Error ? err.message : String(err)}`
    );
  }
};

/**
 * Find classview.json by walking up the directory tree
 */
export const findConfig = (startDir: string): string | null => {
  let currentDir = resolve(startDir);

  while (true) {
    const configPath = join(currentDir, CONFIG_FILE_NAME);
    if (existsSync(configPath)) {
      return configPath;
    }

    const parentDir = dirname(currentDir);
    if (parentDir === currentDir) {
      return null;
    }
    currentDir = parentDir;
  }
};

/**
 * Merge a loaded config with programmatic overrides; overrides win
 */
export const resolveConfig = (
  config: LightClassConfig = {},
  overrides: LightClassConfig = {}
): ResolvedLightClassConfig => ({
  rootTypeName: overrides.rootType ?? config.rootType ?? DEFAULT_ROOT_TYPE,
  builtInPackages: new Set(
    overrides.builtInPackages ?? config.builtInPackages ?? []
  ),
  verbose: overrides.verbose ?? config.verbose ?? false,
});

/**
 * Resolve the config that applies to `startDir`. A missing file means
 * defaults; an unreadable one is reported and also falls back to defaults.
 */
export const loadConfigFromDirectory = (
  startDir: string,
  overrides: LightClassConfig = {}
): ResolvedLightClassConfig => {
  const configPath = findConfig(startDir);
  if (configPath === null) {
    return resolveConfig({}, overrides);
  }

  const loaded = loadConfig(configPath);
  if (!loaded.ok) {
    console.warn(`[Config] ${loaded.error}; using defaults`);
    return resolveConfig({}, overrides);
  }
  return resolveConfig(loaded.value, overrides);
};
