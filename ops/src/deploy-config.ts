/**
 * deploy-config.ts - Configuration loader for funcdeploy
 *
 * Loads the optional .funcdeploy/config.json, walking up directories from the
 * working directory until it finds one. Every field is optional; anything not
 * set falls back to the defaults below.
 */

import fs from "node:fs";
import path from "node:path";
import { FilesystemError, InvalidConfigError } from "./errors.js";

// ============================================================================
// Types
// ============================================================================

export interface DeployConfig {
  /** Name of the exclusion file in the working directory */
  ignoreFile: string;
  /** Name of the archive written into the working directory */
  archiveName: string;
  /** Cloud CLI executable used for the upload */
  cli: string;
}

export const DEFAULT_DEPLOY_CONFIG: Readonly<DeployConfig> = {
  ignoreFile: ".funcignore",
  archiveName: "app.zip",
  cli: "az",
};

const CONFIG_DIR = ".funcdeploy";
const CONFIG_FILENAME = "config.json";

// ============================================================================
// Config File Discovery
// ============================================================================

/**
 * Find the config file by walking up directories from startDir.
 * Returns the path to the config file, or null if not found.
 */
export function findConfigFile(startDir: string): string | null {
  let dir = path.resolve(startDir);

  while (true) {
    const configPath = path.join(dir, CONFIG_DIR, CONFIG_FILENAME);
    if (fs.existsSync(configPath)) {
      return configPath;
    }
    const parent = path.dirname(dir);
    if (parent === dir) {
      return null;
    }
    dir = parent;
  }
}

// ============================================================================
// Validation
// ============================================================================

function validateConfig(config: unknown, configPath: string): asserts config is Partial<DeployConfig> {
  if (typeof config !== "object" || config === null || Array.isArray(config)) {
    throw new InvalidConfigError(`${configPath}: Config must be an object`);
  }

  for (const key of ["ignoreFile", "archiveName", "cli"] as const) {
    const value: unknown = Reflect.get(config, key);
    if (value === undefined) continue;
    if (typeof value !== "string" || value.trim() === "") {
      throw new InvalidConfigError(`${configPath}: Invalid '${key}' (non-empty string required)`);
    }
  }

  const archiveName: unknown = Reflect.get(config, "archiveName");
  if (typeof archiveName === "string") {
    assertArchiveName(archiveName, configPath);
  }
}

/**
 * The archive always lands in the working directory, so only a bare *.zip name is accepted.
 */
export function assertArchiveName(name: string, source: string): void {
  if (path.basename(name) !== name || name === "." || name === "..") {
    throw new InvalidConfigError(`${source}: archiveName must be a file name, not a path: ${name}`);
  }
  if (!name.toLowerCase().endsWith(".zip")) {
    throw new InvalidConfigError(`${source}: archiveName must end in .zip: ${name}`);
  }
}

// ============================================================================
// Config Loading
// ============================================================================

/**
 * Load the deploy config, merged over the defaults.
 *
 * @param startDir - Directory to start searching from (defaults to cwd)
 * @throws InvalidConfigError if a config file exists but is malformed
 */
export function loadDeployConfig(startDir?: string): DeployConfig {
  const searchDir = startDir ?? process.cwd();
  const configPath = findConfigFile(searchDir);

  if (!configPath) {
    return { ...DEFAULT_DEPLOY_CONFIG };
  }

  let content: string;
  try {
    content = fs.readFileSync(configPath, "utf-8");
  } catch (err) {
    throw new FilesystemError("Could not read config", configPath, err);
  }

  let parsed: unknown;

  try {
    parsed = JSON.parse(content);
  } catch (err) {
    throw new InvalidConfigError(`${configPath}: Invalid JSON - ${err instanceof Error ? err.message : err}`, err);
  }

  validateConfig(parsed, configPath);

  return {
    ignoreFile: parsed.ignoreFile ?? DEFAULT_DEPLOY_CONFIG.ignoreFile,
    archiveName: parsed.archiveName ?? DEFAULT_DEPLOY_CONFIG.archiveName,
    cli: parsed.cli ?? DEFAULT_DEPLOY_CONFIG.cli,
  };
}

/**
 * Apply explicit overrides (CLI flags, API options) on top of a loaded config.
 * Keys left undefined keep the loaded value.
 */
export function mergeDeployConfig(base: DeployConfig, overrides: Partial<DeployConfig> = {}): DeployConfig {
  return {
    ignoreFile: overrides.ignoreFile ?? base.ignoreFile,
    archiveName: overrides.archiveName ?? base.archiveName,
    cli: overrides.cli ?? base.cli,
  };
}
