/**
 * CLI argument parser for funcdeploy.
 *
 * Supports:
 * - Positionals: rg1 app1 → { positionals: ["rg1", "app1"] }
 * - Flags: -dryRun, --help → { dryRun: true, help: true }
 * - Key/value with equals: -archive=site.zip → { archive: "site.zip" }
 * - Key/value with space: -archive site.zip → { archive: "site.zip" }
 */

import { MissingArgumentError } from "./errors.js";

export interface ParsedArgs {
  positionals: string[];
  flags: Record<string, string | boolean>;
}

export interface ParseArgsResult {
  parsed: ParsedArgs;
  errors: string[];
}

export interface ParseArgsOptions {
  /** Keys that never take a value, so the following token stays positional */
  booleans?: string[];
}

export interface InvocationArgs {
  resourceGroup: string;
  functionAppName: string;
}

/**
 * Parse CLI arguments into positionals and flags.
 * A key not listed in `booleans` takes the next non-dash token as its value.
 */
export function parseArgs(args: string[], options: ParseArgsOptions = {}): ParseArgsResult {
  const errors: string[] = [];
  const booleans = new Set(options.booleans ?? []);
  const positionals: string[] = [];
  const flags: Record<string, string | boolean> = {};

  let pendingKey: string | null = null;

  for (const token of args) {
    if (token.startsWith("-") && token !== "-") {
      // Complete any pending key without value (treat as boolean flag)
      if (pendingKey !== null) {
        flags[pendingKey] = true;
        pendingKey = null;
      }

      // Strip leading dashes
      const stripped = token.replace(/^--?/, "");
      if (stripped === "") {
        errors.push(`Invalid flag: ${token}`);
        continue;
      }

      const eqIndex = stripped.indexOf("=");
      if (eqIndex !== -1) {
        const key = normalizeKey(stripped.slice(0, eqIndex));
        if (booleans.has(key)) {
          errors.push(`Flag -${key} does not take a value`);
        } else {
          flags[key] = stripped.slice(eqIndex + 1);
        }
      } else {
        const key = normalizeKey(stripped);
        if (booleans.has(key)) {
          flags[key] = true;
        } else {
          pendingKey = key;
        }
      }
    } else if (pendingKey !== null) {
      flags[pendingKey] = token;
      pendingKey = null;
    } else {
      positionals.push(token);
    }
  }

  // Complete any pending key at end
  if (pendingKey !== null) {
    flags[pendingKey] = true;
  }

  return {
    parsed: { positionals, flags },
    errors,
  };
}

/**
 * Read the resource group and function app name from the positionals.
 * Both are required; the values are passed on exactly as given.
 */
export function readInvocationArgs(positionals: readonly string[]): InvocationArgs {
  const [resourceGroup, functionAppName, ...rest] = positionals;

  if (resourceGroup === undefined || resourceGroup.trim() === "") {
    throw new MissingArgumentError("Missing required argument: <resourceGroup>");
  }
  if (functionAppName === undefined || functionAppName.trim() === "") {
    throw new MissingArgumentError("Missing required argument: <functionAppName>");
  }
  if (rest.length > 0) {
    throw new MissingArgumentError(`Unexpected argument: ${rest[0]}`);
  }

  return { resourceGroup, functionAppName };
}

/**
 * Read an optional string flag. A flag given without a value is an error.
 */
export function readStringFlag(flags: ParsedArgs["flags"], key: string): string | undefined {
  const value = flags[key];
  if (value === undefined) return undefined;
  if (typeof value !== "string" || value === "") {
    throw new MissingArgumentError(`Flag -${key} requires a value`);
  }
  return value;
}

/**
 * Normalize a key to camelCase.
 * -dry-run becomes dryRun
 * -dryRun stays dryRun
 */
function normalizeKey(key: string): string {
  // Convert kebab-case to camelCase
  return key.replace(/-([a-z])/g, (_, c: string) => c.toUpperCase());
}
