/**
 * cli.ts - Command line front end for funcdeploy
 *
 * Usage: funcdeploy <resourceGroup> <functionAppName> [options]
 *
 * Parses argv, runs the deploy pipeline, and turns the outcome into an exit code.
 * The external CLI's own exit code is passed through unchanged.
 */

import { parseArgs, readStringFlag } from "./parse-args.js";
import { deployFunctionApp } from "./deploy.js";
import type { CommandRunner } from "./az-functionapp.js";
import { exitCodeFor } from "./errors.js";

export interface RunCliDeps {
  cwd?: string;
  runner?: CommandRunner;
  log?: (message: string) => void;
  error?: (message: string) => void;
}

const BOOLEAN_FLAGS = ["help", "h", "dryRun"];
const KNOWN_FLAGS = new Set([...BOOLEAN_FLAGS, "ignoreFile", "archive"]);

export const USAGE = `
Usage: funcdeploy <resourceGroup> <functionAppName> [options]

Packages the current directory into app.zip, leaving out entries matched by
.funcignore, and zip-deploys it to an Azure Function App.

Options:
  -dryRun              Build the archive and print the deploy command without running it
  -ignoreFile <name>   Exclusion file to read (default .funcignore)
  -archive <name>      Archive file to write (default app.zip)
  -help                Show this help

Examples:
  funcdeploy rg-prod func-orders
  funcdeploy rg-prod func-orders -dryRun
`;

/**
 * Run the CLI and resolve to the process exit code. Never rejects.
 */
export async function runCli(argv: string[], deps: RunCliDeps = {}): Promise<number> {
  const log = deps.log ?? console.log;
  const error = deps.error ?? console.error;

  const { parsed, errors } = parseArgs(argv, { booleans: BOOLEAN_FLAGS });

  if (errors.length > 0) {
    for (const err of errors) {
      error(`Error: ${err}`);
    }
    return 2;
  }

  const { positionals, flags } = parsed;

  if (flags.help || flags.h) {
    log(USAGE);
    return 0;
  }

  if (positionals.length === 0) {
    log(USAGE);
    return 2;
  }

  const unknown = Object.keys(flags).filter(key => !KNOWN_FLAGS.has(key));
  if (unknown.length > 0) {
    error(`Error: Unknown option: -${unknown[0]}`);
    return 2;
  }

  try {
    await deployFunctionApp({
      args: positionals,
      cwd: deps.cwd,
      config: {
        ignoreFile: readStringFlag(flags, "ignoreFile"),
        archiveName: readStringFlag(flags, "archive"),
      },
      dryRun: flags.dryRun === true,
      runner: deps.runner,
      log,
    });
    return 0;
  } catch (err) {
    error(`Error: ${err instanceof Error ? err.message : err}`);
    return exitCodeFor(err);
  }
}
