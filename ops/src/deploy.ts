/**
 * deploy.ts - Zip deploy pipeline
 *
 * ReadArgs -> LoadExclusions -> CollectFiles -> Archive -> Deploy, in that order.
 * The first failing step aborts the run; nothing is retried. An archive that was
 * already written stays on disk for a manual retry.
 */

import path from "node:path";
import { loadDeployConfig, mergeDeployConfig, assertArchiveName, type DeployConfig } from "./deploy-config.js";
import { readInvocationArgs, type InvocationArgs } from "./parse-args.js";
import { loadExclusions } from "./funcignore.js";
import { collectEntries } from "./collect-files.js";
import { createDeployableZip } from "./create-deployable-zip.js";
import {
  buildZipDeployCommand,
  deployZipPackage,
  formatCommand,
  type CommandRunner,
  type ExternalCommand,
} from "./az-functionapp.js";

// ============================================================================
// Types
// ============================================================================

export interface DeployFunctionAppOptions {
  /** Positional arguments: <resourceGroup> <functionAppName> */
  args: readonly string[];
  /** Working directory to package (defaults to process.cwd()) */
  cwd?: string;
  /** Overrides for the values from .funcdeploy/config.json */
  config?: Partial<DeployConfig>;
  /** Build the archive and print the command, but do not upload */
  dryRun?: boolean;
  /** Runs the external CLI (defaults to a synchronous child process) */
  runner?: CommandRunner;
  /** Logging function */
  log?: (message: string) => void;
}

export interface DeployResult {
  invocation: InvocationArgs;
  archivePath: string;
  entryCount: number;
  command: ExternalCommand;
  /** False for a dry run */
  deployed: boolean;
}

// ============================================================================
// Main Export
// ============================================================================

/**
 * Package the working directory and zip-deploy it to a function app.
 *
 * @throws DeployError from whichever step failed
 */
export async function deployFunctionApp(options: DeployFunctionAppOptions): Promise<DeployResult> {
  const log = options.log ?? console.log;
  const workingDir = path.resolve(options.cwd ?? process.cwd());

  try {
    // Step 1: Arguments
    const invocation = readInvocationArgs(options.args);

    const config = mergeDeployConfig(loadDeployConfig(workingDir), options.config);
    assertArchiveName(config.archiveName, "archive");

    // Step 2: Exclusions
    log(`Reading ${config.ignoreFile}...`);
    const patterns = loadExclusions(workingDir, config.ignoreFile);
    log(`${patterns.length} exclusion pattern(s)`);

    // Step 3: Collect
    const entries = collectEntries(workingDir, patterns);
    log(`Collected ${entries.length} entries: ${entries.map(entry => entry.name).join(", ")}`);

    // Step 4: Archive
    log(`Creating ${config.archiveName}...`);
    const zip = await createDeployableZip({
      workingDir,
      entries,
      archiveName: config.archiveName,
      log,
    });

    const request = { ...invocation, archivePath: zip.archivePath, cli: config.cli };

    if (options.dryRun) {
      const command = buildZipDeployCommand(request);
      log(`Dry run - would run: ${formatCommand(command)}`);
      return { invocation, archivePath: zip.archivePath, entryCount: zip.entryCount, command, deployed: false };
    }

    // Step 5: Deploy
    const command = deployZipPackage(request, { runner: options.runner, log });

    log("\n✓ Deploy complete!");

    return { invocation, archivePath: zip.archivePath, entryCount: zip.entryCount, command, deployed: true };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    log(`\n✗ Deploy failed: ${message}`);
    throw error;
  }
}
