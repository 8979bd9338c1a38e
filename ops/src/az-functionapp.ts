/**
 * az-functionapp.ts - Azure Functions zip deploy
 *
 * Uploads an archive with `az functionapp deployment source config-zip`.
 * One synchronous call, output streamed to the terminal, no retries.
 */

import spawn from "cross-spawn";
import { ExternalToolError } from "./errors.js";

// ============================================================================
// Types
// ============================================================================

export interface CommandRunResult {
  /** Exit status, or null when the process was killed by a signal */
  status: number | null;
  /** Set when the process could not be started at all */
  error?: Error;
}

export type CommandRunner = (command: string, args: readonly string[]) => CommandRunResult;

export interface ZipDeployRequest {
  resourceGroup: string;
  functionAppName: string;
  /** Absolute path of the archive to upload */
  archivePath: string;
  /** CLI executable (defaults to "az") */
  cli?: string;
}

export interface ExternalCommand {
  command: string;
  args: string[];
}

export interface DeployZipPackageOptions {
  runner?: CommandRunner;
  /** Logging function */
  log?: (message: string) => void;
}

/** Exit code used when the CLI cannot be started (not installed, not on PATH). */
export const COMMAND_NOT_FOUND_EXIT_CODE = 127;

// ============================================================================
// Helpers
// ============================================================================

export function buildZipDeployCommand(request: ZipDeployRequest): ExternalCommand {
  return {
    command: request.cli ?? "az",
    args: [
      "functionapp",
      "deployment",
      "source",
      "config-zip",
      "--resource-group",
      request.resourceGroup,
      "--name",
      request.functionAppName,
      "--src",
      request.archivePath,
    ],
  };
}

/**
 * Render a command for display. Arguments with whitespace or quotes are double-quoted.
 */
export function formatCommand({ command, args }: ExternalCommand): string {
  return [command, ...args]
    .map(part => (part === "" || /[\s"]/.test(part) ? `"${part.replace(/"/g, '\\"')}"` : part))
    .join(" ");
}

/**
 * Run a command with inherited stdio and wait for it to exit.
 * cross-spawn resolves the .cmd shim on Windows and escapes each argument.
 */
export const runCommand: CommandRunner = (command, args) => {
  const result = spawn.sync(command, [...args], { stdio: "inherit" });
  return { status: result.status, error: result.error };
};

// ============================================================================
// Main
// ============================================================================

/**
 * Upload the archive to the function app.
 *
 * @throws ExternalToolError carrying the tool's exit code when it fails
 */
export function deployZipPackage(request: ZipDeployRequest, options: DeployZipPackageOptions = {}): ExternalCommand {
  const runner = options.runner ?? runCommand;
  const log = options.log ?? console.log;
  const external = buildZipDeployCommand(request);

  log(`Deploying ${request.archivePath} to ${request.functionAppName} (resource group ${request.resourceGroup})`);
  log(`> ${formatCommand(external)}`);

  const result = runner(external.command, external.args);

  if (result.error) {
    throw new ExternalToolError(external.command, COMMAND_NOT_FOUND_EXIT_CODE, result.error.message, result.error);
  }
  if (result.status === null) {
    throw new ExternalToolError(external.command, 1, "terminated by signal");
  }
  if (result.status !== 0) {
    throw new ExternalToolError(external.command, result.status);
  }

  return external;
}
