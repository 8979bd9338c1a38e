/**
 * funcdeploy - Zip deploy for Azure Function Apps
 *
 * Main entry point. Re-exports all public APIs.
 */

// Config
export {
  loadDeployConfig,
  mergeDeployConfig,
  findConfigFile,
  DEFAULT_DEPLOY_CONFIG,
  type DeployConfig
} from "./deploy-config.js";

// Errors
export {
  DeployError,
  MissingArgumentError,
  MissingExclusionFileError,
  InvalidExclusionFileError,
  InvalidConfigError,
  FilesystemError,
  ExternalToolError,
  exitCodeFor,
  type DeployErrorKind
} from "./errors.js";

// Arguments
export {
  parseArgs,
  readInvocationArgs,
  type ParsedArgs,
  type ParseArgsResult,
  type InvocationArgs
} from "./parse-args.js";

// Exclusions & file collection
export { loadExclusions, parseExclusionTable } from "./funcignore.js";
export { collectEntries, matchesPattern, isExcluded, type CollectedEntry } from "./collect-files.js";

// Archive
export {
  createDeployableZip,
  listArchiveEntries,
  removeExistingArchive,
  type CreateDeployableZipOptions,
  type DeployableZip
} from "./create-deployable-zip.js";

// Azure CLI
export {
  buildZipDeployCommand,
  deployZipPackage,
  formatCommand,
  runCommand,
  type CommandRunner,
  type CommandRunResult,
  type ZipDeployRequest,
  type ExternalCommand
} from "./az-functionapp.js";

// Pipeline
export {
  deployFunctionApp,
  type DeployFunctionAppOptions,
  type DeployResult
} from "./deploy.js";

export { runCli } from "./cli.js";
