/**
 * create-deployable-zip.ts - Build the deployment archive
 *
 * Deletes any previous archive, then writes a fresh zip at the lowest zlib level
 * (fastest). Files are stored under their own name, directories recursively
 * under "name/...".
 */

import fs from "node:fs";
import path from "node:path";
import archiver from "archiver";
import AdmZip from "adm-zip";
import type { CollectedEntry } from "./collect-files.js";
import { FilesystemError, isNodeError } from "./errors.js";

export const FASTEST_COMPRESSION_LEVEL = 1;

export interface CreateDeployableZipOptions {
  /** Directory the archive is written into */
  workingDir: string;
  /** Entries to archive, as returned by collectEntries() */
  entries: readonly CollectedEntry[];
  /** Archive file name (defaults to app.zip) */
  archiveName?: string;
  /** Logging function */
  log?: (message: string) => void;
}

export interface DeployableZip {
  archivePath: string;
  /** Number of file entries stored */
  entryCount: number;
  bytes: number;
}

/**
 * Delete the archive left by a previous run. Failure is fatal.
 */
export function removeExistingArchive(archivePath: string, log: (message: string) => void = () => {}): boolean {
  try {
    fs.unlinkSync(archivePath);
  } catch (err) {
    if (isNodeError(err, "ENOENT")) {
      return false;
    }
    throw new FilesystemError("Could not delete existing archive", archivePath, err);
  }
  log(`Removed previous ${path.basename(archivePath)}`);
  return true;
}

/**
 * Names of the file entries stored in a zip (directory entries are skipped).
 */
export function listArchiveEntries(archivePath: string): string[] {
  let zip: AdmZip;
  try {
    zip = new AdmZip(archivePath);
  } catch (err) {
    throw new FilesystemError("Could not read archive", archivePath, err);
  }
  return zip
    .getEntries()
    .filter(entry => !entry.isDirectory)
    .map(entry => entry.entryName);
}

function writeArchive(archivePath: string, entries: readonly CollectedEntry[]): Promise<void> {
  return new Promise((resolve, reject) => {
    // "wx" fails if something reappeared at the path after the delete
    const output = fs.createWriteStream(archivePath, { flags: "wx" });
    const archive = archiver("zip", { zlib: { level: FASTEST_COMPRESSION_LEVEL } });

    const fail = (message: string, target: string) => (err: unknown) => {
      archive.abort();
      reject(new FilesystemError(message, target, err));
    };

    output.on("close", () => resolve());
    output.on("error", fail("Could not write archive", archivePath));
    archive.on("error", fail("Could not archive entry", archivePath));
    // archiver reports unreadable sources (ENOENT and the like) as warnings
    archive.on("warning", fail("Could not read entry", archivePath));

    archive.pipe(output);

    for (const entry of entries) {
      if (entry.isDirectory) {
        // directory() writes no entry for the root itself, so an empty one would vanish
        archive.append("", { name: `${entry.name}/` });
        archive.directory(entry.fullPath, entry.name);
      } else {
        archive.file(entry.fullPath, { name: entry.name });
      }
    }

    archive.finalize().catch(fail("Could not finalize archive", archivePath));
  });
}

/**
 * Create the deployment archive from the collected entries.
 *
 * @returns Path, file count and size of the new archive
 */
export async function createDeployableZip(options: CreateDeployableZipOptions): Promise<DeployableZip> {
  const { workingDir, entries } = options;
  const log = options.log ?? console.log;
  const archivePath = path.join(workingDir, options.archiveName ?? "app.zip");

  removeExistingArchive(archivePath, log);

  const sources = entries.filter(entry => {
    if (path.resolve(entry.fullPath) === path.resolve(archivePath)) {
      log(`Warning: skipping ${entry.name} (the archive cannot contain itself; list it in the exclusion file)`);
      return false;
    }
    return true;
  });

  if (sources.length === 0) {
    log("Warning: no entries to archive");
  }

  await writeArchive(archivePath, sources);

  const bytes = fs.statSync(archivePath).size;
  const entryCount = listArchiveEntries(archivePath).length;
  log(`Created ${path.basename(archivePath)}: ${entryCount} files, ${(bytes / 1024).toFixed(1)} KB`);

  return { archivePath, entryCount, bytes };
}
