/**
 * collect-files.ts - Pick the working directory entries that go into the archive
 *
 * Only the direct children of the working directory are matched against the
 * exclusion patterns. A directory that survives is archived with its whole subtree.
 *
 * Pattern syntax (matched case-insensitively against the entry name):
 *   - "*"      any run of characters, including none
 *   - "?"      exactly one character
 *   - "[abc]"  one of the listed characters; "[a-z]" for a range
 *   - anything else is literal, so "node_modules" only matches that name
 */

import fs from "node:fs";
import path from "node:path";
import { FilesystemError, InvalidExclusionFileError } from "./errors.js";

export interface CollectedEntry {
  /** Entry name relative to the working directory */
  name: string;
  fullPath: string;
  isDirectory: boolean;
}

const patternCache = new Map<string, RegExp>();

function escapeRegex(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\/-]/g, "\\$&");
}

/**
 * Compile a wildcard pattern to an anchored regular expression.
 */
function compilePattern(pattern: string): RegExp {
  let source = "";

  for (let i = 0; i < pattern.length; i++) {
    const ch = pattern[i];

    if (ch === "*") {
      source += ".*";
    } else if (ch === "?") {
      source += ".";
    } else if (ch === "[") {
      const close = pattern.indexOf("]", i + 2);
      if (close === -1) {
        // Unterminated bracket is a literal "["
        source += "\\[";
        continue;
      }
      const body = pattern.slice(i + 1, close);
      source += "[" + body.replace(/[\\\]^]/g, "\\$&") + "]";
      i = close;
    } else {
      source += escapeRegex(ch);
    }
  }

  try {
    return new RegExp("^" + source + "$", "is");
  } catch (err) {
    // e.g. a reversed range such as "[z-a]"
    throw new InvalidExclusionFileError(
      `Invalid exclusion pattern '${pattern}': ${err instanceof Error ? err.message : err}`
    );
  }
}

/**
 * Check if an entry name matches a wildcard pattern.
 */
export function matchesPattern(name: string, pattern: string): boolean {
  let regex = patternCache.get(pattern);
  if (!regex) {
    regex = compilePattern(pattern);
    patternCache.set(pattern, regex);
  }
  return regex.test(name);
}

/**
 * Check if an entry name should be excluded.
 */
export function isExcluded(name: string, excludePatterns: readonly string[]): boolean {
  return excludePatterns.some(pattern => matchesPattern(name, pattern));
}

/**
 * List the direct entries of workingDir that no exclusion pattern matches.
 * Order follows the directory listing.
 */
export function collectEntries(workingDir: string, excludePatterns: readonly string[]): CollectedEntry[] {
  let entries: fs.Dirent[];
  try {
    entries = fs.readdirSync(workingDir, { withFileTypes: true });
  } catch (err) {
    throw new FilesystemError("Could not list directory", workingDir, err);
  }

  const results: CollectedEntry[] = [];
  for (const entry of entries) {
    if (isExcluded(entry.name, excludePatterns)) {
      continue;
    }
    const fullPath = path.join(workingDir, entry.name);
    results.push({
      name: entry.name,
      fullPath,
      isDirectory: entry.isDirectory() || (entry.isSymbolicLink() && isDirectoryTarget(fullPath)),
    });
  }

  return results;
}

function isDirectoryTarget(fullPath: string): boolean {
  return fs.statSync(fullPath, { throwIfNoEntry: false })?.isDirectory() ?? false;
}
