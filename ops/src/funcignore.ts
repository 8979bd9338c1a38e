/**
 * funcignore.ts - Load the exclusion list
 *
 * The exclusion file is a one-column CSV table:
 *
 *   Exclude
 *   *.zip
 *   node_modules
 *   "name, with comma"
 *
 * Each row under the "Exclude" header is one wildcard pattern.
 */

import fs from "node:fs";
import path from "node:path";
import { FilesystemError, InvalidExclusionFileError, MissingExclusionFileError, isNodeError } from "./errors.js";

export const EXCLUDE_COLUMN = "Exclude";

/**
 * Split CSV text into rows of cells. Quoted cells may contain commas and line
 * breaks, and "" inside quotes is a literal quote.
 */
function parseCsvRows(text: string): string[][] {
  const rows: string[][] = [];
  let row: string[] = [];
  let current = "";
  let inQuotes = false;

  const endRow = () => {
    row.push(current);
    rows.push(row.map(cell => cell.trim()));
    row = [];
    current = "";
  };

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];

    if (inQuotes) {
      if (ch === '"' && text[i + 1] === '"') {
        current += '"';
        i++;
      } else if (ch === '"') {
        inQuotes = false;
      } else {
        current += ch;
      }
    } else if (ch === '"') {
      inQuotes = true;
    } else if (ch === ",") {
      row.push(current);
      current = "";
    } else if (ch === "\n") {
      endRow();
    } else if (ch === "\r" && text[i + 1] === "\n") {
      // CRLF: the "\n" ends the row
    } else {
      current += ch;
    }
  }

  endRow();
  return rows.filter(cells => cells.some(cell => cell !== ""));
}

/**
 * Parse the exclusion table text into an ordered list of patterns.
 *
 * @param text - File contents
 * @param source - Path used in error messages
 */
export function parseExclusionTable(text: string, source: string): string[] {
  const rows = parseCsvRows(text.replace(/^\uFEFF/, ""));

  if (rows.length === 0) {
    throw new InvalidExclusionFileError(`${source}: Missing '${EXCLUDE_COLUMN}' header`);
  }

  const header = rows[0];
  const column = header.findIndex(name => name.toLowerCase() === EXCLUDE_COLUMN.toLowerCase());
  if (column === -1) {
    throw new InvalidExclusionFileError(
      `${source}: Missing '${EXCLUDE_COLUMN}' header (found: ${header.join(", ")})`
    );
  }

  const patterns: string[] = [];
  for (const cells of rows.slice(1)) {
    const cell = cells[column] ?? "";
    if (cell !== "") {
      patterns.push(cell);
    }
  }
  return patterns;
}

/**
 * Read the exclusion file from the working directory.
 *
 * @throws MissingExclusionFileError if the file does not exist
 */
export function loadExclusions(workingDir: string, fileName = ".funcignore"): string[] {
  const filePath = path.join(workingDir, fileName);

  let text: string;
  try {
    text = fs.readFileSync(filePath, "utf-8");
  } catch (err) {
    if (isNodeError(err, "ENOENT")) {
      throw new MissingExclusionFileError(filePath, err);
    }
    throw new FilesystemError("Could not read exclusion file", filePath, err);
  }

  return parseExclusionTable(text, filePath);
}
