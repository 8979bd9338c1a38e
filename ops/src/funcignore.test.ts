import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { loadExclusions, parseExclusionTable } from "./funcignore.js";
import { InvalidExclusionFileError, MissingExclusionFileError } from "./errors.js";

describe("parseExclusionTable", () => {
  it("returns one pattern per row under the Exclude header", () => {
    const text = "Exclude\n*.zip\nnode_modules\n.venv\n";

    expect(parseExclusionTable(text, ".funcignore")).toEqual(["*.zip", "node_modules", ".venv"]);
  });

  it("handles CRLF, a byte-order mark, blank lines and padding", () => {
    const text = "\uFEFFExclude\r\n  *.log  \r\n\r\nlocal.settings.json\r\n";

    expect(parseExclusionTable(text, ".funcignore")).toEqual(["*.log", "local.settings.json"]);
  });

  it("unquotes cells and keeps embedded commas and quotes", () => {
    const text = '"Exclude"\n"a,b.txt"\n"say ""hi"".md"\n';

    expect(parseExclusionTable(text, ".funcignore")).toEqual(["a,b.txt", 'say "hi".md']);
  });

  it("keeps a line break inside a quoted cell", () => {
    const text = 'Exclude\r\n"multi\r\nline.txt"\r\n*.tmp\r\n';

    expect(parseExclusionTable(text, ".funcignore")).toEqual(["multi\r\nline.txt", "*.tmp"]);
  });

  it("reads the Exclude column when other columns are present", () => {
    const text = "Note,Exclude\nbuild output,dist\nempty,\nsecrets,*.pem\n";

    expect(parseExclusionTable(text, ".funcignore")).toEqual(["dist", "*.pem"]);
  });

  it("matches the header regardless of case", () => {
    expect(parseExclusionTable("exclude\n*.tmp\n", ".funcignore")).toEqual(["*.tmp"]);
  });

  it("accepts a header with no rows", () => {
    expect(parseExclusionTable("Exclude\n", ".funcignore")).toEqual([]);
  });

  it("rejects a file without the Exclude header", () => {
    expect(() => parseExclusionTable("Pattern\n*.zip\n", "/w/.funcignore")).toThrow(
      "/w/.funcignore: Missing 'Exclude' header (found: Pattern)"
    );
    expect(() => parseExclusionTable("\n\n", "/w/.funcignore")).toThrow(InvalidExclusionFileError);
  });
});

describe("loadExclusions", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "funcdeploy-ignore-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("reads .funcignore from the working directory", () => {
    fs.writeFileSync(path.join(dir, ".funcignore"), "Exclude\n*.zip\n.git\n");

    expect(loadExclusions(dir)).toEqual(["*.zip", ".git"]);
  });

  it("reads a differently named file", () => {
    fs.writeFileSync(path.join(dir, ".deployignore"), "Exclude\ntests\n");

    expect(loadExclusions(dir, ".deployignore")).toEqual(["tests"]);
  });

  it("raises MissingExclusionFile when the file is absent", () => {
    const expected = path.join(dir, ".funcignore");

    expect(() => loadExclusions(dir)).toThrow(MissingExclusionFileError);
    expect(() => loadExclusions(dir)).toThrow(`Exclusion file not found: ${expected}`);
  });
});
