import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { USAGE, runCli } from "./cli.js";
import type { CommandRunner } from "./az-functionapp.js";

describe("runCli", () => {
  let dir: string;
  let out: string[];
  let err: string[];

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "funcdeploy-cli-"));
    out = [];
    err = [];
    fs.writeFileSync(path.join(dir, "host.json"), "{}");
    fs.writeFileSync(path.join(dir, ".funcignore"), "Exclude\n*.zip\n.funcignore\n");
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  function run(argv: string[], runner: CommandRunner = () => ({ status: 0 })): Promise<number> {
    return runCli(argv, { cwd: dir, runner, log: msg => out.push(msg), error: msg => err.push(msg) });
  }

  it("exits 0 after a successful deploy", async () => {
    const runner = vi.fn<CommandRunner>(() => ({ status: 0 }));

    expect(await run(["rg1", "app1"], runner)).toBe(0);
    expect(runner).toHaveBeenCalledTimes(1);
    expect(err).toEqual([]);
  });

  it("passes the external tool's exit code through", async () => {
    expect(await run(["rg1", "app1"], () => ({ status: 5 }))).toBe(5);
    expect(err).toEqual(["Error: az exited with code 5"]);
  });

  it("exits 2 with a message when an argument is missing", async () => {
    expect(await run(["rg1"])).toBe(2);
    expect(err).toEqual(["Error: Missing required argument: <functionAppName>"]);
  });

  it("prints usage with no arguments", async () => {
    expect(await run([])).toBe(2);
    expect(out).toEqual([USAGE]);
  });

  it("prints usage for -help", async () => {
    expect(await run(["-help"])).toBe(0);
    expect(out).toEqual([USAGE]);
  });

  it("rejects unknown options", async () => {
    expect(await run(["rg1", "app1", "-slot", "staging"])).toBe(2);
    expect(err).toEqual(["Error: Unknown option: -slot"]);
  });

  it("exits 1 when the exclusion file is missing", async () => {
    fs.rmSync(path.join(dir, ".funcignore"));

    expect(await run(["rg1", "app1"])).toBe(1);
    expect(err).toEqual([`Error: Exclusion file not found: ${path.join(dir, ".funcignore")}`]);
  });

  it("applies -archive and -dryRun", async () => {
    const runner = vi.fn<CommandRunner>(() => ({ status: 0 }));

    expect(await run(["rg1", "app1", "-dryRun", "-archive", "site.zip"], runner)).toBe(0);
    expect(runner).not.toHaveBeenCalled();
    expect(fs.existsSync(path.join(dir, "site.zip"))).toBe(true);
  });

  it("requires a value for -ignoreFile", async () => {
    expect(await run(["rg1", "app1", "-ignoreFile"])).toBe(2);
    expect(err).toEqual(["Error: Flag -ignoreFile requires a value"]);
  });
});
