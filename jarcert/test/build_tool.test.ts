import { afterEach, beforeEach, describe, expect, it } from "vitest";
import fs from "node:fs";
import path from "node:path";
import { ProcessBuildTool } from "../src/build/build-tool.js";
import { makeTmpDir } from "./helpers/fakes.js";

describe("ProcessBuildTool", () => {
  let repo: string;

  beforeEach(() => {
    repo = makeTmpDir("build");
  });

  afterEach(() => {
    fs.rmSync(repo, { recursive: true, force: true });
  });

  it("runs the command inside the repository", async () => {
    const tool = new ProcessBuildTool([process.execPath, "-e", "require('fs').writeFileSync('out.jar', 'built')"]);
    expect(await tool.run(repo)).toBe(0);
    expect(fs.readFileSync(path.join(repo, "out.jar"), "utf8")).toBe("built");
  });

  it("resolves with the build's exit code", async () => {
    const tool = new ProcessBuildTool([process.execPath, "-e", "process.exit(3)"]);
    expect(await tool.run(repo)).toBe(3);
  });

  it("rejects when the program can not be started", async () => {
    const tool = new ProcessBuildTool([path.join(repo, "no-such-build-tool")]);
    await expect(tool.run(repo)).rejects.toThrow();
  });

  it("requires a command", () => {
    expect(() => new ProcessBuildTool([])).toThrow("Build command must not be empty");
  });
});
