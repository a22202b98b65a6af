import { afterEach, beforeEach, describe, expect, it } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { captureSignature, saveSignature } from "../src/cache/signature.js";
import { displayRepoName, validateCache } from "../src/cache/validator.js";
import {
  ArtifactHashMismatchError,
  ArtifactMissingError,
  RevisionMismatchError,
  SignatureMissingError,
  UntrackedChangesMismatchError,
} from "../src/errors.js";
import { COMMIT_A, COMMIT_B, FakeRepos, makeTmpDir, writeFile, type FakeInspector } from "./helpers/fakes.js";

describe("validateCache", () => {
  let tmpDir: string;
  let repoRoot: string;
  let artifactPath: string;
  let signaturePath: string;
  let repos: FakeRepos;
  let repo: FakeInspector;

  async function certify(): Promise<void> {
    const changeSet = [...repo.statuses.entries()].filter(([, flag]) => flag !== "current").map(([p]) => p).sort();
    const sig = await captureSignature({
      artifactPath,
      sourceRevision: repo.head,
      changeSet,
      repoRoot,
      openRepository: repos.open,
    });
    saveSignature(signaturePath, sig);
  }

  function validate(): Promise<void> {
    return validateCache({ artifactPath, signaturePath, repo, open: repos.open, repoName: "Paper" });
  }

  async function failure(): Promise<unknown> {
    try {
      await validate();
    } catch (err) {
      return err;
    }
    throw new Error("expected validation to fail");
  }

  beforeEach(() => {
    tmpDir = makeTmpDir("validate");
    repoRoot = path.join(tmpDir, "repo");
    fs.mkdirSync(repoRoot);
    artifactPath = writeFile(repoRoot, "target/server.jar", "compiled");
    signaturePath = path.join(tmpDir, "cache", "dev-signature-1.20.1.json");
    repos = new FakeRepos();
    repo = repos.add(repoRoot);
    repo.commit(COMMIT_A, "First commit");
    repo.commit(COMMIT_B, "Second commit");
    repo.head = COMMIT_A;
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("accepts an unchanged clean checkout", async () => {
    await certify();
    await expect(validate()).resolves.toBeUndefined();
  });

  it("accepts unchanged uncommitted edits", async () => {
    writeFile(repoRoot, "src/A.java", "edited");
    repo.statuses.set("src/A.java", "modified");
    await certify();
    await expect(validate()).resolves.toBeUndefined();
  });

  it("reports a missing artifact first", async () => {
    fs.rmSync(artifactPath);
    const err = await failure();
    expect(err).toBeInstanceOf(ArtifactMissingError);
  });

  it("reports a missing signature", async () => {
    expect(await failure()).toBeInstanceOf(SignatureMissingError);
  });

  it("reports a replaced artifact without scanning the tree", async () => {
    await certify();
    fs.writeFileSync(artifactPath, "tampered");
    const statusCallsBefore = repo.statusCalls;

    const err = await failure();
    expect(err).toBeInstanceOf(ArtifactHashMismatchError);
    expect(repo.statusCalls).toBe(statusCallsBefore);
  });

  it("reports a moved HEAD with both commits", async () => {
    await certify();
    repo.head = COMMIT_B;

    const err = await failure();
    expect(err).toBeInstanceOf(RevisionMismatchError);
    if (err instanceof RevisionMismatchError) {
      expect(err.message).toBe("Mismatched commits for Paper");
      expect(err.details).toEqual(["Expected commit 1111111: First commit", "Actual commit 2222222: Second commit"]);
    }
  });

  it("falls back to the raw id for an unresolvable revision", async () => {
    await certify();
    const unknown = "4".repeat(40);
    repo.head = unknown;

    const err = await failure();
    expect(err).toBeInstanceOf(RevisionMismatchError);
    if (err instanceof RevisionMismatchError) {
      expect(err.actual).toEqual({ shortId: unknown, summary: "<unknown message>" });
    }
  });

  it("reports a newly added uncommitted file", async () => {
    await certify();
    writeFile(repoRoot, "x.txt", "new");
    repo.statuses.set("x.txt", "untracked");

    const err = await failure();
    expect(err).toBeInstanceOf(UntrackedChangesMismatchError);
    if (err instanceof UntrackedChangesMismatchError) {
      expect(err.message).toBe("Detected 1 changes to uncommitted files");
      expect(err.details).toEqual(["Added:     x.txt"]);
    }
  });

  it("reports edited and reverted files", async () => {
    writeFile(repoRoot, "a.txt", "one");
    writeFile(repoRoot, "b.txt", "two");
    repo.statuses.set("a.txt", "modified");
    repo.statuses.set("b.txt", "modified");
    await certify();

    fs.writeFileSync(path.join(repoRoot, "a.txt"), "one, edited");
    repo.statuses.delete("b.txt");

    const err = await failure();
    expect(err).toBeInstanceOf(UntrackedChangesMismatchError);
    if (err instanceof UntrackedChangesMismatchError) {
      expect(err.changes).toEqual([
        { path: "a.txt", kind: "Modified" },
        { path: "b.txt", kind: "Removed" },
      ]);
      expect(err.details).toEqual(["Modified:  a.txt", "Removed:   b.txt"]);
    }
  });

  it("reports a submodule moved to another commit", async () => {
    writeFile(repoRoot, "lib/.git", "gitdir: ../.git/modules/lib\n");
    const sub = repos.add(path.join(repoRoot, "lib"));
    sub.head = COMMIT_A;
    writeFile(repoRoot, "lib/file.txt", "x");
    repo.statuses.set("lib", "modified");
    repo.submodules.add("lib");
    await certify();

    sub.head = COMMIT_B;
    const err = await failure();
    expect(err).toBeInstanceOf(UntrackedChangesMismatchError);
    if (err instanceof UntrackedChangesMismatchError) {
      expect(err.changes).toEqual([{ path: "lib", kind: "Modified" }]);
    }
  });

  it("uses an injected loader for the expected signature", async () => {
    await certify();
    let loads = 0;
    const result = validateCache({
      artifactPath,
      signaturePath,
      repo,
      open: repos.open,
      loadExpected: () => {
        loads++;
        return { artifactHash: "0".repeat(64), sourceRevision: COMMIT_A, changedSources: new Map() };
      },
    });
    await expect(result).rejects.toBeInstanceOf(ArtifactHashMismatchError);
    expect(loads).toBe(1);
  });
});

describe("displayRepoName", () => {
  it("shows repositories under the home directory relative to it", () => {
    expect(displayRepoName(path.join(os.homedir(), "git", "Paper"))).toBe(path.join("git", "Paper"));
  });

  it("keeps paths outside the home directory absolute", () => {
    const outside = path.join(path.parse(os.homedir()).root, "jarcert-outside-home", "repo");
    expect(displayRepoName(outside)).toBe(outside);
  });
});
