import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { createHash } from "node:crypto";
import fs from "node:fs";
import path from "node:path";
import {
  captureSignature,
  DELETED_SOURCE_DIGEST,
  DIRECTORY_SOURCE_DIGEST,
  diffChangedSources,
  loadSignature,
  parseSignature,
  saveSignature,
  signaturesEqual,
} from "../src/cache/signature.js";
import { SignatureStore } from "../src/cache/signature-store.js";
import { VersionStore } from "../src/core/version.js";
import { CorruptSignatureError } from "../src/errors.js";
import type { BuildSignature } from "../src/types/signature.js";
import { COMMIT_A, COMMIT_B, FakeRepos, makeTmpDir, writeFile } from "./helpers/fakes.js";

const HASH_1 = "a".repeat(64);
const HASH_2 = "b".repeat(64);

function sha256(data: string | Buffer): string {
  return createHash("sha256").update(data).digest("hex");
}

function signature(changed: [string, string][], revision: string | null = COMMIT_A): BuildSignature {
  return { artifactHash: HASH_1, sourceRevision: revision, changedSources: new Map(changed) };
}

describe("build signature", () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = makeTmpDir("sig");
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("captures artifact, revision and a digest per changed source", async () => {
    const repoRoot = path.join(tmpDir, "repo");
    const artifact = writeFile(tmpDir, "out/server.jar", "jar-bytes");
    writeFile(repoRoot, "src/A.java", "class A {}");
    writeFile(repoRoot, "lib/.git", "gitdir: ../.git/modules/lib\n");
    const repos = new FakeRepos();
    repos.add(path.join(repoRoot, "lib")).head = COMMIT_B;

    const captured = await captureSignature({
      artifactPath: artifact,
      sourceRevision: COMMIT_A,
      changeSet: ["lib", "src/A.java", "src/Gone.java"],
      repoRoot,
      openRepository: repos.open,
    });

    expect(captured.artifactHash).toBe(sha256("jar-bytes"));
    expect(captured.sourceRevision).toBe(COMMIT_A);
    expect([...captured.changedSources.entries()]).toEqual([
      ["lib", sha256(Buffer.from(COMMIT_B, "hex"))],
      ["src/A.java", sha256("class A {}")],
      ["src/Gone.java", DELETED_SOURCE_DIGEST],
    ]);
  });

  it("records plain directories without opening them as repositories", async () => {
    const repoRoot = path.join(tmpDir, "repo");
    const artifact = writeFile(tmpDir, "out/server.jar", "jar-bytes");
    writeFile(repoRoot, "newdir/sub/b.txt", "b");

    const captured = await captureSignature({
      artifactPath: artifact,
      sourceRevision: COMMIT_A,
      changeSet: ["newdir/sub", "newdir/sub/b.txt"],
      repoRoot,
      openRepository: new FakeRepos().open,
    });

    expect([...captured.changedSources.entries()]).toEqual([
      ["newdir/sub", DIRECTORY_SOURCE_DIGEST],
      ["newdir/sub/b.txt", sha256("b")],
    ]);
  });

  it("round-trips through the on-disk form", () => {
    const file = path.join(tmpDir, "nested", "sig.json");
    const original = signature([
      ["z.txt", HASH_2],
      ["a.txt", DELETED_SOURCE_DIGEST],
    ]);

    saveSignature(file, original);
    const loaded = loadSignature(file);

    expect(signaturesEqual(loaded, original)).toBe(true);
    expect(loaded.sourceRevision).toBe(COMMIT_A);
  });

  it("writes changed sources sorted by path", () => {
    const file = path.join(tmpDir, "sig.json");
    saveSignature(
      file,
      signature([
        ["b/x", HASH_2],
        ["a", HASH_1],
      ]),
    );

    const raw: unknown = JSON.parse(fs.readFileSync(file, "utf8"));
    expect(raw).toEqual({
      artifactHash: HASH_1,
      sourceRevision: COMMIT_A,
      changedSources: [
        ["a", HASH_1],
        ["b/x", HASH_2],
      ],
    });
  });

  it("keeps a null revision for a repository without commits", () => {
    const file = path.join(tmpDir, "sig.json");
    saveSignature(file, signature([], null));
    expect(loadSignature(file).sourceRevision).toBeNull();
  });

  it("rejects text that is not JSON", () => {
    const file = writeFile(tmpDir, "sig.json", "{not json");
    expect(() => loadSignature(file)).toThrow(CorruptSignatureError);
  });

  it("rejects documents missing required fields", () => {
    expect(() => parseSignature({ artifactHash: HASH_1, changedSources: [] }, "sig.json")).toThrow(
      CorruptSignatureError,
    );
  });

  it("rejects a malformed artifact hash", () => {
    expect(() =>
      parseSignature({ artifactHash: "xyz", sourceRevision: null, changedSources: [] }, "sig.json"),
    ).toThrow("Corrupt build signature: sig.json");
  });

  it("rejects malformed changed-source entries", () => {
    const raw = { artifactHash: HASH_1, sourceRevision: COMMIT_A, changedSources: [["only-path"]] };
    expect(() => parseSignature(raw, "sig.json")).toThrow(CorruptSignatureError);
  });

  it("rejects duplicate changed-source paths", () => {
    const raw = {
      artifactHash: HASH_1,
      sourceRevision: COMMIT_A,
      changedSources: [
        ["a.txt", HASH_1],
        ["a.txt", HASH_2],
      ],
    };
    try {
      parseSignature(raw, "sig.json");
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(CorruptSignatureError);
      if (err instanceof CorruptSignatureError) {
        expect(err.details).toEqual(["Duplicate changed source: a.txt"]);
      }
    }
  });

  it("compares signatures by value", () => {
    const a = signature([["x", HASH_1]]);
    expect(signaturesEqual(a, signature([["x", HASH_1]]))).toBe(true);
    expect(signaturesEqual(a, signature([["x", HASH_2]]))).toBe(false);
    expect(signaturesEqual(a, signature([["x", HASH_1]], COMMIT_B))).toBe(false);
    expect(signaturesEqual(a, { ...a, artifactHash: HASH_2 })).toBe(false);
  });
});

describe("diffChangedSources", () => {
  it("classifies added, removed and modified paths in path order", () => {
    const expected = new Map([
      ["keep.txt", HASH_1],
      ["gone.txt", HASH_1],
      ["edit.txt", HASH_1],
    ]);
    const actual = new Map([
      ["keep.txt", HASH_1],
      ["edit.txt", HASH_2],
      ["added.txt", HASH_2],
    ]);

    expect(diffChangedSources(expected, actual)).toEqual([
      { path: "added.txt", kind: "Added" },
      { path: "edit.txt", kind: "Modified" },
      { path: "gone.txt", kind: "Removed" },
    ]);
  });

  it("returns nothing for identical maps", () => {
    const m = new Map([["a", HASH_1]]);
    expect(diffChangedSources(m, new Map(m))).toEqual([]);
  });
});

describe("SignatureStore", () => {
  let cacheDir: string;
  const versions = new VersionStore();

  beforeEach(() => {
    cacheDir = makeTmpDir("sigstore");
  });

  afterEach(() => {
    fs.rmSync(cacheDir, { recursive: true, force: true });
  });

  it("names one side-car file per version", () => {
    const store = new SignatureStore(cacheDir);
    expect(store.pathFor(versions.intern("1.20.1"))).toBe(path.join(cacheDir, "dev-signature-1.20.1.json"));
  });

  it("caches loads until the next save", () => {
    const store = new SignatureStore(cacheDir);
    const v = versions.intern("1.20.1");
    expect(store.exists(v)).toBe(false);

    store.save(v, signature([["a", HASH_1]]));
    const first = store.load(v);
    // A rewrite behind the store's back is not seen until cleared.
    saveSignature(store.pathFor(v), signature([["a", HASH_2]]));
    expect(store.load(v)).toBe(first);

    store.clear();
    expect(store.load(v).changedSources.get("a")).toBe(HASH_2);
  });
});
