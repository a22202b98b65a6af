import fs from "node:fs";
import path from "node:path";
import { CorruptSignatureError, type SourceChange } from "../errors.js";
import type { RepoOpener } from "../git/inspector.js";
import { schemaRegistry } from "../schema/registry.js";
import type { BuildSignature, SerializedSignature } from "../types/signature.js";
import { comparePaths, isCheckout } from "./change-scanner.js";
import { hashPath } from "./checksum.js";

/** Recorded for a changed path that no longer exists in the working tree. */
export const DELETED_SOURCE_DIGEST = "deleted";

/** Recorded for a changed plain directory; its files are entries of their own. */
export const DIRECTORY_SOURCE_DIGEST = "directory";

export type CaptureInput = {
  artifactPath: string;
  sourceRevision: string | null;
  /** Paths relative to `repoRoot`. */
  changeSet: readonly string[];
  repoRoot: string;
  openRepository: RepoOpener;
};

/**
 * Hash the artifact and every changed source. Changed directories that are
 * checkouts of their own (submodules) hash as their HEAD commit.
 */
export async function captureSignature(input: CaptureInput): Promise<BuildSignature> {
  const artifactHash = await hashPath(input.artifactPath);
  const changedSources = await hashChangedSources(input.changeSet, input.repoRoot, input.openRepository);
  return { artifactHash, sourceRevision: input.sourceRevision, changedSources };
}

export async function hashChangedSources(
  changeSet: readonly string[],
  repoRoot: string,
  open: RepoOpener,
): Promise<Map<string, string>> {
  const changedSources = new Map<string, string>();

  for (const relativePath of changeSet) {
    changedSources.set(relativePath, await hashChangedSource(path.join(repoRoot, relativePath), open));
  }
  return changedSources;
}

async function hashChangedSource(target: string, open: RepoOpener): Promise<string> {
  const stat = fs.statSync(target, { throwIfNoEntry: false });
  if (!stat) return DELETED_SOURCE_DIGEST;
  if (stat.isDirectory() && !isCheckout(target)) return DIRECTORY_SOURCE_DIGEST;
  return hashPath(target, { kind: "repository", open });
}

export function signaturesEqual(a: BuildSignature, b: BuildSignature): boolean {
  return (
    a.artifactHash === b.artifactHash &&
    a.sourceRevision === b.sourceRevision &&
    diffChangedSources(a.changedSources, b.changedSources).length === 0
  );
}

/**
 * Classify every path whose entry differs between two changed-source maps,
 * sorted by path. A path absent from one side is Added or Removed, never
 * Modified.
 */
export function diffChangedSources(
  expected: ReadonlyMap<string, string>,
  actual: ReadonlyMap<string, string>,
): SourceChange[] {
  const changes: SourceChange[] = [];
  const allPaths = new Set([...expected.keys(), ...actual.keys()]);

  for (const p of [...allPaths].sort(comparePaths)) {
    const before = expected.get(p);
    const after = actual.get(p);
    if (before === undefined) {
      changes.push({ path: p, kind: "Added" });
    } else if (after === undefined) {
      changes.push({ path: p, kind: "Removed" });
    } else if (before !== after) {
      changes.push({ path: p, kind: "Modified" });
    }
  }

  return changes;
}

export function serializeSignature(signature: BuildSignature): SerializedSignature {
  return {
    artifactHash: signature.artifactHash,
    sourceRevision: signature.sourceRevision,
    changedSources: [...signature.changedSources.entries()].sort(([a], [b]) => comparePaths(a, b)),
  };
}

/** Parse a decoded signature document. `source` names it in errors. */
export function parseSignature(raw: unknown, source: string): BuildSignature {
  const registry = schemaRegistry();
  if (!registry.validate("signature", raw)) {
    throw new CorruptSignatureError(source, registry.errorsText("signature"));
  }

  const changedSources = new Map<string, string>();
  for (const [p, digest] of raw.changedSources) {
    if (changedSources.has(p)) {
      throw new CorruptSignatureError(source, `Duplicate changed source: ${p}`);
    }
    changedSources.set(p, digest);
  }
  return { artifactHash: raw.artifactHash, sourceRevision: raw.sourceRevision, changedSources };
}

export function saveSignature(filePath: string, signature: BuildSignature): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, JSON.stringify(serializeSignature(signature), null, 2) + "\n", "utf8");
}

export function loadSignature(filePath: string): BuildSignature {
  const text = fs.readFileSync(filePath, "utf8");
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (e) {
    throw new CorruptSignatureError(filePath, e instanceof Error ? e.message : String(e));
  }
  return parseSignature(raw, filePath);
}
