import fs from "node:fs";
import path from "node:path";
import { ScanInvariantError } from "../errors.js";
import type { RepoInspector, RepoOpener } from "../git/inspector.js";

const GIT_DIR = ".git";

/**
 * Walk the repository status and yield every changed path relative to the
 * repository root.
 *
 * Submodules yield their own path (the pointed-to commit may have moved even
 * when no file differs) followed by their own changes. Untracked plain
 * directories are expanded into their non-ignored files and subdirectories.
 *
 * Each iteration queries the inspector afresh. Order is not stable; use
 * {@link collectChangeSet} for a sorted, de-duplicated list.
 */
export async function* scanChanges(repo: RepoInspector, open: RepoOpener): AsyncGenerator<string> {
  const statuses = await repo.status();
  let submodules: Set<string> | null = null;

  for (const [relativePath, flag] of statuses) {
    if (flag === "current" || flag === "ignored") continue;

    const target = path.join(repo.root, relativePath);
    if (!isDirectory(target)) {
      yield relativePath;
      continue;
    }

    submodules ??= await repo.listSubmodules();
    if (submodules.has(relativePath)) {
      const subRepo = await open(target);
      yield relativePath;
      for await (const nested of scanChanges(subRepo, open)) {
        yield path.posix.join(relativePath, nested);
      }
      continue;
    }

    let found = false;
    for await (const entry of walkUnignored(repo, relativePath)) {
      found = true;
      yield entry;
    }
    if (!found) {
      throw new ScanInvariantError(target, flag);
    }
  }
}

/**
 * Depth-first walk below `relativeDir`, yielding non-ignored files and
 * directories. Ignored directories and nested checkouts are not descended into.
 */
async function* walkUnignored(repo: RepoInspector, relativeDir: string): AsyncGenerator<string> {
  const listing = await fs.promises.readdir(path.join(repo.root, relativeDir), { withFileTypes: true });
  const entries = listing.filter((e) => e.name !== GIT_DIR);
  if (entries.length === 0) return;

  const candidates = entries.map((e) => path.posix.join(relativeDir, e.name));
  const ignored = await repo.ignoredAmong(candidates);

  for (const entry of entries) {
    const relativePath = path.posix.join(relativeDir, entry.name);
    if (ignored.has(relativePath)) continue;
    yield relativePath;
    if (entry.isDirectory() && !isCheckout(path.join(repo.root, relativePath))) {
      yield* walkUnignored(repo, relativePath);
    }
  }
}

/** Collect {@link scanChanges} into a sorted, de-duplicated change set. */
export async function collectChangeSet(repo: RepoInspector, open: RepoOpener): Promise<string[]> {
  const seen = new Set<string>();
  for await (const p of scanChanges(repo, open)) {
    seen.add(p);
  }
  return [...seen].sort(comparePaths);
}

/** Whether `dir` is the root of a checkout: a `.git` directory, or the `.git` file of a submodule. */
export function isCheckout(dir: string): boolean {
  return fs.existsSync(path.join(dir, GIT_DIR));
}

/**
 * {@link collectChangeSet} over the repository plus the checkouts at
 * `nestedRoots` (relative to the repository root). Those checkouts are usually
 * ignored by the outer repository, so its status never reports their changes.
 * A nested root that is not a checkout is skipped.
 */
export async function collectWorkspaceChangeSet(
  repo: RepoInspector,
  open: RepoOpener,
  nestedRoots: readonly string[],
): Promise<string[]> {
  const seen = new Set(await collectChangeSet(repo, open));
  for (const nestedRoot of nestedRoots) {
    const target = path.join(repo.root, nestedRoot);
    if (!isCheckout(target)) continue;

    const nested = await open(target);
    for await (const p of scanChanges(nested, open)) {
      seen.add(path.posix.join(nestedRoot, p));
    }
  }
  return [...seen].sort(comparePaths);
}

export function comparePaths(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function isDirectory(target: string): boolean {
  // deleted paths no longer exist on disk
  return fs.statSync(target, { throwIfNoEntry: false })?.isDirectory() ?? false;
}
