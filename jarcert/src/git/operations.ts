import { simpleGit } from "simple-git";
import fs from "node:fs";
import path from "node:path";
import { InvalidRepositoryError } from "../errors.js";
import type { RepoInspector, RepoOpener, RevisionInfo, StatusFlag } from "./inspector.js";
import { parseCheckIgnore, parsePorcelainStatus, parseSubmodulePaths } from "./status.js";

/** The one git entry point the inspector needs; lets tests script git output. */
export type GitClient = {
  raw(args: string[]): Promise<string>;
};

const CHECK_IGNORE_BATCH = 256;

/**
 * Git inspector backed by simple-git.
 */
export class GitInspector implements RepoInspector {
  constructor(
    readonly root: string,
    private readonly git: GitClient,
  ) {}

  /** HEAD commit id, or null for a repository without commits. */
  async headRevision(): Promise<string | null> {
    // --quiet keeps stderr empty on an unborn HEAD, so the call resolves with no output
    const result = await this.git.raw(["rev-parse", "--verify", "--quiet", "HEAD"]);
    const sha = result.trim();
    return sha.length > 0 ? sha : null;
  }

  async status(): Promise<Map<string, StatusFlag>> {
    const output = await this.git.raw([
      "status",
      "--porcelain=v1",
      "-z",
      "--untracked-files=normal",
      "--ignore-submodules=none",
    ]);
    return parsePorcelainStatus(output);
  }

  async listSubmodules(): Promise<Set<string>> {
    if (!fs.existsSync(path.join(this.root, ".gitmodules"))) return new Set();
    const output = await this.git.raw([
      "config",
      "--file",
      ".gitmodules",
      "--get-regexp",
      "^submodule\\..*\\.path$",
    ]);
    return parseSubmodulePaths(output);
  }

  async ignoredAmong(relativePaths: readonly string[]): Promise<Set<string>> {
    const ignored = new Set<string>();
    for (let i = 0; i < relativePaths.length; i += CHECK_IGNORE_BATCH) {
      const batch = relativePaths.slice(i, i + CHECK_IGNORE_BATCH);
      // check-ignore exits 1 without stderr when nothing matches
      const output = await this.git.raw(["check-ignore", "--", ...batch]);
      for (const entry of parseCheckIgnore(output)) {
        ignored.add(entry);
      }
    }
    return ignored;
  }

  async resolveRevision(expression: string): Promise<RevisionInfo> {
    const output = await this.git.raw(["show", "-s", "--format=%h%x00%B", expression]);
    const sep = output.indexOf("\0");
    if (sep === -1) {
      throw new Error(`Unable to resolve revision: ${expression}`);
    }
    const shortId = output.slice(0, sep).trim();
    const fullMessage = output.slice(sep + 1).replace(/\s+$/, "");
    if (!fullMessage.trim()) {
      throw new Error(`Invalid message for ${shortId}: ${JSON.stringify(fullMessage)}`);
    }
    const newline = fullMessage.indexOf("\n");
    const summary = newline === -1 ? fullMessage : fullMessage.slice(0, newline);
    return { shortId, summary, fullMessage };
  }
}

/**
 * Open `repoPath` as a repository root. A directory inside some other
 * repository (but not its root) is rejected.
 */
export async function openGitRepository(repoPath: string, git?: GitClient): Promise<GitInspector> {
  const resolved = path.resolve(repoPath);
  if (!fs.existsSync(resolved) || !fs.statSync(resolved).isDirectory()) {
    throw new InvalidRepositoryError(resolved, "Directory does not exist");
  }

  const client: GitClient = git ?? simpleGitClient(resolved);
  let toplevel: string;
  try {
    toplevel = (await client.raw(["rev-parse", "--show-toplevel"])).trim();
  } catch (e) {
    throw new InvalidRepositoryError(resolved, e instanceof Error ? e.message : String(e));
  }
  if (!toplevel || fs.realpathSync(toplevel) !== fs.realpathSync(resolved)) {
    throw new InvalidRepositoryError(resolved, toplevel ? `Enclosing repository is ${toplevel}` : undefined);
  }
  return new GitInspector(resolved, client);
}

function simpleGitClient(baseDir: string): GitClient {
  const git = simpleGit(baseDir);
  return { raw: (args) => git.raw(args) };
}

export const openRepository: RepoOpener = (repoPath) => openGitRepository(repoPath);
