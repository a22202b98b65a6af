/** Per-path working tree state as reported by the version-control inspector. */
export type StatusFlag =
  | "current"
  | "modified"
  | "added"
  | "deleted"
  | "renamed"
  | "untracked"
  | "ignored"
  | "conflicted";

export type RevisionInfo = {
  shortId: string;
  summary: string;
  fullMessage: string;
};

/**
 * Read-only view of one repository. Paths are relative to {@link root} and use
 * forward slashes.
 */
export interface RepoInspector {
  readonly root: string;
  /** Full id of the HEAD commit, or null when the repository has no commits. */
  headRevision(): Promise<string | null>;
  status(): Promise<Map<string, StatusFlag>>;
  listSubmodules(): Promise<Set<string>>;
  /** The subset of `relativePaths` matched by ignore rules. */
  ignoredAmong(relativePaths: readonly string[]): Promise<Set<string>>;
  resolveRevision(expression: string): Promise<RevisionInfo>;
}

/** Opens a directory as a repository; rejects with InvalidRepositoryError otherwise. */
export type RepoOpener = (repoPath: string) => Promise<RepoInspector>;
