/** Build signature of a development artifact. */
export type BuildSignature = {
  /** SHA-256 hex of the compiled artifact. */
  readonly artifactHash: string;
  /** HEAD commit the artifact was built from; null for a repository without commits. */
  readonly sourceRevision: string | null;
  /** Relative path → digest, for every path that differed from a clean checkout. */
  readonly changedSources: ReadonlyMap<string, string>;
};

/** On-disk form. Field names are part of the file format. */
export type SerializedSignature = {
  artifactHash: string;
  sourceRevision: string | null;
  changedSources: [string, string][];
};
