import { createHash } from "node:crypto";
import fs from "node:fs";
import { NotHashableError } from "../errors.js";
import type { RepoOpener } from "../git/inspector.js";

export const HASH_CHUNK_SIZE = 8192;

/** Hashed in place of a head commit id for a repository with no commits. */
const UNBORN_HEAD_SENTINEL = Buffer.from("NONE", "utf8");

/**
 * How directories are treated. Plain files hash the same way in both modes.
 * In repository mode a directory is opened as a checkout and its HEAD commit
 * id stands in for the contents.
 */
export type HashMode = { kind: "file" } | { kind: "repository"; open: RepoOpener };

export const FILE_MODE: HashMode = { kind: "file" };

/** Compute the SHA-256 hex digest of a file, streaming it in fixed-size chunks. */
export async function computeSha256(filePath: string): Promise<string> {
  const hash = createHash("sha256");
  const stream = fs.createReadStream(filePath, { highWaterMark: HASH_CHUNK_SIZE });
  for await (const chunk of stream) {
    hash.update(chunk);
  }
  return hash.digest("hex");
}

/** Compute SHA256 hash of a string/buffer. */
export function computeSha256FromContent(content: string | Buffer): string {
  return createHash("sha256").update(content).digest("hex");
}

export async function hashPath(target: string, mode: HashMode = FILE_MODE): Promise<string> {
  const stat = await fs.promises.stat(target);
  if (!stat.isDirectory()) {
    return computeSha256(target);
  }
  if (mode.kind !== "repository") {
    throw new NotHashableError(target);
  }

  const repo = await mode.open(target);
  const head = await repo.headRevision();
  return computeSha256FromContent(head === null ? UNBORN_HEAD_SENTINEL : Buffer.from(head, "hex"));
}
