import type { StatusFlag } from "./inspector.js";

function flagFor(code: string): StatusFlag {
  if (code === "??") return "untracked";
  if (code === "!!") return "ignored";
  if (code.includes("U") || code === "AA" || code === "DD") return "conflicted";
  if (code.includes("R") || code.includes("C")) return "renamed";
  if (code.includes("D")) return "deleted";
  if (code.includes("A")) return "added";
  if (code.trim() === "") return "current";
  return "modified";
}

/**
 * Parse `git status --porcelain=v1 -z` output.
 *
 * Renames and copies carry their source path as the following NUL-separated
 * token; the source is reported as deleted (a copy's source is left alone).
 * Untracked directories come back with a trailing slash, which is stripped.
 */
export function parsePorcelainStatus(output: string): Map<string, StatusFlag> {
  const result = new Map<string, StatusFlag>();
  const tokens = output.split("\0");

  for (let i = 0; i < tokens.length; i++) {
    const entry = tokens[i];
    if (entry.length < 4) continue;

    const code = entry.slice(0, 2);
    const filePath = stripTrailingSlash(entry.slice(3));
    const flag = flagFor(code);
    result.set(filePath, flag);

    if (code.includes("R") || code.includes("C")) {
      const source = tokens[i + 1];
      i++;
      if (source && code.includes("R")) {
        result.set(stripTrailingSlash(source), "deleted");
      }
    }
  }

  return result;
}

/** Parse `git config --get-regexp '^submodule\..*\.path$'` output into paths. */
export function parseSubmodulePaths(output: string): Set<string> {
  const paths = new Set<string>();
  for (const line of output.split("\n")) {
    const trimmed = line.trim();
    if (!trimmed) continue;
    const space = trimmed.indexOf(" ");
    if (space === -1) continue;
    paths.add(stripTrailingSlash(trimmed.slice(space + 1).trim()));
  }
  return paths;
}

function stripTrailingSlash(p: string): string {
  return p.endsWith("/") ? p.slice(0, -1) : p;
}

const C_ESCAPES: Record<string, number> = { a: 7, b: 8, t: 9, n: 10, v: 11, f: 12, r: 13, '"': 34, "\\": 92 };

/**
 * Undo git's C-style quoting of a path (`"dir/\303\251.txt"`). Unquoted paths
 * are returned as they are.
 */
export function unquoteGitPath(p: string): string {
  if (p.length < 2 || !p.startsWith('"') || !p.endsWith('"')) return p;

  const bytes: number[] = [];
  const body = p.slice(1, -1);
  for (let i = 0; i < body.length; i++) {
    const char = String.fromCodePoint(body.codePointAt(i) ?? 0);
    if (char !== "\\") {
      bytes.push(...Buffer.from(char, "utf8"));
      i += char.length - 1;
      continue;
    }
    const octal = /^[0-7]{3}/.exec(body.slice(i + 1));
    if (octal) {
      bytes.push(parseInt(octal[0], 8));
      i += 3;
      continue;
    }
    const escaped = C_ESCAPES[body[i + 1] ?? ""];
    if (escaped === undefined) {
      bytes.push(92);
      continue;
    }
    bytes.push(escaped);
    i++;
  }
  return Buffer.from(bytes).toString("utf8");
}

/** Parse newline-separated `git check-ignore` output into paths. */
export function parseCheckIgnore(output: string): string[] {
  return output
    .split("\n")
    .filter((line) => line.length > 0)
    .map(unquoteGitPath);
}
