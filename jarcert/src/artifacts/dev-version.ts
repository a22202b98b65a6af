import { XMLParser } from "fast-xml-parser";
import fs from "node:fs";
import path from "node:path";
import { ProductVersion, type VersionStore } from "../core/version.js";
import { VersionDetectionError } from "../errors.js";

export type VersionSource = {
  /** POM file relative to the repository. */
  pomFile: string;
  /** Property under `<properties>` holding the product version. */
  property: string;
};

/**
 * Detect the product version a development checkout builds, from a property
 * in its POM.
 */
export function detectDevelopmentVersion(
  repoPath: string,
  source: VersionSource,
  versions: VersionStore,
): ProductVersion {
  const pomPath = path.join(repoPath, source.pomFile);
  if (!fs.existsSync(pomPath)) {
    throw new VersionDetectionError(`Repository is missing its POM: ${source.pomFile}`, [`Looked in ${repoPath}`]);
  }

  const raw = readPomProperty(fs.readFileSync(pomPath, "utf8"), source.property);
  if (raw === null) {
    throw new VersionDetectionError(`Could not find <${source.property}> in ${pomPath}`);
  }
  if (!ProductVersion.isValid(raw)) {
    throw new VersionDetectionError(`Invalid product version in ${pomPath}: ${raw}`);
  }
  return versions.intern(raw);
}

/** Value of `project.properties.<name>`, trimmed, or null when absent. */
export function readPomProperty(xml: string, name: string): string | null {
  // tag values stay strings so "1.20" is not read as the number 1.2
  const parser = new XMLParser({ ignoreAttributes: true, parseTagValue: false, trimValues: true });
  const parsed: unknown = parser.parse(xml);

  const properties = child(child(parsed, "project"), "properties");
  const value = child(properties, name);
  if (typeof value === "string" && value.length > 0) return value;
  if (typeof value === "number") return String(value);
  return null;
}

function child(node: unknown, key: string): unknown {
  if (typeof node !== "object" || node === null) return undefined;
  return Object.getOwnPropertyDescriptor(node, key)?.value;
}
