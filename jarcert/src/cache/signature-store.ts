import fs from "node:fs";
import path from "node:path";
import type { ProductVersion } from "../core/version.js";
import type { BuildSignature } from "../types/signature.js";
import { loadSignature, saveSignature } from "./signature.js";

/**
 * Owns the signature side-car files under the cache directory, one per
 * product version. Loaded signatures stay cached until replaced by a save.
 */
export class SignatureStore {
  private readonly loaded = new Map<string, BuildSignature>();

  constructor(readonly cacheDir: string) {}

  pathFor(version: ProductVersion): string {
    return path.join(this.cacheDir, `dev-signature-${version.name}.json`);
  }

  exists(version: ProductVersion): boolean {
    return fs.existsSync(this.pathFor(version));
  }

  load(version: ProductVersion): BuildSignature {
    const cached = this.loaded.get(version.name);
    if (cached) return cached;

    const signature = loadSignature(this.pathFor(version));
    this.loaded.set(version.name, signature);
    return signature;
  }

  save(version: ProductVersion, signature: BuildSignature): void {
    saveSignature(this.pathFor(version), signature);
    this.loaded.set(version.name, signature);
  }

  clear(): void {
    this.loaded.clear();
  }
}
