import fs from "node:fs";
import path from "node:path";
import { CatalogRequestError } from "../errors.js";
import type { BuildDescriptor } from "../types/catalog.js";
import type { BuildCatalog, FetchFn } from "./catalog.js";

/** Produces the bytes of an official build on disk. */
export interface ArtifactDownloader {
  download(descriptor: BuildDescriptor, destination: string): Promise<void>;
}

export class HttpDownloader implements ArtifactDownloader {
  private readonly fetchFn: FetchFn;

  constructor(
    private readonly catalog: BuildCatalog,
    fetchFn?: FetchFn,
  ) {
    this.fetchFn = fetchFn ?? ((url) => fetch(url));
  }

  async download(descriptor: BuildDescriptor, destination: string): Promise<void> {
    const url = this.catalog.downloadUrl(descriptor);
    const response = await this.fetchFn(url);
    if (!response.ok || !response.body) {
      throw new CatalogRequestError(url, `HTTP ${response.status} ${response.statusText}`.trim());
    }

    await fs.promises.mkdir(path.dirname(destination), { recursive: true });
    const file = await fs.promises.open(destination, "w");
    try {
      const reader = response.body.getReader();
      for (;;) {
        const { done, value } = await reader.read();
        if (done) break;
        await file.write(value);
      }
    } finally {
      await file.close();
    }
  }
}
