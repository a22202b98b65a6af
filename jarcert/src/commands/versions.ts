import type { CommandContext } from "./context.js";
import { selectVersion } from "./targets.js";

export type VersionListing = { version: string; builds: number[] | null };

/** Known product versions, newest first; with `version`, that version's builds instead. */
export async function listVersions(ctx: CommandContext, version?: string): Promise<VersionListing[]> {
  if (version !== undefined) {
    const selected = await selectVersion(ctx, version);
    const builds = await ctx.resolver.catalog.knownBuilds(selected);
    return [{ version: selected.name, builds: [...builds].sort((a, b) => a - b) }];
  }
  const known = await ctx.resolver.catalog.knownVersions();
  return [...known].reverse().map((v) => ({ version: v.name, builds: null }));
}
