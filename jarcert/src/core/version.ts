const VERSION_PATTERN = /^(\d+)\.(\d+)(?:\.(\d+))?$/;

/**
 * A `major.minor[.patch]` product version. Instances are interned through a
 * {@link VersionStore}, so two lookups of the same name share one object.
 */
export class ProductVersion {
  readonly major: number;
  readonly minor: number;
  readonly patch: number;

  /** Use {@link VersionStore.intern}; constructing directly skips interning. */
  constructor(readonly name: string) {
    const match = VERSION_PATTERN.exec(name);
    if (!match) {
      throw new Error(`Invalid version name: ${JSON.stringify(name)}`);
    }
    this.major = Number(match[1]);
    this.minor = Number(match[2]);
    this.patch = Number(match[3] ?? "0");
  }

  static isValid(name: string): boolean {
    return VERSION_PATTERN.test(name);
  }

  /** Lexicographic on (major, minor, patch). */
  compare(other: ProductVersion): number {
    return this.major - other.major || this.minor - other.minor || this.patch - other.patch;
  }

  equals(other: ProductVersion): boolean {
    return this.name === other.name;
  }

  toString(): string {
    return this.name;
  }
}

/** Process-scoped interning table for {@link ProductVersion}. */
export class VersionStore {
  private readonly known = new Map<string, ProductVersion>();

  intern(name: string): ProductVersion {
    const existing = this.known.get(name);
    if (existing) return existing;
    const created = new ProductVersion(name);
    this.known.set(name, created);
    return created;
  }

  /** Intern every valid name, silently skipping the rest. */
  internAll(names: readonly string[]): ProductVersion[] {
    return names.filter((n) => ProductVersion.isValid(n)).map((n) => this.intern(n));
  }

  size(): number {
    return this.known.size;
  }

  clear(): void {
    this.known.clear();
  }
}

export function latestVersion(versions: readonly ProductVersion[]): ProductVersion | null {
  let best: ProductVersion | null = null;
  for (const v of versions) {
    if (!best || v.compare(best) > 0) best = v;
  }
  return best;
}
