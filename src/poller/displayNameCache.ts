export type DisplayNameLookup = (userIds: string[]) => Promise<Record<string, string>>;

interface CacheEntry {
  name: string;
  expiresAt: number;
}

export const DEFAULT_NAME_TTL_MS = 60 * 60 * 1000;

/**
 * User id to display name memo with a bounded lifetime. Owned by whoever
 * runs the poll cycles; lookup failures fall back to the raw ids.
 */
export class DisplayNameCache {
  private entries: Map<string, CacheEntry> = new Map();

  constructor(
    private lookup: DisplayNameLookup,
    private ttlMs: number = DEFAULT_NAME_TTL_MS,
    private now: () => number = Date.now
  ) {}

  private cached(userId: string): string | undefined {
    const entry = this.entries.get(userId);
    if (!entry) return undefined;
    if (entry.expiresAt <= this.now()) {
      this.entries.delete(userId);
      return undefined;
    }
    return entry.name;
  }

  async resolve(userIds: string[]): Promise<Record<string, string>> {
    const unique = [...new Set(userIds.filter(Boolean))];
    const missing = unique.filter(id => this.cached(id) === undefined);

    if (missing.length > 0) {
      try {
        const names = await this.lookup(missing);
        const expiresAt = this.now() + this.ttlMs;
        for (const [id, name] of Object.entries(names)) {
          this.entries.set(id, { name, expiresAt });
        }
      } catch (error) {
        console.error('Failed to resolve user names:', error);
      }
    }

    const resolved: Record<string, string> = {};
    for (const id of unique) {
      resolved[id] = this.cached(id) ?? id;
    }
    return resolved;
  }

  clear(): void {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }
}
