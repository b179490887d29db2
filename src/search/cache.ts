import { createHash } from 'node:crypto';
import { regionsOrDefault } from '../types.js';
import type { Query, RawTable } from '../types.js';

interface CacheEntry {
  records: RawTable;
  storedAt: number;
}

export function cacheKey(query: Query): string {
  const canonical = JSON.stringify({
    keyword: query.keyword?.trim() ?? '',
    regions: [...new Set(regionsOrDefault(query.regions))].sort(),
  });
  return createHash('sha256').update(canonical).digest('hex');
}

/** In-process harvest results keyed by query content, dropped after `ttlMs`. */
export class HarvestCache {
  private readonly entries = new Map<string, CacheEntry>();

  constructor(
    readonly ttlMs: number,
    private readonly now: () => number = Date.now,
  ) {}

  get(query: Query): RawTable | undefined {
    const key = cacheKey(query);
    const entry = this.entries.get(key);
    if (!entry) {
      return undefined;
    }
    if (this.isExpired(entry, this.now())) {
      this.entries.delete(key);
      return undefined;
    }
    return [...entry.records];
  }

  set(query: Query, records: RawTable): void {
    const now = this.now();
    for (const [key, entry] of this.entries) {
      if (this.isExpired(entry, now)) {
        this.entries.delete(key);
      }
    }
    this.entries.set(cacheKey(query), { records: [...records], storedAt: now });
  }

  get size(): number {
    return this.entries.size;
  }

  private isExpired(entry: CacheEntry, now: number): boolean {
    return now - entry.storedAt >= this.ttlMs;
  }
}
