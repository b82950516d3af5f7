import { createHash } from 'node:crypto';

/**
 * In-memory FIFO memo cache, keyed by a content hash so distinct inputs
 * never share an entry. Nothing is persisted.
 */

export class MemoCache<T> {
  private readonly entries = new Map<string, T>();

  constructor(private readonly maxEntries: number) {}

  get size(): number {
    return this.entries.size;
  }

  get(key: string): T | null {
    return this.entries.get(key) ?? null;
  }

  set(key: string, value: T): void {
    if (!this.entries.has(key) && this.entries.size >= this.maxEntries) {
      // Evict oldest entry
      const firstKey = this.entries.keys().next().value;
      if (firstKey !== undefined) this.entries.delete(firstKey);
    }
    this.entries.set(key, value);
  }

  getOrCompute(key: string, compute: () => T): T {
    const hit = this.entries.get(key);
    if (hit !== undefined) return hit;
    const value = compute();
    this.set(key, value);
    return value;
  }

  clear(): void {
    this.entries.clear();
  }
}

/** sha256 over labelled parts; a part's label is hashed with it so the same text in another role differs */
export function contentHash(parts: Record<string, string | undefined>): string {
  const hash = createHash('sha256');
  for (const [name, content] of Object.entries(parts).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))) {
    if (content === undefined) continue;
    hash.update(`${name}\u0000${content.length}\u0000`);
    hash.update(content);
  }
  return hash.digest('hex');
}
