/**
 * In-process key/value store with per-entry expiration.
 *
 * Mirrors the subset of a KV namespace API the cache provider uses
 * (put / getWithMetadata) so the provider stays storage-agnostic.
 * Values are stored as strings.
 */

export interface MemoryPutOptions {
  /** Seconds until the entry is dropped */
  expirationTtl?: number;
  metadata?: Record<string, unknown>;
}

interface StoredEntry {
  value: string;
  metadata: Record<string, unknown> | null;
  expiresAt: number | null;
}

const DEFAULT_MAX_ENTRIES = 1000;

export class MemoryKVStore {
  private entries = new Map<string, StoredEntry>();
  private maxEntries: number;

  constructor(maxEntries: number = DEFAULT_MAX_ENTRIES) {
    this.maxEntries = maxEntries;
  }

  get size(): number {
    return this.entries.size;
  }

  async put(key: string, value: string, options: MemoryPutOptions = {}): Promise<void> {
    const now = Date.now();

    // Re-insert so the key moves to the back of the eviction order
    this.entries.delete(key);

    if (this.entries.size >= this.maxEntries) {
      this.removeExpired(now);
    }
    if (this.entries.size >= this.maxEntries) {
      // Oldest insertion first
      const oldestKey = this.entries.keys().next().value;
      if (oldestKey !== undefined) {
        this.entries.delete(oldestKey);
      }
    }

    this.entries.set(key, {
      value,
      metadata: options.metadata ?? null,
      expiresAt: options.expirationTtl !== undefined
        ? now + options.expirationTtl * 1000
        : null,
    });
  }

  async getWithMetadata(
    key: string,
  ): Promise<{ value: string | null; metadata: Record<string, unknown> | null }> {
    const entry = this.readEntry(key);
    if (!entry) {
      return { value: null, metadata: null };
    }
    return { value: entry.value, metadata: entry.metadata };
  }

  private readEntry(key: string): StoredEntry | null {
    const entry = this.entries.get(key);
    if (!entry) return null;

    if (entry.expiresAt !== null && entry.expiresAt <= Date.now()) {
      this.entries.delete(key);
      return null;
    }
    return entry;
  }

  private removeExpired(now: number): void {
    for (const [key, entry] of this.entries.entries()) {
      if (entry.expiresAt !== null && entry.expiresAt <= now) {
        this.entries.delete(key);
      }
    }
  }
}
