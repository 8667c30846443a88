/**
 * Per-run domain cache
 *
 * Holds the outcome of every domain lookup for the duration of one run.
 * Reads are lock-free; a miss takes the domain's mutex so concurrent
 * candidates on the same domain wait for a single lookup.
 */

import { Mutex } from 'async-mutex';
import type { DomainCacheEntry, DomainResolution } from './types';

/**
 * A mapping from domain to resolution, filled at most once per domain
 *
 * @example
 * ```ts
 * const cache = new DomainCache();
 * const entry = await cache.getOrResolve('example.com', (domain) => lookupMx(domain));
 * cache.get('EXAMPLE.com') === entry; // true
 * ```
 */
export class DomainCache {
  private readonly entries: Map<string, DomainCacheEntry> = new Map();
  private readonly locks: Map<string, Mutex> = new Map();

  /**
   * Gets the stored entry for a domain
   *
   * @returns The entry, or undefined if the domain was never resolved
   */
  get(domain: string): DomainCacheEntry | undefined {
    return this.entries.get(domainCacheKey(domain));
  }

  /**
   * Returns the stored entry, resolving and storing it on first use
   *
   * @param domain - The domain (normalized before use)
   * @param resolve - Performs the lookup; called at most once per domain
   */
  async getOrResolve(
    domain: string,
    resolve: (domain: string) => Promise<DomainResolution>
  ): Promise<DomainCacheEntry> {
    const key = domainCacheKey(domain);

    const cached = this.entries.get(key);
    if (cached) {
      return cached;
    }

    return this.lockFor(key).runExclusive(async () => {
      // Another caller may have filled it while we waited for the lock
      const filled = this.entries.get(key);
      if (filled) {
        return filled;
      }

      const resolution = await resolve(key);
      const entry: DomainCacheEntry = Object.freeze({
        ...resolution,
        domain: key,
        resolvedAt: Date.now(),
      });
      this.entries.set(key, entry);
      this.locks.delete(key);
      return entry;
    });
  }

  /**
   * Checks if a domain has been resolved
   */
  has(domain: string): boolean {
    return this.entries.has(domainCacheKey(domain));
  }

  /**
   * Number of resolved domains
   */
  get size(): number {
    return this.entries.size;
  }

  /**
   * Clears all entries
   */
  clear(): void {
    this.entries.clear();
    this.locks.clear();
  }

  private lockFor(key: string): Mutex {
    let lock = this.locks.get(key);
    if (!lock) {
      lock = new Mutex();
      this.locks.set(key, lock);
    }
    return lock;
  }
}

/**
 * Generates a cache key for a domain
 *
 * @param domain - The domain name
 * @returns A normalized cache key
 */
export function domainCacheKey(domain: string): string {
  return domain.toLowerCase().trim();
}
