import {Account, HexString} from "../types.js";

type CacheEntry<T> = {stateRoot: HexString; promise: Promise<T>};

/**
 * Promise cache with at most one fetch in flight per key. Concurrent callers share the pending fetch,
 * a fetch that fails is evicted so the next caller fetches again.
 */
export class SingleFlightCache<T> {
  private readonly entries = new Map<string, CacheEntry<T>>();

  get size(): number {
    return this.entries.size;
  }

  has(key: string): boolean {
    return this.entries.has(key);
  }

  getOrFetch(key: string, stateRoot: HexString, fetch: () => Promise<T>): Promise<T> {
    const cached = this.entries.get(key);
    if (cached) {
      return cached.promise;
    }

    const entry: CacheEntry<T> = {stateRoot, promise: fetch()};
    this.entries.set(key, entry);
    entry.promise.catch(() => {
      if (this.entries.get(key) === entry) {
        this.entries.delete(key);
      }
    });
    return entry.promise;
  }

  /** Drop the entries of state roots outside `liveStateRoots`, returns the count dropped */
  prune(liveStateRoots: Set<HexString>): number {
    let pruned = 0;
    for (const [key, entry] of this.entries) {
      if (!liveStateRoots.has(entry.stateRoot)) {
        this.entries.delete(key);
        pruned++;
      }
    }
    return pruned;
  }
}

/**
 * Verified accounts, storage slots and code shared by every view of a client.
 * Entries are only ever populated with values that passed proof verification.
 */
export class ProofCache {
  readonly accounts = new SingleFlightCache<Account>();
  readonly storage = new SingleFlightCache<bigint>();
  /** Keyed by code hash */
  readonly code = new SingleFlightCache<Uint8Array>();

  get size(): number {
    return this.accounts.size + this.storage.size + this.code.size;
  }

  prune(liveStateRoots: Set<HexString>): number {
    return this.accounts.prune(liveStateRoots) + this.storage.prune(liveStateRoots) + this.code.prune(liveStateRoots);
  }
}

export function getAccountCacheKey(stateRoot: HexString, address: HexString): string {
  return `${stateRoot}:${address}`;
}

export function getStorageCacheKey(stateRoot: HexString, address: HexString, storageKey: HexString): string {
  return `${stateRoot}:${address}:${storageKey}`;
}
