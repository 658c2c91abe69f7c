import type { Artifact, CacheEntry, RouteParams, StalewiseCache } from './types';

/**
 * Derive the cache key for a route and its bound parameters.
 * Bindings are sorted by name, so the key doesn't depend on insertion order.
 */
export function createCacheKey(routeId: string, params: RouteParams): string {
  const bindings = Object.keys(params)
    .sort()
    .map((name) => [name, params[name]]);
  return JSON.stringify([routeId, bindings]);
}

function routePrefix(routeId: string): string {
  return `[${JSON.stringify(routeId)},`;
}

export function isExpired(entry: CacheEntry, now: number = Date.now()): boolean {
  if (entry.revalidate === null) return false;
  return now - entry.generatedAt > entry.revalidate * 1000;
}

/**
 * In-memory artifact cache. Entries are immutable: every transition swaps in a
 * new object, so a reader holding an entry never sees it change underneath it.
 */
export function createCache(): StalewiseCache {
  const store = new Map<string, CacheEntry>();
  // Invalidation counters: per key, per route prefix and for the whole cache
  let counter = 0;
  let clearedAt = 0;
  const keyVersions = new Map<string, number>();
  const routeVersions = new Map<string, number>();

  function swap(key: string, update: (entry: CacheEntry) => CacheEntry | null): void {
    const entry = store.get(key);
    if (!entry) return;
    const next = update(entry);
    if (next) {
      store.set(key, Object.freeze(next));
    }
  }

  const cache: StalewiseCache = {
    get(key: string): CacheEntry | undefined {
      return store.get(key);
    },

    put(key: string, artifact: Artifact, revalidate: number | null): void {
      store.set(
        key,
        Object.freeze({
          key,
          artifact: Object.freeze({ ...artifact, headers: Object.freeze({ ...artifact.headers }) }),
          generatedAt: Date.now(),
          revalidate,
          state: 'fresh',
          failures: 0,
        }),
      );
    },

    markStale(key: string): void {
      swap(key, (entry) => (entry.state === 'fresh' && isExpired(entry) ? { ...entry, state: 'stale' } : null));
    },

    markRegenerating(key: string): void {
      swap(key, (entry) => (entry.state === 'stale' ? { ...entry, state: 'regenerating' } : null));
    },

    markRegenerationFailed(key: string, error: Error): void {
      swap(key, (entry) =>
        entry.state === 'regenerating'
          ? {
              ...entry,
              state: 'stale',
              failures: entry.failures + 1,
              lastError: { message: error.message, at: Date.now() },
            }
          : null,
      );
    },

    invalidate(key: string): void {
      store.delete(key);
      keyVersions.set(key, ++counter);
    },

    invalidateRoute(routeId: string): number {
      const prefix = routePrefix(routeId);
      routeVersions.set(prefix, ++counter);
      let removed = 0;
      for (const key of Array.from(store.keys())) {
        if (key.startsWith(prefix)) {
          store.delete(key);
          removed++;
        }
      }
      return removed;
    },

    version(key: string): number {
      let version = Math.max(clearedAt, keyVersions.get(key) ?? 0);
      for (const [prefix, routeVersion] of routeVersions) {
        if (routeVersion > version && key.startsWith(prefix)) {
          version = routeVersion;
        }
      }
      return version;
    },

    keys(): string[] {
      return Array.from(store.keys());
    },

    clear(): void {
      store.clear();
      keyVersions.clear();
      routeVersions.clear();
      clearedAt = ++counter;
    },

    get size(): number {
      return store.size;
    },
  };

  return cache;
}
