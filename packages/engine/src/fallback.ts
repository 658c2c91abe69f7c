import { createCacheKey } from './cache';
import type { CacheState, FallbackAction, RouteMatch, RouteParams, StalewiseFallback } from './types';

/**
 * Decides what happens to a parameter set that has never been generated.
 * `knownPaths` maps a route id to the parameter sets declared at build time.
 */
export function createFallback(knownPaths: ReadonlyMap<string, readonly RouteParams[]>): StalewiseFallback {
  const known = new Set<string>();
  for (const [routeId, paths] of knownPaths) {
    for (const params of paths) {
      known.add(createCacheKey(routeId, params));
    }
  }

  function isKnown(match: RouteMatch): boolean {
    if (!match.route.hasDynamicSegments) return true;
    return known.has(createCacheKey(match.route.id, match.params));
  }

  function decide(match: RouteMatch, cacheState: CacheState, isKnownParams: boolean): FallbackAction {
    // Generated before: the scheduler's policy applies
    if (cacheState !== 'absent' || isKnownParams) {
      return 'block';
    }

    switch (match.route.fallback) {
      case 'strict':
        return 'not-found';
      case 'block':
        return 'block';
      case 'placeholder':
        return 'placeholder';
      default: {
        const unknownMode: never = match.route.fallback;
        throw new Error(`Unknown fallback mode: ${String(unknownMode)}`);
      }
    }
  }

  return { decide, isKnown };
}
