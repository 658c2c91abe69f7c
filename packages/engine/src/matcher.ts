import type { CompiledPattern, RouteMatch, RouteParams, RouteTable } from './types';

/**
 * Normalize a request path for matching:
 * - Strip query string and hash
 * - Ensure a leading slash
 */
export function normalizePath(url: string): string {
  // Strip hash
  let path = url.split('#')[0] ?? '';
  // Strip query string
  path = path.split('?')[0] ?? '';
  return path.startsWith('/') ? path : `/${path}`;
}

/**
 * Split a normalized path into decoded segments, ignoring a single trailing separator.
 * Segments are decoded one by one so an encoded "/" stays inside its segment.
 */
export function splitPath(path: string): string[] {
  const trimmed = path.endsWith('/') ? path.slice(0, -1) : path;
  if (trimmed === '') return [];

  return trimmed
    .slice(1)
    .split('/')
    .map((segment) => {
      try {
        return decodeURIComponent(segment);
      } catch {
        // Malformed escape: match on the raw segment
        return segment;
      }
    });
}

function matchPattern(pattern: CompiledPattern, segments: readonly string[]): RouteParams | null {
  const params: RouteParams = {};

  for (let i = 0; i < pattern.segments.length; i++) {
    const spec = pattern.segments[i];
    const value = segments[i];

    switch (spec.kind) {
      case 'static':
        if (value !== spec.name) return null;
        break;
      case 'dynamic':
        if (value === undefined || value === '') return null;
        params[spec.name] = value;
        break;
      case 'catch-all': {
        const rest = segments.slice(i);
        if (rest.length === 0 || rest.includes('')) return null;
        params[spec.name] = rest;
        return params;
      }
      case 'optional-catch-all': {
        const rest = segments.slice(i);
        if (rest.includes('')) return null;
        params[spec.name] = rest;
        return params;
      }
      default: {
        const unknownKind: never = spec.kind;
        throw new Error(`Unknown segment kind: ${String(unknownKind)}`);
      }
    }
  }

  // Without a trailing catch-all the lengths must agree
  return segments.length === pattern.segments.length ? params : null;
}

/**
 * Merge two ascending index lists into one ascending list.
 */
function mergeCandidates(a: readonly number[], b: readonly number[]): number[] {
  const merged: number[] = [];
  let i = 0;
  let j = 0;
  while (i < a.length || j < b.length) {
    if (j >= b.length || (i < a.length && a[i] < b[j])) {
      merged.push(a[i++]);
    } else {
      merged.push(b[j++]);
    }
  }
  return merged;
}

/**
 * Resolve a request path against the route table. Returns undefined when no pattern matches.
 */
export function resolveRoute(table: RouteTable, url: string): RouteMatch | undefined {
  const path = normalizePath(url);
  const segments = splitPath(path);

  const anchored = segments.length > 0 ? table.byFirstSegment.get(segments[0]) ?? [] : [];
  const candidates = mergeCandidates(anchored, table.unanchored);

  for (const index of candidates) {
    const route = table.patterns[index];
    const params = matchPattern(route, segments);
    if (params) {
      return { route, params, path };
    }
  }

  return undefined;
}
