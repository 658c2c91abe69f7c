import { DuplicateRouteError } from './errors';
import { compareSpecificity, formatSegments, shapeOf } from './pattern';
import type { CompiledPattern, RouteTable } from './types';

/**
 * Build the immutable route table for one build generation.
 * Patterns are sorted most specific first so resolution can stop at the first match.
 */
export function buildRouteTable(patterns: readonly CompiledPattern[]): RouteTable {
  const ids = new Map<string, CompiledPattern>();
  const shapes = new Map<string, CompiledPattern>();

  for (const pattern of patterns) {
    const sameId = ids.get(pattern.id);
    if (sameId) {
      throw new DuplicateRouteError(sameId.id, pattern.id, 'share the same id');
    }
    ids.set(pattern.id, pattern);

    const shape = shapeOf(pattern);
    const sameShape = shapes.get(shape);
    if (sameShape) {
      throw new DuplicateRouteError(
        sameShape.id,
        pattern.id,
        `both match ${formatSegments(pattern.segments)}`,
      );
    }
    shapes.set(shape, pattern);
  }

  const sorted = [...patterns].sort(compareSpecificity);

  // Index by leading static literal. Indices are pushed in sorted order,
  // so each bucket stays sorted.
  const byFirstSegment = new Map<string, number[]>();
  const unanchored: number[] = [];

  sorted.forEach((pattern, index) => {
    const first = pattern.segments[0];
    if (first && first.kind === 'static') {
      const bucket = byFirstSegment.get(first.name);
      if (bucket) {
        bucket.push(index);
      } else {
        byFirstSegment.set(first.name, [index]);
      }
    } else {
      unanchored.push(index);
    }
  });

  return Object.freeze({
    patterns: Object.freeze(sorted),
    byFirstSegment,
    unanchored: Object.freeze(unanchored),
  });
}
