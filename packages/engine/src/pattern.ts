import { MalformedPatternError } from './errors';
import type { CompiledPattern, FallbackMode, RouteSegmentSpec, SegmentKind } from './types';

/**
 * Segment ranks, compared position by position. `END` marks the end of a
 * pattern so that "/docs" outranks "/docs/[[...slug]]" for the path "/docs".
 */
const RANK_STATIC = 4;
const RANK_DYNAMIC = 3;
const RANK_CATCH_ALL = 2;
const RANK_END = 1;
const RANK_OPTIONAL_CATCH_ALL = 0;

const PARAM_NAME = /^[A-Za-z_$][\w$-]*$/;

export interface PatternDefinition {
  id: string;
  segments: readonly RouteSegmentSpec[];
  fallback: FallbackMode;
}

function rank(kind: SegmentKind): number {
  switch (kind) {
    case 'static':
      return RANK_STATIC;
    case 'dynamic':
      return RANK_DYNAMIC;
    case 'catch-all':
      return RANK_CATCH_ALL;
    case 'optional-catch-all':
      return RANK_OPTIONAL_CATCH_ALL;
    default: {
      const unknownKind: never = kind;
      throw new Error(`Unknown segment kind: ${String(unknownKind)}`);
    }
  }
}

export function isCatchAll(kind: SegmentKind): boolean {
  return kind === 'catch-all' || kind === 'optional-catch-all';
}

/**
 * Render segments back into the file-style notation, e.g. "/blog/[...slug]".
 */
export function formatSegments(segments: readonly RouteSegmentSpec[]): string {
  const parts = segments.map((seg) => {
    switch (seg.kind) {
      case 'static':
        return seg.name;
      case 'dynamic':
        return `[${seg.name}]`;
      case 'catch-all':
        return `[...${seg.name}]`;
      case 'optional-catch-all':
        return `[[...${seg.name}]]`;
      default: {
        const unknownKind: never = seg.kind;
        throw new Error(`Unknown segment kind: ${String(unknownKind)}`);
      }
    }
  });
  return `/${parts.join('/')}`;
}

/**
 * Parse a file-style route path into segment specs:
 *   - [id]         dynamic
 *   - [...slug]    catch-all
 *   - [[...slug]]  optional catch-all
 *   - anything else is a static literal
 */
export function parseRoutePath(path: string): RouteSegmentSpec[] {
  const segments: RouteSegmentSpec[] = [];

  for (const raw of path.split('/').filter(Boolean)) {
    if (raw.startsWith('[[')) {
      if (!raw.endsWith(']]')) {
        throw new MalformedPatternError(path, `unbalanced brackets in "${raw}"`);
      }
      const inner = raw.slice(2, -2);
      if (!inner.startsWith('...')) {
        throw new MalformedPatternError(path, `optional segment "${raw}" must be a catch-all`);
      }
      segments.push({ kind: 'optional-catch-all', name: inner.slice(3) });
    } else if (raw.startsWith('[')) {
      if (!raw.endsWith(']') || raw.endsWith(']]')) {
        throw new MalformedPatternError(path, `unbalanced brackets in "${raw}"`);
      }
      const inner = raw.slice(1, -1);
      if (inner.startsWith('...')) {
        segments.push({ kind: 'catch-all', name: inner.slice(3) });
      } else {
        segments.push({ kind: 'dynamic', name: inner });
      }
    } else if (raw.includes('[') || raw.includes(']')) {
      throw new MalformedPatternError(path, `unbalanced brackets in "${raw}"`);
    } else {
      segments.push({ kind: 'static', name: raw });
    }
  }

  return segments;
}

export function compilePattern(definition: PatternDefinition): CompiledPattern {
  const { id, segments, fallback } = definition;
  const paramNames: string[] = [];
  const catchAllCount = segments.filter((seg) => isCatchAll(seg.kind)).length;

  if (catchAllCount > 1) {
    throw new MalformedPatternError(id, 'more than one catch-all segment');
  }

  segments.forEach((seg, index) => {
    if (seg.kind === 'static') {
      if (seg.name === '' || seg.name.includes('/')) {
        throw new MalformedPatternError(id, `invalid static segment "${seg.name}"`);
      }
      return;
    }

    if (!PARAM_NAME.test(seg.name)) {
      throw new MalformedPatternError(id, `invalid parameter name "${seg.name}"`);
    }
    if (paramNames.includes(seg.name)) {
      throw new MalformedPatternError(id, `parameter name "${seg.name}" is used twice`);
    }
    if (isCatchAll(seg.kind) && index !== segments.length - 1) {
      throw new MalformedPatternError(id, `catch-all segment "${seg.name}" must be last`);
    }
    paramNames.push(seg.name);
  });

  const frozenSegments = Object.freeze(segments.map((seg) => Object.freeze({ kind: seg.kind, name: seg.name })));

  return Object.freeze({
    id,
    segments: frozenSegments,
    specificity: Object.freeze([...segments.map((seg) => rank(seg.kind)), RANK_END]),
    paramNames: Object.freeze(paramNames),
    fallback,
    hasDynamicSegments: paramNames.length > 0,
  });
}

/**
 * Order two patterns, most specific first. Returns a negative number when
 * `a` should be tried before `b`.
 */
export function compareSpecificity(a: CompiledPattern, b: CompiledPattern): number {
  const length = Math.max(a.specificity.length, b.specificity.length);
  for (let i = 0; i < length; i++) {
    const diff = (b.specificity[i] ?? -1) - (a.specificity[i] ?? -1);
    if (diff !== 0) return diff;
  }

  // Same shape: order by literals, then id, so the order never depends on input order
  const literals = compareStrings(staticSignature(a), staticSignature(b));
  return literals !== 0 ? literals : compareStrings(a.id, b.id);
}

/**
 * Structural identity: kinds and static literals in order, parameter names ignored.
 */
export function shapeOf(pattern: CompiledPattern): string {
  return pattern.segments.map((seg) => (seg.kind === 'static' ? `s:${seg.name}` : seg.kind)).join('/');
}

function staticSignature(pattern: CompiledPattern): string {
  return pattern.segments.map((seg) => (seg.kind === 'static' ? seg.name : '')).join('/');
}

function compareStrings(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}
