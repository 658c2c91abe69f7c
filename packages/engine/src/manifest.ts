import { InvalidManifestError } from './errors';
import type { Artifact, FallbackMode, ManifestEntry, RenderFunction, RouteDefinition, RouteParams } from './types';

const FALLBACK_MODES: readonly FallbackMode[] = ['strict', 'block', 'placeholder'];

function isRenderFunction(value: unknown): value is RenderFunction {
  return typeof value === 'function';
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isOptionalRevalidate(value: unknown): value is number | null | undefined {
  return value === undefined || value === null || (typeof value === 'number' && Number.isFinite(value) && value >= 0);
}

function isOptionalFallback(value: unknown): value is FallbackMode | undefined {
  return value === undefined || FALLBACK_MODES.some((mode) => mode === value);
}

function isRouteParams(value: unknown): value is RouteParams {
  if (!isRecord(value)) return false;
  return Object.values(value).every(
    (param) =>
      typeof param === 'string' || (Array.isArray(param) && param.every((part) => typeof part === 'string')),
  );
}

function isOptionalPaths(value: unknown): value is RouteParams[] | undefined {
  return value === undefined || (Array.isArray(value) && value.every(isRouteParams));
}

function isArtifact(value: unknown): value is Artifact {
  if (!isRecord(value)) return false;
  const { body, status, headers } = value;
  return (
    typeof body === 'string' &&
    typeof status === 'number' &&
    isRecord(headers) &&
    Object.values(headers).every((header) => typeof header === 'string')
  );
}

function isOptionalPlaceholder(
  value: unknown,
): value is Artifact | ((params: RouteParams) => Artifact) | undefined {
  return value === undefined || typeof value === 'function' || isArtifact(value);
}

/**
 * Turn the page modules of a generated routes manifest into route definitions.
 * A page module exports `render` and may export `revalidate`, `fallback`,
 * `paths` and `placeholder`.
 */
export function routesFromManifest(entries: readonly ManifestEntry[]): RouteDefinition[] {
  return entries.map(({ id, path, module }) => {
    const { render, revalidate, fallback, paths, placeholder } = module;

    if (!isRenderFunction(render)) {
      throw new InvalidManifestError(id, 'page module must export a render function');
    }
    if (!isOptionalRevalidate(revalidate)) {
      throw new InvalidManifestError(id, '`revalidate` must be a non-negative number or null');
    }
    if (!isOptionalFallback(fallback)) {
      throw new InvalidManifestError(id, `\`fallback\` must be one of ${FALLBACK_MODES.join(', ')}`);
    }
    if (!isOptionalPaths(paths)) {
      throw new InvalidManifestError(id, '`paths` must be a list of parameter objects');
    }
    if (!isOptionalPlaceholder(placeholder)) {
      throw new InvalidManifestError(id, '`placeholder` must be an artifact or a function returning one');
    }

    const definition: RouteDefinition = { id, path, render, revalidate, fallback, paths, placeholder };
    return definition;
  });
}
