import { createCache, createCacheKey } from './cache';
import { assertMillis, assertSeconds, resolveConfig } from './config';
import { createLogger } from './debug';
import { GenerationError, GenerationTimeoutError, MalformedPatternError, NotFoundError, toError } from './errors';
import { createFallback } from './fallback';
import { createLockRegistry } from './lock';
import { normalizePath, resolveRoute } from './matcher';
import { compilePattern, parseRoutePath } from './pattern';
import { createScheduler } from './scheduler';
import { buildRouteTable } from './table';
import type {
  Artifact,
  EngineOutcome,
  EngineRequest,
  EngineStats,
  GenerateFunction,
  Generated,
  PartialStalewiseConfig,
  RenderResult,
  RouteDefinition,
  RouteMatch,
  RouteParams,
  RouteTable,
  StalewiseCache,
  StalewiseConfig,
  StalewiseLogger,
} from './types';

export interface EngineOptions {
  routes: RouteDefinition[];
  config?: PartialStalewiseConfig;
  /** Replaces the console logger */
  logger?: StalewiseLogger;
  /** An existing cache to serve from; a new one is created otherwise */
  cache?: StalewiseCache;
}

export interface StalewiseEngine {
  readonly config: StalewiseConfig;
  readonly table: RouteTable;
  readonly cache: StalewiseCache;
  /** Match a path without touching the cache */
  resolve(path: string): RouteMatch | undefined;
  /** Answer a normalized request. Rejects with a RangeError for an out-of-range timeout. */
  handle(request: EngineRequest): Promise<EngineOutcome>;
  /** Drop the artifact for one route and parameter set. Returns whether one was cached. */
  invalidate(routeId: string, params?: RouteParams): boolean;
  /** Drop the artifact a request path would be served from. Throws NotFoundError for unknown paths. */
  invalidatePath(path: string): boolean;
  /** Drop every artifact of a route. Returns the number removed. */
  invalidateRoute(routeId: string): number;
  stats(): EngineStats;
  /** Resolve once no generation is running */
  idle(): Promise<void>;
  close(): Promise<void>;
}

const ALLOWED_METHODS = ['GET', 'HEAD'];

function isRenderResult(value: unknown): value is RenderResult {
  return typeof value === 'object' && value !== null && 'body' in value && typeof value.body === 'string';
}

function isHeaders(value: unknown): value is Record<string, string> {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    Object.values(value).every((header) => typeof header === 'string')
  );
}

/**
 * Build an engine from route definitions. Malformed or duplicate routes throw here,
 * so a bad route set stops startup.
 */
export function createEngine(options: EngineOptions): StalewiseEngine {
  const config = resolveConfig(options.config);
  const logger = options.logger ?? createLogger(config);
  const cache = options.cache ?? createCache();

  const definitions = new Map<string, RouteDefinition>();
  const knownPaths = new Map<string, RouteParams[]>();

  const patterns = options.routes.map((definition) => {
    const segments =
      definition.segments ?? (definition.path !== undefined ? parseRoutePath(definition.path) : undefined);
    if (!segments) {
      throw new MalformedPatternError(definition.id, 'a route needs a path or segments');
    }
    const pattern = compilePattern({
      id: definition.id,
      segments,
      fallback: definition.fallback ?? config.fallback.mode,
    });
    if (definition.revalidate !== undefined) {
      assertSeconds(`revalidate of route "${definition.id}"`, definition.revalidate);
    }
    definitions.set(definition.id, definition);
    if (definition.paths) {
      knownPaths.set(definition.id, definition.paths);
    }
    return pattern;
  });

  const table = buildRouteTable(patterns);
  const fallback = createFallback(knownPaths);
  const counters: EngineStats = {
    hits: 0,
    staleHits: 0,
    misses: 0,
    placeholders: 0,
    notFound: 0,
    regenerations: 0,
    failures: 0,
  };

  const scheduler = createScheduler({
    cache,
    locks: createLockRegistry(),
    config,
    logger,
    onRegeneration(_key, outcome) {
      if (outcome === 'success') {
        counters.regenerations++;
      } else {
        counters.failures++;
      }
    },
  });

  logger.log(`Initialized with ${table.patterns.length} routes.`);

  function toArtifact(key: string, result: unknown): Artifact {
    if (!isRenderResult(result)) {
      throw new GenerationError(key, new Error('expected an object with a string body'));
    }

    const status = result.status ?? 200;
    if (!Number.isInteger(status) || status < 100 || status > 599) {
      throw new GenerationError(key, new Error(`invalid status ${status}`));
    }

    const headers = result.headers ?? {};
    if (!isHeaders(headers)) {
      throw new GenerationError(key, new Error('headers must map names to strings'));
    }

    return { body: result.body, status, headers: { ...headers } };
  }

  function toGenerated(definition: RouteDefinition, key: string, result: unknown): Generated {
    const artifact = toArtifact(key, result);

    let revalidate: number | null;
    if (isRenderResult(result) && result.revalidate !== undefined) {
      revalidate = result.revalidate;
    } else if (definition.revalidate !== undefined) {
      revalidate = definition.revalidate;
    } else {
      revalidate = config.revalidate.default;
    }
    if (revalidate !== null && (!Number.isFinite(revalidate) || revalidate < 0)) {
      throw new GenerationError(key, new Error(`invalid revalidate ${revalidate}`));
    }

    return { artifact, revalidate };
  }

  function bindRender(definition: RouteDefinition, match: RouteMatch, key: string): GenerateFunction {
    return async (signal) => {
      const result: unknown = await definition.render(match.params, { routeId: match.route.id, key, signal });
      return toGenerated(definition, key, result);
    };
  }

  function placeholderFor(definition: RouteDefinition, params: RouteParams, key: string): Artifact {
    const { placeholder } = definition;
    if (placeholder === undefined) return config.fallback.placeholder;

    let result: unknown;
    try {
      result = typeof placeholder === 'function' ? placeholder(params) : placeholder;
    } catch (error) {
      throw new GenerationError(key, error);
    }
    return toArtifact(key, result);
  }

  async function handle(request: EngineRequest): Promise<EngineOutcome> {
    const method = request.method.toUpperCase();
    if (!ALLOWED_METHODS.includes(method)) {
      logger.log(`SKIP: method ${method} for ${request.path}`);
      return { type: 'method-not-allowed', method };
    }
    const head = method === 'HEAD';
    if (request.timeout !== undefined) {
      assertMillis('request timeout', request.timeout);
    }

    const match = resolveRoute(table, request.path);
    const definition = match ? definitions.get(match.route.id) : undefined;
    if (!match || !definition) {
      counters.notFound++;
      logger.log(`NOT FOUND: no route for ${request.path}`);
      return { type: 'not-found', path: normalizePath(request.path) };
    }

    const key = createCacheKey(match.route.id, match.params);
    const entry = cache.get(key);
    const action = fallback.decide(match, entry ? entry.state : 'absent', fallback.isKnown(match));
    logger.log(`MATCH: ${match.path} → ${match.route.id} (${action})`, { params: match.params });

    switch (action) {
      case 'not-found':
        counters.notFound++;
        return { type: 'not-found', path: match.path };

      case 'placeholder': {
        scheduler.backfill(key, bindRender(definition, match, key));
        let artifact: Artifact;
        try {
          artifact = placeholderFor(definition, match.params, key);
        } catch (error) {
          counters.failures++;
          return { type: 'generation-error', error: toError(error) };
        }
        counters.placeholders++;
        return { type: 'artifact', artifact, status: 'PLACEHOLDER', match, head };
      }

      case 'block':
        try {
          const result = await scheduler.serve(key, bindRender(definition, match, key), {
            timeout: request.timeout,
          });
          if (result.status === 'HIT') counters.hits++;
          else if (result.status === 'STALE') counters.staleHits++;
          else counters.misses++;
          return { type: 'artifact', artifact: result.artifact, status: result.status, match, head };
        } catch (error) {
          if (error instanceof GenerationTimeoutError) {
            counters.failures++;
            return { type: 'generation-timeout', error };
          }
          if (error instanceof GenerationError) {
            counters.failures++;
            return { type: 'generation-error', error };
          }
          throw error;
        }

      default: {
        const unknownAction: never = action;
        throw new Error(`Unknown fallback action: ${String(unknownAction)}`);
      }
    }
  }

  function invalidate(routeId: string, params: RouteParams = {}): boolean {
    const key = createCacheKey(routeId, params);
    const existed = cache.get(key) !== undefined;
    cache.invalidate(key);
    logger.log(`INVALIDATE: ${key}${existed ? '' : ' (not cached)'}`);
    return existed;
  }

  return {
    config,
    table,
    cache,
    resolve: (path) => resolveRoute(table, path),
    handle,
    invalidate,
    invalidatePath(path: string): boolean {
      const match = resolveRoute(table, path);
      if (!match) {
        throw new NotFoundError(normalizePath(path));
      }
      return invalidate(match.route.id, match.params);
    },
    invalidateRoute(routeId: string): number {
      const removed = cache.invalidateRoute(routeId);
      logger.log(`INVALIDATE: ${removed} entries of ${routeId}`);
      return removed;
    },
    stats: () => ({ ...counters }),
    idle: () => scheduler.idle(),
    close: () => scheduler.close(),
  };
}
