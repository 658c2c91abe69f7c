/**
 * Stalewise Configuration
 */
export interface StalewiseConfig {
  /** Enable debug logging to console */
  debug: boolean;
  /** Revalidation defaults */
  revalidate: {
    /** Seconds before a generated artifact goes stale. `null` keeps it forever. */
    default: number | null;
  };
  /** Render-function scheduling */
  generation: {
    /** Deadline in milliseconds for a request that blocks on generation */
    timeout: number;
    /** Deadline in milliseconds for a background regeneration */
    backgroundTimeout: number;
    /** Whether a rendered status code may be written to the cache */
    shouldCache: (status: number) => boolean;
  };
  /** Behavior for parameter sets that were never generated */
  fallback: {
    /** Mode used by routes that don't set their own */
    mode: FallbackMode;
    /** Artifact served while a placeholder-mode route is backfilled */
    placeholder: Artifact;
  };
  /** Response headers added by `toResponse` */
  headers: {
    /** Whether to expose the cache status header */
    expose: boolean;
    /** Name of the cache status header */
    cacheStatus: string;
  };
}

export type PartialStalewiseConfig = {
  [K in keyof StalewiseConfig]?: StalewiseConfig[K] extends object
    ? Partial<StalewiseConfig[K]>
    : StalewiseConfig[K];
};

export type SegmentKind = 'static' | 'dynamic' | 'catch-all' | 'optional-catch-all';

/**
 * One segment of a route definition. For static segments `name` holds the literal.
 */
export interface RouteSegmentSpec {
  kind: SegmentKind;
  name: string;
}

export type FallbackMode = 'strict' | 'block' | 'placeholder';

export type RouteParams = Record<string, string | string[]>;

export interface CompiledPattern {
  /** Route identity, unique within a table */
  id: string;
  segments: readonly RouteSegmentSpec[];
  /** Rank per segment followed by an end marker; compared lexicographically */
  specificity: readonly number[];
  /** Names bound by dynamic and catch-all segments, in order */
  paramNames: readonly string[];
  fallback: FallbackMode;
  hasDynamicSegments: boolean;
}

export interface RouteTable {
  /** Patterns sorted by descending specificity */
  readonly patterns: readonly CompiledPattern[];
  /** Pattern indices keyed by a leading static literal */
  readonly byFirstSegment: ReadonlyMap<string, readonly number[]>;
  /** Indices of patterns that don't start with a static segment */
  readonly unanchored: readonly number[];
}

export interface RouteMatch {
  route: CompiledPattern;
  params: RouteParams;
  /** The normalized path that was matched */
  path: string;
}

/**
 * A generated response payload plus its status and headers
 */
export interface Artifact {
  body: string;
  status: number;
  headers: Record<string, string>;
}

export type EntryState = 'fresh' | 'stale' | 'regenerating';

export type CacheState = EntryState | 'absent';

export interface CacheEntry {
  readonly key: string;
  readonly artifact: Artifact;
  /** Epoch milliseconds of the generation that produced `artifact` */
  readonly generatedAt: number;
  /** Seconds until stale, `null` for never */
  readonly revalidate: number | null;
  readonly state: EntryState;
  /** Background regenerations that failed since the last successful put */
  readonly failures: number;
  readonly lastError?: { message: string; at: number };
}

/**
 * Artifact cache interface
 */
export interface StalewiseCache {
  /** Look up an entry without side effects */
  get(key: string): CacheEntry | undefined;
  /** Insert or replace an entry as fresh */
  put(key: string, artifact: Artifact, revalidate: number | null): void;
  /** Flip a fresh entry to stale once its revalidation interval elapsed */
  markStale(key: string): void;
  /** Flip a stale entry to regenerating */
  markRegenerating(key: string): void;
  /** Return a regenerating entry to stale, keeping its artifact */
  markRegenerationFailed(key: string, error: Error): void;
  /** Remove an entry */
  invalidate(key: string): void;
  /** Remove every entry generated for a route */
  invalidateRoute(routeId: string): number;
  /** Grows whenever an invalidation may have removed the key */
  version(key: string): number;
  keys(): string[];
  clear(): void;
  readonly size: number;
}

export interface RegenerationLock {
  readonly key: string;
  readonly acquiredAt: number;
  readonly released: boolean;
  release(): void;
}

export interface LockRegistry {
  /** Take the lock for a key, or null when it is already held */
  tryAcquire(key: string): RegenerationLock | null;
  isHeld(key: string): boolean;
  heldKeys(): string[];
}

export interface RenderContext {
  routeId: string;
  key: string;
  /** Aborted when the engine gives up on this generation */
  signal: AbortSignal;
}

export interface RenderResult {
  body: string;
  status?: number;
  headers?: Record<string, string>;
  /** Seconds until stale. `undefined` inherits, `null` never goes stale. */
  revalidate?: number | null;
}

export type RenderFunction = (params: RouteParams, context: RenderContext) => Promise<RenderResult>;

/** A render function bound to one key, as handed to the scheduler */
export type GenerateFunction = (signal: AbortSignal) => Promise<Generated>;

export interface Generated {
  artifact: Artifact;
  revalidate: number | null;
}

export type CacheStatus = 'HIT' | 'STALE' | 'MISS' | 'PLACEHOLDER';

export interface ServeResult {
  artifact: Artifact;
  status: CacheStatus;
}

export interface ServeOptions {
  /** Deadline in milliseconds when the request has to block */
  timeout?: number;
}

export interface StalewiseScheduler {
  serve(key: string, generate: GenerateFunction, options?: ServeOptions): Promise<ServeResult>;
  /** Start a first-time generation in the background, unless one is running */
  backfill(key: string, generate: GenerateFunction): boolean;
  /** Resolve once no background generation is running */
  idle(): Promise<void>;
  close(): Promise<void>;
}

export type FallbackAction = 'not-found' | 'block' | 'placeholder';

export interface StalewiseFallback {
  decide(match: RouteMatch, cacheState: CacheState, known: boolean): FallbackAction;
  isKnown(match: RouteMatch): boolean;
}

export interface RouteDefinitionBase {
  id: string;
  render: RenderFunction;
  fallback?: FallbackMode;
  /** Default seconds until stale for this route */
  revalidate?: number | null;
  /** Parameter sets known at build time */
  paths?: RouteParams[];
  placeholder?: Artifact | ((params: RouteParams) => Artifact);
}

/**
 * A route, given either as a file-style path ("/blog/[...slug]") or as segments
 */
export type RouteDefinition =
  | (RouteDefinitionBase & { path: string; segments?: undefined })
  | (RouteDefinitionBase & { segments: RouteSegmentSpec[]; path?: undefined });

export interface EngineRequest {
  path: string;
  method: string;
  query?: Record<string, string>;
  /** Overrides `generation.timeout` for this request; same bounds apply */
  timeout?: number;
}

export type EngineOutcome =
  | { type: 'artifact'; artifact: Artifact; status: CacheStatus; match: RouteMatch; head: boolean }
  | { type: 'not-found'; path: string }
  | { type: 'method-not-allowed'; method: string }
  | { type: 'generation-error'; error: Error }
  | { type: 'generation-timeout'; error: Error };

export interface EngineResponse {
  status: number;
  headers: Record<string, string>;
  body: string;
}

export interface EngineStats {
  hits: number;
  staleHits: number;
  misses: number;
  placeholders: number;
  notFound: number;
  regenerations: number;
  failures: number;
}

/**
 * Debug logger interface
 */
export interface StalewiseLogger {
  log(message: string, data?: unknown): void;
  warn(message: string, data?: unknown): void;
  error(message: string, data?: unknown): void;
}

/**
 * A page module as exported from a file in the pages directory
 */
export interface PageModule {
  render?: unknown;
  revalidate?: unknown;
  fallback?: unknown;
  paths?: unknown;
  placeholder?: unknown;
}

/**
 * One entry of the generated routes manifest
 */
export interface ManifestEntry {
  id: string;
  path: string;
  module: PageModule;
}
