export type {
  Artifact,
  CacheEntry,
  CacheState,
  CacheStatus,
  CompiledPattern,
  EngineOutcome,
  EngineRequest,
  EngineResponse,
  EngineStats,
  EntryState,
  FallbackAction,
  FallbackMode,
  GenerateFunction,
  Generated,
  LockRegistry,
  ManifestEntry,
  PageModule,
  PartialStalewiseConfig,
  RegenerationLock,
  RenderContext,
  RenderFunction,
  RenderResult,
  RouteDefinition,
  RouteMatch,
  RouteParams,
  RouteSegmentSpec,
  RouteTable,
  SegmentKind,
  ServeOptions,
  ServeResult,
  StalewiseCache,
  StalewiseConfig,
  StalewiseFallback,
  StalewiseLogger,
  StalewiseScheduler,
} from './types';

export { createEngine } from './engine';
export type { EngineOptions, StalewiseEngine } from './engine';
export { toResponse } from './response';
export { routesFromManifest } from './manifest';

export { compilePattern, compareSpecificity, formatSegments, parseRoutePath } from './pattern';
export type { PatternDefinition } from './pattern';
export { buildRouteTable } from './table';
export { normalizePath, resolveRoute, splitPath } from './matcher';
export { createCache, createCacheKey, isExpired } from './cache';
export { createLockRegistry } from './lock';
export { createScheduler } from './scheduler';
export type { RegenerationOutcome, SchedulerOptions } from './scheduler';
export { createFallback } from './fallback';
export { MAX_TIMEOUT, defaultConfig, resolveConfig, updateConfig } from './config';
export { createLogger } from './debug';

export {
  DuplicateRouteError,
  GenerationError,
  GenerationTimeoutError,
  InvalidManifestError,
  MalformedPatternError,
  NotFoundError,
  StalewiseError,
} from './errors';
export type { StalewiseErrorCode } from './errors';
