import type { PartialStalewiseConfig, StalewiseConfig } from './types';

export const defaultConfig: StalewiseConfig = {
  debug: false,
  revalidate: {
    default: null,
  },
  generation: {
    timeout: 10 * 1000, // 10 seconds
    backgroundTimeout: 60 * 1000, // 1 minute
    shouldCache: (status) => status < 500,
  },
  fallback: {
    mode: 'block',
    placeholder: {
      body: '',
      status: 200,
      headers: { 'cache-control': 'no-store' },
    },
  },
  headers: {
    expose: true,
    cacheStatus: 'x-stalewise-cache',
  },
};

function deepMerge(target: StalewiseConfig, source: PartialStalewiseConfig): StalewiseConfig {
  return {
    debug: source.debug ?? target.debug,
    revalidate: mergeSection(target.revalidate, source.revalidate),
    generation: mergeSection(target.generation, source.generation),
    fallback: mergeSection(target.fallback, source.fallback),
    headers: mergeSection(target.headers, source.headers),
  };
}

function mergeSection<T extends object>(target: T, source: Partial<T> | undefined): T {
  const result = { ...target };
  if (!source) return result;

  for (const key of Object.keys(source) as (keyof T)[]) {
    const sourceVal = source[key];
    if (sourceVal !== undefined) {
      result[key] = sourceVal as T[keyof T];
    }
  }
  return result;
}

export function assertSeconds(name: string, value: number | null): void {
  if (value !== null && (!Number.isFinite(value) || value < 0)) {
    throw new RangeError(`${name} must be a non-negative number of seconds or null, got ${value}`);
  }
}

// Longer delays overflow Node's timers and fire immediately
export const MAX_TIMEOUT = 2_147_483_647;

export function assertMillis(name: string, value: number): void {
  if (!Number.isFinite(value) || value <= 0 || value > MAX_TIMEOUT) {
    throw new RangeError(`${name} must be a positive number of milliseconds up to ${MAX_TIMEOUT}, got ${value}`);
  }
}

function validate(config: StalewiseConfig): StalewiseConfig {
  assertSeconds('revalidate.default', config.revalidate.default);
  assertMillis('generation.timeout', config.generation.timeout);
  assertMillis('generation.backgroundTimeout', config.generation.backgroundTimeout);
  return config;
}

export function resolveConfig(userConfig?: PartialStalewiseConfig): StalewiseConfig {
  return validate(deepMerge(defaultConfig, userConfig ?? {}));
}

export function updateConfig(config: StalewiseConfig, updates: PartialStalewiseConfig): StalewiseConfig {
  return validate(deepMerge(config, updates));
}
