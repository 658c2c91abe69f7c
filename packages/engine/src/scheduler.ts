import { GenerationError, GenerationTimeoutError, toError } from './errors';
import type {
  Artifact,
  GenerateFunction,
  Generated,
  LockRegistry,
  RegenerationLock,
  ServeOptions,
  ServeResult,
  StalewiseCache,
  StalewiseConfig,
  StalewiseLogger,
  StalewiseScheduler,
} from './types';

export type RegenerationOutcome = 'success' | 'failure';

export interface SchedulerOptions {
  cache: StalewiseCache;
  locks: LockRegistry;
  config: StalewiseConfig;
  logger: StalewiseLogger;
  /** Called when a background generation settles */
  onRegeneration?: (key: string, outcome: RegenerationOutcome) => void;
}

interface Flight {
  lock: RegenerationLock;
  controller: AbortController;
  /** Shared by every request that waits on this generation */
  promise: Promise<Artifact>;
  /** Blocking requests still waiting; only counted for blocking flights */
  waiters: number;
  /** Whether the flight is given up once no request waits on it */
  blocking: boolean;
}

/**
 * Race a promise against a deadline and, when given, an abort signal. The
 * timer and the listener are removed as soon as either side settles.
 */
function withDeadline<T>(promise: Promise<T>, ms: number, onTimeout: () => Error, signal?: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => {
      clearTimeout(timer);
      reject(toError(signal?.reason));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      reject(onTimeout());
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });

    promise.then(
      (value) => {
        clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
        reject(error);
      },
    );
  });
}

async function invoke(key: string, generate: GenerateFunction, signal: AbortSignal): Promise<Generated> {
  try {
    return await generate(signal);
  } catch (error) {
    if (error instanceof GenerationError || error instanceof GenerationTimeoutError) throw error;
    throw new GenerationError(key, error);
  }
}

/**
 * Stale-while-revalidate policy per cache key:
 *   absent       -> block on a single-flight generation
 *   fresh        -> serve from cache
 *   stale        -> serve from cache, refresh in the background
 *   regenerating -> serve from cache, a refresh is already running
 */
export function createScheduler(options: SchedulerOptions): StalewiseScheduler {
  const { cache, locks, config, logger, onRegeneration } = options;
  const flights = new Map<string, Flight>();
  const running = new Set<Promise<void>>();
  let closed = false;

  function track(promise: Promise<Artifact>): void {
    const settled: Promise<void> = promise.then(
      () => {
        running.delete(settled);
      },
      () => {
        // Failures are recorded and logged where they happen
        running.delete(settled);
      },
    );
    running.add(settled);
  }

  function startFlight(
    key: string,
    lock: RegenerationLock,
    generate: GenerateFunction,
    timeout: number,
    blocking: boolean,
    finish: (generated: Generated, current: boolean) => Artifact,
    fail: (error: Error) => void,
  ): Flight {
    const controller = new AbortController();
    const version = cache.version(key);

    const promise = withDeadline(
      invoke(key, generate, controller.signal),
      timeout,
      () => {
        const error = new GenerationTimeoutError(key, timeout);
        // Best effort: the render function decides whether it honours the signal
        controller.abort(error);
        return error;
      },
      controller.signal,
    )
      // An invalidation since the start means the result may already be out of date
      .then((generated) => finish(generated, cache.version(key) === version))
      .catch((error: unknown) => {
        const normalized = toError(error);
        fail(normalized);
        throw normalized;
      })
      .finally(() => {
        if (flights.get(key) === flight) {
          flights.delete(key);
        }
        lock.release();
      });

    const flight: Flight = { lock, controller, promise, waiters: 0, blocking };
    flights.set(key, flight);
    track(promise);
    return flight;
  }

  function abandon(key: string, flight: Flight, timeout: number): void {
    logger.warn(`ABANDON: no request is waiting on ${key}`);
    if (flights.get(key) === flight) {
      flights.delete(key);
    }
    flight.lock.release();
    flight.controller.abort(new GenerationTimeoutError(key, timeout));
  }

  /**
   * Wait on a flight under the caller's own deadline. The last blocking
   * request to give up takes the flight down with it.
   */
  function wait(key: string, flight: Flight, timeout: number): Promise<Artifact> {
    flight.waiters++;
    return withDeadline(flight.promise, timeout, () => {
      flight.waiters--;
      if (flight.blocking && flight.waiters === 0) {
        abandon(key, flight, timeout);
      }
      return new GenerationTimeoutError(key, timeout);
    });
  }

  function generateBlocking(key: string, generate: GenerateFunction, timeout: number): Promise<Artifact> {
    const existing = flights.get(key);
    if (existing) {
      logger.log(`JOIN: waiting on in-flight generation for ${key}`);
      return wait(key, existing, timeout);
    }

    if (closed) {
      return Promise.reject(new GenerationError(key, new Error('scheduler is closed')));
    }

    const lock = locks.tryAcquire(key);
    if (!lock) {
      return Promise.reject(new GenerationError(key, new Error('regeneration lock is held without a running generation')));
    }

    logger.log(`GENERATE: blocking generation for ${key}`);
    const flight = startFlight(
      key,
      lock,
      generate,
      Math.max(config.generation.backgroundTimeout, timeout),
      true,
      (generated, current) => {
        if (!current) {
          logger.warn(`SKIP CACHE: ${key} was invalidated during generation`);
        } else if (config.generation.shouldCache(generated.artifact.status)) {
          cache.put(key, generated.artifact, generated.revalidate);
        } else {
          logger.warn(`SKIP CACHE: status ${generated.artifact.status} for ${key}`);
        }
        return generated.artifact;
      },
      (error) => {
        logger.warn(`FAILED: blocking generation for ${key}`, error.message);
      },
    );
    return wait(key, flight, timeout);
  }

  function startBackground(key: string, generate: GenerateFunction, firstTime: boolean): boolean {
    if (closed) return false;

    const lock = locks.tryAcquire(key);
    if (!lock) {
      logger.log(`SKIP: generation already in flight for ${key}`);
      return false;
    }

    // Re-check under the lock: another generation may have finished since the caller looked
    const current = cache.get(key);
    if (firstTime ? current !== undefined : current?.state !== 'stale') {
      lock.release();
      return false;
    }
    if (!firstTime) {
      cache.markRegenerating(key);
    }

    logger.log(`${firstTime ? 'BACKFILL' : 'REVALIDATE'}: background generation for ${key}`);
    startFlight(
      key,
      lock,
      generate,
      config.generation.backgroundTimeout,
      false,
      (generated, stillCurrent) => {
        const { status } = generated.artifact;
        if (!config.generation.shouldCache(status)) {
          throw new GenerationError(key, new Error(`status ${status} is not cacheable`));
        }
        if (!stillCurrent) {
          logger.warn(`SKIP CACHE: ${key} was invalidated during generation`);
          return generated.artifact;
        }
        cache.put(key, generated.artifact, generated.revalidate);
        onRegeneration?.(key, 'success');
        return generated.artifact;
      },
      (error) => {
        // Keep the last good artifact; the entry stays eligible for another attempt
        cache.markRegenerationFailed(key, error);
        logger.error(`Background generation failed for ${key}`, error.message);
        onRegeneration?.(key, 'failure');
      },
    );
    return true;
  }

  async function idle(): Promise<void> {
    while (running.size > 0) {
      await Promise.all(Array.from(running));
    }
  }

  return {
    async serve(key: string, generate: GenerateFunction, serveOptions?: ServeOptions): Promise<ServeResult> {
      cache.markStale(key);
      const entry = cache.get(key);

      if (!entry) {
        const timeout = serveOptions?.timeout ?? config.generation.timeout;
        const artifact = await generateBlocking(key, generate, timeout);
        return { artifact, status: 'MISS' };
      }

      switch (entry.state) {
        case 'fresh':
          return { artifact: entry.artifact, status: 'HIT' };
        case 'stale':
          startBackground(key, generate, false);
          return { artifact: entry.artifact, status: 'STALE' };
        case 'regenerating':
          return { artifact: entry.artifact, status: 'STALE' };
        default: {
          const unknownState: never = entry.state;
          throw new Error(`Unknown entry state: ${String(unknownState)}`);
        }
      }
    },

    backfill(key: string, generate: GenerateFunction): boolean {
      return startBackground(key, generate, true);
    },

    idle,

    async close(): Promise<void> {
      closed = true;
      for (const [key, flight] of flights) {
        flight.controller.abort(new GenerationError(key, new Error('scheduler closed')));
      }
      await idle();
    },
  };
}
